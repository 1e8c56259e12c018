// =============================================================================
// Delphic AST (TS-only data model handed over by the parser)
// =============================================================================

export interface Position {
  line: number;
  column: number;
}

export interface Span {
  start: Position;
  end: Position;
}

// Base node with discriminant
export interface AstNode {
  type: string;
  span?: Span;
}

// -----------------------------------------------------------------------------
// Identifiers
// -----------------------------------------------------------------------------

export interface Identifier extends AstNode {
  type: 'Identifier';
  name: string;
}
export function identifier(name: string): Identifier {
  return { type: 'Identifier', name };
}

function toIdentifier(name: Identifier | string): Identifier {
  return typeof name === 'string' ? identifier(name) : name;
}

// -----------------------------------------------------------------------------
// Types
// -----------------------------------------------------------------------------

export interface SimpleTypeExpression extends AstNode { type: 'SimpleTypeExpression'; name: Identifier; }
export interface ArrayTypeExpression extends AstNode {
  type: 'ArrayTypeExpression';
  elementType: TypeExpression;
  low?: Expression;
  high?: Expression;
}
export interface FunctionTypeExpression extends AstNode {
  type: 'FunctionTypeExpression';
  paramTypes: TypeExpression[];
  returnType?: TypeExpression;
}

export interface SetTypeExpression extends AstNode { type: 'SetTypeExpression'; elementType: TypeExpression; }

export type TypeExpression = SimpleTypeExpression | ArrayTypeExpression | FunctionTypeExpression | SetTypeExpression;

export function simpleTypeExpression(name: Identifier | string): SimpleTypeExpression {
  return { type: 'SimpleTypeExpression', name: toIdentifier(name) };
}
export function dynamicArrayType(elementType: TypeExpression | string): ArrayTypeExpression {
  return { type: 'ArrayTypeExpression', elementType: toTypeExpression(elementType) };
}
export function staticArrayType(low: Expression | number, high: Expression | number, elementType: TypeExpression | string): ArrayTypeExpression {
  return {
    type: 'ArrayTypeExpression',
    elementType: toTypeExpression(elementType),
    low: typeof low === 'number' ? integerLiteral(low) : low,
    high: typeof high === 'number' ? integerLiteral(high) : high,
  };
}
export function functionTypeExpression(paramTypes: (TypeExpression | string)[], returnType?: TypeExpression | string): FunctionTypeExpression {
  return {
    type: 'FunctionTypeExpression',
    paramTypes: paramTypes.map(toTypeExpression),
    returnType: returnType === undefined ? undefined : toTypeExpression(returnType),
  };
}

export function setTypeExpression(elementType: TypeExpression | string): SetTypeExpression {
  return { type: 'SetTypeExpression', elementType: toTypeExpression(elementType) };
}

export function toTypeExpression(t: TypeExpression | string): TypeExpression {
  return typeof t === 'string' ? simpleTypeExpression(t) : t;
}

// -----------------------------------------------------------------------------
// Literals
// -----------------------------------------------------------------------------

export interface IntegerLiteral extends AstNode { type: 'IntegerLiteral'; value: number; }
export interface FloatLiteral extends AstNode { type: 'FloatLiteral'; value: number; }
export interface StringLiteral extends AstNode { type: 'StringLiteral'; value: string; }
export interface BooleanLiteral extends AstNode { type: 'BooleanLiteral'; value: boolean; }
export interface NilLiteral extends AstNode { type: 'NilLiteral'; value: null; }
export interface ArrayLiteral extends AstNode {
  type: 'ArrayLiteral';
  elements: Expression[];
  typeAnnotation?: TypeExpression;
}
/** `low..high` inside a set literal. */
export interface RangeExpression extends AstNode { type: 'RangeExpression'; low: Expression; high: Expression; }
export interface SetLiteral extends AstNode { type: 'SetLiteral'; elements: (Expression | RangeExpression)[]; }
export interface RecordFieldInitializer extends AstNode { type: 'RecordFieldInitializer'; name: Identifier; value: Expression; }
export interface RecordLiteral extends AstNode {
  type: 'RecordLiteral';
  typeName?: Identifier;
  fields: RecordFieldInitializer[];
}

export function integerLiteral(value: number): IntegerLiteral { return { type: 'IntegerLiteral', value }; }
export function floatLiteral(value: number): FloatLiteral { return { type: 'FloatLiteral', value }; }
export function stringLiteral(value: string): StringLiteral { return { type: 'StringLiteral', value }; }
export function booleanLiteral(value: boolean): BooleanLiteral { return { type: 'BooleanLiteral', value }; }
export function nilLiteral(): NilLiteral { return { type: 'NilLiteral', value: null }; }
export function arrayLiteral(elements: Expression[], typeAnnotation?: TypeExpression): ArrayLiteral {
  return { type: 'ArrayLiteral', elements, typeAnnotation };
}
export function rangeExpression(low: Expression, high: Expression): RangeExpression { return { type: 'RangeExpression', low, high }; }
export function setLiteral(elements: (Expression | RangeExpression)[]): SetLiteral { return { type: 'SetLiteral', elements }; }
export function recordFieldInitializer(name: Identifier | string, value: Expression): RecordFieldInitializer {
  return { type: 'RecordFieldInitializer', name: toIdentifier(name), value };
}
export function recordLiteral(typeName: Identifier | string | undefined, fields: RecordFieldInitializer[]): RecordLiteral {
  return { type: 'RecordLiteral', typeName: typeName === undefined ? undefined : toIdentifier(typeName), fields };
}

// -----------------------------------------------------------------------------
// Expressions
// -----------------------------------------------------------------------------

export type BinaryOperator =
  | '+' | '-' | '*' | '/' | 'div' | 'mod'
  | 'and' | 'or' | 'xor' | 'shl' | 'shr'
  | '=' | '<>' | '<' | '<=' | '>' | '>='
  | 'in';

export type UnaryOperator = '-' | '+' | 'not';

export interface UnaryExpression extends AstNode { type: 'UnaryExpression'; operator: UnaryOperator; operand: Expression; }
export interface BinaryExpression extends AstNode { type: 'BinaryExpression'; operator: BinaryOperator; left: Expression; right: Expression; }
export interface MemberAccessExpression extends AstNode { type: 'MemberAccessExpression'; object: Expression; member: Identifier; }
export interface IndexExpression extends AstNode { type: 'IndexExpression'; object: Expression; index: Expression; }
export interface FunctionCall extends AstNode { type: 'FunctionCall'; callee: Expression; arguments: Expression[]; }
export interface LambdaExpression extends AstNode {
  type: 'LambdaExpression';
  params: Parameter[];
  returnType?: TypeExpression;
  body: BlockStatement | Expression;
}
export interface IsExpression extends AstNode { type: 'IsExpression'; expression: Expression; targetType: TypeExpression; }
export interface AsExpression extends AstNode { type: 'AsExpression'; expression: Expression; targetType: TypeExpression; }
export interface InheritedExpression extends AstNode { type: 'InheritedExpression'; method?: Identifier; arguments?: Expression[]; }
export interface AddressOfExpression extends AstNode { type: 'AddressOfExpression'; target: Identifier | MemberAccessExpression; }
export interface TypeCastExpression extends AstNode { type: 'TypeCastExpression'; targetType: TypeExpression; expression: Expression; }

export type Expression =
  | Identifier
  | IntegerLiteral
  | FloatLiteral
  | StringLiteral
  | BooleanLiteral
  | NilLiteral
  | ArrayLiteral
  | SetLiteral
  | RecordLiteral
  | UnaryExpression
  | BinaryExpression
  | MemberAccessExpression
  | IndexExpression
  | FunctionCall
  | LambdaExpression
  | IsExpression
  | AsExpression
  | InheritedExpression
  | AddressOfExpression
  | TypeCastExpression;

export function unaryExpression(operator: UnaryOperator, operand: Expression): UnaryExpression { return { type: 'UnaryExpression', operator, operand }; }
export function binaryExpression(operator: BinaryOperator, left: Expression, right: Expression): BinaryExpression { return { type: 'BinaryExpression', operator, left, right }; }
export function memberAccessExpression(object: Expression, member: Identifier | string): MemberAccessExpression {
  return { type: 'MemberAccessExpression', object, member: toIdentifier(member) };
}
export function indexExpression(object: Expression, index: Expression): IndexExpression { return { type: 'IndexExpression', object, index }; }
/** `a[x, y]` as the parser produces it: `((a)[x])[y]`. */
export function multiIndexExpression(object: Expression, indices: Expression[]): Expression {
  return indices.reduce<Expression>((acc, idx) => indexExpression(acc, idx), object);
}
export function functionCall(callee: Expression | string, args: Expression[] = []): FunctionCall {
  return { type: 'FunctionCall', callee: typeof callee === 'string' ? identifier(callee) : callee, arguments: args };
}
export function methodCall(object: Expression, member: Identifier | string, args: Expression[] = []): FunctionCall {
  return functionCall(memberAccessExpression(object, member), args);
}
export function lambdaExpression(params: Parameter[], body: BlockStatement | Expression, returnType?: TypeExpression | string): LambdaExpression {
  return { type: 'LambdaExpression', params, body, returnType: returnType === undefined ? undefined : toTypeExpression(returnType) };
}
export function isExpression(expression: Expression, targetType: TypeExpression | string): IsExpression {
  return { type: 'IsExpression', expression, targetType: toTypeExpression(targetType) };
}
export function asExpression(expression: Expression, targetType: TypeExpression | string): AsExpression {
  return { type: 'AsExpression', expression, targetType: toTypeExpression(targetType) };
}
export function inheritedExpression(method?: Identifier | string, args?: Expression[]): InheritedExpression {
  return { type: 'InheritedExpression', method: method === undefined ? undefined : toIdentifier(method), arguments: args };
}
export function addressOfExpression(target: Identifier | MemberAccessExpression): AddressOfExpression {
  return { type: 'AddressOfExpression', target };
}
export function typeCastExpression(targetType: TypeExpression | string, expression: Expression): TypeCastExpression {
  return { type: 'TypeCastExpression', targetType: toTypeExpression(targetType), expression };
}

// -----------------------------------------------------------------------------
// Statements
// -----------------------------------------------------------------------------

export type AssignmentOperator = ':=' | '+=' | '-=' | '*=' | '/=';
export type AssignmentTarget = Identifier | MemberAccessExpression | IndexExpression;

export interface Program extends AstNode { type: 'Program'; body: Statement[]; }
export interface BlockStatement extends AstNode { type: 'BlockStatement'; body: Statement[]; }
export interface VarDeclaration extends AstNode {
  type: 'VarDeclaration';
  names: Identifier[];
  varType?: TypeExpression;
  initializer?: Expression;
  isConst?: boolean;
}
export interface AssignmentStatement extends AstNode {
  type: 'AssignmentStatement';
  operator: AssignmentOperator;
  target: AssignmentTarget;
  value: Expression;
}
export interface ExpressionStatement extends AstNode { type: 'ExpressionStatement'; expression: Expression; }
export interface IfStatement extends AstNode { type: 'IfStatement'; condition: Expression; consequence: Statement; alternative?: Statement; }
export interface RangeCaseValue extends AstNode { type: 'RangeCaseValue'; low: Expression; high: Expression; }
export interface CaseBranch extends AstNode { type: 'CaseBranch'; values: (Expression | RangeCaseValue)[]; body: Statement; }
export interface CaseStatement extends AstNode { type: 'CaseStatement'; subject: Expression; branches: CaseBranch[]; elseBranch?: Statement; }
export interface WhileStatement extends AstNode { type: 'WhileStatement'; condition: Expression; body: Statement; }
export interface RepeatStatement extends AstNode { type: 'RepeatStatement'; body: BlockStatement; condition: Expression; }
export interface ForStatement extends AstNode {
  type: 'ForStatement';
  variable: Identifier;
  start: Expression;
  end: Expression;
  direction: 'to' | 'downto';
  step?: Expression;
  body: Statement;
  declaresVariable?: boolean;
}
export interface ForInStatement extends AstNode { type: 'ForInStatement'; variable: Identifier; iterable: Expression; body: Statement; declaresVariable?: boolean; }
export interface BreakStatement extends AstNode { type: 'BreakStatement'; }
export interface ContinueStatement extends AstNode { type: 'ContinueStatement'; }
export interface ExitStatement extends AstNode { type: 'ExitStatement'; value?: Expression; }
export interface ExceptionHandler extends AstNode {
  type: 'ExceptionHandler';
  variable?: Identifier;
  exceptionType?: TypeExpression;
  statement: Statement;
}
export interface ExceptClause extends AstNode { type: 'ExceptClause'; handlers: ExceptionHandler[]; elseBlock?: BlockStatement; }
export interface TryStatement extends AstNode {
  type: 'TryStatement';
  tryBlock: BlockStatement;
  exceptClause?: ExceptClause;
  finallyBlock?: BlockStatement;
}
export interface RaiseStatement extends AstNode { type: 'RaiseStatement'; exception?: Expression; }

export function program(body: Statement[]): Program { return { type: 'Program', body }; }
export function blockStatement(body: Statement[]): BlockStatement { return { type: 'BlockStatement', body }; }
export function varDeclaration(
  names: Identifier | string | (Identifier | string)[],
  varType?: TypeExpression | string,
  initializer?: Expression,
  isConst = false,
): VarDeclaration {
  const list = Array.isArray(names) ? names : [names];
  return {
    type: 'VarDeclaration',
    names: list.map(toIdentifier),
    varType: varType === undefined ? undefined : toTypeExpression(varType),
    initializer,
    isConst,
  };
}
export function constDeclaration(name: Identifier | string, initializer: Expression, varType?: TypeExpression | string): VarDeclaration {
  return varDeclaration(name, varType, initializer, true);
}
export function assignmentStatement(target: AssignmentTarget | string, value: Expression, operator: AssignmentOperator = ':='): AssignmentStatement {
  return { type: 'AssignmentStatement', operator, target: typeof target === 'string' ? identifier(target) : target, value };
}
export function expressionStatement(expression: Expression): ExpressionStatement { return { type: 'ExpressionStatement', expression }; }
export function ifStatement(condition: Expression, consequence: Statement, alternative?: Statement): IfStatement {
  return { type: 'IfStatement', condition, consequence, alternative };
}
export function rangeCaseValue(low: Expression, high: Expression): RangeCaseValue { return { type: 'RangeCaseValue', low, high }; }
export function caseBranch(values: (Expression | RangeCaseValue)[], body: Statement): CaseBranch { return { type: 'CaseBranch', values, body }; }
export function caseStatement(subject: Expression, branches: CaseBranch[], elseBranch?: Statement): CaseStatement {
  return { type: 'CaseStatement', subject, branches, elseBranch };
}
export function whileStatement(condition: Expression, body: Statement): WhileStatement { return { type: 'WhileStatement', condition, body }; }
export function repeatStatement(body: Statement[], condition: Expression): RepeatStatement {
  return { type: 'RepeatStatement', body: blockStatement(body), condition };
}
export function forStatement(
  variable: Identifier | string,
  start: Expression,
  end: Expression,
  body: Statement,
  options: { direction?: 'to' | 'downto'; step?: Expression; declaresVariable?: boolean } = {},
): ForStatement {
  return {
    type: 'ForStatement',
    variable: toIdentifier(variable),
    start,
    end,
    direction: options.direction ?? 'to',
    step: options.step,
    body,
    declaresVariable: options.declaresVariable,
  };
}
export function forInStatement(variable: Identifier | string, iterable: Expression, body: Statement, declaresVariable = false): ForInStatement {
  return { type: 'ForInStatement', variable: toIdentifier(variable), iterable, body, declaresVariable };
}
export function breakStatement(): BreakStatement { return { type: 'BreakStatement' }; }
export function continueStatement(): ContinueStatement { return { type: 'ContinueStatement' }; }
export function exitStatement(value?: Expression): ExitStatement { return { type: 'ExitStatement', value }; }
export function exceptionHandler(
  exceptionType: TypeExpression | string | undefined,
  statement: Statement,
  variable?: Identifier | string,
): ExceptionHandler {
  return {
    type: 'ExceptionHandler',
    exceptionType: exceptionType === undefined ? undefined : toTypeExpression(exceptionType),
    statement,
    variable: variable === undefined ? undefined : toIdentifier(variable),
  };
}
export function exceptClause(handlers: ExceptionHandler[], elseBlock?: BlockStatement): ExceptClause {
  return { type: 'ExceptClause', handlers, elseBlock };
}
export function tryStatement(tryBlock: BlockStatement, exceptClauseNode?: ExceptClause, finallyBlock?: BlockStatement): TryStatement {
  return { type: 'TryStatement', tryBlock, exceptClause: exceptClauseNode, finallyBlock };
}
export function raiseStatement(exception?: Expression): RaiseStatement { return { type: 'RaiseStatement', exception }; }

// -----------------------------------------------------------------------------
// Declarations
// -----------------------------------------------------------------------------

export type ParameterModifier = 'var' | 'const';
export type MethodDirective = 'virtual' | 'override' | 'reintroduce' | 'abstract';
export type RoutineKind = 'routine' | 'constructor' | 'destructor';

export interface Parameter extends AstNode {
  type: 'Parameter';
  name: Identifier;
  paramType?: TypeExpression;
  modifier?: ParameterModifier;
  defaultValue?: Expression;
}
export interface FunctionDeclaration extends AstNode {
  type: 'FunctionDeclaration';
  name: Identifier;
  params: Parameter[];
  returnType?: TypeExpression;
  body?: BlockStatement;
  kind: RoutineKind;
  isClassMethod?: boolean;
  isOverload?: boolean;
  directives?: MethodDirective[];
}
export interface FieldDeclaration extends AstNode {
  type: 'FieldDeclaration';
  name: Identifier;
  fieldType?: TypeExpression;
  initializer?: Expression;
  isClassVar?: boolean;
}
export interface PropertyDeclaration extends AstNode {
  type: 'PropertyDeclaration';
  name: Identifier;
  propertyType: TypeExpression;
  indexParams?: Parameter[];
  readSpec?: Identifier;
  writeSpec?: Identifier;
  isDefault?: boolean;
}
export interface ClassOperatorDeclaration extends AstNode {
  type: 'ClassOperatorDeclaration';
  operator: string;
  operandTypes: TypeExpression[];
  returnType?: TypeExpression;
  binding: Identifier;
}
export interface ClassDeclaration extends AstNode {
  type: 'ClassDeclaration';
  name: Identifier;
  parent?: Identifier;
  interfaces: Identifier[];
  fields: FieldDeclaration[];
  methods: FunctionDeclaration[];
  properties: PropertyDeclaration[];
  operators: ClassOperatorDeclaration[];
  isAbstract?: boolean;
}
export interface RecordDeclaration extends AstNode {
  type: 'RecordDeclaration';
  name: Identifier;
  fields: FieldDeclaration[];
  methods: FunctionDeclaration[];
  properties: PropertyDeclaration[];
  operators: ClassOperatorDeclaration[];
}
export interface InterfaceDeclaration extends AstNode {
  type: 'InterfaceDeclaration';
  name: Identifier;
  parent?: Identifier;
  methods: FunctionDeclaration[];
  properties: PropertyDeclaration[];
}
/** `helper for T` / `record helper for T`: methods and properties bolted onto an existing type. */
export interface HelperDeclaration extends AstNode {
  type: 'HelperDeclaration';
  name: Identifier;
  forType: TypeExpression;
  isRecordHelper?: boolean;
  methods: FunctionDeclaration[];
  properties: PropertyDeclaration[];
  classVars: FieldDeclaration[];
  classConsts: FieldDeclaration[];
}
export interface EnumMember extends AstNode { type: 'EnumMember'; name: Identifier; value?: number; }
export interface EnumDeclaration extends AstNode { type: 'EnumDeclaration'; name: Identifier; members: EnumMember[]; }
export interface TypeAliasDeclaration extends AstNode { type: 'TypeAliasDeclaration'; name: Identifier; aliasedType: TypeExpression; }
/** Global operator overload, or an `implicit` / `explicit` conversion. */
export interface OperatorDeclaration extends AstNode {
  type: 'OperatorDeclaration';
  operator: string;
  operandTypes: TypeExpression[];
  returnType?: TypeExpression;
  binding: Identifier;
}

export function parameter(
  name: Identifier | string,
  paramType?: TypeExpression | string,
  options: { modifier?: ParameterModifier; defaultValue?: Expression } = {},
): Parameter {
  return {
    type: 'Parameter',
    name: toIdentifier(name),
    paramType: paramType === undefined ? undefined : toTypeExpression(paramType),
    modifier: options.modifier,
    defaultValue: options.defaultValue,
  };
}
export function functionDeclaration(
  name: Identifier | string,
  params: Parameter[],
  body: BlockStatement | Statement[] | undefined,
  options: {
    returnType?: TypeExpression | string;
    kind?: RoutineKind;
    isClassMethod?: boolean;
    isOverload?: boolean;
    directives?: MethodDirective[];
  } = {},
): FunctionDeclaration {
  return {
    type: 'FunctionDeclaration',
    name: toIdentifier(name),
    params,
    body: Array.isArray(body) ? blockStatement(body) : body,
    returnType: options.returnType === undefined ? undefined : toTypeExpression(options.returnType),
    kind: options.kind ?? 'routine',
    isClassMethod: options.isClassMethod,
    isOverload: options.isOverload,
    directives: options.directives,
  };
}
export function constructorDeclaration(name: Identifier | string, params: Parameter[], body: Statement[], isOverload = false): FunctionDeclaration {
  return functionDeclaration(name, params, body, { kind: 'constructor', isOverload });
}
export function destructorDeclaration(body: Statement[], name: Identifier | string = 'Destroy'): FunctionDeclaration {
  return functionDeclaration(name, [], body, { kind: 'destructor', directives: ['override'] });
}
export function fieldDeclaration(
  name: Identifier | string,
  fieldType?: TypeExpression | string,
  initializer?: Expression,
  isClassVar = false,
): FieldDeclaration {
  return {
    type: 'FieldDeclaration',
    name: toIdentifier(name),
    fieldType: fieldType === undefined ? undefined : toTypeExpression(fieldType),
    initializer,
    isClassVar,
  };
}
export function propertyDeclaration(
  name: Identifier | string,
  propertyType: TypeExpression | string,
  options: { read?: Identifier | string; write?: Identifier | string; indexParams?: Parameter[]; isDefault?: boolean } = {},
): PropertyDeclaration {
  return {
    type: 'PropertyDeclaration',
    name: toIdentifier(name),
    propertyType: toTypeExpression(propertyType),
    readSpec: options.read === undefined ? undefined : toIdentifier(options.read),
    writeSpec: options.write === undefined ? undefined : toIdentifier(options.write),
    indexParams: options.indexParams,
    isDefault: options.isDefault,
  };
}
export function classOperatorDeclaration(
  operator: string,
  operandTypes: (TypeExpression | string)[],
  binding: Identifier | string,
  returnType?: TypeExpression | string,
): ClassOperatorDeclaration {
  return {
    type: 'ClassOperatorDeclaration',
    operator,
    operandTypes: operandTypes.map(toTypeExpression),
    binding: toIdentifier(binding),
    returnType: returnType === undefined ? undefined : toTypeExpression(returnType),
  };
}
export function classDeclaration(
  name: Identifier | string,
  members: {
    parent?: Identifier | string;
    interfaces?: (Identifier | string)[];
    fields?: FieldDeclaration[];
    methods?: FunctionDeclaration[];
    properties?: PropertyDeclaration[];
    operators?: ClassOperatorDeclaration[];
    isAbstract?: boolean;
  } = {},
): ClassDeclaration {
  return {
    type: 'ClassDeclaration',
    name: toIdentifier(name),
    parent: members.parent === undefined ? undefined : toIdentifier(members.parent),
    interfaces: (members.interfaces ?? []).map(toIdentifier),
    fields: members.fields ?? [],
    methods: members.methods ?? [],
    properties: members.properties ?? [],
    operators: members.operators ?? [],
    isAbstract: members.isAbstract,
  };
}
export function recordDeclaration(
  name: Identifier | string,
  members: {
    fields?: FieldDeclaration[];
    methods?: FunctionDeclaration[];
    properties?: PropertyDeclaration[];
    operators?: ClassOperatorDeclaration[];
  } = {},
): RecordDeclaration {
  return {
    type: 'RecordDeclaration',
    name: toIdentifier(name),
    fields: members.fields ?? [],
    methods: members.methods ?? [],
    properties: members.properties ?? [],
    operators: members.operators ?? [],
  };
}
export function interfaceDeclaration(
  name: Identifier | string,
  methods: FunctionDeclaration[],
  options: { parent?: Identifier | string; properties?: PropertyDeclaration[] } = {},
): InterfaceDeclaration {
  return {
    type: 'InterfaceDeclaration',
    name: toIdentifier(name),
    parent: options.parent === undefined ? undefined : toIdentifier(options.parent),
    methods,
    properties: options.properties ?? [],
  };
}
export function helperDeclaration(
  name: Identifier | string,
  forType: TypeExpression | string,
  members: {
    methods?: FunctionDeclaration[];
    properties?: PropertyDeclaration[];
    classVars?: FieldDeclaration[];
    classConsts?: FieldDeclaration[];
    isRecordHelper?: boolean;
  } = {},
): HelperDeclaration {
  return {
    type: 'HelperDeclaration',
    name: toIdentifier(name),
    forType: toTypeExpression(forType),
    isRecordHelper: members.isRecordHelper,
    methods: members.methods ?? [],
    properties: members.properties ?? [],
    classVars: members.classVars ?? [],
    classConsts: members.classConsts ?? [],
  };
}
export function enumDeclaration(name: Identifier | string, members: (string | EnumMember)[]): EnumDeclaration {
  return {
    type: 'EnumDeclaration',
    name: toIdentifier(name),
    members: members.map((m) => (typeof m === 'string' ? { type: 'EnumMember', name: identifier(m) } : m)),
  };
}
export function typeAliasDeclaration(name: Identifier | string, aliasedType: TypeExpression | string): TypeAliasDeclaration {
  return { type: 'TypeAliasDeclaration', name: toIdentifier(name), aliasedType: toTypeExpression(aliasedType) };
}
export function operatorDeclaration(
  operator: string,
  operandTypes: (TypeExpression | string)[],
  binding: Identifier | string,
  returnType?: TypeExpression | string,
): OperatorDeclaration {
  return {
    type: 'OperatorDeclaration',
    operator,
    operandTypes: operandTypes.map(toTypeExpression),
    binding: toIdentifier(binding),
    returnType: returnType === undefined ? undefined : toTypeExpression(returnType),
  };
}

export type Declaration =
  | FunctionDeclaration
  | ClassDeclaration
  | RecordDeclaration
  | InterfaceDeclaration
  | HelperDeclaration
  | EnumDeclaration
  | TypeAliasDeclaration
  | OperatorDeclaration;

export type Statement =
  | Program
  | BlockStatement
  | VarDeclaration
  | AssignmentStatement
  | ExpressionStatement
  | IfStatement
  | CaseStatement
  | WhileStatement
  | RepeatStatement
  | ForStatement
  | ForInStatement
  | BreakStatement
  | ContinueStatement
  | ExitStatement
  | TryStatement
  | RaiseStatement
  | Declaration;

export type Node = Statement | Expression;

/** Attach a source span; parsers call this, tests use it to check diagnostics. */
export function at<T extends AstNode>(node: T, line: number, column: number): T {
  node.span = { start: { line, column }, end: { line, column } };
  return node;
}
