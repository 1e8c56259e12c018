import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import type { ClassInfo } from "./types/class_info";
import type { RoutineInfo } from "./types/member_info";
import type { OperatorEntry } from "./types/operators";
import type { RecordType } from "./types/record_type";
import {
  copyValue,
  isCallable,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeString,
  typeNameOf,
  unwrapVariant,
  valuesEqual,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateUnaryExpression(node: AST.UnaryExpression, env: Environment): RuntimeValue;
    evaluateBinaryExpression(node: AST.BinaryExpression, env: Environment): RuntimeValue;
    applyBinaryOperator(op: string, left: RuntimeValue, right: RuntimeValue, node: AST.AstNode): RuntimeValue;
    /** Result of a user-declared operator, or undefined when none matches the operand types. */
    invokeOperatorOverload(op: string, operands: RuntimeValue[], node: AST.AstNode): RuntimeValue | undefined;
  }
}

type OperatorOwner =
  | { kind: "class"; info: ClassInfo }
  | { kind: "record"; info: RecordType }
  | { kind: "global" };

type OperatorMatch = { entry: OperatorEntry; owner: OperatorOwner };

/** Type names an operand may match in an operator key: its own type first, then ancestors. */
function operandTypeNames(v: RuntimeValue): string[] {
  switch (v.kind) {
    case "object":
      return v.classInfo.ancestry().map((c) => c.name);
    case "interface":
      return v.object ? [v.interfaceInfo.name, ...v.object.classInfo.ancestry().map((c) => c.name)] : [v.interfaceInfo.name];
    default:
      return [typeNameOf(v)];
  }
}

function cartesian(lists: string[][]): string[][] {
  return lists.reduce<string[][]>((acc, names) => acc.flatMap((prefix) => names.map((n) => [...prefix, n])), [[]]);
}

function isAggregate(v: RuntimeValue): boolean {
  return v.kind === "object" || v.kind === "record" || v.kind === "interface";
}

function findOperator(ctx: Interpreter, op: string, operands: RuntimeValue[]): OperatorMatch | undefined {
  const combos = cartesian(operands.map(operandTypeNames));
  for (const operand of operands) {
    const obj = operand.kind === "interface" ? operand.object : operand;
    if (obj?.kind === "object") {
      for (const combo of combos) {
        const found = obj.classInfo.lookupOperator(op, combo);
        if (found) return { entry: found.entry, owner: { kind: "class", info: found.owner } };
      }
    } else if (obj?.kind === "record") {
      for (const combo of combos) {
        const entry = obj.recordType.lookupOperator(op, combo);
        if (entry) return { entry, owner: { kind: "record", info: obj.recordType } };
      }
    }
  }
  for (const combo of combos) {
    const entry = ctx.types.operators.lookup(op, combo);
    if (entry) return { entry, owner: { kind: "global" } };
  }
  return undefined;
}

function bindingSet(owner: OperatorOwner, entry: OperatorEntry): RoutineInfo[] | undefined {
  if (owner.kind === "global") return undefined;
  return entry.isClassMethod ? owner.info.lookupClassMethod(entry.bindingName) : owner.info.lookupMethod(entry.bindingName);
}

/** Integers are exact within the safe range; anything beyond it raises EIntOverflow. */
function integerResult(ctx: Interpreter, value: bigint, node: AST.AstNode): RuntimeValue {
  const n = Number(value);
  if (!Number.isSafeInteger(n) || BigInt(n) !== value) return ctx.raiseBuiltin("EIntOverflow", "Integer overflow", node);
  return makeInteger(n);
}

function integerArithmetic(op: string, a: bigint, b: bigint): bigint | null {
  switch (op) {
    case "+":
      return a + b;
    case "-":
      return a - b;
    case "*":
      return a * b;
    case "div":
      return a / b;
    case "mod":
      return a % b;
    case "and":
      return a & b;
    case "or":
      return a | b;
    case "xor":
      return a ^ b;
    default:
      return null;
  }
}

/** Relational result from a three-way order (-1, 0, 1); null for non-relational operators. */
function compare(op: string, order: number): boolean | null {
  switch (op) {
    case "=":
      return order === 0;
    case "<>":
      return order !== 0;
    case "<":
      return order < 0;
    case "<=":
      return order <= 0;
    case ">":
      return order > 0;
    case ">=":
      return order >= 0;
    default:
      return null;
  }
}

function numberOrder(a: number, b: number): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function stringOrder(a: string, b: string): number {
  return a < b ? -1 : a > b ? 1 : 0;
}

function jsonScalar(v: RuntimeValue): string | number | boolean | null | undefined {
  if (v.kind === "integer" || v.kind === "float" || v.kind === "string" || v.kind === "boolean") return v.value;
  return v.kind === "nil" ? null : undefined;
}

function shift(op: "shl" | "shr", a: number, b: number): bigint {
  const big = BigInt(a);
  const by = BigInt(b);
  return op === "shl" ? big << by : big >> by;
}

export function applyOperationsAugmentations(cls: typeof Interpreter): void {
  cls.prototype.invokeOperatorOverload = function invokeOperatorOverload(
    this: Interpreter,
    op: string,
    operands: RuntimeValue[],
    node: AST.AstNode,
  ): RuntimeValue | undefined {
    const match = findOperator(this, op, operands);
    if (!match) return undefined;
    const { entry, owner } = match;

    if (owner.kind === "global") {
      const fn = this.globals.lookup(entry.bindingName);
      if (!fn || !isCallable(fn)) return this.errorAt(node, `operator ${op} is bound to undefined function ${entry.bindingName}`);
      return this.callFunctionValue(fn, operands, node);
    }

    const set = bindingSet(owner, entry);
    if (!set) return this.errorAt(node, `operator ${op} is bound to undefined method ${owner.info.name}.${entry.bindingName}`);
    if (entry.isClassMethod) {
      const self: RuntimeValue =
        owner.kind === "class" ? { kind: "class_ref", classInfo: owner.info } : { kind: "record_type_ref", recordType: owner.info };
      return this.callRoutineSet(set, operands, { name: entry.bindingName, node, self }).value;
    }
    const selfOperand = operands[entry.selfIndex];
    if (!selfOperand) return this.errorAt(node, `operator ${op} has no operand at position ${entry.selfIndex}`);
    const self = selfOperand.kind === "record" ? copyValue(selfOperand) : selfOperand;
    const rest = operands.filter((_, i) => i !== entry.selfIndex);
    return this.callRoutineSet(set, rest, { name: entry.bindingName, node, self }).value;
  };

  cls.prototype.evaluateUnaryExpression = function evaluateUnaryExpression(this: Interpreter, node: AST.UnaryExpression, env: Environment): RuntimeValue {
    const operand = this.evaluate(node.operand, env);
    if (this.halted(operand)) return operand;
    const v = unwrapVariant(operand);
    if (isAggregate(v)) {
      const overloaded = this.invokeOperatorOverload(node.operator, [v], node);
      if (overloaded) return overloaded;
    }
    switch (node.operator) {
      case "-":
        if (v.kind === "integer") return integerResult(this, -BigInt(v.value), node);
        if (v.kind === "float") return makeFloat(-v.value);
        break;
      case "+":
        if (v.kind === "integer" || v.kind === "float") return v;
        break;
      case "not":
        if (v.kind === "boolean") return makeBoolean(!v.value);
        if (v.kind === "integer") return makeInteger(Number(~BigInt(v.value)));
        break;
    }
    return this.errorAt(node, `operator ${node.operator} not applicable to ${typeNameOf(v)}`);
  };

  cls.prototype.evaluateBinaryExpression = function evaluateBinaryExpression(this: Interpreter, node: AST.BinaryExpression, env: Environment): RuntimeValue {
    const left = this.evaluate(node.left, env);
    if (this.halted(left)) return left;
    if (node.operator === "and" || node.operator === "or") {
      const l = unwrapVariant(left);
      if (l.kind === "boolean" && l.value === (node.operator === "or")) return l;
    }
    // A set on the left types a bracket literal on the right.
    const leftSet = unwrapVariant(left);
    const right = this.evaluate(node.right, env, leftSet.kind === "set" ? { kind: "set", info: leftSet.setType } : undefined);
    if (this.halted(right)) return right;
    return this.applyBinaryOperator(node.operator, left, right, node);
  };

  cls.prototype.applyBinaryOperator = function applyBinaryOperator(
    this: Interpreter,
    op: string,
    leftValue: RuntimeValue,
    rightValue: RuntimeValue,
    node: AST.AstNode,
  ): RuntimeValue {
    const l = unwrapVariant(leftValue);
    const r = unwrapVariant(rightValue);

    if (isAggregate(l) || isAggregate(r)) {
      const overloaded = this.invokeOperatorOverload(op, [l, r], node);
      if (overloaded) return overloaded;
    }
    const setResult = this.applySetOperator(op, l, r, node);
    if (setResult) return setResult;

    const lNum = l.kind === "integer" || l.kind === "float";
    const rNum = r.kind === "integer" || r.kind === "float";
    if (l.kind === "integer" && r.kind === "integer" && op !== "/") {
      if ((op === "div" || op === "mod") && r.value === 0) return this.raiseBuiltin("EDivByZero", "Division by zero", node);
      if (op === "shl" || op === "shr") {
        if (r.value < 0) return this.errorAt(node, `negative shift count ${r.value}`);
        return integerResult(this, shift(op, l.value, r.value), node);
      }
      const exact = integerArithmetic(op, BigInt(l.value), BigInt(r.value));
      if (exact !== null) return integerResult(this, exact, node);
    }
    if ((l.kind === "integer" || l.kind === "float") && (r.kind === "integer" || r.kind === "float")) {
      switch (op) {
        case "+":
          return makeFloat(l.value + r.value);
        case "-":
          return makeFloat(l.value - r.value);
        case "*":
          return makeFloat(l.value * r.value);
        case "/":
          if (r.value === 0) return this.raiseBuiltin("EDivByZero", "Division by zero", node);
          return makeFloat(l.value / r.value);
        default: {
          const c = compare(op, numberOrder(l.value, r.value));
          if (c !== null) return makeBoolean(c);
        }
      }
    } else if (l.kind === "string" && r.kind === "string") {
      if (op === "+") return makeString(l.value + r.value);
      if (op === "in") return makeBoolean(r.value.includes(l.value));
      const c = compare(op, stringOrder(l.value, r.value));
      if (c !== null) return makeBoolean(c);
    } else if (l.kind === "boolean" && r.kind === "boolean") {
      switch (op) {
        case "and":
          return makeBoolean(l.value && r.value);
        case "or":
          return makeBoolean(l.value || r.value);
        case "xor":
          return makeBoolean(l.value !== r.value);
        default: {
          const c = compare(op, numberOrder(Number(l.value), Number(r.value)));
          if (c !== null) return makeBoolean(c);
        }
      }
    } else if (l.kind === "enum" && r.kind === "enum" && l.enumType === r.enumType) {
      const c = compare(op, numberOrder(l.ordinal, r.ordinal));
      if (c !== null) return makeBoolean(c);
    }

    if (op === "in") {
      if (r.kind === "array") return makeBoolean(r.elements.some((e) => valuesEqual(l, e)));
      if (r.kind === "json" && Array.isArray(r.node)) {
        const needle = jsonScalar(l);
        return makeBoolean(needle !== undefined && r.node.some((e) => e === needle));
      }
      if (r.kind === "json" && r.node !== null && typeof r.node === "object" && l.kind === "string") {
        return makeBoolean(Object.prototype.hasOwnProperty.call(r.node, l.value));
      }
      if (r.kind === "nil") return makeBoolean(false);
    }
    if (op === "=" || op === "<>") {
      const eq = valuesEqual(l, r);
      const comparable = (lNum && rNum) || l.kind === r.kind || l.kind === "nil" || r.kind === "nil" || l.kind === "interface" || r.kind === "interface";
      if (comparable) return makeBoolean(op === "=" ? eq : !eq);
    }

    const overloaded = this.invokeOperatorOverload(op, [l, r], node);
    if (overloaded) return overloaded;
    return this.errorAt(node, `operator ${op} not applicable to ${typeNameOf(l)} and ${typeNameOf(r)}`);
  };
}
