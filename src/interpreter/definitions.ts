import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { ClassInfo } from "./types/class_info";
import { EnumType } from "./types/enum_type";
import { InterfaceInfo } from "./types/interface_info";
import type { PropertyInfo, RoutineInfo } from "./types/member_info";
import { operatorSelfIndex, type OperatorEntry } from "./types/operators";
import { RecordType } from "./types/record_type";
import { normalizeName, sameName, typeToString, type RuntimeType } from "./types/runtime_type";
import { NIL, defaultValueFor, runtimeTypeOf, type ErrorValue, type FunctionValue, type RuntimeValue } from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateFunctionDeclaration(node: AST.FunctionDeclaration, env: Environment): RuntimeValue;
    evaluateClassDeclaration(node: AST.ClassDeclaration, env: Environment): RuntimeValue;
    evaluateRecordDeclaration(node: AST.RecordDeclaration, env: Environment): RuntimeValue;
    evaluateInterfaceDeclaration(node: AST.InterfaceDeclaration, env: Environment): RuntimeValue;
    evaluateEnumDeclaration(node: AST.EnumDeclaration): RuntimeValue;
    evaluateTypeAliasDeclaration(node: AST.TypeAliasDeclaration, env: Environment): RuntimeValue;
    evaluateOperatorDeclaration(node: AST.OperatorDeclaration, env: Environment): RuntimeValue;
  }
}

const CONVERSION_OPERATORS = new Set(["implicit", "explicit"]);

type MemberOwner = {
  name: string;
  lookupField(name: string): unknown;
  lookupMethod(name: string): RoutineInfo[] | undefined;
  lookupClassMethod(name: string): RoutineInfo[] | undefined;
  registerOperator(entry: OperatorEntry): string | null;
};

/** Anything a property's accessors can name. */
export type AccessorOwner = Omit<MemberOwner, "registerOperator">;

/** Declared field type, or the type of its initializer when none is written. */
export function fieldType(ctx: Interpreter, field: AST.FieldDeclaration, env: Environment): RuntimeType | ErrorValue {
  if (field.fieldType) return ctx.resolveTypeExpression(field.fieldType, env);
  if (!field.initializer) return ctx.errorAt(field, `field ${field.name.name} needs a type or an initializer`);
  const v = ctx.evaluate(field.initializer, env);
  if (v.kind === "error") return v;
  return runtimeTypeOf(v);
}

export function buildProperty(ctx: Interpreter, owner: AccessorOwner, decl: AST.PropertyDeclaration, env: Environment): PropertyInfo | ErrorValue {
  const name = decl.name.name;
  const type = ctx.resolveTypeExpression(decl.propertyType, env);
  if (type.kind === "error") return type;
  const indexParams = decl.indexParams ?? [];
  if (!decl.readSpec && !decl.writeSpec) return ctx.errorAt(decl, `property ${name} needs a read or write accessor`);
  if (decl.isDefault && indexParams.length === 0) return ctx.errorAt(decl, `default property ${name} must be indexed`);
  for (const [role, spec] of [["read", decl.readSpec], ["write", decl.writeSpec]] as const) {
    if (!spec) continue;
    const found = owner.lookupField(spec.name) !== undefined || owner.lookupMethod(spec.name) !== undefined || owner.lookupClassMethod(spec.name) !== undefined;
    if (!found) return ctx.errorAt(spec, `${role} accessor ${spec.name} of property ${owner.name}.${name} not found`);
  }
  return {
    name,
    type,
    indexParams,
    readSpec: decl.readSpec?.name,
    writeSpec: decl.writeSpec?.name,
    isDefault: decl.isDefault ?? false,
    ownerName: owner.name,
  };
}

function operandTypeNames(ctx: Interpreter, types: AST.TypeExpression[], env: Environment): string[] | ErrorValue {
  const names: string[] = [];
  for (const t of types) {
    const resolved = ctx.resolveTypeExpression(t, env);
    if (resolved.kind === "error") return resolved;
    names.push(typeToString(resolved));
  }
  return names;
}

function registerOwnOperator(
  ctx: Interpreter,
  owner: MemberOwner,
  decl: AST.ClassOperatorDeclaration,
  env: Environment,
): ErrorValue | null {
  if (CONVERSION_OPERATORS.has(decl.operator.toLowerCase())) {
    return ctx.errorAt(decl, `conversion operator ${decl.operator} must be declared at global scope`);
  }
  const names = operandTypeNames(ctx, decl.operandTypes, env);
  if (!Array.isArray(names)) return names;
  const binding = decl.binding.name;
  const isInstance = owner.lookupMethod(binding) !== undefined;
  const isClassMethod = !isInstance && owner.lookupClassMethod(binding) !== undefined;
  if (!isInstance && !isClassMethod) return ctx.errorAt(decl, `operator ${decl.operator} binds unknown method ${owner.name}.${binding}`);
  const err = owner.registerOperator({
    operator: decl.operator,
    operandTypes: names,
    bindingName: binding,
    selfIndex: operatorSelfIndex(decl.operator, names, owner.name, isClassMethod),
    isClassMethod,
  });
  return err ? ctx.errorAt(decl, err) : null;
}

/** Declared spelling of a normalized interface method name. */
function interfaceMethodName(iface: InterfaceInfo, key: string): string {
  let cur: InterfaceInfo | null = iface;
  while (cur) {
    const m = cur.methods.get(key);
    if (m) return m.name.name;
    cur = cur.parent;
  }
  return key;
}

function declareClassMembers(ctx: Interpreter, info: ClassInfo, node: AST.ClassDeclaration, env: Environment): ErrorValue | null {
  for (const field of node.fields) {
    const type = fieldType(ctx, field, env);
    if (type.kind === "error") return type;
    let err: string | null;
    if (field.isClassVar) {
      let value = defaultValueFor(type);
      if (field.initializer) {
        const v = ctx.evaluate(field.initializer, env, type);
        if (v.kind === "error") return v;
        value = ctx.coerceValue(v, type, field.initializer);
        if (value.kind === "error") return value;
      }
      err = info.addClassVar({ name: field.name.name, type, value });
    } else {
      err = info.addField({ name: field.name.name, type, initializer: field.initializer, ownerName: info.name });
    }
    if (err) return ctx.errorAt(field, err);
  }

  for (const method of node.methods) {
    const routine: RoutineInfo = {
      name: method.name.name,
      node: method,
      ownerName: info.name,
      isClassMethod: method.isClassMethod ?? false,
      closure: env,
    };
    if (method.kind === "constructor") info.addConstructor(routine);
    else if (method.kind === "destructor") info.setDestructor(routine);
    else info.addMethod(routine);
  }

  for (const decl of node.properties) {
    const prop = buildProperty(ctx, info, decl, env);
    if ("kind" in prop) return prop;
    const err = info.addProperty(prop);
    if (err) return ctx.errorAt(decl, err);
  }

  for (const decl of node.operators) {
    const err = registerOwnOperator(ctx, info, decl, env);
    if (err) return err;
  }

  for (const id of node.interfaces) {
    const iface = ctx.types.getInterface(id.name);
    if (!iface) return ctx.errorAt(id, `unknown interface ${id.name}`);
    info.addInterface(iface);
    const [missing] = info.missingInterfaceMethods(iface);
    if (missing !== undefined) {
      return ctx.errorAt(node, `class ${info.name} does not implement method ${interfaceMethodName(iface, missing)} of interface ${iface.name}`);
    }
  }

  const vmtError = info.buildVMT();
  return vmtError ? ctx.errorAt(node, vmtError) : null;
}

function declareRecordMembers(ctx: Interpreter, info: RecordType, node: AST.RecordDeclaration, env: Environment): ErrorValue | null {
  for (const field of node.fields) {
    if (field.isClassVar) return ctx.errorAt(field, `record ${info.name} cannot declare class variable ${field.name.name}`);
    const type = fieldType(ctx, field, env);
    if (type.kind === "error") return type;
    const err = info.addField({ name: field.name.name, type, initializer: field.initializer, ownerName: info.name });
    if (err) return ctx.errorAt(field, err);
  }
  for (const method of node.methods) {
    info.addMethod({
      name: method.name.name,
      node: method,
      ownerName: info.name,
      isClassMethod: (method.isClassMethod ?? false) || method.kind === "constructor",
      closure: env,
    });
  }
  for (const decl of node.properties) {
    const prop = buildProperty(ctx, info, decl, env);
    if ("kind" in prop) return prop;
    const err = info.addProperty(prop);
    if (err) return ctx.errorAt(decl, err);
  }
  for (const decl of node.operators) {
    const err = registerOwnOperator(ctx, info, decl, env);
    if (err) return err;
  }
  return null;
}

export function applyDefinitionAugmentations(cls: typeof Interpreter): void {
  /**
   * Binds a global routine. Same-name declarations merge into one overload
   * set; a bodied declaration replaces a forward one of the same arity.
   */
  cls.prototype.evaluateFunctionDeclaration = function evaluateFunctionDeclaration(
    this: Interpreter,
    node: AST.FunctionDeclaration,
    env: Environment,
  ): RuntimeValue {
    const name = node.name.name;
    const routine: RoutineInfo = { name, node, isClassMethod: false, closure: env };
    const existing = env.ownBinding(name);
    if (!existing) {
      const fn: FunctionValue = { kind: "function", name, overloads: [routine], closure: env };
      env.define(name, fn, undefined, { isRoutine: true });
      return NIL;
    }
    if (!existing.isRoutine || existing.value.kind !== "function") return this.errorAt(node, `identifier ${name} already declared`);

    const overloads = existing.value.overloads;
    const forward = overloads.findIndex((r) => !r.node.body && r.node.params.length === node.params.length);
    if (forward !== -1 && node.body) {
      overloads[forward] = routine;
      return NIL;
    }
    if (!node.isOverload && !overloads.some((r) => r.node.isOverload)) {
      return this.errorAt(node, `function ${name} already declared; mark overloads with 'overload'`);
    }
    overloads.push(routine);
    return NIL;
  };

  cls.prototype.evaluateClassDeclaration = function evaluateClassDeclaration(this: Interpreter, node: AST.ClassDeclaration, env: Environment): RuntimeValue {
    const name = node.name.name;
    let parent: ClassInfo | null = null;
    if (node.parent) {
      parent = this.types.getClass(node.parent.name) ?? null;
      if (!parent) return this.errorAt(node.parent, `unknown parent class ${node.parent.name}`);
    } else if (!sameName(name, "TObject")) {
      parent = this.types.getClass("TObject") ?? null;
    }

    const info = new ClassInfo(name, parent);
    info.isAbstract = node.isAbstract ?? false;
    const err = this.types.registerClass(info);
    if (err) return this.errorAt(node, err);

    const failure = declareClassMembers(this, info, node, env);
    if (failure) {
      this.types.classes.delete(normalizeName(name));
      return failure;
    }
    return NIL;
  };

  cls.prototype.evaluateRecordDeclaration = function evaluateRecordDeclaration(this: Interpreter, node: AST.RecordDeclaration, env: Environment): RuntimeValue {
    const info = new RecordType(node.name.name);
    const err = this.types.registerRecord(info);
    if (err) return this.errorAt(node, err);
    const failure = declareRecordMembers(this, info, node, env);
    if (failure) {
      this.types.records.delete(normalizeName(info.name));
      return failure;
    }
    return NIL;
  };

  cls.prototype.evaluateInterfaceDeclaration = function evaluateInterfaceDeclaration(
    this: Interpreter,
    node: AST.InterfaceDeclaration,
    env: Environment,
  ): RuntimeValue {
    let parent: InterfaceInfo | null = null;
    if (node.parent) {
      parent = this.types.getInterface(node.parent.name) ?? null;
      if (!parent) return this.errorAt(node.parent, `unknown parent interface ${node.parent.name}`);
    }
    const info = new InterfaceInfo(node.name.name, parent);
    for (const method of node.methods) info.addMethod(method);
    for (const decl of node.properties) {
      const type = this.resolveTypeExpression(decl.propertyType, env);
      if (type.kind === "error") return type;
      info.addProperty({
        name: decl.name.name,
        type,
        indexParams: decl.indexParams ?? [],
        readSpec: decl.readSpec?.name,
        writeSpec: decl.writeSpec?.name,
        isDefault: decl.isDefault ?? false,
        ownerName: info.name,
      });
    }
    const err = this.types.registerInterface(info);
    return err ? this.errorAt(node, err) : NIL;
  };

  cls.prototype.evaluateEnumDeclaration = function evaluateEnumDeclaration(this: Interpreter, node: AST.EnumDeclaration): RuntimeValue {
    const info = new EnumType(node.name.name);
    for (const member of node.members) {
      const err = info.addMember(member.name.name, member.value);
      if (err) return this.errorAt(member, err);
    }
    const err = this.types.registerEnum(info);
    return err ? this.errorAt(node, err) : NIL;
  };

  cls.prototype.evaluateTypeAliasDeclaration = function evaluateTypeAliasDeclaration(
    this: Interpreter,
    node: AST.TypeAliasDeclaration,
    env: Environment,
  ): RuntimeValue {
    const type = this.resolveTypeExpression(node.aliasedType, env);
    if (type.kind === "error") return type;
    const err = this.types.registerAlias(node.name.name, type);
    return err ? this.errorAt(node, err) : NIL;
  };

  /** Global operators bind to a function by name; `implicit` / `explicit` feed the conversion registry. */
  cls.prototype.evaluateOperatorDeclaration = function evaluateOperatorDeclaration(
    this: Interpreter,
    node: AST.OperatorDeclaration,
    env: Environment,
  ): RuntimeValue {
    const names = operandTypeNames(this, node.operandTypes, env);
    if (!Array.isArray(names)) return names;
    const kind = node.operator.toLowerCase();

    if (kind === "implicit" || kind === "explicit") {
      const [from, ...rest] = names;
      if (from === undefined || rest.length > 0) return this.errorAt(node, `${kind} conversion takes exactly one operand type`);
      if (!node.returnType) return this.errorAt(node, `${kind} conversion from ${from} needs a return type`);
      const to = this.resolveTypeExpression(node.returnType, env);
      if (to.kind === "error") return to;
      const err = this.types.conversions.register({ kind, from, to: typeToString(to), bindingName: node.binding.name });
      return err ? this.errorAt(node, err) : NIL;
    }

    const err = this.types.operators.register({
      operator: node.operator,
      operandTypes: names,
      bindingName: node.binding.name,
      selfIndex: -1,
      isClassMethod: false,
    });
    return err ? this.errorAt(node, err) : NIL;
  };
}
