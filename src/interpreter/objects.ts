import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import type { ClassInfo } from "./types/class_info";
import { isVirtualRoutine, type RoutineInfo } from "./types/member_info";
import { normalizeName, sameName } from "./types/runtime_type";
import {
  NIL,
  copyValue,
  defaultValueFor,
  isCallable,
  isError,
  makeString,
  typeNameOf,
  unwrapVariant,
  type ErrorValue,
  type FunctionValue,
  type ObjectValue,
  type RecordValue,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    /** New instance with every field initialized, parents first; no constructor runs. */
    allocateObject(info: ClassInfo): ObjectValue | ErrorValue;
    instantiate(cls: ClassInfo, ctorName: string, argNodes: AST.Expression[], node: AST.AstNode, env: Environment): RuntimeValue;
    callMethod(
      receiver: RuntimeValue,
      name: string,
      argNodes: AST.Expression[],
      node: AST.AstNode,
      env: Environment,
      receiverExpr?: AST.Expression,
    ): RuntimeValue;
    hasMethod(receiver: RuntimeValue, name: string): boolean;
    /** Bound method pointer for `@obj.M`, or undefined when the receiver has no such method. */
    methodPointer(receiver: RuntimeValue, name: string): FunctionValue | undefined;
  }
}

export function isAssignableLocation(expr: AST.Expression | undefined, env: Environment): boolean {
  if (!expr) return false;
  switch (expr.type) {
    case "Identifier":
      return !(env.lookupBinding(expr.name)?.isConst ?? false);
    case "MemberAccessExpression":
    case "IndexExpression":
      return true;
    default:
      return false;
  }
}

function boundFunction(name: string, overloads: RoutineInfo[], self: RuntimeValue, fallback: Environment): FunctionValue {
  return { kind: "function", name, overloads, closure: overloads[0]?.closure ?? fallback, self };
}

/** The routine to run for an instance call: statically bound when the receiver's declared class says so, else through the VMT. */
function resolveInstanceRoutine(
  ctx: Interpreter,
  obj: ObjectValue,
  set: RoutineInfo[],
  args: RuntimeValue[],
  name: string,
  node: AST.AstNode,
  env: Environment,
  receiverExpr?: AST.Expression,
): RoutineInfo | ErrorValue {
  const staticType = receiverExpr ? ctx.semanticTypeOf(receiverExpr, env) : undefined;
  if (staticType?.kind === "class" && obj.classInfo.inheritsFrom(staticType.info.name)) {
    const staticSet = staticType.info.lookupMethod(name);
    if (staticSet) {
      const chosen = ctx.selectOverload(staticSet, args, name, node);
      if ("kind" in chosen) return chosen;
      if (!isVirtualRoutine(chosen)) return chosen;
      return obj.classInfo.dispatch(chosen);
    }
  }
  const chosen = ctx.selectOverload(set, args, name, node);
  if ("kind" in chosen) return chosen;
  return obj.classInfo.dispatch(chosen);
}

function callObjectMethod(
  ctx: Interpreter,
  obj: ObjectValue,
  name: string,
  argNodes: AST.Expression[],
  node: AST.AstNode,
  env: Environment,
  receiverExpr?: AST.Expression,
): RuntimeValue {
  const cls = obj.classInfo;

  if (sameName(name, "Free")) {
    const destructor = cls.lookupDestructor();
    if (!destructor) return NIL;
    return ctx.callRoutine(destructor, [], { name: "Free", node, self: obj }).value;
  }

  const methods = cls.lookupMethod(name);
  if (methods) {
    const args = ctx.evaluateCallArguments(methods, argNodes, env);
    if (!Array.isArray(args)) return args;
    const routine = resolveInstanceRoutine(ctx, obj, methods, args, name, node, env, receiverExpr);
    if ("kind" in routine) return routine;
    return ctx.callRoutine(routine, args, { name, node, self: obj, argNodes, env }).value;
  }

  const classMethods = cls.lookupClassMethod(name);
  if (classMethods) return callClassMethod(ctx, cls, classMethods, name, argNodes, node, env);

  // `obj.Create(...)` re-runs a constructor on an existing instance.
  const ctors = cls.lookupConstructor(name);
  if (ctors) {
    const args = ctx.evaluateCallArguments(ctors, argNodes, env);
    if (!Array.isArray(args)) return args;
    const r = ctx.callRoutineSet(ctors, args, { name, node, self: obj, argNodes, env }).value;
    return ctx.halted(r) ? r : obj;
  }

  const field = cls.lookupField(name);
  if (field) return ctx.callValue(obj.fields.get(normalizeName(field.name)) ?? NIL, argNodes, node, env);

  if (sameName(name, "ClassName") && argNodes.length === 0) return makeString(cls.name);
  return ctx.callHelperMethod(obj, name, argNodes, node, env, receiverExpr) ?? ctx.errorAt(node, `unknown method '${name}' of ${cls.name}`);
}

function callClassMethod(
  ctx: Interpreter,
  cls: ClassInfo,
  set: RoutineInfo[],
  name: string,
  argNodes: AST.Expression[],
  node: AST.AstNode,
  env: Environment,
): RuntimeValue {
  const args = ctx.evaluateCallArguments(set, argNodes, env);
  if (!Array.isArray(args)) return args;
  return ctx.callRoutineSet(set, args, { name, node, self: { kind: "class_ref", classInfo: cls }, argNodes, env }).value;
}

function callRecordMethod(
  ctx: Interpreter,
  rec: RecordValue,
  name: string,
  argNodes: AST.Expression[],
  node: AST.AstNode,
  env: Environment,
  receiverExpr?: AST.Expression,
): RuntimeValue {
  const recordType = rec.recordType;
  const classMethods = recordType.lookupClassMethod(name);
  const methods = recordType.lookupMethod(name);
  if (!methods) {
    if (!classMethods) {
      const field = recordType.lookupField(name);
      if (field) return ctx.callValue(rec.fields.get(normalizeName(field.name)) ?? NIL, argNodes, node, env);
      return ctx.callHelperMethod(rec, name, argNodes, node, env, receiverExpr) ?? ctx.errorAt(node, `unknown method '${name}' of ${recordType.name}`);
    }
    const args = ctx.evaluateCallArguments(classMethods, argNodes, env);
    if (!Array.isArray(args)) return args;
    return ctx.callRoutineSet(classMethods, args, { name, node, self: { kind: "record_type_ref", recordType }, argNodes, env }).value;
  }

  const args = ctx.evaluateCallArguments(methods, argNodes, env);
  if (!Array.isArray(args)) return args;
  const outcome = ctx.callRoutineSet(methods, args, { name, node, self: copyValue(rec), argNodes, env });
  const mutated = outcome.self;
  if (mutated?.kind === "record" && mutated !== rec && isAssignableLocation(receiverExpr, env)) {
    rec.fields.clear();
    for (const [k, v] of mutated.fields) rec.fields.set(k, v);
  }
  return outcome.value;
}

export function applyObjectAugmentations(cls: typeof Interpreter): void {
  cls.prototype.allocateObject = function allocateObject(this: Interpreter, info: ClassInfo): ObjectValue | ErrorValue {
    const obj: ObjectValue = { kind: "object", classInfo: info, fields: new Map(), id: this.nextObjectId++ };
    for (const [key, field] of info.fields) {
      if (!field.initializer) {
        obj.fields.set(key, defaultValueFor(field.type));
        continue;
      }
      const v = this.evaluate(field.initializer, this.globals, field.type);
      if (isError(v)) return v;
      const coerced = this.coerceValue(v, field.type, field.initializer);
      if (isError(coerced)) return coerced;
      obj.fields.set(key, coerced);
      if (this.exception) break;
    }
    return obj;
  };

  cls.prototype.instantiate = function instantiate(
    this: Interpreter,
    info: ClassInfo,
    ctorName: string,
    argNodes: AST.Expression[],
    node: AST.AstNode,
    env: Environment,
  ): RuntimeValue {
    if (info.isAbstract || info.hasAbstractMethods()) return this.errorAt(node, `cannot instantiate abstract class ${info.name}`);
    const ctors = info.lookupConstructor(ctorName);
    if (!ctors) return this.errorAt(node, `unknown constructor ${info.name}.${ctorName}`);
    const args = this.evaluateCallArguments(ctors, argNodes, env);
    if (!Array.isArray(args)) return args;
    const obj = this.allocateObject(info);
    if (this.halted(obj)) return obj;
    const r = this.callRoutineSet(ctors, args, { name: `${info.name}.${ctorName}`, node, self: obj, argNodes, env }).value;
    return this.halted(r) ? r : obj;
  };

  cls.prototype.callMethod = function callMethod(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    argNodes: AST.Expression[],
    node: AST.AstNode,
    env: Environment,
    receiverExpr?: AST.Expression,
  ): RuntimeValue {
    const r = unwrapVariant(receiver);
    switch (r.kind) {
      case "nil":
        if (sameName(name, "Free")) return NIL;
        return this.errorAt(node, `cannot call method '${name}' on nil`);
      case "interface":
        if (!r.object) {
          if (sameName(name, "Free")) return NIL;
          return this.errorAt(node, `cannot call method '${name}' on nil`);
        }
        return callObjectMethod(this, r.object, name, argNodes, node, env);
      case "object":
        return callObjectMethod(this, r, name, argNodes, node, env, receiverExpr);
      case "class_ref": {
        const info = r.classInfo;
        if (info.lookupConstructor(name)) return this.instantiate(info, name, argNodes, node, env);
        const classMethods = info.lookupClassMethod(name);
        if (classMethods) return callClassMethod(this, info, classMethods, name, argNodes, node, env);
        if (sameName(name, "ClassName") && argNodes.length === 0) return makeString(info.name);
        return this.errorAt(node, `unknown class method '${name}' of ${info.name}`);
      }
      case "record":
        return callRecordMethod(this, r, name, argNodes, node, env, receiverExpr);
      case "record_type_ref": {
        const set = r.recordType.lookupClassMethod(name);
        if (!set) return this.errorAt(node, `unknown class method '${name}' of ${r.recordType.name}`);
        const args = this.evaluateCallArguments(set, argNodes, env);
        if (!Array.isArray(args)) return args;
        return this.callRoutineSet(set, args, { name, node, self: r, argNodes, env }).value;
      }
      default: {
        if (r.kind === "set" && (sameName(name, "Include") || sameName(name, "Exclude"))) {
          const [argNode, ...extra] = argNodes;
          if (!argNode || extra.length > 0) return this.errorAt(node, `${name} expects 1 arguments, got ${argNodes.length}`);
          const element = this.evaluate(argNode, env);
          if (this.halted(element)) return element;
          return this.updateSet(r, element, sameName(name, "Include"), node);
        }
        const helped = this.callHelperMethod(r, name, argNodes, node, env, receiverExpr);
        if (helped !== undefined) return helped;
        const member = this.findMember(r, name, node, env, receiverExpr);
        if (member !== undefined && this.halted(member)) return member;
        if (member !== undefined && isCallable(member)) return this.callValue(member, argNodes, node, env);
        return this.errorAt(node, `cannot call method '${name}' on ${typeNameOf(r)}`);
      }
    }
  };

  cls.prototype.hasMethod = function hasMethod(this: Interpreter, receiver: RuntimeValue, name: string): boolean {
    const r = unwrapVariant(receiver);
    switch (r.kind) {
      case "object": {
        const info = r.classInfo;
        if (info.lookupMethod(name) || info.lookupClassMethod(name) || info.lookupConstructor(name)) return true;
        const field = info.lookupField(name);
        const value = field ? r.fields.get(normalizeName(field.name)) : undefined;
        return (value !== undefined && isCallable(value)) || this.helperDeclaresMethod(r, name);
      }
      case "class_ref":
        return r.classInfo.lookupClassMethod(name) !== undefined || r.classInfo.lookupConstructor(name) !== undefined;
      case "record":
        return r.recordType.lookupMethod(name) !== undefined || r.recordType.lookupClassMethod(name) !== undefined || this.helperDeclaresMethod(r, name);
      case "record_type_ref":
        return r.recordType.lookupClassMethod(name) !== undefined;
      default:
        return this.helperDeclaresMethod(r, name);
    }
  };

  cls.prototype.methodPointer = function methodPointer(this: Interpreter, receiver: RuntimeValue, name: string): FunctionValue | undefined {
    const r = unwrapVariant(receiver);
    const target = r.kind === "interface" ? r.object : r;
    if (!target) return undefined;
    switch (target.kind) {
      case "object": {
        const info = target.classInfo;
        const methods = info.lookupMethod(name);
        if (methods) return boundFunction(name, methods.map((m) => info.dispatch(m)), target, this.globals);
        const classMethods = info.lookupClassMethod(name);
        if (classMethods) return boundFunction(name, classMethods, { kind: "class_ref", classInfo: info }, this.globals);
        return undefined;
      }
      case "class_ref": {
        const classMethods = target.classInfo.lookupClassMethod(name);
        return classMethods ? boundFunction(name, classMethods, target, this.globals) : undefined;
      }
      case "record": {
        const methods = target.recordType.lookupMethod(name);
        if (methods) return boundFunction(name, methods, copyValue(target), this.globals);
        const classMethods = target.recordType.lookupClassMethod(name);
        return classMethods ? boundFunction(name, classMethods, { kind: "record_type_ref", recordType: target.recordType }, this.globals) : undefined;
      }
      case "record_type_ref": {
        const classMethods = target.recordType.lookupClassMethod(name);
        return classMethods ? boundFunction(name, classMethods, target, this.globals) : undefined;
      }
      default:
        return undefined;
    }
  };
}
