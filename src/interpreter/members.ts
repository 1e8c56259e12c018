import * as AST from "../ast";
import { builtinMinArity } from "../builtins/registry";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { isJsonObject, jsonObjectGet, valueToJson } from "./json";
import type { ClassInfo } from "./types/class_info";
import { routineArity, type PropertyInfo, type RoutineInfo } from "./types/member_info";
import { sameName, normalizeName } from "./types/runtime_type";
import {
  NIL,
  isError,
  makeString,
  typeNameOf,
  unwrapVariant,
  type ObjectValue,
  type RecordValue,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateIdentifier(node: AST.Identifier, env: Environment): RuntimeValue;
    evaluateMemberAccess(node: AST.MemberAccessExpression, env: Environment): RuntimeValue;
    /** Member value, or undefined when the receiver has no such member. */
    findMember(receiver: RuntimeValue, name: string, node: AST.AstNode, env: Environment, receiverExpr?: AST.Expression): RuntimeValue | undefined;
    getMember(receiver: RuntimeValue, name: string, node: AST.AstNode, env: Environment, receiverExpr?: AST.Expression): RuntimeValue;
    setMember(receiver: RuntimeValue, name: string, value: RuntimeValue, node: AST.AstNode, env: Environment): RuntimeValue;
    findProperty(receiver: RuntimeValue, name: string): PropertyInfo | undefined;
    defaultPropertyOf(receiver: RuntimeValue): PropertyInfo | undefined;
    readProperty(receiver: RuntimeValue, prop: PropertyInfo, indices: RuntimeValue[], node: AST.AstNode, env: Environment): RuntimeValue;
    writeProperty(receiver: RuntimeValue, prop: PropertyInfo, indices: RuntimeValue[], value: RuntimeValue, node: AST.AstNode, env: Environment): RuntimeValue;
    /** True when `Self` members shadow the binding `name` resolves to in `env`. */
    selfShadows(name: string, env: Environment): boolean;
  }
}

const ACCESSOR_SELF = "__accessor_self";

function hasZeroArgOverload(set: RoutineInfo[]): boolean {
  return set.some((r) => routineArity(r).min === 0);
}

function receiverObject(v: RuntimeValue): ObjectValue | RecordValue | null {
  const u = unwrapVariant(v);
  if (u.kind === "object" || u.kind === "record") return u;
  if (u.kind === "interface") return u.object;
  return null;
}

/**
 * Calls an accessor method through a synthesized call whose receiver and
 * arguments are fresh temporaries in a child scope. Returns the call result
 * and the receiver as the accessor left it (records are passed by copy).
 */
function invokeAccessor(
  ctx: Interpreter,
  receiver: RuntimeValue,
  methodName: string,
  args: RuntimeValue[],
  node: AST.AstNode,
  env: Environment,
): { value: RuntimeValue; receiver: RuntimeValue } {
  const tmpEnv = new Environment(env);
  tmpEnv.define(ACCESSOR_SELF, receiver);
  const argIds = args.map((arg, i) => {
    const name = `__accessor_arg${i}`;
    tmpEnv.define(name, arg);
    return AST.identifier(name);
  });
  const call = AST.functionCall(AST.memberAccessExpression(AST.identifier(ACCESSOR_SELF), methodName), argIds);
  call.span = node.span;
  const value = ctx.evaluate(call, tmpEnv);
  return { value, receiver: tmpEnv.lookup(ACCESSOR_SELF) ?? receiver };
}

function objectMember(ctx: Interpreter, obj: ObjectValue, name: string, node: AST.AstNode, env: Environment): RuntimeValue | undefined {
  const cls = obj.classInfo;
  const field = cls.lookupField(name);
  if (field) return obj.fields.get(normalizeName(field.name)) ?? NIL;
  const prop = cls.lookupProperty(name);
  if (prop) {
    if (prop.indexParams.length > 0) return ctx.errorAt(node, `indexed property ${prop.name} requires an index`);
    return ctx.readProperty(obj, prop, [], node, env);
  }
  const methods = cls.lookupMethod(name);
  if (methods) {
    if (hasZeroArgOverload(methods)) return ctx.callMethod(obj, name, [], node, env);
    return { kind: "function", name, overloads: methods, closure: methods[0]?.closure ?? ctx.globals, self: obj };
  }
  const classVar = cls.lookupClassVar(name);
  if (classVar) return classVar.value;
  const classMethods = cls.lookupClassMethod(name);
  if (classMethods && hasZeroArgOverload(classMethods)) return ctx.callMethod(obj, name, [], node, env);
  if (sameName(name, "ClassName")) return makeString(cls.name);
  return undefined;
}

function classMember(ctx: Interpreter, cls: ClassInfo, name: string, node: AST.AstNode, env: Environment): RuntimeValue | undefined {
  const classVar = cls.lookupClassVar(name);
  if (classVar) return classVar.value;
  const classMethods = cls.lookupClassMethod(name);
  if (classMethods && hasZeroArgOverload(classMethods)) return ctx.callMethod({ kind: "class_ref", classInfo: cls }, name, [], node, env);
  const ctors = cls.lookupConstructor(name);
  if (ctors && hasZeroArgOverload(ctors)) return ctx.instantiate(cls, name, [], node, env);
  if (sameName(name, "ClassName")) return makeString(cls.name);
  return undefined;
}

/** Member the receiver's own type declares; helpers are consulted only when this finds nothing. */
function ownMember(
  ctx: Interpreter,
  r: RuntimeValue,
  name: string,
  node: AST.AstNode,
  env: Environment,
  receiverExpr?: AST.Expression,
): RuntimeValue | undefined {
  switch (r.kind) {
    case "object":
      return objectMember(ctx, r, name, node, env);
    case "interface":
      if (!r.object) return ctx.errorAt(node, `cannot access member '${name}' of nil`);
      return objectMember(ctx, r.object, name, node, env);
    case "record": {
      const field = r.recordType.lookupField(name);
      if (field) return r.fields.get(normalizeName(field.name)) ?? NIL;
      const prop = r.recordType.lookupProperty(name);
      if (prop) {
        if (prop.indexParams.length > 0) return ctx.errorAt(node, `indexed property ${prop.name} requires an index`);
        return ctx.readProperty(r, prop, [], node, env);
      }
      const methods = r.recordType.lookupMethod(name) ?? r.recordType.lookupClassMethod(name);
      if (methods && hasZeroArgOverload(methods)) return ctx.callMethod(r, name, [], node, env, receiverExpr);
      return undefined;
    }
    case "class_ref":
      return classMember(ctx, r.classInfo, name, node, env);
    case "record_type_ref": {
      const methods = r.recordType.lookupClassMethod(name);
      if (methods && hasZeroArgOverload(methods)) return ctx.callMethod(r, name, [], node, env);
      return undefined;
    }
    case "enum_type_ref": {
      const member = r.enumType.lookup(name);
      return member ? { kind: "enum", enumType: r.enumType, name: member.name, ordinal: member.ordinal } : undefined;
    }
    case "json":
      return isJsonObject(r.node) ? jsonObjectGet(r.node, name) : undefined;
    case "nil":
      return ctx.errorAt(node, `cannot access member '${name}' of nil`);
    default:
      return undefined;
  }
}

export function applyMemberAugmentations(cls: typeof Interpreter): void {
  cls.prototype.selfShadows = function selfShadows(this: Interpreter, name: string, env: Environment): boolean {
    if (sameName(name, "Self")) return false;
    const selfDepth = env.depthOf("Self");
    if (selfDepth === -1) return false;
    const depth = env.depthOf(name);
    return depth === -1 || depth > selfDepth;
  };

  cls.prototype.evaluateIdentifier = function evaluateIdentifier(this: Interpreter, node: AST.Identifier, env: Environment): RuntimeValue {
    const name = node.name;
    if (this.selfShadows(name, env)) {
      const self = env.lookup("Self") ?? NIL;
      const member = this.findMember(self, name, node, env, AST.identifier("Self"));
      if (member !== undefined) return member;
    }

    const binding = env.lookupBinding(name);
    if (binding) {
      const value = binding.value;
      if (binding.isRoutine && value.kind === "function" && hasZeroArgOverload(value.overloads)) {
        return this.callFunctionValue(value, [], node);
      }
      return value;
    }

    const cls = this.types.getClass(name);
    if (cls) return { kind: "class_ref", classInfo: cls };
    const rec = this.types.getRecord(name);
    if (rec) return { kind: "record_type_ref", recordType: rec };
    const en = this.types.getEnum(name);
    if (en) return { kind: "enum_type_ref", enumType: en };
    const member = this.types.findEnumMember(name);
    if (member) return { kind: "enum", enumType: member.enumType, name: member.member.name, ordinal: member.member.ordinal };

    const builtin = this.builtins.lookup(name);
    if (builtin && builtinMinArity(builtin) === 0) {
      return this.callBuiltin(builtin, [], node);
    }
    if (this.hosts.has(name)) return this.callHost(name, [], node);

    return this.errorAt(node, `undefined identifier: ${name}`);
  };

  cls.prototype.evaluateMemberAccess = function evaluateMemberAccess(this: Interpreter, node: AST.MemberAccessExpression, env: Environment): RuntimeValue {
    const receiver = this.evaluate(node.object, env);
    if (this.halted(receiver)) return receiver;
    return this.getMember(receiver, node.member.name, node, env, node.object);
  };

  cls.prototype.findMember = function findMember(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    node: AST.AstNode,
    env: Environment,
    receiverExpr?: AST.Expression,
  ): RuntimeValue | undefined {
    const own = ownMember(this, unwrapVariant(receiver), name, node, env, receiverExpr);
    if (own !== undefined) return own;
    return this.findHelperMember(receiver, name, node, env, receiverExpr);
  };

  cls.prototype.getMember = function getMember(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    node: AST.AstNode,
    env: Environment,
    receiverExpr?: AST.Expression,
  ): RuntimeValue {
    const found = this.findMember(receiver, name, node, env, receiverExpr);
    if (found !== undefined) return found;
    return this.errorAt(node, `unknown member '${name}' of ${typeNameOf(unwrapVariant(receiver))}`);
  };

  cls.prototype.setMember = function setMember(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    value: RuntimeValue,
    node: AST.AstNode,
    env: Environment,
  ): RuntimeValue {
    const r = unwrapVariant(receiver);
    switch (r.kind) {
      case "interface":
        if (!r.object) return this.errorAt(node, `cannot assign member '${name}' of nil`);
        return this.setMember(r.object, name, value, node, env);
      case "object":
      case "record": {
        const field = r.kind === "object" ? r.classInfo.lookupField(name) : r.recordType.lookupField(name);
        if (field) {
          const coerced = this.coerceValue(value, field.type, node);
          if (this.halted(coerced)) return coerced;
          r.fields.set(normalizeName(field.name), coerced);
          return NIL;
        }
        const prop = r.kind === "object" ? r.classInfo.lookupProperty(name) : r.recordType.lookupProperty(name);
        if (prop) return this.writeProperty(r, prop, [], value, node, env);
        if (r.kind === "object") {
          const classVar = r.classInfo.lookupClassVar(name);
          if (classVar) {
            const coerced = this.coerceValue(value, classVar.type, node);
            if (this.halted(coerced)) return coerced;
            classVar.value = coerced;
            return NIL;
          }
        }
        return this.setHelperMember(r, name, value, node, env) ?? this.errorAt(node, `unknown member '${name}' of ${typeNameOf(r)}`);
      }
      case "class_ref": {
        const classVar = r.classInfo.lookupClassVar(name);
        if (!classVar) return this.errorAt(node, `unknown class member '${name}' of ${r.classInfo.name}`);
        const coerced = this.coerceValue(value, classVar.type, node);
        if (this.halted(coerced)) return coerced;
        classVar.value = coerced;
        return NIL;
      }
      case "json": {
        if (!isJsonObject(r.node)) return this.errorAt(node, `cannot assign member '${name}' of non-object JSON`);
        const converted = valueToJson(value);
        if (!converted.ok) return this.errorAt(node, converted.message);
        r.node[name] = converted.node;
        return NIL;
      }
      case "nil":
        return this.errorAt(node, `cannot assign member '${name}' of nil`);
      default:
        return this.setHelperMember(r, name, value, node, env) ?? this.errorAt(node, `cannot assign member '${name}' of ${typeNameOf(r)}`);
    }
  };

  cls.prototype.findProperty = function findProperty(this: Interpreter, receiver: RuntimeValue, name: string): PropertyInfo | undefined {
    const target = receiverObject(receiver);
    if (!target) return undefined;
    return target.kind === "object" ? target.classInfo.lookupProperty(name) : target.recordType.lookupProperty(name);
  };

  cls.prototype.defaultPropertyOf = function defaultPropertyOf(this: Interpreter, receiver: RuntimeValue): PropertyInfo | undefined {
    const target = receiverObject(receiver);
    if (!target) return undefined;
    return target.kind === "object" ? target.classInfo.defaultProperty() : target.recordType.defaultProperty();
  };

  cls.prototype.readProperty = function readProperty(
    this: Interpreter,
    receiver: RuntimeValue,
    prop: PropertyInfo,
    indices: RuntimeValue[],
    node: AST.AstNode,
    env: Environment,
  ): RuntimeValue {
    const target = receiverObject(receiver);
    if (!target) return this.errorAt(node, `cannot read property ${prop.name} of nil`);
    if (!prop.readSpec) return this.errorAt(node, `property ${prop.name} is write-only`);
    if (indices.length === 0) {
      const field = target.kind === "object" ? target.classInfo.lookupField(prop.readSpec) : target.recordType.lookupField(prop.readSpec);
      if (field) return target.fields.get(normalizeName(field.name)) ?? NIL;
    }
    return invokeAccessor(this, target, prop.readSpec, indices, node, env).value;
  };

  cls.prototype.writeProperty = function writeProperty(
    this: Interpreter,
    receiver: RuntimeValue,
    prop: PropertyInfo,
    indices: RuntimeValue[],
    value: RuntimeValue,
    node: AST.AstNode,
    env: Environment,
  ): RuntimeValue {
    const target = receiverObject(receiver);
    if (!target) return this.errorAt(node, `cannot write property ${prop.name} of nil`);
    if (!prop.writeSpec) return this.errorAt(node, `property ${prop.name} is read-only`);
    if (indices.length === 0) {
      const field = target.kind === "object" ? target.classInfo.lookupField(prop.writeSpec) : target.recordType.lookupField(prop.writeSpec);
      if (field) {
        const coerced = this.coerceValue(value, field.type, node);
        if (this.halted(coerced)) return coerced;
        target.fields.set(normalizeName(field.name), coerced);
        return NIL;
      }
    }
    const result = invokeAccessor(this, target, prop.writeSpec, [...indices, value], node, env);
    if (this.halted(result.value)) return result.value;
    if (target.kind === "record" && result.receiver.kind === "record" && result.receiver !== target) {
      target.fields.clear();
      for (const [k, v] of result.receiver.fields) target.fields.set(k, v);
    }
    return isError(result.value) ? result.value : NIL;
  };
}
