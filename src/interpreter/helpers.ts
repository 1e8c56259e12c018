import type * as AST from "../ast";
import { buildProperty, fieldType } from "./definitions";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { isAssignableLocation } from "./objects";
import { HelperInfo } from "./types/helper_info";
import { routineArity, type PropertyInfo, type RoutineInfo } from "./types/member_info";
import { typeToString } from "./types/runtime_type";
import {
  NIL,
  copyValue,
  defaultValueFor,
  runtimeTypeOf,
  unwrapVariant,
  type ErrorValue,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateHelperDeclaration(node: AST.HelperDeclaration, env: Environment): RuntimeValue;
    /** Helper method call on `receiver`, or undefined when no helper declares `name`. */
    callHelperMethod(
      receiver: RuntimeValue,
      name: string,
      argNodes: AST.Expression[],
      node: AST.AstNode,
      env: Environment,
      receiverExpr?: AST.Expression,
    ): RuntimeValue | undefined;
    /** Helper property, class variable, constant or parameterless method; undefined when no helper has it. */
    findHelperMember(receiver: RuntimeValue, name: string, node: AST.AstNode, env: Environment, receiverExpr?: AST.Expression): RuntimeValue | undefined;
    /** Undefined when no helper declares `name`. */
    setHelperMember(receiver: RuntimeValue, name: string, value: RuntimeValue, node: AST.AstNode, env: Environment): RuntimeValue | undefined;
    helperDeclaresMethod(receiver: RuntimeValue, name: string): boolean;
  }
}

type Dispatch = {
  name: string;
  node: AST.AstNode;
  env: Environment;
  argNodes?: AST.Expression[];
  receiverExpr?: AST.Expression;
  /** Copy a mutated record Self back even without an assignable receiver expression. */
  forceWriteBack?: boolean;
};

/** Interfaces dispatch on the object behind them. */
function helperReceiver(v: RuntimeValue): RuntimeValue {
  const u = unwrapVariant(v);
  return u.kind === "interface" && u.object ? u.object : u;
}

function findHelperFor(ctx: Interpreter, receiver: RuntimeValue, name: string): HelperInfo | undefined {
  return ctx.types.findHelper(runtimeTypeOf(receiver), name);
}

/** Runs a helper routine with the receiver as Self; record receivers get their mutations back. */
function invokeHelper(ctx: Interpreter, set: RoutineInfo[], receiver: RuntimeValue, args: RuntimeValue[], call: Dispatch): RuntimeValue {
  const self = receiver.kind === "record" ? copyValue(receiver) : receiver;
  const outcome = ctx.callRoutineSet(set, args, { name: call.name, node: call.node, self, argNodes: call.argNodes, env: call.env });
  const mutated = outcome.self;
  if (
    receiver.kind === "record" &&
    mutated?.kind === "record" &&
    mutated !== receiver &&
    (call.forceWriteBack === true || isAssignableLocation(call.receiverExpr, call.env))
  ) {
    receiver.fields.clear();
    for (const [k, v] of mutated.fields) receiver.fields.set(k, v);
  }
  return outcome.value;
}

function readHelperProperty(
  ctx: Interpreter,
  helper: HelperInfo,
  receiver: RuntimeValue,
  prop: PropertyInfo,
  call: Dispatch,
): RuntimeValue {
  if (!prop.readSpec) return ctx.errorAt(call.node, `property ${prop.name} is write-only`);
  const stored = helper.lookupField(prop.readSpec);
  if (stored !== undefined) return stored;
  const set = helper.lookupMethod(prop.readSpec);
  if (!set) return ctx.errorAt(call.node, `read accessor ${prop.readSpec} of property ${helper.name}.${prop.name} not found`);
  return invokeHelper(ctx, set, receiver, [], { ...call, name: prop.readSpec, argNodes: undefined });
}

function writeHelperProperty(
  ctx: Interpreter,
  helper: HelperInfo,
  receiver: RuntimeValue,
  prop: PropertyInfo,
  value: RuntimeValue,
  call: Dispatch,
): RuntimeValue {
  if (!prop.writeSpec) return ctx.errorAt(call.node, `property ${prop.name} is read-only`);
  if (helper.lookupField(prop.writeSpec) !== undefined) return ctx.assignVariable(prop.writeSpec, value, helper.scope, call.node);
  const set = helper.lookupMethod(prop.writeSpec);
  if (!set) return ctx.errorAt(call.node, `write accessor ${prop.writeSpec} of property ${helper.name}.${prop.name} not found`);
  const r = invokeHelper(ctx, set, receiver, [value], { ...call, name: prop.writeSpec, argNodes: undefined, forceWriteBack: true });
  return ctx.halted(r) ? r : NIL;
}

/** Class constants first, then class variables, each in the helper's own scope. */
function declareHelperState(ctx: Interpreter, info: HelperInfo, node: AST.HelperDeclaration): ErrorValue | null {
  const scope = info.scope;
  for (const [field, isConst] of [...node.classConsts.map((f) => [f, true] as const), ...node.classVars.map((f) => [f, false] as const)]) {
    const name = field.name.name;
    if (scope.hasInCurrentScope(name)) return ctx.errorAt(field, `duplicate member ${name} in helper ${info.name}`);
    if (isConst && !field.initializer) return ctx.errorAt(field, `constant ${name} needs a value`);
    const type = fieldType(ctx, field, scope);
    if (type.kind === "error") return type;
    let value = defaultValueFor(type);
    if (field.initializer) {
      const v = ctx.evaluate(field.initializer, scope, type);
      if (v.kind === "error") return v;
      value = ctx.coerceValue(v, type, field.initializer);
      if (value.kind === "error") return value;
    }
    scope.define(name, value, type, { isConst });
  }
  return null;
}

function declareHelperMembers(ctx: Interpreter, info: HelperInfo, node: AST.HelperDeclaration): ErrorValue | null {
  const stateError = declareHelperState(ctx, info, node);
  if (stateError) return stateError;

  for (const method of node.methods) {
    if (method.kind === "constructor" || method.kind === "destructor") {
      return ctx.errorAt(method, `helper ${info.name} cannot declare ${method.kind} ${method.name.name}`);
    }
    info.addMethod({
      name: method.name.name,
      node: method,
      ownerName: info.name,
      isClassMethod: method.isClassMethod ?? false,
      closure: info.scope,
    });
  }

  for (const decl of node.properties) {
    if ((decl.indexParams ?? []).length > 0) return ctx.errorAt(decl, `helper property ${decl.name.name} cannot be indexed`);
    const prop = buildProperty(ctx, info, decl, info.scope);
    if ("kind" in prop) return prop;
    const err = info.addProperty(prop);
    if (err) return ctx.errorAt(decl, err);
  }
  return null;
}

export function applyHelperAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluateHelperDeclaration = function evaluateHelperDeclaration(
    this: Interpreter,
    node: AST.HelperDeclaration,
    env: Environment,
  ): RuntimeValue {
    const target = this.resolveTypeExpression(node.forType, env);
    if (target.kind === "error") return target;
    if (node.isRecordHelper && (target.kind === "class" || target.kind === "interface")) {
      return this.errorAt(node, `record helper ${node.name.name} cannot extend ${typeToString(target)}`);
    }
    const info = new HelperInfo(node.name.name, target, new Environment(env), node.isRecordHelper ?? false);
    const err = this.types.registerHelper(info);
    if (err) return this.errorAt(node, err);
    const failure = declareHelperMembers(this, info, node);
    if (failure) {
      this.types.helpers.splice(this.types.helpers.indexOf(info), 1);
      return failure;
    }
    return NIL;
  };

  cls.prototype.callHelperMethod = function callHelperMethod(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    argNodes: AST.Expression[],
    node: AST.AstNode,
    env: Environment,
    receiverExpr?: AST.Expression,
  ): RuntimeValue | undefined {
    const r = helperReceiver(receiver);
    const helper = findHelperFor(this, r, name);
    if (!helper) return undefined;
    const set = helper.lookupMethod(name);
    if (!set) {
      const member = this.findHelperMember(r, name, node, env, receiverExpr);
      if (member === undefined || this.halted(member)) return member;
      return this.callValue(member, argNodes, node, env);
    }
    const args = this.evaluateCallArguments(set, argNodes, env);
    if (!Array.isArray(args)) return args;
    return invokeHelper(this, set, r, args, { name, node, env, argNodes, receiverExpr });
  };

  cls.prototype.findHelperMember = function findHelperMember(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    node: AST.AstNode,
    env: Environment,
    receiverExpr?: AST.Expression,
  ): RuntimeValue | undefined {
    const r = helperReceiver(receiver);
    const helper = findHelperFor(this, r, name);
    if (!helper) return undefined;
    const prop = helper.lookupProperty(name);
    if (prop) return readHelperProperty(this, helper, r, prop, { name, node, env, receiverExpr });
    const set = helper.lookupMethod(name);
    if (set) {
      if (set.some((routine) => routineArity(routine).min === 0)) return invokeHelper(this, set, r, [], { name, node, env, receiverExpr });
      return { kind: "function", name, overloads: set, closure: helper.scope, self: r };
    }
    return helper.lookupField(name);
  };

  cls.prototype.setHelperMember = function setHelperMember(
    this: Interpreter,
    receiver: RuntimeValue,
    name: string,
    value: RuntimeValue,
    node: AST.AstNode,
    env: Environment,
  ): RuntimeValue | undefined {
    const r = helperReceiver(receiver);
    const helper = findHelperFor(this, r, name);
    if (!helper) return undefined;
    const prop = helper.lookupProperty(name);
    if (prop) return writeHelperProperty(this, helper, r, prop, value, { name, node, env });
    if (helper.lookupField(name) !== undefined) return this.assignVariable(name, value, helper.scope, node);
    return this.errorAt(node, `cannot assign to method ${helper.name}.${name}`);
  };

  cls.prototype.helperDeclaresMethod = function helperDeclaresMethod(this: Interpreter, receiver: RuntimeValue, name: string): boolean {
    const r = helperReceiver(receiver);
    return findHelperFor(this, r, name)?.lookupMethod(name) !== undefined;
  };
}
