import * as AST from "../ast";
import type { BuiltinFunction } from "../builtins/registry";
import { Environment } from "./environment";
import { optionalType } from "./eval_expressions";
import type { Interpreter } from "./index";
import { hasDirective, routineArity, type RoutineInfo } from "./types/member_info";
import { normalizeName, sameName, type RuntimeType } from "./types/runtime_type";
import {
  NIL,
  copyValue,
  defaultValueFor,
  emptyDynamicArray,
  isCallable,
  isError,
  typeNameOf,
  unwrapVariant,
  type CallableValue,
  type ErrorValue,
  type LambdaValue,
  type RuntimeValue,
} from "./values";

export type CallOptions = {
  /** Name used in diagnostics. */
  name: string;
  node: AST.AstNode | null;
  self?: RuntimeValue;
  /** Argument expressions, needed to copy `var` parameters back out. */
  argNodes?: AST.Expression[];
  env?: Environment;
};

export type CallOutcome = {
  value: RuntimeValue;
  /** `Self` as the routine left it; records are passed by copy. */
  self?: RuntimeValue;
};

declare module "./index" {
  interface Interpreter {
    evaluateFunctionCall(node: AST.FunctionCall, env: Environment): RuntimeValue;
    callValue(fn: RuntimeValue, argNodes: AST.Expression[], node: AST.AstNode, env: Environment): RuntimeValue;
    callFunctionValue(fn: CallableValue, args: RuntimeValue[], node: AST.AstNode | null): RuntimeValue;
    /** Argument values, or the halted value that stopped their evaluation. */
    evaluateCallArguments(set: RoutineInfo[], argNodes: AST.Expression[], env: Environment): RuntimeValue[] | RuntimeValue;
    selectOverload(set: RoutineInfo[], args: RuntimeValue[], name: string, node: AST.AstNode | null): RoutineInfo | ErrorValue;
    callRoutineSet(set: RoutineInfo[], args: RuntimeValue[], options: CallOptions): CallOutcome;
    callRoutine(routine: RoutineInfo, args: RuntimeValue[], options: CallOptions): CallOutcome;
    callLambda(fn: LambdaValue, args: RuntimeValue[], node: AST.AstNode | null): RuntimeValue;
    callBuiltin(builtin: BuiltinFunction, args: RuntimeValue[], node: AST.AstNode | null, argNodes?: AST.Expression[], env?: Environment): RuntimeValue;
    evaluateInherited(node: AST.InheritedExpression, env: Environment): RuntimeValue;
    evaluateAddressOf(node: AST.AddressOfExpression, env: Environment): RuntimeValue;
  }
}

function isAssignableExpression(e: AST.Expression): e is AST.AssignmentTarget {
  return e.type === "Identifier" || e.type === "MemberAccessExpression" || e.type === "IndexExpression";
}

function paramType(ctx: Interpreter, param: AST.Parameter, env: Environment): RuntimeType | ErrorValue {
  return optionalType(ctx, param.paramType, env);
}

function arityError(ctx: Interpreter, node: AST.AstNode | null, name: string, min: number, max: number, got: number): ErrorValue {
  const expected = min === max ? `${min}` : `${min} to ${max}`;
  return ctx.errorAt(node, `${name} expects ${expected} arguments, got ${got}`);
}

function frameName(routine: RoutineInfo): string {
  return routine.ownerName ? `${routine.ownerName}.${routine.name}` : routine.name;
}

/** First parameter whose name is already taken in the call scope, with the reason. */
function parameterClash(params: AST.Parameter[], implicit: string[]): { param: AST.Parameter; message: string } | null {
  const seen = new Set<string>();
  for (const param of params) {
    const name = param.name.name;
    const taken = implicit.find((n) => sameName(n, name));
    if (taken) return { param, message: `parameter ${name} conflicts with implicit ${taken}` };
    if (seen.has(normalizeName(name))) return { param, message: `duplicate parameter ${name}` };
    seen.add(normalizeName(name));
  }
  return null;
}

/** Evaluates arguments, passing declared parameter types down as expected types. */
function evaluateArgs(
  ctx: Interpreter,
  params: AST.Parameter[] | null,
  closure: Environment,
  argNodes: AST.Expression[],
  env: Environment,
): RuntimeValue[] | RuntimeValue {
  const args: RuntimeValue[] = [];
  for (const [i, argNode] of argNodes.entries()) {
    const param = params?.[i];
    let expected: RuntimeType | undefined;
    if (param) {
      if (param.modifier === "var" && !isAssignableExpression(argNode)) {
        return ctx.errorAt(argNode, "var parameter requires an assignable argument");
      }
      const t = paramType(ctx, param, closure);
      if (t.kind === "error") return t;
      if (t.kind !== "unknown") expected = t;
    }
    const v = ctx.evaluate(argNode, env, expected);
    if (ctx.halted(v)) return v;
    args.push(v);
  }
  return args;
}

export function applyFunctionAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluateFunctionCall = function evaluateFunctionCall(this: Interpreter, node: AST.FunctionCall, env: Environment): RuntimeValue {
    const callee = node.callee;

    if (callee.type === "Identifier") {
      const name = callee.name;
      if (this.selfShadows(name, env)) {
        const self = env.lookup("Self") ?? NIL;
        if (this.hasMethod(self, name)) return this.callMethod(self, name, node.arguments, node, env, AST.identifier("Self"));
      }
      const binding = env.lookupBinding(name);
      if (binding) return this.callValue(binding.value, node.arguments, node, env);
      const type = this.types.resolveTypeName(name);
      if (type) {
        const [arg, ...extra] = node.arguments;
        if (!arg || extra.length > 0) return this.errorAt(node, `type cast to ${name} takes exactly one argument`);
        return this.evaluateTypeCast(AST.typeCastExpression(AST.simpleTypeExpression(name), arg), env);
      }
      const builtin = this.builtins.lookup(name);
      if (builtin) {
        const args = evaluateArgs(this, null, env, node.arguments, env);
        if (!Array.isArray(args)) return args;
        return this.callBuiltin(builtin, args, node, node.arguments, env);
      }
      if (this.hosts.has(name)) {
        const args = evaluateArgs(this, null, env, node.arguments, env);
        if (!Array.isArray(args)) return args;
        return this.callHost(name, args, node);
      }
      return this.errorAt(node, `undefined function ${name}`);
    }

    if (callee.type === "MemberAccessExpression") {
      const receiver = this.evaluate(callee.object, env);
      if (this.halted(receiver)) return receiver;
      return this.callMethod(receiver, callee.member.name, node.arguments, node, env, callee.object);
    }

    const fn = this.evaluate(callee, env);
    if (this.halted(fn)) return fn;
    return this.callValue(fn, node.arguments, node, env);
  };

  cls.prototype.callValue = function callValue(this: Interpreter, value: RuntimeValue, argNodes: AST.Expression[], node: AST.AstNode, env: Environment): RuntimeValue {
    const fn = unwrapVariant(value);
    if (fn.kind === "nil") return this.errorAt(node, "cannot call nil function pointer");
    if (!isCallable(fn)) return this.errorAt(node, `cannot call ${typeNameOf(fn)}`);

    if (fn.kind === "function") {
      const args = this.evaluateCallArguments(fn.overloads, argNodes, env);
      if (!Array.isArray(args)) return args;
      const self = fn.self?.kind === "record" ? copyValue(fn.self) : fn.self;
      return this.callRoutineSet(fn.overloads, args, { name: fn.name, node, self, argNodes, env }).value;
    }

    const params = fn.kind === "lambda" ? fn.node.params : null;
    const closure = fn.kind === "lambda" ? fn.closure : env;
    const args = evaluateArgs(this, params, closure, argNodes, env);
    if (!Array.isArray(args)) return args;
    return this.callFunctionValue(fn, args, node);
  };

  cls.prototype.callFunctionValue = function callFunctionValue(this: Interpreter, fn: CallableValue, args: RuntimeValue[], node: AST.AstNode | null): RuntimeValue {
    switch (fn.kind) {
      case "function": {
        const self = fn.self?.kind === "record" ? copyValue(fn.self) : fn.self;
        return this.callRoutineSet(fn.overloads, args, { name: fn.name, node, self }).value;
      }
      case "lambda":
        return this.callLambda(fn, args, node);
      case "native_function":
        if (fn.arity !== undefined && fn.arity !== args.length) return arityError(this, node, fn.name, fn.arity, fn.arity, args.length);
        return fn.impl(this, args, node);
    }
  };

  cls.prototype.evaluateCallArguments = function evaluateCallArguments(
    this: Interpreter,
    set: RoutineInfo[],
    argNodes: AST.Expression[],
    env: Environment,
  ): RuntimeValue[] | RuntimeValue {
    const candidates = set.filter((r) => {
      const { min, max } = routineArity(r);
      return argNodes.length >= min && argNodes.length <= max;
    });
    const only = candidates.length === 1 ? candidates[0] : undefined;
    return evaluateArgs(this, only ? only.node.params : null, only ? only.closure : env, argNodes, env);
  };

  cls.prototype.selectOverload = function selectOverload(
    this: Interpreter,
    set: RoutineInfo[],
    args: RuntimeValue[],
    name: string,
    node: AST.AstNode | null,
  ): RoutineInfo | ErrorValue {
    const candidates = set.filter((r) => {
      const { min, max } = routineArity(r);
      return args.length >= min && args.length <= max;
    });
    const [first] = candidates;
    if (!first) {
      const [only] = set;
      if (only && set.length === 1) {
        const { min, max } = routineArity(only);
        return arityError(this, node, name, min, max, args.length);
      }
      return this.errorAt(node, `no overload of ${name} accepts ${args.length} arguments`);
    }
    if (candidates.length === 1) return first;

    let best: RoutineInfo | null = null;
    let bestScore = -1;
    for (const routine of candidates) {
      let score = 0;
      let viable = true;
      for (const [i, arg] of args.entries()) {
        const param = routine.node.params[i];
        if (!param) break;
        const t = paramType(this, param, routine.closure);
        if (t.kind === "error") return t;
        const s = this.conversionScore(arg, t);
        if (s === 0) {
          viable = false;
          break;
        }
        score += s;
      }
      if (viable && score > bestScore) {
        best = routine;
        bestScore = score;
      }
    }
    if (!best) {
      return this.errorAt(node, `no overload of ${name} matches arguments (${args.map((a) => typeNameOf(unwrapVariant(a))).join(", ")})`);
    }
    return best;
  };

  cls.prototype.callRoutineSet = function callRoutineSet(this: Interpreter, set: RoutineInfo[], args: RuntimeValue[], options: CallOptions): CallOutcome {
    const routine = this.selectOverload(set, args, options.name, options.node);
    if ("kind" in routine) return { value: routine };
    return this.callRoutine(routine, args, options);
  };

  cls.prototype.callRoutine = function callRoutine(this: Interpreter, routine: RoutineInfo, args: RuntimeValue[], options: CallOptions): CallOutcome {
    const decl = routine.node;
    const node = options.node;
    if (!decl.body || hasDirective(routine, "abstract")) {
      return { value: this.errorAt(node, `cannot call abstract method ${frameName(routine)}`) };
    }
    const { min, max } = routineArity(routine);
    if (args.length < min || args.length > max) {
      return { value: arityError(this, node, frameName(routine), min, max, args.length) };
    }

    const implicit = [...(options.self !== undefined ? ["Self"] : []), ...(decl.returnType ? ["Result"] : [])];
    const clash = parameterClash(decl.params, implicit);
    if (clash) return { value: this.errorAt(clash.param, `${clash.message} in ${frameName(routine)}`) };

    const fnEnv = new Environment(routine.closure);
    if (options.self !== undefined) fnEnv.define("Self", options.self);

    for (const [i, param] of decl.params.entries()) {
      const t = paramType(this, param, routine.closure);
      if (t.kind === "error") return { value: t };
      let arg = args[i];
      if (arg === undefined) {
        if (!param.defaultValue) return { value: this.errorAt(node, `missing argument ${param.name.name} for ${frameName(routine)}`) };
        arg = this.evaluate(param.defaultValue, routine.closure, t.kind === "unknown" ? undefined : t);
        if (this.halted(arg)) return { value: arg };
      }
      const bound = this.coerceValue(arg, t, param);
      if (this.halted(bound)) return { value: bound };
      fnEnv.define(param.name.name, bound, t.kind === "unknown" ? undefined : t, { isConst: param.modifier === "const" });
    }

    let returnType: RuntimeType | undefined;
    if (decl.returnType) {
      const t = this.resolveTypeExpression(decl.returnType, routine.closure);
      if (t.kind === "error") return { value: t };
      returnType = t;
      fnEnv.define("Result", defaultValueFor(t), t);
    }

    const ownerClass = routine.ownerName ? this.types.getClass(routine.ownerName) : undefined;
    const frame = { name: frameName(routine), node, routine, ownerClass, env: fnEnv, self: options.self };
    const body = decl.body;
    const outcome = this.withFrame<CallOutcome>(frame, { value: NIL }, () => {
      const r = this.executeStatements(body.body, fnEnv);
      if (this.signal !== "none") this.signal = "none";
      if (isError(r)) return { value: r };
      const self = options.self !== undefined ? fnEnv.lookup("Self") : undefined;
      if (this.exception) return { value: NIL, self };
      const result = returnType ? (fnEnv.lookup("Result") ?? NIL) : NIL;
      return { value: result, self };
    });
    if (isError(outcome.value)) return outcome;

    // Copy var parameters back out even while an exception unwinds.
    if (options.argNodes && options.env) {
      for (const [i, param] of decl.params.entries()) {
        const argNode = options.argNodes[i];
        if (param.modifier !== "var" || !argNode || !isAssignableExpression(argNode)) continue;
        const out = fnEnv.lookup(param.name.name) ?? NIL;
        const pending = this.exception;
        this.exception = null;
        const r = this.assignToTarget(argNode, out, options.env, argNode);
        this.exception = pending ?? this.exception;
        if (isError(r)) return { value: r };
      }
    }
    return outcome;
  };

  cls.prototype.callLambda = function callLambda(this: Interpreter, fn: LambdaValue, args: RuntimeValue[], node: AST.AstNode | null): RuntimeValue {
    const decl = fn.node;
    const required = decl.params.filter((p) => p.defaultValue === undefined).length;
    if (args.length < required || args.length > decl.params.length) {
      return arityError(this, node, "lambda", required, decl.params.length, args.length);
    }
    const clash = parameterClash(decl.params, decl.returnType ? ["Result"] : []);
    if (clash) return this.errorAt(clash.param, `${clash.message} in lambda`);
    const env = new Environment(fn.closure);
    for (const [i, param] of decl.params.entries()) {
      const t = paramType(this, param, fn.closure);
      if (t.kind === "error") return t;
      let arg = args[i];
      if (arg === undefined) {
        if (!param.defaultValue) return this.errorAt(node, `missing argument ${param.name.name} for lambda`);
        arg = this.evaluate(param.defaultValue, fn.closure);
        if (this.halted(arg)) return arg;
      }
      const bound = this.coerceValue(arg, t, param);
      if (this.halted(bound)) return bound;
      env.define(param.name.name, bound, t.kind === "unknown" ? undefined : t);
    }
    let returnType: RuntimeType | undefined;
    if (decl.returnType) {
      const t = this.resolveTypeExpression(decl.returnType, fn.closure);
      if (t.kind === "error") return t;
      returnType = t;
      env.define("Result", defaultValueFor(t), t);
    }

    const body = decl.body;
    return this.withFrame<RuntimeValue>({ name: "<lambda>", node }, NIL, () => {
      if (body.type !== "BlockStatement") {
        const v = this.evaluate(body, env, returnType);
        if (this.halted(v)) return v;
        return returnType ? this.coerceValue(v, returnType, body) : v;
      }
      const r = this.executeStatements(body.body, env);
      if (this.signal !== "none") this.signal = "none";
      if (this.halted(r)) return r;
      return returnType ? (env.lookup("Result") ?? NIL) : NIL;
    });
  };

  cls.prototype.callBuiltin = function callBuiltin(
    this: Interpreter,
    builtin: BuiltinFunction,
    args: RuntimeValue[],
    node: AST.AstNode | null,
    argNodes?: AST.Expression[],
    env?: Environment,
  ): RuntimeValue {
    const min = builtin.arity ?? builtin.minArity ?? 0;
    const max = builtin.arity ?? builtin.maxArity ?? Number.POSITIVE_INFINITY;
    if (args.length < min || args.length > max) {
      return arityError(this, node, builtin.name, min, Number.isFinite(max) ? max : min, args.length);
    }

    const varParams = builtin.varParams ?? [];
    for (const i of varParams) {
      const argNode = argNodes?.[i];
      if (!argNode || !isAssignableExpression(argNode)) return this.errorAt(node, "var parameter requires an assignable argument");
      const arg = args[i];
      // A nil dynamic array variable becomes an empty array of its declared type.
      if (arg?.kind === "nil" && argNode.type === "Identifier" && env) {
        const declared = env.lookupType(argNode.name);
        if (declared?.kind === "array" && declared.info.isDynamic) args[i] = emptyDynamicArray(declared.info);
      }
    }

    const result = builtin.impl(this, args, node);
    if (this.halted(result) || !argNodes || !env) return result;
    for (const i of varParams) {
      const argNode = argNodes[i];
      const out = args[i];
      if (!argNode || !out || !isAssignableExpression(argNode)) continue;
      const r = this.assignToTarget(argNode, out, env, argNode);
      if (isError(r)) return r;
    }
    return result;
  };

  cls.prototype.evaluateInherited = function evaluateInherited(this: Interpreter, node: AST.InheritedExpression, env: Environment): RuntimeValue {
    const frame = this.currentMethodFrame();
    if (!frame?.ownerClass || !frame.routine) return this.errorAt(node, "inherited used outside of a method");
    const parent = frame.ownerClass.parent;
    const methodName = node.method?.name ?? frame.routine.name;
    if (!parent) return this.errorAt(node, `class ${frame.ownerClass.name} has no parent for inherited ${methodName}`);

    let args: RuntimeValue[];
    if (node.arguments) {
      const evaluated = evaluateArgs(this, null, env, node.arguments, env);
      if (!Array.isArray(evaluated)) return evaluated;
      args = evaluated;
    } else if (!node.method && frame.env) {
      const frameEnv = frame.env;
      args = frame.routine.node.params.map((p) => frameEnv.lookup(p.name.name) ?? NIL);
    } else {
      args = [];
    }

    const self = env.lookup("Self") ?? frame.self ?? NIL;
    const inConstructor = frame.routine.node.kind === "constructor";
    const set =
      (inConstructor ? parent.lookupConstructor(methodName) : undefined) ??
      parent.lookupMethod(methodName) ??
      parent.lookupConstructor(methodName) ??
      parent.lookupClassMethod(methodName);
    if (!set) {
      // Bare `inherited` with nothing above it does nothing.
      if (!node.method) return NIL;
      return this.errorAt(node, `method ${methodName} not found in ancestors of ${frame.ownerClass.name}`);
    }
    return this.callRoutineSet(set, args, { name: `${parent.name}.${methodName}`, node, self }).value;
  };

  cls.prototype.evaluateAddressOf = function evaluateAddressOf(this: Interpreter, node: AST.AddressOfExpression, env: Environment): RuntimeValue {
    const target = node.target;
    if (target.type === "Identifier") {
      const name = target.name;
      if (this.selfShadows(name, env)) {
        const self = env.lookup("Self") ?? NIL;
        const pointer = this.methodPointer(self, name);
        if (pointer) return pointer;
      }
      const binding = env.lookupBinding(name);
      if (binding) {
        if (isCallable(binding.value)) return binding.value;
        return this.errorAt(node, `cannot take the address of ${name} (${typeNameOf(binding.value)})`);
      }
      const builtin = this.builtins.lookup(name);
      if (builtin) {
        return {
          kind: "native_function",
          name: builtin.name,
          arity: builtin.arity,
          impl: (interp, args, callNode) => interp.callBuiltin(builtin, args, callNode),
        };
      }
      if (this.hosts.has(name)) {
        return { kind: "native_function", name, impl: (interp, args, callNode) => interp.callHost(name, args, callNode) };
      }
      return this.errorAt(node, `undefined function ${name}`);
    }

    const receiver = this.evaluate(target.object, env);
    if (this.halted(receiver)) return receiver;
    const pointer = this.methodPointer(receiver, target.member.name);
    if (pointer) return pointer;
    return this.errorAt(node, `cannot take the address of ${typeNameOf(unwrapVariant(receiver))}.${target.member.name}`);
  };
}
