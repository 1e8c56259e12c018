import type * as AST from "../ast";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { normalizeName, typeToString } from "./types/runtime_type";
import {
  NIL,
  isError,
  makeString,
  typeNameOf,
  unwrapVariant,
  type ErrorValue,
  type ExceptionValue,
  type ObjectValue,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    raiseObject(instance: ObjectValue, node: AST.AstNode | null): void;
    raiseBuiltin(className: string, message: string, node: AST.AstNode | null, extraFields?: Record<string, string>): RuntimeValue;
    evaluateRaiseStatement(node: AST.RaiseStatement, env: Environment): RuntimeValue;
    evaluateTryStatement(node: AST.TryStatement, env: Environment): RuntimeValue;
  }
}

function exceptionMessage(instance: ObjectValue): string {
  const msg = instance.fields.get("message");
  return msg && msg.kind === "string" ? msg.value : "";
}

function matchHandler(ctx: Interpreter, handler: AST.ExceptionHandler, exc: ExceptionValue, env: Environment): boolean | ErrorValue {
  if (!handler.exceptionType) return true;
  const type = ctx.resolveTypeExpression(handler.exceptionType, env);
  if (type.kind === "error") return type;
  if (type.kind !== "class") {
    return ctx.errorAt(handler, `exception handler type must be a class, got ${typeToString(type)}`);
  }
  return exc.classInfo.inheritsFrom(type.info.name);
}

/**
 * Runs a handler or except-else body with the active exception cleared, the
 * handler exception available to bare `raise`, and ExceptObject bound.
 */
function runHandler(
  ctx: Interpreter,
  body: AST.Statement,
  env: Environment,
  exc: ExceptionValue,
  variable?: AST.Identifier,
): RuntimeValue {
  const savedHandler = ctx.handlerException;
  const savedExceptObject = ctx.globals.lookup("ExceptObject") ?? NIL;
  ctx.exception = null;
  ctx.handlerException = exc;
  ctx.globals.assign("ExceptObject", exc.instance);
  const handlerEnv = new Environment(env);
  if (variable) {
    handlerEnv.define(variable.name, exc.instance, { kind: "class", info: exc.classInfo });
  }
  try {
    return ctx.evaluate(body, handlerEnv);
  } finally {
    ctx.handlerException = savedHandler;
    ctx.globals.assign("ExceptObject", savedExceptObject);
  }
}

export function applyErrorHandlingAugmentations(cls: typeof Interpreter): void {
  cls.prototype.raiseObject = function raiseObject(this: Interpreter, instance: ObjectValue, node: AST.AstNode | null): void {
    const message = exceptionMessage(instance);
    this.exception = {
      classInfo: instance.classInfo,
      instance,
      message,
      callStack: this.callStackNames(),
      position: node?.span?.start,
    };
    this.trace(`raise ${instance.classInfo.name}: ${message}`);
  };

  cls.prototype.raiseBuiltin = function raiseBuiltin(
    this: Interpreter,
    className: string,
    message: string,
    node: AST.AstNode | null,
    extraFields: Record<string, string> = {},
  ): RuntimeValue {
    const info = this.types.getClass(className);
    if (!info) {
      throw new Error(`builtin exception class ${className} is not registered`);
    }
    const instance = this.allocateObject(info);
    if (isError(instance)) return instance;
    instance.fields.set("message", makeString(message));
    for (const [name, value] of Object.entries(extraFields)) {
      instance.fields.set(normalizeName(name), makeString(value));
    }
    this.raiseObject(instance, node);
    return NIL;
  };

  cls.prototype.evaluateRaiseStatement = function evaluateRaiseStatement(this: Interpreter, node: AST.RaiseStatement, env: Environment): RuntimeValue {
    if (!node.exception) {
      if (!this.handlerException) {
        return this.errorAt(node, "bare raise with no active exception");
      }
      this.exception = this.handlerException;
      return NIL;
    }
    const value = this.evaluate(node.exception, env);
    if (this.halted(value)) return value;
    let target = unwrapVariant(value);
    if (target.kind === "interface" && target.object) target = target.object;
    if (target.kind !== "object") {
      return this.errorAt(node, `raise requires exception object, got ${typeNameOf(target)}`);
    }
    this.raiseObject(target, node);
    return NIL;
  };

  cls.prototype.evaluateTryStatement = function evaluateTryStatement(this: Interpreter, node: AST.TryStatement, env: Environment): RuntimeValue {
    // Evaluator errors are not exceptions: they abort the run here, skipping handlers and finally.
    const result = this.evaluate(node.tryBlock, env);
    if (isError(result)) return result;

    const clause = node.exceptClause;
    const raised = this.exception;
    if (raised && clause) {
      let handled = false;
      for (const handler of clause.handlers) {
        const matched = matchHandler(this, handler, raised, env);
        if (typeof matched !== "boolean") return matched;
        if (!matched) continue;
        const r = runHandler(this, handler.statement, env, raised, handler.variable);
        if (isError(r)) return r;
        handled = true;
        break;
      }
      if (!handled && clause.elseBlock) {
        const r = runHandler(this, clause.elseBlock, env, raised);
        if (isError(r)) return r;
        handled = true;
      }
      if (!handled && clause.handlers.length === 0) {
        this.exception = null;
      }
    }

    if (node.finallyBlock) {
      const pending = this.exception;
      const pendingSignal = this.signal;
      const savedExceptObject = this.globals.lookup("ExceptObject") ?? NIL;
      this.exception = null;
      this.signal = "none";
      if (pending) this.globals.assign("ExceptObject", pending.instance);
      let r: RuntimeValue;
      try {
        r = this.evaluate(node.finallyBlock, env);
      } finally {
        this.globals.assign("ExceptObject", savedExceptObject);
      }
      if (isError(r)) return r;
      if (this.exception === null) {
        this.exception = pending;
        if (this.signal === "none") this.signal = pendingSignal;
      }
    }
    return NIL;
  };
}
