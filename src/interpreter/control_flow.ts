import type * as AST from "../ast";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { INTEGER_TYPE } from "./types/runtime_type";
import {
  NIL,
  copyValue,
  isError,
  isTruthy,
  jsonToValue,
  makeInteger,
  makeString,
  ordinalOf,
  setElements,
  typeNameOf,
  unwrapVariant,
  valuesEqual,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    executeStatements(statements: AST.Statement[], env: Environment): RuntimeValue;
    evaluateCondition(expr: AST.Expression, env: Environment): boolean | RuntimeValue;
    evaluateIfStatement(node: AST.IfStatement, env: Environment): RuntimeValue;
    evaluateCaseStatement(node: AST.CaseStatement, env: Environment): RuntimeValue;
    evaluateWhileStatement(node: AST.WhileStatement, env: Environment): RuntimeValue;
    evaluateRepeatStatement(node: AST.RepeatStatement, env: Environment): RuntimeValue;
    evaluateForStatement(node: AST.ForStatement, env: Environment): RuntimeValue;
    evaluateForInStatement(node: AST.ForInStatement, env: Environment): RuntimeValue;
    evaluateExitStatement(node: AST.ExitStatement, env: Environment): RuntimeValue;
  }
}

type LoopOutcome = "next" | "stop" | RuntimeValue;

/** Runs one loop body and consumes break / continue. */
function runLoopBody(ctx: Interpreter, body: AST.Statement, env: Environment): LoopOutcome {
  const r = ctx.evaluate(body, env);
  if (isError(r)) return r;
  if (ctx.exception) return "stop";
  switch (ctx.signal) {
    case "break":
      ctx.signal = "none";
      return "stop";
    case "continue":
      ctx.signal = "none";
      return "next";
    case "exit":
      return "stop";
    default:
      return "next";
  }
}

function caseValueMatches(ctx: Interpreter, subject: RuntimeValue, value: AST.Expression | AST.RangeCaseValue, env: Environment): boolean | RuntimeValue {
  if (value.type === "RangeCaseValue") {
    const low = ctx.evaluate(value.low, env);
    if (ctx.halted(low)) return low;
    const high = ctx.evaluate(value.high, env);
    if (ctx.halted(high)) return high;
    const s = caseOrdinal(subject);
    const lo = caseOrdinal(low);
    const hi = caseOrdinal(high);
    if (s === null || lo === null || hi === null) {
      return ctx.errorAt(value, `case range requires ordinal values, got ${typeNameOf(subject)}`);
    }
    return s >= lo && s <= hi;
  }
  const v = ctx.evaluate(value, env);
  if (ctx.halted(v)) return v;
  return valuesEqual(subject, v);
}

/** Ordinal for case ranges; single characters count by code point. */
function caseOrdinal(v: RuntimeValue): number | null {
  const u = unwrapVariant(v);
  if (u.kind === "string" && Array.from(u.value).length === 1) return u.value.codePointAt(0) ?? null;
  return ordinalOf(u);
}

export function applyControlFlowAugmentations(cls: typeof Interpreter): void {
  cls.prototype.executeStatements = function executeStatements(this: Interpreter, statements: AST.Statement[], env: Environment): RuntimeValue {
    for (const stmt of statements) {
      const r = this.evaluate(stmt, env);
      if (isError(r)) return r;
      if (this.exception) return NIL;
      if (this.signal !== "none") return NIL;
    }
    return NIL;
  };

  cls.prototype.evaluateCondition = function evaluateCondition(this: Interpreter, expr: AST.Expression, env: Environment): boolean | RuntimeValue {
    const v = this.evaluate(expr, env);
    if (this.halted(v)) return v;
    const truth = isTruthy(v);
    if (truth === null) return this.errorAt(expr, `condition must be Boolean, got ${typeNameOf(v)}`);
    return truth;
  };

  cls.prototype.evaluateIfStatement = function evaluateIfStatement(this: Interpreter, node: AST.IfStatement, env: Environment): RuntimeValue {
    const cond = this.evaluateCondition(node.condition, env);
    if (typeof cond !== "boolean") return cond;
    if (cond) return this.evaluate(node.consequence, env);
    return node.alternative ? this.evaluate(node.alternative, env) : NIL;
  };

  cls.prototype.evaluateCaseStatement = function evaluateCaseStatement(this: Interpreter, node: AST.CaseStatement, env: Environment): RuntimeValue {
    const subject = this.evaluate(node.subject, env);
    if (this.halted(subject)) return subject;
    for (const branch of node.branches) {
      for (const value of branch.values) {
        const m = caseValueMatches(this, subject, value, env);
        if (typeof m !== "boolean") return m;
        if (m) return this.evaluate(branch.body, env);
      }
    }
    return node.elseBranch ? this.evaluate(node.elseBranch, env) : NIL;
  };

  cls.prototype.evaluateWhileStatement = function evaluateWhileStatement(this: Interpreter, node: AST.WhileStatement, env: Environment): RuntimeValue {
    for (;;) {
      const cond = this.evaluateCondition(node.condition, env);
      if (typeof cond !== "boolean") return cond;
      if (!cond) return NIL;
      const outcome = runLoopBody(this, node.body, env);
      if (outcome === "stop") return NIL;
      if (outcome !== "next") return outcome;
    }
  };

  cls.prototype.evaluateRepeatStatement = function evaluateRepeatStatement(this: Interpreter, node: AST.RepeatStatement, env: Environment): RuntimeValue {
    for (;;) {
      const outcome = runLoopBody(this, node.body, env);
      if (outcome === "stop") return NIL;
      if (outcome !== "next") return outcome;
      const cond = this.evaluateCondition(node.condition, env);
      if (typeof cond !== "boolean") return cond;
      if (cond) return NIL;
    }
  };

  cls.prototype.evaluateForStatement = function evaluateForStatement(this: Interpreter, node: AST.ForStatement, env: Environment): RuntimeValue {
    const startValue = this.evaluate(node.start, env);
    if (this.halted(startValue)) return startValue;
    const endValue = this.evaluate(node.end, env);
    if (this.halted(endValue)) return endValue;
    const start = unwrapVariant(startValue);
    const end = unwrapVariant(endValue);
    const from = ordinalOf(start);
    const to = ordinalOf(end);
    if (from === null || to === null) {
      return this.errorAt(node, `for loop bounds must be ordinal values, got ${typeNameOf(start)} and ${typeNameOf(end)}`);
    }
    let step = 1;
    if (node.step) {
      const stepValue = this.evaluate(node.step, env);
      if (this.halted(stepValue)) return stepValue;
      const s = ordinalOf(stepValue);
      if (s === null || s <= 0) return this.errorAt(node.step, "for loop step must be a positive Integer");
      step = s;
    }
    const enumType = start.kind === "enum" ? start.enumType : null;
    const makeCounter = (i: number): RuntimeValue | null => {
      if (!enumType) return makeInteger(i);
      const member = enumType.byOrdinal(i);
      return member ? { kind: "enum", enumType, name: member.name, ordinal: member.ordinal } : null;
    };

    const loopEnv = node.declaresVariable ? new Environment(env) : env;
    if (node.declaresVariable) {
      loopEnv.define(node.variable.name, start, enumType ? { kind: "enum", info: enumType } : INTEGER_TYPE);
    } else if (!env.has(node.variable.name)) {
      return this.errorAt(node.variable, `undefined identifier: ${node.variable.name}`);
    }

    const ascending = node.direction === "to";
    for (let i = from; ascending ? i <= to : i >= to; i += ascending ? step : -step) {
      const counter = makeCounter(i);
      if (!counter) continue;
      loopEnv.assign(node.variable.name, counter);
      const outcome = runLoopBody(this, node.body, loopEnv);
      if (outcome === "stop") return NIL;
      if (outcome !== "next") return outcome;
    }
    return NIL;
  };

  cls.prototype.evaluateForInStatement = function evaluateForInStatement(this: Interpreter, node: AST.ForInStatement, env: Environment): RuntimeValue {
    const iterableValue = this.evaluate(node.iterable, env);
    if (this.halted(iterableValue)) return iterableValue;
    const iterable = unwrapVariant(iterableValue);
    let items: RuntimeValue[];
    switch (iterable.kind) {
      case "array":
        items = iterable.elements.slice();
        break;
      case "string":
        items = Array.from(iterable.value, (ch) => makeString(ch));
        break;
      case "set":
        items = setElements(iterable);
        break;
      case "enum_type_ref":
        items = iterable.enumType.members.map((m): RuntimeValue => ({ kind: "enum", enumType: iterable.enumType, name: m.name, ordinal: m.ordinal }));
        break;
      case "json":
        if (Array.isArray(iterable.node)) {
          items = iterable.node.map(jsonToValue);
        } else if (iterable.node !== null && typeof iterable.node === "object") {
          items = Object.keys(iterable.node).map((k) => makeString(k));
        } else {
          return this.errorAt(node.iterable, "cannot iterate over JSON scalar");
        }
        break;
      case "nil":
        items = [];
        break;
      default:
        return this.errorAt(node.iterable, `cannot iterate over ${typeNameOf(iterable)}`);
    }

    const loopEnv = node.declaresVariable ? new Environment(env) : env;
    if (node.declaresVariable) {
      loopEnv.define(node.variable.name, NIL);
    } else if (!env.has(node.variable.name)) {
      return this.errorAt(node.variable, `undefined identifier: ${node.variable.name}`);
    }
    for (const item of items) {
      loopEnv.assign(node.variable.name, copyValue(item));
      const outcome = runLoopBody(this, node.body, loopEnv);
      if (outcome === "stop") return NIL;
      if (outcome !== "next") return outcome;
    }
    return NIL;
  };

  cls.prototype.evaluateExitStatement = function evaluateExitStatement(this: Interpreter, node: AST.ExitStatement, env: Environment): RuntimeValue {
    if (node.value) {
      const expected = env.lookupType("Result");
      const v = this.evaluate(node.value, env, expected);
      if (this.halted(v)) return v;
      if (!env.has("Result")) return this.errorAt(node, "exit with a value outside a function");
      const r = this.assignVariable("Result", v, env, node);
      if (isError(r)) return r;
    }
    this.signal = "exit";
    return NIL;
  };
}
