import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { typeToString, type RuntimeType } from "./types/runtime_type";
import { MAX_SET_ORDINAL, SetType, isOrdinalType } from "./types/set_type";
import {
  NIL,
  makeBoolean,
  runtimeTypeOf,
  typeNameOf,
  unwrapVariant,
  type ErrorValue,
  type RuntimeValue,
  type SetValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateSetLiteral(node: AST.SetLiteral, env: Environment, expected?: RuntimeType): RuntimeValue;
    /** Result of `op` when a set is involved, or undefined when neither operand is a set. */
    applySetOperator(op: string, left: RuntimeValue, right: RuntimeValue, node: AST.AstNode): RuntimeValue | undefined;
    /** Adds or removes one element in place. */
    updateSet(set: SetValue, element: RuntimeValue, include: boolean, node: AST.AstNode | null): RuntimeValue;
  }
}

type Evaluated = { low: RuntimeValue; high?: RuntimeValue; node: AST.AstNode };

/** Ordinal of `v` as a member of `setType`, or null when `v` is not of the element type. */
export function elementOrdinal(setType: SetType, value: RuntimeValue): number | null {
  const v = unwrapVariant(value);
  const t = setType.elementType;
  if (t.kind === "enum") return v.kind === "enum" && v.enumType === t.info ? v.ordinal : null;
  if (t.kind !== "primitive") return null;
  switch (t.name) {
    case "Integer":
      return v.kind === "integer" ? v.value : null;
    case "Boolean":
      return v.kind === "boolean" ? Number(v.value) : null;
    case "String":
      return v.kind === "string" && v.value.length === 1 ? v.value.charCodeAt(0) : null;
    default:
      return null;
  }
}

function ordinalInRange(ctx: Interpreter, ordinal: number, node: AST.AstNode | null): ErrorValue | null {
  if (ordinal >= 0 && ordinal <= MAX_SET_ORDINAL) return null;
  return ctx.errorAt(node, `set element ${ordinal} out of range 0..${MAX_SET_ORDINAL}`);
}

function emptySet(setType: SetType): SetValue {
  return { kind: "set", setType, members: new Set() };
}

function isSubset(a: SetValue, b: SetValue): boolean {
  for (const m of a.members) if (!b.members.has(m)) return false;
  return true;
}

export function applySetAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluateSetLiteral = function evaluateSetLiteral(
    this: Interpreter,
    node: AST.SetLiteral,
    env: Environment,
    expected?: RuntimeType,
  ): RuntimeValue {
    const parts: Evaluated[] = [];
    for (const element of node.elements) {
      if (element.type === "RangeExpression") {
        const low = this.evaluate(element.low, env);
        if (this.halted(low)) return low;
        const high = this.evaluate(element.high, env);
        if (this.halted(high)) return high;
        parts.push({ low, high, node: element });
      } else {
        const low = this.evaluate(element, env);
        if (this.halted(low)) return low;
        parts.push({ low, node: element });
      }
    }

    let setType: SetType;
    if (expected?.kind === "set") {
      setType = expected.info;
    } else {
      const [first] = parts;
      if (!first) return this.errorAt(node, "cannot infer type for empty set literal");
      const elementType = runtimeTypeOf(unwrapVariant(first.low));
      if (!isOrdinalType(elementType)) return this.errorAt(first.node, `set element type must be ordinal, got ${typeToString(elementType)}`);
      setType = new SetType(elementType);
    }

    const result = emptySet(setType);
    const expectedName = typeToString(setType.elementType);
    for (const part of parts) {
      const lo = elementOrdinal(setType, part.low);
      if (lo === null) {
        return this.errorAt(part.node, `type mismatch in set literal: expected ${expectedName}, got ${typeNameOf(unwrapVariant(part.low))}`);
      }
      const loError = ordinalInRange(this, lo, part.node);
      if (loError) return loError;
      if (!part.high) {
        result.members.add(lo);
        continue;
      }
      const hi = elementOrdinal(setType, part.high);
      if (hi === null) {
        return this.errorAt(part.node, `type mismatch in set literal: expected ${expectedName}, got ${typeNameOf(unwrapVariant(part.high))}`);
      }
      const hiError = ordinalInRange(this, hi, part.node);
      if (hiError) return hiError;
      for (let o = lo; o <= hi; o++) {
        if (setType.elementType.kind === "enum" && !setType.elementType.info.byOrdinal(o)) continue;
        result.members.add(o);
      }
    }
    return result;
  };

  cls.prototype.applySetOperator = function applySetOperator(
    this: Interpreter,
    op: string,
    left: RuntimeValue,
    right: RuntimeValue,
    node: AST.AstNode,
  ): RuntimeValue | undefined {
    if (op === "in" && right.kind === "set") {
      const ordinal = elementOrdinal(right.setType, left);
      if (ordinal === null) return this.errorAt(node, `type mismatch: ${typeNameOf(left)} not in ${right.setType.toString()}`);
      return makeBoolean(right.members.has(ordinal));
    }
    if (left.kind !== "set" || right.kind !== "set") return undefined;
    if (!left.setType.equals(right.setType)) {
      return this.errorAt(node, `type mismatch in set operation: ${left.setType.toString()} vs ${right.setType.toString()}`);
    }
    const setType = left.setType;
    switch (op) {
      case "+":
        return { kind: "set", setType, members: new Set([...left.members, ...right.members]) };
      case "-":
        return { kind: "set", setType, members: new Set([...left.members].filter((m) => !right.members.has(m))) };
      case "*":
        return { kind: "set", setType, members: new Set([...left.members].filter((m) => right.members.has(m))) };
      case "=":
        return makeBoolean(left.members.size === right.members.size && isSubset(left, right));
      case "<>":
        return makeBoolean(left.members.size !== right.members.size || !isSubset(left, right));
      case "<=":
        return makeBoolean(isSubset(left, right));
      case ">=":
        return makeBoolean(isSubset(right, left));
      default:
        return this.errorAt(node, `operator ${op} not applicable to ${setType.toString()}`);
    }
  };

  cls.prototype.updateSet = function updateSet(
    this: Interpreter,
    set: SetValue,
    element: RuntimeValue,
    include: boolean,
    node: AST.AstNode | null,
  ): RuntimeValue {
    const ordinal = elementOrdinal(set.setType, element);
    if (ordinal === null) {
      const verb = include ? "cannot add" : "cannot remove";
      const prep = include ? "to" : "from";
      return this.errorAt(node, `type mismatch: ${verb} ${typeNameOf(unwrapVariant(element))} ${prep} ${set.setType.toString()}`);
    }
    if (include) {
      const rangeError = ordinalInRange(this, ordinal, node);
      if (rangeError) return rangeError;
      set.members.add(ordinal);
    } else {
      set.members.delete(ordinal);
    }
    return NIL;
  };
}
