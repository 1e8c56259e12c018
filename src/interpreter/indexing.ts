import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { isJsonObject, jsonArrayGet, jsonObjectGet, valueToJson } from "./json";
import type { PropertyInfo } from "./types/member_info";
import {
  NIL,
  defaultValueFor,
  makeString,
  ordinalOf,
  typeNameOf,
  unwrapVariant,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateIndexExpression(node: AST.IndexExpression, env: Environment): RuntimeValue;
    indexValue(container: RuntimeValue, index: RuntimeValue, node: AST.AstNode): RuntimeValue;
    assignIndex(node: AST.IndexExpression, value: RuntimeValue, env: Environment): RuntimeValue;
  }
}

type IndexChain = { base: AST.Expression; indices: AST.Expression[] };

/** `((a)[x])[y]` → base `a`, indices `[x, y]` in source order. */
function flattenIndexChain(node: AST.IndexExpression): IndexChain {
  const indices: AST.Expression[] = [];
  let cur: AST.Expression = node;
  while (cur.type === "IndexExpression") {
    indices.unshift(cur.index);
    cur = cur.object;
  }
  return { base: cur, indices };
}

function evaluateAll(ctx: Interpreter, exprs: AST.Expression[], env: Environment): RuntimeValue[] | RuntimeValue {
  const out: RuntimeValue[] = [];
  for (const e of exprs) {
    const v = ctx.evaluate(e, env);
    if (ctx.halted(v)) return v;
    out.push(v);
  }
  return out;
}

/** Base container plus the indexed property it names, when it names one. */
type ResolvedBase = { container: RuntimeValue; property?: PropertyInfo; receiver?: RuntimeValue };

function resolveBase(ctx: Interpreter, base: AST.Expression, env: Environment): ResolvedBase | RuntimeValue {
  if (base.type === "MemberAccessExpression") {
    const receiver = ctx.evaluate(base.object, env);
    if (ctx.halted(receiver)) return receiver;
    const prop = ctx.findProperty(receiver, base.member.name);
    if (prop && prop.indexParams.length > 0) return { container: receiver, property: prop, receiver };
    const container = ctx.getMember(receiver, base.member.name, base, env, base.object);
    if (ctx.halted(container)) return container;
    return { container };
  }
  const container = ctx.evaluate(base, env);
  if (ctx.halted(container)) return container;
  return { container };
}

function isResolved(v: ResolvedBase | RuntimeValue): v is ResolvedBase {
  return "container" in v;
}

function stringIndexError(ctx: Interpreter, node: AST.AstNode, index: number, length: number): RuntimeValue {
  return ctx.errorAt(node, `string index out of bounds: ${index} (string length is ${length})`);
}

export function applyIndexingAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluateIndexExpression = function evaluateIndexExpression(this: Interpreter, node: AST.IndexExpression, env: Environment): RuntimeValue {
    const { base, indices } = flattenIndexChain(node);
    const resolved = resolveBase(this, base, env);
    if (!isResolved(resolved)) return resolved;

    let container = resolved.container;
    let pos = 0;
    if (resolved.property && resolved.receiver) {
      const count = resolved.property.indexParams.length;
      if (indices.length < count) {
        return this.errorAt(node, `property ${resolved.property.name} expects ${count} index arguments, got ${indices.length}`);
      }
      const args = evaluateAll(this, indices.slice(0, count), env);
      if (!Array.isArray(args)) return args;
      container = this.readProperty(resolved.receiver, resolved.property, args, node, env);
      if (this.halted(container)) return container;
      pos = count;
    }

    while (pos < indices.length) {
      const defaultProp = this.defaultPropertyOf(container);
      if (defaultProp && defaultProp.indexParams.length > 0) {
        const count = defaultProp.indexParams.length;
        if (indices.length - pos < count) {
          return this.errorAt(node, `property ${defaultProp.name} expects ${count} index arguments, got ${indices.length - pos}`);
        }
        const args = evaluateAll(this, indices.slice(pos, pos + count), env);
        if (!Array.isArray(args)) return args;
        container = this.readProperty(container, defaultProp, args, node, env);
        pos += count;
      } else {
        const indexExpr = indices[pos];
        if (!indexExpr) break;
        const index = this.evaluate(indexExpr, env);
        if (this.halted(index)) return index;
        container = this.indexValue(container, index, node);
        pos += 1;
      }
      if (this.halted(container)) return container;
    }
    return container;
  };

  cls.prototype.indexValue = function indexValue(this: Interpreter, containerValue: RuntimeValue, rawIndex: RuntimeValue, node: AST.AstNode): RuntimeValue {
    const container = unwrapVariant(containerValue);
    const index = unwrapVariant(rawIndex);

    if (container.kind === "nil") return this.errorAt(node, "cannot index nil");

    if (container.kind === "json") {
      if (index.kind === "string") return jsonObjectGet(container.node, index.value);
      if (index.kind === "integer") return jsonArrayGet(container.node, index.value);
      return this.errorAt(node, `JSON index must be String or Integer, got ${typeNameOf(index)}`);
    }

    if (container.kind === "array") {
      const i = ordinalOf(index);
      if (i === null) return this.errorAt(node, `index must be an ordinal value, got ${typeNameOf(index)}`);
      const type = container.arrayType;
      let offset: number;
      if (type.isStatic) {
        if (i < type.low || i > type.high) {
          return this.errorAt(node, `array index out of bounds: ${i} (bounds are ${type.low}..${type.high})`);
        }
        offset = i - type.low;
      } else {
        if (i < 0 || i >= container.elements.length) {
          return this.errorAt(node, `array index out of bounds: ${i} (array length is ${container.elements.length})`);
        }
        offset = i;
      }
      const element = container.elements[offset];
      if (element === undefined || element.kind === "nil") {
        const zero = defaultValueFor(type.elementType);
        // Materialize aggregate zero values so member writes through this slot stick.
        if (zero.kind === "record" || zero.kind === "array") container.elements[offset] = zero;
        return zero;
      }
      return element;
    }

    if (container.kind === "string") {
      if (index.kind !== "integer") return this.errorAt(node, `string index must be Integer, got ${typeNameOf(index)}`);
      const chars = Array.from(container.value);
      if (index.value < 1 || index.value > chars.length) return stringIndexError(this, node, index.value, chars.length);
      return makeString(chars[index.value - 1] ?? "");
    }

    return this.errorAt(node, `cannot index type ${typeNameOf(container)}`);
  };

  cls.prototype.assignIndex = function assignIndex(this: Interpreter, node: AST.IndexExpression, value: RuntimeValue, env: Environment): RuntimeValue {
    const { base, indices } = flattenIndexChain(node);
    const resolved = resolveBase(this, base, env);
    if (!isResolved(resolved)) return resolved;

    let container = resolved.container;
    let pos = 0;
    if (resolved.property && resolved.receiver) {
      const prop = resolved.property;
      const count = prop.indexParams.length;
      if (indices.length < count) {
        return this.errorAt(node, `property ${prop.name} expects ${count} index arguments, got ${indices.length}`);
      }
      const args = evaluateAll(this, indices.slice(0, count), env);
      if (!Array.isArray(args)) return args;
      if (indices.length === count) return this.writeProperty(resolved.receiver, prop, args, value, node, env);
      container = this.readProperty(resolved.receiver, prop, args, node, env);
      if (this.halted(container)) return container;
      pos = count;
    }

    while (pos < indices.length) {
      const remaining = indices.length - pos;
      const defaultProp = this.defaultPropertyOf(container);
      if (defaultProp && defaultProp.indexParams.length > 0) {
        const count = defaultProp.indexParams.length;
        if (remaining < count) {
          return this.errorAt(node, `property ${defaultProp.name} expects ${count} index arguments, got ${remaining}`);
        }
        const args = evaluateAll(this, indices.slice(pos, pos + count), env);
        if (!Array.isArray(args)) return args;
        if (remaining === count) return this.writeProperty(container, defaultProp, args, value, node, env);
        container = this.readProperty(container, defaultProp, args, node, env);
        if (this.halted(container)) return container;
        pos += count;
        continue;
      }

      const indexExpr = indices[pos];
      if (!indexExpr) break;
      const index = this.evaluate(indexExpr, env);
      if (this.halted(index)) return index;
      if (remaining > 1) {
        container = this.indexValue(container, index, node);
        if (this.halted(container)) return container;
        pos += 1;
        continue;
      }
      return storeAt(this, node, container, index, value, env);
    }
    return this.errorAt(node, "invalid index assignment");
  };
}

/** Final step of an index assignment: one index into one container. */
function storeAt(
  ctx: Interpreter,
  node: AST.IndexExpression,
  containerValue: RuntimeValue,
  rawIndex: RuntimeValue,
  value: RuntimeValue,
  env: Environment,
): RuntimeValue {
  const container = unwrapVariant(containerValue);
  const index = unwrapVariant(rawIndex);

  switch (container.kind) {
    case "nil":
      return ctx.errorAt(node, "cannot index nil");
    case "json": {
      const converted = valueToJson(value);
      if (!converted.ok) return ctx.errorAt(node, converted.message);
      if (index.kind === "string") {
        if (!isJsonObject(container.node)) return ctx.errorAt(node, "cannot set a string key on a non-object JSON value");
        container.node[index.value] = converted.node;
        return NIL;
      }
      if (index.kind === "integer") {
        if (!Array.isArray(container.node)) return ctx.errorAt(node, "cannot set an integer index on a non-array JSON value");
        if (index.value < 0 || index.value > container.node.length) {
          return ctx.errorAt(node, `JSON array index out of bounds: ${index.value} (array length is ${container.node.length})`);
        }
        container.node[index.value] = converted.node;
        return NIL;
      }
      return ctx.errorAt(node, `JSON index must be String or Integer, got ${typeNameOf(index)}`);
    }
    case "array": {
      const i = ordinalOf(index);
      if (i === null) return ctx.errorAt(node, `index must be an ordinal value, got ${typeNameOf(index)}`);
      const type = container.arrayType;
      let offset: number;
      if (type.isStatic) {
        if (i < type.low || i > type.high) {
          return ctx.errorAt(node, `array index out of bounds: ${i} (bounds are ${type.low}..${type.high})`);
        }
        offset = i - type.low;
      } else {
        if (i < 0 || i >= container.elements.length) {
          return ctx.errorAt(node, `array index out of bounds: ${i} (array length is ${container.elements.length})`);
        }
        offset = i;
      }
      const coerced = ctx.coerceValue(value, type.elementType, node);
      if (ctx.halted(coerced)) return coerced;
      container.elements[offset] = coerced;
      return NIL;
    }
    case "string": {
      if (index.kind !== "integer") return ctx.errorAt(node, `string index must be Integer, got ${typeNameOf(index)}`);
      const ch = unwrapVariant(value);
      if (ch.kind !== "string" || Array.from(ch.value).length !== 1) {
        return ctx.errorAt(node, `string element assignment requires a single character, got ${typeNameOf(ch)}`);
      }
      const chars = Array.from(container.value);
      if (index.value < 1 || index.value > chars.length) return stringIndexError(ctx, node, index.value, chars.length);
      chars[index.value - 1] = ch.value;
      const target = node.object;
      if (target.type !== "Identifier" && target.type !== "MemberAccessExpression" && target.type !== "IndexExpression") {
        return ctx.errorAt(node, "cannot assign to a character of a temporary string");
      }
      return ctx.assignToTarget(target, makeString(chars.join("")), env, node);
    }
    default:
      return ctx.errorAt(node, `cannot index type ${typeNameOf(container)}`);
  }
}
