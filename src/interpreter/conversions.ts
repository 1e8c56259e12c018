import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { valueToJson } from "./json";
import { elementOrdinal } from "./sets";
import { valueToString } from "./stringify";
import type { ArrayType } from "./types/array_type";
import type { ClassInfo } from "./types/class_info";
import { MAX_SET_ORDINAL, type SetType } from "./types/set_type";
import { isNilableType, isTypeCompatible, sameName, typeToString, typesEqual, type RuntimeType } from "./types/runtime_type";
import {
  NIL,
  boxVariant,
  copyValue,
  isCallable,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeString,
  runtimeTypeOf,
  typeNameOf,
  unwrapVariant,
  type ArrayValue,
  type ObjectValue,
  type RuntimeValue,
  type SetValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    /** Value prepared for storage in a slot of type `target`: copied, promoted, wrapped or converted. */
    coerceValue(value: RuntimeValue, target: RuntimeType, node: AST.AstNode | null): RuntimeValue;
    /** Null when no implicit conversion path exists. */
    tryImplicitConversion(value: RuntimeValue, target: RuntimeType, node: AST.AstNode | null): RuntimeValue | null;
    /** 3 exact, 2 compatible, 1 via implicit conversion, 0 not assignable. */
    conversionScore(value: RuntimeValue, target: RuntimeType): number;
    isValueAssignable(value: RuntimeValue, target: RuntimeType): boolean;
    evaluateTypeCast(node: AST.TypeCastExpression, env: Environment): RuntimeValue;
    evaluateIsExpression(node: AST.IsExpression, env: Environment): RuntimeValue;
    evaluateAsExpression(node: AST.AsExpression, env: Environment): RuntimeValue;
  }
}

/** Object behind an object or interface value; null for nil and everything else. */
export function objectOf(v: RuntimeValue): ObjectValue | null {
  const u = unwrapVariant(v);
  if (u.kind === "object") return u;
  if (u.kind === "interface") return u.object;
  return null;
}

/** Names an implicit conversion may be keyed by: the value's type, then its ancestors. */
function conversionSourceNames(v: RuntimeValue): string[] {
  const obj = objectOf(v);
  if (obj) return obj.classInfo.ancestry().map((c) => c.name);
  return [typeNameOf(unwrapVariant(v))];
}

function isCompatibleClass(obj: ObjectValue, target: ClassInfo): boolean {
  return obj.classInfo.inheritsFrom(target.name);
}

/** Coercion that needs no user conversion; null when the value does not fit. */
function coerceDirect(ctx: Interpreter, value: RuntimeValue, target: RuntimeType, node: AST.AstNode | null): RuntimeValue | null {
  if (target.kind === "unknown") return copyValue(value);
  if (target.kind === "variant") return boxVariant(copyValue(value));

  const v = unwrapVariant(value);
  if (v.kind === "nil") {
    if (!isNilableType(target)) return null;
    if (target.kind === "interface") return { kind: "interface", interfaceInfo: target.info, object: null };
    return NIL;
  }

  switch (target.kind) {
    case "primitive":
      if (target.name === "Integer" && v.kind === "integer") return v;
      if (target.name === "Float" && v.kind === "float") return v;
      if (target.name === "Float" && v.kind === "integer") return makeFloat(v.value);
      if (target.name === "String" && v.kind === "string") return v;
      if (target.name === "Boolean" && v.kind === "boolean") return v;
      return null;
    case "enum":
      return v.kind === "enum" && v.enumType === target.info ? v : null;
    case "record":
      return v.kind === "record" && v.recordType === target.info ? copyValue(v) : null;
    case "class": {
      const obj = objectOf(v);
      return obj && isCompatibleClass(obj, target.info) ? obj : null;
    }
    case "interface":
      if (v.kind === "object") {
        return v.classInfo.implementsInterface(target.info) ? { kind: "interface", interfaceInfo: target.info, object: v } : null;
      }
      if (v.kind === "interface") {
        if (v.interfaceInfo === target.info) return v;
        const compatible = v.interfaceInfo.isCompatibleWith(target.info) || (v.object?.classInfo.implementsInterface(target.info) ?? false);
        return compatible ? { kind: "interface", interfaceInfo: target.info, object: v.object } : null;
      }
      return null;
    case "array":
      return v.kind === "array" ? adaptArray(ctx, v, target.info, node) : null;
    case "set":
      if (v.kind === "set") return v.setType.equals(target.info) ? copyValue(v) : null;
      return v.kind === "array" ? arrayToSet(ctx, v, target.info, node) : null;
    case "function":
      return isCallable(v) ? v : null;
    case "json": {
      if (v.kind === "json" || v.kind === "integer" || v.kind === "float" || v.kind === "string" || v.kind === "boolean") return v;
      const converted = valueToJson(v);
      return converted.ok ? { kind: "json", node: converted.node } : null;
    }
    case "nil":
      return null;
  }
}

/**
 * Fits an array value to an array type. Equal types copy (static) or alias
 * (dynamic); structurally compatible arrays are rebuilt element by element.
 */
function adaptArray(ctx: Interpreter, value: ArrayValue, target: ArrayType, node: AST.AstNode | null): RuntimeValue | null {
  if (value.arrayType.equals(target)) return copyValue(value);
  if (!value.arrayType.isCompatibleWith(target) && !target.isCompatibleWith(value.arrayType)) return null;
  if (target.isStatic && value.elements.length !== target.size) {
    return ctx.errorAt(node, `array has ${value.elements.length} elements, expected ${target.size}`);
  }
  const elements: RuntimeValue[] = [];
  for (const e of value.elements) {
    const coerced = ctx.coerceValue(e, target.elementType, node);
    if (ctx.halted(coerced)) return coerced;
    elements.push(coerced);
  }
  return { kind: "array", arrayType: target, elements };
}

/** `[a, b]` arriving where a set is expected; null when an element is of the wrong type. */
function arrayToSet(ctx: Interpreter, value: ArrayValue, target: SetType, node: AST.AstNode | null): RuntimeValue | null {
  const set: SetValue = { kind: "set", setType: target, members: new Set() };
  for (const e of value.elements) {
    const ordinal = elementOrdinal(target, e);
    if (ordinal === null) return null;
    if (ordinal < 0 || ordinal > MAX_SET_ORDINAL) return ctx.errorAt(node, `set element ${ordinal} out of range 0..${MAX_SET_ORDINAL}`);
    set.members.add(ordinal);
  }
  return set;
}

function castToPrimitive(v: RuntimeValue, name: string): RuntimeValue | null {
  switch (name) {
    case "Integer":
      if (v.kind === "integer") return v;
      if (v.kind === "float") return makeInteger(Math.trunc(v.value));
      if (v.kind === "boolean") return makeInteger(v.value ? 1 : 0);
      if (v.kind === "enum") return makeInteger(v.ordinal);
      return null;
    case "Float":
      if (v.kind === "integer" || v.kind === "float") return makeFloat(v.value);
      return null;
    case "Boolean":
      if (v.kind === "boolean") return v;
      if (v.kind === "integer") return makeBoolean(v.value !== 0);
      return null;
    case "String":
      if (v.kind === "integer" || v.kind === "float" || v.kind === "string" || v.kind === "boolean" || v.kind === "enum") {
        return makeString(valueToString(v));
      }
      return null;
    default:
      return null;
  }
}

export function applyConversionAugmentations(cls: typeof Interpreter): void {
  cls.prototype.coerceValue = function coerceValue(this: Interpreter, value: RuntimeValue, target: RuntimeType, node: AST.AstNode | null): RuntimeValue {
    if (this.halted(value)) return value;
    const direct = coerceDirect(this, value, target, node);
    if (direct) return direct;
    const v = unwrapVariant(value);
    if (v.kind === "nil") return this.errorAt(node, `cannot assign nil to ${typeToString(target)}`);
    const converted = this.tryImplicitConversion(v, target, node);
    if (converted) return converted;
    return this.errorAt(node, `incompatible types: cannot assign ${typeNameOf(v)} to ${typeToString(target)}`);
  };

  cls.prototype.tryImplicitConversion = function tryImplicitConversion(
    this: Interpreter,
    value: RuntimeValue,
    target: RuntimeType,
    node: AST.AstNode | null,
  ): RuntimeValue | null {
    const targetName = typeToString(target);
    for (const sourceName of conversionSourceNames(value)) {
      const path = this.types.conversions.findConversionPath(sourceName, targetName);
      if (!path || path.length === 0) continue;
      let current = value;
      for (const step of path) {
        const fn = this.globals.lookup(step.bindingName);
        if (!fn || !isCallable(fn)) {
          return this.errorAt(node, `conversion function ${step.bindingName} is not defined`);
        }
        current = this.callFunctionValue(fn, [current], node);
        if (this.halted(current)) return current;
      }
      return current;
    }
    return null;
  };

  cls.prototype.conversionScore = function conversionScore(this: Interpreter, value: RuntimeValue, target: RuntimeType): number {
    const v = unwrapVariant(value);
    const actual = runtimeTypeOf(v);
    if (target.kind !== "unknown" && typesEqual(actual, target)) return 3;
    if (v.kind === "object" && target.kind === "class" && v.classInfo === target.info) return 3;
    if (this.isValueAssignable(v, target)) return 2;
    const targetName = typeToString(target);
    const reachable = conversionSourceNames(v).some((name) => {
      const path = this.types.conversions.findConversionPath(name, targetName);
      return path !== null && path.length > 0;
    });
    return reachable ? 1 : 0;
  };

  cls.prototype.isValueAssignable = function isValueAssignable(this: Interpreter, value: RuntimeValue, target: RuntimeType): boolean {
    const v = unwrapVariant(value);
    if (target.kind === "unknown" || target.kind === "variant") return true;
    if (v.kind === "nil") return isNilableType(target);
    switch (target.kind) {
      case "class":
      case "interface": {
        if (target.kind === "interface" && v.kind === "interface") {
          return v.interfaceInfo.isCompatibleWith(target.info) || (v.object?.classInfo.implementsInterface(target.info) ?? false);
        }
        const obj = objectOf(v);
        if (!obj) return false;
        return target.kind === "class" ? isCompatibleClass(obj, target.info) : obj.classInfo.implementsInterface(target.info);
      }
      case "function":
        return isCallable(v);
      case "json":
        return v.kind !== "object" && v.kind !== "class_ref" && !isCallable(v);
      default:
        return isTypeCompatible(runtimeTypeOf(v), target);
    }
  };

  cls.prototype.evaluateTypeCast = function evaluateTypeCast(this: Interpreter, node: AST.TypeCastExpression, env: Environment): RuntimeValue {
    const target = this.resolveTypeExpression(node.targetType, env);
    if (target.kind === "error") return target;
    const value = this.evaluate(node.expression, env);
    if (this.halted(value)) return value;
    const v = unwrapVariant(value);
    const targetName = typeToString(target);

    for (const sourceName of conversionSourceNames(v)) {
      const explicit = this.types.conversions.findExplicit(sourceName, targetName);
      if (!explicit) continue;
      const fn = this.globals.lookup(explicit.bindingName);
      if (!fn || !isCallable(fn)) return this.errorAt(node, `conversion function ${explicit.bindingName} is not defined`);
      return this.callFunctionValue(fn, [v], node);
    }

    const castError = () => this.errorAt(node, `cannot cast ${typeNameOf(v)} to ${targetName}`);
    switch (target.kind) {
      case "primitive": {
        const cast = castToPrimitive(v, target.name);
        if (cast) return cast;
        break;
      }
      case "enum": {
        if (v.kind === "enum" && v.enumType === target.info) return v;
        if (v.kind === "integer") {
          const member = target.info.byOrdinal(v.value);
          if (!member) return this.errorAt(node, `enum ordinal ${v.value} out of range for ${target.info.name}`);
          return { kind: "enum", enumType: target.info, name: member.name, ordinal: member.ordinal };
        }
        break;
      }
      case "class": {
        if (v.kind === "nil") return NIL;
        const obj = objectOf(v);
        if (obj) return isCompatibleClass(obj, target.info) ? obj : castError();
        break;
      }
      default:
        break;
    }

    const direct = coerceDirect(this, v, target, node);
    if (direct) return direct;
    const converted = this.tryImplicitConversion(v, target, node);
    if (converted) return converted;
    return castError();
  };

  cls.prototype.evaluateIsExpression = function evaluateIsExpression(this: Interpreter, node: AST.IsExpression, env: Environment): RuntimeValue {
    const value = this.evaluate(node.expression, env);
    if (this.halted(value)) return value;
    const target = this.resolveTypeExpression(node.targetType, env);
    if (target.kind === "error") return target;
    const v = unwrapVariant(value);
    if (v.kind === "nil") return makeBoolean(false);
    if (target.kind === "class") {
      const obj = objectOf(v);
      return makeBoolean(obj !== null && isCompatibleClass(obj, target.info));
    }
    if (target.kind === "interface") {
      if (v.kind === "interface" && v.interfaceInfo.inheritsFrom(target.info.name)) return makeBoolean(v.object !== null);
      const obj = objectOf(v);
      return makeBoolean(obj !== null && obj.classInfo.implementsInterface(target.info));
    }
    return makeBoolean(typesEqual(runtimeTypeOf(v), target));
  };

  cls.prototype.evaluateAsExpression = function evaluateAsExpression(this: Interpreter, node: AST.AsExpression, env: Environment): RuntimeValue {
    const value = this.evaluate(node.expression, env);
    if (this.halted(value)) return value;
    const target = this.resolveTypeExpression(node.targetType, env);
    if (target.kind === "error") return target;
    const v = unwrapVariant(value);

    if (target.kind === "class") {
      if (v.kind === "nil") return NIL;
      const obj = objectOf(v);
      if (v.kind === "interface" && !obj) return NIL;
      if (!obj || !isCompatibleClass(obj, target.info)) return this.errorAt(node, "invalid class typecast");
      return obj;
    }
    if (target.kind === "interface") {
      if (v.kind === "nil") return { kind: "interface", interfaceInfo: target.info, object: null };
      if (v.kind === "interface") {
        if (!v.object) return { kind: "interface", interfaceInfo: target.info, object: null };
        if (v.interfaceInfo.isCompatibleWith(target.info) || v.object.classInfo.implementsInterface(target.info)) {
          return { kind: "interface", interfaceInfo: target.info, object: v.object };
        }
        return this.errorAt(node, `interface ${v.interfaceInfo.name} is not compatible with ${target.info.name}`);
      }
      if (v.kind === "object") {
        if (v.classInfo.implementsInterface(target.info)) return { kind: "interface", interfaceInfo: target.info, object: v };
        return this.errorAt(node, `class ${v.classInfo.name} does not implement interface ${target.info.name}`);
      }
      return this.errorAt(node, "invalid class typecast");
    }
    if (sameName(typeNameOf(v), typeToString(target))) return v;
    return this.errorAt(node, "invalid class typecast");
  };
}
