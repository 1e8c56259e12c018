import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import type { ArrayType } from "./types/array_type";
import type { ClassInfo } from "./types/class_info";
import type { EnumType } from "./types/enum_type";
import type { InterfaceInfo } from "./types/interface_info";
import type { RoutineInfo } from "./types/member_info";
import type { RecordType } from "./types/record_type";
import type { SetType } from "./types/set_type";
import {
  BOOLEAN_TYPE,
  FLOAT_TYPE,
  INTEGER_TYPE,
  JSON_TYPE,
  NIL_TYPE,
  STRING_TYPE,
  UNKNOWN_TYPE,
  VARIANT_TYPE,
  type RuntimeType,
} from "./types/runtime_type";

export type JsonNode = null | boolean | number | string | JsonNode[] | { [key: string]: JsonNode };

export type ArrayValue = { kind: "array"; arrayType: ArrayType; elements: RuntimeValue[] };
/** Members are element ordinals; sets are values and copy on assignment. */
export type SetValue = { kind: "set"; setType: SetType; members: Set<number> };
export type RecordValue = { kind: "record"; recordType: RecordType; fields: Map<string, RuntimeValue> };
export type ObjectValue = { kind: "object"; classInfo: ClassInfo; fields: Map<string, RuntimeValue>; id: number };
export type FunctionValue = {
  kind: "function";
  name: string;
  overloads: RoutineInfo[];
  closure: Environment;
  /** Bound receiver of a method pointer. */
  self?: RuntimeValue;
};
export type LambdaValue = { kind: "lambda"; node: AST.LambdaExpression; closure: Environment };
export type NativeFunctionValue = {
  kind: "native_function";
  name: string;
  arity?: number;
  impl: (interpreter: Interpreter, args: RuntimeValue[], node: AST.AstNode | null) => RuntimeValue;
};
export type ErrorValue = { kind: "error"; message: string };

export type RuntimeValue =
  | { kind: "integer"; value: number }
  | { kind: "float"; value: number }
  | { kind: "string"; value: string }
  | { kind: "boolean"; value: boolean }
  | { kind: "nil"; value: null }
  | { kind: "enum"; enumType: EnumType; name: string; ordinal: number }
  | ArrayValue
  | SetValue
  | RecordValue
  | ObjectValue
  | { kind: "interface"; interfaceInfo: InterfaceInfo; object: ObjectValue | null }
  | { kind: "class_ref"; classInfo: ClassInfo }
  | { kind: "record_type_ref"; recordType: RecordType }
  | { kind: "enum_type_ref"; enumType: EnumType }
  | FunctionValue
  | LambdaValue
  | NativeFunctionValue
  | { kind: "variant"; value: Exclude<RuntimeValue, { kind: "variant" }> | null }
  | { kind: "json"; node: JsonNode }
  | ErrorValue;

export type CallableValue = FunctionValue | LambdaValue | NativeFunctionValue;

/** Language-level exception in flight. */
export type ExceptionValue = {
  classInfo: ClassInfo;
  instance: ObjectValue;
  message: string;
  /** Frame names at raise time, outermost first. */
  callStack: string[];
  position?: AST.Position;
};

export const NIL: RuntimeValue = { kind: "nil", value: null };

export function makeInteger(value: number): RuntimeValue {
  return { kind: "integer", value };
}

export function makeFloat(value: number): RuntimeValue {
  return { kind: "float", value };
}

export function makeString(value: string): RuntimeValue {
  return { kind: "string", value };
}

export function makeBoolean(value: boolean): RuntimeValue {
  return { kind: "boolean", value };
}

export function makeError(message: string): ErrorValue {
  return { kind: "error", message };
}

export function isError(v: RuntimeValue): v is ErrorValue {
  return v.kind === "error";
}

export function isCallable(v: RuntimeValue): v is CallableValue {
  return v.kind === "function" || v.kind === "lambda" || v.kind === "native_function";
}

export function typeTag(v: RuntimeValue): string {
  switch (v.kind) {
    case "class_ref":
      return "CLASS";
    case "record_type_ref":
      return "RECORD_TYPE";
    case "enum_type_ref":
      return "ENUM_TYPE";
    case "function":
      return "FUNCTION_POINTER";
    case "native_function":
      return "NATIVE";
    default:
      return v.kind.toUpperCase();
  }
}

/** Language-level type name, as used in diagnostics and conversion keys. */
export function typeNameOf(v: RuntimeValue): string {
  switch (v.kind) {
    case "integer":
      return "Integer";
    case "float":
      return "Float";
    case "string":
      return "String";
    case "boolean":
      return "Boolean";
    case "nil":
      return "Nil";
    case "enum":
      return v.enumType.name;
    case "array":
      return v.arrayType.toString();
    case "set":
      return v.setType.toString();
    case "record":
      return v.recordType.name;
    case "object":
      return v.classInfo.name;
    case "interface":
      return v.interfaceInfo.name;
    case "class_ref":
      return `class of ${v.classInfo.name}`;
    case "record_type_ref":
      return v.recordType.name;
    case "enum_type_ref":
      return v.enumType.name;
    case "function":
    case "native_function":
      return "function";
    case "lambda":
      return "lambda";
    case "variant":
      return "Variant";
    case "json":
      return "JSON";
    case "error":
      return "Error";
  }
}

export function runtimeTypeOf(v: RuntimeValue): RuntimeType {
  switch (v.kind) {
    case "integer":
      return INTEGER_TYPE;
    case "float":
      return FLOAT_TYPE;
    case "string":
      return STRING_TYPE;
    case "boolean":
      return BOOLEAN_TYPE;
    case "nil":
      return NIL_TYPE;
    case "enum":
      return { kind: "enum", info: v.enumType };
    case "array":
      return { kind: "array", info: v.arrayType };
    case "set":
      return { kind: "set", info: v.setType };
    case "record":
      return { kind: "record", info: v.recordType };
    case "object":
      return { kind: "class", info: v.classInfo };
    case "interface":
      return { kind: "interface", info: v.interfaceInfo };
    case "variant":
      return VARIANT_TYPE;
    case "json":
      return JSON_TYPE;
    case "lambda":
      return { kind: "function", params: v.node.params.map(() => UNKNOWN_TYPE) };
    case "function": {
      const first = v.overloads[0];
      return { kind: "function", params: first ? first.node.params.map(() => UNKNOWN_TYPE) : [] };
    }
    default:
      return UNKNOWN_TYPE;
  }
}

export function unwrapVariant(v: RuntimeValue): RuntimeValue {
  if (v.kind !== "variant") return v;
  return v.value ?? NIL;
}

export function boxVariant(v: RuntimeValue): RuntimeValue {
  if (v.kind === "variant") return v;
  if (v.kind === "nil") return { kind: "variant", value: null };
  return { kind: "variant", value: v };
}

/** Static arrays, sets and records are copied recursively; everything else aliases. */
export function copyValue(v: RuntimeValue): RuntimeValue {
  switch (v.kind) {
    case "set":
      return { kind: "set", setType: v.setType, members: new Set(v.members) };
    case "array":
      if (v.arrayType.isDynamic) return v;
      return { kind: "array", arrayType: v.arrayType, elements: v.elements.map(copyValue) };
    case "record": {
      const fields = new Map<string, RuntimeValue>();
      for (const [k, f] of v.fields) fields.set(k, copyValue(f));
      return { kind: "record", recordType: v.recordType, fields };
    }
    case "variant":
      return v.value ? { kind: "variant", value: unboxedCopy(v.value) } : v;
    default:
      return v;
  }
}

function unboxedCopy(v: Exclude<RuntimeValue, { kind: "variant" }>): Exclude<RuntimeValue, { kind: "variant" }> {
  if (v.kind === "array" && v.arrayType.isStatic) {
    return { kind: "array", arrayType: v.arrayType, elements: v.elements.map(copyValue) };
  }
  if (v.kind === "set") return { kind: "set", setType: v.setType, members: new Set(v.members) };
  if (v.kind === "record") {
    const fields = new Map<string, RuntimeValue>();
    for (const [k, f] of v.fields) fields.set(k, copyValue(f));
    return { kind: "record", recordType: v.recordType, fields };
  }
  return v;
}

export function makeRecord(recordType: RecordType): RecordValue {
  const fields = new Map<string, RuntimeValue>();
  for (const [key, field] of recordType.fields) fields.set(key, defaultValueFor(field.type));
  return { kind: "record", recordType, fields };
}

export function defaultValueFor(t: RuntimeType): RuntimeValue {
  switch (t.kind) {
    case "primitive":
      if (t.name === "Integer") return makeInteger(0);
      if (t.name === "Float") return makeFloat(0);
      if (t.name === "String") return makeString("");
      return makeBoolean(false);
    case "enum": {
      const first = t.info.first;
      return first ? { kind: "enum", enumType: t.info, name: first.name, ordinal: first.ordinal } : NIL;
    }
    case "record":
      return makeRecord(t.info);
    case "array":
      if (t.info.isDynamic) return NIL;
      return {
        kind: "array",
        arrayType: t.info,
        elements: Array.from({ length: t.info.size }, () => defaultValueFor(t.info.elementType)),
      };
    case "set":
      return { kind: "set", setType: t.info, members: new Set() };
    case "variant":
      return { kind: "variant", value: null };
    case "json":
      return { kind: "json", node: null };
    default:
      return NIL;
  }
}

/** Empty dynamic array value standing in for a nil dynamic array slot. */
export function emptyDynamicArray(arrayType: ArrayType): ArrayValue {
  return { kind: "array", arrayType, elements: [] };
}

/** Value of a set element stored as `ordinal`. */
export function setElementValue(elementType: RuntimeType, ordinal: number): RuntimeValue {
  if (elementType.kind === "enum") {
    const member = elementType.info.byOrdinal(ordinal);
    return member ? { kind: "enum", enumType: elementType.info, name: member.name, ordinal } : makeInteger(ordinal);
  }
  if (elementType.kind === "primitive" && elementType.name === "Boolean") return makeBoolean(ordinal !== 0);
  if (elementType.kind === "primitive" && elementType.name === "String") return makeString(String.fromCharCode(ordinal));
  return makeInteger(ordinal);
}

/** Members in ascending ordinal order. */
export function setElements(v: SetValue): RuntimeValue[] {
  return Array.from(v.members)
    .sort((a, b) => a - b)
    .map((o) => setElementValue(v.setType.elementType, o));
}

export function ordinalOf(v: RuntimeValue): number | null {
  const u = unwrapVariant(v);
  if (u.kind === "integer") return u.value;
  if (u.kind === "enum") return u.ordinal;
  return null;
}

export function valuesEqual(a: RuntimeValue, b: RuntimeValue): boolean {
  const l = unwrapVariant(a);
  const r = unwrapVariant(b);
  if ((l.kind === "integer" || l.kind === "float") && (r.kind === "integer" || r.kind === "float")) {
    return l.value === r.value;
  }
  switch (l.kind) {
    case "string":
    case "boolean":
      return r.kind === l.kind && r.value === l.value;
    case "nil":
      return r.kind === "nil" || (r.kind === "interface" && r.object === null);
    case "enum":
      return r.kind === "enum" && r.enumType === l.enumType && r.ordinal === l.ordinal;
    case "object":
      return (r.kind === "object" && r.id === l.id) || (r.kind === "interface" && r.object?.id === l.id);
    case "interface":
      if (l.object === null) return r.kind === "nil" || (r.kind === "interface" && r.object === null);
      return valuesEqual(l.object, r);
    case "record": {
      if (r.kind !== "record" || r.recordType !== l.recordType) return false;
      for (const [k, f] of l.fields) {
        const other = r.fields.get(k);
        if (!other || !valuesEqual(f, other)) return false;
      }
      return true;
    }
    case "array":
      if (r.kind !== "array") return false;
      if (l.arrayType.isDynamic || r.arrayType.isDynamic) return l === r;
      return l.elements.length === r.elements.length && l.elements.every((e, i) => {
        const other = r.elements[i];
        return other !== undefined && valuesEqual(e, other);
      });
    case "set":
      return (
        r.kind === "set" &&
        l.setType.equals(r.setType) &&
        l.members.size === r.members.size &&
        Array.from(l.members).every((m) => r.members.has(m))
      );
    case "class_ref":
      return r.kind === "class_ref" && r.classInfo === l.classInfo;
    case "json":
      return r.kind === "json" && JSON.stringify(l.node) === JSON.stringify(r.node);
    default:
      return l === r;
  }
}

export function isTruthy(v: RuntimeValue): boolean | null {
  const u = unwrapVariant(v);
  return u.kind === "boolean" ? u.value : null;
}

export function jsonToValue(node: JsonNode): RuntimeValue {
  if (node === null) return NIL;
  if (typeof node === "boolean") return makeBoolean(node);
  if (typeof node === "number") return Number.isInteger(node) ? makeInteger(node) : makeFloat(node);
  if (typeof node === "string") return makeString(node);
  return { kind: "json", node };
}
