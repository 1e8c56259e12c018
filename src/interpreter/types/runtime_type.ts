import type { ArrayType } from "./array_type";
import type { ClassInfo } from "./class_info";
import type { EnumType } from "./enum_type";
import type { InterfaceInfo } from "./interface_info";
import type { RecordType } from "./record_type";
import type { SetType } from "./set_type";

export type PrimitiveName = "Integer" | "Float" | "String" | "Boolean";

export type RuntimeType =
  | { kind: "primitive"; name: PrimitiveName }
  | { kind: "variant" }
  | { kind: "json" }
  | { kind: "nil" }
  | { kind: "unknown" }
  | { kind: "class"; info: ClassInfo }
  | { kind: "interface"; info: InterfaceInfo }
  | { kind: "record"; info: RecordType }
  | { kind: "enum"; info: EnumType }
  | { kind: "array"; info: ArrayType }
  | { kind: "set"; info: SetType }
  | { kind: "function"; params: RuntimeType[]; returnType?: RuntimeType };

export const INTEGER_TYPE: RuntimeType = { kind: "primitive", name: "Integer" };
export const FLOAT_TYPE: RuntimeType = { kind: "primitive", name: "Float" };
export const STRING_TYPE: RuntimeType = { kind: "primitive", name: "String" };
export const BOOLEAN_TYPE: RuntimeType = { kind: "primitive", name: "Boolean" };
export const VARIANT_TYPE: RuntimeType = { kind: "variant" };
export const JSON_TYPE: RuntimeType = { kind: "json" };
export const NIL_TYPE: RuntimeType = { kind: "nil" };
export const UNKNOWN_TYPE: RuntimeType = { kind: "unknown" };

export function normalizeName(name: string): string {
  return name.toLowerCase();
}

export function sameName(a: string, b: string): boolean {
  return normalizeName(a) === normalizeName(b);
}

export function typeToString(t: RuntimeType): string {
  switch (t.kind) {
    case "primitive":
      return t.name;
    case "variant":
      return "Variant";
    case "json":
      return "JSON";
    case "nil":
      return "Nil";
    case "unknown":
      return "Unknown";
    case "class":
    case "interface":
    case "record":
    case "enum":
      return t.info.name;
    case "array":
    case "set":
      return t.info.toString();
    case "function": {
      const params = t.params.map(typeToString).join(", ");
      return t.returnType ? `function(${params}): ${typeToString(t.returnType)}` : `procedure(${params})`;
    }
  }
}

export function typesEqual(a: RuntimeType, b: RuntimeType): boolean {
  switch (a.kind) {
    case "primitive":
      return b.kind === "primitive" && a.name === b.name;
    case "class":
    case "interface":
    case "record":
    case "enum":
      return b.kind === a.kind && sameName(a.info.name, b.info.name);
    case "array":
      return b.kind === "array" && a.info.equals(b.info);
    case "set":
      return b.kind === "set" && a.info.equals(b.info);
    case "function":
      return (
        b.kind === "function" &&
        a.params.length === b.params.length &&
        a.params.every((p, i) => {
          const other = b.params[i];
          return other !== undefined && typesEqual(p, other);
        })
      );
    default:
      return a.kind === b.kind;
  }
}

/** Slots a nil value may occupy. */
export function isNilableType(t: RuntimeType): boolean {
  switch (t.kind) {
    case "class":
    case "interface":
    case "function":
    case "nil":
    case "unknown":
    case "variant":
    case "json":
      return true;
    case "array":
      return t.info.isDynamic;
    default:
      return false;
  }
}

/**
 * Whether a value statically typed `from` may be stored in a slot of type `to`
 * without a user conversion.
 */
export function isTypeCompatible(from: RuntimeType, to: RuntimeType): boolean {
  if (to.kind === "unknown" || to.kind === "variant" || from.kind === "unknown") return true;
  if (typesEqual(from, to)) return true;
  if (from.kind === "nil") return isNilableType(to);
  switch (to.kind) {
    case "primitive":
      return to.name === "Float" && from.kind === "primitive" && from.name === "Integer";
    case "class":
      return from.kind === "class" && from.info.inheritsFrom(to.info.name);
    case "interface":
      if (from.kind === "class") return from.info.implementsInterface(to.info);
      if (from.kind === "interface") return from.info.isCompatibleWith(to.info);
      return false;
    case "array":
      return from.kind === "array" && from.info.isCompatibleWith(to.info);
    case "function":
      return (from.kind === "function" && from.params.length === to.params.length);
    default:
      return false;
  }
}
