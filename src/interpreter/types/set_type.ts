import { typesEqual, typeToString, type RuntimeType } from "./runtime_type";

/** Largest Integer ordinal a `set of Integer` may hold. */
export const MAX_SET_ORDINAL = 65535;

/** `set of T` over an ordinal element type; members are kept as ordinals. */
export class SetType {
  constructor(readonly elementType: RuntimeType) {}

  toString(): string {
    return `set of ${typeToString(this.elementType)}`;
  }

  equals(other: SetType): boolean {
    return typesEqual(this.elementType, other.elementType);
  }
}

/** Enum, Integer, Boolean and String (one character) qualify as set elements. */
export function isOrdinalType(t: RuntimeType): boolean {
  if (t.kind === "enum") return true;
  return t.kind === "primitive" && t.name !== "Float";
}
