import { isTypeCompatible, typesEqual, typeToString, type RuntimeType } from "./runtime_type";

export type ArrayBounds = { low: number; high: number };

/**
 * Static arrays carry inclusive bounds and are copied on assignment; dynamic
 * arrays are zero based and shared by reference.
 */
export class ArrayType {
  constructor(
    readonly elementType: RuntimeType,
    readonly bounds: ArrayBounds | null = null,
  ) {}

  get isStatic(): boolean {
    return this.bounds !== null;
  }

  get isDynamic(): boolean {
    return this.bounds === null;
  }

  get low(): number {
    return this.bounds ? this.bounds.low : 0;
  }

  get high(): number {
    return this.bounds ? this.bounds.high : -1;
  }

  get size(): number {
    return this.bounds ? this.bounds.high - this.bounds.low + 1 : 0;
  }

  toString(): string {
    const elem = typeToString(this.elementType);
    return this.bounds ? `array[${this.bounds.low}..${this.bounds.high}] of ${elem}` : `array of ${elem}`;
  }

  equals(other: ArrayType): boolean {
    if (!typesEqual(this.elementType, other.elementType)) return false;
    if (this.bounds === null || other.bounds === null) return this.bounds === other.bounds;
    return this.bounds.low === other.bounds.low && this.bounds.high === other.bounds.high;
  }

  /** Element types compatible and, when both are static, the same size. */
  isCompatibleWith(other: ArrayType): boolean {
    if (!isTypeCompatible(this.elementType, other.elementType)) return false;
    if (this.isStatic && other.isStatic) return this.size === other.size;
    return true;
  }
}

export function staticArray(elementType: RuntimeType, low: number, high: number): ArrayType {
  return new ArrayType(elementType, { low, high });
}

export function dynamicArray(elementType: RuntimeType): ArrayType {
  return new ArrayType(elementType, null);
}
