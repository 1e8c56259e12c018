import { normalizeName } from "./runtime_type";

export type OperatorEntry = {
  operator: string;
  operandTypes: string[];
  bindingName: string;
  /** Operand passed as `Self`; -1 for class-method and global bindings. */
  selfIndex: number;
  isClassMethod: boolean;
};

export function operatorKey(operator: string, operandTypes: readonly string[]): string {
  return `${operator.toLowerCase()}(${operandTypes.map(normalizeName).join(",")})`;
}

export class OperatorTable {
  private readonly entries = new Map<string, OperatorEntry>();

  /** Returns an error message when the operand tuple is already bound. */
  register(entry: OperatorEntry): string | null {
    const key = operatorKey(entry.operator, entry.operandTypes);
    if (this.entries.has(key)) {
      return `operator ${entry.operator} already defined for (${entry.operandTypes.join(", ")})`;
    }
    this.entries.set(key, entry);
    return null;
  }

  lookup(operator: string, operandTypes: readonly string[]): OperatorEntry | undefined {
    return this.entries.get(operatorKey(operator, operandTypes));
  }

  get size(): number {
    return this.entries.size;
  }

  all(): OperatorEntry[] {
    return Array.from(this.entries.values());
  }
}

/** Binary class operators bind `Self` to the first operand of the declaring type; `in` binds the right side. */
export function operatorSelfIndex(operator: string, operandTypes: readonly string[], ownerName: string, isClassMethod: boolean): number {
  if (isClassMethod) return -1;
  if (operandTypes.length <= 1) return 0;
  if (operator.toLowerCase() === "in") return 1;
  const owner = normalizeName(ownerName);
  const idx = operandTypes.findIndex((t) => normalizeName(t) === owner);
  return idx < 0 ? 0 : idx;
}
