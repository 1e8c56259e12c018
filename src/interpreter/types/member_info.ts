import type * as AST from "../../ast";
import type { Environment } from "../environment";
import type { RuntimeValue } from "../values";
import { normalizeName, type RuntimeType } from "./runtime_type";

/** A declared routine: global function, method, constructor or destructor. */
export type RoutineInfo = {
  name: string;
  node: AST.FunctionDeclaration;
  /** Declaring class or record; absent for global functions. */
  ownerName?: string;
  isClassMethod: boolean;
  /** Scope the routine was declared in. */
  closure: Environment;
  /** VMT slot, assigned when the owning class is frozen. */
  slot?: number;
};

export type FieldInfo = {
  name: string;
  type: RuntimeType;
  initializer?: AST.Expression;
  ownerName: string;
};

export type ClassVarInfo = {
  name: string;
  type: RuntimeType;
  value: RuntimeValue;
};

export type PropertyInfo = {
  name: string;
  type: RuntimeType;
  indexParams: AST.Parameter[];
  readSpec?: string;
  writeSpec?: string;
  isDefault: boolean;
  ownerName: string;
};

export function hasDirective(routine: RoutineInfo, directive: AST.MethodDirective): boolean {
  return routine.node.directives?.includes(directive) ?? false;
}

export function isVirtualRoutine(routine: RoutineInfo): boolean {
  return (
    hasDirective(routine, "virtual") ||
    hasDirective(routine, "override") ||
    hasDirective(routine, "abstract") ||
    hasDirective(routine, "reintroduce")
  );
}

export function routineArity(routine: RoutineInfo): { min: number; max: number } {
  const params = routine.node.params;
  return { min: params.filter((p) => p.defaultValue === undefined).length, max: params.length };
}

/** Overload sets keyed by normalized name, in declaration order. */
export class MethodTable {
  private readonly sets = new Map<string, RoutineInfo[]>();

  add(routine: RoutineInfo): void {
    const key = normalizeName(routine.name);
    const existing = this.sets.get(key);
    if (existing) existing.push(routine);
    else this.sets.set(key, [routine]);
  }

  get(name: string): RoutineInfo[] | undefined {
    return this.sets.get(normalizeName(name));
  }

  has(name: string): boolean {
    return this.sets.has(normalizeName(name));
  }

  entries(): IterableIterator<[string, RoutineInfo[]]> {
    return this.sets.entries();
  }

  all(): RoutineInfo[] {
    return Array.from(this.sets.values()).flat();
  }
}
