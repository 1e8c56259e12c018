import type * as AST from "../../ast";
import type { PropertyInfo } from "./member_info";
import { normalizeName } from "./runtime_type";

export class InterfaceInfo {
  /** Own method signatures keyed by normalized name. */
  readonly methods = new Map<string, AST.FunctionDeclaration>();
  readonly properties = new Map<string, PropertyInfo>();

  constructor(
    readonly name: string,
    readonly parent: InterfaceInfo | null = null,
  ) {}

  addMethod(node: AST.FunctionDeclaration): void {
    this.methods.set(normalizeName(node.name.name), node);
  }

  addProperty(prop: PropertyInfo): void {
    this.properties.set(normalizeName(prop.name), prop);
  }

  /** Normalized names of own and inherited methods. */
  allMethodNames(): string[] {
    const names = new Set<string>();
    let cur: InterfaceInfo | null = this;
    while (cur) {
      for (const key of cur.methods.keys()) names.add(key);
      cur = cur.parent;
    }
    return Array.from(names);
  }

  lookupProperty(name: string): PropertyInfo | undefined {
    let cur: InterfaceInfo | null = this;
    while (cur) {
      const p = cur.properties.get(normalizeName(name));
      if (p) return p;
      cur = cur.parent;
    }
    return undefined;
  }

  inheritsFrom(name: string): boolean {
    let cur: InterfaceInfo | null = this;
    while (cur) {
      if (normalizeName(cur.name) === normalizeName(name)) return true;
      cur = cur.parent;
    }
    return false;
  }

  /** This interface can stand in for `other` when its method set is a superset. */
  isCompatibleWith(other: InterfaceInfo): boolean {
    const mine = new Set(this.allMethodNames());
    return other.allMethodNames().every((m) => mine.has(m));
  }
}
