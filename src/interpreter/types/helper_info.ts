import type { Environment } from "../environment";
import type { RuntimeValue } from "../values";
import { MethodTable, type PropertyInfo, type RoutineInfo } from "./member_info";
import { normalizeName, typesEqual, type RuntimeType } from "./runtime_type";

/**
 * Methods and properties attached to an existing type by `helper for T`.
 * Class variables and constants live in `scope`, which the helper's routines
 * close over.
 */
export class HelperInfo {
  readonly methods = new MethodTable();
  readonly properties = new Map<string, PropertyInfo>();

  constructor(
    readonly name: string,
    readonly target: RuntimeType,
    readonly scope: Environment,
    readonly isRecordHelper: boolean,
  ) {}

  addMethod(routine: RoutineInfo): void {
    this.methods.add(routine);
  }

  addProperty(prop: PropertyInfo): string | null {
    const key = normalizeName(prop.name);
    if (this.properties.has(key)) return `duplicate property ${prop.name} in helper ${this.name}`;
    this.properties.set(key, prop);
    return null;
  }

  /** Class variable or constant declared by the helper. */
  lookupField(name: string): RuntimeValue | undefined {
    return this.scope.ownBinding(name)?.value;
  }

  lookupMethod(name: string): RoutineInfo[] | undefined {
    return this.methods.get(name);
  }

  lookupClassMethod(name: string): RoutineInfo[] | undefined {
    const set = this.methods.get(name)?.filter((r) => r.isClassMethod);
    return set && set.length > 0 ? set : undefined;
  }

  lookupProperty(name: string): PropertyInfo | undefined {
    return this.properties.get(normalizeName(name));
  }

  hasMember(name: string): boolean {
    return this.methods.has(name) || this.properties.has(normalizeName(name)) || this.scope.ownBinding(name) !== undefined;
  }

  /** Class helpers extend descendants too; every other helper needs the exact type. */
  appliesTo(t: RuntimeType): boolean {
    if (this.target.kind === "class") return t.kind === "class" && t.info.inheritsFrom(this.target.info.name);
    return typesEqual(t, this.target);
  }
}
