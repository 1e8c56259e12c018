import { normalizeName, type RuntimeType } from "./types/runtime_type";
import type { RuntimeValue } from "./values";

export type Binding = {
  value: RuntimeValue;
  type?: RuntimeType;
  isConst?: boolean;
  /** Declared routine (auto-called when named bare), as opposed to a variable holding a pointer. */
  isRoutine?: boolean;
};

/** Case-insensitive scope frame with a parent chain. */
export class Environment {
  private readonly bindings: Map<string, Binding> = new Map();

  constructor(readonly parent: Environment | null = null) {}

  define(name: string, value: RuntimeValue, type?: RuntimeType, flags: { isConst?: boolean; isRoutine?: boolean } = {}): void {
    const key = normalizeName(name);
    if (this.bindings.has(key)) {
      throw new Error(`Redefinition in current scope: ${name}`);
    }
    this.bindings.set(key, { value, type, ...flags });
  }

  /** Mutates the nearest frame that binds `name`; false when no frame does. */
  assign(name: string, value: RuntimeValue): boolean {
    const binding = this.lookupBinding(name);
    if (!binding) return false;
    binding.value = value;
    return true;
  }

  lookupBinding(name: string): Binding | undefined {
    const key = normalizeName(name);
    let env: Environment | null = this;
    while (env) {
      const binding = env.bindings.get(key);
      if (binding) return binding;
      env = env.parent;
    }
    return undefined;
  }

  lookup(name: string): RuntimeValue | undefined {
    return this.lookupBinding(name)?.value;
  }

  lookupType(name: string): RuntimeType | undefined {
    return this.lookupBinding(name)?.type;
  }

  /** Frames between this one and the one binding `name`; -1 when unbound. */
  depthOf(name: string): number {
    const key = normalizeName(name);
    let env: Environment | null = this;
    for (let depth = 0; env; depth++) {
      if (env.bindings.has(key)) return depth;
      env = env.parent;
    }
    return -1;
  }

  has(name: string): boolean {
    return this.lookupBinding(name) !== undefined;
  }

  hasInCurrentScope(name: string): boolean {
    return this.bindings.has(normalizeName(name));
  }

  /** Binding in this frame only, used to merge overloads. */
  ownBinding(name: string): Binding | undefined {
    return this.bindings.get(normalizeName(name));
  }
}
