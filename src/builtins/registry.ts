import type * as AST from "../ast";
import type { Interpreter } from "../interpreter/index";
import { normalizeName } from "../interpreter/types/runtime_type";
import type { RuntimeValue } from "../interpreter/values";

export type BuiltinImpl = (ctx: Interpreter, args: RuntimeValue[], node: AST.AstNode | null) => RuntimeValue;

export type BuiltinFunction = {
  name: string;
  /** Exact argument count; when absent `minArity` / `maxArity` bound it. */
  arity?: number;
  minArity?: number;
  maxArity?: number;
  /** Argument positions passed by reference and written back after the call. */
  varParams?: number[];
  impl: BuiltinImpl;
};

/** Fewest arguments a builtin accepts. */
export function builtinMinArity(fn: BuiltinFunction): number {
  return fn.arity ?? fn.minArity ?? 0;
}

/** Case-insensitive table of builtin routines. */
export class BuiltinRegistry {
  private readonly functions = new Map<string, BuiltinFunction>();

  register(fn: BuiltinFunction): this {
    const key = normalizeName(fn.name);
    if (this.functions.has(key)) {
      throw new Error(`builtin ${fn.name} is already registered`);
    }
    this.functions.set(key, fn);
    return this;
  }

  /** Registers `fn`, replacing any builtin of the same name. */
  override(fn: BuiltinFunction): this {
    this.functions.set(normalizeName(fn.name), fn);
    return this;
  }

  lookup(name: string): BuiltinFunction | undefined {
    return this.functions.get(normalizeName(name));
  }

  has(name: string): boolean {
    return this.functions.has(normalizeName(name));
  }

  names(): string[] {
    return Array.from(this.functions.values(), (fn) => fn.name);
  }
}
