import { normalizeName } from "./runtime_type";

/** Longest implicit conversion chain tried between two types. */
export const MAX_CONVERSION_CHAIN_DEPTH = 3;

export type ConversionKind = "implicit" | "explicit";

export type ConversionEntry = {
  kind: ConversionKind;
  from: string;
  to: string;
  bindingName: string;
};

export class ConversionRegistry {
  private readonly implicit = new Map<string, Map<string, ConversionEntry>>();
  private readonly explicit = new Map<string, Map<string, ConversionEntry>>();

  register(entry: ConversionEntry): string | null {
    const table = entry.kind === "implicit" ? this.implicit : this.explicit;
    const from = normalizeName(entry.from);
    const to = normalizeName(entry.to);
    let bucket = table.get(from);
    if (!bucket) {
      bucket = new Map();
      table.set(from, bucket);
    }
    if (bucket.has(to)) {
      return `${entry.kind} conversion from ${entry.from} to ${entry.to} already defined`;
    }
    bucket.set(to, entry);
    return null;
  }

  findImplicit(from: string, to: string): ConversionEntry | undefined {
    return this.implicit.get(normalizeName(from))?.get(normalizeName(to));
  }

  findExplicit(from: string, to: string): ConversionEntry | undefined {
    return this.explicit.get(normalizeName(from))?.get(normalizeName(to));
  }

  /**
   * Breadth-first search over implicit conversions. Returns the shortest chain
   * of at most `maxDepth` steps, or null.
   */
  findConversionPath(from: string, to: string, maxDepth = MAX_CONVERSION_CHAIN_DEPTH): ConversionEntry[] | null {
    const start = normalizeName(from);
    const goal = normalizeName(to);
    if (start === goal) return [];
    const visited = new Set<string>([start]);
    let frontier: Array<{ type: string; path: ConversionEntry[] }> = [{ type: start, path: [] }];
    for (let depth = 0; depth < maxDepth && frontier.length > 0; depth++) {
      const next: typeof frontier = [];
      for (const { type, path } of frontier) {
        const edges = this.implicit.get(type);
        if (!edges) continue;
        for (const [target, entry] of edges) {
          if (visited.has(target)) continue;
          const extended = [...path, entry];
          if (target === goal) return extended;
          visited.add(target);
          next.push({ type: target, path: extended });
        }
      }
      frontier = next;
    }
    return null;
  }
}
