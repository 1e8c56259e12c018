import { normalizeName } from "./runtime_type";

export type EnumMember = { name: string; ordinal: number };

export class EnumType {
  readonly members: EnumMember[] = [];
  private readonly byName = new Map<string, EnumMember>();

  constructor(readonly name: string) {}

  addMember(name: string, ordinal?: number): string | null {
    const key = normalizeName(name);
    if (this.byName.has(key)) return `duplicate enum member ${name} in ${this.name}`;
    const last = this.members[this.members.length - 1];
    const member = { name, ordinal: ordinal ?? (last ? last.ordinal + 1 : 0) };
    this.members.push(member);
    this.byName.set(key, member);
    return null;
  }

  lookup(name: string): EnumMember | undefined {
    return this.byName.get(normalizeName(name));
  }

  byOrdinal(ordinal: number): EnumMember | undefined {
    return this.members.find((m) => m.ordinal === ordinal);
  }

  get first(): EnumMember | undefined {
    return this.members[0];
  }

  get last(): EnumMember | undefined {
    return this.members[this.members.length - 1];
  }
}
