import type { ClassInfo } from "./class_info";
import { ConversionRegistry } from "./conversion_registry";
import type { EnumMember, EnumType } from "./enum_type";
import type { HelperInfo } from "./helper_info";
import type { InterfaceInfo } from "./interface_info";
import { OperatorTable } from "./operators";
import type { RecordType } from "./record_type";
import {
  BOOLEAN_TYPE,
  FLOAT_TYPE,
  INTEGER_TYPE,
  JSON_TYPE,
  STRING_TYPE,
  VARIANT_TYPE,
  normalizeName,
  sameName,
  type RuntimeType,
} from "./runtime_type";

const BUILTIN_TYPE_NAMES = new Map<string, RuntimeType>([
  ["integer", INTEGER_TYPE],
  ["int64", INTEGER_TYPE],
  ["cardinal", INTEGER_TYPE],
  ["float", FLOAT_TYPE],
  ["double", FLOAT_TYPE],
  ["real", FLOAT_TYPE],
  ["string", STRING_TYPE],
  ["boolean", BOOLEAN_TYPE],
  ["variant", VARIANT_TYPE],
  ["json", JSON_TYPE],
]);

/**
 * Every user and builtin type known to one interpreter, plus the global
 * operator table and the conversion registry.
 */
export class TypeRegistry {
  readonly classes = new Map<string, ClassInfo>();
  readonly records = new Map<string, RecordType>();
  readonly interfaces = new Map<string, InterfaceInfo>();
  readonly enums = new Map<string, EnumType>();
  readonly aliases = new Map<string, RuntimeType>();
  /** In declaration order; later helpers shadow earlier ones. */
  readonly helpers: HelperInfo[] = [];
  readonly operators = new OperatorTable();
  readonly conversions = new ConversionRegistry();

  isDeclared(name: string): boolean {
    const key = normalizeName(name);
    return (
      BUILTIN_TYPE_NAMES.has(key) ||
      this.classes.has(key) ||
      this.records.has(key) ||
      this.interfaces.has(key) ||
      this.enums.has(key) ||
      this.aliases.has(key) ||
      this.helpers.some((h) => sameName(h.name, name))
    );
  }

  private duplicate(name: string): string | null {
    return this.isDeclared(name) ? `type ${name} already declared` : null;
  }

  registerClass(info: ClassInfo): string | null {
    const err = this.duplicate(info.name);
    if (!err) this.classes.set(normalizeName(info.name), info);
    return err;
  }

  registerRecord(info: RecordType): string | null {
    const err = this.duplicate(info.name);
    if (!err) this.records.set(normalizeName(info.name), info);
    return err;
  }

  registerInterface(info: InterfaceInfo): string | null {
    const err = this.duplicate(info.name);
    if (!err) this.interfaces.set(normalizeName(info.name), info);
    return err;
  }

  registerEnum(info: EnumType): string | null {
    const err = this.duplicate(info.name);
    if (!err) this.enums.set(normalizeName(info.name), info);
    return err;
  }

  registerAlias(name: string, type: RuntimeType): string | null {
    const err = this.duplicate(name);
    if (!err) this.aliases.set(normalizeName(name), type);
    return err;
  }

  registerHelper(info: HelperInfo): string | null {
    const err = this.duplicate(info.name);
    if (!err) this.helpers.push(info);
    return err;
  }

  /** Most recently declared helper for `t` that declares `member`. */
  findHelper(t: RuntimeType, member: string): HelperInfo | undefined {
    for (let i = this.helpers.length - 1; i >= 0; i--) {
      const helper = this.helpers[i];
      if (helper && helper.appliesTo(t) && helper.hasMember(member)) return helper;
    }
    return undefined;
  }

  getClass(name: string): ClassInfo | undefined {
    return this.classes.get(normalizeName(name));
  }

  getRecord(name: string): RecordType | undefined {
    return this.records.get(normalizeName(name));
  }

  getInterface(name: string): InterfaceInfo | undefined {
    return this.interfaces.get(normalizeName(name));
  }

  getEnum(name: string): EnumType | undefined {
    return this.enums.get(normalizeName(name));
  }

  resolveTypeName(name: string): RuntimeType | undefined {
    const key = normalizeName(name);
    const builtin = BUILTIN_TYPE_NAMES.get(key);
    if (builtin) return builtin;
    const cls = this.classes.get(key);
    if (cls) return { kind: "class", info: cls };
    const rec = this.records.get(key);
    if (rec) return { kind: "record", info: rec };
    const iface = this.interfaces.get(key);
    if (iface) return { kind: "interface", info: iface };
    const en = this.enums.get(key);
    if (en) return { kind: "enum", info: en };
    return this.aliases.get(key);
  }

  /** Enum members are visible unqualified. */
  findEnumMember(name: string): { enumType: EnumType; member: EnumMember } | undefined {
    for (const enumType of this.enums.values()) {
      const member = enumType.lookup(name);
      if (member) return { enumType, member };
    }
    return undefined;
  }
}
