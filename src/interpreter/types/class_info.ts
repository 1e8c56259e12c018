import type { InterfaceInfo } from "./interface_info";
import {
  MethodTable,
  hasDirective,
  type ClassVarInfo,
  type FieldInfo,
  type PropertyInfo,
  type RoutineInfo,
} from "./member_info";
import { OperatorTable, type OperatorEntry } from "./operators";
import { normalizeName, sameName } from "./runtime_type";

function slotKey(routine: RoutineInfo): string {
  return `${normalizeName(routine.name)}/${routine.node.params.length}`;
}

export class ClassInfo {
  /** Instance fields, inherited ones first. */
  readonly fields = new Map<string, FieldInfo>();
  readonly classVars = new Map<string, ClassVarInfo>();
  readonly methods = new MethodTable();
  readonly classMethods = new MethodTable();
  readonly constructors = new MethodTable();
  readonly properties = new Map<string, PropertyInfo>();
  readonly operators = new OperatorTable();
  readonly interfaces: InterfaceInfo[] = [];
  readonly vmt: RoutineInfo[] = [];
  destructor: RoutineInfo | null = null;
  isAbstract = false;

  private readonly slots = new Map<string, number>();
  private defaultPropertyName: string | null = null;
  private frozen = false;

  constructor(
    readonly name: string,
    readonly parent: ClassInfo | null = null,
  ) {
    if (parent) {
      for (const [key, field] of parent.fields) this.fields.set(key, field);
    }
  }

  get isFrozen(): boolean {
    return this.frozen;
  }

  private assertMutable(what: string): void {
    if (this.frozen) {
      throw new Error(`cannot register ${what} on frozen class ${this.name}`);
    }
  }

  addField(field: FieldInfo): string | null {
    this.assertMutable(`field ${field.name}`);
    const key = normalizeName(field.name);
    if (this.fields.has(key)) return `duplicate field ${field.name} in class ${this.name}`;
    this.fields.set(key, field);
    return null;
  }

  addClassVar(classVar: ClassVarInfo): string | null {
    this.assertMutable(`class var ${classVar.name}`);
    const key = normalizeName(classVar.name);
    if (this.classVars.has(key)) return `duplicate class var ${classVar.name} in class ${this.name}`;
    this.classVars.set(key, classVar);
    return null;
  }

  addMethod(routine: RoutineInfo): void {
    this.assertMutable(`method ${routine.name}`);
    if (routine.isClassMethod) this.classMethods.add(routine);
    else this.methods.add(routine);
  }

  addConstructor(routine: RoutineInfo): void {
    this.assertMutable(`constructor ${routine.name}`);
    this.constructors.add(routine);
  }

  setDestructor(routine: RoutineInfo): void {
    this.assertMutable(`destructor ${routine.name}`);
    this.destructor = routine;
    this.methods.add(routine);
  }

  addProperty(prop: PropertyInfo): string | null {
    this.assertMutable(`property ${prop.name}`);
    const key = normalizeName(prop.name);
    if (this.properties.has(key)) return `duplicate property ${prop.name} in class ${this.name}`;
    this.properties.set(key, prop);
    if (prop.isDefault) this.defaultPropertyName = key;
    return null;
  }

  addInterface(iface: InterfaceInfo): void {
    this.assertMutable(`interface ${iface.name}`);
    this.interfaces.push(iface);
  }

  registerOperator(entry: OperatorEntry): string | null {
    this.assertMutable(`operator ${entry.operator}`);
    return this.operators.register(entry);
  }

  /** Self first, root last. */
  ancestry(): ClassInfo[] {
    const chain: ClassInfo[] = [];
    let cur: ClassInfo | null = this;
    while (cur) {
      chain.push(cur);
      cur = cur.parent;
    }
    return chain;
  }

  inheritsFrom(name: string): boolean {
    return this.ancestry().some((c) => sameName(c.name, name));
  }

  lookupMethod(name: string): RoutineInfo[] | undefined {
    for (const cls of this.ancestry()) {
      const set = cls.methods.get(name);
      if (set) return set;
    }
    return undefined;
  }

  lookupClassMethod(name: string): RoutineInfo[] | undefined {
    for (const cls of this.ancestry()) {
      const set = cls.classMethods.get(name);
      if (set) return set;
    }
    return undefined;
  }

  lookupConstructor(name: string): RoutineInfo[] | undefined {
    for (const cls of this.ancestry()) {
      const set = cls.constructors.get(name);
      if (set) return set;
    }
    return undefined;
  }

  lookupDestructor(): RoutineInfo | null {
    for (const cls of this.ancestry()) {
      if (cls.destructor) return this.dispatch(cls.destructor);
    }
    return null;
  }

  lookupField(name: string): FieldInfo | undefined {
    return this.fields.get(normalizeName(name));
  }

  lookupClassVar(name: string): ClassVarInfo | undefined {
    for (const cls of this.ancestry()) {
      const v = cls.classVars.get(normalizeName(name));
      if (v) return v;
    }
    return undefined;
  }

  lookupProperty(name: string): PropertyInfo | undefined {
    for (const cls of this.ancestry()) {
      const p = cls.properties.get(normalizeName(name));
      if (p) return p;
    }
    return undefined;
  }

  defaultProperty(): PropertyInfo | undefined {
    for (const cls of this.ancestry()) {
      if (cls.defaultPropertyName) return cls.properties.get(cls.defaultPropertyName);
    }
    return undefined;
  }

  lookupOperator(operator: string, operandTypes: readonly string[]): { entry: OperatorEntry; owner: ClassInfo } | undefined {
    for (const cls of this.ancestry()) {
      const entry = cls.operators.lookup(operator, operandTypes);
      if (entry) return { entry, owner: cls };
    }
    return undefined;
  }

  /** Name-based: every method the interface (and its parents) declares exists on the class. */
  implementsInterface(iface: InterfaceInfo): boolean {
    return iface.allMethodNames().every((m) => this.lookupMethod(m) !== undefined || this.lookupClassMethod(m) !== undefined);
  }

  missingInterfaceMethods(iface: InterfaceInfo): string[] {
    return iface.allMethodNames().filter((m) => this.lookupMethod(m) === undefined && this.lookupClassMethod(m) === undefined);
  }

  /** True while any VMT slot still holds an abstract method. */
  hasAbstractMethods(): boolean {
    return this.vmt.some((m) => hasDirective(m, "abstract"));
  }

  /** Implementation this class's VMT holds for a virtual routine; non-virtual routines dispatch to themselves. */
  dispatch(routine: RoutineInfo): RoutineInfo {
    if (routine.slot === undefined) return routine;
    return this.vmt[routine.slot] ?? routine;
  }

  /**
   * Copies the parent VMT, opens slots for `virtual` and `reintroduce`
   * methods, replaces slots for `override`, and freezes the class.
   */
  buildVMT(): string | null {
    this.assertMutable("VMT");
    if (this.parent) {
      this.vmt.push(...this.parent.vmt);
      for (const [key, idx] of this.parent.slots) this.slots.set(key, idx);
    }
    for (const routine of this.methods.all()) {
      const key = slotKey(routine);
      if (hasDirective(routine, "override")) {
        const idx = this.slots.get(key);
        if (idx === undefined) {
          return `method ${this.name}.${routine.name} is marked override but no virtual method ${routine.name} exists in an ancestor`;
        }
        this.vmt[idx] = routine;
        routine.slot = idx;
      } else if (hasDirective(routine, "virtual") || hasDirective(routine, "abstract") || hasDirective(routine, "reintroduce")) {
        routine.slot = this.vmt.length;
        this.slots.set(key, routine.slot);
        this.vmt.push(routine);
      } else {
        this.slots.delete(key);
      }
    }
    this.frozen = true;
    return null;
  }
}
