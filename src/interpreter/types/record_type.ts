import { MethodTable, type FieldInfo, type PropertyInfo, type RoutineInfo } from "./member_info";
import { OperatorTable, type OperatorEntry } from "./operators";
import { normalizeName } from "./runtime_type";

/** Value-type counterpart of ClassInfo: no inheritance, no virtual dispatch. */
export class RecordType {
  readonly fields = new Map<string, FieldInfo>();
  readonly methods = new MethodTable();
  readonly classMethods = new MethodTable();
  readonly properties = new Map<string, PropertyInfo>();
  readonly operators = new OperatorTable();
  private defaultPropertyName: string | null = null;

  constructor(readonly name: string) {}

  addField(field: FieldInfo): string | null {
    const key = normalizeName(field.name);
    if (this.fields.has(key)) return `duplicate field ${field.name} in record ${this.name}`;
    this.fields.set(key, field);
    return null;
  }

  addMethod(routine: RoutineInfo): void {
    if (routine.isClassMethod) this.classMethods.add(routine);
    else this.methods.add(routine);
  }

  addProperty(prop: PropertyInfo): string | null {
    const key = normalizeName(prop.name);
    if (this.properties.has(key)) return `duplicate property ${prop.name} in record ${this.name}`;
    this.properties.set(key, prop);
    if (prop.isDefault) this.defaultPropertyName = key;
    return null;
  }

  registerOperator(entry: OperatorEntry): string | null {
    return this.operators.register(entry);
  }

  lookupField(name: string): FieldInfo | undefined {
    return this.fields.get(normalizeName(name));
  }

  lookupMethod(name: string): RoutineInfo[] | undefined {
    return this.methods.get(name);
  }

  lookupClassMethod(name: string): RoutineInfo[] | undefined {
    return this.classMethods.get(name);
  }

  lookupProperty(name: string): PropertyInfo | undefined {
    return this.properties.get(normalizeName(name));
  }

  defaultProperty(): PropertyInfo | undefined {
    return this.defaultPropertyName ? this.properties.get(this.defaultPropertyName) : undefined;
  }

  lookupOperator(operator: string, operandTypes: readonly string[]): OperatorEntry | undefined {
    return this.operators.lookup(operator, operandTypes);
  }
}
