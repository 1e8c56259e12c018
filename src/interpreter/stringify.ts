import type { Interpreter } from "./index";
import { setElements, type RuntimeValue } from "./values";

declare module "./index" {
  interface Interpreter {
    valueToString(v: RuntimeValue): string;
  }
}

export function valueToString(v: RuntimeValue, seen: Set<RuntimeValue> = new Set()): string {
  switch (v.kind) {
    case "integer":
    case "float":
      return String(v.value);
    case "string":
      return v.value;
    case "boolean":
      return v.value ? "True" : "False";
    case "nil":
      return "nil";
    case "enum":
      return v.name;
    case "array": {
      if (seen.has(v)) return "[...]";
      seen.add(v);
      const text = `[${v.elements.map((e) => valueToString(e, seen)).join(", ")}]`;
      seen.delete(v);
      return text;
    }
    case "set":
      return `[${setElements(v).map((e) => valueToString(e)).join(", ")}]`;
    case "record": {
      const fields = Array.from(v.recordType.fields.values()).map((f) => {
        const value = v.fields.get(f.name.toLowerCase());
        return `${f.name}: ${value ? valueToString(value, seen) : "nil"}`;
      });
      return `(${fields.join("; ")})`;
    }
    case "object":
      return `<object ${v.classInfo.name}>`;
    case "interface":
      return v.object ? `<interface ${v.interfaceInfo.name}>` : "nil";
    case "class_ref":
      return v.classInfo.name;
    case "record_type_ref":
      return v.recordType.name;
    case "enum_type_ref":
      return v.enumType.name;
    case "function":
      return `<function ${v.name}>`;
    case "lambda":
      return "<lambda>";
    case "native_function":
      return `<native ${v.name}>`;
    case "variant":
      return v.value ? valueToString(v.value, seen) : "Unassigned";
    case "json":
      return JSON.stringify(v.node);
    case "error":
      return `<error ${v.message}>`;
  }
}

export function applyStringifyAugmentations(cls: typeof Interpreter): void {
  cls.prototype.valueToString = function (this: Interpreter, v: RuntimeValue): string {
    return valueToString(v);
  };
}
