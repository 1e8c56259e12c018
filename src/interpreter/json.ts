import { dynamicArray } from "./types/array_type";
import { normalizeName } from "./types/runtime_type";
import { NIL, jsonToValue, setElements, typeNameOf, type JsonNode, type RuntimeValue } from "./values";

export type JsonResult = { ok: true; node: JsonNode } | { ok: false; message: string };

export function isJsonObject(node: JsonNode): node is { [key: string]: JsonNode } {
  return node !== null && typeof node === "object" && !Array.isArray(node);
}

export const CYCLIC_JSON_MESSAGE = "cannot serialize cyclic value";

/** `path` holds the arrays, records and objects currently being walked. */
export function valueToJson(v: RuntimeValue, path: Set<RuntimeValue> = new Set()): JsonResult {
  switch (v.kind) {
    case "integer":
    case "float":
    case "string":
    case "boolean":
      return { ok: true, node: v.value };
    case "nil":
      return { ok: true, node: null };
    case "enum":
      return { ok: true, node: v.name };
    case "json":
      return { ok: true, node: v.node };
    case "variant":
      return v.value ? valueToJson(v.value, path) : { ok: true, node: null };
    case "interface":
      return v.object ? valueToJson(v.object, path) : { ok: true, node: null };
    case "set":
      return valueToJson({ kind: "array", arrayType: dynamicArray(v.setType.elementType), elements: setElements(v) });
    case "array": {
      if (path.has(v)) return { ok: false, message: CYCLIC_JSON_MESSAGE };
      path.add(v);
      const out: JsonNode[] = [];
      for (const e of v.elements) {
        const r = valueToJson(e, path);
        if (!r.ok) return r;
        out.push(r.node);
      }
      path.delete(v);
      return { ok: true, node: out };
    }
    case "record":
    case "object": {
      if (path.has(v)) return { ok: false, message: CYCLIC_JSON_MESSAGE };
      path.add(v);
      const decls = v.kind === "record" ? v.recordType.fields : v.classInfo.fields;
      const out: { [key: string]: JsonNode } = {};
      for (const field of decls.values()) {
        const value = v.fields.get(normalizeName(field.name));
        if (!value) continue;
        const r = valueToJson(value, path);
        if (!r.ok) return r;
        out[field.name] = r.node;
      }
      path.delete(v);
      return { ok: true, node: out };
    }
    default:
      return { ok: false, message: `cannot convert ${typeNameOf(v)} to JSON` };
  }
}

/** Plain JS data as a JSON node; undefined when something in it has no JSON form. */
export function toJsonNode(raw: unknown): JsonNode | undefined {
  if (raw === null || typeof raw === "boolean" || typeof raw === "number" || typeof raw === "string") return raw;
  if (Array.isArray(raw)) {
    const out: JsonNode[] = [];
    for (const item of raw) {
      const node = toJsonNode(item);
      if (node === undefined) return undefined;
      out.push(node);
    }
    return out;
  }
  if (typeof raw === "object") {
    const out: { [key: string]: JsonNode } = {};
    for (const [key, item] of Object.entries(raw)) {
      const node = toJsonNode(item);
      if (node === undefined) return undefined;
      out[key] = node;
    }
    return out;
  }
  return undefined;
}

/** Object member by key; nil when absent or when the node is not an object. */
export function jsonObjectGet(node: JsonNode, key: string): RuntimeValue {
  if (!isJsonObject(node) || !Object.prototype.hasOwnProperty.call(node, key)) return NIL;
  const child = node[key];
  return child === undefined ? NIL : jsonToValue(child);
}

/** Array element by index; nil when out of range. */
export function jsonArrayGet(node: JsonNode, index: number): RuntimeValue {
  if (!Array.isArray(node) || index < 0 || index >= node.length) return NIL;
  const child = node[index];
  return child === undefined ? NIL : jsonToValue(child);
}
