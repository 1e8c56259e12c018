import type * as AST from "../ast";
import type { Interpreter } from "../interpreter/index";
import { toJsonNode, valueToJson } from "../interpreter/json";
import { dynamicArray } from "../interpreter/types/array_type";
import { UNKNOWN_TYPE } from "../interpreter/types/runtime_type";
import {
  NIL,
  defaultValueFor,
  isCallable,
  isTruthy,
  makeBoolean,
  makeInteger,
  makeString,
  runtimeTypeOf,
  typeNameOf,
  unwrapVariant,
  type ArrayValue,
  type CallableValue,
  type ErrorValue,
  type RuntimeValue,
} from "../interpreter/values";
import { BuiltinRegistry } from "./registry";

type Checked<T> = T | ErrorValue;

function isErrorValue<T>(v: Checked<T>): v is ErrorValue {
  return typeof v === "object" && v !== null && "kind" in v && v.kind === "error";
}

function expectInteger(ctx: Interpreter, v: RuntimeValue | undefined, label: string, node: AST.AstNode | null): Checked<number> {
  const u = unwrapVariant(v ?? NIL);
  if (u.kind !== "integer") return ctx.errorAt(node, `${label} expects Integer, got ${typeNameOf(u)}`);
  return u.value;
}

function expectString(ctx: Interpreter, v: RuntimeValue | undefined, label: string, node: AST.AstNode | null): Checked<string> {
  const u = unwrapVariant(v ?? NIL);
  if (u.kind !== "string") return ctx.errorAt(node, `${label} expects String, got ${typeNameOf(u)}`);
  return u.value;
}

function emptyUntypedArray(): ArrayValue {
  return { kind: "array", arrayType: dynamicArray(UNKNOWN_TYPE), elements: [] };
}

/** A nil dynamic array reads as an empty one. */
function expectArray(ctx: Interpreter, v: RuntimeValue | undefined, label: string, node: AST.AstNode | null): Checked<ArrayValue> {
  const u = unwrapVariant(v ?? NIL);
  if (u.kind === "array") return u;
  if (u.kind === "nil") return emptyUntypedArray();
  return ctx.errorAt(node, `${label} expects an array, got ${typeNameOf(u)}`);
}

function expectCallable(ctx: Interpreter, v: RuntimeValue | undefined, label: string, node: AST.AstNode | null): Checked<CallableValue> {
  const u = unwrapVariant(v ?? NIL);
  if (isCallable(u)) return u;
  return ctx.errorAt(node, `${label} expects a function, got ${typeNameOf(u)}`);
}

function codePointLength(s: string): number {
  return Array.from(s).length;
}

function joinArgs(ctx: Interpreter, args: RuntimeValue[]): string {
  return args.map((a) => ctx.valueToString(a)).join("");
}

/** Shared by Low and High: bounds of arrays, strings and enums. */
function bound(ctx: Interpreter, which: "Low" | "High", v: RuntimeValue | undefined, node: AST.AstNode | null): RuntimeValue {
  const u = unwrapVariant(v ?? NIL);
  switch (u.kind) {
    case "array":
      if (u.arrayType.isStatic) return makeInteger(which === "Low" ? u.arrayType.low : u.arrayType.high);
      return makeInteger(which === "Low" ? 0 : u.elements.length - 1);
    case "nil":
      return makeInteger(which === "Low" ? 0 : -1);
    case "string":
      return makeInteger(which === "Low" ? 1 : codePointLength(u.value));
    case "enum":
    case "enum_type_ref": {
      const member = which === "Low" ? u.enumType.first : u.enumType.last;
      if (!member) return ctx.errorAt(node, `enum ${u.enumType.name} has no members`);
      return { kind: "enum", enumType: u.enumType, name: member.name, ordinal: member.ordinal };
    }
    default:
      return ctx.errorAt(node, `${which} expects an array, string or enum, got ${typeNameOf(u)}`);
  }
}

function parseInteger(text: string, base: number): number | null {
  let digits = text.trim();
  let sign = 1;
  if (digits.startsWith("-") || digits.startsWith("+")) {
    if (digits.startsWith("-")) sign = -1;
    digits = digits.slice(1);
  }
  if (digits === "") return null;
  for (const ch of digits) {
    const d = parseInt(ch, 36);
    if (Number.isNaN(d) || d >= base) return null;
  }
  const n = parseInt(digits, base);
  return Number.isSafeInteger(n) ? sign * n : null;
}

function assertionMessage(node: AST.AstNode | null, extra: string | undefined): string {
  const start = node?.span?.start;
  let message = start ? `Assertion failed [line: ${start.line}, column: ${start.column}]` : "Assertion failed";
  if (extra) message += ` : ${extra}`;
  return message;
}

/** Calls `fn` once per element; stops at the first halted result. */
function eachElement(
  ctx: Interpreter,
  arr: ArrayValue,
  fn: CallableValue,
  node: AST.AstNode | null,
  visit: (result: RuntimeValue, element: RuntimeValue) => RuntimeValue | undefined,
): RuntimeValue | undefined {
  for (const element of arr.elements) {
    const result = ctx.callFunctionValue(fn, [element], node);
    if (ctx.halted(result)) return result;
    const stop = visit(result, element);
    if (stop) return stop;
  }
  return undefined;
}

export function createCoreBuiltins(): BuiltinRegistry {
  const registry = new BuiltinRegistry();

  registry.register({
    name: "Print",
    minArity: 0,
    impl: (ctx, args) => {
      ctx.output(joinArgs(ctx, args));
      return NIL;
    },
  });

  registry.register({
    name: "PrintLn",
    minArity: 0,
    impl: (ctx, args) => {
      ctx.output(`${joinArgs(ctx, args)}\n`);
      return NIL;
    },
  });

  registry.register({
    name: "Length",
    arity: 1,
    impl: (ctx, args, node) => {
      const u = unwrapVariant(args[0] ?? NIL);
      switch (u.kind) {
        case "array":
          return makeInteger(u.elements.length);
        case "string":
          return makeInteger(codePointLength(u.value));
        case "nil":
          return makeInteger(0);
        case "json":
          if (Array.isArray(u.node)) return makeInteger(u.node.length);
          if (typeof u.node === "string") return makeInteger(codePointLength(u.node));
          if (u.node !== null && typeof u.node === "object") return makeInteger(Object.keys(u.node).length);
          return ctx.errorAt(node, "Length expects a JSON array, object or string");
        default:
          return ctx.errorAt(node, `Length expects an array or string, got ${typeNameOf(u)}`);
      }
    },
  });

  registry.register({ name: "Low", arity: 1, impl: (ctx, args, node) => bound(ctx, "Low", args[0], node) });
  registry.register({ name: "High", arity: 1, impl: (ctx, args, node) => bound(ctx, "High", args[0], node) });

  registry.register({
    name: "SetLength",
    arity: 2,
    varParams: [0],
    impl: (ctx, args, node) => {
      const length = expectInteger(ctx, args[1], "SetLength", node);
      if (isErrorValue(length)) return length;
      if (length < 0) return ctx.errorAt(node, `SetLength length must not be negative, got ${length}`);
      const target = unwrapVariant(args[0] ?? NIL);
      if (target.kind === "string") {
        const chars = Array.from(target.value);
        args[0] = makeString(chars.length >= length ? chars.slice(0, length).join("") : target.value + " ".repeat(length - chars.length));
        return NIL;
      }
      if (target.kind !== "array" && target.kind !== "nil") {
        return ctx.errorAt(node, `SetLength expects a dynamic array or string, got ${typeNameOf(target)}`);
      }
      const arr: ArrayValue = target.kind === "nil" ? emptyUntypedArray() : target;
      if (arr.arrayType.isStatic) return ctx.errorAt(node, `SetLength cannot resize static ${arr.arrayType.toString()}`);
      if (arr.elements.length > length) arr.elements.length = length;
      while (arr.elements.length < length) arr.elements.push(defaultValueFor(arr.arrayType.elementType));
      args[0] = arr;
      return NIL;
    },
  });

  for (const [name, include] of [["Include", true], ["Exclude", false]] as const) {
    registry.register({
      name,
      arity: 2,
      varParams: [0],
      impl: (ctx, args, node) => {
        const target = unwrapVariant(args[0] ?? NIL);
        if (target.kind !== "set") return ctx.errorAt(node, `${name} expects a set, got ${typeNameOf(target)}`);
        const r = ctx.updateSet(target, args[1] ?? NIL, include, node);
        if (ctx.halted(r)) return r;
        args[0] = target;
        return NIL;
      },
    });
  }

  registry.register({
    name: "IntToStr",
    arity: 1,
    impl: (ctx, args, node) => {
      const n = expectInteger(ctx, args[0], "IntToStr", node);
      return isErrorValue(n) ? n : makeString(String(n));
    },
  });

  registry.register({
    name: "FloatToStr",
    arity: 1,
    impl: (ctx, args, node) => {
      const u = unwrapVariant(args[0] ?? NIL);
      if (u.kind !== "float" && u.kind !== "integer") return ctx.errorAt(node, `FloatToStr expects Float, got ${typeNameOf(u)}`);
      return makeString(String(u.value));
    },
  });

  registry.register({
    name: "StrToInt",
    minArity: 1,
    maxArity: 2,
    impl: (ctx, args, node) => {
      const text = expectString(ctx, args[0], "StrToInt", node);
      if (isErrorValue(text)) return text;
      let base = 10;
      if (args.length === 2) {
        const b = expectInteger(ctx, args[1], "StrToInt", node);
        if (isErrorValue(b)) return b;
        if (b < 2 || b > 36) return ctx.errorAt(node, `StrToInt base must be between 2 and 36, got ${b}`);
        base = b;
      }
      const n = parseInteger(text, base);
      if (n === null) return ctx.raiseBuiltin("EConvertError", `'${text}' is not a valid integer`, node);
      return makeInteger(n);
    },
  });

  registry.register({
    name: "Ord",
    arity: 1,
    impl: (ctx, args, node) => {
      const u = unwrapVariant(args[0] ?? NIL);
      switch (u.kind) {
        case "integer":
          return u;
        case "enum":
          return makeInteger(u.ordinal);
        case "boolean":
          return makeInteger(u.value ? 1 : 0);
        case "string": {
          const chars = Array.from(u.value);
          const only = chars.length === 1 ? chars[0] : undefined;
          if (only === undefined) return ctx.errorAt(node, `Ord expects a single character, got a string of length ${chars.length}`);
          return makeInteger(only.codePointAt(0) ?? 0);
        }
        default:
          return ctx.errorAt(node, `Ord expects an ordinal value, got ${typeNameOf(u)}`);
      }
    },
  });

  registry.register({
    name: "Assigned",
    arity: 1,
    impl: (_ctx, args) => {
      const u = unwrapVariant(args[0] ?? NIL);
      if (u.kind === "interface") return makeBoolean(u.object !== null);
      if (u.kind === "json") return makeBoolean(u.node !== null);
      return makeBoolean(u.kind !== "nil");
    },
  });

  registry.register({
    name: "Assert",
    minArity: 1,
    maxArity: 2,
    impl: (ctx, args, node) => {
      const cond = isTruthy(args[0] ?? NIL);
      if (cond === null) return ctx.errorAt(node, `Assert expects Boolean, got ${typeNameOf(unwrapVariant(args[0] ?? NIL))}`);
      if (cond) return NIL;
      let extra: string | undefined;
      if (args.length === 2) {
        const m = expectString(ctx, args[1], "Assert", node);
        if (isErrorValue(m)) return m;
        extra = m;
      }
      return ctx.raiseBuiltin("EAssertionFailed", assertionMessage(node, extra), node);
    },
  });

  registry.register({
    name: "ParseJSON",
    arity: 1,
    impl: (ctx, args, node) => {
      const text = expectString(ctx, args[0], "ParseJSON", node);
      if (isErrorValue(text)) return text;
      let raw: unknown;
      try {
        raw = JSON.parse(text);
      } catch (err) {
        const message = err instanceof Error ? err.message : String(err);
        return ctx.errorAt(node, `JSON parse error: ${message}`);
      }
      const parsed = toJsonNode(raw);
      if (parsed === undefined) return ctx.errorAt(node, "JSON parse error: unsupported value");
      return { kind: "json", node: parsed };
    },
  });

  registry.register({
    name: "JSONStringify",
    minArity: 1,
    maxArity: 2,
    impl: (ctx, args, node) => {
      const converted = valueToJson(args[0] ?? NIL);
      if (!converted.ok) return ctx.errorAt(node, converted.message);
      if (args.length === 2) {
        const indent = expectInteger(ctx, args[1], "JSONStringify", node);
        if (isErrorValue(indent)) return indent;
        return makeString(JSON.stringify(converted.node, null, indent));
      }
      return makeString(JSON.stringify(converted.node));
    },
  });

  registry.register({
    name: "GetStackTrace",
    arity: 0,
    impl: (ctx) => makeString([...ctx.callStackNames()].reverse().join("\n")),
  });

  registry.register({
    name: "Map",
    arity: 2,
    impl: (ctx, args, node) => {
      const arr = expectArray(ctx, args[0], "Map", node);
      if (isErrorValue(arr)) return arr;
      const fn = expectCallable(ctx, args[1], "Map", node);
      if (isErrorValue(fn)) return fn;
      const out: RuntimeValue[] = [];
      const stopped = eachElement(ctx, arr, fn, node, (result) => {
        out.push(result);
        return undefined;
      });
      if (stopped) return stopped;
      const first = out[0];
      const elementType = first ? runtimeTypeOf(first) : UNKNOWN_TYPE;
      return { kind: "array", arrayType: dynamicArray(elementType.kind === "nil" ? UNKNOWN_TYPE : elementType), elements: out };
    },
  });

  registry.register({
    name: "Filter",
    arity: 2,
    impl: (ctx, args, node) => {
      const arr = expectArray(ctx, args[0], "Filter", node);
      if (isErrorValue(arr)) return arr;
      const fn = expectCallable(ctx, args[1], "Filter", node);
      if (isErrorValue(fn)) return fn;
      const out: RuntimeValue[] = [];
      const stopped = eachElement(ctx, arr, fn, node, (result, element) => {
        const keep = isTruthy(result);
        if (keep === null) return ctx.errorAt(node, `Filter predicate must return Boolean, got ${typeNameOf(unwrapVariant(result))}`);
        if (keep) out.push(element);
        return undefined;
      });
      if (stopped) return stopped;
      return { kind: "array", arrayType: dynamicArray(arr.arrayType.elementType), elements: out };
    },
  });

  registry.register({
    name: "Reduce",
    arity: 3,
    impl: (ctx, args, node) => {
      const arr = expectArray(ctx, args[0], "Reduce", node);
      if (isErrorValue(arr)) return arr;
      const fn = expectCallable(ctx, args[1], "Reduce", node);
      if (isErrorValue(fn)) return fn;
      let acc = args[2] ?? NIL;
      for (const element of arr.elements) {
        acc = ctx.callFunctionValue(fn, [acc, element], node);
        if (ctx.halted(acc)) return acc;
      }
      return acc;
    },
  });

  registry.register({
    name: "ForEach",
    arity: 2,
    impl: (ctx, args, node) => {
      const arr = expectArray(ctx, args[0], "ForEach", node);
      if (isErrorValue(arr)) return arr;
      const fn = expectCallable(ctx, args[1], "ForEach", node);
      if (isErrorValue(fn)) return fn;
      return eachElement(ctx, arr, fn, node, () => undefined) ?? NIL;
    },
  });

  return registry;
}
