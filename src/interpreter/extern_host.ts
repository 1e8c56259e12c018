import type * as AST from "../ast";
import type { Interpreter } from "./index";
import { toJsonNode } from "./json";
import { CallbackErrorSignal, CallbackRaiseSignal } from "./signals";
import { dynamicArray } from "./types/array_type";
import { normalizeName, typeToString, type RuntimeType } from "./types/runtime_type";
import {
  NIL,
  boxVariant,
  isError,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeRecord,
  makeString,
  setElements,
  typeNameOf,
  type CallableValue,
  type ErrorValue,
  type RuntimeValue,
} from "./values";

/** Host implementation; parameters are checked at the bridge, not by the compiler. */
export type HostFunction = { bivarianceHack(...args: unknown[]): unknown }["bivarianceHack"];

/** Type names resolved against the interpreter's registry when the function is called. */
export type HostSignature = {
  params?: string[];
  returns?: string;
};

export type HostEntry = {
  name: string;
  fn: HostFunction;
  signature?: HostSignature;
};

/** Case-insensitive table of functions scripts can call into. */
export class HostRegistry {
  private readonly entries = new Map<string, HostEntry>();

  register(name: string, fn: HostFunction, signature?: HostSignature): this {
    const key = normalizeName(name);
    if (this.entries.has(key)) {
      throw new Error(`host function ${name} is already registered`);
    }
    this.entries.set(key, { name, fn, signature });
    return this;
  }

  has(name: string): boolean {
    return this.entries.has(normalizeName(name));
  }

  get(name: string): HostEntry | undefined {
    return this.entries.get(normalizeName(name));
  }

  names(): string[] {
    return Array.from(this.entries.values(), (e) => e.name);
  }
}

declare module "./index" {
  interface Interpreter {
    callHost(name: string, args: RuntimeValue[], node: AST.AstNode | null): RuntimeValue;
  }
}

type Marshaled = { ok: true; value: unknown } | { ok: false; message: string };

function isPlainObject(raw: unknown): raw is Record<string, unknown> {
  return typeof raw === "object" && raw !== null && !Array.isArray(raw);
}

function isThenable(raw: unknown): raw is PromiseLike<unknown> {
  return isPlainObject(raw) && typeof raw.then === "function";
}

function isHostFunction(raw: unknown): raw is HostFunction {
  return typeof raw === "function";
}

function describeHost(raw: unknown): string {
  return typeof raw === "string" ? JSON.stringify(raw) : String(raw);
}

/** Wraps a script callable so host code can call it synchronously. */
function hostCallback(ctx: Interpreter, fn: CallableValue): (...args: unknown[]) => unknown {
  return (...hostArgs: unknown[]) => {
    const args: RuntimeValue[] = [];
    for (const raw of hostArgs) {
      const v = fromHost(ctx, raw);
      if (isError(v)) throw new CallbackErrorSignal(v.message);
      args.push(v);
    }
    const savedNode = ctx.currentNode;
    let result: RuntimeValue;
    try {
      result = ctx.callFunctionValue(fn, args, savedNode);
    } finally {
      ctx.currentNode = savedNode;
    }
    if (isError(result)) throw new CallbackErrorSignal(result.message);
    const raised = ctx.exception;
    if (raised) {
      ctx.exception = null;
      throw new CallbackRaiseSignal(raised);
    }
    const out = toHost(ctx, result);
    if (!out.ok) throw new CallbackErrorSignal(out.message);
    return out.value;
  };
}

const CYCLIC_HOST_MESSAGE = "cannot pass cyclic value to a host function";

function toHost(ctx: Interpreter, v: RuntimeValue, path: Set<RuntimeValue> = new Set()): Marshaled {
  switch (v.kind) {
    case "integer":
    case "float":
    case "string":
    case "boolean":
      return { ok: true, value: v.value };
    case "nil":
      return { ok: true, value: null };
    case "enum":
      return { ok: true, value: v.name };
    case "json":
      return { ok: true, value: v.node };
    case "variant":
      return v.value ? toHost(ctx, v.value, path) : { ok: true, value: null };
    case "interface":
      return v.object ? toHost(ctx, v.object, path) : { ok: true, value: null };
    case "set":
      return toHost(ctx, { kind: "array", arrayType: dynamicArray(v.setType.elementType), elements: setElements(v) });
    case "array": {
      if (path.has(v)) return { ok: false, message: CYCLIC_HOST_MESSAGE };
      path.add(v);
      const out: unknown[] = [];
      for (const e of v.elements) {
        const r = toHost(ctx, e, path);
        if (!r.ok) return r;
        out.push(r.value);
      }
      path.delete(v);
      return { ok: true, value: out };
    }
    case "record":
    case "object": {
      if (path.has(v)) return { ok: false, message: CYCLIC_HOST_MESSAGE };
      path.add(v);
      const decls = v.kind === "record" ? v.recordType.fields : v.classInfo.fields;
      const out: Record<string, unknown> = {};
      for (const field of decls.values()) {
        const r = toHost(ctx, v.fields.get(normalizeName(field.name)) ?? NIL, path);
        if (!r.ok) return r;
        out[field.name] = r.value;
      }
      path.delete(v);
      return { ok: true, value: out };
    }
    case "function":
    case "lambda":
    case "native_function":
      return { ok: true, value: hostCallback(ctx, v) };
    case "class_ref":
      return { ok: true, value: v.classInfo.name };
    default:
      return { ok: false, message: `cannot pass ${typeNameOf(v)} to a host function` };
  }
}

function inferFromHost(ctx: Interpreter, raw: unknown): RuntimeValue | ErrorValue {
  if (raw === null || raw === undefined) return NIL;
  if (typeof raw === "boolean") return makeBoolean(raw);
  if (typeof raw === "number") return Number.isInteger(raw) ? makeInteger(raw) : makeFloat(raw);
  if (typeof raw === "string") return makeString(raw);
  if (isHostFunction(raw)) {
    const name = raw.name || "<host>";
    return {
      kind: "native_function",
      name,
      impl: (interp, args, node) => invokeHostFunction(interp, name, raw, args, node, undefined),
    };
  }
  const node = toJsonNode(raw);
  if (node !== undefined) return { kind: "json", node };
  return ctx.errorAt(ctx.currentNode, `cannot convert host value of type ${typeof raw}`);
}

function fromHost(ctx: Interpreter, raw: unknown, type?: RuntimeType): RuntimeValue | ErrorValue {
  if (!type || type.kind === "unknown") return inferFromHost(ctx, raw);
  const expected: RuntimeType = type;
  const mismatch = () => ctx.errorAt(ctx.currentNode, `host value ${describeHost(raw)} is not of type ${typeToString(expected)}`);
  switch (type.kind) {
    case "primitive":
      switch (type.name) {
        case "Integer":
          return typeof raw === "number" && Number.isInteger(raw) ? makeInteger(raw) : mismatch();
        case "Float":
          return typeof raw === "number" ? makeFloat(raw) : mismatch();
        case "String":
          return typeof raw === "string" ? makeString(raw) : mismatch();
        case "Boolean":
          return typeof raw === "boolean" ? makeBoolean(raw) : mismatch();
      }
      return mismatch();
    case "variant": {
      const v = inferFromHost(ctx, raw);
      return isError(v) ? v : boxVariant(v);
    }
    case "json": {
      const node = raw === undefined ? null : toJsonNode(raw);
      return node === undefined ? mismatch() : { kind: "json", node };
    }
    case "nil":
      return raw === null || raw === undefined ? NIL : mismatch();
    case "enum": {
      const member = typeof raw === "string" ? type.info.lookup(raw) : typeof raw === "number" ? type.info.byOrdinal(raw) : undefined;
      return member ? { kind: "enum", enumType: type.info, name: member.name, ordinal: member.ordinal } : mismatch();
    }
    case "record": {
      if (!isPlainObject(raw)) return mismatch();
      const rec = makeRecord(type.info);
      for (const field of type.info.fields.values()) {
        if (!(field.name in raw)) continue;
        const v = fromHost(ctx, raw[field.name], field.type);
        if (isError(v)) return v;
        rec.fields.set(normalizeName(field.name), v);
      }
      return rec;
    }
    case "array": {
      if (!Array.isArray(raw)) return raw === null && type.info.isDynamic ? NIL : mismatch();
      if (type.info.isStatic && raw.length !== type.info.size) {
        return ctx.errorAt(ctx.currentNode, `host array has ${raw.length} elements, expected ${type.info.size}`);
      }
      const elements: RuntimeValue[] = [];
      for (const item of raw) {
        const v = fromHost(ctx, item, type.info.elementType);
        if (isError(v)) return v;
        elements.push(v);
      }
      return { kind: "array", arrayType: type.info, elements };
    }
    default:
      return raw === null || raw === undefined ? NIL : mismatch();
  }
}

function resolveSignatureType(ctx: Interpreter, name: string, node: AST.AstNode | null): RuntimeType | ErrorValue {
  return ctx.types.resolveTypeName(name) ?? ctx.errorAt(node, `unknown type ${name} in host signature`);
}

function hostErrorClass(err: unknown): string {
  if (err instanceof Error) return err.constructor.name;
  return typeof err;
}

/**
 * Marshals, calls and unmarshals one host function inside its own frame.
 * Only the external call is guarded: a thrown host error becomes EHost, a
 * script exception raised by a callback resumes unwinding unchanged.
 */
function invokeHostFunction(
  ctx: Interpreter,
  name: string,
  fn: HostFunction,
  args: RuntimeValue[],
  node: AST.AstNode | null,
  signature: HostSignature | undefined,
): RuntimeValue {
  return ctx.withFrame<RuntimeValue>({ name, node }, NIL, () => {
    const params = signature?.params;
    if (params && params.length !== args.length) {
      return ctx.errorAt(node, `host function ${name} expects ${params.length} arguments, got ${args.length}`);
    }
    const hostArgs: unknown[] = [];
    for (const [i, arg] of args.entries()) {
      let value = arg;
      const paramName = params?.[i];
      if (paramName !== undefined) {
        const t = resolveSignatureType(ctx, paramName, node);
        if (t.kind === "error") return t;
        value = ctx.coerceValue(arg, t, node);
        if (ctx.halted(value)) return value;
      }
      const marshaled = toHost(ctx, value);
      if (!marshaled.ok) return ctx.errorAt(node, marshaled.message);
      hostArgs.push(marshaled.value);
    }

    let result: unknown;
    try {
      result = fn(...hostArgs);
    } catch (err) {
      if (err instanceof CallbackRaiseSignal) {
        ctx.exception = err.exception;
        return NIL;
      }
      if (err instanceof CallbackErrorSignal) return ctx.errorAt(node, err.message);
      const message = err instanceof Error ? err.message : String(err);
      return ctx.raiseBuiltin("EHost", message, node, { ExceptionClass: hostErrorClass(err) });
    }

    if (isThenable(result)) {
      void Promise.resolve(result).then(
        () => undefined,
        (err: unknown) => ctx.trace(`host function ${name} rejected after returning: ${String(err)}`),
      );
      return ctx.raiseBuiltin("EHost", `host function ${name} returned a promise; host calls must be synchronous`, node, {
        ExceptionClass: "Promise",
      });
    }

    let returnType: RuntimeType | undefined;
    if (signature?.returns) {
      const t = resolveSignatureType(ctx, signature.returns, node);
      if (t.kind === "error") return t;
      returnType = t;
    }
    const saved = ctx.currentNode;
    ctx.currentNode = node;
    const value = fromHost(ctx, result, returnType);
    ctx.currentNode = saved;
    return value;
  });
}

export function applyExternHostAugmentations(cls: typeof Interpreter): void {
  cls.prototype.callHost = function callHost(this: Interpreter, name: string, args: RuntimeValue[], node: AST.AstNode | null): RuntimeValue {
    const entry = this.hosts.get(name);
    if (!entry) return this.errorAt(node, `undefined host function ${name}`);
    return invokeHostFunction(this, entry.name, entry.fn, args, node, entry.signature);
  };
}
