import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { ArrayType, dynamicArray, staticArray } from "./types/array_type";
import { FLOAT_TYPE, UNKNOWN_TYPE, typeToString, typesEqual, type RuntimeType } from "./types/runtime_type";
import {
  NIL,
  boxVariant,
  copyValue,
  makeFloat,
  runtimeTypeOf,
  typeNameOf,
  unwrapVariant,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateArrayLiteral(node: AST.ArrayLiteral, env: Environment, expected?: RuntimeType): RuntimeValue;
  }
}

function elementMismatch(ctx: Interpreter, node: AST.AstNode, position: number, got: string, expected: string): RuntimeValue {
  return ctx.errorAt(node, `array element ${position} has incompatible type (got ${got}, expected ${expected})`);
}

/** Wider of two element types, or null when they do not unify. */
function unifyElementTypes(a: RuntimeType, b: RuntimeType): RuntimeType | null {
  if (typesEqual(a, b)) return a;
  const numeric = (t: RuntimeType) => t.kind === "primitive" && (t.name === "Integer" || t.name === "Float");
  if (numeric(a) && numeric(b)) return FLOAT_TYPE;
  if (a.kind === "class" && b.kind === "class") {
    if (b.info.inheritsFrom(a.info.name)) return a;
    if (a.info.inheritsFrom(b.info.name)) return b;
  }
  return null;
}

function resolveDeclaredType(ctx: Interpreter, node: AST.ArrayLiteral, env: Environment, expected?: RuntimeType): ArrayType | RuntimeValue | null {
  if (node.typeAnnotation) {
    const annotated = ctx.resolveTypeExpression(node.typeAnnotation, env);
    if (annotated.kind === "error") return annotated;
    if (annotated.kind !== "array") return ctx.errorAt(node, `array literal annotated with non-array type ${typeToString(annotated)}`);
    return annotated.info;
  }
  if (expected?.kind === "array") return expected.info;
  const semantic = ctx.semanticTypeOf(node, env);
  if (semantic?.kind === "array") return semantic.info;
  return null;
}

/** Element coercion in rule order: Variant boxing, nil, exact, Integer→Float, array shape, general compatibility. */
function coerceElement(ctx: Interpreter, node: AST.AstNode, value: RuntimeValue, elementType: RuntimeType, position: number): RuntimeValue {
  if (elementType.kind === "unknown") return copyValue(value);
  if (elementType.kind === "variant") return boxVariant(copyValue(value));

  const v = unwrapVariant(value);
  if (v.kind === "nil") {
    if (elementType.kind === "interface") return { kind: "interface", interfaceInfo: elementType.info, object: null };
    if (elementType.kind === "class" || elementType.kind === "array") return NIL;
    return elementMismatch(ctx, node, position, "Nil", typeToString(elementType));
  }

  if (typesEqual(runtimeTypeOf(v), elementType)) return copyValue(v);
  if (elementType.kind === "primitive" && elementType.name === "Float" && v.kind === "integer") return makeFloat(v.value);
  if (elementType.kind === "array" && v.kind === "array") {
    if (!v.arrayType.isCompatibleWith(elementType.info) && !elementType.info.isCompatibleWith(v.arrayType)) {
      return elementMismatch(ctx, node, position, typeNameOf(v), typeToString(elementType));
    }
    return ctx.coerceValue(v, elementType, node);
  }
  if (ctx.isValueAssignable(v, elementType)) return ctx.coerceValue(v, elementType, node);
  return elementMismatch(ctx, node, position, typeNameOf(v), typeToString(elementType));
}

export function applyArrayLiteralAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluateArrayLiteral = function evaluateArrayLiteral(
    this: Interpreter,
    node: AST.ArrayLiteral,
    env: Environment,
    expected?: RuntimeType,
  ): RuntimeValue {
    if (expected?.kind === "set" && !node.typeAnnotation) {
      const asSet: AST.SetLiteral = { type: "SetLiteral", elements: node.elements, span: node.span };
      return this.evaluateSetLiteral(asSet, env, expected);
    }
    const declared = resolveDeclaredType(this, node, env, expected);
    if (declared && !(declared instanceof ArrayType)) return declared;

    const elementExpected = declared?.elementType;
    const values: RuntimeValue[] = [];
    for (const element of node.elements) {
      const v = this.evaluate(element, env, elementExpected && elementExpected.kind !== "unknown" ? elementExpected : undefined);
      if (this.halted(v)) return v;
      values.push(v);
    }

    let arrayType: ArrayType;
    if (declared) {
      arrayType = declared;
    } else if (values.length === 0) {
      arrayType = dynamicArray(UNKNOWN_TYPE);
    } else {
      let inferred: RuntimeType | null = null;
      for (const [i, value] of values.entries()) {
        const v = unwrapVariant(value);
        if (v.kind === "nil") continue;
        const t = runtimeTypeOf(v);
        if (!inferred) {
          inferred = t;
          continue;
        }
        const unified = unifyElementTypes(inferred, t);
        if (!unified) return elementMismatch(this, node, i + 1, typeNameOf(v), typeToString(inferred));
        inferred = unified;
      }
      if (!inferred) return this.errorAt(node, "cannot determine array type for literal");
      arrayType = staticArray(inferred, 0, values.length - 1);
    }

    if (arrayType.isStatic && values.length !== arrayType.size) {
      return this.errorAt(node, `array literal has ${values.length} elements, expected ${arrayType.size}`);
    }

    const elements: RuntimeValue[] = [];
    for (const [i, value] of values.entries()) {
      const coerced = coerceElement(this, node, value, arrayType.elementType, i + 1);
      if (this.halted(coerced)) return coerced;
      elements.push(coerced);
    }
    return { kind: "array", arrayType, elements };
  };
}
