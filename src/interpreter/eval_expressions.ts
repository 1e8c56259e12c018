import type * as AST from "../ast";
import { Environment } from "./environment";
import type { Interpreter } from "./index";
import { dynamicArray, staticArray } from "./types/array_type";
import { UNKNOWN_TYPE, typeToString, type RuntimeType } from "./types/runtime_type";
import { SetType, isOrdinalType } from "./types/set_type";
import {
  NIL,
  isError,
  makeBoolean,
  makeFloat,
  makeInteger,
  makeString,
  ordinalOf,
  type ErrorValue,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluate(node: AST.Node, env?: Environment, expected?: RuntimeType): RuntimeValue;
    /** True when evaluation must stop: an evaluator error or an exception in flight. */
    halted(v: RuntimeValue): boolean;
    resolveTypeExpression(t: AST.TypeExpression, env: Environment): RuntimeType | ErrorValue;
    semanticTypeOf(node: AST.AstNode, env: Environment): RuntimeType | undefined;
  }
}

export function applyEvaluationAugmentations(cls: typeof Interpreter): void {
  cls.prototype.halted = function halted(this: Interpreter, v: RuntimeValue): boolean {
    return isError(v) || this.exception !== null;
  };

  cls.prototype.evaluate = function evaluate(this: Interpreter, node: AST.Node, env: Environment = this.globals, expected?: RuntimeType): RuntimeValue {
    this.currentNode = node;
    switch (node.type) {
      case "IntegerLiteral":
        if (!Number.isSafeInteger(node.value)) return this.errorAt(node, `integer literal ${node.value} out of range`);
        return makeInteger(node.value);
      case "FloatLiteral":
        return makeFloat(node.value);
      case "StringLiteral":
        return makeString(node.value);
      case "BooleanLiteral":
        return makeBoolean(node.value);
      case "NilLiteral":
        return NIL;
      case "ArrayLiteral":
        return this.evaluateArrayLiteral(node, env, expected);
      case "SetLiteral":
        return this.evaluateSetLiteral(node, env, expected);
      case "RecordLiteral":
        return this.evaluateRecordLiteral(node, env, expected);
      case "Identifier":
        return this.evaluateIdentifier(node, env);
      case "UnaryExpression":
        return this.evaluateUnaryExpression(node, env);
      case "BinaryExpression":
        return this.evaluateBinaryExpression(node, env);
      case "MemberAccessExpression":
        return this.evaluateMemberAccess(node, env);
      case "IndexExpression":
        return this.evaluateIndexExpression(node, env);
      case "FunctionCall":
        return this.evaluateFunctionCall(node, env);
      case "LambdaExpression":
        return { kind: "lambda", node, closure: env };
      case "IsExpression":
        return this.evaluateIsExpression(node, env);
      case "AsExpression":
        return this.evaluateAsExpression(node, env);
      case "InheritedExpression":
        return this.evaluateInherited(node, env);
      case "AddressOfExpression":
        return this.evaluateAddressOf(node, env);
      case "TypeCastExpression":
        return this.evaluateTypeCast(node, env);

      case "Program":
        return this.executeStatements(node.body, env);
      case "BlockStatement":
        return this.executeStatements(node.body, new Environment(env));
      case "VarDeclaration":
        return this.evaluateVarDeclaration(node, env);
      case "AssignmentStatement":
        return this.evaluateAssignment(node, env);
      case "ExpressionStatement": {
        const v = this.evaluate(node.expression, env);
        return isError(v) ? v : NIL;
      }
      case "IfStatement":
        return this.evaluateIfStatement(node, env);
      case "CaseStatement":
        return this.evaluateCaseStatement(node, env);
      case "WhileStatement":
        return this.evaluateWhileStatement(node, env);
      case "RepeatStatement":
        return this.evaluateRepeatStatement(node, env);
      case "ForStatement":
        return this.evaluateForStatement(node, env);
      case "ForInStatement":
        return this.evaluateForInStatement(node, env);
      case "BreakStatement":
        this.signal = "break";
        return NIL;
      case "ContinueStatement":
        this.signal = "continue";
        return NIL;
      case "ExitStatement":
        return this.evaluateExitStatement(node, env);
      case "TryStatement":
        return this.evaluateTryStatement(node, env);
      case "RaiseStatement":
        return this.evaluateRaiseStatement(node, env);

      case "FunctionDeclaration":
        return this.evaluateFunctionDeclaration(node, env);
      case "ClassDeclaration":
        return this.evaluateClassDeclaration(node, env);
      case "RecordDeclaration":
        return this.evaluateRecordDeclaration(node, env);
      case "InterfaceDeclaration":
        return this.evaluateInterfaceDeclaration(node, env);
      case "HelperDeclaration":
        return this.evaluateHelperDeclaration(node, env);
      case "EnumDeclaration":
        return this.evaluateEnumDeclaration(node);
      case "TypeAliasDeclaration":
        return this.evaluateTypeAliasDeclaration(node, env);
      case "OperatorDeclaration":
        return this.evaluateOperatorDeclaration(node, env);
      default: {
        const unknown: never = node;
        throw new Error(`Unsupported node ${JSON.stringify(unknown)}`);
      }
    }
  };

  cls.prototype.resolveTypeExpression = function resolveTypeExpression(
    this: Interpreter,
    t: AST.TypeExpression,
    env: Environment,
  ): RuntimeType | ErrorValue {
    switch (t.type) {
      case "SimpleTypeExpression": {
        const resolved = this.types.resolveTypeName(t.name.name);
        return resolved ?? this.errorAt(t, `unknown type ${t.name.name}`);
      }
      case "ArrayTypeExpression": {
        const elem = this.resolveTypeExpression(t.elementType, env);
        if (elem.kind === "error") return elem;
        if (!t.low || !t.high) return { kind: "array", info: dynamicArray(elem) };
        const low = this.evaluate(t.low, env);
        if (isError(low)) return low;
        const high = this.evaluate(t.high, env);
        if (isError(high)) return high;
        const lo = ordinalOf(low);
        const hi = ordinalOf(high);
        if (lo === null || hi === null) return this.errorAt(t, "array bounds must be ordinal values");
        if (hi < lo) return this.errorAt(t, `invalid array bounds ${lo}..${hi}`);
        return { kind: "array", info: staticArray(elem, lo, hi) };
      }
      case "SetTypeExpression": {
        const elem = this.resolveTypeExpression(t.elementType, env);
        if (elem.kind === "error") return elem;
        if (!isOrdinalType(elem)) return this.errorAt(t, `set element type must be ordinal, got ${typeToString(elem)}`);
        return { kind: "set", info: new SetType(elem) };
      }
      case "FunctionTypeExpression": {
        const params: RuntimeType[] = [];
        for (const p of t.paramTypes) {
          const r = this.resolveTypeExpression(p, env);
          if (r.kind === "error") return r;
          params.push(r);
        }
        if (!t.returnType) return { kind: "function", params };
        const ret = this.resolveTypeExpression(t.returnType, env);
        if (ret.kind === "error") return ret;
        return { kind: "function", params, returnType: ret };
      }
    }
  };

  cls.prototype.semanticTypeOf = function semanticTypeOf(this: Interpreter, node: AST.AstNode, env: Environment): RuntimeType | undefined {
    const annotated = this.semanticInfo?.getType(node);
    if (!annotated) return undefined;
    const resolved = this.resolveTypeExpression(annotated, env);
    if (resolved.kind === "error" || resolved.kind === "unknown") return undefined;
    return resolved;
  };
}

/** Parameter or declared type, Unknown when omitted. */
export function optionalType(ctx: Interpreter, t: AST.TypeExpression | undefined, env: Environment): RuntimeType | ErrorValue {
  return t ? ctx.resolveTypeExpression(t, env) : UNKNOWN_TYPE;
}
