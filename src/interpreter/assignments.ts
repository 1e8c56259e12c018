import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { sameName, type RuntimeType } from "./types/runtime_type";
import {
  NIL,
  copyValue,
  defaultValueFor,
  isError,
  runtimeTypeOf,
  unwrapVariant,
  type RuntimeValue,
} from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateVarDeclaration(node: AST.VarDeclaration, env: Environment): RuntimeValue;
    evaluateAssignment(node: AST.AssignmentStatement, env: Environment): RuntimeValue;
    assignToTarget(target: AST.AssignmentTarget, value: RuntimeValue, env: Environment, node: AST.AstNode): RuntimeValue;
    assignVariable(name: string, value: RuntimeValue, env: Environment, node: AST.AstNode): RuntimeValue;
  }
}

const COMPOUND_OPERATORS: Record<Exclude<AST.AssignmentOperator, ":=">, AST.BinaryOperator> = {
  "+=": "+",
  "-=": "-",
  "*=": "*",
  "/=": "/",
};

/** Type a variable takes from its initializer when none is written. */
function inferredType(v: RuntimeValue): RuntimeType | undefined {
  const t = runtimeTypeOf(v);
  return t.kind === "nil" || t.kind === "function" || t.kind === "unknown" ? undefined : t;
}

/** Declared type of the slot behind `Self.name`, when Self has one. */
function selfSlotType(self: RuntimeValue, name: string): RuntimeType | undefined {
  const s = unwrapVariant(self);
  const target = s.kind === "interface" ? s.object : s;
  if (!target) return undefined;
  switch (target.kind) {
    case "object":
      return (
        target.classInfo.lookupField(name)?.type ?? target.classInfo.lookupProperty(name)?.type ?? target.classInfo.lookupClassVar(name)?.type
      );
    case "record":
      return target.recordType.lookupField(name)?.type ?? target.recordType.lookupProperty(name)?.type;
    case "class_ref":
      return target.classInfo.lookupClassVar(name)?.type;
    default:
      return undefined;
  }
}

function expectedTypeOf(ctx: Interpreter, target: AST.AssignmentTarget, env: Environment): RuntimeType | undefined {
  if (target.type !== "Identifier") return undefined;
  if (ctx.selfShadows(target.name, env)) {
    const fromSelf = selfSlotType(env.lookup("Self") ?? NIL, target.name);
    if (fromSelf) return fromSelf;
  }
  const t = env.lookupType(target.name);
  return t && t.kind !== "unknown" ? t : undefined;
}

export function applyAssignmentAugmentations(cls: typeof Interpreter): void {
  cls.prototype.evaluateVarDeclaration = function evaluateVarDeclaration(this: Interpreter, node: AST.VarDeclaration, env: Environment): RuntimeValue {
    let declared: RuntimeType | undefined;
    if (node.varType) {
      const t = this.resolveTypeExpression(node.varType, env);
      if (t.kind === "error") return t;
      declared = t;
    }

    for (const id of node.names) {
      const name = id.name;
      if (env.hasInCurrentScope(name)) return this.errorAt(id, `variable ${name} already declared`);
      if (node.isConst && !node.initializer) return this.errorAt(id, `constant ${name} needs a value`);

      let value: RuntimeValue;
      let type = declared;
      if (node.initializer) {
        const v = this.evaluate(node.initializer, env, declared);
        if (this.halted(v)) return v;
        if (declared) {
          value = this.coerceValue(v, declared, node.initializer);
          if (this.halted(value)) return value;
        } else {
          value = copyValue(v);
          type = inferredType(v);
        }
      } else if (declared) {
        value = defaultValueFor(declared);
      } else {
        return this.errorAt(id, `variable ${name} needs a type or an initializer`);
      }
      env.define(name, value, type, { isConst: node.isConst ?? false });
    }
    return NIL;
  };

  cls.prototype.evaluateAssignment = function evaluateAssignment(this: Interpreter, node: AST.AssignmentStatement, env: Environment): RuntimeValue {
    const target = node.target;
    if (node.operator === ":=") {
      const value = this.evaluate(node.value, env, expectedTypeOf(this, target, env));
      if (this.halted(value)) return value;
      const r = this.assignToTarget(target, value, env, node);
      return isError(r) ? r : NIL;
    }

    const current = this.evaluate(target, env);
    if (this.halted(current)) return current;
    const rhs = this.evaluate(node.value, env);
    if (this.halted(rhs)) return rhs;
    const combined = this.applyBinaryOperator(COMPOUND_OPERATORS[node.operator], current, rhs, node);
    if (this.halted(combined)) return combined;
    const r = this.assignToTarget(target, combined, env, node);
    return isError(r) ? r : NIL;
  };

  cls.prototype.assignToTarget = function assignToTarget(
    this: Interpreter,
    target: AST.AssignmentTarget,
    value: RuntimeValue,
    env: Environment,
    node: AST.AstNode,
  ): RuntimeValue {
    switch (target.type) {
      case "Identifier":
        return this.assignVariable(target.name, value, env, node);
      case "MemberAccessExpression": {
        const receiver = this.evaluate(target.object, env);
        if (this.halted(receiver)) return receiver;
        return this.setMember(receiver, target.member.name, value, target, env);
      }
      case "IndexExpression":
        return this.assignIndex(target, value, env);
    }
  };

  /**
   * Stores into a variable, converting to its declared type. Inside methods a
   * Self member wins over outer bindings; inside functions the function's own
   * name stands for `Result`.
   */
  cls.prototype.assignVariable = function assignVariable(
    this: Interpreter,
    name: string,
    value: RuntimeValue,
    env: Environment,
    node: AST.AstNode,
  ): RuntimeValue {
    if (this.selfShadows(name, env)) {
      const self = env.lookup("Self") ?? NIL;
      if (selfSlotType(self, name)) return this.setMember(self, name, value, node, env);
    }

    const binding = env.lookupBinding(name);
    if (!binding || binding.isRoutine) {
      const frame = this.callStack[this.callStack.length - 1];
      if (frame?.routine && sameName(frame.routine.name, name) && env.has("Result")) {
        return this.assignVariable("Result", value, env, node);
      }
      return this.errorAt(node, binding ? `cannot assign to routine ${name}` : `undefined variable ${name}`);
    }
    if (binding.isConst) return this.errorAt(node, `cannot assign to constant ${name}`);

    const stored = binding.type ? this.coerceValue(value, binding.type, node) : copyValue(value);
    if (this.halted(stored)) return stored;
    binding.value = stored;
    return NIL;
  };
}
