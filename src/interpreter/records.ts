import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import { RecordType } from "./types/record_type";
import { normalizeName, type RuntimeType } from "./types/runtime_type";
import { makeRecord, type RuntimeValue } from "./values";

declare module "./index" {
  interface Interpreter {
    evaluateRecordLiteral(node: AST.RecordLiteral, env: Environment, expected?: RuntimeType): RuntimeValue;
  }
}

function literalRecordType(ctx: Interpreter, node: AST.RecordLiteral, env: Environment, expected?: RuntimeType): RecordType | RuntimeValue {
  if (node.typeName) {
    const rec = ctx.types.getRecord(node.typeName.name);
    return rec ?? ctx.errorAt(node, `unknown record type ${node.typeName.name}`);
  }
  if (expected?.kind === "record") return expected.info;
  const semantic = ctx.semanticTypeOf(node, env);
  if (semantic?.kind === "record") return semantic.info;
  return ctx.errorAt(node, "cannot determine record type for literal");
}

export function applyRecordAugmentations(cls: typeof Interpreter): void {
  /** `(X: 1; Y: 2)`: unnamed fields keep their zero value. */
  cls.prototype.evaluateRecordLiteral = function evaluateRecordLiteral(
    this: Interpreter,
    node: AST.RecordLiteral,
    env: Environment,
    expected?: RuntimeType,
  ): RuntimeValue {
    const recordType = literalRecordType(this, node, env, expected);
    if (!(recordType instanceof RecordType)) return recordType;

    const record = makeRecord(recordType);
    for (const init of node.fields) {
      const field = recordType.lookupField(init.name.name);
      if (!field) return this.errorAt(init, `unknown field ${init.name.name} in record ${recordType.name}`);
      const value = this.evaluate(init.value, env, field.type);
      if (this.halted(value)) return value;
      const coerced = this.coerceValue(value, field.type, init);
      if (this.halted(coerced)) return coerced;
      record.fields.set(normalizeName(field.name), coerced);
    }
    return record;
  };
}
