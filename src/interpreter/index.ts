import type * as AST from "../ast";
import { BuiltinRegistry } from "../builtins/registry";
import { createCoreBuiltins } from "../builtins/core";
import type { SemanticInfo } from "../semantic";
import { applyArrayLiteralAugmentations } from "./array_literals";
import { applyAssignmentAugmentations } from "./assignments";
import { applyCallStackAugmentations, type CallFrame } from "./call_stack";
import { applyControlFlowAugmentations } from "./control_flow";
import { applyConversionAugmentations } from "./conversions";
import { applyDefinitionAugmentations } from "./definitions";
import { Environment } from "./environment";
import { applyErrorHandlingAugmentations } from "./error_handling";
import { applyEvaluationAugmentations } from "./eval_expressions";
import { HostRegistry, applyExternHostAugmentations } from "./extern_host";
import { applyFunctionAugmentations } from "./functions";
import { applyHelperAugmentations } from "./helpers";
import { applyIndexingAugmentations } from "./indexing";
import { applyMemberAugmentations } from "./members";
import { applyObjectAugmentations } from "./objects";
import { applyOperationsAugmentations } from "./operations";
import { buildPrelude } from "./prelude";
import { applyRecordAugmentations } from "./records";
import { applyDiagnosticAugmentations } from "./runtime_diagnostics";
import { applySetAugmentations } from "./sets";
import type { ControlSignal } from "./signals";
import { applyStringifyAugmentations } from "./stringify";
import { TypeRegistry } from "./types/registry";
import { NIL, isError, type ExceptionValue, type RuntimeValue } from "./values";

// =============================================================================
// Delphic interpreter (modular layout)
// =============================================================================

export const DEFAULT_MAX_RECURSION_DEPTH = 1024;

export type InterpreterOptions = {
  maxRecursionDepth?: number;
  /** Sink for Print / PrintLn; defaults to stdout. */
  output?: (text: string) => void;
  semanticInfo?: SemanticInfo;
  builtins?: BuiltinRegistry;
  hosts?: HostRegistry;
  /** Echo evaluator errors and uncaught exceptions to stderr. Defaults to DELPHIC_TRACE_ERRORS. */
  traceErrors?: boolean;
};

export type RunResult = {
  /** Program value, or the evaluator error that stopped it. */
  value: RuntimeValue;
  /** Language exception nothing handled. */
  exception: ExceptionValue | null;
};

export class Interpreter {
  readonly globals = new Environment();
  readonly types = new TypeRegistry();
  readonly builtins: BuiltinRegistry;
  readonly hosts: HostRegistry;
  readonly semanticInfo: SemanticInfo | null;
  readonly output: (text: string) => void;
  maxRecursionDepth: number;
  traceErrors: boolean;

  /** Exception currently unwinding; checked after every statement. */
  exception: ExceptionValue | null = null;
  /** Exception owned by the innermost running handler, for bare `raise`. */
  handlerException: ExceptionValue | null = null;
  signal: ControlSignal = "none";
  callStack: CallFrame[] = [];
  currentNode: AST.AstNode | null = null;
  nextObjectId = 1;

  constructor(options: InterpreterOptions = {}) {
    this.maxRecursionDepth = options.maxRecursionDepth ?? DEFAULT_MAX_RECURSION_DEPTH;
    this.output = options.output ?? ((text) => process.stdout.write(text));
    this.semanticInfo = options.semanticInfo ?? null;
    this.builtins = options.builtins ?? createCoreBuiltins();
    this.hosts = options.hosts ?? new HostRegistry();
    this.traceErrors = options.traceErrors ?? Boolean(process.env.DELPHIC_TRACE_ERRORS);
    this.installPrelude();
  }

  /** Runs a program in the global scope and reports how it ended. */
  run(program: AST.Program): RunResult {
    this.exception = null;
    this.signal = "none";
    const value = this.evaluate(program, this.globals);
    const exception = this.exception;
    this.exception = null;
    this.signal = "none";
    if (exception) this.trace(this.formatUncaughtException(exception));
    return { value, exception };
  }

  private installPrelude(): void {
    this.globals.define("ExceptObject", NIL);
    for (const decl of buildPrelude()) {
      const result = this.evaluate(decl, this.globals);
      if (isError(result)) {
        throw new Error(`prelude failed: ${result.message}`);
      }
    }
  }
}

applyDiagnosticAugmentations(Interpreter);
applyStringifyAugmentations(Interpreter);
applyCallStackAugmentations(Interpreter);
applyConversionAugmentations(Interpreter);
applyOperationsAugmentations(Interpreter);
applyMemberAugmentations(Interpreter);
applyIndexingAugmentations(Interpreter);
applyArrayLiteralAugmentations(Interpreter);
applySetAugmentations(Interpreter);
applyRecordAugmentations(Interpreter);
applyObjectAugmentations(Interpreter);
applyFunctionAugmentations(Interpreter);
applyAssignmentAugmentations(Interpreter);
applyControlFlowAugmentations(Interpreter);
applyErrorHandlingAugmentations(Interpreter);
applyDefinitionAugmentations(Interpreter);
applyHelperAugmentations(Interpreter);
applyExternHostAugmentations(Interpreter);
applyEvaluationAugmentations(Interpreter);

export { Environment } from "./environment";
export type { CallFrame } from "./call_stack";
export type { ControlSignal } from "./signals";
export type { ExceptionValue, RuntimeValue } from "./values";
export { HostRegistry } from "./extern_host";
