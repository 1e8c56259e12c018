import type * as AST from "../ast";
import type { Interpreter } from "./index";
import { makeError, type ErrorValue, type ExceptionValue } from "./values";

declare module "./index" {
  interface Interpreter {
    errorAt(node: AST.AstNode | null | undefined, message: string): ErrorValue;
    trace(message: string): void;
    formatUncaughtException(exception: ExceptionValue): string;
  }
}

export function locationSuffix(node: AST.AstNode | null | undefined): string {
  const start = node?.span?.start;
  return start ? ` at line ${start.line}, column ${start.column}` : "";
}

/** `Runtime Error: Class: message`, then one `  at Frame` line per frame, innermost first. */
export function formatUncaughtException(exception: ExceptionValue): string {
  const lines = [`Runtime Error: ${exception.classInfo.name}: ${exception.message}`];
  for (const frame of [...exception.callStack].reverse()) {
    lines.push(`  at ${frame}`);
  }
  return lines.join("\n");
}

export function applyDiagnosticAugmentations(cls: typeof Interpreter): void {
  cls.prototype.errorAt = function errorAt(this: Interpreter, node: AST.AstNode | null | undefined, message: string): ErrorValue {
    const err = makeError(`${message}${locationSuffix(node ?? this.currentNode)}`);
    this.trace(err.message);
    return err;
  };

  cls.prototype.trace = function trace(this: Interpreter, message: string): void {
    if (this.traceErrors) {
      console.error(`[trace] ${message}`);
    }
  };

  cls.prototype.formatUncaughtException = function (this: Interpreter, exception: ExceptionValue): string {
    return formatUncaughtException(exception);
  };
}
