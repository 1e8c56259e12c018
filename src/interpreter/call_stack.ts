import type * as AST from "../ast";
import type { Environment } from "./environment";
import type { Interpreter } from "./index";
import type { ClassInfo } from "./types/class_info";
import type { RoutineInfo } from "./types/member_info";
import type { RuntimeValue } from "./values";

export type CallFrame = {
  /** `Fn`, `TFoo.Method`, `<lambda>` or a host function name. */
  name: string;
  node: AST.AstNode | null;
  routine?: RoutineInfo;
  /** Class declaring the running method; `inherited` starts from its parent. */
  ownerClass?: ClassInfo;
  env?: Environment;
  self?: RuntimeValue;
};

declare module "./index" {
  interface Interpreter {
    withFrame<T>(frame: CallFrame, onOverflow: T, body: () => T): T;
    callStackNames(): string[];
    currentMethodFrame(): CallFrame | undefined;
  }
}

export function applyCallStackAugmentations(cls: typeof Interpreter): void {
  /**
   * Pushes `frame` for the duration of `body`. The depth limit is checked
   * before the push; exceeding it raises EScriptStackOverflow and returns
   * `onOverflow` without running `body`.
   */
  cls.prototype.withFrame = function withFrame<T>(this: Interpreter, frame: CallFrame, onOverflow: T, body: () => T): T {
    if (this.callStack.length >= this.maxRecursionDepth) {
      this.raiseBuiltin("EScriptStackOverflow", `Maximal recursion exceeded (${this.maxRecursionDepth})`, frame.node);
      return onOverflow;
    }
    this.callStack.push(frame);
    try {
      return body();
    } finally {
      this.callStack.pop();
    }
  };

  cls.prototype.callStackNames = function callStackNames(this: Interpreter): string[] {
    return this.callStack.map((f) => f.name);
  };

  cls.prototype.currentMethodFrame = function currentMethodFrame(this: Interpreter): CallFrame | undefined {
    for (let i = this.callStack.length - 1; i >= 0; i--) {
      const frame = this.callStack[i];
      if (frame?.ownerClass) return frame;
    }
    return undefined;
  };
}
