import type { ExceptionValue } from "./values";

/**
 * Non-local control transfer pending on the interpreter. Loops consume
 * `break` and `continue`; routine calls consume `exit`.
 */
export type ControlSignal = "none" | "break" | "continue" | "exit";

/**
 * Thrown by script callbacks handed to host functions so that a language
 * exception crosses the host frame unchanged. Never escapes the bridge.
 */
export class CallbackRaiseSignal extends Error {
  constructor(public exception: ExceptionValue) {
    super(`${exception.classInfo.name}: ${exception.message}`);
  }
}

/** Carries an evaluator error out of a script callback invoked by a host function. */
export class CallbackErrorSignal extends Error {
  constructor(message: string) {
    super(message);
  }
}
