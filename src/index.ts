export * as AST from "./ast";
export { SemanticInfo } from "./semantic";
export {
  DEFAULT_MAX_RECURSION_DEPTH,
  Environment,
  HostRegistry,
  Interpreter,
  type CallFrame,
  type ExceptionValue,
  type InterpreterOptions,
  type RunResult,
  type RuntimeValue,
} from "./interpreter/index";
export type { HostFunction, HostSignature } from "./interpreter/extern_host";
export { BuiltinRegistry, type BuiltinFunction, type BuiltinImpl } from "./builtins/registry";
export { createCoreBuiltins } from "./builtins/core";
export { loadInterpreterConfig, parseInterpreterConfig, type InterpreterConfig } from "./config";
