export { Session } from "./session.js";
export type { RunResult, SessionOptions } from "./session.js";

export { DiagnosticReporter, DiagnosticSeverity } from "./common/diagnostics.js";
export type { Diagnostic, ReporterOptions } from "./common/diagnostics.js";
export { ErrorKind, KestrelError, isKestrelError } from "./common/errors.js";
export { formatDiagnostic, formatDiagnostics } from "./common/pretty.js";
export { attempt } from "./common/result.js";
export type { Result } from "./common/result.js";
export type { Location, Span } from "./common/span.js";
export { joinSpans } from "./common/span.js";

export {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "./config/config.js";
export type { ConfigValidation, KestrelConfig } from "./config/config.js";

export { Lexer, tokenize } from "./lexer/lexer.js";
export { TokenType, tokensToSource } from "./lexer/token.js";
export type { Token } from "./lexer/token.js";
export { Parser, parse } from "./parser/parser.js";
export * as ast from "./ast/ast.js";

export { MacroExpander } from "./macro/expander.js";
export type { IncludeLoader } from "./macro/expander.js";
export { MacroTable } from "./macro/table.js";

export { Evaluator } from "./eval/evaluator.js";
export type { EvaluatorHooks, ModuleLoader } from "./eval/evaluator.js";
export { Environment } from "./runtime/environment.js";
export type { Namespace } from "./runtime/environment.js";
export { ThrownError, createGlobals } from "./runtime/builtins.js";
export * from "./runtime/values.js";

export { MemoryModuleHost, NodeModuleHost } from "./modules/host.js";
export type { ModuleHost } from "./modules/host.js";
export { Module, ModuleResolver } from "./modules/resolver.js";

export { decodeAsm } from "./asm/decoder.js";
export type { AsmProgram, Instruction } from "./asm/decoder.js";
export { executeAsm } from "./asm/emulator.js";
export type { AsmResult, AsmRunOptions } from "./asm/emulator.js";
