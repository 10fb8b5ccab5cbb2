/**
 * Central error catalog. Every failure the lexer, parser, macro engine,
 * resolver, evaluator or emulator raises is a {@link KestrelError} built from
 * one of these entries, so messages stay consistent across components.
 */
import { Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
import { Span } from "./span.js";

export enum ErrorKind {
  LexError = "LexError",
  ParseError = "ParseError",
  MacroExpansionLimit = "MacroExpansionLimit",
  CircularImport = "CircularImport",
  ModuleNotFound = "ModuleNotFound",
  ArityError = "ArityError",
  MissingField = "MissingField",
  TypeError = "TypeError",
  UndefinedNameError = "UndefinedNameError",
  UnsupportedOpcode = "UnsupportedOpcode",
  MemoryFault = "MemoryFault",
  ExecutionLimit = "ExecutionLimit",
  UserError = "UserError",
}

export type ErrorParams = Record<string, string | number>;

export interface ErrorDefinition {
  kind: ErrorKind;
  format: (params: ErrorParams) => string;
}

function makeErrorDef(
  kind: ErrorKind,
  format: (params: ErrorParams) => string
): ErrorDefinition {
  return { kind, format };
}

export const ERROR_CATALOG: Record<ErrorKind, ErrorDefinition> = {
  [ErrorKind.LexError]: makeErrorDef(
    ErrorKind.LexError,
    ({ message }) => `${message}`
  ),
  [ErrorKind.ParseError]: makeErrorDef(
    ErrorKind.ParseError,
    ({ message, found }) =>
      found === undefined ? `${message}` : `${message} Found '${found}'.`
  ),
  [ErrorKind.MacroExpansionLimit]: makeErrorDef(
    ErrorKind.MacroExpansionLimit,
    ({ name, limit }) =>
      `expansion of '${name}' exceeded the depth limit of ${limit}`
  ),
  [ErrorKind.CircularImport]: makeErrorDef(
    ErrorKind.CircularImport,
    ({ chain }) => `circular import: ${chain}`
  ),
  [ErrorKind.ModuleNotFound]: makeErrorDef(
    ErrorKind.ModuleNotFound,
    ({ path, tried }) =>
      tried ? `module '${path}' not found (tried ${tried})` : `module '${path}' not found`
  ),
  [ErrorKind.ArityError]: makeErrorDef(
    ErrorKind.ArityError,
    ({ name, expected, actual }) =>
      `'${name}' expects ${expected} argument(s) but got ${actual}`
  ),
  [ErrorKind.MissingField]: makeErrorDef(
    ErrorKind.MissingField,
    ({ struct, field }) => `missing required field '${field}' of ${struct}`
  ),
  [ErrorKind.TypeError]: makeErrorDef(
    ErrorKind.TypeError,
    ({ message }) => `${message}`
  ),
  [ErrorKind.UndefinedNameError]: makeErrorDef(
    ErrorKind.UndefinedNameError,
    ({ name, what }) => `undefined ${what ?? "name"} '${name}'`
  ),
  [ErrorKind.UnsupportedOpcode]: makeErrorDef(
    ErrorKind.UnsupportedOpcode,
    ({ opcode, line, reason }) =>
      `unsupported instruction '${opcode}' on asm line ${line}${reason ? `: ${reason}` : ""}`
  ),
  [ErrorKind.MemoryFault]: makeErrorDef(
    ErrorKind.MemoryFault,
    ({ address, size, limit, requested }) =>
      requested !== undefined
        ? `memory fault: region of ${requested} bytes exceeds the limit of ${limit} bytes`
        : `memory fault: ${size}-byte access at ${address} outside region of ${limit} bytes`
  ),
  [ErrorKind.ExecutionLimit]: makeErrorDef(
    ErrorKind.ExecutionLimit,
    ({ what, limit }) => `${what} exceeded the limit of ${limit}`
  ),
  [ErrorKind.UserError]: makeErrorDef(
    ErrorKind.UserError,
    ({ message }) => `${message}`
  ),
};

export class KestrelError extends Error {
  readonly kind: ErrorKind;
  readonly span?: Span;
  readonly details: ErrorParams;

  constructor(kind: ErrorKind, details: ErrorParams, span?: Span) {
    super(ERROR_CATALOG[kind].format(details));
    this.name = kind;
    this.kind = kind;
    this.details = details;
    this.span = span;
  }

  /** Copy of this error positioned at `span`, unless it already has one. */
  at(span: Span | undefined): KestrelError {
    if (this.span || !span) return this;
    return new KestrelError(this.kind, this.details, span);
  }

  toDiagnostic(): Diagnostic {
    return {
      severity: DiagnosticSeverity.Error,
      message: this.message,
      code: this.kind,
      span: this.span,
    };
  }
}

export function fail(
  kind: ErrorKind,
  details: ErrorParams = {},
  span?: Span
): never {
  throw new KestrelError(kind, details, span);
}

export function typeError(message: string, span?: Span): never {
  return fail(ErrorKind.TypeError, { message }, span);
}

export function isKestrelError(e: unknown): e is KestrelError {
  return e instanceof KestrelError;
}
