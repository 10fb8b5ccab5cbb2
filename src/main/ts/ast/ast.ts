import { Span } from "../common/span.js";
import { Token } from "../lexer/token.js";

export interface Node {
  span: Span;
}

export type Statement =
  | ImportDecl
  | LetDecl
  | FnDecl
  | StructDecl
  | AsmDecl
  | MacroDecl
  | KeywordDecl
  | ReturnStmt
  | BreakStmt
  | ContinueStmt
  | ThrowStmt
  | ExpressionStmt;

export type Expression =
  | LiteralExpr
  | IdentifierExpr
  | ListExpr
  | UnaryExpr
  | BinaryExpr
  | AssignExpr
  | CallExpr
  | AccessExpr
  | IndexExpr
  | FnExpr
  | BlockExpr
  | IfExpr
  | WhileExpr
  | ForExpr
  | TryExpr
  | AsmExpr;

export type AssignTarget = IdentifierExpr | AccessExpr | IndexExpr;

// --- Statements ---

/**
 * Example: `import "./geometry" as geo;`
 * Example: `from "./geometry" import Point, area;`
 */
export interface ImportDecl extends Node {
  kind: "ImportDecl";
  path: string;
  alias?: string;
  /** Selected names for `from … import`; absent for whole-module imports. */
  members?: { name: string; span: Span }[];
}

/**
 * Example: `export let origin = Point(0, 0);`
 */
export interface LetDecl extends Node {
  kind: "LetDecl";
  exported: boolean;
  name: string;
  initializer: Expression;
}

/**
 * Example: `fn add(a, b) { a + b }`
 */
export interface FnDecl extends Node {
  kind: "FnDecl";
  exported: boolean;
  name: string;
  params: string[];
  body: BlockExpr;
}

/**
 * Example: `struct Point { x, y = 0, label? }`
 */
export interface StructDecl extends Node {
  kind: "StructDecl";
  exported: boolean;
  name: string;
  fields: FieldDecl[];
}

export interface FieldDecl extends Node {
  name: string;
  /** Unevaluated; evaluated afresh at every instantiation. */
  defaultValue?: Expression;
  optional: boolean;
}

/**
 * Example:
 * ```
 * asm add(a: rdi, b: rsi) -> rax {
 *   mov rax, rdi
 *   add rax, rsi
 * }
 * ```
 */
export interface AsmDecl extends Node {
  kind: "AsmDecl";
  exported: boolean;
  name: string;
  source: AsmSource;
}

/**
 * Example: `macro square($x) { ($x) * ($x) }`
 *
 * Kept opaque: the macro engine registered it while scanning tokens.
 */
export interface MacroDecl extends Node {
  kind: "MacroDecl";
  name: string;
  params: string[];
  body: Token[];
}

/**
 * Example: `keyword unless $cond $body => { if (!$cond) $body }`
 */
export interface KeywordDecl extends Node {
  kind: "KeywordDecl";
  name: string;
  pattern: Token[];
  template: Token[];
}

export interface ReturnStmt extends Node {
  kind: "ReturnStmt";
  value?: Expression;
}

export interface BreakStmt extends Node {
  kind: "BreakStmt";
}

export interface ContinueStmt extends Node {
  kind: "ContinueStmt";
}

export interface ThrowStmt extends Node {
  kind: "ThrowStmt";
  value: Expression;
}

/**
 * Example: `x = 200;`
 */
export interface ExpressionStmt extends Node {
  kind: "ExpressionStmt";
  expression: Expression;
}

// --- Expressions ---

export type LiteralValue = bigint | number | string | boolean | null;

/**
 * Example: `123`, `1.5`, `"hello"`, `true`, `none`
 */
export interface LiteralExpr extends Node {
  kind: "LiteralExpr";
  value: LiteralValue;
}

export interface IdentifierExpr extends Node {
  kind: "IdentifierExpr";
  name: string;
}

/**
 * Example: `[1, 2, 3]`
 */
export interface ListExpr extends Node {
  kind: "ListExpr";
  elements: Expression[];
}

/**
 * Example: `-x`, `!y`
 */
export interface UnaryExpr extends Node {
  kind: "UnaryExpr";
  operator: Token;
  right: Expression;
}

/**
 * Example: `a + b`, `a && b`
 */
export interface BinaryExpr extends Node {
  kind: "BinaryExpr";
  left: Expression;
  operator: Token;
  right: Expression;
}

/**
 * Example: `p.x = 3`, `total += n`
 */
export interface AssignExpr extends Node {
  kind: "AssignExpr";
  target: AssignTarget;
  operator: Token;
  value: Expression;
}

export interface Argument {
  name?: string;
  value: Expression;
  span: Span;
}

/**
 * Example: `Point(3, y: 4)`
 */
export interface CallExpr extends Node {
  kind: "CallExpr";
  callee: Expression;
  args: Argument[];
}

/**
 * Example: `obj.member`
 */
export interface AccessExpr extends Node {
  kind: "AccessExpr";
  object: Expression;
  member: string;
}

/**
 * Example: `xs[0]`
 */
export interface IndexExpr extends Node {
  kind: "IndexExpr";
  object: Expression;
  index: Expression;
}

/**
 * Example: `fn (x) { x * 2 }`
 */
export interface FnExpr extends Node {
  kind: "FnExpr";
  params: string[];
  body: BlockExpr;
}

/**
 * Example: `{ let y = 1; y + 1 }`
 */
export interface BlockExpr extends Node {
  kind: "BlockExpr";
  statements: Statement[];
}

export interface IfExpr extends Node {
  kind: "IfExpr";
  condition: Expression;
  thenBranch: BlockExpr;
  elseBranch?: BlockExpr | IfExpr;
}

export interface WhileExpr extends Node {
  kind: "WhileExpr";
  condition: Expression;
  body: BlockExpr;
}

/**
 * Example: `for (item in items) { … }`
 */
export interface ForExpr extends Node {
  kind: "ForExpr";
  variable: string;
  iterable: Expression;
  body: BlockExpr;
}

/**
 * Example: `try { risky() } catch (err) { err.message }`
 */
export interface TryExpr extends Node {
  kind: "TryExpr";
  body: BlockExpr;
  errorName: string;
  handler: BlockExpr;
}

/**
 * Example: `asm (x: rax) -> (x: rax) { inc rax }`
 */
export interface AsmExpr extends Node {
  kind: "AsmExpr";
  source: AsmSource;
}

// --- Assembly operand interface ---

export type AsmLocation =
  | { kind: "Register"; name: string; span: Span }
  | { kind: "Memory"; offset: number; count?: number; span: Span };

export interface AsmBinding {
  name: string;
  location: AsmLocation;
  span: Span;
}

export type AsmExits =
  | { kind: "None" }
  | { kind: "Single"; location: AsmLocation }
  | { kind: "Tuple"; bindings: AsmBinding[] };

export interface AsmSource {
  bindings: AsmBinding[];
  exits: AsmExits;
  memorySize?: number;
  /** Raw instruction text, decoded by the emulator when evaluated. */
  text: string;
  textSpan: Span;
}

export interface Program extends Node {
  kind: "Program";
  statements: Statement[];
}
