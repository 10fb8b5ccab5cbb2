import { Span } from "../common/span.js";

export enum TokenType {
  // Keywords
  Let,
  Fn,
  Return,
  Struct,
  If,
  Else,
  While,
  For,
  In,
  Break,
  Continue,
  Import,
  From,
  As,
  Export,
  True,
  False,
  None,
  Try,
  Catch,
  Throw,

  // Directive markers
  Asm,
  Macro,
  Keyword,
  Insert, // #insert
  Undef, // #undef

  // Literals
  Identifier,
  String,
  Integer,
  Float,
  AsmBody, // raw text between the braces of an asm block
  MacroVar, // $name

  // Operators & Punctuation
  Plus, // +
  Minus, // -
  Star, // *
  Slash, // /
  Percent, // %
  Equal, // =
  EqualEqual, // ==
  Bang, // !
  BangEqual, // !=
  Less, // <
  LessEqual, // <=
  Greater, // >
  GreaterEqual, // >=
  AmpersandAmpersand, // &&
  PipePipe, // ||
  PlusEqual, // +=
  MinusEqual, // -=
  StarEqual, // *=
  SlashEqual, // /=
  Arrow, // ->
  FatArrow, // =>
  Question, // ?
  Dot, // .
  Colon, // :
  Comma, // ,
  Semicolon, // ;
  OpenParen, // (
  CloseParen, // )
  OpenBrace, // {
  CloseBrace, // }
  OpenBracket, // [
  CloseBracket, // ]

  EOF,
}

export type TokenLiteral = string | number | bigint;

export interface Token {
  type: TokenType;
  lexeme: string;
  literal?: TokenLiteral;
  line: number;
  column: number;
  offset: number;
  length: number;
  sourceFile: string;
  /** Number of macro expansions that produced this token; 0 for source text. */
  depth: number;
}

export const OPENERS: ReadonlyMap<TokenType, TokenType> = new Map([
  [TokenType.OpenParen, TokenType.CloseParen],
  [TokenType.OpenBracket, TokenType.CloseBracket],
  [TokenType.OpenBrace, TokenType.CloseBrace],
]);

/** Re-renders tokens as source text; used for expansion listings. */
export function tokensToSource(tokens: readonly Token[]): string {
  const parts: string[] = [];
  for (const token of tokens) {
    if (token.type === TokenType.EOF) continue;
    if (token.type === TokenType.AsmBody) {
      parts.push(`{${token.lexeme}}`);
    } else if (token.type === TokenType.String) {
      parts.push(JSON.stringify(token.literal ?? ""));
    } else {
      parts.push(token.lexeme);
    }
  }
  return parts.join(" ");
}

export function tokenSpan(token: Token): Span {
  return {
    start: { line: token.line, column: token.column, offset: token.offset },
    end: {
      line: token.line,
      column: token.column + token.length,
      offset: token.offset + token.length,
    },
    sourceFile: token.sourceFile,
  };
}
