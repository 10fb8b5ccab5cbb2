import { DiagnosticReporter } from "../common/diagnostics.js";
import { ErrorKind, KestrelError } from "../common/errors.js";
import { Span } from "../common/span.js";
import { Token, TokenType, tokenSpan } from "../lexer/token.js";

export class ParserState {
  readonly tokens: Token[];
  current = 0;
  readonly reporter: DiagnosticReporter;
  readonly sourceFile: string;

  constructor(
    tokens: Token[],
    sourceFile: string,
    reporter: DiagnosticReporter
  ) {
    this.tokens = tokens;
    this.sourceFile = sourceFile;
    this.reporter = reporter;
  }

  match(...types: TokenType[]): boolean {
    for (const type of types) {
      if (this.check(type)) {
        this.advance();
        return true;
      }
    }
    return false;
  }

  consume(type: TokenType, message: string): Token {
    if (this.check(type)) return this.advance();
    throw this.error(this.peek(), message);
  }

  check(type: TokenType): boolean {
    if (this.isAtEnd()) return false;
    return this.peek().type === type;
  }

  checkNext(type: TokenType): boolean {
    const next = this.tokens[this.current + 1];
    return next !== undefined && next.type === type;
  }

  advance(): Token {
    if (!this.isAtEnd()) this.current++;
    return this.previous();
  }

  isAtEnd(): boolean {
    return this.peek().type === TokenType.EOF;
  }

  peek(): Token {
    return this.tokens[this.current];
  }

  previous(): Token {
    return this.tokens[Math.max(0, this.current - 1)];
  }

  /** Builds a parse error at `token` for the caller to throw. */
  error(token: Token, message: string): KestrelError {
    const found = token.type === TokenType.EOF ? "end of input" : token.lexeme;
    return new KestrelError(
      ErrorKind.ParseError,
      { message, found },
      this.tokenSpan(token)
    );
  }

  tokenSpan(token: Token): Span {
    return tokenSpan(token);
  }

  span(start: Token, end: Token): Span {
    return {
      start: { line: start.line, column: start.column, offset: start.offset },
      end: {
        line: end.line,
        column: end.column + end.length,
        offset: end.offset + end.length,
      },
      sourceFile: start.sourceFile,
    };
  }
}
