import { Token, TokenLiteral, TokenType } from "./token.js";
import {
  DiagnosticReporter,
  DiagnosticSeverity,
} from "../common/diagnostics.js";
import { ErrorKind, KestrelError } from "../common/errors.js";

const ESCAPES: Record<string, string> = {
  n: "\n",
  t: "\t",
  r: "\r",
  "0": "\0",
  "\\": "\\",
  '"': '"',
};

export class Lexer {
  private source: string;
  private sourceFile: string;
  private tokens: Token[] = [];
  private start = 0;
  private startLine = 1;
  private startColumn = 1;
  private current = 0;
  private line = 1;
  private column = 1;
  private reporter: DiagnosticReporter;
  // Set after `asm` until its body is captured; tracks header parentheses.
  private asmHeaderDepth: number | null = null;

  private static keywords: Record<string, TokenType> = {
    let: TokenType.Let,
    fn: TokenType.Fn,
    return: TokenType.Return,
    struct: TokenType.Struct,
    if: TokenType.If,
    else: TokenType.Else,
    while: TokenType.While,
    for: TokenType.For,
    in: TokenType.In,
    break: TokenType.Break,
    continue: TokenType.Continue,
    import: TokenType.Import,
    from: TokenType.From,
    as: TokenType.As,
    export: TokenType.Export,
    true: TokenType.True,
    false: TokenType.False,
    none: TokenType.None,
    try: TokenType.Try,
    catch: TokenType.Catch,
    throw: TokenType.Throw,
    asm: TokenType.Asm,
    macro: TokenType.Macro,
    keyword: TokenType.Keyword,
  };

  private static directives: Record<string, TokenType> = {
    insert: TokenType.Insert,
    undef: TokenType.Undef,
  };

  constructor(
    source: string,
    sourceFile: string,
    reporter: DiagnosticReporter
  ) {
    this.source = source;
    this.sourceFile = sourceFile;
    this.reporter = reporter;
  }

  /**
   * Scans the whole source. Throws a `LexError` on the first invalid input;
   * the error is also reported to the reporter.
   */
  scanTokens(): Token[] {
    while (!this.isAtEnd()) {
      this.start = this.current;
      this.startLine = this.line;
      this.startColumn = this.column;
      this.scanToken();
    }

    this.tokens.push({
      type: TokenType.EOF,
      lexeme: "",
      line: this.line,
      column: this.column,
      offset: this.current,
      length: 0,
      sourceFile: this.sourceFile,
      depth: 0,
    });
    return this.tokens;
  }

  private scanToken() {
    const c = this.advance();
    switch (c) {
      case "(":
        if (this.asmHeaderDepth !== null) this.asmHeaderDepth++;
        this.addToken(TokenType.OpenParen);
        break;
      case ")":
        if (this.asmHeaderDepth !== null) this.asmHeaderDepth--;
        this.addToken(TokenType.CloseParen);
        break;
      case "{":
        if (this.asmHeaderDepth === 0) {
          this.asmBody();
        } else {
          this.addToken(TokenType.OpenBrace);
        }
        break;
      case "}":
        this.addToken(TokenType.CloseBrace);
        break;
      case "[":
        this.addToken(TokenType.OpenBracket);
        break;
      case "]":
        this.addToken(TokenType.CloseBracket);
        break;
      case ",":
        this.addToken(TokenType.Comma);
        break;
      case ".":
        this.addToken(TokenType.Dot);
        break;
      case ";":
        this.addToken(TokenType.Semicolon);
        break;
      case ":":
        this.addToken(TokenType.Colon);
        break;
      case "?":
        this.addToken(TokenType.Question);
        break;
      case "+":
        this.addToken(this.match("=") ? TokenType.PlusEqual : TokenType.Plus);
        break;
      case "-":
        if (this.match(">")) {
          this.addToken(TokenType.Arrow);
        } else {
          this.addToken(
            this.match("=") ? TokenType.MinusEqual : TokenType.Minus
          );
        }
        break;
      case "*":
        this.addToken(this.match("=") ? TokenType.StarEqual : TokenType.Star);
        break;
      case "/":
        if (this.match("/")) {
          while (this.peek() !== "\n" && !this.isAtEnd()) this.advance();
        } else if (this.match("*")) {
          this.multiLineComment();
        } else {
          this.addToken(
            this.match("=") ? TokenType.SlashEqual : TokenType.Slash
          );
        }
        break;
      case "%":
        this.addToken(TokenType.Percent);
        break;
      case "!":
        this.addToken(this.match("=") ? TokenType.BangEqual : TokenType.Bang);
        break;
      case "=":
        if (this.match(">")) {
          this.addToken(TokenType.FatArrow);
        } else if (this.match("=")) {
          this.addToken(TokenType.EqualEqual);
        } else {
          this.addToken(TokenType.Equal);
        }
        break;
      case "<":
        this.addToken(this.match("=") ? TokenType.LessEqual : TokenType.Less);
        break;
      case ">":
        this.addToken(
          this.match("=") ? TokenType.GreaterEqual : TokenType.Greater
        );
        break;
      case "&":
        if (!this.match("&")) this.error(`Unexpected character: &`);
        this.addToken(TokenType.AmpersandAmpersand);
        break;
      case "|":
        if (!this.match("|")) this.error(`Unexpected character: |`);
        this.addToken(TokenType.PipePipe);
        break;
      case "#":
        this.directive();
        break;
      case "$":
        this.macroVar();
        break;
      case " ":
      case "\r":
      case "\t":
        break;
      case "\n":
        break;
      case '"':
        this.string();
        break;
      default:
        if (this.isDigit(c)) {
          this.number();
        } else if (this.isAlpha(c)) {
          this.identifier();
        } else {
          this.error(`Unexpected character: ${c}`);
        }
        break;
    }
  }

  private multiLineComment() {
    while (
      !(this.peek() === "*" && this.peekNext() === "/") &&
      !this.isAtEnd()
    ) {
      this.advance();
    }

    if (this.isAtEnd()) {
      this.error("Unterminated multi-line comment.");
    }

    // Consume "*/"
    this.advance();
    this.advance();
  }

  private identifier() {
    while (this.isAlphaNumeric(this.peek())) this.advance();

    const text = this.source.substring(this.start, this.current);
    const type = Lexer.keywords[text] ?? TokenType.Identifier;
    this.addToken(type);
    if (type === TokenType.Asm) this.asmHeaderDepth = 0;
  }

  private directive() {
    if (!this.isAlpha(this.peek())) this.error("Expect directive name after '#'.");
    while (this.isAlphaNumeric(this.peek())) this.advance();
    const name = this.source.substring(this.start + 1, this.current);
    const type = Lexer.directives[name];
    if (type === undefined) this.error(`Unknown directive: #${name}`);
    this.addToken(type);
  }

  private macroVar() {
    if (!this.isAlpha(this.peek())) this.error("Expect name after '$'.");
    while (this.isAlphaNumeric(this.peek())) this.advance();
    this.addToken(
      TokenType.MacroVar,
      this.source.substring(this.start + 1, this.current)
    );
  }

  private number() {
    const first = this.source.charAt(this.start);
    if (first === "0" && (this.peek() === "x" || this.peek() === "X")) {
      this.advance();
      if (!this.isHexDigit(this.peek())) this.error("Expect hex digits after '0x'.");
      while (this.isHexDigit(this.peek()) || this.peek() === "_") this.advance();
      const text = this.source.substring(this.start, this.current).replace(/_/g, "");
      this.addToken(TokenType.Integer, BigInt(text));
      return;
    }

    this.digits();
    let isFloat = false;

    // Look for a fractional part.
    if (this.peek() === "." && this.isDigit(this.peekNext())) {
      isFloat = true;
      this.advance();
      this.digits();
    }

    if (this.peek() === "e" || this.peek() === "E") {
      const sign = this.peekNext();
      const hasSign = sign === "+" || sign === "-";
      const digitAt = this.source.charAt(this.current + (hasSign ? 2 : 1));
      if (this.isDigit(digitAt)) {
        isFloat = true;
        this.advance();
        if (hasSign) this.advance();
        this.digits();
      }
    }

    const text = this.source.substring(this.start, this.current).replace(/_/g, "");
    if (isFloat) {
      this.addToken(TokenType.Float, parseFloat(text));
    } else {
      this.addToken(TokenType.Integer, BigInt(text));
    }
  }

  private digits() {
    while (this.isDigit(this.peek()) || (this.peek() === "_" && this.isDigit(this.peekNext()))) {
      this.advance();
    }
  }

  private string() {
    let value = "";
    while (this.peek() !== '"') {
      if (this.isAtEnd() || this.peek() === "\n") {
        this.error("Unterminated string.");
      }
      const c = this.advance();
      if (c === "\\") {
        const escaped = ESCAPES[this.peek()];
        if (escaped === undefined) this.error(`Unknown escape sequence: \\${this.peek()}`);
        this.advance();
        value += escaped;
      } else {
        value += c;
      }
    }

    // The closing ".
    this.advance();
    this.addToken(TokenType.String, value);
  }

  private asmBody() {
    this.asmHeaderDepth = null;
    const bodyStart = this.current;
    const line = this.line;
    const column = this.column;
    let depth = 1;
    while (!this.isAtEnd()) {
      const c = this.peek();
      if (c === "{") depth++;
      if (c === "}") {
        depth--;
        if (depth === 0) break;
      }
      this.advance();
    }

    if (this.isAtEnd()) {
      this.error("Unterminated asm block.");
    }

    const raw = this.source.substring(bodyStart, this.current);
    this.advance(); // closing }
    this.tokens.push({
      type: TokenType.AsmBody,
      lexeme: raw,
      literal: raw,
      line,
      column,
      offset: bodyStart,
      length: raw.length,
      sourceFile: this.sourceFile,
      depth: 0,
    });
  }

  private match(expected: string): boolean {
    if (this.isAtEnd()) return false;
    if (this.source.charAt(this.current) !== expected) return false;

    this.advance();
    return true;
  }

  private peek(): string {
    if (this.isAtEnd()) return "\0";
    return this.source.charAt(this.current);
  }

  private peekNext(): string {
    if (this.current + 1 >= this.source.length) return "\0";
    return this.source.charAt(this.current + 1);
  }

  private isAlpha(c: string): boolean {
    return (c >= "a" && c <= "z") || (c >= "A" && c <= "Z") || c === "_";
  }

  private isAlphaNumeric(c: string): boolean {
    return this.isAlpha(c) || this.isDigit(c);
  }

  private isDigit(c: string): boolean {
    return c >= "0" && c <= "9";
  }

  private isHexDigit(c: string): boolean {
    return this.isDigit(c) || (c >= "a" && c <= "f") || (c >= "A" && c <= "F");
  }

  private isAtEnd(): boolean {
    return this.current >= this.source.length;
  }

  private advance(): string {
    const c = this.source.charAt(this.current++);
    if (c === "\n") {
      this.line++;
      this.column = 1;
    } else {
      this.column++;
    }
    return c;
  }

  private addToken(type: TokenType, literal?: TokenLiteral) {
    const text = this.source.substring(this.start, this.current);
    this.tokens.push({
      type,
      lexeme: text,
      literal,
      line: this.startLine,
      column: this.startColumn,
      offset: this.start,
      length: this.current - this.start,
      sourceFile: this.sourceFile,
      depth: 0,
    });
  }

  private error(message: string): never {
    const span = {
      start: { line: this.startLine, column: this.startColumn, offset: this.start },
      end: { line: this.line, column: this.column, offset: this.current },
      sourceFile: this.sourceFile,
    };
    this.reporter.report({
      severity: DiagnosticSeverity.Error,
      message,
      code: ErrorKind.LexError,
      span,
    });
    throw new KestrelError(ErrorKind.LexError, { message }, span);
  }
}

/** Convenience wrapper: lex `source` with a silent reporter. */
export function tokenize(source: string, sourceFile = "<input>"): Token[] {
  return new Lexer(source, sourceFile, new DiagnosticReporter({ silent: true })).scanTokens();
}
