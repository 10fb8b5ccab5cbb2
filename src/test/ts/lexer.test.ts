import { beforeEach, describe, expect, it } from "vitest";
import { Lexer } from "../../main/ts/lexer/lexer.js";
import { TokenType } from "../../main/ts/lexer/token.js";
import { DiagnosticReporter } from "../../main/ts/common/diagnostics.js";
import { ErrorKind, KestrelError } from "../../main/ts/common/errors.js";

describe("Lexer", () => {
  let reporter: DiagnosticReporter;

  const scan = (source: string) => new Lexer(source, "test.kes", reporter).scanTokens();

  const scanError = (source: string): KestrelError => {
    try {
      scan(source);
    } catch (e) {
      if (e instanceof KestrelError) return e;
      throw e;
    }
    throw new Error("expected a lex error");
  };

  beforeEach(() => {
    reporter = new DiagnosticReporter({ silent: true });
  });

  it("should scan basic tokens", () => {
    const tokens = scan(`let total = 0xFF + 1_000;
print(total);`);

    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Let,
      TokenType.Identifier,
      TokenType.Equal,
      TokenType.Integer,
      TokenType.Plus,
      TokenType.Integer,
      TokenType.Semicolon,
      TokenType.Identifier,
      TokenType.OpenParen,
      TokenType.Identifier,
      TokenType.CloseParen,
      TokenType.Semicolon,
      TokenType.EOF,
    ]);
    expect(tokens[3].literal).toBe(255n);
    expect(tokens[5].literal).toBe(1000n);
    expect(reporter.hasErrors()).toBe(false);
  });

  it("should scan float literals", () => {
    const tokens = scan("3.25 1e3 2.5e-2");
    expect(tokens.slice(0, 3).map((t) => [t.type, t.literal])).toEqual([
      [TokenType.Float, 3.25],
      [TokenType.Float, 1000],
      [TokenType.Float, 0.025],
    ]);
  });

  it("should keep a dot after an integer as member access", () => {
    const tokens = scan("xs.0");
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.Dot,
      TokenType.Integer,
      TokenType.EOF,
    ]);
  });

  it("should decode string escapes", () => {
    const tokens = scan(String.raw`"tab\tquote\"end\n"`);
    expect(tokens[0].type).toBe(TokenType.String);
    expect(tokens[0].literal).toBe('tab\tquote"end\n');
  });

  it("should skip line and block comments", () => {
    const tokens = scan(`// note
/* multi
line */ 123`);
    expect(tokens[0].type).toBe(TokenType.Integer);
    expect(tokens[0].line).toBe(3);
    expect(tokens[0].column).toBe(9);
  });

  it("should scan multi-character operators", () => {
    const tokens = scan("a += 1 -> => == != <= >= && || ?");
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Identifier,
      TokenType.PlusEqual,
      TokenType.Integer,
      TokenType.Arrow,
      TokenType.FatArrow,
      TokenType.EqualEqual,
      TokenType.BangEqual,
      TokenType.LessEqual,
      TokenType.GreaterEqual,
      TokenType.AmpersandAmpersand,
      TokenType.PipePipe,
      TokenType.Question,
      TokenType.EOF,
    ]);
  });

  it("should scan directives and macro captures", () => {
    const tokens = scan(`#insert "util.kes" #undef twice $body`);
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Insert,
      TokenType.String,
      TokenType.Undef,
      TokenType.Identifier,
      TokenType.MacroVar,
      TokenType.EOF,
    ]);
    expect(tokens[4].lexeme).toBe("$body");
    expect(tokens[4].literal).toBe("body");
  });

  it("should capture an asm body as one raw token", () => {
    const tokens = scan(`asm (x: rax) -> (x: rax) {
  inc rax ; bump
}`);
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Asm,
      TokenType.OpenParen,
      TokenType.Identifier,
      TokenType.Colon,
      TokenType.Identifier,
      TokenType.CloseParen,
      TokenType.Arrow,
      TokenType.OpenParen,
      TokenType.Identifier,
      TokenType.Colon,
      TokenType.Identifier,
      TokenType.CloseParen,
      TokenType.AsmBody,
      TokenType.EOF,
    ]);
    expect(tokens[12].lexeme).toBe("\n  inc rax ; bump\n");
  });

  it("should lex braces normally once the asm body is closed", () => {
    const tokens = scan("asm () { nop } { 1 }");
    expect(tokens.map((t) => t.type)).toEqual([
      TokenType.Asm,
      TokenType.OpenParen,
      TokenType.CloseParen,
      TokenType.AsmBody,
      TokenType.OpenBrace,
      TokenType.Integer,
      TokenType.CloseBrace,
      TokenType.EOF,
    ]);
  });

  it("should track line and column", () => {
    const tokens = scan("let\n  y");
    expect(tokens[1].lexeme).toBe("y");
    expect(tokens[1].line).toBe(2);
    expect(tokens[1].column).toBe(3);
  });

  it("should reject an unterminated string", () => {
    const error = scanError(`let s = "abc`);
    expect(error.kind).toBe(ErrorKind.LexError);
    expect(error.message).toBe("Unterminated string.");
    expect(error.span?.start).toEqual({ line: 1, column: 9, offset: 8 });
    expect(reporter.getDiagnostics()).toHaveLength(1);
  });

  it("should reject a newline inside a string", () => {
    expect(scanError('"ab\ncd"').message).toBe("Unterminated string.");
  });

  it("should reject an unterminated block comment", () => {
    expect(scanError("1 /* open").message).toBe("Unterminated multi-line comment.");
  });

  it("should reject an unterminated asm block", () => {
    expect(scanError("asm () { mov rax, 1").message).toBe("Unterminated asm block.");
  });

  it("should reject unknown characters and directives", () => {
    expect(scanError("let a = @;").message).toBe("Unexpected character: @");
    expect(scanError("#define X").message).toBe("Unknown directive: #define");
  });
});
