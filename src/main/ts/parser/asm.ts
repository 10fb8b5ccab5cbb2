import { AsmBinding, AsmExits, AsmLocation, AsmSource } from "../ast/ast.js";
import { joinSpans } from "../common/span.js";
import { Token, TokenType } from "../lexer/token.js";
import { ParserState } from "./state.js";

/**
 * Parses the operand interface of an `asm` block. The instruction text itself
 * arrives as one raw `AsmBody` token and is left for the emulator to decode.
 */
export class AsmHeaderParser {
  constructor(private readonly state: ParserState) {}

  parseSource(): AsmSource {
    const bindings = this.parseBindings();

    let exits: AsmExits = { kind: "None" };
    if (this.state.match(TokenType.Arrow)) {
      exits = this.parseExits();
    }

    let memorySize: number | undefined;
    if (this.state.check(TokenType.Identifier) && this.state.peek().lexeme === "memory") {
      this.state.advance();
      memorySize = this.integer("Expect memory size in bytes.");
    }

    const body = this.state.consume(TokenType.AsmBody, "Expect '{' before asm body.");
    return {
      bindings,
      exits,
      memorySize,
      text: body.lexeme,
      textSpan: this.state.tokenSpan(body),
    };
  }

  private parseBindings(): AsmBinding[] {
    this.state.consume(TokenType.OpenParen, "Expect '(' before asm operands.");
    const bindings: AsmBinding[] = [];
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        bindings.push(this.binding());
      } while (this.state.match(TokenType.Comma));
    }
    this.state.consume(TokenType.CloseParen, "Expect ')' after asm operands.");
    return bindings;
  }

  private parseExits(): AsmExits {
    if (this.state.check(TokenType.OpenParen)) {
      return { kind: "Tuple", bindings: this.parseBindings() };
    }
    return { kind: "Single", location: this.location() };
  }

  private binding(): AsmBinding {
    const name = this.state.consume(TokenType.Identifier, "Expect operand name.");
    this.state.consume(TokenType.Colon, "Expect ':' after operand name.");
    const location = this.location();
    return {
      name: name.lexeme,
      location,
      span: joinSpans(this.state.tokenSpan(name), location.span),
    };
  }

  private location(): AsmLocation {
    const token = this.state.consume(
      TokenType.Identifier,
      "Expect register or memory slot."
    );
    if (token.lexeme !== "mem" || !this.state.check(TokenType.OpenBracket)) {
      return {
        kind: "Register",
        name: token.lexeme.toLowerCase(),
        span: this.state.tokenSpan(token),
      };
    }

    this.state.advance(); // '['
    const offset = this.integer("Expect memory offset.");
    let count: number | undefined;
    if (this.state.match(TokenType.Semicolon)) {
      count = this.integer("Expect qword count.");
    }
    const end: Token = this.state.consume(
      TokenType.CloseBracket,
      "Expect ']' after memory slot."
    );
    return { kind: "Memory", offset, count, span: this.state.span(token, end) };
  }

  private integer(message: string): number {
    const token = this.state.consume(TokenType.Integer, message);
    return Number(token.literal ?? 0);
  }
}
