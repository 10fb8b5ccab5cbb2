import {
  Argument,
  AssignTarget,
  BlockExpr,
  Expression,
  IfExpr,
  Statement,
} from "../ast/ast.js";
import { joinSpans } from "../common/span.js";
import { Token, TokenType } from "../lexer/token.js";
import { AsmHeaderParser } from "./asm.js";
import { ParserState } from "./state.js";

export enum Precedence {
  None,
  Assignment, // = += -= *= /=
  Or, // ||
  And, // &&
  Equality, // == !=
  Comparison, // < > <= >=
  Term, // + -
  Factor, // * / %
  Unary, // ! -
  Call, // . () []
  Primary,
}

const BINARY_OPERATORS = new Set<TokenType>([
  TokenType.Plus,
  TokenType.Minus,
  TokenType.Star,
  TokenType.Slash,
  TokenType.Percent,
  TokenType.EqualEqual,
  TokenType.BangEqual,
  TokenType.Less,
  TokenType.LessEqual,
  TokenType.Greater,
  TokenType.GreaterEqual,
  TokenType.AmpersandAmpersand,
  TokenType.PipePipe,
]);

const ASSIGNMENT_OPERATORS = new Set<TokenType>([
  TokenType.Equal,
  TokenType.PlusEqual,
  TokenType.MinusEqual,
  TokenType.StarEqual,
  TokenType.SlashEqual,
]);

const PRECEDENCE: Partial<Record<TokenType, Precedence>> = {
  [TokenType.Equal]: Precedence.Assignment,
  [TokenType.PlusEqual]: Precedence.Assignment,
  [TokenType.MinusEqual]: Precedence.Assignment,
  [TokenType.StarEqual]: Precedence.Assignment,
  [TokenType.SlashEqual]: Precedence.Assignment,
  [TokenType.PipePipe]: Precedence.Or,
  [TokenType.AmpersandAmpersand]: Precedence.And,
  [TokenType.EqualEqual]: Precedence.Equality,
  [TokenType.BangEqual]: Precedence.Equality,
  [TokenType.Less]: Precedence.Comparison,
  [TokenType.LessEqual]: Precedence.Comparison,
  [TokenType.Greater]: Precedence.Comparison,
  [TokenType.GreaterEqual]: Precedence.Comparison,
  [TokenType.Plus]: Precedence.Term,
  [TokenType.Minus]: Precedence.Term,
  [TokenType.Star]: Precedence.Factor,
  [TokenType.Slash]: Precedence.Factor,
  [TokenType.Percent]: Precedence.Factor,
  [TokenType.Dot]: Precedence.Call,
  [TokenType.OpenParen]: Precedence.Call,
  [TokenType.OpenBracket]: Precedence.Call,
};

/** Expressions that end in a block and may stand as statements without ';'. */
export const BLOCK_LIKE = new Set<TokenType>([
  TokenType.If,
  TokenType.While,
  TokenType.For,
  TokenType.Try,
  TokenType.Asm,
  TokenType.OpenBrace,
]);

export class ExpressionParser {
  private readonly asmParser: AsmHeaderParser;

  constructor(
    private readonly state: ParserState,
    private readonly parseDeclaration: () => Statement
  ) {
    this.asmParser = new AsmHeaderParser(state);
  }

  parseExpression(precedence: Precedence = Precedence.None): Expression {
    let left = this.prefix();

    while (precedence < this.getPrecedence(this.state.peek().type)) {
      left = this.infix(left);
    }

    return left;
  }

  /** Parses an if/while/for/try/block expression without trailing operators. */
  parseBlockLike(): Expression {
    return this.prefix();
  }

  parseBlock(message: string): BlockExpr {
    const open = this.state.consume(TokenType.OpenBrace, message);
    return this.parseBlockExpr(open);
  }

  parseBlockExpr(openBrace: Token): BlockExpr {
    const statements: Statement[] = [];

    while (!this.state.check(TokenType.CloseBrace) && !this.state.isAtEnd()) {
      statements.push(this.parseDeclaration());
    }

    const endToken = this.state.consume(
      TokenType.CloseBrace,
      "Expect '}' after block."
    );

    return {
      kind: "BlockExpr",
      statements,
      span: this.state.span(openBrace, endToken),
    };
  }

  parseParams(): string[] {
    this.state.consume(TokenType.OpenParen, "Expect '(' before parameters.");
    const params: string[] = [];
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        params.push(
          this.state.consume(TokenType.Identifier, "Expect parameter name.")
            .lexeme
        );
      } while (this.state.match(TokenType.Comma));
    }
    this.state.consume(TokenType.CloseParen, "Expect ')' after parameters.");
    return params;
  }

  private prefix(): Expression {
    if (this.state.isAtEnd()) {
      throw this.state.error(this.state.peek(), "Expect expression.");
    }
    const token = this.state.advance();

    switch (token.type) {
      case TokenType.Integer:
      case TokenType.Float:
      case TokenType.String:
        return {
          kind: "LiteralExpr",
          value: token.literal ?? null,
          span: this.state.tokenSpan(token),
        };
      case TokenType.True:
      case TokenType.False:
        return {
          kind: "LiteralExpr",
          value: token.type === TokenType.True,
          span: this.state.tokenSpan(token),
        };
      case TokenType.None:
        return {
          kind: "LiteralExpr",
          value: null,
          span: this.state.tokenSpan(token),
        };
      case TokenType.Identifier:
        return {
          kind: "IdentifierExpr",
          name: token.lexeme,
          span: this.state.tokenSpan(token),
        };
      case TokenType.OpenBrace:
        return this.parseBlockExpr(token);
      case TokenType.Minus:
      case TokenType.Bang:
        return this.unary(token);
      case TokenType.OpenParen:
        return this.grouping();
      case TokenType.OpenBracket:
        return this.listLiteral(token);
      case TokenType.If:
        return this.ifExpression(token);
      case TokenType.While:
        return this.whileExpression(token);
      case TokenType.For:
        return this.forExpression(token);
      case TokenType.Try:
        return this.tryExpression(token);
      case TokenType.Fn:
        return this.fnExpression(token);
      case TokenType.Asm:
        return {
          kind: "AsmExpr",
          source: this.asmParser.parseSource(),
          span: this.state.span(token, this.state.previous()),
        };
      default:
        throw this.state.error(token, "Expect expression.");
    }
  }

  private infix(left: Expression): Expression {
    const token = this.state.advance();

    if (BINARY_OPERATORS.has(token.type)) {
      return this.binary(left, token);
    }
    if (ASSIGNMENT_OPERATORS.has(token.type)) {
      return this.assignment(left, token);
    }

    if (token.type === TokenType.OpenParen) return this.call(left);
    if (token.type === TokenType.Dot) return this.access(left);
    if (token.type === TokenType.OpenBracket) return this.index(left);

    throw this.state.error(token, "Unexpected operator.");
  }

  private unary(operator: Token): Expression {
    const right = this.parseExpression(Precedence.Unary);
    return {
      kind: "UnaryExpr",
      operator,
      right,
      span: joinSpans(this.state.tokenSpan(operator), right.span),
    };
  }

  private binary(left: Expression, operator: Token): Expression {
    const precedence = this.getPrecedence(operator.type);
    const right = this.parseExpression(precedence);
    return {
      kind: "BinaryExpr",
      left,
      operator,
      right,
      span: joinSpans(left.span, right.span),
    };
  }

  private assignment(left: Expression, operator: Token): Expression {
    const target = this.assignTarget(left, operator);
    // Right associative: a = b = c.
    const value = this.parseExpression(Precedence.Assignment - 1);
    return {
      kind: "AssignExpr",
      target,
      operator,
      value,
      span: joinSpans(left.span, value.span),
    };
  }

  private assignTarget(left: Expression, operator: Token): AssignTarget {
    switch (left.kind) {
      case "IdentifierExpr":
      case "AccessExpr":
      case "IndexExpr":
        return left;
      default:
        throw this.state.error(operator, "Invalid assignment target.");
    }
  }

  private grouping(): Expression {
    const expr = this.parseExpression();
    this.state.consume(TokenType.CloseParen, "Expect ')' after expression.");
    return expr;
  }

  private call(callee: Expression): Expression {
    const args: Argument[] = [];
    if (!this.state.check(TokenType.CloseParen)) {
      do {
        args.push(this.argument());
      } while (this.state.match(TokenType.Comma));
    }
    const endToken = this.state.consume(
      TokenType.CloseParen,
      "Expect ')' after arguments."
    );
    return {
      kind: "CallExpr",
      callee,
      args,
      span: joinSpans(callee.span, this.state.tokenSpan(endToken)),
    };
  }

  private argument(): Argument {
    if (
      this.state.check(TokenType.Identifier) &&
      this.state.checkNext(TokenType.Colon)
    ) {
      const nameToken = this.state.advance();
      this.state.advance(); // ':'
      const value = this.parseExpression();
      return {
        name: nameToken.lexeme,
        value,
        span: joinSpans(this.state.tokenSpan(nameToken), value.span),
      };
    }
    const value = this.parseExpression();
    return { value, span: value.span };
  }

  private access(object: Expression): Expression {
    const member = this.state.consume(
      TokenType.Identifier,
      "Expect member name after '.'."
    );

    return {
      kind: "AccessExpr",
      object,
      member: member.lexeme,
      span: joinSpans(object.span, this.state.tokenSpan(member)),
    };
  }

  private index(object: Expression): Expression {
    const index = this.parseExpression();
    const endToken = this.state.consume(
      TokenType.CloseBracket,
      "Expect ']' after index."
    );

    return {
      kind: "IndexExpr",
      object,
      index,
      span: joinSpans(object.span, this.state.tokenSpan(endToken)),
    };
  }

  private listLiteral(openBracket: Token): Expression {
    const elements: Expression[] = [];
    if (!this.state.check(TokenType.CloseBracket)) {
      do {
        if (this.state.check(TokenType.CloseBracket)) break; // trailing comma
        elements.push(this.parseExpression());
      } while (this.state.match(TokenType.Comma));
    }
    const endToken = this.state.consume(
      TokenType.CloseBracket,
      "Expect ']' after list elements."
    );
    return {
      kind: "ListExpr",
      elements,
      span: this.state.span(openBracket, endToken),
    };
  }

  private ifExpression(ifToken: Token): IfExpr {
    this.state.consume(TokenType.OpenParen, "Expect '(' after 'if'.");
    const condition = this.parseExpression();
    this.state.consume(TokenType.CloseParen, "Expect ')' after condition.");
    const thenBranch = this.parseBlock("Expect '{' after if condition.");

    let elseBranch: BlockExpr | IfExpr | undefined;
    if (this.state.match(TokenType.Else)) {
      if (this.state.match(TokenType.If)) {
        elseBranch = this.ifExpression(this.state.previous());
      } else {
        elseBranch = this.parseBlock("Expect '{' after else.");
      }
    }

    return {
      kind: "IfExpr",
      condition,
      thenBranch,
      elseBranch,
      span: this.state.span(ifToken, this.state.previous()),
    };
  }

  private whileExpression(whileToken: Token): Expression {
    this.state.consume(TokenType.OpenParen, "Expect '(' after 'while'.");
    const condition = this.parseExpression();
    this.state.consume(TokenType.CloseParen, "Expect ')' after condition.");
    const body = this.parseBlock("Expect '{' after while condition.");

    return {
      kind: "WhileExpr",
      condition,
      body,
      span: this.state.span(whileToken, this.state.previous()),
    };
  }

  private forExpression(forToken: Token): Expression {
    this.state.consume(TokenType.OpenParen, "Expect '(' after 'for'.");
    const variable = this.state.consume(
      TokenType.Identifier,
      "Expect loop variable name."
    ).lexeme;
    this.state.consume(TokenType.In, "Expect 'in' after loop variable.");
    const iterable = this.parseExpression();
    this.state.consume(TokenType.CloseParen, "Expect ')' after for clause.");
    const body = this.parseBlock("Expect '{' after for clause.");

    return {
      kind: "ForExpr",
      variable,
      iterable,
      body,
      span: this.state.span(forToken, this.state.previous()),
    };
  }

  private tryExpression(tryToken: Token): Expression {
    const body = this.parseBlock("Expect '{' after 'try'.");
    this.state.consume(TokenType.Catch, "Expect 'catch' after try block.");
    this.state.consume(TokenType.OpenParen, "Expect '(' after 'catch'.");
    const errorName = this.state.consume(
      TokenType.Identifier,
      "Expect error binding name."
    ).lexeme;
    this.state.consume(TokenType.CloseParen, "Expect ')' after error name.");
    const handler = this.parseBlock("Expect '{' after catch clause.");

    return {
      kind: "TryExpr",
      body,
      errorName,
      handler,
      span: this.state.span(tryToken, this.state.previous()),
    };
  }

  private fnExpression(fnToken: Token): Expression {
    const params = this.parseParams();
    const body = this.parseBlock("Expect '{' before function body.");
    return {
      kind: "FnExpr",
      params,
      body,
      span: this.state.span(fnToken, this.state.previous()),
    };
  }

  private getPrecedence(type: TokenType): Precedence {
    return PRECEDENCE[type] ?? Precedence.None;
  }
}
