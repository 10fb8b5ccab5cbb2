import {
  AsmDecl,
  Expression,
  FieldDecl,
  FnDecl,
  ImportDecl,
  LetDecl,
  Program,
  Statement,
  StructDecl,
} from "../ast/ast.js";
import { DiagnosticReporter } from "../common/diagnostics.js";
import { isKestrelError } from "../common/errors.js";
import { Token, TokenType } from "../lexer/token.js";
import { readDefinition } from "../macro/definitions.js";
import { AsmHeaderParser } from "./asm.js";
import { BLOCK_LIKE, ExpressionParser } from "./expressions.js";
import { ParserState } from "./state.js";

/**
 * Builds the AST for one macro-expanded token stream. Parsing stops at the
 * first error: it is reported once and rethrown.
 */
export class Parser {
  private readonly state: ParserState;
  private readonly expressionParser: ExpressionParser;
  private readonly asmParser: AsmHeaderParser;

  constructor(
    tokens: Token[],
    sourceFile: string,
    reporter: DiagnosticReporter
  ) {
    this.state = new ParserState(tokens, sourceFile, reporter);
    this.expressionParser = new ExpressionParser(this.state, () =>
      this.declaration()
    );
    this.asmParser = new AsmHeaderParser(this.state);
  }

  parse(): Program {
    const statements: Statement[] = [];
    const startToken = this.state.peek();

    try {
      while (!this.state.isAtEnd()) {
        statements.push(this.declaration());
      }
    } catch (e) {
      if (isKestrelError(e)) this.state.reporter.report(e.toDiagnostic());
      throw e;
    }

    return {
      kind: "Program",
      statements,
      span: this.state.span(startToken, this.state.peek()),
    };
  }

  private declaration(): Statement {
    if (this.state.match(TokenType.Export)) return this.exported();

    if (this.state.match(TokenType.Import)) return this.importDeclaration();
    if (this.state.match(TokenType.From)) return this.fromImport();
    if (this.state.match(TokenType.Let)) return this.letDeclaration(false);
    if (this.state.check(TokenType.Fn) && this.state.checkNext(TokenType.Identifier)) {
      this.state.advance();
      return this.fnDeclaration(false);
    }
    if (this.state.match(TokenType.Struct)) return this.structDeclaration(false);
    if (this.state.check(TokenType.Asm) && this.state.checkNext(TokenType.Identifier)) {
      this.state.advance();
      return this.asmDeclaration(false);
    }
    if (this.state.check(TokenType.Macro) || this.state.check(TokenType.Keyword)) {
      return this.macroDeclaration();
    }

    return this.statement();
  }

  private exported(): Statement {
    const start = this.state.previous();
    let decl: LetDecl | FnDecl | StructDecl | AsmDecl;
    if (this.state.match(TokenType.Let)) {
      decl = this.letDeclaration(true);
    } else if (this.state.match(TokenType.Fn)) {
      decl = this.fnDeclaration(true);
    } else if (this.state.match(TokenType.Struct)) {
      decl = this.structDeclaration(true);
    } else if (this.state.match(TokenType.Asm)) {
      decl = this.asmDeclaration(true);
    } else {
      throw this.state.error(
        this.state.peek(),
        "Expect 'let', 'fn', 'struct' or 'asm' after 'export'."
      );
    }
    decl.span = this.state.span(start, this.state.previous());
    return decl;
  }

  private importDeclaration(): ImportDecl {
    const start = this.state.previous();
    const path = this.modulePath();

    let alias: string | undefined;
    if (this.state.match(TokenType.As)) {
      alias = this.state.consume(TokenType.Identifier, "Expect alias name after 'as'.").lexeme;
    }
    this.endStatement("Expect ';' after import.");

    return {
      kind: "ImportDecl",
      path,
      alias,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private fromImport(): ImportDecl {
    const start = this.state.previous();
    const path = this.modulePath();
    this.state.consume(TokenType.Import, "Expect 'import' after module path.");

    const members: { name: string; span: ImportDecl["span"] }[] = [];
    do {
      const member = this.state.consume(TokenType.Identifier, "Expect member name.");
      members.push({ name: member.lexeme, span: this.state.tokenSpan(member) });
    } while (this.state.match(TokenType.Comma));
    this.endStatement("Expect ';' after import.");

    return {
      kind: "ImportDecl",
      path,
      members,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private modulePath(): string {
    const token = this.state.consume(TokenType.String, "Expect module path string.");
    return String(token.literal ?? "");
  }

  private letDeclaration(exported: boolean): LetDecl {
    const start = this.state.previous();
    const name = this.state.consume(TokenType.Identifier, "Expect variable name.").lexeme;
    this.state.consume(TokenType.Equal, "Expect '=' before initializer.");
    const initializer = this.expression();
    this.endStatement("Expect ';' after variable declaration.");

    return {
      kind: "LetDecl",
      exported,
      name,
      initializer,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private fnDeclaration(exported: boolean): FnDecl {
    const start = this.state.previous();
    const name = this.state.consume(TokenType.Identifier, "Expect function name.").lexeme;
    const params = this.expressionParser.parseParams();
    const body = this.expressionParser.parseBlock("Expect '{' before function body.");
    this.state.match(TokenType.Semicolon);

    return {
      kind: "FnDecl",
      exported,
      name,
      params,
      body,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private structDeclaration(exported: boolean): StructDecl {
    const start = this.state.previous();
    const name = this.state.consume(TokenType.Identifier, "Expect struct name.").lexeme;

    this.state.consume(TokenType.OpenBrace, "Expect '{' before struct fields.");
    const fields: FieldDecl[] = [];
    while (!this.state.check(TokenType.CloseBrace)) {
      const fieldToken = this.state.consume(TokenType.Identifier, "Expect field name.");
      if (fields.some((f) => f.name === fieldToken.lexeme)) {
        throw this.state.error(fieldToken, `Duplicate field '${fieldToken.lexeme}'.`);
      }
      const optional = this.state.match(TokenType.Question);
      let defaultValue: Expression | undefined;
      if (this.state.match(TokenType.Equal)) {
        defaultValue = this.expression();
      }
      fields.push({
        name: fieldToken.lexeme,
        defaultValue,
        optional: optional || defaultValue !== undefined,
        span: this.state.span(fieldToken, this.state.previous()),
      });
      if (!this.state.match(TokenType.Comma)) break;
    }
    this.state.consume(TokenType.CloseBrace, "Expect '}' after struct fields.");
    this.state.match(TokenType.Semicolon);

    return {
      kind: "StructDecl",
      exported,
      name,
      fields,
      span: this.state.span(start, this.state.previous()),
    };
  }

  private asmDeclaration(exported: boolean): AsmDecl {
    const start = this.state.previous();
    const name = this.state.consume(TokenType.Identifier, "Expect asm block name.").lexeme;
    const source = this.asmParser.parseSource();
    this.state.match(TokenType.Semicolon);

    return {
      kind: "AsmDecl",
      exported,
      name,
      source,
      span: this.state.span(start, this.state.previous()),
    };
  }

  /** The macro engine already registered these; the node only marks where. */
  private macroDeclaration(): Statement {
    const start = this.state.peek();
    const { value, end } = readDefinition(this.state.tokens, this.state.current);
    this.state.current = end;
    this.state.match(TokenType.Semicolon);
    const span = this.state.span(start, this.state.previous());

    if (value.kind === "macro") {
      return { kind: "MacroDecl", name: value.name, params: value.params, body: value.body, span };
    }
    return {
      kind: "KeywordDecl",
      name: value.name,
      pattern: value.pattern,
      template: value.template,
      span,
    };
  }

  private statement(): Statement {
    const start = this.state.peek();

    if (this.state.match(TokenType.Return)) {
      let value: Expression | undefined;
      if (!this.atStatementEnd()) value = this.expression();
      this.endStatement("Expect ';' after return value.");
      return { kind: "ReturnStmt", value, span: this.state.span(start, this.state.previous()) };
    }
    if (this.state.match(TokenType.Break)) {
      this.endStatement("Expect ';' after 'break'.");
      return { kind: "BreakStmt", span: this.state.span(start, this.state.previous()) };
    }
    if (this.state.match(TokenType.Continue)) {
      this.endStatement("Expect ';' after 'continue'.");
      return { kind: "ContinueStmt", span: this.state.span(start, this.state.previous()) };
    }
    if (this.state.match(TokenType.Throw)) {
      const value = this.expression();
      this.endStatement("Expect ';' after thrown value.");
      return { kind: "ThrowStmt", value, span: this.state.span(start, this.state.previous()) };
    }

    return this.expressionStatement();
  }

  private expressionStatement(): Statement {
    // A leading if, loop, try, asm or block is a complete statement on its own.
    const expression = BLOCK_LIKE.has(this.state.peek().type)
      ? this.expressionParser.parseBlockLike()
      : this.expression();
    this.endStatement("Expect ';' after expression.");
    return {
      kind: "ExpressionStmt",
      expression,
      span: expression.span,
    };
  }

  /**
   * `;` ends a statement. It may be left out before `}`, at end of input, and
   * after anything that itself ends in a block.
   */
  private endStatement(message: string) {
    if (this.state.match(TokenType.Semicolon)) return;
    const last = this.state.previous().type;
    if (last === TokenType.CloseBrace || last === TokenType.AsmBody) return;
    if (this.atStatementEnd()) return;
    throw this.state.error(this.state.peek(), message);
  }

  private atStatementEnd(): boolean {
    return (
      this.state.isAtEnd() ||
      this.state.check(TokenType.Semicolon) ||
      this.state.check(TokenType.CloseBrace)
    );
  }

  private expression(): Expression {
    return this.expressionParser.parseExpression();
  }
}

export function parse(
  tokens: Token[],
  sourceFile = "<input>",
  reporter = new DiagnosticReporter({ silent: true })
): Program {
  return new Parser(tokens, sourceFile, reporter).parse();
}
