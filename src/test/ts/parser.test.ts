import { beforeEach, describe, expect, it, vi } from "vitest";
import { Parser } from "../../main/ts/parser/parser.js";
import { tokenize } from "../../main/ts/lexer/lexer.js";
import { DiagnosticReporter } from "../../main/ts/common/diagnostics.js";
import { ErrorKind, KestrelError } from "../../main/ts/common/errors.js";
import { Expression, Program, Statement } from "../../main/ts/ast/ast.js";

type StatementOf<K extends Statement["kind"]> = Extract<Statement, { kind: K }>;
type ExpressionOf<K extends Expression["kind"]> = Extract<Expression, { kind: K }>;

function isStatement<K extends Statement["kind"]>(stmt: Statement, kind: K): stmt is StatementOf<K> {
  return stmt.kind === kind;
}

function isExpression<K extends Expression["kind"]>(expr: Expression, kind: K): expr is ExpressionOf<K> {
  return expr.kind === kind;
}

function statement<K extends Statement["kind"]>(program: Program, index: number, kind: K): StatementOf<K> {
  const stmt = program.statements[index];
  if (!isStatement(stmt, kind)) throw new Error(`expected ${kind}, got ${stmt.kind}`);
  return stmt;
}

function expression<K extends Expression["kind"]>(expr: Expression, kind: K): ExpressionOf<K> {
  if (!isExpression(expr, kind)) throw new Error(`expected ${kind}, got ${expr.kind}`);
  return expr;
}

describe("Parser", () => {
  let reporter: DiagnosticReporter;

  const parseProgram = (source: string) =>
    new Parser(tokenize(source, "test.kes"), "test.kes", reporter).parse();

  const parseError = (source: string): KestrelError => {
    try {
      parseProgram(source);
    } catch (e) {
      if (e instanceof KestrelError) return e;
      throw e;
    }
    throw new Error("expected a parse error");
  };

  beforeEach(() => {
    reporter = new DiagnosticReporter({ silent: true });
    vi.spyOn(reporter, "report");
  });

  it("should parse basic declarations", () => {
    const program = parseProgram(`
      import "./geometry" as geo;
      export let origin = 0;
      fn add(a, b) { a + b }
      struct Point { x, y = 0, label? }
      export asm twice(n: rdi) -> rax {
        lea rax, [rdi + rdi]
      }
    `);

    expect(reporter.report).not.toHaveBeenCalled();
    expect(program.statements.map((s) => s.kind)).toEqual([
      "ImportDecl",
      "LetDecl",
      "FnDecl",
      "StructDecl",
      "AsmDecl",
    ]);
    expect(statement(program, 1, "LetDecl").exported).toBe(true);
    expect(statement(program, 2, "FnDecl").params).toEqual(["a", "b"]);
    expect(statement(program, 4, "AsmDecl").exported).toBe(true);
  });

  it("should parse struct field modifiers", () => {
    const struct = statement(parseProgram("struct Point { x, y = 0, label? }"), 0, "StructDecl");
    expect(struct.fields.map((f) => [f.name, f.optional, f.defaultValue !== undefined])).toEqual([
      ["x", false, false],
      ["y", true, true],
      ["label", true, false],
    ]);
  });

  it("should parse every import form", () => {
    const program = parseProgram(`
      import "./geometry";
      import "./geometry" as geo;
      from "std::math" import sqrt, pi;
    `);
    const merge = statement(program, 0, "ImportDecl");
    expect(merge.path).toBe("./geometry");
    expect(merge.alias).toBeUndefined();
    expect(merge.members).toBeUndefined();
    expect(statement(program, 1, "ImportDecl").alias).toBe("geo");
    const from = statement(program, 2, "ImportDecl");
    expect(from.path).toBe("std::math");
    expect(from.members?.map((m) => m.name)).toEqual(["sqrt", "pi"]);
  });

  it("should respect operator precedence", () => {
    const program = parseProgram("1 + 2 * 3 == 7 && !done;");
    const and = expression(statement(program, 0, "ExpressionStmt").expression, "BinaryExpr");
    expect(and.operator.lexeme).toBe("&&");
    const eq = expression(and.left, "BinaryExpr");
    expect(eq.operator.lexeme).toBe("==");
    const sum = expression(eq.left, "BinaryExpr");
    expect(sum.operator.lexeme).toBe("+");
    expect(expression(sum.right, "BinaryExpr").operator.lexeme).toBe("*");
    expect(expression(and.right, "UnaryExpr").operator.lexeme).toBe("!");
  });

  it("should parse named call arguments", () => {
    const program = parseProgram("Point(1, y: 2);");
    const call = expression(statement(program, 0, "ExpressionStmt").expression, "CallExpr");
    expect(call.args.map((a) => a.name)).toEqual([undefined, "y"]);
  });

  it("should parse assignment targets", () => {
    const program = parseProgram("p.x = 1; xs[0] += 2; total = total + 1;");
    const targets = program.statements.map((s) => {
      if (!isStatement(s, "ExpressionStmt")) throw new Error(s.kind);
      return expression(s.expression, "AssignExpr").target.kind;
    });
    expect(targets).toEqual(["AccessExpr", "IndexExpr", "IdentifierExpr"]);
  });

  it("should treat a leading block-like expression as a statement", () => {
    const program = parseProgram(`
      if (a) { 1 } else if (b) { 2 } else { 3 }
      while (false) { break; }
      for (item in items) { continue }
      try { throw "x"; } catch (err) { err }
      -1
    `);
    expect(program.statements).toHaveLength(5);
    const ifExpr = expression(statement(program, 0, "ExpressionStmt").expression, "IfExpr");
    expect(ifExpr.elseBranch?.kind).toBe("IfExpr");
    expect(statement(program, 3, "ExpressionStmt").expression.kind).toBe("TryExpr");
    expect(statement(program, 4, "ExpressionStmt").expression.kind).toBe("UnaryExpr");
  });

  it("should allow omitting the last semicolon of a block or file", () => {
    const program = parseProgram("fn f() { let a = 1; a } f()");
    expect(program.statements.map((s) => s.kind)).toEqual(["FnDecl", "ExpressionStmt"]);
  });

  it("should parse anonymous functions and inline asm as expressions", () => {
    const program = parseProgram(`
      let inc = fn (n) { n + 1 };
      let y = asm (x: rax) -> rax memory 16 { inc rax };
    `);
    expect(statement(program, 0, "LetDecl").initializer.kind).toBe("FnExpr");
    const asm = expression(statement(program, 1, "LetDecl").initializer, "AsmExpr");
    expect(asm.source.bindings.map((b) => [b.name, b.location.kind])).toEqual([["x", "Register"]]);
    expect(asm.source.exits).toMatchObject({ kind: "Single", location: { kind: "Register", name: "rax" } });
    expect(asm.source.memorySize).toBe(16);
    expect(asm.source.text).toBe(" inc rax ");
  });

  it("should parse asm memory slots and tuple exits", () => {
    const program = parseProgram(`
      asm sum(xs: mem[0; 4]) -> (total: rax, last: mem[32]) {
        mov rax, [0]
      }
    `);
    const { source } = statement(program, 0, "AsmDecl");
    expect(source.bindings[0].location).toMatchObject({ kind: "Memory", offset: 0, count: 4 });
    expect(source.exits.kind).toBe("Tuple");
    if (source.exits.kind !== "Tuple") return;
    expect(source.exits.bindings.map((b) => b.name)).toEqual(["total", "last"]);
    expect(source.exits.bindings[1].location).toMatchObject({ kind: "Memory", offset: 32 });
  });

  it("should keep macro definitions as opaque declarations", () => {
    const program = parseProgram(`
      macro twice($e) { $e + $e }
      keyword unless $c $body => { if (!$c) $body }
    `);
    const macro = statement(program, 0, "MacroDecl");
    expect(macro.name).toBe("twice");
    expect(macro.params).toEqual(["e"]);
    expect(macro.body.map((t) => t.lexeme)).toEqual(["$e", "+", "$e"]);
    const keyword = statement(program, 1, "KeywordDecl");
    expect(keyword.pattern.map((t) => t.lexeme)).toEqual(["$c", "$body"]);
  });

  it("should report a missing semicolon once and rethrow", () => {
    const error = parseError("let x = 1 let y = 2;");
    expect(error.kind).toBe(ErrorKind.ParseError);
    expect(error.message).toBe("Expect ';' after variable declaration. Found 'let'.");
    expect(error.span?.start.column).toBe(11);
    expect(reporter.report).toHaveBeenCalledTimes(1);
  });

  it("should name end of input in errors", () => {
    expect(parseError("let x =").message).toBe("Expect expression. Found 'end of input'.");
  });

  it("should reject duplicate struct fields", () => {
    expect(parseError("struct P { x, x }").message).toBe("Duplicate field 'x'. Found 'x'.");
  });

  it("should reject invalid assignment targets", () => {
    expect(parseError("1 = 2;").message).toBe("Invalid assignment target. Found '='.");
  });
});
