import { describe, expect, it } from "vitest";
import { ErrorKind } from "../../main/ts/common/errors.js";
import { createTestSession, errorOf, evalKestrel, printed } from "./helpers.js";

const run = (source: string) => createTestSession().session.run(source);

describe("Evaluator", () => {
  describe("arithmetic", () => {
    it("should truncate integer division toward zero", () => {
      expect(evalKestrel("7 / 2")).toBe("3");
      expect(evalKestrel("-7 / 2")).toBe("-3");
      expect(evalKestrel("-7 % 3")).toBe("-1");
    });

    it("should promote mixed arithmetic to float", () => {
      expect(evalKestrel("1 + 2.5")).toBe("3.5");
      expect(evalKestrel("2 * 1.5")).toBe("3.0");
      expect(evalKestrel("1 == 1.0")).toBe("true");
    });

    it("should keep integers arbitrarily wide", () => {
      expect(evalKestrel("fn fact(n) { if (n <= 1) { return 1; } n * fact(n - 1) } fact(25)")).toBe(
        "15511210043330985984000000"
      );
    });

    it("should concatenate strings and lists", () => {
      expect(evalKestrel(`"ab" + "cd"`)).toBe("abcd");
      expect(evalKestrel("[1] + [2, 3]")).toBe("[1, 2, 3]");
    });

    it("should reject division by zero", () => {
      const error = errorOf(() => run("1 / 0"));
      expect(error.kind).toBe(ErrorKind.TypeError);
      expect(error.message).toBe("division by zero");
      expect(errorOf(() => run("1.5 / 0.0")).message).toBe("division by zero");
      expect(errorOf(() => run("5 % 0")).message).toBe("modulo by zero");
    });

    it("should reject mismatched operand types", () => {
      expect(errorOf(() => run(`1 + "a"`)).message).toBe(
        "unsupported operand types for +: int and string"
      );
    });
  });

  describe("conditions", () => {
    it("should apply truthiness rules", () => {
      expect(evalKestrel(`if ("") { 1 } else { 2 }`)).toBe("2");
      expect(evalKestrel("if ([0]) { 1 } else { 2 }")).toBe("1");
      expect(evalKestrel("if (0.0) { 1 } else if (none) { 2 } else { 3 }")).toBe("3");
    });

    it("should reject structs as conditions", () => {
      const error = errorOf(() => run("struct P { x } if (P(1)) { 1 }"));
      expect(error.kind).toBe(ErrorKind.TypeError);
      expect(error.message).toBe("P cannot be used as a condition");
    });

    it("should short-circuit logical operators", () => {
      expect(
        evalKestrel("let calls = 0; fn hit() { calls += 1; true } false && hit(); true || hit(); calls")
      ).toBe("0");
    });

    it("should evaluate if as an expression", () => {
      expect(evalKestrel(`let sign = if (-3 < 0) { "neg" } else { "pos" }; sign`)).toBe("neg");
    });
  });

  describe("scoping and closures", () => {
    it("should bind closures late", () => {
      expect(evalKestrel("let n = 1; fn get() { n } n = 5; get()")).toBe("5");
    });

    it("should keep state captured by a returned closure", () => {
      expect(
        evalKestrel(`
          fn counter() {
            let count = 0;
            fn () { count += 1; count }
          }
          let c = counter();
          c(); c(); c()
        `)
      ).toBe("3");
    });

    it("should give every loop iteration its own frame", () => {
      expect(
        evalKestrel("let fs = []; for (i in range(3)) { push(fs, fn () { i }); } fs[0]() + fs[2]()")
      ).toBe("2");
    });

    it("should shadow in blocks and rebind in the same frame", () => {
      expect(evalKestrel("let x = 1; { let x = 2; } x")).toBe("1");
      expect(evalKestrel("let x = 1; let x = x + 1; x")).toBe("2");
    });

    it("should reject unknown names", () => {
      const error = errorOf(() => run("missing + 1"));
      expect(error.kind).toBe(ErrorKind.UndefinedNameError);
      expect(error.message).toBe("undefined name 'missing'");
      expect(errorOf(() => run("nope = 1")).message).toBe("undefined name 'nope'");
    });
  });

  describe("loops", () => {
    it("should iterate lists and ranges", () => {
      expect(evalKestrel("let total = 0; for (i in range(5)) { total += i; } total")).toBe("10");
    });

    it("should honor break and continue", () => {
      expect(evalKestrel("let i = 0; while (true) { i += 1; if (i == 3) { break; } } i")).toBe("3");
      expect(
        evalKestrel(
          "let evens = []; for (n in range(6)) { if (n % 2 == 1) { continue; } push(evens, n); } evens"
        )
      ).toBe("[0, 2, 4]");
    });

    it("should iterate strings by code point", () => {
      expect(evalKestrel(`let out = ""; for (ch in "héllo") { out = ch + out; } out`)).toBe("olléh");
    });

    it("should reject break outside of a loop", () => {
      expect(errorOf(() => run("break;")).message).toBe("'break' outside of a loop");
    });
  });

  describe("functions", () => {
    it("should bind named arguments", () => {
      expect(evalKestrel("fn sub(a, b) { a - b } sub(b: 1, a: 5)")).toBe("4");
    });

    it("should reject a wrong argument count", () => {
      const error = errorOf(() => run("fn f(a) { a } f(1, 2)"));
      expect(error.kind).toBe(ErrorKind.ArityError);
      expect(error.message).toBe("'f' expects 1 argument(s) but got 2");
    });

    it("should return early and from the top level", () => {
      expect(evalKestrel("fn first(xs) { for (x in xs) { return x; } none } first([7, 8])")).toBe("7");
      expect(evalKestrel("return 5; 6")).toBe("5");
    });

    it("should stop runaway recursion", () => {
      const { session } = createTestSession({}, { maxCallDepth: 50 });
      const error = errorOf(() => session.run("fn down(n) { down(n + 1) } down(0)"));
      expect(error.kind).toBe(ErrorKind.TypeError);
      expect(error.message).toBe("maximum call depth exceeded");
    });

    it("should allow recursion up to the configured depth", () => {
      const countdown = "fn f(n) { if (n == 0) { 0 } else { f(n - 1) + 1 } } ";
      expect(evalKestrel(countdown + "f(99)", { maxCallDepth: 100 })).toBe("99");
      const error = errorOf(() => createTestSession({}, { maxCallDepth: 100 }).session.run(countdown + "f(100)"));
      expect(error.kind).toBe(ErrorKind.TypeError);
      expect(error.message).toBe("maximum call depth exceeded");
    });

    it("should recurse a few hundred calls deep by default", () => {
      expect(evalKestrel("fn f(n) { if (n == 0) { 0 } else { f(n - 1) + 1 } } f(200)")).toBe("200");
    });

    it("should report host stack exhaustion as the call depth error", () => {
      const countdown = "fn f(n) { if (n == 0) { 0 } else { f(n - 1) + 1 } } ";
      const config = { maxCallDepth: 1_000_000 };
      const error = errorOf(() => createTestSession({}, config).session.run(countdown + "f(100000)"));
      expect(error.kind).toBe(ErrorKind.TypeError);
      expect(error.message).toBe("maximum call depth exceeded");
      expect(evalKestrel(countdown + "try { f(100000) } catch (e) { [e.kind, e.message] }", config)).toBe(
        `["TypeError", "maximum call depth exceeded"]`
      );
    });

    it("should display callables", () => {
      expect(evalKestrel("fn f() {} [str(f), str(print), str(fn () {})]")).toBe(
        `["<fn f>", "<builtin print>", "<fn anonymous>"]`
      );
    });
  });

  describe("errors", () => {
    it("should catch runtime errors as Error structs", () => {
      expect(evalKestrel(`try { 1 / 0 } catch (e) { e.kind + ": " + e.message }`)).toBe(
        "TypeError: division by zero"
      );
    });

    it("should record where an error happened", () => {
      expect(evalKestrel("try {\n  undefinedThing\n} catch (e) { [e.line, e.column] }")).toBe("[2, 3]");
    });

    it("should catch thrown values", () => {
      expect(evalKestrel(`try { throw "boom"; } catch (e) { [e.kind, e.message] }`)).toBe(
        `["UserError", "boom"]`
      );
      expect(evalKestrel(`try { throw error("Custom", "bad"); } catch (e) { e.kind }`)).toBe("Custom");
    });

    it("should yield the body value when nothing is thrown", () => {
      expect(evalKestrel("try { 42 } catch (e) { 0 }")).toBe("42");
    });

    it("should surface uncaught throws as user errors", () => {
      const error = errorOf(() => run(`throw "boom";`));
      expect(error.kind).toBe(ErrorKind.UserError);
      expect(error.message).toBe("boom");
    });

    it("should raise failed assertions", () => {
      expect(errorOf(() => run(`assert(1 == 2, "math")`)).message).toBe("math");
      expect(evalKestrel("try { assert(false) } catch (e) { e.message }")).toBe("assertion failed");
    });
  });

  describe("builtins", () => {
    it("should print through the session sink", () => {
      expect(printed(`print("a", 1, [1, "b"], none, 2.0); print()`)).toEqual([
        `a 1 [1, "b"] none 2.0`,
        "",
      ]);
    });

    it("should name value types", () => {
      expect(
        evalKestrel("[type(1), type(1.5), type(\"s\"), type(true), type(none), type([]), type(print)]")
      ).toBe(`["int", "float", "string", "bool", "none", "list", "function"]`);
    });

    it("should convert between numbers and strings", () => {
      expect(evalKestrel(`int("42") + int(3.9)`)).toBe("45");
      expect(evalKestrel("float(2)")).toBe("2.0");
      expect(evalKestrel("str(1.5) + str(true)")).toBe("1.5true");
      expect(errorOf(() => run(`int("x")`)).message).toBe(`cannot convert "x" to int`);
    });

    it("should mutate lists in place", () => {
      expect(evalKestrel("let xs = [1, 2]; pop(xs) + len(xs)")).toBe("3");
      expect(evalKestrel("let a = [1]; let b = a; push(b, 2); a")).toBe("[1, 2]");
      expect(errorOf(() => run("pop([])")).message).toBe("pop from empty list");
    });

    it("should compare and show a list that contains itself", () => {
      expect(evalKestrel("let a = []; push(a, a); let b = []; push(b, b); [a == b, a != b, str(a)]")).toBe(
        `[true, false, "[[...]]"]`
      );
      expect(printed("let a = [1]; push(a, a); print(a);")).toEqual(["[1, [...]]"]);
      expect(evalKestrel("let a = [1]; push(a, a); let b = [2]; push(b, b); a == b")).toBe("false");
    });

    it("should build ranges and index sequences", () => {
      expect(evalKestrel("range(2, 5)")).toBe("[2, 3, 4]");
      expect(evalKestrel(`"abc"[1]`)).toBe("b");
      expect(evalKestrel(`len("héllo")`)).toBe("5");
      expect(errorOf(() => run("[1, 2][5]")).message).toBe("index 5 out of range for length 2");
    });

    it("should check builtin arity", () => {
      const error = errorOf(() => run("len()"));
      expect(error.kind).toBe(ErrorKind.ArityError);
      expect(error.message).toBe("'len' expects 1 argument(s) but got 0");
      expect(errorOf(() => run("range()")).message).toBe("'range' expects 1 to 2 argument(s) but got 0");
    });
  });

  it("should call statement hooks around every statement", () => {
    const kinds: string[] = [];
    const { session } = createTestSession({}, {}, {
      hooks: { beforeStatement: (stmt) => kinds.push(stmt.kind) },
    });
    session.run("let a = 1; fn f() { a } f()");
    expect(kinds).toEqual(["LetDecl", "FnDecl", "ExpressionStmt", "ExpressionStmt"]);
  });
});
