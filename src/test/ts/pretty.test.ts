import { afterEach, describe, expect, it, vi } from "vitest";
import { Diagnostic, DiagnosticReporter, DiagnosticSeverity } from "../../main/ts/common/diagnostics.js";
import { formatDiagnostic, formatDiagnostics } from "../../main/ts/common/pretty.js";

const SOURCE = "let a = 1;\nlet b = a +;\nprint(b);";

const parseError: Diagnostic = {
  severity: DiagnosticSeverity.Error,
  code: "ParseError",
  message: "Expect expression. Found ';'.",
  span: {
    start: { line: 2, column: 12, offset: 22 },
    end: { line: 2, column: 13, offset: 23 },
    sourceFile: "main.kes",
  },
};

describe("formatDiagnostic", () => {
  it("should print a header without a span", () => {
    expect(
      formatDiagnostic({ severity: DiagnosticSeverity.Error, code: "TypeError", message: "boom" })
    ).toBe("error[TypeError]: boom");
    expect(formatDiagnostic({ severity: DiagnosticSeverity.Warning, message: "careful" })).toBe(
      "warning: careful"
    );
  });

  it("should print only the header when the source is unknown", () => {
    expect(formatDiagnostic(parseError)).toBe("main.kes:2:12 error[ParseError]: Expect expression. Found ';'.");
  });

  it("should underline the span in a code frame", () => {
    expect(formatDiagnostic(parseError, SOURCE)).toBe(
      [
        "main.kes:2:12 error[ParseError]: Expect expression. Found ';'.",
        "2 | let b = a +;",
        "  |            ^",
      ].join("\n")
    );
  });

  it("should include context lines", () => {
    expect(formatDiagnostic(parseError, SOURCE, { contextLines: 1 }).split("\n")).toEqual([
      "main.kes:2:12 error[ParseError]: Expect expression. Found ';'.",
      "1 | let a = 1;",
      "2 | let b = a +;",
      "  |            ^",
      "3 | print(b);",
    ]);
  });

  it("should size the caret to single-line spans", () => {
    const start = { line: 1, column: 5, offset: 4 };
    const word: Diagnostic = {
      ...parseError,
      span: { start, end: { line: 1, column: 6, offset: 5 }, sourceFile: "main.kes" },
    };
    const value: Diagnostic = {
      ...parseError,
      span: { start: { line: 1, column: 9, offset: 8 }, end: { line: 1, column: 10, offset: 9 }, sourceFile: "main.kes" },
    };
    const multiline: Diagnostic = {
      ...parseError,
      span: { start, end: { line: 3, column: 1, offset: 23 }, sourceFile: "main.kes" },
    };
    const keyword: Diagnostic = {
      ...parseError,
      span: { start: { line: 1, column: 1, offset: 0 }, end: { line: 1, column: 4, offset: 3 }, sourceFile: "main.kes" },
    };
    expect(formatDiagnostic(word, SOURCE).split("\n")[2]).toBe("  |     ^");
    expect(formatDiagnostic(value, SOURCE).split("\n")[2]).toBe("  |         ^");
    expect(formatDiagnostic(multiline, SOURCE).split("\n")[2]).toBe("  |     ^");
    expect(formatDiagnostic(keyword, SOURCE).split("\n")[2]).toBe("  | ^^^");
  });

  it("should style the header only", () => {
    const styled = formatDiagnostic(parseError, SOURCE, {
      styleHeader: (text, severity) => `<${DiagnosticSeverity[severity]}>${text}`,
    });
    expect(styled.split("\n")[0]).toBe(
      "<Error>main.kes:2:12 error[ParseError]: Expect expression. Found ';'."
    );
    expect(styled.split("\n")[1]).toBe("2 | let b = a +;");
  });
});

describe("formatDiagnostics", () => {
  it("should separate diagnostics with a blank line", () => {
    const other: Diagnostic = { severity: DiagnosticSeverity.Error, code: "UserError", message: "boom" };
    expect(formatDiagnostics([other, parseError], { "main.kes": SOURCE })).toBe(
      [
        "error[UserError]: boom",
        "",
        "main.kes:2:12 error[ParseError]: Expect expression. Found ';'.",
        "2 | let b = a +;",
        "  |            ^",
      ].join("\n")
    );
  });
});

describe("DiagnosticReporter", () => {
  it("should collect diagnostics and track errors", () => {
    const reporter = new DiagnosticReporter({ silent: true });
    reporter.report({ severity: DiagnosticSeverity.Warning, message: "careful" });
    expect(reporter.hasErrors()).toBe(false);
    reporter.report(parseError);
    expect(reporter.hasErrors()).toBe(true);
    expect(reporter.getDiagnostics()).toHaveLength(2);
    reporter.clear();
    expect(reporter.getDiagnostics()).toEqual([]);
  });

  afterEach(() => {
    vi.restoreAllMocks();
  });

  it("should print to the console unless silent", () => {
    const error = vi.spyOn(console, "error").mockImplementation(() => undefined);
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);
    const reporter = new DiagnosticReporter();
    reporter.report(parseError);
    reporter.report({ severity: DiagnosticSeverity.Warning, message: "careful" });
    expect(error.mock.calls).toEqual([["main.kes:2:12 - [ERROR] Expect expression. Found ';'."]]);
    expect(log.mock.calls).toEqual([["[WARNING] careful"]]);
    new DiagnosticReporter({ silent: true }).report(parseError);
    expect(error).toHaveBeenCalledTimes(1);
  });

  it("should hand diagnostics to a sink", () => {
    const seen: string[] = [];
    const reporter = new DiagnosticReporter({ sink: (d) => seen.push(formatDiagnostic(d, SOURCE)) });
    reporter.report(parseError);
    expect(seen).toEqual([
      ["main.kes:2:12 error[ParseError]: Expect expression. Found ';'.", "2 | let b = a +;", "  |            ^"].join("\n"),
    ]);
  });
});
