import { Diagnostic, DiagnosticSeverity } from "./diagnostics.js";
import { Span } from "./span.js";

export type FormatDiagnosticOptions = {
  contextLines?: number;
  /** Decorates the header line, e.g. with terminal colors. */
  styleHeader?: (text: string, severity: DiagnosticSeverity) => string;
};

function computeLineStarts(src: string): number[] {
  const starts = [0];
  for (let i = 0; i < src.length; i++) {
    if (src.charCodeAt(i) === 10 /* \n */) starts.push(i + 1);
  }
  return starts;
}

function getLineText(src: string, lineStarts: number[], line: number): string {
  const idx = Math.max(1, line) - 1;
  const start = lineStarts[idx] ?? 0;
  const end = lineStarts[idx + 1] ?? src.length;
  const raw = src.slice(start, end);
  return raw.endsWith("\n") ? raw.slice(0, -1) : raw;
}

function padLeft(s: string, width: number): string {
  if (s.length >= width) return s;
  return " ".repeat(width - s.length) + s;
}

function caretLine(col: number, width: number, lineNoWidth: number): string {
  const safeCol = Math.max(1, col);
  const carets = "^".repeat(Math.max(1, width));
  return `${" ".repeat(lineNoWidth)} | ${" ".repeat(safeCol - 1)}${carets}`;
}

function header(diag: Diagnostic): string {
  const severity = DiagnosticSeverity[diag.severity].toLowerCase();
  const label = diag.code ? `${severity}[${diag.code}]` : severity;
  const span = diag.span;
  if (!span) return `${label}: ${diag.message}`;
  return `${span.sourceFile}:${span.start.line}:${span.start.column} ${label}: ${diag.message}`;
}

function caretWidth(span: Span): number {
  if (span.end.line !== span.start.line) return 1;
  return span.end.column - span.start.column;
}

/**
 * Formats a single diagnostic into a header line followed by a code frame.
 *
 * `source` must be the text of `diag.span.sourceFile`.
 */
export function formatDiagnostic(
  diag: Diagnostic,
  source?: string,
  opts: FormatDiagnosticOptions = {}
): string {
  const style = opts.styleHeader ?? ((text: string) => text);
  const h = style(header(diag), diag.severity);
  if (!diag.span || source === undefined) return h;

  const span = diag.span;
  const contextLines = opts.contextLines ?? 0;
  const lineStarts = computeLineStarts(source);
  const lineNo = Math.max(1, span.start.line);
  const startLine = Math.max(1, lineNo - contextLines);
  const endLine = Math.min(lineStarts.length, lineNo + contextLines);
  const lineNoWidth = String(endLine).length;

  const lines: string[] = [h];
  for (let ln = startLine; ln <= endLine; ln++) {
    const txt = getLineText(source, lineStarts, ln);
    lines.push(`${padLeft(String(ln), lineNoWidth)} | ${txt}`);
    if (ln === lineNo) {
      lines.push(caretLine(span.start.column, caretWidth(span), lineNoWidth));
    }
  }
  return lines.join("\n");
}

export function formatDiagnostics(
  diags: readonly Diagnostic[],
  sourceByFile: Record<string, string>,
  opts: FormatDiagnosticOptions = {}
): string {
  return diags
    .map((d) => {
      const src = d.span ? sourceByFile[d.span.sourceFile] : undefined;
      return formatDiagnostic(d, src, opts);
    })
    .join("\n\n");
}
