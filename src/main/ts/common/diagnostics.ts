import { Span } from "./span.js";

export enum DiagnosticSeverity {
  Error,
  Warning,
  Info,
  Hint,
}

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  /** Error kind for runtime and front-end failures, e.g. `ParseError`. */
  code?: string;
  span?: Span;
}

export interface ReporterOptions {
  /** Record diagnostics without printing them. */
  silent?: boolean;
  /** Replaces the console output, e.g. with a code-frame printer. */
  sink?: (diagnostic: Diagnostic) => void;
}

export class DiagnosticReporter {
  private diagnostics: Diagnostic[] = [];
  private readonly silent: boolean;
  private readonly sink: (diagnostic: Diagnostic) => void;

  constructor(options: ReporterOptions = {}) {
    this.silent = options.silent ?? false;
    this.sink = options.sink ?? ((diagnostic) => this.printDiagnostic(diagnostic));
  }

  report(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic);
    if (!this.silent) this.sink(diagnostic);
  }

  private printDiagnostic(diagnostic: Diagnostic) {
    const severityStr = DiagnosticSeverity[diagnostic.severity].toUpperCase();
    let message = `[${severityStr}] ${diagnostic.message}`;

    if (diagnostic.span) {
      const { start, sourceFile } = diagnostic.span;
      message = `${sourceFile}:${start.line}:${start.column} - ${message}`;
    }

    if (diagnostic.severity === DiagnosticSeverity.Error) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  hasErrors(): boolean {
    return this.diagnostics.some(
      (d) => d.severity === DiagnosticSeverity.Error
    );
  }

  getDiagnostics(): Diagnostic[] {
    return this.diagnostics;
  }

  clear() {
    this.diagnostics = [];
  }
}
