#!/usr/bin/env node
import chalk from "chalk";
import * as fs from "node:fs";
import * as path from "node:path";
import { fileURLToPath } from "node:url";
import { Diagnostic, DiagnosticReporter, DiagnosticSeverity } from "./common/diagnostics.js";
import { isKestrelError } from "./common/errors.js";
import { formatDiagnostic } from "./common/pretty.js";
import { KestrelConfig, loadConfig, validateConfig } from "./config/config.js";
import { TokenType, tokensToSource } from "./lexer/token.js";
import { ModuleHost, NodeModuleHost } from "./modules/host.js";
import { Session } from "./session.js";

const USAGE = `Kestrel

Usage:
  kestrel run <file>       evaluate a program
  kestrel expand <file>    print the macro-expanded token stream
  kestrel tokens <file>    print the lexed tokens

Options:
  --config <path>          read configuration from <path>`;

export interface CliIO {
  out: (line: string) => void;
  err: (line: string) => void;
  host: ModuleHost;
  /** Colors diagnostic headers; off when output is captured. */
  color?: boolean;
}

const defaultIO = (): CliIO => ({
  out: (line) => console.log(line),
  err: (line) => console.error(line),
  host: new NodeModuleHost(),
  color: process.stderr.isTTY,
});

function styleHeader(text: string, severity: DiagnosticSeverity): string {
  return severity === DiagnosticSeverity.Error ? chalk.red.bold(text) : chalk.yellow(text);
}

function sourceOf(diag: Diagnostic, host: ModuleHost): string | undefined {
  const file = diag.span?.sourceFile;
  if (file === undefined || file.startsWith("<")) return undefined;
  return host.realpath(file) === undefined ? undefined : host.read(file);
}

function parseArgs(argv: string[]): { command?: string; file?: string; configFile?: string } {
  const positional: string[] = [];
  let configFile: string | undefined;
  for (let i = 0; i < argv.length; i++) {
    if (argv[i] === "--config") {
      configFile = argv[++i];
    } else {
      positional.push(argv[i]);
    }
  }
  return { command: positional[0], file: positional[1], configFile };
}

/** Runs one CLI invocation and returns the process exit code. */
export function main(argv: string[], io: CliIO = defaultIO()): number {
  const { command, file, configFile } = parseArgs(argv);
  if (!command || !file || !["run", "expand", "tokens"].includes(command)) {
    io.err(USAGE);
    return 2;
  }

  let config: KestrelConfig;
  try {
    config = loadConfig({ configFile, cwd: io.host.cwd() });
  } catch (e) {
    io.err(`config: ${e instanceof Error ? e.message : String(e)}`);
    return 2;
  }
  const validation = validateConfig(config);
  for (const warning of validation.warnings) io.err(`config warning: ${warning}`);
  if (!validation.valid) {
    for (const error of validation.errors) io.err(`config error: ${error}`);
    return 2;
  }

  const reporter = new DiagnosticReporter({
    sink: (diag) =>
      io.err(
        formatDiagnostic(diag, sourceOf(diag, io.host), {
          styleHeader: io.color ? styleHeader : undefined,
        })
      ),
  });
  const session = new Session({ config, host: io.host, print: io.out, reporter });
  const target = path.resolve(io.host.cwd(), file);
  if (command !== "run" && io.host.realpath(target) === undefined) {
    io.err(`file not found: ${file}`);
    return 1;
  }
  try {
    switch (command) {
      case "run":
        session.runFile(file);
        break;
      case "expand":
        io.out(tokensToSource(session.expand(io.host.read(target), target)));
        break;
      case "tokens":
        for (const token of session.tokenize(io.host.read(target), target)) {
          io.out(`${token.line}:${token.column} ${TokenType[token.type]} ${JSON.stringify(token.lexeme)}`);
        }
        break;
    }
    return 0;
  } catch (e) {
    // The session has already reported it.
    if (!isKestrelError(e)) throw e;
    return 1;
  }
}

function invokedDirectly(): boolean {
  const entry = process.argv[1];
  if (entry === undefined || !fs.existsSync(entry)) return false;
  return fs.realpathSync(entry) === fs.realpathSync(fileURLToPath(import.meta.url));
}

if (invokedDirectly()) {
  process.exitCode = main(process.argv.slice(2));
}
