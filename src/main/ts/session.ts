import * as path from "node:path";
import { Program } from "./ast/ast.js";
import { DiagnosticReporter } from "./common/diagnostics.js";
import { ErrorKind, KestrelError, fail, isKestrelError } from "./common/errors.js";
import { Result, attempt } from "./common/result.js";
import { Span } from "./common/span.js";
import { KestrelConfig, mergeConfigs } from "./config/config.js";
import { Evaluator, EvaluatorHooks } from "./eval/evaluator.js";
import { tokenize } from "./lexer/lexer.js";
import { Token } from "./lexer/token.js";
import { MacroExpander } from "./macro/expander.js";
import { MacroTable } from "./macro/table.js";
import { ModuleHost, NodeModuleHost } from "./modules/host.js";
import { Module, ModuleResolver } from "./modules/resolver.js";
import { Parser } from "./parser/parser.js";
import { Globals, createGlobals } from "./runtime/builtins.js";
import { Environment } from "./runtime/environment.js";
import { Value } from "./runtime/values.js";

export interface SessionOptions {
  /** Overrides on top of the defaults; use `loadConfig` for env and file layers. */
  config?: Partial<KestrelConfig>;
  host?: ModuleHost;
  /** Sink for `print`; defaults to `console.log`. */
  print?: (line: string) => void;
  hooks?: EvaluatorHooks;
  /** Receives every error that escapes a public entry point. Silent by default. */
  reporter?: DiagnosticReporter;
}

export interface RunResult {
  value: Value;
  /** Top-level frame of the evaluated source. */
  env: Environment;
  exports: string[];
}

const ENTRY_SPAN = (sourceFile: string): Span => ({
  start: { line: 1, column: 1, offset: 0 },
  end: { line: 1, column: 1, offset: 0 },
  sourceFile,
});

/**
 * One interpreter instance: the macro table, module cache and global frame
 * are shared by every file it processes and by nothing else.
 */
export class Session {
  readonly config: KestrelConfig;
  readonly host: ModuleHost;
  readonly macros = new MacroTable();
  readonly globals: Globals;
  readonly reporter: DiagnosticReporter;

  private readonly resolver: ModuleResolver;
  private readonly expander: MacroExpander;
  private readonly evaluator: Evaluator;

  constructor(options: SessionOptions = {}) {
    this.config = mergeConfigs(options.config ?? {});
    this.host = options.host ?? new NodeModuleHost();
    this.reporter = options.reporter ?? new DiagnosticReporter({ silent: true });
    this.globals = createGlobals();

    this.resolver = new ModuleResolver(
      this.host,
      (file, source) => {
        const result = this.evaluate(source, file);
        return { env: result.env, exports: result.exports };
      },
      { searchPaths: this.config.searchPaths, packagesDir: this.config.packagesDir }
    );
    this.expander = new MacroExpander(this.macros, {
      depthLimit: this.config.macroDepthLimit,
      loader: this.resolver,
    });
    this.evaluator = new Evaluator({
      globals: this.globals,
      loader: this.resolver,
      print: options.print,
      hooks: options.hooks,
      maxCallDepth: this.config.maxCallDepth,
      asmStepLimit: this.config.asmStepLimit,
      asmStackSize: this.config.asmStackSize,
      asmMemoryLimit: this.config.asmMemoryLimit,
    });
  }

  tokenize(source: string, sourceFile = "<input>"): Token[] {
    return this.guard(() => tokenize(source, sourceFile));
  }

  /** Lexed and macro-expanded tokens, as the parser will see them. */
  expand(source: string, sourceFile = "<input>"): Token[] {
    return this.guard(() => this.expanded(source, sourceFile));
  }

  parse(source: string, sourceFile = "<input>"): Program {
    return this.guard(() => this.parsed(source, sourceFile));
  }

  /** Evaluates `source` as a module and returns its last statement's value. */
  run(source: string, sourceFile = "<input>"): Value {
    return this.guard(() => this.evaluate(source, sourceFile).value);
  }

  /**
   * Runs a file as the entry module. Imports of the entry file from its own
   * dependencies are reported as cycles.
   */
  runFile(file: string): RunResult {
    return this.guard(() => {
      const requested = path.resolve(this.host.cwd(), file);
      const canonical = this.host.realpath(requested);
      if (canonical === undefined) {
        return fail(ErrorKind.ModuleNotFound, { path: file, tried: requested });
      }
      const source = this.host.read(canonical);
      return this.resolver.track(canonical, () => this.evaluate(source, canonical));
    });
  }

  tryRun(source: string, sourceFile = "<input>"): Result<Value, KestrelError> {
    return attempt(() => this.run(source, sourceFile), isKestrelError);
  }

  /** Loads a module the way `import` would from `fromFile`. */
  importModule(request: string, fromFile = "<input>"): Module {
    return this.guard(() => this.resolver.load(request, fromFile, ENTRY_SPAN(fromFile)));
  }

  /**
   * Calls the function a module exports as `name`, loading the module first if
   * needed. Arguments are passed positionally.
   */
  call(request: string, name: string, args: Value[] = [], fromFile = "<input>"): Value {
    return this.guard(() => {
      const span = ENTRY_SPAN(fromFile);
      const callee = this.resolver.load(request, fromFile, span).exports.get(name);
      if (callee === undefined) {
        return fail(ErrorKind.UndefinedNameError, { name, what: "export" }, span);
      }
      return this.evaluator.call(callee, args, span);
    });
  }

  private expanded(source: string, sourceFile: string): Token[] {
    return this.expander.expand(tokenize(source, sourceFile), sourceFile);
  }

  private parsed(source: string, sourceFile: string): Program {
    const tokens = this.expanded(source, sourceFile);
    return new Parser(tokens, sourceFile, new DiagnosticReporter({ silent: true })).parse();
  }

  private evaluate(source: string, sourceFile: string): RunResult {
    const program = this.parsed(source, sourceFile);
    const env = new Environment(this.globals.env);
    const { value, exports } = this.evaluator.evaluateModule(program, env);
    return { value, env, exports };
  }

  private guard<T>(fn: () => T): T {
    try {
      return fn();
    } catch (e) {
      if (isKestrelError(e)) this.reporter.report(e.toDiagnostic());
      throw e;
    }
  }
}
