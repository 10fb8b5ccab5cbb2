import * as path from "node:path";
import { ErrorKind, fail } from "../common/errors.js";
import { Span } from "../common/span.js";
import { ModuleLoader } from "../eval/evaluator.js";
import { IncludeLoader } from "../macro/expander.js";
import { Environment, Namespace } from "../runtime/environment.js";
import { Value, deepFreeze } from "../runtime/values.js";
import { ModuleHost } from "./host.js";

export const SOURCE_EXTENSION = ".kes";

export class Module implements Namespace {
  constructor(
    readonly path: string,
    readonly env: Environment,
    readonly exports: ReadonlyMap<string, Value>
  ) {}
}

/** Lexes, expands, parses and evaluates one file into its top-level frame. */
export type ModuleCompiler = (
  canonicalPath: string,
  source: string
) => { env: Environment; exports: string[] };

export interface ResolverOptions {
  searchPaths?: string[];
  packagesDir?: string;
}

/**
 * Locates modules on disk (or any {@link ModuleHost}), evaluates each at most
 * once per canonical path, and rejects import cycles.
 */
export class ModuleResolver implements ModuleLoader, IncludeLoader {
  private readonly cache = new Map<string, Module>();
  private readonly loading: string[] = [];
  private readonly roots: string[];

  constructor(
    readonly host: ModuleHost,
    private readonly compile: ModuleCompiler,
    options: ResolverOptions = {}
  ) {
    this.roots = [...(options.searchPaths ?? [])];
    if (options.packagesDir) this.roots.push(options.packagesDir);
  }

  /** Candidate files for `request` as seen from `fromFile`, in lookup order. */
  candidates(request: string, fromFile: string): string[] {
    const normalized = request.split("::").join("/");
    const withExt = (file: string) => (path.extname(file) === "" ? file + SOURCE_EXTENSION : file);

    if (path.isAbsolute(normalized)) return [withExt(normalized)];

    const importerDir = fromFile.startsWith("<") ? this.host.cwd() : path.dirname(fromFile);
    if (normalized.startsWith("./") || normalized.startsWith("../")) {
      return [withExt(path.resolve(importerDir, normalized))];
    }

    const bare = !normalized.includes("/") && path.extname(normalized) === "";
    const result: string[] = [];
    for (const root of [importerDir, ...this.roots]) {
      const base = path.resolve(this.host.cwd(), root);
      result.push(withExt(path.join(base, normalized)));
      if (bare) result.push(withExt(path.join(base, normalized, normalized)));
    }
    return result;
  }

  locate(request: string, fromFile: string, span?: Span): string {
    const tried = this.candidates(request, fromFile);
    for (const candidate of tried) {
      const found = this.host.realpath(candidate);
      if (found !== undefined) return found;
    }
    return fail(ErrorKind.ModuleNotFound, { path: request, tried: tried.join(", ") }, span);
  }

  read(canonicalPath: string): string {
    return this.host.read(canonicalPath);
  }

  load(request: string, fromFile: string, span: Span): Module {
    const target = this.locate(request, fromFile, span);
    const cached = this.cache.get(target);
    if (cached) return cached;

    if (this.loading.includes(target)) {
      const chain = [...this.loading.slice(this.loading.indexOf(target)), target]
        .map((file) => this.displayPath(file))
        .join(" -> ");
      return fail(ErrorKind.CircularImport, { chain }, span);
    }

    return this.track(target, () => {
      const { env, exports } = this.compile(target, this.host.read(target));
      const values = new Map<string, Value>();
      for (const name of exports) {
        const value = env.getOwn(name);
        if (value !== undefined) {
          deepFreeze(value);
          values.set(name, value);
        }
      }
      env.freeze();
      const module = new Module(target, env, values);
      this.cache.set(target, module);
      return module;
    });
  }

  /** Runs `fn` with `file` on the loading stack so imports back into it are cycles. */
  track<T>(file: string, fn: () => T): T {
    this.loading.push(file);
    try {
      return fn();
    } finally {
      this.loading.pop();
    }
  }

  private displayPath(file: string): string {
    const relative = path.relative(this.host.cwd(), file);
    return relative.startsWith("..") ? file : relative;
  }
}
