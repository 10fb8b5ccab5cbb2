import * as fs from "node:fs";
import * as path from "node:path";

/** File access the resolver needs; swapped for an in-memory map in tests. */
export interface ModuleHost {
  /** Canonical path of an existing file, or undefined when there is none. */
  realpath(file: string): string | undefined;
  read(file: string): string;
  cwd(): string;
}

export class NodeModuleHost implements ModuleHost {
  realpath(file: string): string | undefined {
    try {
      if (!fs.statSync(file).isFile()) return undefined;
      return fs.realpathSync(file);
    } catch (e) {
      if (isMissing(e)) return undefined;
      throw e;
    }
  }

  read(file: string): string {
    return fs.readFileSync(file, "utf-8");
  }

  cwd(): string {
    return process.cwd();
  }
}

function isMissing(e: unknown): boolean {
  return (
    e instanceof Error &&
    "code" in e &&
    (e.code === "ENOENT" || e.code === "ENOTDIR")
  );
}

/** Files keyed by absolute path. */
export class MemoryModuleHost implements ModuleHost {
  private readonly files = new Map<string, string>();

  constructor(
    files: Record<string, string> = {},
    private readonly root = "/"
  ) {
    for (const [name, source] of Object.entries(files)) this.write(name, source);
  }

  write(file: string, source: string) {
    this.files.set(path.posix.resolve(this.root, file), source);
  }

  realpath(file: string): string | undefined {
    const resolved = path.posix.resolve(this.root, file);
    return this.files.has(resolved) ? resolved : undefined;
  }

  read(file: string): string {
    const source = this.files.get(path.posix.resolve(this.root, file));
    if (source === undefined) throw new Error(`no such file: ${file}`);
    return source;
  }

  cwd(): string {
    return this.root;
  }
}
