import * as fs from "node:fs";
import * as path from "node:path";

// =========================================================================
// Configuration Types
// =========================================================================

export type KestrelConfig = {
  /** Import search roots, tried in order after the importing file's directory */
  searchPaths: string[];
  /** Directory a package manager installs into; searched last */
  packagesDir?: string;
  /** Maximum nesting of macro and keyword expansions */
  macroDepthLimit: number;
  /** Maximum depth of nested function calls */
  maxCallDepth: number;
  /** Maximum instructions one assembly block may execute */
  asmStepLimit: number;
  /** Bytes of stack appended to every assembly block's memory region */
  asmStackSize: number;
  /** Largest memory region, data plus stack, one assembly block may allocate */
  asmMemoryLimit: number;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_CONFIG: KestrelConfig = {
  searchPaths: [],
  macroDepthLimit: 64,
  maxCallDepth: 256,
  asmStepLimit: 1_000_000,
  asmStackSize: 256,
  asmMemoryLimit: 1 << 20,
};

/** Rough number of nested calls the default Node.js stack holds. */
const HOST_CALL_DEPTH = 400;

export const DEFAULT_CONFIG_FILE = "kestrel.config.json";

// =========================================================================
// Configuration Loading
// =========================================================================

function intFromEnv(value: string | undefined): number | undefined {
  const n = parseInt(value ?? "", 10);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Load configuration from environment variables.
 * `KESTREL_PATH` uses the platform path-list separator.
 */
export function configFromEnv(
  env: NodeJS.ProcessEnv = process.env
): Partial<KestrelConfig> {
  const config: Partial<KestrelConfig> = {};

  const searchPath = env.KESTREL_PATH;
  if (searchPath) {
    config.searchPaths = searchPath.split(path.delimiter).filter(Boolean);
  }
  if (env.KESTREL_PACKAGES) config.packagesDir = env.KESTREL_PACKAGES;

  const macroDepthLimit = intFromEnv(env.KESTREL_MACRO_DEPTH);
  if (macroDepthLimit !== undefined) config.macroDepthLimit = macroDepthLimit;
  const maxCallDepth = intFromEnv(env.KESTREL_MAX_CALL_DEPTH);
  if (maxCallDepth !== undefined) config.maxCallDepth = maxCallDepth;
  const asmStepLimit = intFromEnv(env.KESTREL_ASM_STEPS);
  if (asmStepLimit !== undefined) config.asmStepLimit = asmStepLimit;
  const asmMemoryLimit = intFromEnv(env.KESTREL_ASM_MEMORY);
  if (asmMemoryLimit !== undefined) config.asmMemoryLimit = asmMemoryLimit;

  return config;
}

/**
 * Load configuration from a JSON file. Relative search paths are resolved
 * against the file's directory.
 */
export function configFromFile(filePath: string): Partial<KestrelConfig> {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const data: unknown = JSON.parse(content);
  if (typeof data !== "object" || data === null || Array.isArray(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }

  const config = configFromObject(data);
  const baseDir = path.dirname(path.resolve(filePath));
  if (config.searchPaths) {
    config.searchPaths = config.searchPaths.map((p) => path.resolve(baseDir, p));
  }
  if (config.packagesDir) {
    config.packagesDir = path.resolve(baseDir, config.packagesDir);
  }
  return config;
}

function pick(data: object, ...keys: string[]): unknown {
  for (const key of keys) {
    const value: unknown = Reflect.get(data, key);
    if (value !== undefined) return value;
  }
  return undefined;
}

function isStringArray(value: unknown): value is string[] {
  return Array.isArray(value) && value.every((v) => typeof v === "string");
}

function numberField(data: object, ...keys: string[]): number | undefined {
  const value = pick(data, ...keys);
  if (value === undefined) return undefined;
  if (typeof value !== "number") {
    throw new Error(`Config field '${keys[0]}' must be a number`);
  }
  return value;
}

/**
 * Create configuration from a plain object (e.g. parsed JSON).
 * Accepts camelCase and snake_case keys.
 */
export function configFromObject(data: object): Partial<KestrelConfig> {
  const config: Partial<KestrelConfig> = {};

  const searchPaths = pick(data, "searchPaths", "search_paths");
  if (searchPaths !== undefined) {
    if (!isStringArray(searchPaths)) {
      throw new Error("Config field 'searchPaths' must be an array of strings");
    }
    config.searchPaths = searchPaths;
  }

  const packagesDir = pick(data, "packagesDir", "packages_dir");
  if (packagesDir !== undefined) {
    if (typeof packagesDir !== "string") {
      throw new Error("Config field 'packagesDir' must be a string");
    }
    config.packagesDir = packagesDir;
  }

  const macroDepthLimit = numberField(data, "macroDepthLimit", "macro_depth_limit");
  if (macroDepthLimit !== undefined) config.macroDepthLimit = macroDepthLimit;
  const maxCallDepth = numberField(data, "maxCallDepth", "max_call_depth");
  if (maxCallDepth !== undefined) config.maxCallDepth = maxCallDepth;
  const asmStepLimit = numberField(data, "asmStepLimit", "asm_step_limit");
  if (asmStepLimit !== undefined) config.asmStepLimit = asmStepLimit;
  const asmStackSize = numberField(data, "asmStackSize", "asm_stack_size");
  if (asmStackSize !== undefined) config.asmStackSize = asmStackSize;
  const asmMemoryLimit = numberField(data, "asmMemoryLimit", "asm_memory_limit");
  if (asmMemoryLimit !== undefined) config.asmMemoryLimit = asmMemoryLimit;

  return config;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: Partial<KestrelConfig>[]): KestrelConfig {
  let result: KestrelConfig = { ...DEFAULT_CONFIG };
  for (const cfg of configs) {
    result = { ...result, ...cfg };
  }
  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  cwd?: string;
  env?: NodeJS.ProcessEnv;
  overrides?: Partial<KestrelConfig>;
}): KestrelConfig {
  const layers: Partial<KestrelConfig>[] = [configFromEnv(options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const candidate = path.resolve(options?.cwd ?? process.cwd(), DEFAULT_CONFIG_FILE);
    if (fs.existsSync(candidate)) layers.push(configFromFile(candidate));
  }

  if (options?.overrides) layers.push(options.overrides);

  return mergeConfigs(...layers);
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: KestrelConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (config.macroDepthLimit < 1) {
    errors.push("macroDepthLimit must be at least 1");
  }
  if (config.maxCallDepth < 1) {
    errors.push("maxCallDepth must be at least 1");
  }
  if (config.asmStepLimit < 1) {
    errors.push("asmStepLimit must be at least 1");
  }
  if (config.asmStackSize < 0 || config.asmStackSize % 8 !== 0) {
    errors.push("asmStackSize must be a non-negative multiple of 8");
  }
  if (config.asmMemoryLimit < config.asmStackSize) {
    errors.push("asmMemoryLimit must be at least asmStackSize");
  }
  if (config.maxCallDepth > HOST_CALL_DEPTH) {
    warnings.push(
      `maxCallDepth above ${HOST_CALL_DEPTH} may outrun the host stack; deeper calls fail as 'maximum call depth exceeded'`
    );
  }
  for (const p of config.searchPaths) {
    if (!path.isAbsolute(p)) {
      warnings.push(`search path '${p}' is relative and resolves against the working directory`);
    }
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
