import * as fs from "node:fs";
import * as os from "node:os";
import * as path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import {
  DEFAULT_CONFIG,
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  validateConfig,
} from "../../main/ts/config/config.js";

describe("config", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "kestrel-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  const writeConfig = (data: unknown, name = "kestrel.config.json") => {
    const file = path.join(dir, name);
    fs.writeFileSync(file, JSON.stringify(data));
    return file;
  };

  describe("configFromObject", () => {
    it("should accept camelCase and snake_case keys", () => {
      expect(
        configFromObject({ searchPaths: ["/a"], max_call_depth: 10, asm_stack_size: 64, asm_memory_limit: 4096 })
      ).toEqual({
        searchPaths: ["/a"],
        maxCallDepth: 10,
        asmStackSize: 64,
        asmMemoryLimit: 4096,
      });
    });

    it("should reject fields of the wrong type", () => {
      expect(() => configFromObject({ searchPaths: "lib" })).toThrow(
        "Config field 'searchPaths' must be an array of strings"
      );
      expect(() => configFromObject({ packages_dir: 3 })).toThrow("Config field 'packagesDir' must be a string");
      expect(() => configFromObject({ macroDepthLimit: "8" })).toThrow(
        "Config field 'macroDepthLimit' must be a number"
      );
    });
  });

  describe("configFromEnv", () => {
    it("should split the search path and parse limits", () => {
      const env = {
        KESTREL_PATH: ["/a", "", "/b"].join(path.delimiter),
        KESTREL_PACKAGES: "/pkgs",
        KESTREL_MACRO_DEPTH: "7",
        KESTREL_ASM_STEPS: "lots",
        KESTREL_ASM_MEMORY: "65536",
      };
      expect(configFromEnv(env)).toEqual({
        searchPaths: ["/a", "/b"],
        packagesDir: "/pkgs",
        macroDepthLimit: 7,
        asmMemoryLimit: 65536,
      });
    });

    it("should ignore an empty environment", () => {
      expect(configFromEnv({})).toEqual({});
    });
  });

  describe("configFromFile", () => {
    it("should resolve relative paths against the file", () => {
      const file = writeConfig({ search_paths: ["lib", "/abs"], packagesDir: "pkgs", maxCallDepth: 10 });
      expect(configFromFile(file)).toEqual({
        searchPaths: [path.join(dir, "lib"), "/abs"],
        packagesDir: path.join(dir, "pkgs"),
        maxCallDepth: 10,
      });
    });

    it("should report missing files and non-object content", () => {
      const missing = path.join(dir, "missing.json");
      expect(() => configFromFile(missing)).toThrow(`Config file not found: ${missing}`);
      const list = writeConfig([1, 2], "list.json");
      expect(() => configFromFile(list)).toThrow(`Config file must contain a JSON object: ${list}`);
    });
  });

  describe("mergeConfigs", () => {
    it("should let later layers win over defaults", () => {
      expect(mergeConfigs({ maxCallDepth: 5 }, { maxCallDepth: 9, asmStepLimit: 3 })).toEqual({
        ...DEFAULT_CONFIG,
        maxCallDepth: 9,
        asmStepLimit: 3,
      });
    });
  });

  describe("loadConfig", () => {
    it("should layer env, the discovered file and overrides", () => {
      writeConfig({ maxCallDepth: 10 });
      const config = loadConfig({
        cwd: dir,
        env: { KESTREL_MAX_CALL_DEPTH: "20", KESTREL_MACRO_DEPTH: "7" },
        overrides: { asmStepLimit: 5 },
      });
      expect(config.maxCallDepth).toBe(10);
      expect(config.macroDepthLimit).toBe(7);
      expect(config.asmStepLimit).toBe(5);
      expect(config.asmStackSize).toBe(256);
    });

    it("should fall back to defaults without a file", () => {
      expect(loadConfig({ cwd: dir, env: {} })).toEqual(DEFAULT_CONFIG);
    });
  });

  describe("validateConfig", () => {
    it("should accept the defaults", () => {
      expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
    });

    it("should report errors and warnings", () => {
      const result = validateConfig(
        mergeConfigs({ macroDepthLimit: 0, asmStackSize: 12, maxCallDepth: 6000, searchPaths: ["lib"] })
      );
      expect(result.valid).toBe(false);
      expect(result.errors).toEqual([
        "macroDepthLimit must be at least 1",
        "asmStackSize must be a non-negative multiple of 8",
      ]);
      expect(result.warnings).toEqual([
        "maxCallDepth above 400 may outrun the host stack; deeper calls fail as 'maximum call depth exceeded'",
        "search path 'lib' is relative and resolves against the working directory",
      ]);
    });

    it("should keep the asm memory cap above the stack and warn only past the host depth", () => {
      expect(validateConfig(mergeConfigs({ asmMemoryLimit: 128 })).errors).toEqual([
        "asmMemoryLimit must be at least asmStackSize",
      ]);
      expect(validateConfig(mergeConfigs({ maxCallDepth: 400 })).warnings).toEqual([]);
      expect(validateConfig(mergeConfigs({ maxCallDepth: 401 })).warnings).toHaveLength(1);
    });
  });
});
