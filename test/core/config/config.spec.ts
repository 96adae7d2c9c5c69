// test/core/config/config.spec.ts
// Tests for configuration system

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import {
  configFromEnv,
  configFromFile,
  configFromObject,
  loadConfig,
  mergeConfigs,
  parseSimpleYaml,
  validateConfig,
  DEFAULT_CONFIG,
} from "../../../src/core/config/config";

describe("configFromEnv", () => {
  it("contributes nothing when no variables are set", () => {
    expect(configFromEnv("IDRIS_IDE", {})).toEqual({});
  });

  it("reads every variable", () => {
    const overrides = configFromEnv("IDRIS_IDE", {
      IDRIS_IDE_COMMAND: "idris2",
      IDRIS_IDE_ARGS: "--ide-mode  --no-banner",
      IDRIS_IDE_TIMEOUT_MS: "3000",
      IDRIS_IDE_TEMPLATES: "true",
      IDRIS_IDE_TRACE: "0",
    });
    expect(overrides).toEqual({
      compiler: { command: "idris2", args: ["--ide-mode", "--no-banner"] },
      protocol: { requestTimeoutMs: 3000 },
      editing: { templates: true },
      trace: { enabled: false },
    });
  });

  it("ignores a timeout that is not a whole number", () => {
    expect(configFromEnv("IDRIS_IDE", { IDRIS_IDE_TIMEOUT_MS: "soon" })).toEqual({});
  });
});

describe("configFromObject", () => {
  it("accepts camelCase and snake_case keys", () => {
    expect(configFromObject({ protocol: { request_timeout_ms: 250 } })).toEqual({ protocol: { requestTimeoutMs: 250 } });
    expect(configFromObject({ protocol: { requestTimeoutMs: 100 } })).toEqual({ protocol: { requestTimeoutMs: 100 } });
  });

  it("drops values of the wrong type", () => {
    expect(configFromObject({ compiler: { command: 7, args: [1, 2] }, editing: { templates: "yes" } })).toEqual({});
  });

  it("splits a string of arguments", () => {
    expect(configFromObject({ compiler: { args: "--ide-mode -p contrib" } })).toEqual({
      compiler: { args: ["--ide-mode", "-p", "contrib"] },
    });
  });
});

describe("mergeConfigs", () => {
  it("lets later layers win field by field", () => {
    const merged = mergeConfigs(
      DEFAULT_CONFIG,
      { compiler: { command: "idris2" }, trace: { enabled: true } },
      { compiler: { cwd: "/work" } },
    );
    expect(merged.compiler).toEqual({ command: "idris2", args: ["--ide-mode"], cwd: "/work" });
    expect(merged.trace.enabled).toBe(true);
    expect(merged.protocol.requestTimeoutMs).toBe(0);
  });

  it("does not share the default argument list", () => {
    const merged = mergeConfigs(DEFAULT_CONFIG);
    merged.compiler.args.push("--verbose");
    expect(DEFAULT_CONFIG.compiler.args).toEqual(["--ide-mode"]);
  });
});

describe("files", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "idris-ide-config-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("reads JSON", () => {
    const file = path.join(dir, "idris-ide.config.json");
    fs.writeFileSync(file, JSON.stringify({ editing: { templates: true } }));
    expect(configFromFile(file)).toEqual({ editing: { templates: true } });
  });

  it("reads simple YAML", () => {
    const file = path.join(dir, "idris-ide.config.yaml");
    fs.writeFileSync(file, [
      "# compiler settings",
      "compiler:",
      "  command: idris2",
      "  args: [--ide-mode, --no-color]",
      "protocol:",
      "  requestTimeoutMs: 5000",
    ].join("\n"));
    expect(configFromFile(file)).toEqual({
      compiler: { command: "idris2", args: ["--ide-mode", "--no-color"] },
      protocol: { requestTimeoutMs: 5000 },
    });
  });

  it("rejects unknown extensions and missing files", () => {
    const file = path.join(dir, "idris-ide.config.toml");
    fs.writeFileSync(file, "");
    expect(() => configFromFile(file)).toThrow("Unsupported config file format: .toml");
    expect(() => configFromFile(path.join(dir, "nope.json"))).toThrow("Config file not found");
  });

  it("layers defaults, environment, file and overrides", () => {
    fs.writeFileSync(path.join(dir, "idris-ide.config.json"), JSON.stringify({ compiler: { command: "from-file" } }));
    const config = loadConfig({
      searchDir: dir,
      env: { IDRIS_IDE_COMMAND: "from-env", IDRIS_IDE_TRACE: "1" },
      overrides: { editing: { templates: true } },
    });
    expect(config).toEqual({
      compiler: { command: "from-file", args: ["--ide-mode"] },
      protocol: { requestTimeoutMs: 0 },
      editing: { templates: true },
      trace: { enabled: true },
    });
  });

  it("falls back to defaults without a config file", () => {
    expect(loadConfig({ searchDir: dir, env: {} })).toEqual(DEFAULT_CONFIG);
  });
});

describe("parseSimpleYaml", () => {
  it("nests by indentation", () => {
    expect(parseSimpleYaml("a:\n  b: 1\n  c:\n    d: true\ne: 'x'")).toEqual({ a: { b: 1, c: { d: true } }, e: "x" });
  });
});

describe("validateConfig", () => {
  it("accepts the defaults", () => {
    expect(validateConfig(DEFAULT_CONFIG)).toEqual({ valid: true, errors: [], warnings: [] });
  });

  it("reports an empty command and a negative timeout", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { compiler: { command: " " }, protocol: { requestTimeoutMs: -1 } }));
    expect(result.valid).toBe(false);
    expect(result.errors).toEqual(["compiler.command must not be empty", "protocol.requestTimeoutMs must not be negative"]);
  });

  it("warns when IDE mode is not requested", () => {
    const result = validateConfig(mergeConfigs(DEFAULT_CONFIG, { compiler: { args: [] } }));
    expect(result.valid).toBe(true);
    expect(result.warnings).toHaveLength(1);
  });
});
