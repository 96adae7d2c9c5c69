// src/core/config/config.ts
// Configuration for the IDE client: which compiler to start and how to talk to it

import * as fs from "fs";
import * as path from "path";

// =========================================================================
// Configuration Types
// =========================================================================

export type CompilerConfig = {
  /** Executable started in IDE mode */
  command: string;
  /** Arguments passed to the executable */
  args: string[];
  /** Directory the process starts in (defaults to the current directory) */
  cwd?: string;
};

export type ProtocolConfig = {
  /** Fail a call after this many milliseconds without a reply; 0 waits forever */
  requestTimeoutMs: number;
};

export type EditingConfig = {
  /** Hand compiler output with holes to the template expander */
  templates: boolean;
};

export type TraceConfig = {
  /** Log protocol events to stderr */
  enabled: boolean;
};

export type IdeClientConfig = {
  compiler: CompilerConfig;
  protocol: ProtocolConfig;
  editing: EditingConfig;
  trace: TraceConfig;
};

export type IdeClientConfigOverrides = {
  compiler?: Partial<CompilerConfig>;
  protocol?: Partial<ProtocolConfig>;
  editing?: Partial<EditingConfig>;
  trace?: Partial<TraceConfig>;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_COMPILER_CONFIG: CompilerConfig = {
  command: "idris",
  args: ["--ide-mode"],
};

export const DEFAULT_PROTOCOL_CONFIG: ProtocolConfig = {
  requestTimeoutMs: 0,
};

export const DEFAULT_CONFIG: IdeClientConfig = {
  compiler: DEFAULT_COMPILER_CONFIG,
  protocol: DEFAULT_PROTOCOL_CONFIG,
  editing: { templates: false },
  trace: { enabled: false },
};

export const CONFIG_FILE_NAMES = ["idris-ide.config.json", "idris-ide.config.yaml", "idris-ide.config.yml"];

// =========================================================================
// Configuration Loading
// =========================================================================

function parseBool(value: string | undefined): boolean | undefined {
  if (value === undefined || value === "") return undefined;
  return value === "1" || value.toLowerCase() === "true" || value.toLowerCase() === "yes";
}

function parseNonNegativeInt(value: string | undefined): number | undefined {
  if (value === undefined || !/^\d+$/.test(value.trim())) return undefined;
  return parseInt(value, 10);
}

/**
 * Load configuration overrides from environment variables.
 * Only variables that are set contribute.
 */
export function configFromEnv(prefix = "IDRIS_IDE", env: NodeJS.ProcessEnv = process.env): IdeClientConfigOverrides {
  const out: IdeClientConfigOverrides = {};

  const command = env[`${prefix}_COMMAND`];
  const args = env[`${prefix}_ARGS`];
  if (command || args !== undefined) {
    out.compiler = {};
    if (command) out.compiler.command = command;
    if (args !== undefined) out.compiler.args = args.split(/\s+/).filter((a) => a.length > 0);
  }

  const timeoutMs = parseNonNegativeInt(env[`${prefix}_TIMEOUT_MS`]);
  if (timeoutMs !== undefined) out.protocol = { requestTimeoutMs: timeoutMs };

  const templates = parseBool(env[`${prefix}_TEMPLATES`]);
  if (templates !== undefined) out.editing = { templates };

  const trace = parseBool(env[`${prefix}_TRACE`]);
  if (trace !== undefined) out.trace = { enabled: trace };

  return out;
}

/**
 * Load configuration from a JSON or YAML file.
 */
export function configFromFile(filePath: string): IdeClientConfigOverrides {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const content = fs.readFileSync(filePath, "utf8");
  const ext = path.extname(filePath).toLowerCase();

  let data: unknown;

  if (ext === ".json") {
    data = JSON.parse(content);
  } else if (ext === ".yaml" || ext === ".yml") {
    // Simple YAML parser for basic configs
    data = parseSimpleYaml(content);
  } else {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  return configFromObject(isRecord(data) ? data : {});
}

function isRecord(x: unknown): x is Record<string, unknown> {
  return typeof x === "object" && x !== null && !Array.isArray(x);
}

function section(data: Record<string, unknown>, key: string): Record<string, unknown> {
  const value = data[key];
  return isRecord(value) ? value : {};
}

function pick(obj: Record<string, unknown>, ...keys: string[]): unknown {
  for (const key of keys) {
    if (obj[key] !== undefined) return obj[key];
  }
  return undefined;
}

function stringList(x: unknown): string[] | undefined {
  if (typeof x === "string") return x.split(/\s+/).filter((a) => a.length > 0);
  if (Array.isArray(x) && x.every((a): a is string => typeof a === "string")) return x;
  return undefined;
}

/**
 * Create configuration overrides from a plain object (e.g., from parsed JSON/YAML).
 * Both camelCase and snake_case keys are accepted.
 */
export function configFromObject(data: Record<string, unknown>): IdeClientConfigOverrides {
  const compilerData = section(data, "compiler");
  const protocolData = section(data, "protocol");
  const editingData = section(data, "editing");
  const traceData = section(data, "trace");

  const out: IdeClientConfigOverrides = {};

  const command = pick(compilerData, "command");
  const args = stringList(pick(compilerData, "args"));
  const cwd = pick(compilerData, "cwd");
  const compiler: Partial<CompilerConfig> = {};
  if (typeof command === "string") compiler.command = command;
  if (args) compiler.args = args;
  if (typeof cwd === "string") compiler.cwd = cwd;
  if (Object.keys(compiler).length > 0) out.compiler = compiler;

  const timeoutMs = pick(protocolData, "requestTimeoutMs", "request_timeout_ms");
  if (typeof timeoutMs === "number") out.protocol = { requestTimeoutMs: timeoutMs };

  const templates = pick(editingData, "templates");
  if (typeof templates === "boolean") out.editing = { templates };

  const enabled = pick(traceData, "enabled");
  if (typeof enabled === "boolean") out.trace = { enabled };

  return out;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(base: IdeClientConfig, ...configs: IdeClientConfigOverrides[]): IdeClientConfig {
  let result: IdeClientConfig = {
    compiler: { ...base.compiler, args: [...base.compiler.args] },
    protocol: { ...base.protocol },
    editing: { ...base.editing },
    trace: { ...base.trace },
  };

  for (const cfg of configs) {
    result = {
      compiler: { ...result.compiler, ...cfg.compiler },
      protocol: { ...result.protocol, ...cfg.protocol },
      editing: { ...result.editing, ...cfg.editing },
      trace: { ...result.trace, ...cfg.trace },
    };
  }

  return result;
}

/**
 * Auto-detect and load configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: IdeClientConfigOverrides;
  env?: NodeJS.ProcessEnv;
  searchDir?: string;
}): IdeClientConfig {
  const layers: IdeClientConfigOverrides[] = [configFromEnv("IDRIS_IDE", options?.env ?? process.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const dir = options?.searchDir ?? process.cwd();
    for (const name of CONFIG_FILE_NAMES) {
      const p = path.join(dir, name);
      if (fs.existsSync(p)) {
        layers.push(configFromFile(p));
        break;
      }
    }
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

  return mergeConfigs(DEFAULT_CONFIG, ...layers);
}

// =========================================================================
// Simple YAML Parser (for basic configs only)
// =========================================================================

type YamlValue = string | number | boolean | null | YamlValue[] | { [key: string]: YamlValue };

function parseYamlScalar(value: string): YamlValue {
  if (value === "true") return true;
  if (value === "false") return false;
  if (value === "null") return null;
  if (/^-?\d+$/.test(value)) return parseInt(value, 10);
  if (/^-?\d+\.\d+$/.test(value)) return parseFloat(value);
  if ((value.startsWith('"') && value.endsWith('"')) || (value.startsWith("'") && value.endsWith("'"))) {
    return value.slice(1, -1);
  }
  if (value.startsWith("[") && value.endsWith("]")) {
    const inner = value.slice(1, -1).trim();
    return inner === "" ? [] : inner.split(",").map((v) => parseYamlScalar(v.trim()));
  }
  return value;
}

export function parseSimpleYaml(content: string): Record<string, YamlValue> {
  const result: Record<string, YamlValue> = {};
  const stack: Array<{ obj: Record<string, YamlValue>; indent: number }> = [{ obj: result, indent: -1 }];

  for (const rawLine of content.split("\n")) {
    const trimmed = rawLine.trim();
    if (!trimmed || trimmed.startsWith("#")) continue;

    const indent = rawLine.search(/\S/);

    // Pop stack to find parent at correct indent level
    let top = stack[stack.length - 1];
    while (stack.length > 1 && top && top.indent >= indent) {
      stack.pop();
      top = stack[stack.length - 1];
    }

    const parent = top ? top.obj : result;

    const colonIdx = trimmed.indexOf(":");
    if (colonIdx < 0) continue;

    const key = trimmed.slice(0, colonIdx).trim();
    const value = trimmed.slice(colonIdx + 1).trim();

    if (value === "") {
      const nested: Record<string, YamlValue> = {};
      parent[key] = nested;
      stack.push({ obj: nested, indent });
    } else {
      parent[key] = parseYamlScalar(value);
    }
  }

  return result;
}

// =========================================================================
// Config Validation
// =========================================================================

export type ConfigValidation = {
  valid: boolean;
  errors: string[];
  warnings: string[];
};

export function validateConfig(config: IdeClientConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.compiler.command.trim()) {
    errors.push("compiler.command must not be empty");
  }
  if (!config.compiler.args.includes("--ide-mode")) {
    warnings.push("compiler.args does not include --ide-mode; the process may not speak the IDE protocol");
  }
  if (config.protocol.requestTimeoutMs < 0) {
    errors.push("protocol.requestTimeoutMs must not be negative");
  } else if (config.protocol.requestTimeoutMs > 0 && config.protocol.requestTimeoutMs < 1000) {
    warnings.push("protocol.requestTimeoutMs is below one second; loading large files may time out");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
