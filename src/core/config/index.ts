// src/core/config/index.ts
// Configuration system exports

export {
  type CompilerConfig,
  type ProtocolConfig,
  type EditingConfig,
  type TraceConfig,
  type IdeClientConfig,
  type IdeClientConfigOverrides,
  type ConfigValidation,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_PROTOCOL_CONFIG,
  DEFAULT_CONFIG,
  CONFIG_FILE_NAMES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  parseSimpleYaml,
  validateConfig,
} from "./config";
