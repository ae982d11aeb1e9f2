// src/core/config/index.ts
// Configuration system exports

export {
  type CompilerConfig,
  type ReplConfig,
  type CalxConfig,
  type PartialCalxConfig,
  type ConfigValidation,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_REPL_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  parseOperatorList,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
