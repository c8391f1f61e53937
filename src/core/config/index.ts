// src/core/config/index.ts
// Configuration system exports

export {
  type InterpreterConfig,
  type CompilerConfig,
  type ServerConfig,
  type BfkitConfig,
  type PartialBfkitConfig,
  type ConfigValidation,
  DEFAULT_INTERPRETER_CONFIG,
  DEFAULT_COMPILER_CONFIG,
  DEFAULT_SERVER_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  isEofBehavior,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  sessionParamsFromConfig,
  validateConfig,
} from "./config";
