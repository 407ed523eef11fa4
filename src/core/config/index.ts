// src/core/config/index.ts
// Configuration system exports

export {
  type LogLevel,
  type HistoryConfig,
  type ScratchConfig,
  type ScratchConfigInput,
  type ConfigValidation,
  LOG_LEVELS,
  DEFAULT_HISTORY_FILE,
  DEFAULT_HISTORY_CONFIG,
  DEFAULT_CONFIG,
  DEFAULT_CONFIG_FILES,
  configFromEnv,
  configFromFile,
  configFromObject,
  mergeConfigs,
  loadConfig,
  validateConfig,
} from "./config";
