// src/core/config/config.ts
// Configuration for the scratch console

import * as fs from "fs";
import * as os from "os";
import * as path from "path";
import { DEFAULT_HISTORY_SIZE } from "../console/history";

// =========================================================================
// Configuration Types
// =========================================================================

export type LogLevel = "fatal" | "error" | "warn" | "info" | "debug" | "trace" | "silent";

export const LOG_LEVELS: readonly LogLevel[] = ["fatal", "error", "warn", "info", "debug", "trace", "silent"];

export type HistoryConfig = {
  /** File the history ring is persisted to */
  filePath: string;
  /** Maximum number of entries kept */
  maxSize: number;
};

export type ScratchConfig = {
  history: HistoryConfig;
  logLevel: LogLevel;
};

export type ScratchConfigInput = {
  history?: Partial<HistoryConfig>;
  logLevel?: LogLevel;
};

// =========================================================================
// Default Configuration
// =========================================================================

export const DEFAULT_HISTORY_FILE = path.join(os.homedir(), ".scratch-console", "history.json");

export const DEFAULT_HISTORY_CONFIG: HistoryConfig = {
  filePath: DEFAULT_HISTORY_FILE,
  maxSize: DEFAULT_HISTORY_SIZE,
};

export const DEFAULT_CONFIG: ScratchConfig = {
  history: DEFAULT_HISTORY_CONFIG,
  logLevel: "warn",
};

export const DEFAULT_CONFIG_FILES = ["scratch.config.json", ".scratchrc.json"];

// =========================================================================
// Configuration Loading
// =========================================================================

function isLogLevel(value: unknown): value is LogLevel {
  return typeof value === "string" && LOG_LEVELS.some((l) => l === value);
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function pickString(...values: unknown[]): string | undefined {
  for (const v of values) {
    if (typeof v === "string" && v.length > 0) return v;
  }
  return undefined;
}

function pickNumber(...values: unknown[]): number | undefined {
  for (const v of values) {
    if (typeof v === "number" && !Number.isNaN(v)) return v;
  }
  return undefined;
}

function parseIntEnv(raw: string | undefined): number | undefined {
  if (!raw) return undefined;
  const n = Number(raw);
  return Number.isNaN(n) ? undefined : n;
}

/**
 * Read configuration from environment variables. Only variables that are set
 * appear in the result.
 */
export function configFromEnv(prefix = "SCRATCH", env: NodeJS.ProcessEnv = process.env): ScratchConfigInput {
  const history: Partial<HistoryConfig> = {};
  const filePath = env[`${prefix}_HISTORY_FILE`];
  if (filePath) history.filePath = filePath;
  const maxSize = parseIntEnv(env[`${prefix}_HISTORY_MAX_SIZE`]);
  if (maxSize !== undefined) history.maxSize = maxSize;

  const result: ScratchConfigInput = { history };
  const level = env[`${prefix}_LOG_LEVEL`];
  if (isLogLevel(level)) result.logLevel = level;
  return result;
}

/**
 * Load configuration from a JSON file.
 */
export function configFromFile(filePath: string): ScratchConfigInput {
  if (!fs.existsSync(filePath)) {
    throw new Error(`Config file not found: ${filePath}`);
  }

  const ext = path.extname(filePath).toLowerCase();
  if (ext !== ".json") {
    throw new Error(`Unsupported config file format: ${ext}`);
  }

  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    throw new Error(`Invalid JSON in config file ${filePath}: ${e instanceof Error ? e.message : String(e)}`);
  }
  if (!isRecord(data)) {
    throw new Error(`Config file must contain a JSON object: ${filePath}`);
  }
  return configFromObject(data);
}

/**
 * Create configuration from a plain object. Accepts camelCase and snake_case
 * keys, either nested under `history` or flat.
 */
export function configFromObject(data: Record<string, unknown>): ScratchConfigInput {
  const historyData = isRecord(data.history) ? data.history : {};

  const history: Partial<HistoryConfig> = {};
  const filePath = pickString(
    historyData.filePath,
    historyData.file_path,
    data.historyFilePath,
    data.history_file_path
  );
  if (filePath) history.filePath = filePath;
  const maxSize = pickNumber(
    historyData.maxSize,
    historyData.max_size,
    data.historyMaxSize,
    data.history_max_size
  );
  if (maxSize !== undefined) history.maxSize = maxSize;

  const result: ScratchConfigInput = { history };
  const level = data.logLevel ?? data.log_level;
  if (isLogLevel(level)) result.logLevel = level;
  return result;
}

/**
 * Merge configs with later ones overriding earlier ones.
 */
export function mergeConfigs(...configs: ScratchConfigInput[]): ScratchConfig {
  const result: ScratchConfig = { ...DEFAULT_CONFIG, history: { ...DEFAULT_CONFIG.history } };

  for (const cfg of configs) {
    if (cfg.history) {
      result.history = { ...result.history, ...cfg.history };
    }
    if (cfg.logLevel) {
      result.logLevel = cfg.logLevel;
    }
  }

  return result;
}

/**
 * Resolve the effective configuration.
 * Priority: overrides > config file > environment > defaults
 */
export function loadConfig(options?: {
  configFile?: string;
  overrides?: ScratchConfigInput;
  env?: NodeJS.ProcessEnv;
  cwd?: string;
}): ScratchConfig {
  const layers: ScratchConfigInput[] = [configFromEnv("SCRATCH", options?.env)];

  if (options?.configFile) {
    layers.push(configFromFile(options.configFile));
  } else {
    const cwd = options?.cwd ?? process.cwd();
    const found = DEFAULT_CONFIG_FILES.map((f) => path.join(cwd, f)).find((p) => fs.existsSync(p));
    if (found) layers.push(configFromFile(found));
  }

  if (options?.overrides) {
    layers.push(options.overrides);
  }

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

export function validateConfig(config: ScratchConfig): ConfigValidation {
  const errors: string[] = [];
  const warnings: string[] = [];

  if (!config.history.filePath) {
    errors.push("history.filePath must not be empty");
  }
  if (!Number.isInteger(config.history.maxSize) || config.history.maxSize < 1) {
    errors.push(`history.maxSize must be a positive integer, got ${config.history.maxSize}`);
  } else if (config.history.maxSize > 10_000) {
    warnings.push("history.maxSize is very large; the whole ring is rewritten on every save");
  }

  return {
    valid: errors.length === 0,
    errors,
    warnings,
  };
}
