// bin/scratch-cli-lib.ts
// Shared CLI utilities for the scratch command
// Exported functions for testing

import * as fs from "fs";
import * as path from "path";
import type { ScratchConfig, ScratchConfigInput } from "../src/core/config";
import { loadConfig, validateConfig } from "../src/core/config";
import type { DisplaySurfaces } from "../src/core/console";
import { tokenize, type Tok } from "../src/core/reader";

// ═══════════════════════════════════════════════════════════════════════════════
// TYPE DEFINITIONS
// ═══════════════════════════════════════════════════════════════════════════════

export type CliArgs = {
  help?: boolean;
  version?: boolean;
  eval?: string;
  config?: string;
  historyFile?: string;
  historySize?: number;
  errors: string[];
};

export type CliConfig = {
  mode: "repl" | "exec";
  code?: string;
  configFile?: string;
  overrides: ScratchConfigInput;
};

export type ResolvedConfig =
  | { tag: "Valid"; config: ScratchConfig; warnings: string[] }
  | { tag: "Invalid"; errors: string[] };

export type ConsoleCommand =
  | { tag: "prev" }
  | { tag: "next" }
  | { tag: "history" }
  | { tag: "save" }
  | { tag: "clear-history" }
  | { tag: "help" }
  | { tag: "quit" }
  | { tag: "unknown"; name: string };

// ═══════════════════════════════════════════════════════════════════════════════
// ARGUMENT PARSING
// ═══════════════════════════════════════════════════════════════════════════════

export function parseCliArgs(args: string[]): CliArgs {
  const result: CliArgs = { errors: [] };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg === "--help" || arg === "-h") {
      result.help = true;
    } else if (arg === "--version" || arg === "-v") {
      result.version = true;
    } else if (arg === "--eval" || arg === "-e") {
      result.eval = args[++i] ?? "";
    } else if (arg === "--config" || arg === "-c") {
      result.config = args[++i];
    } else if (arg === "--history-file") {
      result.historyFile = args[++i];
    } else if (arg === "--history-size") {
      const raw = args[++i];
      const n = Number(raw);
      if (raw === undefined || !Number.isInteger(n) || n < 1) {
        result.errors.push(`--history-size expects a positive integer, got ${raw ?? "nothing"}`);
      } else {
        result.historySize = n;
      }
    } else {
      result.errors.push(`Unknown argument: ${arg}`);
    }
  }

  return result;
}

// ═══════════════════════════════════════════════════════════════════════════════
// HELP TEXT
// ═══════════════════════════════════════════════════════════════════════════════

export function getHelpText(): string {
  return `
scratch - interactive Lisp expression console

USAGE:
  scratch [options]                   Start the interactive console
  scratch --eval <code>               Evaluate code, print the result and exit

OPTIONS:
  -h, --help                         Show this help message
  -v, --version                      Show version information
  -e, --eval <code>                  Evaluate code and exit
  -c, --config <file>                Read configuration from a JSON file
  --history-file <path>              Where submission history is kept
  --history-size <n>                 Maximum number of history entries

${getCommandHelpText()}
`.trim();
}

export function getCommandHelpText(): string {
  return `
CONSOLE COMMANDS:
  :prev, :p                          Show the previous history entry
  :next, :n                          Show the next history entry
  :history, :hist                    List the history ring
  :save                              Write history to disk now
  :clear-history                     Empty the history, on disk as well
  :help, :h                          Show this list
  :quit, :q                          Save history and exit
`.trim();
}

// ═══════════════════════════════════════════════════════════════════════════════
// VERSION
// ═══════════════════════════════════════════════════════════════════════════════

export function getVersion(): string {
  try {
    const pkgPath = path.join(__dirname, "..", "package.json");
    const pkg: unknown = JSON.parse(fs.readFileSync(pkgPath, "utf8"));
    if (typeof pkg === "object" && pkg !== null && "version" in pkg && typeof pkg.version === "string") {
      return `scratch-console v${pkg.version}`;
    }
    return "scratch-console v0.1.0";
  } catch {
    return "scratch-console v0.1.0";
  }
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION BUILDING
// ═══════════════════════════════════════════════════════════════════════════════

export function buildConfig(args: CliArgs): CliConfig {
  const history: ScratchConfigInput["history"] = {};
  if (args.historyFile) history.filePath = args.historyFile;
  if (args.historySize !== undefined) history.maxSize = args.historySize;

  const config: CliConfig = {
    mode: args.eval !== undefined ? "exec" : "repl",
    overrides: { history },
  };

  if (args.eval !== undefined) {
    config.code = args.eval;
  }
  if (args.config) {
    config.configFile = args.config;
  }

  return config;
}

/**
 * Load and validate the effective configuration. A config file that is
 * missing or unreadable is reported the same way as an invalid setting.
 */
export function resolveConfig(
  cli: CliConfig,
  options?: { env?: NodeJS.ProcessEnv; cwd?: string }
): ResolvedConfig {
  let config: ScratchConfig;
  try {
    config = loadConfig({ configFile: cli.configFile, overrides: cli.overrides, ...options });
  } catch (e) {
    return { tag: "Invalid", errors: [`config: ${e instanceof Error ? e.message : String(e)}`] };
  }

  const validation = validateConfig(config);
  if (!validation.valid) {
    return { tag: "Invalid", errors: validation.errors.map((e) => `config: ${e}`) };
  }
  return { tag: "Valid", config, warnings: validation.warnings };
}

// ═══════════════════════════════════════════════════════════════════════════════
// CONSOLE INPUT
// ═══════════════════════════════════════════════════════════════════════════════

/** Parse a `:command` line; undefined when the line is not a command. */
export function parseCommand(line: string): ConsoleCommand | undefined {
  const trimmed = line.trim();
  if (!trimmed.startsWith(":")) return undefined;
  const name = trimmed.slice(1).split(/\s+/)[0];

  switch (name) {
    case "prev":
    case "p":
      return { tag: "prev" };
    case "next":
    case "n":
      return { tag: "next" };
    case "history":
    case "hist":
      return { tag: "history" };
    case "save":
      return { tag: "save" };
    case "clear-history":
      return { tag: "clear-history" };
    case "help":
    case "h":
      return { tag: "help" };
    case "quit":
    case "q":
      return { tag: "quit" };
    default:
      return { tag: "unknown", name };
  }
}

const PREFIX_TOKENS = new Set<Tok["tag"]>(["Quote", "Function", "Backquote", "Comma", "CommaAt"]);

/**
 * Whether `text` can be submitted as is: every list and string is closed and
 * no quote prefix is left dangling. Lines are accumulated until this holds.
 */
export function isInputComplete(text: string): boolean {
  let depth = 0;
  const toks = tokenize(text);
  for (const t of toks) {
    if (t.tag === "LParen" || t.tag === "LBracket") depth++;
    else if (t.tag === "RParen" || t.tag === "RBracket") depth--;
    else if (t.tag === "Str" && !t.closed) return false;
  }
  const last = toks[toks.length - 1];
  if (last && PREFIX_TOKENS.has(last.tag)) return false;
  return depth <= 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// OUTPUT
// ═══════════════════════════════════════════════════════════════════════════════

export const AUXILIARY_TITLE = "*scratch-output*";

/**
 * Terminal display surfaces: inline results on one `=>` line, long results in
 * a framed block standing in for a separate output buffer.
 */
export function terminalSurfaces(write: (line: string) => void): DisplaySurfaces {
  return {
    showInline(text) {
      write(`=> ${text}`);
    },
    showAuxiliary(text) {
      write(`┌── ${AUXILIARY_TITLE} ──`);
      for (const line of text.split("\n")) {
        write(`│ ${line}`);
      }
      write("└──");
    },
  };
}

export function formatHistory(entries: readonly string[], cursor: number): string[] {
  if (entries.length === 0) return ["(history is empty)"];
  return entries.map((entry, i) => {
    const marker = i === cursor ? ">" : " ";
    return `${marker}${String(i).padStart(3, " ")}  ${entry.replace(/\n/g, "\n      ")}`;
  });
}
