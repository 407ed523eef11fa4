#!/usr/bin/env npx tsx
// bin/scratch.ts
// Interactive scratch console
//
// Run:  npx tsx bin/scratch.ts
//       npx tsx bin/scratch.ts --eval "(+ 1 2)"

import * as readline from "readline";
import {
  parseCliArgs,
  getHelpText,
  getCommandHelpText,
  getVersion,
  buildConfig,
  resolveConfig,
  parseCommand,
  isInputComplete,
  terminalSurfaces,
  formatHistory,
  type CliConfig,
  type ConsoleCommand,
} from "./scratch-cli-lib";
import type { ScratchConfig } from "../src/core/config";
import { ConsoleSession } from "../src/core/console";
import { ScratchEvaluator, createScratchContext, type ScratchContext } from "../src/core/eval/evaluator";
import { isFail } from "../src/outcome/outcome";
import { logger } from "../src/core/logger";

const PROMPT = "scratch> ";
const CONTINUATION_PROMPT = "...      ";

const write = (line: string) => console.log(line);

// ═══════════════════════════════════════════════════════════════════════════════
// MAIN ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

async function main(): Promise<number> {
  const cliArgs = parseCliArgs(process.argv.slice(2));

  if (cliArgs.errors.length > 0) {
    for (const e of cliArgs.errors) console.error(e);
    console.error("Run with --help for usage.");
    return 2;
  }

  if (cliArgs.help) {
    write(getHelpText());
    return 0;
  }

  if (cliArgs.version) {
    write(getVersion());
    return 0;
  }

  const cli = buildConfig(cliArgs);
  const resolved = resolveConfig(cli);
  if (resolved.tag === "Invalid") {
    for (const e of resolved.errors) console.error(e);
    return 2;
  }
  const { config } = resolved;
  for (const w of resolved.warnings) logger.warn(w);
  logger.level = config.logLevel;

  const session = openSession(config);
  try {
    return cli.mode === "exec" ? executeMode(session, cli) : await replMode(session);
  } finally {
    session.close();
  }
}

function openSession(config: ScratchConfig): ConsoleSession<ScratchContext> {
  return ConsoleSession.open({
    context: createScratchContext(),
    evaluator: new ScratchEvaluator(),
    surfaces: terminalSurfaces(write),
    history: config.history,
  });
}

// ═══════════════════════════════════════════════════════════════════════════════
// EXECUTE MODE (--eval)
// ═══════════════════════════════════════════════════════════════════════════════

function executeMode(session: ConsoleSession<ScratchContext>, cli: CliConfig): number {
  const { outcome } = session.submit(cli.code ?? "");
  return isFail(outcome) ? 1 : 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// REPL MODE
// ═══════════════════════════════════════════════════════════════════════════════

/** Returns true when the console should exit. */
function runCommand(session: ConsoleSession<ScratchContext>, cmd: ConsoleCommand): boolean {
  switch (cmd.tag) {
    case "prev":
    case "next": {
      const entry = cmd.tag === "prev" ? session.previous() : session.next();
      write(entry === undefined ? "(history is empty)" : `[${session.ring.position}] ${entry}`);
      return false;
    }
    case "history":
      for (const line of formatHistory(session.ring.entries(), session.ring.position)) write(line);
      return false;
    case "save": {
      const result = session.saveHistory();
      write(result.tag === "Saved" ? `Saved ${result.count} entries to ${result.path}` : `History not saved: ${result.reason}`);
      return false;
    }
    case "clear-history": {
      const result = session.cleanupHistory();
      write(result.tag === "Saved" ? "History cleared." : `History cleared in memory only: ${result.reason}`);
      return false;
    }
    case "help":
      write(getCommandHelpText());
      return false;
    case "quit":
      return true;
    case "unknown":
      write(`Unknown command :${cmd.name} (try :help)`);
      return false;
  }
}

async function replMode(session: ConsoleSession<ScratchContext>): Promise<number> {
  const isTTY = Boolean(process.stdin.isTTY);
  const rl = readline.createInterface({
    input: process.stdin,
    output: isTTY ? process.stdout : undefined,
    prompt: PROMPT,
    history: [...session.ring.entries()].reverse(),
    historySize: session.ring.maxSize,
  });

  if (isTTY) {
    write(`${getVersion()}  (:help for commands)`);
    rl.prompt();
  }

  let buffer = "";

  try {
    for await (const line of rl) {
      if (buffer === "") {
        const cmd = parseCommand(line);
        if (cmd) {
          if (runCommand(session, cmd)) break;
          if (isTTY) rl.prompt();
          continue;
        }
        if (line.trim() === "") {
          if (isTTY) rl.prompt();
          continue;
        }
      }

      buffer += (buffer ? "\n" : "") + line;
      if (!isInputComplete(buffer)) {
        rl.setPrompt(CONTINUATION_PROMPT);
        if (isTTY) rl.prompt();
        continue;
      }

      session.submit(buffer);
      buffer = "";
      rl.setPrompt(PROMPT);
      if (isTTY) rl.prompt();
    }
  } finally {
    rl.close();
  }

  return 0;
}

// ═══════════════════════════════════════════════════════════════════════════════
// ENTRY POINT
// ═══════════════════════════════════════════════════════════════════════════════

main()
  .then((code) => {
    process.exitCode = code;
  })
  .catch((error: unknown) => {
    console.error("Fatal error:", error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  });
