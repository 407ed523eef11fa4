import * as fs from "fs";
import * as path from "path";
import { createChildLogger } from "../logger";

const log = createChildLogger("history");

export type SaveResult =
  | { tag: "Saved"; path: string; count: number }
  | { tag: "Skipped"; path: string; reason: string };

export type LoadResult =
  | { tag: "Loaded"; path: string; entries: string[] }
  | { tag: "Missing"; path: string }
  | { tag: "Corrupt"; path: string; reason: string };

function describe(e: unknown): string {
  return e instanceof Error ? e.message : String(e);
}

function nearestExistingDir(dir: string): string {
  let current = dir;
  while (!fs.existsSync(current)) {
    const parent = path.dirname(current);
    if (parent === current) break;
    current = parent;
  }
  return current;
}

export type WriteAccess = (target: string) => boolean;

const hasWriteAccess: WriteAccess = (target) => {
  try {
    fs.accessSync(target, fs.constants.W_OK);
    return true;
  } catch {
    return false;
  }
};

/**
 * How `filePath` can be written, or undefined when it cannot.
 *
 * - `replace`: a sibling temp file is renamed over the target. Needs a
 *   writable directory (missing directories are created on save).
 * - `in-place`: the file is writable but its directory is not, so the file
 *   is overwritten directly.
 */
export function planWrite(filePath: string, canWrite: WriteAccess = hasWriteAccess): "replace" | "in-place" | undefined {
  try {
    if (fs.existsSync(filePath)) {
      if (!fs.statSync(filePath).isFile() || !canWrite(filePath)) return undefined;
      return canWrite(path.dirname(filePath)) ? "replace" : "in-place";
    }
    const dir = nearestExistingDir(path.dirname(filePath));
    return fs.statSync(dir).isDirectory() && canWrite(dir) ? "replace" : undefined;
  } catch (e) {
    log.debug({ path: filePath, err: describe(e) }, "cannot stat history path");
    return undefined;
  }
}

export function isWritable(filePath: string, canWrite: WriteAccess = hasWriteAccess): boolean {
  return planWrite(filePath, canWrite) !== undefined;
}

/** Write `entries` as a JSON array, the way `planWrite` allows. */
export function writeHistoryFile(
  filePath: string,
  entries: readonly string[],
  canWrite: WriteAccess = hasWriteAccess
): SaveResult {
  const mode = planWrite(filePath, canWrite);
  if (!mode) {
    return { tag: "Skipped", path: filePath, reason: "not writable" };
  }
  const text = `${JSON.stringify(entries, null, 2)}\n`;
  if (mode === "in-place") {
    try {
      fs.writeFileSync(filePath, text, "utf8");
      return { tag: "Saved", path: filePath, count: entries.length };
    } catch (e) {
      return { tag: "Skipped", path: filePath, reason: describe(e) };
    }
  }
  const tmp = `${filePath}.${process.pid}.tmp`;
  try {
    fs.mkdirSync(path.dirname(filePath), { recursive: true });
    fs.writeFileSync(tmp, text, "utf8");
    fs.renameSync(tmp, filePath);
    return { tag: "Saved", path: filePath, count: entries.length };
  } catch (e) {
    fs.rmSync(tmp, { force: true });
    return { tag: "Skipped", path: filePath, reason: describe(e) };
  }
}

export function readHistoryFile(filePath: string): LoadResult {
  if (!fs.existsSync(filePath)) {
    return { tag: "Missing", path: filePath };
  }
  let data: unknown;
  try {
    data = JSON.parse(fs.readFileSync(filePath, "utf8"));
  } catch (e) {
    return { tag: "Corrupt", path: filePath, reason: describe(e) };
  }
  if (!Array.isArray(data) || !data.every((x): x is string => typeof x === "string")) {
    return { tag: "Corrupt", path: filePath, reason: "expected an array of strings" };
  }
  return { tag: "Loaded", path: filePath, entries: data };
}
