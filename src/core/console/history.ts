import type { LoadResult, SaveResult } from "./historyFile";
import { readHistoryFile, writeHistoryFile } from "./historyFile";
import { createChildLogger } from "../logger";

const log = createChildLogger("history");

export const DEFAULT_HISTORY_SIZE = 100;

export type Direction = -1 | 1;

/**
 * Bounded, deduplicated list of submitted texts with a circular cursor.
 *
 * Entries are kept oldest first. Re-submitting an entry moves it to the tail.
 * The bound keeps the *first* `maxSize` entries, so once the ring is full,
 * new distinct submissions are dropped at the next `enforceBound()`.
 */
export class HistoryRing {
  private items: string[] = [];
  private cursor = 0;

  constructor(readonly maxSize: number = DEFAULT_HISTORY_SIZE) {
    if (!Number.isInteger(maxSize) || maxSize < 1) {
      throw new RangeError(`history size must be a positive integer, got ${maxSize}`);
    }
  }

  get size(): number {
    return this.items.length;
  }

  get position(): number {
    return this.cursor;
  }

  entries(): readonly string[] {
    return this.items;
  }

  /** Move `entry` to the tail, dropping any earlier occurrence. Does not bound. */
  push(entry: string): void {
    const idx = this.items.indexOf(entry);
    if (idx >= 0) this.items.splice(idx, 1);
    this.items.push(entry);
  }

  enforceBound(): void {
    if (this.items.length > this.maxSize) {
      this.items = this.items.slice(0, this.maxSize);
    }
  }

  /**
   * Step the cursor by `direction`, wrapping to the first entry when moving
   * forward past the end and to the last entry when moving back past the
   * start. Returns the entry under the cursor, or undefined when empty.
   */
  navigate(direction: Direction): string | undefined {
    const sum = this.cursor + direction;
    const last = this.items.length - 1;
    if (sum >= 0 && sum <= last) {
      this.cursor = sum;
    } else {
      this.cursor = direction > 0 ? 0 : Math.abs(last);
    }
    return this.items[this.cursor];
  }

  resetCursor(): void {
    this.cursor = 0;
  }

  clear(): void {
    this.items = [];
    this.cursor = 0;
  }

  save(filePath: string): SaveResult {
    this.enforceBound();
    const result = writeHistoryFile(filePath, this.items);
    if (result.tag === "Saved") {
      log.debug({ path: filePath, count: result.count }, "history saved");
    } else {
      log.warn({ path: filePath, reason: result.reason }, "history not saved");
    }
    return result;
  }

  /** Replace the entries with the file's contents; failures leave the ring empty. */
  load(filePath: string): LoadResult {
    const result = readHistoryFile(filePath);
    switch (result.tag) {
      case "Loaded":
        this.items = [...result.entries];
        this.enforceBound();
        log.debug({ path: filePath, count: this.items.length }, "history loaded");
        break;
      case "Missing":
        this.items = [];
        log.debug({ path: filePath }, "no history file");
        break;
      case "Corrupt":
        this.items = [];
        log.warn({ path: filePath, reason: result.reason }, "history file unreadable, starting empty");
        break;
    }
    this.cursor = 0;
    return result;
  }

  /** Forget everything, on disk as well. */
  cleanup(filePath: string): SaveResult {
    this.clear();
    return this.save(filePath);
  }
}
