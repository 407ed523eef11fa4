import type { Val } from "../eval/values";
import type { DisplaySurfaces, Evaluator, Rendered } from "./types";
import type { HistoryConfig } from "../config/config";
import type { LoadResult, SaveResult } from "./historyFile";
import { HistoryRing } from "./history";
import { evaluate } from "./engine";
import { renderValue, renderFailure, display } from "./render";
import type { Outcome } from "../../outcome/outcome";
import { match } from "../../outcome/matchers";
import { createChildLogger } from "../logger";

const log = createChildLogger("console");

export type SessionOptions<C> = {
  context: C;
  evaluator: Evaluator<C>;
  surfaces: DisplaySurfaces;
  history: HistoryConfig;
  /** Ring shared across sessions; a fresh one is created when omitted. */
  ring?: HistoryRing;
};

export type SubmitResult = {
  outcome: Outcome<Val>;
  rendered: Rendered;
};

/**
 * One console session: the execution context captured when it opened, the
 * history ring and its cursor, and the sinks results are shown on.
 */
export class ConsoleSession<C> {
  readonly ring: HistoryRing;
  /** Result of the lazy history load at open, if one happened. */
  readonly restored?: LoadResult;
  private binding: { context: C } | undefined;
  private readonly evaluator: Evaluator<C>;
  private readonly surfaces: DisplaySurfaces;
  private readonly historyFile: string;

  private constructor(opts: SessionOptions<C>) {
    this.binding = { context: opts.context };
    this.evaluator = opts.evaluator;
    this.surfaces = opts.surfaces;
    this.historyFile = opts.history.filePath;
    this.ring = opts.ring ?? new HistoryRing(opts.history.maxSize);
    if (this.ring.size === 0) {
      this.restored = this.ring.load(this.historyFile);
    }
    this.ring.resetCursor();
  }

  static open<C>(opts: SessionOptions<C>): ConsoleSession<C> {
    return new ConsoleSession(opts);
  }

  get isOpen(): boolean {
    return this.binding !== undefined;
  }

  /**
   * Record `text` in history, evaluate it against the bound context and show
   * the result (or the error) on the appropriate surface.
   */
  submit(text: string): SubmitResult {
    if (!this.binding) {
      throw new Error("console session is closed");
    }
    const { context } = this.binding;

    this.ring.push(text);
    this.ring.enforceBound();

    const outcome = evaluate(text, context, this.evaluator);
    const rendered = match<Val, Rendered>(outcome, {
      done: (d) => renderValue(d.value),
      fail: (f) => {
        log.debug({ reason: f.failure.reason }, f.failure.message);
        return renderFailure(f.failure);
      },
    });
    display(rendered, this.surfaces);
    return { outcome, rendered };
  }

  previous(): string | undefined {
    return this.ring.navigate(-1);
  }

  next(): string | undefined {
    return this.ring.navigate(1);
  }

  saveHistory(): SaveResult {
    return this.ring.save(this.historyFile);
  }

  cleanupHistory(): SaveResult {
    return this.ring.cleanup(this.historyFile);
  }

  /** Persist history and release the execution context. */
  close(): SaveResult {
    const result = this.saveHistory();
    this.binding = undefined;
    return result;
  }
}
