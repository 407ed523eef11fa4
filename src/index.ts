// src/index.ts
// scratch-console - Public API
//
// Interactive expression console: form segmentation, evaluation against a
// bound context, result rendering and a persisted history ring.

// ═══════════════════════════════════════════════════════════════════════════════
// CONSOLE CORE
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Evaluator,
  type DisplaySurfaces,
  type DisplayTarget,
  type Rendered,
  type Form,
  type Segmentation,
  type Formatters,
  type Direction,
  type SaveResult,
  type LoadResult,
  type SessionOptions,
  type SubmitResult,
  EvaluatorError,
  segment,
  segmentForms,
  countForms,
  SEQUENCE_FORM,
  composeUnit,
  evaluate,
  AUXILIARY_THRESHOLD,
  routeText,
  renderValue,
  renderFailure,
  display,
  DEFAULT_HISTORY_SIZE,
  HistoryRing,
  planWrite,
  isWritable,
  readHistoryFile,
  writeHistoryFile,
  ConsoleSession,
} from "./core/console";

// ═══════════════════════════════════════════════════════════════════════════════
// READER & PRINTER
// ═══════════════════════════════════════════════════════════════════════════════

export {
  type Datum,
  type Sym,
  type Flo,
  type Vec,
  type ReadResult,
  sym,
  flo,
  vec,
  isSym,
  isFlo,
  isVec,
  tokenize,
  Reader,
  readForm,
  readAll,
  parseNumber,
} from "./core/reader";
export { printVal, printDatum, prettyPrint, formatString, formatNumber, DEFAULT_PRETTY_WIDTH } from "./core/printer/print";

// ═══════════════════════════════════════════════════════════════════════════════
// SCRATCH EVALUATOR (default host)
// ═══════════════════════════════════════════════════════════════════════════════

export type { Val } from "./core/eval/values";
export { VNil, VT, num, float, str, list, vector, datumToVal } from "./core/eval/values";
export { ScratchContext, ScratchEvaluator, createScratchContext } from "./core/eval/evaluator";
export {
  VoidVariableError,
  VoidFunctionError,
  WrongTypeError,
  WrongArityError,
  UserError,
  SettingConstantError,
} from "./core/eval/errors";

// ═══════════════════════════════════════════════════════════════════════════════
// CONFIGURATION & LOGGING
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./core/config";
export { logger, createChildLogger, type Logger } from "./core/logger";

// ═══════════════════════════════════════════════════════════════════════════════
// OUTCOMES
// ═══════════════════════════════════════════════════════════════════════════════

export * from "./outcome";
