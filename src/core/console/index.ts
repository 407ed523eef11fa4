export type { Evaluator, DisplaySurfaces, DisplayTarget, Rendered } from "./types";
export { EvaluatorError } from "./errors";
export { type Form, type Segmentation, segment, segmentForms, countForms } from "./segment";
export { SEQUENCE_FORM, composeUnit, evaluate } from "./engine";
export { AUXILIARY_THRESHOLD, type Formatters, routeText, renderValue, renderFailure, display } from "./render";
export { DEFAULT_HISTORY_SIZE, type Direction, HistoryRing } from "./history";
export { type SaveResult, type LoadResult, type WriteAccess, planWrite, isWritable, readHistoryFile, writeHistoryFile } from "./historyFile";
export { type SessionOptions, type SubmitResult, ConsoleSession } from "./session";
