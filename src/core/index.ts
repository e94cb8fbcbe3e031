/**
 * 织入引擎核心模块
 */
export { comparePositions, formatPosition, positionAt, resolveOffset } from "./position-resolver";
export { parseMatchReport, parseRecordBlock, splitRecordBlocks, RECORD_MARKER } from "./report-parser";
export { expandAdvice, orderArgumentKeys, DEFAULT_PLACEHOLDER } from "./template-expander";
export type { ExpandOptions } from "./template-expander";
export { weaveText, weaveFile, readTextFile, writeTextFile } from "./file-weaver";
export {
  ErrorCategory,
  ErrorSeverity,
  WeaveError,
  createWeaveError,
  formatError,
  logError,
  toWeaveError,
} from "./error-handler";
export type { WeaveErrorOptions } from "./error-handler";
