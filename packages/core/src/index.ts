/**
 * @seqfuse/core: configuration, logging and the error taxonomy shared by
 * every seqfuse package.
 */

export { config, defineConfig, isDebugEnabled, isFusionEnabled } from "./config.js";
export type { SeqfuseConfig } from "./config.js";

export { createLogger } from "./logger.js";
export type { Logger } from "./logger.js";

export {
  SeqError,
  ArgumentNullError,
  ArgumentOutOfRangeError,
  InsufficientElementsError,
  EmptySequenceError,
  SequenceTooLongError,
  InvalidOperationError,
  NotSupportedError,
  KeyNotFoundError,
  isSeqError,
} from "./errors.js";
export type { SeqErrorKind } from "./errors.js";

export { checkInteger, checkNonNull, checkNonNegative, checkPositive } from "./checks.js";
