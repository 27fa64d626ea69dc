/**
 * Sequence Error Types
 *
 * One class per failure category so callers can tell a bad argument from a
 * source that ran out early or an aggregate over nothing.
 */

export type SeqErrorKind =
  | "argument-null"
  | "argument-out-of-range"
  | "insufficient-elements"
  | "empty-sequence"
  | "sequence-too-long"
  | "invalid-operation"
  | "not-supported"
  | "key-not-found";

/**
 * Base class for all sequence failures.
 */
export class SeqError extends Error {
  constructor(
    message: string,
    readonly kind: SeqErrorKind
  ) {
    super(message);
    this.name = "SeqError";
  }
}

/**
 * Thrown when a required argument is null or undefined.
 */
export class ArgumentNullError extends SeqError {
  constructor(readonly paramName: string) {
    super(`Value cannot be null or undefined. (Parameter '${paramName}')`, "argument-null");
    this.name = "ArgumentNullError";
  }
}

/**
 * Thrown when a count, size or index is outside the accepted range.
 */
export class ArgumentOutOfRangeError extends SeqError {
  constructor(
    readonly paramName: string,
    readonly value: number,
    requirement: string
  ) {
    super(`The input must be ${requirement}.\n${paramName} = ${value}`, "argument-out-of-range");
    this.name = "ArgumentOutOfRangeError";
  }
}

/**
 * Thrown at completion when skip, take or tail saw fewer elements than it needed.
 */
export class InsufficientElementsError extends SeqError {
  constructor(
    readonly operation: string,
    readonly missing: number
  ) {
    super(
      missing > 0
        ? `The input sequence has an insufficient number of elements: tried to ${operation} ${missing} ${
            missing === 1 ? "element" : "elements"
          } past the end of the sequence.`
        : `The input sequence has an insufficient number of elements for ${operation}.`,
      "insufficient-elements"
    );
    this.name = "InsufficientElementsError";
  }
}

/**
 * Thrown when an operation needs at least one element and got none.
 */
export class EmptySequenceError extends SeqError {
  constructor(readonly paramName: string = "source") {
    super(`The input sequence was empty. (Parameter '${paramName}')`, "empty-sequence");
    this.name = "EmptySequenceError";
  }
}

/**
 * Thrown by exactlyOne when a second element exists.
 */
export class SequenceTooLongError extends SeqError {
  constructor(readonly paramName: string = "source") {
    super(
      `The input sequence contains more than one element. (Parameter '${paramName}')`,
      "sequence-too-long"
    );
    this.name = "SequenceTooLongError";
  }
}

/**
 * Thrown when an enumerator is used outside its running phase.
 */
export class InvalidOperationError extends SeqError {
  constructor(message: string) {
    super(message, "invalid-operation");
    this.name = "InvalidOperationError";
  }

  static notStarted(): InvalidOperationError {
    return new InvalidOperationError("Enumeration has not started. Call moveNext.");
  }

  static alreadyFinished(): InvalidOperationError {
    return new InvalidOperationError("Enumeration already finished.");
  }
}

export class NotSupportedError extends SeqError {
  constructor(message: string) {
    super(message, "not-supported");
    this.name = "NotSupportedError";
  }

  static noReset(): NotSupportedError {
    return new NotSupportedError("Reset is not supported on this enumerator.");
  }
}

/**
 * Thrown by find, pick and findIndex when nothing matched.
 */
export class KeyNotFoundError extends SeqError {
  constructor(message = "An index satisfying the predicate was not found in the collection.") {
    super(message, "key-not-found");
    this.name = "KeyNotFoundError";
  }
}

export function isSeqError(error: unknown): error is SeqError {
  return error instanceof SeqError;
}
