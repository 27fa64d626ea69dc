/**
 * Argument checks shared by the public operations. They run before any
 * element is pulled.
 */

import { ArgumentNullError, ArgumentOutOfRangeError } from "./errors.js";

export function checkNonNull<T>(paramName: string, value: T | null | undefined): asserts value is T {
  if (value === null || value === undefined) {
    throw new ArgumentNullError(paramName);
  }
}

/** Rejects NaN, fractions and the infinities. */
export function checkInteger(paramName: string, value: number): void {
  if (!Number.isInteger(value)) {
    throw new ArgumentOutOfRangeError(paramName, value, "an integer");
  }
}

export function checkNonNegative(paramName: string, value: number): void {
  checkInteger(paramName, value);
  if (value < 0) {
    throw new ArgumentOutOfRangeError(paramName, value, "non-negative");
  }
}

export function checkPositive(paramName: string, value: number): void {
  checkInteger(paramName, value);
  if (value <= 0) {
    throw new ArgumentOutOfRangeError(paramName, value, "positive");
  }
}
