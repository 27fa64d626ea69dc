/**
 * Scoped console logging for pipeline tracing.
 *
 * `debug` lines are printed only while the `debug` config flag is on;
 * `warn` lines are always printed. Every line carries a `[seqfuse:<scope>]`
 * prefix so traces from different drivers can be told apart.
 */

import { isDebugEnabled } from "./config.js";

export interface Logger {
  readonly scope: string;
  debug(message: string): void;
  warn(message: string, detail?: unknown): void;
}

export function createLogger(scope: string): Logger {
  const prefix = `[seqfuse:${scope}]`;

  return {
    scope,
    debug(message) {
      if (!isDebugEnabled()) return;
      console.log(`${prefix} ${message}`);
    },
    warn(message, detail) {
      if (detail === undefined) {
        console.warn(`${prefix} ${message}`);
      } else {
        console.warn(`${prefix} ${message}`, detail);
      }
    },
  };
}
