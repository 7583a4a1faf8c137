// =============================================================================
// @paper-courier/shared — Ordered provider fallback
// =============================================================================
// A chain is a list of attempts tried in order. An attempt that throws moves
// the chain on only when its `recoverable` predicate accepts the error; any
// other failure, or running out of attempts, ends in the chain's default.
// The chain itself never throws.
// =============================================================================

import { errorMessage } from "../errors.js";
import { silentLogger, type Logger } from "../logger.js";

export interface Attempt<T> {
  name: string;
  run: () => Promise<T>;
  /** Whether a failure of this attempt should hand over to the next one */
  recoverable: (err: unknown) => boolean;
}

export interface ChainOutcome<T> {
  value: T;
  /** Name of the attempt that produced `value`, or undefined for the default */
  source?: string;
}

export async function runFallbackChain<T>(
  attempts: readonly Attempt<T>[],
  fallback: () => T,
  logger: Logger = silentLogger,
): Promise<ChainOutcome<T>> {
  for (const attempt of attempts) {
    try {
      return { value: await attempt.run(), source: attempt.name };
    } catch (err) {
      const recoverable = attempt.recoverable(err);
      logger.warn("Provider attempt failed", {
        attempt: attempt.name,
        recoverable,
        error: errorMessage(err),
      });
      if (!recoverable) break;
    }
  }
  return { value: fallback() };
}
