export type SleepFn = (ms: number) => Promise<void>;

/** Monotonic clock in milliseconds */
export type ClockFn = () => number;

export const sleep: SleepFn = (ms) =>
  new Promise((resolve) => setTimeout(resolve, ms));

export const monotonicNow: ClockFn = () => performance.now();

/**
 * Delay to wait after a generative call so that the next one starts no
 * earlier than `start + floorSeconds + marginSeconds`. Elapsed time is
 * truncated to whole seconds before the subtraction.
 *
 * @example rateLimitDelayMs(3200, 12) === 10_000
 */
export function rateLimitDelayMs(
  elapsedMs: number,
  floorSeconds: number,
  marginSeconds = 1,
): number {
  const elapsedSeconds = Math.trunc(elapsedMs / 1000);
  return (Math.max(floorSeconds - elapsedSeconds, 0) + marginSeconds) * 1000;
}
