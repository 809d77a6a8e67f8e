/**
 * Clock abstraction: injectable for deterministic testing.
 *
 * Production code reads wall-clock milliseconds via `systemClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

export interface Clock {
  /** Current time in epoch milliseconds */
  readonly now: () => number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};
