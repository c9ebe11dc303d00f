/**
 * Clock abstraction, injectable for deterministic tests.
 *
 * Production code uses `Date.now` via `defaultClock`.
 * Tests inject a fake clock that returns fixed instants.
 */
export interface Clock {
  readonly now: () => number;
}

export const defaultClock: Clock = {
  now: () => Date.now(),
};
