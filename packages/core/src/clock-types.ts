/**
 * Clock abstraction, injectable for deterministic tests.
 *
 * Production code uses `systemClock`.
 * Tests inject a fake clock that controls time explicitly.
 */

export interface Clock {
  readonly now: () => Date;
}

export const systemClock: Clock = {
  now: () => new Date(),
};
