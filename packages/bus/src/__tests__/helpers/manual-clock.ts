import type { Clock } from '../../types.js';

/** A clock whose time only moves when a test (or a sleep) moves it. */
export interface ManualClock extends Clock {
  advance(ms: number): void;
  /** Every delay passed to `sleep`, in call order. */
  readonly sleeps: number[];
}

/** Sleeps resolve on the next microtask and advance the clock by the slept amount. */
export function createManualClock(start = Date.parse('2026-03-01T12:00:00.000Z')): ManualClock {
  let current = start;
  const sleeps: number[] = [];
  return {
    now: () => current,
    sleep: async (ms) => {
      sleeps.push(ms);
      current += Math.max(0, ms);
    },
    advance: (ms) => {
      current += ms;
    },
    sleeps,
  };
}
