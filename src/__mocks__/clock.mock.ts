import type { Clock } from '../delivery/clock.js';

export interface FakeClock extends Clock {
  /** Every delay passed to `sleep`, in call order */
  readonly sleeps: number[];
}

/**
 * Clock whose sleeps resolve immediately and advance `now()`
 */
export function createFakeClock(start = 1_700_000_000_000): FakeClock {
  let current = start;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => current,
    sleep: async (ms: number) => {
      sleeps.push(ms);
      current += ms;
    },
  };
}
