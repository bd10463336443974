import type { Clock } from '../clock.js';

export interface FakeClock extends Clock {
  sleeps: number[];
  advance(ms: number): void;
}

/** sleep() returns at once and moves now() forward by the requested time */
export function createFakeClock(start = 0): FakeClock {
  let time = start;
  const sleeps: number[] = [];

  return {
    sleeps,
    now: () => time,
    async sleep(ms: number): Promise<void> {
      sleeps.push(ms);
      time += ms;
    },
    advance(ms: number): void {
      time += ms;
    },
  };
}
