/**
 * Time source for polling loops. Production code uses the system clock;
 * tests inject a fake whose sleep() just advances now().
 */

export interface Clock {
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: (ms: number) => new Promise(r => setTimeout(r, ms)),
};
