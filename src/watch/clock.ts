/**
 * clock.ts
 *
 * Time source for the tick loop and batch gaps.
 * Live runs use the wall clock; tests drive a ManualClock so no real waiting happens.
 */

import { setTimeout as delay } from 'node:timers/promises';

export interface Clock {
  now(): number;
  // resolves false when the signal aborted the wait
  sleep(ms: number, signal?: AbortSignal): Promise<boolean>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  async sleep(ms, signal) {
    if (signal?.aborted) return false;
    try {
      await delay(ms, undefined, { signal });
      return true;
    } catch (e) {
      if (signal?.aborted) return false;
      throw e;
    }
  },
};

/**
 * Deterministic clock: sleeping advances time instantly.
 * Every requested sleep is kept in `sleeps` so callers can check the pacing.
 */
export class ManualClock implements Clock {
  readonly sleeps: number[] = [];

  constructor(private currentMs: number = 0) {}

  now(): number {
    return this.currentMs;
  }

  async sleep(ms: number, signal?: AbortSignal): Promise<boolean> {
    if (signal?.aborted) return false;
    this.sleeps.push(ms);
    this.currentMs += ms;
    return !signal?.aborted;
  }
}
