import { performance } from 'node:perf_hooks';
import { setTimeout as sleep } from 'node:timers/promises';

/**
 * Time source for frame pacing. Tests swap in a virtual clock.
 */
export interface Clock {
  /** Monotonic milliseconds. */
  now(): number;
  /** Rejects with an AbortError when `signal` aborts mid-sleep. */
  sleep(ms: number, signal: AbortSignal): Promise<void>;
}

export const systemClock: Clock = {
  now: () => performance.now(),
  sleep: (ms, signal) => sleep(ms, undefined, { signal }),
};
