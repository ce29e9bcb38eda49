import { setTimeout as delay } from "node:timers/promises";

/** Waits between worker states; swapped for a fake in tests */
export interface Sleeper {
  /** Resolves after `ms`, or early (without throwing) once `signal` aborts */
  sleep(ms: number, signal?: AbortSignal): Promise<void>;
}

export const timerSleeper: Sleeper = {
  async sleep(ms, signal) {
    if (signal?.aborted) return;
    try {
      await delay(ms, undefined, { signal });
    } catch (err) {
      if (signal?.aborted) return;
      throw err;
    }
  },
};
