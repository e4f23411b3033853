import { setTimeout as delay } from "node:timers/promises";

/**
 * Time source for polling, warm-up and duration reporting
 */
export interface Clock {
  /**
   * Current time in epoch milliseconds
   */
  now(): number;
  sleep(ms: number): Promise<void>;
}

export const systemClock: Clock = {
  now: () => Date.now(),
  sleep: async (ms: number) => {
    await delay(ms);
  },
};
