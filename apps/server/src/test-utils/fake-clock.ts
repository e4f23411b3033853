import { setImmediate as nextTick } from "node:timers/promises";
import type { Clock } from "../services/clock.js";

/**
 * Clock whose sleeps return on the next tick and advance virtual time
 */
export class FakeClock implements Clock {
  readonly sleeps: number[] = [];
  private nowMs: number;

  constructor(startMs = 1_700_000_000_000) {
    this.nowMs = startMs;
  }

  now(): number {
    return this.nowMs;
  }

  async sleep(ms: number): Promise<void> {
    this.sleeps.push(ms);
    this.nowMs += ms;
    await nextTick();
  }

  advance(ms: number): void {
    this.nowMs += ms;
  }
}
