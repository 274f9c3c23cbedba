import { performance } from "perf_hooks";

/**
 * Source of "now" for the limiters, in milliseconds.
 * Only differences between two readings are meaningful.
 */
export interface Clock {
  now(): number;
}

export const monotonicClock: Clock = {
  now: () => performance.now(),
};

/**
 * Clock that only moves when told to. Used to drive limiters
 * deterministically.
 */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += ms;
  }

  set(ms: number): void {
    this.current = ms;
  }
}
