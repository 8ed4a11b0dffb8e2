import { performance } from 'perf_hooks';
import type { Clock } from './types.js';

export const monotonicClock: Clock = {
  now: () => performance.now() / 1000,
};

/** Clock for tests and replays: only moves when told to. */
export class ManualClock implements Clock {
  constructor(private current = 0) {}

  now(): number {
    return this.current;
  }

  set(seconds: number): void {
    this.current = seconds;
  }

  advance(seconds: number): number {
    this.current += seconds;
    return this.current;
  }
}
