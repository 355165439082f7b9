/**
 * Clock abstraction for testable freshness windows and timestamps.
 *
 * @module clock
 */

/**
 * Clock interface for getting current wall time in milliseconds.
 * Allows injection of fake clocks in tests for deterministic timing.
 */
export interface Clock {
  /** Milliseconds since the Unix epoch */
  now(): number;
}

/**
 * Production clock backed by Date.now().
 */
export const systemClock: Clock = {
  now: () => Date.now(),
};

/**
 * Manually advanced clock for tests and simulations.
 */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

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
