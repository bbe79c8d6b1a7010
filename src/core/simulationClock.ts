/**
 * Clock model for accelerated delivery simulation.
 * Maps real elapsed time onto simulated campaign time.
 */

export interface Clock {
  /** Current wall-clock time in epoch milliseconds. */
  now(): number;
}

export const systemClock: Clock = {
  now: () => Date.now(),
};

/** Clock that only moves when told to; for deterministic tests and demos. */
export class ManualClock implements Clock {
  constructor(private current: number = 0) {}

  now(): number {
    return this.current;
  }

  advance(ms: number): void {
    this.current += Math.max(0, ms);
  }

  set(ms: number): void {
    this.current = ms;
  }
}

/**
 * Simulated elapsed milliseconds for a task started at `startMs`.
 * `timeAcceleration` is simulated seconds per real second.
 */
export function simulatedElapsedMs(startMs: number, nowMs: number, timeAcceleration: number): number {
  return (nowMs - startMs) * timeAcceleration;
}

/** Real milliseconds between ticks. */
export function tickIntervalMs(updateIntervalSeconds: number): number {
  return updateIntervalSeconds * 1000;
}
