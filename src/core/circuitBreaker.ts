/**
 * Per-endpoint circuit breaker for webhook fault isolation.
 * CLOSED -> OPEN after `failureThreshold` consecutive failures;
 * OPEN -> HALF_OPEN once `resetTimeoutMs` has passed;
 * HALF_OPEN -> CLOSED after `successThreshold` successes, or back to OPEN on any failure.
 */

import type { Clock } from "./simulationClock.js";
import { systemClock } from "./simulationClock.js";

export type CircuitState = "closed" | "open" | "half_open";

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  successThreshold?: number;
  resetTimeoutMs?: number;
  clock?: Clock;
}

export class CircuitBreaker {
  private readonly failureThreshold: number;
  private readonly successThreshold: number;
  private readonly resetTimeoutMs: number;
  private readonly clock: Clock;

  private _state: CircuitState = "closed";
  private failures = 0;
  private successes = 0;
  private openedAt = 0;

  constructor(options: CircuitBreakerOptions = {}) {
    this.failureThreshold = options.failureThreshold ?? 5;
    this.successThreshold = options.successThreshold ?? 2;
    this.resetTimeoutMs = options.resetTimeoutMs ?? 60_000;
    this.clock = options.clock ?? systemClock;
  }

  get state(): CircuitState {
    return this._state;
  }

  get failureCount(): number {
    return this.failures;
  }

  canAttempt(): boolean {
    if (this._state === "open") {
      if (this.clock.now() - this.openedAt < this.resetTimeoutMs) return false;
      this._state = "half_open";
      this.successes = 0;
    }
    return true;
  }

  recordSuccess(): void {
    this.failures = 0;
    if (this._state === "half_open") {
      this.successes += 1;
      if (this.successes >= this.successThreshold) this._state = "closed";
    } else {
      this._state = "closed";
    }
  }

  recordFailure(): void {
    this.failures += 1;
    if (this._state === "half_open" || this.failures >= this.failureThreshold) {
      this._state = "open";
      this.openedAt = this.clock.now();
      this.successes = 0;
    }
  }
}
