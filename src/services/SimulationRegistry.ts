/**
 * Process-wide table of running delivery simulations, keyed by media buy id.
 *
 * Every method runs synchronously on the event loop, so a registration, a
 * self-deregistration on completion and an external stop can never
 * interleave inside one another.
 */

import { DuplicateTaskError, SimulationCapacityError } from "../core/errors.js";
import { activeSimulationsGauge } from "../core/metrics.js";

export interface RegisteredSimulation {
  readonly mediaBuyId: string;
  stop(): boolean;
}

export class SimulationRegistry<T extends RegisteredSimulation = RegisteredSimulation> {
  private readonly tasks = new Map<string, T>();

  constructor(private readonly maxActive: number = Number.POSITIVE_INFINITY) {}

  get size(): number {
    return this.tasks.size;
  }

  register(mediaBuyId: string, task: T): void {
    if (this.tasks.has(mediaBuyId)) throw new DuplicateTaskError(mediaBuyId);
    if (this.tasks.size >= this.maxActive) throw new SimulationCapacityError(this.maxActive);
    this.tasks.set(mediaBuyId, task);
    activeSimulationsGauge.set(this.tasks.size);
  }

  lookup(mediaBuyId: string): T | undefined {
    return this.tasks.get(mediaBuyId);
  }

  /**
   * Remove an entry; no-op when absent. With `task`, only that exact instance
   * is removed so a finished task cannot evict a newer one under the same id.
   */
  deregister(mediaBuyId: string, task?: T): boolean {
    const current = this.tasks.get(mediaBuyId);
    if (!current || (task && current !== task)) return false;
    this.tasks.delete(mediaBuyId);
    activeSimulationsGauge.set(this.tasks.size);
    return true;
  }

  list(): T[] {
    return [...this.tasks.values()];
  }

  /** Stop every task and empty the table; returns how many were running. */
  stopAll(): number {
    const running = this.list();
    for (const task of running) task.stop();
    this.clear();
    return running.length;
  }

  clear(): void {
    this.tasks.clear();
    activeSimulationsGauge.set(0);
  }
}
