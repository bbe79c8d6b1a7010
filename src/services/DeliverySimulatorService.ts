/**
 * Time-accelerated delivery simulation for mock-adapter media buys.
 *
 * Each running media buy owns one SimulationTask. The task ticks every
 * `updateIntervalSeconds` of real time, turns elapsed real time into
 * simulated campaign time, and posts a delivery webhook per tick until the
 * flight is fully delivered (final notification) or it is stopped.
 *
 * Simulations live in memory only. They are not resumed when the process
 * restarts; see SimulationRecoveryService for the manual restart.
 */

import { getAppConfig } from "../core/config/configService.js";
import type { SimulationConfig } from "../core/config/types.js";
import { validateSimulationConfig } from "../core/config/configService.js";
import { SIMULATION_DEFAULTS } from "../core/constants.js";
import { computeDeliverySnapshot, type DeliverySnapshot, type MediaBuyRef } from "../core/deliverySimulation.js";
import { ConfigurationError } from "../core/errors.js";
import { createChildLogger, type Logger } from "../core/logger.js";
import { simulationTickCounter, simulationsFinishedCounter } from "../core/metrics.js";
import { simulatedElapsedMs, systemClock, tickIntervalMs, type Clock } from "../core/simulationClock.js";
import { withTimeout } from "../core/timeout.js";
import { isValidMediaBuyRef, validateMediaBuyRef } from "../core/validation.js";
import { getDb } from "../db/client.js";
import type { DeliveryNotificationType } from "../types/adcp.js";
import {
  buildDeliveryEnvelope,
  WebhookDeliveryNotifier,
  type DeliveryNotifier,
  type NotificationFailure,
  type NotificationOutcome,
} from "./ProtocolWebhookService.js";
import { SimulationRegistry, type RegisteredSimulation } from "./SimulationRegistry.js";
import {
  createDbDeliveryLogStore,
  createDbEndpointResolver,
  createDbMediaBuyReader,
} from "./SimulationDataService.js";
import { HttpWebhookDispatcher } from "./WebhookDeliveryService.js";

export type SimulationStatus = "active" | "completed" | "stopped";

/** Read-through source for the media buy; consulted once per tick. */
export interface MediaBuyReader {
  getMediaBuy(mediaBuyId: string): Promise<MediaBuyRef | undefined>;
}

export interface SimulationTaskState {
  mediaBuyId: string;
  tenantId: string;
  principalId: string;
  status: SimulationStatus;
  startedAt: string | null;
  /** Last emitted sequence number; 0 before the first tick. */
  sequenceNumber: number;
  finalized: boolean;
  timeAcceleration: number;
  updateIntervalSeconds: number;
  lastSnapshot: DeliverySnapshot | null;
}

export interface TickOutcome {
  sequenceNumber: number;
  notificationType: DeliveryNotificationType;
  snapshot: DeliverySnapshot;
  delivered: number;
  failures: NotificationFailure[];
}

export interface SimulationTaskDeps {
  notifier: DeliveryNotifier;
  clock?: Clock;
  reader?: MediaBuyReader;
  /** Deadline for the media-buy read and for the notification of one tick. */
  stepTimeoutMs?: number;
  /** Called once when the task reaches a terminal state. */
  onTerminal?: (task: SimulationTask) => void;
  logger?: Logger;
}

export class SimulationTask implements RegisteredSimulation {
  readonly mediaBuyId: string;

  private mediaBuy: MediaBuyRef;
  private readonly clock: Clock;
  private readonly log: Logger;
  private readonly intervalMs: number;
  private readonly stepTimeoutMs: number;

  private _status: SimulationStatus = "active";
  private startedAtMs: number | null = null;
  private sequence = 0;
  private finalized = false;
  private nextTickIndex = 0;
  /** Simulated elapsed time of the last tick; elapsed never moves backwards. */
  private lastElapsedMs = 0;
  private lastSnapshot: DeliverySnapshot | null = null;
  private timer: ReturnType<typeof setTimeout> | undefined;
  private tickChain: Promise<unknown> = Promise.resolve();
  private resolveSettled: (status: SimulationStatus) => void = () => undefined;
  private readonly settled: Promise<SimulationStatus>;

  constructor(
    mediaBuy: MediaBuyRef,
    private readonly config: SimulationConfig,
    private readonly deps: SimulationTaskDeps
  ) {
    this.mediaBuyId = mediaBuy.mediaBuyId;
    this.mediaBuy = mediaBuy;
    this.clock = deps.clock ?? systemClock;
    this.log = (deps.logger ?? createChildLogger("delivery-simulator")).child({ mediaBuyId: mediaBuy.mediaBuyId });
    this.intervalMs = tickIntervalMs(config.updateIntervalSeconds);
    this.stepTimeoutMs = deps.stepTimeoutMs ?? SIMULATION_DEFAULTS.STEP_TIMEOUT_MS;
    this.settled = new Promise((resolve) => {
      this.resolveSettled = resolve;
    });
  }

  get status(): SimulationStatus {
    return this._status;
  }

  get state(): SimulationTaskState {
    return {
      mediaBuyId: this.mediaBuyId,
      tenantId: this.mediaBuy.tenantId,
      principalId: this.mediaBuy.principalId,
      status: this._status,
      startedAt: this.startedAtMs === null ? null : new Date(this.startedAtMs).toISOString(),
      sequenceNumber: this.sequence,
      finalized: this.finalized,
      timeAcceleration: this.config.timeAcceleration,
      updateIntervalSeconds: this.config.updateIntervalSeconds,
      lastSnapshot: this.lastSnapshot,
    };
  }

  /** Resolves with the terminal status once the task completes or is stopped. */
  whenSettled(): Promise<SimulationStatus> {
    return this.settled;
  }

  /** Record the start time and fire the first tick immediately. */
  start(): void {
    if (this.startedAtMs !== null || this._status !== "active") return;
    this.startedAtMs = this.clock.now();

    const flightHours = (this.mediaBuy.endTime.getTime() - this.mediaBuy.startTime.getTime()) / 3_600_000;
    this.log.info(
      {
        flightHours,
        realDurationSeconds: (flightHours * 3600) / this.config.timeAcceleration,
        timeAcceleration: this.config.timeAcceleration,
        updateIntervalSeconds: this.config.updateIntervalSeconds,
      },
      "Started delivery simulation"
    );
    this.scheduleNext();
  }

  /**
   * Run one tick. Calls are serialized: a tick requested while another is in
   * flight runs after it. Returns undefined when the task is already terminal.
   */
  tick(): Promise<TickOutcome | undefined> {
    const run = this.tickChain.then(() => this.runTick());
    // Keep the chain alive past a failed tick; the caller still sees the rejection via `run`.
    this.tickChain = run.catch(() => undefined);
    return run;
  }

  /**
   * Idempotent. A tick already in flight still delivers; nothing is
   * scheduled afterwards. Returns false when the task was already terminal.
   */
  stop(): boolean {
    if (this._status !== "active") return false;
    this.finish("stopped");
    this.log.info({ sequenceNumber: this.sequence }, "Stopped delivery simulation");
    return true;
  }

  // Tick k is due at startedAt + k * interval, so dispatch latency does not
  // shift later ticks. A wall clock stepped backwards would push that far
  // out, so the wait is capped at one interval.
  private nextDueAt(now: number): number {
    if (this.startedAtMs === null || this.nextTickIndex === 0) return now + this.intervalMs;
    const dueAt = this.startedAtMs + this.nextTickIndex * this.intervalMs;
    return Math.min(Math.max(dueAt, now), now + this.intervalMs);
  }

  private scheduleNext(): void {
    if (this._status !== "active" || this.startedAtMs === null) return;
    const now = this.clock.now();
    // The first tick fires at once.
    const delay = this.nextTickIndex === 0 ? 0 : this.nextDueAt(now) - now;
    this.timer = setTimeout(() => {
      this.timer = undefined;
      void this.runScheduledTick();
    }, delay);
  }

  private async runScheduledTick(): Promise<void> {
    this.nextTickIndex += 1;
    try {
      await this.tick();
    } catch (err) {
      this.log.error({ err, sequenceNumber: this.sequence }, "Delivery simulation tick failed");
    }
    this.scheduleNext();
  }

  private async runTick(): Promise<TickOutcome | undefined> {
    if (this._status !== "active") return undefined;
    if (this.startedAtMs === null) this.startedAtMs = this.clock.now();

    const mediaBuy = await this.refreshMediaBuy();
    if (!mediaBuy) {
      this.log.info("Media buy no longer exists, stopping simulation");
      this.stop();
      return undefined;
    }

    const now = this.clock.now();
    const elapsed = Math.max(
      this.lastElapsedMs,
      simulatedElapsedMs(this.startedAtMs, now, this.config.timeAcceleration)
    );
    this.lastElapsedMs = elapsed;
    const snapshot = computeDeliverySnapshot(mediaBuy, elapsed, {
      pacing: this.config.pacing,
      traffic: this.config.traffic,
    });

    const isFinal = snapshot.complete && !this.finalized;
    if (isFinal) this.finalized = true;
    this.sequence += 1;
    const sequenceNumber = this.sequence;
    this.lastSnapshot = snapshot;

    const envelope = buildDeliveryEnvelope({
      mediaBuy,
      snapshot,
      sequenceNumber,
      isFinal,
      now: new Date(now),
      nextExpectedAt: new Date(this.nextDueAt(now)),
    });
    const notificationType = envelope.data.notification_type;
    simulationTickCounter.inc({ notification_type: notificationType });

    this.log.debug(
      { sequenceNumber, notificationType, impressions: snapshot.impressions, spend: snapshot.spend },
      `Delivery webhook #${sequenceNumber}`
    );

    const outcome = await this.notify(envelope);
    for (const failure of outcome.failures) {
      this.log.warn(
        { sequenceNumber, url: failure.url, statusCode: failure.statusCode, error: failure.error },
        "Delivery webhook dispatch failed"
      );
    }

    if (isFinal) {
      this.finish("completed");
      this.log.info({ sequenceNumber }, "Delivery simulation completed");
    }

    return {
      sequenceNumber,
      notificationType,
      snapshot,
      delivered: outcome.delivered,
      failures: outcome.failures,
    };
  }

  private async notify(envelope: Parameters<DeliveryNotifier["notify"]>[0]): Promise<NotificationOutcome> {
    try {
      return await withTimeout(this.deps.notifier.notify(envelope), this.stepTimeoutMs, "Webhook notification");
    } catch (err) {
      return {
        attempted: 0,
        delivered: 0,
        failures: [{ url: "", error: err instanceof Error ? err.message : "Notifier failed" }],
      };
    }
  }

  private async refreshMediaBuy(): Promise<MediaBuyRef | undefined> {
    if (!this.deps.reader) return this.mediaBuy;
    try {
      const fresh = await withTimeout(this.deps.reader.getMediaBuy(this.mediaBuyId), this.stepTimeoutMs, "Media buy read");
      if (!fresh) return undefined;
      if (isValidMediaBuyRef(fresh)) {
        this.mediaBuy = fresh;
      } else {
        this.log.warn("Re-read media buy is invalid, keeping previous values");
      }
    } catch (err) {
      this.log.warn({ err }, "Failed to re-read media buy, using last known values");
    }
    return this.mediaBuy;
  }

  private finish(status: "completed" | "stopped"): void {
    if (this._status !== "active") return;
    this._status = status;
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
    simulationsFinishedCounter.inc({ outcome: status });
    this.deps.onTerminal?.(this);
    this.resolveSettled(status);
  }
}

export interface DeliverySimulatorDeps {
  notifier: DeliveryNotifier;
  registry?: SimulationRegistry<SimulationTask>;
  clock?: Clock;
  /** Default read-through source; a start call may pass its own. */
  reader?: MediaBuyReader;
  stepTimeoutMs?: number;
  logger?: Logger;
}

export interface StartSimulationOptions {
  reader?: MediaBuyReader;
}

/** Entry point for buy-lifecycle handlers (create, pause, cancel, shutdown). */
export class DeliverySimulator {
  readonly registry: SimulationRegistry<SimulationTask>;

  constructor(private readonly deps: DeliverySimulatorDeps) {
    this.registry = deps.registry ?? new SimulationRegistry<SimulationTask>();
  }

  /**
   * Validate, register and start a simulation.
   * Throws ConfigurationError, ValidationError or DuplicateTaskError; nothing
   * is scheduled when it throws.
   */
  startSimulation(mediaBuy: MediaBuyRef, config: SimulationConfig, options: StartSimulationOptions = {}): SimulationTask {
    validateSimulationConfig(config);
    if (!config.enabled) {
      throw new ConfigurationError(`Delivery simulation is disabled for ${mediaBuy.mediaBuyId}`);
    }
    validateMediaBuyRef(mediaBuy);

    const reader = options.reader ?? this.deps.reader;
    const task = new SimulationTask(mediaBuy, config, {
      notifier: this.deps.notifier,
      ...(this.deps.clock && { clock: this.deps.clock }),
      ...(reader && { reader }),
      ...(this.deps.stepTimeoutMs !== undefined && { stepTimeoutMs: this.deps.stepTimeoutMs }),
      ...(this.deps.logger && { logger: this.deps.logger }),
      onTerminal: (t) => {
        this.registry.deregister(t.mediaBuyId, t);
      },
    });
    this.registry.register(mediaBuy.mediaBuyId, task);
    task.start();
    return task;
  }

  /** Idempotent; true only when a running simulation was stopped. */
  stopSimulation(mediaBuyId: string): boolean {
    return this.registry.lookup(mediaBuyId)?.stop() ?? false;
  }

  getSimulation(mediaBuyId: string): SimulationTask | undefined {
    return this.registry.lookup(mediaBuyId);
  }

  listSimulations(): SimulationTaskState[] {
    return this.registry.list().map((task) => task.state);
  }

  stopAll(): number {
    return this.registry.stopAll();
  }

  /** Wait for background delivery-log writes; call after stopAll on shutdown. */
  async drain(): Promise<void> {
    await this.deps.notifier.flush?.();
  }
}

let simulator: DeliverySimulator | null = null;

/** Process-wide simulator wired to the database and HTTP webhooks. */
export function getDeliverySimulator(): DeliverySimulator {
  if (!simulator) {
    const config = getAppConfig();
    const db = getDb();
    simulator = new DeliverySimulator({
      notifier: new WebhookDeliveryNotifier({
        resolver: createDbEndpointResolver(db),
        dispatcher: new HttpWebhookDispatcher(config.webhook),
        logStore: createDbDeliveryLogStore(db),
      }),
      registry: new SimulationRegistry<SimulationTask>(config.simulation.maxActive),
      reader: createDbMediaBuyReader(db),
      stepTimeoutMs: config.simulation.stepTimeoutMs,
    });
  }
  return simulator;
}

export function startSimulation(mediaBuy: MediaBuyRef, config: SimulationConfig): SimulationTask {
  return getDeliverySimulator().startSimulation(mediaBuy, config);
}

export function stopSimulation(mediaBuyId: string): boolean {
  return getDeliverySimulator().stopSimulation(mediaBuyId);
}
