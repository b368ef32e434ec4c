/**
 * Monitor: wires the registry, prober, health tracker, redeploy coordinator
 * and scheduler together and exposes the operator operations
 */

import {
  ForbiddenError,
  NotFoundError,
  createLogger,
  errorMessage,
  systemClock,
} from '@lazarus/core';
import type {
  Clock,
  HealthState,
  Logger,
  ProbeResult,
  RedeployAttempt,
  Target,
  TargetDetail,
  TargetView,
} from '@lazarus/core';
import { SlotTable } from './health/slots.js';
import { HealthTracker } from './health/tracker.js';
import type { MonitorMetrics } from './metrics/registry.js';
import type { Notifier } from './notifier/types.js';
import { Prober } from './probe/prober.js';
import type { ProviderClients } from './providers/types.js';
import { RedeployCoordinator } from './redeploy/coordinator.js';
import { TargetRegistry, type RegistryChange } from './registry/target-registry.js';
import { Scheduler } from './scheduler/scheduler.js';
import type { ConfigStore } from './store/types.js';

export interface MonitorOptions {
  store: ConfigStore;
  providers: ProviderClients;
  notifier: Notifier;
  prober?: Prober;
  metrics?: MonitorMetrics;
  clock?: Clock;
  logger?: Logger;
  poolSize: number;
  tickMs: number;
  providerTimeoutMs: number;
  historySize: number;
}

export class Monitor {
  readonly registry: TargetRegistry;
  private readonly slots = new SlotTable();
  private readonly tracker: HealthTracker;
  private readonly coordinator: RedeployCoordinator;
  private readonly scheduler: Scheduler;
  private readonly prober: Prober;
  private readonly metrics: MonitorMetrics | undefined;
  private readonly logger: Logger;
  private started = false;

  constructor(options: MonitorOptions) {
    const clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('monitor');
    this.metrics = options.metrics;
    this.prober = options.prober ?? new Prober({ clock });

    this.registry = new TargetRegistry({
      store: options.store,
      clock,
      logger: this.logger.child('registry'),
    });
    this.tracker = new HealthTracker({
      slots: this.slots,
      notifier: options.notifier,
      clock,
      logger: this.logger.child('health'),
      metrics: options.metrics,
    });
    this.coordinator = new RedeployCoordinator({
      registry: this.registry,
      slots: this.slots,
      tracker: this.tracker,
      providers: options.providers,
      store: options.store,
      notifier: options.notifier,
      providerTimeoutMs: options.providerTimeoutMs,
      historySize: options.historySize,
      clock,
      logger: this.logger.child('redeploy'),
      metrics: options.metrics,
    });
    this.scheduler = new Scheduler({
      registry: this.registry,
      cycle: (target) => this.runProbeCycle(target),
      poolSize: options.poolSize,
      tickMs: options.tickMs,
      drain: () => this.coordinator.drain(),
      clock,
      logger: this.logger.child('scheduler'),
      metrics: options.metrics,
    });

    this.registry.onChange((change) => this.onRegistryChange(change));
  }

  /**
   * Restore targets and redeploy history, then start the scheduler
   */
  async start(): Promise<void> {
    if (this.started) {
      return;
    }
    const targets = await this.registry.load();
    for (const target of targets) {
      this.slots.create(target.id);
      this.metrics?.setTargetStatus(target.id, 'UNKNOWN');
    }
    await this.coordinator.loadHistory();

    this.scheduler.start();
    this.started = true;
    this.logger.info(`Monitoring ${targets.length} target(s)`);
  }

  /**
   * Stop probing and wait for in-flight work until the deadline
   * @returns Whether everything drained in time
   */
  async stop(deadlineMs: number): Promise<boolean> {
    const drained = await this.scheduler.stop(deadlineMs);
    this.started = false;
    return drained;
  }

  get isRunning(): boolean {
    return this.scheduler.isRunning;
  }

  listTargets(): TargetView[] {
    return this.registry.list().map((target) => ({ target, health: this.healthOf(target.id) }));
  }

  /**
   * @throws {NotFoundError} When the id is unknown
   */
  getHealth(id: string): HealthState {
    this.registry.require(id);
    return this.healthOf(id);
  }

  /**
   * @throws {NotFoundError} When the id is unknown
   */
  getTarget(id: string): TargetDetail {
    const target = this.registry.require(id);
    return {
      target,
      health: this.healthOf(id),
      history: this.coordinator.history(id),
    };
  }

  /**
   * @throws {NotFoundError} When the id is unknown
   */
  getHistory(id: string): RedeployAttempt[] {
    this.registry.require(id);
    return this.coordinator.history(id);
  }

  async addTarget(input: unknown): Promise<Target> {
    return this.registry.add(input);
  }

  async updateTarget(id: string, fields: unknown): Promise<Target> {
    return this.registry.update(id, fields);
  }

  async removeTarget(id: string): Promise<Target> {
    return this.registry.remove(id);
  }

  /**
   * Probe now, through the target's lane, and return the applied result
   * @throws {NotFoundError} When the id is unknown
   */
  async forceProbe(id: string): Promise<ProbeResult> {
    const target = this.registry.require(id);
    return this.scheduler.forceProbe(target);
  }

  /**
   * Manual redeploy under the same in-flight and cooldown rules as escalation
   * @throws {NotFoundError} When the id is unknown
   * @throws {ForbiddenError} When manual redeploys are disabled for the target
   */
  async forceRedeploy(id: string): Promise<RedeployAttempt> {
    const target = this.registry.require(id);
    if (!target.allowManualRedeploy) {
      throw new ForbiddenError(`Manual redeploy is disabled for target '${id}'`);
    }
    return this.coordinator.requestRedeploy(id, 'MANUAL');
  }

  private healthOf(id: string): HealthState {
    const state = this.tracker.getState(id);
    if (!state) {
      throw new NotFoundError('Target', id);
    }
    return state;
  }

  private async runProbeCycle(target: Target): Promise<ProbeResult> {
    const slot = this.slots.get(target.id);
    const result = await this.prober.probe(target);

    // Use the configuration current at completion; drop results for removed targets
    const current = this.registry.get(target.id);
    if (!current || !slot || !this.slots.isCurrent(slot)) {
      this.logger.debug(`Discarding probe result for removed target '${target.id}'`);
      return result;
    }
    this.metrics?.recordProbe(target.id, result.outcome.kind, result.latencyMs);

    const decision = this.tracker.recordProbe(current, result, this.coordinator.isEligible(current.id));
    if (decision.escalate) {
      void this.coordinator.requestRedeploy(current.id, 'AUTOMATIC').catch((error: unknown) => {
        this.logger.error(`Automatic redeploy of '${current.id}' failed`, toError(error));
      });
    }
    return result;
  }

  private onRegistryChange(change: RegistryChange): void {
    const id = change.target.id;
    switch (change.type) {
      case 'added':
        this.slots.create(id);
        this.metrics?.setTargetStatus(id, 'UNKNOWN');
        break;
      case 'updated':
        break;
      case 'removed':
        this.slots.delete(id);
        this.metrics?.forgetTarget(id);
        void this.coordinator.forget(id).catch((error: unknown) => {
          this.logger.warn(`Failed to delete redeploy history for '${id}'`, { error: errorMessage(error) });
        });
        break;
    }
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}
