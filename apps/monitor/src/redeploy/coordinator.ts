/**
 * Redeploy coordinator: one attempt in flight per target, cooldown between
 * attempt starts, bounded persisted history
 */

import { randomUUID } from 'node:crypto';
import {
  NotFoundError,
  RedeployHistorySchema,
  createLogger,
  createTimeoutSignal,
  describeRedeployOutcome,
  errorMessage,
  formatZodIssues,
  isTimeoutAbort,
  systemClock,
  withTimeout,
} from '@lazarus/core';
import type {
  Clock,
  Logger,
  ProviderOutcome,
  RedeployAttempt,
  RedeployOutcome,
  RedeployTrigger,
  Target,
} from '@lazarus/core';
import type { HealthTracker } from '../health/tracker.js';
import type { InFlightAttempt, SlotTable, TargetSlot } from '../health/slots.js';
import type { MonitorMetrics } from '../metrics/registry.js';
import type { Notifier } from '../notifier/types.js';
import type { ProviderClients } from '../providers/types.js';
import type { TargetRegistry } from '../registry/target-registry.js';
import { STORE_KEYS, type ConfigStore } from '../store/index.js';

export interface RedeployCoordinatorOptions {
  registry: TargetRegistry;
  slots: SlotTable;
  tracker: HealthTracker;
  providers: ProviderClients;
  store: ConfigStore;
  notifier: Notifier;
  providerTimeoutMs: number;
  historySize: number;
  clock?: Clock;
  logger?: Logger;
  metrics?: MonitorMetrics;
}

export class RedeployCoordinator {
  private histories = new Map<string, RedeployAttempt[]>();
  private inFlight = new Set<Promise<RedeployAttempt>>();
  // Keyed by target id rather than slot: an attempt started before a remove and
  // re-add still blocks and cools down the new registration
  private active = new Map<string, InFlightAttempt>();
  private lastStartMono = new Map<string, number>();
  private readonly options: RedeployCoordinatorOptions;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(options: RedeployCoordinatorOptions) {
    this.options = options;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('redeploy');
  }

  /**
   * No attempt in flight and the cooldown since the last attempt start has elapsed
   */
  isEligible(targetId: string): boolean {
    const slot = this.options.slots.get(targetId);
    const target = this.options.registry.get(targetId);
    if (!slot || !target) {
      return false;
    }
    return this.throttleReason(target) === null;
  }

  /**
   * Start a redeploy, or return a THROTTLED attempt without calling the provider
   * when one is already in flight or the cooldown has not elapsed.
   * Provider failures are returned as FAILED attempts.
   *
   * @throws {NotFoundError} When the target is not registered
   */
  async requestRedeploy(targetId: string, trigger: RedeployTrigger): Promise<RedeployAttempt> {
    const target = this.options.registry.get(targetId);
    const slot = this.options.slots.get(targetId);
    if (!target || !slot) {
      throw new NotFoundError('Target', targetId);
    }

    const throttled = this.throttleReason(target);
    if (throttled !== null) {
      const now = this.clock.now().toISOString();
      const attempt: RedeployAttempt = {
        id: randomUUID(),
        targetId,
        trigger,
        requestedAt: now,
        completedAt: now,
        outcome: { kind: 'THROTTLED', reason: throttled },
      };
      this.logger.info(`Redeploy of '${targetId}' throttled: ${throttled}`, { trigger });
      this.options.metrics?.recordRedeploy(targetId, attempt.outcome);
      this.publishAttempt(attempt);
      return attempt;
    }

    const run = this.execute(target, slot, trigger);
    this.inFlight.add(run);
    try {
      return await run;
    } finally {
      this.inFlight.delete(run);
    }
  }

  /**
   * Completed attempts for a target, newest last
   */
  history(targetId: string): RedeployAttempt[] {
    return [...(this.histories.get(targetId) ?? [])];
  }

  /**
   * Restore histories from the store and seed cooldowns so a restart does not reset them
   */
  async loadHistory(): Promise<void> {
    const entries = await this.options.store.list(STORE_KEYS.HISTORY_PREFIX);

    for (const entry of entries) {
      const targetId = entry.key.slice(STORE_KEYS.HISTORY_PREFIX.length);
      const parsed = RedeployHistorySchema.safeParse(entry.value);
      if (!parsed.success) {
        this.logger.warn(`Skipping invalid redeploy history '${entry.key}'`, {
          issues: formatZodIssues(parsed.error),
        });
        continue;
      }
      if (!this.options.registry.has(targetId)) {
        continue;
      }

      const history = parsed.data.slice(-this.options.historySize);
      this.histories.set(targetId, history);

      const last = history[history.length - 1];
      if (last) {
        const elapsed = Math.max(0, this.clock.now().getTime() - Date.parse(last.requestedAt));
        this.lastStartMono.set(targetId, this.clock.monotonic() - elapsed);
        this.options.tracker.seedLastRedeploy(targetId, last.requestedAt);
      }
    }
  }

  /**
   * Drop the history of a removed target. The cooldown and any running attempt
   * still apply if the id is registered again.
   */
  async forget(targetId: string): Promise<void> {
    this.histories.delete(targetId);
    await this.options.store.delete(STORE_KEYS.history(targetId));
  }

  /**
   * Resolves once every in-flight attempt has settled
   */
  async drain(): Promise<void> {
    while (this.inFlight.size > 0) {
      await Promise.allSettled(Array.from(this.inFlight));
    }
  }

  get inFlightCount(): number {
    return this.inFlight.size;
  }

  private throttleReason(target: Target): string | null {
    if (this.active.has(target.id)) {
      return 'redeploy already in progress';
    }
    const lastStart = this.lastStartMono.get(target.id);
    if (lastStart !== undefined) {
      const cooldownMs = target.cooldownSeconds * 1000;
      const elapsed = this.clock.monotonic() - lastStart;
      if (elapsed < cooldownMs) {
        const remaining = Math.ceil((cooldownMs - elapsed) / 1000);
        return `cooldown active, ${remaining}s remaining`;
      }
    }
    return null;
  }

  private async execute(target: Target, slot: TargetSlot, trigger: RedeployTrigger): Promise<RedeployAttempt> {
    const id = randomUUID();
    const requestedAt = this.clock.now().toISOString();

    // Bookkeeping happens before the first await so a concurrent request sees it
    const running: InFlightAttempt = { id, trigger, requestedAt };
    this.active.set(target.id, running);
    this.lastStartMono.set(target.id, this.clock.monotonic());
    slot.inFlight = running;
    this.options.tracker.markRedeploying(target.id);
    this.logger.info(`Redeploying '${target.id}' via ${target.provider}`, { trigger, attemptId: id });

    const outcome = await this.callProvider(target);

    this.active.delete(target.id);
    slot.inFlight = null;
    const attempt: RedeployAttempt = {
      id,
      targetId: target.id,
      trigger,
      requestedAt,
      completedAt: this.clock.now().toISOString(),
      outcome,
    };

    if (!this.options.slots.isCurrent(slot)) {
      this.logger.info(`Discarding redeploy outcome for '${target.id}': target was removed`, {
        outcome: describeRedeployOutcome(outcome),
      });
      return attempt;
    }

    this.record(attempt);
    this.options.tracker.applyAttemptOutcome(slot, attempt);
    this.options.metrics?.recordRedeploy(target.id, outcome);
    this.publishAttempt(attempt);

    const summary = `Redeploy of '${target.id}' ${describeRedeployOutcome(outcome)}`;
    if (outcome.kind === 'SUCCEEDED') {
      this.logger.info(summary, { attemptId: id });
    } else {
      this.logger.warn(summary, { attemptId: id });
    }

    await this.persist(target.id);
    return attempt;
  }

  private async callProvider(target: Target): Promise<RedeployOutcome> {
    const timeoutMs = this.options.providerTimeoutMs;
    const client = this.options.providers[target.provider];

    let result: ProviderOutcome;
    try {
      result = await withTimeout(
        client.redeploy(target, createTimeoutSignal(timeoutMs)),
        timeoutMs,
        `provider call timed out after ${timeoutMs}ms`
      );
    } catch (error) {
      if (isTimeoutAbort(error)) {
        return { kind: 'FAILED', reason: `provider call timed out after ${timeoutMs}ms` };
      }
      return { kind: 'FAILED', reason: errorMessage(error) };
    }

    switch (result.kind) {
      case 'ACCEPTED':
        return { kind: 'SUCCEEDED' };
      case 'RATE_LIMITED':
        return { kind: 'THROTTLED', reason: 'provider rate limited' };
      case 'ERROR':
        return { kind: 'FAILED', reason: `provider error ${result.code}: ${result.message}` };
    }
  }

  private record(attempt: RedeployAttempt): void {
    const history = this.histories.get(attempt.targetId) ?? [];
    history.push(attempt);
    while (history.length > this.options.historySize) {
      history.shift();
    }
    this.histories.set(attempt.targetId, history);
  }

  private async persist(targetId: string): Promise<void> {
    try {
      await this.options.store.set(STORE_KEYS.history(targetId), this.history(targetId));
    } catch (error) {
      this.logger.warn(`Failed to persist redeploy history for '${targetId}'`, { error: errorMessage(error) });
    }
  }

  private publishAttempt(attempt: RedeployAttempt): void {
    this.options.notifier.publish({
      type: 'REDEPLOY_ATTEMPTED',
      targetId: attempt.targetId,
      outcome: attempt.outcome,
      attempt,
      timestamp: attempt.completedAt,
    });
  }
}
