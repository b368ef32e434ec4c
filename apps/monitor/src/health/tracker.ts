/**
 * Health tracker: per-target status state machine driven by probe results
 * and redeploy outcomes
 */

import { createLogger, describeProbeOutcome, isProbeSuccess, systemClock } from '@lazarus/core';
import type { Clock, HealthState, HealthStatus, Logger, ProbeResult, RedeployAttempt, Target } from '@lazarus/core';
import type { MonitorMetrics } from '../metrics/registry.js';
import type { Notifier } from '../notifier/types.js';
import type { SlotTable, TargetSlot } from './slots.js';

export interface HealthTrackerOptions {
  slots: SlotTable;
  notifier: Notifier;
  clock?: Clock;
  logger?: Logger;
  metrics?: MonitorMetrics;
}

export interface ProbeDecision {
  /** False when the target is no longer registered */
  applied: boolean;
  status: HealthStatus;
  /** The caller should start an automatic redeploy now */
  escalate: boolean;
}

export class HealthTracker {
  private readonly slots: SlotTable;
  private readonly notifier: Notifier;
  private readonly clock: Clock;
  private readonly logger: Logger;
  private readonly metrics: MonitorMetrics | undefined;

  constructor(options: HealthTrackerOptions) {
    this.slots = options.slots;
    this.notifier = options.notifier;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('health');
    this.metrics = options.metrics;
  }

  /**
   * Copy of the last known state
   */
  getState(targetId: string): HealthState | undefined {
    const slot = this.slots.get(targetId);
    return slot ? { ...slot.health } : undefined;
  }

  /**
   * Apply one probe result.
   * `redeployEligible` is the coordinator's answer for this target at this moment.
   */
  recordProbe(target: Target, result: ProbeResult, redeployEligible: boolean): ProbeDecision {
    const slot = this.slots.get(target.id);
    if (!slot) {
      this.logger.debug(`Discarding probe result for unregistered target '${target.id}'`);
      return { applied: false, status: 'UNKNOWN', escalate: false };
    }

    const health = slot.health;
    health.lastProbe = result;

    if (isProbeSuccess(result.outcome)) {
      health.consecutiveFailures = 0;
      this.onSuccess(slot);
      return { applied: true, status: health.status, escalate: false };
    }

    health.consecutiveFailures += 1;
    const failures = health.consecutiveFailures;
    const previous = health.status;
    const detail = describeProbeOutcome(result.outcome);

    if (previous === 'REDEPLOYING') {
      this.logger.debug(`Probe failed for '${target.id}' while redeploying (${detail})`, { failures });
      return { applied: true, status: previous, escalate: false };
    }

    if (failures >= target.failureThreshold) {
      if (previous !== 'DOWN') {
        this.logger.warn(`Target '${target.id}' is down after ${failures} consecutive failures (${detail})`);
        this.transition(slot, 'DOWN');
      }

      let escalate = false;
      if (!target.autoRedeploy) {
        this.logger.debug(`Automatic redeploy disabled for '${target.id}'`);
      } else if (!redeployEligible) {
        this.logger.debug(`Redeploy for '${target.id}' not eligible yet (in flight or cooling down)`);
      } else {
        escalate = true;
      }
      return { applied: true, status: health.status, escalate };
    }

    this.logger.debug(`Probe failed for '${target.id}' (${detail})`, {
      failures,
      threshold: target.failureThreshold,
    });

    // Below the threshold: a single miss from a good or unknown state is tolerated
    const tolerated = failures === 1 && (previous === 'HEALTHY' || previous === 'UNKNOWN');
    if (previous !== 'DOWN' && !tolerated) {
      this.transition(slot, 'DEGRADED');
    }
    return { applied: true, status: health.status, escalate: false };
  }

  /**
   * An attempt started for the target; called by the coordinator
   */
  markRedeploying(targetId: string): void {
    const slot = this.slots.get(targetId);
    if (!slot) return;
    slot.health.lastRedeployAt = this.clock.now().toISOString();
    this.transition(slot, 'REDEPLOYING');
  }

  /**
   * Apply a completed attempt to the slot it was started on
   */
  applyAttemptOutcome(slot: TargetSlot, attempt: RedeployAttempt): void {
    if (!this.slots.isCurrent(slot)) {
      return;
    }
    switch (attempt.outcome.kind) {
      case 'SUCCEEDED':
        // Wait for a successful probe before calling it healthy
        this.transition(slot, 'DEGRADED');
        break;
      case 'FAILED':
      case 'THROTTLED':
        this.transition(slot, 'DOWN');
        break;
    }
  }

  /**
   * Restore the last redeploy time from persisted history
   */
  seedLastRedeploy(targetId: string, requestedAt: string): void {
    const slot = this.slots.get(targetId);
    if (slot) {
      slot.health.lastRedeployAt = requestedAt;
    }
  }

  private onSuccess(slot: TargetSlot): void {
    const previous = slot.health.status;

    if (slot.inFlight) {
      // Status tracks the attempt until it completes
      return;
    }

    if (previous === 'HEALTHY') {
      return;
    }

    this.transition(slot, 'HEALTHY');

    if (previous === 'DEGRADED' || previous === 'DOWN' || previous === 'REDEPLOYING') {
      this.logger.info(`Target '${slot.targetId}' recovered from ${previous}`);
      this.notifier.publish({
        type: 'TARGET_RECOVERED',
        targetId: slot.targetId,
        previousStatus: previous,
        timestamp: this.clock.now().toISOString(),
      });
    }
  }

  private transition(slot: TargetSlot, next: HealthStatus): void {
    const previous = slot.health.status;
    if (previous === next) {
      return;
    }

    const timestamp = this.clock.now().toISOString();
    slot.health.status = next;
    slot.health.lastTransitionAt = timestamp;
    this.metrics?.setTargetStatus(slot.targetId, next);

    this.logger.info(`Target '${slot.targetId}' ${previous} -> ${next}`);
    this.notifier.publish({
      type: 'STATUS_CHANGED',
      targetId: slot.targetId,
      oldStatus: previous,
      newStatus: next,
      timestamp,
    });
  }
}
