/**
 * Prometheus metrics registry
 */

import { Registry, Counter, Histogram, Gauge, collectDefaultMetrics } from 'prom-client';
import type { HealthStatus, ProbeOutcomeKind, RedeployOutcome } from '@lazarus/core';

const STATUS_VALUES: Record<HealthStatus, number> = {
  HEALTHY: 1,
  DEGRADED: 0.5,
  DOWN: 0,
  REDEPLOYING: -1,
  UNKNOWN: -2,
};

const PROBE_OUTCOMES: readonly ProbeOutcomeKind[] = ['SUCCESS', 'TIMEOUT', 'CONNECTION_ERROR', 'HTTP_ERROR'];
const REDEPLOY_OUTCOMES: ReadonlyArray<RedeployOutcome['kind']> = ['SUCCEEDED', 'FAILED', 'THROTTLED'];

export interface MetricsOptions {
  /** Also collect process metrics (CPU, memory, event loop) */
  collectDefaults?: boolean;
}

/**
 * Metrics for one monitor instance, each on its own registry
 */
export class MonitorMetrics {
  readonly registry = new Registry();

  // ==========================================================================
  // Probe Metrics
  // ==========================================================================

  readonly probesTotal = new Counter({
    name: 'lazarus_probes_total',
    help: 'Total number of probes by outcome',
    labelNames: ['target_id', 'outcome'] as const,
    registers: [this.registry],
  });

  readonly probeLatency = new Histogram({
    name: 'lazarus_probe_latency_ms',
    help: 'Probe latency in milliseconds',
    labelNames: ['target_id'] as const,
    buckets: [25, 50, 100, 250, 500, 1000, 2500, 5000, 10000, 30000],
    registers: [this.registry],
  });

  readonly skippedProbes = new Counter({
    name: 'lazarus_skipped_probes_total',
    help: 'Scheduler ticks skipped because the previous probe cycle was still running',
    labelNames: ['target_id'] as const,
    registers: [this.registry],
  });

  // ==========================================================================
  // Health & Redeploy Metrics
  // ==========================================================================

  readonly targetStatus = new Gauge({
    name: 'lazarus_target_status',
    help: 'Target status (1=healthy, 0.5=degraded, 0=down, -1=redeploying, -2=unknown)',
    labelNames: ['target_id'] as const,
    registers: [this.registry],
  });

  readonly redeployAttempts = new Counter({
    name: 'lazarus_redeploy_attempts_total',
    help: 'Total number of redeploy attempts by outcome',
    labelNames: ['target_id', 'outcome'] as const,
    registers: [this.registry],
  });

  constructor(options: MetricsOptions = {}) {
    if (options.collectDefaults) {
      collectDefaultMetrics({ register: this.registry });
    }
  }

  recordProbe(targetId: string, outcome: ProbeOutcomeKind, latencyMs: number): void {
    this.probesTotal.inc({ target_id: targetId, outcome });
    this.probeLatency.observe({ target_id: targetId }, latencyMs);
  }

  recordSkippedProbe(targetId: string): void {
    this.skippedProbes.inc({ target_id: targetId });
  }

  setTargetStatus(targetId: string, status: HealthStatus): void {
    this.targetStatus.set({ target_id: targetId }, STATUS_VALUES[status]);
  }

  recordRedeploy(targetId: string, outcome: RedeployOutcome): void {
    this.redeployAttempts.inc({ target_id: targetId, outcome: outcome.kind });
  }

  /**
   * Drop every series of a removed target
   */
  forgetTarget(targetId: string): void {
    for (const outcome of PROBE_OUTCOMES) {
      this.probesTotal.remove({ target_id: targetId, outcome });
    }
    for (const outcome of REDEPLOY_OUTCOMES) {
      this.redeployAttempts.remove({ target_id: targetId, outcome });
    }
    this.probeLatency.remove({ target_id: targetId });
    this.skippedProbes.remove({ target_id: targetId });
    this.targetStatus.remove({ target_id: targetId });
  }

  async render(): Promise<string> {
    return this.registry.metrics();
  }

  get contentType(): string {
    return this.registry.contentType;
  }
}
