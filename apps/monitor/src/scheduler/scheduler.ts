/**
 * Probe scheduler: one ticking loop dispatches due targets into a bounded pool,
 * with at most one probe cycle per target at a time
 */

import {
  KeyedMutex,
  Semaphore,
  TimeoutError,
  createLogger,
  errorMessage,
  systemClock,
  withTimeout,
} from '@lazarus/core';
import type { Clock, Logger, ProbeResult, Target } from '@lazarus/core';
import type { MonitorMetrics } from '../metrics/registry.js';
import type { TargetRegistry } from '../registry/target-registry.js';

/** Probe a target and apply the result */
export type ProbeCycle = (target: Target) => Promise<ProbeResult>;

export interface SchedulerOptions {
  registry: TargetRegistry;
  cycle: ProbeCycle;
  poolSize: number;
  tickMs?: number;
  /** Extra work to wait for on stop, such as in-flight redeploys */
  drain?: () => Promise<void>;
  clock?: Clock;
  logger?: Logger;
  metrics?: MonitorMetrics;
}

export const DEFAULT_TICK_MS = 1000;

export class Scheduler {
  private timer: NodeJS.Timeout | null = null;
  private stopping = false;
  private lastDispatched = new Map<string, number>();
  private active = new Set<Promise<unknown>>();
  private readonly lanes = new KeyedMutex();
  private readonly pool: Semaphore;
  private readonly tickMs: number;
  private readonly clock: Clock;
  private readonly logger: Logger;

  constructor(private readonly options: SchedulerOptions) {
    this.pool = new Semaphore(options.poolSize);
    this.tickMs = options.tickMs ?? DEFAULT_TICK_MS;
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createLogger('scheduler');
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.stopping = false;
    this.logger.info(`Scheduler started (tick ${this.tickMs}ms, pool ${this.pool.size})`);
    this.tick();
    this.timer = setInterval(() => this.tick(), this.tickMs);
  }

  get isRunning(): boolean {
    return this.timer !== null;
  }

  /** Probe cycles dispatched and not yet settled */
  get activeCount(): number {
    return this.active.size;
  }

  /**
   * Dispatch every enabled target whose interval has elapsed
   */
  tick(): void {
    if (this.stopping) {
      return;
    }

    const now = this.clock.monotonic();
    const targets = this.options.registry.list();
    const seen = new Set<string>();

    for (const target of targets) {
      seen.add(target.id);
      if (!target.enabled) {
        continue;
      }

      const last = this.lastDispatched.get(target.id);
      if (last !== undefined && now - last < target.intervalSeconds * 1000) {
        continue;
      }

      if (this.lanes.isLocked(target.id)) {
        this.logger.debug(`Skipping '${target.id}': previous probe cycle still running`);
        this.options.metrics?.recordSkippedProbe(target.id);
        continue;
      }

      this.lastDispatched.set(target.id, now);
      void this.track(this.dispatch(target)).catch((error: unknown) => {
        this.logger.error(`Probe cycle for '${target.id}' failed`, toError(error));
      });
    }

    // Removed targets are probed immediately if they come back
    for (const id of this.lastDispatched.keys()) {
      if (!seen.has(id)) {
        this.lastDispatched.delete(id);
      }
    }
  }

  /**
   * Out-of-band probe through the target's lane; queued behind a running cycle
   */
  async forceProbe(target: Target): Promise<ProbeResult> {
    if (this.stopping) {
      throw new Error('Scheduler is stopping');
    }
    return this.track(this.dispatch(target));
  }

  /**
   * Stop dispatching and wait for running cycles and the drain hook.
   * @returns Whether everything settled before the deadline
   */
  async stop(deadlineMs: number): Promise<boolean> {
    this.stopping = true;
    if (this.timer) {
      clearInterval(this.timer);
      this.timer = null;
    }

    const settle = async (): Promise<void> => {
      while (this.active.size > 0) {
        await Promise.allSettled(Array.from(this.active));
      }
      await this.options.drain?.();
    };

    try {
      await withTimeout(settle(), deadlineMs, `Shutdown deadline of ${deadlineMs}ms exceeded`);
      this.logger.info('Scheduler stopped');
      return true;
    } catch (error) {
      if (error instanceof TimeoutError) {
        this.logger.warn(error.message, { activeProbes: this.active.size });
        return false;
      }
      throw error;
    }
  }

  private dispatch(target: Target): Promise<ProbeResult> {
    return this.lanes.runExclusive(target.id, () => this.pool.run(() => this.options.cycle(target)));
  }

  private track<T>(work: Promise<T>): Promise<T> {
    this.active.add(work);
    const untrack = (): void => {
      this.active.delete(work);
    };
    void work.then(untrack, untrack);
    return work;
  }
}

function toError(error: unknown): Error {
  return error instanceof Error ? error : new Error(errorMessage(error));
}
