/**
 * HTTP prober
 */

import { createTimeoutSignal, isRecord, isTimeoutAbort, probeTimeoutMs, systemClock } from '@lazarus/core';
import type { Clock, FetchLike, ProbeOutcome, ProbeResult, Target } from '@lazarus/core';

export const PROBE_USER_AGENT = 'lazarus-monitor/1.0';

export interface ProberOptions {
  fetch?: FetchLike;
  clock?: Clock;
  userAgent?: string;
}

export class Prober {
  private readonly fetchImpl: FetchLike;
  private readonly clock: Clock;
  private readonly userAgent: string;

  constructor(options: ProberOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.clock = options.clock ?? systemClock;
    this.userAgent = options.userAgent ?? PROBE_USER_AGENT;
  }

  /**
   * Probe a target once. Failures are returned as outcomes; this never throws.
   */
  async probe(target: Target): Promise<ProbeResult> {
    const timestamp = this.clock.now().toISOString();
    const startedAt = this.clock.monotonic();
    const outcome = await this.request(target);

    return {
      targetId: target.id,
      timestamp,
      outcome,
      latencyMs: Math.max(0, Math.round(this.clock.monotonic() - startedAt)),
    };
  }

  private async request(target: Target): Promise<ProbeOutcome> {
    try {
      const response = await this.fetchImpl(target.url, {
        method: 'GET',
        redirect: 'manual',
        headers: { 'User-Agent': this.userAgent },
        signal: createTimeoutSignal(probeTimeoutMs(target)),
      });

      // Only the status line matters
      await response.body?.cancel().catch(() => undefined);

      if (response.status >= 200 && response.status < 400) {
        return { kind: 'SUCCESS', statusCode: response.status };
      }
      return { kind: 'HTTP_ERROR', statusCode: response.status };
    } catch (error) {
      if (isTimeoutAbort(error)) {
        return { kind: 'TIMEOUT' };
      }
      return { kind: 'CONNECTION_ERROR', message: transportErrorMessage(error) };
    }
  }
}

/**
 * fetch reports transport failures as `TypeError: fetch failed` with the
 * system error code on `cause`
 */
function transportErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    const cause: unknown = error.cause;
    if (isRecord(cause) && typeof cause.code === 'string') {
      return cause.code;
    }
    return error.message;
  }
  return String(error);
}
