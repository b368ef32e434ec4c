/**
 * End-to-end control loop scenarios with in-process fakes
 */

import { describe, it, expect, beforeEach } from 'vitest';
import { ForbiddenError, NotFoundError } from '@lazarus/core';
import type { FetchLike, ProviderOutcome } from '@lazarus/core';
import { MonitorMetrics } from '../metrics/registry.js';
import { Monitor } from '../monitor.js';
import { Prober } from '../probe/prober.js';
import { MemoryConfigStore } from '../store/memory-store.js';
import {
  FakeClock,
  RecordingNotifier,
  ScriptedProvider,
  deferred,
  flushPromises,
  providerSet,
  silentLogger,
} from './helpers.js';

describe('Monitor', () => {
  let store: MemoryConfigStore;
  let clock: FakeClock;
  let notifier: RecordingNotifier;
  let provider: ScriptedProvider;
  let up: boolean;

  function createMonitor(): Monitor {
    const probeFetch: FetchLike = async () => new Response(null, { status: up ? 200 : 503 });
    return new Monitor({
      store,
      providers: providerSet(provider),
      notifier,
      prober: new Prober({ fetch: probeFetch, clock }),
      clock,
      logger: silentLogger,
      poolSize: 2,
      tickMs: 1000,
      providerTimeoutMs: 1000,
      historySize: 10,
    });
  }

  const definition = {
    id: 'api',
    url: 'https://api.example.test/health',
    provider: 'WEBHOOK',
    deploy: { url: 'https://deploy.example.test/hook' },
    intervalSeconds: 30,
    failureThreshold: 3,
    cooldownSeconds: 300,
  };

  beforeEach(() => {
    store = new MemoryConfigStore();
    clock = new FakeClock();
    notifier = new RecordingNotifier();
    provider = new ScriptedProvider();
    up = true;
  });

  it('redeploys a target that stays down and reports its recovery', async () => {
    const monitor = createMonitor();
    await monitor.addTarget(definition);
    const answer = deferred<ProviderOutcome>();
    provider.answerWith(answer.promise);

    up = false;
    await monitor.forceProbe('api');
    expect(monitor.getHealth('api').status).toBe('UNKNOWN');
    await monitor.forceProbe('api');
    expect(monitor.getHealth('api').status).toBe('DEGRADED');
    await monitor.forceProbe('api');

    // escalation starts before the third probe cycle returns
    expect(monitor.getHealth('api').status).toBe('REDEPLOYING');
    expect(provider.calls.map((target) => target.id)).toEqual(['api']);

    await monitor.forceProbe('api');
    expect(monitor.getHealth('api')).toMatchObject({ status: 'REDEPLOYING', consecutiveFailures: 4 });

    answer.resolve({ kind: 'ACCEPTED' });
    await flushPromises();
    expect(monitor.getHealth('api').status).toBe('DEGRADED');
    expect(monitor.getHistory('api').map((attempt) => attempt.outcome)).toEqual([{ kind: 'SUCCEEDED' }]);

    up = true;
    await monitor.forceProbe('api');
    expect(monitor.getHealth('api')).toMatchObject({ status: 'HEALTHY', consecutiveFailures: 0 });

    expect(notifier.ofType('STATUS_CHANGED').map((e) => `${e.oldStatus}->${e.newStatus}`)).toEqual([
      'UNKNOWN->DEGRADED',
      'DEGRADED->DOWN',
      'DOWN->REDEPLOYING',
      'REDEPLOYING->DEGRADED',
      'DEGRADED->HEALTHY',
    ]);
    expect(notifier.ofType('TARGET_RECOVERED')).toEqual([
      { type: 'TARGET_RECOVERED', targetId: 'api', previousStatus: 'DEGRADED', timestamp: '2024-01-01T00:00:00.000Z' },
    ]);
  });

  it('stays DOWN without redeploying when automatic redeploys are off', async () => {
    const monitor = createMonitor();
    await monitor.addTarget({ ...definition, autoRedeploy: false });

    up = false;
    for (let i = 0; i < 5; i++) {
      await monitor.forceProbe('api');
    }

    expect(monitor.getHealth('api')).toMatchObject({ status: 'DOWN', consecutiveFailures: 5 });
    expect(provider.calls).toEqual([]);
  });

  it('does not escalate again during the cooldown', async () => {
    const monitor = createMonitor();
    await monitor.addTarget(definition);
    provider.answer({ kind: 'ERROR', code: 503, message: 'unavailable' });

    up = false;
    for (let i = 0; i < 3; i++) {
      await monitor.forceProbe('api');
    }
    await flushPromises();
    expect(monitor.getHealth('api').status).toBe('DOWN');

    await monitor.forceProbe('api');
    expect(provider.calls).toHaveLength(1);

    clock.advance(300_000);
    await monitor.forceProbe('api');
    expect(provider.calls).toHaveLength(2);
  });

  it('guards manual redeploys', async () => {
    const monitor = createMonitor();
    await monitor.addTarget({ ...definition, allowManualRedeploy: false });

    await expect(monitor.forceRedeploy('api')).rejects.toBeInstanceOf(ForbiddenError);
    await expect(monitor.forceRedeploy('ghost')).rejects.toBeInstanceOf(NotFoundError);

    await monitor.updateTarget('api', { allowManualRedeploy: true });
    const attempt = await monitor.forceRedeploy('api');
    expect(attempt).toMatchObject({ trigger: 'MANUAL', outcome: { kind: 'SUCCEEDED' } });
  });

  it('forgets a removed target', async () => {
    const monitor = createMonitor();
    await monitor.addTarget(definition);
    await monitor.forceRedeploy('api');

    await monitor.removeTarget('api');
    await flushPromises();

    expect(monitor.listTargets()).toEqual([]);
    expect(() => monitor.getHealth('api')).toThrow(NotFoundError);
    await expect(monitor.forceProbe('api')).rejects.toBeInstanceOf(NotFoundError);
    expect(await store.list('history/')).toEqual([]);
  });

  it('leaves no metric series behind for a target removed mid-check', async () => {
    const metrics = new MonitorMetrics();
    const response = deferred<Response>();
    const monitor = new Monitor({
      store,
      providers: providerSet(provider),
      notifier,
      prober: new Prober({ fetch: () => response.promise, clock }),
      metrics,
      clock,
      logger: silentLogger,
      poolSize: 2,
      tickMs: 1000,
      providerTimeoutMs: 1000,
      historySize: 10,
    });
    await monitor.addTarget(definition);

    const probing = monitor.forceProbe('api');
    await flushPromises();
    await monitor.removeTarget('api');
    response.resolve(new Response(null, { status: 200 }));
    await probing;

    const probes = await metrics.probesTotal.get();
    expect(probes.values.filter((value) => value.labels.target_id === 'api')).toEqual([]);
  });

  it('restores targets and redeploy history on start', async () => {
    const first = createMonitor();
    await first.addTarget(definition);
    await first.forceRedeploy('api');

    const second = createMonitor();
    await second.start();
    try {
      expect(second.isRunning).toBe(true);
      expect(second.listTargets().map((view) => view.target.id)).toEqual(['api']);
      expect(second.getHistory('api')).toHaveLength(1);
      expect(second.getHealth('api').lastRedeployAt).toBe('2024-01-01T00:00:00.000Z');
      expect((await second.forceRedeploy('api')).outcome).toEqual({
        kind: 'THROTTLED',
        reason: 'cooldown active, 300s remaining',
      });
    } finally {
      await second.stop(1000);
    }
    expect(second.isRunning).toBe(false);
  });
});
