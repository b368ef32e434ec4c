/**
 * HTTP API tests against an in-process monitor
 */

import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { FetchLike } from '@lazarus/core';
import { MonitorMetrics } from '../metrics/registry.js';
import { Monitor } from '../monitor.js';
import { SseSink } from '../notifier/sse.js';
import { Prober } from '../probe/prober.js';
import { buildServer } from '../server.js';
import { MemoryConfigStore } from '../store/memory-store.js';
import { RecordingNotifier, ScriptedProvider, providerSet, silentLogger } from './helpers.js';

const AUTH = { authorization: 'Bearer test-secret' };

const targetBody = {
  id: 'api',
  url: 'https://api.example.test/health',
  provider: 'WEBHOOK',
  deploy: { url: 'https://deploy.example.test/hook' },
  intervalSeconds: 10,
  cooldownSeconds: 60,
};

describe('Monitor API', () => {
  let app: FastifyInstance;
  let monitor: Monitor;
  let metrics: MonitorMetrics;
  let probeStatus: number;

  beforeEach(async () => {
    probeStatus = 200;
    const probeFetch: FetchLike = async () => new Response(null, { status: probeStatus });
    metrics = new MonitorMetrics();
    monitor = new Monitor({
      store: new MemoryConfigStore(),
      providers: providerSet(new ScriptedProvider()),
      notifier: new RecordingNotifier(),
      prober: new Prober({ fetch: probeFetch }),
      metrics,
      logger: silentLogger,
      poolSize: 2,
      tickMs: 1000,
      providerTimeoutMs: 1000,
      historySize: 10,
    });
    app = await buildServer({ monitor, metrics, sse: new SseSink({ logger: silentLogger }), adminApiKeys: ['test-secret'] });
  });

  afterEach(async () => {
    await app.close();
  });

  async function createTarget(body: Record<string, unknown> = targetBody) {
    return app.inject({ method: 'POST', url: '/api/targets', headers: AUTH, payload: body });
  }

  it('reports liveness without auth', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toMatchObject({ status: 'ok', running: false, targets: 0 });
  });

  describe('POST /api/targets', () => {
    it('creates a target with defaults applied', async () => {
      const response = await createTarget();

      expect(response.statusCode).toBe(201);
      const body = response.json();
      expect(body.success).toBe(true);
      expect(body.message).toBe('Target created successfully');
      expect(body.data).toMatchObject({
        id: 'api',
        intervalSeconds: 10,
        failureThreshold: 3,
        cooldownSeconds: 60,
        enabled: true,
        autoRedeploy: true,
        allowManualRedeploy: true,
      });
    });

    it('requires an admin key', async () => {
      const missing = await app.inject({ method: 'POST', url: '/api/targets', payload: targetBody });
      expect(missing.statusCode).toBe(401);
      expect(missing.json()).toEqual({
        error: 'Missing Authorization header',
        code: 'AUTHENTICATION_ERROR',
        success: false,
      });

      const wrong = await app.inject({
        method: 'POST',
        url: '/api/targets',
        headers: { authorization: 'Bearer wrong-secret' },
        payload: targetBody,
      });
      expect(wrong.statusCode).toBe(401);
      expect(wrong.json().error).toBe('Invalid API key');
      expect(monitor.listTargets()).toEqual([]);
    });

    it('rejects an invalid definition with the failing fields', async () => {
      const response = await createTarget({ ...targetBody, url: 'ftp://api.example.test' });

      expect(response.statusCode).toBe(400);
      const body = response.json();
      expect(body.code).toBe('INVALID_CONFIG');
      expect(body.success).toBe(false);
      expect(Array.isArray(body.details)).toBe(true);
    });

    it('rejects a duplicate id', async () => {
      await createTarget();
      const response = await createTarget();

      expect(response.statusCode).toBe(409);
      expect(response.json()).toMatchObject({
        error: "Target with id 'api' already exists",
        code: 'DUPLICATE_TARGET',
        success: false,
      });
    });
  });

  it('lists targets with their health', async () => {
    await createTarget();

    const response = await app.inject({ method: 'GET', url: '/api/targets' });

    expect(response.statusCode).toBe(200);
    const body = response.json();
    expect(body.data).toHaveLength(1);
    expect(body.data[0].target.id).toBe('api');
    expect(body.data[0].health).toEqual({
      status: 'UNKNOWN',
      consecutiveFailures: 0,
      lastTransitionAt: null,
      lastRedeployAt: null,
      lastProbe: null,
    });
  });

  it('answers 404 for unknown targets', async () => {
    const response = await app.inject({ method: 'GET', url: '/api/targets/ghost/health' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toMatchObject({
      error: "Target with id 'ghost' not found",
      code: 'NOT_FOUND',
      success: false,
    });
  });

  it('applies updates to what later reads see', async () => {
    await createTarget();

    const patch = await app.inject({
      method: 'PATCH',
      url: '/api/targets/api',
      headers: AUTH,
      payload: { intervalSeconds: 120, description: 'public API' },
    });
    expect(patch.statusCode).toBe(200);
    expect(patch.json().message).toBe('Target updated successfully');

    const detail = await app.inject({ method: 'GET', url: '/api/targets/api' });
    expect(detail.json().data.target).toMatchObject({ intervalSeconds: 120, description: 'public API' });
    expect(detail.json().data.history).toEqual([]);
  });

  it('removes a target', async () => {
    await createTarget();

    const response = await app.inject({ method: 'DELETE', url: '/api/targets/api', headers: AUTH });
    expect(response.statusCode).toBe(200);
    expect(response.json().message).toBe('Target deleted successfully');

    const list = await app.inject({ method: 'GET', url: '/api/targets' });
    expect(list.json().data).toEqual([]);
  });

  it('probes on demand and returns the updated health', async () => {
    await createTarget();

    const response = await app.inject({ method: 'POST', url: '/api/targets/api/probe', headers: AUTH });

    expect(response.statusCode).toBe(200);
    const { data } = response.json();
    expect(data.result.outcome).toEqual({ kind: 'SUCCESS', statusCode: 200 });
    expect(data.health.status).toBe('HEALTHY');
    expect(data.health.consecutiveFailures).toBe(0);
  });

  it('counts failed on-demand probes', async () => {
    await createTarget();
    probeStatus = 503;

    const response = await app.inject({ method: 'POST', url: '/api/targets/api/probe', headers: AUTH });

    const { data } = response.json();
    expect(data.result.outcome).toEqual({ kind: 'HTTP_ERROR', statusCode: 503 });
    expect(data.health.consecutiveFailures).toBe(1);
  });

  it('redeploys on demand, then throttles during the cooldown', async () => {
    await createTarget();

    const first = await app.inject({ method: 'POST', url: '/api/targets/api/redeploy', headers: AUTH });
    expect(first.statusCode).toBe(200);
    expect(first.json().data).toMatchObject({ targetId: 'api', trigger: 'MANUAL', outcome: { kind: 'SUCCEEDED' } });

    const second = await app.inject({ method: 'POST', url: '/api/targets/api/redeploy', headers: AUTH });
    expect(second.statusCode).toBe(200);
    expect(second.json().data.outcome.kind).toBe('THROTTLED');
  });

  it('refuses manual redeploys the target does not allow', async () => {
    await createTarget({ ...targetBody, allowManualRedeploy: false });

    const response = await app.inject({ method: 'POST', url: '/api/targets/api/redeploy', headers: AUTH });

    expect(response.statusCode).toBe(403);
    expect(response.json()).toEqual({
      error: "Manual redeploy is disabled for target 'api'",
      code: 'FORBIDDEN',
      success: false,
    });
  });

  it('exposes Prometheus metrics', async () => {
    await createTarget();

    const response = await app.inject({ method: 'GET', url: '/metrics' });

    expect(response.statusCode).toBe(200);
    expect(response.body).toContain('lazarus_target_status{target_id="api"} -2');
  });

  it('answers unknown routes with a JSON 404', async () => {
    const response = await app.inject({ method: 'GET', url: '/nope' });

    expect(response.statusCode).toBe(404);
    expect(response.json()).toEqual({ error: 'Not found', code: 'NOT_FOUND', path: '/nope', success: false });
  });
});

describe('GET /api/events', () => {
  it('refuses streams over the connection limit', async () => {
    const metrics = new MonitorMetrics();
    const monitor = new Monitor({
      store: new MemoryConfigStore(),
      providers: providerSet(new ScriptedProvider()),
      notifier: new RecordingNotifier(),
      metrics,
      logger: silentLogger,
      poolSize: 1,
      tickMs: 1000,
      providerTimeoutMs: 1000,
      historySize: 10,
    });
    const app = await buildServer({
      monitor,
      metrics,
      sse: new SseSink({ maxConnections: 0, logger: silentLogger }),
      adminApiKeys: [],
    });

    try {
      const response = await app.inject({ method: 'GET', url: '/api/events' });
      expect(response.statusCode).toBe(429);
      expect(response.json()).toEqual({
        error: 'Maximum concurrent connections reached',
        code: 'TOO_MANY_CONNECTIONS',
        success: false,
      });
    } finally {
      await app.close();
    }
  });
});
