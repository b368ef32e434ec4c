/**
 * HTTP API for the monitor
 */

import Fastify, { type FastifyInstance } from 'fastify';
import cors from '@fastify/cors';
import { createLogger, getErrorResponse } from '@lazarus/core';
import { createAdminAuthHook } from './auth.js';
import type { MonitorMetrics } from './metrics/registry.js';
import type { Monitor } from './monitor.js';
import type { SseSink } from './notifier/sse.js';
import { eventRoutes } from './routes/events.js';
import { targetRoutes } from './routes/targets.js';

const logger = createLogger('api');

export interface BuildServerOptions {
  monitor: Monitor;
  metrics: MonitorMetrics;
  sse: SseSink;
  adminApiKeys: readonly string[];
}

export async function buildServer(options: BuildServerOptions): Promise<FastifyInstance> {
  const { monitor, metrics, sse } = options;

  const fastify = Fastify({
    logger: false, // We use our own logger
    trustProxy: true,
    // SSE streams would otherwise hold close() open
    forceCloseConnections: true,
  });

  await fastify.register(cors, {
    origin: true,
    credentials: true,
  });

  // Global error handler
  fastify.setErrorHandler((error, request, reply) => {
    const response = getErrorResponse(error);
    if (response.statusCode >= 500) {
      logger.error('Request error', error, { method: request.method, url: request.url });
    } else {
      logger.debug(`${request.method} ${request.url} -> ${response.statusCode} ${response.code}`);
    }

    const body: Record<string, unknown> = {
      error: response.statusCode >= 500 && response.code === 'INTERNAL_ERROR' ? 'Internal server error' : response.error,
      code: response.code,
      success: false,
    };
    if (response.details !== undefined) {
      body.details = response.details;
    }
    void reply.code(response.statusCode).send(body);
  });

  fastify.setNotFoundHandler((request, reply) => {
    void reply.code(404).send({
      error: 'Not found',
      code: 'NOT_FOUND',
      path: request.url,
      success: false,
    });
  });

  // Health check (no auth required)
  fastify.get('/health', async () => ({
    status: 'ok',
    running: monitor.isRunning,
    targets: monitor.registry.size,
    timestamp: new Date().toISOString(),
  }));

  // Prometheus metrics endpoint (no auth required)
  fastify.get('/metrics', async (_request, reply) => {
    reply.type(metrics.contentType);
    return metrics.render();
  });

  const authHook = createAdminAuthHook(options.adminApiKeys);
  await fastify.register(targetRoutes, { prefix: '/api', monitor, authHook });
  await fastify.register(eventRoutes, { prefix: '/api', sse });

  fastify.addHook('onClose', async () => {
    sse.clear();
  });

  return fastify;
}
