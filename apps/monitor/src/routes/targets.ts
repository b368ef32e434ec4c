/**
 * API routes for target management
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { createLogger } from '@lazarus/core';
import type { AuthHook } from '../auth.js';
import type { Monitor } from '../monitor.js';
import { created, deleted, success, updated } from '../utils/response.js';

const logger = createLogger('api:targets');

export const IdParamsSchema = z.object({
  id: z.string().min(1),
});

export interface TargetRoutesOptions {
  monitor: Monitor;
  authHook: AuthHook;
}

export async function targetRoutes(fastify: FastifyInstance, options: TargetRoutesOptions): Promise<void> {
  const { monitor, authHook } = options;

  fastify.get('/targets', async () => success(monitor.listTargets()));

  fastify.get('/targets/:id', async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    return success(monitor.getTarget(id));
  });

  fastify.get('/targets/:id/health', async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    return success(monitor.getHealth(id));
  });

  fastify.post('/targets', {
    onRequest: authHook,
  }, async (request, reply) => {
    const target = await monitor.addTarget(request.body);
    logger.info(`Created target: ${target.id}`);
    reply.status(201);
    return created(target, 'Target');
  });

  fastify.patch('/targets/:id', {
    onRequest: authHook,
  }, async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    const target = await monitor.updateTarget(id, request.body ?? {});
    return updated(target, 'Target');
  });

  fastify.delete('/targets/:id', {
    onRequest: authHook,
  }, async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    const target = await monitor.removeTarget(id);
    return deleted(target, 'Target');
  });

  fastify.post('/targets/:id/probe', {
    onRequest: authHook,
  }, async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    const result = await monitor.forceProbe(id);
    return success({ result, health: monitor.getHealth(id) });
  });

  fastify.post('/targets/:id/redeploy', {
    onRequest: authHook,
  }, async (request) => {
    const { id } = IdParamsSchema.parse(request.params);
    const attempt = await monitor.forceRedeploy(id);
    return success(attempt);
  });
}
