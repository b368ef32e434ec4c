/**
 * SSE endpoint streaming monitor events
 */

import type { FastifyInstance } from 'fastify';
import { z } from 'zod';
import { SSE_KEEPALIVE_MS, parseChannels, type SseSink } from '../notifier/sse.js';

const EventsQuerySchema = z.object({
  channels: z.string().optional(),
  targetId: z.string().min(1).optional(),
});

export interface EventRoutesOptions {
  sse: SseSink;
  keepaliveMs?: number;
}

export async function eventRoutes(fastify: FastifyInstance, options: EventRoutesOptions): Promise<void> {
  const { sse } = options;
  const keepaliveMs = options.keepaliveMs ?? SSE_KEEPALIVE_MS;

  fastify.get('/events', async (request, reply) => {
    // Check connection limits BEFORE setting headers
    const limitCheck = sse.canConnect();
    if (!limitCheck.success) {
      return reply.code(429).send({
        error: limitCheck.reason ?? 'Connection limit reached',
        code: 'TOO_MANY_CONNECTIONS',
        success: false,
      });
    }

    const query = EventsQuerySchema.parse(request.query);

    reply.hijack();
    reply.raw.writeHead(200, {
      'Content-Type': 'text/event-stream',
      'Cache-Control': 'no-cache',
      Connection: 'keep-alive',
      'X-Accel-Buffering': 'no', // Disable nginx buffering
    });

    const client = sse.registerClient(reply.raw, parseChannels(query.channels), query.targetId);

    const keepalive = setInterval(() => {
      reply.raw.write(': keepalive\n\n');
    }, keepaliveMs);

    const cleanup = (): void => {
      clearInterval(keepalive);
      sse.disconnect(client.id);
    };
    reply.raw.on('close', cleanup);
    reply.raw.on('error', cleanup);
  });
}
