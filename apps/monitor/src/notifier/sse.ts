/**
 * Server-Sent Events sink: broadcasts monitor events to connected HTTP clients
 */

import { randomUUID } from 'node:crypto';
import { createLogger } from '@lazarus/core';
import type { Logger, MonitorEvent, MonitorEventType } from '@lazarus/core';
import type { NotificationSink } from './types.js';

export const MAX_SSE_CONNECTIONS = 100;
export const SSE_KEEPALIVE_MS = 30000;

export const SSE_CHANNELS = {
  ALL: 'all',
  STATUS_CHANGED: 'STATUS_CHANGED',
  TARGET_RECOVERED: 'TARGET_RECOVERED',
  REDEPLOY_ATTEMPTED: 'REDEPLOY_ATTEMPTED',
} as const;

export type SseChannel = typeof SSE_CHANNELS[keyof typeof SSE_CHANNELS];

/** The part of a writable HTTP response the sink needs */
export interface SseResponse {
  write(chunk: string): boolean;
}

// SSE-specific control messages sent alongside monitor events
export interface SseControlMessage {
  type: 'connected';
  data: { clientId: string; channels: SseChannel[] };
  timestamp: string;
}

export type SseMessage = MonitorEvent | SseControlMessage;

export interface SseClient {
  id: string;
  response: SseResponse;
  channels: Set<SseChannel>;
  /** Only events for this target, when set */
  targetId?: string;
}

export interface ConnectionLimitResult {
  success: boolean;
  reason?: string;
}

export interface SseSinkOptions {
  maxConnections?: number;
  logger?: Logger;
}

export function isSseChannel(value: string): value is SseChannel {
  return Object.values<string>(SSE_CHANNELS).includes(value);
}

/**
 * Parse a comma separated `channels` query value; unknown names are dropped
 */
export function parseChannels(raw: string | undefined): SseChannel[] {
  if (!raw) {
    return [SSE_CHANNELS.ALL];
  }
  const channels = raw
    .split(',')
    .map((name) => name.trim())
    .filter(isSseChannel);
  return channels.length > 0 ? channels : [SSE_CHANNELS.ALL];
}

export class SseSink implements NotificationSink {
  readonly name = 'sse';
  private clients = new Map<string, SseClient>();
  private readonly maxConnections: number;
  private readonly logger: Logger;

  constructor(options: SseSinkOptions = {}) {
    this.maxConnections = options.maxConnections ?? MAX_SSE_CONNECTIONS;
    this.logger = options.logger ?? createLogger('sse');
  }

  canConnect(): ConnectionLimitResult {
    if (this.clients.size >= this.maxConnections) {
      return {
        success: false,
        reason: 'Maximum concurrent connections reached',
      };
    }
    return { success: true };
  }

  registerClient(response: SseResponse, channels: SseChannel[], targetId?: string): SseClient {
    const client: SseClient = {
      id: generateClientId(),
      response,
      channels: new Set(channels),
    };
    if (targetId !== undefined) client.targetId = targetId;

    this.clients.set(client.id, client);
    this.logger.debug(`SSE client ${client.id} connected`, { channels, targetId });

    this.sendToClient(client, {
      type: 'connected',
      data: { clientId: client.id, channels },
      timestamp: new Date().toISOString(),
    });
    return client;
  }

  disconnect(clientId: string): void {
    if (this.clients.delete(clientId)) {
      this.logger.debug(`SSE client ${clientId} disconnected`);
    }
  }

  async deliver(event: MonitorEvent): Promise<void> {
    this.broadcast(event);
  }

  broadcast(event: MonitorEvent): void {
    for (const client of this.clients.values()) {
      if (!wants(client, event.type)) {
        continue;
      }
      if (client.targetId && client.targetId !== event.targetId) {
        continue;
      }
      this.sendToClient(client, event);
    }
  }

  getClientCount(): number {
    return this.clients.size;
  }

  /** Drop every client, e.g. on shutdown */
  clear(): void {
    this.clients.clear();
  }

  private sendToClient(client: SseClient, message: SseMessage): boolean {
    return this.write(client, `event: ${message.type}\ndata: ${JSON.stringify(message)}\n\n`);
  }

  private write(client: SseClient, chunk: string): boolean {
    try {
      return client.response.write(chunk);
    } catch (error) {
      // Client went away mid-write
      this.logger.debug(`Dropping SSE client ${client.id}`, {
        error: error instanceof Error ? error.message : String(error),
      });
      this.disconnect(client.id);
      return false;
    }
  }
}

function wants(client: SseClient, type: MonitorEventType): boolean {
  return client.channels.has(SSE_CHANNELS.ALL) || client.channels.has(type);
}

export function generateClientId(): string {
  return `sse_${randomUUID()}`;
}
