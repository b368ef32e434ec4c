/**
 * Shared fixtures for monitor tests
 */

import { CreateTargetSchema, LogLevel, createLogger } from '@lazarus/core';
import type {
  Clock,
  Logger,
  MonitorEvent,
  ProbeOutcome,
  ProbeResult,
  ProviderKind,
  ProviderOutcome,
  Target,
} from '@lazarus/core';
import type { Notifier } from '../notifier/types.js';
import type { ProviderClient, ProviderClients } from '../providers/types.js';

export const silentLogger: Logger = createLogger('test', { level: LogLevel.SILENT });

export class FakeClock implements Clock {
  private mono = 1_000;
  private wall: number;

  constructor(start = '2024-01-01T00:00:00.000Z') {
    this.wall = Date.parse(start);
  }

  monotonic(): number {
    return this.mono;
  }

  now(): Date {
    return new Date(this.wall);
  }

  advance(ms: number): void {
    this.mono += ms;
    this.wall += ms;
  }
}

export class RecordingNotifier implements Notifier {
  readonly events: MonitorEvent[] = [];

  publish(event: MonitorEvent): void {
    this.events.push(event);
  }

  ofType<T extends MonitorEvent['type']>(type: T): Array<Extract<MonitorEvent, { type: T }>> {
    return this.events.filter((event): event is Extract<MonitorEvent, { type: T }> => event.type === type);
  }
}

export function makeTarget(overrides: Record<string, unknown> = {}): Target {
  const definition = CreateTargetSchema.parse({
    id: 'api',
    url: 'https://api.example.test/health',
    provider: 'WEBHOOK',
    deploy: { url: 'https://deploy.example.test/hook' },
    intervalSeconds: 10,
    failureThreshold: 3,
    cooldownSeconds: 60,
    ...overrides,
  });
  return { ...definition, createdAt: '2024-01-01T00:00:00.000Z', updatedAt: '2024-01-01T00:00:00.000Z' };
}

export const SUCCESS: ProbeOutcome = { kind: 'SUCCESS', statusCode: 200 };
export const TIMEOUT: ProbeOutcome = { kind: 'TIMEOUT' };

export function probeResult(targetId: string, outcome: ProbeOutcome): ProbeResult {
  return { targetId, timestamp: '2024-01-01T00:00:00.000Z', outcome, latencyMs: 5 };
}

export interface Deferred<T> {
  promise: Promise<T>;
  resolve(value: T): void;
  reject(error: Error): void;
}

export function deferred<T>(): Deferred<T> {
  let resolve: (value: T) => void = () => undefined;
  let reject: (error: Error) => void = () => undefined;
  const promise = new Promise<T>((res, rej) => {
    resolve = res;
    reject = rej;
  });
  return { promise, resolve, reject };
}

/**
 * Provider client whose answers are queued by the test
 */
export class ScriptedProvider implements ProviderClient {
  readonly calls: Target[] = [];
  private queue: Array<Promise<ProviderOutcome>> = [];

  constructor(readonly kind: ProviderKind = 'WEBHOOK') {}

  answer(outcome: ProviderOutcome): void {
    this.queue.push(Promise.resolve(outcome));
  }

  answerWith(pending: Promise<ProviderOutcome>): void {
    this.queue.push(pending);
  }

  async redeploy(target: Target): Promise<ProviderOutcome> {
    this.calls.push(target);
    return this.queue.shift() ?? { kind: 'ACCEPTED' };
  }
}

export function providerSet(client: ProviderClient): ProviderClients {
  return { RENDER: client, KOYEB: client, WEBHOOK: client };
}

/** Let queued microtasks and promise callbacks run */
export async function flushPromises(): Promise<void> {
  for (let i = 0; i < 10; i++) {
    await new Promise<void>((resolve) => setImmediate(resolve));
  }
}
