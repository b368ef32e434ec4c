/**
 * HTTP client for the monitor API
 */

import { z, type ZodTypeAny } from 'zod';
import {
  DEFAULT_TIMEOUTS,
  LazarusError,
  ProbeResponseSchema,
  RedeployAttemptSchema,
  TargetDetailSchema,
  TargetSchema,
  TargetViewSchema,
  createLogger,
  createTimeoutSignal,
  errorMessage,
  formatZodIssues,
} from '@lazarus/core';
import type { FetchLike } from '@lazarus/core';

const logger = createLogger('cli:api');

const EnvelopeSchema = z.object({
  success: z.boolean().optional(),
  data: z.unknown().optional(),
  message: z.string().optional(),
  error: z.string().optional(),
  code: z.string().optional(),
  details: z.unknown().optional(),
});

const MonitorHealthSchema = z.object({
  status: z.string(),
  running: z.boolean(),
  targets: z.number(),
  timestamp: z.string(),
});

export type MonitorHealth = z.infer<typeof MonitorHealthSchema>;
export type TargetRecord = z.output<typeof TargetSchema>;
export type TargetViewRecord = z.output<typeof TargetViewSchema>;
export type TargetDetailRecord = z.output<typeof TargetDetailSchema>;
export type ProbeResponse = z.output<typeof ProbeResponseSchema>;
export type AttemptRecord = z.output<typeof RedeployAttemptSchema>;

export interface ApiClientOptions {
  baseUrl: string;
  apiKey?: string;
  timeoutMs?: number;
  fetch?: FetchLike;
}

export class ApiClient {
  private readonly baseUrl: string;
  private readonly apiKey: string | undefined;
  private readonly timeoutMs: number;
  private readonly fetchImpl: FetchLike;

  constructor(options: ApiClientOptions) {
    this.baseUrl = options.baseUrl.replace(/\/+$/, '');
    this.apiKey = options.apiKey;
    this.timeoutMs = options.timeoutMs ?? DEFAULT_TIMEOUTS.API_REQUEST;
    this.fetchImpl = options.fetch ?? fetch;
  }

  async health(): Promise<MonitorHealth> {
    const body = await this.send('GET', '/health');
    return this.parse(MonitorHealthSchema, body, '/health');
  }

  async listTargets(): Promise<TargetViewRecord[]> {
    return this.request('GET', '/api/targets', z.array(TargetViewSchema));
  }

  async getTarget(id: string): Promise<TargetDetailRecord> {
    return this.request('GET', `/api/targets/${encodeURIComponent(id)}`, TargetDetailSchema);
  }

  async addTarget(definition: Record<string, unknown>): Promise<TargetRecord> {
    return this.request('POST', '/api/targets', TargetSchema, definition);
  }

  async updateTarget(id: string, fields: Record<string, unknown>): Promise<TargetRecord> {
    return this.request('PATCH', `/api/targets/${encodeURIComponent(id)}`, TargetSchema, fields);
  }

  async removeTarget(id: string): Promise<TargetRecord> {
    return this.request('DELETE', `/api/targets/${encodeURIComponent(id)}`, TargetSchema);
  }

  async probe(id: string): Promise<ProbeResponse> {
    return this.request('POST', `/api/targets/${encodeURIComponent(id)}/probe`, ProbeResponseSchema);
  }

  async redeploy(id: string): Promise<AttemptRecord> {
    return this.request('POST', `/api/targets/${encodeURIComponent(id)}/redeploy`, RedeployAttemptSchema);
  }

  /**
   * Call an endpoint and validate the `data` of its response envelope
   * @throws {LazarusError} With the server's code and status on a non-2xx answer
   */
  private async request<S extends ZodTypeAny>(
    method: string,
    path: string,
    schema: S,
    body?: Record<string, unknown>
  ): Promise<z.output<S>> {
    const raw = await this.send(method, path, body);
    const envelope = this.parse(EnvelopeSchema, raw, path);
    return this.parse(schema, envelope.data, path);
  }

  private async send(method: string, path: string, body?: Record<string, unknown>): Promise<unknown> {
    const url = `${this.baseUrl}${path}`;
    const headers: Record<string, string> = {};
    if (body !== undefined) {
      headers['Content-Type'] = 'application/json';
    }
    if (this.apiKey) {
      headers.Authorization = `Bearer ${this.apiKey}`;
    }

    logger.debug(`${method} ${url}`);

    let response: Response;
    try {
      response = await this.fetchImpl(url, {
        method,
        headers,
        body: body === undefined ? undefined : JSON.stringify(body),
        signal: createTimeoutSignal(this.timeoutMs),
      });
    } catch (error) {
      throw new LazarusError(`Cannot reach monitor at ${this.baseUrl}: ${errorMessage(error)}`, 'CONNECTION_ERROR', 503);
    }

    const text = await response.text();
    let payload: unknown = undefined;
    if (text) {
      try {
        payload = JSON.parse(text);
      } catch {
        payload = undefined;
      }
    }

    if (!response.ok) {
      const envelope = EnvelopeSchema.safeParse(payload);
      const failure = envelope.success ? envelope.data : undefined;
      throw new LazarusError(
        failure?.error ?? `Request failed: ${response.status} ${response.statusText}`.trim(),
        failure?.code ?? 'API_ERROR',
        response.status,
        failure?.details
      );
    }

    return payload;
  }

  private parse<S extends ZodTypeAny>(schema: S, value: unknown, path: string): z.output<S> {
    const parsed = schema.safeParse(value);
    if (!parsed.success) {
      throw new LazarusError(
        `Unexpected response from ${path}: ${formatZodIssues(parsed.error).join('; ')}`,
        'INVALID_RESPONSE',
        502
      );
    }
    return parsed.data;
  }
}
