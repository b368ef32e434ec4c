/**
 * Outbound webhook sink: POSTs each event as JSON
 */

import { DEFAULT_TIMEOUTS, createTimeoutSignal } from '@lazarus/core';
import type { FetchLike, MonitorEvent } from '@lazarus/core';
import { summarizeEvent } from './format.js';
import type { NotificationSink } from './types.js';

export interface WebhookSinkOptions {
  url: string;
  headers?: Record<string, string>;
  fetch?: FetchLike;
}

export class WebhookSink implements NotificationSink {
  readonly name = 'webhook';
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: WebhookSinkOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async deliver(event: MonitorEvent, signal?: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(this.options.url, {
      method: 'POST',
      headers: {
        'Content-Type': 'application/json',
        ...this.options.headers,
      },
      body: JSON.stringify({ ...event, summary: summarizeEvent(event) }),
      signal: signal ?? createTimeoutSignal(DEFAULT_TIMEOUTS.NOTIFY),
    });

    if (!response.ok) {
      const text = await response.text().catch(() => '');
      throw new Error(`Webhook error: ${response.status} ${text}`.trim());
    }
  }
}
