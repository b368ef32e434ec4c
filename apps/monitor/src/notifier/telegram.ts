/**
 * Telegram sink: sends an HTML status line to one chat through the Bot API
 */

import { DEFAULT_TIMEOUTS, createTimeoutSignal } from '@lazarus/core';
import type { FetchLike, MonitorEvent } from '@lazarus/core';
import { summarizeEvent } from './format.js';
import type { NotificationSink } from './types.js';

export const TELEGRAM_API_BASE = 'https://api.telegram.org';

const EVENT_ICONS: Record<MonitorEvent['type'], string> = {
  STATUS_CHANGED: '🔔',
  TARGET_RECOVERED: '✅',
  REDEPLOY_ATTEMPTED: '🔁',
};

export interface TelegramSinkOptions {
  botToken: string;
  chatId: string;
  fetch?: FetchLike;
}

export function escapeHtml(text: string): string {
  return text.replace(/&/g, '&amp;').replace(/</g, '&lt;').replace(/>/g, '&gt;');
}

export function formatTelegramMessage(event: MonitorEvent): string {
  return `${EVENT_ICONS[event.type]} <b>${escapeHtml(event.type)}</b>\n${escapeHtml(summarizeEvent(event))}`;
}

export class TelegramSink implements NotificationSink {
  readonly name = 'telegram';
  private readonly fetchImpl: FetchLike;

  constructor(private readonly options: TelegramSinkOptions) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async deliver(event: MonitorEvent, signal?: AbortSignal): Promise<void> {
    const response = await this.fetchImpl(`${TELEGRAM_API_BASE}/bot${this.options.botToken}/sendMessage`, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({
        chat_id: this.options.chatId,
        text: formatTelegramMessage(event),
        parse_mode: 'HTML',
        disable_web_page_preview: true,
      }),
      signal: signal ?? createTimeoutSignal(DEFAULT_TIMEOUTS.NOTIFY),
    });

    if (!response.ok) {
      const description = await readDescription(response);
      throw new Error(`Telegram API error: ${description ?? response.statusText}`);
    }
  }
}

async function readDescription(response: Response): Promise<string | undefined> {
  try {
    const body: unknown = await response.json();
    if (typeof body === 'object' && body !== null && 'description' in body && typeof body.description === 'string') {
      return body.description;
    }
  } catch {
    return undefined;
  }
  return undefined;
}
