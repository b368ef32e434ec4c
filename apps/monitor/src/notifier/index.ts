export { NotifierHub } from './hub.js';
export type { NotifierHubOptions } from './hub.js';
export { SseSink, SSE_CHANNELS, SSE_KEEPALIVE_MS, MAX_SSE_CONNECTIONS, parseChannels, isSseChannel } from './sse.js';
export type { SseChannel, SseClient, SseResponse, SseMessage } from './sse.js';
export { WebhookSink } from './webhook.js';
export { TelegramSink, escapeHtml, formatTelegramMessage } from './telegram.js';
export { summarizeEvent } from './format.js';
export type { Notifier, NotificationSink } from './types.js';
