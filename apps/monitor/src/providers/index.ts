/**
 * Provider clients, one per provider tag
 */

import type { Config, FetchLike } from '@lazarus/core';
import { KoyebClient } from './koyeb.js';
import { RenderClient } from './render.js';
import type { ProviderClients } from './types.js';
import { WebhookClient } from './webhook.js';

export function createProviderClients(
  credentials: Config['providers'],
  fetchImpl?: FetchLike
): ProviderClients {
  return {
    RENDER: new RenderClient({ fetch: fetchImpl, apiKey: credentials.renderApiKey }),
    KOYEB: new KoyebClient({ fetch: fetchImpl, apiToken: credentials.koyebApiToken }),
    WEBHOOK: new WebhookClient({ fetch: fetchImpl }),
  };
}

export { RenderClient, RENDER_API_BASE } from './render.js';
export { KoyebClient, KOYEB_API_BASE } from './koyeb.js';
export { WebhookClient } from './webhook.js';
export { outcomeFromResponse } from './response.js';
export type { ProviderClient, ProviderClients, ProviderClientOptions } from './types.js';
