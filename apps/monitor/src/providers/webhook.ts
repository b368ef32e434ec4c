/**
 * Generic deploy hook: any URL that triggers a redeploy when called
 */

import type { FetchLike, ProviderOutcome, Target } from '@lazarus/core';
import { outcomeFromResponse } from './response.js';
import type { ProviderClient, ProviderClientOptions } from './types.js';

export class WebhookClient implements ProviderClient {
  readonly kind = 'WEBHOOK' as const;
  private readonly fetchImpl: FetchLike;

  constructor(options: ProviderClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
  }

  async redeploy(target: Target, signal: AbortSignal): Promise<ProviderOutcome> {
    if (target.provider !== 'WEBHOOK') {
      return { kind: 'ERROR', code: 'WRONG_PROVIDER', message: `Target '${target.id}' is not a WEBHOOK target` };
    }
    const { url, method = 'GET', headers } = target.deploy;

    const response = await this.fetchImpl(url, {
      method,
      headers: { ...headers },
      signal,
    });
    return outcomeFromResponse(response);
  }
}
