/**
 * Koyeb: service redeploy endpoint with an API token
 */

import type { FetchLike, ProviderOutcome, Target } from '@lazarus/core';
import { outcomeFromResponse } from './response.js';
import type { ProviderClient, ProviderClientOptions } from './types.js';

export const KOYEB_API_BASE = 'https://app.koyeb.com/v1';

export interface KoyebClientOptions extends ProviderClientOptions {
  apiToken?: string;
}

export class KoyebClient implements ProviderClient {
  readonly kind = 'KOYEB' as const;
  private readonly fetchImpl: FetchLike;
  private readonly apiToken: string | undefined;

  constructor(options: KoyebClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.apiToken = options.apiToken;
  }

  async redeploy(target: Target, signal: AbortSignal): Promise<ProviderOutcome> {
    if (target.provider !== 'KOYEB') {
      return { kind: 'ERROR', code: 'WRONG_PROVIDER', message: `Target '${target.id}' is not a KOYEB target` };
    }

    const apiToken = target.deploy.apiToken ?? this.apiToken;
    if (!apiToken) {
      return { kind: 'ERROR', code: 'MISSING_CREDENTIALS', message: 'No Koyeb API token configured' };
    }

    const serviceId = encodeURIComponent(target.deploy.serviceId);
    const response = await this.fetchImpl(`${KOYEB_API_BASE}/services/${serviceId}/redeploy`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiToken}`,
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({}),
      signal,
    });
    return outcomeFromResponse(response);
  }
}
