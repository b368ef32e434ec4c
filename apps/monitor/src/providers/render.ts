/**
 * Render: deploy hook URL, or the REST API with an API key
 */

import type { FetchLike, ProviderOutcome, Target } from '@lazarus/core';
import { outcomeFromResponse } from './response.js';
import type { ProviderClient, ProviderClientOptions } from './types.js';

export const RENDER_API_BASE = 'https://api.render.com/v1';

export interface RenderClientOptions extends ProviderClientOptions {
  /** Used when the target does not carry its own key */
  apiKey?: string;
}

export class RenderClient implements ProviderClient {
  readonly kind = 'RENDER' as const;
  private readonly fetchImpl: FetchLike;
  private readonly apiKey: string | undefined;

  constructor(options: RenderClientOptions = {}) {
    this.fetchImpl = options.fetch ?? fetch;
    this.apiKey = options.apiKey;
  }

  async redeploy(target: Target, signal: AbortSignal): Promise<ProviderOutcome> {
    if (target.provider !== 'RENDER') {
      return { kind: 'ERROR', code: 'WRONG_PROVIDER', message: `Target '${target.id}' is not a RENDER target` };
    }
    const { deployHookUrl, serviceId } = target.deploy;

    if (deployHookUrl) {
      const response = await this.fetchImpl(deployHookUrl, { method: 'POST', signal });
      return outcomeFromResponse(response);
    }

    if (!serviceId) {
      return { kind: 'ERROR', code: 'MISSING_SERVICE', message: 'deployHookUrl or serviceId is required' };
    }

    const apiKey = target.deploy.apiKey ?? this.apiKey;
    if (!apiKey) {
      return { kind: 'ERROR', code: 'MISSING_CREDENTIALS', message: 'No Render API key configured' };
    }

    const response = await this.fetchImpl(`${RENDER_API_BASE}/services/${encodeURIComponent(serviceId)}/deploys`, {
      method: 'POST',
      headers: {
        Authorization: `Bearer ${apiKey}`,
        Accept: 'application/json',
        'Content-Type': 'application/json',
      },
      body: JSON.stringify({ clearCache: 'do_not_clear' }),
      signal,
    });
    return outcomeFromResponse(response);
  }
}
