import type { ProviderOutcome } from '@lazarus/core';

const MAX_ERROR_BODY = 200;

/**
 * Map a provider HTTP response: 2xx accepted, 429 rate limited, anything else an error
 */
export async function outcomeFromResponse(response: Response): Promise<ProviderOutcome> {
  if (response.ok) {
    await response.body?.cancel().catch(() => undefined);
    return { kind: 'ACCEPTED' };
  }
  if (response.status === 429) {
    await response.body?.cancel().catch(() => undefined);
    return { kind: 'RATE_LIMITED' };
  }

  const text = await response.text().catch(() => '');
  const body = text.trim().slice(0, MAX_ERROR_BODY);
  return {
    kind: 'ERROR',
    code: response.status,
    message: body || response.statusText || `HTTP ${response.status}`,
  };
}
