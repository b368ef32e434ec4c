/**
 * Hosting provider client contract
 */

import type { FetchLike, ProviderKind, ProviderOutcome, Target } from '@lazarus/core';

export interface ProviderClient {
  readonly kind: ProviderKind;
  /**
   * Ask the provider to redeploy the target's service.
   * Rejects only on transport failure or abort.
   */
  redeploy(target: Target, signal: AbortSignal): Promise<ProviderOutcome>;
}

export type ProviderClients = Readonly<Record<ProviderKind, ProviderClient>>;

export interface ProviderClientOptions {
  fetch?: FetchLike;
}
