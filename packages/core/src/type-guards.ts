/**
 * Type guards for runtime type validation
 */

import type {
  HealthStatus,
  ProbeOutcome,
  ProviderKind,
  RedeployOutcome,
} from './types.js';

const PROVIDER_KINDS: readonly ProviderKind[] = ['RENDER', 'KOYEB', 'WEBHOOK'];
const HEALTH_STATUSES: readonly HealthStatus[] = ['UNKNOWN', 'HEALTHY', 'DEGRADED', 'DOWN', 'REDEPLOYING'];

/**
 * Check if a value is a plain object (not null, not an array)
 */
export function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

/**
 * Type guard for record of strings (headers, CLI key=value pairs, etc.)
 */
export function isStringRecord(value: unknown): value is Record<string, string> {
  if (!isRecord(value)) {
    return false;
  }
  return Object.values(value).every((v) => typeof v === 'string');
}

/**
 * Narrow unknown to Record<string, string>
 */
export function asStringRecord(value: unknown): Record<string, string> {
  if (isStringRecord(value)) {
    return value;
  }
  throw new Error('Invalid value: expected Record<string, string>');
}

export function isProviderKind(value: unknown): value is ProviderKind {
  return typeof value === 'string' && PROVIDER_KINDS.some((kind) => kind === value);
}

export function isHealthStatus(value: unknown): value is HealthStatus {
  return typeof value === 'string' && HEALTH_STATUSES.some((status) => status === value);
}

/**
 * A probe counts as a success only for a 2xx/3xx answer
 */
export function isProbeSuccess(outcome: ProbeOutcome): outcome is Extract<ProbeOutcome, { kind: 'SUCCESS' }> {
  return outcome.kind === 'SUCCESS';
}

/**
 * Outcome text for logs, metrics labels and notifications
 */
export function describeRedeployOutcome(outcome: RedeployOutcome): string {
  switch (outcome.kind) {
    case 'SUCCEEDED':
      return 'succeeded';
    case 'FAILED':
      return `failed: ${outcome.reason}`;
    case 'THROTTLED':
      return `throttled: ${outcome.reason}`;
  }
}

export function describeProbeOutcome(outcome: ProbeOutcome): string {
  switch (outcome.kind) {
    case 'SUCCESS':
      return `HTTP ${outcome.statusCode}`;
    case 'HTTP_ERROR':
      return `HTTP ${outcome.statusCode}`;
    case 'TIMEOUT':
      return 'timed out';
    case 'CONNECTION_ERROR':
      return `connection error: ${outcome.message}`;
  }
}
