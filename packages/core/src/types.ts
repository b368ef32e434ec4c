/**
 * Shared type definitions for the Lazarus keep-alive monitor
 */

// ============================================================================
// Target Types
// ============================================================================

export type ProviderKind = 'RENDER' | 'KOYEB' | 'WEBHOOK';

export interface RenderDeployConfig {
  /** Deploy hook URL; takes precedence over the REST API when set */
  deployHookUrl?: string;
  serviceId?: string;
  apiKey?: string;
}

export interface KoyebDeployConfig {
  serviceId: string;
  apiToken?: string;
}

export interface WebhookDeployConfig {
  url: string;
  method?: 'GET' | 'POST';
  headers?: Record<string, string>;
}

export type DeployConfig =
  | RenderDeployConfig
  | KoyebDeployConfig
  | WebhookDeployConfig;

export type TargetDeployment =
  | { provider: 'RENDER'; deploy: RenderDeployConfig }
  | { provider: 'KOYEB'; deploy: KoyebDeployConfig }
  | { provider: 'WEBHOOK'; deploy: WebhookDeployConfig };

export interface TargetSettings {
  url: string;
  intervalSeconds: number;
  failureThreshold: number;
  cooldownSeconds: number;
  timeoutMs?: number;
  enabled: boolean;
  autoRedeploy: boolean;
  allowManualRedeploy: boolean;
  description?: string;
}

export type Target = TargetDeployment & TargetSettings & {
  id: string;
  createdAt: string;
  updatedAt: string;
};

// ============================================================================
// Probe Types
// ============================================================================

export type ProbeOutcome =
  | { kind: 'SUCCESS'; statusCode: number }
  | { kind: 'TIMEOUT' }
  | { kind: 'CONNECTION_ERROR'; message: string }
  | { kind: 'HTTP_ERROR'; statusCode: number };

export type ProbeOutcomeKind = ProbeOutcome['kind'];

export interface ProbeResult {
  readonly targetId: string;
  readonly timestamp: string;
  readonly outcome: ProbeOutcome;
  readonly latencyMs: number;
}

// ============================================================================
// Health Types
// ============================================================================

export type HealthStatus = 'UNKNOWN' | 'HEALTHY' | 'DEGRADED' | 'DOWN' | 'REDEPLOYING';

export interface HealthState {
  status: HealthStatus;
  consecutiveFailures: number;
  lastTransitionAt: string | null;
  lastRedeployAt: string | null;
  lastProbe: ProbeResult | null;
}

// ============================================================================
// Redeploy Types
// ============================================================================

export type RedeployTrigger = 'AUTOMATIC' | 'MANUAL';

export type RedeployOutcome =
  | { kind: 'SUCCEEDED' }
  | { kind: 'FAILED'; reason: string }
  | { kind: 'THROTTLED'; reason: string };

export interface RedeployAttempt {
  readonly id: string;
  readonly targetId: string;
  readonly trigger: RedeployTrigger;
  readonly requestedAt: string;
  readonly completedAt: string;
  readonly outcome: RedeployOutcome;
}

/** What a hosting provider answered to a redeploy call */
export type ProviderOutcome =
  | { kind: 'ACCEPTED' }
  | { kind: 'RATE_LIMITED' }
  | { kind: 'ERROR'; code: number | string; message: string };

// ============================================================================
// Notification Types
// ============================================================================

export type MonitorEvent =
  | {
      type: 'STATUS_CHANGED';
      targetId: string;
      oldStatus: HealthStatus;
      newStatus: HealthStatus;
      timestamp: string;
    }
  | {
      type: 'TARGET_RECOVERED';
      targetId: string;
      previousStatus: HealthStatus;
      timestamp: string;
    }
  | {
      type: 'REDEPLOY_ATTEMPTED';
      targetId: string;
      outcome: RedeployOutcome;
      attempt: RedeployAttempt;
      timestamp: string;
    };

export type MonitorEventType = MonitorEvent['type'];

// ============================================================================
// Configuration Types
// ============================================================================

export type StoreDriver = 'file' | 'redis' | 'memory';

export interface Config {
  monitor: {
    host: string;
    port: number;
  };
  store: {
    driver: StoreDriver;
    path: string;
    redisUrl: string;
    redisNamespace: string;
  };
  scheduler: {
    poolSize: number;
    tickMs: number;
    shutdownTimeoutMs: number;
  };
  redeploy: {
    providerTimeoutMs: number;
    historySize: number;
  };
  providers: {
    renderApiKey?: string;
    koyebApiToken?: string;
  };
  notify: {
    webhookUrl?: string;
    telegram?: {
      botToken: string;
      chatId: string;
    };
  };
  adminApiKeys: string[];
}

// ============================================================================
// Clock & HTTP
// ============================================================================

export interface Clock {
  /** Monotonic milliseconds, only meaningful as differences */
  monotonic(): number;
  now(): Date;
}

/** The part of `fetch` the monitor and CLI use; injectable in tests */
export type FetchLike = (input: string | URL, init?: RequestInit) => Promise<Response>;

// ============================================================================
// Error Types
// ============================================================================

export class LazarusError extends Error {
  constructor(
    message: string,
    public code: string,
    public statusCode: number = 500,
    public details?: unknown
  ) {
    super(message);
    this.name = 'LazarusError';
  }
}

export class AuthenticationError extends LazarusError {
  constructor(message: string = 'Authentication failed', details?: unknown) {
    super(message, 'AUTHENTICATION_ERROR', 401, details);
    this.name = 'AuthenticationError';
  }
}

export class ForbiddenError extends LazarusError {
  constructor(message: string = 'Operation not allowed', details?: unknown) {
    super(message, 'FORBIDDEN', 403, details);
    this.name = 'ForbiddenError';
  }
}

export class NotFoundError extends LazarusError {
  constructor(resource: string, id?: string) {
    const message = id ? `${resource} with id '${id}' not found` : `${resource} not found`;
    super(message, 'NOT_FOUND', 404, { resource, id });
    this.name = 'NotFoundError';
  }
}

export class InvalidConfigError extends LazarusError {
  constructor(message: string, details?: unknown) {
    super(message, 'INVALID_CONFIG', 400, details);
    this.name = 'InvalidConfigError';
  }
}

export class DuplicateTargetError extends LazarusError {
  constructor(id: string) {
    super(`Target with id '${id}' already exists`, 'DUPLICATE_TARGET', 409, { id });
    this.name = 'DuplicateTargetError';
  }
}

export class StoreError extends LazarusError {
  constructor(message: string, details?: unknown) {
    super(message, 'STORE_ERROR', 500, details);
    this.name = 'StoreError';
  }
}

// ============================================================================
// API Response Types
// ============================================================================

export interface ApiResponse<T> {
  data: T;
  success: true;
}

export interface ApiError {
  error: string;
  code: string;
  details?: unknown;
  success: false;
}

export interface TargetView {
  target: Target;
  health: HealthState;
}

export interface TargetDetail extends TargetView {
  history: RedeployAttempt[];
}
