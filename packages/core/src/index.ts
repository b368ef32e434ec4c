/**
 * Core utilities for the Lazarus keep-alive monitor
 */

export * from './types.js';
export * from './errors.js';
export * from './logger.js';
export * from './config.js';
export * from './env.js';
export * from './schemas.js';
export * from './type-guards.js';
export * from './timeout.js';
export * from './concurrency.js';

// Re-export commonly used types for convenience
export type {
  Target,
  HealthState,
  HealthStatus,
  ProbeResult,
  RedeployAttempt,
  MonitorEvent,
  // API Response Types
  ApiResponse,
  ApiError,
  TargetView,
  TargetDetail,
} from './types.js';
