/**
 * Timeout utilities for probes and provider calls
 */

export class TimeoutError extends Error {
  constructor(message: string, public readonly timeoutMs: number) {
    super(message);
    this.name = 'TimeoutError';
  }
}

/**
 * Wrap a promise with a timeout
 * @param errorMessage - Optional custom error message
 * @returns The promise result, or rejects with a TimeoutError
 */
export async function withTimeout<T>(
  promise: Promise<T>,
  timeoutMs: number,
  errorMessage?: string
): Promise<T> {
  let timeoutHandle: NodeJS.Timeout | undefined;

  const timeoutPromise = new Promise<never>((_, reject) => {
    timeoutHandle = setTimeout(() => {
      reject(new TimeoutError(errorMessage ?? `Operation timed out after ${timeoutMs}ms`, timeoutMs));
    }, timeoutMs);
  });

  try {
    return await Promise.race([promise, timeoutPromise]);
  } finally {
    clearTimeout(timeoutHandle);
  }
}

/**
 * Create an AbortSignal that aborts after `timeoutMs`, optionally also following a parent signal.
 * The delay is rounded to a whole millisecond; AbortSignal.timeout rejects fractions.
 */
export function createTimeoutSignal(timeoutMs: number, parent?: AbortSignal): AbortSignal {
  const timeoutSignal = AbortSignal.timeout(toDelayMs(timeoutMs));
  if (!parent) {
    return timeoutSignal;
  }
  return AbortSignal.any([parent, timeoutSignal]);
}

/**
 * Whether a thrown value is an abort caused by a timeout signal
 */
export function isTimeoutAbort(error: unknown): boolean {
  if (error instanceof TimeoutError) {
    return true;
  }
  if (!(error instanceof Error)) {
    return false;
  }
  if (error.name === 'TimeoutError' || error.name === 'AbortError') {
    return true;
  }
  const cause: unknown = error.cause;
  if (typeof cause === 'object' && cause !== null && 'code' in cause) {
    return cause.code === 'ETIMEDOUT' || cause.code === 'UND_ERR_CONNECT_TIMEOUT';
  }
  return false;
}

/**
 * Default timeout values for different operations (in milliseconds)
 */
export const DEFAULT_TIMEOUTS = {
  /** Upper bound for a single probe (30 seconds) */
  PROBE: 30000,
  /** Hosting provider redeploy call (60 seconds) */
  PROVIDER_CALL: 60000,
  /** Notification sink delivery (10 seconds) */
  NOTIFY: 10000,
  /** CLI calls to the monitor API (30 seconds) */
  API_REQUEST: 30000,
} as const;

/**
 * Probe timeout for a target: explicit override, else half the interval capped at PROBE
 */
export function probeTimeoutMs(target: { intervalSeconds: number; timeoutMs?: number }): number {
  if (target.timeoutMs !== undefined) {
    return toDelayMs(target.timeoutMs);
  }
  return toDelayMs(Math.min((target.intervalSeconds * 1000) / 2, DEFAULT_TIMEOUTS.PROBE));
}

/** Whole milliseconds, at least 1 */
function toDelayMs(ms: number): number {
  return Math.max(1, Math.round(ms));
}
