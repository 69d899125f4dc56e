/**
 * Retry policy and exponential backoff for external API calls
 *
 * Features:
 * - Explicit policy object (attempt budgets, base delay, multiplier)
 * - Separate budgets for rate limits (exponential) and transient failures (fixed delay)
 * - Retry-After honouring for HTTP 429
 * - A single error classifier shared by the Zotero and OpenAI adapters
 */

import { logger, type Logger } from './logger.js';

// =============================================================================
// Constants
// =============================================================================

/**
 * HTTP status codes with special handling
 */
export const RATE_LIMIT_STATUS = 429;
export const REQUEST_TIMEOUT_STATUS = 408;
export const SERVER_ERROR_THRESHOLD = 500;

/**
 * Error codes and message fragments that indicate a connectivity problem
 */
const NETWORK_ERROR_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'EPIPE',
  'socket hang up',
  'fetch failed',
  'network',
];

// =============================================================================
// Types
// =============================================================================

/**
 * How an error should be handled by the retry loop
 */
export type ErrorClass = 'rate-limit' | 'transient' | 'fatal';

/**
 * Budget for rate-limit retries (exponential backoff)
 */
export interface RateLimitBudget {
  /** Total attempts that may end in a rate-limit signal before giving up */
  maxAttempts: number;
  baseDelayMs: number;
  multiplier: number;
  maxDelayMs: number;
  /** Random spread as a fraction of the delay (0 disables jitter) */
  jitterFactor: number;
}

/**
 * Budget for transient failures (fixed short delay)
 */
export interface TransientBudget {
  maxAttempts: number;
  delayMs: number;
}

/**
 * Retry policy consumed by withRetry
 */
export interface RetryPolicy {
  rateLimit: RateLimitBudget;
  transient: TransientBudget;
  /** Decides how an error is treated */
  classify: (error: Error) => ErrorClass;
}

/**
 * Outcome of a retried operation
 */
export type RetryResult<T> =
  | { success: true; data: T; attempts: number; totalTimeMs: number }
  | {
      success: false;
      error: Error;
      attempts: number;
      totalTimeMs: number;
      /** True when the error was retryable but the budget ran out */
      exhausted: boolean;
      errorClass: ErrorClass;
    };

/**
 * Options for a retry operation
 */
export interface RetryOptions {
  policy?: RetryPolicy;
  logger?: Logger;
  /** Label used in log lines */
  label?: string;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  /** Called before each retry wait */
  onRetry?: (attempt: number, error: Error, delayMs: number, errorClass: ErrorClass) => void;
}

// =============================================================================
// Errors
// =============================================================================

/**
 * Error class for API errors with HTTP status
 *
 * A status of 0 means no HTTP response was received.
 */
export class ApiRequestError extends Error {
  public readonly status: number;
  public readonly code?: string;
  public readonly retryAfter?: number;

  constructor(
    message: string,
    status: number,
    options: { code?: string; retryAfter?: number; cause?: unknown } = {}
  ) {
    super(message, options.cause !== undefined ? { cause: options.cause } : undefined);
    this.name = 'ApiRequestError';
    this.status = status;
    this.code = options.code;
    this.retryAfter = options.retryAfter;
  }

  isRateLimited(): boolean {
    return this.status === RATE_LIMIT_STATUS;
  }

  isServerError(): boolean {
    return this.status >= SERVER_ERROR_THRESHOLD;
  }
}

// =============================================================================
// Classification
// =============================================================================

function looksLikeNetworkError(error: Error): boolean {
  const code = 'code' in error && typeof error.code === 'string' ? error.code : '';
  const haystack = `${code} ${error.message}`.toLowerCase();
  return NETWORK_ERROR_PATTERNS.some((pattern) => haystack.includes(pattern.toLowerCase()));
}

/**
 * Default error classifier
 */
export function classifyError(error: Error): ErrorClass {
  if (error.name === 'AbortError' || error.name === 'TimeoutError') {
    return 'transient';
  }

  if (error instanceof ApiRequestError) {
    if (error.isRateLimited()) return 'rate-limit';
    if (error.isServerError() || error.status === REQUEST_TIMEOUT_STATUS) return 'transient';
    if (error.status === 0) return looksLikeNetworkError(error) || error.code === 'ECONNECTION' ? 'transient' : 'fatal';
    return 'fatal';
  }

  return looksLikeNetworkError(error) ? 'transient' : 'fatal';
}

/**
 * Default retry policy
 */
export const DEFAULT_RETRY_POLICY: RetryPolicy = {
  rateLimit: {
    maxAttempts: 3,
    baseDelayMs: 5000,
    multiplier: 2,
    maxDelayMs: 60000,
    jitterFactor: 0.1,
  },
  transient: {
    maxAttempts: 3,
    delayMs: 2000,
  },
  classify: classifyError,
};

/**
 * Build a policy from partial overrides of the default
 */
export function createRetryPolicy(overrides: {
  rateLimit?: Partial<RateLimitBudget>;
  transient?: Partial<TransientBudget>;
  classify?: RetryPolicy['classify'];
} = {}): RetryPolicy {
  return {
    rateLimit: { ...DEFAULT_RETRY_POLICY.rateLimit, ...overrides.rateLimit },
    transient: { ...DEFAULT_RETRY_POLICY.transient, ...overrides.transient },
    classify: overrides.classify ?? DEFAULT_RETRY_POLICY.classify,
  };
}

// =============================================================================
// Delay Calculation
// =============================================================================

/**
 * Delay before the next attempt after the n-th rate-limit failure
 *
 * @param failure - 1-indexed count of rate-limit failures so far
 * @param retryAfter - Retry-After value in seconds, if the server sent one
 */
export function backoffDelay(
  failure: number,
  budget: RateLimitBudget,
  retryAfter?: number
): number {
  if (retryAfter !== undefined && retryAfter > 0) {
    return Math.min(retryAfter * 1000, budget.maxDelayMs);
  }

  const exponentialDelay = budget.baseDelayMs * Math.pow(budget.multiplier, failure - 1);

  const jitter =
    budget.jitterFactor > 0
      ? Math.random() * exponentialDelay * budget.jitterFactor * 2 - exponentialDelay * budget.jitterFactor
      : 0;

  return Math.min(Math.max(exponentialDelay + jitter, 0), budget.maxDelayMs);
}

/**
 * Sleep for a specified duration
 */
export function sleep(ms: number): Promise<void> {
  return new Promise((resolve) => setTimeout(resolve, ms));
}

/**
 * Parse a Retry-After (or Zotero Backoff) header value
 *
 * @param value - Header value (seconds as number or HTTP-date)
 * @returns Delay in seconds, or undefined if not parseable
 */
export function parseRetryAfter(value: string | null): number | undefined {
  if (!value) return undefined;

  const seconds = Number.parseInt(value, 10);
  if (!Number.isNaN(seconds) && String(seconds) === value.trim()) {
    return seconds > 0 ? seconds : undefined;
  }

  const date = new Date(value);
  const delayMs = date.getTime() - Date.now();
  if (!Number.isNaN(delayMs) && delayMs > 0) {
    return Math.ceil(delayMs / 1000);
  }

  return undefined;
}

// =============================================================================
// Retry Logic
// =============================================================================

/**
 * Execute a function under a retry policy
 *
 * Rate-limit and transient failures draw from separate budgets; a fatal error
 * ends the loop on the spot.
 */
export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<RetryResult<T>> {
  const policy = options.policy ?? DEFAULT_RETRY_POLICY;
  const log = options.logger ?? logger;
  const wait = options.sleep ?? sleep;
  const label = options.label ?? 'request';
  const startTime = Date.now();

  let attempts = 0;
  let rateLimitFailures = 0;
  let transientFailures = 0;

  for (;;) {
    attempts++;
    try {
      const data = await fn();
      if (attempts > 1) {
        log.info(`${label} succeeded after ${attempts} attempts`, { attempts });
      }
      return { success: true, data, attempts, totalTimeMs: Date.now() - startTime };
    } catch (thrown) {
      const error = thrown instanceof Error ? thrown : new Error(String(thrown));
      const errorClass = policy.classify(error);

      let delayMs: number;
      if (errorClass === 'rate-limit') {
        rateLimitFailures++;
        if (rateLimitFailures >= policy.rateLimit.maxAttempts) {
          log.warn(`${label}: rate-limit retries exhausted`, { attempts, error: error.message });
          return { success: false, error, attempts, totalTimeMs: Date.now() - startTime, exhausted: true, errorClass };
        }
        const retryAfter = error instanceof ApiRequestError ? error.retryAfter : undefined;
        delayMs = backoffDelay(rateLimitFailures, policy.rateLimit, retryAfter);
      } else if (errorClass === 'transient') {
        transientFailures++;
        if (transientFailures >= policy.transient.maxAttempts) {
          log.warn(`${label}: transient-error retries exhausted`, { attempts, error: error.message });
          return { success: false, error, attempts, totalTimeMs: Date.now() - startTime, exhausted: true, errorClass };
        }
        delayMs = policy.transient.delayMs;
      } else {
        log.debug(`${label}: error is not retryable`, { attempts, error: error.message });
        return { success: false, error, attempts, totalTimeMs: Date.now() - startTime, exhausted: false, errorClass };
      }

      log.info(`${label}: ${errorClass} failure, retrying in ${Math.round(delayMs)}ms`, {
        attempt: attempts,
        error: error.message,
        status: error instanceof ApiRequestError ? error.status : undefined,
      });
      options.onRetry?.(attempts, error, delayMs, errorClass);

      await wait(delayMs);
    }
  }
}
