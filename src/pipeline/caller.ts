/**
 * RateLimitedCaller - cache, retry and backoff around an external call
 *
 * Lookup order: fresh cache entry, then the external service under the retry
 * policy. Successful responses are cached before they are returned.
 */

import { NonRetryableError, RetriesExhaustedError, toError } from '../errors.js';
import { logger as defaultLogger, type Logger } from '../api/logger.js';
import { DEFAULT_RETRY_POLICY, withRetry, type RetryPolicy } from '../api/retry.js';
import type { ResponseCache } from './cache.js';

export interface RateLimitedCallerOptions<Req, Res> {
  /** The external call */
  invoke: (request: Req) => Promise<Res>;
  /** Deterministic fingerprint of a request */
  fingerprint: (request: Req) => string;
  cache?: ResponseCache<Res>;
  policy?: RetryPolicy;
  logger?: Logger;
  /** Injected for tests */
  sleep?: (ms: number) => Promise<void>;
  label?: string;
}

export interface CallerStats {
  cacheHits: number;
  cacheMisses: number;
  /** Calls that reached the external service, retries included */
  attempts: number;
  failures: number;
}

export class RateLimitedCaller<Req, Res> {
  private readonly log: Logger;
  private readonly policy: RetryPolicy;
  private readonly counters: CallerStats = { cacheHits: 0, cacheMisses: 0, attempts: 0, failures: 0 };

  constructor(private readonly options: RateLimitedCallerOptions<Req, Res>) {
    this.log = (options.logger ?? defaultLogger).child({ component: options.label ?? 'caller' });
    this.policy = options.policy ?? DEFAULT_RETRY_POLICY;
  }

  /**
   * @throws RetriesExhaustedError when a retryable error outlasts the budget
   * @throws NonRetryableError when the service rejects the request outright
   */
  async call(request: Req): Promise<Res> {
    const fingerprint = this.options.fingerprint(request);

    if (this.options.cache) {
      const cached = await this.options.cache.get(fingerprint);
      if (cached !== undefined) {
        this.counters.cacheHits++;
        this.log.debug('Cache hit', { fingerprint });
        return cached;
      }
      this.counters.cacheMisses++;
    }

    const result = await withRetry(() => this.options.invoke(request), {
      policy: this.policy,
      logger: this.log,
      label: this.options.label ?? 'external call',
      sleep: this.options.sleep,
    });
    this.counters.attempts += result.attempts;

    if (!result.success) {
      this.counters.failures++;
      if (result.exhausted) {
        throw new RetriesExhaustedError(result.attempts, result.error);
      }
      throw new NonRetryableError(result.error);
    }

    if (this.options.cache) {
      try {
        await this.options.cache.set(fingerprint, result.data);
      } catch (error) {
        this.log.warn('Could not store response in cache', { fingerprint, error: toError(error).message });
      }
    }

    return result.data;
  }

  get stats(): CallerStats {
    return { ...this.counters };
  }
}
