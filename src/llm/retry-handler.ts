/**
 * Retry Handler
 * Manages retry logic with backoff for LLM transport failures
 */

import { logger } from '../lib/logger/structured-logger.js';

export interface ErrorCategory {
  type: 'abort_timeout' | 'transport_error' | 'unknown';
  isRetriable: boolean;
  reason: string;
  statusCode?: number;
}

export interface RetryConfig {
  maxAttempts: number;
  backoffMs: number[];
}

function readField(e: unknown, field: string): unknown {
  if (typeof e !== 'object' || e === null) return undefined;
  return Reflect.get(e, field);
}

export class RetryHandler {
  constructor(
    private readonly config: RetryConfig,
    private readonly sleep: (ms: number) => Promise<void> = (ms) => new Promise(res => setTimeout(res, ms))
  ) {}

  /**
   * Execute fn, retrying retriable failures with the configured backoff.
   * Non-retriable errors and the last failure are rethrown.
   */
  async executeWithRetry<T>(
    fn: (attempt: number) => Promise<T>,
    opts?: { traceId?: string }
  ): Promise<T> {
    const { maxAttempts, backoffMs } = this.config;
    let lastErr: unknown;

    for (let attempt = 0; attempt < maxAttempts; attempt++) {
      const backoff = backoffMs[attempt] ?? 0;
      if (attempt > 0 && backoff > 0) {
        await this.sleep(backoff);
      }

      try {
        return await fn(attempt);
      } catch (e) {
        lastErr = e;
        const category = this.categorizeError(e);

        if (!category.isRetriable) {
          logger.error({
            status: category.statusCode,
            traceId: opts?.traceId,
            errorType: category.type,
            reason: category.reason
          }, '[LLM] Non-retriable error, failing fast');
          throw e;
        }

        if (attempt === maxAttempts - 1) {
          logger.error({
            attempts: attempt + 1,
            traceId: opts?.traceId,
            errorType: category.type
          }, '[LLM] All retry attempts exhausted');
          throw e;
        }

        logger.warn({
          attempt: attempt + 1,
          maxAttempts,
          status: category.statusCode,
          traceId: opts?.traceId,
          errorType: category.type
        }, '[LLM] Retriable error, will retry with backoff');
      }
    }

    throw lastErr ?? new Error('LLM failed after all attempts');
  }

  categorizeError(e: unknown): ErrorCategory {
    const name = readField(e, 'name');
    const message = e instanceof Error ? e.message : String(e);
    const status = readField(e, 'status');

    const isAbortError = name === 'AbortError' ||
      name === 'APIConnectionTimeoutError' ||
      message.includes('aborted') ||
      message.includes('timeout');

    if (isAbortError) {
      return {
        type: 'abort_timeout',
        isRetriable: true,
        reason: 'Request aborted or timeout'
      };
    }

    if (typeof status === 'number' && (status === 429 || status >= 500)) {
      return {
        type: 'transport_error',
        isRetriable: true,
        reason: `HTTP ${status}`,
        statusCode: status
      };
    }

    return {
      type: 'unknown',
      isRetriable: false,
      reason: message || 'unknown',
      ...(typeof status === 'number' ? { statusCode: status } : {})
    };
  }
}
