import pRetry, { AbortError, type FailedAttemptError, type Options } from 'p-retry';
import { logger } from './logger';
import { getErrorCode, getErrorMessage, getErrorStatusCode } from '../utils/errorUtils';

export interface RetryOptions {
  retries?: number;
  context?: string;
  minTimeout?: number;
  onRetry?: (error: FailedAttemptError, attempt: number) => void;
}

const NETWORK_PATTERNS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'ENOTFOUND',
  'EAI_AGAIN',
  'fetch failed',
  'network',
  'socket hang up',
  'timeout',
  'aborted',
];

export function isRetryableError(error: unknown): boolean {
  const statusCode = getErrorStatusCode(error);
  if (statusCode === 429) return true;
  if (statusCode !== undefined && statusCode >= 500 && statusCode < 600) return true;
  if (statusCode !== undefined && statusCode >= 400 && statusCode < 500) return false;

  if (error instanceof Error && (error.name === 'TimeoutError' || error.name === 'AbortError')) return true;

  const code = getErrorCode(error);
  const lowerMsg = getErrorMessage(error).toLowerCase();
  return NETWORK_PATTERNS.some(pattern =>
    code === pattern || lowerMsg.includes(pattern.toLowerCase())
  );
}

export async function withRetry<T>(
  fn: () => Promise<T>,
  options: RetryOptions = {}
): Promise<T> {
  const { retries = 3, context = 'API', minTimeout = 1000 } = options;

  const retryOptions: Options = {
    retries,
    minTimeout,
    maxTimeout: 30000,
    factor: 2,
    onFailedAttempt: (error) => {
      logger.warn(`[${context}] Retry attempt ${error.attemptNumber}/${retries + 1}`, {
        extra: {
          event: 'retry_attempt',
          context,
          attempt: error.attemptNumber,
          retriesLeft: error.retriesLeft,
          error: error.message
        }
      });

      if (options.onRetry) {
        options.onRetry(error, error.attemptNumber);
      }
    }
  };

  return pRetry(async () => {
    try {
      return await fn();
    } catch (error: unknown) {
      if (error instanceof AbortError) throw error;
      if (isRetryableError(error)) throw error;
      throw new AbortError(error instanceof Error ? error : getErrorMessage(error));
    }
  }, retryOptions);
}

export async function withWeatherRetry<T>(
  fn: () => Promise<T>,
  minTimeout?: number
): Promise<T> {
  return withRetry(fn, {
    retries: 1,
    context: 'Weather',
    minTimeout,
  });
}

export { AbortError };
