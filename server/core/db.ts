import { Pool, QueryResult } from 'pg';
import { getErrorMessage, getErrorCode, getErrorDetail } from '../utils/errorUtils';
import { config } from './config';
import { logger } from './logger';

export const isProduction = config.isProduction;

const sslConfig = { rejectUnauthorized: false };

export const pool = new Pool({
  connectionString: config.databaseUrl,
  connectionTimeoutMillis: 10000,
  idleTimeoutMillis: 30000,
  max: config.dbPoolMax,
  ssl: isProduction ? sslConfig : undefined,
});

pool.on('error', (err) => {
  logger.error('[Database] Pool error:', { extra: { detail: err.message } });
});

const RETRYABLE_ERRORS = [
  'ECONNRESET',
  'ECONNREFUSED',
  'ETIMEDOUT',
  'EPIPE',
  'connection terminated unexpectedly',
  'Connection terminated unexpectedly',
  'timeout expired',
  'sorry, too many clients already',
];

function isRetryableError(error: unknown): boolean {
  if (!error) return false;
  const message = getErrorMessage(error);
  const code = getErrorCode(error);
  return RETRYABLE_ERRORS.some(e => message.includes(e) || code === e);
}

export function isConstraintError(error: unknown): { type: 'unique' | 'foreign_key' | null, detail?: string } {
  const code = getErrorCode(error);
  const detail = getErrorDetail(error);
  if (code === '23505') return { type: 'unique', detail };
  if (code === '23503') return { type: 'foreign_key', detail };
  return { type: null };
}

export async function queryWithRetry<T extends Record<string, unknown> = Record<string, unknown>>(
  queryText: string,
  params?: unknown[],
  maxRetries: number = 3
): Promise<QueryResult<T>> {
  let lastError: unknown = null;

  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await pool.query<T>(queryText, params);
    } catch (error: unknown) {
      lastError = error;

      if (!isRetryableError(error) || attempt === maxRetries) {
        throw error;
      }

      const delay = Math.min(100 * Math.pow(2, attempt - 1), 2000);
      if (!isProduction) {
        logger.info(`[Database] Retrying query (attempt ${attempt}/${maxRetries}) after ${delay}ms...`);
      }
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }

  throw lastError;
}

export function getPoolStatus() {
  return {
    total: pool.totalCount,
    idle: pool.idleCount,
    waiting: pool.waitingCount
  };
}
