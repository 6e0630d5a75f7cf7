import { ensureSchema, seedCatalog, seedDemoUser } from '../db-init';
import { config } from '../core/config';
import { getErrorMessage } from '../utils/errorUtils';
import { logger } from '../core/logger';

async function retryWithBackoff<T>(fn: () => Promise<T>, label: string, maxRetries = 3): Promise<T> {
  for (let attempt = 1; attempt <= maxRetries; attempt++) {
    try {
      return await fn();
    } catch (err: unknown) {
      if (attempt === maxRetries) throw err;
      const delay = Math.pow(2, attempt) * 1000;
      logger.info(`[Startup] ${label} failed (attempt ${attempt}/${maxRetries}), retrying in ${delay/1000}s...`);
      await new Promise(resolve => setTimeout(resolve, delay));
    }
  }
  throw new Error('unreachable');
}

export interface StartupHealth {
  database: 'ok' | 'failed' | 'pending';
  catalog: 'ok' | 'failed' | 'pending';
  criticalFailures: string[];
  warnings: string[];
  startedAt: string;
  completedAt?: string;
}

const startupHealth: StartupHealth = {
  database: 'pending',
  catalog: 'pending',
  criticalFailures: [],
  warnings: [],
  startedAt: new Date().toISOString()
};

export function getStartupHealth(): StartupHealth {
  return { ...startupHealth };
}

export async function runStartupTasks(): Promise<void> {
  logger.info('[Startup] Running database initialization...');

  try {
    await retryWithBackoff(ensureSchema, 'Schema setup');
    startupHealth.database = 'ok';
  } catch (err: unknown) {
    logger.error('[Startup] Schema setup failed', { error: err });
    startupHealth.database = 'failed';
    startupHealth.criticalFailures.push(`Schema setup: ${getErrorMessage(err)}`);
  }

  if (startupHealth.database === 'ok') {
    try {
      await seedCatalog();
      startupHealth.catalog = 'ok';
    } catch (err: unknown) {
      logger.error('[Startup] Catalog seed failed', { error: err });
      startupHealth.catalog = 'failed';
      startupHealth.criticalFailures.push(`Catalog seed: ${getErrorMessage(err)}`);
    }

    if (!config.isProduction) {
      try {
        await seedDemoUser();
      } catch (err: unknown) {
        logger.warn(`[Startup] Demo user seed failed (non-critical): ${getErrorMessage(err)}`);
        startupHealth.warnings.push(`Demo user: ${getErrorMessage(err)}`);
      }
    }
  }

  startupHealth.completedAt = new Date().toISOString();

  if (startupHealth.criticalFailures.length > 0) {
    logger.error('[Startup] CRITICAL FAILURES', { extra: { failures: startupHealth.criticalFailures } });
  } else {
    logger.info('[Startup] Initialization complete', { extra: { warnings: startupHealth.warnings.length } });
  }
}
