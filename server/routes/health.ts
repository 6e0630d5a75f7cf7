import { Router, type Request, type Response } from 'express';
import { sql } from 'drizzle-orm';
import { db } from '../db';
import { logger } from '../core/logger';
import { getPoolStatus } from '../core/db';
import { bookingWizard } from '../core/bookingWizard';
import { getStartupHealth } from '../loaders/startup';
import { cacheSize } from '../core/queryCache';
import { safeErrorDetail } from '../utils/errorUtils';

const router = Router();

router.get('/api/health', async (req: Request, res: Response) => {
  const startedAt = Date.now();
  try {
    await db.execute(sql`select 1`);
    res.json({
      status: 'ok',
      database: { connected: true, latencyMs: Date.now() - startedAt },
      pool: getPoolStatus(),
      activeWizards: bookingWizard.activeCount(),
      cacheEntries: cacheSize(),
      startup: getStartupHealth(),
      timestamp: new Date().toISOString(),
    });
  } catch (error: unknown) {
    logger.error('[Health] Database check failed', { error });
    res.status(503).json({
      status: 'degraded',
      database: { connected: false, error: safeErrorDetail(error) },
      timestamp: new Date().toISOString(),
    });
  }
});

export default router;
