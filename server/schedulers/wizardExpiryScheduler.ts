import { schedulerTracker } from '../core/schedulerTracker';
import { bookingWizard } from '../core/bookingWizard';
import { logger } from '../core/logger';
import { getErrorMessage } from '../utils/errorUtils';

export const WIZARD_EXPIRY_TASK = 'Wizard Expiry';
export const WIZARD_EXPIRY_INTERVAL_MS = 60 * 1000;

export function runWizardExpirySweep(): number {
  const started = Date.now();
  try {
    const evicted = bookingWizard.sweepExpired();
    if (evicted > 0) {
      logger.info(`[Wizard Expiry] Evicted ${evicted} expired booking wizard(s)`, { extra: { evicted } });
    }
    schedulerTracker.recordRun(WIZARD_EXPIRY_TASK, true, undefined, Date.now() - started);
    return evicted;
  } catch (err: unknown) {
    logger.error('[Wizard Expiry] Scheduler error:', { error: err });
    schedulerTracker.recordRun(WIZARD_EXPIRY_TASK, false, getErrorMessage(err), Date.now() - started);
    return 0;
  }
}

export function startWizardExpiryScheduler(): NodeJS.Timeout {
  const id = setInterval(runWizardExpirySweep, WIZARD_EXPIRY_INTERVAL_MS);
  logger.info('[Startup] Wizard expiry scheduler enabled (runs every minute)');
  return id;
}
