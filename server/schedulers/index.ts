import { startWizardExpiryScheduler, WIZARD_EXPIRY_INTERVAL_MS, WIZARD_EXPIRY_TASK } from './wizardExpiryScheduler';
import { schedulerTracker } from '../core/schedulerTracker';

const intervalIds: NodeJS.Timeout[] = [];

export function initSchedulers(): void {
  schedulerTracker.registerScheduler(WIZARD_EXPIRY_TASK, WIZARD_EXPIRY_INTERVAL_MS);

  intervalIds.push(startWizardExpiryScheduler());
}

export function stopSchedulers(): void {
  for (const id of intervalIds) {
    clearInterval(id);
  }
  intervalIds.length = 0;
}
