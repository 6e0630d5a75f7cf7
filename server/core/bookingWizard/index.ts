import { BookingWizard } from './bookingWizard';
import { WizardStore } from './wizardStore';

export const bookingWizard = new BookingWizard(new WizardStore());

export { BookingWizard } from './bookingWizard';
export { WizardStore } from './wizardStore';
export { finalize } from './finalizer';
export type { FinalizedBooking } from './finalizer';
export type { WizardHandle, WizardState, WizardSelections, WizardTotals } from './types';
