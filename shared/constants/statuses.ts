export const BOOKING_STATUSES = [
  'pending',
  'confirmed',
  'completed',
  'cancelled'
] as const;

export type BookingStatus = typeof BOOKING_STATUSES[number];

export const ACTIVE_BOOKING_STATUSES: BookingStatus[] = ['pending', 'confirmed'];
export const BILLABLE_BOOKING_STATUSES: BookingStatus[] = ['confirmed', 'completed'];

// cancelled and completed are terminal
export const BOOKING_TRANSITIONS: Record<BookingStatus, readonly BookingStatus[]> = {
  pending: ['confirmed', 'cancelled'],
  confirmed: ['completed', 'cancelled'],
  completed: [],
  cancelled: [],
};

export function canTransition(from: BookingStatus, to: BookingStatus): boolean {
  return BOOKING_TRANSITIONS[from].includes(to);
}

export const WIZARD_STEPS = [1, 2, 3, 4] as const;
export type WizardStep = typeof WIZARD_STEPS[number];

export const WIZARD_STEP_NAMES: Record<WizardStep, string> = {
  1: 'service',
  2: 'products',
  3: 'schedule',
  4: 'confirm',
};
