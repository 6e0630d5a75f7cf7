// Crew working hours. Times are wall-clock HH:MM in the business timezone.
export const OPENING_TIME = '08:00';
export const CLOSING_TIME = '18:00';
export const SLOT_INTERVAL_MINUTES = 30;
export const BOOKING_HORIZON_DAYS = 90;

// 0 = Sunday
export const OPEN_DAYS: readonly number[] = [1, 2, 3, 4, 5, 6];
