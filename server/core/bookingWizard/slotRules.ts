import {
  OPENING_TIME,
  CLOSING_TIME,
  SLOT_INTERVAL_MINUTES,
  BOOKING_HORIZON_DAYS,
  OPEN_DAYS,
} from '../../../shared/constants/availability';
import { validationError, type ValidationError } from '../errors';

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const TIME_PATTERN = /^(\d{2}):(\d{2})$/;

export function parseTimeToMinutes(time: string): number | null {
  const match = TIME_PATTERN.exec(time);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  if (hours > 23 || minutes > 59) return null;
  return hours * 60 + minutes;
}

interface DateParts {
  year: number;
  month: number;
  day: number;
}

export function parseDateParts(date: string): DateParts | null {
  const match = DATE_PATTERN.exec(date);
  if (!match) return null;
  const year = Number(match[1]);
  const month = Number(match[2]);
  const day = Number(match[3]);
  // Reject rollovers such as 2030-02-31
  const probe = new Date(Date.UTC(year, month - 1, day));
  if (probe.getUTCFullYear() !== year || probe.getUTCMonth() !== month - 1 || probe.getUTCDate() !== day) {
    return null;
  }
  return { year, month, day };
}

export function dayOfWeek(parts: DateParts): number {
  return new Date(Date.UTC(parts.year, parts.month - 1, parts.day)).getUTCDay();
}

/**
 * Combines a wall-clock date and time into an instant in the server's
 * timezone. Returns null when either part is malformed.
 */
export function toScheduledAt(date: string, time: string): Date | null {
  const parts = parseDateParts(date);
  const minutes = parseTimeToMinutes(time);
  if (!parts || minutes === null) return null;
  return new Date(parts.year, parts.month - 1, parts.day, Math.floor(minutes / 60), minutes % 60);
}

export interface SlotRequest {
  scheduledDate: string;
  scheduledTime: string;
  durationMinutes: number;
}

/**
 * Checks a requested slot against working hours and the booking horizon.
 * Occupancy is checked separately against storage.
 */
export function checkSlotRules(slot: SlotRequest, now: Date): { scheduledAt: Date } | ValidationError {
  const parts = parseDateParts(slot.scheduledDate);
  if (!parts) {
    return validationError('scheduledDate', 'Date must be a valid YYYY-MM-DD date');
  }
  const startMinutes = parseTimeToMinutes(slot.scheduledTime);
  if (startMinutes === null) {
    return validationError('scheduledTime', 'Time must be a valid HH:MM time');
  }

  const scheduledAt = toScheduledAt(slot.scheduledDate, slot.scheduledTime);
  if (!scheduledAt) {
    return validationError('scheduledDate', 'Date must be a valid YYYY-MM-DD date');
  }
  if (scheduledAt.getTime() <= now.getTime()) {
    return validationError('scheduledDate', 'Please choose a date and time in the future');
  }
  const horizon = now.getTime() + BOOKING_HORIZON_DAYS * 24 * 60 * 60 * 1000;
  if (scheduledAt.getTime() > horizon) {
    return validationError('scheduledDate', `Bookings can be made up to ${BOOKING_HORIZON_DAYS} days ahead`);
  }
  if (!OPEN_DAYS.includes(dayOfWeek(parts))) {
    return validationError('scheduledDate', 'Our crews are not available on that day');
  }

  const opening = parseTimeToMinutes(OPENING_TIME) ?? 0;
  const closing = parseTimeToMinutes(CLOSING_TIME) ?? 24 * 60;
  if (startMinutes % SLOT_INTERVAL_MINUTES !== 0) {
    return validationError('scheduledTime', `Start times are on ${SLOT_INTERVAL_MINUTES}-minute boundaries`);
  }
  if (startMinutes < opening || startMinutes + slot.durationMinutes > closing) {
    return validationError('scheduledTime', `This service must run between ${OPENING_TIME} and ${CLOSING_TIME}`);
  }

  return { scheduledAt };
}
