import { describe, it, expect } from 'vitest';
import {
  checkSlotRules,
  parseDateParts,
  parseTimeToMinutes,
  toScheduledAt,
} from '../../server/core/bookingWizard/slotRules';

const NOW = new Date(2030, 0, 2, 9, 0);

function slot(scheduledDate: string, scheduledTime: string, durationMinutes = 60) {
  return { scheduledDate, scheduledTime, durationMinutes };
}

describe('Slot rules - parsing', () => {
  it('converts HH:MM to minutes after midnight', () => {
    expect(parseTimeToMinutes('08:30')).toBe(510);
    expect(parseTimeToMinutes('00:00')).toBe(0);
    expect(parseTimeToMinutes('24:00')).toBeNull();
    expect(parseTimeToMinutes('9:00')).toBeNull();
  });

  it('rejects calendar dates that do not exist', () => {
    expect(parseDateParts('2030-01-07')).toEqual({ year: 2030, month: 1, day: 7 });
    expect(parseDateParts('2030-02-31')).toBeNull();
    expect(parseDateParts('2030-13-01')).toBeNull();
    expect(parseDateParts('07/01/2030')).toBeNull();
  });

  it('builds the instant in server-local time', () => {
    expect(toScheduledAt('2030-01-07', '14:30')?.getTime()).toBe(new Date(2030, 0, 7, 14, 30).getTime());
    expect(toScheduledAt('2030-01-07', '25:00')).toBeNull();
  });
});

describe('Slot rules - availability', () => {
  it('accepts an open weekday slot inside working hours', () => {
    expect(checkSlotRules(slot('2030-01-07', '09:00'), NOW)).toEqual({
      scheduledAt: new Date(2030, 0, 7, 9, 0),
    });
  });

  it('accepts Saturdays and a service ending exactly at closing', () => {
    expect('scheduledAt' in checkSlotRules(slot('2030-01-05', '16:00', 120), NOW)).toBe(true);
  });

  it('rejects Sundays', () => {
    expect(checkSlotRules(slot('2030-01-06', '09:00'), NOW)).toEqual({
      code: 'VALIDATION_ERROR',
      field: 'scheduledDate',
      message: 'Our crews are not available on that day',
    });
  });

  it('rejects slots that are not in the future', () => {
    expect(checkSlotRules(slot('2030-01-02', '09:00'), NOW)).toMatchObject({ field: 'scheduledDate' });
    expect(checkSlotRules(slot('2029-12-31', '10:00'), NOW)).toMatchObject({
      message: 'Please choose a date and time in the future',
    });
  });

  it('rejects dates beyond the booking horizon', () => {
    expect(checkSlotRules(slot('2030-04-01', '09:00'), NOW)).toHaveProperty('scheduledAt');
    expect(checkSlotRules(slot('2030-04-08', '09:00'), NOW)).toEqual({
      code: 'VALIDATION_ERROR',
      field: 'scheduledDate',
      message: 'Bookings can be made up to 90 days ahead',
    });
  });

  it('rejects start times off the 30-minute grid', () => {
    expect(checkSlotRules(slot('2030-01-07', '09:15'), NOW)).toEqual({
      code: 'VALIDATION_ERROR',
      field: 'scheduledTime',
      message: 'Start times are on 30-minute boundaries',
    });
  });

  it('rejects services that start early or run past closing', () => {
    const early = checkSlotRules(slot('2030-01-07', '07:30'), NOW);
    const late = checkSlotRules(slot('2030-01-07', '17:30', 60), NOW);
    const longService = checkSlotRules(slot('2030-01-07', '16:30', 120), NOW);

    for (const result of [early, late, longService]) {
      expect(result).toEqual({
        code: 'VALIDATION_ERROR',
        field: 'scheduledTime',
        message: 'This service must run between 08:00 and 18:00',
      });
    }
  });

  it('reports malformed input on the right field', () => {
    expect(checkSlotRules(slot('2030-1-7', '09:00'), NOW)).toMatchObject({ field: 'scheduledDate' });
    expect(checkSlotRules(slot('2030-01-07', '9am'), NOW)).toMatchObject({ field: 'scheduledTime' });
  });
});
