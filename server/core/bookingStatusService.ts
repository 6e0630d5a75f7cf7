import { eq } from 'drizzle-orm';
import { bookings, type Booking, type PointTransaction } from '../../shared/schema';
import { BOOKING_CONFIRMED_SEEDS } from '../../shared/constants/rewards';
import { canTransition, type BookingStatus } from '../../shared/constants/statuses';
import { logger } from './logger';
import { fail, ok, GENERIC_STORAGE_ERROR, type Result, type TransitionError } from './errors';
import {
  appendTransaction,
  awardCompletionWithin,
  hasBookingEntry,
  lockBooking,
  runLedgerTransaction,
  type LedgerContext,
} from './rewards/rewardsLedger';

export interface TransitionOutcome {
  booking: Booking;
  pointTransaction: PointTransaction | null;
}

// Cancelling gives back the booking_confirmed seeds, once
async function offsetConfirmation(booking: Booking, ctx: LedgerContext): Promise<PointTransaction | null> {
  const earned = await hasBookingEntry(booking.id, 'booking_confirmed', ctx.tx);
  if (!earned) return null;
  if (await hasBookingEntry(booking.id, 'booking_cancelled', ctx.tx)) return null;
  return appendTransaction(booking.userId, -BOOKING_CONFIRMED_SEEDS, 'booking_cancelled', {
    bookingId: booking.id,
    ctx,
  });
}

/**
 * Moves a booking along pending -> confirmed -> completed, or to cancelled.
 * Seeds side effects of the new status are written in the same transaction.
 */
export async function transitionBooking(
  bookingId: number,
  to: BookingStatus
): Promise<Result<TransitionOutcome, TransitionError>> {
  try {
    return await runLedgerTransaction(async (ctx) => {
      const current = await lockBooking(bookingId, ctx.tx);
      if (!current) {
        return fail<TransitionError>({ code: 'BOOKING_NOT_FOUND', message: 'Booking not found' });
      }
      if (!canTransition(current.status, to)) {
        return fail<TransitionError>({
          code: 'INVALID_TRANSITION',
          message: `A ${current.status} booking cannot be marked ${to}`,
        });
      }

      const [booking] = await ctx.tx
        .update(bookings)
        .set({ status: to, updatedAt: new Date() })
        .where(eq(bookings.id, bookingId))
        .returning();

      let pointTransaction: PointTransaction | null = null;
      if (to === 'completed') {
        const award = await awardCompletionWithin(booking, ctx);
        // A missing award only means it was already granted
        pointTransaction = award.success ? award.data : null;
      } else if (to === 'cancelled') {
        pointTransaction = await offsetConfirmation(booking, ctx);
      }

      logger.info('[Booking Status] Booking status changed', {
        userId: booking.userId,
        bookingId,
        extra: { from: current.status, to, seeds: pointTransaction?.amount ?? 0 },
      });
      return ok({ booking, pointTransaction });
    });
  } catch (error: unknown) {
    logger.error('[Booking Status] Failed to change booking status', { bookingId, error, extra: { to } });
    return fail(GENERIC_STORAGE_ERROR);
  }
}
