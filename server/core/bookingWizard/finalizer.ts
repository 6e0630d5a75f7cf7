import { bookings, bookingProducts, type Booking, type BookingProduct, type PointTransaction } from '../../../shared/schema';
import { BOOKING_CONFIRMED_SEEDS } from '../../../shared/constants/rewards';
import { getActiveService, getActiveProductsByIds } from '../catalogService';
import { isConstraintError } from '../db';
import { logger } from '../logger';
import { appendTransaction, runLedgerTransaction } from '../rewards/rewardsLedger';
import {
  fail,
  ok,
  validationError,
  GENERIC_STORAGE_ERROR,
  type FinalizeError,
  type Result,
  type SlotConflictError,
  type ValidationError,
} from '../errors';
import { findSlotConflict, lockServiceDay } from './conflictDetection';
import { toScheduledAt } from './slotRules';
import type { WizardState } from './types';

export interface FinalizedBooking {
  booking: Booking;
  products: BookingProduct[];
  pointTransaction: PointTransaction;
}

const SLOT_TAKEN_MESSAGE = 'Someone just booked that time slot. Please pick another time.';

/**
 * Writes a fully validated wizard as a pending booking, its add-on lines and
 * the booking_confirmed seeds entry. All rows commit together or not at all.
 */
export async function finalize(
  state: WizardState
): Promise<Result<FinalizedBooking, FinalizeError | ValidationError>> {
  const { service, products = [], schedule } = state.selections;
  if (!service || !schedule) {
    return fail(validationError('step', 'Booking details are incomplete'));
  }
  const scheduledAt = toScheduledAt(schedule.scheduledDate, schedule.scheduledTime);
  if (!scheduledAt) {
    return fail(validationError('scheduledDate', 'Date must be a valid YYYY-MM-DD date'));
  }

  try {
    return await runLedgerTransaction(async (ctx) => {
      const { tx } = ctx;
      await lockServiceDay(service.serviceId, schedule.scheduledDate, tx);

      // Price and duration are snapshotted from the catalog as it is right now
      const current = await getActiveService(service.serviceId, tx);
      if (!current) {
        return fail(validationError('serviceId', 'Selected service is no longer available'));
      }

      const conflict = await findSlotConflict(current.id, scheduledAt, current.durationMinutes, tx);
      if (conflict) {
        return fail<SlotConflictError>({
          code: 'SLOT_CONFLICT',
          message: SLOT_TAKEN_MESSAGE,
          conflictingBookingId: conflict.bookingId,
        });
      }

      const catalog = await getActiveProductsByIds(products.map(p => p.productId), tx);
      const lines: Array<Omit<typeof bookingProducts.$inferInsert, 'bookingId'>> = [];
      for (const item of products) {
        const product = catalog.get(item.productId);
        if (!product) {
          return fail(validationError('products', `${item.name} is no longer available`));
        }
        lines.push({
          productId: product.id,
          productName: product.name,
          unitPriceCents: product.priceCents,
          quantity: item.quantity,
        });
      }
      const productsTotalCents = lines.reduce((sum, line) => sum + line.unitPriceCents * (line.quantity ?? 1), 0);

      const [booking] = await tx
        .insert(bookings)
        .values({
          userId: state.userId,
          serviceId: current.id,
          scheduledAt,
          durationMinutes: current.durationMinutes,
          status: 'pending',
          servicePriceCents: current.priceCents,
          productsTotalCents,
          totalPriceCents: current.priceCents + productsTotalCents,
          specialInstructions: schedule.specialInstructions,
        })
        .returning();

      const insertedLines = lines.length > 0
        ? await tx
            .insert(bookingProducts)
            .values(lines.map(line => ({ ...line, bookingId: booking.id })))
            .returning()
        : [];

      const pointTransaction = await appendTransaction(state.userId, BOOKING_CONFIRMED_SEEDS, 'booking_confirmed', {
        bookingId: booking.id,
        ctx,
      });

      logger.info('[Booking Finalizer] Booking created', {
        userId: state.userId,
        bookingId: booking.id,
        wizardHandle: state.handle,
        extra: { serviceId: current.id, scheduledAt: scheduledAt.toISOString(), totalPriceCents: booking.totalPriceCents },
      });

      return ok({ booking, products: insertedLines, pointTransaction });
    });
  } catch (error: unknown) {
    const constraint = isConstraintError(error);
    if (constraint.type === 'unique') {
      logger.warn('[Booking Finalizer] Slot taken at insert', {
        userId: state.userId,
        wizardHandle: state.handle,
        extra: { detail: constraint.detail },
      });
      return fail<SlotConflictError>({ code: 'SLOT_CONFLICT', message: SLOT_TAKEN_MESSAGE });
    }
    logger.error('[Booking Finalizer] Failed to write booking', {
      userId: state.userId,
      wizardHandle: state.handle,
      error,
    });
    return fail(GENERIC_STORAGE_ERROR);
  }
}
