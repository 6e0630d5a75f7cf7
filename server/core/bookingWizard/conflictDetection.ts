import { and, eq, ne, sql } from 'drizzle-orm';
import { db, type DbExecutor } from '../../db';
import { bookings } from '../../../shared/schema';

export interface SlotConflict {
  bookingId: number;
  scheduledAt: Date;
  durationMinutes: number;
}

/**
 * Finds a non-cancelled booking of the same service whose window overlaps
 * [scheduledAt, scheduledAt + durationMinutes).
 */
export async function findSlotConflict(
  serviceId: number,
  scheduledAt: Date,
  durationMinutes: number,
  executor: DbExecutor = db
): Promise<SlotConflict | null> {
  const start = scheduledAt.toISOString();
  const end = new Date(scheduledAt.getTime() + durationMinutes * 60 * 1000).toISOString();

  const [conflict] = await executor
    .select({
      bookingId: bookings.id,
      scheduledAt: bookings.scheduledAt,
      durationMinutes: bookings.durationMinutes,
    })
    .from(bookings)
    .where(and(
      eq(bookings.serviceId, serviceId),
      ne(bookings.status, 'cancelled'),
      sql`${bookings.scheduledAt} < ${end}::timestamptz`,
      sql`${bookings.scheduledAt} + make_interval(mins => ${bookings.durationMinutes}) > ${start}::timestamptz`
    ))
    .limit(1);

  return conflict ?? null;
}

// Transaction-scoped lock serializing slot checks for one service on one day
export async function lockServiceDay(serviceId: number, scheduledDate: string, executor: DbExecutor): Promise<void> {
  const key = `booking-slot:${serviceId}:${scheduledDate}`;
  await executor.execute(sql`SELECT pg_advisory_xact_lock(hashtext(${key}))`);
}
