import { and, asc, desc, eq, gt, inArray } from 'drizzle-orm';
import { db } from '../db';
import { bookings, bookingProducts, services, users, type Booking, type BookingProduct } from '../../shared/schema';
import {
  ACTIVE_BOOKING_STATUSES,
  BILLABLE_BOOKING_STATUSES,
  type BookingStatus,
} from '../../shared/constants/statuses';

export interface BookingView extends Booking {
  serviceName: string;
  serviceCategory: string;
  products: BookingProduct[];
}

export interface DashboardStats {
  totalBookings: number;
  pendingBookings: number;
  confirmedBookings: number;
  completedBookings: number;
  cancelledBookings: number;
  totalSpentCents: number;
  memberSince: Date | null;
  nextBooking: {
    bookingId: number;
    serviceName: string;
    scheduledAt: Date;
    status: BookingStatus;
  } | null;
}

async function attachProducts(rows: Array<{ booking: Booking; serviceName: string; serviceCategory: string }>): Promise<BookingView[]> {
  const ids = rows.map(row => row.booking.id);
  const lines = ids.length > 0
    ? await db.select().from(bookingProducts).where(inArray(bookingProducts.bookingId, ids)).orderBy(asc(bookingProducts.id))
    : [];

  const byBooking = new Map<number, BookingProduct[]>();
  for (const line of lines) {
    const list = byBooking.get(line.bookingId) ?? [];
    list.push(line);
    byBooking.set(line.bookingId, list);
  }

  return rows.map(row => ({
    ...row.booking,
    serviceName: row.serviceName,
    serviceCategory: row.serviceCategory,
    products: byBooking.get(row.booking.id) ?? [],
  }));
}

function bookingsWithService() {
  return db
    .select({ booking: bookings, serviceName: services.name, serviceCategory: services.category })
    .from(bookings)
    .innerJoin(services, eq(bookings.serviceId, services.id));
}

export async function listBookings(userId: number): Promise<BookingView[]> {
  const rows = await bookingsWithService()
    .where(eq(bookings.userId, userId))
    .orderBy(desc(bookings.createdAt), desc(bookings.id));
  return attachProducts(rows);
}

export async function getBooking(userId: number, bookingId: number): Promise<BookingView | null> {
  const rows = await bookingsWithService()
    .where(and(eq(bookings.id, bookingId), eq(bookings.userId, userId)))
    .limit(1);
  const [view] = await attachProducts(rows);
  return view ?? null;
}

/** Completed bookings, most recently serviced first. */
export async function listReceipts(userId: number): Promise<BookingView[]> {
  const rows = await bookingsWithService()
    .where(and(eq(bookings.userId, userId), eq(bookings.status, 'completed')))
    .orderBy(desc(bookings.scheduledAt), desc(bookings.id));
  return attachProducts(rows);
}

export async function dashboardStats(userId: number, now: Date = new Date()): Promise<DashboardStats> {
  const [owner] = await db
    .select({ createdAt: users.createdAt })
    .from(users)
    .where(eq(users.id, userId))
    .limit(1);

  const rows = await db
    .select({ status: bookings.status, totalPriceCents: bookings.totalPriceCents })
    .from(bookings)
    .where(eq(bookings.userId, userId));

  const countOf = (status: BookingStatus) => rows.filter(row => row.status === status).length;
  const totalSpentCents = rows
    .filter(row => BILLABLE_BOOKING_STATUSES.includes(row.status))
    .reduce((sum, row) => sum + row.totalPriceCents, 0);

  const [next] = await db
    .select({
      bookingId: bookings.id,
      serviceName: services.name,
      scheduledAt: bookings.scheduledAt,
      status: bookings.status,
    })
    .from(bookings)
    .innerJoin(services, eq(bookings.serviceId, services.id))
    .where(and(
      eq(bookings.userId, userId),
      inArray(bookings.status, ACTIVE_BOOKING_STATUSES),
      gt(bookings.scheduledAt, now)
    ))
    .orderBy(asc(bookings.scheduledAt))
    .limit(1);

  return {
    totalBookings: rows.length,
    pendingBookings: countOf('pending'),
    confirmedBookings: countOf('confirmed'),
    completedBookings: countOf('completed'),
    cancelledBookings: countOf('cancelled'),
    totalSpentCents,
    memberSince: owner?.createdAt ?? null,
    nextBooking: next ?? null,
  };
}
