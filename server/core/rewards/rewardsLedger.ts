import { and, desc, eq, sql } from 'drizzle-orm';
import { db, type DbExecutor } from '../../db';
import { bookings, pointTransactions, users, type PointTransaction } from '../../../shared/schema';
import {
  REDEMPTION_OPTIONS,
  SERVICE_COMPLETED_SEEDS,
  WELCOME_BONUS_SEEDS,
  findRedemptionOption,
  type PointReason,
  type RedemptionOption,
} from '../../../shared/constants/rewards';
import { getCached, setCache, invalidateCache } from '../queryCache';
import { logger } from '../logger';
import { fail, ok, GENERIC_STORAGE_ERROR, type AwardError, type RedemptionError, type Result, type UserNotFoundError } from '../errors';

const BALANCE_CACHE_PREFIX = 'rewards:balance:';
const BALANCE_CACHE_TTL_MS = 60 * 1000;

/**
 * An open database transaction plus the users whose balance it touches.
 * Cached balances for those users are dropped once the transaction settles,
 * so a reader never caches a total that is about to change.
 */
export interface LedgerContext {
  tx: DbExecutor;
  touched: Set<number>;
}

export async function runLedgerTransaction<T>(work: (ctx: LedgerContext) => Promise<T>): Promise<T> {
  const touched = new Set<number>();
  try {
    return await db.transaction(async (tx) => work({ tx, touched }));
  } finally {
    for (const userId of touched) {
      invalidateBalance(userId);
    }
  }
}

// Bumped on every invalidation. A read that started under an older
// generation must not cache what it saw.
const balanceGenerations = new Map<number, number>();

function balanceGeneration(userId: number): number {
  return balanceGenerations.get(userId) ?? 0;
}

export function invalidateBalance(userId: number): void {
  balanceGenerations.set(userId, balanceGeneration(userId) + 1);
  invalidateCache(`${BALANCE_CACHE_PREFIX}${userId}`);
}

export interface AppendOptions {
  bookingId?: number | null;
  redemptionOptionId?: string | null;
  ctx?: LedgerContext;
}

/**
 * The single append primitive of the seeds ledger. Rows are never updated or
 * deleted. With `ctx` the entry joins the caller's transaction.
 */
export async function appendTransaction(
  userId: number,
  amount: number,
  reason: PointReason,
  options: AppendOptions = {}
): Promise<PointTransaction> {
  if (!Number.isInteger(amount) || amount === 0) {
    throw new Error(`Point transaction amount must be a non-zero integer, got ${amount}`);
  }

  const executor = options.ctx?.tx ?? db;
  const [entry] = await executor
    .insert(pointTransactions)
    .values({
      userId,
      amount,
      reason,
      bookingId: options.bookingId ?? null,
      redemptionOptionId: options.redemptionOptionId ?? null,
    })
    .returning();

  if (options.ctx) {
    options.ctx.touched.add(userId);
  } else {
    invalidateBalance(userId);
  }

  logger.info('[Rewards] Seeds transaction appended', {
    userId,
    bookingId: options.bookingId ?? undefined,
    extra: { amount, reason },
  });
  return entry;
}

export async function grantWelcomeBonus(userId: number, ctx: LedgerContext): Promise<PointTransaction> {
  return appendTransaction(userId, WELCOME_BONUS_SEEDS, 'welcome_bonus', { ctx });
}

/** Sum of every ledger entry for the user, read straight from storage. */
export async function computeBalance(userId: number, executor: DbExecutor = db): Promise<number> {
  const [row] = await executor
    .select({ total: sql<number>`coalesce(sum(${pointTransactions.amount}), 0)`.mapWith(Number) })
    .from(pointTransactions)
    .where(eq(pointTransactions.userId, userId));
  return row?.total ?? 0;
}

export async function balance(userId: number): Promise<number> {
  const key = `${BALANCE_CACHE_PREFIX}${userId}`;
  const cached = getCached<number>(key);
  if (cached !== null) return cached;

  const generation = balanceGeneration(userId);
  const total = await computeBalance(userId);
  if (balanceGeneration(userId) === generation) {
    setCache(key, total, BALANCE_CACHE_TTL_MS);
  }
  return total;
}

export function redemptionsWithin(points: number): RedemptionOption[] {
  return REDEMPTION_OPTIONS.filter(option => option.cost <= points);
}

export async function eligibleRedemptions(userId: number): Promise<RedemptionOption[]> {
  return redemptionsWithin(await balance(userId));
}

async function lockUser(userId: number, tx: DbExecutor): Promise<boolean> {
  const [row] = await tx
    .select({ id: users.id })
    .from(users)
    .where(eq(users.id, userId))
    .for('update');
  return row !== undefined;
}

export async function redeem(
  userId: number,
  optionId: string
): Promise<Result<PointTransaction, RedemptionError | UserNotFoundError>> {
  const option = findRedemptionOption(optionId);
  if (!option) {
    return fail({ code: 'UNKNOWN_OPTION', message: 'That reward is not available' });
  }

  try {
    return await runLedgerTransaction(async (ctx) => {
      // The row lock serializes concurrent redemptions for one user
      if (!(await lockUser(userId, ctx.tx))) {
        return fail<UserNotFoundError>({ code: 'USER_NOT_FOUND', message: 'Account not found' });
      }

      const current = await computeBalance(userId, ctx.tx);
      if (current < option.cost) {
        return fail<RedemptionError>({
          code: 'INSUFFICIENT_POINTS',
          message: `You need ${option.cost} seeds for ${option.name} but have ${current}`,
          balance: current,
          cost: option.cost,
        });
      }

      const entry = await appendTransaction(userId, -option.cost, 'redemption', {
        redemptionOptionId: option.id,
        ctx,
      });
      return ok(entry);
    });
  } catch (error: unknown) {
    logger.error('[Rewards] Redemption failed', { userId, error, extra: { optionId } });
    return fail(GENERIC_STORAGE_ERROR);
  }
}

export async function hasBookingEntry(bookingId: number, reason: PointReason, tx: DbExecutor): Promise<boolean> {
  const [existing] = await tx
    .select({ id: pointTransactions.id })
    .from(pointTransactions)
    .where(and(eq(pointTransactions.bookingId, bookingId), eq(pointTransactions.reason, reason)))
    .limit(1);
  return existing !== undefined;
}

/**
 * Awards the completion bonus inside an open transaction. The caller must
 * already hold the booking row lock.
 */
export async function awardCompletionWithin(
  booking: { id: number; userId: number; status: string },
  ctx: LedgerContext
): Promise<Result<PointTransaction, AwardError>> {
  if (booking.status !== 'completed') {
    return fail({ code: 'NOT_COMPLETED', message: 'Seeds are awarded once the service is completed' });
  }
  if (await hasBookingEntry(booking.id, 'service_completed', ctx.tx)) {
    return fail({ code: 'ALREADY_AWARDED', message: 'Completion seeds were already awarded for this booking' });
  }
  const entry = await appendTransaction(booking.userId, SERVICE_COMPLETED_SEEDS, 'service_completed', {
    bookingId: booking.id,
    ctx,
  });
  return ok(entry);
}

export async function lockBooking(bookingId: number, tx: DbExecutor) {
  const [booking] = await tx
    .select()
    .from(bookings)
    .where(eq(bookings.id, bookingId))
    .for('update');
  return booking ?? null;
}

export async function awardCompletion(bookingId: number): Promise<Result<PointTransaction, AwardError>> {
  try {
    return await runLedgerTransaction(async (ctx) => {
      const booking = await lockBooking(bookingId, ctx.tx);
      if (!booking) {
        return fail<AwardError>({ code: 'BOOKING_NOT_FOUND', message: 'Booking not found' });
      }
      return awardCompletionWithin(booking, ctx);
    });
  } catch (error: unknown) {
    logger.error('[Rewards] Completion award failed', { bookingId, error });
    return fail(GENERIC_STORAGE_ERROR);
  }
}

export async function history(userId: number, limit: number = 100): Promise<PointTransaction[]> {
  return db
    .select()
    .from(pointTransactions)
    .where(eq(pointTransactions.userId, userId))
    .orderBy(desc(pointTransactions.createdAt), desc(pointTransactions.id))
    .limit(limit);
}

export interface RewardsSummary {
  balance: number;
  totalsByReason: Record<PointReason, number>;
  confirmedBookings: number;
  completedServices: number;
  welcomeBonus: number;
  eligible: RedemptionOption[];
  nextReward: { option: RedemptionOption; seedsNeeded: number } | null;
}

export async function summary(userId: number): Promise<RewardsSummary> {
  const rows = await db
    .select({
      reason: pointTransactions.reason,
      total: sql<number>`sum(${pointTransactions.amount})`.mapWith(Number),
      count: sql<number>`count(*)`.mapWith(Number),
    })
    .from(pointTransactions)
    .where(eq(pointTransactions.userId, userId))
    .groupBy(pointTransactions.reason);

  const totalsByReason: Record<PointReason, number> = {
    welcome_bonus: 0,
    booking_confirmed: 0,
    service_completed: 0,
    redemption: 0,
    booking_cancelled: 0,
  };
  const counts: Record<PointReason, number> = { ...totalsByReason };
  for (const row of rows) {
    totalsByReason[row.reason] = row.total;
    counts[row.reason] = row.count;
  }

  const current = Object.values(totalsByReason).reduce((sum, value) => sum + value, 0);
  const next = REDEMPTION_OPTIONS
    .filter(option => option.cost > current)
    .sort((a, b) => a.cost - b.cost)[0];

  return {
    balance: current,
    totalsByReason,
    confirmedBookings: counts.booking_confirmed - counts.booking_cancelled,
    completedServices: counts.service_completed,
    welcomeBonus: totalsByReason.welcome_bonus,
    eligible: redemptionsWithin(current),
    nextReward: next ? { option: next, seedsNeeded: next.cost - current } : null,
  };
}
