import { describe, it, expect, beforeEach, vi } from 'vitest';

vi.mock('../../server/db', async () => {
  const { createTestDb } = await import('../helpers/testDb');
  return createTestDb();
});

vi.mock('../../server/core/logger', async (importOriginal) => ({
  ...(await importOriginal<typeof import('../../server/core/logger')>()),
  logger: {
    info: vi.fn(),
    error: vi.fn(),
    warn: vi.fn()
  }
}));

import { eq } from 'drizzle-orm';
import { db } from '../../server/db';
import { bookings, pointTransactions } from '../../shared/schema';
import {
  appendTransaction,
  awardCompletion,
  balance,
  computeBalance,
  eligibleRedemptions,
  history,
  redeem,
  summary,
} from '../../server/core/rewards/rewardsLedger';
import { clearAllCaches } from '../../server/core/queryCache';
import { insertTestUser, resetDatabase, seedTestCatalog } from '../helpers/testDb';

let userId: number;

async function insertBooking(status: 'pending' | 'confirmed' | 'completed', hour = 9) {
  const [booking] = await db
    .insert(bookings)
    .values({
      userId,
      serviceId: 1,
      scheduledAt: new Date(2030, 0, 7, hour, 0),
      durationMinutes: 60,
      status,
      servicePriceCents: 5000,
      productsTotalCents: 0,
      totalPriceCents: 5000,
    })
    .returning();
  return booking;
}

async function entriesFor(id: number) {
  return db.select().from(pointTransactions).where(eq(pointTransactions.userId, id));
}

describe('Rewards Ledger', () => {
  beforeEach(async () => {
    await resetDatabase(db);
    clearAllCaches();
    await seedTestCatalog(db);
    userId = (await insertTestUser(db, 'carol')).id;
  });

  describe('balance', () => {
    it('is zero with no entries', async () => {
      expect(await balance(userId)).toBe(0);
    });

    it('equals the sum of every entry after mixed appends', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');
      await appendTransaction(userId, 25, 'booking_confirmed');
      await appendTransaction(userId, -100, 'redemption', { redemptionOptionId: 'discount_10' });
      await appendTransaction(userId, 100, 'service_completed');
      await appendTransaction(userId, -25, 'booking_cancelled');

      const rows = await entriesFor(userId);
      const sum = rows.reduce((total, row) => total + row.amount, 0);
      expect(sum).toBe(500);
      expect(await balance(userId)).toBe(sum);
      expect(await computeBalance(userId)).toBe(sum);
    });

    it('drops the cached total when an entry is appended', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');
      expect(await balance(userId)).toBe(500);

      await appendTransaction(userId, 25, 'booking_confirmed');

      expect(await balance(userId)).toBe(525);
    });

    it('does not cache a total read while a redemption commits', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');

      let release = () => {};
      const gate = new Promise<void>(resolve => {
        release = () => resolve();
      });
      let readDone: Promise<number> = Promise.resolve(-1);
      // Runs the real sum now, hands it back only once the gate opens
      const heldSelect = () => {
        readDone = computeBalance(userId);
        const held = readDone.then(async (total) => {
          await gate;
          return [{ total }];
        });
        return { from: () => ({ where: () => held }) };
      };
      const selectSpy = vi.spyOn(db, 'select').mockImplementationOnce(heldSelect as unknown as typeof db.select);

      const inFlight = balance(userId);
      expect(await readDone).toBe(500);

      const redeemed = await redeem(userId, 'discount_10');
      expect(redeemed.success).toBe(true);
      release();

      expect(await inFlight).toBe(500);
      selectSpy.mockRestore();
      expect(await balance(userId)).toBe(400);
      expect(await computeBalance(userId)).toBe(400);
    });

    it('keeps users apart', async () => {
      const other = await insertTestUser(db, 'dave');
      await appendTransaction(userId, 500, 'welcome_bonus');
      await appendTransaction(other.id, 25, 'booking_confirmed');

      expect(await balance(userId)).toBe(500);
      expect(await balance(other.id)).toBe(25);
    });
  });

  describe('appendTransaction', () => {
    it('rejects zero and fractional amounts', async () => {
      await expect(appendTransaction(userId, 0, 'welcome_bonus')).rejects.toThrow('non-zero integer');
      await expect(appendTransaction(userId, 2.5, 'welcome_bonus')).rejects.toThrow('non-zero integer');
      expect(await entriesFor(userId)).toHaveLength(0);
    });
  });

  describe('eligibleRedemptions', () => {
    it('lists the options the balance covers', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');

      const eligible = await eligibleRedemptions(userId);

      expect(eligible.map(option => option.id)).toEqual(['discount_10', 'discount_25', 'free_fertilizer']);
    });
  });

  describe('redeem', () => {
    it('debits the option cost', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');

      const result = await redeem(userId, 'discount_10');

      expect(result.success).toBe(true);
      if (result.success) {
        expect(result.data).toMatchObject({ userId, amount: -100, reason: 'redemption', redemptionOptionId: 'discount_10' });
      }
      expect(await balance(userId)).toBe(400);
    });

    it('refuses when the balance is short and leaves it unchanged', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');

      const result = await redeem(userId, 'gold_member');

      expect(result).toEqual({
        success: false,
        error: {
          code: 'INSUFFICIENT_POINTS',
          message: 'You need 1000 seeds for Gold Member Status but have 500',
          balance: 500,
          cost: 1000,
        },
      });
      expect(await balance(userId)).toBe(500);
      expect(await entriesFor(userId)).toHaveLength(1);
    });

    it('refuses unknown options and unknown users', async () => {
      const unknownOption = await redeem(userId, 'free_mower');
      expect(unknownOption.success).toBe(false);
      if (!unknownOption.success) expect(unknownOption.error.code).toBe('UNKNOWN_OPTION');

      const unknownUser = await redeem(9999, 'discount_10');
      expect(unknownUser.success).toBe(false);
      if (!unknownUser.success) expect(unknownUser.error.code).toBe('USER_NOT_FOUND');
    });

    it('never overdraws under concurrent redemptions', async () => {
      await appendTransaction(userId, 300, 'welcome_bonus');

      const results = await Promise.all([redeem(userId, 'discount_25'), redeem(userId, 'discount_25')]);

      expect(results.filter(r => r.success)).toHaveLength(1);
      const refused = results.find(r => !r.success);
      expect(refused && !refused.success ? refused.error.code : null).toBe('INSUFFICIENT_POINTS');
      expect(await balance(userId)).toBe(50);
    });
  });

  describe('awardCompletion', () => {
    it('awards 100 seeds once per completed booking', async () => {
      const booking = await insertBooking('completed');

      const first = await awardCompletion(booking.id);
      const second = await awardCompletion(booking.id);

      expect(first.success).toBe(true);
      if (first.success) {
        expect(first.data).toMatchObject({ amount: 100, reason: 'service_completed', bookingId: booking.id });
      }
      expect(second.success).toBe(false);
      if (!second.success) expect(second.error.code).toBe('ALREADY_AWARDED');

      const awards = (await entriesFor(userId)).filter(row => row.reason === 'service_completed');
      expect(awards).toHaveLength(1);
      expect(await balance(userId)).toBe(100);
    });

    it('refuses bookings that are not completed or do not exist', async () => {
      const pending = await insertBooking('pending');

      const notCompleted = await awardCompletion(pending.id);
      const missing = await awardCompletion(4242);

      expect(notCompleted.success).toBe(false);
      if (!notCompleted.success) expect(notCompleted.error.code).toBe('NOT_COMPLETED');
      expect(missing.success).toBe(false);
      if (!missing.success) expect(missing.error.code).toBe('BOOKING_NOT_FOUND');
      expect(await balance(userId)).toBe(0);
    });
  });

  describe('history and summary', () => {
    it('lists entries newest first', async () => {
      await appendTransaction(userId, 500, 'welcome_bonus');
      await appendTransaction(userId, 25, 'booking_confirmed');
      await appendTransaction(userId, -100, 'redemption', { redemptionOptionId: 'discount_10' });

      const entries = await history(userId);

      expect(entries.map(entry => entry.reason)).toEqual(['redemption', 'booking_confirmed', 'welcome_bonus']);
      expect(await history(userId, 1)).toHaveLength(1);
    });

    it('totals entries by reason and points at the next reward', async () => {
      const confirmed = await insertBooking('completed');
      const cancelled = await insertBooking('pending', 11);
      await appendTransaction(userId, 500, 'welcome_bonus');
      await appendTransaction(userId, 25, 'booking_confirmed', { bookingId: confirmed.id });
      await appendTransaction(userId, 25, 'booking_confirmed', { bookingId: cancelled.id });
      await appendTransaction(userId, -25, 'booking_cancelled', { bookingId: cancelled.id });
      await appendTransaction(userId, 100, 'service_completed', { bookingId: confirmed.id });

      const result = await summary(userId);

      expect(result.balance).toBe(625);
      expect(result.totalsByReason).toEqual({
        welcome_bonus: 500,
        booking_confirmed: 50,
        service_completed: 100,
        redemption: 0,
        booking_cancelled: -25,
      });
      expect(result.confirmedBookings).toBe(1);
      expect(result.completedServices).toBe(1);
      expect(result.welcomeBonus).toBe(500);
      expect(result.eligible.map(option => option.id)).toEqual(['discount_10', 'discount_25', 'free_fertilizer']);
      expect(result.nextReward).toEqual({
        option: expect.objectContaining({ id: 'gold_member' }),
        seedsNeeded: 375,
      });
    });
  });
});
