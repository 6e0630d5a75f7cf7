import bcrypt from 'bcryptjs';
import { eq, sql } from 'drizzle-orm';
import { db } from '../db';
import {
  users,
  registerSchema,
  loginSchema,
  profileUpdateSchema,
  type UserRow,
  type UserProfile,
} from '../../shared/schema';
import { isConstraintError } from './db';
import { logger } from './logger';
import {
  fail,
  firstZodIssue,
  ok,
  GENERIC_STORAGE_ERROR,
  type AccountError,
  type DuplicateAccountError,
  type Result,
} from './errors';
import { grantWelcomeBonus, runLedgerTransaction } from './rewards/rewardsLedger';

const BCRYPT_ROUNDS = 10;

export function toProfile(row: UserRow): UserProfile {
  return {
    id: row.id,
    username: row.username,
    email: row.email,
    fullName: row.fullName,
    phone: row.phone,
    address: row.address,
    createdAt: row.createdAt,
  };
}

function duplicate(field: 'email' | 'username'): DuplicateAccountError {
  return {
    code: 'DUPLICATE_ACCOUNT',
    field,
    message: field === 'email' ? 'An account with that email already exists' : 'That username is taken',
  };
}

async function findDuplicate(email: string, username: string): Promise<DuplicateAccountError | null> {
  const [byEmail] = await db
    .select({ id: users.id })
    .from(users)
    .where(sql`lower(${users.email}) = ${email}`)
    .limit(1);
  if (byEmail) return duplicate('email');

  const [byUsername] = await db
    .select({ id: users.id })
    .from(users)
    .where(eq(users.username, username))
    .limit(1);
  return byUsername ? duplicate('username') : null;
}

/**
 * Creates the account and its welcome bonus together; a user never exists
 * without the bonus entry.
 */
export async function register(input: unknown): Promise<Result<UserProfile, AccountError>> {
  const parsed = registerSchema.safeParse(input);
  if (!parsed.success) return fail(firstZodIssue(parsed.error, 'email'));
  const data = parsed.data;

  try {
    const existing = await findDuplicate(data.email, data.username);
    if (existing) return fail(existing);

    const passwordHash = await bcrypt.hash(data.password, BCRYPT_ROUNDS);
    const created = await runLedgerTransaction(async (ctx) => {
      const [user] = await ctx.tx
        .insert(users)
        .values({
          username: data.username,
          email: data.email,
          passwordHash,
          fullName: data.fullName,
          phone: data.phone ?? null,
          address: data.address ?? null,
        })
        .returning();
      await grantWelcomeBonus(user.id, ctx);
      return user;
    });

    logger.info('[Accounts] User registered', { userId: created.id, extra: { username: created.username } });
    return ok(toProfile(created));
  } catch (error: unknown) {
    const constraint = isConstraintError(error);
    if (constraint.type === 'unique') {
      // Lost a race with a concurrent registration
      return fail(duplicate(constraint.detail?.includes('username') ? 'username' : 'email'));
    }
    logger.error('[Accounts] Registration failed', { error, extra: { email: data.email } });
    return fail(GENERIC_STORAGE_ERROR);
  }
}

export async function authenticate(input: unknown): Promise<Result<UserProfile, AccountError>> {
  const parsed = loginSchema.safeParse(input);
  if (!parsed.success) return fail(firstZodIssue(parsed.error, 'email'));

  const [user] = await db
    .select()
    .from(users)
    .where(sql`lower(${users.email}) = ${parsed.data.email}`)
    .limit(1);

  const isValid = user ? await bcrypt.compare(parsed.data.password, user.passwordHash) : false;
  if (!user || !isValid) {
    logger.warn('[Accounts] Failed login attempt', { extra: { email: parsed.data.email } });
    return fail({ code: 'INVALID_CREDENTIALS', message: 'Invalid email or password' });
  }
  return ok(toProfile(user));
}

export async function getProfile(userId: number): Promise<UserProfile | null> {
  const [user] = await db.select().from(users).where(eq(users.id, userId)).limit(1);
  return user ? toProfile(user) : null;
}

export async function updateProfile(userId: number, input: unknown): Promise<Result<UserProfile, AccountError>> {
  const parsed = profileUpdateSchema.safeParse(input);
  if (!parsed.success) return fail(firstZodIssue(parsed.error, 'fullName'));

  const [user] = await db
    .update(users)
    .set({ ...parsed.data, updatedAt: new Date() })
    .where(eq(users.id, userId))
    .returning();
  if (!user) return fail({ code: 'USER_NOT_FOUND', message: 'Account not found' });

  logger.info('[Accounts] Profile updated', { userId, extra: { fields: Object.keys(parsed.data) } });
  return ok(toProfile(user));
}
