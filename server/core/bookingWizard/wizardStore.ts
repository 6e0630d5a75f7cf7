import crypto from 'crypto';
import { logger } from '../logger';
import { config } from '../config';
import type { WizardHandle, WizardState } from './types';

interface WizardRecord {
  state: WizardState;
  committing: boolean;
}

export interface WizardStoreOptions {
  timeoutMs?: number;
  clock?: () => number;
}

/**
 * Server-side, in-memory home for in-progress wizards, keyed by handle with
 * at most one live wizard per user. Nothing here is persisted; an expired
 * record is evicted on access or by sweepExpired().
 */
export class WizardStore {
  private records = new Map<WizardHandle, WizardRecord>();
  private handlesByUser = new Map<number, WizardHandle>();
  readonly timeoutMs: number;
  private readonly clock: () => number;

  constructor(options: WizardStoreOptions = {}) {
    this.timeoutMs = options.timeoutMs ?? config.wizardTimeoutMs;
    this.clock = options.clock ?? Date.now;
  }

  now(): Date {
    return new Date(this.clock());
  }

  create(userId: number): WizardState {
    const previous = this.handlesByUser.get(userId);
    if (previous) {
      this.abandon(previous);
    }

    const now = this.now();
    const state: WizardState = {
      handle: crypto.randomBytes(12).toString('hex'),
      userId,
      status: 'in_progress',
      step: 1,
      selections: {},
      totals: { servicePriceCents: 0, productsTotalCents: 0, totalPriceCents: 0 },
      bookingId: null,
      createdAt: now,
      updatedAt: now,
      expiresAt: new Date(now.getTime() + this.timeoutMs),
    };
    this.records.set(state.handle, { state, committing: false });
    this.handlesByUser.set(userId, state.handle);
    return structuredClone(state);
  }

  /** Live record, or null when unknown or expired. Callers mutate through update(). */
  private getRecord(handle: WizardHandle): WizardRecord | null {
    const record = this.records.get(handle);
    if (!record) return null;
    if (record.state.expiresAt.getTime() <= this.clock() && !record.committing) {
      this.evict(handle, 'expired');
      return null;
    }
    return record;
  }

  get(handle: WizardHandle): WizardState | null {
    const record = this.getRecord(handle);
    return record ? structuredClone(record.state) : null;
  }

  getForUser(userId: number): WizardState | null {
    const handle = this.handlesByUser.get(userId);
    return handle ? this.get(handle) : null;
  }

  /** Applies a change and refreshes the inactivity deadline. */
  update(handle: WizardHandle, change: (state: WizardState) => void): WizardState | null {
    const record = this.getRecord(handle);
    if (!record) return null;
    change(record.state);
    const now = this.now();
    record.state.updatedAt = now;
    record.state.expiresAt = new Date(now.getTime() + this.timeoutMs);
    return structuredClone(record.state);
  }

  /**
   * update() for user edits: refused while a commit holds the record or once
   * the wizard has left in_progress.
   */
  edit(handle: WizardHandle, change: (state: WizardState) => void): WizardState | null {
    const record = this.getRecord(handle);
    if (!record || record.committing || record.state.status !== 'in_progress') return null;
    return this.update(handle, change);
  }

  isCommitting(handle: WizardHandle): boolean {
    return this.records.get(handle)?.committing ?? false;
  }

  /** Claims the record for a commit. False when another commit holds it. */
  beginCommit(handle: WizardHandle): boolean {
    const record = this.getRecord(handle);
    if (!record || record.committing) return false;
    record.committing = true;
    return true;
  }

  endCommit(handle: WizardHandle): void {
    const record = this.records.get(handle);
    if (record) record.committing = false;
  }

  abandon(handle: WizardHandle): WizardState | null {
    const record = this.records.get(handle);
    if (!record) return null;
    record.state.status = 'abandoned';
    const finalState = structuredClone(record.state);
    this.evict(handle, 'abandoned');
    return finalState;
  }

  abandonForUser(userId: number): WizardState | null {
    const handle = this.handlesByUser.get(userId);
    return handle ? this.abandon(handle) : null;
  }

  sweepExpired(): number {
    const now = this.clock();
    let evicted = 0;
    for (const [handle, record] of this.records) {
      if (record.state.expiresAt.getTime() <= now && !record.committing) {
        this.evict(handle, 'expired');
        evicted++;
      }
    }
    return evicted;
  }

  size(): number {
    return this.records.size;
  }

  private evict(handle: WizardHandle, reason: 'expired' | 'abandoned'): void {
    const record = this.records.get(handle);
    if (!record) return;
    this.records.delete(handle);
    if (this.handlesByUser.get(record.state.userId) === handle) {
      this.handlesByUser.delete(record.state.userId);
    }
    if (record.state.status === 'in_progress') {
      logger.info(`[Booking Wizard] Wizard ${reason}`, { wizardHandle: handle, userId: record.state.userId, extra: { step: record.state.step } });
    }
  }
}
