import type { WizardStep } from '../../../shared/constants/statuses';
import { logger } from '../logger';
import {
  fail,
  ok,
  validationError,
  type CommitError,
  type NotReadyError,
  type Result,
  type SlotConflictError,
  type StepError,
  type ValidationError,
  type WizardNotFoundError,
} from '../errors';
import { finalize, type FinalizedBooking } from './finalizer';
import { WizardStore } from './wizardStore';
import { computeTotals, type WizardHandle, type WizardSelections, type WizardState } from './types';
import { validateServiceStep, validateProductsStep, validateScheduleStep } from './wizardValidation';

const WIZARD_NOT_FOUND: WizardNotFoundError = {
  code: 'WIZARD_NOT_FOUND',
  message: 'Your booking session has expired. Please start again.',
};

const COMMIT_IN_PROGRESS: NotReadyError = {
  code: 'NOT_READY',
  message: 'This booking is already being confirmed',
};

function isWizardStep(step: number): step is WizardStep {
  return Number.isInteger(step) && step >= 1 && step <= 4;
}

const NEXT_STEP: Record<WizardStep, WizardStep> = { 1: 2, 2: 3, 3: 4, 4: 4 };

/**
 * Multi-step booking flow: service → add-ons → date/time → confirm.
 * Each step's data is validated before the wizard advances; going back
 * keeps every field already filled in.
 */
export class BookingWizard {
  constructor(readonly store: WizardStore = new WizardStore()) {}

  start(userId: number): WizardState {
    const state = this.store.create(userId);
    logger.info('[Booking Wizard] Started', { userId, wizardHandle: state.handle });
    return state;
  }

  getState(handle: WizardHandle): Result<WizardState, WizardNotFoundError> {
    const state = this.store.get(handle);
    return state ? ok(state) : fail(WIZARD_NOT_FOUND);
  }

  async setStepData(handle: WizardHandle, step: number, fields: unknown): Promise<Result<WizardState, StepError>> {
    const state = this.store.get(handle);
    if (!state || state.status !== 'in_progress') {
      return fail(WIZARD_NOT_FOUND);
    }
    if (this.store.isCommitting(handle)) {
      return fail(COMMIT_IN_PROGRESS);
    }
    if (!isWizardStep(step)) {
      return fail(validationError('step', 'Unknown booking step'));
    }
    if (step > state.step) {
      return fail(validationError('step', `Please complete step ${state.step} first`));
    }
    const submitted: WizardStep = step;

    let patch: Partial<WizardSelections>;
    switch (submitted) {
      case 1: {
        const service = await validateServiceStep(fields);
        if ('code' in service) return fail(service);
        patch = { service };
        break;
      }
      case 2: {
        const products = await validateProductsStep(fields);
        if (!Array.isArray(products)) return fail(products);
        patch = { products };
        break;
      }
      case 3: {
        if (!state.selections.service) {
          return fail(validationError('serviceId', 'Please choose a service first'));
        }
        const schedule = await validateScheduleStep(fields, state.selections.service, this.store.now());
        if ('code' in schedule) {
          return fail(schedule.code === 'SLOT_CONFLICT' ? validationError('scheduledTime', schedule.message) : schedule);
        }
        patch = { schedule };
        break;
      }
      default:
        return fail(validationError('step', 'The confirmation step has no details to save. Confirm the booking instead.'));
    }

    // Validation awaited storage, so a commit may have claimed the wizard since
    const updated = this.store.edit(handle, (draft) => {
      draft.selections = { ...draft.selections, ...patch };
      draft.totals = computeTotals(draft.selections);
      draft.step = NEXT_STEP[submitted];
    });
    return updated ? ok(updated) : fail(this.editRefusal(handle));
  }

  /** Moves back to an earlier step. Nothing already entered is discarded. */
  goBack(handle: WizardHandle, toStep?: number): Result<WizardState, StepError> {
    const state = this.store.get(handle);
    if (!state || state.status !== 'in_progress') {
      return fail(WIZARD_NOT_FOUND);
    }
    if (this.store.isCommitting(handle)) {
      return fail(COMMIT_IN_PROGRESS);
    }
    const target = toStep ?? state.step - 1;
    if (!isWizardStep(target) || target >= state.step) {
      return fail(validationError('step', 'You can only go back to an earlier step'));
    }
    const updated = this.store.edit(handle, (draft) => {
      draft.step = target;
    });
    return updated ? ok(updated) : fail(this.editRefusal(handle));
  }

  async commit(handle: WizardHandle): Promise<Result<FinalizedBooking, CommitError>> {
    const state = this.store.get(handle);
    if (!state || state.status === 'abandoned') {
      return fail(WIZARD_NOT_FOUND);
    }
    if (state.status === 'committed') {
      return fail({ code: 'ALREADY_COMMITTED', message: 'This booking has already been confirmed' });
    }
    if (state.step !== 4) {
      return fail({ code: 'NOT_READY', message: 'Please complete every booking step before confirming' });
    }
    if (!this.store.beginCommit(handle)) {
      return fail(COMMIT_IN_PROGRESS);
    }

    try {
      const revalidated = await this.revalidate(state);
      if ('code' in revalidated) return fail(revalidated);

      const result = await finalize(revalidated);
      if (!result.success) {
        // Wizard stays at step 4 so the user can pick another slot
        return result;
      }

      this.store.update(handle, (draft) => {
        draft.status = 'committed';
        draft.bookingId = result.data.booking.id;
      });
      return result;
    } finally {
      this.store.endCommit(handle);
    }
  }

  abandon(handle: WizardHandle): Result<WizardState, WizardNotFoundError> {
    const state = this.store.abandon(handle);
    return state ? ok(state) : fail(WIZARD_NOT_FOUND);
  }

  abandonForUser(userId: number): WizardState | null {
    return this.store.abandonForUser(userId);
  }

  sweepExpired(): number {
    return this.store.sweepExpired();
  }

  activeCount(): number {
    return this.store.size();
  }

  private editRefusal(handle: WizardHandle): WizardNotFoundError | NotReadyError {
    return this.store.isCommitting(handle) ? COMMIT_IN_PROGRESS : WIZARD_NOT_FOUND;
  }

  /** Re-runs every step's rules against current catalog and bookings. */
  private async revalidate(state: WizardState): Promise<WizardState | ValidationError | SlotConflictError> {
    const { selections } = state;
    const service = await validateServiceStep({ serviceId: selections.service?.serviceId });
    if ('code' in service) return service;

    const products = await validateProductsStep({
      products: (selections.products ?? []).map(p => ({ productId: p.productId, quantity: p.quantity })),
    });
    if (!Array.isArray(products)) return products;

    const schedule = await validateScheduleStep(
      {
        scheduledDate: selections.schedule?.scheduledDate,
        scheduledTime: selections.schedule?.scheduledTime,
        specialInstructions: selections.schedule?.specialInstructions ?? undefined,
      },
      service,
      this.store.now()
    );
    // A slot taken since step 3 surfaces as SLOT_CONFLICT
    if ('code' in schedule) return schedule;

    const refreshed: WizardSelections = { service, products, schedule };
    return { ...state, selections: refreshed, totals: computeTotals(refreshed) };
  }
}

export type { FinalizedBooking };
