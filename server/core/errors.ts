import type { ZodError } from 'zod';

export type Result<T, E> =
  | { success: true; data: T }
  | { success: false; error: E };

export function ok<T>(data: T): { success: true; data: T } {
  return { success: true, data };
}

export function fail<E>(error: E): { success: false; error: E } {
  return { success: false, error };
}

export interface ValidationError {
  code: 'VALIDATION_ERROR';
  field: string;
  message: string;
}

export interface SlotConflictError {
  code: 'SLOT_CONFLICT';
  message: string;
  conflictingBookingId?: number;
}

export interface StorageError {
  code: 'STORAGE_ERROR';
  message: string;
}

export interface PreconditionError<C extends string> {
  code: C;
  message: string;
}

export type WizardNotFoundError = PreconditionError<'WIZARD_NOT_FOUND'>;
export type NotReadyError = PreconditionError<'NOT_READY'>;
export type AlreadyCommittedError = PreconditionError<'ALREADY_COMMITTED'>;
export type InsufficientPointsError = PreconditionError<'INSUFFICIENT_POINTS'> & { balance: number; cost: number };
export type UnknownOptionError = PreconditionError<'UNKNOWN_OPTION'>;
export type AlreadyAwardedError = PreconditionError<'ALREADY_AWARDED'>;
export type BookingNotFoundError = PreconditionError<'BOOKING_NOT_FOUND'>;
export type NotCompletedError = PreconditionError<'NOT_COMPLETED'>;
export type InvalidTransitionError = PreconditionError<'INVALID_TRANSITION'>;
export type DuplicateAccountError = PreconditionError<'DUPLICATE_ACCOUNT'> & { field: 'email' | 'username' };
export type InvalidCredentialsError = PreconditionError<'INVALID_CREDENTIALS'>;
export type UserNotFoundError = PreconditionError<'USER_NOT_FOUND'>;

export type FinalizeError = SlotConflictError | StorageError;

export type CommitError =
  | WizardNotFoundError
  | NotReadyError
  | AlreadyCommittedError
  | ValidationError
  | FinalizeError;

export type StepError = WizardNotFoundError | NotReadyError | ValidationError | StorageError;

export type RedemptionError = UnknownOptionError | InsufficientPointsError | StorageError;

export type AwardError = BookingNotFoundError | NotCompletedError | AlreadyAwardedError | StorageError;

export type TransitionError = BookingNotFoundError | InvalidTransitionError | StorageError;

export type AccountError = ValidationError | DuplicateAccountError | InvalidCredentialsError | UserNotFoundError | StorageError;

export type CoreError = CommitError | StepError | RedemptionError | AwardError | TransitionError | AccountError;

export function validationError(field: string, message: string): ValidationError {
  return { code: 'VALIDATION_ERROR', field, message };
}

// Reports only the first problem, keyed by its dotted path
export function firstZodIssue(error: ZodError, fallbackField: string): ValidationError {
  const issue = error.issues[0];
  const field = issue && issue.path.length > 0 ? issue.path.join('.') : fallbackField;
  return validationError(field, issue?.message ?? 'Invalid value');
}

export const GENERIC_STORAGE_ERROR: StorageError = {
  code: 'STORAGE_ERROR',
  message: 'Something went wrong on our end. Please try again.',
};
