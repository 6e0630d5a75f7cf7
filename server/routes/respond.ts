import type { Request, Response } from 'express';
import { createErrorResponse } from '../core/logger';
import type { CoreError } from '../core/errors';

const STATUS_BY_CODE: Record<CoreError['code'], number> = {
  VALIDATION_ERROR: 400,
  INVALID_CREDENTIALS: 401,
  WIZARD_NOT_FOUND: 404,
  BOOKING_NOT_FOUND: 404,
  USER_NOT_FOUND: 404,
  UNKNOWN_OPTION: 404,
  SLOT_CONFLICT: 409,
  NOT_READY: 409,
  ALREADY_COMMITTED: 409,
  INSUFFICIENT_POINTS: 409,
  ALREADY_AWARDED: 409,
  NOT_COMPLETED: 409,
  INVALID_TRANSITION: 409,
  DUPLICATE_ACCOUNT: 409,
  STORAGE_ERROR: 500,
};

export function statusForError(error: CoreError): number {
  return STATUS_BY_CODE[error.code];
}

/**
 * Sends a typed core failure. Storage failures are logged where they happen,
 * so only the generic message leaves the server.
 */
export function sendCoreError(req: Request, res: Response, error: CoreError) {
  const body = createErrorResponse(req, error.message, error.code, 'field' in error ? error.field : undefined);
  if (error.code === 'INSUFFICIENT_POINTS') {
    return res.status(409).json({ ...body, balance: error.balance, cost: error.cost });
  }
  return res.status(statusForError(error)).json(body);
}

export function parseIdParam(value: string | undefined): number | null {
  if (!value || !/^\d+$/.test(value)) return null;
  const id = Number(value);
  return Number.isSafeInteger(id) && id > 0 ? id : null;
}
