import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { logAndRespond } from '../core/logger';
import { dashboardStats, getBooking, listBookings, listReceipts } from '../core/dashboardService';
import { transitionBooking } from '../core/bookingStatusService';
import { BOOKING_STATUSES } from '../../shared/constants/statuses';
import { firstZodIssue } from '../core/errors';
import { isAdmin, isAuthenticated } from '../middleware/auth';
import { getSessionUser } from '../types/session';
import { parseIdParam, sendCoreError } from './respond';

const router = Router();

const statusChangeSchema = z.object({
  status: z.enum(BOOKING_STATUSES),
});

router.get('/api/bookings', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    res.json({ bookings: await listBookings(user.id) });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch bookings', error);
  }
});

router.get('/api/bookings/:id', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  const bookingId = parseIdParam(req.params.id);
  if (!bookingId) {
    return res.status(400).json({ error: 'Invalid booking id', code: 'VALIDATION_ERROR', field: 'id' });
  }
  try {
    const booking = await getBooking(user.id, bookingId);
    if (!booking) {
      return res.status(404).json({ error: 'Booking not found', code: 'BOOKING_NOT_FOUND' });
    }
    res.json({ booking });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch booking', error);
  }
});

router.post('/api/bookings/:id/status', isAdmin, async (req: Request, res: Response) => {
  const bookingId = parseIdParam(req.params.id);
  if (!bookingId) {
    return res.status(400).json({ error: 'Invalid booking id', code: 'VALIDATION_ERROR', field: 'id' });
  }
  const parsed = statusChangeSchema.safeParse(req.body);
  if (!parsed.success) {
    return sendCoreError(req, res, firstZodIssue(parsed.error, 'status'));
  }
  try {
    const result = await transitionBooking(bookingId, parsed.data.status);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    res.json({
      success: true,
      booking: result.data.booking,
      seedsChange: result.data.pointTransaction?.amount ?? 0,
    });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to update booking status', error);
  }
});

router.get('/api/receipts', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    res.json({ receipts: await listReceipts(user.id) });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch receipts', error);
  }
});

router.get('/api/stats', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    res.json(await dashboardStats(user.id));
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Error fetching stats', error);
  }
});

export default router;
