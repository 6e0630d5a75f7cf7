import { Router, type Request, type Response } from 'express';
import { z } from 'zod';
import { logAndRespond } from '../core/logger';
import { balance, eligibleRedemptions, history, redeem, summary } from '../core/rewards/rewardsLedger';
import { REDEMPTION_OPTIONS } from '../../shared/constants/rewards';
import { firstZodIssue } from '../core/errors';
import { isAuthenticated } from '../middleware/auth';
import { redemptionRateLimiter } from '../middleware/rateLimiting';
import { getSessionUser } from '../types/session';
import { sendCoreError } from './respond';

const router = Router();

const redeemSchema = z.object({
  optionId: z.string().trim().min(1, 'optionId is required'),
});

const historyQuerySchema = z.object({
  limit: z.coerce.number().int().min(1).max(500).default(100),
});

router.get('/api/rewards', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    res.json(await summary(user.id));
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch rewards', error);
  }
});

router.get('/api/rewards/history', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  const parsed = historyQuerySchema.safeParse(req.query);
  if (!parsed.success) {
    return sendCoreError(req, res, firstZodIssue(parsed.error, 'limit'));
  }
  try {
    res.json({ transactions: await history(user.id, parsed.data.limit) });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch seeds history', error);
  }
});

router.get('/api/rewards/redemptions', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    const eligible = await eligibleRedemptions(user.id);
    res.json({
      options: REDEMPTION_OPTIONS,
      eligible: eligible.map(option => option.id),
    });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to fetch redemption options', error);
  }
});

router.post('/api/rewards/redeem', isAuthenticated, redemptionRateLimiter, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  const parsed = redeemSchema.safeParse(req.body);
  if (!parsed.success) {
    return sendCoreError(req, res, firstZodIssue(parsed.error, 'optionId'));
  }
  try {
    const result = await redeem(user.id, parsed.data.optionId);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    res.json({
      success: true,
      transaction: result.data,
      balance: await balance(user.id),
    });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to redeem seeds', error);
  }
});

export default router;
