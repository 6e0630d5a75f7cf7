import rateLimit from 'express-rate-limit';
import type { Request, Response } from 'express';
import { logger } from '../core/logger';

const getClientKey = (req: Request): string => {
  const userId = req.session?.user?.id;
  if (userId) {
    return `user:${userId}`;
  }
  return req.ip || 'unknown';
};

const getSubmittedEmail = (req: Request): string => {
  const body: unknown = req.body;
  if (body && typeof body === 'object' && 'email' in body && typeof body.email === 'string') {
    return body.email.trim().toLowerCase();
  }
  return 'unknown';
};

export const globalRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Global limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many requests. Please slow down.' });
  },
  skip: (req) => {
    if (req.path === '/api/health' || req.path === '/api/auth/session') {
      return true;
    }
    return !req.path.startsWith('/api/');
  }
});

export const bookingRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 60,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Booking limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many booking requests. Please wait a moment.' });
  }
});

export const authRateLimiter = rateLimit({
  windowMs: 15 * 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: (req) => `auth:${getSubmittedEmail(req)}:${req.ip || 'unknown'}`,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Auth limit exceeded for ${getSubmittedEmail(req)}`);
    res.status(429).json({ error: 'Too many login attempts. Please try again in 15 minutes.' });
  }
});

export const redemptionRateLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 10,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: getClientKey,
  validate: false,
  handler: (req: Request, res: Response) => {
    logger.warn(`[RateLimit] Redemption limit exceeded for ${getClientKey(req)} on ${req.path}`);
    res.status(429).json({ error: 'Too many redemption requests. Please wait.' });
  }
});
