import { Router, type Request, type Response } from 'express';
import { logger, logAndRespond } from '../core/logger';
import { bookingWizard } from '../core/bookingWizard';
import { register, authenticate } from '../core/userService';
import { balance } from '../core/rewards/rewardsLedger';
import { authRateLimiter } from '../middleware/rateLimiting';
import { isAdminEmail } from '../middleware/auth';
import { getSessionUser, type SessionUser } from '../types/session';
import type { UserProfile } from '../../shared/schema';
import { sendCoreError } from './respond';

const router = Router();

function toSessionUser(profile: UserProfile): SessionUser {
  return {
    id: profile.id,
    email: profile.email,
    username: profile.username,
    fullName: profile.fullName,
  };
}

function startSession(req: Request, res: Response, profile: UserProfile, status: number) {
  req.session.user = toSessionUser(profile);
  req.session.save((err) => {
    if (err) {
      return logAndRespond(req, res, 500, 'Failed to create session', err);
    }
    res.status(status).json({ success: true, user: profile });
  });
}

router.post('/api/auth/register', authRateLimiter, async (req: Request, res: Response) => {
  try {
    const result = await register(req.body);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    startSession(req, res, result.data, 201);
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Registration failed', error);
  }
});

router.post('/api/auth/login', authRateLimiter, async (req: Request, res: Response) => {
  try {
    const result = await authenticate(req.body);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    startSession(req, res, result.data, 200);
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Login failed', error);
  }
});

router.post('/api/auth/logout', (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (user) {
    bookingWizard.abandonForUser(user.id);
  }

  req.session.destroy((err) => {
    if (err) {
      return logAndRespond(req, res, 500, 'Failed to logout', err);
    }
    if (user) {
      logger.info('[Auth] User logged out', { userId: user.id });
    }
    res.clearCookie('connect.sid');
    res.json({ success: true, message: 'Logged out successfully' });
  });
});

router.get('/api/auth/session', async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) {
    return res.json({ authenticated: false });
  }
  try {
    res.json({
      authenticated: true,
      user,
      isAdmin: isAdminEmail(user.email),
      seeds: await balance(user.id),
    });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to load session', error);
  }
});

export default router;
