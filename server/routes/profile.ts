import { Router, type Request, type Response } from 'express';
import { logAndRespond } from '../core/logger';
import { getProfile, updateProfile } from '../core/userService';
import { isAuthenticated } from '../middleware/auth';
import { getSessionUser } from '../types/session';
import { sendCoreError } from './respond';

const router = Router();

router.get('/api/profile', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    const profile = await getProfile(user.id);
    if (!profile) {
      return res.status(404).json({ error: 'Account not found', code: 'USER_NOT_FOUND' });
    }
    res.json({ profile });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to load profile', error);
  }
});

router.put('/api/profile', isAuthenticated, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });
  try {
    const result = await updateProfile(user.id, req.body);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    req.session.user = { ...user, fullName: result.data.fullName };
    res.json({ success: true, profile: result.data });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to update profile', error);
  }
});

export default router;
