import { Router, type Request, type Response } from 'express';
import { logAndRespond } from '../core/logger';
import { bookingWizard, type WizardState } from '../core/bookingWizard';
import { balance } from '../core/rewards/rewardsLedger';
import { WIZARD_STEP_NAMES } from '../../shared/constants/statuses';
import { isAuthenticated } from '../middleware/auth';
import { bookingRateLimiter } from '../middleware/rateLimiting';
import { getSessionUser } from '../types/session';
import { sendCoreError } from './respond';

const router = Router();

const NO_WIZARD = {
  error: 'No booking in progress. Start a new booking.',
  code: 'WIZARD_NOT_FOUND',
};

function present(state: WizardState) {
  return { ...state, stepName: WIZARD_STEP_NAMES[state.step] };
}

// Only the handle remembered in this session is ever used
function sessionHandle(req: Request): string | null {
  const user = getSessionUser(req);
  const handle = req.session.wizardHandle;
  if (!user || !handle) return null;
  const state = bookingWizard.getState(handle);
  return state.success && state.data.userId === user.id ? handle : null;
}

router.post('/api/booking/wizard', isAuthenticated, (req: Request, res: Response) => {
  const user = getSessionUser(req);
  if (!user) return res.status(401).json({ error: 'Please log in to continue' });

  const state = bookingWizard.start(user.id);
  req.session.wizardHandle = state.handle;
  res.status(201).json({ wizard: present(state) });
});

router.get('/api/booking/wizard', isAuthenticated, (req: Request, res: Response) => {
  const handle = sessionHandle(req);
  if (!handle) return res.status(404).json(NO_WIZARD);

  const result = bookingWizard.getState(handle);
  if (!result.success) {
    return sendCoreError(req, res, result.error);
  }
  res.json({ wizard: present(result.data) });
});

router.put('/api/booking/wizard/steps/:step', isAuthenticated, bookingRateLimiter, async (req: Request, res: Response) => {
  const handle = sessionHandle(req);
  if (!handle) return res.status(404).json(NO_WIZARD);

  try {
    const step = Number(req.params.step);
    const result = await bookingWizard.setStepData(handle, step, req.body);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    res.json({ wizard: present(result.data) });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to save booking step', error);
  }
});

router.post('/api/booking/wizard/back', isAuthenticated, (req: Request, res: Response) => {
  const handle = sessionHandle(req);
  if (!handle) return res.status(404).json(NO_WIZARD);

  const body: unknown = req.body;
  const toStep = body && typeof body === 'object' && 'step' in body && body.step !== undefined
    ? Number(body.step)
    : undefined;
  const result = bookingWizard.goBack(handle, toStep);
  if (!result.success) {
    return sendCoreError(req, res, result.error);
  }
  res.json({ wizard: present(result.data) });
});

router.post('/api/booking/wizard/commit', isAuthenticated, bookingRateLimiter, async (req: Request, res: Response) => {
  const user = getSessionUser(req);
  const handle = sessionHandle(req);
  if (!user || !handle) return res.status(404).json(NO_WIZARD);

  try {
    const result = await bookingWizard.commit(handle);
    if (!result.success) {
      return sendCoreError(req, res, result.error);
    }
    const { booking, products, pointTransaction } = result.data;
    res.status(201).json({
      success: true,
      booking,
      products,
      seedsEarned: pointTransaction.amount,
      seedsBalance: await balance(user.id),
    });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Failed to confirm booking', error);
  }
});

router.delete('/api/booking/wizard', isAuthenticated, (req: Request, res: Response) => {
  const handle = sessionHandle(req);
  if (!handle) return res.status(404).json(NO_WIZARD);

  const result = bookingWizard.abandon(handle);
  delete req.session.wizardHandle;
  if (!result.success) {
    return sendCoreError(req, res, result.error);
  }
  res.json({ success: true });
});

export default router;
