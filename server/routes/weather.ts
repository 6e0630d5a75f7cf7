import { Router, type Request, type Response } from 'express';
import { logAndRespond } from '../core/logger';
import { currentConditions, weatherStatus } from '../core/weather/weatherService';
import { isAuthenticated } from '../middleware/auth';

const router = Router();

router.get('/api/weather', isAuthenticated, async (req: Request, res: Response) => {
  try {
    const location = typeof req.query.location === 'string' ? req.query.location : undefined;
    res.json({ success: true, weather: await currentConditions(location) });
  } catch (error: unknown) {
    logAndRespond(req, res, 500, 'Weather service temporarily unavailable', error);
  }
});

router.get('/api/weather/status', isAuthenticated, (req: Request, res: Response) => {
  res.json({ success: true, ...weatherStatus() });
});

export default router;
