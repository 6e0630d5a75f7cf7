import express, { type NextFunction, type Request, type Response } from 'express';
import cors from 'cors';
import compression from 'compression';
import { config } from './core/config';
import { logAndRespond, logRequest, requestIdMiddleware } from './core/logger';
import { getSession } from './middleware/auth';
import { globalRateLimiter } from './middleware/rateLimiting';
import authRouter from './routes/auth';
import profileRouter from './routes/profile';
import catalogRouter from './routes/catalog';
import bookingRouter from './routes/booking';
import bookingsRouter from './routes/bookings';
import rewardsRouter from './routes/rewards';
import weatherRouter from './routes/weather';
import healthRouter from './routes/health';
import './types/session';

export function createApp() {
  const app = express();

  app.set('trust proxy', 1);
  app.disable('x-powered-by');
  app.use((req, res, next) => {
    res.setHeader('X-Content-Type-Options', 'nosniff');
    res.setHeader('X-Frame-Options', 'SAMEORIGIN');
    res.setHeader('Referrer-Policy', 'strict-origin-when-cross-origin');
    if (config.isProduction) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains');
    }
    next();
  });

  app.use(requestIdMiddleware);
  app.use(logRequest);
  app.use(cors({
    origin: config.isProduction ? false : true,
    credentials: true,
    methods: ['GET', 'POST', 'PUT', 'DELETE', 'OPTIONS'],
    allowedHeaders: ['Content-Type'],
  }));
  app.use(compression());
  app.use(express.json({ limit: '100kb' }));
  app.use(getSession());
  app.use(globalRateLimiter);

  app.use(healthRouter);
  app.use(authRouter);
  app.use(profileRouter);
  app.use(catalogRouter);
  app.use(bookingRouter);
  app.use(bookingsRouter);
  app.use(rewardsRouter);
  app.use(weatherRouter);

  app.use('/api', (req: Request, res: Response) => {
    res.status(404).json({ error: 'Not found', code: 'NOT_FOUND' });
  });

  // Malformed JSON bodies land here before any route runs
  app.use((err: unknown, req: Request, res: Response, next: NextFunction) => {
    if (res.headersSent) {
      return next(err);
    }
    if (err instanceof SyntaxError) {
      return res.status(400).json({ error: 'Request body must be valid JSON', code: 'VALIDATION_ERROR' });
    }
    logAndRespond(req, res, 500, 'Internal server error', err);
  });

  return app;
}
