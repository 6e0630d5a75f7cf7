import session from "express-session";
import type { RequestHandler } from "express";
import connectPg from "connect-pg-simple";
import { pool } from "../core/db";
import { config } from "../core/config";
import { getSessionUser } from "../types/session";
import { getErrorMessage } from "../utils/errorUtils";
import { logger } from "../core/logger";

const SESSION_TTL_MS = 30 * 24 * 60 * 60 * 1000; // 30 days

export function getSession() {
  const isProduction = config.isProduction;

  const cookieConfig = {
    httpOnly: true,
    secure: isProduction,
    sameSite: 'lax' as const,
    maxAge: SESSION_TTL_MS,
  };

  if (!config.sessionSecret) {
    if (isProduction) {
      throw new Error('[Session] FATAL: SESSION_SECRET is required in production. Set it in your environment variables.');
    }
    logger.warn('[Session] SESSION_SECRET is missing - using development fallback (NOT SAFE FOR PRODUCTION)');
    logger.info('[Session] Using MemoryStore');
    return session({
      secret: 'dev-only-fallback-secret-' + Date.now(),
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }

  if (!config.databaseUrl) {
    logger.info('[Session] Using MemoryStore');
    return session({
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }

  try {
    const pgStore = connectPg(session);
    const sessionStore = new pgStore({
      pool,
      createTableIfMissing: true,
      ttl: SESSION_TTL_MS / 1000,
      tableName: "sessions",
      errorLog: (err: Error) => {
        logger.error('[Session Store] Error:', { extra: { message: err.message } });
      },
    });

    logger.info('[Session] Using Postgres session store');
    return session({
      secret: config.sessionSecret,
      store: sessionStore,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  } catch (err: unknown) {
    logger.warn('[Session] Postgres store failed, using MemoryStore:', { extra: { errorMessage: getErrorMessage(err) } });
    return session({
      secret: config.sessionSecret,
      resave: false,
      saveUninitialized: false,
      cookie: cookieConfig,
    });
  }
}

export function isAdminEmail(email: string): boolean {
  return config.adminEmails.includes(email.trim().toLowerCase());
}

export const isAuthenticated: RequestHandler = (req, res, next) => {
  const user = getSessionUser(req);

  if (!user) {
    res.status(401).json({ error: "Please log in to continue", code: "UNAUTHORIZED" });
    return;
  }

  next();
};

export const isAdmin: RequestHandler = (req, res, next) => {
  const user = getSessionUser(req);

  if (!user) {
    res.status(401).json({ error: "Please log in to continue", code: "UNAUTHORIZED" });
    return;
  }

  if (!isAdminEmail(user.email)) {
    logger.warn('[Auth] Admin route denied', { userId: user.id, extra: { path: req.path } });
    res.status(403).json({ error: "Forbidden: Admin access required", code: "FORBIDDEN" });
    return;
  }

  next();
};
