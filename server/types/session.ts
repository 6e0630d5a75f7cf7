import type { Session, SessionData } from 'express-session';

export interface SessionUser {
  id: number;
  email: string;
  username: string;
  fullName: string;
}

declare module 'express-session' {
  interface SessionData {
    user?: SessionUser;
    wizardHandle?: string;
  }
}

export function getSessionUser(req: { session?: Session & Partial<SessionData> }): SessionUser | undefined {
  return req.session?.user;
}
