import { Request, RequestHandler, Response, NextFunction } from 'express';
import { maskSessionKey, SessionService } from '../services/session-service.js';
import { CookieConfig, Session } from '../types/index.js';

const requestSessions = new WeakMap<Response, Session>();

export interface SessionMiddlewareOptions {
  /** Path prefixes that never get a session (health checks, admin API). */
  excludedPrefixes?: string[];
}

export function getRequestSession(res: Response): Session | null {
  return requestSessions.get(res) ?? null;
}

/** Attaches `session` to the response and (re)issues its cookie. */
export function setRequestSession(res: Response, session: Session, cookie: CookieConfig): void {
  requestSessions.set(res, session);
  res.locals.session = session;
  res.cookie(cookie.name, session.sessionKey, {
    maxAge: cookie.maxAgeMs,
    httpOnly: cookie.httpOnly,
    secure: cookie.secure,
    sameSite: cookie.sameSite,
    path: '/',
  });
}

function readCookie(req: Request, name: string): string | null {
  const cookies: unknown = req.cookies;
  if (typeof cookies !== 'object' || cookies === null) return null;
  const value: unknown = Reflect.get(cookies, name);
  return typeof value === 'string' && value.length > 0 ? value : null;
}

/**
 * Loads the session named by the session cookie, creating one when the cookie
 * is missing or stale. Requires cookie-parser ahead of it.
 */
export function sessionMiddleware(sessions: SessionService, options: SessionMiddlewareOptions = {}): RequestHandler {
  const cookie = sessions.getCookieConfig();
  const excluded = options.excludedPrefixes ?? [];

  return (req: Request, res: Response, next: NextFunction): void => {
    if (excluded.some(prefix => req.path.startsWith(prefix))) {
      next();
      return;
    }

    const load = async (): Promise<void> => {
      const sessionKey = readCookie(req, cookie.name);
      let session = sessionKey ? await sessions.getSessionByKey(sessionKey) : null;
      if (!session) {
        if (sessionKey) {
          console.log(`[session] Unknown session key ${maskSessionKey(sessionKey)}; issuing a new session`);
        }
        session = await sessions.createSession();
      }
      setRequestSession(res, session, cookie);
    };

    load().then(() => next(), next);
  };
}
