import { createHash, timingSafeEqual } from 'crypto';
import { Request, RequestHandler, Response, NextFunction } from 'express';
import { AuthenticationError } from '../errors/index.js';

export interface AdminCredentials {
  username: string;
  password: string;
}

function digest(value: string): Buffer {
  return createHash('sha256').update(value, 'utf-8').digest();
}

function safeEqual(a: string, b: string): boolean {
  return timingSafeEqual(digest(a), digest(b));
}

export function parseBasicAuth(header: string | undefined): AdminCredentials | null {
  if (!header) return null;
  const match = /^Basic\s+(.+)$/i.exec(header.trim());
  if (!match) return null;

  const decoded = Buffer.from(match[1], 'base64').toString('utf-8');
  const separator = decoded.indexOf(':');
  if (separator < 0) return null;
  return { username: decoded.slice(0, separator), password: decoded.slice(separator + 1) };
}

/**
 * HTTP Basic auth for the admin API.
 */
export function adminAuth(expected: AdminCredentials): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const provided = parseBasicAuth(req.headers.authorization);
    // both comparisons always run
    const usernameOk = safeEqual(provided?.username ?? '', expected.username);
    const passwordOk = safeEqual(provided?.password ?? '', expected.password);

    if (provided && usernameOk && passwordOk) {
      next();
      return;
    }

    res.set('WWW-Authenticate', 'Basic realm="Admin Area"');
    next(new AuthenticationError(provided ? 'Invalid admin credentials' : undefined));
  };
}
