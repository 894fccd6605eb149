import { Request, Response, NextFunction, RequestHandler } from 'express';

export interface RateLimitConfig {
  windowMs: number; // Time window in milliseconds
  maxRequests: number; // Maximum requests per window
  keyGenerator?: (req: Request) => string;
  now?: () => number;
}

export interface RateLimitInfo {
  limit: number;
  remaining: number;
  reset: number; // Timestamp when the window resets
  retryAfter?: number; // Seconds until retry is allowed
}

const ipKey = (req: Request): string => req.ip ?? 'unknown';

/**
 * Fixed-window request counter keyed per client.
 */
export class RateLimiter {
  private readonly requests: Map<string, { count: number; resetTime: number }> = new Map();
  private readonly config: RateLimitConfig;
  private readonly keyGenerator: (req: Request) => string;
  private readonly now: () => number;

  constructor(config: RateLimitConfig) {
    this.config = config;
    this.keyGenerator = config.keyGenerator ?? ipKey;
    this.now = config.now ?? Date.now;

    // Clean up expired entries every minute; the timer never holds the process open
    setInterval(() => {
      this.cleanupExpiredEntries();
    }, 60000).unref();
  }

  /**
   * Express middleware for rate limiting
   */
  middleware(): RequestHandler {
    return (req: Request, res: Response, next: NextFunction): void => {
      const key = this.keyGenerator(req);
      const now = this.now();

      let rateLimitInfo = this.requests.get(key);
      if (!rateLimitInfo || rateLimitInfo.resetTime <= now) {
        rateLimitInfo = { count: 0, resetTime: now + this.config.windowMs };
        this.requests.set(key, rateLimitInfo);
      }

      if (rateLimitInfo.count >= this.config.maxRequests) {
        const retryAfter = Math.ceil((rateLimitInfo.resetTime - now) / 1000);

        res.set({
          'X-RateLimit-Limit': this.config.maxRequests.toString(),
          'X-RateLimit-Remaining': '0',
          'X-RateLimit-Reset': new Date(rateLimitInfo.resetTime).toISOString(),
          'Retry-After': retryAfter.toString(),
        });

        res.status(429).json({
          success: false,
          error: 'Too Many Requests',
          code: 'RATE_LIMITED',
          message: 'Rate limit exceeded',
          retryAfter,
          timestamp: new Date(now).toISOString(),
        });
        return;
      }

      rateLimitInfo.count++;

      const remaining = Math.max(0, this.config.maxRequests - rateLimitInfo.count);
      res.set({
        'X-RateLimit-Limit': this.config.maxRequests.toString(),
        'X-RateLimit-Remaining': remaining.toString(),
        'X-RateLimit-Reset': new Date(rateLimitInfo.resetTime).toISOString(),
      });
      res.locals.rateLimit = {
        limit: this.config.maxRequests,
        remaining,
        reset: rateLimitInfo.resetTime,
      } satisfies RateLimitInfo;

      next();
    };
  }

  /**
   * Get rate limit info for a key
   */
  getInfo(key: string): RateLimitInfo | null {
    const rateLimitInfo = this.requests.get(key);
    if (!rateLimitInfo) return null;

    const now = this.now();
    if (rateLimitInfo.resetTime <= now) {
      return { limit: this.config.maxRequests, remaining: this.config.maxRequests, reset: now + this.config.windowMs };
    }

    const remaining = Math.max(0, this.config.maxRequests - rateLimitInfo.count);
    return {
      limit: this.config.maxRequests,
      remaining,
      reset: rateLimitInfo.resetTime,
      retryAfter: remaining === 0 ? Math.ceil((rateLimitInfo.resetTime - now) / 1000) : undefined,
    };
  }

  reset(key: string): void {
    this.requests.delete(key);
  }

  getStats(): { totalKeys: number; activeKeys: number; windowMs: number; maxRequests: number } {
    const now = this.now();
    const activeKeys = Array.from(this.requests.values()).filter(info => info.resetTime > now).length;
    return {
      totalKeys: this.requests.size,
      activeKeys,
      windowMs: this.config.windowMs,
      maxRequests: this.config.maxRequests,
    };
  }

  private cleanupExpiredEntries(): void {
    const now = this.now();
    let removed = 0;
    for (const [key, info] of this.requests.entries()) {
      if (info.resetTime <= now) {
        this.requests.delete(key);
        removed++;
      }
    }
    if (removed > 0) {
      console.log(`[rate-limiter] Cleaned up ${removed} expired rate limit entries`);
    }
  }
}

/**
 * Pre-configured rate limiters for different use cases
 */
export class RateLimitPresets {
  /**
   * Global limiter, per client IP
   */
  static moderate(maxRequests: number = 1000): RateLimiter {
    return new RateLimiter({
      windowMs: 15 * 60 * 1000, // 15 minutes
      maxRequests,
      keyGenerator: ipKey,
    });
  }

  /**
   * Chat limiter, per account, instance and client IP
   */
  static chatPerInstance(maxRequests: number = 30): RateLimiter {
    return new RateLimiter({
      windowMs: 60 * 1000, // 1 minute
      maxRequests,
      keyGenerator: (req: Request) => {
        const account = req.params['account'];
        const instance = req.params['instance'];
        return account && instance ? `chat:${account}/${instance}:${ipKey(req)}` : ipKey(req);
      },
    });
  }
}
