import { Request, Response, NextFunction } from 'express';
import { AppError } from '@helpdesk/shared-kernel';

interface WindowEntry {
  count: number;
  resetTime: number;
}

export interface RateLimitOptions {
  windowMs: number;
  max: number;
  /** Picks the bucket for a request; requests without a key are not limited. */
  keyOf: (req: Request) => string | undefined;
  now?: () => number;
}

/** Fixed-window request limit per key. */
export function rateLimit(options: RateLimitOptions) {
  const windows = new Map<string, WindowEntry>();
  const now = options.now ?? Date.now;

  function cleanup(at: number): void {
    for (const [key, entry] of windows.entries()) {
      if (entry.resetTime <= at) windows.delete(key);
    }
  }

  return (req: Request, res: Response, next: NextFunction) => {
    const key = options.keyOf(req);
    if (!key) {
      next();
      return;
    }

    const at = now();
    cleanup(at);
    const entry = windows.get(key);
    if (!entry) {
      windows.set(key, { count: 1, resetTime: at + options.windowMs });
      next();
      return;
    }

    if (entry.count >= options.max) {
      res.setHeader('Retry-After', String(Math.ceil((entry.resetTime - at) / 1000)));
      next(new AppError(429, 'RATE_LIMITED', 'Too many messages, please slow down'));
      return;
    }

    entry.count += 1;
    next();
  };
}
