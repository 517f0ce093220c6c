/**
 * Authentication middleware - Checks the static API bearer token
 */

import { timingSafeEqual } from 'crypto';
import { Request, Response, NextFunction } from 'express';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const authLogger = logger.child({ middleware: 'auth' });

function tokensMatch(given: string, expected: string): boolean {
  const a = Buffer.from(given);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

export interface AuthOptions {
  apiToken: string;
  /** Let every request through (development mode) */
  bypass: boolean;
}

export function createAuthMiddleware(options: AuthOptions) {
  return (req: Request, res: Response, next: NextFunction): void => {
    // Skip auth in development mode for testing
    if (options.bypass) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;

    if (!authHeader?.startsWith('Bearer ')) {
      res.status(401).json({ error: 'Missing or invalid authorization header' });
      return;
    }

    if (!options.apiToken || !tokensMatch(authHeader.slice(7), options.apiToken)) {
      authLogger.warn({ path: req.path }, 'Invalid token');
      res.status(401).json({ error: 'Invalid token' });
      return;
    }

    next();
  };
}

export const authMiddleware = createAuthMiddleware({
  apiToken: config.apiToken,
  bypass: config.nodeEnv === 'development',
});
