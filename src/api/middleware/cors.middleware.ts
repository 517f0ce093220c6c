/**
 * CORS middleware - Only allows requests from listed origins
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const corsLogger = logger.child({ middleware: 'cors' });

/**
 * Exact match, any localhost port for a localhost entry,
 * or a subdomain of an https entry
 */
export function isOriginAllowed(origin: string, allowedOrigins: readonly string[]): boolean {
  return allowedOrigins.some((allowed) => {
    if (allowed.startsWith('http://localhost')) {
      return origin.startsWith('http://localhost');
    }
    return origin === allowed || (allowed.startsWith('https://') && origin.endsWith(allowed.replace('https://', '.')));
  });
}

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Allow requests with no origin (like curl or the CLI)
    if (!origin) {
      callback(null, true);
      return;
    }

    if (isOriginAllowed(origin, config.allowedOrigins)) {
      callback(null, true);
    } else {
      corsLogger.warn({ origin }, 'Blocked request from unauthorized origin');
      callback(new Error('Not allowed by CORS'));
    }
  },
  methods: ['GET', 'POST', 'OPTIONS'],
  allowedHeaders: ['Content-Type', 'Authorization'],
  maxAge: 86400, // 24 hours
});
