/**
 * CORS middleware - Only allows requests from whitelisted domains
 */

import cors from 'cors';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const corsLogger = logger.child({ middleware: 'cors' });

export const corsMiddleware = cors({
  origin: (origin, callback) => {
    // Allow requests with no origin (schedulers, curl)
    if (!origin) {
      callback(null, true);
      return;
    }

    const isAllowed = config.allowedOrigins.some((allowed) => {
      // Handle wildcard localhost
      if (allowed.startsWith('http://localhost')) {
        return origin.startsWith('http://localhost');
      }
      return origin === allowed;
    });

    if (isAllowed) {
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
