/**
 * Authentication middleware - Validates the import API bearer token
 */

import { timingSafeEqual } from 'crypto';
import type { Request, Response, NextFunction } from 'express';
import { config } from '../../config/index.js';
import { logger } from '../../utils/logger.js';

const authLogger = logger.child({ middleware: 'auth' });

export interface AuthSettings {
  disabled: boolean;
  token: string;
}

export interface AuthRejection {
  status: 401 | 503;
  error: string;
}

function tokensMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Null when the Authorization header grants access
 */
export function checkAuthorization(header: string | undefined, settings: AuthSettings): AuthRejection | null {
  if (settings.disabled) {
    return null;
  }

  if (!settings.token) {
    return { status: 503, error: 'Import API is not configured' };
  }

  if (!header?.startsWith('Bearer ')) {
    return { status: 401, error: 'Missing or invalid authorization header' };
  }

  if (!tokensMatch(header.slice(7), settings.token)) {
    return { status: 401, error: 'Invalid token' };
  }

  return null;
}

export function authMiddleware(req: Request, res: Response, next: NextFunction): void {
  const rejection = checkAuthorization(req.headers.authorization, {
    disabled: config.authDisabled,
    token: config.importApiToken,
  });

  if (rejection) {
    authLogger.warn({ path: req.path, status: rejection.status }, rejection.error);
    res.status(rejection.status).json({ error: rejection.error });
    return;
  }

  next();
}
