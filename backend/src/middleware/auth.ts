/**
 * Authentication Middleware
 * Bearer-token guard for the operator control surface
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import logger from '../utils/logger';

function tokensMatch(expected: string, provided: string): boolean {
  const a = Buffer.from(expected);
  const b = Buffer.from(provided);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * Require `Authorization: Bearer <token>` when a token is configured.
 * Without one the control surface is open (local deployments).
 */
export function authenticate(expectedToken?: string): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedToken) {
      next();
      return;
    }

    const authHeader = req.headers.authorization;
    if (!authHeader) {
      res.status(401).json({
        success: false,
        error: 'No authorization token provided'
      });
      return;
    }

    const token = authHeader.startsWith('Bearer ') ? authHeader.slice(7) : authHeader;
    if (!tokensMatch(expectedToken, token)) {
      logger.warn(`Rejected control request ${req.method} ${req.path}: invalid token`);
      res.status(401).json({
        success: false,
        error: 'Invalid authorization token'
      });
      return;
    }

    next();
  };
}
