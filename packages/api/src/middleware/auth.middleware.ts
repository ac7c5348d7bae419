import type { NextFunction, Request, RequestHandler, Response } from 'express';
import { AuthenticationError } from '../utils/errors.js';
import { verifyJWT } from '../utils/auth.utils.js';
import { createLogger } from '../utils/logger.js';

export interface AuthenticatedUser {
  id: string;
  email?: string;
}

declare global {
  namespace Express {
    interface Request {
      user?: AuthenticatedUser;
    }
  }
}

const logger = createLogger('Auth');

/**
 * Bearer-token authentication for the operator API. Rejected requests go to
 * the error handler as AuthenticationError (401).
 */
export const authenticate = (secret: string): RequestHandler =>
  (req: Request, _res: Response, next: NextFunction): void => {
    const authHeader = req.headers.authorization;
    if (!authHeader || !authHeader.startsWith('Bearer ')) {
      next(new AuthenticationError('No token provided'));
      return;
    }

    const payload = verifyJWT(authHeader.slice('Bearer '.length), secret);
    if (!payload) {
      logger.warn(`Rejected invalid token for ${req.method} ${req.originalUrl}`);
      next(new AuthenticationError('Invalid token'));
      return;
    }

    req.user = { id: payload.userId, email: payload.email };
    next();
  };
