/**
 * Authentication middleware for JWT token validation
 */

import { Request, Response, NextFunction } from 'express';
import jwt from 'jsonwebtoken';

export interface AuthenticatedUser {
  id: string;
  email?: string;
  token: string;
}

export interface AuthenticatedRequest extends Request {
  user?: AuthenticatedUser;
}

function extractBearerToken(req: Request): string | undefined {
  const authHeader = req.headers['authorization'];
  if (!authHeader) {
    return undefined;
  }
  const [scheme, token] = authHeader.split(' ');
  return scheme?.toLowerCase() === 'bearer' && token ? token : undefined;
}

/**
 * Resolve the user from a verified payload. Issuers disagree on the claim,
 * so user_id, id and sub are all accepted.
 */
export function userFromPayload(payload: string | jwt.JwtPayload, token: string): AuthenticatedUser | null {
  if (typeof payload === 'string') {
    return null;
  }
  const candidate = payload.user_id ?? payload.id ?? payload.sub;
  if (typeof candidate !== 'string' && typeof candidate !== 'number') {
    return null;
  }
  return {
    id: String(candidate),
    email: typeof payload.email === 'string' ? payload.email : undefined,
    token
  };
}

/**
 * Middleware to authenticate JWT tokens
 */
export function authenticateToken(jwtSecret: string) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req);

    if (!token) {
      res.status(401).json({
        error: 'Access token required',
        message: 'Please provide a valid access token'
      });
      return;
    }

    try {
      const user = userFromPayload(jwt.verify(token, jwtSecret), token);
      if (!user) {
        res.status(401).json({
          error: 'Invalid token',
          message: 'User ID not found in token'
        });
        return;
      }
      req.user = user;
      next();
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        res.status(401).json({
          error: 'Token expired',
          message: 'Access token has expired. Please refresh your token.'
        });
      } else if (error instanceof jwt.JsonWebTokenError) {
        res.status(403).json({
          error: 'Invalid token',
          message: 'Access token is invalid'
        });
      } else {
        res.status(500).json({
          error: 'Authentication error',
          message: 'Unable to authenticate token'
        });
      }
    }
  };
}

/**
 * Optional authentication middleware - doesn't fail if no token provided
 */
export function optionalAuth(jwtSecret: string) {
  return (req: AuthenticatedRequest, res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req);

    if (!token) {
      next();
      return;
    }

    try {
      const user = userFromPayload(jwt.verify(token, jwtSecret), token);
      if (user) {
        req.user = user;
      }
    } catch (error) {
      // Ignore token errors in optional auth
      console.warn('Optional auth token validation failed:', error instanceof Error ? error.message : error);
    }

    next();
  };
}
