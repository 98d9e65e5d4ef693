import type { NextFunction, Request, RequestHandler, Response } from 'express';
import jwt, { type JwtPayload } from 'jsonwebtoken';

import { AuthenticationError, AuthorizationError } from './errors';
import { tokenPayloadSchema, type TokenPayload } from './schema';

export type CallerIdentity = TokenPayload;

declare global {
  namespace Express {
    interface Request {
      caller?: CallerIdentity;
    }
  }
}

export type AccessDecision =
  | { allowed: true }
  | { allowed: false; reason: 'unauthenticated' | 'unauthorized' };

/**
 * Access predicate for privileged endpoints: allowed iff there is a caller and
 * its role equals the privileged role. No side effects.
 */
export function evaluateAccess(caller: CallerIdentity | undefined, privilegedRole: string): AccessDecision {
  if (!caller) {
    return { allowed: false, reason: 'unauthenticated' };
  }
  if (caller.role !== privilegedRole) {
    return { allowed: false, reason: 'unauthorized' };
  }
  return { allowed: true };
}

export function verifyAccessToken(token: string, secret: string): CallerIdentity {
  let decoded: string | JwtPayload;
  try {
    decoded = jwt.verify(token, secret, { algorithms: ['HS256'] });
  } catch (error) {
    const message = error instanceof jwt.TokenExpiredError ? 'Access token expired' : 'Invalid access token';
    throw new AuthenticationError(message, 'AUTH_TOKEN_INVALID');
  }

  const payload = tokenPayloadSchema.safeParse(decoded);
  if (!payload.success) {
    throw new AuthenticationError('Invalid access token', 'AUTH_TOKEN_INVALID');
  }
  return payload.data;
}

/*
  Reads the Bearer token and sets req.caller. Identity comes from the token
  claims alone, so authentication costs no database round trip.
*/
export function authenticateToken(secret: string): RequestHandler {
  return (req: Request, _res: Response, next: NextFunction) => {
    const authHeader = req.headers['authorization'];
    const [scheme, token] = authHeader ? authHeader.split(' ') : [];

    if (scheme !== 'Bearer' || !token) {
      next(new AuthenticationError('Access token required'));
      return;
    }

    try {
      req.caller = verifyAccessToken(token, secret);
      next();
    } catch (error) {
      next(error);
    }
  };
}

/**
 * Gate for a whole router: authenticates the caller and applies evaluateAccess.
 * Mount once with `router.use(requireRole(...))` rather than per route.
 */
export function requireRole(role: string, secret: string): RequestHandler[] {
  const guard: RequestHandler = (req, _res, next) => {
    const decision = evaluateAccess(req.caller, role);
    if (decision.allowed) {
      next();
    } else if (decision.reason === 'unauthenticated') {
      next(new AuthenticationError('Access token required'));
    } else {
      next(new AuthorizationError());
    }
  };

  return [authenticateToken(secret), guard];
}
