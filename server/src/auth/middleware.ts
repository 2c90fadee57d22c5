import { Request, Response, NextFunction, RequestHandler } from 'express';
import { Account } from '../db/types';
import { UnauthorizedError, sendErrorResponse } from '../utils/errors';
import { AuthorizationService, assertAuthorized } from './authorizationService';
import { AuthResolver, SessionTokenResolver, extractBearerToken } from './tokenResolver';
import './requestContext';

/**
 * Build an authentication middleware around a credential resolver.
 */
export function createRequireAuth(resolver: AuthResolver): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    const token = extractBearerToken(req.headers.authorization);
    if (!token) {
      sendErrorResponse(res, new UnauthorizedError(), 'authenticating request');
      return;
    }

    const account = resolver.resolve(token);
    if (!account) {
      sendErrorResponse(res, new UnauthorizedError('Invalid or expired token'), 'authenticating request');
      return;
    }

    req.account = account;
    req.sessionToken = token;
    next();
  };
}

export const requireAuth: RequestHandler = createRequireAuth(new SessionTokenResolver());

export function requireAdmin(req: Request, res: Response, next: NextFunction): void {
  requireAuth(req, res, () => {
    try {
      assertAuthorized(AuthorizationService.checkAdminAccess(getActor(req)));
    } catch (error) {
      sendErrorResponse(res, error, 'authorizing request');
      return;
    }
    next();
  });
}

/**
 * The authenticated account of a request that went through requireAuth.
 * @throws UnauthorizedError when the request carries none
 */
export function getActor(req: Request): Account {
  if (!req.account) {
    throw new UnauthorizedError();
  }
  return req.account;
}

/**
 * The bearer token the request was authenticated with.
 * @throws UnauthorizedError when the request carries none
 */
export function getSessionToken(req: Request): string {
  if (!req.sessionToken) {
    throw new UnauthorizedError();
  }
  return req.sessionToken;
}
