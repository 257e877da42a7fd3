/**
 * Authentication Middleware
 * API key check plus the caller principal carried in the x-user-address header
 *
 * The API key authenticates the calling service; that service vouches for the
 * principal it forwards. Verifying end-user identity happens upstream.
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { timingSafeEqual } from 'crypto';
import { AuthenticationError } from '../types/errors';
import { sanitizePrincipal } from '../utils/sanitize';
import type { Principal } from '../types/capsule';

declare global {
  // eslint-disable-next-line @typescript-eslint/no-namespace
  namespace Express {
    interface Request {
      principal?: Principal;
    }
  }
}

export const PRINCIPAL_HEADER = 'x-user-address';

function keysMatch(provided: string, expected: string): boolean {
  const a = Buffer.from(provided);
  const b = Buffer.from(expected);
  return a.length === b.length && timingSafeEqual(a, b);
}

/**
 * API Key Authentication Middleware
 * Without a configured key every request passes (local development)
 */
export function apiKeyAuth(expectedApiKey: string | undefined): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    if (!expectedApiKey) {
      return next();
    }

    const apiKey = req.header('x-api-key');
    if (!apiKey || !keysMatch(apiKey, expectedApiKey)) {
      res.status(401).json({
        error: 'Unauthorized',
        message: 'Invalid or missing API key',
        details: 'Please provide a valid API key in the X-API-Key header',
      });
      return;
    }

    next();
  };
}

/**
 * Attach the caller principal to the request; rejects requests without one
 */
export function requirePrincipal(req: Request, _res: Response, next: NextFunction): void {
  const header = req.header(PRINCIPAL_HEADER);
  if (!header) {
    return next(new AuthenticationError(`Missing ${PRINCIPAL_HEADER} header`));
  }

  try {
    req.principal = sanitizePrincipal(header, PRINCIPAL_HEADER);
    next();
  } catch (error) {
    next(error);
  }
}

/**
 * Attach the caller principal when one is present; anonymous reads pass
 */
export function optionalPrincipal(req: Request, res: Response, next: NextFunction): void {
  if (!req.header(PRINCIPAL_HEADER)) {
    return next();
  }
  requirePrincipal(req, res, next);
}

/**
 * Caller principal set by requirePrincipal
 */
export function callerOf(req: Request): Principal {
  if (!req.principal) {
    throw new AuthenticationError();
  }
  return req.principal;
}
