/**
 * Rate Limiting Middleware
 * Protects the ledger from request floods
 */

import rateLimit, { ipKeyGenerator } from 'express-rate-limit';
import { Request, Response } from 'express';
import { logger } from '../utils/logger';
import { PRINCIPAL_HEADER } from './auth';

/**
 * Principal when the request carries one, otherwise the client IP
 */
export function principalOrIpKey(req: Request): string {
  if (req.principal) {
    return `principal:${req.principal}`;
  }
  const ip = req.ip || req.socket.remoteAddress || '';
  return ipKeyGenerator(ip);
}

/**
 * Rate limiter for general API endpoints
 * 300 requests per IP per minute
 */
export const apiLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 300,
  standardHeaders: true,
  legacyHeaders: false,
  handler: (req: Request, res: Response) => {
    logger.warn('Rate limit exceeded for API', { ip: req.ip, path: req.path });
    res.status(429).json({
      error: 'Too many requests',
      message: 'Please slow down and try again in a minute.',
    });
  },
});

/**
 * Rate limiter for ledger writes
 * 30 writes per principal per minute
 */
export const writeLimiter = rateLimit({
  windowMs: 60 * 1000,
  max: 30,
  standardHeaders: true,
  legacyHeaders: false,
  keyGenerator: principalOrIpKey,
  handler: (req: Request, res: Response) => {
    logger.warn('Rate limit exceeded for ledger writes', {
      ip: req.ip,
      principal: req.header(PRINCIPAL_HEADER),
      path: req.path,
    });
    res.status(429).json({
      error: 'Too many ledger writes',
      message: 'Please try again in a minute.',
    });
  },
});
