/**
 * Capsule API Router
 * Lifecycle writes need a caller principal; reads accept anonymous callers
 */

import { Router } from 'express';
import { optionalPrincipal, requirePrincipal } from '../../middleware/auth';
import { writeLimiter } from '../../middleware/rateLimit';
import { asyncHandler, CapsuleController } from './controller';
import type { CapsuleLedger } from '../../services/capsuleLedger';

export function createCapsuleRouter(ledger: CapsuleLedger): Router {
  const router = Router();
  const controller = new CapsuleController(ledger);

  // Static paths first so they are not captured by :capsuleId
  router.get('/public', asyncHandler(controller.listPublic));
  router.post('/group', requirePrincipal, writeLimiter, asyncHandler(controller.createGroup));
  router.post('/', requirePrincipal, writeLimiter, asyncHandler(controller.create));

  router.get('/:capsuleId', optionalPrincipal, asyncHandler(controller.get));
  router.get('/:capsuleId/audit', asyncHandler(controller.audit));

  router.post('/:capsuleId/open', requirePrincipal, writeLimiter, asyncHandler(controller.open));
  router.post('/:capsuleId/preview', requirePrincipal, asyncHandler(controller.preview));
  router.post('/:capsuleId/funds', requirePrincipal, writeLimiter, asyncHandler(controller.addFunds));
  router.patch('/:capsuleId/payload', requirePrincipal, writeLimiter, asyncHandler(controller.updatePayload));
  router.post('/:capsuleId/extend', requirePrincipal, writeLimiter, asyncHandler(controller.extend));
  router.post('/:capsuleId/emergency-withdraw', requirePrincipal, writeLimiter, asyncHandler(controller.emergencyWithdraw));
  router.post('/:capsuleId/cancel', requirePrincipal, writeLimiter, asyncHandler(controller.cancel));

  return router;
}

/**
 * Ledger-wide reads: per-principal capsule index and aggregate stats
 */
export function createLedgerRouter(ledger: CapsuleLedger): Router {
  const router = Router();
  const controller = new CapsuleController(ledger);

  router.get('/principals/:principal/capsules', asyncHandler(controller.listForPrincipal));
  router.get('/ledger/stats', asyncHandler(controller.stats));

  return router;
}

/**
 * Owner-only controls
 */
export function createAdminRouter(ledger: CapsuleLedger): Router {
  const router = Router();
  const controller = new CapsuleController(ledger);

  router.use(requirePrincipal);
  router.post('/pause', asyncHandler(controller.togglePause));
  router.post('/withdraw-penalties', asyncHandler(controller.withdrawPenalties));

  return router;
}
