/**
 * Capsule Controller
 * Request handlers over the ledger's operation surface
 */

import { Request, Response, NextFunction, RequestHandler } from 'express';
import { callerOf } from '../../middleware/auth';
import { logger } from '../../utils/logger';
import type { CapsuleLedger } from '../../services/capsuleLedger';
import type { Capsule } from '../../types/capsule';
import {
  addFundsSchema,
  capsuleIdParamsSchema,
  createCapsuleSchema,
  createGroupSchema,
  extendUnlockSchema,
  paginationQuerySchema,
  principalParamsSchema,
  updatePayloadSchema,
  withdrawPenaltiesSchema,
} from '../schemas/capsule.schemas';

type AsyncHandler = (req: Request, res: Response) => Promise<void>;

/**
 * Forward rejections to the error middleware
 */
export function asyncHandler(handler: AsyncHandler): RequestHandler {
  return (req: Request, res: Response, next: NextFunction): void => {
    handler(req, res).catch(next);
  };
}

/**
 * Public view of a capsule. The payload is only shown to its creator;
 * recipients read it through preview or open.
 */
export function presentCapsule(capsule: Capsule, viewer: string | undefined): Omit<Capsule, 'payload'> & { payload?: string } {
  const { payload, ...rest } = capsule;
  return viewer === capsule.creator ? { ...rest, payload } : rest;
}

export class CapsuleController {
  constructor(private readonly ledger: CapsuleLedger) {}

  create: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const body = createCapsuleSchema.parse(req.body);
    const capsuleId = await this.ledger.createCapsule(caller, body);
    const capsule = this.ledger.getCapsule(capsuleId);

    logger.info('Capsule created', { capsuleId, principal: caller, recipient: body.recipient, value: body.value });
    res.status(201).json({
      success: true,
      capsuleId,
      unlockTime: capsule.unlockTime,
    });
  };

  createGroup: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const body = createGroupSchema.parse(req.body);
    const previousId = await this.ledger.createGroup(caller, body);
    const capsuleIds = body.recipients.map((_, offset) => previousId + offset + 1);

    logger.info('Group capsules created', { principal: caller, capsuleIds });
    res.status(201).json({
      success: true,
      previousId,
      capsuleIds,
    });
  };

  get: AsyncHandler = async (req, res) => {
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const capsule = this.ledger.getCapsule(capsuleId);
    const status = await this.ledger.getCapsuleStatus(capsuleId);

    res.json({
      capsule: presentCapsule(capsule, req.principal),
      status,
    });
  };

  audit: AsyncHandler = async (req, res) => {
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    res.json({ capsuleId, entry: this.ledger.getAuditEntry(capsuleId) });
  };

  open: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    await this.ledger.openCapsule(caller, capsuleId);
    const capsule = this.ledger.getCapsule(capsuleId);

    res.json({
      success: true,
      capsuleId,
      value: capsule.value,
      payload: capsule.payload,
      openedAt: capsule.openedAt,
    });
  };

  preview: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const preview = await this.ledger.previewCapsule(caller, capsuleId);
    res.json({ success: true, capsuleId, preview });
  };

  addFunds: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const { amount } = addFundsSchema.parse(req.body);
    await this.ledger.addFunds(caller, capsuleId, amount);
    res.json({ success: true, capsuleId, value: this.ledger.getCapsule(capsuleId).value });
  };

  updatePayload: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const { payload } = updatePayloadSchema.parse(req.body);
    await this.ledger.updatePayload(caller, capsuleId, payload);
    res.json({ success: true, capsuleId });
  };

  extend: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const { additionalDelay } = extendUnlockSchema.parse(req.body);
    const unlockTime = await this.ledger.extendUnlock(caller, capsuleId, additionalDelay);
    res.json({ success: true, capsuleId, unlockTime });
  };

  emergencyWithdraw: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const withdrawn = await this.ledger.emergencyWithdraw(caller, capsuleId);

    logger.warn('Emergency withdrawal', { capsuleId, principal: caller, withdrawn });
    res.json({ success: true, capsuleId, withdrawn });
  };

  cancel: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { capsuleId } = capsuleIdParamsSchema.parse(req.params);
    const { refund, penalty } = await this.ledger.cancelCapsule(caller, capsuleId);
    res.json({ success: true, capsuleId, refund, penalty });
  };

  listPublic: AsyncHandler = async (_req, res) => {
    res.json({ capsuleIds: this.ledger.listPublicCapsules() });
  };

  listForPrincipal: AsyncHandler = async (req, res) => {
    const { principal } = principalParamsSchema.parse(req.params);
    const { offset, limit } = paginationQuerySchema.parse(req.query);
    const { total, ids } = this.ledger.getCapsuleIdsFor(principal, offset, limit);
    res.json({ principal, total, offset, limit, capsuleIds: ids });
  };

  stats: AsyncHandler = async (_req, res) => {
    const stats = await this.ledger.getStats();
    res.json({ ...stats, reconciliation: this.ledger.reconcile() });
  };

  togglePause: AsyncHandler = async (req, res) => {
    const paused = await this.ledger.togglePause(callerOf(req));
    logger.warn('Ledger pause toggled', { paused, principal: req.principal });
    res.json({ success: true, paused });
  };

  withdrawPenalties: AsyncHandler = async (req, res) => {
    const caller = callerOf(req);
    const { amount } = withdrawPenaltiesSchema.parse(req.body);
    const withdrawn = await this.ledger.withdrawPenalties(caller, amount);
    res.json({ success: true, withdrawn });
  };
}
