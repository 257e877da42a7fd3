/**
 * Validation Schemas for Capsule API
 * Using Zod for type-safe validation
 */

import { z } from 'zod';
import { principalPattern } from '../../utils/sanitize';
import {
  MAX_GROUP_RECIPIENTS,
  MAX_KIND_LENGTH,
  MAX_METADATA_LENGTH,
  MAX_PAYLOAD_LENGTH,
} from '../../services/capsuleLedger';

const principal = z.string().trim().regex(principalPattern, 'Invalid principal format');
const amount = z.number().int('Amount must be a whole number').nonnegative('Amount must be >= 0').max(Number.MAX_SAFE_INTEGER);
const blocks = z.number().int('Delay must be a whole number of blocks').positive('Delay must be greater than 0').max(Number.MAX_SAFE_INTEGER);
// Length limits in code points are enforced by the ledger; these bound request size
const payload = z.string().min(1, 'Payload is required').max(MAX_PAYLOAD_LENGTH * 2, 'Payload too long');
const metadata = z.string().max(MAX_METADATA_LENGTH * 2, 'Metadata too long').nullable().optional();

export const createCapsuleSchema = z.object({
  recipient: principal,
  payload,
  value: amount.default(0),
  delay: blocks,
  kind: z.string().max(MAX_KIND_LENGTH * 2, 'Kind too long').default('gift'),
  isPublic: z.boolean().default(false),
  metadata,
});

export const createGroupSchema = z.object({
  recipients: z.array(principal)
    .min(1, 'At least one recipient is required')
    .max(MAX_GROUP_RECIPIENTS, `At most ${MAX_GROUP_RECIPIENTS} recipients`),
  payload,
  valuePerRecipient: amount.default(0),
  delay: blocks,
  metadata,
});

export const addFundsSchema = z.object({
  amount: amount.positive('Amount must be greater than 0'),
});

export const updatePayloadSchema = z.object({
  payload,
});

export const extendUnlockSchema = z.object({
  additionalDelay: blocks,
});

export const withdrawPenaltiesSchema = z.object({
  amount: amount.positive('Amount must be greater than 0'),
});

export const capsuleIdParamsSchema = z.object({
  capsuleId: z.coerce.number().int().positive('Capsule ID must be a positive integer').max(Number.MAX_SAFE_INTEGER),
});

export const principalParamsSchema = z.object({
  principal,
});

export const paginationQuerySchema = z.object({
  offset: z.coerce.number().int().nonnegative().default(0),
  limit: z.coerce.number().int().min(1).max(100).default(50),
});
