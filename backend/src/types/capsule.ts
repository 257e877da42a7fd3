/**
 * Capsule ledger domain types
 */

/** Authenticated identity handle (creator, recipient, owner, escrow account). */
export type Principal = string;

export interface Capsule {
  id: number;
  creator: Principal;
  recipient: Principal;
  payload: string;
  value: number;
  unlockTime: number;
  createdAt: number;
  openedAt: number | null;
  isConsumed: boolean;
  kind: string;
  metadata: string | null;
  isPublic: boolean;
}

export const AUDIT_ACTIONS = [
  'created',
  'opened',
  'previewed',
  'funds-added',
  'message-updated',
  'time-extended',
  'emergency-withdraw',
  'cancelled',
] as const;

export type AuditAction = (typeof AUDIT_ACTIONS)[number];

/**
 * Latest access event for a capsule. Only one is kept per capsule.
 */
export interface AuditEntry {
  capsuleId: number;
  actor: Principal;
  time: number;
  action: AuditAction;
}

export interface LedgerCounters {
  nonce: number;
  totalCapsules: number;
  totalValueLocked: number;
  totalOpened: number;
  paused: boolean;
}

export interface IndexAppend {
  principal: Principal;
  position: number;
  capsuleId: number;
}

/**
 * Everything one committed transaction wrote, in the shape the repository persists.
 */
export interface LedgerChangeSet {
  capsules: Capsule[];
  indexAppends: IndexAppend[];
  auditEntries: AuditEntry[];
  publicIds: number[];
  counters: LedgerCounters;
}

export interface LedgerSnapshot {
  capsules: Capsule[];
  index: IndexAppend[];
  auditEntries: AuditEntry[];
  publicIds: number[];
  counters: LedgerCounters;
}

export interface CreateCapsuleInput {
  recipient: Principal;
  payload: string;
  value: number;
  delay: number;
  kind: string;
  isPublic: boolean;
  metadata?: string | null;
}

export interface CreateGroupInput {
  recipients: Principal[];
  payload: string;
  valuePerRecipient: number;
  delay: number;
  metadata?: string | null;
}

export interface PreviewRecord {
  payload: string;
  creator: Principal;
  value: number;
  createdAt: number;
  kind: string;
  metadata: string | null;
}

export interface CancelResult {
  refund: number;
  penalty: number;
}

export type CapsuleStatus =
  | { state: 'locked'; unlockTime: number; blocksRemaining: number }
  | { state: 'unlockable'; unlockTime: number }
  | { state: 'consumed'; openedAt: number | null };

export interface LedgerStats extends LedgerCounters {
  escrowBalance: number;
  withdrawablePenalties: number;
}

/**
 * How the two emergency-withdraw conditions (far-future unlock, freshly created) combine.
 */
export type EmergencyWithdrawRule = 'all' | 'any';
