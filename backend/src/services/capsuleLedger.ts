/**
 * Capsule Ledger
 * Time-locked custody of value and payloads. Every write runs as one serialized
 * transaction: validate, stage, persist, move funds, then publish the new state.
 */

import { logger, type Logger } from '../utils/logger';
import { SerialQueue } from '../utils/serialQueue';
import { codePointLength, getErrorMessage } from '../types/common';
import {
  AlreadyConsumedError,
  CapsuleLimitExceededError,
  InvalidAmountError,
  InvalidPayloadError,
  InvalidRecipientError,
  InvalidUnlockTimeError,
  isAppError,
  NotFoundError,
  StillLockedError,
  TransferFailedError,
  UnauthorizedError,
} from '../types/errors';
import type {
  AuditAction,
  AuditEntry,
  CancelResult,
  Capsule,
  CapsuleStatus,
  CreateCapsuleInput,
  CreateGroupInput,
  EmergencyWithdrawRule,
  LedgerStats,
  PreviewRecord,
  Principal,
} from '../types/capsule';
import { LedgerState, LedgerTransaction } from './ledgerState';
import { InMemoryLedgerRepository, type LedgerRepository } from '../db/ledgerRepository';
import type { TimeSource } from './clock';
import type { ValueTransfer } from './bank';

export const MAX_CAPSULES_PER_PRINCIPAL = 100;
export const MAX_PAYLOAD_LENGTH = 1000;
export const MAX_METADATA_LENGTH = 500;
export const MAX_KIND_LENGTH = 20;
export const MAX_GROUP_RECIPIENTS = 10;
export const GROUP_KIND = 'group';

// Ten-minute blocks
export const BLOCKS_PER_DAY = 144;
export const BLOCKS_PER_YEAR = 52560;

export const CANCEL_PENALTY_DIVISOR = 10;

export interface CapsuleLedgerOptions {
  owner: Principal;
  escrowAccount: Principal;
  clock: TimeSource;
  bank: ValueTransfer;
  repository?: LedgerRepository;
  emergencyWithdrawRule?: EmergencyWithdrawRule;
  /** Apply the per-principal capsule limit to group creation as well. */
  enforceGroupCapsuleLimit?: boolean;
}

interface PendingTransfer {
  amount: number;
  from: Principal;
  to: Principal;
}

interface TransactionContext {
  tx: LedgerTransaction;
  now: number;
  /** Queue a transfer; it runs only after every precondition has passed. */
  transfer(amount: number, from: Principal, to: Principal): void;
}

function checkedAdd(a: number, b: number, what: string): number {
  const sum = a + b;
  if (!Number.isSafeInteger(sum)) {
    throw new InvalidAmountError(`${what} overflows`, { a, b });
  }
  return sum;
}

function requireDelay(delay: number): void {
  if (!Number.isSafeInteger(delay) || delay <= 0) {
    throw new InvalidUnlockTimeError('Delay must be a positive whole number of blocks');
  }
}

function requireAmount(amount: number, allowZero: boolean): void {
  if (!Number.isSafeInteger(amount) || amount < 0 || (!allowZero && amount === 0)) {
    throw new InvalidAmountError(allowZero ? 'Amount must be a non-negative integer' : 'Amount must be a positive integer', {
      amount,
    });
  }
}

function requirePayload(payload: string): void {
  if (payload.length === 0) {
    throw new InvalidPayloadError('Payload must not be empty');
  }
  if (codePointLength(payload) > MAX_PAYLOAD_LENGTH) {
    throw new InvalidPayloadError(`Payload exceeds ${MAX_PAYLOAD_LENGTH} characters`);
  }
}

function requireDescriptors(kind: string, metadata: string | null): void {
  if (codePointLength(kind) > MAX_KIND_LENGTH) {
    throw new InvalidPayloadError(`Kind exceeds ${MAX_KIND_LENGTH} characters`, 'kind');
  }
  if (metadata !== null && codePointLength(metadata) > MAX_METADATA_LENGTH) {
    throw new InvalidPayloadError(`Metadata exceeds ${MAX_METADATA_LENGTH} characters`, 'metadata');
  }
}

export class CapsuleLedger {
  readonly owner: Principal;
  readonly escrowAccount: Principal;
  private readonly clock: TimeSource;
  private readonly bank: ValueTransfer;
  private readonly repository: LedgerRepository;
  private readonly emergencyWithdrawRule: EmergencyWithdrawRule;
  private readonly enforceGroupCapsuleLimit: boolean;
  private readonly queue = new SerialQueue();
  private readonly state: LedgerState;

  constructor(options: CapsuleLedgerOptions, state: LedgerState = new LedgerState()) {
    if (options.owner === options.escrowAccount) {
      throw new Error('Owner and escrow account must differ');
    }
    this.owner = options.owner;
    this.escrowAccount = options.escrowAccount;
    this.clock = options.clock;
    this.bank = options.bank;
    this.repository = options.repository ?? new InMemoryLedgerRepository();
    this.emergencyWithdrawRule = options.emergencyWithdrawRule ?? 'all';
    this.enforceGroupCapsuleLimit = options.enforceGroupCapsuleLimit ?? false;
    this.state = state;
  }

  /**
   * Build a ledger from whatever the repository has persisted
   */
  static async open(options: CapsuleLedgerOptions): Promise<CapsuleLedger> {
    const repository = options.repository ?? new InMemoryLedgerRepository();
    const snapshot = await repository.load();
    const state = snapshot ? LedgerState.fromSnapshot(snapshot) : new LedgerState();
    return new CapsuleLedger({ ...options, repository }, state);
  }

  // ---------------------------------------------------------------------------
  // Operations
  // ---------------------------------------------------------------------------

  /**
   * Lock `value` and `payload` for `recipient` until `delay` blocks from now.
   * @returns the new capsule id
   */
  createCapsule(caller: Principal, input: CreateCapsuleInput): Promise<number> {
    return this.execute('create', caller, undefined, ({ tx, now, transfer }) => {
      const metadata = input.metadata ?? null;
      this.requireNotPaused(tx);
      if (input.recipient.length === 0 || input.recipient === caller) {
        throw new InvalidRecipientError('Recipient must differ from creator');
      }
      requireDelay(input.delay);
      requirePayload(input.payload);
      requireDescriptors(input.kind, metadata);
      requireAmount(input.value, true);
      if (tx.indexCount(caller) >= MAX_CAPSULES_PER_PRINCIPAL) {
        throw new CapsuleLimitExceededError(caller, MAX_CAPSULES_PER_PRINCIPAL);
      }

      transfer(input.value, caller, this.escrowAccount);
      return this.mint(tx, now, {
        creator: caller,
        recipient: input.recipient,
        payload: input.payload,
        value: input.value,
        delay: input.delay,
        kind: input.kind,
        isPublic: input.isPublic,
        metadata,
      });
    });
  }

  /**
   * Release an unlocked capsule's value to its recipient
   */
  openCapsule(caller: Principal, id: number): Promise<boolean> {
    return this.execute('open', caller, id, ({ tx, now, transfer }) => {
      const capsule = this.requireUnconsumed(tx, id);
      if (capsule.recipient !== caller) {
        throw new UnauthorizedError('Only the recipient can open this capsule', { capsuleId: id });
      }
      this.requireNotPaused(tx);
      if (now < capsule.unlockTime) {
        throw new StillLockedError(`Capsule ${id} unlocks at ${capsule.unlockTime}`, { unlockTime: capsule.unlockTime, now });
      }

      const counters = tx.counters();
      transfer(capsule.value, this.escrowAccount, capsule.recipient);
      // value stays on the record; consumption is read from isConsumed/openedAt
      tx.putCapsule({ ...capsule, isConsumed: true, openedAt: now });
      this.audit(tx, id, caller, now, 'opened');
      tx.updateCounters({
        totalOpened: counters.totalOpened + 1,
        totalValueLocked: counters.totalValueLocked - capsule.value,
      });
      return true;
    });
  }

  /**
   * Read an unlocked capsule's contents without consuming it. Records a `previewed` audit entry.
   */
  previewCapsule(caller: Principal, id: number): Promise<PreviewRecord> {
    return this.execute('preview', caller, id, ({ tx, now }) => {
      const capsule = this.requireCapsule(tx, id);
      if (capsule.recipient !== caller) {
        throw new UnauthorizedError('Only the recipient can preview this capsule', { capsuleId: id });
      }
      if (now < capsule.unlockTime) {
        throw new StillLockedError(`Capsule ${id} unlocks at ${capsule.unlockTime}`, { unlockTime: capsule.unlockTime, now });
      }

      this.audit(tx, id, caller, now, 'previewed');
      return {
        payload: capsule.payload,
        creator: capsule.creator,
        value: capsule.value,
        createdAt: capsule.createdAt,
        kind: capsule.kind,
        metadata: capsule.metadata,
      };
    });
  }

  addFunds(caller: Principal, id: number, amount: number): Promise<boolean> {
    return this.execute('add-funds', caller, id, ({ tx, now, transfer }) => {
      const capsule = this.requireUnconsumed(tx, id);
      this.requireCreator(capsule, caller);
      this.requireNotPaused(tx);
      requireAmount(amount, false);

      const counters = tx.counters();
      const value = checkedAdd(capsule.value, amount, 'Capsule value');
      const totalValueLocked = checkedAdd(counters.totalValueLocked, amount, 'Total value locked');

      transfer(amount, caller, this.escrowAccount);
      tx.putCapsule({ ...capsule, value });
      this.audit(tx, id, caller, now, 'funds-added');
      tx.updateCounters({ totalValueLocked });
      return true;
    });
  }

  /**
   * Replace the payload. Only while strictly before the unlock time.
   */
  updatePayload(caller: Principal, id: number, payload: string): Promise<boolean> {
    return this.execute('update-payload', caller, id, ({ tx, now }) => {
      const capsule = this.requireUnconsumed(tx, id);
      this.requireCreator(capsule, caller);
      this.requireNotPaused(tx);
      this.requireLocked(capsule, now);
      requirePayload(payload);

      tx.putCapsule({ ...capsule, payload });
      this.audit(tx, id, caller, now, 'message-updated');
      return true;
    });
  }

  /**
   * Push the unlock time later by `additionalDelay` blocks
   * @returns the new unlock time
   */
  extendUnlock(caller: Principal, id: number, additionalDelay: number): Promise<number> {
    return this.execute('extend-unlock', caller, id, ({ tx, now }) => {
      const capsule = this.requireUnconsumed(tx, id);
      this.requireCreator(capsule, caller);
      this.requireNotPaused(tx);
      this.requireLocked(capsule, now);
      requireDelay(additionalDelay);

      const unlockTime = checkedAdd(capsule.unlockTime, additionalDelay, 'Unlock time');
      tx.putCapsule({ ...capsule, unlockTime });
      this.audit(tx, id, caller, now, 'time-extended');
      return unlockTime;
    });
  }

  /**
   * Creator recovery of a freshly created, far-future capsule. Available while paused.
   * @returns the amount returned to the creator
   */
  emergencyWithdraw(caller: Principal, id: number): Promise<number> {
    return this.execute('emergency-withdraw', caller, id, ({ tx, now, transfer }) => {
      const capsule = this.requireUnconsumed(tx, id);
      this.requireCreator(capsule, caller);
      if (capsule.value <= 0) {
        throw new InvalidAmountError('Capsule holds no value to withdraw', { capsuleId: id });
      }
      if (!this.emergencyWindowOpen(capsule, now)) {
        throw new UnauthorizedError('Emergency withdrawal window is closed', {
          capsuleId: id,
          rule: this.emergencyWithdrawRule,
          blocksUntilUnlock: capsule.unlockTime - now,
          blocksSinceCreation: now - capsule.createdAt,
        });
      }

      const counters = tx.counters();
      transfer(capsule.value, this.escrowAccount, capsule.creator);
      tx.putCapsule({ ...capsule, isConsumed: true, openedAt: now, value: 0 });
      this.audit(tx, id, caller, now, 'emergency-withdraw');
      tx.updateCounters({ totalValueLocked: counters.totalValueLocked - capsule.value });
      return capsule.value;
    });
  }

  /**
   * Cancel before unlock: the creator gets the value back minus a 10% penalty,
   * which stays in escrow outside the tracked total.
   */
  cancelCapsule(caller: Principal, id: number): Promise<CancelResult> {
    return this.execute('cancel', caller, id, ({ tx, now, transfer }) => {
      const capsule = this.requireUnconsumed(tx, id);
      this.requireCreator(capsule, caller);
      this.requireNotPaused(tx);
      this.requireLocked(capsule, now);

      const penalty = Math.floor(capsule.value / CANCEL_PENALTY_DIVISOR);
      const refund = capsule.value - penalty;
      const counters = tx.counters();

      transfer(refund, this.escrowAccount, capsule.creator);
      tx.putCapsule({ ...capsule, isConsumed: true, openedAt: now });
      this.audit(tx, id, caller, now, 'cancelled');
      tx.updateCounters({ totalValueLocked: counters.totalValueLocked - capsule.value });
      return { refund, penalty };
    });
  }

  /**
   * One capsule per recipient, funded by a single aggregate intake.
   * @returns the id immediately preceding the first minted capsule; the minted
   * ids are the next `recipients.length` integers.
   */
  createGroup(caller: Principal, input: CreateGroupInput): Promise<number> {
    return this.execute('create-group', caller, undefined, ({ tx, now, transfer }) => {
      const metadata = input.metadata ?? null;
      this.requireNotPaused(tx);
      requireDelay(input.delay);
      requirePayload(input.payload);
      requireDescriptors(GROUP_KIND, metadata);
      if (input.recipients.length === 0 || input.recipients.some((recipient) => recipient.length === 0)) {
        throw new InvalidRecipientError('Recipient list must not be empty');
      }
      if (input.recipients.length > MAX_GROUP_RECIPIENTS) {
        throw new InvalidRecipientError(`At most ${MAX_GROUP_RECIPIENTS} recipients per group`);
      }
      requireAmount(input.valuePerRecipient, true);

      const total = input.valuePerRecipient * input.recipients.length;
      if (!Number.isSafeInteger(total)) {
        throw new InvalidAmountError('Group total overflows', { valuePerRecipient: input.valuePerRecipient });
      }

      const previousId = tx.counters().nonce;
      transfer(total, caller, this.escrowAccount);
      for (const recipient of input.recipients) {
        if (this.enforceGroupCapsuleLimit && tx.indexCount(caller) >= MAX_CAPSULES_PER_PRINCIPAL) {
          throw new CapsuleLimitExceededError(caller, MAX_CAPSULES_PER_PRINCIPAL);
        }
        this.mint(tx, now, {
          creator: caller,
          recipient,
          payload: input.payload,
          value: input.valuePerRecipient,
          delay: input.delay,
          kind: GROUP_KIND,
          isPublic: false,
          metadata,
        });
      }
      return previousId;
    });
  }

  // ---------------------------------------------------------------------------
  // Admin
  // ---------------------------------------------------------------------------

  /**
   * @returns the pause flag after toggling
   */
  togglePause(caller: Principal): Promise<boolean> {
    return this.execute('toggle-pause', caller, undefined, ({ tx }) => {
      this.requireOwner(caller);
      const paused = !tx.counters().paused;
      tx.updateCounters({ paused });
      return paused;
    });
  }

  /**
   * Move escrow surplus (penalties and anything else outside the tracked total) to the owner
   */
  withdrawPenalties(caller: Principal, amount: number): Promise<number> {
    return this.execute('withdraw-penalties', caller, undefined, async ({ tx, transfer }) => {
      this.requireOwner(caller);
      requireAmount(amount, false);

      const withdrawable = await this.withdrawable(tx.counters().totalValueLocked);
      if (amount > withdrawable) {
        throw new InvalidAmountError(`Only ${withdrawable} is withdrawable`, { amount, withdrawable });
      }

      transfer(amount, this.escrowAccount, this.owner);
      return amount;
    });
  }

  // ---------------------------------------------------------------------------
  // Reads
  // ---------------------------------------------------------------------------

  now(): Promise<number> {
    return this.clock.now();
  }

  getCapsule(id: number): Capsule {
    const capsule = this.state.getCapsule(id);
    if (!capsule) {
      throw new NotFoundError('Capsule', id);
    }
    return capsule;
  }

  /**
   * Latest access event, or null for a capsule that has none
   */
  getAuditEntry(id: number): AuditEntry | null {
    this.getCapsule(id);
    return this.state.getAuditEntry(id) ?? null;
  }

  getIndexCount(principal: Principal): number {
    return this.state.indexCount(principal);
  }

  getIndexEntry(principal: Principal, position: number): number | undefined {
    return this.state.indexEntry(principal, position);
  }

  getCapsuleIdsFor(principal: Principal, offset: number = 0, limit: number = 50): { total: number; ids: number[] } {
    return {
      total: this.state.indexCount(principal),
      ids: this.state.indexSlice(principal, offset, limit),
    };
  }

  isPublic(id: number): boolean {
    return this.state.isPublic(id);
  }

  listPublicCapsules(): number[] {
    return this.state.listPublic();
  }

  async getCapsuleStatus(id: number): Promise<CapsuleStatus> {
    const capsule = this.getCapsule(id);
    if (capsule.isConsumed) {
      return { state: 'consumed', openedAt: capsule.openedAt };
    }
    const now = await this.clock.now();
    if (now < capsule.unlockTime) {
      return { state: 'locked', unlockTime: capsule.unlockTime, blocksRemaining: capsule.unlockTime - now };
    }
    return { state: 'unlockable', unlockTime: capsule.unlockTime };
  }

  /**
   * Unconsumed capsules whose unlock time falls in (after, upTo]
   */
  findUnlockable(after: number, upTo: number): Capsule[] {
    const found: Capsule[] = [];
    for (const capsule of this.state.openCapsules()) {
      if (capsule.unlockTime > after && capsule.unlockTime <= upTo) {
        found.push(capsule);
      }
    }
    return found;
  }

  async getStats(): Promise<LedgerStats> {
    const counters = this.state.counters();
    const escrowBalance = await this.bank.balanceOf(this.escrowAccount);
    return {
      ...counters,
      escrowBalance,
      withdrawablePenalties: Math.max(0, escrowBalance - counters.totalValueLocked),
    };
  }

  /**
   * Compare the tracked total against the sum of unconsumed capsule values
   */
  reconcile(): { totalValueLocked: number; unconsumedValue: number; balanced: boolean } {
    let unconsumedValue = 0;
    for (const capsule of this.state.openCapsules()) {
      unconsumedValue += capsule.value;
    }
    const { totalValueLocked } = this.state.counters();
    return { totalValueLocked, unconsumedValue, balanced: totalValueLocked === unconsumedValue };
  }

  /**
   * Resolves once every queued write has settled
   */
  idle(): Promise<void> {
    return this.queue.idle();
  }

  // ---------------------------------------------------------------------------
  // Transaction machinery
  // ---------------------------------------------------------------------------

  private execute<T>(
    operation: string,
    caller: Principal,
    capsuleId: number | undefined,
    body: (context: TransactionContext) => T | Promise<T>
  ): Promise<T> {
    return this.queue.run(async () => {
      const log = logger.child({ operation, principal: caller, capsuleId });
      const now = await this.clock.now();
      const tx = this.state.begin();
      const transfers: PendingTransfer[] = [];

      let result: T;
      try {
        result = await body({
          tx,
          now,
          transfer: (amount, from, to) => {
            if (amount > 0) {
              transfers.push({ amount, from, to });
            }
          },
        });
      } catch (error) {
        log.debug('Precondition failed', { code: isAppError(error) ? error.code : undefined, error: getErrorMessage(error) });
        throw error;
      }

      const changes = tx.changes();
      const unit = await this.repository.begin();
      try {
        await unit.write(changes);
        await this.moveFunds(transfers);
      } catch (error) {
        await unit.rollback().catch((rollbackError: unknown) => {
          log.error('Rollback failed', { error: getErrorMessage(rollbackError) });
        });
        throw error;
      }

      try {
        await unit.commit();
      } catch (error) {
        log.error('Commit failed after funds moved, reversing transfers', { error: getErrorMessage(error) });
        await this.reverseFunds(transfers, log);
        throw error;
      }

      this.state.apply(changes);
      log.info('Ledger transaction committed', {
        nonce: changes.counters.nonce,
        totalValueLocked: changes.counters.totalValueLocked,
        transfers: transfers.length,
      });
      return result;
    });
  }

  private async moveFunds(transfers: PendingTransfer[]): Promise<void> {
    const done: PendingTransfer[] = [];
    for (const transfer of transfers) {
      const ok = await this.bank.transfer(transfer.amount, transfer.from, transfer.to);
      if (!ok) {
        await this.reverseFunds(done, logger);
        throw new TransferFailedError(transfer.amount, transfer.from, transfer.to);
      }
      done.push(transfer);
    }
  }

  private async reverseFunds(transfers: PendingTransfer[], log: Logger): Promise<void> {
    for (const transfer of [...transfers].reverse()) {
      const ok = await this.bank.transfer(transfer.amount, transfer.to, transfer.from);
      if (!ok) {
        log.error('Compensating transfer failed', { ...transfer });
      }
    }
  }

  private mint(
    tx: LedgerTransaction,
    now: number,
    fields: Omit<Capsule, 'id' | 'unlockTime' | 'createdAt' | 'openedAt' | 'isConsumed'> & { delay: number }
  ): number {
    const counters = tx.counters();
    const id = counters.nonce + 1;
    const unlockTime = checkedAdd(now, fields.delay, 'Unlock time');
    const totalValueLocked = checkedAdd(counters.totalValueLocked, fields.value, 'Total value locked');

    tx.putCapsule({
      id,
      creator: fields.creator,
      recipient: fields.recipient,
      payload: fields.payload,
      value: fields.value,
      unlockTime,
      createdAt: now,
      openedAt: null,
      isConsumed: false,
      kind: fields.kind,
      metadata: fields.metadata,
      isPublic: fields.isPublic,
    });
    tx.appendToIndex(fields.creator, id);
    tx.appendToIndex(fields.recipient, id);
    if (fields.isPublic) {
      tx.registerPublic(id);
    }
    this.audit(tx, id, fields.creator, now, 'created');
    tx.updateCounters({
      nonce: id,
      totalCapsules: counters.totalCapsules + 1,
      totalValueLocked,
    });
    return id;
  }

  private audit(tx: LedgerTransaction, capsuleId: number, actor: Principal, time: number, action: AuditAction): void {
    tx.writeAudit({ capsuleId, actor, time, action });
  }

  private emergencyWindowOpen(capsule: Capsule, now: number): boolean {
    const farFromUnlock = capsule.unlockTime - now > BLOCKS_PER_YEAR;
    const freshlyCreated = now - capsule.createdAt < BLOCKS_PER_DAY;
    return this.emergencyWithdrawRule === 'all'
      ? farFromUnlock && freshlyCreated
      : farFromUnlock || freshlyCreated;
  }

  private async withdrawable(totalValueLocked: number): Promise<number> {
    const balance = await this.bank.balanceOf(this.escrowAccount);
    return Math.max(0, balance - totalValueLocked);
  }

  private requireCapsule(tx: LedgerTransaction, id: number): Capsule {
    const capsule = tx.getCapsule(id);
    if (!capsule) {
      throw new NotFoundError('Capsule', id);
    }
    return capsule;
  }

  private requireUnconsumed(tx: LedgerTransaction, id: number): Capsule {
    const capsule = this.requireCapsule(tx, id);
    if (capsule.isConsumed) {
      throw new AlreadyConsumedError(id);
    }
    return capsule;
  }

  private requireCreator(capsule: Capsule, caller: Principal): void {
    if (capsule.creator !== caller) {
      throw new UnauthorizedError('Only the creator can modify this capsule', { capsuleId: capsule.id });
    }
  }

  private requireOwner(caller: Principal): void {
    if (caller !== this.owner) {
      throw new UnauthorizedError('Only the ledger owner can do this');
    }
  }

  private requireNotPaused(tx: LedgerTransaction): void {
    if (tx.counters().paused) {
      throw new UnauthorizedError('Ledger is paused');
    }
  }

  private requireLocked(capsule: Capsule, now: number): void {
    if (now >= capsule.unlockTime) {
      throw new StillLockedError(`Capsule ${capsule.id} is no longer locked`, { unlockTime: capsule.unlockTime, now });
    }
  }
}
