/**
 * Ledger State
 * Capsule store, owner index, audit log, public set and global counters,
 * plus the transaction overlay every write stages its changes on.
 */

import type {
  AuditEntry,
  Capsule,
  IndexAppend,
  LedgerChangeSet,
  LedgerCounters,
  LedgerSnapshot,
  Principal,
} from '../types/capsule';

export const INITIAL_COUNTERS: LedgerCounters = {
  nonce: 0,
  totalCapsules: 0,
  totalValueLocked: 0,
  totalOpened: 0,
  paused: false,
};

/**
 * Read surface shared by committed state and open transactions
 */
export interface LedgerReader {
  getCapsule(id: number): Capsule | undefined;
  indexCount(principal: Principal): number;
  counters(): LedgerCounters;
}

export class LedgerState implements LedgerReader {
  private readonly capsules = new Map<number, Capsule>();
  private readonly index = new Map<Principal, number[]>();
  private readonly audit = new Map<number, AuditEntry>();
  private readonly publicIds = new Set<number>();
  private current: LedgerCounters = { ...INITIAL_COUNTERS };

  static fromSnapshot(snapshot: LedgerSnapshot): LedgerState {
    const state = new LedgerState();
    const capsules = [...snapshot.capsules].sort((a, b) => a.id - b.id);
    for (const capsule of capsules) {
      state.capsules.set(capsule.id, { ...capsule });
    }
    const ordered = [...snapshot.index].sort((a, b) => a.position - b.position);
    for (const entry of ordered) {
      state.appendIndex(entry);
    }
    for (const entry of snapshot.auditEntries) {
      state.audit.set(entry.capsuleId, { ...entry });
    }
    snapshot.publicIds.forEach((id) => state.publicIds.add(id));
    state.current = { ...snapshot.counters };
    return state;
  }

  getCapsule(id: number): Capsule | undefined {
    const capsule = this.capsules.get(id);
    return capsule ? { ...capsule } : undefined;
  }

  indexCount(principal: Principal): number {
    return this.index.get(principal)?.length ?? 0;
  }

  indexEntry(principal: Principal, position: number): number | undefined {
    return this.index.get(principal)?.[position];
  }

  indexSlice(principal: Principal, offset: number, limit: number): number[] {
    return (this.index.get(principal) ?? []).slice(offset, offset + limit);
  }

  getAuditEntry(id: number): AuditEntry | undefined {
    const entry = this.audit.get(id);
    return entry ? { ...entry } : undefined;
  }

  isPublic(id: number): boolean {
    return this.publicIds.has(id);
  }

  listPublic(): number[] {
    return [...this.publicIds].sort((a, b) => a - b);
  }

  counters(): LedgerCounters {
    return { ...this.current };
  }

  /**
   * Unconsumed capsules, in id order
   */
  *openCapsules(): IterableIterator<Capsule> {
    for (const capsule of this.capsules.values()) {
      if (!capsule.isConsumed) {
        yield { ...capsule };
      }
    }
  }

  begin(): LedgerTransaction {
    return new LedgerTransaction(this);
  }

  /**
   * Apply a committed change set. Only the ledger calls this, after persistence succeeded.
   */
  apply(changes: LedgerChangeSet): void {
    for (const capsule of changes.capsules) {
      this.capsules.set(capsule.id, { ...capsule });
    }
    for (const entry of changes.indexAppends) {
      this.appendIndex(entry);
    }
    for (const entry of changes.auditEntries) {
      this.audit.set(entry.capsuleId, { ...entry });
    }
    changes.publicIds.forEach((id) => this.publicIds.add(id));
    this.current = { ...changes.counters };
  }

  toSnapshot(): LedgerSnapshot {
    const index: IndexAppend[] = [];
    for (const [principal, ids] of this.index) {
      ids.forEach((capsuleId, position) => index.push({ principal, position, capsuleId }));
    }
    return {
      capsules: [...this.capsules.values()].map((capsule) => ({ ...capsule })),
      index,
      auditEntries: [...this.audit.values()].map((entry) => ({ ...entry })),
      publicIds: this.listPublic(),
      counters: this.counters(),
    };
  }

  private appendIndex(entry: IndexAppend): void {
    const ids = this.index.get(entry.principal) ?? [];
    if (entry.position !== ids.length) {
      throw new Error(
        `Index for ${entry.principal} expected position ${ids.length}, got ${entry.position}`
      );
    }
    ids.push(entry.capsuleId);
    this.index.set(entry.principal, ids);
  }
}

/**
 * Staged writes over a committed LedgerState. Reads see the staged values;
 * nothing reaches the base state until the ledger applies `changes()`.
 */
export class LedgerTransaction implements LedgerReader {
  private readonly staged = new Map<number, Capsule>();
  private readonly appends: IndexAppend[] = [];
  private readonly audit = new Map<number, AuditEntry>();
  private readonly newPublicIds = new Set<number>();
  private stagedCounters: LedgerCounters;

  constructor(private readonly base: LedgerState) {
    this.stagedCounters = base.counters();
  }

  getCapsule(id: number): Capsule | undefined {
    const staged = this.staged.get(id);
    return staged ? { ...staged } : this.base.getCapsule(id);
  }

  putCapsule(capsule: Capsule): void {
    this.staged.set(capsule.id, { ...capsule });
  }

  indexCount(principal: Principal): number {
    const stagedCount = this.appends.filter((entry) => entry.principal === principal).length;
    return this.base.indexCount(principal) + stagedCount;
  }

  appendToIndex(principal: Principal, capsuleId: number): void {
    this.appends.push({ principal, position: this.indexCount(principal), capsuleId });
  }

  writeAudit(entry: AuditEntry): void {
    this.audit.set(entry.capsuleId, { ...entry });
  }

  registerPublic(capsuleId: number): void {
    if (!this.base.isPublic(capsuleId)) {
      this.newPublicIds.add(capsuleId);
    }
  }

  counters(): LedgerCounters {
    return { ...this.stagedCounters };
  }

  updateCounters(update: Partial<LedgerCounters>): void {
    this.stagedCounters = { ...this.stagedCounters, ...update };
  }

  changes(): LedgerChangeSet {
    return {
      capsules: [...this.staged.values()].map((capsule) => ({ ...capsule })),
      indexAppends: this.appends.map((entry) => ({ ...entry })),
      auditEntries: [...this.audit.values()].map((entry) => ({ ...entry })),
      publicIds: [...this.newPublicIds],
      counters: this.counters(),
    };
  }
}
