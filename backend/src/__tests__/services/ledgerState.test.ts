/**
 * Tests for Ledger State
 */

import { LedgerState, INITIAL_COUNTERS } from '../../services/ledgerState';
import type { Capsule } from '../../types/capsule';

function capsule(id: number, overrides: Partial<Capsule> = {}): Capsule {
  return {
    id,
    creator: 'alice',
    recipient: 'bob',
    payload: `payload ${id}`,
    value: 10,
    unlockTime: 100,
    createdAt: 0,
    openedAt: null,
    isConsumed: false,
    kind: 'gift',
    metadata: null,
    isPublic: false,
    ...overrides,
  };
}

describe('LedgerState', () => {
  it('starts empty', () => {
    const state = new LedgerState();

    expect(state.counters()).toEqual(INITIAL_COUNTERS);
    expect(state.getCapsule(1)).toBeUndefined();
    expect(state.indexCount('alice')).toBe(0);
    expect(state.listPublic()).toEqual([]);
  });

  describe('transactions', () => {
    it('stage writes without touching committed state', () => {
      const state = new LedgerState();
      const tx = state.begin();

      tx.putCapsule(capsule(1));
      tx.appendToIndex('alice', 1);
      tx.updateCounters({ nonce: 1 });

      expect(tx.getCapsule(1)?.payload).toBe('payload 1');
      expect(tx.indexCount('alice')).toBe(1);
      expect(tx.counters().nonce).toBe(1);
      expect(state.getCapsule(1)).toBeUndefined();
      expect(state.indexCount('alice')).toBe(0);
      expect(state.counters().nonce).toBe(0);
    });

    it('number staged index appends after the committed entries', () => {
      const state = new LedgerState();
      const first = state.begin();
      first.appendToIndex('alice', 1);
      state.apply(first.changes());

      const second = state.begin();
      second.appendToIndex('alice', 2);
      second.appendToIndex('bob', 2);
      second.appendToIndex('alice', 3);

      expect(second.changes().indexAppends).toEqual([
        { principal: 'alice', position: 1, capsuleId: 2 },
        { principal: 'bob', position: 0, capsuleId: 2 },
        { principal: 'alice', position: 2, capsuleId: 3 },
      ]);
    });

    it('skip public ids that are already registered', () => {
      const state = new LedgerState();
      const first = state.begin();
      first.registerPublic(4);
      state.apply(first.changes());

      const second = state.begin();
      second.registerPublic(4);
      second.registerPublic(5);

      expect(second.changes().publicIds).toEqual([5]);
    });

    it('keep only the latest audit entry per capsule', () => {
      const state = new LedgerState();
      const tx = state.begin();
      tx.writeAudit({ capsuleId: 1, actor: 'alice', time: 1, action: 'created' });
      tx.writeAudit({ capsuleId: 1, actor: 'alice', time: 2, action: 'message-updated' });
      state.apply(tx.changes());

      expect(state.getAuditEntry(1)).toEqual({ capsuleId: 1, actor: 'alice', time: 2, action: 'message-updated' });
    });
  });

  it('rejects an index append out of position', () => {
    const state = new LedgerState();

    expect(() =>
      state.apply({
        capsules: [],
        indexAppends: [{ principal: 'alice', position: 1, capsuleId: 1 }],
        auditEntries: [],
        publicIds: [],
        counters: INITIAL_COUNTERS,
      })
    ).toThrow('Index for alice expected position 0, got 1');
  });

  it('lists only unconsumed capsules as open', () => {
    const state = new LedgerState();
    const tx = state.begin();
    tx.putCapsule(capsule(1));
    tx.putCapsule(capsule(2, { isConsumed: true, openedAt: 150 }));
    tx.putCapsule(capsule(3));
    state.apply(tx.changes());

    expect([...state.openCapsules()].map((c) => c.id)).toEqual([1, 3]);
  });

  it('rebuilds itself from a snapshot', () => {
    const state = new LedgerState();
    const tx = state.begin();
    tx.putCapsule(capsule(1, { isPublic: true }));
    tx.putCapsule(capsule(2));
    tx.appendToIndex('alice', 1);
    tx.appendToIndex('bob', 1);
    tx.appendToIndex('alice', 2);
    tx.registerPublic(1);
    tx.writeAudit({ capsuleId: 2, actor: 'alice', time: 3, action: 'created' });
    tx.updateCounters({ nonce: 2, totalCapsules: 2, totalValueLocked: 20 });
    state.apply(tx.changes());

    const snapshot = state.toSnapshot();
    const restored = LedgerState.fromSnapshot({ ...snapshot, index: [...snapshot.index].reverse() });

    expect(restored.indexSlice('alice', 0, 10)).toEqual([1, 2]);
    expect(restored.indexEntry('bob', 0)).toBe(1);
    expect(restored.listPublic()).toEqual([1]);
    expect(restored.getAuditEntry(2)?.action).toBe('created');
    expect(restored.counters()).toEqual({ ...INITIAL_COUNTERS, nonce: 2, totalCapsules: 2, totalValueLocked: 20 });
  });
});
