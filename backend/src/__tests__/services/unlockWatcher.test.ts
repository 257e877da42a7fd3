/**
 * Tests for the Unlock Watcher
 * Scans for capsules that became openable and notifies a listener
 */

import * as cron from 'node-cron';
import { CapsuleLedger } from '../../services/capsuleLedger';
import { ManualClock } from '../../services/clock';
import { InMemoryBank } from '../../services/bank';
import { UnlockWatcher, UnlockNotification } from '../../services/unlockWatcher';

jest.mock('node-cron', () => ({
  validate: jest.fn((expression: string) => expression !== 'not a schedule'),
  schedule: jest.fn(() => ({ stop: jest.fn() })),
}));

describe('UnlockWatcher', () => {
  let clock: ManualClock;
  let ledger: CapsuleLedger;

  beforeEach(async () => {
    jest.clearAllMocks();
    clock = new ManualClock(1000);
    ledger = new CapsuleLedger({
      owner: 'owner',
      escrowAccount: 'escrow',
      clock,
      bank: new InMemoryBank({ alice: 1000 }),
    });

    const base = { payload: 'later', value: 10, kind: 'gift', isPublic: false };
    await ledger.createCapsule('alice', { ...base, recipient: 'bob', delay: 100 });
    await ledger.createCapsule('alice', { ...base, recipient: 'carol', delay: 300 });
  });

  it('rejects an invalid schedule', () => {
    expect(() => new UnlockWatcher(ledger, jest.fn(), 'not a schedule')).toThrow(
      'Invalid cron schedule: not a schedule'
    );
  });

  it('notifies about capsules that unlocked since the last scan', async () => {
    const notifications: UnlockNotification[] = [];
    const watcher = new UnlockWatcher(ledger, (n) => {
      notifications.push(n);
    }, '*/10 * * * *', 1000);

    clock.set(1150);
    const result = await watcher.scan();

    expect(result).toEqual({ from: 1000, to: 1150, found: 1, notified: 1, errors: 0 });
    expect(notifications).toEqual([
      { capsuleId: 1, recipient: 'bob', creator: 'alice', unlockTime: 1100, detectedAt: 1150 },
    ]);
  });

  it('does not report the same capsule twice', async () => {
    const listener = jest.fn();
    const watcher = new UnlockWatcher(ledger, listener, '*/10 * * * *', 1000);

    clock.set(1150);
    await watcher.scan();
    const again = await watcher.scan();

    expect(again).toEqual({ from: 1150, to: 1150, found: 0, notified: 0, errors: 0 });

    clock.set(1300);
    const later = await watcher.scan();
    expect(later).toEqual({ from: 1150, to: 1300, found: 1, notified: 1, errors: 0 });
    expect(listener).toHaveBeenCalledTimes(2);
  });

  it('skips consumed capsules', async () => {
    const listener = jest.fn();
    const watcher = new UnlockWatcher(ledger, listener, '*/10 * * * *', 1000);
    await ledger.cancelCapsule('alice', 1);

    clock.set(1400);
    const result = await watcher.scan();

    expect(result.found).toBe(1);
    expect(listener).toHaveBeenCalledWith(expect.objectContaining({ capsuleId: 2 }));
  });

  it('counts listener failures and retries them on the next scan', async () => {
    const watcher = new UnlockWatcher(
      ledger,
      async () => {
        throw new Error('mail server down');
      },
      '*/10 * * * *',
      1000
    );

    clock.set(1400);
    const result = await watcher.scan();

    expect(result).toEqual({ from: 1000, to: 1400, found: 2, notified: 0, errors: 2 });
    expect(await watcher.scan()).toEqual({ from: 1400, to: 1400, found: 2, notified: 0, errors: 2 });
  });

  it('delivers a failed notification once the listener recovers', async () => {
    const delivered: number[] = [];
    let failing = true;
    const watcher = new UnlockWatcher(ledger, (n) => {
      if (failing) {
        throw new Error('mail server down');
      }
      delivered.push(n.capsuleId);
    }, '*/10 * * * *', 1000);

    clock.set(1150);
    expect(await watcher.scan()).toEqual({ from: 1000, to: 1150, found: 1, notified: 0, errors: 1 });

    failing = false;
    clock.set(1300);
    expect(await watcher.scan()).toEqual({ from: 1150, to: 1300, found: 2, notified: 2, errors: 0 });
    expect(delivered).toEqual([1, 2]);

    expect(await watcher.scan()).toEqual({ from: 1300, to: 1300, found: 0, notified: 0, errors: 0 });
  });

  it('drops a pending retry once the capsule is consumed', async () => {
    const listener = jest.fn().mockRejectedValueOnce(new Error('mail server down'));
    const watcher = new UnlockWatcher(ledger, listener, '*/10 * * * *', 1000);

    clock.set(1150);
    await watcher.scan();
    await ledger.openCapsule('bob', 1);

    expect(await watcher.scan()).toEqual({ from: 1150, to: 1150, found: 0, notified: 0, errors: 0 });
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('schedules a single cron job and stops it', () => {
    const watcher = new UnlockWatcher(ledger, jest.fn(), '*/5 * * * *');

    watcher.start();
    watcher.start();

    const schedule = jest.mocked(cron.schedule);
    expect(schedule).toHaveBeenCalledTimes(1);
    expect(schedule.mock.calls[0][0]).toBe('*/5 * * * *');

    watcher.stop();
    const job = schedule.mock.results[0].value;
    expect(job.stop).toHaveBeenCalledTimes(1);
  });
});
