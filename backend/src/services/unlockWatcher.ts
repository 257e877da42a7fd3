/**
 * Unlock Watcher
 * Periodically finds capsules that have become openable since the previous scan
 */

import * as cron from 'node-cron';
import { logger } from '../utils/logger';
import { getErrorMessage } from '../types/common';
import type { Capsule } from '../types/capsule';
import type { CapsuleLedger } from './capsuleLedger';

export interface UnlockNotification {
  capsuleId: number;
  recipient: string;
  creator: string;
  unlockTime: number;
  detectedAt: number;
}

export type UnlockListener = (notification: UnlockNotification) => Promise<void> | void;

export interface UnlockScanResult {
  from: number;
  to: number;
  found: number;
  notified: number;
  errors: number;
}

export class UnlockWatcher {
  private cronJob: cron.ScheduledTask | null = null;
  private isRunning = false;
  private lastHeight: number;
  private readonly failed = new Set<number>();

  constructor(
    private readonly ledger: CapsuleLedger,
    private readonly listener: UnlockListener,
    private readonly schedule: string = '*/10 * * * *',
    startHeight: number = 0
  ) {
    if (!cron.validate(schedule)) {
      throw new Error(`Invalid cron schedule: ${schedule}`);
    }
    this.lastHeight = startHeight;
  }

  start(): void {
    if (this.cronJob) {
      logger.warn('Unlock watcher already running');
      return;
    }

    this.cronJob = cron.schedule(this.schedule, async () => {
      if (this.isRunning) {
        logger.warn('Previous unlock scan still running, skipping this run');
        return;
      }

      this.isRunning = true;
      try {
        await this.scan();
      } catch (error) {
        logger.error('Error during unlock scan', { error: getErrorMessage(error) });
      } finally {
        this.isRunning = false;
      }
    });

    logger.info('Unlock watcher started', { schedule: this.schedule, fromHeight: this.lastHeight });
  }

  stop(): void {
    if (this.cronJob) {
      this.cronJob.stop();
      this.cronJob = null;
      logger.info('Unlock watcher stopped');
    }
  }

  /**
   * Notify about every unconsumed capsule whose unlock time passed since the last scan.
   * Capsules whose listener call failed are retried on later scans until delivered or consumed.
   */
  async scan(): Promise<UnlockScanResult> {
    const from = this.lastHeight;
    const to = await this.ledger.now();
    const capsules = this.pendingRetries();
    if (to > from) {
      capsules.push(...this.ledger.findUnlockable(from, to));
      this.lastHeight = to;
    }
    if (capsules.length === 0) {
      return { from, to, found: 0, notified: 0, errors: 0 };
    }

    let notified = 0;
    let errors = 0;

    for (const capsule of capsules) {
      try {
        await this.listener(this.toNotification(capsule, to));
        this.failed.delete(capsule.id);
        notified++;
      } catch (error) {
        errors++;
        this.failed.add(capsule.id);
        logger.warn('Unlock listener failed, will retry on next scan', {
          capsuleId: capsule.id,
          error: getErrorMessage(error),
        });
      }
    }

    logger.info('Unlock scan completed', { from, to, found: capsules.length, notified, errors });
    return { from, to, found: capsules.length, notified, errors };
  }

  private pendingRetries(): Capsule[] {
    const capsules: Capsule[] = [];
    for (const id of this.failed) {
      const capsule = this.ledger.getCapsule(id);
      if (capsule.isConsumed) {
        this.failed.delete(id);
      } else {
        capsules.push(capsule);
      }
    }
    return capsules;
  }

  private toNotification(capsule: Capsule, detectedAt: number): UnlockNotification {
    return {
      capsuleId: capsule.id,
      recipient: capsule.recipient,
      creator: capsule.creator,
      unlockTime: capsule.unlockTime,
      detectedAt,
    };
  }
}
