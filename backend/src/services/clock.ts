/**
 * Time Source
 * The ledger's monotonic time reference, measured in blocks
 */

export interface TimeSource {
  now(): Promise<number>;
}

export interface BlockHeightClockOptions {
  blockIntervalMs: number;
  genesisTimestampMs: number;
  wallClock?: () => number;
}

/**
 * Derives a block height from wall-clock time: one block per interval since genesis.
 * Never reports a height lower than one it has already reported.
 */
export class BlockHeightClock implements TimeSource {
  private readonly blockIntervalMs: number;
  private readonly genesisTimestampMs: number;
  private readonly wallClock: () => number;
  private lastHeight = 0;

  constructor(options: BlockHeightClockOptions) {
    if (!Number.isInteger(options.blockIntervalMs) || options.blockIntervalMs <= 0) {
      throw new Error('blockIntervalMs must be a positive integer');
    }
    this.blockIntervalMs = options.blockIntervalMs;
    this.genesisTimestampMs = options.genesisTimestampMs;
    this.wallClock = options.wallClock ?? Date.now;
  }

  async now(): Promise<number> {
    const elapsed = Math.max(0, this.wallClock() - this.genesisTimestampMs);
    const height = Math.floor(elapsed / this.blockIntervalMs);
    this.lastHeight = Math.max(this.lastHeight, height);
    return this.lastHeight;
  }
}

/**
 * Clock that only moves when told to. Used by tests and local tooling.
 */
export class ManualClock implements TimeSource {
  constructor(private height: number = 0) {}

  async now(): Promise<number> {
    return this.height;
  }

  set(height: number): void {
    if (height < this.height) {
      throw new Error(`Clock cannot move backwards (${this.height} -> ${height})`);
    }
    this.height = height;
  }

  advance(blocks: number): number {
    this.set(this.height + blocks);
    return this.height;
  }
}
