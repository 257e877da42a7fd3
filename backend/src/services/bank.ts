/**
 * Value Transfer
 * Moves custodied funds between external accounts and the ledger's escrow account
 */

import { logger } from '../utils/logger';
import type { Principal } from '../types/capsule';

export interface ValueTransfer {
  /**
   * Move `amount` from one account to another. Resolves false when the move cannot
   * happen (e.g. insufficient balance); nothing moves in that case.
   */
  transfer(amount: number, from: Principal, to: Principal): Promise<boolean>;
  balanceOf(account: Principal): Promise<number>;
}

/**
 * Balance sheet kept in process memory
 */
export class InMemoryBank implements ValueTransfer {
  private balances = new Map<Principal, number>();

  constructor(initialBalances: Record<Principal, number> = {}) {
    for (const [account, amount] of Object.entries(initialBalances)) {
      this.mint(account, amount);
    }
  }

  async transfer(amount: number, from: Principal, to: Principal): Promise<boolean> {
    if (!Number.isSafeInteger(amount) || amount <= 0 || from === to) {
      logger.warn('Rejected transfer', { amount, from, to });
      return false;
    }

    const available = this.balances.get(from) ?? 0;
    if (available < amount) {
      logger.warn('Insufficient balance for transfer', { amount, from, to, available });
      return false;
    }

    const credited = (this.balances.get(to) ?? 0) + amount;
    if (!Number.isSafeInteger(credited)) {
      return false;
    }

    this.balances.set(from, available - amount);
    this.balances.set(to, credited);
    logger.debug('Transfer completed', { amount, from, to });
    return true;
  }

  async balanceOf(account: Principal): Promise<number> {
    return this.balances.get(account) ?? 0;
  }

  /**
   * Credit an account out of thin air (faucet for local runs and tests)
   */
  mint(account: Principal, amount: number): void {
    if (!Number.isSafeInteger(amount) || amount < 0) {
      throw new Error(`Invalid mint amount: ${amount}`);
    }
    this.balances.set(account, (this.balances.get(account) ?? 0) + amount);
  }
}
