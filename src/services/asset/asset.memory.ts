import crypto from 'crypto';

import { config } from '../../config';
import { createServiceLogger } from '../../observability/logger';

import { AssetTransfer, TransferResult } from './asset.types';

const log = createServiceLogger('asset-ledger');

/**
 * Process-local asset ledger for development (STAKING_STORAGE=memory) and tests.
 */
export class InMemoryAssetLedger implements AssetTransfer {
  private readonly balances = new Map<string, bigint>();

  constructor(
    readonly custodyAccountId: string = config.staking.custodyAccountId,
    openingBalances: ReadonlyArray<readonly [string, bigint]> = []
  ) {
    for (const [accountId, amount] of openingBalances) {
      this.fund(accountId, amount);
    }
  }

  async transferIn(from: string, amount: bigint): Promise<TransferResult> {
    if (this.balanceOf(from) < amount) {
      log.warn({ participantId: from, amount: amount.toString() }, 'Insufficient balance for deposit');
      return { success: false, reason: 'INSUFFICIENT_BALANCE' };
    }
    this.move(from, this.custodyAccountId, amount);
    return { success: true, transferId: crypto.randomUUID() };
  }

  async transferOut(to: string, amount: bigint): Promise<TransferResult> {
    if (this.balanceOf(this.custodyAccountId) < amount) {
      log.warn({ participantId: to, amount: amount.toString() }, 'Insufficient custody balance');
      return { success: false, reason: 'INSUFFICIENT_CUSTODY' };
    }
    this.move(this.custodyAccountId, to, amount);
    return { success: true, transferId: crypto.randomUUID() };
  }

  fund(accountId: string, amount: bigint): void {
    this.balances.set(accountId, this.balanceOf(accountId) + amount);
  }

  balanceOf(accountId: string): bigint {
    return this.balances.get(accountId) ?? 0n;
  }

  private move(from: string, to: string, amount: bigint): void {
    this.balances.set(from, this.balanceOf(from) - amount);
    this.balances.set(to, this.balanceOf(to) + amount);
  }
}
