import crypto from 'crypto';

import mongoose, { Types } from 'mongoose';

import { config } from '../../config';
import { AssetAccount, IAssetAccount } from '../../models/AssetAccount';
import { AssetTransfer as AssetTransferRecord, TransferDirection } from '../../models/AssetTransfer';
import { createServiceLogger } from '../../observability/logger';

import { AssetTransfer, TransferFailureReason, TransferResult } from './asset.types';

const log = createServiceLogger('asset-ledger');

const toDecimal = (value: bigint): Types.Decimal128 =>
  mongoose.Types.Decimal128.fromString(value.toString());

/**
 * MongoDB-backed asset ledger.
 *
 * Each leg is a single-document atomic $inc; the debit leg only matches when
 * the balance covers the amount, so an account can never go negative.
 */
export class MongoAssetLedger implements AssetTransfer {
  constructor(private readonly custodyAccountId: string = config.staking.custodyAccountId) {}

  async transferIn(from: string, amount: bigint): Promise<TransferResult> {
    return this.move('IN', from, from, this.custodyAccountId, amount, 'INSUFFICIENT_BALANCE');
  }

  async transferOut(to: string, amount: bigint): Promise<TransferResult> {
    return this.move('OUT', to, this.custodyAccountId, to, amount, 'INSUFFICIENT_CUSTODY');
  }

  private async move(
    direction: TransferDirection,
    participantId: string,
    debitAccount: string,
    creditAccount: string,
    amount: bigint,
    shortfall: TransferFailureReason
  ): Promise<TransferResult> {
    const transferId = crypto.randomUUID();
    const context = { transferId, direction, participantId, amount: amount.toString() };

    let debited: IAssetAccount | null;
    try {
      debited = await AssetAccount.findOneAndUpdate(
        { accountId: debitAccount, balance: { $gte: toDecimal(amount) } },
        { $inc: { balance: toDecimal(-amount) } },
        { new: true }
      );
    } catch (error) {
      log.error({ ...context, err: error }, 'Asset debit failed');
      return { success: false, reason: 'ASSET_LEDGER_ERROR' };
    }

    if (!debited) {
      await this.journal(transferId, direction, participantId, amount, shortfall);
      log.warn(context, `Asset transfer rejected: ${shortfall}`);
      return { success: false, reason: shortfall };
    }

    try {
      await AssetAccount.findOneAndUpdate(
        { accountId: creditAccount },
        { $inc: { balance: toDecimal(amount) } },
        { upsert: true, new: true }
      );
    } catch (error) {
      log.error({ ...context, err: error }, 'Asset credit failed, reversing debit');
      await this.reverseDebit(debitAccount, amount, context);
      return { success: false, reason: 'ASSET_LEDGER_ERROR' };
    }

    await this.journal(transferId, direction, participantId, amount);
    log.info(context, 'Asset transfer completed');
    return { success: true, transferId };
  }

  private async reverseDebit(
    accountId: string,
    amount: bigint,
    context: Record<string, string>
  ): Promise<void> {
    try {
      await AssetAccount.findOneAndUpdate(
        { accountId },
        { $inc: { balance: toDecimal(amount) } }
      );
    } catch (error) {
      log.fatal({ ...context, err: error, accountId }, 'Debit reversal failed; account needs reconciliation');
    }
  }

  /**
   * Journal writes never change the outcome of a movement that already happened
   */
  private async journal(
    transferId: string,
    direction: TransferDirection,
    accountId: string,
    amount: bigint,
    reason?: TransferFailureReason
  ): Promise<void> {
    try {
      await AssetTransferRecord.create({
        transferId,
        direction,
        accountId,
        amount: toDecimal(amount),
        status: reason ? 'REJECTED' : 'COMPLETED',
        reason,
      });
    } catch (error) {
      log.error({ err: error, transferId }, 'Failed to journal asset transfer');
    }
  }
}
