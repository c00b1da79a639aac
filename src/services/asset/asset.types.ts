export type TransferFailureReason =
  | 'INSUFFICIENT_BALANCE'
  | 'INSUFFICIENT_CUSTODY'
  | 'ASSET_LEDGER_ERROR';

/**
 * Outcome of an asset movement. Implementations report failure through
 * this value and never throw, so the ledger decides how to unwind.
 */
export type TransferResult =
  | { success: true; transferId: string }
  | { success: false; reason: TransferFailureReason };

/**
 * Moves the staked asset between a participant and ledger custody.
 */
export interface AssetTransfer {
  transferIn(from: string, amount: bigint): Promise<TransferResult>;
  transferOut(to: string, amount: bigint): Promise<TransferResult>;
}
