/**
 * Asset Transfer Module
 *
 * Moves the staked asset in and out of ledger custody.
 */

export { MongoAssetLedger } from './asset.service';
export { InMemoryAssetLedger } from './asset.memory';
export { AssetTransfer, TransferResult, TransferFailureReason } from './asset.types';
