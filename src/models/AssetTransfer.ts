import mongoose, { Document, Schema, Types } from 'mongoose';

export type TransferDirection = 'IN' | 'OUT';
export type TransferStatus = 'COMPLETED' | 'REJECTED';

/**
 * Journal entry for every attempted movement between a participant
 * account and ledger custody.
 */
export interface IAssetTransfer extends Document {
  transferId: string;
  direction: TransferDirection;
  accountId: string;
  amount: Types.Decimal128;
  status: TransferStatus;
  reason?: string;
  createdAt: Date;
  updatedAt: Date;
}

const assetTransferSchema = new Schema<IAssetTransfer>(
  {
    transferId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    direction: {
      type: String,
      required: true,
      enum: ['IN', 'OUT'],
    },
    accountId: {
      type: String,
      required: true,
      index: true,
    },
    amount: {
      type: Schema.Types.Decimal128,
      required: true,
    },
    status: {
      type: String,
      required: true,
      enum: ['COMPLETED', 'REJECTED'],
    },
    reason: {
      type: String,
    },
  },
  {
    timestamps: true,
  }
);

assetTransferSchema.index({ accountId: 1, createdAt: -1 });

export const AssetTransfer = mongoose.model<IAssetTransfer>('AssetTransfer', assetTransferSchema);
