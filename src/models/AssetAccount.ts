import mongoose, { Document, Schema, Types } from 'mongoose';

/**
 * Balance of the staked asset held by one account.
 * The custody account holds staked principal and the reward reserve.
 */
export interface IAssetAccount extends Document {
  accountId: string;
  balance: Types.Decimal128;
  createdAt: Date;
  updatedAt: Date;
}

const assetAccountSchema = new Schema<IAssetAccount>(
  {
    accountId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    balance: {
      type: Schema.Types.Decimal128,
      required: true,
    },
  },
  {
    timestamps: true,
  }
);

export const AssetAccount = mongoose.model<IAssetAccount>('AssetAccount', assetAccountSchema);
