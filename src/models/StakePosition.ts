import mongoose, { Document, Schema, Types } from 'mongoose';

/**
 * Persisted staking position.
 *
 * Amounts are Decimal128 so integer values beyond 2^53 survive storage.
 * `version` backs optimistic concurrency: every write names the version it read.
 */
export interface IStakePosition extends Document {
  participantId: string;
  principal: Types.Decimal128;
  accruedReward: Types.Decimal128;
  lastSettledAt: number;
  version: number;
  createdAt: Date;
  updatedAt: Date;
}

const stakePositionSchema = new Schema<IStakePosition>(
  {
    participantId: {
      type: String,
      required: true,
      unique: true,
      index: true,
    },
    principal: {
      type: Schema.Types.Decimal128,
      required: true,
    },
    accruedReward: {
      type: Schema.Types.Decimal128,
      required: true,
    },
    lastSettledAt: {
      type: Number,
      required: true,
      min: 0,
    },
    version: {
      type: Number,
      required: true,
      default: 1,
    },
  },
  {
    timestamps: true,
  }
);

export const StakePosition = mongoose.model<IStakePosition>('StakePosition', stakePositionSchema);
