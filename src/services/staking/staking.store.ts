/**
 * Position Stores
 *
 * Both stores implement compare-and-set writes on a per-position version so
 * that two writers (two processes, or a reentrant call racing a rollback)
 * can never silently overwrite each other.
 */

import mongoose, { Types } from 'mongoose';

import { ApiError } from '../../middlewares/errorHandler';
import { StakePosition } from '../../models/StakePosition';

import { Position, PositionStore, StoredPosition } from './staking.types';

const DUPLICATE_KEY = 11000;

const toDecimal = (value: bigint): Types.Decimal128 =>
  mongoose.Types.Decimal128.fromString(value.toString());

const fromDecimal = (value: Types.Decimal128): bigint => BigInt(value.toString());

const isDuplicateKeyError = (error: unknown): boolean =>
  typeof error === 'object' && error !== null && 'code' in error && error.code === DUPLICATE_KEY;

/**
 * MongoDB-backed store (StakePosition collection)
 */
export class MongoPositionStore implements PositionStore {
  async load(participantId: string): Promise<StoredPosition | null> {
    const doc = await StakePosition.findOne({ participantId });
    if (!doc) {
      return null;
    }
    return {
      position: {
        principal: fromDecimal(doc.principal),
        accruedReward: fromDecimal(doc.accruedReward),
        lastSettledAt: doc.lastSettledAt,
      },
      version: doc.version,
    };
  }

  async save(
    participantId: string,
    position: Position,
    expectedVersion: number | null
  ): Promise<number> {
    const fields = {
      principal: toDecimal(position.principal),
      accruedReward: toDecimal(position.accruedReward),
      lastSettledAt: position.lastSettledAt,
    };

    if (expectedVersion === null) {
      try {
        const created = await StakePosition.create({ participantId, ...fields, version: 1 });
        return created.version;
      } catch (error) {
        if (isDuplicateKeyError(error)) {
          throw ApiError.concurrentModification(participantId);
        }
        throw error;
      }
    }

    const updated = await StakePosition.findOneAndUpdate(
      { participantId, version: expectedVersion },
      { $set: fields, $inc: { version: 1 } },
      { new: true }
    );

    if (!updated) {
      throw ApiError.concurrentModification(participantId);
    }
    return updated.version;
  }
}

/**
 * Process-local store for development (STAKING_STORAGE=memory) and tests
 */
export class InMemoryPositionStore implements PositionStore {
  private readonly records = new Map<string, StoredPosition>();

  async load(participantId: string): Promise<StoredPosition | null> {
    const record = this.records.get(participantId);
    return record ? { position: { ...record.position }, version: record.version } : null;
  }

  async save(
    participantId: string,
    position: Position,
    expectedVersion: number | null
  ): Promise<number> {
    const current = this.records.get(participantId);
    const currentVersion = current ? current.version : null;
    if (currentVersion !== expectedVersion) {
      throw ApiError.concurrentModification(participantId);
    }
    const version = (currentVersion ?? 0) + 1;
    this.records.set(participantId, { position: { ...position }, version });
    return version;
  }
}
