/**
 * Position Store Unit Tests
 *
 * Tests compare-and-set semantics of the in-memory store and the
 * Mongo store's mapping onto the StakePosition model.
 */

import mongoose from 'mongoose';

import { ApiError } from '../../../src/middlewares/errorHandler';
import { InMemoryPositionStore, MongoPositionStore } from '../../../src/services/staking/staking.store';
import { ErrorCode } from '../../../src/types/errors';

// Mock StakePosition model
const mockFindOne = jest.fn();
const mockFindOneAndUpdate = jest.fn();
const mockCreate = jest.fn();

jest.mock('../../../src/models/StakePosition', () => ({
  StakePosition: {
    findOne: (...args: unknown[]) => mockFindOne(...args),
    findOneAndUpdate: (...args: unknown[]) => mockFindOneAndUpdate(...args),
    create: (...args: unknown[]) => mockCreate(...args),
  },
}));

const position = { principal: 1000n, accruedReward: 5n, lastSettledAt: 10 };

describe('InMemoryPositionStore', () => {
  let store: InMemoryPositionStore;

  beforeEach(() => {
    store = new InMemoryPositionStore();
  });

  it('should return null for an unknown participant', async () => {
    expect(await store.load('alice')).toBeNull();
  });

  it('should create at version 1 and increment on each write', async () => {
    expect(await store.save('alice', position, null)).toBe(1);
    expect(await store.save('alice', { ...position, principal: 2000n }, 1)).toBe(2);

    expect(await store.load('alice')).toEqual({
      position: { principal: 2000n, accruedReward: 5n, lastSettledAt: 10 },
      version: 2,
    });
  });

  it('should reject a stale version', async () => {
    await store.save('alice', position, null);

    await expect(store.save('alice', position, null)).rejects.toMatchObject({
      errorCode: ErrorCode.CONCURRENT_MODIFICATION,
    });
    await expect(store.save('alice', position, 7)).rejects.toBeInstanceOf(ApiError);
  });

  it('should hand out copies', async () => {
    await store.save('alice', position, null);
    const loaded = await store.load('alice');
    if (loaded) {
      loaded.position.principal = 0n;
    }

    expect((await store.load('alice'))?.position.principal).toBe(1000n);
  });
});

describe('MongoPositionStore', () => {
  const store = new MongoPositionStore();
  const decimal = (value: string) => mongoose.Types.Decimal128.fromString(value);

  beforeEach(() => {
    jest.clearAllMocks();
  });

  it('should convert stored decimals to bigint', async () => {
    mockFindOne.mockResolvedValueOnce({
      principal: decimal('340282366920938463463374607431768211456'),
      accruedReward: decimal('12'),
      lastSettledAt: 99,
      version: 4,
    });

    expect(await store.load('alice')).toEqual({
      position: {
        principal: 2n ** 128n,
        accruedReward: 12n,
        lastSettledAt: 99,
      },
      version: 4,
    });
  });

  it('should update only the expected version', async () => {
    mockFindOneAndUpdate.mockResolvedValueOnce({ version: 3 });

    expect(await store.save('alice', position, 2)).toBe(3);
    expect(mockFindOneAndUpdate).toHaveBeenCalledWith(
      { participantId: 'alice', version: 2 },
      {
        $set: {
          principal: decimal('1000'),
          accruedReward: decimal('5'),
          lastSettledAt: 10,
        },
        $inc: { version: 1 },
      },
      { new: true }
    );
  });

  it('should report a conflict when no document matches the version', async () => {
    mockFindOneAndUpdate.mockResolvedValueOnce(null);

    await expect(store.save('alice', position, 2)).rejects.toMatchObject({
      errorCode: ErrorCode.CONCURRENT_MODIFICATION,
    });
  });

  it('should insert the first write at version 1', async () => {
    mockCreate.mockResolvedValueOnce({ version: 1 });

    expect(await store.save('alice', position, null)).toBe(1);
    expect(mockCreate).toHaveBeenCalledWith({
      participantId: 'alice',
      principal: decimal('1000'),
      accruedReward: decimal('5'),
      lastSettledAt: 10,
      version: 1,
    });
  });

  it('should report a conflict when a concurrent insert won', async () => {
    mockCreate.mockRejectedValueOnce(Object.assign(new Error('E11000 duplicate key'), { code: 11000 }));

    await expect(store.save('alice', position, null)).rejects.toMatchObject({
      errorCode: ErrorCode.CONCURRENT_MODIFICATION,
    });
  });
});
