/**
 * Reward accrual arithmetic
 *
 * Pure functions over Position values. All amounts are bigint, so the
 * principal * rate * elapsed product never overflows, and the division
 * truncates toward zero (floor, since every operand is non-negative).
 * Tiny principal * elapsed products therefore accrue nothing: that is the
 * precision floor of integer reward, not an error.
 */

import { ApiError } from '../../middlewares/errorHandler';

import { AccrualConfig, Position } from './staking.types';

export const BPS_DENOMINATOR = 10_000n;

export const DEFAULT_RATE_BPS = 1000;
export const DEFAULT_SECONDS_PER_YEAR = 31_536_000;

/**
 * Validate and freeze rate parameters.
 */
export function createAccrualConfig(
  rateBps: number = DEFAULT_RATE_BPS,
  secondsPerYear: number = DEFAULT_SECONDS_PER_YEAR
): AccrualConfig {
  if (!Number.isSafeInteger(rateBps) || rateBps < 0) {
    throw new Error(`rateBps must be a non-negative integer, got ${rateBps}`);
  }
  if (!Number.isSafeInteger(secondsPerYear) || secondsPerYear <= 0) {
    throw new Error(`secondsPerYear must be a positive integer, got ${secondsPerYear}`);
  }
  return Object.freeze({ rateBps, secondsPerYear });
}

export function emptyPosition(now: number): Position {
  return { principal: 0n, accruedReward: 0n, lastSettledAt: now };
}

/**
 * Seconds between the last settlement and now.
 * A clock behind the last settlement is rejected, never clamped.
 */
export function elapsedSince(position: Position, now: number): bigint {
  if (!Number.isSafeInteger(now)) {
    throw ApiError.internal(`Timestamp must be an integer number of seconds, got ${now}`);
  }
  if (now < position.lastSettledAt) {
    throw ApiError.clockRegression(position.lastSettledAt, now);
  }
  return BigInt(now - position.lastSettledAt);
}

/**
 * floor(principal * rateBps * elapsed / (secondsPerYear * 10000))
 */
export function accrue(principal: bigint, elapsed: bigint, config: AccrualConfig): bigint {
  if (principal <= 0n || elapsed <= 0n) {
    return 0n;
  }
  return (
    (principal * BigInt(config.rateBps) * elapsed) /
    (BigInt(config.secondsPerYear) * BPS_DENOMINATOR)
  );
}

/**
 * Fold elapsed time into accruedReward and move lastSettledAt to now.
 *
 * lastSettledAt advances even with zero principal, so time spent unstaked
 * is consumed without reward. Settling twice at the same now is a no-op.
 */
export function settle(position: Position, now: number, config: AccrualConfig): Position {
  const delta = accrue(position.principal, elapsedSince(position, now), config);
  return {
    principal: position.principal,
    accruedReward: position.accruedReward + delta,
    lastSettledAt: now,
  };
}

/**
 * What settle() would leave in accruedReward at now, without mutating anything.
 */
export function pendingReward(position: Position, now: number, config: AccrualConfig): bigint {
  return settle(position, now, config).accruedReward;
}
