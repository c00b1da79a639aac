/**
 * A participant's staking record.
 *
 * principal and accruedReward are asset units; lastSettledAt is a unix
 * timestamp in whole seconds up to which reward has been folded in.
 */
export interface Position {
  principal: bigint;
  accruedReward: bigint;
  lastSettledAt: number;
}

/**
 * Position as held by a store, with the version used for compare-and-set writes.
 */
export interface StoredPosition {
  position: Position;
  version: number;
}

/**
 * Key-value persistence for positions.
 *
 * save() must reject with ApiError CONCURRENT_MODIFICATION when the stored
 * version differs from expectedVersion (null meaning "no record yet").
 */
export interface PositionStore {
  load(participantId: string): Promise<StoredPosition | null>;
  save(participantId: string, position: Position, expectedVersion: number | null): Promise<number>;
}

/**
 * Immutable rate parameters of a ledger instance.
 */
export interface AccrualConfig {
  readonly rateBps: number;
  readonly secondsPerYear: number;
}

/**
 * Current time in unix seconds.
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

export type LedgerOperation = 'deposit' | 'withdraw' | 'claim';

export interface DepositResult {
  participantId: string;
  amount: bigint;
  position: Position;
}

export interface WithdrawResult {
  participantId: string;
  amount: bigint;
  position: Position;
}

export interface ClaimResult {
  participantId: string;
  reward: bigint;
  position: Position;
}

export interface PositionView extends Position {
  participantId: string;
  pendingReward: bigint;
  asOf: number;
}
