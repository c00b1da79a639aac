/**
 * Accrual Ledger
 *
 * Owns every staking position. Each operation settles the participant's
 * reward up to `now` before it reads or changes principal, and all
 * mutations for one participant are serialised through the participant lock.
 *
 * Ordering:
 * - deposit: settle -> transferIn -> credit principal (nothing is written
 *   unless the asset arrived; a credit that cannot be written is refunded)
 * - withdraw / claim: settle -> debit and persist -> transferOut -> on
 *   failure restore. The debit is visible before the asset leaves, so a
 *   reentrant call from the transfer cannot spend the same principal or
 *   reward twice.
 */

import { v4 as uuid } from 'uuid';

import { ApiError } from '../../middlewares/errorHandler';
import { addLogContext } from '../../observability/log-context';
import { createServiceLogger } from '../../observability/logger';
import {
  eventPublishFailuresTotal,
  stakingOperationDuration,
  stakingOperationsTotal,
  stakingReconciliationFailuresTotal,
  stakingRollbacksTotal,
} from '../../observability/metrics';
import { ErrorCode } from '../../types/errors';
import { EventPublisher, EventType, StakingEvent } from '../../types/events';
import { AssetTransfer } from '../asset/asset.types';

import { elapsedSince, emptyPosition, pendingReward, settle } from './staking.accrual';
import { ParticipantLock } from './staking.lock';
import {
  AccrualConfig,
  ClaimResult,
  DepositResult,
  LedgerOperation,
  Position,
  PositionStore,
  PositionView,
  WithdrawResult,
} from './staking.types';

const log = createServiceLogger('accrual-ledger');

const DEFAULT_MAX_WRITE_RETRIES = 5;

export interface AccrualLedgerOptions {
  store: PositionStore;
  assets: AssetTransfer;
  events: EventPublisher;
  config: AccrualConfig;
  lock?: ParticipantLock;
  /**
   * Attempts for writes that must land because an asset already moved
   * (deposit credit, compensating rollback)
   */
  maxWriteRetries?: number;
}

/**
 * Position as read for an operation; version is null when nothing is stored yet
 */
interface LoadedPosition {
  position: Position;
  version: number | null;
}

const isConflict = (error: unknown): boolean =>
  error instanceof ApiError && error.errorCode === ErrorCode.CONCURRENT_MODIFICATION;

export class AccrualLedger {
  private readonly store: PositionStore;
  private readonly assets: AssetTransfer;
  private readonly events: EventPublisher;
  private readonly config: AccrualConfig;
  private readonly lock: ParticipantLock;
  private readonly maxWriteRetries: number;

  constructor(options: AccrualLedgerOptions) {
    this.store = options.store;
    this.assets = options.assets;
    this.events = options.events;
    this.config = Object.freeze({ ...options.config });
    this.lock = options.lock ?? new ParticipantLock();

    const maxWriteRetries = options.maxWriteRetries ?? DEFAULT_MAX_WRITE_RETRIES;
    if (!Number.isSafeInteger(maxWriteRetries) || maxWriteRetries < 1) {
      throw new Error(`maxWriteRetries must be a positive integer, got ${maxWriteRetries}`);
    }
    this.maxWriteRetries = maxWriteRetries;
  }

  getConfig(): AccrualConfig {
    return this.config;
  }

  async deposit(participantId: string, amount: bigint, now: number): Promise<DepositResult> {
    return this.instrument('deposit', participantId, () =>
      this.lock.run(participantId, async () => {
        if (amount <= 0n) {
          throw ApiError.invalidAmount();
        }

        // Rejects a regressed clock before any asset moves
        const loaded = await this.loadOrCreate(participantId, now);
        elapsedSince(loaded.position, now);

        const transfer = await this.assets.transferIn(participantId, amount);
        if (!transfer.success) {
          throw ApiError.transferFailed(transfer.reason);
        }

        let position: Position;
        try {
          position = await this.writeWithRetry(participantId, now, (current) => {
            // A reentrant call during the transfer may have settled already
            const settled = settle(current, Math.max(now, current.lastSettledAt), this.config);
            return { ...settled, principal: settled.principal + amount };
          });
        } catch (error) {
          await this.refundDeposit(participantId, amount, error);
          throw error;
        }

        await this.emit({
          eventId: uuid(),
          eventType: EventType.DEPOSITED,
          participantId,
          timestamp: new Date(now * 1000),
          payload: { amount: amount.toString(), principal: position.principal.toString() },
        });

        return { participantId, amount, position };
      })
    );
  }

  async withdraw(participantId: string, amount: bigint, now: number): Promise<WithdrawResult> {
    return this.instrument('withdraw', participantId, () =>
      this.lock.run(participantId, async () => {
        if (amount <= 0n) {
          throw ApiError.invalidAmount();
        }

        const loaded = await this.loadOrCreate(participantId, now);
        const settled = settle(loaded.position, now, this.config);

        if (amount > settled.principal) {
          throw ApiError.insufficientPrincipal(
            `Withdrawal of ${amount} exceeds staked principal of ${settled.principal}`
          );
        }

        const position: Position = { ...settled, principal: settled.principal - amount };
        const version = await this.store.save(participantId, position, loaded.version);

        const transfer = await this.assets.transferOut(participantId, amount);
        if (!transfer.success) {
          await this.rollback('withdraw', participantId, now, loaded, version, (current) => ({
            ...current,
            principal: current.principal + amount,
          }));
          throw ApiError.transferFailed(transfer.reason);
        }

        await this.emit({
          eventId: uuid(),
          eventType: EventType.WITHDRAWN,
          participantId,
          timestamp: new Date(now * 1000),
          payload: { amount: amount.toString(), principal: position.principal.toString() },
        });

        return { participantId, amount, position };
      })
    );
  }

  async claimReward(participantId: string, now: number): Promise<ClaimResult> {
    return this.instrument('claim', participantId, () =>
      this.lock.run(participantId, async () => {
        const loaded = await this.loadOrCreate(participantId, now);
        const settled = settle(loaded.position, now, this.config);
        const reward = settled.accruedReward;

        if (reward === 0n) {
          throw ApiError.noRewardAvailable();
        }

        const position: Position = { ...settled, accruedReward: 0n };
        const version = await this.store.save(participantId, position, loaded.version);

        const transfer = await this.assets.transferOut(participantId, reward);
        if (!transfer.success) {
          await this.rollback('claim', participantId, now, loaded, version, (current) => ({
            ...current,
            accruedReward: current.accruedReward + reward,
          }));
          throw ApiError.transferFailed(transfer.reason);
        }

        await this.emit({
          eventId: uuid(),
          eventType: EventType.REWARD_CLAIMED,
          participantId,
          timestamp: new Date(now * 1000),
          payload: { reward: reward.toString(), principal: position.principal.toString() },
        });

        return { participantId, reward, position };
      })
    );
  }

  /**
   * Reward a participant could claim at `now`. Reads only.
   */
  async pendingReward(participantId: string, now: number): Promise<bigint> {
    const stored = await this.store.load(participantId);
    if (!stored) {
      return 0n;
    }
    return pendingReward(stored.position, now, this.config);
  }

  async getPosition(participantId: string, now: number): Promise<PositionView> {
    const { position } = await this.loadOrCreate(participantId, now);
    return {
      participantId,
      ...position,
      pendingReward: pendingReward(position, now, this.config),
      asOf: now,
    };
  }

  private async loadOrCreate(participantId: string, now: number): Promise<LoadedPosition> {
    const stored = await this.store.load(participantId);
    return stored ?? { position: emptyPosition(now), version: null };
  }

  /**
   * Apply a change to whatever is currently stored, retrying on version
   * conflicts. Used only once an asset has moved, so giving up means the
   * position and custody disagree.
   */
  private async writeWithRetry(
    participantId: string,
    now: number,
    change: (current: Position) => Position
  ): Promise<Position> {
    let attempt = 0;
    for (;;) {
      attempt += 1;
      const loaded = await this.loadOrCreate(participantId, now);
      const next = change(loaded.position);
      try {
        await this.store.save(participantId, next, loaded.version);
        return next;
      } catch (error) {
        if (!isConflict(error) || attempt >= this.maxWriteRetries) {
          log.error({ err: error, participantId, attempt }, 'Position write failed after asset movement');
          throw error;
        }
        log.warn({ participantId, attempt }, 'Position write conflict, retrying');
      }
    }
  }

  /**
   * Undo a persisted debit after its outbound transfer failed.
   *
   * The pre-operation snapshot is restored exactly when nothing else wrote in
   * between; otherwise the inverse change is applied to the current position.
   */
  private async rollback(
    operation: LedgerOperation,
    participantId: string,
    now: number,
    snapshot: LoadedPosition,
    committedVersion: number,
    inverse: (current: Position) => Position
  ): Promise<void> {
    try {
      await this.store.save(participantId, snapshot.position, committedVersion);
      stakingRollbacksTotal.inc({ operation, mode: 'snapshot' });
      log.warn({ participantId, operation }, 'Transfer failed, position restored');
      return;
    } catch (error) {
      if (!isConflict(error)) {
        this.reconciliationRequired(operation, participantId, error);
        throw error;
      }
    }

    try {
      await this.writeWithRetry(participantId, now, inverse);
    } catch (error) {
      this.reconciliationRequired(operation, participantId, error);
      throw error;
    }
    stakingRollbacksTotal.inc({ operation, mode: 'compensation' });
    log.warn({ participantId, operation }, 'Transfer failed, debit compensated');
  }

  /**
   * Return a deposit to the participant when its credit could not be written.
   */
  private async refundDeposit(participantId: string, amount: bigint, cause: unknown): Promise<void> {
    const refund = await this.assets.transferOut(participantId, amount);
    if (refund.success) {
      stakingRollbacksTotal.inc({ operation: 'deposit', mode: 'refund' });
      log.warn(
        { participantId, amount: amount.toString(), transferId: refund.transferId },
        'Deposit credit failed, transfer refunded'
      );
      return;
    }
    this.reconciliationRequired('deposit', participantId, cause, {
      amount: amount.toString(),
      refundFailure: refund.reason,
    });
  }

  private reconciliationRequired(
    operation: LedgerOperation,
    participantId: string,
    error: unknown,
    details: Record<string, string> = {}
  ): void {
    stakingReconciliationFailuresTotal.inc({ operation });
    log.fatal(
      { err: error, participantId, operation, ...details },
      'Position and custody disagree; reconciliation required'
    );
  }

  /**
   * Events are published after the operation committed. The asset movement
   * cannot be undone at this point, so a publish failure is logged and counted.
   */
  private async emit(event: StakingEvent): Promise<void> {
    try {
      await this.events.publish(event);
    } catch (error) {
      eventPublishFailuresTotal.inc({ event_type: event.eventType });
      log.error(
        { err: error, eventId: event.eventId, eventType: event.eventType },
        'Failed to publish staking event'
      );
    }
  }

  private async instrument<T>(
    operation: LedgerOperation,
    participantId: string,
    fn: () => Promise<T>
  ): Promise<T> {
    addLogContext({ participantId, operation });
    const endTimer = stakingOperationDuration.startTimer({ operation });
    try {
      const result = await fn();
      stakingOperationsTotal.inc({ operation, outcome: 'success' });
      log.info({ participantId, operation }, 'Staking operation completed');
      return result;
    } catch (error) {
      const outcome = error instanceof ApiError ? ErrorCode[error.errorCode] : 'error';
      stakingOperationsTotal.inc({ operation, outcome });
      if (error instanceof ApiError && error.errorCode === ErrorCode.CLOCK_REGRESSION) {
        log.fatal({ participantId, operation, err: error }, 'Clock regression detected');
      } else {
        log.info({ participantId, operation, outcome }, 'Staking operation rejected');
      }
      throw error;
    } finally {
      endTimer();
    }
  }
}
