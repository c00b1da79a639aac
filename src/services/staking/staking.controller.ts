import { Request, Response, NextFunction } from 'express';

import { AuthRequest } from '../../auth/auth.types';
import { ApiError } from '../../middlewares/errorHandler';

import { BPS_DENOMINATOR } from './staking.accrual';
import { AccrualLedger } from './staking.ledger';
import { Clock, Position, PositionView } from './staking.types';
import { toAmount } from './staking.validation';

const serializePosition = (position: Position) => ({
  principal: position.principal.toString(),
  accruedReward: position.accruedReward.toString(),
  lastSettledAt: position.lastSettledAt,
});

const serializeView = (view: PositionView) => ({
  participantId: view.participantId,
  ...serializePosition(view),
  pendingReward: view.pendingReward.toString(),
  asOf: view.asOf,
});

const requireParticipant = (req: AuthRequest): string => {
  if (!req.participant) {
    throw ApiError.unauthorized('Not authenticated');
  }
  return req.participant.participantId;
};

/**
 * Operation surface of the ledger: resolves the caller and the current
 * time, then delegates.
 */
export class StakingController {
  constructor(
    private readonly ledger: AccrualLedger,
    private readonly clock: Clock
  ) {}

  /**
   * Stake funds
   * POST /staking/deposit
   */
  async deposit(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const participantId = requireParticipant(req);
      const amount = toAmount(req.body?.amount);

      const result = await this.ledger.deposit(participantId, amount, this.clock());

      res.status(200).json({
        success: true,
        data: {
          participantId,
          amount: result.amount.toString(),
          position: serializePosition(result.position),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Withdraw staked principal
   * POST /staking/withdraw
   */
  async withdraw(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const participantId = requireParticipant(req);
      const amount = toAmount(req.body?.amount);

      const result = await this.ledger.withdraw(participantId, amount, this.clock());

      res.status(200).json({
        success: true,
        data: {
          participantId,
          amount: result.amount.toString(),
          position: serializePosition(result.position),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * Claim all accrued reward
   * POST /staking/claim
   */
  async claim(req: AuthRequest, res: Response, next: NextFunction): Promise<void> {
    try {
      const participantId = requireParticipant(req);

      const result = await this.ledger.claimReward(participantId, this.clock());

      res.status(200).json({
        success: true,
        data: {
          participantId,
          reward: result.reward.toString(),
          position: serializePosition(result.position),
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /staking/positions/:participantId/pending-reward
   */
  async getPendingReward(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const { participantId } = req.params;
      const now = this.clock();
      const pendingReward = await this.ledger.pendingReward(participantId, now);

      res.status(200).json({
        success: true,
        data: {
          participantId,
          pendingReward: pendingReward.toString(),
          asOf: now,
        },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /staking/positions/:participantId
   */
  async getPosition(req: Request, res: Response, next: NextFunction): Promise<void> {
    try {
      const view = await this.ledger.getPosition(req.params.participantId, this.clock());

      res.status(200).json({
        success: true,
        data: { position: serializeView(view) },
      });
    } catch (error) {
      next(error);
    }
  }

  /**
   * GET /staking/config
   */
  getConfig(_req: Request, res: Response): void {
    const { rateBps, secondsPerYear } = this.ledger.getConfig();
    res.status(200).json({
      success: true,
      data: { rateBps, secondsPerYear, bpsDenominator: Number(BPS_DENOMINATOR) },
    });
  }
}
