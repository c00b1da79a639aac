import { Router, Request, RequestHandler, Response, NextFunction } from 'express';

import { authMiddleware } from '../../auth/auth.middleware';
import { idempotencyMiddleware, validateIdempotencyKey } from '../../middlewares/idempotency';
import { validateRequest } from '../../middlewares/validateRequest';

import { StakingController } from './staking.controller';
import { amountValidation, participantParamValidation } from './staking.validation';

/**
 * Staking API Routes
 *
 * Mutations act on the authenticated caller's own position;
 * reads take any participant ID.
 */
export const createStakingRoutes = (controller: StakingController): Router => {
  const router = Router();

  const mutation: RequestHandler[] = [authMiddleware, validateIdempotencyKey, idempotencyMiddleware];

  // POST /staking/deposit - Stake funds
  router.post(
    '/deposit',
    mutation,
    amountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.deposit(req, res, next)
  );

  // POST /staking/withdraw - Withdraw staked principal
  router.post(
    '/withdraw',
    mutation,
    amountValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.withdraw(req, res, next)
  );

  // POST /staking/claim - Claim accrued reward
  router.post('/claim', mutation, (req: Request, res: Response, next: NextFunction) =>
    controller.claim(req, res, next)
  );

  // GET /staking/config - Rate parameters
  router.get('/config', (req: Request, res: Response) => controller.getConfig(req, res));

  // GET /staking/positions/:participantId - Position with pending reward
  router.get(
    '/positions/:participantId',
    participantParamValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) => controller.getPosition(req, res, next)
  );

  // GET /staking/positions/:participantId/pending-reward
  router.get(
    '/positions/:participantId/pending-reward',
    participantParamValidation,
    validateRequest,
    (req: Request, res: Response, next: NextFunction) =>
      controller.getPendingReward(req, res, next)
  );

  return router;
};
