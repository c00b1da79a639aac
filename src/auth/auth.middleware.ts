import { Response, NextFunction } from 'express';

import { ApiError } from '../middlewares/errorHandler';
import { addLogContext } from '../observability';

import { authService } from './auth.service';
import { AuthRequest } from './auth.types';

export const authMiddleware = (req: AuthRequest, _res: Response, next: NextFunction): void => {
  try {
    const authHeader = req.headers.authorization;

    if (!authHeader) {
      throw ApiError.unauthorized('No authorization header provided');
    }

    if (!authHeader.startsWith('Bearer ')) {
      throw ApiError.unauthorized('Invalid authorization format. Use: Bearer <token>');
    }

    const token = authHeader.substring(7);

    if (!token) {
      throw ApiError.unauthorized('No token provided');
    }

    const payload = authService.verifyToken(token);

    req.participant = { participantId: payload.sub };
    addLogContext({ participantId: payload.sub });
    next();
  } catch (error) {
    next(error);
  }
};
