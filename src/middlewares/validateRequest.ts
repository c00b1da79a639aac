import { Request, Response, NextFunction } from 'express';
import { validationResult } from 'express-validator';

import { ApiError } from './errorHandler';

/**
 * Reusable validation middleware that extracts express-validator errors
 * and formats them into a consistent error response
 */
export const validateRequest = (req: Request, _res: Response, next: NextFunction): void => {
  const errors = validationResult(req);

  if (!errors.isEmpty()) {
    const validationErrors = errors.array().reduce<Record<string, string[]>>((acc, err) => {
      const field = err.type === 'field' ? err.path : err.type;
      if (!acc[field]) acc[field] = [];
      acc[field].push(String(err.msg));
      return acc;
    }, {});
    next(ApiError.validationError('Validation failed', validationErrors));
    return;
  }

  next();
};
