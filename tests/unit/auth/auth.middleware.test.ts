/**
 * Auth Middleware Unit Tests
 */

import { Response, NextFunction } from 'express';

import { authMiddleware } from '../../../src/auth/auth.middleware';
import { AuthRequest } from '../../../src/auth/auth.types';
import { ErrorCode } from '../../../src/types/errors';
import { tokenFor } from '../../helpers';

describe('authMiddleware', () => {
  let mockNext: jest.Mock;

  const run = (authorization?: string): AuthRequest => {
    const req = { headers: authorization ? { authorization } : {} } as AuthRequest;
    authMiddleware(req, {} as Response, mockNext as NextFunction);
    return req;
  };

  beforeEach(() => {
    mockNext = jest.fn();
  });

  it('should attach the participant from a valid token', () => {
    const req = run(`Bearer ${tokenFor('alice')}`);

    expect(req.participant).toEqual({ participantId: 'alice' });
    expect(mockNext).toHaveBeenCalledWith();
  });

  it('should reject a request without an authorization header', () => {
    run();

    expect(mockNext).toHaveBeenCalledWith(
      expect.objectContaining({
        errorCode: ErrorCode.UNAUTHORIZED,
        message: 'No authorization header provided',
      })
    );
  });

  it('should reject a non-bearer scheme', () => {
    run('Basic dXNlcjpwYXNz');

    expect(mockNext).toHaveBeenCalledWith(
      expect.objectContaining({ errorCode: ErrorCode.UNAUTHORIZED })
    );
  });

  it('should reject an invalid token', () => {
    const req = run('Bearer garbage');

    expect(req.participant).toBeUndefined();
    expect(mockNext).toHaveBeenCalledWith(
      expect.objectContaining({ errorCode: ErrorCode.INVALID_TOKEN })
    );
  });
});
