import jwt, { SignOptions } from 'jsonwebtoken';

import { config } from '../config';
import { ApiError } from '../middlewares/errorHandler';

import { JWTPayload } from './auth.types';

/**
 * Resolves caller identity from bearer tokens.
 *
 * Identity management lives outside the ledger; this service only verifies
 * tokens signed with the shared secret. issueToken exists for operators and
 * test tooling that need to mint a token for a known participant.
 */
export class AuthService {
  constructor(private readonly secret: string = config.jwt.secret) {}

  issueToken(participantId: string, expiresIn: string = config.jwt.accessTokenExpiresIn): string {
    const options: SignOptions = {
      subject: participantId,
      expiresIn: expiresIn as SignOptions['expiresIn'],
    };
    return jwt.sign({}, this.secret, options);
  }

  verifyToken(token: string): JWTPayload {
    let decoded: string | jwt.JwtPayload;
    try {
      decoded = jwt.verify(token, this.secret);
    } catch (error) {
      if (error instanceof jwt.TokenExpiredError) {
        throw ApiError.tokenExpired();
      }
      if (error instanceof jwt.JsonWebTokenError) {
        throw ApiError.invalidToken();
      }
      throw ApiError.unauthorized('Token verification failed');
    }

    if (typeof decoded === 'string' || !decoded.sub) {
      throw ApiError.invalidToken('Token has no subject');
    }

    return { sub: decoded.sub, iat: decoded.iat, exp: decoded.exp };
  }
}

export const authService = new AuthService();
