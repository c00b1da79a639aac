import { Request } from 'express';

/**
 * Claims carried by a caller's bearer token.
 * `sub` is the participant identity the ledger keys positions by.
 */
export interface JWTPayload {
  sub: string;
  iat?: number;
  exp?: number;
}

export interface AuthenticatedParticipant {
  participantId: string;
}

export interface AuthRequest extends Request {
  participant?: AuthenticatedParticipant;
}
