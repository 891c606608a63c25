/**
 * JWT - Caller identity via the jsonwebtoken package
 *
 * Tokens authenticate the calling service, not the user a decision is about.
 */

import jwt from 'jsonwebtoken';
import type { JwtPayload, VerifyOptions } from 'jsonwebtoken';
import { logger } from './logger.js';
import { getErrorMessage } from './errors.js';

export interface JwtConfig {
  secret: string;
  audience?: string;
  issuer?: string;
}

/** Verified caller of the decision API */
export interface CallerIdentity {
  subject?: string;
  claims: JwtPayload;
}

/** Verify an HS256 bearer token. Returns null when the token is rejected. */
export function verifyToken(token: string, config: JwtConfig): CallerIdentity | null {
  const options: VerifyOptions = {
    algorithms: ['HS256'],
    ...(config.issuer && { issuer: config.issuer }),
    ...(config.audience && { audience: config.audience }),
  };

  let payload: string | JwtPayload;
  try {
    payload = jwt.verify(token, config.secret, options);
  } catch (error) {
    logger.debug('Token verification failed', { error: getErrorMessage(error) });
    return null;
  }

  if (typeof payload === 'string') {
    logger.debug('Token verification failed: payload is not an object');
    return null;
  }

  return { subject: payload.sub, claims: payload };
}

/** Extract Bearer token from Authorization header */
export function extractToken(header: string | undefined): string | null {
  if (!header) return null;
  const [type, token] = header.split(' ');
  return type?.toLowerCase() === 'bearer' ? token || null : null;
}
