/**
 * Route handlers
 *
 * Transport-free: each takes parsed input and returns a status and a JSON
 * body, so the HTTP server only does I/O.
 */

import { type } from 'arktype';
import type { AccessEngine, DirectoryStore } from 'access-engine';
import { extractToken, verifyToken, type CallerIdentity, type JwtConfig } from '../common/jwt.js';
import { HttpError, getErrorMessage, toHttpError } from '../common/errors.js';
import { createChildLogger } from '../common/logger.js';
import { validateInput, isValidationFailure } from '../common/validation/arktype.js';
import { AUTHZ_ERRORS } from '../error-codes.js';

const log = createChildLogger({ component: 'gateway' });

export interface HandlerResult {
  status: number;
  body: unknown;
}

const isAllowedBodySchema = type({
  external_user_id: 'string',
  namespace: 'string',
  action: 'string',
  resource: 'string',
});

// ═══════════════════════════════════════════════════════════════════
// Authentication
// ═══════════════════════════════════════════════════════════════════

/**
 * Verify the caller's bearer token
 *
 * @throws HttpError 401 when the header is missing or the token is rejected
 */
export function authenticate(authorization: string | undefined, jwt: JwtConfig): CallerIdentity {
  const token = extractToken(authorization);
  if (!token) {
    throw new HttpError(401, AUTHZ_ERRORS.Unauthorized, 'Missing bearer token');
  }
  const caller = verifyToken(token, jwt);
  if (!caller) {
    throw new HttpError(401, AUTHZ_ERRORS.InvalidToken, 'Invalid or expired token');
  }
  return caller;
}

// ═══════════════════════════════════════════════════════════════════
// Decision
// ═══════════════════════════════════════════════════════════════════

/**
 * POST /v1/isallowed
 */
export async function handleIsAllowed(engine: AccessEngine, body: unknown): Promise<HandlerResult> {
  const input = validateInput(isAllowedBodySchema(body));
  if (isValidationFailure(input)) {
    return errorResult(new HttpError(422, AUTHZ_ERRORS.ValidationError, input.errors.join('; ')));
  }

  try {
    const decision = await engine.isAllowed({
      externalUserId: input.external_user_id,
      namespace: input.namespace,
      action: input.action,
      resource: input.resource,
    });
    return { status: 200, body: { result: decision.result } };
  } catch (error) {
    return errorResult(toHttpError(error));
  }
}

// ═══════════════════════════════════════════════════════════════════
// Health
// ═══════════════════════════════════════════════════════════════════

/**
 * GET /healthz
 */
export async function handleHealth(
  store: DirectoryStore,
  info: { service: string; startedAt: number }
): Promise<HandlerResult> {
  let healthy = true;
  if (store.ping) {
    try {
      healthy = await store.ping();
    } catch (error) {
      log.warn('Directory store ping failed', { error: getErrorMessage(error) });
      healthy = false;
    }
  }

  return {
    status: healthy ? 200 : 503,
    body: {
      status: healthy ? 'ok' : 'degraded',
      service: info.service,
      uptime: (Date.now() - info.startedAt) / 1000,
      timestamp: new Date().toISOString(),
    },
  };
}

// ═══════════════════════════════════════════════════════════════════
// Errors
// ═══════════════════════════════════════════════════════════════════

export function errorResult(error: HttpError): HandlerResult {
  if (error.status >= 500) {
    log.error('Request failed', { status: error.status, code: error.code, error: error.message });
  } else {
    log.debug('Request rejected', { status: error.status, code: error.code, error: error.message });
  }
  return { status: error.status, body: error.toBody() };
}
