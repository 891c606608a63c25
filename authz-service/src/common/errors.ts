/**
 * Error Handling Utilities
 *
 * Unified error handling for the service:
 * - Generic error utilities (getErrorMessage, normalizeError)
 * - HTTP error mapping (HttpError, toHttpError)
 * - GraphQL error handling (GraphQLError class, formatGraphQLError)
 * - Error code registry (registerServiceErrorCodes, getAllErrorCodes)
 */

import { GraphQLError as GraphQLErrorType } from 'graphql';
import { InvalidRequestError, StoreUnavailableError } from 'access-engine';
import { logger, getCorrelationId } from './logger.js';
import { AUTHZ_ERRORS, type AuthzErrorCode } from '../error-codes.js';

// ═══════════════════════════════════════════════════════════════════
// Generic Error Utilities
// ═══════════════════════════════════════════════════════════════════

/**
 * Extract error message from any error type
 *
 * @example
 * ```typescript
 * try {
 *   await store.ping();
 * } catch (error) {
 *   logger.error('Ping failed', { error: getErrorMessage(error) });
 * }
 * ```
 */
export function getErrorMessage(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  if (typeof error === 'string') {
    return error;
  }
  if (error && typeof error === 'object' && 'message' in error) {
    return String(error.message);
  }
  return String(error);
}

/**
 * Create a standardized error object from any error type
 */
export function normalizeError(error: unknown): { message: string; stack?: string } {
  if (error instanceof Error) {
    return {
      message: error.message,
      stack: error.stack,
    };
  }
  return {
    message: getErrorMessage(error),
  };
}

// ═══════════════════════════════════════════════════════════════════
// HTTP Errors
// ═══════════════════════════════════════════════════════════════════

/**
 * Error with an HTTP status and a service error code.
 * Thrown by the gateway; rendered as `{ error: { code, message } }`.
 */
export class HttpError extends Error {
  readonly status: number;
  readonly code: AuthzErrorCode;

  constructor(status: number, code: AuthzErrorCode, message: string) {
    super(message);
    this.name = 'HttpError';
    this.status = status;
    this.code = code;
  }

  toBody(): { error: { code: string; message: string } } {
    return { error: { code: this.code, message: this.message } };
  }
}

/**
 * Map any error reaching the transport boundary to an HttpError.
 * A store failure maps to 503 and is never reported as a deny.
 */
export function toHttpError(error: unknown): HttpError {
  if (error instanceof HttpError) {
    return error;
  }
  if (error instanceof InvalidRequestError) {
    return new HttpError(400, AUTHZ_ERRORS.InvalidRequest, error.message);
  }
  if (error instanceof StoreUnavailableError) {
    return new HttpError(503, AUTHZ_ERRORS.StoreUnavailable, error.message);
  }
  logger.error('Unhandled error', normalizeError(error));
  return new HttpError(500, AUTHZ_ERRORS.ServerError, 'Internal server error');
}

// ═══════════════════════════════════════════════════════════════════
// GraphQL Error Handling
// ═══════════════════════════════════════════════════════════════════

/**
 * Format string to CapitalCamelCase
 * Examples:
 * - "user not found" -> "UserNotFound"
 * - "MSAuthzInvalidRequest" -> "MSAuthzInvalidRequest" (already formatted)
 * - "store_unavailable" -> "StoreUnavailable"
 */
export function formatToCapitalCamelCase(str: string): string {
  if (!str) return 'RuntimeError';

  if (/^[A-Z]/.test(str)) {
    return str;
  }

  return str
    .toLowerCase()
    .replace(/[^a-z0-9]+/g, ' ')
    .trim()
    .split(' ')
    .map(word => word.charAt(0).toUpperCase() + word.slice(1))
    .join('');
}

/**
 * GraphQL Error Class
 *
 * Error class for GraphQL resolvers with extensions support.
 * Messages are formatted to CapitalCamelCase and logged on creation:
 * at `error` for 5xx (or no status), at `debug` for client errors.
 *
 * @example
 * ```typescript
 * throw new GraphQLError(AUTHZ_ERRORS.InvalidRequest, { fields: ['action'] });
 * ```
 */
export class GraphQLError extends Error {
  public extensions: Record<string, unknown>;

  constructor(type: string, details?: Record<string, unknown>) {
    const formattedMessage = formatToCapitalCamelCase(type);
    super(formattedMessage);

    this.name = 'GraphQLError';
    this.extensions = { ...details, code: formattedMessage };

    if (Error.captureStackTrace) {
      Error.captureStackTrace(this, GraphQLError);
    }

    const status = this.extensions.status;
    const entry = { code: formattedMessage, details: this.extensions, correlationId: getCorrelationId() };
    if (typeof status === 'number' && status < 500) {
      logger.debug('GraphQL request rejected', entry);
    } else {
      logger.error('GraphQL Error', entry);
    }
  }

  /**
   * Convert any error to a GraphQLError carrying the matching service code
   */
  static format(error: unknown): GraphQLError {
    if (error instanceof GraphQLError) {
      return error;
    }
    const http = toHttpError(error);
    return new GraphQLError(http.code, {
      status: http.status,
      originalError: http.message,
    });
  }
}

/**
 * Format error for a GraphQL response
 *
 * @example
 * ```typescript
 * try {
 *   return await engine.isAllowed(request);
 * } catch (error) {
 *   throw formatGraphQLError(error);
 * }
 * ```
 */
export function formatGraphQLError(
  error: unknown,
  context?: { correlationId?: string }
): GraphQLErrorType {
  const formatted = GraphQLError.format(error);
  return new GraphQLErrorType(formatted.message, {
    extensions: {
      ...formatted.extensions,
      correlationId: context?.correlationId || getCorrelationId(),
    },
    originalError: formatted,
  });
}

// ═══════════════════════════════════════════════════════════════════
// Error Code Registry
// ═══════════════════════════════════════════════════════════════════

const errorCodeRegistry = new Set<string>();

/**
 * Register error codes from a service
 * Called during initialization
 */
export function registerServiceErrorCodes(codes: readonly string[]): void {
  codes.forEach(code => errorCodeRegistry.add(code));
}

/**
 * Get all registered error codes as a sorted flat array
 */
export function getAllErrorCodes(): string[] {
  return Array.from(errorCodeRegistry).sort();
}
