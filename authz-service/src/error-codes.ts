/**
 * Authz Service Error Codes
 *
 * Follows the pattern: MS{Service}{ErrorName}
 */

export const AUTHZ_ERRORS = {
  // Request
  ValidationError: 'MSAuthzValidationError',
  InvalidRequest: 'MSAuthzInvalidRequest',
  PayloadTooLarge: 'MSAuthzPayloadTooLarge',

  // Identity
  Unauthorized: 'MSAuthzUnauthorized',
  InvalidToken: 'MSAuthzInvalidToken',

  // Directory
  StoreUnavailable: 'MSAuthzStoreUnavailable',

  // Routing
  NotFound: 'MSAuthzNotFound',
  MethodNotAllowed: 'MSAuthzMethodNotAllowed',

  // General
  ServerError: 'MSAuthzServerError',
} as const;

/**
 * Error code type
 */
export type AuthzErrorCode = typeof AUTHZ_ERRORS[keyof typeof AUTHZ_ERRORS];

/**
 * All error codes as array (for registration with the error-code registry)
 */
export const AUTHZ_ERROR_CODES: readonly AuthzErrorCode[] = Object.values(AUTHZ_ERRORS);
