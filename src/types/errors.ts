/**
 * OAuth 2.0 / OpenID Connect error codes and their default HTTP statuses.
 *
 * Codes follow RFC 6749 §4.1.2.1 / §5.2 and RFC 6750 §3.1. Error responses
 * carry them in the `error` claim.
 */

// ---------------------------------------------------------------------------
// Error codes
// ---------------------------------------------------------------------------

export const OAuthErrorCode = {
  INVALID_REQUEST: 'invalid_request',
  INVALID_CLIENT: 'invalid_client',
  INVALID_GRANT: 'invalid_grant',
  INVALID_TOKEN: 'invalid_token',
  UNAUTHORIZED_CLIENT: 'unauthorized_client',
  ACCESS_DENIED: 'access_denied',
  SERVER_ERROR: 'server_error',
} as const;

export type OAuthErrorCodeValue = (typeof OAuthErrorCode)[keyof typeof OAuthErrorCode];

// ---------------------------------------------------------------------------
// HTTP status defaults
// ---------------------------------------------------------------------------

/** Status a host should use when it surfaces each code as an HTTP error. */
export const ERROR_HTTP_STATUS: Record<OAuthErrorCodeValue, number> = {
  [OAuthErrorCode.INVALID_REQUEST]: 400,
  [OAuthErrorCode.INVALID_CLIENT]: 401,
  [OAuthErrorCode.INVALID_GRANT]: 400,
  [OAuthErrorCode.INVALID_TOKEN]: 401,
  [OAuthErrorCode.UNAUTHORIZED_CLIENT]: 401,
  [OAuthErrorCode.ACCESS_DENIED]: 403,
  [OAuthErrorCode.SERVER_ERROR]: 500,
};

// ---------------------------------------------------------------------------
// Error response shape
// ---------------------------------------------------------------------------

/** Claims of an error response message. */
export interface ErrorResponseClaims {
  error: string;
  error_description?: string;
  error_uri?: string;
  state?: string;
}
