/**
 * Error classes raised by the endpoint core and the message layer.
 *
 * Only the three {@link MessageVerificationError} kinds are recovered inside
 * the parse pipeline (as `invalid_request` responses). Everything else is a
 * fault the host must surface itself; {@link httpStatusFor} gives it the
 * matching status code.
 */

import { errors as joseErrors } from 'jose';
import { ERROR_HTTP_STATUS, OAuthErrorCode, type OAuthErrorCodeValue } from '../types/errors.js';

// ---------------------------------------------------------------------------
// Verification failures (recovered)
// ---------------------------------------------------------------------------

/** Base class for message verification failures. */
export abstract class MessageVerificationError extends Error {
  /** Claim that failed verification. */
  readonly field?: string;

  constructor(message: string, field?: string) {
    super(message);
    if (field !== undefined) {
      this.field = field;
    }
  }
}

/** A required claim is absent. */
export class MissingRequiredAttributeError extends MessageVerificationError {
  constructor(field: string) {
    super(`Missing required attribute '${field}'`, field);
    this.name = 'MissingRequiredAttributeError';
  }
}

/** A required claim is present but empty. */
export class MissingRequiredValueError extends MessageVerificationError {
  constructor(field: string) {
    super(`Missing required value for '${field}'`, field);
    this.name = 'MissingRequiredValueError';
  }
}

/** A claim has a value the schema does not allow. */
export class MessageValueError extends MessageVerificationError {
  constructor(message: string, field?: string) {
    super(message, field);
    this.name = 'MessageValueError';
  }
}

/** True for the failures the verify stage turns into `invalid_request`. */
export function isVerificationFailure(error: unknown): error is MessageVerificationError {
  return (
    error instanceof MissingRequiredAttributeError ||
    error instanceof MissingRequiredValueError ||
    error instanceof MessageValueError
  );
}

// ---------------------------------------------------------------------------
// Faults (propagated)
// ---------------------------------------------------------------------------

/** Wire input could not be decoded into a message. */
export class MessageDecodeError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'MessageDecodeError';
  }
}

/** Client authentication was required but missing, or it failed. */
export class UnauthorizedClientError extends Error {
  readonly code: OAuthErrorCodeValue = OAuthErrorCode.UNAUTHORIZED_CLIENT;

  constructor(message = 'Client authentication failed') {
    super(message);
    this.name = 'UnauthorizedClientError';
  }
}

/** The endpoint itself is misconfigured. Never a client error. */
export class EndpointConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'EndpointConfigError';
  }
}

// ---------------------------------------------------------------------------
// HTTP mapping
// ---------------------------------------------------------------------------

/**
 * HTTP status a host should answer with when `error` escapes the core.
 */
export function httpStatusFor(error: unknown): number {
  if (error instanceof UnauthorizedClientError) {
    return ERROR_HTTP_STATUS[error.code];
  }
  if (error instanceof MessageDecodeError || isVerificationFailure(error)) {
    return ERROR_HTTP_STATUS[OAuthErrorCode.INVALID_REQUEST];
  }
  if (error instanceof joseErrors.JOSEError) {
    return ERROR_HTTP_STATUS[OAuthErrorCode.INVALID_REQUEST];
  }
  return ERROR_HTTP_STATUS[OAuthErrorCode.SERVER_ERROR];
}
