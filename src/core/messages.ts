/**
 * Message types every endpoint can bind to without declaring its own.
 */

import type { Claims, MessageType, ProtocolMessage } from '../types/message.js';
import type { ErrorResponseClaims } from '../types/errors.js';
import { defineMessageType, type Message } from './message.js';

/** Free-form message: any claims, nothing required. */
export const GenericMessage: MessageType<Message> = defineMessageType({
  name: 'Message',
  schema: { type: 'object', properties: {} },
});

/** OAuth 2.0 error response (RFC 6749 §5.2). */
export const ErrorResponse: MessageType<Message> = defineMessageType({
  name: 'ErrorResponse',
  schema: {
    type: 'object',
    required: ['error'],
    properties: {
      error: { type: 'string' },
      error_description: { type: 'string' },
      error_uri: { type: 'string' },
      state: { type: 'string' },
    },
  },
});

/** Build an error message of `type` from error claims, leaving out unset fields. */
export function createErrorMessage(type: MessageType, claims: ErrorResponseClaims): ProtocolMessage {
  const values: Claims = { error: claims.error };
  if (claims.error_description !== undefined) values['error_description'] = claims.error_description;
  if (claims.error_uri !== undefined) values['error_uri'] = claims.error_uri;
  if (claims.state !== undefined) values['state'] = claims.state;
  return type.create(values);
}

/** True when `message` is an error response. */
export function isErrorMessage(message: ProtocolMessage): boolean {
  return message.has('error');
}
