/**
 * Minimal message types and endpoints for exercising the pipeline.
 *
 * These are deliberately small: a resource lookup in the style of
 * WebFinger, an authorization-style redirect endpoint, and a request type
 * carrying a signed field. They are fixtures, not protocol implementations.
 */

import type { EndpointContext } from '../types/context.js';
import type { Claims, ProtocolMessage } from '../types/message.js';
import { Endpoint, type EndpointOptions } from '../core/endpoint.js';
import { defineMessageType } from '../core/message.js';
import { ErrorResponse } from '../core/messages.js';

// ---------------------------------------------------------------------------
// Message types
// ---------------------------------------------------------------------------

export const LookupRequest = defineMessageType({
  name: 'LookupRequest',
  schema: {
    type: 'object',
    required: ['resource'],
    properties: {
      resource: { type: 'string' },
      rel: { type: ['string', 'array'], items: { type: 'string' } },
      client_id: { type: 'string' },
    },
  },
});

export const LookupResponse = defineMessageType({
  name: 'LookupResponse',
  schema: {
    type: 'object',
    properties: {
      subject: { type: 'string' },
      links: {
        type: 'array',
        items: {
          type: 'object',
          properties: { rel: { type: 'string' }, href: { type: 'string' } },
        },
      },
    },
  },
});

export const AuthorizationRequest = defineMessageType({
  name: 'AuthorizationRequest',
  schema: {
    type: 'object',
    required: ['response_type', 'client_id'],
    properties: {
      response_type: { type: 'string', enum: ['code', 'token'] },
      client_id: { type: 'string' },
      redirect_uri: { type: 'string' },
      scope: { type: 'string' },
      state: { type: 'string' },
    },
  },
});

export const AuthorizationResponse = defineMessageType({
  name: 'AuthorizationResponse',
  schema: {
    type: 'object',
    required: ['code'],
    properties: {
      code: { type: 'string' },
      state: { type: 'string' },
    },
  },
});

/** A request whose `request` claim must be a JWT signed by the client. */
export const SignedRequest = defineMessageType({
  name: 'SignedRequest',
  schema: {
    type: 'object',
    properties: {
      client_id: { type: 'string' },
      request: { type: 'string' },
    },
  },
  signedFields: ['request'],
});

// ---------------------------------------------------------------------------
// Endpoints
// ---------------------------------------------------------------------------

/** Resolves a `resource` to a subject and a link to the issuer. */
export class LookupEndpoint extends Endpoint {
  constructor(options?: EndpointOptions) {
    super(
      {
        name: 'lookup',
        path: '.well-known/webfinger',
        requestType: LookupRequest,
        responseType: LookupResponse,
        errorType: ErrorResponse,
        requestFormat: 'urlencoded',
        responseFormat: 'json',
      },
      options,
    );
  }

  async processRequest(context: EndpointContext, request?: ProtocolMessage): Promise<Claims> {
    const resource = request?.get('resource');
    if (typeof resource !== 'string') {
      return { error: 'invalid_request', error_description: 'Missing resource' };
    }
    return {
      subject: resource,
      links: [{ rel: 'http://openid.net/specs/connect/1.0/issuer', href: context.issuer }],
    };
  }
}

/** Issues a fixed code back to the client's redirect URI. */
export class RedirectEndpoint extends Endpoint {
  constructor(options?: EndpointOptions) {
    super(
      {
        name: 'authorization',
        path: 'authorization',
        requestType: AuthorizationRequest,
        responseType: AuthorizationResponse,
        errorType: ErrorResponse,
        requestFormat: 'url',
        responseFormat: 'urlencoded',
        responsePlacement: 'url',
      },
      options,
    );
  }

  async processRequest(_context: EndpointContext, request?: ProtocolMessage): Promise<Claims> {
    const args: Claims = { code: 'test-code' };
    const state = request?.get('state');
    if (typeof state === 'string') args['state'] = state;
    return args;
  }
}
