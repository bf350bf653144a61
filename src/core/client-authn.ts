/**
 * Client authentication.
 *
 * The endpoint pipeline asks a {@link ClientAuthenticator} who the caller
 * is and gets back an explicit {@link ClientAuthResult}: authenticated,
 * no recognised method in use, or failed. Deciding whether "no method" is
 * acceptable belongs to the endpoint, not to the authenticator.
 *
 * {@link verifyClient} is the default authenticator. It recognises
 * client_secret_basic, client_secret_post (RFC 6749 §2.3.1), and bearer
 * tokens in the Authorization header or the request body (RFC 6750 §2.1,
 * §2.2), in that order.
 */

import { createHash, timingSafeEqual } from 'node:crypto';
import type { ClientAuthMethodName, EndpointContext } from '../types/context.js';
import type { ProtocolMessage } from '../types/message.js';
import { createLogger } from './logger.js';

const logger = createLogger('client-authn');

// ---------------------------------------------------------------------------
// Result types
// ---------------------------------------------------------------------------

/** What a successful authentication established. */
export interface ClientAuthInfo {
  method: string;
  /** Authenticated client, when the method identifies one. */
  clientId?: string;
  /** Bearer token that was presented, for bearer methods. */
  token?: string;
}

export type ClientAuthResult =
  | { kind: 'authenticated'; info: ClientAuthInfo }
  | { kind: 'no-method' }
  | { kind: 'failed'; reason: string };

/**
 * Inspects a request and its credential.
 *
 * @param auth - Value of the HTTP Authorization header, if any.
 */
export type ClientAuthenticator = (
  context: EndpointContext,
  request: ProtocolMessage,
  auth?: string,
) => Promise<ClientAuthResult>;

function failed(reason: string): ClientAuthResult {
  return { kind: 'failed', reason };
}

// ---------------------------------------------------------------------------
// Secret methods
// ---------------------------------------------------------------------------

function secretsMatch(presented: string, expected: string): boolean {
  const a = createHash('sha256').update(presented).digest();
  const b = createHash('sha256').update(expected).digest();
  return timingSafeEqual(a, b);
}

async function checkSecret(
  context: EndpointContext,
  clientId: string,
  secret: string,
  method: ClientAuthMethodName,
): Promise<ClientAuthResult> {
  if (!context.clients) {
    return failed('No client database configured');
  }

  const client = await context.clients.get(clientId);
  if (!client) {
    return failed(`Unknown client "${clientId}"`);
  }
  if (client.client_secret === undefined) {
    return failed(`Client "${clientId}" has no secret`);
  }
  if (!secretsMatch(secret, client.client_secret)) {
    return failed(`Wrong secret for client "${clientId}"`);
  }
  if (
    client.token_endpoint_auth_method !== undefined &&
    client.token_endpoint_auth_method !== method
  ) {
    return failed(
      `Client "${clientId}" is registered for ${client.token_endpoint_auth_method}, not ${method}`,
    );
  }

  return { kind: 'authenticated', info: { method, clientId } };
}

/** Form-decode one half of a Basic credential (RFC 6749 §2.3.1). */
function formDecode(value: string): string | undefined {
  try {
    return decodeURIComponent(value.replace(/\+/g, ' '));
  } catch {
    return undefined;
  }
}

function parseBasic(credentials: string): { clientId: string; secret: string } | undefined {
  const decoded = Buffer.from(credentials, 'base64').toString('utf-8');
  const colon = decoded.indexOf(':');
  if (colon <= 0) return undefined;

  const clientId = formDecode(decoded.slice(0, colon));
  const secret = formDecode(decoded.slice(colon + 1));
  if (clientId === undefined || secret === undefined) return undefined;
  return { clientId, secret };
}

// ---------------------------------------------------------------------------
// Bearer methods
// ---------------------------------------------------------------------------

async function checkBearer(
  context: EndpointContext,
  token: string,
  method: ClientAuthMethodName,
): Promise<ClientAuthResult> {
  if (token.length === 0) {
    return failed('Empty bearer token');
  }
  if (!context.tokens) {
    return failed('No access token resolver configured');
  }

  const info = await context.tokens.resolve(token);
  if (!info) {
    return failed('Unknown or expired access token');
  }
  return { kind: 'authenticated', info: { method, clientId: info.clientId, token } };
}

// ---------------------------------------------------------------------------
// verifyClient
// ---------------------------------------------------------------------------

const BASIC_PREFIX = /^basic\s+/i;
const BEARER_PREFIX = /^bearer\s+/i;

/** Default {@link ClientAuthenticator}. */
export const verifyClient: ClientAuthenticator = async (context, request, auth) => {
  const result = await detectAndVerify(context, request, auth);

  if (result.kind === 'authenticated') {
    logger.debug('client authenticated', {
      method: result.info.method,
      client_id: result.info.clientId,
    });
  } else if (result.kind === 'failed') {
    logger.info('client authentication failed', { reason: result.reason });
  }
  return result;
};

async function detectAndVerify(
  context: EndpointContext,
  request: ProtocolMessage,
  auth?: string,
): Promise<ClientAuthResult> {
  if (auth !== undefined && auth.length > 0) {
    if (BASIC_PREFIX.test(auth)) {
      const parsed = parseBasic(auth.replace(BASIC_PREFIX, '').trim());
      if (!parsed) {
        return failed('Malformed Basic credentials');
      }
      return checkSecret(context, parsed.clientId, parsed.secret, 'client_secret_basic');
    }
    if (BEARER_PREFIX.test(auth)) {
      return checkBearer(context, auth.replace(BEARER_PREFIX, '').trim(), 'bearer_header');
    }
    return failed('Unsupported authorization scheme');
  }

  const secret = request.get('client_secret');
  if (typeof secret === 'string') {
    const clientId = request.get('client_id');
    if (typeof clientId !== 'string') {
      return failed('client_secret_post requires client_id');
    }
    return checkSecret(context, clientId, secret, 'client_secret_post');
  }

  const accessToken = request.get('access_token');
  if (typeof accessToken === 'string') {
    return checkBearer(context, accessToken, 'bearer_body');
  }

  return { kind: 'no-method' };
}
