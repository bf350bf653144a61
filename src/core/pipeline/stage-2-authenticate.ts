/**
 * Pipeline Stage 2: Client authentication.
 *
 * Asks the authenticator who the caller is and resolves the client id:
 *   - authenticated with a client id: written into the request's
 *     `client_id` and used as the resolved id
 *   - authenticated without one: the request's own `client_id`, if any
 *   - no recognised method: tolerated only when the endpoint requires no
 *     method (the request's own `client_id` is then used), otherwise
 *     UnauthorizedClientError
 *   - failed: always UnauthorizedClientError
 *
 * The stage never invents a client id.
 */

import type { EndpointContext } from '../../types/context.js';
import type { ProtocolMessage } from '../../types/message.js';
import type { ClientAuthResult } from '../client-authn.js';
import type { EndpointExtras } from '../hook-chain.js';
import { UnauthorizedClientError } from '../endpoint-errors.js';
import type { ParseStage, ParseContext, ParseResult } from './types.js';
import { createLogger } from '../logger.js';

const logger = createLogger('pipeline:authenticate');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Stage2Options {
  authenticate(
    context: EndpointContext,
    request: ProtocolMessage,
    auth: string | undefined,
    extras: EndpointExtras,
  ): Promise<ClientAuthResult>;
  /** Required authentication method; empty when none is required. */
  clientAuthMethod: string;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Defer to the `client_id` the request already carries, if any. */
function withOwnClientId(ctx: ParseContext, request: ProtocolMessage): ParseContext {
  const own = request.get('client_id');
  return typeof own === 'string' ? { ...ctx, clientId: own } : ctx;
}

// ---------------------------------------------------------------------------
// Stage 2
// ---------------------------------------------------------------------------

export function createStage2Authenticate(options: Stage2Options): ParseStage {
  const { authenticate, clientAuthMethod } = options;

  return {
    name: 'authenticate',

    async execute(ctx: ParseContext): Promise<ParseResult | ParseContext> {
      const { request } = ctx;
      if (!request) {
        throw new Error('Pipeline error: request not decoded before authentication');
      }

      const result = await authenticate(ctx.endpointContext, request, ctx.auth, ctx.extras);

      switch (result.kind) {
        case 'authenticated': {
          const { clientId } = result.info;
          if (clientId !== undefined) {
            request.set('client_id', clientId);
            return { ...ctx, clientId };
          }
          return withOwnClientId(ctx, request);
        }

        case 'no-method':
          if (clientAuthMethod) {
            logger.info('required client authentication missing', { required: clientAuthMethod });
            throw new UnauthorizedClientError(
              `Client authentication with ${clientAuthMethod} is required`,
            );
          }
          return withOwnClientId(ctx, request);

        case 'failed':
          throw new UnauthorizedClientError(result.reason);
      }
    },
  };
}
