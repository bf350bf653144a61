/**
 * Pipeline Stage 4: Post-parse extension point.
 *
 * Records the raw inbound request as a protocol event when the context has
 * an event sink, then hands the verified request to the endpoint's
 * post-parse processing (its post-parse hook chain). This is the terminal
 * stage: it always returns a ParseResult.
 */

import type { EndpointContext } from '../../types/context.js';
import type { ProtocolMessage } from '../../types/message.js';
import type { EndpointExtras } from '../hook-chain.js';
import type { ParseStage, ParseContext, ParseResult } from './types.js';

/** Event label under which inbound requests are recorded. */
export const PROTOCOL_REQUEST_EVENT = 'Protocol request';

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Stage4Options {
  postParse(
    context: EndpointContext,
    request: ProtocolMessage,
    clientId: string | undefined,
    extras: EndpointExtras,
  ): ProtocolMessage;
}

// ---------------------------------------------------------------------------
// Stage 4
// ---------------------------------------------------------------------------

export function createStage4PostParse(options: Stage4Options): ParseStage {
  const { postParse } = options;

  return {
    name: 'post-parse',

    async execute(ctx: ParseContext): Promise<ParseResult | ParseContext> {
      const { request, clientId, endpointContext } = ctx;
      if (!request) {
        throw new Error('Pipeline error: request not decoded before post-parse');
      }

      endpointContext.events?.store(PROTOCOL_REQUEST_EVENT, ctx.raw);

      const processed = postParse(endpointContext, request, clientId, ctx.extras);

      return clientId === undefined
        ? { ok: true, request: processed }
        : { ok: true, request: processed, clientId };
    },
  };
}
