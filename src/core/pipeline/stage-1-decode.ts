/**
 * Pipeline Stage 1: Decode the raw request.
 *
 * Builds a request message from whatever arrived: a pre-parsed claims
 * object is used directly, a string is decoded according to the
 * endpoint's request format, and no request at all yields an empty
 * message. The result is not yet verified.
 */

import type { MessageType } from '../../types/message.js';
import type { RequestFormat } from '../../types/endpoint.js';
import type { ParseStage, ParseContext, ParseResult } from './types.js';
import { createLogger } from '../logger.js';

const logger = createLogger('pipeline:decode');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Stage1Options {
  requestType: MessageType;
  requestFormat: RequestFormat;
}

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

/** Query component of a (possibly relative) URL, without the `?`. */
export function queryComponent(url: string): string {
  const hash = url.indexOf('#');
  const withoutFragment = hash === -1 ? url : url.slice(0, hash);
  const question = withoutFragment.indexOf('?');
  return question === -1 ? '' : withoutFragment.slice(question + 1);
}

// ---------------------------------------------------------------------------
// Stage 1
// ---------------------------------------------------------------------------

export function createStage1Decode(options: Stage1Options): ParseStage {
  const { requestType, requestFormat } = options;

  return {
    name: 'decode',

    async execute(ctx: ParseContext): Promise<ParseResult | ParseContext> {
      const { raw, endpointContext } = ctx;

      if (raw === undefined || raw === '') {
        return { ...ctx, request: requestType.create() };
      }

      if (typeof raw !== 'string') {
        return { ...ctx, request: requestType.create(raw) };
      }

      logger.debug('decoding request', { format: requestFormat, type: requestType.name });

      switch (requestFormat) {
        case 'jwt':
          return {
            ...ctx,
            request: await requestType.fromJwt(raw, {
              keyJar: endpointContext.keyJar,
              verifySsl: endpointContext.verifySsl,
            }),
          };
        case 'url':
          return { ...ctx, request: requestType.deserialize(queryComponent(raw), 'urlencoded') };
        case 'json':
        case 'urlencoded':
          return { ...ctx, request: requestType.deserialize(raw, requestFormat) };
      }
    },
  };
}
