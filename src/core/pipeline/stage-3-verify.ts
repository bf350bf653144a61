/**
 * Pipeline Stage 3: Protocol verification.
 *
 * Verifies the decoded, client-tagged request against its schema, using the
 * context's key registry and the resolved client id as the counterpart for
 * signed claims. The three verification failures (missing attribute,
 * missing value, bad value) become an `invalid_request` error message in
 * the endpoint's error type. Anything else is rethrown.
 */

import type { MessageType } from '../../types/message.js';
import { OAuthErrorCode } from '../../types/errors.js';
import { isVerificationFailure } from '../endpoint-errors.js';
import { createErrorMessage } from '../messages.js';
import type { ParseStage, ParseContext, ParseResult } from './types.js';
import { createLogger } from '../logger.js';

const logger = createLogger('pipeline:verify');

// ---------------------------------------------------------------------------
// Options
// ---------------------------------------------------------------------------

export interface Stage3Options {
  errorType: MessageType;
}

// ---------------------------------------------------------------------------
// Stage 3
// ---------------------------------------------------------------------------

export function createStage3Verify(options: Stage3Options): ParseStage {
  const { errorType } = options;

  return {
    name: 'verify',

    async execute(ctx: ParseContext): Promise<ParseResult | ParseContext> {
      const { request, clientId, endpointContext } = ctx;
      if (!request) {
        throw new Error('Pipeline error: request not decoded before verification');
      }

      try {
        await request.verify({
          keyJar: endpointContext.keyJar,
          opponentId: clientId,
          verifySsl: endpointContext.verifySsl,
        });
      } catch (err) {
        if (!isVerificationFailure(err)) throw err;

        logger.debug('verification failed', {
          client_id: clientId,
          error_code: OAuthErrorCode.INVALID_REQUEST,
          details: err.message,
        });
        return {
          ok: false,
          error: createErrorMessage(errorType, {
            error: OAuthErrorCode.INVALID_REQUEST,
            error_description: err.message,
          }),
        };
      }

      return ctx;
    },
  };
}
