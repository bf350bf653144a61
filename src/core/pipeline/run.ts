/**
 * Runs parse stages in order until one finishes.
 */

import type { ParseStage, ParseContext, ParseResult } from './types.js';
import { createLogger } from '../logger.js';

const logger = createLogger('pipeline');

export function isParseResult(value: ParseResult | ParseContext): value is ParseResult {
  return 'ok' in value;
}

/**
 * Execute `stages` sequentially.
 *
 * A stage that returns a {@link ParseResult} ends the run. If every stage
 * passes, the decoded request in the final context is the result.
 */
export async function runParsePipeline(
  stages: readonly ParseStage[],
  initial: ParseContext,
): Promise<ParseResult> {
  let ctx = initial;

  for (const stage of stages) {
    const started = performance.now();
    const result = await stage.execute(ctx);
    logger.debug('stage complete', {
      stage: stage.name,
      duration_ms: Math.round(performance.now() - started),
    });

    if (isParseResult(result)) {
      return result;
    }
    ctx = result;
  }

  if (!ctx.request) {
    throw new Error('Pipeline error: no request decoded after all stages');
  }
  return ctx.clientId === undefined
    ? { ok: true, request: ctx.request }
    : { ok: true, request: ctx.request, clientId: ctx.clientId };
}
