/**
 * Hook chains: the endpoint extension points.
 *
 * A chain is an ordered list of pure transformation functions. Running it
 * folds the value through every hook in order; each hook receives the
 * previous hook's output. An empty chain returns its input.
 */

import type { EndpointContext } from '../types/context.js';
import type { Claims, ProtocolMessage } from '../types/message.js';
import type { HeaderList } from './headers.js';
import { createLogger } from './logger.js';

const logger = createLogger('hook-chain');

// ---------------------------------------------------------------------------
// Types
// ---------------------------------------------------------------------------

/** Extra, endpoint-specific arguments passed through to every hook. */
export interface EndpointExtras {
  /** Header list to extend when emitting a response. */
  httpHeaders?: HeaderList;
  /** Encode redirect parameters in the fragment rather than the query. */
  fragmentEnc?: boolean;
  /** Redirect target for responses placed in the URL. */
  returnUri?: string;
  [key: string]: unknown;
}

/** One hook: `(context, value, ...args) => value`. */
export type Hook<TValue, TArgs extends unknown[]> = (
  context: EndpointContext,
  value: TValue,
  ...args: TArgs
) => TValue;

/** An ordered chain of hooks. */
export type HookChain<TValue, TArgs extends unknown[]> = ReadonlyArray<Hook<TValue, TArgs>>;

/** Runs after a request is verified: `(context, request, clientId, extras)`. */
export type PostParseHook = Hook<ProtocolMessage, [clientId: string | undefined, extras: EndpointExtras]>;

/** Runs on response arguments before the response is built. */
export type PreConstructHook = Hook<
  Claims,
  [request: ProtocolMessage | undefined, extras: EndpointExtras]
>;

/** Runs on the built response. May replace it, including with an error message. */
export type PostConstructHook = Hook<
  ProtocolMessage,
  [request: ProtocolMessage | undefined, extras: EndpointExtras]
>;

// ---------------------------------------------------------------------------
// runHookChain
// ---------------------------------------------------------------------------

/**
 * Fold `initial` through `chain` in order.
 *
 * @param label - Extension point name, used in debug logs.
 */
export function runHookChain<TValue, TArgs extends unknown[]>(
  label: string,
  chain: HookChain<TValue, TArgs>,
  context: EndpointContext,
  initial: TValue,
  ...args: TArgs
): TValue {
  return chain.reduce((value, hook, index) => {
    logger.debug('running hook', { point: label, index, hook: hook.name || 'anonymous' });
    return hook(context, value, ...args);
  }, initial);
}
