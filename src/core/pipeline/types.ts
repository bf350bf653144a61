/**
 * Pipeline types for the 4-stage request-parse pipeline.
 *
 * The pipeline turns a raw inbound request into a verified request
 * message. Each stage either passes (returning an enriched context) or
 * finishes (returning a result). Stages run strictly in order.
 */

import type { EndpointContext } from '../../types/context.js';
import type { Claims, ProtocolMessage } from '../../types/message.js';
import type { EndpointExtras } from '../hook-chain.js';

// ---------------------------------------------------------------------------
// Raw request
// ---------------------------------------------------------------------------

/** A wire-encoded request string, a pre-parsed claims object, or nothing. */
export type RawRequest = string | Claims | undefined;

// ---------------------------------------------------------------------------
// Parse context
// ---------------------------------------------------------------------------

/**
 * Per-call context threaded through each stage.
 *
 * Stages enrich it as they execute:
 *   Stage 1 sets `request`
 *   Stage 2 sets `clientId`
 *   Stages 3-4 verify and finish
 */
export interface ParseContext {
  endpointContext: EndpointContext;
  raw: RawRequest;
  /** HTTP Authorization header value. */
  auth?: string;
  extras: EndpointExtras;
  request?: ProtocolMessage;
  clientId?: string;
}

// ---------------------------------------------------------------------------
// Parse result
// ---------------------------------------------------------------------------

/**
 * Terminal result of the pipeline: a verified request, or an error message
 * in the endpoint's error type.
 */
export type ParseResult =
  | { ok: true; request: ProtocolMessage; clientId?: string }
  | { ok: false; error: ProtocolMessage };

// ---------------------------------------------------------------------------
// Parse stage
// ---------------------------------------------------------------------------

/**
 * A single stage in the parse pipeline.
 *
 * Each stage receives the current context and resolves to either:
 *   - An enriched `ParseContext` (continue to the next stage)
 *   - A `ParseResult` (stop the pipeline)
 *
 * Faults are thrown, not returned.
 */
export interface ParseStage {
  name: string;
  execute(ctx: ParseContext): Promise<ParseResult | ParseContext>;
}
