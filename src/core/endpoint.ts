/**
 * Endpoint: the request → response lifecycle of one protocol operation.
 *
 * Call structure:
 *
 *   parseRequest
 *     - decode
 *     - clientAuthentication (*)
 *     - verify
 *     - doPostParseRequest (*)
 *   processRequest (*)
 *   doResponse
 *     - responseInfo (*)
 *       - construct
 *         - doPreConstruct (*)
 *         - responseType.create
 *         - doPostConstruct (*)
 *     - format, place, add headers
 *
 * Methods marked (*) are the override points for concrete endpoints. An
 * endpoint holds only its definition, hook chains and authenticator; all
 * per-request data stays in arguments and return values.
 */

import type { EndpointContext } from '../types/context.js';
import type { Claims, ProtocolMessage } from '../types/message.js';
import {
  DEFAULT_ENDPOINT_DEFINITION,
  REQUEST_FORMATS,
  REQUEST_PLACEMENTS,
  RESPONSE_FORMATS,
  RESPONSE_PLACEMENTS,
  type EndpointDefinition,
  type ResponseFormat,
  type ResponsePlacement,
} from '../types/endpoint.js';
import { verifyClient, type ClientAuthenticator, type ClientAuthResult } from './client-authn.js';
import { EndpointConfigError } from './endpoint-errors.js';
import {
  CONTENT_TYPE_HEADER,
  JSON_CONTENT_TYPE,
  NO_CACHE_HEADERS,
  URLENCODED_CONTENT_TYPE,
  setContentType,
  type HeaderList,
} from './headers.js';
import {
  runHookChain,
  type EndpointExtras,
  type PostConstructHook,
  type PostParseHook,
  type PreConstructHook,
} from './hook-chain.js';
import { createLogger, type Logger } from './logger.js';
import { isErrorMessage } from './messages.js';
import {
  createStage1Decode,
  createStage2Authenticate,
  createStage3Verify,
  createStage4PostParse,
  runParsePipeline,
  type ParseResult,
  type ParseStage,
  type RawRequest,
} from './pipeline/index.js';
import { sanitizeForLog } from './request-sanitizer.js';

// ---------------------------------------------------------------------------
// Definition
// ---------------------------------------------------------------------------

/** An endpoint definition where every field with a default may be omitted. */
export type EndpointDefinitionInput = Pick<
  EndpointDefinition,
  'name' | 'requestType' | 'responseType' | 'errorType'
> &
  Partial<EndpointDefinition>;

function checkMember(allowed: ReadonlySet<string>, field: string, value: string): void {
  if (!allowed.has(value)) {
    throw new EndpointConfigError(
      `Invalid ${field}: "${value}". Must be one of: ${[...allowed].join(', ')}`,
    );
  }
}

/**
 * Check an endpoint definition's enumerations.
 *
 * @throws EndpointConfigError on the first invalid field.
 */
export function assertEndpointDefinition(definition: EndpointDefinition): void {
  if (definition.name.length === 0) {
    throw new EndpointConfigError('Endpoint name must not be empty');
  }
  checkMember(REQUEST_FORMATS, 'requestFormat', definition.requestFormat);
  checkMember(REQUEST_PLACEMENTS, 'requestPlacement', definition.requestPlacement);
  checkMember(RESPONSE_FORMATS, 'responseFormat', definition.responseFormat);
  checkMember(RESPONSE_PLACEMENTS, 'responsePlacement', definition.responsePlacement);
}

// ---------------------------------------------------------------------------
// Options / results
// ---------------------------------------------------------------------------

/** Per-instance configuration: hook chains and the authentication delegate. */
export interface EndpointOptions {
  postParseRequest?: readonly PostParseHook[];
  preConstruct?: readonly PreConstructHook[];
  postConstruct?: readonly PostConstructHook[];
  /** Defaults to {@link verifyClient}. */
  clientAuthenticator?: ClientAuthenticator;
}

/**
 * Outcome of {@link Endpoint.doResponse}: a serialized body or redirect with
 * its headers, or an error message returned as-is.
 */
export type DoResponseResult =
  | { response: string; httpHeaders: HeaderList }
  | { response: ProtocolMessage };

// ---------------------------------------------------------------------------
// Response rendering
// ---------------------------------------------------------------------------

interface RenderedResponse {
  body: string;
  /** Empty when the response is not an HTTP body. */
  contentType: string;
}

type ResponseRenderer = (
  response: ProtocolMessage,
  format: ResponseFormat,
  extras: EndpointExtras,
) => RenderedResponse;

const RESPONSE_RENDERERS: ReadonlyMap<ResponsePlacement, ResponseRenderer> = new Map<
  ResponsePlacement,
  ResponseRenderer
>([
  [
    'body',
    (response, format) =>
      format === 'json'
        ? { body: response.toJson(), contentType: JSON_CONTENT_TYPE }
        : { body: response.toUrlencoded(), contentType: URLENCODED_CONTENT_TYPE },
  ],
  [
    'url',
    (response, _format, extras) => {
      if (extras.returnUri === undefined) {
        throw new EndpointConfigError('A response placed in the URL needs a returnUri');
      }
      return {
        body: response.toRedirect(extras.returnUri, extras.fragmentEnc ?? false),
        contentType: '',
      };
    },
  ],
]);

// ---------------------------------------------------------------------------
// Endpoint
// ---------------------------------------------------------------------------

export class Endpoint {
  readonly definition: Readonly<EndpointDefinition>;

  protected readonly postParseRequest: readonly PostParseHook[];
  protected readonly preConstruct: readonly PreConstructHook[];
  protected readonly postConstruct: readonly PostConstructHook[];
  protected readonly clientAuthenticator: ClientAuthenticator;
  protected readonly logger: Logger;

  private readonly parseStages: readonly ParseStage[];

  /**
   * @throws EndpointConfigError if the definition holds an unknown format or placement.
   */
  constructor(definition: EndpointDefinitionInput, options: EndpointOptions = {}) {
    const resolved: EndpointDefinition = { ...DEFAULT_ENDPOINT_DEFINITION, ...definition };
    assertEndpointDefinition(resolved);
    this.definition = resolved;

    this.postParseRequest = [...(options.postParseRequest ?? [])];
    this.preConstruct = [...(options.preConstruct ?? [])];
    this.postConstruct = [...(options.postConstruct ?? [])];
    this.clientAuthenticator = options.clientAuthenticator ?? verifyClient;
    this.logger = createLogger(`endpoint:${resolved.name}`, { endpoint: resolved.name });

    this.parseStages = [
      createStage1Decode({
        requestType: resolved.requestType,
        requestFormat: resolved.requestFormat,
      }),
      createStage2Authenticate({
        authenticate: (context, request, auth, extras) =>
          this.clientAuthentication(context, request, auth, extras),
        clientAuthMethod: resolved.clientAuthMethod,
      }),
      createStage3Verify({ errorType: resolved.errorType }),
      createStage4PostParse({
        postParse: (context, request, clientId, extras) =>
          this.doPostParseRequest(context, request, clientId, extras),
      }),
    ];
  }

  get name(): string {
    return this.definition.name;
  }

  // -------------------------------------------------------------------------
  // Request side
  // -------------------------------------------------------------------------

  /**
   * Decode, authenticate and verify an inbound request.
   *
   * Verification failures come back as `{ ok: false, error }` holding an
   * `invalid_request` message. Authentication escalations, decoding faults
   * and configuration faults are thrown.
   *
   * @param request - Wire string, pre-parsed claims, or nothing.
   * @param auth - HTTP Authorization header value.
   */
  async parseRequest(
    context: EndpointContext,
    request?: RawRequest,
    auth?: string,
    extras: EndpointExtras = {},
  ): Promise<ParseResult> {
    const started = performance.now();
    this.logger.debug(`- ${this.name} -`);
    this.logger.info('request received', { request: sanitizeForLog(request) });

    const result = await runParsePipeline(this.parseStages, {
      endpointContext: context,
      raw: request,
      auth,
      extras,
    });

    const duration_ms = Math.round(performance.now() - started);
    if (result.ok) {
      this.logger.info('parsed and verified request', {
        ok: true,
        client_id: result.clientId,
        duration_ms,
        request: sanitizeForLog(result.request.toDict()),
      });
    } else {
      this.logger.info('request rejected', {
        ok: false,
        error_code: 'invalid_request',
        duration_ms,
        error_description: result.error.get('error_description'),
      });
    }
    return result;
  }

  /** Identify the caller. Override to change how this endpoint authenticates clients. */
  clientAuthentication(
    context: EndpointContext,
    request: ProtocolMessage,
    auth?: string,
    _extras: EndpointExtras = {},
  ): Promise<ClientAuthResult> {
    return this.clientAuthenticator(context, request, auth);
  }

  doPostParseRequest(
    context: EndpointContext,
    request: ProtocolMessage,
    clientId: string | undefined,
    extras: EndpointExtras = {},
  ): ProtocolMessage {
    return runHookChain('post-parse', this.postParseRequest, context, request, clientId, extras);
  }

  /**
   * Endpoint-specific processing of a parsed request.
   *
   * @returns Arguments for {@link doResponse}. The base endpoint has none.
   */
  async processRequest(_context: EndpointContext, _request?: ProtocolMessage): Promise<Claims> {
    return {};
  }

  // -------------------------------------------------------------------------
  // Response side
  // -------------------------------------------------------------------------

  doPreConstruct(
    context: EndpointContext,
    responseArgs: Claims,
    request: ProtocolMessage | undefined,
    extras: EndpointExtras = {},
  ): Claims {
    return runHookChain('pre-construct', this.preConstruct, context, responseArgs, request, extras);
  }

  doPostConstruct(
    context: EndpointContext,
    response: ProtocolMessage,
    request: ProtocolMessage | undefined,
    extras: EndpointExtras = {},
  ): ProtocolMessage {
    return runHookChain('post-construct', this.postConstruct, context, response, request, extras);
  }

  /**
   * Build the response message: pre-construct hooks over the arguments,
   * instantiate the response type, post-construct hooks over the message.
   */
  construct(
    context: EndpointContext,
    responseArgs: Claims,
    request: ProtocolMessage | undefined,
    extras: EndpointExtras = {},
  ): ProtocolMessage {
    const args = this.doPreConstruct(context, { ...responseArgs }, request, extras);
    const response = this.definition.responseType.create(args);
    return this.doPostConstruct(context, response, request, extras);
  }

  /** Assemble the response for {@link doResponse}. Override to change assembly. */
  responseInfo(
    context: EndpointContext,
    responseArgs: Claims,
    request: ProtocolMessage | undefined,
    extras: EndpointExtras = {},
  ): ProtocolMessage {
    return this.construct(context, responseArgs, request, extras);
  }

  /**
   * Produce the outgoing response.
   *
   * Error responses are returned untouched as `{ response }`. Anything else
   * is serialized according to the endpoint's placement and format and
   * returned with its headers.
   *
   * @throws EndpointConfigError when the response placement is not one this
   *   core knows, or a URL placement has no `returnUri`.
   */
  doResponse(
    context: EndpointContext,
    responseArgs: Claims = {},
    request?: ProtocolMessage,
    extras: EndpointExtras = {},
  ): DoResponseResult {
    const response = this.responseInfo(context, responseArgs, request, extras);

    if (isErrorMessage(response)) {
      this.logger.info('error response', { ok: false, error_code: response.get('error') });
      return { response };
    }

    const { responsePlacement, responseFormat } = this.definition;
    const render = RESPONSE_RENDERERS.get(responsePlacement);
    if (!render) {
      throw new EndpointConfigError(`Unknown response placement: "${responsePlacement}"`);
    }
    const { body, contentType } = render(response, responseFormat, extras);

    // A redirect carries only the cache headers.
    let httpHeaders: HeaderList = [];
    if (contentType) {
      httpHeaders = extras.httpHeaders
        ? setContentType(extras.httpHeaders, contentType)
        : [[CONTENT_TYPE_HEADER, contentType]];
    }

    this.logger.debug('response ready', { placement: responsePlacement, format: responseFormat });
    return { response: body, httpHeaders: [...httpHeaders, ...NO_CACHE_HEADERS] };
  }
}
