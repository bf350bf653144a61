/**
 * Endpoint definition: the fixed, per-endpoint-type configuration.
 *
 * Every enumeration here is closed. Definitions are checked once, when an
 * endpoint is constructed, so that a misconfigured endpoint fails at
 * startup instead of on its first request.
 */

import type { MessageType } from './message.js';

// ---------------------------------------------------------------------------
// Format / placement unions
// ---------------------------------------------------------------------------

/** How the raw request string is encoded. A pre-parsed object bypasses this. */
export type RequestFormat = 'urlencoded' | 'json' | 'jwt' | 'url';

/** Where the request arrives. Informational only. */
export type RequestPlacement = 'query' | 'body';

/** How a successful response body is encoded. */
export type ResponseFormat = 'json' | 'urlencoded';

/** Where a successful response goes: an HTTP body or a redirect URL. */
export type ResponsePlacement = 'body' | 'url';

export const REQUEST_FORMATS: ReadonlySet<string> = new Set<RequestFormat>([
  'urlencoded',
  'json',
  'jwt',
  'url',
]);

export const REQUEST_PLACEMENTS: ReadonlySet<string> = new Set<RequestPlacement>(['query', 'body']);

export const RESPONSE_FORMATS: ReadonlySet<string> = new Set<ResponseFormat>(['json', 'urlencoded']);

export const RESPONSE_PLACEMENTS: ReadonlySet<string> = new Set<ResponsePlacement>(['body', 'url']);

// ---------------------------------------------------------------------------
// EndpointDefinition
// ---------------------------------------------------------------------------

/**
 * Configuration shared by every instance of one endpoint type.
 *
 * `clientAuthMethod` names the authentication method the endpoint requires;
 * the empty string means callers may omit client authentication entirely.
 */
export interface EndpointDefinition {
  name: string;
  path: string;
  requestType: MessageType;
  responseType: MessageType;
  errorType: MessageType;
  requestFormat: RequestFormat;
  requestPlacement: RequestPlacement;
  responseFormat: ResponseFormat;
  responsePlacement: ResponsePlacement;
  clientAuthMethod: string;
}

/** Fields of {@link EndpointDefinition} that have defaults. */
export type EndpointDefinitionDefaults = Pick<
  EndpointDefinition,
  | 'path'
  | 'requestFormat'
  | 'requestPlacement'
  | 'responseFormat'
  | 'responsePlacement'
  | 'clientAuthMethod'
>;

export const DEFAULT_ENDPOINT_DEFINITION: Readonly<EndpointDefinitionDefaults> = {
  path: '',
  requestFormat: 'urlencoded',
  requestPlacement: 'query',
  responseFormat: 'json',
  responsePlacement: 'body',
  clientAuthMethod: '',
};
