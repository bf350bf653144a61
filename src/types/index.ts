export {
  type ClaimValue,
  type Claims,
  type SerializationFormat,
  type VerifyOptions,
  type JwtDecodeOptions,
  type ProtocolMessage,
  type MessageType,
  type ClaimSchema,
  type MessageSchema,
} from './message.js';

export {
  type KeyLookupOptions,
  type KeyRegistry,
  type EventSink,
  type ClientAuthMethodName,
  type ClientRecord,
  type ClientDatabase,
  type AccessTokenInfo,
  type AccessTokenResolver,
  type EndpointContext,
} from './context.js';

export {
  OAuthErrorCode,
  type OAuthErrorCodeValue,
  ERROR_HTTP_STATUS,
  type ErrorResponseClaims,
} from './errors.js';

export {
  type RequestFormat,
  type RequestPlacement,
  type ResponseFormat,
  type ResponsePlacement,
  type EndpointDefinition,
  type EndpointDefinitionDefaults,
  REQUEST_FORMATS,
  REQUEST_PLACEMENTS,
  RESPONSE_FORMATS,
  RESPONSE_PLACEMENTS,
  DEFAULT_ENDPOINT_DEFINITION,
} from './endpoint.js';

export {
  type ConfigLogLevel,
  type ServerSection,
  type LoggingSection,
  type KeySourceConfig,
  type ServerConfig,
  DEFAULT_CONFIG,
  parseConfig,
} from './config.js';
