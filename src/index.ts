/**
 * Public entry point: the endpoint core, its message layer, and the
 * default collaborators.
 */

export const VERSION = '0.1.0';

export * from './types/index.js';

export {
  Endpoint,
  assertEndpointDefinition,
  type EndpointDefinitionInput,
  type EndpointOptions,
  type DoResponseResult,
} from './core/endpoint.js';

export {
  MessageVerificationError,
  MissingRequiredAttributeError,
  MissingRequiredValueError,
  MessageValueError,
  MessageDecodeError,
  UnauthorizedClientError,
  EndpointConfigError,
  isVerificationFailure,
  httpStatusFor,
} from './core/endpoint-errors.js';

export {
  Message,
  defineMessageType,
  toClaims,
  toClaimValue,
  type MessageTypeDefinition,
} from './core/message.js';
export { GenericMessage, ErrorResponse, createErrorMessage, isErrorMessage } from './core/messages.js';

export {
  verifyClient,
  type ClientAuthenticator,
  type ClientAuthInfo,
  type ClientAuthResult,
} from './core/client-authn.js';

export {
  runHookChain,
  type EndpointExtras,
  type Hook,
  type HookChain,
  type PostParseHook,
  type PreConstructHook,
  type PostConstructHook,
} from './core/hook-chain.js';

export {
  CONTENT_TYPE_HEADER,
  JSON_CONTENT_TYPE,
  URLENCODED_CONTENT_TYPE,
  NO_CACHE_HEADERS,
  setContentType,
  type Header,
  type HeaderList,
} from './core/headers.js';

export { KeyJar } from './core/key-jar.js';

export {
  loadConfig,
  createEndpointContext,
  type EndpointContextDeps,
} from './core/config-loader.js';

export {
  createLogger,
  configureLogging,
  resetLogging,
  type Logger,
  type LogLevel,
  type LogEntry,
  type LogSink,
} from './core/logger.js';

export { RequestSanitizer, sanitizeForLog, REDACTED_PLACEHOLDER } from './core/request-sanitizer.js';

export {
  PROTOCOL_REQUEST_EVENT,
  type ParseResult,
  type RawRequest,
} from './core/pipeline/index.js';
