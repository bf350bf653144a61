/**
 * Shared execution context passed into every endpoint call.
 *
 * The context is owned by the server process and is read-mostly: endpoints
 * read from it and never write to it. Collaborators reachable from here
 * (key registry, event sink, client database, token resolver) are mutated
 * only by the surrounding system, which is responsible for their
 * concurrency safety.
 */

import type { JWTVerifyGetKey } from 'jose';

// ---------------------------------------------------------------------------
// Key registry
// ---------------------------------------------------------------------------

/** Options for resolving a key set. */
export interface KeyLookupOptions {
  /** Verify TLS certificates when fetching a remote key set. Defaults to true. */
  verifySsl?: boolean;
}

/** Keys indexed by owner (issuer or client id). */
export interface KeyRegistry {
  /** Key resolver for JWTs issued by `owner`, or undefined when none are registered. */
  keySetFor(owner: string, options?: KeyLookupOptions): JWTVerifyGetKey | undefined;
  owners(): string[];
}

// ---------------------------------------------------------------------------
// Event sink
// ---------------------------------------------------------------------------

/** Receives protocol events for auditing or debugging. */
export interface EventSink {
  store(label: string, data: unknown): void;
}

// ---------------------------------------------------------------------------
// Clients and tokens
// ---------------------------------------------------------------------------

/** Client authentication methods understood by the default delegate. */
export type ClientAuthMethodName =
  | 'client_secret_basic'
  | 'client_secret_post'
  | 'bearer_header'
  | 'bearer_body';

/** Registered client metadata consulted during authentication. */
export interface ClientRecord {
  client_id: string;
  client_secret?: string;
  token_endpoint_auth_method?: ClientAuthMethodName;
}

/** Lookup of registered clients. */
export interface ClientDatabase {
  get(clientId: string): Promise<ClientRecord | undefined>;
}

/** What an access token resolves to. */
export interface AccessTokenInfo {
  clientId: string;
  subject?: string;
}

/** Resolves access tokens presented as bearer credentials. */
export interface AccessTokenResolver {
  resolve(token: string): Promise<AccessTokenInfo | undefined>;
}

// ---------------------------------------------------------------------------
// EndpointContext
// ---------------------------------------------------------------------------

export interface EndpointContext {
  /** Issuer identifier of this identity provider. */
  readonly issuer: string;
  /** Key registry; absent when the server holds no keys. */
  readonly keyJar?: KeyRegistry;
  readonly verifySsl: boolean;
  readonly events?: EventSink;
  readonly clients?: ClientDatabase;
  readonly tokens?: AccessTokenResolver;
}
