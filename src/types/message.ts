/**
 * Message capability contract.
 *
 * The endpoint pipeline never touches a concrete message schema. It talks
 * to requests and responses only through {@link ProtocolMessage}, and to
 * the schema binding only through {@link MessageType}. Any message library
 * that implements these two interfaces can back an endpoint.
 */

import type { KeyRegistry } from './context.js';

// ---------------------------------------------------------------------------
// Claim values
// ---------------------------------------------------------------------------

/** A JSON value carried by a message claim. */
export type ClaimValue = string | number | boolean | null | ClaimValue[] | { [key: string]: ClaimValue };

/** The claims (key/value pairs) of a message. */
export type Claims = { [key: string]: ClaimValue };

// ---------------------------------------------------------------------------
// Wire formats
// ---------------------------------------------------------------------------

/** Text encodings a message can be deserialized from. */
export type SerializationFormat = 'json' | 'urlencoded';

// ---------------------------------------------------------------------------
// Verification / decoding options
// ---------------------------------------------------------------------------

/** Inputs to {@link ProtocolMessage.verify}. */
export interface VerifyOptions {
  /** Registry holding keys for signed fields. */
  keyJar?: KeyRegistry;
  /** Owner of the keys that signed fields must verify against (usually the client id). */
  opponentId?: string;
  /** Whether remote key sets are fetched with TLS verification. */
  verifySsl?: boolean;
}

/** Inputs to {@link MessageType.fromJwt}. */
export interface JwtDecodeOptions {
  keyJar?: KeyRegistry;
  verifySsl?: boolean;
}

// ---------------------------------------------------------------------------
// ProtocolMessage
// ---------------------------------------------------------------------------

/**
 * A structured protocol message (request, response or error).
 *
 * Errors are messages carrying an `error` claim.
 */
export interface ProtocolMessage {
  /** Name of the message type this instance was built from. */
  readonly typeName: string;

  has(key: string): boolean;
  get(key: string): ClaimValue | undefined;
  set(key: string, value: ClaimValue): void;
  keys(): string[];

  /** Shallow copy of the claims in insertion order. */
  toDict(): Claims;

  /**
   * Check the message against its schema.
   *
   * @throws MissingRequiredAttributeError | MissingRequiredValueError | MessageValueError
   */
  verify(options?: VerifyOptions): Promise<void>;

  toJson(): string;
  toUrlencoded(): string;

  /**
   * Render the message as parameters on a redirect target.
   *
   * @param location - Redirect URI.
   * @param fragmentEnc - Put parameters in the fragment instead of the query.
   */
  toRedirect(location: string, fragmentEnc?: boolean): string;
}

// ---------------------------------------------------------------------------
// MessageType
// ---------------------------------------------------------------------------

/** Schema binding: how an endpoint creates and decodes messages of one type. */
export interface MessageType<M extends ProtocolMessage = ProtocolMessage> {
  readonly name: string;
  create(claims?: Claims): M;
  deserialize(data: string, format: SerializationFormat): M;
  fromJwt(token: string, options?: JwtDecodeOptions): Promise<M>;
}

// ---------------------------------------------------------------------------
// Schema subset used to declare message types
// ---------------------------------------------------------------------------

/** JSON Schema for a single claim. */
export type ClaimSchema = {
  type?: string | string[];
  description?: string;
  enum?: ClaimValue[];
  const?: ClaimValue;
  pattern?: string;
  minLength?: number;
  maxLength?: number;
  minimum?: number;
  maximum?: number;
  items?: ClaimSchema;
  minItems?: number;
  properties?: Record<string, ClaimSchema>;
};

/** JSON Schema for a whole message. */
export type MessageSchema = {
  type: 'object';
  required?: string[];
  additionalProperties?: boolean;
  properties: Record<string, ClaimSchema>;
};
