/**
 * Schema-backed protocol messages.
 *
 * A message type is declared once from a JSON Schema with
 * {@link defineMessageType}; the schema is compiled with ajv at definition
 * time and reused for every verification. Messages decode from JSON,
 * form-urlencoding and signed JWTs, and encode to JSON, form-urlencoding
 * and redirect URLs.
 */

import _Ajv, { type ErrorObject, type ValidateFunction } from 'ajv';
// ajv ESM interop: default export is the module, the constructor is on `.default`
const Ajv = _Ajv.default;

import { decodeJwt, jwtVerify } from 'jose';
import type {
  ClaimValue,
  Claims,
  JwtDecodeOptions,
  MessageSchema,
  MessageType,
  ProtocolMessage,
  SerializationFormat,
  VerifyOptions,
} from '../types/message.js';
import {
  MessageDecodeError,
  MessageValueError,
  MissingRequiredAttributeError,
  MissingRequiredValueError,
} from './endpoint-errors.js';

const ajv = new Ajv({ allErrors: true, strict: false });

// ---------------------------------------------------------------------------
// Prototype pollution keys
// ---------------------------------------------------------------------------

const POLLUTION_KEYS: ReadonlySet<string> = new Set(['__proto__', 'constructor', 'prototype']);

function assertSafeKey(key: string): void {
  if (POLLUTION_KEYS.has(key)) {
    throw new MessageDecodeError(`Claim name "${key}" is not allowed`);
  }
}

// ---------------------------------------------------------------------------
// Claim value conversion
// ---------------------------------------------------------------------------

function isScalar(value: ClaimValue): value is string | number | boolean {
  return typeof value === 'string' || typeof value === 'number' || typeof value === 'boolean';
}

/**
 * Convert an arbitrary decoded value into a claim value.
 *
 * `undefined` maps to `undefined` so callers can drop the claim.
 *
 * @throws MessageDecodeError for values JSON cannot carry.
 */
export function toClaimValue(value: unknown): ClaimValue | undefined {
  if (value === undefined) return undefined;
  if (value === null || typeof value === 'string' || typeof value === 'boolean') return value;
  if (typeof value === 'number') {
    if (!Number.isFinite(value)) {
      throw new MessageDecodeError('Claim values must be finite numbers');
    }
    return value;
  }
  if (Array.isArray(value)) {
    const items: ClaimValue[] = [];
    for (const item of value) {
      const converted = toClaimValue(item);
      items.push(converted === undefined ? null : converted);
    }
    return items;
  }
  if (typeof value === 'object') {
    return toClaims(Object.entries(value));
  }
  throw new MessageDecodeError(`Unsupported claim value of type ${typeof value}`);
}

/** Build claims from key/value pairs, dropping undefined values. */
export function toClaims(entries: Iterable<[string, unknown]>): Claims {
  const claims: Claims = {};
  for (const [key, raw] of entries) {
    assertSafeKey(key);
    const value = toClaimValue(raw);
    if (value !== undefined) {
      claims[key] = value;
    }
  }
  return claims;
}

// ---------------------------------------------------------------------------
// Codecs
// ---------------------------------------------------------------------------

function decodeUrlencoded(data: string): Claims {
  const claims: Claims = {};
  for (const [key, value] of new URLSearchParams(data)) {
    assertSafeKey(key);
    const previous = claims[key];
    if (previous === undefined) {
      claims[key] = value;
    } else if (Array.isArray(previous)) {
      previous.push(value);
    } else {
      claims[key] = [previous, value];
    }
  }
  return claims;
}

function decodeJson(data: string): Claims {
  let parsed: unknown;
  try {
    parsed = JSON.parse(data);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MessageDecodeError(`Invalid JSON message: ${reason}`);
  }
  if (typeof parsed !== 'object' || parsed === null || Array.isArray(parsed)) {
    throw new MessageDecodeError('JSON message must be an object');
  }
  return toClaims(Object.entries(parsed));
}

/** Form-encode one claim value; `undefined` means the claim is left out. */
function encodeClaim(value: ClaimValue): string | undefined {
  if (value === null) return undefined;
  if (typeof value === 'string') return value;
  if (typeof value === 'number' || typeof value === 'boolean') return String(value);
  if (Array.isArray(value) && value.every(isScalar)) {
    return value.map(String).join(' ');
  }
  return JSON.stringify(value);
}

// ---------------------------------------------------------------------------
// Verification
// ---------------------------------------------------------------------------

function toVerificationError(errors: ErrorObject[]): Error {
  const missing = errors.find((e) => e.keyword === 'required' && e.instancePath === '');
  const missingProperty: unknown = missing?.params['missingProperty'];
  if (typeof missingProperty === 'string') {
    return new MissingRequiredAttributeError(missingProperty);
  }

  const details = errors
    .map((e) => {
      const path = e.instancePath || '/';
      if (e.keyword === 'additionalProperties') {
        const extra: unknown = e.params['additionalProperty'];
        return `${path}: additional property "${String(extra)}" not allowed`;
      }
      return `${path}: ${e.message ?? 'invalid value'}`;
    })
    .join('; ');
  const field = errors[0]?.instancePath.replace(/^\//, '').split('/')[0] || undefined;
  return new MessageValueError(details, field);
}

function isEmptyValue(value: ClaimValue | undefined): boolean {
  return value === '' || (Array.isArray(value) && value.length === 0);
}

// ---------------------------------------------------------------------------
// Message
// ---------------------------------------------------------------------------

interface CompiledMessageType {
  name: string;
  schema: MessageSchema;
  signedFields: readonly string[];
  validate: ValidateFunction;
}

export class Message implements ProtocolMessage {
  private readonly compiled: CompiledMessageType;
  private readonly claims: Claims;

  constructor(compiled: CompiledMessageType, claims: Claims = {}) {
    this.compiled = compiled;
    this.claims = toClaims(Object.entries(claims));
  }

  get typeName(): string {
    return this.compiled.name;
  }

  has(key: string): boolean {
    return Object.hasOwn(this.claims, key);
  }

  get(key: string): ClaimValue | undefined {
    return this.has(key) ? this.claims[key] : undefined;
  }

  set(key: string, value: ClaimValue): void {
    assertSafeKey(key);
    this.claims[key] = value;
  }

  delete(key: string): boolean {
    if (!this.has(key)) return false;
    delete this.claims[key];
    return true;
  }

  keys(): string[] {
    return Object.keys(this.claims);
  }

  toDict(): Claims {
    return { ...this.claims };
  }

  async verify(options: VerifyOptions = {}): Promise<void> {
    const { schema, signedFields, validate } = this.compiled;
    const claims = this.toDict();

    if (!validate(claims)) {
      throw toVerificationError(validate.errors ?? []);
    }

    for (const field of schema.required ?? []) {
      if (isEmptyValue(claims[field])) {
        throw new MissingRequiredValueError(field);
      }
    }

    for (const field of signedFields) {
      const value = claims[field];
      if (value !== undefined) {
        await verifySignedField(field, value, options);
      }
    }
  }

  toJson(): string {
    return JSON.stringify(this.claims);
  }

  toUrlencoded(): string {
    const params = new URLSearchParams();
    for (const [key, value] of Object.entries(this.claims)) {
      const encoded = encodeClaim(value);
      if (encoded !== undefined) {
        params.append(key, encoded);
      }
    }
    return params.toString();
  }

  /** @throws TypeError if `location` is not an absolute URL. */
  toRedirect(location: string, fragmentEnc = false): string {
    const params = this.toUrlencoded();
    if (params.length === 0) return location;

    const url = new URL(location);
    if (fragmentEnc) {
      url.hash = params;
    } else {
      const query = url.search.slice(1);
      url.search = query ? `${query}&${params}` : params;
    }
    return url.toString();
  }
}

async function verifySignedField(
  field: string,
  value: ClaimValue,
  options: VerifyOptions,
): Promise<void> {
  if (typeof value !== 'string') {
    throw new MessageValueError(`'${field}' must be a signed JWT`, field);
  }
  if (!options.keyJar) {
    throw new MessageValueError(`Cannot verify '${field}': no key registry available`, field);
  }
  const owner = options.opponentId ?? '';
  const keySet = options.keyJar.keySetFor(owner, { verifySsl: options.verifySsl });
  if (!keySet) {
    throw new MessageValueError(`Cannot verify '${field}': no keys for "${owner}"`, field);
  }
  try {
    await jwtVerify(value, keySet);
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new MessageValueError(`Invalid signature on '${field}': ${reason}`, field);
  }
}

// ---------------------------------------------------------------------------
// defineMessageType
// ---------------------------------------------------------------------------

/** Declaration of a message type. */
export interface MessageTypeDefinition {
  name: string;
  schema: MessageSchema;
  /** Claims that must hold a JWT signed by the counterpart's keys. */
  signedFields?: readonly string[];
}

/**
 * Compile a message type.
 *
 * @throws If the schema does not compile.
 */
export function defineMessageType(definition: MessageTypeDefinition): MessageType<Message> {
  const compiled: CompiledMessageType = {
    name: definition.name,
    schema: definition.schema,
    signedFields: definition.signedFields ?? [],
    validate: ajv.compile(definition.schema),
  };

  const create = (claims?: Claims): Message => new Message(compiled, claims);

  return {
    name: definition.name,
    create,

    deserialize(data: string, format: SerializationFormat): Message {
      return create(format === 'json' ? decodeJson(data) : decodeUrlencoded(data));
    },

    async fromJwt(token: string, options: JwtDecodeOptions = {}): Promise<Message> {
      const unverified = decodeJwt(token);
      const clientId = unverified['client_id'];
      const owner =
        typeof unverified.iss === 'string'
          ? unverified.iss
          : typeof clientId === 'string'
            ? clientId
            : undefined;
      if (owner === undefined) {
        throw new MessageDecodeError('JWT request names neither an issuer nor a client_id');
      }

      const keySet = options.keyJar?.keySetFor(owner, { verifySsl: options.verifySsl });
      if (!keySet) {
        throw new MessageDecodeError(`No keys registered for "${owner}"`);
      }

      const { payload } = await jwtVerify(token, keySet);
      return create(toClaims(Object.entries(payload)));
    },
  };
}
