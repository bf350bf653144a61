/**
 * Key registry backed by jose key sets.
 *
 * Holds one JSON Web Key Set per owner (an issuer or a client id). Local
 * sets come from JWKS documents already in memory; remote sets are fetched
 * lazily from a `jwks_uri` and cached by jose. When TLS verification is
 * turned off, remote sets are fetched through an agent that accepts any
 * certificate.
 */

import { Agent } from 'node:https';
import { createLocalJWKSet, createRemoteJWKSet, type JSONWebKeySet, type JWTVerifyGetKey } from 'jose';
import type { KeyLookupOptions, KeyRegistry } from '../types/context.js';
import { createLogger } from './logger.js';

const logger = createLogger('key-jar');

// ---------------------------------------------------------------------------
// Key sources
// ---------------------------------------------------------------------------

type KeySource =
  | { kind: 'local'; keySet: JWTVerifyGetKey }
  | {
      kind: 'remote';
      uri: URL;
      verified?: JWTVerifyGetKey;
      unverified?: JWTVerifyGetKey;
    };

// ---------------------------------------------------------------------------
// KeyJar
// ---------------------------------------------------------------------------

export class KeyJar implements KeyRegistry {
  private readonly sources: Map<string, KeySource> = new Map();

  /**
   * Register an in-memory JWKS for `owner`, replacing any previous source.
   *
   * @throws If the document holds no keys.
   */
  addJwks(owner: string, jwks: JSONWebKeySet): void {
    if (!Array.isArray(jwks.keys) || jwks.keys.length === 0) {
      throw new Error(`JWKS for "${owner}" contains no keys`);
    }
    this.sources.set(owner, { kind: 'local', keySet: createLocalJWKSet(jwks) });
    logger.debug('registered local key set', { owner, keys: jwks.keys.length });
  }

  /** Register a remote JWKS location for `owner`, replacing any previous source. */
  addRemote(owner: string, jwksUri: string): void {
    this.sources.set(owner, { kind: 'remote', uri: new URL(jwksUri) });
    logger.debug('registered remote key set', { owner, uri: jwksUri });
  }

  keySetFor(owner: string, options?: KeyLookupOptions): JWTVerifyGetKey | undefined {
    const source = this.sources.get(owner);
    if (!source) return undefined;

    if (source.kind === 'local') {
      return source.keySet;
    }

    // Remote resolvers carry their own cache, so keep one per TLS policy.
    if (options?.verifySsl === false) {
      source.unverified ??= createRemoteJWKSet(source.uri, {
        agent: new Agent({ rejectUnauthorized: false }),
      });
      return source.unverified;
    }
    source.verified ??= createRemoteJWKSet(source.uri);
    return source.verified;
  }

  owners(): string[] {
    return [...this.sources.keys()];
  }

  has(owner: string): boolean {
    return this.sources.has(owner);
  }
}
