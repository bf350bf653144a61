/**
 * TOML-based configuration loader.
 *
 * Reads `config.toml`, parses it with smol-toml, validates it with
 * {@link parseConfig}, and turns the result into the {@link EndpointContext}
 * every endpoint call receives.
 */

import { parse as parseTOML } from 'smol-toml';
import type { JSONWebKeySet } from 'jose';
import { existsSync, readFileSync } from 'node:fs';
import { resolve } from 'node:path';
import { parseConfig, DEFAULT_CONFIG } from '../types/config.js';
import type { KeySourceConfig, ServerConfig } from '../types/config.js';
import type {
  AccessTokenResolver,
  ClientDatabase,
  EndpointContext,
  EventSink,
} from '../types/context.js';
import { KeyJar } from './key-jar.js';
import { configureLogging, createLogger } from './logger.js';

const logger = createLogger('config');

// ---------------------------------------------------------------------------
// loadConfig()
// ---------------------------------------------------------------------------

/**
 * Load and validate a `config.toml` file.
 *
 * If the file does not exist or is empty, returns `DEFAULT_CONFIG`.
 * Throws on invalid TOML syntax or schema validation errors.
 */
export function loadConfig(configPath: string): ServerConfig {
  if (!existsSync(configPath)) {
    logger.debug('no config file, using defaults', { path: configPath });
    return structuredClone(DEFAULT_CONFIG);
  }

  const content = readFileSync(configPath, 'utf-8');
  if (content.trim().length === 0) {
    return structuredClone(DEFAULT_CONFIG);
  }

  return parseConfig(parseTOML(content));
}

// ---------------------------------------------------------------------------
// createEndpointContext()
// ---------------------------------------------------------------------------

/** Collaborators supplied by the host rather than the config file. */
export interface EndpointContextDeps {
  /** Directory that relative `jwks_file` paths resolve against. */
  baseDir: string;
  events?: EventSink;
  clients?: ClientDatabase;
  tokens?: AccessTokenResolver;
}

function readJwksFile(owner: string, path: string): JSONWebKeySet {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, 'utf-8'));
  } catch (err) {
    const reason = err instanceof Error ? err.message : String(err);
    throw new Error(`keys entry "${owner}": cannot read ${path}: ${reason}`);
  }
  if (typeof parsed !== 'object' || parsed === null || !('keys' in parsed)) {
    throw new Error(`keys entry "${owner}": ${path} is not a JWKS document`);
  }
  const { keys } = parsed;
  if (!Array.isArray(keys)) {
    throw new Error(`keys entry "${owner}": ${path} has no "keys" array`);
  }
  return { keys };
}

function registerKeys(jar: KeyJar, entry: KeySourceConfig, baseDir: string): void {
  if (entry.jwks_uri !== undefined) {
    jar.addRemote(entry.owner, entry.jwks_uri);
  } else if (entry.jwks_file !== undefined) {
    const path = resolve(baseDir, entry.jwks_file);
    jar.addJwks(entry.owner, readJwksFile(entry.owner, path));
  }
}

/**
 * Build the shared endpoint context from a validated config.
 *
 * Applies the configured log level, and loads every `[[keys]]` entry into
 * a {@link KeyJar}. The key jar is left out when no keys are configured.
 *
 * @throws If a key file is unreadable or holds no keys.
 */
export function createEndpointContext(
  config: ServerConfig,
  deps: EndpointContextDeps,
): EndpointContext {
  configureLogging({ level: config.logging.level });

  let keyJar: KeyJar | undefined;
  if (config.keys.length > 0) {
    keyJar = new KeyJar();
    for (const entry of config.keys) {
      registerKeys(keyJar, entry, deps.baseDir);
    }
  }

  logger.info('endpoint context ready', {
    issuer: config.server.issuer,
    verify_ssl: config.server.verify_ssl,
    key_owners: keyJar?.owners() ?? [],
  });

  return {
    issuer: config.server.issuer,
    keyJar,
    verifySsl: config.server.verify_ssl,
    events: deps.events,
    clients: deps.clients,
    tokens: deps.tokens,
  };
}
