/**
 * Server configuration schema.
 *
 * Defines the TypeScript types for the `config.toml` sections an identity
 * provider hands to the endpoint core, the defaults applied when a section
 * or field is missing, and `parseConfig()`, which validates a raw parsed
 * TOML document into a typed {@link ServerConfig}.
 */

// ---------------------------------------------------------------------------
// Log level union
// ---------------------------------------------------------------------------

/** Log levels accepted in `[logging]`. */
export type ConfigLogLevel = 'debug' | 'info' | 'warn' | 'error';

const VALID_LOG_LEVELS: ReadonlySet<string> = new Set<ConfigLogLevel>([
  'debug',
  'info',
  'warn',
  'error',
]);

function isLogLevel(value: string): value is ConfigLogLevel {
  return VALID_LOG_LEVELS.has(value);
}

// ---------------------------------------------------------------------------
// Config section types
// ---------------------------------------------------------------------------

/** `[server]` section of config.toml. */
export interface ServerSection {
  issuer: string;
  verify_ssl: boolean;
}

/** `[logging]` section of config.toml. */
export interface LoggingSection {
  level: ConfigLogLevel;
}

/**
 * One `[[keys]]` entry: the key set of a single owner (an issuer or a
 * client id). Exactly one of `jwks_file` and `jwks_uri` is set.
 */
export interface KeySourceConfig {
  owner: string;
  jwks_file?: string;
  jwks_uri?: string;
}

// ---------------------------------------------------------------------------
// Top-level config
// ---------------------------------------------------------------------------

/**
 * Full server configuration.
 *
 * Unknown top-level keys are preserved so that endpoint implementations
 * can read their own sections from the same file.
 */
export interface ServerConfig {
  server: ServerSection;
  logging: LoggingSection;
  keys: KeySourceConfig[];
  [section: string]: unknown;
}

// ---------------------------------------------------------------------------
// Defaults
// ---------------------------------------------------------------------------

/** Default configuration applied when config.toml is absent or partial. */
export const DEFAULT_CONFIG: ServerConfig = {
  server: { issuer: 'http://localhost', verify_ssl: true },
  logging: { level: 'info' },
  keys: [],
};

const KNOWN_SECTIONS: ReadonlySet<string> = new Set(['server', 'logging', 'keys']);

// ---------------------------------------------------------------------------
// Helpers
// ---------------------------------------------------------------------------

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function section(raw: Record<string, unknown>, name: string): Record<string, unknown> {
  const value = raw[name];
  if (value === undefined) return {};
  if (!isRecord(value)) {
    throw new Error(`[${name}] must be a table`);
  }
  return value;
}

// ---------------------------------------------------------------------------
// parseConfig()
// ---------------------------------------------------------------------------

/**
 * Parse and validate a raw config object (e.g. from TOML parsing) into a
 * fully typed `ServerConfig`. Applies defaults for missing sections and
 * validates known fields.
 */
export function parseConfig(raw: Record<string, unknown>): ServerConfig {
  const extra: Record<string, unknown> = {};
  for (const key of Object.keys(raw)) {
    if (!KNOWN_SECTIONS.has(key)) {
      extra[key] = raw[key];
    }
  }

  // --- server ---
  const rawServer = section(raw, 'server');
  const issuer = rawServer['issuer'] ?? DEFAULT_CONFIG.server.issuer;
  if (typeof issuer !== 'string' || issuer.length === 0) {
    throw new Error('server.issuer must be a non-empty string');
  }
  if (!URL.canParse(issuer)) {
    throw new Error(`Invalid server.issuer: "${issuer}" is not an absolute URL`);
  }
  const verifySsl = rawServer['verify_ssl'] ?? DEFAULT_CONFIG.server.verify_ssl;
  if (typeof verifySsl !== 'boolean') {
    throw new Error('server.verify_ssl must be a boolean');
  }

  // --- logging ---
  const rawLogging = section(raw, 'logging');
  const level = rawLogging['level'] ?? DEFAULT_CONFIG.logging.level;
  if (typeof level !== 'string' || !isLogLevel(level)) {
    throw new Error(
      `Invalid logging.level: "${String(level)}". ` +
        `Must be one of: ${[...VALID_LOG_LEVELS].join(', ')}`,
    );
  }

  // --- keys ---
  const rawKeys = raw['keys'] ?? [];
  if (!Array.isArray(rawKeys)) {
    throw new Error('keys must be an array of tables');
  }
  const keys: KeySourceConfig[] = [];
  const seenOwners = new Set<string>();
  for (const entry of rawKeys) {
    if (!isRecord(entry)) {
      throw new Error('keys entries must be tables');
    }
    const owner = entry['owner'];
    if (typeof owner !== 'string' || owner.length === 0) {
      throw new Error('keys entries must have an owner string');
    }
    if (seenOwners.has(owner)) {
      throw new Error(`keys: duplicate owner "${owner}"`);
    }
    seenOwners.add(owner);

    const file = entry['jwks_file'];
    const uri = entry['jwks_uri'];
    if ((file === undefined) === (uri === undefined)) {
      throw new Error(`keys entry "${owner}" must set exactly one of jwks_file or jwks_uri`);
    }
    if (file !== undefined) {
      if (typeof file !== 'string') {
        throw new Error(`keys entry "${owner}": jwks_file must be a string`);
      }
      keys.push({ owner, jwks_file: file });
    } else {
      if (typeof uri !== 'string' || !URL.canParse(uri)) {
        throw new Error(`keys entry "${owner}": jwks_uri must be an absolute URL`);
      }
      keys.push({ owner, jwks_uri: uri });
    }
  }

  return {
    ...extra,
    server: { issuer, verify_ssl: verifySsl },
    logging: { level },
    keys,
  };
}
