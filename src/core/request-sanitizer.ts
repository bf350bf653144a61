/**
 * Request sanitizer for protocol logging.
 *
 * Deep-walks an inbound request (a claims object or a raw wire string) and
 * replaces credentials with [REDACTED] before the request reaches a log
 * line. Reports the paths it redacted so callers can log them without the
 * values.
 */

// ---------------------------------------------------------------------------
// Constants
// ---------------------------------------------------------------------------

/** Replacement string for redacted credential values. */
export const REDACTED_PLACEHOLDER = '[REDACTED]';

/** Claim names whose values are always redacted. */
export const SECRET_CLAIMS: ReadonlySet<string> = new Set([
  'client_secret',
  'client_assertion',
  'password',
  'access_token',
  'refresh_token',
  'code',
  'code_verifier',
]);

// ---------------------------------------------------------------------------
// Result type
// ---------------------------------------------------------------------------

/** Result of sanitizing a value. */
export interface SanitizeResult {
  /** The sanitized value (deep copy; the original is not mutated). */
  value: unknown;
  /** JSON-path-style field paths where redaction occurred. */
  redactedPaths: string[];
}

// ---------------------------------------------------------------------------
// Credential patterns
// ---------------------------------------------------------------------------

const CREDENTIAL_PATTERNS: Array<{
  name: string;
  pattern: RegExp;
  replace: (match: string) => string;
}> = [
  // Authorization header values: "Bearer <token>", "Basic <b64>"
  {
    name: 'authorization_scheme',
    pattern: /\b(bearer|basic)\s+([A-Za-z0-9._~+/=-]{6,})/gi,
    replace: (match: string) => {
      const prefix = match.split(/\s+/)[0];
      return `${prefix} ${REDACTED_PLACEHOLDER}`;
    },
  },

  // Secret claims inside a urlencoded string: "client_secret=..."
  {
    name: 'urlencoded_secret',
    pattern:
      /\b(client_secret|client_assertion|password|access_token|refresh_token|code|code_verifier)=([^&#\s]+)/g,
    replace: (match: string) => {
      const eqIndex = match.indexOf('=');
      return `${match.slice(0, eqIndex)}=${REDACTED_PLACEHOLDER}`;
    },
  },
];

// ---------------------------------------------------------------------------
// RequestSanitizer
// ---------------------------------------------------------------------------

export class RequestSanitizer {
  sanitize(value: unknown): SanitizeResult {
    const redactedPaths: string[] = [];
    const sanitized = this.walk(value, '$', redactedPaths);
    return { value: sanitized, redactedPaths };
  }

  private walk(value: unknown, path: string, redactedPaths: string[]): unknown {
    if (value === null || value === undefined) {
      return value;
    }

    if (typeof value === 'string') {
      return this.sanitizeString(value, path, redactedPaths);
    }

    if (typeof value !== 'object') {
      return value;
    }

    if (Array.isArray(value)) {
      return value.map((item, index) => this.walk(item, `${path}[${index}]`, redactedPaths));
    }

    const result: Record<string, unknown> = {};
    for (const [key, val] of Object.entries(value)) {
      const childPath = `${path}.${key}`;
      if (SECRET_CLAIMS.has(key)) {
        result[key] = REDACTED_PLACEHOLDER;
        redactedPaths.push(childPath);
      } else {
        result[key] = this.walk(val, childPath, redactedPaths);
      }
    }
    return result;
  }

  private sanitizeString(value: string, path: string, redactedPaths: string[]): string {
    let sanitized = value;
    let wasRedacted = false;

    for (const { pattern, replace } of CREDENTIAL_PATTERNS) {
      pattern.lastIndex = 0;
      sanitized = sanitized.replace(pattern, (match) => {
        wasRedacted = true;
        return replace(match);
      });
    }

    if (wasRedacted) {
      redactedPaths.push(path);
    }

    return sanitized;
  }
}

const defaultSanitizer = new RequestSanitizer();

/** Sanitize with a shared {@link RequestSanitizer}; returns only the value. */
export function sanitizeForLog(value: unknown): unknown {
  return defaultSanitizer.sanitize(value).value;
}
