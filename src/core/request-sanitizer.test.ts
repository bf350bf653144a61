import { describe, it, expect } from 'vitest';
import { RequestSanitizer, sanitizeForLog, REDACTED_PLACEHOLDER } from './request-sanitizer.js';

describe('RequestSanitizer', () => {
  const sanitizer = new RequestSanitizer();

  it('redacts secret claims in a claims object', () => {
    const result = sanitizer.sanitize({ client_id: 'client_1', client_secret: 'test-secret' });

    expect(result.value).toEqual({ client_id: 'client_1', client_secret: REDACTED_PLACEHOLDER });
    expect(result.redactedPaths).toEqual(['$.client_secret']);
  });

  it('redacts secret parameters inside a urlencoded request', () => {
    const result = sanitizer.sanitize(
      'grant_type=authorization_code&code=abc123&client_secret=test-secret',
    );

    expect(result.value).toBe(
      'grant_type=authorization_code&code=[REDACTED]&client_secret=[REDACTED]',
    );
    expect(result.redactedPaths).toEqual(['$']);
  });

  it('redacts authorization scheme credentials', () => {
    expect(sanitizer.sanitize('Basic dGVzdDp0ZXN0').value).toBe('Basic [REDACTED]');
    expect(sanitizer.sanitize('Bearer test-token-value').value).toBe('Bearer [REDACTED]');
  });

  it('walks nested objects and arrays', () => {
    const result = sanitizer.sanitize({
      nested: { password: 'hunter2', user: 'alice' },
      list: ['access_token=abcdef', 'plain'],
    });

    expect(result.value).toEqual({
      nested: { password: REDACTED_PLACEHOLDER, user: 'alice' },
      list: ['access_token=[REDACTED]', 'plain'],
    });
    expect(result.redactedPaths).toEqual(['$.nested.password', '$.list[0]']);
  });

  it('does not mutate the input', () => {
    const input = { refresh_token: 'test-refresh' };
    sanitizer.sanitize(input);
    expect(input).toEqual({ refresh_token: 'test-refresh' });
  });

  it('passes through values with nothing to redact', () => {
    const result = sanitizer.sanitize({ scope: 'openid profile', max_age: 300, prompt: null });

    expect(result.value).toEqual({ scope: 'openid profile', max_age: 300, prompt: null });
    expect(result.redactedPaths).toEqual([]);
  });
});

describe('sanitizeForLog', () => {
  it('returns only the sanitized value', () => {
    expect(sanitizeForLog({ code_verifier: 'test-verifier' })).toEqual({
      code_verifier: REDACTED_PLACEHOLDER,
    });
  });

  it('passes undefined through', () => {
    expect(sanitizeForLog(undefined)).toBeUndefined();
  });
});
