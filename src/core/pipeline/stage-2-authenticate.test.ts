import { describe, it, expect, vi } from 'vitest';
import { createStage2Authenticate } from './stage-2-authenticate.js';
import { isParseResult } from './run.js';
import type { ParseContext } from './types.js';
import type { ClientAuthResult } from '../client-authn.js';
import { UnauthorizedClientError } from '../endpoint-errors.js';
import { GenericMessage } from '../messages.js';
import { createTestContext } from '../../testing/index.js';
import type { Claims } from '../../types/message.js';

function parseContext(claims: Claims, auth?: string): ParseContext {
  return {
    endpointContext: createTestContext(),
    raw: claims,
    auth,
    extras: { state: 'xyz' },
    request: GenericMessage.create(claims),
  };
}

async function run(result: ClientAuthResult, ctx: ParseContext, clientAuthMethod = ''): Promise<ParseContext> {
  const stage = createStage2Authenticate({
    authenticate: async () => result,
    clientAuthMethod,
  });
  const out = await stage.execute(ctx);
  if (isParseResult(out)) {
    throw new Error('authenticate stage must not finish the pipeline');
  }
  return out;
}

describe('Stage 2: authenticate', () => {
  it('passes context, request, credential and extras to the authenticator', async () => {
    const authenticate = vi.fn(async (): Promise<ClientAuthResult> => ({ kind: 'no-method' }));
    const ctx = parseContext({}, 'Basic abc');
    await createStage2Authenticate({ authenticate, clientAuthMethod: '' }).execute(ctx);

    expect(authenticate).toHaveBeenCalledWith(ctx.endpointContext, ctx.request, 'Basic abc', ctx.extras);
  });

  describe('authenticated', () => {
    it('writes the authenticated client id into the request', async () => {
      const ctx = parseContext({ client_id: 'claimed' });
      const out = await run(
        { kind: 'authenticated', info: { method: 'client_secret_basic', clientId: 'client_1' } },
        ctx,
        'client_secret_basic',
      );

      expect(out.clientId).toBe('client_1');
      expect(out.request?.get('client_id')).toBe('client_1');
    });

    it("falls back to the request's client_id when the method names none", async () => {
      const out = await run(
        { kind: 'authenticated', info: { method: 'custom' } },
        parseContext({ client_id: 'client_2' }),
      );
      expect(out.clientId).toBe('client_2');
    });

    it('leaves the client id unset when nothing names one', async () => {
      const out = await run({ kind: 'authenticated', info: { method: 'custom' } }, parseContext({}));
      expect(out.clientId).toBeUndefined();
    });
  });

  describe('no-method', () => {
    it("is tolerated when no method is required, using the request's client_id", async () => {
      const out = await run({ kind: 'no-method' }, parseContext({ client_id: 'client_1' }));
      expect(out.clientId).toBe('client_1');
    });

    it('ignores a client_id that is not a string', async () => {
      const out = await run({ kind: 'no-method' }, parseContext({ client_id: 7 }));
      expect(out.clientId).toBeUndefined();
    });

    it('escalates when a method is required', async () => {
      await expect(
        run({ kind: 'no-method' }, parseContext({ client_id: 'client_1' }), 'client_secret_basic'),
      ).rejects.toThrow(
        new UnauthorizedClientError('Client authentication with client_secret_basic is required'),
      );
    });
  });

  describe('failed', () => {
    it('escalates even when no method is required', async () => {
      await expect(
        run({ kind: 'failed', reason: 'Wrong secret for client "client_1"' }, parseContext({})),
      ).rejects.toBeInstanceOf(UnauthorizedClientError);
    });

    it('carries the reason', async () => {
      await expect(
        run({ kind: 'failed', reason: 'Unknown or expired access token' }, parseContext({}), 'bearer_header'),
      ).rejects.toThrow('Unknown or expired access token');
    });
  });

  it('throws when no request was decoded', async () => {
    const ctx: ParseContext = { endpointContext: createTestContext(), raw: undefined, extras: {} };
    await expect(run({ kind: 'no-method' }, ctx)).rejects.toThrow(
      'Pipeline error: request not decoded before authentication',
    );
  });
});
