import { describe, it, expect, vi } from 'vitest';
import { createStage3Verify } from './stage-3-verify.js';
import type { ParseContext } from './types.js';
import type { ProtocolMessage } from '../../types/message.js';
import { ErrorResponse, GenericMessage } from '../messages.js';
import { KeyJar } from '../key-jar.js';
import { LookupRequest, createTestContext } from '../../testing/index.js';

function parseContext(request: ProtocolMessage, clientId?: string): ParseContext {
  return {
    endpointContext: createTestContext({ keyJar: new KeyJar(), verifySsl: false }),
    raw: undefined,
    extras: {},
    request,
    clientId,
  };
}

describe('Stage 3: verify', () => {
  const stage = createStage3Verify({ errorType: ErrorResponse });

  it('passes a valid request through unchanged', async () => {
    const ctx = parseContext(LookupRequest.create({ resource: 'acct:foo@example.com' }));
    expect(await stage.execute(ctx)).toBe(ctx);
  });

  it('turns a missing attribute into an invalid_request error message', async () => {
    const result = await stage.execute(parseContext(LookupRequest.create({})));

    expect(result).toMatchObject({ ok: false });
    if (!('ok' in result) || result.ok) throw new Error('expected an error result');
    expect(result.error.typeName).toBe('ErrorResponse');
    expect(result.error.toDict()).toEqual({
      error: 'invalid_request',
      error_description: "Missing required attribute 'resource'",
    });
  });

  it('turns an empty required value into an invalid_request error message', async () => {
    const result = await stage.execute(parseContext(LookupRequest.create({ resource: '' })));
    if (!('ok' in result) || result.ok) throw new Error('expected an error result');
    expect(result.error.get('error_description')).toBe("Missing required value for 'resource'");
  });

  it('builds the error in the configured error type', async () => {
    const generic = createStage3Verify({ errorType: GenericMessage });
    const result = await generic.execute(parseContext(LookupRequest.create({ resource: 5 })));
    if (!('ok' in result) || result.ok) throw new Error('expected an error result');
    expect(result.error.typeName).toBe('Message');
    expect(result.error.get('error_description')).toBe('/resource: must be string');
  });

  it('verifies with the context keys, the client id and the TLS policy', async () => {
    const request = GenericMessage.create();
    const verify = vi.spyOn(request, 'verify');
    const ctx = parseContext(request, 'client_1');

    await stage.execute(ctx);

    expect(verify).toHaveBeenCalledWith({
      keyJar: ctx.endpointContext.keyJar,
      opponentId: 'client_1',
      verifySsl: false,
    });
  });

  it('rethrows anything that is not a verification failure', async () => {
    const request = GenericMessage.create();
    vi.spyOn(request, 'verify').mockRejectedValue(new Error('registry offline'));

    await expect(stage.execute(parseContext(request))).rejects.toThrow('registry offline');
  });
});
