import { describe, it, expect } from 'vitest';
import { createStage1Decode, queryComponent } from './stage-1-decode.js';
import { isParseResult } from './run.js';
import type { RawRequest } from './types.js';
import type { EndpointContext } from '../../types/context.js';
import type { RequestFormat } from '../../types/endpoint.js';
import type { ProtocolMessage } from '../../types/message.js';
import { KeyJar } from '../key-jar.js';
import { GenericMessage } from '../messages.js';
import { createTestContext, createSigningKey, signTestJwt } from '../../testing/index.js';

async function decode(
  requestFormat: RequestFormat,
  raw: RawRequest,
  context: EndpointContext = createTestContext(),
): Promise<ProtocolMessage | undefined> {
  const stage = createStage1Decode({ requestType: GenericMessage, requestFormat });
  const result = await stage.execute({ endpointContext: context, raw, extras: {} });
  if (isParseResult(result)) {
    throw new Error('decode stage must not finish the pipeline');
  }
  return result.request;
}

describe('queryComponent', () => {
  it('returns the text after ?', () => {
    expect(queryComponent('https://op.example/authorize?foo=bar&baz=qux')).toBe('foo=bar&baz=qux');
  });

  it('drops the fragment', () => {
    expect(queryComponent('/authorize?a=1#b=2')).toBe('a=1');
  });

  it('returns an empty string when there is no query', () => {
    expect(queryComponent('https://op.example/authorize')).toBe('');
    expect(queryComponent('https://op.example/#a?b')).toBe('');
  });
});

describe('Stage 1: decode', () => {
  it('yields an empty message for an absent request', async () => {
    const request = await decode('urlencoded', undefined);
    expect(request?.typeName).toBe('Message');
    expect(request?.toDict()).toEqual({});
  });

  it('yields an empty message for an empty string', async () => {
    expect((await decode('json', ''))?.toDict()).toEqual({});
  });

  it('uses pre-parsed claims whatever the format', async () => {
    const request = await decode('jwt', { client_id: 'client_1', scope: 'openid' });
    expect(request?.toDict()).toEqual({ client_id: 'client_1', scope: 'openid' });
  });

  it('decodes the query of a url request', async () => {
    const request = await decode('url', 'https://op.example/authorize?foo=bar&baz=qux');
    expect(request?.toDict()).toEqual({ foo: 'bar', baz: 'qux' });
  });

  it('decodes a urlencoded request', async () => {
    const request = await decode('urlencoded', 'resource=acct%3Afoo%40example.com&rel=self');
    expect(request?.toDict()).toEqual({ resource: 'acct:foo@example.com', rel: 'self' });
  });

  it('decodes a json request', async () => {
    const request = await decode('json', '{"resource":"acct:foo@example.com"}');
    expect(request?.toDict()).toEqual({ resource: 'acct:foo@example.com' });
  });

  it('decodes a signed jwt request with the context key registry', async () => {
    const key = await createSigningKey();
    const keyJar = new KeyJar();
    keyJar.addJwks('client_1', key.jwks);
    const token = await signTestJwt({ iss: 'client_1', scope: 'openid' }, key);

    const request = await decode('jwt', token, createTestContext({ keyJar }));
    expect(request?.toDict()).toEqual({ iss: 'client_1', scope: 'openid' });
  });

  it('propagates decode errors', async () => {
    await expect(decode('json', 'not json')).rejects.toThrow('Invalid JSON message');
  });
});
