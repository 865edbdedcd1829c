import { toInboundRequest } from './gateway.controller';

describe('toInboundRequest', () => {
  const base = {
    id: 'req-7',
    method: 'POST',
    url: '/v1/chat/completions',
    headers: {},
    body: Buffer.from('{}'),
  };

  it('uses the id the server assigned to the request', () => {
    expect(toInboundRequest(base).requestId).toBe('req-7');
  });

  it('drops the query string from the path', () => {
    expect(
      toInboundRequest({ ...base, url: '/v1/chat/completions?stream=false' }).path,
    ).toBe('v1/chat/completions');
  });

  it('keeps a path that starts with a double slash', () => {
    expect(toInboundRequest({ ...base, url: '//host/p?x=1' }).path).toBe('host/p');
  });

  it('joins repeated headers and lowercases names', () => {
    const inbound = toInboundRequest({
      ...base,
      headers: { Authorization: 'Bearer abc', 'x-tag': ['a', 'b'] },
    });

    expect(inbound.headers).toEqual({ authorization: 'Bearer abc', 'x-tag': 'a, b' });
  });

  it('reads a missing body as empty bytes', () => {
    expect(toInboundRequest({ ...base, body: undefined }).body).toEqual(Buffer.alloc(0));
  });
});
