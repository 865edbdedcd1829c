import { PayloadTooLargeException } from '@nestjs/common';
import { classifyError } from './error-classifier';
import {
  InvocationError,
  NullResponseError,
  TransportError,
  ValidationError,
} from './errors/gateway.errors';

describe('classifyError', () => {
  it('maps validation failures to 400 with their own message', () => {
    expect(classifyError(new ValidationError('Messages field is required'))).toEqual({
      statusCode: 400,
      message: 'Messages field is required',
    });
  });

  it('maps transport failures to 502', () => {
    expect(classifyError(new TransportError('connect ECONNREFUSED 127.0.0.1:4000'))).toEqual({
      statusCode: 502,
      message: 'Error connecting to backend server: connect ECONNREFUSED 127.0.0.1:4000',
    });
  });

  it('maps invocation failures to 500', () => {
    expect(classifyError(new InvocationError('Backend responded with 401: bad key'))).toEqual({
      statusCode: 500,
      message: 'Proxy error: Backend responded with 401: bad key',
    });
  });

  it('maps a null backend response to 500', () => {
    expect(classifyError(new NullResponseError())).toEqual({
      statusCode: 500,
      message: 'Proxy error: Backend returned null response',
    });
  });

  it('prefers a transport failure found in the cause chain', () => {
    const transport = new TransportError('getaddrinfo ENOTFOUND backend');
    const wrapped = new InvocationError('call failed', { cause: transport });

    expect(classifyError(new Error('outer', { cause: wrapped }))).toEqual({
      statusCode: 502,
      message: 'Error connecting to backend server: getaddrinfo ENOTFOUND backend',
    });
  });

  it('stops on cyclic cause chains', () => {
    const first = new Error('first');
    const second = new Error('second', { cause: first });
    first.cause = second;

    expect(classifyError(first)).toEqual({
      statusCode: 500,
      message: 'Proxy error: first',
    });
  });

  it('maps any other error to 500', () => {
    expect(classifyError(new RangeError('out of range'))).toEqual({
      statusCode: 500,
      message: 'Proxy error: out of range',
    });
  });

  it('stringifies non-Error throwables', () => {
    expect(classifyError('plain failure')).toEqual({
      statusCode: 500,
      message: 'Proxy error: plain failure',
    });
  });

  it('keeps the status of framework HTTP exceptions', () => {
    expect(classifyError(new PayloadTooLargeException('Body too large'))).toEqual({
      statusCode: 413,
      message: 'Body too large',
    });
  });

  it('keeps the 4xx status a framework error carries', () => {
    const tooLarge = Object.assign(new Error('Request body is too large'), {
      code: 'FST_ERR_CTP_BODY_TOO_LARGE',
      statusCode: 413,
    });

    expect(classifyError(tooLarge)).toEqual({
      statusCode: 413,
      message: 'Request body is too large',
    });
  });

  it('does not trust a 5xx status on a plain error', () => {
    const upstream = Object.assign(new Error('upstream broke'), { statusCode: 503 });

    expect(classifyError(upstream)).toEqual({
      statusCode: 500,
      message: 'Proxy error: upstream broke',
    });
  });
});
