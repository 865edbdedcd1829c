import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BackendInvoker,
  BackendOptions,
  NormalizedChatRequest,
} from './interfaces/gateway.interfaces';
import {
  GatewayError,
  InvocationError,
  NullResponseError,
  TransportError,
} from './errors/gateway.errors';
import { BackendCompletion } from './backend-result';
import { BACKEND_OPTIONS } from './gateway.constants';
import { isPlainObject } from '../../common/utils/is-plain-object';

/**
 * Network-level failures reported by fetch: the request never got an answer
 * or the connection dropped while the body was being read.
 */
const NETWORK_FAILURE_MESSAGES = new Set(['fetch failed', 'terminated']);

/**
 * Backend invoker speaking the OpenAI-compatible chat completions API
 */
@Injectable()
export class BackendClientService implements BackendInvoker {
  private readonly logger = new Logger(BackendClientService.name);

  constructor(
    @Inject(BACKEND_OPTIONS) private readonly options: BackendOptions,
  ) { }

  async invoke(
    request: NormalizedChatRequest,
    requestId: string,
  ): Promise<unknown> {
    const url = `${this.options.baseUrl.replace(/\/+$/, '')}/v1/chat/completions`;

    const headers: Record<string, string> = {
      'Content-Type': 'application/json',
      'X-Request-ID': requestId,
    };
    if (request.credential) {
      headers['Authorization'] = `Bearer ${request.credential}`;
    }

    this.logger.debug(
      `Forwarding ${requestId} to ${url}: model=${request.model}, ` +
      `messages=${request.messages.length}, max_tokens=${request.max_tokens}`,
    );

    let response: Response;
    try {
      response = await fetch(url, {
        method: 'POST',
        headers,
        body: JSON.stringify({
          model: request.model,
          messages: request.messages,
          temperature: request.temperature,
          max_tokens: request.max_tokens,
        }),
      });
    } catch (error) {
      throw toInvocationFailure(error);
    }

    try {
      const text = await response.text();

      if (!response.ok) {
        throw new InvocationError(
          `Backend responded with ${response.status}: ${parseBackendError(text)}`,
        );
      }

      return decodeCompletion(text);
    } catch (error) {
      if (error instanceof GatewayError) {
        throw error;
      }
      throw toInvocationFailure(error);
    } finally {
      if (!response.bodyUsed && response.body) {
        await response.body.cancel().catch(() => { });
      }
    }
  }
}

function decodeCompletion(text: string): unknown {
  if (text.trim() === '') {
    throw new NullResponseError();
  }

  let document: unknown;
  try {
    document = JSON.parse(text);
  } catch (error) {
    throw new InvocationError(
      `Backend returned malformed JSON: ${text.substring(0, 200)}`,
      { cause: error },
    );
  }

  if (document === null) {
    throw new NullResponseError();
  }
  return isPlainObject(document) ? new BackendCompletion(document) : document;
}

/**
 * Pull a human readable message out of a backend error body
 */
function parseBackendError(body: string): string {
  try {
    const parsed: unknown = JSON.parse(body);
    if (isPlainObject(parsed)) {
      const { error, detail } = parsed;
      if (isPlainObject(error) && typeof error.message === 'string') {
        return error.message;
      }
      if (typeof error === 'string') {
        return error;
      }
      if (typeof detail === 'string') {
        return detail;
      }
    }
  } catch {
    // Not JSON
  }

  return body.substring(0, 200);
}

function toInvocationFailure(error: unknown): GatewayError {
  if (error instanceof TypeError && NETWORK_FAILURE_MESSAGES.has(error.message)) {
    return new TransportError(describeCause(error), { cause: error });
  }

  const message = error instanceof Error ? error.message : String(error);
  return new InvocationError(message, { cause: error });
}

function describeCause(error: Error): string {
  const { cause } = error;
  if (cause instanceof AggregateError && cause.message === '') {
    return cause.errors
      .map((inner: unknown) => (inner instanceof Error ? inner.message : String(inner)))
      .join('; ');
  }
  if (cause instanceof Error && cause.message !== '') {
    return cause.message;
  }
  return error.message;
}
