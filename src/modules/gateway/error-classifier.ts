import { HttpException, HttpStatus } from '@nestjs/common';
import { ClassifiedError } from './interfaces/gateway.interfaces';
import { GatewayError, TransportError } from './errors/gateway.errors';

/**
 * Maps any failure raised while handling a request to the status code and
 * message the client is shown.
 *
 * Validation failures keep their own message (400). A TransportError anywhere
 * in the cause chain wins over the error that wrapped it (502). HTTP exceptions
 * and framework client errors (an oversize body is a 413) keep their status.
 * Everything else is a proxy error (500).
 */
export function classifyError(error: unknown): ClassifiedError {
  if (error instanceof GatewayError && error.kind === 'validation') {
    return { statusCode: HttpStatus.BAD_REQUEST, message: error.message };
  }

  const transport = findInCauseChain(error, TransportError);
  if (transport) {
    return {
      statusCode: HttpStatus.BAD_GATEWAY,
      message: `Error connecting to backend server: ${transport.message}`,
    };
  }

  if (error instanceof HttpException) {
    return {
      statusCode: error.getStatus(),
      message: httpExceptionMessage(error),
    };
  }

  const clientStatus = clientErrorStatus(error);
  if (error instanceof Error && clientStatus !== undefined) {
    return { statusCode: clientStatus, message: error.message };
  }

  return {
    statusCode: HttpStatus.INTERNAL_SERVER_ERROR,
    message: `Proxy error: ${describe(error)}`,
  };
}

function findInCauseChain<T extends Error>(
  error: unknown,
  type: abstract new (...args: never[]) => T,
): T | undefined {
  const seen = new Set<unknown>();
  let current: unknown = error;

  while (current instanceof Error && !seen.has(current)) {
    if (current instanceof type) {
      return current;
    }
    seen.add(current);
    current = current.cause;
  }

  return undefined;
}

/**
 * 4xx status carried on a framework error, e.g. FST_ERR_CTP_BODY_TOO_LARGE
 */
function clientErrorStatus(error: unknown): number | undefined {
  if (!(error instanceof Error) || !('statusCode' in error)) {
    return undefined;
  }
  const { statusCode } = error;
  if (typeof statusCode === 'number' && statusCode >= 400 && statusCode < 500) {
    return statusCode;
  }
  return undefined;
}

function httpExceptionMessage(exception: HttpException): string {
  const response = exception.getResponse();

  if (typeof response === 'string') {
    return response;
  }

  const message = 'message' in response ? response.message : undefined;
  if (typeof message === 'string') {
    return message;
  }
  if (Array.isArray(message)) {
    return message.map(String).join(', ');
  }
  return exception.message;
}

function describe(error: unknown): string {
  if (error instanceof Error) {
    return error.message;
  }
  return String(error);
}
