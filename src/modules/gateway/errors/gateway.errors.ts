export type GatewayErrorKind =
  | 'validation'
  | 'transport'
  | 'invocation'
  | 'null_response';

/**
 * Base class for failures raised inside the gateway pipeline
 */
export abstract class GatewayError extends Error {
  abstract readonly kind: GatewayErrorKind;

  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
  }
}

/**
 * Client input defect, answered with 400 before any backend call
 */
export class ValidationError extends GatewayError {
  readonly kind = 'validation';
}

/**
 * The backend could not be reached (refused, DNS, reset)
 */
export class TransportError extends GatewayError {
  readonly kind = 'transport';
}

/**
 * The backend was reached but the call failed
 */
export class InvocationError extends GatewayError {
  readonly kind = 'invocation';
}

/**
 * The backend answered successfully with nothing
 */
export class NullResponseError extends GatewayError {
  readonly kind = 'null_response';

  constructor(message = 'Backend returned null response') {
    super(message);
  }
}
