/**
 * Inbound request as seen by the gateway pipeline.
 * Header names are lower-cased by the transport layer.
 */
export interface InboundRequest {
  requestId: string;
  method: string;
  /** URL remainder after the service root, without the query string */
  path: string;
  headers: Record<string, string>;
  body: Buffer;
}

/**
 * OpenAI-compatible chat message
 */
export interface ChatMessage {
  role: string;
  /** Text, a list of content parts, or null on assistant tool calls */
  content?: string | unknown[] | null;
  [key: string]: unknown;
}

/**
 * Canonical chat completion request, defaults applied and validated
 */
export interface NormalizedChatRequest {
  model: string;
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  credential: string;
}

/**
 * Field defaults applied by the request normalizer
 */
export interface ChatRequestDefaults {
  model: string;
  temperature: number;
  maxTokens: number;
}

/**
 * Backend connection settings
 */
export interface BackendOptions {
  baseUrl: string;
}

/**
 * JSON mapping sent back to the client on success
 */
export type NormalizedResponseBody = Record<string, unknown>;

/**
 * A backend value that knows how to turn itself into a plain mapping
 */
export interface MappingConvertible {
  toMapping(): Record<string, unknown> | null | undefined;
}

/**
 * Backend value resolved once, right after the invocation
 */
export type BackendResult =
  | { kind: 'structured'; source: MappingConvertible }
  | { kind: 'field-bag'; mapping: Record<string, unknown> | null | undefined }
  | { kind: 'unrecognized'; value: unknown };

/**
 * Single call to the inference backend
 */
export interface BackendInvoker {
  invoke(request: NormalizedChatRequest, requestId: string): Promise<unknown>;
}

export interface ClassifiedError {
  statusCode: number;
  message: string;
}

/**
 * Per-request pipeline stage
 */
export type GatewayStage =
  | 'RECEIVED'
  | 'NORMALIZING'
  | 'INVOKING'
  | 'NORMALIZING_RESPONSE'
  | 'RESPONDING'
  | 'FAILED';

/**
 * What the handler writes back to the transport
 */
export type GatewayOutcome =
  | { ok: true; statusCode: 200; body: NormalizedResponseBody; stages: GatewayStage[] }
  | {
      ok: false;
      statusCode: number;
      body: { detail: string };
      failedAt: 'NORMALIZING' | 'INVOKING';
      stages: GatewayStage[];
    };
