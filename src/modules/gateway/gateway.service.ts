import { Inject, Injectable, Logger } from '@nestjs/common';
import {
  BackendInvoker,
  GatewayOutcome,
  GatewayStage,
  InboundRequest,
  NormalizedChatRequest,
} from './interfaces/gateway.interfaces';
import { RequestNormalizerService } from './request-normalizer.service';
import { resolveBackendResult } from './backend-result';
import {
  EMPTY_RESPONSE,
  INVALID_RESPONSE_FORMAT,
  normalizeResponse,
} from './response-normalizer';
import { classifyError } from './error-classifier';
import { NullResponseError } from './errors/gateway.errors';
import { InvocationObserver } from '../tracing/invocation-observer';
import {
  BACKEND_INVOKER,
  CHAT_COMPLETION_SPAN,
  INVOCATION_OBSERVER,
} from './gateway.constants';

/**
 * Runs one inbound request through the pipeline:
 * RECEIVED → NORMALIZING → INVOKING → NORMALIZING_RESPONSE → RESPONDING,
 * or FAILED → RESPONDING when normalization or the backend call fails.
 */
@Injectable()
export class GatewayService {
  private readonly logger = new Logger(GatewayService.name);

  constructor(
    private readonly requestNormalizer: RequestNormalizerService,
    @Inject(BACKEND_INVOKER) private readonly backend: BackendInvoker,
    @Inject(INVOCATION_OBSERVER) private readonly observer: InvocationObserver,
  ) { }

  async handle(inbound: InboundRequest): Promise<GatewayOutcome> {
    const startedAt = Date.now();
    const outcome = await this.run(inbound);
    this.logger.log(
      `${inbound.requestId} ${inbound.method} /${inbound.path} ${outcome.statusCode} ${Date.now() - startedAt}ms`,
    );
    return outcome;
  }

  private async run(inbound: InboundRequest): Promise<GatewayOutcome> {
    const stages: GatewayStage[] = [];
    const enter = (stage: GatewayStage): void =>
      this.enter(stages, inbound.requestId, stage);

    enter('RECEIVED');
    this.logger.debug(
      `${inbound.requestId} ${inbound.method} /${inbound.path} (${inbound.body.length} bytes)`,
    );

    enter('NORMALIZING');
    let request: NormalizedChatRequest;
    try {
      request = this.requestNormalizer.normalize(inbound.body, inbound.headers);
    } catch (error) {
      return this.fail(inbound, 'NORMALIZING', error, stages);
    }

    enter('INVOKING');
    let raw: unknown;
    try {
      raw = await this.observer.observe(
        CHAT_COMPLETION_SPAN,
        {
          'gateway.request_id': inbound.requestId,
          'gateway.path': inbound.path,
          'llm.model': request.model,
          'llm.max_tokens': request.max_tokens,
          'llm.temperature': request.temperature,
        },
        async () => {
          const value = await this.backend.invoke(request, inbound.requestId);
          if (value === null || value === undefined) {
            throw new NullResponseError();
          }
          return value;
        },
      );
    } catch (error) {
      return this.fail(inbound, 'INVOKING', error, stages);
    }

    enter('NORMALIZING_RESPONSE');
    const result = resolveBackendResult(raw);
    const body = normalizeResponse(result);
    if (body.error === INVALID_RESPONSE_FORMAT || body.error === EMPTY_RESPONSE) {
      this.logger.warn(
        `${inbound.requestId} backend answered with an unusable ${result.kind} value`,
      );
    }

    enter('RESPONDING');
    return { ok: true, statusCode: 200, body, stages };
  }

  private fail(
    inbound: InboundRequest,
    failedAt: 'NORMALIZING' | 'INVOKING',
    error: unknown,
    stages: GatewayStage[],
  ): GatewayOutcome {
    this.enter(stages, inbound.requestId, 'FAILED');
    const { statusCode, message } = classifyError(error);

    if (statusCode >= 500) {
      this.logger.error(
        `${inbound.requestId} failed while ${failedAt}: ${message}`,
        error instanceof Error ? error.stack : undefined,
      );
    } else {
      this.logger.warn(`${inbound.requestId} rejected: ${message}`);
    }

    this.enter(stages, inbound.requestId, 'RESPONDING');
    return {
      ok: false,
      statusCode,
      body: { detail: message },
      failedAt,
      stages,
    };
  }

  private enter(
    stages: GatewayStage[],
    requestId: string,
    stage: GatewayStage,
  ): void {
    stages.push(stage);
    this.logger.debug(`${requestId} ${stage}`);
  }
}
