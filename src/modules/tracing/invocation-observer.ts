import { Injectable, Logger } from '@nestjs/common';
import {
  Attributes,
  context,
  Span,
  SpanStatusCode,
  trace,
} from '@opentelemetry/api';
import { TracingService } from './tracing.service';

/**
 * Wraps a backend invocation so it can be timed and recorded.
 * Implementations must hand back the invocation's own result or error.
 */
export interface InvocationObserver {
  observe<T>(
    name: string,
    attributes: Attributes,
    invocation: () => Promise<T>,
  ): Promise<T>;
}

@Injectable()
export class OtelInvocationObserver implements InvocationObserver {
  private readonly logger = new Logger(OtelInvocationObserver.name);

  constructor(private readonly tracing: TracingService) { }

  async observe<T>(
    name: string,
    attributes: Attributes,
    invocation: () => Promise<T>,
  ): Promise<T> {
    const span = this.startSpan(name, attributes);
    if (!span) {
      return invocation();
    }

    try {
      const result = await context.with(
        trace.setSpan(context.active(), span),
        invocation,
      );
      this.endSpan(span, () => span.setStatus({ code: SpanStatusCode.OK }));
      return result;
    } catch (error) {
      this.endSpan(span, () => {
        span.recordException(error instanceof Error ? error : String(error));
        span.setStatus({
          code: SpanStatusCode.ERROR,
          message: error instanceof Error ? error.message : String(error),
        });
      });
      throw error;
    }
  }

  private startSpan(name: string, attributes: Attributes): Span | undefined {
    try {
      return this.tracing.getTracer().startSpan(name, { attributes });
    } catch (error) {
      this.logger.warn(`Could not start span ${name}: ${String(error)}`);
      return undefined;
    }
  }

  private endSpan(span: Span, record: () => void): void {
    try {
      record();
      span.end();
    } catch (error) {
      this.logger.warn(`Could not end span: ${String(error)}`);
    }
  }
}
