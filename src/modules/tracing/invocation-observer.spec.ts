import { ConfigService } from '@nestjs/config';
import { SpanStatusCode } from '@opentelemetry/api';
import {
  InMemorySpanExporter,
  NodeTracerProvider,
  SimpleSpanProcessor,
} from '@opentelemetry/sdk-trace-node';
import { OtelInvocationObserver } from './invocation-observer';
import { TracingService } from './tracing.service';

describe('OtelInvocationObserver', () => {
  let exporter: InMemorySpanExporter;
  let provider: NodeTracerProvider;
  let tracing: TracingService;
  let observer: OtelInvocationObserver;

  beforeEach(() => {
    exporter = new InMemorySpanExporter();
    provider = new NodeTracerProvider();
    provider.addSpanProcessor(new SimpleSpanProcessor(exporter));

    tracing = new TracingService(new ConfigService());
    jest.spyOn(tracing, 'getTracer').mockReturnValue(provider.getTracer('test'));
    observer = new OtelInvocationObserver(tracing);
  });

  afterEach(async () => {
    await provider.shutdown();
  });

  it('records a span around a successful invocation', async () => {
    const result = await observer.observe(
      'backend.chat_completion',
      { 'llm.model': 'claude-3-5-haiku-20241022' },
      async () => ({ id: 'x' }),
    );

    expect(result).toEqual({ id: 'x' });
    const [span] = exporter.getFinishedSpans();
    expect(span.name).toBe('backend.chat_completion');
    expect(span.attributes['llm.model']).toBe('claude-3-5-haiku-20241022');
    expect(span.status.code).toBe(SpanStatusCode.OK);
  });

  it('records the failure and rethrows the same error', async () => {
    const failure = new Error('connect ECONNREFUSED');

    await expect(
      observer.observe('backend.chat_completion', {}, async () => {
        throw failure;
      }),
    ).rejects.toBe(failure);

    const [span] = exporter.getFinishedSpans();
    expect(span.status).toEqual({
      code: SpanStatusCode.ERROR,
      message: 'connect ECONNREFUSED',
    });
    expect(span.events.map((event) => event.name)).toEqual(['exception']);
  });

  it('still runs the invocation when no span can be started', async () => {
    jest.spyOn(tracing, 'getTracer').mockImplementation(() => {
      throw new Error('tracer unavailable');
    });

    await expect(
      observer.observe('backend.chat_completion', {}, async () => 'done'),
    ).resolves.toBe('done');
    expect(exporter.getFinishedSpans()).toHaveLength(0);
  });
});

describe('TracingService', () => {
  it('hands out a no-op tracer when tracing is disabled', async () => {
    const tracing = new TracingService(new ConfigService({ TRACING_ENABLED: false }));

    tracing.onModuleInit();
    const span = tracing.getTracer().startSpan('standalone');

    expect(span.isRecording()).toBe(false);
    span.end();
    await tracing.onApplicationShutdown();
  });

  it('requires an endpoint when tracing is enabled', () => {
    const tracing = new TracingService(new ConfigService({ TRACING_ENABLED: true }));

    expect(() => tracing.onModuleInit()).toThrow(
      'TRACING_ENDPOINT is required when TRACING_ENABLED is true',
    );
  });
});
