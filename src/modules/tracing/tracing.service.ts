import {
  Injectable,
  Logger,
  OnApplicationShutdown,
  OnModuleInit,
} from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { trace, Tracer } from '@opentelemetry/api';
import { OTLPTraceExporter } from '@opentelemetry/exporter-trace-otlp-http';
import { Resource } from '@opentelemetry/resources';
import {
  BatchSpanProcessor,
  NodeTracerProvider,
} from '@opentelemetry/sdk-trace-node';

const TRACER_NAME = 'chat-gateway';

/**
 * Owns the process-wide tracer provider. The exporter is registered once when
 * the module starts and flushed when the application shuts down; with tracing
 * disabled every span goes to the no-op tracer.
 */
@Injectable()
export class TracingService implements OnModuleInit, OnApplicationShutdown {
  private readonly logger = new Logger(TracingService.name);
  private provider: NodeTracerProvider | null = null;
  private tracer: Tracer = trace.getTracer(TRACER_NAME);

  constructor(private readonly config: ConfigService) { }

  onModuleInit(): void {
    if (!this.config.get<boolean>('TRACING_ENABLED', false)) {
      this.logger.log('Tracing disabled');
      return;
    }

    const endpoint = this.config.get<string>('TRACING_ENDPOINT');
    if (!endpoint) {
      throw new Error('TRACING_ENDPOINT is required when TRACING_ENABLED is true');
    }

    const projectName = this.config.get<string>('TRACING_PROJECT_NAME', 'chat-gateway');
    const apiKey = this.config.get<string>('TRACING_API_KEY');

    const provider = new NodeTracerProvider({
      resource: new Resource({ 'service.name': projectName }),
    });
    provider.addSpanProcessor(
      new BatchSpanProcessor(
        new OTLPTraceExporter({
          url: endpoint,
          headers: apiKey ? { api_key: apiKey } : {},
        }),
      ),
    );
    provider.register();

    this.provider = provider;
    this.tracer = provider.getTracer(TRACER_NAME);
    this.logger.log(`Tracing enabled: project=${projectName}, endpoint=${endpoint}`);
  }

  getTracer(): Tracer {
    return this.tracer;
  }

  async onApplicationShutdown(): Promise<void> {
    if (!this.provider) {
      return;
    }
    this.logger.log('Flushing trace exporter...');
    await this.provider.shutdown();
    this.provider = null;
  }
}
