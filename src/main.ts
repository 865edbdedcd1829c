import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import {
    FastifyAdapter,
    NestFastifyApplication,
} from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { configureApp, fastifyOptions } from './app.setup';

async function bootstrap() {
    const logger = new Logger('Bootstrap');

    // Create Fastify adapter with options
    const fastifyAdapter = new FastifyAdapter({
        logger: {
            level: process.env.LOG_LEVEL || 'info',
            transport:
                process.env.NODE_ENV !== 'production'
                    ? {
                        target: 'pino-pretty',
                        options: {
                            colorize: true,
                            translateTime: 'HH:MM:ss Z',
                            ignore: 'pid,hostname',
                        },
                    }
                    : undefined,
        },
        trustProxy: true,
        ...fastifyOptions(Number(process.env.MAX_BODY_BYTES) || 10 * 1024 * 1024),
    });

    // Bodies are parsed by the gateway itself
    const app = await NestFactory.create<NestFastifyApplication>(
        AppModule,
        fastifyAdapter,
        {
            bufferLogs: true,
            bodyParser: false,
        },
    );

    configureApp(app);

    // Graceful shutdown
    app.enableShutdownHooks();

    const configService = app.get(ConfigService);
    const port = configService.get<number>('PORT', 8000);
    const host = configService.get<string>('HOST', '0.0.0.0');

    await app.listen(port, host);

    logger.log(`Chat gateway running on http://${host}:${port}`);
    logger.log(`Health check available at http://${host}:${port}/health`);
    logger.log(
        `Forwarding to ${configService.get<string>('BACKEND_BASE_URL', 'http://localhost:4000')}`,
    );
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    new Logger('Process').error('Uncaught Exception', error.stack);
    process.exit(1);
});

process.on('unhandledRejection', (reason) => {
    new Logger('Process').error(`Unhandled Rejection: ${String(reason)}`);
});

bootstrap().catch((error: unknown) => {
    new Logger('Bootstrap').error(
        `Startup failed: ${error instanceof Error ? error.message : String(error)}`,
    );
    process.exit(1);
});
