import { randomUUID } from 'node:crypto';
import { FastifyServerOptions } from 'fastify';
import { NestFastifyApplication } from '@nestjs/platform-fastify';

export const REQUEST_ID_HEADER = 'x-request-id';

/**
 * Fastify options shared by the server and the end-to-end tests: the inbound
 * x-request-id header becomes `request.id`, otherwise a UUID v4 is assigned.
 */
export function fastifyOptions(bodyLimit: number): FastifyServerOptions {
    return {
        bodyLimit,
        requestIdHeader: REQUEST_ID_HEADER,
        genReqId: () => randomUUID(),
    };
}

/**
 * Shared HTTP setup for the server and the end-to-end tests.
 *
 * The application must be created with `bodyParser: false`: every body reaches
 * the gateway as raw bytes and is parsed there.
 */
export function configureApp(app: NestFastifyApplication): void {
    const fastifyInstance = app.getHttpAdapter().getInstance();

    fastifyInstance.removeAllContentTypeParsers();
    fastifyInstance.addContentTypeParser(
        '*',
        { parseAs: 'buffer' },
        (_req, body, done) => {
            done(null, body);
        },
    );

    app.enableCors({
        origin: '*',
        methods: '*',
        allowedHeaders: '*',
        exposedHeaders: ['X-Request-ID'],
        maxAge: 86400,
    });
}
