import {
    ExceptionFilter,
    Catch,
    ArgumentsHost,
    Logger,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { classifyError } from '../../modules/gateway/error-classifier';
import { CORS_RESPONSE_HEADERS } from '../../modules/gateway/gateway.constants';

interface ErrorResponse {
    detail: string;
}

/**
 * Last-resort boundary: anything that escapes a handler is rendered as
 * `{ detail }` with the classified status code.
 */
@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
    private readonly logger = new Logger(AllExceptionsFilter.name);

    catch(exception: unknown, host: ArgumentsHost): void {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<FastifyReply>();
        const request = ctx.getRequest<FastifyRequest>();

        const requestIdHeader = request.headers['x-request-id'];
        const requestId =
            typeof requestIdHeader === 'string' ? requestIdHeader : request.id;

        const { statusCode, message } = classifyError(exception);
        const errorResponse: ErrorResponse = { detail: message };

        if (statusCode >= 500) {
            this.logger.error(
                `${request.method} ${request.url} ${statusCode} - ${message}`,
                exception instanceof Error ? exception.stack : undefined,
                { requestId, statusCode },
            );
        } else {
            this.logger.warn(
                `${request.method} ${request.url} ${statusCode} - ${message}`,
                { requestId, statusCode },
            );
        }

        if (response.sent) {
            return;
        }

        response
            .header('x-request-id', requestId)
            .headers(CORS_RESPONSE_HEADERS)
            .status(statusCode)
            .send(errorResponse);
    }
}
