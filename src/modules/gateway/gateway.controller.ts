import {
  Controller,
  Delete,
  Get,
  Patch,
  Post,
  Put,
  Req,
  Res,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { GatewayService } from './gateway.service';
import { InboundRequest } from './interfaces/gateway.interfaces';
import { CORS_RESPONSE_HEADERS } from './gateway.constants';

/**
 * Catch-all gateway endpoint. GET, POST, PUT, DELETE and PATCH on any path go
 * through the same pipeline; GET /health is served by the health controller.
 * OPTIONS is left to the CORS preflight handler.
 */
@Controller()
export class GatewayController {
  constructor(private readonly gatewayService: GatewayService) { }

  @Get('*')
  async get(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    await this.proxy(request, reply);
  }

  @Post('*')
  async post(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    await this.proxy(request, reply);
  }

  @Put('*')
  async put(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    await this.proxy(request, reply);
  }

  @Delete('*')
  async delete(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    await this.proxy(request, reply);
  }

  @Patch('*')
  async patch(@Req() request: FastifyRequest, @Res() reply: FastifyReply): Promise<void> {
    await this.proxy(request, reply);
  }

  private async proxy(
    request: FastifyRequest,
    reply: FastifyReply,
  ): Promise<void> {
    const inbound = toInboundRequest(request);
    const outcome = await this.gatewayService.handle(inbound);

    await reply
      .header('x-request-id', inbound.requestId)
      .header('Content-Type', 'application/json')
      .headers(CORS_RESPONSE_HEADERS)
      .status(outcome.statusCode)
      .send(outcome.body);
  }
}

/**
 * The request id is the one Fastify assigned: the inbound x-request-id header,
 * or a fresh UUID when the client sent none.
 */
export function toInboundRequest(
  request: Pick<FastifyRequest, 'id' | 'method' | 'url' | 'headers' | 'body'>,
): InboundRequest {
  const headers: Record<string, string> = {};
  for (const [name, value] of Object.entries(request.headers)) {
    if (value !== undefined) {
      headers[name.toLowerCase()] = Array.isArray(value) ? value.join(', ') : value;
    }
  }

  const queryAt = request.url.indexOf('?');
  const path = queryAt === -1 ? request.url : request.url.slice(0, queryAt);

  return {
    requestId: request.id,
    method: request.method,
    path: path.replace(/^\/+/, ''),
    headers,
    body: Buffer.isBuffer(request.body) ? request.body : Buffer.alloc(0),
  };
}
