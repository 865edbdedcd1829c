import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { GatewayController } from './gateway.controller';
import { GatewayService } from './gateway.service';
import { RequestNormalizerService } from './request-normalizer.service';
import { BackendClientService } from './backend-client.service';
import { BackendOptions } from './interfaces/gateway.interfaces';
import { OtelInvocationObserver } from '../tracing/invocation-observer';
import {
  BACKEND_INVOKER,
  BACKEND_OPTIONS,
  INVOCATION_OBSERVER,
} from './gateway.constants';

@Module({
  imports: [ConfigModule],
  controllers: [GatewayController],
  providers: [
    {
      provide: BACKEND_OPTIONS,
      useFactory: (configService: ConfigService): BackendOptions => ({
        baseUrl: configService.get<string>('BACKEND_BASE_URL', 'http://localhost:4000'),
      }),
      inject: [ConfigService],
    },
    {
      provide: BACKEND_INVOKER,
      useClass: BackendClientService,
    },
    {
      provide: INVOCATION_OBSERVER,
      useExisting: OtelInvocationObserver,
    },
    RequestNormalizerService,
    GatewayService,
  ],
  exports: [GatewayService],
})
export class GatewayModule {}
