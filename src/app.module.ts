import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { HealthModule } from './modules/health/health.module';
import { GatewayModule } from './modules/gateway/gateway.module';
import { TracingModule } from './modules/tracing/tracing.module';
import { AllExceptionsFilter } from './common/filters/all-exceptions.filter';
import { configValidationSchema } from './config/config.validation';

@Module({
    imports: [
        // Configuration
        ConfigModule.forRoot({
            isGlobal: true,
            validationSchema: configValidationSchema,
            validationOptions: {
                abortEarly: true,
            },
            envFilePath: ['.env.local', '.env'],
        }),

        // Core modules
        TracingModule,

        // Feature modules
        HealthModule,
        GatewayModule,
    ],
    providers: [
        // Global exception filter
        {
            provide: APP_FILTER,
            useClass: AllExceptionsFilter,
        },
    ],
})
export class AppModule { }
