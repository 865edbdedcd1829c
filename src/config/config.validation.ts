import * as Joi from 'joi';

export const configValidationSchema = Joi.object({
    // Application
    NODE_ENV: Joi.string()
        .valid('development', 'production', 'test')
        .default('development'),
    PORT: Joi.number().port().default(8000),
    HOST: Joi.string().default('0.0.0.0'),
    LOG_LEVEL: Joi.string()
        .valid('fatal', 'error', 'warn', 'info', 'debug', 'trace')
        .default('info'),

    // Backend
    BACKEND_BASE_URL: Joi.string()
        .uri({ scheme: ['http', 'https'] })
        .default('http://localhost:4000'),

    // Request defaults
    DEFAULT_MODEL: Joi.string().default('claude-3-5-haiku-20241022'),
    DEFAULT_TEMPERATURE: Joi.number().min(0).default(0.7),
    DEFAULT_MAX_TOKENS: Joi.number().integer().min(1).default(20),

    // Request Limits
    MAX_BODY_BYTES: Joi.number().integer().min(1).default(10485760), // 10MB

    // Tracing
    TRACING_ENABLED: Joi.boolean().default(false),
    TRACING_ENDPOINT: Joi.string().uri().when('TRACING_ENABLED', {
        is: true,
        then: Joi.required(),
        otherwise: Joi.optional(),
    }),
    TRACING_PROJECT_NAME: Joi.string().default('chat-gateway'),
    TRACING_API_KEY: Joi.string().optional(),
});

export type ConfigValidation = {
    NODE_ENV: 'development' | 'production' | 'test';
    PORT: number;
    HOST: string;
    LOG_LEVEL: string;
    BACKEND_BASE_URL: string;
    DEFAULT_MODEL: string;
    DEFAULT_TEMPERATURE: number;
    DEFAULT_MAX_TOKENS: number;
    MAX_BODY_BYTES: number;
    TRACING_ENABLED: boolean;
    TRACING_ENDPOINT?: string;
    TRACING_PROJECT_NAME: string;
    TRACING_API_KEY?: string;
};
