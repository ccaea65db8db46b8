import * as Joi from 'joi';

export const configValidationSchema = Joi.object<ConfigValidation>({
    // Application
    NODE_ENV: Joi.string()
        .valid('development', 'production', 'test')
        .default('development'),
    HOST: Joi.string().default('0.0.0.0'),
    // Overrides server.port from the settings document when set
    PORT: Joi.number().port().optional(),
    CORS_ORIGINS: Joi.string().default('*'),
    LOG_LEVEL: Joi.string()
        .valid('fatal', 'error', 'warn', 'info', 'debug', 'trace')
        .default('info'),

    // Mock settings document (YAML or JSON)
    CONFIG: Joi.string().default('config.yaml'),
});

export type ConfigValidation = {
    NODE_ENV: 'development' | 'production' | 'test';
    HOST: string;
    PORT?: number;
    CORS_ORIGINS: string;
    LOG_LEVEL: string;
    CONFIG: string;
};
