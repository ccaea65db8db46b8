import 'reflect-metadata';
import { NestFactory } from '@nestjs/core';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { Logger } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { AppModule } from './app.module';
import { createFastifyAdapter } from './app.factory';
import { loadMockSettings, MockSettings } from './config/mock-settings';
import { ConfigValidation } from './config/config.validation';
import { loadEnvironment } from './config/environment';

async function bootstrap() {
    const logger = new Logger('Bootstrap');

    // Settings decide which controllers exist, so env and settings load before Nest does
    const env = await loadEnvironment();
    const settings = loadMockSettings(env.CONFIG, logger);

    const fastifyAdapter = createFastifyAdapter({
        logLevel: env.LOG_LEVEL,
        prettyLogs: env.NODE_ENV !== 'production',
    });

    const app = await NestFactory.create<NestFastifyApplication>(
        AppModule.forRoot(settings),
        fastifyAdapter,
        { bufferLogs: true },
    );

    const configService = app.get<ConfigService<ConfigValidation, true>>(ConfigService);

    // CORS configuration
    app.enableCors({
        origin: configService.get('CORS_ORIGINS', { infer: true }).split(','),
        methods: ['GET', 'POST', 'OPTIONS'],
        allowedHeaders: [
            'Content-Type',
            'Authorization',
            'X-Request-ID',
            'X-Api-Key',
            'X-Goog-Api-Key',
            'Anthropic-Version',
        ],
        exposedHeaders: [
            'X-Request-ID',
            'X-RateLimit-Limit-Requests',
            'X-RateLimit-Remaining-Requests',
            'X-RateLimit-Reset-Requests',
            'Retry-After',
        ],
        maxAge: 86400,
    });

    // Graceful shutdown
    app.enableShutdownHooks();

    const port = configService.get('PORT', { infer: true }) ?? settings.server.port;
    const host = configService.get('HOST', { infer: true });

    await app.listen(port, host);

    logger.log(`LLM mock server running on http://${host}:${port}`);
    logFaultSettings(logger, settings);
}

function logFaultSettings(logger: Logger, settings: MockSettings): void {
    const { server, rateLimit, errors, auth } = settings;

    if (server.latencyMs > 0) {
        logger.log(`Base latency: ${server.latencyMs}ms`);
    }
    if (errors.forceError !== 'none') {
        logger.warn(`Forcing ${errors.forceError} on every request`);
    }
    if (errors.errorRate > 0) {
        logger.log(`Random error rate: ${(errors.errorRate * 100).toFixed(1)}%`);
    }
    if (rateLimit.failAfterRequests > 0) {
        logger.log(`Rate limiting every request from #${rateLimit.failAfterRequests}`);
    }
    if (auth.requireAuth) {
        logger.log(`Auth required (${auth.validKeys.length} valid keys)`);
    }
}

// Handle uncaught errors
process.on('uncaughtException', (error) => {
    console.error('Uncaught Exception:', error);
    process.exit(1);
});

process.on('unhandledRejection', (reason, promise) => {
    console.error('Unhandled Rejection at:', promise, 'reason:', reason);
    process.exit(1);
});

bootstrap().catch((error: unknown) => {
    console.error('Failed to start server:', error);
    process.exit(1);
});
