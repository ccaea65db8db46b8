import { FastifyAdapter, NestFastifyApplication } from '@nestjs/platform-fastify';
import { v4 as uuidv4 } from 'uuid';

export interface AdapterOptions {
    /** Pino log level; false turns Fastify's own logging off */
    logLevel: string | false;
    prettyLogs: boolean;
}

/**
 * Fastify adapter shared by the server and the e2e tests
 */
export function createFastifyAdapter(options: AdapterOptions): FastifyAdapter {
    return new FastifyAdapter({
        logger:
            options.logLevel === false
                ? false
                : {
                    level: options.logLevel,
                    transport: options.prettyLogs
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
        bodyLimit: 10 * 1024 * 1024, // 10MB max body size
        requestIdHeader: 'x-request-id',
        genReqId: () => uuidv4(),
    });
}

/**
 * Wait until Fastify has registered every route, so `inject` can be used
 */
export async function readyApp(app: NestFastifyApplication): Promise<void> {
    await app.init();
    await app.getHttpAdapter().getInstance().ready();
}
