import {
    Injectable,
    NestInterceptor,
    ExecutionContext,
    CallHandler,
    Logger,
} from '@nestjs/common';
import { Observable } from 'rxjs';
import { tap } from 'rxjs/operators';
import { FastifyRequest, FastifyReply } from 'fastify';
import { matchProvider } from '../../modules/pipeline/provider-path';
import { RuntimeStateService } from '../../modules/runtime/runtime-state.service';

/**
 * One line per request that got past the guards: which provider was
 * emulated, whether it streamed, and how much of the time was injected latency
 */
@Injectable()
export class LoggingInterceptor implements NestInterceptor {
    private readonly logger = new Logger('HTTP');

    constructor(private readonly runtime: RuntimeStateService) {}

    intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
        const ctx = context.switchToHttp();
        const request = ctx.getRequest<FastifyRequest>();
        const response = ctx.getResponse<FastifyReply>();

        const { method, url } = request;
        const label = matchProvider(url) ?? 'server';
        const meta = {
            requestId: request.id,
            requestCount: request.requestCount,
            provider: matchProvider(url),
            injectedLatencyMs: this.runtime.latencyMs(),
        };

        const startTime = Date.now();

        return next.handle().pipe(
            tap({
                next: () => {
                    const duration = Date.now() - startTime;
                    const statusCode = response.statusCode;
                    const stream = String(response.getHeader('content-type') ?? '')
                        .startsWith('text/event-stream');

                    this.logger.log(
                        `[${label}] ${method} ${url} ${statusCode}${stream ? ' stream' : ''} ${duration}ms`,
                        { ...meta, statusCode, stream, duration },
                    );
                },
                error: (error: Error) => {
                    const duration = Date.now() - startTime;

                    this.logger.error(
                        `[${label}] ${method} ${url} ERROR ${duration}ms - ${error.message}`,
                        { ...meta, duration, error: error.name },
                    );
                },
            }),
        );
    }
}
