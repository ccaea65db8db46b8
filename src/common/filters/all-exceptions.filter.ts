import {
    ExceptionFilter,
    Catch,
    ArgumentsHost,
    HttpException,
    HttpStatus,
    Logger,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { ProviderFaultException } from '../../modules/pipeline/faults/provider-fault.exception';

interface ErrorResponse {
    error: {
        message: string;
        type: string;
        param: string | null;
        code: string;
    };
}

@Catch()
export class AllExceptionsFilter implements ExceptionFilter {
    private readonly logger = new Logger(AllExceptionsFilter.name);

    catch(exception: unknown, host: ArgumentsHost): void {
        const ctx = host.switchToHttp();
        const response = ctx.getResponse<FastifyReply>();
        const request = ctx.getRequest<FastifyRequest>();

        // A stream that fails after its headers went out cannot be answered again
        if (response.sent) {
            this.logger.error(
                `Error after response was sent: ${this.describe(exception)}`,
                { requestId: request.id, url: request.url },
            );
            return;
        }

        response.header('x-request-id', request.id);

        // Injected faults carry the provider's own envelope and headers
        if (exception instanceof ProviderFaultException) {
            for (const [name, value] of Object.entries(exception.headers)) {
                response.header(name, value);
            }
            response.status(exception.getStatus()).send(exception.getResponse());
            return;
        }

        let status = HttpStatus.INTERNAL_SERVER_ERROR;
        let body: object = this.envelope('Internal server error', status);

        if (exception instanceof HttpException) {
            status = exception.getStatus();
            const exceptionResponse = exception.getResponse();

            if (typeof exceptionResponse === 'string') {
                body = this.envelope(exceptionResponse, status);
            } else if ('error' in exceptionResponse && typeof exceptionResponse.error === 'object') {
                // Already shaped by the thrower
                body = exceptionResponse;
            } else {
                body = this.envelope(exception.message, status);
            }
        } else {
            this.logger.error(
                `Unexpected error: ${this.describe(exception)}`,
                exception instanceof Error ? exception.stack : undefined,
                { requestId: request.id },
            );
        }

        if (status >= 500) {
            this.logger.error(`${request.method} ${request.url} ${status}`, {
                requestId: request.id,
                status,
            });
        } else {
            this.logger.warn(`${request.method} ${request.url} ${status}`, {
                requestId: request.id,
                status,
            });
        }

        response.status(status).send(body);
    }

    private envelope(message: string, status: number): ErrorResponse {
        return {
            error: {
                message,
                type: this.getErrorType(status),
                param: null,
                code: this.getErrorCode(status),
            },
        };
    }

    private describe(exception: unknown): string {
        return exception instanceof Error ? exception.message : String(exception);
    }

    private getErrorType(status: number): string {
        switch (status) {
            case 400:
                return 'invalid_request_error';
            case 401:
                return 'authentication_error';
            case 404:
                return 'not_found_error';
            case 413:
                return 'request_too_large';
            case 429:
                return 'rate_limit_error';
            default:
                return status >= 500 ? 'api_error' : 'invalid_request_error';
        }
    }

    private getErrorCode(status: number): string {
        switch (status) {
            case 400:
                return 'invalid_request';
            case 401:
                return 'invalid_api_key';
            case 404:
                return 'not_found';
            case 413:
                return 'request_too_large';
            case 429:
                return 'rate_limit_exceeded';
            default:
                return status >= 500 ? 'internal_error' : 'invalid_request';
        }
    }
}
