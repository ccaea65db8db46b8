import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
} from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { IncomingHttpHeaders } from 'http';
import { RuntimeStateService } from '../../runtime/runtime-state.service';
import { ProviderFaultException } from '../faults/provider-fault.exception';
import { providerFromPath } from '../provider-path';

/**
 * Second pipeline stage: reject unknown keys when auth is required
 */
@Injectable()
export class ApiKeyGuard implements CanActivate {
  private readonly logger = new Logger(ApiKeyGuard.name);

  constructor(private readonly runtime: RuntimeStateService) {}

  canActivate(context: ExecutionContext): boolean {
    const { settings } = this.runtime;
    if (!settings.auth.requireAuth) {
      return true;
    }

    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const apiKey = extractApiKey(request);

    if (this.runtime.isValidKey(apiKey)) {
      return true;
    }

    this.logger.warn(
      `Auth failed: ${apiKey === undefined ? 'missing key' : 'unknown key'}`,
      { url: request.url, requestCount: request.requestCount },
    );

    throw ProviderFaultException.create(
      'unauthorized',
      providerFromPath(request.url),
      { requestsPerMinute: settings.rateLimit.requestsPerMinute },
    );
  }
}

/**
 * Credential from `Authorization: Bearer`, then the provider-specific
 * headers (`x-api-key`, `x-goog-api-key`), then the `key` query parameter
 */
export function extractApiKey(
  request: Pick<FastifyRequest, 'query'> & { headers: IncomingHttpHeaders },
): string | undefined {
  const authorization = request.headers.authorization;
  if (authorization) {
    const key = authorization.replace(/^Bearer\s+/i, '').trim();
    return key || undefined;
  }

  for (const header of ['x-api-key', 'x-goog-api-key']) {
    const value = request.headers[header];
    const key = Array.isArray(value) ? value[0] : value;
    if (key) {
      return key.trim();
    }
  }

  const query = request.query;
  if (typeof query === 'object' && query !== null && 'key' in query) {
    const key = query.key;
    if (typeof key === 'string' && key) {
      return key;
    }
  }

  return undefined;
}
