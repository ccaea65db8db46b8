import {
  CanActivate,
  ExecutionContext,
  Injectable,
  Logger,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { RuntimeStateService } from '../../runtime/runtime-state.service';
import { ProviderFaultException } from '../faults/provider-fault.exception';
import { providerFromPath } from '../provider-path';

/**
 * Third pipeline stage: forced, threshold and random faults
 */
@Injectable()
export class FaultInjectionGuard implements CanActivate {
  private readonly logger = new Logger(FaultInjectionGuard.name);

  constructor(private readonly runtime: RuntimeStateService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    const response = context.switchToHttp().getResponse<FastifyReply>();
    const { settings } = this.runtime;

    const requestCount =
      request.requestCount ?? this.runtime.getRequestCount();
    const fault = this.runtime.decideFault(requestCount);

    if (fault) {
      this.logger.warn(`Injecting ${fault} fault`, {
        url: request.url,
        requestCount,
      });

      throw ProviderFaultException.create(fault, providerFromPath(request.url), {
        requestsPerMinute: settings.rateLimit.requestsPerMinute,
      });
    }

    if (settings.rateLimit.enabled) {
      this.setRateLimitHeaders(response, requestCount);
    }

    return true;
  }

  private setRateLimitHeaders(response: FastifyReply, requestCount: number): void {
    const { requestsPerMinute, failAfterRequests } = this.runtime.settings.rateLimit;

    const remaining =
      failAfterRequests > 0
        ? Math.max(0, failAfterRequests - requestCount)
        : requestsPerMinute;

    response.header('x-ratelimit-limit-requests', String(requestsPerMinute));
    response.header('x-ratelimit-remaining-requests', String(remaining));
  }
}
