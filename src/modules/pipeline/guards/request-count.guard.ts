import { CanActivate, ExecutionContext, Injectable } from '@nestjs/common';
import { FastifyRequest } from 'fastify';
import { RuntimeStateService } from '../../runtime/runtime-state.service';

// Extend FastifyRequest with the per-request pipeline state
declare module 'fastify' {
  interface FastifyRequest {
    requestCount?: number;
  }
}

/**
 * First pipeline stage: count every request that reaches the server
 */
@Injectable()
export class RequestCountGuard implements CanActivate {
  constructor(private readonly runtime: RuntimeStateService) {}

  canActivate(context: ExecutionContext): boolean {
    const request = context.switchToHttp().getRequest<FastifyRequest>();
    request.requestCount = this.runtime.incrementRequests();
    return true;
  }
}
