import {
  CallHandler,
  ExecutionContext,
  Injectable,
  NestInterceptor,
} from '@nestjs/common';
import { Observable, timer } from 'rxjs';
import { switchMap } from 'rxjs/operators';
import { RuntimeStateService } from '../../runtime/runtime-state.service';

/**
 * Fourth pipeline stage: hold the request for the configured base latency
 * before the handler runs
 */
@Injectable()
export class LatencyInterceptor implements NestInterceptor {
  constructor(private readonly runtime: RuntimeStateService) {}

  intercept(context: ExecutionContext, next: CallHandler): Observable<unknown> {
    const latencyMs = this.runtime.latencyMs();
    if (latencyMs <= 0) {
      return next.handle();
    }

    return timer(latencyMs).pipe(switchMap(() => next.handle()));
  }
}
