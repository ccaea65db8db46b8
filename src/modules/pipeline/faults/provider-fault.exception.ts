import { HttpException } from '@nestjs/common';
import {
  FaultKind,
  ProviderKind,
} from '../../runtime/interfaces/runtime.interfaces';
import { buildFaultResponse, FaultContext } from './fault-responses';

/**
 * Injected fault, rendered by the exception filter in the provider's own
 * error format
 */
export class ProviderFaultException extends HttpException {
  constructor(
    readonly kind: FaultKind,
    readonly provider: ProviderKind,
    readonly headers: Record<string, string>,
    body: object,
    status: number,
  ) {
    super(body, status);
  }

  static create(
    kind: FaultKind,
    provider: ProviderKind,
    context: FaultContext,
  ): ProviderFaultException {
    const { status, body, headers } = buildFaultResponse(kind, provider, context);
    return new ProviderFaultException(kind, provider, headers, body, status);
  }
}
