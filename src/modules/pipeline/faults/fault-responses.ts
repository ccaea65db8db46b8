import { HttpStatus } from '@nestjs/common';
import {
  FaultKind,
  ProviderKind,
} from '../../runtime/interfaces/runtime.interfaces';

/**
 * Status, body and headers of an injected fault
 */
export interface FaultResponse {
  status: HttpStatus;
  body: object;
  headers: Record<string, string>;
}

export interface FaultContext {
  /** Advertised in the rate-limit headers */
  requestsPerMinute: number;
}

export const FAULT_STATUS: Record<FaultKind, HttpStatus> = {
  unauthorized: HttpStatus.UNAUTHORIZED,
  rate_limit: HttpStatus.TOO_MANY_REQUESTS,
  server_error: HttpStatus.INTERNAL_SERVER_ERROR,
  timeout: HttpStatus.GATEWAY_TIMEOUT,
};

/**
 * Error envelope the real provider returns for the same condition
 */
export function buildFaultResponse(
  kind: FaultKind,
  provider: ProviderKind,
  context: FaultContext,
): FaultResponse {
  switch (provider) {
    case 'anthropic':
      return anthropicFault(kind, context);
    case 'gemini':
      return geminiFault(kind);
    case 'openai-chat':
    case 'openai-responses':
      return openAiFault(kind, context);
  }
}

function openAiFault(kind: FaultKind, context: FaultContext): FaultResponse {
  const error = (message: string, type: string, code: string) => ({
    error: { message, type, param: null, code },
  });

  switch (kind) {
    case 'unauthorized':
      return {
        status: FAULT_STATUS.unauthorized,
        body: error(
          'Incorrect API key provided. You can find your API key in your account settings.',
          'invalid_request_error',
          'invalid_api_key',
        ),
        headers: {},
      };
    case 'rate_limit':
      return {
        status: FAULT_STATUS.rate_limit,
        body: error(
          'Rate limit reached for requests. Please slow down.',
          'rate_limit_error',
          'rate_limit_exceeded',
        ),
        headers: {
          'x-ratelimit-limit-requests': String(context.requestsPerMinute),
          'x-ratelimit-remaining-requests': '0',
          'x-ratelimit-reset-requests': '1s',
          'retry-after': '1',
        },
      };
    case 'server_error':
      return {
        status: FAULT_STATUS.server_error,
        body: error(
          'The server had an error while processing your request. Sorry about that!',
          'server_error',
          'internal_error',
        ),
        headers: {},
      };
    case 'timeout':
      return {
        status: FAULT_STATUS.timeout,
        body: error(
          'Request timed out. Please try again.',
          'timeout_error',
          'timeout',
        ),
        headers: {},
      };
  }
}

function anthropicFault(kind: FaultKind, context: FaultContext): FaultResponse {
  const error = (type: string, message: string) => ({
    type: 'error',
    error: { type, message },
  });

  switch (kind) {
    case 'unauthorized':
      return {
        status: FAULT_STATUS.unauthorized,
        body: error('authentication_error', 'invalid x-api-key'),
        headers: {},
      };
    case 'rate_limit':
      return {
        status: FAULT_STATUS.rate_limit,
        body: error(
          'rate_limit_error',
          'Number of requests has exceeded your rate limit. Please retry after 60 seconds.',
        ),
        headers: {
          'retry-after': '60',
          'x-ratelimit-limit-requests': String(context.requestsPerMinute),
          'x-ratelimit-remaining-requests': '0',
        },
      };
    case 'server_error':
      return {
        status: FAULT_STATUS.server_error,
        body: error('api_error', 'Internal server error'),
        headers: {},
      };
    case 'timeout':
      return {
        status: FAULT_STATUS.timeout,
        body: error('timeout_error', 'Request timed out.'),
        headers: {},
      };
  }
}

function geminiFault(kind: FaultKind): FaultResponse {
  switch (kind) {
    case 'unauthorized':
      return {
        status: FAULT_STATUS.unauthorized,
        body: {
          error: {
            code: 401,
            message: 'API key not valid. Please pass a valid API key.',
            status: 'UNAUTHENTICATED',
            details: [
              {
                '@type': 'type.googleapis.com/google.rpc.ErrorInfo',
                reason: 'API_KEY_INVALID',
                domain: 'googleapis.com',
              },
            ],
          },
        },
        headers: {},
      };
    case 'rate_limit':
      return {
        status: FAULT_STATUS.rate_limit,
        body: {
          error: {
            code: 429,
            message: 'Resource has been exhausted (e.g. check quota).',
            status: 'RESOURCE_EXHAUSTED',
            details: [
              {
                '@type': 'type.googleapis.com/google.rpc.QuotaFailure',
                violations: [
                  {
                    subject: 'GenerateContentRequest',
                    description: 'Quota exceeded',
                  },
                ],
              },
            ],
          },
        },
        headers: { 'retry-after': '60' },
      };
    case 'server_error':
      return {
        status: FAULT_STATUS.server_error,
        body: {
          error: {
            code: 500,
            message: 'An internal error has occurred. Please retry or report the issue.',
            status: 'INTERNAL',
          },
        },
        headers: {},
      };
    case 'timeout':
      return {
        status: FAULT_STATUS.timeout,
        body: {
          error: {
            code: 504,
            message: 'Deadline exceeded while waiting for response.',
            status: 'DEADLINE_EXCEEDED',
          },
        },
        headers: {},
      };
  }
}
