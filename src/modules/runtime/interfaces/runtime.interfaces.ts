/**
 * Provider surfaces the server can emulate
 */
export type ProviderKind =
  | 'openai-chat'
  | 'anthropic'
  | 'gemini'
  | 'openai-responses';

/**
 * Injected failure outcomes. These are the only errors the pipeline produces.
 */
export type FaultKind =
  | 'unauthorized'
  | 'rate_limit'
  | 'server_error'
  | 'timeout';

/**
 * Configured process-wide fault, `none` disables it
 */
export type ForcedFault = 'none' | FaultKind;

/**
 * Faults a random draw can pick from (timeout is only ever forced)
 */
export const RANDOM_FAULTS: readonly FaultKind[] = [
  'unauthorized',
  'rate_limit',
  'server_error',
];
