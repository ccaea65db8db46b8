import { ProviderKind } from '../runtime/interfaces/runtime.interfaces';

/**
 * Provider whose endpoint this path belongs to, if any
 */
export function matchProvider(path: string): ProviderKind | undefined {
  if (path.includes('/v1beta/models')) {
    return 'gemini';
  }
  if (path.includes('/v1/messages')) {
    return 'anthropic';
  }
  if (path.includes('/v1/responses')) {
    return 'openai-responses';
  }
  if (path.includes('/v1/chat/completions')) {
    return 'openai-chat';
  }
  return undefined;
}

/**
 * Provider whose error shape a request on this path should get.
 * Unmatched paths (health included) fall back to the chat-completions shape.
 */
export function providerFromPath(path: string): ProviderKind {
  return matchProvider(path) ?? 'openai-chat';
}
