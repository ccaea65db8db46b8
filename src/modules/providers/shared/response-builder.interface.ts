import { FakeContentProducer } from '../../content/fake-content.producer';
import { ProviderKind } from '../../runtime/interfaces/runtime.interfaces';
import { StreamFragment } from '../../streaming';

/**
 * Capability every provider emulation implements. The pipeline and the
 * streaming engine only ever talk to a provider through this interface.
 */
export interface ResponseBuilder<TRequest, TResponse extends object> {
  readonly provider: ProviderKind;

  /** Delay before each streamed fragment */
  readonly streamDelayMs: number;

  /** Whether the synthetic answer should be a tool invocation */
  wantsToolCall(request: TRequest): boolean;

  /** Single JSON document for a non-streaming request */
  buildResponse(request: TRequest, producer: FakeContentProducer): TResponse;

  /** Ordered fragment list for a streaming request */
  buildStream(request: TRequest, producer: FakeContentProducer): StreamFragment[];
}

/** Most words streamed for one text block, whatever the request asks for */
export const STREAM_TOKEN_LIMIT = 4096;

/**
 * Requested streaming budget, or the fallback, capped at STREAM_TOKEN_LIMIT
 */
export function streamBudget(
  requested: number | null | undefined,
  fallback: number,
): number {
  return Math.min(requested ?? fallback, STREAM_TOKEN_LIMIT);
}

/**
 * Join stream chunks the way they are emitted: one space before every
 * chunk after the first
 */
export function spaceChunks(chunks: readonly string[]): string[] {
  return chunks.map((chunk, index) => (index > 0 ? ` ${chunk}` : chunk));
}

/**
 * Token estimate summed over several texts
 */
export function sumTokens(texts: readonly string[]): number {
  return texts.reduce(
    (total, text) => total + FakeContentProducer.estimateTokens(text),
    0,
  );
}

export function unixSeconds(): number {
  return Math.floor(Date.now() / 1000);
}
