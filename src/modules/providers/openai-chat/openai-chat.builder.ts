import { Injectable } from '@nestjs/common';
import { FakeContentProducer } from '../../content/fake-content.producer';
import { StreamFragment } from '../../streaming';
import {
  ResponseBuilder,
  spaceChunks,
  streamBudget,
  sumTokens,
  unixSeconds,
} from '../shared/response-builder.interface';
import { shouldInvokeTool, toolArguments } from '../shared/tool-intent';
import {
  ChatCompletionChunk,
  ChatCompletionChunkDelta,
  ChatCompletionRequest,
  ChatCompletionResponse,
  ChatFinishReason,
  ChatMessage,
  ChatTimeInfo,
  ChatToolCall,
  ChatUsage,
} from './interfaces/chat.interfaces';

/** Output tokens reported for a tool call, whatever its arguments */
export const CHAT_TOOL_CALL_TOKENS = 15;

const DEFAULT_STREAM_TOKENS = 50;

/**
 * Text of a chat message: the string content, or its first text part
 */
export function messageText(message: ChatMessage): string | undefined {
  const { content } = message;
  if (typeof content === 'string') {
    return content;
  }
  return content?.find((part) => part.text !== undefined)?.text;
}

/**
 * Every text-bearing piece of a message, for input accounting
 */
function messageTexts(message: ChatMessage): string[] {
  const { content } = message;
  if (typeof content === 'string') {
    return [content];
  }
  const texts: string[] = [];
  for (const part of content ?? []) {
    if (part.text !== undefined) {
      texts.push(part.text);
    }
  }
  return texts;
}

interface ChunkHeader {
  id: string;
  created: number;
  model: string;
  fingerprint: string;
}

@Injectable()
export class OpenAiChatBuilder
  implements ResponseBuilder<ChatCompletionRequest, ChatCompletionResponse>
{
  readonly provider = 'openai-chat';
  readonly streamDelayMs = 15;

  wantsToolCall(request: ChatCompletionRequest): boolean {
    return shouldInvokeTool(this.lastTurnText(request), request.tools?.length ?? 0);
  }

  promptTokens(request: ChatCompletionRequest): number {
    return sumTokens(request.messages.flatMap(messageTexts));
  }

  buildResponse(
    request: ChatCompletionRequest,
    producer: FakeContentProducer,
  ): ChatCompletionResponse {
    const id = producer.completionId();
    const fingerprint = producer.fingerprint();
    const promptTokens = this.promptTokens(request);

    let content: string | null = null;
    let toolCalls: ChatToolCall[] | undefined;
    let completionTokens: number;
    let finishReason: ChatFinishReason;

    if (this.wantsToolCall(request)) {
      toolCalls = [this.toolCall(request, producer)];
      completionTokens = CHAT_TOOL_CALL_TOKENS;
      finishReason = 'tool_calls';
    } else {
      content = producer.paragraph();
      completionTokens = FakeContentProducer.estimateTokens(content);
      finishReason = 'stop';
    }

    return {
      id,
      object: 'chat.completion',
      created: unixSeconds(),
      model: request.model,
      system_fingerprint: fingerprint,
      choices: [
        {
          index: 0,
          message: {
            role: 'assistant',
            content,
            ...(toolCalls ? { tool_calls: toolCalls } : {}),
          },
          finish_reason: finishReason,
        },
      ],
      usage: this.usage(promptTokens, completionTokens),
      time_info: this.timeInfo(),
    };
  }

  buildStream(
    request: ChatCompletionRequest,
    producer: FakeContentProducer,
  ): StreamFragment[] {
    const header: ChunkHeader = {
      id: producer.completionId(),
      created: unixSeconds(),
      model: request.model,
      fingerprint: producer.fingerprint(),
    };
    const fragments: StreamFragment[] = [
      { kind: 'start', data: this.chunk(header, { role: 'assistant', content: '' }) },
    ];

    let completionTokens: number;
    let finishReason: ChatFinishReason;

    if (this.wantsToolCall(request)) {
      const call = this.toolCall(request, producer);
      fragments.push(
        {
          kind: 'block_start',
          data: this.chunk(header, {
            tool_calls: [
              {
                index: 0,
                id: call.id,
                type: 'function',
                function: { name: call.function.name, arguments: '' },
              },
            ],
          }),
        },
        {
          kind: 'tool_delta',
          data: this.chunk(header, {
            tool_calls: [{ index: 0, function: { arguments: call.function.arguments } }],
          }),
        },
      );
      completionTokens = CHAT_TOOL_CALL_TOKENS;
      finishReason = 'tool_calls';
    } else {
      const budget = streamBudget(
        request.max_tokens ?? request.max_completion_tokens,
        DEFAULT_STREAM_TOKENS,
      );
      const deltas = spaceChunks(producer.streamChunks(budget));
      for (const text of deltas) {
        fragments.push({ kind: 'delta', data: this.chunk(header, { content: text }) });
      }
      completionTokens = sumTokens(deltas);
      finishReason = 'stop';
    }

    const finalChunk = this.chunk(header, {}, finishReason);
    if (request.stream_options?.include_usage) {
      finalChunk.usage = this.usage(this.promptTokens(request), completionTokens);
      finalChunk.time_info = this.timeInfo();
    }

    fragments.push(
      { kind: 'finish', data: finalChunk },
      { kind: 'terminator', data: '[DONE]' },
    );
    return fragments;
  }

  private lastTurnText(request: ChatCompletionRequest): string | undefined {
    const last = request.messages[request.messages.length - 1];
    return last ? messageText(last) : undefined;
  }

  private toolCall(
    request: ChatCompletionRequest,
    producer: FakeContentProducer,
  ): ChatToolCall {
    return {
      id: `call_${producer.toolCallId()}`,
      type: 'function',
      function: {
        name: request.tools?.[0]?.function.name ?? '',
        arguments: JSON.stringify(toolArguments(this.lastTurnText(request))),
      },
    };
  }

  private chunk(
    header: ChunkHeader,
    delta: ChatCompletionChunkDelta,
    finishReason: ChatFinishReason | null = null,
  ): ChatCompletionChunk {
    return {
      id: header.id,
      object: 'chat.completion.chunk',
      created: header.created,
      model: header.model,
      system_fingerprint: header.fingerprint,
      choices: [{ index: 0, delta, finish_reason: finishReason }],
    };
  }

  private usage(promptTokens: number, completionTokens: number): ChatUsage {
    return {
      prompt_tokens: promptTokens,
      completion_tokens: completionTokens,
      total_tokens: promptTokens + completionTokens,
      prompt_tokens_details: { cached_tokens: 0 },
    };
  }

  // Fixed timings in the shape some OpenAI-compatible hosts report
  private timeInfo(): ChatTimeInfo {
    return {
      queue_time: 0.025,
      prompt_time: 0.003,
      completion_time: 0.005,
      total_time: 0.035,
      created: Date.now() / 1000,
    };
  }
}
