import { Injectable } from '@nestjs/common';
import { FakeContentProducer } from '../../content/fake-content.producer';
import { StreamFragment } from '../../streaming';
import {
  ResponseBuilder,
  spaceChunks,
  sumTokens,
} from '../shared/response-builder.interface';
import { shouldInvokeTool, toolArguments } from '../shared/tool-intent';
import {
  AnthropicMessage,
  InputContentBlock,
  MessagesRequest,
  MessagesResponse,
  MessagesUsage,
  OutputContentBlock,
  StopReason,
} from './interfaces/messages.interfaces';

/** Output tokens reported for a tool_use block */
export const ANTHROPIC_TOOL_USE_TOKENS = 50;

/** Input tokens charged for an image, tool or redacted block */
export const ANTHROPIC_OPAQUE_BLOCK_TOKENS = 10;

/** Streamed text and thinking never exceed this many words */
const MAX_STREAM_TOKENS = 100;

function blockTokens(block: InputContentBlock): number {
  switch (block.type) {
    case 'text':
      return FakeContentProducer.estimateTokens(block.text);
    case 'thinking':
      return FakeContentProducer.estimateTokens(block.thinking);
    default:
      return ANTHROPIC_OPAQUE_BLOCK_TOKENS;
  }
}

function firstText(message: AnthropicMessage): string | undefined {
  if (typeof message.content === 'string') {
    return message.content;
  }
  for (const block of message.content) {
    if (block.type === 'text') {
      return block.text;
    }
  }
  return undefined;
}

@Injectable()
export class AnthropicBuilder
  implements ResponseBuilder<MessagesRequest, MessagesResponse>
{
  readonly provider = 'anthropic';
  readonly streamDelayMs = 15;

  wantsToolCall(request: MessagesRequest): boolean {
    return shouldInvokeTool(this.lastTurnText(request), request.tools?.length ?? 0);
  }

  wantsThinking(request: MessagesRequest): boolean {
    return request.thinking?.type === 'enabled';
  }

  inputTokens(request: MessagesRequest): number {
    const { system } = request;
    let total =
      typeof system === 'string'
        ? FakeContentProducer.estimateTokens(system)
        : sumTokens((system ?? []).map((block) => block.text));

    for (const message of request.messages) {
      if (typeof message.content === 'string') {
        total += FakeContentProducer.estimateTokens(message.content);
      } else {
        total += message.content.reduce((sum, block) => sum + blockTokens(block), 0);
      }
    }
    return total;
  }

  buildResponse(
    request: MessagesRequest,
    producer: FakeContentProducer,
  ): MessagesResponse {
    const id = this.messageId(producer);
    const content: OutputContentBlock[] = [];
    let outputTokens = 0;

    if (this.wantsThinking(request)) {
      const thinking = producer.paragraph();
      outputTokens += FakeContentProducer.estimateTokens(thinking);
      content.push({ type: 'thinking', thinking, signature: producer.signature() });
    }

    let stopReason: StopReason;
    if (this.wantsToolCall(request)) {
      content.push(this.toolUse(request, producer));
      outputTokens += ANTHROPIC_TOOL_USE_TOKENS;
      stopReason = 'tool_use';
    } else {
      const text = producer.paragraph();
      outputTokens += FakeContentProducer.estimateTokens(text);
      content.push({ type: 'text', text });
      stopReason = 'end_turn';
    }

    return {
      id,
      type: 'message',
      role: 'assistant',
      model: request.model,
      content,
      stop_reason: stopReason,
      stop_sequence: null,
      usage: this.usage(this.inputTokens(request), outputTokens),
    };
  }

  buildStream(
    request: MessagesRequest,
    producer: FakeContentProducer,
  ): StreamFragment[] {
    const inputTokens = this.inputTokens(request);
    const fragments: StreamFragment[] = [
      this.event('start', 'message_start', {
        message: {
          id: this.messageId(producer),
          type: 'message',
          role: 'assistant',
          model: request.model,
          content: [],
          stop_reason: null,
          stop_sequence: null,
          usage: this.usage(inputTokens, 1),
        },
      }),
    ];

    let index = 0;
    let outputTokens = 0;

    if (this.wantsThinking(request)) {
      const budget = Math.min(request.thinking?.budget_tokens ?? MAX_STREAM_TOKENS, MAX_STREAM_TOKENS);
      const deltas = spaceChunks(producer.streamChunks(budget));

      fragments.push(
        this.event('block_start', 'content_block_start', {
          index,
          content_block: { type: 'thinking', thinking: '', signature: '' },
        }),
      );
      for (const thinking of deltas) {
        fragments.push(
          this.event('delta', 'content_block_delta', {
            index,
            delta: { type: 'thinking_delta', thinking },
          }),
        );
      }
      fragments.push(
        this.event('delta', 'content_block_delta', {
          index,
          delta: { type: 'signature_delta', signature: producer.signature() },
        }),
        this.event('block_stop', 'content_block_stop', { index }),
      );

      outputTokens += sumTokens(deltas);
      index += 1;
    }

    let stopReason: StopReason;
    if (this.wantsToolCall(request)) {
      const toolUse = this.toolUse(request, producer);
      fragments.push(
        this.event('block_start', 'content_block_start', {
          index,
          content_block: { ...toolUse, input: {} },
        }),
        this.event('tool_delta', 'content_block_delta', {
          index,
          delta: { type: 'input_json_delta', partial_json: JSON.stringify(toolUse.input) },
        }),
        this.event('block_stop', 'content_block_stop', { index }),
      );
      outputTokens += ANTHROPIC_TOOL_USE_TOKENS;
      stopReason = 'tool_use';
    } else {
      const deltas = spaceChunks(
        producer.streamChunks(Math.min(request.max_tokens, MAX_STREAM_TOKENS)),
      );
      fragments.push(
        this.event('block_start', 'content_block_start', {
          index,
          content_block: { type: 'text', text: '' },
        }),
      );
      for (const text of deltas) {
        fragments.push(
          this.event('delta', 'content_block_delta', {
            index,
            delta: { type: 'text_delta', text },
          }),
        );
      }
      fragments.push(this.event('block_stop', 'content_block_stop', { index }));
      outputTokens += sumTokens(deltas);
      stopReason = 'end_turn';
    }

    fragments.push(
      this.event('finish', 'message_delta', {
        delta: { stop_reason: stopReason, stop_sequence: null },
        usage: this.usage(inputTokens, outputTokens),
      }),
      this.event('terminator', 'message_stop', {}),
    );
    return fragments;
  }

  private lastTurnText(request: MessagesRequest): string | undefined {
    const last = request.messages[request.messages.length - 1];
    return last ? firstText(last) : undefined;
  }

  private messageId(producer: FakeContentProducer): string {
    return `msg_${producer.hex(24)}`;
  }

  private toolUse(
    request: MessagesRequest,
    producer: FakeContentProducer,
  ): { type: 'tool_use'; id: string; name: string; input: object } {
    return {
      type: 'tool_use',
      id: `toolu_${producer.hex(24)}`,
      name: request.tools?.[0]?.name ?? 'unknown',
      input: toolArguments(this.lastTurnText(request)),
    };
  }

  /**
   * Named SSE event whose payload repeats the event name as `type`
   */
  private event(
    kind: StreamFragment['kind'],
    event: string,
    payload: object,
  ): StreamFragment {
    return { kind, event, data: { type: event, ...payload } };
  }

  private usage(inputTokens: number, outputTokens: number): MessagesUsage {
    return {
      input_tokens: inputTokens,
      output_tokens: outputTokens,
      cache_creation_input_tokens: 0,
      cache_read_input_tokens: 0,
    };
  }
}
