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
  InputItem,
  OutputItem,
  OutputText,
  ResponseObject,
  ResponsesRequest,
  ResponsesUsage,
} from './interfaces/responses.interfaces';

/** Output tokens reported for a function call */
export const RESPONSES_FUNCTION_CALL_TOKENS = 15;

const DEFAULT_STREAM_TOKENS = 50;

function itemText(item: InputItem): string | undefined {
  const { content } = item;
  if (typeof content === 'string') {
    return content;
  }
  return content?.find((part) => part.text !== undefined)?.text;
}

function itemTexts(item: InputItem): string[] {
  const { content } = item;
  const texts: string[] = [];
  if (typeof content === 'string') {
    texts.push(content);
  } else {
    for (const part of content ?? []) {
      if (part.text !== undefined) {
        texts.push(part.text);
      }
    }
  }
  if (item.output !== undefined) {
    texts.push(item.output);
  }
  return texts;
}

function outputText(text: string): OutputText {
  return { type: 'output_text', annotations: [], logprobs: [], text };
}

interface ResponseIdentity {
  id: string;
  createdAt: number;
}

/**
 * Emits named events carrying an increasing `sequence_number`
 */
class SequencedEvents {
  readonly fragments: StreamFragment[] = [];
  private sequence = 0;

  push(kind: StreamFragment['kind'], type: string, payload: object): void {
    this.fragments.push({
      kind,
      event: type,
      data: { type, sequence_number: this.sequence, ...payload },
    });
    this.sequence += 1;
  }
}

@Injectable()
export class OpenAiResponsesBuilder
  implements ResponseBuilder<ResponsesRequest, ResponseObject>
{
  readonly provider = 'openai-responses';
  readonly streamDelayMs = 10;

  wantsToolCall(request: ResponsesRequest): boolean {
    return shouldInvokeTool(this.lastTurnText(request), request.tools?.length ?? 0);
  }

  inputTokens(request: ResponsesRequest): number {
    const texts =
      typeof request.input === 'string'
        ? [request.input]
        : request.input.flatMap(itemTexts);
    if (request.instructions) {
      texts.push(request.instructions);
    }
    return sumTokens(texts);
  }

  buildResponse(request: ResponsesRequest, producer: FakeContentProducer): ResponseObject {
    const identity: ResponseIdentity = {
      id: `resp_${producer.hex(24)}`,
      createdAt: unixSeconds(),
    };

    let item: OutputItem;
    let outputTokens: number;

    if (this.wantsToolCall(request)) {
      item = this.functionCall(request, producer, 'completed');
      outputTokens = RESPONSES_FUNCTION_CALL_TOKENS;
    } else {
      const text = producer.paragraph();
      item = this.message(`msg_${producer.hex(24)}`, 'completed', [outputText(text)]);
      outputTokens = FakeContentProducer.estimateTokens(text);
    }

    return this.envelope(request, identity, 'completed', [item], this.usage(this.inputTokens(request), outputTokens));
  }

  buildStream(request: ResponsesRequest, producer: FakeContentProducer): StreamFragment[] {
    const identity: ResponseIdentity = {
      id: `resp_${producer.hex(24)}`,
      createdAt: unixSeconds(),
    };
    const events = new SequencedEvents();

    events.push('start', 'response.created', {
      response: this.envelope(request, identity, 'in_progress', [], null),
    });
    events.push('start', 'response.in_progress', {
      response: this.envelope(request, identity, 'in_progress', [], null),
    });

    let item: OutputItem;
    let outputTokens: number;

    if (this.wantsToolCall(request)) {
      const done = this.functionCall(request, producer, 'completed');
      item = done;

      events.push('block_start', 'response.output_item.added', {
        output_index: 0,
        item: { ...done, status: 'in_progress', arguments: '' },
      });
      events.push('tool_delta', 'response.function_call_arguments.delta', {
        item_id: done.id,
        output_index: 0,
        delta: done.arguments,
      });
      events.push('block_stop', 'response.function_call_arguments.done', {
        item_id: done.id,
        output_index: 0,
        arguments: done.arguments,
      });
      events.push('block_stop', 'response.output_item.done', {
        output_index: 0,
        item: done,
      });
      outputTokens = RESPONSES_FUNCTION_CALL_TOKENS;
    } else {
      const messageId = `msg_${producer.hex(24)}`;
      const budget = streamBudget(request.max_output_tokens, DEFAULT_STREAM_TOKENS);
      const deltas = spaceChunks(producer.streamChunks(budget));
      const fullText = deltas.join('');
      const location = { item_id: messageId, output_index: 0, content_index: 0 };

      events.push('block_start', 'response.output_item.added', {
        output_index: 0,
        item: this.message(messageId, 'in_progress', []),
      });
      events.push('block_start', 'response.content_part.added', {
        ...location,
        part: outputText(''),
      });
      for (const delta of deltas) {
        events.push('delta', 'response.output_text.delta', {
          ...location,
          delta,
          logprobs: [],
        });
      }
      events.push('block_stop', 'response.output_text.done', {
        ...location,
        text: fullText,
        logprobs: [],
      });
      events.push('block_stop', 'response.content_part.done', {
        ...location,
        part: outputText(fullText),
      });

      item = this.message(messageId, 'completed', [outputText(fullText)]);
      events.push('block_stop', 'response.output_item.done', {
        output_index: 0,
        item,
      });
      outputTokens = sumTokens(deltas);
    }

    events.push('terminator', 'response.completed', {
      response: this.envelope(
        request,
        identity,
        'completed',
        [item],
        this.usage(this.inputTokens(request), outputTokens),
      ),
    });
    return events.fragments;
  }

  private lastTurnText(request: ResponsesRequest): string | undefined {
    const { input } = request;
    if (typeof input === 'string') {
      return input;
    }
    const last = input[input.length - 1];
    return last ? itemText(last) : undefined;
  }

  private functionCall(
    request: ResponsesRequest,
    producer: FakeContentProducer,
    status: 'in_progress' | 'completed',
  ): Extract<OutputItem, { type: 'function_call' }> {
    return {
      id: `fc_${producer.hex(24)}`,
      type: 'function_call',
      status,
      name: request.tools?.[0]?.name ?? 'unknown',
      arguments: JSON.stringify(toolArguments(this.lastTurnText(request))),
      call_id: `call_${producer.hex(24)}`,
    };
  }

  private message(
    id: string,
    status: 'in_progress' | 'completed',
    content: OutputText[],
  ): OutputItem {
    return { id, type: 'message', status, content, role: 'assistant' };
  }

  private usage(inputTokens: number, outputTokens: number): ResponsesUsage {
    return {
      input_tokens: inputTokens,
      input_tokens_details: { cached_tokens: 0 },
      output_tokens: outputTokens,
      output_tokens_details: { reasoning_tokens: 0 },
      total_tokens: inputTokens + outputTokens,
    };
  }

  /**
   * Full response object; request settings are echoed back
   */
  private envelope(
    request: ResponsesRequest,
    identity: ResponseIdentity,
    status: 'in_progress' | 'completed',
    output: OutputItem[],
    usage: ResponsesUsage | null,
  ): ResponseObject {
    return {
      id: identity.id,
      object: 'response',
      created_at: identity.createdAt,
      status,
      background: false,
      model: request.model,
      output,
      usage,
      billing: { payer: 'developer' },
      completed_at: status === 'completed' ? unixSeconds() : null,
      error: null,
      incomplete_details: null,
      instructions: request.instructions ?? null,
      max_output_tokens: request.max_output_tokens ?? null,
      max_tool_calls: null,
      parallel_tool_calls: true,
      previous_response_id: null,
      reasoning: {
        effort: request.reasoning?.effort ?? null,
        summary: request.reasoning?.summary ?? null,
      },
      service_tier: 'default',
      store: request.store ?? true,
      temperature: request.temperature ?? 1,
      text: {
        format: request.text?.format ?? { type: 'text' },
        verbosity: request.text?.verbosity ?? 'medium',
      },
      tool_choice: request.tool_choice ?? 'auto',
      tools: request.tools ?? [],
      top_p: request.top_p ?? 1,
      truncation: 'disabled',
      user: null,
      metadata: {},
    };
  }
}
