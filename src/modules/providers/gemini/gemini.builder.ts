import { Injectable } from '@nestjs/common';
import { FakeContentProducer } from '../../content/fake-content.producer';
import { StreamFragment } from '../../streaming';
import {
  ResponseBuilder,
  spaceChunks,
  streamBudget,
  sumTokens,
} from '../shared/response-builder.interface';
import { shouldInvokeTool, toolArguments } from '../shared/tool-intent';
import {
  GeminiAction,
  GeminiCall,
  GeminiContent,
  GeminiFunctionDeclaration,
  GenerateContentResponse,
  ResponsePart,
  UsageMetadata,
} from './interfaces/gemini.interfaces';

/** candidatesTokenCount reported for a function call */
export const GEMINI_FUNCTION_CALL_TOKENS = 12;

const DEFAULT_STREAM_TOKENS = 50;
const MAX_THOUGHT_TOKENS = 100;

export const GEMINI_ACTIONS: readonly GeminiAction[] = [
  'generateContent',
  'streamGenerateContent',
];

export function isGeminiAction(action: string): action is GeminiAction {
  return GEMINI_ACTIONS.some((known) => known === action);
}

function contentTexts(content: GeminiContent): string[] {
  const texts: string[] = [];
  for (const part of content.parts) {
    if (part.text !== undefined) {
      texts.push(part.text);
    }
  }
  return texts;
}

interface TokenCounts {
  prompt: number;
  candidates: number;
  thoughts: number;
}

@Injectable()
export class GeminiBuilder
  implements ResponseBuilder<GeminiCall, GenerateContentResponse>
{
  readonly provider = 'gemini';
  readonly streamDelayMs = 15;

  wantsToolCall({ body }: GeminiCall): boolean {
    return shouldInvokeTool(this.lastTurnText(body.contents), this.declarations(body.tools).length);
  }

  wantsThoughts({ body }: GeminiCall): boolean {
    return body.generationConfig?.thinkingConfig?.includeThoughts === true;
  }

  promptTokens({ body }: GeminiCall): number {
    const contents = body.systemInstruction
      ? [body.systemInstruction, ...body.contents]
      : body.contents;
    return sumTokens(contents.flatMap(contentTexts));
  }

  buildResponse(call: GeminiCall, producer: FakeContentProducer): GenerateContentResponse {
    const responseId = producer.hex(22);
    const parts: ResponsePart[] = [];
    const counts: TokenCounts = { prompt: this.promptTokens(call), candidates: 0, thoughts: 0 };

    if (this.wantsThoughts(call)) {
      const thought = producer.paragraph();
      parts.push({ text: thought, thought: true });
      counts.thoughts = FakeContentProducer.estimateTokens(thought);
    }

    if (this.wantsToolCall(call)) {
      parts.push(this.functionCallPart(call));
      counts.candidates = GEMINI_FUNCTION_CALL_TOKENS;
    } else {
      const text = producer.paragraph();
      parts.push({ text });
      counts.candidates = FakeContentProducer.estimateTokens(text);
    }

    return this.chunk(call, responseId, parts, counts, true);
  }

  /**
   * Every chunk repeats the running usage; the last one carries the
   * finish reason and no parts
   */
  buildStream(call: GeminiCall, producer: FakeContentProducer): StreamFragment[] {
    const responseId = producer.hex(22);
    const counts: TokenCounts = { prompt: this.promptTokens(call), candidates: 0, thoughts: 0 };
    const fragments: StreamFragment[] = [];

    if (this.wantsThoughts(call)) {
      const requested = call.body.generationConfig?.thinkingConfig?.thinkingBudget;
      const budget = Math.min(
        requested !== undefined && requested > 0 ? requested : DEFAULT_STREAM_TOKENS,
        MAX_THOUGHT_TOKENS,
      );
      for (const text of spaceChunks(producer.streamChunks(budget))) {
        counts.thoughts += FakeContentProducer.estimateTokens(text);
        fragments.push({
          kind: 'delta',
          data: this.chunk(call, responseId, [{ text, thought: true }], counts, false),
        });
      }
    }

    if (this.wantsToolCall(call)) {
      counts.candidates = GEMINI_FUNCTION_CALL_TOKENS;
      fragments.push({
        kind: 'tool_delta',
        data: this.chunk(call, responseId, [this.functionCallPart(call)], counts, false),
      });
    } else {
      const budget = streamBudget(
        call.body.generationConfig?.maxOutputTokens,
        DEFAULT_STREAM_TOKENS,
      );
      for (const text of spaceChunks(producer.streamChunks(budget))) {
        counts.candidates += FakeContentProducer.estimateTokens(text);
        fragments.push({
          kind: 'delta',
          data: this.chunk(call, responseId, [{ text }], counts, false),
        });
      }
    }

    fragments.push({
      kind: 'finish',
      data: this.chunk(call, responseId, [], counts, true),
    });
    return fragments;
  }

  private declarations(
    tools: GeminiCall['body']['tools'],
  ): GeminiFunctionDeclaration[] {
    return (tools ?? []).flatMap((tool) => tool.functionDeclarations ?? []);
  }

  private lastTurnText(contents: GeminiContent[]): string | undefined {
    const last = contents[contents.length - 1];
    return last?.parts.find((part) => part.text !== undefined)?.text;
  }

  private functionCallPart({ body }: GeminiCall): ResponsePart {
    return {
      functionCall: {
        name: this.declarations(body.tools)[0]?.name ?? 'unknown_function',
        args: toolArguments(this.lastTurnText(body.contents)),
      },
    };
  }

  private chunk(
    call: GeminiCall,
    responseId: string,
    parts: ResponsePart[],
    counts: TokenCounts,
    final: boolean,
  ): GenerateContentResponse {
    return {
      candidates: [
        {
          content: { parts, role: 'model' },
          ...(final ? { finishReason: 'STOP' as const } : {}),
          index: 0,
        },
      ],
      usageMetadata: this.usageMetadata(counts),
      modelVersion: call.model,
      responseId,
    };
  }

  private usageMetadata({ prompt, candidates, thoughts }: TokenCounts): UsageMetadata {
    return {
      promptTokenCount: prompt,
      candidatesTokenCount: candidates,
      totalTokenCount: prompt + candidates + thoughts,
      ...(thoughts > 0 ? { thoughtsTokenCount: thoughts } : {}),
    };
  }
}
