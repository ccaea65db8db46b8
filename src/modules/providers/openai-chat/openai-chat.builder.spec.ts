import { FakeContentProducer } from '../../content/fake-content.producer';
import { StreamFragment } from '../../streaming';
import { STREAM_TOKEN_LIMIT } from '../shared/response-builder.interface';
import { ChatCompletionRequest } from './interfaces/chat.interfaces';
import { CHAT_TOOL_CALL_TOKENS, OpenAiChatBuilder } from './openai-chat.builder';

const weatherTool = {
  type: 'function' as const,
  function: { name: 'get_weather', parameters: { type: 'object' } },
};

function payload(fragment: StreamFragment) {
  return JSON.parse(JSON.stringify(fragment.data));
}

describe('OpenAiChatBuilder', () => {
  const builder = new OpenAiChatBuilder();
  let producer: FakeContentProducer;

  beforeEach(() => {
    producer = new FakeContentProducer(42);
  });

  describe('buildResponse', () => {
    it('answers plain prompts with text and a stop reason', () => {
      const request: ChatCompletionRequest = {
        model: 'm',
        messages: [{ role: 'user', content: 'Hello' }],
      };

      const response = builder.buildResponse(request, producer);
      const [choice] = response.choices;

      expect(response.object).toBe('chat.completion');
      expect(response.model).toBe('m');
      expect(response.id).toMatch(/^chatcmpl-/);
      expect(response.system_fingerprint).toMatch(/^fp_/);
      expect(choice.finish_reason).toBe('stop');
      expect(choice.message.role).toBe('assistant');
      expect(choice.message.tool_calls).toBeUndefined();
      expect(typeof choice.message.content).toBe('string');
      expect(response.usage.prompt_tokens).toBe(2);
      expect(response.usage.completion_tokens).toBe(
        FakeContentProducer.estimateTokens(choice.message.content ?? ''),
      );
      expect(response.usage.total_tokens).toBe(
        response.usage.prompt_tokens + response.usage.completion_tokens,
      );
      expect(response.usage.prompt_tokens_details).toEqual({ cached_tokens: 0 });
    });

    it('answers a weather question with a tool call', () => {
      const request: ChatCompletionRequest = {
        model: 'm',
        messages: [{ role: 'user', content: 'What is the weather in Paris?' }],
        tools: [weatherTool],
      };

      const response = builder.buildResponse(request, producer);
      const [choice] = response.choices;

      expect(choice.finish_reason).toBe('tool_calls');
      expect(choice.message.content).toBeNull();
      expect(choice.message.tool_calls).toHaveLength(1);
      expect(choice.message.tool_calls?.[0]).toEqual({
        id: expect.stringMatching(/^call_[0-9a-f]{11}$/),
        type: 'function',
        function: { name: 'get_weather', arguments: '{"location":"Paris"}' },
      });
      expect(response.usage).toMatchObject({
        prompt_tokens: 8,
        completion_tokens: CHAT_TOOL_CALL_TOKENS,
        total_tokens: 8 + CHAT_TOOL_CALL_TOKENS,
      });
    });

    it('ignores trigger words when no tools are declared', () => {
      const response = builder.buildResponse(
        { model: 'm', messages: [{ role: 'user', content: 'What is the weather?' }] },
        producer,
      );
      expect(response.choices[0].finish_reason).toBe('stop');
    });

    it('looks only at the latest message and its first text part', () => {
      const request: ChatCompletionRequest = {
        model: 'm',
        messages: [
          { role: 'user', content: 'find the weather' },
          {
            role: 'user',
            content: [
              { type: 'image_url' },
              { type: 'text', text: 'hi' },
              { type: 'text', text: 'weather?' },
            ],
          },
        ],
        tools: [weatherTool],
      };

      expect(builder.wantsToolCall(request)).toBe(false);
      // 'find the weather' (16 bytes) + 'hi' + 'weather?'
      expect(builder.promptTokens(request)).toBe(4 + 1 + 2);
    });

    it('counts null content as nothing', () => {
      expect(
        builder.promptTokens({
          model: 'm',
          messages: [{ role: 'assistant', content: null }],
        }),
      ).toBe(0);
    });
  });

  describe('buildStream', () => {
    it('streams role, content deltas, a final chunk and [DONE]', () => {
      const fragments = builder.buildStream(
        { model: 'm', messages: [{ role: 'user', content: 'Hello' }], max_tokens: 10 },
        producer,
      );

      const kinds = fragments.map((fragment) => fragment.kind);
      expect(kinds[0]).toBe('start');
      expect(kinds.slice(1, -2).every((kind) => kind === 'delta')).toBe(true);
      expect(kinds.slice(-2)).toEqual(['finish', 'terminator']);
      expect(fragments[fragments.length - 1].data).toBe('[DONE]');
      expect(fragments.every((fragment) => fragment.event === undefined)).toBe(true);

      const start = payload(fragments[0]);
      expect(start.object).toBe('chat.completion.chunk');
      expect(start.choices[0].delta).toEqual({ role: 'assistant', content: '' });

      const deltas: string[] = fragments
        .slice(1, -2)
        .map((fragment) => payload(fragment).choices[0].delta.content);
      expect(deltas[0].startsWith(' ')).toBe(false);
      expect(deltas.slice(1).every((text) => text.startsWith(' '))).toBe(true);
      expect(deltas.join('').trim().split(' ')).toHaveLength(10);
      expect(deltas[deltas.length - 1].endsWith('.')).toBe(true);

      const ids = new Set(fragments.slice(0, -1).map((fragment) => payload(fragment).id));
      expect(ids.size).toBe(1);
    });

    it('reports usage only when asked, summed from the streamed deltas', () => {
      const request: ChatCompletionRequest = {
        model: 'm',
        messages: [{ role: 'user', content: 'Hello' }],
        max_tokens: 12,
        stream_options: { include_usage: true },
      };

      const fragments = builder.buildStream(request, producer);
      const streamed = fragments
        .filter((fragment) => fragment.kind === 'delta')
        .map((fragment) => payload(fragment).choices[0].delta.content);
      const final = payload(fragments[fragments.length - 2]);

      const completionTokens = streamed.reduce(
        (sum: number, text: string) => sum + FakeContentProducer.estimateTokens(text),
        0,
      );
      expect(final.choices[0]).toEqual({ index: 0, delta: {}, finish_reason: 'stop' });
      expect(final.usage).toEqual({
        prompt_tokens: 2,
        completion_tokens: completionTokens,
        total_tokens: 2 + completionTokens,
        prompt_tokens_details: { cached_tokens: 0 },
      });
      expect(final.time_info).toBeDefined();

      const withoutUsage = builder.buildStream(
        { ...request, stream_options: undefined },
        new FakeContentProducer(42),
      );
      const plainFinal = payload(withoutUsage[withoutUsage.length - 2]);
      expect(plainFinal.usage).toBeUndefined();
      expect(plainFinal.time_info).toBeUndefined();
    });

    it('falls back to max_completion_tokens, then 50 words', () => {
      const words = (request: ChatCompletionRequest) =>
        builder
          .buildStream(request, new FakeContentProducer(1))
          .filter((fragment) => fragment.kind === 'delta')
          .map((fragment) => payload(fragment).choices[0].delta.content)
          .join('')
          .trim()
          .split(' ').length;

      const base = { model: 'm', messages: [{ role: 'user', content: 'Hello' }] };
      expect(words({ ...base, max_completion_tokens: 7 })).toBe(7);
      expect(words(base)).toBe(50);
    });

    it('caps a huge max_tokens at the stream limit', () => {
      const fragments = builder.buildStream(
        {
          model: 'm',
          messages: [{ role: 'user', content: 'Hello' }],
          max_tokens: 2_000_000,
        },
        new FakeContentProducer(1),
      );
      const text = fragments
        .filter((fragment) => fragment.kind === 'delta')
        .map((fragment) => payload(fragment).choices[0].delta.content)
        .join('');

      expect(text.split(' ')).toHaveLength(STREAM_TOKEN_LIMIT);
    });

    it('streams a tool call as a header and one arguments delta', () => {
      const fragments = builder.buildStream(
        {
          model: 'm',
          messages: [{ role: 'user', content: 'What is the weather in Paris?' }],
          tools: [weatherTool],
          stream_options: { include_usage: true },
        },
        producer,
      );

      expect(fragments.map((fragment) => fragment.kind)).toEqual([
        'start',
        'block_start',
        'tool_delta',
        'finish',
        'terminator',
      ]);

      const header = payload(fragments[1]).choices[0].delta.tool_calls[0];
      expect(header).toEqual({
        index: 0,
        id: expect.stringMatching(/^call_/),
        type: 'function',
        function: { name: 'get_weather', arguments: '' },
      });
      expect(payload(fragments[2]).choices[0].delta.tool_calls[0]).toEqual({
        index: 0,
        function: { arguments: '{"location":"Paris"}' },
      });

      const final = payload(fragments[3]);
      expect(final.choices[0].finish_reason).toBe('tool_calls');
      expect(final.usage.completion_tokens).toBe(CHAT_TOOL_CALL_TOKENS);
    });
  });
});
