import { FakeContentProducer } from '../../content/fake-content.producer';
import { StreamFragment } from '../../streaming';
import { STREAM_TOKEN_LIMIT } from '../shared/response-builder.interface';
import {
  OpenAiResponsesBuilder,
  RESPONSES_FUNCTION_CALL_TOKENS,
} from './openai-responses.builder';
import { ResponsesRequest } from './interfaces/responses.interfaces';

function payload(fragment: StreamFragment) {
  return JSON.parse(JSON.stringify(fragment.data));
}

const weatherTool = { type: 'function', name: 'get_weather' };

describe('OpenAiResponsesBuilder', () => {
  const builder = new OpenAiResponsesBuilder();
  let producer: FakeContentProducer;

  beforeEach(() => {
    producer = new FakeContentProducer(11);
  });

  describe('inputTokens', () => {
    it('counts string input and instructions', () => {
      expect(
        builder.inputTokens({ model: 'gpt-4o', input: 'Hello', instructions: 'Be brief' }),
      ).toBe(4);
    });

    it('counts message content and tool outputs', () => {
      const request: ResponsesRequest = {
        model: 'gpt-4o',
        input: [
          { role: 'user', content: 'What is the weather in Paris?' },
          { type: 'function_call_output', call_id: 'call_1', output: 'sunny and 21C' },
          { role: 'user', content: [{ type: 'input_text', text: 'abcd' }] },
        ],
      };

      expect(builder.inputTokens(request)).toBe(8 + 4 + 1);
    });
  });

  describe('buildResponse', () => {
    it('returns a completed message with usage', () => {
      const response = builder.buildResponse({ model: 'gpt-4o', input: 'Hello' }, producer);
      const [item] = response.output;

      expect(response.id).toMatch(/^resp_[0-9a-f]{24}$/);
      expect(response.object).toBe('response');
      expect(response.status).toBe('completed');
      expect(response.completed_at).not.toBeNull();
      expect(item.type).toBe('message');
      if (item.type !== 'message') {
        return;
      }
      expect(item.id).toMatch(/^msg_[0-9a-f]{24}$/);
      expect(item.role).toBe('assistant');
      const text = item.content[0].text;
      expect(response.usage).toEqual({
        input_tokens: 2,
        input_tokens_details: { cached_tokens: 0 },
        output_tokens: FakeContentProducer.estimateTokens(text),
        output_tokens_details: { reasoning_tokens: 0 },
        total_tokens: 2 + FakeContentProducer.estimateTokens(text),
      });
    });

    it('echoes request settings and falls back to defaults', () => {
      const echoed = builder.buildResponse(
        {
          model: 'gpt-4o',
          input: 'Hello',
          instructions: 'Be brief',
          max_output_tokens: 64,
          temperature: 0.2,
          store: false,
          reasoning: { effort: 'low' },
        },
        producer,
      );
      expect(echoed.instructions).toBe('Be brief');
      expect(echoed.max_output_tokens).toBe(64);
      expect(echoed.temperature).toBe(0.2);
      expect(echoed.store).toBe(false);
      expect(echoed.reasoning).toEqual({ effort: 'low', summary: null });

      const defaults = builder.buildResponse({ model: 'gpt-4o', input: 'Hello' }, producer);
      expect(defaults.instructions).toBeNull();
      expect(defaults.temperature).toBe(1);
      expect(defaults.top_p).toBe(1);
      expect(defaults.store).toBe(true);
      expect(defaults.tool_choice).toBe('auto');
      expect(defaults.text).toEqual({ format: { type: 'text' }, verbosity: 'medium' });
    });

    it('returns a function call for a weather question', () => {
      const response = builder.buildResponse(
        { model: 'gpt-4o', input: 'What is the weather in Paris?', tools: [weatherTool] },
        producer,
      );
      const [item] = response.output;

      expect(item.type).toBe('function_call');
      if (item.type !== 'function_call') {
        return;
      }
      expect(item.id).toMatch(/^fc_[0-9a-f]{24}$/);
      expect(item.call_id).toMatch(/^call_[0-9a-f]{24}$/);
      expect(item.name).toBe('get_weather');
      expect(item.status).toBe('completed');
      expect(JSON.parse(item.arguments)).toEqual({ location: 'Paris' });
      expect(response.usage?.output_tokens).toBe(RESPONSES_FUNCTION_CALL_TOKENS);
    });

    it('answers with text once the tool result comes back', () => {
      const response = builder.buildResponse(
        {
          model: 'gpt-4o',
          input: [
            { role: 'user', content: 'What is the weather in Paris?' },
            { type: 'function_call_output', call_id: 'call_1', output: 'sunny' },
          ],
          tools: [weatherTool],
        },
        producer,
      );

      expect(response.output[0].type).toBe('message');
    });
  });

  describe('buildStream', () => {
    it('emits the text event sequence with increasing sequence numbers', () => {
      const fragments = builder.buildStream(
        { model: 'gpt-4o', input: 'Hello', max_output_tokens: 6 },
        producer,
      );
      const events = fragments.map((fragment) => fragment.event);
      const deltaCount = events.filter((event) => event === 'response.output_text.delta').length;

      expect(events).toEqual([
        'response.created',
        'response.in_progress',
        'response.output_item.added',
        'response.content_part.added',
        ...Array<string>(deltaCount).fill('response.output_text.delta'),
        'response.output_text.done',
        'response.content_part.done',
        'response.output_item.done',
        'response.completed',
      ]);
      expect(fragments[fragments.length - 1].kind).toBe('terminator');

      const payloads = fragments.map(payload);
      payloads.forEach((data, i) => {
        expect(data.sequence_number).toBe(i);
        expect(data.type).toBe(events[i]);
      });

      const created = payloads[0].response;
      expect(created.status).toBe('in_progress');
      expect(created.output).toEqual([]);
      expect(created.usage).toBeNull();
      expect(created.completed_at).toBeNull();

      const deltas: string[] = payloads
        .filter((data) => data.type === 'response.output_text.delta')
        .map((data) => data.delta);
      const fullText = deltas.join('');
      expect(fullText.split(' ')).toHaveLength(6);

      const textDone = payloads.find((data) => data.type === 'response.output_text.done');
      expect(textDone.text).toBe(fullText);

      const completed = payloads[payloads.length - 1].response;
      expect(completed.id).toBe(created.id);
      expect(completed.status).toBe('completed');
      expect(completed.output[0].content[0].text).toBe(fullText);
      const outputTokens = deltas.reduce(
        (sum, delta) => sum + FakeContentProducer.estimateTokens(delta),
        0,
      );
      expect(completed.usage.output_tokens).toBe(outputTokens);
      expect(completed.usage.total_tokens).toBe(2 + outputTokens);
    });

    it('caps a huge max_output_tokens at the stream limit', () => {
      const fragments = builder.buildStream(
        { model: 'gpt-4o', input: 'Hello', max_output_tokens: 2_000_000 },
        producer,
      );
      const done = fragments
        .map(payload)
        .find((data) => data.type === 'response.output_text.done');

      expect(done.text.split(' ')).toHaveLength(STREAM_TOKEN_LIMIT);
    });

    it('emits the function call event sequence', () => {
      const fragments = builder.buildStream(
        { model: 'gpt-4o', input: 'find restaurants in Rome', tools: [weatherTool] },
        producer,
      );
      const payloads = fragments.map(payload);

      expect(fragments.map((fragment) => fragment.event)).toEqual([
        'response.created',
        'response.in_progress',
        'response.output_item.added',
        'response.function_call_arguments.delta',
        'response.function_call_arguments.done',
        'response.output_item.done',
        'response.completed',
      ]);
      expect(payloads[2].item.arguments).toBe('');
      expect(payloads[2].item.status).toBe('in_progress');
      expect(payloads[3].delta).toBe('{"location":"Rome"}');
      expect(payloads[4].arguments).toBe('{"location":"Rome"}');
      expect(payloads[5].item.status).toBe('completed');
      expect(payloads[6].response.output).toEqual([payloads[5].item]);
      expect(payloads[6].response.usage.output_tokens).toBe(RESPONSES_FUNCTION_CALL_TOKENS);
    });
  });
});
