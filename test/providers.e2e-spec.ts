import { NestFastifyApplication } from '@nestjs/platform-fastify';
import {
  chatBody,
  createTestApp,
  geminiBody,
  messagesBody,
  parseFrames,
  responsesBody,
} from './helpers';

describe('Provider endpoints (e2e)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp();
  });

  afterAll(async () => {
    await app.close();
  });

  describe('GET /health', () => {
    it('answers ok in plain text', async () => {
      const response = await app.inject({ method: 'GET', url: '/health' });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.body).toBe('ok');
    });
  });

  describe('POST /v1/chat/completions', () => {
    it('returns a completion with consistent usage', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        payload: chatBody,
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.object).toBe('chat.completion');
      expect(body.model).toBe('gpt-4o');
      expect(body.choices[0].finish_reason).toBe('stop');
      expect(body.choices[0].message.role).toBe('assistant');
      expect(body.usage.prompt_tokens).toBe(2);
      expect(body.usage.total_tokens).toBe(
        body.usage.prompt_tokens + body.usage.completion_tokens,
      );
    });

    it('returns a tool call when a tool is declared and asked for', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        payload: {
          model: 'gpt-4o',
          messages: [{ role: 'user', content: 'What is the weather in Paris?' }],
          tools: [{ type: 'function', function: { name: 'get_weather' } }],
        },
      });
      const [choice] = response.json().choices;

      expect(choice.finish_reason).toBe('tool_calls');
      expect(choice.message.tool_calls[0].function).toEqual({
        name: 'get_weather',
        arguments: '{"location":"Paris"}',
      });
    });

    it('streams chunks ending with [DONE]', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        payload: { ...chatBody, stream: true, max_tokens: 5 },
      });

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/event-stream/);
      expect(response.headers['cache-control']).toBe('no-cache');
      expect(response.body.endsWith('data: [DONE]\n\n')).toBe(true);

      const frames = parseFrames(response.body);
      const chunks = frames.slice(0, -1).map((frame) => JSON.parse(frame.data));
      expect(chunks[0].choices[0].delta).toEqual({ role: 'assistant', content: '' });
      expect(chunks[chunks.length - 1].choices[0].finish_reason).toBe('stop');
      expect(chunks.every((chunk) => chunk.object === 'chat.completion.chunk')).toBe(true);
    });

    it('rejects a body without messages', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/chat/completions',
        payload: { model: 'gpt-4o' },
      });

      expect(response.statusCode).toBe(400);
      expect(response.json().error).toMatchObject({
        type: 'invalid_request_error',
        param: null,
        code: 'invalid_request',
      });
    });
  });

  describe('POST /v1/messages', () => {
    it('returns a message with a text block', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        payload: messagesBody,
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.type).toBe('message');
      expect(body.id).toMatch(/^msg_[0-9a-f]{24}$/);
      expect(body.stop_reason).toBe('end_turn');
      expect(body.content[0].type).toBe('text');
      expect(body.usage.input_tokens).toBe(2);
    });

    it('streams named events ending with message_stop', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/messages',
        payload: { ...messagesBody, max_tokens: 4, stream: true },
      });
      const frames = parseFrames(response.body);
      const events = frames.map((frame) => frame.event);

      expect(response.headers['content-type']).toMatch(/^text\/event-stream/);
      expect(events[0]).toBe('message_start');
      expect(events[1]).toBe('content_block_start');
      expect(events.slice(-3)).toEqual(['content_block_stop', 'message_delta', 'message_stop']);
      for (const frame of frames) {
        expect(JSON.parse(frame.data).type).toBe(frame.event);
      }
    });
  });

  describe('POST /v1beta/models/{model}:{action}', () => {
    it('answers generateContent with the model from the path', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1beta/models/gemini-2.0-flash:generateContent',
        payload: geminiBody,
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.modelVersion).toBe('gemini-2.0-flash');
      expect(body.candidates[0].finishReason).toBe('STOP');
      expect(body.usageMetadata.promptTokenCount).toBe(2);
    });

    it('streams bare data frames for streamGenerateContent', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1beta/models/gemini-2.0-flash:streamGenerateContent?alt=sse',
        payload: { ...geminiBody, generationConfig: { maxOutputTokens: 4 } },
      });
      const frames = parseFrames(response.body);
      const last = JSON.parse(frames[frames.length - 1].data);

      expect(response.statusCode).toBe(200);
      expect(response.headers['content-type']).toMatch(/^text\/event-stream/);
      expect(frames.every((frame) => frame.event === undefined)).toBe(true);
      expect(response.body).not.toContain('[DONE]');
      expect(last.candidates[0].finishReason).toBe('STOP');
      expect(last.candidates[0].content.parts).toEqual([]);
    });

    it('rejects a path without an action', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1beta/models/gemini-2.0-flash',
        payload: geminiBody,
      });

      expect(response.statusCode).toBe(400);
      expect(response.headers['content-type']).toMatch(/^text\/plain/);
      expect(response.body).toBe('Invalid path: expected model:action format');
    });

    it('rejects an unknown action', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1beta/models/gemini-2.0-flash:countTokens',
        payload: geminiBody,
      });

      expect(response.statusCode).toBe(404);
      expect(response.body).toBe('Unknown action: countTokens');
    });
  });

  describe('POST /v1/responses', () => {
    it('returns a completed response', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/responses',
        payload: { ...responsesBody, instructions: 'Be brief' },
      });
      const body = response.json();

      expect(response.statusCode).toBe(200);
      expect(body.object).toBe('response');
      expect(body.status).toBe('completed');
      expect(body.instructions).toBe('Be brief');
      expect(body.output[0].type).toBe('message');
      expect(body.usage.input_tokens).toBe(4);
    });

    it('streams sequenced events ending with response.completed', async () => {
      const response = await app.inject({
        method: 'POST',
        url: '/v1/responses',
        payload: { ...responsesBody, stream: true, max_output_tokens: 3 },
      });
      const frames = parseFrames(response.body);
      const payloads = frames.map((frame) => JSON.parse(frame.data));

      expect(frames[0].event).toBe('response.created');
      expect(frames[frames.length - 1].event).toBe('response.completed');
      payloads.forEach((data, i) => expect(data.sequence_number).toBe(i));
    });
  });

  it('echoes a client supplied request id', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/chat/completions',
      headers: { 'x-request-id': 'req-test-1' },
      payload: chatBody,
    });

    expect(response.headers['x-request-id']).toBe('req-test-1');
  });
});

describe('Disabled providers (e2e)', () => {
  let app: NestFastifyApplication;

  beforeAll(async () => {
    app = await createTestApp({ providers: { anthropic: false } });
  });

  afterAll(async () => {
    await app.close();
  });

  it('does not mount a disabled provider', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/v1/messages',
      payload: messagesBody,
    });

    expect(response.statusCode).toBe(404);
  });

  it('keeps the other providers and health mounted', async () => {
    const chat = await app.inject({ method: 'POST', url: '/v1/chat/completions', payload: chatBody });
    const health = await app.inject({ method: 'GET', url: '/health' });

    expect(chat.statusCode).toBe(200);
    expect(health.statusCode).toBe(200);
  });
});
