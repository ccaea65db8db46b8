import { Test } from '@nestjs/testing';
import { NestFastifyApplication } from '@nestjs/platform-fastify';
import { AppModule } from '../src/app.module';
import { createFastifyAdapter, readyApp } from '../src/app.factory';
import { parseMockSettings } from '../src/config/mock-settings';

/**
 * Boot the whole application in process from a settings document
 */
export async function createTestApp(
  document: object = {},
): Promise<NestFastifyApplication> {
  const moduleRef = await Test.createTestingModule({
    imports: [AppModule.forRoot(parseMockSettings(document))],
  }).compile();

  const app = moduleRef.createNestApplication<NestFastifyApplication>(
    createFastifyAdapter({ logLevel: false, prettyLogs: false }),
    { logger: false },
  );
  await readyApp(app);
  return app;
}

/**
 * Split an event-stream body into its frames
 */
export function parseFrames(body: string): Array<{ event?: string; data: string }> {
  return body
    .split('\n\n')
    .filter((frame) => frame.length > 0)
    .map((frame) => {
      let event: string | undefined;
      let data = '';
      for (const line of frame.split('\n')) {
        if (line.startsWith('event: ')) {
          event = line.slice('event: '.length);
        } else if (line.startsWith('data: ')) {
          data = line.slice('data: '.length);
        }
      }
      return { event, data };
    });
}

export const chatBody = {
  model: 'gpt-4o',
  messages: [{ role: 'user', content: 'Hello' }],
};

export const messagesBody = {
  model: 'claude-sonnet-4-5',
  max_tokens: 64,
  messages: [{ role: 'user', content: 'Hello' }],
};

export const geminiBody = {
  contents: [{ role: 'user', parts: [{ text: 'Hello' }] }],
};

export const responsesBody = {
  model: 'gpt-4o',
  input: 'Hello',
};
