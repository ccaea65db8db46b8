import { DynamicModule, Logger, Module, Type } from '@nestjs/common';
import { MockSettings } from '../../config/mock-settings';
import { AnthropicModule } from './anthropic/anthropic.module';
import { GeminiModule } from './gemini/gemini.module';
import { OpenAiChatModule } from './openai-chat/openai-chat.module';
import { OpenAiResponsesModule } from './openai-responses/openai-responses.module';

/**
 * Mounts one feature module per enabled provider
 */
@Module({})
export class ProvidersModule {
  private static readonly logger = new Logger(ProvidersModule.name);

  static register(settings: MockSettings): DynamicModule {
    const { providers } = settings;
    const candidates: Array<[boolean, Type<unknown>, string]> = [
      [providers.openaiChat, OpenAiChatModule, 'POST /v1/chat/completions'],
      [providers.anthropic, AnthropicModule, 'POST /v1/messages'],
      [providers.gemini, GeminiModule, 'POST /v1beta/models/{model}:{action}'],
      [providers.openaiResponses, OpenAiResponsesModule, 'POST /v1/responses'],
    ];

    const imports: Array<Type<unknown>> = [];
    for (const [enabled, module, route] of candidates) {
      if (enabled) {
        imports.push(module);
        this.logger.log(`Mounted ${route}`);
      }
    }

    return {
      module: ProvidersModule,
      imports,
    };
  }
}
