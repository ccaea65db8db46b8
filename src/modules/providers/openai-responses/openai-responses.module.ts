import { Module } from '@nestjs/common';
import { OpenAiResponsesBuilder } from './openai-responses.builder';
import { OpenAiResponsesController } from './openai-responses.controller';

@Module({
  controllers: [OpenAiResponsesController],
  providers: [OpenAiResponsesBuilder],
  exports: [OpenAiResponsesBuilder],
})
export class OpenAiResponsesModule {}
