import { Module } from '@nestjs/common';
import { OpenAiChatBuilder } from './openai-chat.builder';
import { OpenAiChatController } from './openai-chat.controller';

@Module({
  controllers: [OpenAiChatController],
  providers: [OpenAiChatBuilder],
  exports: [OpenAiChatBuilder],
})
export class OpenAiChatModule {}
