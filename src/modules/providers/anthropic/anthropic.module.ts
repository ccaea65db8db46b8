import { Module } from '@nestjs/common';
import { AnthropicBuilder } from './anthropic.builder';
import { AnthropicController } from './anthropic.controller';

@Module({
  controllers: [AnthropicController],
  providers: [AnthropicBuilder],
  exports: [AnthropicBuilder],
})
export class AnthropicModule {}
