import { Module } from '@nestjs/common';
import { GeminiBuilder } from './gemini.builder';
import { GeminiController } from './gemini.controller';

@Module({
  controllers: [GeminiController],
  providers: [GeminiBuilder],
  exports: [GeminiBuilder],
})
export class GeminiModule {}
