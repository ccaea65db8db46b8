import { Body, Controller, Logger, Post, Req, Res } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { JoiValidationPipe } from '../../../common/pipes/joi-validation.pipe';
import { RuntimeStateService } from '../../runtime/runtime-state.service';
import { sendBuilderResult } from '../shared/send-builder-result';
import { ChatCompletionRequest } from './interfaces/chat.interfaces';
import { OpenAiChatBuilder } from './openai-chat.builder';
import { chatCompletionRequestSchema } from './openai-chat.schema';

@Controller('v1/chat')
export class OpenAiChatController {
  private readonly logger = new Logger(OpenAiChatController.name);

  constructor(
    private readonly builder: OpenAiChatBuilder,
    private readonly runtime: RuntimeStateService,
  ) {}

  /**
   * POST /v1/chat/completions
   */
  @Post('completions')
  async chatCompletions(
    @Body(new JoiValidationPipe(chatCompletionRequestSchema))
    body: ChatCompletionRequest,
    @Req() request: FastifyRequest,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    await sendBuilderResult(this.builder, body, body.stream === true, {
      request,
      reply,
      producer: this.runtime.createProducer(),
      logger: this.logger,
    });
  }
}
