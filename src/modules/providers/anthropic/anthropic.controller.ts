import { Body, Controller, Logger, Post, Req, Res } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { JoiValidationPipe } from '../../../common/pipes/joi-validation.pipe';
import { RuntimeStateService } from '../../runtime/runtime-state.service';
import { sendBuilderResult } from '../shared/send-builder-result';
import { AnthropicBuilder } from './anthropic.builder';
import { messagesRequestSchema } from './anthropic.schema';
import { MessagesRequest } from './interfaces/messages.interfaces';

@Controller('v1')
export class AnthropicController {
  private readonly logger = new Logger(AnthropicController.name);

  constructor(
    private readonly builder: AnthropicBuilder,
    private readonly runtime: RuntimeStateService,
  ) {}

  /**
   * POST /v1/messages
   */
  @Post('messages')
  async messages(
    @Body(new JoiValidationPipe(messagesRequestSchema)) body: MessagesRequest,
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
