import { Body, Controller, Logger, Post, Req, Res } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { JoiValidationPipe } from '../../../common/pipes/joi-validation.pipe';
import { RuntimeStateService } from '../../runtime/runtime-state.service';
import { sendBuilderResult } from '../shared/send-builder-result';
import { ResponsesRequest } from './interfaces/responses.interfaces';
import { OpenAiResponsesBuilder } from './openai-responses.builder';
import { responsesRequestSchema } from './openai-responses.schema';

@Controller('v1')
export class OpenAiResponsesController {
  private readonly logger = new Logger(OpenAiResponsesController.name);

  constructor(
    private readonly builder: OpenAiResponsesBuilder,
    private readonly runtime: RuntimeStateService,
  ) {}

  /**
   * POST /v1/responses
   */
  @Post('responses')
  async responses(
    @Body(new JoiValidationPipe(responsesRequestSchema)) body: ResponsesRequest,
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
