import {
  Body,
  Controller,
  HttpStatus,
  Logger,
  Param,
  Post,
  Req,
  Res,
} from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { JoiValidationPipe } from '../../../common/pipes/joi-validation.pipe';
import { RuntimeStateService } from '../../runtime/runtime-state.service';
import { sendBuilderResult } from '../shared/send-builder-result';
import { GeminiBuilder, isGeminiAction } from './gemini.builder';
import { generateContentRequestSchema } from './gemini.schema';
import { GenerateContentRequest } from './interfaces/gemini.interfaces';

@Controller('v1beta/models')
export class GeminiController {
  private readonly logger = new Logger(GeminiController.name);

  constructor(
    private readonly builder: GeminiBuilder,
    private readonly runtime: RuntimeStateService,
  ) {}

  /**
   * POST /v1beta/models/{model}:generateContent
   * POST /v1beta/models/{model}:streamGenerateContent
   */
  @Post(':modelAction')
  async modelAction(
    @Param('modelAction') modelAction: string,
    @Body(new JoiValidationPipe(generateContentRequestSchema))
    body: GenerateContentRequest,
    @Req() request: FastifyRequest,
    @Res() reply: FastifyReply,
  ): Promise<void> {
    const separator = modelAction.lastIndexOf(':');
    if (separator < 0) {
      await reply
        .status(HttpStatus.BAD_REQUEST)
        .type('text/plain')
        .send('Invalid path: expected model:action format');
      return;
    }

    const model = modelAction.slice(0, separator);
    const action = modelAction.slice(separator + 1);

    if (!isGeminiAction(action)) {
      this.logger.warn(`Unknown Gemini action ${action}`);
      await reply
        .status(HttpStatus.NOT_FOUND)
        .type('text/plain')
        .send(`Unknown action: ${action}`);
      return;
    }

    await sendBuilderResult(
      this.builder,
      { model, body },
      action === 'streamGenerateContent',
      {
        request,
        reply,
        producer: this.runtime.createProducer(),
        logger: this.logger,
      },
    );
  }
}
