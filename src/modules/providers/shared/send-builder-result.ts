import { Logger } from '@nestjs/common';
import { FastifyReply, FastifyRequest } from 'fastify';
import { FakeContentProducer } from '../../content/fake-content.producer';
import { sendEventStream, StreamMetrics } from '../../streaming';
import { ResponseBuilder } from './response-builder.interface';

export interface BuilderReplyContext {
  request: FastifyRequest;
  reply: FastifyReply;
  producer: FakeContentProducer;
  logger: Logger;
}

/**
 * Answer with the builder's JSON document, or stream its fragments
 */
export async function sendBuilderResult<TRequest, TResponse extends object>(
  builder: ResponseBuilder<TRequest, TResponse>,
  body: TRequest,
  stream: boolean,
  context: BuilderReplyContext,
): Promise<void> {
  const { request, reply, producer, logger } = context;

  if (!stream) {
    await reply.status(200).send(builder.buildResponse(body, producer));
    return;
  }

  const fragments = builder.buildStream(body, producer);
  await sendEventStream(request, reply, fragments, {
    delayMs: builder.streamDelayMs,
    onMetrics: (metrics: StreamMetrics) => {
      const summary = `${builder.provider} stream ${metrics.requestId} ended ${metrics.status} after ${metrics.fragmentCount}/${metrics.plannedFragments} fragments`;
      if (metrics.status === 'COMPLETED') {
        logger.debug(summary, metrics);
      } else {
        logger.warn(summary);
      }
    },
  });
}
