import { FastifyReply, FastifyRequest } from 'fastify';
import { PacedEventStream } from './paced-event-stream';
import { PacedStreamOptions, StreamFragment } from './stream-fragment.interface';

/**
 * Reply with a paced `text/event-stream` body built from the fragments
 */
export async function sendEventStream(
  request: FastifyRequest,
  reply: FastifyReply,
  fragments: readonly StreamFragment[],
  options: PacedStreamOptions,
): Promise<PacedEventStream> {
  const stream = new PacedEventStream(request.id, fragments, options);

  reply.header('Content-Type', 'text/event-stream');
  reply.header('Cache-Control', 'no-cache');
  reply.header('Connection', 'keep-alive');

  // Stop producing fragments once the client goes away
  reply.raw.once('close', () => {
    if (!reply.raw.writableFinished) {
      stream.handleClientAbort();
    }
  });

  await reply.status(200).send(stream);
  return stream;
}
