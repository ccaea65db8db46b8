export { PacedEventStream } from './paced-event-stream';
export { frameFragment } from './sse-frame';
export { sendEventStream } from './send-event-stream';
export {
  FragmentKind,
  StreamFragment,
  StreamMetrics,
  StreamStatus,
  PacedStreamOptions,
} from './stream-fragment.interface';
