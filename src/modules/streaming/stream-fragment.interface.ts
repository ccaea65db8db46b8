/**
 * Position of a fragment in the provider stream skeleton
 */
export type FragmentKind =
  | 'start'        // Role / session announcement
  | 'block_start'  // Content block opened
  | 'delta'        // Text or reasoning delta
  | 'tool_delta'   // Tool-call argument delta
  | 'block_stop'   // Content block closed
  | 'finish'       // Finish reason and usage
  | 'terminator';  // Sentinel telling clients to stop reading

/**
 * One SSE frame of a streamed response. Order in the list is emission order.
 */
export interface StreamFragment {
  kind: FragmentKind;

  /** SSE event name, omitted for providers that send bare data frames */
  event?: string;

  /** JSON payload, or a literal sentinel such as `[DONE]` */
  data: object | string;
}

/**
 * Stream completion status
 */
export type StreamStatus =
  | 'STREAMING'     // Still emitting
  | 'COMPLETED'     // Every fragment written
  | 'CLIENT_ABORT'  // Client disconnected
  | 'ERROR';        // Destroyed with an error

/**
 * Metrics collected while a stream is written
 */
export interface StreamMetrics {
  /** Request ID */
  requestId: string;

  /** Time to the first fragment in milliseconds (null if none was written) */
  ttfbMs: number | null;

  /** Total duration in milliseconds */
  totalLatencyMs: number;

  /** Fragments written so far */
  fragmentCount: number;

  /** Fragments built for the response */
  plannedFragments: number;

  /** Total output bytes */
  outputBytes: number;

  status: StreamStatus;

  errorMessage?: string;
}

/**
 * Options for a paced stream
 */
export interface PacedStreamOptions {
  /** Delay before each fragment in milliseconds */
  delayMs: number;

  /** Called once when the stream completes, aborts or fails */
  onMetrics?: (metrics: StreamMetrics) => void;
}
