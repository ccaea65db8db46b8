import { Readable } from 'stream';
import { Logger } from '@nestjs/common';
import { frameFragment } from './sse-frame';
import {
  PacedStreamOptions,
  StreamFragment,
  StreamMetrics,
  StreamStatus,
} from './stream-fragment.interface';

/**
 * Readable that writes a fixed list of SSE fragments in order, waiting
 * `delayMs` before each one to mimic token-by-token arrival.
 * Destroying the stream (client disconnect) cancels the pending fragment.
 */
export class PacedEventStream extends Readable {
  private readonly logger = new Logger(PacedEventStream.name);

  private readonly requestId: string;
  private readonly fragments: readonly StreamFragment[];
  private readonly delayMs: number;
  private readonly onMetrics?: (metrics: StreamMetrics) => void;
  private readonly startTime: number;

  // Metrics state
  private ttfbMs: number | null = null;
  private position = 0;
  private outputBytes = 0;
  private status: StreamStatus = 'STREAMING';
  private errorMessage?: string;

  // Pending fragment timer
  private timer?: NodeJS.Timeout;

  // Flag to prevent double-finish
  private metricsEmitted = false;

  constructor(
    requestId: string,
    fragments: readonly StreamFragment[],
    options: PacedStreamOptions,
  ) {
    super();
    this.requestId = requestId;
    this.fragments = fragments;
    this.delayMs = options.delayMs;
    this.onMetrics = options.onMetrics;
    this.startTime = Date.now();
  }

  _read(): void {
    this.scheduleNext();
  }

  _destroy(error: Error | null, callback: (error: Error | null) => void): void {
    this.clearTimer();

    if (this.status === 'STREAMING') {
      if (error) {
        this.status = 'ERROR';
        this.errorMessage = error.message;
        this.logger.warn(
          `Stream destroyed with error for ${this.requestId}: ${error.message}`,
        );
      } else {
        this.status = 'CLIENT_ABORT';
        this.logger.debug(
          `Client aborted stream ${this.requestId} after ${this.position}/${this.fragments.length} fragments`,
        );
      }
    }

    this.emitMetrics();
    callback(error);
  }

  /**
   * Stop emitting because the client went away
   */
  handleClientAbort(): void {
    if (this.status !== 'STREAMING') {
      return;
    }
    this.destroy();
  }

  /**
   * Current metrics (for in-flight inspection)
   */
  getMetrics(): StreamMetrics {
    return {
      requestId: this.requestId,
      ttfbMs: this.ttfbMs,
      totalLatencyMs: Date.now() - this.startTime,
      fragmentCount: this.position,
      plannedFragments: this.fragments.length,
      outputBytes: this.outputBytes,
      status: this.status,
      errorMessage: this.errorMessage,
    };
  }

  /**
   * Arm the timer for the next fragment unless one is already pending
   */
  private scheduleNext(): void {
    if (this.timer || this.destroyed || this.status !== 'STREAMING') {
      return;
    }

    this.timer = setTimeout(() => {
      this.timer = undefined;
      this.emitNext();
    }, this.delayMs);
  }

  private emitNext(): void {
    if (this.destroyed) {
      return;
    }

    if (this.position >= this.fragments.length) {
      this.finish();
      return;
    }

    const framed = frameFragment(this.fragments[this.position]);
    this.position += 1;

    if (this.ttfbMs === null) {
      this.ttfbMs = Date.now() - this.startTime;
    }
    this.outputBytes += Buffer.byteLength(framed, 'utf8');

    const wantsMore = this.push(framed);

    if (this.position >= this.fragments.length) {
      this.finish();
    } else if (wantsMore) {
      this.scheduleNext();
    }
  }

  private finish(): void {
    this.status = 'COMPLETED';
    this.push(null);
    this.emitMetrics();
  }

  private clearTimer(): void {
    if (this.timer) {
      clearTimeout(this.timer);
      this.timer = undefined;
    }
  }

  private emitMetrics(): void {
    if (this.metricsEmitted) {
      return;
    }
    this.metricsEmitted = true;

    const metrics = this.getMetrics();
    this.logger.debug(
      `Stream metrics for ${this.requestId}: TTFB=${metrics.ttfbMs}ms, fragments=${metrics.fragmentCount}/${metrics.plannedFragments}, bytes=${metrics.outputBytes}, status=${metrics.status}`,
    );
    this.onMetrics?.(metrics);
  }
}
