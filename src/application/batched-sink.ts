import { Sink } from './sink.js';
import type { SinkOptions } from './sink.js';

export interface BatchedSinkOptions extends SinkOptions {
  batchSize: number;
  flushIntervalMs: number;
}

/**
 * A sink that hands events to its backend in batches.
 *
 * A flush happens when the backlog reaches `batchSize`, or when
 * `flushIntervalMs` has elapsed since the first pending event arrived,
 * whichever comes first. A failed batch counts as one failure and stays at
 * the head of the backlog.
 */
export abstract class BatchedSink extends Sink {
  protected readonly batchSize: number;

  private readonly flushIntervalMs: number;
  private timer: NodeJS.Timeout | null = null;
  private flushDue = false;

  constructor(options: BatchedSinkOptions) {
    super(options);
    this.batchSize = Math.max(1, options.batchSize);
    this.flushIntervalMs = options.flushIntervalMs;
  }

  override async stop(timeoutMs: number): Promise<void> {
    await super.stop(timeoutMs);
    this.clearTimer();
  }

  protected override afterOffer(): void {
    this.armTimer();
    if (this.backlog.size >= this.batchSize) {
      this.scheduleDrain();
    }
  }

  protected override batchLimit(): number {
    return this.batchSize;
  }

  protected override readyToFlush(): boolean {
    if (this.backlog.isEmpty) return false;
    return this.flushDue || this.isFlushingAll || this.backlog.size >= this.batchSize;
  }

  protected override afterFlush(): void {
    this.flushDue = false;
    this.clearTimer();
    if (!this.backlog.isEmpty) this.armTimer();
  }

  private armTimer(): void {
    if (this.timer !== null) return;
    this.timer = setTimeout(() => {
      this.timer = null;
      this.flushDue = true;
      this.scheduleDrain();
    }, this.flushIntervalMs);
    this.timer.unref();
  }

  private clearTimer(): void {
    if (this.timer !== null) {
      clearTimeout(this.timer);
      this.timer = null;
    }
  }
}
