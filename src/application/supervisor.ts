import type { Logger } from 'pino';
import type { SinkState } from '../domain/index.js';
import type { Sink } from './sink.js';

/**
 * Decides when each sink retries its connection.
 *
 * Event-driven: whenever a sink enters `backoff`, a timer is armed for that
 * sink's delay and `connect()` is called when it fires. A new failure arms
 * the next timer through the same path. The supervisor never touches
 * backlogs or the send path.
 */
export class Supervisor {
  private readonly sinks: readonly Sink[];
  private readonly log: Logger;
  private readonly timers = new Map<Sink, NodeJS.Timeout>();
  private unsubscribes: Array<() => void> = [];
  private running = false;

  constructor(sinks: readonly Sink[], log: Logger) {
    this.sinks = sinks;
    this.log = log;
  }

  /** Subscribes to every sink and connects the ones still disconnected. */
  start(): void {
    if (this.running) return;
    this.running = true;

    for (const sink of this.sinks) {
      this.unsubscribes.push(sink.onStateChange((state) => this.handleState(sink, state)));
    }

    for (const sink of this.sinks) {
      if (sink.state.kind === 'disconnected') {
        this.reconnect(sink);
      } else {
        this.handleState(sink, sink.state);
      }
    }
  }

  stop(): void {
    this.running = false;
    for (const timer of this.timers.values()) clearTimeout(timer);
    this.timers.clear();
    for (const unsubscribe of this.unsubscribes) unsubscribe();
    this.unsubscribes = [];
  }

  /** Sinks with a reconnect timer currently armed. */
  pending(): string[] {
    return [...this.timers.keys()].map((sink) => sink.name);
  }

  private handleState(sink: Sink, state: SinkState): void {
    if (!this.running || state.kind !== 'backoff') return;

    this.cancel(sink);
    this.log.info(
      { sink: sink.name, attempt: state.attempt, delayMs: state.delayMs },
      'Sink reconnect scheduled',
    );

    const timer = setTimeout(() => {
      this.timers.delete(sink);
      this.reconnect(sink);
    }, state.delayMs);
    timer.unref();
    this.timers.set(sink, timer);
  }

  private cancel(sink: Sink): void {
    const timer = this.timers.get(sink);
    if (timer !== undefined) {
      clearTimeout(timer);
      this.timers.delete(sink);
    }
  }

  private reconnect(sink: Sink): void {
    if (!this.running) return;
    void sink.connect().catch((err: unknown) => {
      this.log.error({ err, sink: sink.name }, 'Sink connect threw');
    });
  }
}
