import type { Logger } from 'pino';
import type { LogEvent } from '../domain/index.js';
import type { Sink, SinkStats } from './sink.js';

/** Anything that takes decoded events off a listener's hands. */
export interface EventAcceptor {
  accept(event: LogEvent): void;
}

export interface RouterStats {
  accepted: number;
  sinks: SinkStats[];
}

/**
 * Fan-out hub between listeners and sinks.
 *
 * Each accepted event is offered to every sink, in configuration order.
 * Sinks are independent: an exception from one is logged and the
 * remaining sinks still receive the event. The sink set is fixed at
 * construction.
 */
export class Router implements EventAcceptor {
  private readonly sinks: readonly Sink[];
  private readonly log: Logger;
  private acceptedCount = 0;

  constructor(sinks: readonly Sink[], log: Logger) {
    this.sinks = Object.freeze([...sinks]);
    this.log = log;
  }

  accept(event: LogEvent): void {
    this.acceptedCount++;

    for (const sink of this.sinks) {
      try {
        sink.offer(event);
      } catch (err: unknown) {
        this.log.error({ err, sink: sink.name, category: event.category }, 'Sink rejected event');
      }
    }
  }

  get accepted(): number {
    return this.acceptedCount;
  }

  getSinks(): readonly Sink[] {
    return this.sinks;
  }

  snapshot(): RouterStats {
    return {
      accepted: this.acceptedCount,
      sinks: this.sinks.map((sink) => sink.stats()),
    };
  }
}
