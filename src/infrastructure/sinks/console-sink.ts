import { once } from 'node:events';
import type { Writable } from 'node:stream';
import type { LogEvent } from '../../domain/index.js';
import { CONNECTED } from '../../domain/index.js';
import { encode } from '../../application/protocol-codec.js';
import { Sink } from '../../application/sink.js';
import type { SinkOptions } from '../../application/sink.js';

export interface ConsoleSinkOptions extends SinkOptions {
  /** Defaults to stdout. */
  stream?: Writable | undefined;
}

const NEWLINE = Buffer.from('\n');

/**
 * Writes every event in wire format to a local stream, one per line.
 *
 * Local verification only: always connected, never fails, never backs off.
 * A write error is logged and the event counted as delivered. A full
 * stream buffer holds the drain loop until the stream drains.
 */
export class ConsoleSink extends Sink {
  readonly kind = 'console' as const;

  private readonly stream: Writable;

  constructor(options: ConsoleSinkOptions) {
    super(options);
    this.stream = options.stream ?? process.stdout;
    this.stream.on('error', (err: unknown) => {
      this.log.error({ err, sink: this.name }, 'Console stream error');
    });
    this.setState(CONNECTED);
  }

  protected async openConnection(): Promise<void> {}

  protected async closeConnection(): Promise<void> {}

  protected async transmit(events: readonly LogEvent[]): Promise<void> {
    for (const event of events) {
      try {
        if (!this.stream.write(Buffer.concat([encode(event), NEWLINE]))) {
          await once(this.stream, 'drain');
        }
      } catch (err: unknown) {
        this.log.error({ err, sink: this.name, category: event.category }, 'Console write failed');
      }
    }
  }
}
