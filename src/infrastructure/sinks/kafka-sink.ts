import { hostname } from 'node:os';
import { Kafka, logLevel } from 'kafkajs';
import type { Producer } from 'kafkajs';
import type { LogEvent } from '../../domain/index.js';
import { SendError } from '../../domain/index.js';
import { toRecord } from '../../application/protocol-codec.js';
import { BatchedSink } from '../../application/batched-sink.js';
import type { BatchedSinkOptions } from '../../application/batched-sink.js';

export interface KafkaSinkOptions extends BatchedSinkOptions {
  /** `host:port` bootstrap brokers. */
  brokers: readonly string[];
  topic: string;
  /** Defaults to `logship-<hostname>`. */
  clientId?: string | undefined;
}

/**
 * Produces events to a Kafka topic, one JSON message per event, in batches
 * of `batchSize` or every `flushIntervalMs`.
 *
 * kafkajs' own retries are turned off so a failed send lands in the sink's
 * backoff like every other backend.
 */
export class KafkaSink extends BatchedSink {
  readonly kind = 'kafka' as const;

  private readonly brokers: string[];
  private readonly topic: string;
  private readonly clientId: string;
  private producer: Producer | null = null;
  private removeDisconnectListener: (() => void) | null = null;

  constructor(options: KafkaSinkOptions) {
    super(options);
    this.brokers = [...options.brokers];
    this.topic = options.topic;
    this.clientId = options.clientId ?? `logship-${hostname()}`;
  }

  protected async openConnection(): Promise<void> {
    const kafka = new Kafka({
      clientId: this.clientId,
      brokers: this.brokers,
      logLevel: logLevel.NOTHING,
      retry: { retries: 0 },
    });
    const producer = kafka.producer();

    try {
      await producer.connect();
    } catch (err: unknown) {
      await producer.disconnect().catch((closeErr: unknown) => {
        this.log.debug({ err: closeErr, sink: this.name }, 'Kafka disconnect after failed connect');
      });
      throw err;
    }

    this.removeDisconnectListener = producer.on(producer.events.DISCONNECT, () => {
      this.handleDisconnect(producer);
    });
    this.producer = producer;
    this.log.debug({ sink: this.name, brokers: this.brokers, topic: this.topic }, 'Kafka producer connected');
  }

  protected async closeConnection(): Promise<void> {
    const producer = this.producer;
    this.producer = null;
    this.removeDisconnectListener?.();
    this.removeDisconnectListener = null;
    if (producer) {
      await producer.disconnect();
    }
  }

  protected async transmit(events: readonly LogEvent[]): Promise<void> {
    const producer = this.producer;
    if (!producer) {
      throw new SendError(this.name, 'No Kafka producer');
    }

    await producer.send({
      topic: this.topic,
      messages: events.map((event) => ({ value: JSON.stringify(toRecord(event)) })),
    });

    this.log.debug({ sink: this.name, count: events.length }, 'Batch produced');
  }

  private handleDisconnect(producer: Producer): void {
    if (this.producer !== producer) return;
    this.producer = null;
    this.removeDisconnectListener?.();
    this.removeDisconnectListener = null;
    this.connectionLost(new Error('Kafka producer disconnected'));
  }
}
