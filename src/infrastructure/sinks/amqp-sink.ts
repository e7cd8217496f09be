import amqp from 'amqplib';
import type { Channel, ConfirmChannel } from 'amqplib';
import type { JsonValue, LogEvent } from '../../domain/index.js';
import { SendError, toError } from '../../domain/index.js';
import { toRecord } from '../../application/protocol-codec.js';
import { Sink } from '../../application/sink.js';
import type { SinkOptions } from '../../application/sink.js';

type AmqpConnection = Awaited<ReturnType<typeof amqp.connect>>;

/**
 * `confirm` waits for the broker to ack every publish.
 * `fire-and-forget` counts a publish as delivered once written to the
 * socket; messages in flight when the connection drops are lost.
 */
export type PublishMode = 'confirm' | 'fire-and-forget';

export interface AmqpSinkOptions extends SinkOptions {
  host: string;
  port: number;
  vhost: string;
  user: string;
  password: string;
  exchange: string;
  mode: PublishMode;
}

type OpenChannel =
  | { mode: 'confirm'; channel: ConfirmChannel }
  | { mode: 'fire-and-forget'; channel: Channel };

/**
 * Publishes events to a topic exchange, one message per event, with the
 * category as routing key. A consumer like Logstash binds its own queue.
 */
export class AmqpSink extends Sink {
  readonly kind = 'amqp' as const;

  private readonly url: string;
  private readonly exchange: string;
  private readonly mode: PublishMode;
  private connection: AmqpConnection | null = null;
  private open: OpenChannel | null = null;

  constructor(options: AmqpSinkOptions) {
    super(options);
    const credentials = `${encodeURIComponent(options.user)}:${encodeURIComponent(options.password)}`;
    this.url = `amqp://${credentials}@${options.host}:${options.port}/${encodeURIComponent(options.vhost)}`;
    this.exchange = options.exchange;
    this.mode = options.mode;
  }

  protected async openConnection(): Promise<void> {
    const connection = await amqp.connect(this.url);

    // 'error' is always followed by 'close'; the close handler does the work.
    connection.on('error', (err: unknown) => {
      this.log.warn({ err, sink: this.name }, 'AMQP connection error');
    });
    connection.on('close', () => {
      this.handleClose(connection);
    });

    try {
      const open: OpenChannel = this.mode === 'confirm'
        ? { mode: 'confirm', channel: await connection.createConfirmChannel() }
        : { mode: 'fire-and-forget', channel: await connection.createChannel() };

      // The broker closes a channel on protocol errors (404, 406) while the
      // connection stays up; 'close' always follows 'error'.
      const { channel } = open;
      channel.on('error', (err: unknown) => {
        this.log.warn({ err, sink: this.name }, 'AMQP channel error');
      });
      channel.on('close', () => {
        this.handleChannelClose(channel);
      });

      await channel.assertExchange(this.exchange, 'topic', { durable: true, autoDelete: false });

      this.connection = connection;
      this.open = open;
    } catch (err: unknown) {
      await connection.close().catch((closeErr: unknown) => {
        this.log.debug({ err: closeErr, sink: this.name }, 'AMQP close after failed setup');
      });
      throw err;
    }

    this.log.debug({ sink: this.name, exchange: this.exchange, mode: this.mode }, 'AMQP channel open');
  }

  protected async closeConnection(): Promise<void> {
    const connection = this.connection;
    this.connection = null;
    this.open = null;
    if (connection) {
      await connection.close();
    }
  }

  protected async transmit(events: readonly LogEvent[]): Promise<void> {
    for (const event of events) {
      await this.publish(event);
    }
  }

  private async publish(event: LogEvent): Promise<void> {
    const open = this.open;
    if (!open) {
      throw new SendError(this.name, 'No AMQP channel');
    }

    const content = Buffer.from(JSON.stringify(toMessage(event)), 'utf8');
    const properties = { contentType: 'application/json', timestamp: Math.floor(this.now() / 1000) };

    if (open.mode === 'fire-and-forget') {
      if (!open.channel.publish(this.exchange, event.category, content, properties)) {
        await this.waitForDrain(open.channel);
      }
      return;
    }

    await new Promise<void>((resolve, reject) => {
      open.channel.publish(this.exchange, event.category, content, properties, (err: unknown) => {
        if (err) {
          reject(new SendError(this.name, 'Broker rejected publish', { cause: toError(err) }));
        } else {
          resolve();
        }
      });
    });
  }

  /** Resolves once the channel's write buffer has drained; rejects if it closes first. */
  private waitForDrain(channel: Channel): Promise<void> {
    return new Promise<void>((resolve, reject) => {
      const onDrain = (): void => {
        channel.removeListener('close', onClose);
        resolve();
      };
      const onClose = (): void => {
        channel.removeListener('drain', onDrain);
        reject(new SendError(this.name, 'AMQP channel closed while waiting for drain'));
      };
      channel.once('drain', onDrain);
      channel.once('close', onClose);
    });
  }

  private handleChannelClose(channel: Channel): void {
    if (this.open?.channel !== channel) return;
    const connection = this.connection;
    this.connection = null;
    this.open = null;

    if (connection) {
      connection.close().catch((err: unknown) => {
        this.log.debug({ err, sink: this.name }, 'AMQP close after channel loss');
      });
    }
    this.connectionLost(new Error('AMQP channel closed'));
  }

  private handleClose(connection: AmqpConnection): void {
    if (this.connection !== connection) return;
    this.connection = null;
    this.open = null;
    this.connectionLost(new Error('AMQP connection closed'));
  }
}

/**
 * The JSON document published for an event.
 *
 * The timestamp goes out as a string and `isError` as a boolean, the
 * shapes the Logstash AMQP input maps without type conflicts.
 */
export function toMessage(event: LogEvent): Record<string, JsonValue> {
  const message = toRecord(event);
  message['timestamp'] = String(event.timestamp);
  if ('isError' in message) {
    message['isError'] = Boolean(message['isError']);
  }
  return message;
}
