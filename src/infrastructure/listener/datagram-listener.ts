import { createSocket } from 'node:dgram';
import type { Socket } from 'node:dgram';
import { isIPv6 } from 'node:net';
import type { Logger } from 'pino';
import type { DecodeErrorKind } from '../../domain/index.js';
import { createLogEvent, epochSeconds } from '../../domain/index.js';
import type { DecodeResult } from '../../application/protocol-codec.js';
import type { EventAcceptor } from '../../application/router.js';

export interface ListenerOptions {
  host: string;
  port: number;
  router: EventAcceptor;
  log: Logger;
  /** Seconds clock used for events without a timestamp. */
  now?: (() => number) | undefined;
}

export interface ListenerStats {
  name: string;
  address: string | null;
  received: number;
  accepted: number;
  dropped: Record<DecodeErrorKind, number>;
}

/**
 * Owns one UDP socket and turns datagrams into events.
 *
 * The receive path is synchronous: decode, stamp, hand to the router.
 * Malformed datagrams are counted by failure kind and dropped; nothing
 * on this path waits on a sink.
 */
export abstract class DatagramListener {
  abstract readonly name: string;

  protected readonly log: Logger;
  private readonly host: string;
  private readonly port: number;
  private readonly router: EventAcceptor;
  private readonly now: () => number;
  private socket: Socket | null = null;
  private received = 0;
  private accepted = 0;
  private readonly dropped: Record<DecodeErrorKind, number> = {
    InvalidCategory: 0,
    InvalidPayload: 0,
  };

  constructor(options: ListenerOptions) {
    this.host = options.host;
    this.port = options.port;
    this.router = options.router;
    this.log = options.log;
    this.now = options.now ?? epochSeconds;
  }

  /** Binds the socket. Rejects if the address cannot be bound. */
  async start(): Promise<void> {
    if (this.socket) return;

    const socket = createSocket({ type: isIPv6(this.host) ? 'udp6' : 'udp4' });

    await new Promise<void>((resolve, reject) => {
      const onError = (err: Error): void => {
        socket.close();
        reject(err);
      };
      socket.once('error', onError);
      socket.bind(this.port, this.host, () => {
        socket.off('error', onError);
        resolve();
      });
    });

    socket.on('error', (err: Error) => {
      this.log.error({ err, listener: this.name }, 'Listener socket error');
    });
    socket.on('message', (datagram: Buffer) => {
      this.handleDatagram(datagram);
    });

    this.socket = socket;
    this.log.info({ listener: this.name, address: this.address() }, 'Listener bound');
  }

  async stop(): Promise<void> {
    const socket = this.socket;
    this.socket = null;
    if (!socket) return;

    await new Promise<void>((resolve) => {
      socket.close(() => resolve());
    });
    this.log.info({ listener: this.name }, 'Listener closed');
  }

  /** `host:port` the socket is bound to, or null before `start()`. */
  address(): string | null {
    if (!this.socket) return null;
    const { address, port } = this.socket.address();
    return `${address}:${port}`;
  }

  handleDatagram(datagram: Buffer): void {
    this.received++;

    const result = this.decodeDatagram(datagram);
    if (!result.ok) {
      this.dropped[result.error.kind]++;
      this.log.debug(
        { listener: this.name, kind: result.error.kind, reason: result.error.message, size: datagram.length },
        'Dropped datagram',
      );
      return;
    }

    this.accepted++;
    this.router.accept(createLogEvent(result.event, this.now));
  }

  stats(): ListenerStats {
    return {
      name: this.name,
      address: this.address(),
      received: this.received,
      accepted: this.accepted,
      dropped: { ...this.dropped },
    };
  }

  protected abstract decodeDatagram(datagram: Buffer): DecodeResult;
}
