import Redis from 'ioredis';
import type { LogEvent } from '../../domain/index.js';
import { ConnectError, SendError } from '../../domain/index.js';
import { toRecord } from '../../application/protocol-codec.js';
import { BackoffSchedule } from '../../application/backoff.js';
import type { BackoffOptions } from '../../application/backoff.js';
import { Sink } from '../../application/sink.js';
import type { SinkOptions } from '../../application/sink.js';

export interface RedisSinkOptions extends SinkOptions {
  hosts: readonly string[];
  port: number;
  key: string;
}

/**
 * Pushes events onto a Redis list (LPUSH), spreading pushes round-robin
 * over every reachable host. A push that fails on one host is retried on
 * the others before the delivery counts as failed.
 *
 * ioredis' own reconnect loop is disabled. While at least one host is up,
 * each missing host is retried on its own backoff schedule and rejoins the
 * rotation once it accepts a connection. When every host is gone the sink
 * as a whole backs off and the supervisor reconnects it.
 */
export class RedisSink extends Sink {
  readonly kind = 'redis' as const;

  private readonly hosts: readonly string[];
  private readonly port: number;
  private readonly key: string;
  private readonly hostBackoff: Partial<BackoffOptions> | undefined;
  private readonly retries = new Map<string, BackoffSchedule>();
  private readonly rejoinTimers = new Map<string, NodeJS.Timeout>();
  private clients: Redis[] = [];
  private cursor = 0;
  /** Bumped on every close so a rejoin that started earlier is discarded. */
  private generation = 0;

  constructor(options: RedisSinkOptions) {
    super(options);
    this.hosts = options.hosts;
    this.port = options.port;
    this.key = options.key;
    this.hostBackoff = options.backoff;
  }

  /** Hosts with a live connection. */
  get connectedClients(): number {
    return this.clients.length;
  }

  /** Hosts waiting to rejoin the rotation. */
  get pendingHosts(): string[] {
    return [...this.rejoinTimers.keys()];
  }

  protected async openConnection(): Promise<void> {
    const candidates = this.hosts.map((host) => ({ host, client: this.createClient(host) }));
    const results = await Promise.allSettled(candidates.map(({ client }) => client.connect()));

    const live: Redis[] = [];
    const down: string[] = [];
    let lastError: unknown;
    results.forEach((result, index) => {
      const candidate = candidates[index];
      if (!candidate) return;
      if (result.status === 'fulfilled') {
        live.push(candidate.client);
        this.watch(candidate.client, candidate.host);
      } else {
        lastError = result.reason;
        down.push(candidate.host);
        this.log.debug({ err: result.reason, sink: this.name, host: candidate.host }, 'Redis host unreachable');
        candidate.client.disconnect();
      }
    });

    if (live.length === 0) {
      throw new ConnectError(this.name, 'No Redis host reachable', { cause: lastError });
    }

    this.clients = live;
    this.cursor = 0;
    for (const host of down) {
      this.scheduleRejoin(host);
    }
  }

  protected async closeConnection(): Promise<void> {
    this.generation++;
    this.cancelRejoins();

    const clients = this.clients;
    this.clients = [];
    await Promise.all(
      clients.map((client) =>
        client.quit().catch((err: unknown) => {
          this.log.debug({ err, sink: this.name }, 'Redis quit failed, disconnecting');
          client.disconnect();
        }),
      ),
    );
  }

  protected async transmit(events: readonly LogEvent[]): Promise<void> {
    const values = events.map((event) => JSON.stringify(toRecord(event)));
    const count = this.clients.length;
    let lastError: unknown = new Error('No connected Redis client');

    for (let offset = 0; offset < count; offset++) {
      const index = (this.cursor + offset) % count;
      const client = this.clients[index];
      if (!client) continue;

      try {
        await client.lpush(this.key, ...values);
        this.cursor = (index + 1) % count;
        return;
      } catch (err: unknown) {
        lastError = err;
        this.log.debug({ err, sink: this.name, host: client.options.host }, 'LPUSH failed, trying next host');
      }
    }

    throw new SendError(this.name, 'LPUSH failed on every Redis host', { cause: lastError });
  }

  private createClient(host: string): Redis {
    return new Redis({
      host,
      port: this.port,
      lazyConnect: true,
      enableOfflineQueue: false,
      maxRetriesPerRequest: 0,
      retryStrategy: () => null,
    });
  }

  private watch(client: Redis, host: string): void {
    client.once('end', () => {
      this.handleEnd(client, host);
    });
  }

  private scheduleRejoin(host: string): void {
    if (this.rejoinTimers.has(host)) return;

    let schedule = this.retries.get(host);
    if (!schedule) {
      schedule = new BackoffSchedule(this.hostBackoff);
      this.retries.set(host, schedule);
    }
    const { attempt, delayMs } = schedule.advance();

    const timer = setTimeout(() => {
      this.rejoinTimers.delete(host);
      this.rejoin(host).catch((err: unknown) => {
        this.log.error({ err, sink: this.name, host }, 'Redis rejoin failed');
      });
    }, delayMs);
    timer.unref();
    this.rejoinTimers.set(host, timer);

    this.log.debug({ sink: this.name, host, attempt, delayMs }, 'Redis host rejoin scheduled');
  }

  private async rejoin(host: string): Promise<void> {
    const generation = this.generation;
    const client = this.createClient(host);

    try {
      await client.connect();
    } catch (err: unknown) {
      client.disconnect();
      this.log.debug({ err, sink: this.name, host }, 'Redis host still unreachable');
      if (generation === this.generation) {
        this.scheduleRejoin(host);
      }
      return;
    }

    if (generation !== this.generation || this.state.kind !== 'connected') {
      client.disconnect();
      return;
    }

    this.retries.get(host)?.reset();
    this.clients = [...this.clients, client];
    this.watch(client, host);
    this.log.info({ sink: this.name, host, connected: this.clients.length }, 'Redis host rejoined');
  }

  private cancelRejoins(): void {
    for (const timer of this.rejoinTimers.values()) {
      clearTimeout(timer);
    }
    this.rejoinTimers.clear();
    this.retries.clear();
  }

  private handleEnd(client: Redis, host: string): void {
    if (!this.clients.includes(client)) return;

    this.clients = this.clients.filter((candidate) => candidate !== client);
    this.log.warn({ sink: this.name, host, remaining: this.clients.length }, 'Redis connection ended');

    if (this.clients.length === 0) {
      this.generation++;
      this.cancelRejoins();
      this.connectionLost(new Error('All Redis connections ended'));
    } else {
      this.cursor = this.cursor % this.clients.length;
      this.scheduleRejoin(host);
    }
  }
}
