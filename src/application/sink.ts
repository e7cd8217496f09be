import type { Logger } from 'pino';
import type { LogEvent, SinkState } from '../domain/index.js';
import {
  CONNECTED,
  CONNECTING,
  DISCONNECTED,
  ConnectError,
  SendError,
  describeState,
  toError,
} from '../domain/index.js';
import { Backlog } from './backlog.js';
import type { OverflowPolicy } from './backlog.js';
import { BackoffSchedule } from './backoff.js';
import type { BackoffOptions } from './backoff.js';

export type SinkKind = 'amqp' | 'batch-rpc' | 'kafka' | 'redis' | 'console';

/** Outcome of a single delivery. Failures never escape the sink as exceptions. */
export type SendResult =
  | { readonly ok: true }
  | { readonly ok: false; readonly error: SendError };

/** A queued event plus how many failed deliveries it has been part of. */
export interface BacklogEntry {
  readonly event: LogEvent;
  attempts: number;
}

export interface SinkOptions {
  name: string;
  log: Logger;
  backlogCapacity: number;
  overflowPolicy?: OverflowPolicy | undefined;
  backoff?: Partial<BackoffOptions> | undefined;
  /** Entries that failed this many deliveries are dropped. Unlimited when unset. */
  maxAttempts?: number | undefined;
  /** Millisecond clock, used for `retryAt`. */
  now?: (() => number) | undefined;
}

export interface SinkCounters {
  offered: number;
  sent: number;
  evicted: number;
  expired: number;
  filtered: number;
  failures: number;
}

export interface SinkStats extends SinkCounters {
  name: string;
  kind: SinkKind;
  state: string;
  backlog: number;
  capacity: number;
}

export type StateListener = (state: SinkState) => void;

/**
 * Base class for every backend.
 *
 * Owns the backlog, the backoff schedule and the connection state machine:
 *
 *   disconnected --connect ok--> connected
 *   disconnected --connect fails--> backoff(1)
 *   connected --send fails / connection lost--> backoff(1)
 *   backoff(n) --connect--> connecting --ok--> connected | --fails--> backoff(n+1)
 *
 * Subclasses only implement how to open, close and transmit. Delivery runs
 * one batch at a time from the head of the backlog, so each sink sees events
 * in arrival order. Entries leave the backlog only once the backend has
 * acknowledged them.
 */
export abstract class Sink {
  abstract readonly kind: SinkKind;
  readonly name: string;

  protected readonly log: Logger;
  protected readonly backlog: Backlog<BacklogEntry>;
  protected readonly backoff: BackoffSchedule;
  protected readonly now: () => number;
  protected readonly counters: SinkCounters = {
    offered: 0,
    sent: 0,
    evicted: 0,
    expired: 0,
    filtered: 0,
    failures: 0,
  };

  private readonly maxAttempts: number | undefined;
  private readonly listeners = new Set<StateListener>();
  private currentState: SinkState = DISCONNECTED;
  private draining: Promise<void> | null = null;
  private flushingAll = false;
  private stopping = false;

  constructor(options: SinkOptions) {
    this.name = options.name;
    this.log = options.log;
    this.backlog = new Backlog<BacklogEntry>(options.backlogCapacity, options.overflowPolicy);
    this.backoff = new BackoffSchedule(options.backoff);
    this.maxAttempts = options.maxAttempts;
    this.now = options.now ?? (() => Date.now());
  }

  get state(): SinkState {
    return this.currentState;
  }

  /** Subscribes to state transitions. Returns the unsubscribe function. */
  onStateChange(listener: StateListener): () => void {
    this.listeners.add(listener);
    return () => {
      this.listeners.delete(listener);
    };
  }

  /**
   * Enqueues an event without waiting on any I/O.
   *
   * A full backlog evicts according to its overflow policy. When the sink
   * is connected a drain is scheduled; otherwise the event waits for the
   * next successful connect.
   */
  offer(event: LogEvent): void {
    if (!this.accepts(event)) {
      this.counters.filtered++;
      return;
    }

    this.counters.offered++;
    const result = this.backlog.push({ event, attempts: 0 });
    if (result.evicted) {
      this.counters.evicted++;
    }

    this.afterOffer();
  }

  /**
   * Attempts to (re)establish the backend connection.
   *
   * Resolves `true` when connected. Connect errors are logged and turned
   * into a backoff transition; they never reject.
   */
  async connect(): Promise<boolean> {
    if (this.stopping) return false;
    if (this.currentState.kind === 'connected') return true;
    if (this.currentState.kind === 'connecting') return false;

    this.setState(CONNECTING);

    try {
      await this.openConnection();
    } catch (err: unknown) {
      const error = err instanceof ConnectError
        ? err
        : new ConnectError(this.name, toError(err).message, { cause: err });
      this.counters.failures++;
      this.log.warn({ err: error, sink: this.name }, 'Sink connect failed');
      this.enterBackoff();
      return false;
    }

    if (this.stopping) {
      await this.safeClose();
      this.setState(DISCONNECTED);
      return false;
    }

    this.backoff.reset();
    this.setState(CONNECTED);
    this.log.info({ sink: this.name, backlog: this.backlog.size }, 'Sink connected');
    this.scheduleDrain();
    return true;
  }

  /**
   * Delivers one event directly, bypassing the backlog.
   *
   * Only a connected sink transmits. A failure moves the sink to backoff
   * exactly like a failed drain; a success resets the backoff counter.
   */
  async send(event: LogEvent): Promise<SendResult> {
    if (this.currentState.kind !== 'connected') {
      return { ok: false, error: new SendError(this.name, 'Sink is not connected') };
    }

    const result = await this.deliver([event]);
    if (result.ok) {
      this.counters.sent++;
      this.backoff.reset();
    } else {
      await this.handleSendFailure(result.error, 1);
    }
    return result;
  }

  /** Closes the backend connection and moves to `disconnected`. */
  async disconnect(): Promise<void> {
    await this.safeClose();
    this.setState(DISCONNECTED);
  }

  /**
   * Shutdown: one flush of the backlog bounded by `timeoutMs`, then a
   * forced disconnect whatever the outcome.
   */
  async stop(timeoutMs: number): Promise<void> {
    this.stopping = true;

    if (this.currentState.kind === 'connected' && !this.backlog.isEmpty) {
      let timer: NodeJS.Timeout | undefined;
      const timeout = new Promise<void>((resolve) => {
        timer = setTimeout(resolve, timeoutMs);
      });
      try {
        await Promise.race([this.flushAll(), timeout]);
      } finally {
        clearTimeout(timer);
      }
    }

    await this.disconnect();
    this.log.info({ sink: this.name, remaining: this.backlog.size }, 'Sink stopped');
  }

  stats(): SinkStats {
    return {
      name: this.name,
      kind: this.kind,
      state: describeState(this.currentState),
      backlog: this.backlog.size,
      capacity: this.backlog.capacity,
      ...this.counters,
    };
  }

  protected abstract openConnection(): Promise<void>;
  protected abstract closeConnection(): Promise<void>;
  /** Hands events to the backend; resolves once acknowledged. */
  protected abstract transmit(events: readonly LogEvent[]): Promise<void>;

  /** Offer-time filter. */
  protected accepts(_event: LogEvent): boolean {
    return true;
  }

  /** Called after every offer; per-event sinks drain straight away. */
  protected afterOffer(): void {
    this.scheduleDrain();
  }

  /** Largest number of entries handed to one `transmit` call. */
  protected batchLimit(): number {
    return 1;
  }

  /** Whether the drain loop should send now. */
  protected readyToFlush(): boolean {
    return !this.backlog.isEmpty;
  }

  /** Called after every acknowledged delivery. */
  protected afterFlush(): void {}

  /** True while shutdown is pushing out everything that is left. */
  protected get isFlushingAll(): boolean {
    return this.flushingAll;
  }

  protected setState(next: SinkState): void {
    const previous = this.currentState;
    this.currentState = next;
    if (previous.kind === next.kind && next.kind !== 'backoff') return;

    this.log.debug(
      { sink: this.name, from: describeState(previous), to: describeState(next) },
      'Sink state changed',
    );
    for (const listener of this.listeners) {
      try {
        listener(next);
      } catch (err: unknown) {
        this.log.error({ err, sink: this.name }, 'Sink state listener failed');
      }
    }
  }

  /**
   * To be called by subclasses when the backend reports the connection
   * gone. The handle must already be released.
   */
  protected connectionLost(reason: Error): void {
    if (this.currentState.kind !== 'connected') return;
    this.counters.failures++;
    this.log.warn({ err: reason, sink: this.name }, 'Sink connection lost');
    this.enterBackoff();
  }

  protected scheduleDrain(): void {
    if (this.draining !== null) return;
    if (this.currentState.kind !== 'connected' || !this.readyToFlush()) return;

    this.draining = this.drain().finally(() => {
      this.draining = null;
      this.scheduleDrain();
    });
  }

  private async deliver(events: readonly LogEvent[]): Promise<SendResult> {
    try {
      await this.transmit(events);
      return { ok: true };
    } catch (err: unknown) {
      const error = err instanceof SendError
        ? err
        : new SendError(this.name, toError(err).message, { cause: err });
      return { ok: false, error };
    }
  }

  private async drain(): Promise<void> {
    try {
      while (this.currentState.kind === 'connected' && this.readyToFlush()) {
        const batch = this.backlog.peek(this.batchLimit());
        const result = await this.deliver(batch.map((entry) => entry.event));

        if (result.ok) {
          const delivered = new Set(batch);
          this.backlog.discardHead((entry) => delivered.has(entry));
          this.counters.sent += batch.length;
          this.backoff.reset();
          this.afterFlush();
          continue;
        }

        this.retire(batch);
        await this.handleSendFailure(result.error, batch.length);
        return;
      }
    } catch (err: unknown) {
      this.log.error({ err, sink: this.name }, 'Sink drain loop failed');
    }
  }

  /** Counts a failed attempt on each entry and drops those over the ceiling. */
  private retire(batch: readonly BacklogEntry[]): void {
    for (const entry of batch) entry.attempts++;

    const ceiling = this.maxAttempts;
    if (ceiling === undefined) return;

    const expired = this.backlog.remove((entry) => entry.attempts >= ceiling);
    if (expired > 0) {
      this.counters.expired += expired;
      this.log.warn({ sink: this.name, expired, maxAttempts: ceiling }, 'Dropped entries over retry ceiling');
    }
  }

  private async handleSendFailure(error: SendError, batchSize: number): Promise<void> {
    if (this.currentState.kind !== 'connected') return;

    this.counters.failures++;
    this.log.warn({ err: error, sink: this.name, batchSize }, 'Sink send failed');
    this.enterBackoff();
    await this.safeClose();
  }

  private enterBackoff(): void {
    const { attempt, delayMs } = this.backoff.advance();
    this.setState({ kind: 'backoff', attempt, delayMs, retryAt: this.now() + delayMs });
  }

  private async safeClose(): Promise<void> {
    try {
      await this.closeConnection();
    } catch (err: unknown) {
      this.log.debug({ err, sink: this.name }, 'Error while closing sink connection');
    }
  }

  private async flushAll(): Promise<void> {
    this.flushingAll = true;
    try {
      this.scheduleDrain();
      while (this.draining !== null) {
        await this.draining;
      }
    } finally {
      this.flushingAll = false;
    }
  }
}
