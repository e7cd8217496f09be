import { z } from 'zod';
import type { LogEvent } from '../../domain/index.js';
import { SendError } from '../../domain/index.js';
import { LOG_LEVEL_RANKS } from '../../application/config-schema.js';
import type { LogLevelName } from '../../application/config-schema.js';
import { toPayload } from '../../application/protocol-codec.js';
import { BatchedSink } from '../../application/batched-sink.js';
import type { BatchedSinkOptions } from '../../application/batched-sink.js';

export interface BatchRpcSinkOptions extends BatchedSinkOptions {
  url: string;
  timeoutMs: number;
  /** Events whose `logLevel` ranks below this are not shipped. */
  minLogLevel?: LogLevelName | undefined;
}

/** One entry of a `Log` call: the category plus the event JSON without it. */
export interface LogEntry {
  category: string;
  message: string;
}

/**
 * Collector reply. `TRY_LATER` means the collector is overloaded and kept
 * nothing; the whole batch must be retried.
 */
const logResultSchema = z.object({
  result: z.enum(['OK', 'TRY_LATER']),
});

function isLogLevelName(value: string): value is LogLevelName {
  return Object.hasOwn(LOG_LEVEL_RANKS, value);
}

/**
 * Ships events to a log-collection service in batches: one HTTP POST of
 * `{ messages: LogEntry[] }` per flush.
 */
export class BatchRpcSink extends BatchedSink {
  readonly kind = 'batch-rpc' as const;

  private readonly url: string;
  private readonly timeoutMs: number;
  private readonly minRank: number;

  constructor(options: BatchRpcSinkOptions) {
    super(options);
    this.url = options.url;
    this.timeoutMs = options.timeoutMs;
    this.minRank = options.minLogLevel === undefined ? 0 : LOG_LEVEL_RANKS[options.minLogLevel];
  }

  /** HTTP is connectionless; connecting just re-enables flushing. */
  protected async openConnection(): Promise<void> {}

  protected async closeConnection(): Promise<void> {}

  protected override accepts(event: LogEvent): boolean {
    if (this.minRank === 0) return true;
    const level = event.fields['logLevel'];
    const name = typeof level === 'string' ? level.toUpperCase() : 'INFO';
    if (!isLogLevelName(name)) return true;
    return LOG_LEVEL_RANKS[name] >= this.minRank;
  }

  protected async transmit(events: readonly LogEvent[]): Promise<void> {
    const messages: LogEntry[] = events.map((event) => ({
      category: event.category,
      message: JSON.stringify(toPayload(event)),
    }));

    const response = await fetch(this.url, {
      method: 'POST',
      headers: { 'Content-Type': 'application/json' },
      body: JSON.stringify({ messages }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    const text = await response.text();

    if (!response.ok) {
      throw new SendError(this.name, `Collector returned HTTP ${response.status}`);
    }

    if (parseResult(text) === 'TRY_LATER') {
      throw new SendError(this.name, 'Collector answered TRY_LATER');
    }

    this.log.debug({ sink: this.name, count: messages.length }, 'Batch delivered');
  }
}

/** A 2xx reply without a recognised body counts as `OK`. */
function parseResult(text: string): 'OK' | 'TRY_LATER' {
  if (text.trim() === '') return 'OK';
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return 'OK';
  }
  const parsed = logResultSchema.safeParse(raw);
  return parsed.success ? parsed.data.result : 'OK';
}
