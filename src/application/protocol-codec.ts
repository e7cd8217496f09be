import { z } from 'zod';
import type { JsonValue, LogEvent, LogEventDraft } from '../domain/index.js';
import { DecodeError, isValidCategory } from '../domain/index.js';
import type { DecodeErrorKind } from '../domain/index.js';

/**
 * Zod schema for any JSON value.
 *
 * `JSON.parse` already guarantees the shape at runtime; the schema gives
 * the parsed payload a precise static type without casting.
 */
export const jsonValueSchema: z.ZodType<JsonValue> = z.lazy(() =>
  z.union([
    z.string(),
    z.number(),
    z.boolean(),
    z.null(),
    z.array(jsonValueSchema),
    z.record(z.string(), jsonValueSchema),
  ]),
);

/** The part after the colon must be a JSON object. */
const payloadSchema = z.record(z.string(), jsonValueSchema);

/** Longest category fragment quoted back in error messages. */
const MAX_QUOTED = 40;

/**
 * Outcome of decoding one datagram.
 * Returns a discriminated result so the listener decides how to count failures.
 */
export type DecodeResult =
  | { readonly ok: true; readonly event: LogEventDraft }
  | { readonly ok: false; readonly error: DecodeError };

function fail(kind: DecodeErrorKind, message: string, cause?: unknown): DecodeResult {
  return {
    ok: false,
    error: new DecodeError(kind, message, cause === undefined ? undefined : { cause }),
  };
}

function quote(text: string): string {
  return text.length > MAX_QUOTED ? `${text.slice(0, MAX_QUOTED)}…` : text;
}

/**
 * Decodes `<category>:<SP>?<json-object>`.
 *
 * - Trailing whitespace (a newline from `echo`, typically) is ignored.
 * - At most one whitespace character after the colon is skipped.
 * - A `timestamp` key is lifted out of `fields` unchanged; it must be a
 *   number or a string. When absent the draft has no timestamp.
 */
export function decode(datagram: Buffer | string): DecodeResult {
  const text = (typeof datagram === 'string' ? datagram : datagram.toString('utf8')).trimEnd();

  const colon = text.indexOf(':');
  if (colon === -1) {
    return fail('InvalidCategory', 'Missing category delimiter');
  }

  const category = text.slice(0, colon);
  if (!isValidCategory(category)) {
    return fail('InvalidCategory', `Invalid category "${quote(category)}"`);
  }

  let offset = colon + 1;
  if (/\s/.test(text.charAt(offset))) offset++;

  let raw: unknown;
  try {
    raw = JSON.parse(text.slice(offset));
  } catch (err: unknown) {
    return fail('InvalidPayload', 'Payload is not valid JSON', err);
  }

  const parsed = payloadSchema.safeParse(raw);
  if (!parsed.success) {
    return fail('InvalidPayload', 'Payload is not a JSON object');
  }

  const { timestamp, ...fields } = parsed.data;
  if (timestamp !== undefined && typeof timestamp !== 'number' && typeof timestamp !== 'string') {
    return fail('InvalidPayload', 'timestamp must be a number or a string');
  }

  return {
    ok: true,
    event: timestamp === undefined ? { category, fields } : { category, fields, timestamp },
  };
}

/** The JSON object carried after the colon: fields plus timestamp. */
export function toPayload(event: LogEvent): Record<string, JsonValue> {
  return { ...event.fields, timestamp: event.timestamp };
}

/**
 * One flat JSON document per event, the shape downstream collectors
 * (Logstash, Redis consumers) index: fields, category and timestamp.
 */
export function toRecord(event: LogEvent): Record<string, JsonValue> {
  return { ...event.fields, category: event.category, timestamp: event.timestamp };
}

/** Encodes an event as `<category>: <json-object>`. Inverse of `decode`. */
export function encode(event: LogEvent): Buffer {
  return Buffer.from(`${event.category}: ${JSON.stringify(toPayload(event))}`, 'utf8');
}
