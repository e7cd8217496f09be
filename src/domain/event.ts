/**
 * Core domain types for the logship event model.
 *
 * These types define the canonical shape of a log event as it flows
 * from a listener through the router into every sink. They carry no
 * framework dependencies.
 */

/** Any value that survives a JSON round trip. */
export type JsonValue =
  | string
  | number
  | boolean
  | null
  | JsonValue[]
  | { [key: string]: JsonValue };

/** Free-form key/value fields attached to every event. Never holds `timestamp`. */
export type EventFields = Readonly<Record<string, JsonValue>>;

/**
 * Seconds since the epoch. Producers may send it as a JSON number or as a
 * string (`"1379002018.000"`); the value is kept exactly as received.
 */
export type EventTimestamp = number | string;

/** Pattern every category must fully match. */
export const CATEGORY_PATTERN = /^[0-9A-Za-z_]+$/;

/**
 * Canonical log event.
 *
 * Built once by a listener and then shared by reference with every sink,
 * so instances are frozen.
 */
export interface LogEvent {
  readonly category: string;
  readonly fields: EventFields;
  readonly timestamp: EventTimestamp;
}

/**
 * A decoded event that may still lack its timestamp.
 * The listener fills the gap from its own clock.
 */
export interface LogEventDraft {
  readonly category: string;
  readonly fields: EventFields;
  readonly timestamp?: EventTimestamp | undefined;
}

export function isValidCategory(category: string): boolean {
  return CATEGORY_PATTERN.test(category);
}

/**
 * Completes a draft into an immutable event.
 *
 * `now` is only consulted when the draft has no timestamp of its own.
 */
export function createLogEvent(draft: LogEventDraft, now: () => number): LogEvent {
  return Object.freeze({
    category: draft.category,
    fields: Object.freeze({ ...draft.fields }),
    timestamp: draft.timestamp ?? now(),
  });
}

/** Wall-clock time as floating-point seconds since the epoch. */
export function epochSeconds(): number {
  return Date.now() / 1000;
}
