import { z } from 'zod';
import type { JsonValue } from '../domain/index.js';
import { DecodeError, isValidCategory } from '../domain/index.js';
import type { DecodeResult } from './protocol-codec.js';
import { jsonValueSchema } from './protocol-codec.js';

export const FACILITIES = [
  'kern', 'user', 'mail', 'daemon', 'auth', 'syslog', 'lpr', 'news',
  'uucp', 'cron', 'authpriv', 'ftp', 'ntp', 'audit', 'alert', 'at',
  'local0', 'local1', 'local2', 'local3', 'local4', 'local5', 'local6', 'local7',
] as const;

export const SEVERITIES = ['emerg', 'alert', 'crit', 'err', 'warn', 'notice', 'info', 'debug'] as const;

export type Facility = (typeof FACILITIES)[number];
export type Severity = (typeof SEVERITIES)[number];

/** Severity names rewritten to the level names the rest of the pipeline uses. */
export const LOG_LEVELS: Record<Severity, string> = {
  emerg: 'EMERGENCY',
  alert: 'ALERT',
  crit: 'CRITICAL',
  err: 'ERROR',
  warn: 'WARNING',
  notice: 'NOTICE',
  info: 'INFO',
  debug: 'DEBUG',
};

const MONTHS = ['jan', 'feb', 'mar', 'apr', 'may', 'jun', 'jul', 'aug', 'sep', 'oct', 'nov', 'dec'];

/**
 * RFC 3164 line: `<PRI>Mmm dd hh:mm:ss host tag[pid]: message`, optionally
 * followed by `@cee: {json}` carrying structured fields.
 */
const SYSLOG_LINE =
  /^<(?<priority>\d+)>(?<timestamp>\w{3} [ 1-9]\d \d\d:\d\d:\d\d) (?<hostname>[\w.-]+) (?<tag>[\w.-]+)(?:\[(?<pid>\d+)\])?: ?(?<content>(?<message>.*?)(?: ?@cee: (?<cee>.*))?)$/is;

const TIMESTAMP = /^(?<month>\w{3}) +(?<day>\d{1,2}) (?<hour>\d\d):(?<minute>\d\d):(?<second>\d\d)$/;

const ceeSchema = z.record(z.string(), jsonValueSchema);

export type SyslogTimezone = 'local' | 'utc';

export interface SyslogParseOptions {
  /** Millisecond clock; supplies the year syslog timestamps leave out. */
  now: () => number;
  timezone: SyslogTimezone;
  /** Rewrites reported hostnames, e.g. short names to FQDNs. */
  hostnames?: Readonly<Record<string, string>> | undefined;
}

/** Splits a priority into facility and severity; undefined for values over 191. */
export function parsePriority(priority: number): { facility: Facility; severity: Severity } | undefined {
  const facility = FACILITIES[Math.floor(priority / 8)];
  const severity = SEVERITIES[priority % 8];
  if (facility === undefined || severity === undefined) return undefined;
  return { facility, severity };
}

/** Seconds since the epoch for a year-less syslog timestamp. */
export function parseSyslogTimestamp(
  text: string,
  year: number,
  timezone: SyslogTimezone,
): number | undefined {
  const match = TIMESTAMP.exec(text);
  const groups = match?.groups;
  if (!groups) return undefined;

  const month = MONTHS.indexOf((groups['month'] ?? '').toLowerCase());
  if (month === -1) return undefined;

  const day = Number(groups['day']);
  const hour = Number(groups['hour']);
  const minute = Number(groups['minute']);
  const second = Number(groups['second']);

  const millis = timezone === 'utc'
    ? Date.UTC(year, month, day, hour, minute, second)
    : new Date(year, month, day, hour, minute, second).getTime();

  return Number.isNaN(millis) ? undefined : millis / 1000;
}

/**
 * Converts one syslog datagram into an event draft.
 *
 * Category is `syslog` unless the CEE payload names another valid one.
 * Lines that do not follow RFC 3164 are shipped whole as `message`, without
 * a timestamp. Unparseable CEE keeps the full content as the message.
 */
export function parseSyslog(datagram: Buffer | string, options: SyslogParseOptions): DecodeResult {
  const line = (typeof datagram === 'string' ? datagram : datagram.toString('utf8')).trimEnd();
  const groups = SYSLOG_LINE.exec(line)?.groups;

  if (!groups) {
    return { ok: true, event: { category: 'syslog', fields: { message: line } } };
  }

  const fields: Record<string, JsonValue> = {};

  const priority = parsePriority(Number(groups['priority']));
  if (priority) {
    fields['facility'] = priority.facility;
    fields['logLevel'] = LOG_LEVELS[priority.severity];
  }

  const hostname = groups['hostname'] ?? '';
  fields['hostname'] = options.hostnames?.[hostname] ?? hostname;
  fields['appname'] = groups['tag'] ?? '';
  if (groups['pid'] !== undefined) {
    fields['pid'] = groups['pid'];
  }
  fields['message'] = groups['message'] ?? '';

  const year = options.timezone === 'utc'
    ? new Date(options.now()).getUTCFullYear()
    : new Date(options.now()).getFullYear();
  let timestamp: number | string | undefined = parseSyslogTimestamp(
    groups['timestamp'] ?? '',
    year,
    options.timezone,
  );

  let category = 'syslog';
  const cee = groups['cee'];
  if (cee !== undefined) {
    const parsed = parseCee(cee);
    if (parsed === undefined) {
      fields['message'] = groups['content'] ?? '';
    } else {
      const { category: ceeCategory, timestamp: ceeTimestamp, ...rest } = parsed;
      Object.assign(fields, rest);

      if (ceeCategory !== undefined) {
        if (typeof ceeCategory !== 'string' || !isValidCategory(ceeCategory)) {
          return { ok: false, error: invalidCategory(ceeCategory) };
        }
        category = ceeCategory;
      }
      if (typeof ceeTimestamp === 'number' || typeof ceeTimestamp === 'string') {
        timestamp = ceeTimestamp;
      }
    }
  }

  return {
    ok: true,
    event: timestamp === undefined ? { category, fields } : { category, fields, timestamp },
  };
}

function parseCee(text: string): Record<string, JsonValue> | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = ceeSchema.safeParse(raw);
  return parsed.success ? parsed.data : undefined;
}

function invalidCategory(value: JsonValue): DecodeError {
  return new DecodeError('InvalidCategory', `Invalid CEE category ${JSON.stringify(value)}`);
}
