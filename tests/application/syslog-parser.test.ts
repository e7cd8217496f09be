import { describe, it, expect } from 'vitest';
import { parsePriority, parseSyslog, parseSyslogTimestamp } from '../../src/application/syslog-parser.js';
import type { SyslogParseOptions } from '../../src/application/syslog-parser.js';

const NOW = Date.UTC(2023, 0, 15, 12, 0, 0);
const options: SyslogParseOptions = { now: () => NOW, timezone: 'utc' };

describe('parsePriority', () => {
  it('splits facility and severity', () => {
    expect(parsePriority(13)).toEqual({ facility: 'user', severity: 'notice' });
    expect(parsePriority(0)).toEqual({ facility: 'kern', severity: 'emerg' });
    expect(parsePriority(191)).toEqual({ facility: 'local7', severity: 'debug' });
  });

  it('returns undefined past the last facility', () => {
    expect(parsePriority(192)).toBeUndefined();
  });
});

describe('parseSyslogTimestamp', () => {
  it('fills in the year and reads the time as UTC', () => {
    expect(parseSyslogTimestamp('Feb  3 04:05:06', 2024, 'utc')).toBe(Date.UTC(2024, 1, 3, 4, 5, 6) / 1000);
  });

  it('reads the time as local when asked to', () => {
    expect(parseSyslogTimestamp('Oct 11 22:14:15', 2023, 'local')).toBe(
      new Date(2023, 9, 11, 22, 14, 15).getTime() / 1000,
    );
  });

  it('rejects an unknown month', () => {
    expect(parseSyslogTimestamp('Foo 11 22:14:15', 2023, 'utc')).toBeUndefined();
  });
});

describe('parseSyslog', () => {
  it('turns an RFC 3164 line into syslog fields', () => {
    const result = parseSyslog('<13>Oct 11 22:14:15 myhost myapp[123]: Something happened\n', options);

    expect(result).toEqual({
      ok: true,
      event: {
        category: 'syslog',
        fields: {
          facility: 'user',
          logLevel: 'NOTICE',
          hostname: 'myhost',
          appname: 'myapp',
          pid: '123',
          message: 'Something happened',
        },
        timestamp: Date.UTC(2023, 9, 11, 22, 14, 15) / 1000,
      },
    });
  });

  it('omits pid when the tag has none', () => {
    const result = parseSyslog('<14>Oct 11 22:14:15 myhost cron: job done', options);

    expect(result.ok && result.event.fields).toEqual({
      facility: 'user',
      logLevel: 'INFO',
      hostname: 'myhost',
      appname: 'cron',
      message: 'job done',
    });
  });

  it('merges CEE fields and takes category and timestamp from them', () => {
    const result = parseSyslog(
      '<14>Oct 11 22:14:15 web01 checkout: order placed @cee: {"category":"orders","total":12,"timestamp":1700000000}',
      options,
    );

    expect(result).toEqual({
      ok: true,
      event: {
        category: 'orders',
        fields: {
          facility: 'user',
          logLevel: 'INFO',
          hostname: 'web01',
          appname: 'checkout',
          message: 'order placed',
          total: 12,
        },
        timestamp: 1700000000,
      },
    });
  });

  it('keeps the whole content as message when CEE is not JSON', () => {
    const result = parseSyslog('<14>Oct 11 22:14:15 web01 checkout: hello @cee: {not json', options);

    expect(result.ok && result.event.fields['message']).toBe('hello @cee: {not json');
    expect(result.ok && result.event.category).toBe('syslog');
  });

  it('rejects a CEE category that is not a valid category', () => {
    const result = parseSyslog('<14>Oct 11 22:14:15 web01 checkout: x @cee: {"category":"bad-cat"}', options);

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error.kind).toBe('InvalidCategory');
      expect(result.error.message).toBe('Invalid CEE category "bad-cat"');
    }
  });

  it('rewrites hostnames through the mapping', () => {
    const result = parseSyslog('<14>Oct 11 22:14:15 web01 app: hi', {
      ...options,
      hostnames: { web01: 'web01.example.test' },
    });

    expect(result.ok && result.event.fields['hostname']).toBe('web01.example.test');
  });

  it('ships lines that are not RFC 3164 whole, without a timestamp', () => {
    const result = parseSyslog('plain text from somewhere', options);

    expect(result).toEqual({
      ok: true,
      event: { category: 'syslog', fields: { message: 'plain text from somewhere' } },
    });
  });

  it('leaves out facility and level for an out-of-range priority', () => {
    const result = parseSyslog('<999>Oct 11 22:14:15 h app: m', options);

    expect(result.ok && result.event.fields).toEqual({ hostname: 'h', appname: 'app', message: 'm' });
  });
});
