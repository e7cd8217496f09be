import { describe, it, expect } from 'vitest';
import { decode, encode, toPayload, toRecord } from '../../src/application/protocol-codec.js';
import { DecodeError } from '../../src/domain/index.js';
import { makeEvent } from '../helpers.js';

describe('decode', () => {
  it('splits category and JSON fields', () => {
    const result = decode(Buffer.from('metrics: {"value": 1}'));

    expect(result).toEqual({ ok: true, event: { category: 'metrics', fields: { value: 1 } } });
  });

  it('accepts a payload directly after the colon', () => {
    const result = decode('metrics:{"value":1}');

    expect(result.ok).toBe(true);
    if (result.ok) expect(result.event.fields).toEqual({ value: 1 });
  });

  it('ignores a trailing newline', () => {
    const result = decode('app_errors: {"message": "boom"}\r\n');

    expect(result).toEqual({ ok: true, event: { category: 'app_errors', fields: { message: 'boom' } } });
  });

  it('lifts the timestamp out of the fields', () => {
    const result = decode('orders: {"timestamp": 1700000000.5, "total": 12}');

    expect(result).toEqual({
      ok: true,
      event: { category: 'orders', fields: { total: 12 }, timestamp: 1700000000.5 },
    });
  });

  it('keeps a string timestamp as-is', () => {
    const result = decode('orders: {"timestamp": "2024-01-02T03:04:05Z"}');

    expect(result.ok && result.event.timestamp).toBe('2024-01-02T03:04:05Z');
  });

  it('keeps nested values', () => {
    const result = decode('deep: {"a": {"b": [1, true, null, "x"]}}');

    expect(result.ok && result.event.fields).toEqual({ a: { b: [1, true, null, 'x'] } });
  });

  it('rejects a category with characters outside [0-9A-Za-z_]', () => {
    const result = decode('bad-cat: {}');

    expect(result.ok).toBe(false);
    if (!result.ok) {
      expect(result.error).toBeInstanceOf(DecodeError);
      expect(result.error.kind).toBe('InvalidCategory');
      expect(result.error.message).toBe('Invalid category "bad-cat"');
    }
  });

  it('rejects an empty category', () => {
    const result = decode(': {}');
    expect(!result.ok && result.error.kind).toBe('InvalidCategory');
  });

  it('rejects a datagram without a colon', () => {
    const result = decode('just some text');

    expect(!result.ok && result.error.kind).toBe('InvalidCategory');
    expect(!result.ok && result.error.message).toBe('Missing category delimiter');
  });

  it('truncates long categories in the error message', () => {
    const result = decode(`${'x'.repeat(45)}-y: {}`);

    expect(!result.ok && result.error.message).toBe(`Invalid category "${'x'.repeat(40)}…"`);
  });

  it('rejects a payload that is not JSON', () => {
    const result = decode('metrics: {value: 1}');

    expect(!result.ok && result.error.kind).toBe('InvalidPayload');
    expect(!result.ok && result.error.message).toBe('Payload is not valid JSON');
  });

  it('rejects an empty payload', () => {
    const result = decode('metrics:');
    expect(!result.ok && result.error.kind).toBe('InvalidPayload');
  });

  it.each(['[1, 2]', '"text"', '42', 'null'])('rejects non-object payload %s', (payload) => {
    const result = decode(`metrics: ${payload}`);

    expect(!result.ok && result.error.kind).toBe('InvalidPayload');
    expect(!result.ok && result.error.message).toBe('Payload is not a JSON object');
  });

  it('rejects a timestamp that is neither number nor string', () => {
    const result = decode('metrics: {"timestamp": {"seconds": 1}}');

    expect(!result.ok && result.error.message).toBe('timestamp must be a number or a string');
  });
});

describe('encode', () => {
  it('writes category, colon, space and the JSON payload', () => {
    const event = makeEvent('metrics', { value: 1 }, 1700000000);

    expect(encode(event).toString('utf8')).toBe('metrics: {"value":1,"timestamp":1700000000}');
  });

  it('decodes back to the same category, fields and timestamp', () => {
    const event = makeEvent('orders', { total: 12, tags: ['a'] }, 1700000001.25);
    const result = decode(encode(event));

    expect(result).toEqual({
      ok: true,
      event: { category: 'orders', fields: { total: 12, tags: ['a'] }, timestamp: 1700000001.25 },
    });
  });
});

describe('toPayload / toRecord', () => {
  it('toPayload adds only the timestamp', () => {
    expect(toPayload(makeEvent('c', { a: 1 }, 5))).toEqual({ a: 1, timestamp: 5 });
  });

  it('toRecord adds category and timestamp', () => {
    expect(toRecord(makeEvent('c', { a: 1 }, 5))).toEqual({ a: 1, category: 'c', timestamp: 5 });
  });
});
