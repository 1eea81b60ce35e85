import {describe, expect, it} from 'vitest';

import {formatTimestampObject, parseRfc3339Timestamp} from '../index';

describe('parseRfc3339Timestamp', () => {
  it('converts UTC timestamps to epoch seconds and nanos', () => {
    expect(parseRfc3339Timestamp('2015-05-18T23:58:36.000Z')).toEqual({
      ok: true,
      value: {seconds: 1431993516, nanos: 0}
    });
    expect(parseRfc3339Timestamp('2015-05-18T23:58:36Z')).toEqual({
      ok: true,
      value: {seconds: 1431993516, nanos: 0}
    });
    expect(parseRfc3339Timestamp('1970-01-01T00:00:00Z')).toEqual({
      ok: true,
      value: {seconds: 0, nanos: 0}
    });
  });

  it('keeps sub-millisecond precision up to nanoseconds', () => {
    const full = parseRfc3339Timestamp('2015-05-18T23:58:36.123456789Z');
    const partial = parseRfc3339Timestamp('2015-05-18T23:58:36.1234Z');

    expect(full.ok && full.value.nanos).toBe(123456789);
    expect(partial.ok && partial.value.nanos).toBe(123400000);
  });

  it('truncates fractions longer than nanosecond precision', () => {
    expect(parseRfc3339Timestamp('2015-05-18T23:58:36.123456789012Z')).toEqual({
      ok: true,
      value: {seconds: 1431993516, nanos: 123456789}
    });
    expect(parseRfc3339Timestamp('1969-12-31T23:59:59.9999999999Z')).toEqual({
      ok: true,
      value: {seconds: -1, nanos: 999999999}
    });
  });

  it('applies numeric offsets', () => {
    expect(parseRfc3339Timestamp('2015-05-19T01:58:36.5+02:00')).toEqual({
      ok: true,
      value: {seconds: 1431993516, nanos: 500000000}
    });
    expect(parseRfc3339Timestamp('2015-05-18T23:58:36-07:30')).toEqual({
      ok: true,
      value: {seconds: 1432020516, nanos: 0}
    });
  });

  it('returns negative seconds with positive nanos before the epoch', () => {
    expect(parseRfc3339Timestamp('1969-12-31T23:59:59.999999999Z')).toEqual({
      ok: true,
      value: {seconds: -1, nanos: 999999999}
    });
  });

  it('accepts leap days and rejects impossible dates', () => {
    expect(parseRfc3339Timestamp('2016-02-29T00:00:00Z')).toEqual({
      ok: true,
      value: {seconds: 1456704000, nanos: 0}
    });
    expect(parseRfc3339Timestamp('2015-02-29T00:00:00Z').ok).toBe(false);
    expect(parseRfc3339Timestamp('2015-04-31T00:00:00Z').ok).toBe(false);
    expect(parseRfc3339Timestamp('2015-13-01T00:00:00Z').ok).toBe(false);
  });

  it('rejects values outside the RFC3339 profile', () => {
    const rejected = [
      '',
      'invalid',
      'Mon May 18 23:58:36 UTC 2015',
      '2015-05-18',
      '2015-05-18T23:58:36',
      '2015-05-18 23:58:36Z',
      '2015-05-18T24:00:00Z',
      '2015-05-18T23:60:00Z',
      ' 2015-05-18T23:58:36Z'
    ];

    for (const value of rejected) {
      const result = parseRfc3339Timestamp(value);
      expect(result.ok, value).toBe(false);
      if (!result.ok) {
        expect(result.error.code, value).toBe('timestamp_format_invalid');
      }
    }
  });
});

describe('formatTimestampObject', () => {
  it('renders seconds and nanos as bare JSON numbers', () => {
    expect(formatTimestampObject({seconds: 1431993516, nanos: 0})).toBe('{"seconds": 1431993516, "nanos": 0}');
    expect(formatTimestampObject({seconds: -1, nanos: 999999999})).toBe('{"seconds": -1, "nanos": 999999999}');
  });
});
