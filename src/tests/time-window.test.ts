// ABOUTME: Tests for time window parsing and record filtering
// ABOUTME: Covers date/datetime granularity, open-ended ranges, UTC offsets and inverted ranges

import { describe, it, expect } from 'vitest';
import { createTimeFilter, parseTimeBound, parseTimeWindow } from '../time-window.js';
import { parseAccessLogTimestamp } from '../log-record-parser.js';
import { ConfigurationError } from '../errors.js';

const DAY_MS = 86_400_000;

function at(logTimestamp: string) {
  const parsed = parseAccessLogTimestamp(logTimestamp);
  if (!parsed) {
    throw new Error(`bad fixture timestamp ${logTimestamp}`);
  }
  return parsed;
}

describe('parseTimeWindow', () => {
  it('expands a single date to the whole day', () => {
    const window = parseTimeWindow('2018-01-23');

    expect(window.start).toEqual({
      granularity: 'date',
      reference: 'local',
      lowerMs: Date.UTC(2018, 0, 23),
      upperMs: Date.UTC(2018, 0, 23) + DAY_MS - 1,
    });
    expect(window.end).toEqual(window.start);
  });

  it('parses ranges with open ends', () => {
    expect(parseTimeWindow('2018-01-23/').end).toBeUndefined();
    expect(parseTimeWindow('../2018-01-23').start).toBeUndefined();
    expect(parseTimeWindow('/2018-01-23T10:00:00').end?.granularity).toBe('datetime');
  });

  it('parses datetimes with offsets as absolute instants', () => {
    expect(parseTimeBound('2018-01-23T13:00:00+01:00')).toEqual({
      granularity: 'datetime',
      reference: 'absolute',
      lowerMs: Date.UTC(2018, 0, 23, 12, 0, 0),
      upperMs: Date.UTC(2018, 0, 23, 12, 0, 0),
    });
    expect(parseTimeBound('2018-01-23T13:00:00Z').lowerMs).toBe(Date.UTC(2018, 0, 23, 13));
    expect(parseTimeBound('2018-01-23T13:00-0230').lowerMs).toBe(Date.UTC(2018, 0, 23, 15, 30));
  });

  it('rejects a start after the end', () => {
    expect(() => parseTimeWindow('2018-01-24/2018-01-23')).toThrow(ConfigurationError);
    expect(() => parseTimeWindow('2018-01-23T10:00:01/2018-01-23T10:00:00')).toThrow('start is after its end');
  });

  it('allows a range within a single day', () => {
    expect(() => parseTimeWindow('2018-01-23/2018-01-23T00:00:00')).not.toThrow();
  });

  it('accepts a range mixing an offset start with a local end', () => {
    const window = parseTimeWindow('2018-01-23T10:00:00-05:00/2018-01-23T12:00:00');
    const accept = createTimeFilter(window);

    expect(window.start?.reference).toBe('absolute');
    expect(window.end?.reference).toBe('local');
    expect(accept(at('23/Jan/2018:12:00:00 -0500'))).toBe(true);
    expect(accept(at('23/Jan/2018:14:59:59 +0000'))).toBe(false);
  });

  it('rejects mixed ranges that no UTC offset can reconcile', () => {
    expect(() => parseTimeWindow('2018-01-24T12:00:00Z/2018-01-23T12:00:00')).toThrow('start is after its end');
    expect(() => parseTimeWindow('2018-01-24T12:00:00/2018-01-23T12:00:00Z')).toThrow(ConfigurationError);
  });

  it('keeps years below 100 in the first century', () => {
    expect(parseTimeBound('0050-01-01').lowerMs).toBe(Date.parse('0050-01-01T00:00:00Z'));
  });

  it('rejects malformed specifications', () => {
    expect(() => parseTimeWindow('2018-13-01')).toThrow(ConfigurationError);
    expect(() => parseTimeWindow('2018-02-30')).toThrow(ConfigurationError);
    expect(() => parseTimeWindow('yesterday')).toThrow(ConfigurationError);
    expect(() => parseTimeWindow('/')).toThrow(ConfigurationError);
    expect(() => parseTimeWindow('')).toThrow(ConfigurationError);
    expect(() => parseTimeWindow('2018-01-01/2018-01-02/2018-01-03')).toThrow(ConfigurationError);
  });
});

describe('createTimeFilter', () => {
  it('accepts everything without a window', () => {
    const accept = createTimeFilter();
    expect(accept(at('01/Jan/1999:00:00:00 +0000'))).toBe(true);
  });

  it('accepts the whole calendar day for a bare date', () => {
    const accept = createTimeFilter(parseTimeWindow('2018-01-24'));

    expect(accept(at('24/Jan/2018:00:00:00 +0000'))).toBe(true);
    expect(accept(at('24/Jan/2018:23:59:59 +0000'))).toBe(true);
    expect(accept(at('23/Jan/2018:23:59:59 +0000'))).toBe(false);
    expect(accept(at('25/Jan/2018:00:00:00 +0000'))).toBe(false);
  });

  it('accepts the start day and later for a start-only date window', () => {
    const accept = createTimeFilter(parseTimeWindow('2018-01-24/'));

    expect(accept(at('24/Jan/2018:00:00:00 +0000'))).toBe(true);
    expect(accept(at('15/Mar/2030:12:00:00 +0000'))).toBe(true);
    expect(accept(at('23/Jan/2018:23:59:59 +0000'))).toBe(false);
  });

  it('uses the record offset for date bounds', () => {
    const accept = createTimeFilter(parseTimeWindow('2018-01-24'));

    // 22:30 UTC on the 23rd, but the 24th where it was logged
    expect(accept(at('24/Jan/2018:00:30:00 +0200'))).toBe(true);
    expect(accept(at('23/Jan/2018:23:30:00 -0500'))).toBe(false);
  });

  it('compares instants for bounds carrying an offset', () => {
    const accept = createTimeFilter(parseTimeWindow('2018-01-24T00:00:00Z/'));

    expect(accept(at('24/Jan/2018:00:30:00 +0200'))).toBe(false);
    expect(accept(at('24/Jan/2018:02:30:00 +0200'))).toBe(true);
    expect(accept(at('23/Jan/2018:19:00:00 -0500'))).toBe(true);
  });

  it('matches a single datetime to the second', () => {
    const accept = createTimeFilter(parseTimeWindow('2018-01-23T13:09:45'));

    expect(accept(at('23/Jan/2018:13:09:45 +0000'))).toBe(true);
    expect(accept(at('23/Jan/2018:13:09:46 +0000'))).toBe(false);
  });

  it('treats both bounds as inclusive', () => {
    const accept = createTimeFilter(parseTimeWindow('2018-01-23T10:00:00/2018-01-23T11:00:00'));

    expect(accept(at('23/Jan/2018:10:00:00 +0000'))).toBe(true);
    expect(accept(at('23/Jan/2018:11:00:00 +0000'))).toBe(true);
    expect(accept(at('23/Jan/2018:11:00:01 +0000'))).toBe(false);
  });
});
