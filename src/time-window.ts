// ABOUTME: Parses ISO 8601 time instants and start/end ranges into inclusive time windows
// ABOUTME: Accepts or rejects log record timestamps against a window, honouring each record's UTC offset

import { ConfigurationError } from './errors.js';
import { utcTimestamp } from './log-record-parser.js';
import type { LogRecord, TimeBound, TimeWindow } from './types.js';

const DAY_MS = 86_400_000;
const MAX_UTC_OFFSET_MS = 14 * 3_600_000;

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DATETIME_PATTERN =
  /^(\d{4})-(\d{2})-(\d{2})[T ](\d{2}):(\d{2})(?::(\d{2}))?(Z|[+-]\d{2}:?\d{2})?$/;

function toInt(value: string | undefined): number {
  return value === undefined ? 0 : parseInt(value, 10);
}

function wallClockMs(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number {
  const ms = utcTimestamp(year, month - 1, day, hour, minute, second);
  const check = new Date(ms);
  if (
    check.getUTCFullYear() !== year ||
    check.getUTCMonth() !== month - 1 ||
    check.getUTCDate() !== day ||
    hour > 23 || minute > 59 || second > 59
  ) {
    return NaN;
  }
  return ms;
}

function parseOffsetMinutes(offset: string): number {
  if (offset === 'Z') {
    return 0;
  }
  const digits = offset.substring(1).replace(':', '');
  const hours = parseInt(digits.substring(0, 2), 10);
  const minutes = parseInt(digits.substring(2, 4), 10);
  if (hours > 23 || minutes > 59) {
    return NaN;
  }
  return (offset.startsWith('-') ? -1 : 1) * (hours * 60 + minutes);
}

/**
 * Parse one bound: "2018-01-23", "2018-01-23T13:09:45" or "2018-01-23T13:09:45+01:00"
 */
export function parseTimeBound(value: string): TimeBound {
  const text = value.trim();

  const dateMatch = DATE_PATTERN.exec(text);
  if (dateMatch) {
    const lowerMs = wallClockMs(toInt(dateMatch[1]), toInt(dateMatch[2]), toInt(dateMatch[3]));
    if (Number.isNaN(lowerMs)) {
      throw new ConfigurationError(`Invalid date "${value}"`);
    }
    return { granularity: 'date', reference: 'local', lowerMs, upperMs: lowerMs + DAY_MS - 1 };
  }

  const dtMatch = DATETIME_PATTERN.exec(text);
  if (dtMatch) {
    const [, year, month, day, hour, minute, second, offset] = dtMatch;
    const wall = wallClockMs(
      toInt(year), toInt(month), toInt(day), toInt(hour), toInt(minute), toInt(second)
    );
    if (Number.isNaN(wall)) {
      throw new ConfigurationError(`Invalid datetime "${value}"`);
    }

    if (offset === undefined) {
      return { granularity: 'datetime', reference: 'local', lowerMs: wall, upperMs: wall };
    }

    const offsetMinutes = parseOffsetMinutes(offset);
    if (Number.isNaN(offsetMinutes)) {
      throw new ConfigurationError(`Invalid UTC offset in "${value}"`);
    }
    const instant = wall - offsetMinutes * 60_000;
    return { granularity: 'datetime', reference: 'absolute', lowerMs: instant, upperMs: instant };
  }

  throw new ConfigurationError(
    `Time value "${value}" is neither YYYY-MM-DD nor YYYY-MM-DDTHH:MM:SS[offset]`
  );
}

function isOpenBound(value: string): boolean {
  const text = value.trim();
  return text.length === 0 || text === '..';
}

/**
 * Parse a time specification: an instant ("2018-01-23"), or a range
 * ("2018-01-01/2018-01-31") where either side may be left open ("2018-01-01/", "../2018-01-31")
 */
export function parseTimeWindow(spec: string): TimeWindow {
  const parts = spec.split('/');

  if (parts.length === 1) {
    if (isOpenBound(parts[0])) {
      throw new ConfigurationError('Time specification is empty');
    }
    const bound = parseTimeBound(parts[0]);
    return { start: bound, end: bound };
  }

  if (parts.length !== 2) {
    throw new ConfigurationError(`Time range "${spec}" must have the form start/end`);
  }

  const [startText, endText] = parts;
  const window: TimeWindow = {};
  if (!isOpenBound(startText)) {
    window.start = parseTimeBound(startText);
  }
  if (!isOpenBound(endText)) {
    window.end = parseTimeBound(endText);
  }

  if (!window.start && !window.end) {
    throw new ConfigurationError(`Time range "${spec}" has no bounds`);
  }

  validateTimeWindow(window);
  return window;
}

/**
 * Reject windows no record can satisfy. A local bound and an absolute bound
 * differ by the record's UTC offset, which is at most 14 hours either way.
 */
export function validateTimeWindow(window: TimeWindow): void {
  const { start, end } = window;
  if (!start || !end) {
    return;
  }
  const slack = start.reference === end.reference ? 0 : MAX_UTC_OFFSET_MS;
  if (start.lowerMs - end.upperMs > slack) {
    throw new ConfigurationError('Time window start is after its end');
  }
}

function recordValue(
  record: Pick<LogRecord, 'timestamp' | 'utcOffsetMinutes'>,
  bound: TimeBound
): number {
  return bound.reference === 'local'
    ? record.timestamp + record.utcOffsetMinutes * 60_000
    : record.timestamp;
}

export function isWithinWindow(
  record: Pick<LogRecord, 'timestamp' | 'utcOffsetMinutes'>,
  window: TimeWindow
): boolean {
  if (window.start && recordValue(record, window.start) < window.start.lowerMs) {
    return false;
  }
  if (window.end && recordValue(record, window.end) > window.end.upperMs) {
    return false;
  }
  return true;
}

export type TimeFilter = (record: Pick<LogRecord, 'timestamp' | 'utcOffsetMinutes'>) => boolean;

/**
 * Build the accept/reject predicate; without a window every record is accepted
 */
export function createTimeFilter(window?: TimeWindow): TimeFilter {
  if (!window) {
    return () => true;
  }
  validateTimeWindow(window);
  return record => isWithinWindow(record, window);
}
