// ABOUTME: Parses Apache/nginx common and combined access-log lines into LogRecord objects
// ABOUTME: Malformed lines come back as skip results carrying a reason, never as exceptions

import { MalformedLineError } from './errors.js';
import type { LogRecord, ParseResult, SkipReason } from './types.js';

// host ident authuser [timestamp] "request line" status size ["referer" "user-agent"]
const ACCESS_LOG_PATTERN =
  /^(\S+) \S+ \S+ \[([^\]]+)\] "((?:[^"\\]|\\.)*)" (\S+) (\S+)(?: "((?:[^"\\]|\\.)*)" "((?:[^"\\]|\\.)*)")?/;

// 23/Jan/2018:13:09:45 +0000
const TIMESTAMP_PATTERN =
  /^(\d{2})\/([A-Za-z]{3})\/(\d{4}):(\d{2}):(\d{2}):(\d{2}) ([+-])(\d{2})(\d{2})$/;

const MONTHS: Record<string, number> = {
  jan: 0, feb: 1, mar: 2, apr: 3, may: 4, jun: 5,
  jul: 6, aug: 7, sep: 8, oct: 9, nov: 10, dec: 11,
};

function skip(reason: SkipReason, detail: string): ParseResult {
  return { ok: false, reason, detail };
}

/**
 * Epoch ms of a UTC wall clock (month 0-11). Unlike Date.UTC, years 0-99 stay in the first century.
 */
export function utcTimestamp(year: number, month: number, day: number, hour = 0, minute = 0, second = 0): number {
  const date = new Date(Date.UTC(2000, 0, 1, hour, minute, second));
  date.setUTCFullYear(year, month, day);
  return date.getTime();
}

function daysInMonth(year: number, month: number): number {
  return new Date(utcTimestamp(year, month + 1, 0)).getUTCDate();
}

/**
 * Parse the bracketed access-log timestamp into a UTC instant and its offset
 */
export function parseAccessLogTimestamp(
  value: string
): { timestamp: number; utcOffsetMinutes: number } | null {
  const match = TIMESTAMP_PATTERN.exec(value);
  if (!match) {
    return null;
  }

  const [, dayStr, monthStr, yearStr, hourStr, minuteStr, secondStr, sign, offHourStr, offMinuteStr] = match;
  const month = MONTHS[monthStr.toLowerCase()];
  if (month === undefined) {
    return null;
  }

  const year = parseInt(yearStr, 10);
  const day = parseInt(dayStr, 10);
  const hour = parseInt(hourStr, 10);
  const minute = parseInt(minuteStr, 10);
  const second = parseInt(secondStr, 10);
  const offHours = parseInt(offHourStr, 10);
  const offMinutes = parseInt(offMinuteStr, 10);

  if (day < 1 || day > daysInMonth(year, month) || hour > 23 || minute > 59 || second > 59) {
    return null;
  }
  if (offHours > 23 || offMinutes > 59) {
    return null;
  }

  const utcOffsetMinutes = (sign === '-' ? -1 : 1) * (offHours * 60 + offMinutes);
  const wallClock = utcTimestamp(year, month, day, hour, minute, second);

  return { timestamp: wallClock - utcOffsetMinutes * 60_000, utcOffsetMinutes };
}

export function parseLogLine(line: string): ParseResult {
  if (line.trim().length === 0) {
    return skip('empty-line', 'Line is empty');
  }

  const match = ACCESS_LOG_PATTERN.exec(line);
  if (!match) {
    return skip('layout', 'Line does not match the common/combined access-log layout');
  }

  const [, clientAddress, rawTimestamp, requestLine, statusStr, sizeStr, referer, userAgent] = match;

  const time = parseAccessLogTimestamp(rawTimestamp);
  if (!time) {
    return skip('timestamp', `Timestamp "${rawTimestamp}" does not match dd/Mon/yyyy:HH:MM:SS +hhmm`);
  }

  const requestTokens = requestLine.split(' ').filter(token => token.length > 0);
  if (requestTokens.length !== 3) {
    return skip('layout', `Request line "${requestLine}" is not "METHOD TARGET PROTOCOL"`);
  }
  const [method, target, protocol] = requestTokens;

  if (!/^\d{3}$/.test(statusStr)) {
    return skip('status', `Status code "${statusStr}" is not numeric`);
  }

  let size = 0;
  if (sizeStr !== '-') {
    if (!/^\d+$/.test(sizeStr)) {
      return skip('size', `Response size "${sizeStr}" is neither numeric nor "-"`);
    }
    size = parseInt(sizeStr, 10);
  }

  const record: LogRecord = {
    clientAddress,
    timestamp: time.timestamp,
    utcOffsetMinutes: time.utcOffsetMinutes,
    method,
    target,
    protocol,
    status: parseInt(statusStr, 10),
    size,
  };
  if (referer !== undefined) {
    record.referer = referer;
  }
  if (userAgent !== undefined) {
    record.userAgent = userAgent;
  }

  return { ok: true, record: Object.freeze(record) };
}

/**
 * Throwing variant for callers handling a single line outside the pipeline
 */
export function parseLogLineOrThrow(line: string): LogRecord {
  const result = parseLogLine(line);
  if (!result.ok) {
    throw new MalformedLineError(result.reason, result.detail);
  }
  return result.record;
}
