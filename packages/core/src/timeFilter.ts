import type { TimeFilter, TimeOfDay } from "@knxlens/contracts";

const TIME_OF_DAY_PATTERN = /^(\d{1,2}):(\d{2})(?::(\d{2}))?$/;
const TIMESTAMP_PATTERN = /^(\d{4})-(\d{2})-(\d{2})[ T](\d{2}):(\d{2}):(\d{2})(?:[.,]\d+)?$/;

export function parseTimeOfDay(input: string): TimeOfDay | null {
  const match = input.trim().match(TIME_OF_DAY_PATTERN);
  if (!match) return null;
  const hours = Number(match[1]);
  const minutes = Number(match[2]);
  const seconds = match[3] === undefined ? 0 : Number(match[3]);
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return { hours, minutes, seconds };
}

export function secondsOfDay(time: TimeOfDay): number {
  return time.hours * 3600 + time.minutes * 60 + time.seconds;
}

export function formatTimeOfDay(time: TimeOfDay): string {
  const pad = (value: number) => String(value).padStart(2, "0");
  return `${pad(time.hours)}:${pad(time.minutes)}:${pad(time.seconds)}`;
}

/** Time-of-day portion of a `YYYY-MM-DD HH:MM:SS[.fff]` log timestamp. */
export function timestampTimeOfDay(timestamp: string): TimeOfDay | null {
  const match = timestamp.trim().match(TIMESTAMP_PATTERN);
  if (!match) return null;
  const month = Number(match[2]);
  const day = Number(match[3]);
  const hours = Number(match[4]);
  const minutes = Number(match[5]);
  const seconds = Number(match[6]);
  if (month < 1 || month > 12 || day < 1 || day > 31) return null;
  if (hours > 23 || minutes > 59 || seconds > 59) return null;
  return { hours, minutes, seconds };
}

export function createTimeFilter(start?: string, end?: string): TimeFilter | null {
  const startTime = start ? parseTimeOfDay(start) : null;
  const endTime = end ? parseTimeOfDay(end) : null;
  if (!startTime && !endTime) return null;
  return { start: startTime, end: endTime };
}

export function isTimeFilterActive(filter: TimeFilter | null): filter is TimeFilter {
  return Boolean(filter && (filter.start || filter.end));
}

/**
 * Inclusive on both bounds. A timestamp that cannot be read is rejected while a filter is set.
 */
export function passesTimeFilter(timestamp: string, filter: TimeFilter | null): boolean {
  if (!isTimeFilterActive(filter)) return true;
  const time = timestampTimeOfDay(timestamp);
  if (!time) return false;
  const value = secondsOfDay(time);
  if (filter.start && value < secondsOfDay(filter.start)) return false;
  if (filter.end && value > secondsOfDay(filter.end)) return false;
  return true;
}
