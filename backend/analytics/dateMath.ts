import type { ISODateString, ISODateTimeString } from "../domain/Primitives";

// Calendar arithmetic on UTC day numbers.
// A calendar day never depends on the host timezone.

export const DAY_MS = 24 * 60 * 60 * 1000;

const ISO_DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})/;

export function isValidISODate(value: string): boolean {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) return false;
  const ms = Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3]));
  return new Date(ms).toISOString().substring(0, 10) === match[0];
}

// Days since 1970-01-01 for the calendar day the string starts with.
// Accepts "YYYY-MM-DD" and full date-times; the time part is ignored.
export function toDayNumber(value: ISODateString | ISODateTimeString): number {
  const match = ISO_DATE_PATTERN.exec(value);
  if (!match) throw new Error(`Invalid ISO date: ${value}`);
  return Math.floor(Date.UTC(Number(match[1]), Number(match[2]) - 1, Number(match[3])) / DAY_MS);
}

export function fromDayNumber(day: number): ISODateString {
  return new Date(day * DAY_MS).toISOString().substring(0, 10);
}

export function daysBetween(from: ISODateString | ISODateTimeString, to: ISODateString | ISODateTimeString): number {
  return toDayNumber(to) - toDayNumber(from);
}

export function addDays(date: ISODateString, days: number): ISODateString {
  return fromDayNumber(toDayNumber(date) + days);
}

// Keeps the time of day; used for follow-up scheduling.
export function addDaysToTimestamp(timestamp: ISODateTimeString, days: number): ISODateTimeString {
  const ms = Date.parse(timestamp);
  if (!Number.isFinite(ms)) throw new Error(`Invalid timestamp: ${timestamp}`);
  return new Date(ms + days * DAY_MS).toISOString();
}

export function toISODate(date: Date): ISODateString {
  return date.toISOString().substring(0, 10);
}
