import { FeedEntryError } from "../errors.js";
import type { UtcDate } from "../types.js";

const DAY_MS = 24 * 60 * 60 * 1000;

export function toUtcDate(date: Date): UtcDate {
  return date.toISOString().slice(0, 10);
}

export function utcToday(now: Date = new Date()): UtcDate {
  return toUtcDate(now);
}

/** UTC calendar date of a feed timestamp; throws FeedEntryError when unparseable */
export function parseUtcDate(value: string | null | undefined, field: string): UtcDate {
  const time = value ? Date.parse(value) : Number.NaN;
  if (Number.isNaN(time)) {
    throw new FeedEntryError(`Unparseable ${field}: ${value ?? "<missing>"}`);
  }
  return toUtcDate(new Date(time));
}

export function addDays(date: UtcDate, days: number): UtcDate {
  return toUtcDate(new Date(Date.parse(`${date}T00:00:00Z`) + days * DAY_MS));
}
