import { formatInTimeZone } from "date-fns-tz";

const ISO_WITH_OFFSET = "yyyy-MM-dd'T'HH:mm:ss.SSSXXX";

export interface Clock {
  timezone: string;
  now(): Date;
  /** ISO-8601 rendering in the configured timezone, e.g. 2026-01-06T10:00:00.000+07:00 */
  format(date: Date): string;
  /** Wall-clock pattern in the configured timezone (date-fns tokens) */
  formatPattern(date: Date, pattern: string): string;
}

export function createClock(timezone: string, now: () => Date = () => new Date()): Clock {
  return {
    timezone,
    now,
    format: (date) => formatInTimeZone(date, timezone, ISO_WITH_OFFSET),
    formatPattern: (date, pattern) => formatInTimeZone(date, timezone, pattern),
  };
}

/**
 * Deterministic clock for tests: starts at `start` and moves only when told to.
 */
export function createManualClock(start: Date, timezone = "UTC") {
  let current = new Date(start.getTime());
  const clock = createClock(timezone, () => new Date(current.getTime()));
  return {
    ...clock,
    advance(ms: number) {
      current = new Date(current.getTime() + ms);
    },
    set(date: Date) {
      current = new Date(date.getTime());
    },
  };
}

export type ManualClock = ReturnType<typeof createManualClock>;
