import { ConfigurationError } from '../utils/etl-errors';
import { DEFAULT_END_TIME, DEFAULT_START_TIME } from './tomorrow.dto';

const HOUR_MS = 60 * 60 * 1000;
const DAY_MS = 24 * HOUR_MS;

/** Short look-back for history, long look-forward for the forecast. */
export const LOOK_BACK_MS = HOUR_MS;
export const LOOK_AHEAD_MS = 5 * DAY_MS;

export interface ForecastWindow {
  startTime: string;
  endTime: string;
}

// Ends in Z or a numeric offset such as +02:00 / -0530
const ZONE_DESIGNATOR = /(?:Z|[+-]\d{2}:?\d{2})$/i;
const HAS_TIME = /\d{2}:\d{2}/;

/**
 * Parse an ISO-8601 instant, reading values without a zone designator as UTC.
 * Returns undefined for anything that is not a timestamp.
 */
export function parseInstant(value: string): Date | undefined {
  const trimmed = value.trim();
  if (trimmed.length === 0) {
    return undefined;
  }
  const withZone =
    HAS_TIME.test(trimmed) && !ZONE_DESIGNATOR.test(trimmed)
      ? `${trimmed}Z`
      : trimmed;
  const parsed = new Date(withZone);
  return Number.isNaN(parsed.getTime()) ? undefined : parsed;
}

/** Snapshot time from configuration; the window then does not depend on the host time zone. */
export function parseSnapshotTime(value: string): Date {
  const parsed = parseInstant(value);
  if (parsed === undefined) {
    throw new ConfigurationError(`Invalid snapshot time: '${value}'`);
  }
  return parsed;
}

/** ISO-8601 in UTC, dropping the milliseconds when they are zero. */
export function formatInstant(instant: Date): string {
  const iso = instant.toISOString();
  return instant.getUTCMilliseconds() === 0 ? iso.replace('.000Z', 'Z') : iso;
}

export function computeForecastWindow(snapshotTime?: string | Date): ForecastWindow {
  if (snapshotTime === undefined) {
    return { startTime: DEFAULT_START_TIME, endTime: DEFAULT_END_TIME };
  }

  const anchor =
    snapshotTime instanceof Date ? snapshotTime : parseSnapshotTime(snapshotTime);
  return {
    startTime: formatInstant(new Date(anchor.getTime() - LOOK_BACK_MS)),
    endTime: formatInstant(new Date(anchor.getTime() + LOOK_AHEAD_MS)),
  };
}
