import { Weekday, WEEKDAYS } from '../types.js';

const MINUTE_MS = 60 * 1000;
const TIMESTAMP_PATTERN = /^(\d{4}-\d{2}-\d{2}T\d{2}:\d{2}(?::\d{2}(?:\.\d+)?)?)(Z|[+-]\d{2}:?\d{2})?$/;

export interface ParsedTimestamp {
  timestamp: Date;
  utcOffsetMinutes: number;
}

/**
 * Parse an ISO-8601 timestamp keeping its offset. Accepts the Graph API's
 * `+0000` form as well as `+00:00` and `Z`; a missing offset means UTC.
 */
export function parseTimestamp(value: string): ParsedTimestamp {
  const match = TIMESTAMP_PATTERN.exec(value.trim());
  if (!match) {
    throw new Error(`Unrecognised timestamp: ${value}`);
  }

  const [, local, zone] = match;
  let utcOffsetMinutes = 0;
  let normalizedZone = 'Z';

  if (zone && zone !== 'Z') {
    const sign = zone.startsWith('-') ? -1 : 1;
    const digits = zone.slice(1).replace(':', '');
    const hours = Number(digits.slice(0, 2));
    const minutes = Number(digits.slice(2, 4));
    utcOffsetMinutes = sign * (hours * 60 + minutes);
    normalizedZone = `${zone[0]}${digits.slice(0, 2)}:${digits.slice(2, 4)}`;
  }

  const timestamp = new Date(`${local}${normalizedZone}`);
  if (Number.isNaN(timestamp.getTime())) {
    throw new Error(`Unrecognised timestamp: ${value}`);
  }

  return { timestamp, utcOffsetMinutes };
}

/**
 * Render a timestamp in its original offset, e.g. `2024-05-01T20:30:00+02:00`.
 */
export function formatTimestamp(timestamp: Date, utcOffsetMinutes: number): string {
  const local = new Date(timestamp.getTime() + utcOffsetMinutes * MINUTE_MS).toISOString().slice(0, 19);
  const sign = utcOffsetMinutes < 0 ? '-' : '+';
  const absolute = Math.abs(utcOffsetMinutes);
  const hours = String(Math.floor(absolute / 60)).padStart(2, '0');
  const minutes = String(absolute % 60).padStart(2, '0');
  return `${local}${sign}${hours}:${minutes}`;
}

function shifted(timestamp: Date, utcOffsetMinutes: number): Date {
  return new Date(timestamp.getTime() + utcOffsetMinutes * MINUTE_MS);
}

export function localHour(timestamp: Date, utcOffsetMinutes: number): number {
  return shifted(timestamp, utcOffsetMinutes).getUTCHours();
}

export function localWeekday(timestamp: Date, utcOffsetMinutes: number): Weekday {
  // getUTCDay: 0 = Sunday
  const day = shifted(timestamp, utcOffsetMinutes).getUTCDay();
  return WEEKDAYS[(day + 6) % 7];
}
