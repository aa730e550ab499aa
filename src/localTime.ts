import { DateTime, type Zone } from 'luxon';

export interface LocalDate {
  year: number;
  month: number;
  day: number;
}

export interface LocalWallTime extends LocalDate {
  hour?: number;
  minute?: number;
  second?: number;
}

/**
 * Instants (epoch ms) that a local wall time maps to. A normal wall time has a
 * single mapping; a wall time inside a DST fold has two; one inside a DST gap
 * has none.
 */
export interface LocalResolution {
  single?: number;
  earliest?: number;
  latest?: number;
}

const DAY_MS = 24 * 60 * 60 * 1000;

export function toZone(zone: string | Zone): Zone {
  const probe = DateTime.fromMillis(0, { zone });
  if (!probe.isValid) {
    throw new Error(`unknown time zone: ${String(zone)}`);
  }
  return probe.zone;
}

export function resolveLocal(wall: LocalWallTime, zone: Zone): LocalResolution {
  const wallMs = Date.UTC(
    wall.year,
    wall.month - 1,
    wall.day,
    wall.hour ?? 0,
    wall.minute ?? 0,
    wall.second ?? 0
  );
  const offsets = new Set([zone.offset(wallMs - DAY_MS), zone.offset(wallMs + DAY_MS)]);
  const instants = [...offsets]
    .map((offset) => ({ offset, instant: wallMs - offset * 60_000 }))
    .filter(({ offset, instant }) => zone.offset(instant) === offset)
    .map(({ instant }) => instant)
    .sort((a, b) => a - b);

  if (instants.length === 1) {
    return { single: instants[0], earliest: instants[0], latest: instants[0] };
  }
  if (instants.length > 1) {
    return { earliest: instants[0], latest: instants[instants.length - 1] };
  }
  return {};
}

/** single, then earliest, then latest, then `fallbackMs`. */
export function pickInstant(resolution: LocalResolution, fallbackMs: number): number {
  return resolution.single ?? resolution.earliest ?? resolution.latest ?? fallbackMs;
}

export function localMidnightSecs(date: LocalDate, zone: Zone, nowMs: number): number {
  return Math.floor(pickInstant(resolveLocal(date, zone), nowMs) / 1000);
}

export function localDateOf(epochSecs: number, zone: Zone): LocalDate {
  const dt = DateTime.fromSeconds(epochSecs, { zone });
  return { year: dt.year, month: dt.month, day: dt.day };
}

export function localHourOf(epochSecs: number, zone: Zone): number {
  return DateTime.fromSeconds(epochSecs, { zone }).hour;
}

export function shiftDays(date: LocalDate, days: number): LocalDate {
  const shifted = DateTime.utc(date.year, date.month, date.day).plus({ days });
  return { year: shifted.year, month: shifted.month, day: shifted.day };
}
