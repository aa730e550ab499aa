import type { Zone } from 'luxon';
import { localDateOf, localHourOf, localMidnightSecs, shiftDays } from './localTime';
import type { AnalyticsReport, EventLog, Period } from './types';

export const HOURS = 24;
export const RETENTION_SECS = 180 * 24 * 60 * 60;

export function normalizePeriod(value: string | undefined): Period {
  if (value === 'weekly' || value === 'monthly') {
    return value;
  }
  return 'daily';
}

export function periodStart(period: string, nowSecs: number, zone: Zone): number {
  const today = localDateOf(nowSecs, zone);
  const nowMs = nowSecs * 1000;
  switch (normalizePeriod(period)) {
    case 'weekly':
      return localMidnightSecs(shiftDays(today, -6), zone, nowMs);
    case 'monthly':
      return localMidnightSecs({ ...today, day: 1 }, zone, nowMs);
    default:
      return localMidnightSecs(today, zone, nowMs);
  }
}

export function pruneEvents(log: EventLog, nowSecs: number): EventLog {
  const cutoff = nowSecs - RETENTION_SECS;
  return {
    sedentary: log.sedentary.filter((event) => event.ts >= cutoff),
    standups: log.standups.filter((event) => event.ts >= cutoff)
  };
}

export function aggregate(
  log: EventLog,
  period: string,
  nowSecs: number,
  zone: Zone
): AnalyticsReport {
  const start = periodStart(period, nowSecs, zone);
  const sedentary = log.sedentary.filter((event) => event.ts >= start);
  const standups = log.standups.filter((event) => event.ts >= start);

  const hourlySedentary = new Array<number>(HOURS).fill(0);
  const hourlyStandup = new Array<number>(HOURS).fill(0);
  const hourlySedentaryDelaySecs = new Array<number>(HOURS).fill(0);

  let totalSittingSecs = 0;
  for (const event of sedentary) {
    const hour = localHourOf(event.ts, zone);
    hourlySedentary[hour] += 1;
    hourlySedentaryDelaySecs[hour] += event.durationSecs;
    totalSittingSecs += event.durationSecs;
  }
  for (const event of standups) {
    hourlyStandup[localHourOf(event.ts, zone)] += 1;
  }

  return {
    hourlySedentary,
    hourlyStandup,
    hourlySedentaryDelaySecs,
    sedentarySessions: sedentary.length,
    standupSessions: standups.length,
    totalSittingSecs,
    recordCount: sedentary.length + standups.length
  };
}
