import type { Zone } from 'luxon';
import { aggregate, periodStart, pruneEvents } from '../aggregate';
import type { Logger } from '../logger';
import type { DataStore } from '../store';
import type { AnalyticsReport, Clock, EventLog } from '../types';
import { toEpochSecs, WriteQueue } from '../utils';

/** Owns the in-memory event log and its persistence. */
export class AnalyticsService {
  private log: EventLog = { sedentary: [], standups: [] };
  private readonly writes: WriteQueue;

  constructor(
    private readonly store: DataStore,
    private readonly clock: Clock,
    private readonly zone: Zone,
    private readonly logger: Logger
  ) {
    this.writes = new WriteQueue(logger, 'analytics');
  }

  async init(): Promise<void> {
    this.log = await this.store.loadAnalytics(this.nowSecs());
    this.logger.info(
      { sedentary: this.log.sedentary.length, standups: this.log.standups.length },
      'analytics loaded'
    );
  }

  nowSecs(): number {
    return toEpochSecs(this.clock.now());
  }

  recordSedentary(ts: number, durationSecs: number): void {
    this.log.sedentary.push({ ts, durationSecs });
  }

  recordStandup(ts: number): void {
    this.log.standups.push({ ts });
  }

  report(period: string): AnalyticsReport {
    const now = this.nowSecs();
    this.log = pruneEvents(this.log, now);
    return aggregate(this.log, period, now, this.zone);
  }

  todayStandupCount(): number {
    return this.report('daily').standupSessions;
  }

  resetToday(): void {
    const start = periodStart('daily', this.nowSecs(), this.zone);
    this.log = {
      sedentary: this.log.sedentary.filter((event) => event.ts < start),
      standups: this.log.standups.filter((event) => event.ts < start)
    };
    this.persist();
  }

  snapshot(): EventLog {
    return {
      sedentary: this.log.sedentary.map((event) => ({ ...event })),
      standups: this.log.standups.map((event) => ({ ...event }))
    };
  }

  persist(): void {
    const snapshot = this.snapshot();
    const now = this.nowSecs();
    this.writes.push(() => this.store.saveAnalytics(snapshot, now));
  }

  flush(): Promise<void> {
    return this.writes.flush();
  }
}
