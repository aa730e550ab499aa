import type { AppEvents } from '../events';
import type { Logger } from '../logger';
import {
  computePlacement,
  REMINDER_HEIGHT,
  REMINDER_WIDTH,
  type ReminderPresenter
} from '../presenter';
import type { ActiveReminder, Clock } from '../types';
import { toEpochSecs } from '../utils';
import type { AnalyticsService } from './analyticsService';
import type { SettingsService } from './settingsService';
import { DEFAULT_TIP_TEXT, tipText, type TipSelector } from './tipService';

export const TICK_SECS = 5;
export const STALE_AFTER_SECS = 60;
export const ACK_DEBOUNCE_MS = 700;

interface ReminderSession {
  id: number;
  startTs?: number;
  shownAt?: number;
  intervalSecs: number;
  loggedSedentary: boolean;
  tipText: string;
  visible: boolean;
}

export interface ReminderSchedulerDeps {
  settings: SettingsService;
  analytics: AnalyticsService;
  tips: TipSelector;
  presenter: ReminderPresenter;
  events: AppEvents;
  clock: Clock;
  logger: Logger;
}

export interface AcknowledgeParams {
  stoodUp: boolean;
  reminderId?: number;
}

/**
 * Counts seated time and arms a reminder when the configured interval is
 * reached. Every transition runs synchronously, so arming, acknowledging and
 * lapse logging never interleave.
 */
export class ReminderScheduler {
  private elapsedSecs = 0;
  private lastIntervalChangeAt: number;
  private session: ReminderSession;
  private timer?: NodeJS.Timeout;

  constructor(private readonly deps: ReminderSchedulerDeps) {
    this.lastIntervalChangeAt = deps.clock.monotonic();
    this.session = {
      id: 0,
      intervalSecs: deps.settings.intervalSecs(),
      loggedSedentary: false,
      tipText: DEFAULT_TIP_TEXT,
      visible: false
    };
  }

  start(): void {
    if (this.timer) {
      return;
    }
    this.timer = setInterval(() => this.tick(), TICK_SECS * 1000);
    this.deps.logger.info({ intervalSecs: this.deps.settings.intervalSecs() }, 'scheduler started');
  }

  stop(): void {
    if (!this.timer) {
      return;
    }
    clearInterval(this.timer);
    this.timer = undefined;
    this.deps.logger.info('scheduler stopped');
  }

  isRunning(): boolean {
    return this.timer !== undefined;
  }

  elapsed(): number {
    return this.elapsedSecs;
  }

  intervalChangedAt(): number {
    return this.lastIntervalChangeAt;
  }

  tick(): void {
    if (this.session.visible) {
      this.tickArmed();
      return;
    }

    this.elapsedSecs += TICK_SECS;
    const limit = this.deps.settings.intervalSecs();
    if (this.elapsedSecs < limit) {
      return;
    }

    if (this.deps.presenter.status() !== 'missing') {
      this.arm(limit);
    } else {
      this.deps.logger.warn('reminder window missing, skipping reminder');
    }
    this.deps.events.emit('reminder-fired');
    this.elapsedSecs = 0;
  }

  /** Returns false when the acknowledgment was ignored. */
  acknowledge(params: AcknowledgeParams): boolean {
    const session = this.session;
    if (params.reminderId !== undefined && params.reminderId !== session.id) {
      return false;
    }
    if (!session.visible) {
      return false;
    }
    if (
      session.shownAt !== undefined &&
      this.deps.clock.monotonic() - session.shownAt < ACK_DEBOUNCE_MS
    ) {
      return false;
    }

    const now = this.nowSecs();
    let logged = false;
    if (session.startTs !== undefined) {
      const lag = Math.max(0, now - session.startTs);
      if (lag >= STALE_AFTER_SECS) {
        logged = this.logLapse();
      } else if (!session.loggedSedentary && params.stoodUp) {
        this.deps.analytics.recordStandup(now);
        logged = true;
      }
    } else if (params.stoodUp) {
      this.deps.analytics.recordStandup(now);
      logged = true;
    }

    this.clearSession();
    this.elapsedSecs = 0;

    if (logged) {
      this.deps.analytics.persist();
      this.deps.events.emit('analytics-updated');
      if (params.stoodUp) {
        this.deps.events.emit('standup-logged');
      }
    }
    this.deps.presenter.hide();
    this.deps.logger.debug({ id: session.id, stoodUp: params.stoodUp, logged }, 'reminder acknowledged');
    return true;
  }

  /** Records a standup outside any reminder and returns today's standup count. */
  logStandup(): number {
    this.elapsedSecs = 0;
    if (this.session.visible) {
      this.deps.presenter.hide();
    }
    this.clearSession();
    this.deps.analytics.recordStandup(this.nowSecs());
    this.deps.analytics.persist();
    this.deps.events.emit('standup-logged');
    this.deps.events.emit('analytics-updated');
    return this.deps.analytics.todayStandupCount();
  }

  setIntervalMinutes(minutes: number): number {
    const normalized = this.deps.settings.setIntervalMinutes(minutes);
    this.elapsedSecs = 0;
    this.lastIntervalChangeAt = this.deps.clock.monotonic();
    this.deps.logger.info({ minutes: normalized }, 'interval changed');
    return normalized;
  }

  activeReminder(): ActiveReminder {
    return {
      id: this.session.id,
      text: this.session.tipText,
      theme: this.deps.settings.get().theme,
      visible: this.session.visible
    };
  }

  private tickArmed(): void {
    const presenter = this.deps.presenter;
    const status = presenter.status();
    if (status === 'missing') {
      this.deps.logger.warn({ id: this.session.id }, 'reminder window lost, dropping session');
      this.clearSession();
      return;
    }
    if (status === 'hidden') {
      presenter.show(this.activeReminder());
      this.deps.events.emit('reminder-refresh', this.session.id);
    }

    if (this.logLapse()) {
      this.deps.analytics.persist();
      this.deps.events.emit('analytics-updated');
    }
  }

  private arm(intervalSecs: number): void {
    const reminderLanguage = this.deps.settings.get().reminderLanguage;
    this.session = {
      id: this.session.id + 1,
      startTs: this.nowSecs(),
      shownAt: this.deps.clock.monotonic(),
      intervalSecs,
      loggedSedentary: false,
      tipText: tipText(this.deps.tips.next(), reminderLanguage),
      visible: true
    };

    const presenter = this.deps.presenter;
    const area = presenter.primaryWorkArea();
    const size = presenter.outerSize() ?? { width: REMINDER_WIDTH, height: REMINDER_HEIGHT };
    presenter.show(this.activeReminder(), area ? computePlacement(area, size) : undefined);
    this.deps.logger.info({ id: this.session.id, intervalSecs }, 'reminder armed');
  }

  /**
   * Logs the armed session as sedentary once it has been up for
   * STALE_AFTER_SECS. Shared by the tick and the acknowledgment so a session
   * is logged at most once.
   */
  private logLapse(): boolean {
    const session = this.session;
    if (session.loggedSedentary || session.startTs === undefined) {
      return false;
    }
    if (this.nowSecs() - session.startTs < STALE_AFTER_SECS) {
      return false;
    }
    session.loggedSedentary = true;
    this.deps.analytics.recordSedentary(session.startTs, session.intervalSecs);
    return true;
  }

  private clearSession(): void {
    this.session = {
      ...this.session,
      startTs: undefined,
      shownAt: undefined,
      visible: false
    };
  }

  private nowSecs(): number {
    return toEpochSecs(this.deps.clock.now());
  }
}
