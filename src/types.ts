export type Language = 'en' | 'zh-CN';
export type Theme = 'day' | 'night';
export type Period = 'daily' | 'weekly' | 'monthly';

export interface AppConfig {
  intervalMinutes: number;
  language: Language;
  reminderLanguage: Language;
  theme: Theme;
}

export interface SedentaryEvent {
  ts: number;
  durationSecs: number;
}

export interface StandupEvent {
  ts: number;
}

export interface EventLog {
  sedentary: SedentaryEvent[];
  standups: StandupEvent[];
}

export interface AnalyticsReport {
  hourlySedentary: number[];
  hourlyStandup: number[];
  hourlySedentaryDelaySecs: number[];
  sedentarySessions: number;
  standupSessions: number;
  totalSittingSecs: number;
  recordCount: number;
}

export interface ActiveReminder {
  id: number;
  text: string;
  theme: Theme;
  visible: boolean;
}

export interface Clock {
  /** Wall clock, epoch milliseconds. */
  now(): number;
  /** Monotonic milliseconds, only meaningful as a difference. */
  monotonic(): number;
}
