import {
  defaultConfig,
  normalizeIntervalMinutes,
  normalizeLanguage,
  normalizeTheme
} from '../config';
import type { AppEvents } from '../events';
import type { Logger } from '../logger';
import type { DataStore } from '../store';
import type { AppConfig, Language, Theme } from '../types';
import { WriteQueue } from '../utils';

export class SettingsService {
  private config: AppConfig = defaultConfig();
  private readonly writes: WriteQueue;

  constructor(
    private readonly store: DataStore,
    private readonly events: AppEvents,
    private readonly logger: Logger
  ) {
    this.writes = new WriteQueue(logger, 'config');
  }

  async init(): Promise<void> {
    this.config = await this.store.loadConfig();
    this.logger.info({ config: this.config }, 'config loaded');
  }

  get(): AppConfig {
    return { ...this.config };
  }

  intervalSecs(): number {
    return this.config.intervalMinutes * 60;
  }

  setIntervalMinutes(minutes: number): number {
    const normalized = normalizeIntervalMinutes(minutes);
    this.config = { ...this.config, intervalMinutes: normalized };
    this.persist();
    return normalized;
  }

  setLanguage(language: string): Language {
    const normalized = normalizeLanguage(language);
    this.config = { ...this.config, language: normalized };
    this.persist();
    this.events.emit('language-changed', normalized);
    return normalized;
  }

  setReminderLanguage(language: string): Language {
    const normalized = normalizeLanguage(language);
    this.config = { ...this.config, reminderLanguage: normalized };
    this.persist();
    this.events.emit('reminder-language-changed', normalized);
    return normalized;
  }

  setTheme(theme: string): Theme {
    const normalized = normalizeTheme(theme);
    this.config = { ...this.config, theme: normalized };
    this.persist();
    this.events.emit('theme-changed', normalized);
    return normalized;
  }

  flush(): Promise<void> {
    return this.writes.flush();
  }

  private persist(): void {
    const snapshot = this.get();
    this.writes.push(() => this.store.saveConfig(snapshot));
  }
}
