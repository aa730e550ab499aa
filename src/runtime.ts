import type { Zone } from 'luxon';
import { AppEvents } from './events';
import {
  configuredExportDir,
  defaultDataDir,
  defaultExportDirs,
  defaultLegacyDir,
  hostPathContext
} from './host';
import { toZone } from './localTime';
import { silentLogger, type Logger } from './logger';
import { HeadlessPresenter, type ReminderPresenter } from './presenter';
import { AnalyticsService } from './services/analyticsService';
import { ExportService } from './services/exportService';
import { ReminderScheduler } from './services/reminderService';
import { SettingsService } from './services/settingsService';
import { TipSelector, type RandomSource } from './services/tipService';
import { createStore, type DataStore, type StoreKind } from './store';
import type { Clock } from './types';
import { systemClock } from './utils';

export interface RuntimeOptions {
  storage?: StoreKind;
  store?: DataStore;
  dataDir?: string;
  legacyDir?: string;
  /** Fixed export directory; skips the candidate search. */
  exportDir?: string;
  exportDirs?: string[];
  /** IANA zone name or `local`. */
  timeZone?: string;
  clock?: Clock;
  random?: RandomSource;
  presenter?: ReminderPresenter;
  logger?: Logger;
}

export interface Runtime {
  zone: Zone;
  events: AppEvents;
  presenter: ReminderPresenter;
  settings: SettingsService;
  analytics: AnalyticsService;
  tips: TipSelector;
  scheduler: ReminderScheduler;
  exports: ExportService;
  init(): Promise<void>;
  close(): Promise<void>;
}

export function createRuntime(options: RuntimeOptions = {}): Runtime {
  const logger = options.logger ?? silentLogger;
  const clock = options.clock ?? systemClock;
  const zone = toZone(options.timeZone ?? 'local');
  const host = hostPathContext();
  const dataDir = options.dataDir ?? defaultDataDir(host);

  const store =
    options.store ??
    createStore({
      kind: options.storage ?? 'file',
      dataDir,
      legacyDir: options.legacyDir ?? defaultLegacyDir(host, dataDir),
      logger
    });
  const events = new AppEvents();
  const presenter = options.presenter ?? new HeadlessPresenter();
  const settings = new SettingsService(store, events, logger);
  const analytics = new AnalyticsService(store, clock, zone, logger);
  const tips = new TipSelector(undefined, options.random);
  const scheduler = new ReminderScheduler({
    settings,
    analytics,
    tips,
    presenter,
    events,
    clock,
    logger
  });
  const exports = new ExportService(analytics, {
    exportDir: options.exportDir ?? configuredExportDir(host),
    exportDirs: options.exportDirs ?? defaultExportDirs(host, dataDir),
    clock,
    zone,
    logger
  });

  return {
    zone,
    events,
    presenter,
    settings,
    analytics,
    tips,
    scheduler,
    exports,
    async init() {
      await settings.init();
      await analytics.init();
    },
    async close() {
      scheduler.stop();
      await Promise.all([settings.flush(), analytics.flush()]);
    }
  };
}
