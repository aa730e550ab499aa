import { mkdir, readFile, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { z } from 'zod';
import { pruneEvents } from './aggregate';
import { defaultConfig, normalizeConfig } from './config';
import { silentLogger, type Logger } from './logger';
import type { AppConfig, EventLog } from './types';

export type StoreKind = 'memory' | 'file';

export const CONFIG_FILE = 'config.json';
export const ANALYTICS_FILE = 'analytics.json';

/**
 * Durable state. Implementations never reject: unreadable or malformed data
 * resolves to defaults, and failed writes are logged and skipped.
 */
export interface DataStore {
  /** Loads, normalizes and writes the normalized config back. */
  loadConfig(): Promise<AppConfig>;
  saveConfig(config: AppConfig): Promise<void>;

  loadAnalytics(nowSecs: number): Promise<EventLog>;
  saveAnalytics(log: EventLog, nowSecs: number): Promise<void>;
}

const configDocumentSchema = z.object({
  interval_minutes: z.number().int().nonnegative(),
  language: z.string().default('en'),
  reminder_language: z.string().default('en'),
  theme: z.string().default('night')
});

const analyticsDocumentSchema = z.object({
  reminder_events: z.array(
    z.object({
      ts: z.number().int(),
      duration_secs: z.number().int().nonnegative()
    })
  ),
  standup_events: z.array(z.number().int())
});

function emptyLog(): EventLog {
  return { sedentary: [], standups: [] };
}

function cloneLog(log: EventLog): EventLog {
  return {
    sedentary: log.sedentary.map((event) => ({ ...event })),
    standups: log.standups.map((event) => ({ ...event }))
  };
}

export function parseConfigDocument(text: string): AppConfig | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = configDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  return normalizeConfig({
    intervalMinutes: parsed.data.interval_minutes,
    language: parsed.data.language,
    reminderLanguage: parsed.data.reminder_language,
    theme: parsed.data.theme
  });
}

export function serializeConfig(config: AppConfig): string {
  return JSON.stringify(
    {
      interval_minutes: config.intervalMinutes,
      language: config.language,
      reminder_language: config.reminderLanguage,
      theme: config.theme
    },
    null,
    2
  );
}

export function parseAnalyticsDocument(text: string): EventLog | undefined {
  let raw: unknown;
  try {
    raw = JSON.parse(text);
  } catch {
    return undefined;
  }
  const parsed = analyticsDocumentSchema.safeParse(raw);
  if (!parsed.success) {
    return undefined;
  }
  return {
    sedentary: parsed.data.reminder_events.map((event) => ({
      ts: event.ts,
      durationSecs: event.duration_secs
    })),
    standups: parsed.data.standup_events.map((ts) => ({ ts }))
  };
}

export function serializeAnalytics(log: EventLog): string {
  return JSON.stringify(
    {
      reminder_events: log.sedentary.map((event) => ({
        ts: event.ts,
        duration_secs: event.durationSecs
      })),
      standup_events: log.standups.map((event) => event.ts)
    },
    null,
    2
  );
}

export class InMemoryStore implements DataStore {
  config?: AppConfig;
  analytics?: EventLog;

  async loadConfig(): Promise<AppConfig> {
    const config = this.config ? normalizeConfig(this.config) : defaultConfig();
    this.config = { ...config };
    return config;
  }

  async saveConfig(config: AppConfig): Promise<void> {
    this.config = { ...config };
  }

  async loadAnalytics(nowSecs: number): Promise<EventLog> {
    return pruneEvents(this.analytics ?? emptyLog(), nowSecs);
  }

  async saveAnalytics(log: EventLog, nowSecs: number): Promise<void> {
    this.analytics = cloneLog(pruneEvents(log, nowSecs));
  }
}

export interface FileStoreOptions {
  dataDir: string;
  /** Data directory of an older install layout, read when `dataDir` has nothing usable. */
  legacyDir?: string;
  logger?: Logger;
}

export class FileStore implements DataStore {
  private readonly dataDir: string;
  private readonly legacyDir?: string;
  private readonly logger: Logger;

  constructor(options: FileStoreOptions) {
    this.dataDir = options.dataDir;
    this.legacyDir = options.legacyDir;
    this.logger = options.logger ?? silentLogger;
  }

  async loadConfig(): Promise<AppConfig> {
    const config =
      (await this.readFirst(CONFIG_FILE, parseConfigDocument)) ?? defaultConfig();
    await this.saveConfig(config);
    return config;
  }

  async saveConfig(config: AppConfig): Promise<void> {
    await this.write(CONFIG_FILE, serializeConfig(config));
  }

  async loadAnalytics(nowSecs: number): Promise<EventLog> {
    const log = (await this.readFirst(ANALYTICS_FILE, parseAnalyticsDocument)) ?? emptyLog();
    return pruneEvents(log, nowSecs);
  }

  async saveAnalytics(log: EventLog, nowSecs: number): Promise<void> {
    await this.write(ANALYTICS_FILE, serializeAnalytics(pruneEvents(log, nowSecs)));
  }

  private async readFirst<T>(
    fileName: string,
    parse: (text: string) => T | undefined
  ): Promise<T | undefined> {
    const dirs = this.legacyDir ? [this.dataDir, this.legacyDir] : [this.dataDir];
    for (const dir of dirs) {
      const filePath = path.join(dir, fileName);
      const text = await this.read(filePath);
      if (text === undefined) {
        continue;
      }
      const value = parse(text);
      if (value !== undefined) {
        if (dir !== this.dataDir) {
          this.logger.info({ path: filePath }, 'migrating data from legacy directory');
        }
        return value;
      }
      this.logger.warn({ path: filePath }, 'ignoring malformed document');
    }
    return undefined;
  }

  private async read(filePath: string): Promise<string | undefined> {
    try {
      return await readFile(filePath, 'utf8');
    } catch (err) {
      this.logger.debug({ err, path: filePath }, 'document not readable');
      return undefined;
    }
  }

  private async write(fileName: string, contents: string): Promise<void> {
    const filePath = path.join(this.dataDir, fileName);
    try {
      await mkdir(path.dirname(filePath), { recursive: true });
      await writeFile(filePath, contents, 'utf8');
    } catch (err) {
      this.logger.warn({ err, path: filePath }, 'write skipped');
    }
  }
}

export function createStore(params: {
  kind: StoreKind;
  dataDir?: string;
  legacyDir?: string;
  logger?: Logger;
}): DataStore {
  if (params.kind === 'file') {
    if (!params.dataDir) {
      throw new Error('DATA_DIR is required for file storage');
    }
    return new FileStore({
      dataDir: params.dataDir,
      legacyDir: params.legacyDir,
      logger: params.logger
    });
  }
  return new InMemoryStore();
}
