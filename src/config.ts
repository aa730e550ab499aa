import type { AppConfig, Language, Theme } from './types';

export const ALLOWED_INTERVAL_MINUTES = [5, 10, 20, 30, 50] as const;
export const DEFAULT_INTERVAL_MINUTES = 50;

export function defaultConfig(): AppConfig {
  return {
    intervalMinutes: DEFAULT_INTERVAL_MINUTES,
    language: 'en',
    reminderLanguage: 'en',
    theme: 'night'
  };
}

export function normalizeIntervalMinutes(value: number): number {
  return ALLOWED_INTERVAL_MINUTES.some((allowed) => allowed === value)
    ? value
    : DEFAULT_INTERVAL_MINUTES;
}

export function normalizeLanguage(value: string): Language {
  return value === 'zh-CN' ? 'zh-CN' : 'en';
}

export function normalizeTheme(value: string): Theme {
  return value === 'day' ? 'day' : 'night';
}

export function normalizeConfig(raw: {
  intervalMinutes: number;
  language: string;
  reminderLanguage: string;
  theme: string;
}): AppConfig {
  return {
    intervalMinutes: normalizeIntervalMinutes(raw.intervalMinutes),
    language: normalizeLanguage(raw.language),
    reminderLanguage: normalizeLanguage(raw.reminderLanguage),
    theme: normalizeTheme(raw.theme)
  };
}
