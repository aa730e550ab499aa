import os from 'node:os';
import path from 'node:path';
import type { Language } from './types';

export const APP_ID = 'dev.standupnudge.app';
/** Directory name used by installs made before the app id changed. */
export const LEGACY_APP_ID = 'standup-nudge';

export interface PathContext {
  env: NodeJS.ProcessEnv;
  platform: NodeJS.Platform;
  home: string;
}

export function hostPathContext(): PathContext {
  return { env: process.env, platform: process.platform, home: os.homedir() };
}

function dataRoot(ctx: PathContext): string {
  if (ctx.platform === 'win32') {
    return ctx.env.APPDATA ?? path.join(ctx.home, 'AppData', 'Roaming');
  }
  if (ctx.platform === 'darwin') {
    return path.join(ctx.home, 'Library', 'Application Support');
  }
  return ctx.env.XDG_DATA_HOME ?? path.join(ctx.home, '.local', 'share');
}

export function defaultDataDir(ctx: PathContext): string {
  return ctx.env.DATA_DIR?.trim() || path.join(dataRoot(ctx), APP_ID);
}

export function defaultLegacyDir(ctx: PathContext, dataDir: string): string {
  return ctx.env.LEGACY_DATA_DIR?.trim() || path.join(path.dirname(dataDir), LEGACY_APP_ID);
}

/** `EXPORT_DIR` is used as given and created when missing. */
export function configuredExportDir(ctx: PathContext): string | undefined {
  return ctx.env.EXPORT_DIR?.trim() || undefined;
}

/** Downloads, then desktop, then the application data directory. */
export function defaultExportDirs(ctx: PathContext, dataDir: string): string[] {
  return [path.join(ctx.home, 'Downloads'), path.join(ctx.home, 'Desktop'), dataDir];
}

export function systemLanguage(env: NodeJS.ProcessEnv = process.env): Language {
  const locale = (
    env.LC_ALL ||
    env.LC_MESSAGES ||
    env.LANG ||
    Intl.DateTimeFormat().resolvedOptions().locale ||
    'en-US'
  ).toLowerCase();
  return locale.startsWith('zh') ? 'zh-CN' : 'en';
}
