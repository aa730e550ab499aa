import path from 'node:path';
import { describe, expect, it } from 'vitest';
import {
  APP_ID,
  defaultDataDir,
  configuredExportDir,
  defaultExportDirs,
  defaultLegacyDir,
  LEGACY_APP_ID,
  systemLanguage
} from '../src/host';

describe('host paths', () => {
  it('places data under the platform data root', () => {
    expect(defaultDataDir({ env: {}, platform: 'linux', home: '/home/sam' })).toBe(
      path.join('/home/sam', '.local', 'share', APP_ID)
    );
    expect(
      defaultDataDir({ env: { XDG_DATA_HOME: '/data' }, platform: 'linux', home: '/home/sam' })
    ).toBe(path.join('/data', APP_ID));
    expect(defaultDataDir({ env: {}, platform: 'darwin', home: '/Users/sam' })).toBe(
      path.join('/Users/sam', 'Library', 'Application Support', APP_ID)
    );
    expect(
      defaultDataDir({ env: { DATA_DIR: '/srv/standup' }, platform: 'linux', home: '/home/sam' })
    ).toBe('/srv/standup');
  });

  it('looks for legacy data next to the current directory', () => {
    const ctx = { env: {}, platform: 'linux' as const, home: '/home/sam' };
    expect(defaultLegacyDir(ctx, '/data/dev.standupnudge.app')).toBe(
      path.join('/data', LEGACY_APP_ID)
    );
  });

  it('orders export directories', () => {
    const ctx = { env: { EXPORT_DIR: '/exports' }, platform: 'linux' as const, home: '/home/sam' };
    expect(configuredExportDir(ctx)).toBe('/exports');
    expect(configuredExportDir({ ...ctx, env: { EXPORT_DIR: '  ' } })).toBeUndefined();
    expect(defaultExportDirs(ctx, '/data/app')).toEqual([
      path.join('/home/sam', 'Downloads'),
      path.join('/home/sam', 'Desktop'),
      '/data/app'
    ]);
  });

  it('maps the host locale to a supported language', () => {
    expect(systemLanguage({ LANG: 'zh_CN.UTF-8' })).toBe('zh-CN');
    expect(systemLanguage({ LC_ALL: 'zh_TW.UTF-8', LANG: 'en_US.UTF-8' })).toBe('zh-CN');
    expect(systemLanguage({ LANG: 'de_DE.UTF-8' })).toBe('en');
  });
});
