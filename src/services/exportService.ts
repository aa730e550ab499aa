import { existsSync } from 'node:fs';
import { mkdir, writeFile } from 'node:fs/promises';
import path from 'node:path';
import { DateTime, type Zone } from 'luxon';
import { HOURS, normalizePeriod } from '../aggregate';
import { AppError } from '../errors';
import type { Logger } from '../logger';
import type { AnalyticsReport, Clock } from '../types';
import type { AnalyticsService } from './analyticsService';

export const MIN_EXPORT_RECORDS = 5;
export const PNG_DATA_URL_PREFIX = 'data:image/png;base64,';
export const FILE_PREFIX = 'standup-nudge';

const BASE64_PATTERN = /^(?:[A-Za-z0-9+/]{4})*(?:[A-Za-z0-9+/]{2}==|[A-Za-z0-9+/]{3}=)?$/;

export function buildAnalyticsCsv(report: AnalyticsReport): string {
  const rows = ['hour,sedentary_sessions,standup_sessions'];
  for (let hour = 0; hour < HOURS; hour += 1) {
    rows.push(
      `${String(hour).padStart(2, '0')}:00,${report.hourlySedentary[hour]},${report.hourlyStandup[hour]}`
    );
  }
  rows.push(`totals,${report.sedentarySessions},${report.standupSessions}`);
  rows.push(`total_sitting_minutes,${Math.floor(report.totalSittingSecs / 60)},`);
  return rows.join('\n');
}

export function decodePngDataUrl(dataUrl: string): Buffer {
  if (!dataUrl.startsWith(PNG_DATA_URL_PREFIX)) {
    throw new AppError(400, 40021, '图片数据格式不正确，应为 PNG data URL');
  }
  const payload = dataUrl.slice(PNG_DATA_URL_PREFIX.length);
  if (payload.length === 0 || !BASE64_PATTERN.test(payload)) {
    throw new AppError(400, 40022, '图片数据解码失败');
  }
  return Buffer.from(payload, 'base64');
}

/**
 * First existing directory wins; if none exists the last candidate (the
 * application data directory) is used and created on write.
 */
export function resolveExportDir(candidates: string[]): string {
  if (candidates.length === 0) {
    throw new AppError(500, 50032, '无法确定导出目录');
  }
  return candidates.find((dir) => existsSync(dir)) ?? candidates[candidates.length - 1];
}

export class ExportService {
  constructor(
    private readonly analytics: AnalyticsService,
    private readonly options: {
      exportDir?: string;
      exportDirs: string[];
      clock: Clock;
      zone: Zone;
      logger: Logger;
    }
  ) {}

  async exportCsv(period?: string): Promise<string> {
    const periodKey = normalizePeriod(period);
    const report = this.analytics.report(periodKey);
    if (report.recordCount < MIN_EXPORT_RECORDS) {
      throw new AppError(422, 42201, `数据不足，至少需要 ${MIN_EXPORT_RECORDS} 条记录才能导出`, {
        reason: 'NOT_ENOUGH_DATA',
        min_records: MIN_EXPORT_RECORDS,
        record_count: report.recordCount
      });
    }
    const fileName = `${FILE_PREFIX}_${periodKey}_analytics_${this.stamp()}.csv`;
    return this.write(fileName, buildAnalyticsCsv(report));
  }

  async exportPng(dataUrl: string): Promise<string> {
    const bytes = decodePngDataUrl(dataUrl);
    const fileName = `${FILE_PREFIX}_24h_heatmap_${this.stamp()}.png`;
    return this.write(fileName, bytes);
  }

  private stamp(): string {
    return DateTime.fromMillis(this.options.clock.now(), { zone: this.options.zone }).toFormat(
      'yyyyLLdd_HHmmss'
    );
  }

  private async write(fileName: string, contents: string | Buffer): Promise<string> {
    const dir = this.options.exportDir ?? resolveExportDir(this.options.exportDirs);
    const target = path.join(dir, fileName);
    try {
      await mkdir(path.dirname(target), { recursive: true });
      await writeFile(target, contents);
    } catch (err) {
      this.options.logger.error({ err, path: target }, 'export write failed');
      throw new AppError(500, 50031, '导出文件写入失败', {
        reason: err instanceof Error ? err.message : String(err)
      });
    }
    this.options.logger.info({ path: target }, 'export written');
    return target;
  }
}
