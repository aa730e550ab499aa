import Fastify from 'fastify';
import { z } from 'zod';
import { AppError } from './errors';
import { systemLanguage } from './host';
import { createRuntime, type Runtime, type RuntimeOptions } from './runtime';
import { tipText } from './services/tipService';
import type { AnalyticsReport } from './types';

export interface BuildServerOptions extends Omit<RuntimeOptions, 'logger'> {
  /** Prebuilt runtime; the server then only routes to it. */
  runtime?: Runtime;
  logger?: boolean | { level: string };
  /** Start the reminder loop once the server is ready. Defaults to true. */
  autoStart?: boolean;
}

function analyticsPayload(report: AnalyticsReport) {
  return {
    hourly_sedentary: report.hourlySedentary,
    hourly_standup: report.hourlyStandup,
    hourly_sedentary_delay_secs: report.hourlySedentaryDelaySecs,
    sedentary_sessions: report.sedentarySessions,
    standup_sessions: report.standupSessions,
    total_sitting_secs: report.totalSittingSecs,
    record_count: report.recordCount
  };
}

/** Heatmap data URLs run well past Fastify's 1 MiB default. */
const PNG_BODY_LIMIT = 16 * 1024 * 1024;

const languageBody = z.object({ language: z.string() });

export function buildServer(options: BuildServerOptions = {}) {
  const { runtime: prebuilt, logger, autoStart = true, ...runtimeOptions } = options;
  const app = Fastify({ logger: logger ?? false });
  const runtime =
    prebuilt ??
    createRuntime({
      ...runtimeOptions,
      storage:
        runtimeOptions.storage ?? (process.env.STORAGE_DRIVER === 'memory' ? 'memory' : 'file'),
      logger: app.log
    });
  const { settings, analytics, scheduler, exports, tips } = runtime;
  const startedAt = Date.now();

  app.addHook('onReady', async () => {
    await runtime.init();
    if (autoStart) {
      scheduler.start();
    }
  });

  app.addHook('onClose', async () => {
    await runtime.close();
  });

  app.setErrorHandler((error, _request, reply) => {
    if (error instanceof AppError) {
      reply.status(error.status).send(error.toBody());
      return;
    }

    if (error instanceof z.ZodError) {
      reply.status(400).send({
        code: 40000,
        message: '请求参数错误',
        details: { issues: error.issues }
      });
      return;
    }

    if (error.statusCode !== undefined && error.statusCode >= 400 && error.statusCode < 500) {
      reply.status(error.statusCode).send({
        code: 40000,
        message: '请求格式错误',
        details: { fastify_code: error.code, reason: error.message }
      });
      return;
    }

    app.log.error({ err: error }, 'unhandled request error');
    reply.status(500).send({
      code: 50000,
      message: '服务器内部错误'
    });
  });

  app.get('/healthz', async () => ({
    code: 0,
    message: 'ok',
    data: {
      status: 'ok',
      uptime_sec: Math.floor((Date.now() - startedAt) / 1000),
      scheduler_running: scheduler.isRunning()
    }
  }));

  app.get('/v1/settings', async () => {
    const config = settings.get();
    return {
      code: 0,
      message: 'ok',
      data: {
        interval_minutes: config.intervalMinutes,
        language: config.language,
        reminder_language: config.reminderLanguage,
        theme: config.theme
      }
    };
  });

  app.get('/v1/settings/interval', async () => ({
    code: 0,
    message: 'ok',
    data: { minutes: settings.get().intervalMinutes }
  }));

  app.put('/v1/settings/interval', async (request) => {
    const body = z.object({ minutes: z.number() }).parse(request.body);
    const minutes = scheduler.setIntervalMinutes(body.minutes);
    return {
      code: 0,
      message: `Interval set to ${minutes} minutes`,
      data: { minutes }
    };
  });

  app.get('/v1/settings/language', async () => ({
    code: 0,
    message: 'ok',
    data: { language: settings.get().language }
  }));

  app.put('/v1/settings/language', async (request) => {
    const body = languageBody.parse(request.body);
    return { code: 0, message: 'ok', data: { language: settings.setLanguage(body.language) } };
  });

  app.get('/v1/settings/reminder-language', async () => ({
    code: 0,
    message: 'ok',
    data: { language: settings.get().reminderLanguage }
  }));

  app.put('/v1/settings/reminder-language', async (request) => {
    const body = languageBody.parse(request.body);
    return {
      code: 0,
      message: 'ok',
      data: { language: settings.setReminderLanguage(body.language) }
    };
  });

  app.get('/v1/settings/theme', async () => ({
    code: 0,
    message: 'ok',
    data: { theme: settings.get().theme }
  }));

  app.put('/v1/settings/theme', async (request) => {
    const body = z.object({ theme: z.string() }).parse(request.body);
    return { code: 0, message: 'ok', data: { theme: settings.setTheme(body.theme) } };
  });

  app.post('/v1/standups', async () => {
    const count = scheduler.logStandup();
    return { code: 0, message: 'ok', data: { standup_sessions: count } };
  });

  app.get('/v1/standups/count', async () => ({
    code: 0,
    message: 'ok',
    data: { standup_sessions: analytics.todayStandupCount() }
  }));

  app.post('/v1/reminders/acknowledge', async (request) => {
    const body = z
      .object({
        stood_up: z.boolean(),
        reminder_id: z.number().int().nonnegative().optional()
      })
      .parse(request.body);
    const accepted = scheduler.acknowledge({
      stoodUp: body.stood_up,
      reminderId: body.reminder_id
    });
    return { code: 0, message: 'ok', data: { accepted } };
  });

  app.get('/v1/reminders/active', async () => ({
    code: 0,
    message: 'ok',
    data: scheduler.activeReminder()
  }));

  app.get('/v1/tips/next', async () => {
    const index = tips.next();
    return {
      code: 0,
      message: 'ok',
      data: { index, text: tipText(index, settings.get().reminderLanguage) }
    };
  });

  app.get('/v1/analytics', async (request) => {
    const query = z.object({ period: z.string().optional() }).parse(request.query);
    const report = analytics.report(query.period ?? 'daily');
    return { code: 0, message: 'ok', data: analyticsPayload(report) };
  });

  app.post('/v1/exports/csv', async (request) => {
    const body = z.object({ period: z.string().optional() }).parse(request.body ?? {});
    const filePath = await exports.exportCsv(body.period);
    return { code: 0, message: 'ok', data: { path: filePath } };
  });

  app.post('/v1/exports/png', { bodyLimit: PNG_BODY_LIMIT }, async (request) => {
    const body = z.object({ data_url: z.string() }).parse(request.body);
    const filePath = await exports.exportPng(body.data_url);
    return { code: 0, message: 'ok', data: { path: filePath } };
  });

  app.delete('/v1/records/today', async () => {
    analytics.resetToday();
    runtime.events.emit('analytics-updated');
    return { code: 0, message: 'ok' };
  });

  app.get('/v1/system/language', async () => ({
    code: 0,
    message: 'ok',
    data: { language: systemLanguage() }
  }));

  return app;
}
