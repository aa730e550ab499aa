import { mkdtempSync, readFileSync, rmSync } from 'node:fs';
import { tmpdir } from 'node:os';
import path from 'node:path';
import request from 'supertest';
import { afterEach, beforeEach, describe, expect, it } from 'vitest';
import { buildServer } from '../src/server';
import type { Runtime } from '../src/runtime';
import type { InMemoryStore } from '../src/store';
import { runTicks, setupRuntime, type ManualClock } from './helpers';

describe('operation surface', () => {
  let runtime: Runtime;
  let clock: ManualClock;
  let store: InMemoryStore;
  let app: ReturnType<typeof buildServer>;

  beforeEach(async () => {
    ({ runtime, clock, store } = await setupRuntime({ intervalMinutes: 5 }));
    app = buildServer({ runtime, autoStart: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('reports health', async () => {
    const health = await request(app.server).get('/healthz');
    expect(health.status).toBe(200);
    expect(health.body.code).toBe(0);
    expect(health.body.data.status).toBe('ok');
    expect(health.body.data.scheduler_running).toBe(false);
  });

  it('normalizes and persists the interval', async () => {
    const invalid = await request(app.server).put('/v1/settings/interval').send({ minutes: 7 });
    expect(invalid.status).toBe(200);
    expect(invalid.body.data.minutes).toBe(50);
    expect(invalid.body.message).toBe('Interval set to 50 minutes');

    const valid = await request(app.server).put('/v1/settings/interval').send({ minutes: 20 });
    expect(valid.body.data.minutes).toBe(20);

    const current = await request(app.server).get('/v1/settings/interval');
    expect(current.body.data.minutes).toBe(20);

    await runtime.settings.flush();
    expect(store.config?.intervalMinutes).toBe(20);
  });

  it('rejects malformed request bodies', async () => {
    const response = await request(app.server)
      .put('/v1/settings/interval')
      .send({ minutes: 'ten' });
    expect(response.status).toBe(400);
    expect(response.body.code).toBe(40000);
  });

  it('normalizes languages and theme', async () => {
    const french = await request(app.server).put('/v1/settings/language').send({ language: 'fr' });
    expect(french.body.data.language).toBe('en');

    await request(app.server).put('/v1/settings/language').send({ language: 'zh-CN' });
    await request(app.server)
      .put('/v1/settings/reminder-language')
      .send({ language: 'zh-CN' });
    const theme = await request(app.server).put('/v1/settings/theme').send({ theme: 'day' });
    expect(theme.body.data.theme).toBe('day');

    const settings = await request(app.server).get('/v1/settings');
    expect(settings.body.data).toEqual({
      interval_minutes: 5,
      language: 'zh-CN',
      reminder_language: 'zh-CN',
      theme: 'day'
    });

    const reminderLanguage = await request(app.server).get('/v1/settings/reminder-language');
    expect(reminderLanguage.body.data.language).toBe('zh-CN');
  });

  it('acknowledges only the active reminder', async () => {
    runTicks(runtime, clock, 60);

    const active = await request(app.server).get('/v1/reminders/active');
    expect(active.body.data).toMatchObject({ id: 1, theme: 'night', visible: true });

    clock.advance(10_000);
    const stale = await request(app.server)
      .post('/v1/reminders/acknowledge')
      .send({ stood_up: true, reminder_id: 0 });
    expect(stale.body.data.accepted).toBe(false);

    const accepted = await request(app.server)
      .post('/v1/reminders/acknowledge')
      .send({ stood_up: true, reminder_id: 1 });
    expect(accepted.body.data.accepted).toBe(true);

    const count = await request(app.server).get('/v1/standups/count');
    expect(count.body.data.standup_sessions).toBe(1);

    const analytics = await request(app.server).get('/v1/analytics').query({ period: 'weekly' });
    expect(analytics.status).toBe(200);
    expect(analytics.body.data.hourly_standup[9]).toBe(1);
    expect(analytics.body.data.record_count).toBe(1);

    const after = await request(app.server).get('/v1/reminders/active');
    expect(after.body.data.visible).toBe(false);
  });

  it('logs standups directly and resets today', async () => {
    const first = await request(app.server).post('/v1/standups');
    expect(first.body.data.standup_sessions).toBe(1);
    const second = await request(app.server).post('/v1/standups');
    expect(second.body.data.standup_sessions).toBe(2);

    const reset = await request(app.server).delete('/v1/records/today');
    expect(reset.status).toBe(200);

    const count = await request(app.server).get('/v1/standups/count');
    expect(count.body.data.standup_sessions).toBe(0);

    await runtime.analytics.flush();
    expect(store.analytics).toEqual({ sedentary: [], standups: [] });
  });

  it('refuses exports without enough data', async () => {
    await request(app.server).post('/v1/standups');
    const response = await request(app.server).post('/v1/exports/csv').send({ period: 'daily' });
    expect(response.status).toBe(422);
    expect(response.body.code).toBe(42201);
    expect(response.body.details.record_count).toBe(1);
  });

  it('rejects a PNG export with the wrong prefix', async () => {
    const response = await request(app.server)
      .post('/v1/exports/png')
      .send({ data_url: 'data:image/gif;base64,R0lG' });
    expect(response.status).toBe(400);
    expect(response.body.code).toBe(40021);
  });

  it('maps malformed JSON to a client error', async () => {
    const response = await request(app.server)
      .post('/v1/reminders/acknowledge')
      .set('content-type', 'application/json')
      .send('{"stood_up": tru');
    expect(response.status).toBe(400);
    expect(response.body.code).toBe(40000);
    expect(response.body.details.fastify_code).toBe('FST_ERR_CTP_INVALID_JSON_BODY');
  });

  it('hands out a fresh tip each time', async () => {
    const first = await request(app.server).get('/v1/tips/next');
    const second = await request(app.server).get('/v1/tips/next');
    expect(first.body.data.index).toBe(3);
    expect(second.body.data.index).toBe(7);
    expect(typeof second.body.data.text).toBe('string');
  });

  it('reports the host language', async () => {
    const response = await request(app.server).get('/v1/system/language');
    expect(['en', 'zh-CN']).toContain(response.body.data.language);
  });
});

describe('server with its own runtime', () => {
  let app = buildServer({ storage: 'memory', exportDirs: [] });

  beforeEach(async () => {
    app = buildServer({ storage: 'memory', exportDirs: [] });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
  });

  it('starts the reminder loop once ready', async () => {
    const response = await request(app.server).get('/healthz');
    expect(response.body.data.scheduler_running).toBe(true);
  });

  it('serves default settings from a fresh memory store', async () => {
    const response = await request(app.server).get('/v1/settings');
    expect(response.body.data).toEqual({
      interval_minutes: 50,
      language: 'en',
      reminder_language: 'en',
      theme: 'night'
    });
  });
});

describe('heatmap export over HTTP', () => {
  let exportDir: string;
  let app: ReturnType<typeof buildServer>;

  beforeEach(async () => {
    exportDir = mkdtempSync(path.join(tmpdir(), 'standup-heatmap-'));
    const { runtime } = await setupRuntime({}, { exportDir });
    app = buildServer({ runtime, autoStart: false });
    await app.ready();
  });

  afterEach(async () => {
    await app.close();
    rmSync(exportDir, { recursive: true, force: true });
  });

  it('accepts images larger than the default body limit', async () => {
    const bytes = Buffer.alloc(1_200_000, 7);
    const response = await request(app.server)
      .post('/v1/exports/png')
      .send({ data_url: `data:image/png;base64,${bytes.toString('base64')}` });

    expect(response.status).toBe(200);
    expect(path.dirname(response.body.data.path)).toBe(exportDir);
    expect(readFileSync(response.body.data.path).equals(bytes)).toBe(true);
  });
});

describe('time zone from the environment', () => {
  const original = process.env.TZ;

  afterEach(() => {
    if (original === undefined) {
      delete process.env.TZ;
    } else {
      process.env.TZ = original;
    }
  });

  it('starts with an empty TZ', async () => {
    process.env.TZ = '';
    const app = buildServer({ storage: 'memory', exportDirs: [], autoStart: false });
    await app.ready();
    const response = await request(app.server).get('/healthz');
    expect(response.status).toBe(200);
    await app.close();
  });
});
