import { HeadlessPresenter } from '../src/presenter';
import { createRuntime, type Runtime, type RuntimeOptions } from '../src/runtime';
import { InMemoryStore } from '../src/store';
import type { AppConfig, Clock } from '../src/types';

export class ManualClock implements Clock {
  private mono = 0;

  constructor(private wall: number) {}

  now(): number {
    return this.wall;
  }

  monotonic(): number {
    return this.mono;
  }

  advance(ms: number): void {
    this.wall += ms;
    this.mono += ms;
  }
}

/** Wednesday 2026-10-14 09:00:00 UTC */
export const BASE_TIME = Date.UTC(2026, 9, 14, 9, 0, 0);

export function secs(ms: number): number {
  return Math.floor(ms / 1000);
}

export async function setupRuntime(
  config: Partial<AppConfig> = {},
  overrides: Partial<RuntimeOptions> = {}
): Promise<{
  runtime: Runtime;
  clock: ManualClock;
  store: InMemoryStore;
  presenter: HeadlessPresenter;
}> {
  const clock = new ManualClock(BASE_TIME);
  const store = new InMemoryStore();
  store.config = {
    intervalMinutes: 5,
    language: 'en',
    reminderLanguage: 'en',
    theme: 'night',
    ...config
  };
  const presenter = new HeadlessPresenter({ x: 0, y: 0, width: 1920, height: 1040 });
  const runtime = createRuntime({
    store,
    clock,
    presenter,
    timeZone: 'UTC',
    random: () => 0.25,
    exportDirs: [],
    ...overrides
  });
  await runtime.init();
  return { runtime, clock, store, presenter };
}

/** Advances the clock by one tick period and runs the tick, `count` times. */
export function runTicks(runtime: Runtime, clock: ManualClock, count: number): void {
  for (let i = 0; i < count; i += 1) {
    clock.advance(5_000);
    runtime.scheduler.tick();
  }
}
