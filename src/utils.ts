import type { Logger } from './logger';
import type { Clock } from './types';

export const systemClock: Clock = {
  now: () => Date.now(),
  monotonic: () => performance.now()
};

export function toEpochSecs(ms: number): number {
  return Math.floor(ms / 1000);
}

/**
 * Runs persistence tasks one after another so a later snapshot is never
 * overtaken by an earlier one. Callers do not wait; `flush()` does.
 */
export class WriteQueue {
  private tail: Promise<void> = Promise.resolve();

  constructor(
    private readonly logger: Logger,
    private readonly label: string
  ) {}

  push(task: () => Promise<void>): void {
    this.tail = this.tail.then(task).catch((err: unknown) => {
      this.logger.warn({ err, queue: this.label }, 'queued write failed');
    });
  }

  flush(): Promise<void> {
    return this.tail;
  }
}
