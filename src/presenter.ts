import type { ActiveReminder } from './types';

export const REMINDER_WIDTH = 640;
export const REMINDER_HEIGHT = 196;
export const REMINDER_MARGIN = 28;

export type PresenterStatus = 'visible' | 'hidden' | 'missing';

export interface Size {
  width: number;
  height: number;
}

export interface WorkArea extends Size {
  x: number;
  y: number;
}

export interface Placement {
  x: number;
  y: number;
  width: number;
  height: number;
}

/**
 * The window that shows a reminder. Rendering lives outside this service;
 * the scheduler only needs to know whether the window still exists.
 */
export interface ReminderPresenter {
  status(): PresenterStatus;
  show(reminder: ActiveReminder, placement?: Placement): void;
  hide(): void;
  primaryWorkArea(): WorkArea | undefined;
  outerSize(): Size | undefined;
}

/** Bottom-right corner of the work area, inset by the margin. */
export function computePlacement(area: WorkArea, size: Size, margin = REMINDER_MARGIN): Placement {
  return {
    x: area.x + area.width - size.width - margin,
    y: area.y + area.height - size.height - margin,
    width: size.width,
    height: size.height
  };
}

/**
 * Presenter for a UI that polls `GET /v1/reminders/active` instead of being
 * driven directly.
 */
export class HeadlessPresenter implements ReminderPresenter {
  private shown = false;
  private attached = true;
  lastPlacement?: Placement;
  lastReminder?: ActiveReminder;
  showCount = 0;

  constructor(private readonly workArea?: WorkArea) {}

  status(): PresenterStatus {
    if (!this.attached) {
      return 'missing';
    }
    return this.shown ? 'visible' : 'hidden';
  }

  show(reminder: ActiveReminder, placement?: Placement): void {
    this.shown = true;
    this.showCount += 1;
    this.lastReminder = reminder;
    if (placement) {
      this.lastPlacement = placement;
    }
  }

  hide(): void {
    this.shown = false;
  }

  /** Simulates the window being closed out from under the scheduler. */
  detach(): void {
    this.attached = false;
    this.shown = false;
  }

  attach(): void {
    this.attached = true;
  }

  primaryWorkArea(): WorkArea | undefined {
    return this.workArea;
  }

  outerSize(): Size | undefined {
    return undefined;
  }
}
