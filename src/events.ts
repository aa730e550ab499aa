import { EventEmitter } from 'node:events';

export interface AppEventMap {
  'reminder-fired': void;
  'reminder-refresh': number;
  'analytics-updated': void;
  'standup-logged': void;
  'language-changed': string;
  'reminder-language-changed': string;
  'theme-changed': string;
}

export type AppEventName = keyof AppEventMap;

/** Notifications for whatever UI is attached to the running service. */
export class AppEvents {
  private readonly emitter = new EventEmitter();

  emit<K extends AppEventName>(name: K, ...payload: AppEventMap[K] extends void ? [] : [AppEventMap[K]]): void {
    this.emitter.emit(name, ...payload);
  }

  on<K extends AppEventName>(name: K, listener: (payload: AppEventMap[K]) => void): () => void {
    this.emitter.on(name, listener);
    return () => {
      this.emitter.off(name, listener);
    };
  }
}
