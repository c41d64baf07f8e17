import { logger } from '../utils/logger.js';

const COMPONENT = 'Scheduler';

/**
 * Timers the playback subsystem can have outstanding.
 * Tokens are plain data; the owner decides what each one means when
 * it is dispatched back.
 */
export type TimerToken =
  | { kind: 'titleShow' }
  | { kind: 'titleClear' }
  | { kind: 'durationCheck' }
  | { kind: 'fadeStep' }
  | { kind: 'loopRestart'; itemId: string };

export type OverlayTimerToken = Exclude<TimerToken, { kind: 'loopRestart' }>;

export interface TimerHandle<T = TimerToken> {
  readonly id: number;
  readonly token: T;
  readonly repeating: boolean;
}

export interface Scheduler<T = TimerToken> {
  schedule(delayMs: number, token: T): TimerHandle<T>;
  scheduleRepeating(intervalMs: number, token: T): TimerHandle<T>;
  /** No-op for null, unknown or already cancelled handles */
  cancel(handle: TimerHandle<T> | null): void;
  cancelAll(): void;
  isActive(handle: TimerHandle<T> | null): boolean;
  readonly pendingCount: number;
}

type NodeTimer = ReturnType<typeof setTimeout>;

/**
 * Scheduler on top of Node timers. Every callback is delivered through one
 * dispatch function on the event loop, so callbacks never overlap with each
 * other or with a controller tick. A throwing dispatch is logged and dropped.
 */
export class TimerScheduler<T = TimerToken> implements Scheduler<T> {
  private timers: Map<number, { handle: TimerHandle<T>; timer: NodeTimer }>;
  private nextId: number;
  private dispatch: (token: T) => void;

  constructor(dispatch: (token: T) => void) {
    this.timers = new Map();
    this.nextId = 1;
    this.dispatch = dispatch;
  }

  schedule(delayMs: number, token: T): TimerHandle<T> {
    const handle: TimerHandle<T> = { id: this.nextId++, token, repeating: false };
    const timer = setTimeout(() => {
      this.timers.delete(handle.id);
      this.deliver(handle);
    }, Math.max(0, delayMs));
    this.timers.set(handle.id, { handle, timer });
    return handle;
  }

  scheduleRepeating(intervalMs: number, token: T): TimerHandle<T> {
    const handle: TimerHandle<T> = { id: this.nextId++, token, repeating: true };
    const timer = setInterval(() => {
      this.deliver(handle);
    }, Math.max(1, intervalMs));
    this.timers.set(handle.id, { handle, timer });
    return handle;
  }

  cancel(handle: TimerHandle<T> | null): void {
    if (!handle) return;
    const entry = this.timers.get(handle.id);
    if (!entry) return;
    if (entry.handle.repeating) {
      clearInterval(entry.timer);
    } else {
      clearTimeout(entry.timer);
    }
    this.timers.delete(handle.id);
  }

  cancelAll(): void {
    for (const entry of [...this.timers.values()]) {
      this.cancel(entry.handle);
    }
  }

  isActive(handle: TimerHandle<T> | null): boolean {
    return handle !== null && this.timers.has(handle.id);
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  private deliver(handle: TimerHandle<T>): void {
    try {
      this.dispatch(handle.token);
    } catch (error: unknown) {
      logger.error(COMPONENT, 'Timer callback failed', error, { timerId: handle.id });
    }
  }
}
