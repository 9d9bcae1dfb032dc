/**
 * Injectable timer abstraction used by ratio interpolation.
 * `timeoutScheduler` runs on real timers; `ManualScheduler` is driven by hand in tests.
 */

export interface ScheduledTask {
  cancel(): void;
}

export interface Scheduler {
  /** Run `callback` every `intervalMs` until the returned task is cancelled. */
  every(intervalMs: number, callback: () => void): ScheduledTask;
  now(): number;
}

export const timeoutScheduler: Scheduler = {
  every(intervalMs, callback) {
    const handle = setInterval(callback, intervalMs);
    return {
      cancel: () => clearInterval(handle),
    };
  },
  now: () => Date.now(),
};

interface ManualTimer {
  id: number;
  interval: number;
  due: number;
  callback: () => void;
}

export class ManualScheduler implements Scheduler {
  private time = 0;
  private nextId = 1;
  private timers = new Map<number, ManualTimer>();

  every(intervalMs: number, callback: () => void): ScheduledTask {
    const interval = Math.max(1, intervalMs);
    const id = this.nextId++;
    this.timers.set(id, { id, interval, due: this.time + interval, callback });
    return {
      cancel: () => {
        this.timers.delete(id);
      },
    };
  }

  now(): number {
    return this.time;
  }

  get pendingCount(): number {
    return this.timers.size;
  }

  /**
   * Move the clock forward, firing every tick that falls due in order.
   */
  advance(ms: number): void {
    const target = this.time + ms;
    for (;;) {
      let next: ManualTimer | undefined;
      for (const timer of this.timers.values()) {
        if (timer.due <= target && (!next || timer.due < next.due)) next = timer;
      }
      if (!next) break;
      this.time = next.due;
      next.due += next.interval;
      next.callback();
    }
    this.time = target;
  }
}
