/**
 * Ratio Store
 *
 * Owns the split ratio of one divider. The value is always clamped into
 * [0, 1]; observers see each accepted change exactly once, after it is stored.
 * Interpolation runs on an injectable scheduler rather than a frame clock.
 */

import { EventEmitter } from 'eventemitter3';
import { easeOut, type Easing } from './easing';
import { SplitterConfigError, SplitterErrorType } from './errors';
import { randomId } from './id';
import { pointerRouter, type PointerRouter, type RouterTarget } from './pointerRouter';
import { timeoutScheduler, type ScheduledTask, type Scheduler } from './scheduler';
import { log } from '../services/logger';

const COMPONENT = 'RatioStore';

export const DEFAULT_UPDATE_THRESHOLD = 0.002;
const SETTLED_EPSILON = 1e-7;

export interface RatioStoreEvents {
  change: (value: number, previous: number) => void;
  dragging: (isDragging: boolean) => void;
}

export interface RatioStoreOptions {
  initialRatio?: number;
  scheduler?: Scheduler;
  router?: PointerRouter;
  /** Let a second owner take over the store instead of failing the attach. */
  tolerateSharedAttach?: boolean;
}

export interface InterpolateOptions {
  duration?: number;
  easing?: Easing;
  steps?: number;
}

export interface AttachmentToken {
  readonly id: string;
}

export function createAttachmentToken(owner = 'divider'): AttachmentToken {
  return Object.freeze({ id: randomId(owner) });
}

interface ActiveInterpolation {
  task: ScheduledTask;
  resolve: () => void;
}

export function clampRatio(value: number): number {
  return Math.min(1, Math.max(0, value));
}

function assertRatio(value: number, name: string): void {
  if (!Number.isFinite(value) || value < 0 || value > 1) {
    throw new SplitterConfigError(
      SplitterErrorType.INVALID_RATIO,
      `${name} must be between 0.0 and 1.0 (received ${value})`,
      [{ path: name, message: 'must be between 0.0 and 1.0' }]
    );
  }
}

export class RatioStore extends EventEmitter<RatioStoreEvents> implements RouterTarget {
  readonly id = randomId('ratio');
  private _value: number;
  private _isDragging = false;
  private disposed = false;
  private owner: AttachmentToken | null = null;
  private interpolation: ActiveInterpolation | null = null;
  private dragStopHandler: (() => void) | null = null;
  private readonly scheduler: Scheduler;
  private readonly _router: PointerRouter;
  private readonly tolerateSharedAttach: boolean;

  constructor(options: RatioStoreOptions = {}) {
    super();
    const initialRatio = options.initialRatio ?? 0.5;
    assertRatio(initialRatio, 'initialRatio');
    this._value = initialRatio;
    this.scheduler = options.scheduler ?? timeoutScheduler;
    this._router = options.router ?? pointerRouter;
    this.tolerateSharedAttach = options.tolerateSharedAttach ?? false;
    this._router.register(this);
  }

  get value(): number {
    return this._value;
  }

  get isDragging(): boolean {
    return this._isDragging;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get isInterpolating(): boolean {
    return this.interpolation !== null;
  }

  get router(): PointerRouter {
    return this._router;
  }

  /** Id of the attachment token currently holding the store. */
  get ownerId(): string | null {
    return this.owner?.id ?? null;
  }

  subscribe(listener: (value: number, previous: number) => void): () => void {
    this.on('change', listener);
    return () => {
      this.off('change', listener);
    };
  }

  subscribeDragging(listener: (isDragging: boolean) => void): () => void {
    this.on('dragging', listener);
    return () => {
      this.off('dragging', listener);
    };
  }

  /**
   * Apply `newRatio` (clamped) when it differs from the current value by more
   * than `threshold`. Returns whether the value changed.
   */
  update(newRatio: number, threshold: number = DEFAULT_UPDATE_THRESHOLD): boolean {
    if (this.disposed || Number.isNaN(newRatio)) return false;
    const clamped = clampRatio(newRatio);
    if (Math.abs(clamped - this._value) <= threshold) return false;
    this.commit(clamped);
    return true;
  }

  reset(to = 0.5): void {
    assertRatio(to, 'to');
    if (this.disposed) return;
    this.cancelInterpolation();
    this.commit(to);
  }

  interpolateTo(target: number, options: InterpolateOptions = {}): Promise<void> {
    if (this.disposed || Number.isNaN(target)) return Promise.resolve();
    const { duration = 160, easing = easeOut, steps = 12 } = options;
    const goal = clampRatio(target);
    const animatable = Number.isFinite(duration) && Number.isFinite(steps) && duration > 0 && steps > 0;

    if (Math.abs(goal - this._value) < SETTLED_EPSILON || !animatable) {
      this.cancelInterpolation();
      this.commit(goal);
      return Promise.resolve();
    }

    this.cancelInterpolation();

    const totalSteps = Math.max(1, Math.floor(steps));
    const start = this._value;
    const interval = Math.max(1, duration / totalSteps);
    let step = 0;

    return new Promise<void>((resolve) => {
      const task = this.scheduler.every(interval, () => {
        step += 1;
        if (step >= totalSteps) {
          this.finishInterpolation();
          this.commit(goal);
          resolve();
          return;
        }
        const progress = easing(Math.min(1, step / totalSteps));
        this.commit(start + (goal - start) * progress);
      });
      this.interpolation = { task, resolve };
    });
  }

  /** Stop a running interpolation where it is and resolve its promise. */
  cancelInterpolation(): void {
    const active = this.interpolation;
    if (!active) return;
    this.interpolation = null;
    active.task.cancel();
    active.resolve();
  }

  setDragging(dragging: boolean): void {
    if (this._isDragging === dragging) return;
    this._isDragging = dragging;
    this.emit('dragging', dragging);
  }

  attach(token: AttachmentToken): void {
    if (this.owner === null || this.owner.id === token.id) {
      this.owner = token;
      return;
    }
    if (this.tolerateSharedAttach) {
      log.warn(COMPONENT, 'Store re-attached to a new divider', { previous: this.owner.id, next: token.id });
      this.owner = token;
      return;
    }
    throw new SplitterConfigError(
      SplitterErrorType.SHARED_STORE,
      'RatioStore is already attached to another divider. A store must not be shared across dividers simultaneously.',
      [{ path: 'store', message: `held by ${this.owner.id}` }]
    );
  }

  detach(token: AttachmentToken): void {
    if (this.owner?.id === token.id) {
      this.owner = null;
    }
  }

  /** Installed by the drag state machine while it owns a drag. */
  _setDragStopHandler(handler: (() => void) | null): void {
    this.dragStopHandler = handler;
  }

  forceStopDrag(): void {
    const handler = this.dragStopHandler;
    this.dragStopHandler = null;
    handler?.();
  }

  dispose(): void {
    if (this.disposed) return;
    this.cancelInterpolation();
    this.forceStopDrag();
    this.setDragging(false);
    this._router.unregister(this);
    this.disposed = true;
    this.owner = null;
    this.removeAllListeners();
  }

  private finishInterpolation(): void {
    const active = this.interpolation;
    if (!active) return;
    this.interpolation = null;
    active.task.cancel();
  }

  private commit(next: number): void {
    const previous = this._value;
    if (next === previous) return;
    this._value = next;
    this.emit('change', next, previous);
  }
}
