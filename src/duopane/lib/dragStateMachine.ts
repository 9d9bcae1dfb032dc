/**
 * Drag State Machine
 *
 * Per-divider interaction controller: idle -> armed -> dragging -> idle.
 *
 * Pointer-down events on the handle arm a pending pointer. When the host's
 * gesture recognizer reports a drag start, the pending pointer closest to the
 * reported origin becomes the drag's pointer id and is registered with the
 * pointer router, so a release seen anywhere can still end the drag.
 */

import { EventEmitter } from 'eventemitter3';
import {
  PRIMARY_MOUSE_BUTTON,
  mainAxisOf,
  type DragStartDetails,
  type DragUpdateDetails,
  type InteractionContext,
  type InteractionEffects,
  type Point,
  type SplitterPointerEvent,
} from '../types/duopane-split';
import { clampToEffective } from './constraintResolver';
import { fireHaptic } from './effects';
import type { RatioStore } from './ratioStore';
import { snapRatio } from './snapEngine';
import { log } from '../services/logger';

const COMPONENT = 'DragStateMachine';

/** Squared distance within which a pending pointer matches a drag origin. */
const POINTER_MATCH_DISTANCE_SQ = 16;
const CHANGE_EPSILON = 1e-9;
const UNTRACKED_POINTER = -1;

export type DragState = 'idle' | 'armed' | 'dragging';

export interface PendingPointer {
  id: number;
  lastPosition: Point;
}

export interface InteractionFlags {
  isHovering: boolean;
  isFocused: boolean;
}

export interface DragStateEvents {
  dragStart: (ratio: number) => void;
  dragEnd: (ratio: number) => void;
  ratioChanged: (ratio: number) => void;
  stateChanged: (state: DragState) => void;
  interaction: (flags: InteractionFlags) => void;
}

interface DragSession {
  startPosition: number;
  startRatio: number;
  pointerId: number;
  releaseScrollHold: (() => void) | null;
  removeOverlay: (() => void) | null;
}

interface FinishOptions {
  snap: boolean;
  notify: boolean;
}

function acceptsPointer(event: SplitterPointerEvent): boolean {
  if (event.deviceKind !== 'mouse') return true;
  return ((event.buttons ?? PRIMARY_MOUSE_BUTTON) & PRIMARY_MOUSE_BUTTON) !== 0;
}

function distanceSq(a: Point, b: Point): number {
  const dx = a.x - b.x;
  const dy = a.y - b.y;
  return dx * dx + dy * dy;
}

export class DragStateMachine extends EventEmitter<DragStateEvents> {
  private session: DragSession | null = null;
  private pending: PendingPointer[] = [];
  private flags: InteractionFlags = { isHovering: false, isFocused: false };
  private disposed = false;
  private lastState: DragState = 'idle';

  constructor(
    private readonly store: RatioStore,
    private readonly getContext: () => InteractionContext,
    private readonly effects: InteractionEffects = {}
  ) {
    super();
  }

  get state(): DragState {
    if (this.session) return 'dragging';
    return this.pending.length > 0 ? 'armed' : 'idle';
  }

  get isDragging(): boolean {
    return this.session !== null;
  }

  get activePointerId(): number | null {
    return this.session?.pointerId ?? null;
  }

  get pendingPointers(): readonly PendingPointer[] {
    return this.pending;
  }

  get interaction(): InteractionFlags {
    return this.flags;
  }

  pointerDown(event: SplitterPointerEvent): void {
    if (this.disposed || this.session || !this.getContext().resizable) return;
    if (!acceptsPointer(event)) return;
    this.pending = this.pending.filter((p) => p.id !== event.pointerId);
    this.pending.push({ id: event.pointerId, lastPosition: event.globalPosition });
    this.emitStateIfChanged();
  }

  pointerMove(event: SplitterPointerEvent): void {
    if (this.session) return;
    const entry = this.pending.find((p) => p.id === event.pointerId);
    if (entry) entry.lastPosition = event.globalPosition;
  }

  pointerUp(event: SplitterPointerEvent): void {
    this.discardPending(event.pointerId);
  }

  pointerCancel(event: SplitterPointerEvent): void {
    this.discardPending(event.pointerId);
  }

  dragStart(details: DragStartDetails): void {
    const ctx = this.getContext();
    if (this.disposed || this.session || !ctx.resizable) return;

    const pointerId = this.takePendingPointer(details.globalPosition);
    const session: DragSession = {
      startPosition: mainAxisOf(details.globalPosition, ctx.axis),
      startRatio: this.store.value,
      pointerId,
      releaseScrollHold: null,
      removeOverlay: null,
    };
    this.session = session;

    this.store.cancelInterpolation();
    this.store.router.setDragging(this.store, pointerId);
    this.store._setDragStopHandler(() => this.forceStop());
    this.store.setDragging(true);

    if (ctx.holdScrollWhileDragging && this.effects.acquireScrollHold) {
      session.releaseScrollHold = this.effects.acquireScrollHold();
    }
    if (ctx.overlayEnabled && this.effects.showOverlay) {
      session.removeOverlay = this.effects.showOverlay(ctx.axis);
    }
    fireHaptic(this.effects, COMPONENT);
    this.effects.requestFocus?.();

    log.debug(COMPONENT, 'Drag started', { pointerId, ratio: this.store.value });
    this.emitStateIfChanged();
    this.emit('dragStart', this.store.value);
  }

  dragUpdate(details: DragUpdateDetails): void {
    const session = this.session;
    if (!session) return;

    if (!this.store.router.isActiveDrag(this.store, session.pointerId)) {
      log.debug(COMPONENT, 'Router no longer tracks this drag, stopping', { pointerId: session.pointerId });
      this.forceStop();
      return;
    }

    const ctx = this.getContext();
    if (!(ctx.availableExtent > 0)) return;

    const delta = mainAxisOf(details.globalPosition, ctx.axis) - session.startPosition;
    const proposed = session.startRatio + delta / ctx.availableExtent;
    const clamped = clampToEffective(proposed, ctx.availableExtent, ctx.constraints);
    const before = this.store.value;
    this.store.update(clamped);
    if (Math.abs(this.store.value - before) > CHANGE_EPSILON) {
      this.emit('ratioChanged', this.store.value);
    }
  }

  dragEnd(): void {
    this.finish({ snap: true, notify: true });
  }

  dragCancel(): void {
    this.finish({ snap: true, notify: true });
  }

  /** Stop the active drag from outside the gesture stream. Safe to call repeatedly. */
  forceStop(): void {
    this.finish({ snap: true, notify: !this.disposed });
  }

  hoverChanged(isHovering: boolean): void {
    if (this.flags.isHovering === isHovering) return;
    this.flags = { ...this.flags, isHovering };
    this.emit('interaction', this.flags);
  }

  focusChanged(isFocused: boolean): void {
    if (this.flags.isFocused === isFocused) return;
    this.flags = { ...this.flags, isFocused };
    this.emit('interaction', this.flags);
  }

  /**
   * Stop any drag synchronously without emitting `dragEnd`, then drop listeners.
   */
  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.finish({ snap: false, notify: false });
    this.pending = [];
    this.removeAllListeners();
  }

  private finish(options: FinishOptions): void {
    const session = this.session;
    if (!session) return;
    this.session = null;

    let snapped: number | null = null;
    if (options.snap) {
      const ctx = this.getContext();
      const result = snapRatio(this.store, ctx.snapPoints, ctx.snapTolerance, ctx.constraints, ctx.availableExtent);
      snapped = result.ratio;
      if (result.changed && options.notify) {
        this.emit('ratioChanged', this.store.value);
      }
    }

    this.store.setDragging(false);
    this.store._setDragStopHandler(null);
    this.store.router.release(this.store);
    session.removeOverlay?.();
    session.releaseScrollHold?.();
    this.pending = this.pending.filter((p) => p.id !== session.pointerId);

    log.debug(COMPONENT, 'Drag finished', { pointerId: session.pointerId, ratio: this.store.value });
    this.emitStateIfChanged();
    if (options.notify) {
      this.emit('dragEnd', snapped ?? this.store.value);
    }
  }

  private takePendingPointer(origin: Point): number {
    if (this.pending.length === 0) return UNTRACKED_POINTER;
    let index = -1;
    for (let i = this.pending.length - 1; i >= 0; i--) {
      if (distanceSq(this.pending[i].lastPosition, origin) <= POINTER_MATCH_DISTANCE_SQ) {
        index = i;
        break;
      }
    }
    if (index < 0) index = 0;
    const [taken] = this.pending.splice(index, 1);
    return taken.id;
  }

  private discardPending(pointerId: number): void {
    const before = this.pending.length;
    this.pending = this.pending.filter((p) => p.id !== pointerId);
    if (this.pending.length !== before) this.emitStateIfChanged();
  }

  private emitStateIfChanged(): void {
    const next = this.state;
    if (next === this.lastState) return;
    this.lastState = next;
    this.emit('stateChanged', next);
  }
}
