import { EventEmitter } from 'eventemitter3';
import type { InteractionContext, InteractionEffects, KeyIntent, SplitterAxis } from '../types/duopane-split';
import { clampToEffective, effectiveBounds } from './constraintResolver';
import { fireHaptic } from './effects';
import type { RatioStore } from './ratioStore';
import { snapRatio } from './snapEngine';

const COMPONENT = 'KeyboardAdjuster';
const CHANGE_EPSILON = 1e-9;

export interface KeyboardAdjusterEvents {
  ratioChanged: (ratio: number) => void;
}

/**
 * Map a DOM `KeyboardEvent.key` to an intent. Arrow keys follow the axis;
 * PageDown and ArrowRight/ArrowDown grow the start pane.
 */
export function intentForKey(key: string, axis: SplitterAxis): KeyIntent | null {
  const decrease = axis === 'horizontal' ? 'ArrowLeft' : 'ArrowUp';
  const increase = axis === 'horizontal' ? 'ArrowRight' : 'ArrowDown';
  switch (key) {
    case decrease:
      return { kind: 'step', direction: -1 };
    case increase:
      return { kind: 'step', direction: 1 };
    case 'PageUp':
      return { kind: 'page', direction: -1 };
    case 'PageDown':
      return { kind: 'page', direction: 1 };
    case 'Home':
      return { kind: 'jumpToMin' };
    case 'End':
      return { kind: 'jumpToMax' };
    default:
      return null;
  }
}

export class KeyboardAdjuster extends EventEmitter<KeyboardAdjusterEvents> {
  private adjustedSinceSnap = false;

  constructor(
    private readonly store: RatioStore,
    private readonly getContext: () => InteractionContext,
    private readonly effects: InteractionEffects = {}
  ) {
    super();
  }

  isEnabled(ctx: InteractionContext = this.getContext()): boolean {
    return ctx.resizable && ctx.enableKeyboard && !this.store.isDisposed;
  }

  /**
   * Apply an intent through the same clamp as dragging. Returns whether the
   * ratio changed; a disabled adjuster ignores every intent.
   */
  adjust(intent: KeyIntent): boolean {
    const ctx = this.getContext();
    if (!this.isEnabled(ctx)) return false;

    const current = this.store.value;
    let proposed: number;
    switch (intent.kind) {
      case 'step':
        proposed = current + intent.direction * ctx.keyboardStep;
        break;
      case 'page':
        proposed = current + intent.direction * ctx.pageStep;
        break;
      case 'jumpToMin':
        proposed = effectiveBounds(ctx.availableExtent, ctx.constraints).lo;
        break;
      case 'jumpToMax':
        proposed = effectiveBounds(ctx.availableExtent, ctx.constraints).hi;
        break;
    }

    this.store.cancelInterpolation();
    this.store.update(clampToEffective(proposed, ctx.availableExtent, ctx.constraints), 0);
    fireHaptic(this.effects, COMPONENT);

    if (Math.abs(this.store.value - current) <= CHANGE_EPSILON) return false;
    this.adjustedSinceSnap = true;
    this.emit('ratioChanged', this.store.value);
    return true;
  }

  /**
   * Close a burst of adjustments (key release): snap once if anything moved.
   */
  endSession(): void {
    if (!this.adjustedSinceSnap) return;
    this.adjustedSinceSnap = false;
    const ctx = this.getContext();
    const result = snapRatio(this.store, ctx.snapPoints, ctx.snapTolerance, ctx.constraints, ctx.availableExtent);
    if (result.changed) {
      this.emit('ratioChanged', this.store.value);
    }
  }
}
