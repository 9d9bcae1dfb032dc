import { describe, it, expect, vi, beforeEach } from 'vitest';
import { KeyboardAdjuster, intentForKey } from '../keyboardAdjuster';
import { RatioStore } from '../ratioStore';
import { PointerRouter } from '../pointerRouter';
import type { InteractionContext } from '../../types/duopane-split';

describe('intentForKey', () => {
  it('maps arrows along the horizontal axis', () => {
    expect(intentForKey('ArrowLeft', 'horizontal')).toEqual({ kind: 'step', direction: -1 });
    expect(intentForKey('ArrowRight', 'horizontal')).toEqual({ kind: 'step', direction: 1 });
    expect(intentForKey('ArrowUp', 'horizontal')).toBeNull();
  });

  it('maps arrows along the vertical axis', () => {
    expect(intentForKey('ArrowUp', 'vertical')).toEqual({ kind: 'step', direction: -1 });
    expect(intentForKey('ArrowDown', 'vertical')).toEqual({ kind: 'step', direction: 1 });
    expect(intentForKey('ArrowRight', 'vertical')).toBeNull();
  });

  it('maps paging and jump keys on either axis', () => {
    expect(intentForKey('PageUp', 'vertical')).toEqual({ kind: 'page', direction: -1 });
    expect(intentForKey('PageDown', 'horizontal')).toEqual({ kind: 'page', direction: 1 });
    expect(intentForKey('Home', 'horizontal')).toEqual({ kind: 'jumpToMin' });
    expect(intentForKey('End', 'vertical')).toEqual({ kind: 'jumpToMax' });
    expect(intentForKey('Enter', 'horizontal')).toBeNull();
  });
});

describe('KeyboardAdjuster', () => {
  let store: RatioStore;
  let ctx: InteractionContext;

  beforeEach(() => {
    store = new RatioStore({ router: new PointerRouter() });
    ctx = {
      axis: 'horizontal',
      resizable: true,
      enableKeyboard: true,
      keyboardStep: 0.01,
      pageStep: 0.1,
      overlayEnabled: true,
      holdScrollWhileDragging: false,
      snapPoints: [],
      snapTolerance: 0.02,
      availableExtent: 594,
      constraints: { minRatio: 0.2, maxRatio: 0.8, minStartPixels: 0, minEndPixels: 0, overflowPolicy: 'favorStart' },
    };
  });

  it('steps, pages and jumps within the ratio bounds', () => {
    const adjuster = new KeyboardAdjuster(store, () => ctx);

    adjuster.adjust({ kind: 'step', direction: 1 });
    expect(store.value).toBeCloseTo(0.51);
    adjuster.adjust({ kind: 'page', direction: 1 });
    expect(store.value).toBeCloseTo(0.61);
    adjuster.adjust({ kind: 'jumpToMin' });
    expect(store.value).toBe(0.2);
    adjuster.adjust({ kind: 'jumpToMax' });
    expect(store.value).toBe(0.8);
  });

  it('clamps a page step into the bounds', () => {
    const adjuster = new KeyboardAdjuster(store, () => ctx);
    store.reset(0.75);

    adjuster.adjust({ kind: 'page', direction: 1 });

    expect(store.value).toBe(0.8);
  });

  it('jumps to the pixel bound when it is tighter than the ratio bound', () => {
    ctx = { ...ctx, constraints: { ...ctx.constraints, minEndPixels: 297 } };
    const adjuster = new KeyboardAdjuster(store, () => ctx);
    store.reset(0.3);

    adjuster.adjust({ kind: 'jumpToMax' });

    expect(store.value).toBeCloseTo(0.5);
  });

  it('applies single steps below the drag noise threshold', () => {
    ctx = { ...ctx, keyboardStep: 0.001 };
    const adjuster = new KeyboardAdjuster(store, () => ctx);

    expect(adjuster.adjust({ kind: 'step', direction: -1 })).toBe(true);
    expect(store.value).toBeCloseTo(0.499);
  });

  it('emits ratioChanged only for real changes', () => {
    const adjuster = new KeyboardAdjuster(store, () => ctx);
    const changed = vi.fn();
    adjuster.on('ratioChanged', changed);

    adjuster.adjust({ kind: 'jumpToMax' });
    adjuster.adjust({ kind: 'jumpToMax' });

    expect(changed).toHaveBeenCalledTimes(1);
    expect(changed).toHaveBeenCalledWith(0.8);
  });

  it('fires haptics for every handled intent', () => {
    const haptic = vi.fn();
    const adjuster = new KeyboardAdjuster(store, () => ctx, { haptic });

    adjuster.adjust({ kind: 'jumpToMax' });
    adjuster.adjust({ kind: 'jumpToMax' });

    expect(haptic).toHaveBeenCalledTimes(2);
  });

  it('ignores every intent when keyboard input is off', () => {
    ctx = { ...ctx, enableKeyboard: false };
    const haptic = vi.fn();
    const adjuster = new KeyboardAdjuster(store, () => ctx, { haptic });

    expect(adjuster.adjust({ kind: 'jumpToMax' })).toBe(false);
    expect(store.value).toBe(0.5);
    expect(haptic).not.toHaveBeenCalled();
  });

  it('ignores every intent when not resizable', () => {
    ctx = { ...ctx, resizable: false };
    const adjuster = new KeyboardAdjuster(store, () => ctx);

    adjuster.adjust({ kind: 'page', direction: -1 });

    expect(store.value).toBe(0.5);
  });

  describe('endSession', () => {
    it('snaps once after a burst of adjustments', () => {
      ctx = { ...ctx, snapPoints: [0.55], snapTolerance: 0.05 };
      const adjuster = new KeyboardAdjuster(store, () => ctx);
      const changed = vi.fn();
      adjuster.on('ratioChanged', changed);

      adjuster.adjust({ kind: 'step', direction: 1 });
      adjuster.adjust({ kind: 'step', direction: 1 });
      expect(store.value).toBeCloseTo(0.52);

      adjuster.endSession();
      expect(store.value).toBe(0.55);
      expect(changed).toHaveBeenCalledTimes(3);

      adjuster.endSession();
      expect(changed).toHaveBeenCalledTimes(3);
    });

    it('does not snap when nothing moved', () => {
      ctx = { ...ctx, snapPoints: [0.52], snapTolerance: 0.05 };
      const adjuster = new KeyboardAdjuster(store, () => ctx);

      adjuster.endSession();

      expect(store.value).toBe(0.5);
    });
  });
});
