import { describe, it, expect, vi, beforeEach } from 'vitest';
import { DragStateMachine } from '../dragStateMachine';
import { RatioStore } from '../ratioStore';
import { PointerRouter } from '../pointerRouter';
import type {
  InteractionContext,
  InteractionEffects,
  PointerPhase,
  SplitterPointerEvent,
} from '../../types/duopane-split';

const pointer = (
  pointerId: number,
  phase: PointerPhase,
  x: number,
  y = 0,
  extra: Partial<SplitterPointerEvent> = {}
): SplitterPointerEvent => ({
  pointerId,
  phase,
  globalPosition: { x, y },
  deviceKind: 'mouse',
  buttons: 1,
  ...extra,
});

describe('DragStateMachine', () => {
  let router: PointerRouter;
  let store: RatioStore;
  let ctx: InteractionContext;

  beforeEach(() => {
    router = new PointerRouter();
    store = new RatioStore({ router });
    // 400 wide with a 10px divider
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
      availableExtent: 390,
      constraints: { minRatio: 0, maxRatio: 1, minStartPixels: 0, minEndPixels: 0, overflowPolicy: 'favorStart' },
    };
  });

  const createMachine = (effects: InteractionEffects = {}) => new DragStateMachine(store, () => ctx, effects);

  const beginDrag = (machine: DragStateMachine, pointerId = 1, x = 200) => {
    machine.pointerDown(pointer(pointerId, 'down', x));
    machine.dragStart({ globalPosition: { x, y: 0 }, deviceKind: 'mouse' });
  };

  it('moves the ratio by the drag delta over the available extent', () => {
    const machine = createMachine();
    const changed = vi.fn();
    machine.on('ratioChanged', changed);

    beginDrag(machine);
    machine.dragUpdate({ globalPosition: { x: 200 + 0.2 * 390, y: 0 } });

    expect(store.value).toBeCloseTo(0.7);
    expect(changed).toHaveBeenCalledTimes(1);
  });

  it('snaps to the nearest point on release', () => {
    ctx = { ...ctx, snapPoints: [0.25, 0.75], snapTolerance: 0.1 };
    const machine = createMachine();
    const ended = vi.fn();
    machine.on('dragEnd', ended);

    beginDrag(machine);
    machine.dragUpdate({ globalPosition: { x: 200 + 0.28 * 390, y: 0 } });
    expect(store.value).toBeCloseTo(0.78);

    machine.dragEnd();

    expect(store.value).toBe(0.75);
    expect(ended).toHaveBeenCalledWith(0.75);
    expect(store.isDragging).toBe(false);
  });

  it('clamps drag updates into the effective bounds', () => {
    ctx = { ...ctx, constraints: { ...ctx.constraints, minRatio: 0.2, maxRatio: 0.8 } };
    const machine = createMachine();

    beginDrag(machine);
    machine.dragUpdate({ globalPosition: { x: 2000, y: 0 } });
    expect(store.value).toBe(0.8);
    machine.dragUpdate({ globalPosition: { x: -2000, y: 0 } });
    expect(store.value).toBe(0.2);
  });

  it('follows the vertical axis', () => {
    ctx = { ...ctx, axis: 'vertical' };
    const machine = createMachine();

    machine.dragStart({ globalPosition: { x: 0, y: 100 }, deviceKind: 'touch' });
    machine.dragUpdate({ globalPosition: { x: 500, y: 100 - 0.1 * 390 } });

    expect(store.value).toBeCloseTo(0.4);
  });

  it('ignores updates while the extent is unknown', () => {
    ctx = { ...ctx, availableExtent: 0 };
    const machine = createMachine();

    beginDrag(machine);
    machine.dragUpdate({ globalPosition: { x: 900, y: 0 } });

    expect(store.value).toBe(0.5);
    expect(machine.isDragging).toBe(true);
  });

  describe('pending pointers', () => {
    it('arms on pointer-down and disarms on pointer-up', () => {
      const machine = createMachine();
      const states = vi.fn();
      machine.on('stateChanged', states);

      machine.pointerDown(pointer(3, 'down', 10));
      expect(machine.state).toBe('armed');
      machine.pointerUp(pointer(3, 'up', 10));
      expect(machine.state).toBe('idle');
      expect(states.mock.calls).toEqual([['armed'], ['idle']]);
    });

    it('ignores a mouse press without the primary button', () => {
      const machine = createMachine();
      machine.pointerDown(pointer(3, 'down', 10, 0, { buttons: 2 }));
      expect(machine.pendingPointers).toHaveLength(0);
    });

    it('accepts touch-like devices regardless of buttons', () => {
      const machine = createMachine();
      machine.pointerDown(pointer(4, 'down', 10, 0, { deviceKind: 'pen', buttons: 0 }));
      machine.pointerDown(pointer(5, 'down', 10, 0, { deviceKind: 'trackpad', buttons: 0 }));
      expect(machine.pendingPointers.map((p) => p.id)).toEqual([4, 5]);
    });

    it('correlates the drag with the pointer nearest the reported origin', () => {
      const machine = createMachine();
      machine.pointerDown(pointer(1, 'down', 0));
      machine.pointerDown(pointer(2, 'down', 40));
      machine.pointerMove(pointer(2, 'move', 50));

      machine.dragStart({ globalPosition: { x: 52, y: 1 }, deviceKind: 'mouse' });

      expect(machine.activePointerId).toBe(2);
      expect(router.pointerId).toBe(2);
      expect(machine.pendingPointers.map((p) => p.id)).toEqual([1]);
    });

    it('falls back to the oldest pending pointer', () => {
      const machine = createMachine();
      machine.pointerDown(pointer(1, 'down', 0));
      machine.pointerDown(pointer(2, 'down', 40));

      machine.dragStart({ globalPosition: { x: 200, y: 0 }, deviceKind: 'mouse' });

      expect(machine.activePointerId).toBe(1);
    });

    it('drags untracked when nothing is pending', () => {
      const machine = createMachine();
      machine.dragStart({ globalPosition: { x: 200, y: 0 }, deviceKind: 'mouse' });

      expect(machine.activePointerId).toBe(-1);
      router.route(pointer(-1, 'up', 0));
      expect(machine.isDragging).toBe(true);
    });

    it('does not move a pending pointer during a drag', () => {
      const machine = createMachine();
      machine.pointerDown(pointer(1, 'down', 0));
      machine.pointerDown(pointer(2, 'down', 100));
      machine.dragStart({ globalPosition: { x: 100, y: 0 }, deviceKind: 'mouse' });

      machine.pointerMove(pointer(1, 'move', 60));

      expect(machine.pendingPointers[0].lastPosition).toEqual({ x: 0, y: 0 });
    });
  });

  describe('drag lifecycle', () => {
    it('registers with the router and raises the dragging flag', () => {
      const machine = createMachine();
      const started = vi.fn();
      machine.on('dragStart', started);

      beginDrag(machine, 9);

      expect(router.dragger).toBe(store);
      expect(router.pointerId).toBe(9);
      expect(store.isDragging).toBe(true);
      expect(machine.state).toBe('dragging');
      expect(started).toHaveBeenCalledWith(0.5);
    });

    it('ignores a second drag start while dragging', () => {
      const machine = createMachine();
      const started = vi.fn();
      machine.on('dragStart', started);

      beginDrag(machine, 1);
      beginDrag(machine, 2, 300);

      expect(started).toHaveBeenCalledTimes(1);
      expect(machine.activePointerId).toBe(1);
    });

    it('does nothing when not resizable', () => {
      ctx = { ...ctx, resizable: false };
      const machine = createMachine();

      beginDrag(machine);

      expect(machine.state).toBe('idle');
      expect(store.isDragging).toBe(false);
      expect(router.dragger).toBeNull();
    });

    it('is stopped by a release of its pointer seen by the router', () => {
      const machine = createMachine();
      const ended = vi.fn();
      machine.on('dragEnd', ended);
      beginDrag(machine, 4);

      router.route(pointer(4, 'cancel', 0));
      machine.dragEnd();

      expect(machine.isDragging).toBe(false);
      expect(store.isDragging).toBe(false);
      expect(router.dragger).toBeNull();
      expect(ended).toHaveBeenCalledTimes(1);
    });

    it('ignores releases of other pointers', () => {
      const machine = createMachine();
      beginDrag(machine, 4);

      router.route(pointer(5, 'up', 0));
      router.route(pointer(4, 'move', 0));

      expect(machine.isDragging).toBe(true);
    });

    it('stops itself when another drag has superseded it', () => {
      const machine = createMachine();
      const ended = vi.fn();
      machine.on('dragEnd', ended);
      beginDrag(machine, 4);

      const other = { id: 'other', forceStopDrag: vi.fn() };
      router.setDragging(other, 8);
      machine.dragUpdate({ globalPosition: { x: 300, y: 0 } });

      expect(machine.isDragging).toBe(false);
      expect(store.value).toBe(0.5);
      expect(ended).toHaveBeenCalledWith(0.5);
      expect(router.dragger).toBe(other);
      expect(other.forceStopDrag).not.toHaveBeenCalled();
    });

    it('makes repeated stops no-ops', () => {
      const machine = createMachine();
      const ended = vi.fn();
      machine.on('dragEnd', ended);
      beginDrag(machine);

      machine.dragEnd();
      machine.forceStop();
      machine.dragCancel();

      expect(ended).toHaveBeenCalledTimes(1);
    });
  });

  describe('side effects', () => {
    it('inserts an overlay and holds scrolling for the drag only', () => {
      ctx = { ...ctx, holdScrollWhileDragging: true };
      const removeOverlay = vi.fn();
      const releaseScroll = vi.fn();
      const effects: InteractionEffects = {
        showOverlay: vi.fn(() => removeOverlay),
        acquireScrollHold: vi.fn(() => releaseScroll),
        requestFocus: vi.fn(),
        haptic: vi.fn(),
      };
      const machine = createMachine(effects);

      beginDrag(machine);
      expect(effects.showOverlay).toHaveBeenCalledWith('horizontal');
      expect(effects.acquireScrollHold).toHaveBeenCalledTimes(1);
      expect(effects.requestFocus).toHaveBeenCalledTimes(1);
      expect(effects.haptic).toHaveBeenCalledTimes(1);
      expect(removeOverlay).not.toHaveBeenCalled();

      machine.dragEnd();
      expect(removeOverlay).toHaveBeenCalledTimes(1);
      expect(releaseScroll).toHaveBeenCalledTimes(1);
    });

    it('skips the overlay when disabled', () => {
      ctx = { ...ctx, overlayEnabled: false };
      const effects: InteractionEffects = { showOverlay: vi.fn(() => () => undefined) };
      const machine = createMachine(effects);

      beginDrag(machine);

      expect(effects.showOverlay).not.toHaveBeenCalled();
    });

    it('does not wait on a failing haptic effect', () => {
      const machine = createMachine({ haptic: () => Promise.reject(new Error('no haptics')) });
      beginDrag(machine);
      expect(machine.isDragging).toBe(true);
    });
  });

  describe('hover and focus', () => {
    it('emits interaction flags only on change', () => {
      const machine = createMachine();
      const interaction = vi.fn();
      machine.on('interaction', interaction);

      machine.hoverChanged(true);
      machine.hoverChanged(true);
      machine.focusChanged(true);

      expect(interaction.mock.calls).toEqual([
        [{ isHovering: true, isFocused: false }],
        [{ isHovering: true, isFocused: true }],
      ]);
    });
  });

  describe('dispose', () => {
    it('stops an active drag without emitting dragEnd', () => {
      const machine = createMachine();
      const ended = vi.fn();
      machine.on('dragEnd', ended);
      beginDrag(machine, 6);

      machine.dispose();

      expect(machine.isDragging).toBe(false);
      expect(store.isDragging).toBe(false);
      expect(router.dragger).toBeNull();
      expect(ended).not.toHaveBeenCalled();

      router.route(pointer(6, 'up', 0));
      expect(store.isDragging).toBe(false);
    });

    it('ignores input afterwards', () => {
      const machine = createMachine();
      machine.dispose();
      beginDrag(machine);
      expect(machine.state).toBe('idle');
    });
  });
});
