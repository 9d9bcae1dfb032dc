import { describe, it, expect, vi } from 'vitest';
import { findNearestSnapPoint, snapRatio } from '../snapEngine';
import { RatioStore } from '../ratioStore';
import { PointerRouter } from '../pointerRouter';
import type { ConstraintConfig } from '../../types/duopane-split';

const constraints: ConstraintConfig = {
  minRatio: 0,
  maxRatio: 1,
  minStartPixels: 0,
  minEndPixels: 0,
  overflowPolicy: 'favorStart',
};

describe('findNearestSnapPoint', () => {
  it('picks the nearest point within tolerance', () => {
    expect(findNearestSnapPoint(0.78, [0.25, 0.75], 0.1)).toBe(0.75);
  });

  it('returns null beyond tolerance', () => {
    expect(findNearestSnapPoint(0.5, [0.25, 0.75], 0.1)).toBeNull();
  });

  it('breaks ties by list order', () => {
    expect(findNearestSnapPoint(0.5, [0.75, 0.25], 0.3)).toBe(0.75);
    expect(findNearestSnapPoint(0.5, [0.25, 0.75], 0.3)).toBe(0.25);
  });

  it('accepts a point exactly at the tolerance edge', () => {
    expect(findNearestSnapPoint(0.5, [0.75], 0.25)).toBe(0.75);
  });

  it('returns null for an empty list', () => {
    expect(findNearestSnapPoint(0.5, [], 1)).toBeNull();
  });
});

describe('snapRatio', () => {
  const createStore = (initialRatio: number) => new RatioStore({ initialRatio, router: new PointerRouter() });

  it('commits a snap point even when it is within the noise threshold', () => {
    const store = createStore(0.501);
    const listener = vi.fn();
    store.subscribe(listener);

    const result = snapRatio(store, [0.5], 0.02, constraints, 400);

    expect(result).toEqual({ ratio: 0.5, changed: true });
    expect(store.value).toBe(0.5);
    expect(listener).toHaveBeenCalledTimes(1);
  });

  it('clamps the snapped point into the effective bounds', () => {
    // 320 wide with an 8px divider
    const store = createStore(0.1);
    const cfg: ConstraintConfig = { ...constraints, minRatio: 0.2, minStartPixels: 130 };

    const result = snapRatio(store, [0, 1], 1, cfg, 312);

    expect(result.ratio).toBeCloseTo(130 / 312);
    expect(store.value * 312).toBeCloseTo(130);
  });

  it('leaves the value alone without a nearby point', () => {
    const store = createStore(0.5);
    expect(snapRatio(store, [0.1, 0.9], 0.05, constraints, 400)).toEqual({ ratio: null, changed: false });
    expect(store.value).toBe(0.5);
  });

  it('does nothing without a positive extent', () => {
    const store = createStore(0.74);
    expect(snapRatio(store, [0.75], 0.1, constraints, 0)).toEqual({ ratio: null, changed: false });
    expect(store.value).toBe(0.74);
  });

  it('reports no change when already on the point', () => {
    const store = createStore(0.75);
    expect(snapRatio(store, [0.75], 0.1, constraints, 400)).toEqual({ ratio: 0.75, changed: false });
  });
});
