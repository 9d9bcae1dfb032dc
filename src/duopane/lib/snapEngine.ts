import type { ConstraintConfig } from '../types/duopane-split';
import { clampToEffective } from './constraintResolver';
import type { RatioStore } from './ratioStore';

export interface SnapResult {
  /** Committed ratio, or null when no point was within tolerance. */
  ratio: number | null;
  changed: boolean;
}

const NO_SNAP: SnapResult = { ratio: null, changed: false };

/**
 * Nearest snap point to `value` within `tolerance`. Ties go to the earlier point.
 */
export function findNearestSnapPoint(
  value: number,
  points: readonly number[],
  tolerance: number
): number | null {
  let nearest: number | null = null;
  let bestDistance = Number.POSITIVE_INFINITY;
  for (const point of points) {
    const distance = Math.abs(point - value);
    if (distance < bestDistance) {
      bestDistance = distance;
      nearest = point;
    }
  }
  return nearest !== null && bestDistance <= tolerance ? nearest : null;
}

/**
 * Commit the nearest snap point (clamped into the effective bounds) to the store.
 * Runs once at the end of a gesture or keyboard session.
 */
export function snapRatio(
  store: RatioStore,
  points: readonly number[],
  tolerance: number,
  constraints: ConstraintConfig,
  availableExtent: number
): SnapResult {
  if (!(availableExtent > 0) || points.length === 0) return NO_SNAP;
  const target = findNearestSnapPoint(store.value, points, tolerance);
  if (target === null) return NO_SNAP;
  const clamped = clampToEffective(target, availableExtent, constraints);
  const changed = store.update(clamped, 0);
  return { ratio: store.value, changed };
}
