/**
 * Constraint Resolver
 *
 * Pure functions that turn a requested ratio into a legal split of the
 * available extent. Drag, keyboard and snap all clamp through
 * `clampToEffective`, so every input path honours the same bounds.
 */

import type { ConstraintConfig, EffectiveBounds, OverflowPolicy, ResolvedSplit } from '../types/duopane-split';

export interface ResolveOptions {
  /** Floor the first extent to whole pixels. */
  antiAlias?: boolean;
}

function clamp(value: number, min: number, max: number): number {
  return Math.min(max, Math.max(min, value));
}

function hasExtent(availableExtent: number): boolean {
  return Number.isFinite(availableExtent) && availableExtent > 0;
}

export function effectiveBounds(availableExtent: number, config: ConstraintConfig): EffectiveBounds {
  if (!hasExtent(availableExtent)) {
    return { lo: config.minRatio, hi: config.maxRatio, minStart: 0, minEnd: 0, cramped: false };
  }
  const minStart = clamp(config.minStartPixels, 0, availableExtent);
  const minEnd = clamp(config.minEndPixels, 0, availableExtent);
  const pixelMinRatio = clamp(minStart / availableExtent, 0, 1);
  const pixelMaxRatio = clamp(1 - minEnd / availableExtent, 0, 1);
  const lo = Math.max(config.minRatio, pixelMinRatio);
  const hi = Math.min(config.maxRatio, pixelMaxRatio);
  return { lo, hi, minStart, minEnd, cramped: lo > hi };
}

/**
 * Ratio used when the bound range is empty.
 */
export function crampedRatio(bounds: EffectiveBounds, policy: OverflowPolicy): number {
  switch (policy) {
    case 'favorStart':
      return bounds.lo;
    case 'favorEnd':
      return bounds.hi;
    case 'proportional': {
      const total = bounds.minStart + bounds.minEnd;
      return total <= 0 ? 0.5 : bounds.minStart / total;
    }
  }
}

export function clampToEffective(ratio: number, availableExtent: number, config: ConstraintConfig): number {
  const bounds = effectiveBounds(availableExtent, config);
  if (bounds.cramped) return crampedRatio(bounds, config.overflowPolicy);
  return clamp(ratio, bounds.lo, bounds.hi);
}

// Minimums here are the configured pixel values, not ones derived from the floored extent.
function floorToPixelGrid(
  extent: number,
  availableExtent: number,
  bounds: EffectiveBounds,
  policy: OverflowPolicy
): number {
  const floored = Math.floor(extent);
  const maxAllowed = clamp(availableExtent - bounds.minEnd, 0, availableExtent);
  if (bounds.minStart <= maxAllowed) {
    return clamp(floored, bounds.minStart, maxAllowed);
  }
  switch (policy) {
    case 'favorStart':
      return bounds.minStart;
    case 'favorEnd':
      return maxAllowed;
    case 'proportional': {
      const total = bounds.minStart + bounds.minEnd;
      return total <= 0 ? availableExtent / 2 : availableExtent * (bounds.minStart / total);
    }
  }
}

export function resolveSplit(
  ratio: number,
  availableExtent: number,
  config: ConstraintConfig,
  options: ResolveOptions = {}
): ResolvedSplit {
  if (!hasExtent(availableExtent)) {
    return {
      ratio: clamp(ratio, config.minRatio, config.maxRatio),
      firstExtent: 0,
      secondExtent: 0,
      cramped: false,
    };
  }

  const bounds = effectiveBounds(availableExtent, config);
  const effective = bounds.cramped
    ? crampedRatio(bounds, config.overflowPolicy)
    : clamp(ratio, bounds.lo, bounds.hi);

  let firstExtent = availableExtent * effective;
  if (options.antiAlias) {
    firstExtent = floorToPixelGrid(firstExtent, availableExtent, bounds, config.overflowPolicy);
  }
  const secondExtent = clamp(availableExtent - firstExtent, 0, availableExtent);

  return { ratio: effective, firstExtent, secondExtent, cramped: bounds.cramped };
}
