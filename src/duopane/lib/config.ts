/**
 * Splitter Configuration
 *
 * Options are validated with zod when a divider is created or updated.
 * Precedence for themeable values: explicit option > theme > built-in default.
 */

import { z } from 'zod';
import type { OverflowPolicy, SplitterAxis, UnboundedBehavior } from '../types/duopane-split';
import { configErrorFromZod } from './errors';

export const SPLITTER_DEFAULTS = {
  axis: 'horizontal',
  initialRatio: 0.5,
  minRatio: 0,
  maxRatio: 1,
  minPanelSize: 100,
  dividerThickness: 6,
  keyboardStep: 0.01,
  pageStep: 0.1,
  enableKeyboard: true,
  overlayEnabled: true,
  holdScrollWhileDragging: false,
  snapTolerance: 0.02,
  handleHitSlop: 0,
  resizable: true,
  overflowPolicy: 'favorStart',
  unboundedBehavior: 'flexExpand',
  fallbackMainAxisExtent: 500,
  antiAliasing: false,
} as const;

const ratio = z.number().min(0, 'must be between 0.0 and 1.0').max(1, 'must be between 0.0 and 1.0');
const nonNegative = z.number().finite().min(0, 'must be non-negative');

/** Values a theme may supply. */
export const splitterThemeSchema = z.object({
  dividerThickness: nonNegative.optional(),
  handleHitSlop: nonNegative.optional(),
  overlayEnabled: z.boolean().optional(),
  enableKeyboard: z.boolean().optional(),
  keyboardStep: nonNegative.optional(),
  pageStep: nonNegative.optional(),
  unboundedBehavior: z.enum(['flexExpand', 'limitedBox']).optional(),
  fallbackMainAxisExtent: z.number().finite().positive('must be greater than zero').optional(),
  antiAliasing: z.boolean().optional(),
  dividerColor: z.string().optional(),
  dividerHoverColor: z.string().optional(),
  dividerActiveColor: z.string().optional(),
  blockerColor: z.string().optional(),
});

export type SplitterThemeData = z.infer<typeof splitterThemeSchema>;

export const splitterOptionsSchema = splitterThemeSchema
  .extend({
    axis: z.enum(['horizontal', 'vertical']).optional(),
    initialRatio: ratio.optional(),
    minRatio: ratio.optional(),
    maxRatio: ratio.optional(),
    minPanelSize: nonNegative.optional(),
    minStartPanelSize: nonNegative.optional(),
    minEndPanelSize: nonNegative.optional(),
    holdScrollWhileDragging: z.boolean().optional(),
    snapPoints: z.array(ratio).optional(),
    snapTolerance: nonNegative.optional(),
    doubleTapResetTo: ratio.optional(),
    resizable: z.boolean().optional(),
    overflowPolicy: z.enum(['favorStart', 'favorEnd', 'proportional']).optional(),
  })
  .refine((o) => (o.minRatio ?? SPLITTER_DEFAULTS.minRatio) < (o.maxRatio ?? SPLITTER_DEFAULTS.maxRatio), {
    message: 'minRatio must be less than maxRatio',
    path: ['minRatio'],
  });

export type SplitterOptionValues = z.infer<typeof splitterOptionsSchema>;

export interface ResolvedSplitterConfig {
  axis: SplitterAxis;
  initialRatio: number;
  minRatio: number;
  maxRatio: number;
  minStartPanelSize: number;
  minEndPanelSize: number;
  dividerThickness: number;
  keyboardStep: number;
  pageStep: number;
  enableKeyboard: boolean;
  overlayEnabled: boolean;
  holdScrollWhileDragging: boolean;
  snapPoints: readonly number[];
  snapTolerance: number;
  handleHitSlop: number;
  doubleTapResetTo: number | null;
  resizable: boolean;
  overflowPolicy: OverflowPolicy;
  unboundedBehavior: UnboundedBehavior;
  fallbackMainAxisExtent: number;
  antiAliasing: boolean;
  colors: {
    divider?: string;
    dividerHover?: string;
    dividerActive?: string;
    blocker?: string;
  };
}

/**
 * Validate options and theme, then merge them over the defaults.
 * Throws `SplitterConfigError` on the first invalid input.
 */
export function resolveSplitterConfig(
  options: SplitterOptionValues = {},
  theme: SplitterThemeData = {}
): ResolvedSplitterConfig {
  const parsedOptions = splitterOptionsSchema.safeParse(options);
  if (!parsedOptions.success) throw configErrorFromZod(parsedOptions.error);
  const parsedTheme = splitterThemeSchema.safeParse(theme);
  if (!parsedTheme.success) throw configErrorFromZod(parsedTheme.error);

  const o = parsedOptions.data;
  const t = parsedTheme.data;
  const d = SPLITTER_DEFAULTS;
  const minPanelSize = o.minPanelSize ?? d.minPanelSize;

  return Object.freeze({
    axis: o.axis ?? d.axis,
    initialRatio: o.initialRatio ?? d.initialRatio,
    minRatio: o.minRatio ?? d.minRatio,
    maxRatio: o.maxRatio ?? d.maxRatio,
    minStartPanelSize: o.minStartPanelSize ?? minPanelSize,
    minEndPanelSize: o.minEndPanelSize ?? minPanelSize,
    dividerThickness: o.dividerThickness ?? t.dividerThickness ?? d.dividerThickness,
    keyboardStep: o.keyboardStep ?? t.keyboardStep ?? d.keyboardStep,
    pageStep: o.pageStep ?? t.pageStep ?? d.pageStep,
    enableKeyboard: o.enableKeyboard ?? t.enableKeyboard ?? d.enableKeyboard,
    overlayEnabled: o.overlayEnabled ?? t.overlayEnabled ?? d.overlayEnabled,
    holdScrollWhileDragging: o.holdScrollWhileDragging ?? d.holdScrollWhileDragging,
    snapPoints: Object.freeze([...(o.snapPoints ?? [])]),
    snapTolerance: o.snapTolerance ?? d.snapTolerance,
    handleHitSlop: o.handleHitSlop ?? t.handleHitSlop ?? d.handleHitSlop,
    doubleTapResetTo: o.doubleTapResetTo ?? null,
    resizable: o.resizable ?? d.resizable,
    overflowPolicy: o.overflowPolicy ?? d.overflowPolicy,
    unboundedBehavior: o.unboundedBehavior ?? t.unboundedBehavior ?? d.unboundedBehavior,
    fallbackMainAxisExtent: o.fallbackMainAxisExtent ?? t.fallbackMainAxisExtent ?? d.fallbackMainAxisExtent,
    antiAliasing: o.antiAliasing ?? t.antiAliasing ?? d.antiAliasing,
    colors: {
      divider: o.dividerColor ?? t.dividerColor,
      dividerHover: o.dividerHoverColor ?? t.dividerHoverColor,
      dividerActive: o.dividerActiveColor ?? t.dividerActiveColor,
      blocker: o.blockerColor ?? t.blockerColor,
    },
  });
}
