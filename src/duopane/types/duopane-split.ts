/**
 * Duopane - Split Type Definitions
 * Shared types for the splitter core and its React adapter
 */

export type SplitterAxis = 'horizontal' | 'vertical';

/** Rule used when the pixel minimums of both panes exceed the available extent. */
export type OverflowPolicy = 'favorStart' | 'favorEnd' | 'proportional';

/** How a layout pass treats an unbounded (infinite or unmeasured) main axis. */
export type UnboundedBehavior = 'flexExpand' | 'limitedBox';

export type PointerDeviceKind = 'mouse' | 'touch' | 'pen' | 'trackpad' | 'unknown';
export type PointerPhase = 'down' | 'move' | 'up' | 'cancel';

/** Bitmask value of the primary mouse button, as reported by `PointerEvent.buttons`. */
export const PRIMARY_MOUSE_BUTTON = 1;

/** Main-axis extent passed by callers that have no bounded size to offer. */
export const UNBOUNDED = Number.POSITIVE_INFINITY;

export interface Point {
  x: number;
  y: number;
}

export interface SplitterPointerEvent {
  pointerId: number;
  phase: PointerPhase;
  globalPosition: Point;
  deviceKind: PointerDeviceKind;
  buttons?: number;
}

export interface ConstraintConfig {
  minRatio: number;
  maxRatio: number;
  minStartPixels: number;
  minEndPixels: number;
  overflowPolicy: OverflowPolicy;
}

export interface EffectiveBounds {
  lo: number;
  hi: number;
  /** Pixel minimums after clamping into `[0, availableExtent]`. */
  minStart: number;
  minEnd: number;
  cramped: boolean;
}

export interface ResolvedSplit {
  ratio: number;
  firstExtent: number;
  secondExtent: number;
  cramped: boolean;
}

export type KeyIntent =
  | { kind: 'step'; direction: 1 | -1 }
  | { kind: 'page'; direction: 1 | -1 }
  | { kind: 'jumpToMin' }
  | { kind: 'jumpToMax' };

export type SplitLayout =
  | { kind: 'flex' }
  | {
      kind: 'sized';
      mainAxisExtent: number;
      availableExtent: number;
      dividerThickness: number;
      split: ResolvedSplit;
    };

export interface HandleDetails {
  axis: SplitterAxis;
  isDragging: boolean;
  isHovering: boolean;
  isFocused: boolean;
  thickness: number;
}

export interface DragStartDetails {
  globalPosition: Point;
  deviceKind: PointerDeviceKind;
}

export interface DragUpdateDetails {
  globalPosition: Point;
}

export function mainAxisOf(point: Point, axis: SplitterAxis): number {
  return axis === 'horizontal' ? point.x : point.y;
}

/** Snapshot of geometry and settings read by drag and keyboard handling. */
export interface InteractionContext {
  axis: SplitterAxis;
  resizable: boolean;
  enableKeyboard: boolean;
  keyboardStep: number;
  pageStep: number;
  overlayEnabled: boolean;
  holdScrollWhileDragging: boolean;
  snapPoints: readonly number[];
  snapTolerance: number;
  /** Available extent of the most recent layout pass (divider excluded). */
  availableExtent: number;
  constraints: ConstraintConfig;
}

/** Host-side effects; each is optional. */
export interface InteractionEffects {
  /** Returns a release function. */
  acquireScrollHold?: () => () => void;
  /** Insert a pointer-blocking overlay; returns its remover. */
  showOverlay?: (axis: SplitterAxis) => () => void;
  haptic?: () => void | Promise<void>;
  requestFocus?: () => void;
}
