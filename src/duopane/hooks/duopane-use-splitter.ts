/**
 * Splitter Hook
 * Binds a DividerController to a container and a handle element
 */

import React, { useCallback, useEffect, useLayoutEffect, useRef, useState } from 'react';
import type {
  HandleDetails,
  InteractionEffects,
  PointerDeviceKind,
  SplitLayout,
  SplitterAxis,
  SplitterPointerEvent,
} from '../types/duopane-split';
import { resolveSplitterConfig, type ResolvedSplitterConfig } from '../lib/config';
import { DividerController, type DividerControllerOptions } from '../lib/dividerController';
import { deviceKindOf } from '../lib/pointerRouter';
import { mergeSplitterThemes, useSplitterTheme } from '../lib/theming';
import { log } from '../services/logger';

const COMPONENT = 'useSplitter';

/** Pointer travel before a press turns into a drag. */
export const DRAG_SLOP_PX = 5;
export const DOUBLE_TAP_WINDOW_MS = 300;
export const DRAGGING_BODY_CLASS = 'duopane-resize-dragging';

export type UseSplitterOptions = DividerControllerOptions & {
  /** Skip measuring and lay out against this extent; `Infinity` means unbounded. */
  mainAxisExtent?: number;
};

export interface SplitterHandleProps {
  ref: React.RefObject<HTMLDivElement>;
  role: 'separator';
  tabIndex: number | undefined;
  'aria-orientation': 'horizontal' | 'vertical';
  'aria-valuenow': number;
  'aria-valuemin': number;
  'aria-valuemax': number;
  'aria-disabled': boolean;
  onPointerDown: (event: React.PointerEvent<HTMLDivElement>) => void;
  onPointerEnter: () => void;
  onPointerLeave: () => void;
  onKeyDown: (event: React.KeyboardEvent<HTMLDivElement>) => void;
  onKeyUp: () => void;
  onFocus: () => void;
  onBlur: () => void;
}

export interface UseSplitterResult {
  controller: DividerController | null;
  ratio: number;
  layout: SplitLayout;
  config: ResolvedSplitterConfig;
  handleDetails: HandleDetails;
  containerRef: React.RefObject<HTMLDivElement>;
  handleProps: SplitterHandleProps;
}

interface Gesture {
  pointerId: number;
  origin: { x: number; y: number };
  deviceKind: PointerDeviceKind;
  started: boolean;
  detach: () => void;
}

interface PointerLike {
  pointerId: number;
  clientX: number;
  clientY: number;
  pointerType: string;
  buttons: number;
}

function toSplitterEvent(event: PointerLike, phase: SplitterPointerEvent['phase']): SplitterPointerEvent {
  return {
    pointerId: event.pointerId,
    phase,
    globalPosition: { x: event.clientX, y: event.clientY },
    deviceKind: deviceKindOf(event.pointerType),
    buttons: event.buttons,
  };
}

function sameList(a: readonly number[] | undefined, b: readonly number[] | undefined): boolean {
  if (a === b) return true;
  if (!a || !b || a.length !== b.length) return false;
  return a.every((value, i) => value === b[i]);
}

function shallowEqual<T extends object>(a: T | undefined, b: T | undefined): boolean {
  if (a === b) return true;
  if (!a || !b) return false;
  const keys = new Set([...Object.keys(a), ...Object.keys(b)]);
  for (const key of keys) {
    if (Reflect.get(a, key) !== Reflect.get(b, key)) return false;
  }
  return true;
}

/**
 * Options the controller re-validates on change. Every key is listed so a
 * removed option falls back to its default instead of keeping a stale value.
 */
function coreOptions(options: UseSplitterOptions, contextTheme: DividerControllerOptions['theme']): DividerControllerOptions {
  return {
    axis: options.axis,
    initialRatio: options.initialRatio,
    minRatio: options.minRatio,
    maxRatio: options.maxRatio,
    minPanelSize: options.minPanelSize,
    minStartPanelSize: options.minStartPanelSize,
    minEndPanelSize: options.minEndPanelSize,
    dividerThickness: options.dividerThickness,
    handleHitSlop: options.handleHitSlop,
    keyboardStep: options.keyboardStep,
    pageStep: options.pageStep,
    enableKeyboard: options.enableKeyboard,
    overlayEnabled: options.overlayEnabled,
    holdScrollWhileDragging: options.holdScrollWhileDragging,
    snapPoints: options.snapPoints,
    snapTolerance: options.snapTolerance,
    doubleTapResetTo: options.doubleTapResetTo,
    resizable: options.resizable,
    overflowPolicy: options.overflowPolicy,
    unboundedBehavior: options.unboundedBehavior,
    fallbackMainAxisExtent: options.fallbackMainAxisExtent,
    antiAliasing: options.antiAliasing,
    dividerColor: options.dividerColor,
    dividerHoverColor: options.dividerHoverColor,
    dividerActiveColor: options.dividerActiveColor,
    blockerColor: options.blockerColor,
    store: options.store,
    theme: mergeSplitterThemes(contextTheme ?? {}, options.theme ?? {}),
    resetAnimation: options.resetAnimation,
    scheduler: options.scheduler,
    router: options.router,
  };
}

function sameCoreOptions(a: DividerControllerOptions, b: DividerControllerOptions): boolean {
  const { snapPoints: snapA, theme: themeA, resetAnimation: animA, ...restA } = a;
  const { snapPoints: snapB, theme: themeB, resetAnimation: animB, ...restB } = b;
  return sameList(snapA, snapB) && shallowEqual(themeA, themeB) && shallowEqual(animA, animB) && shallowEqual(restA, restB);
}

function resizeCursor(axis: SplitterAxis): string {
  return axis === 'horizontal' ? 'col-resize' : 'row-resize';
}

/**
 * Covers the page while a drag runs so iframes and other embedded surfaces
 * cannot take the pointer stream away from the divider.
 */
function showDragOverlay(axis: SplitterAxis, blockerColor: string | undefined): () => void {
  const body = document.body;
  const overlay = document.createElement('div');
  overlay.setAttribute('data-duopane-overlay', axis);
  Object.assign(overlay.style, {
    position: 'fixed',
    inset: '0',
    zIndex: '2147483647',
    cursor: resizeCursor(axis),
    background: blockerColor ?? 'transparent',
  });
  body.appendChild(overlay);
  body.classList.add(DRAGGING_BODY_CLASS);
  body.style.cursor = resizeCursor(axis);
  body.style.userSelect = 'none';

  return () => {
    overlay.remove();
    body.classList.remove(DRAGGING_BODY_CLASS);
    body.style.cursor = '';
    body.style.userSelect = '';
  };
}

function holdBodyScroll(): () => void {
  const body = document.body;
  const previous = body.style.overflow;
  body.style.overflow = 'hidden';
  return () => {
    body.style.overflow = previous;
  };
}

/**
 * Drive a two-pane split from DOM input.
 *
 * The container is measured along the split axis unless `mainAxisExtent` is
 * given. Callbacks are read from the latest render, so inline handlers do
 * not rebuild the controller.
 */
export function useSplitter(options: UseSplitterOptions = {}): UseSplitterResult {
  const contextTheme = useSplitterTheme();
  const containerRef = useRef<HTMLDivElement>(null);
  const handleRef = useRef<HTMLDivElement>(null);
  const latest = useRef(options);
  latest.current = options;

  const core = coreOptions(options, contextTheme);
  const coreRef = useRef(core);
  const appliedRef = useRef(core);
  coreRef.current = core;

  const [controller, setController] = useState<DividerController | null>(null);
  const [ratio, setRatio] = useState(() => options.store?.value ?? options.initialRatio ?? 0.5);
  const [details, setDetails] = useState<HandleDetails | null>(null);
  const [measured, setMeasured] = useState(0);
  const controllerRef = useRef<DividerController | null>(null);
  const gestureRef = useRef<Gesture | null>(null);
  const lastTapRef = useRef(Number.NEGATIVE_INFINITY);

  useLayoutEffect(() => {
    const effects: InteractionEffects = {
      showOverlay: (axis) => showDragOverlay(axis, controllerRef.current?.config.colors.blocker),
      acquireScrollHold: holdBodyScroll,
      requestFocus: () => handleRef.current?.focus(),
      haptic: () => latest.current.effects?.haptic?.(),
    };
    const instance = new DividerController({ ...coreRef.current, effects });
    appliedRef.current = coreRef.current;
    controllerRef.current = instance;

    instance.on('change', setRatio);
    instance.on('interaction', setDetails);
    instance.on('ratioChanged', (value) => latest.current.onRatioChanged?.(value));
    instance.on('dragStart', (value) => latest.current.onDragStart?.(value));
    instance.on('dragEnd', (value) => {
      if (gestureRef.current?.started) {
        gestureRef.current.detach();
        gestureRef.current = null;
      }
      latest.current.onDragEnd?.(value);
    });
    instance.on('handleTap', (value) => latest.current.onHandleTap?.(value));
    instance.on('handleDoubleTap', (value) => latest.current.onHandleDoubleTap?.(value));

    setController(instance);
    setRatio(instance.ratio);
    setDetails(instance.handleDetails);
    log.debug(COMPONENT, 'Splitter mounted', { ratio: instance.ratio });

    return () => {
      gestureRef.current?.detach();
      gestureRef.current = null;
      controllerRef.current = null;
      instance.dispose();
    };
  }, []);

  useLayoutEffect(() => {
    if (!controller || sameCoreOptions(appliedRef.current, core)) return;
    appliedRef.current = core;
    controller.updateOptions(core);
    setRatio(controller.ratio);
    setDetails(controller.handleDetails);
  });

  const config = controller?.config ?? resolveSplitterConfig(core, core.theme);
  const axis = config.axis;
  const fixedExtent = options.mainAxisExtent;

  useLayoutEffect(() => {
    if (fixedExtent !== undefined) return;
    const element = containerRef.current;
    if (!element) return;
    const measure = () => {
      const rect = element.getBoundingClientRect();
      setMeasured(axis === 'horizontal' ? rect.width : rect.height);
    };
    measure();
    if (typeof ResizeObserver !== 'undefined') {
      const observer = new ResizeObserver(measure);
      observer.observe(element);
      return () => observer.disconnect();
    }
    window.addEventListener('resize', measure);
    return () => window.removeEventListener('resize', measure);
  }, [axis, fixedExtent]);

  useEffect(() => {
    if (controller && !config.resizable) {
      gestureRef.current?.detach();
      gestureRef.current = null;
    }
  }, [controller, config.resizable]);

  const layout: SplitLayout = controller ? controller.layout(fixedExtent ?? measured) : { kind: 'flex' };

  const endGesture = useCallback((event: PointerLike, phase: 'up' | 'cancel') => {
    const gesture = gestureRef.current;
    const instance = controllerRef.current;
    if (!gesture || gesture.pointerId !== event.pointerId) return;
    gesture.detach();
    gestureRef.current = null;
    if (!instance) return;

    instance.pointerEvent(toSplitterEvent(event, phase));
    if (gesture.started) {
      if (phase === 'up') instance.dragMachine.dragEnd();
      else instance.dragMachine.dragCancel();
      return;
    }
    if (phase === 'cancel') return;

    const now = Date.now();
    if (now - lastTapRef.current <= DOUBLE_TAP_WINDOW_MS) {
      lastTapRef.current = Number.NEGATIVE_INFINITY;
      instance.doubleTap().catch((error: unknown) => {
        log.error(COMPONENT, 'Double-tap reset failed', { error: String(error) });
      });
    } else {
      lastTapRef.current = now;
      instance.tap();
    }
  }, []);

  const movePointer = useCallback((event: PointerLike) => {
    const gesture = gestureRef.current;
    const instance = controllerRef.current;
    if (!gesture || !instance || gesture.pointerId !== event.pointerId) return;

    if (!gesture.started) {
      instance.pointerEvent(toSplitterEvent(event, 'move'));
      const dx = event.clientX - gesture.origin.x;
      const dy = event.clientY - gesture.origin.y;
      if (dx * dx + dy * dy <= DRAG_SLOP_PX * DRAG_SLOP_PX) return;
      gesture.started = true;
      instance.dragMachine.dragStart({ globalPosition: gesture.origin, deviceKind: gesture.deviceKind });
    }
    instance.dragMachine.dragUpdate({ globalPosition: { x: event.clientX, y: event.clientY } });
  }, []);

  const onPointerDown = useCallback(
    (event: React.PointerEvent<HTMLDivElement>) => {
      const instance = controllerRef.current;
      if (!instance || !instance.config.resizable) return;
      if (gestureRef.current) {
        if (instance.dragMachine.isDragging) return;
        // The previous release never reached the document.
        gestureRef.current.detach();
        gestureRef.current = null;
      }
      const splitterEvent = toSplitterEvent(event, 'down');
      instance.pointerEvent(splitterEvent);
      if (instance.dragMachine.state !== 'armed') return;
      event.preventDefault();

      const onMove = (e: PointerEvent) => movePointer(e);
      const onUp = (e: PointerEvent) => endGesture(e, 'up');
      const onCancel = (e: PointerEvent) => endGesture(e, 'cancel');
      document.addEventListener('pointermove', onMove);
      document.addEventListener('pointerup', onUp);
      document.addEventListener('pointercancel', onCancel);

      gestureRef.current = {
        pointerId: event.pointerId,
        origin: splitterEvent.globalPosition,
        deviceKind: splitterEvent.deviceKind,
        started: false,
        detach: () => {
          document.removeEventListener('pointermove', onMove);
          document.removeEventListener('pointerup', onUp);
          document.removeEventListener('pointercancel', onCancel);
        },
      };
    },
    [movePointer, endGesture]
  );

  const onKeyDown = useCallback((event: React.KeyboardEvent<HTMLDivElement>) => {
    if (controllerRef.current?.handleKey(event.key)) {
      event.preventDefault();
    }
  }, []);

  const onKeyUp = useCallback(() => controllerRef.current?.handleKeyRelease(), []);
  const onPointerEnter = useCallback(() => controllerRef.current?.dragMachine.hoverChanged(true), []);
  const onPointerLeave = useCallback(() => controllerRef.current?.dragMachine.hoverChanged(false), []);
  const onFocus = useCallback(() => controllerRef.current?.dragMachine.focusChanged(true), []);
  const onBlur = useCallback(() => controllerRef.current?.dragMachine.focusChanged(false), []);

  const handleDetails: HandleDetails = details ?? {
    axis,
    isDragging: false,
    isHovering: false,
    isFocused: false,
    thickness: config.dividerThickness,
  };
  const keyboardEnabled = config.enableKeyboard && config.resizable;

  return {
    controller,
    ratio,
    layout,
    config,
    handleDetails,
    containerRef,
    handleProps: {
      ref: handleRef,
      role: 'separator',
      tabIndex: keyboardEnabled ? 0 : undefined,
      'aria-orientation': axis === 'horizontal' ? 'vertical' : 'horizontal',
      'aria-valuenow': Math.round(ratio * 100),
      'aria-valuemin': Math.round(config.minRatio * 100),
      'aria-valuemax': Math.round(config.maxRatio * 100),
      'aria-disabled': !config.resizable,
      onPointerDown,
      onPointerEnter,
      onPointerLeave,
      onKeyDown,
      onKeyUp,
      onFocus,
      onBlur,
    },
  };
}
