/**
 * Global Pointer Router
 *
 * Process-wide registry of the drag that currently owns a pointer. It listens
 * to the whole pointer stream (not just the handle's own events) so that an
 * up/cancel swallowed by an embedded surface still ends the drag.
 */

import type { PointerDeviceKind, SplitterPointerEvent } from '../types/duopane-split';
import { log } from '../services/logger';

const COMPONENT = 'PointerRouter';

/** Anything that can be force-stopped when its pointer is released elsewhere. */
export interface RouterTarget {
  readonly id: string;
  forceStopDrag(): void;
}

export type PointerListener = (event: SplitterPointerEvent) => void;

export interface PointerEventSource {
  subscribe(listener: PointerListener): () => void;
}

export class PointerRouter {
  private currentDragger: RouterTarget | null = null;
  private activePointerId: number | null = null;
  private readonly targets = new Set<RouterTarget>();
  private initialized = false;
  private unsubscribeSource: (() => void) | null = null;

  constructor(private readonly sourceFactory: () => PointerEventSource | undefined = () => undefined) {}

  get isInitialized(): boolean {
    return this.initialized;
  }

  get dragger(): RouterTarget | null {
    return this.currentDragger;
  }

  get pointerId(): number | null {
    return this.activePointerId;
  }

  get registeredCount(): number {
    return this.targets.size;
  }

  /**
   * Start listening to a pointer source. Called lazily on first registration
   * with the factory's source; an explicit source replaces it.
   */
  init(source?: PointerEventSource): void {
    if (source) {
      this.unsubscribeSource?.();
      this.unsubscribeSource = source.subscribe((event) => this.route(event));
      this.initialized = true;
      return;
    }
    if (this.initialized) return;
    const fallback = this.sourceFactory();
    if (fallback) {
      this.unsubscribeSource = fallback.subscribe((event) => this.route(event));
    }
    this.initialized = true;
  }

  teardown(): void {
    this.unsubscribeSource?.();
    this.unsubscribeSource = null;
    this.initialized = false;
    this.currentDragger = null;
    this.activePointerId = null;
    this.targets.clear();
  }

  register(target: RouterTarget): void {
    this.init();
    this.targets.add(target);
  }

  unregister(target: RouterTarget): void {
    this.targets.delete(target);
    if (this.currentDragger === target) {
      this.currentDragger = null;
      this.activePointerId = null;
    }
  }

  /**
   * Record the active drag. A new dragger supersedes the previous one without
   * stopping it. `null` clears the record.
   */
  setDragging(target: RouterTarget | null, pointerId: number | null = null): void {
    if (target) {
      this.init();
      if (this.currentDragger && this.currentDragger !== target) {
        log.debug(COMPONENT, 'Drag superseded', { previous: this.currentDragger.id, next: target.id });
      }
    }
    this.currentDragger = target;
    this.activePointerId = target ? pointerId : null;
  }

  /** Clear the record only when it still belongs to `target`. */
  release(target: RouterTarget): void {
    if (this.currentDragger === target) {
      this.setDragging(null);
    }
  }

  isActiveDrag(target: RouterTarget, pointerId: number | null): boolean {
    return this.currentDragger === target && this.activePointerId === pointerId;
  }

  route(event: SplitterPointerEvent): void {
    if (event.phase !== 'up' && event.phase !== 'cancel') return;
    const dragger = this.currentDragger;
    const active = this.activePointerId;
    if (!dragger || active === null || active < 0 || event.pointerId !== active) return;

    log.debug(COMPONENT, 'Force-stopping drag on global pointer release', {
      target: dragger.id,
      pointerId: active,
      phase: event.phase,
    });
    this.currentDragger = null;
    this.activePointerId = null;
    dragger.forceStopDrag();
  }

  // Test-only
  resetForTests(): void {
    this.teardown();
  }
}

export function deviceKindOf(pointerType: string | undefined): PointerDeviceKind {
  switch (pointerType) {
    case 'mouse':
    case 'touch':
    case 'pen':
      return pointerType;
    default:
      return 'unknown';
  }
}

/**
 * Feed pointer releases seen anywhere on `target` (capture phase) into a router.
 */
export function createWindowPointerSource(target: Window): PointerEventSource {
  return {
    subscribe(listener) {
      const forward = (phase: 'up' | 'cancel') => (event: PointerEvent) => {
        if (!Number.isInteger(event.pointerId)) return;
        listener({
          pointerId: event.pointerId,
          phase,
          globalPosition: { x: event.clientX, y: event.clientY },
          deviceKind: deviceKindOf(event.pointerType),
          buttons: event.buttons,
        });
      };
      const onUp = forward('up');
      const onCancel = forward('cancel');
      target.addEventListener('pointerup', onUp, true);
      target.addEventListener('pointercancel', onCancel, true);
      return () => {
        target.removeEventListener('pointerup', onUp, true);
        target.removeEventListener('pointercancel', onCancel, true);
      };
    },
  };
}

export const pointerRouter = new PointerRouter(() =>
  typeof window !== 'undefined' ? createWindowPointerSource(window) : undefined
);
