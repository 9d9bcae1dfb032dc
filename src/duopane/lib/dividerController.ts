/**
 * Divider Controller
 *
 * One splitter instance. Validates its options, attaches to (or creates) a
 * RatioStore, runs the layout pass and fans drag, keyboard and tap activity
 * out as typed events and callbacks. Framework adapters hold one of these per
 * mounted splitter and forward DOM input to it.
 */

import { EventEmitter } from 'eventemitter3';
import type {
  ConstraintConfig,
  HandleDetails,
  InteractionContext,
  InteractionEffects,
  SplitLayout,
  SplitterPointerEvent,
} from '../types/duopane-split';
import { resolveSplitterConfig, type ResolvedSplitterConfig, type SplitterOptionValues, type SplitterThemeData } from './config';
import { resolveSplit } from './constraintResolver';
import { DragStateMachine } from './dragStateMachine';
import { KeyboardAdjuster, intentForKey } from './keyboardAdjuster';
import type { PointerRouter } from './pointerRouter';
import { RatioStore, createAttachmentToken, type InterpolateOptions } from './ratioStore';
import type { Scheduler } from './scheduler';
import { log } from '../services/logger';

const COMPONENT = 'DividerController';
const CHANGE_EPSILON = 1e-9;

export interface SplitterCallbacks {
  onRatioChanged?: (ratio: number) => void;
  onDragStart?: (ratio: number) => void;
  onDragEnd?: (ratio: number) => void;
  onHandleTap?: (ratio: number) => void;
  onHandleDoubleTap?: (ratio: number) => void;
}

export type DividerControllerOptions = SplitterOptionValues &
  SplitterCallbacks & {
    /** Caller-owned store; when omitted the controller creates and owns one. */
    store?: RatioStore;
    theme?: SplitterThemeData;
    /** Interpolation used by double-tap reset. */
    resetAnimation?: InterpolateOptions;
    scheduler?: Scheduler;
    router?: PointerRouter;
    effects?: InteractionEffects;
  };

export interface DividerEvents {
  change: (ratio: number) => void;
  ratioChanged: (ratio: number) => void;
  dragStart: (ratio: number) => void;
  dragEnd: (ratio: number) => void;
  handleTap: (ratio: number) => void;
  handleDoubleTap: (ratio: number) => void;
  interaction: (details: HandleDetails) => void;
}

export class DividerController extends EventEmitter<DividerEvents> {
  private options: DividerControllerOptions;
  private _config: ResolvedSplitterConfig;
  private _store: RatioStore;
  private ownsStore: boolean;
  private drag: DragStateMachine;
  private keyboard: KeyboardAdjuster;
  private unwire: Array<() => void> = [];
  private availableExtent = 0;
  private disposed = false;
  private readonly token = createAttachmentToken('divider');

  constructor(options: DividerControllerOptions = {}) {
    super();
    this.options = { ...options };
    this._config = resolveSplitterConfig(options, options.theme);
    const { store, owned } = this.createOrAdopt(this.options, this._config);
    this._store = store;
    this.ownsStore = owned;
    this.drag = new DragStateMachine(store, () => this.context, options.effects);
    this.keyboard = new KeyboardAdjuster(store, () => this.context, options.effects);
    this.wire();
  }

  get store(): RatioStore {
    return this._store;
  }

  get config(): ResolvedSplitterConfig {
    return this._config;
  }

  get ratio(): number {
    return this._store.value;
  }

  get isDisposed(): boolean {
    return this.disposed;
  }

  get dragMachine(): DragStateMachine {
    return this.drag;
  }

  get keyboardAdjuster(): KeyboardAdjuster {
    return this.keyboard;
  }

  get constraints(): ConstraintConfig {
    return {
      minRatio: this._config.minRatio,
      maxRatio: this._config.maxRatio,
      minStartPixels: this._config.minStartPanelSize,
      minEndPixels: this._config.minEndPanelSize,
      overflowPolicy: this._config.overflowPolicy,
    };
  }

  get context(): InteractionContext {
    const c = this._config;
    return {
      axis: c.axis,
      resizable: c.resizable,
      enableKeyboard: c.enableKeyboard,
      keyboardStep: c.keyboardStep,
      pageStep: c.pageStep,
      overlayEnabled: c.overlayEnabled,
      holdScrollWhileDragging: c.holdScrollWhileDragging,
      snapPoints: c.snapPoints,
      snapTolerance: c.snapTolerance,
      availableExtent: this.availableExtent,
      constraints: this.constraints,
    };
  }

  get handleDetails(): HandleDetails {
    const flags = this.drag.interaction;
    return {
      axis: this._config.axis,
      isDragging: this.drag.isDragging,
      isHovering: flags.isHovering,
      isFocused: flags.isFocused,
      thickness: this._config.dividerThickness,
    };
  }

  get keyboardEnabled(): boolean {
    return this._config.enableKeyboard && this._config.resizable;
  }

  /**
   * Compute the split for a main-axis extent and remember the available
   * extent for subsequent drag and keyboard input.
   */
  layout(mainAxisExtent: number): SplitLayout {
    const c = this._config;
    let extent = mainAxisExtent;
    if (!Number.isFinite(extent) || extent <= 0) {
      if (c.unboundedBehavior === 'limitedBox' && extent === Number.POSITIVE_INFINITY) {
        extent = c.fallbackMainAxisExtent;
      } else {
        this.availableExtent = 0;
        return { kind: 'flex' };
      }
    }

    const availableExtent = Math.max(0, extent - c.dividerThickness);
    this.availableExtent = availableExtent;
    return {
      kind: 'sized',
      mainAxisExtent: extent,
      availableExtent,
      dividerThickness: c.dividerThickness,
      split: resolveSplit(this._store.value, availableExtent, this.constraints, { antiAlias: c.antiAliasing }),
    };
  }

  /**
   * Merge new options over the current ones. Validation happens before any
   * state changes, so a rejected update leaves the controller as it was.
   */
  updateOptions(next: DividerControllerOptions): void {
    if (this.disposed) return;
    const merged: DividerControllerOptions = { ...this.options, ...next };
    const config = resolveSplitterConfig(merged, merged.theme);
    const storeChanged = 'store' in next && next.store !== (this.ownsStore ? undefined : this._store);

    if (storeChanged) {
      this.swapStore(merged, config);
    }
    this.options = merged;
    this._config = config;
    if (!config.resizable && this.drag.isDragging) {
      this.drag.forceStop();
    }
    this.emit('interaction', this.handleDetails);
  }

  pointerEvent(event: SplitterPointerEvent): void {
    switch (event.phase) {
      case 'down':
        this.drag.pointerDown(event);
        break;
      case 'move':
        this.drag.pointerMove(event);
        break;
      case 'up':
        this.drag.pointerUp(event);
        break;
      case 'cancel':
        this.drag.pointerCancel(event);
        break;
    }
  }

  /** Returns true when the key was handled. */
  handleKey(key: string): boolean {
    if (!this.keyboardEnabled) return false;
    const intent = intentForKey(key, this._config.axis);
    if (!intent) return false;
    this.keyboard.adjust(intent);
    return true;
  }

  handleKeyRelease(): void {
    this.keyboard.endSession();
  }

  tap(): void {
    if (this.disposed) return;
    const ratio = this._store.value;
    this.emit('handleTap', ratio);
    this.options.onHandleTap?.(ratio);
  }

  async doubleTap(): Promise<void> {
    if (this.disposed) return;
    const ratio = this._store.value;
    this.emit('handleDoubleTap', ratio);
    this.options.onHandleDoubleTap?.(ratio);

    const target = this._config.doubleTapResetTo;
    if (target === null || !this._config.resizable) return;
    const store = this._store;
    const before = store.value;
    await store.interpolateTo(target, this.options.resetAnimation);
    if (!this.disposed && store === this._store && Math.abs(store.value - before) > CHANGE_EPSILON) {
      this.emitRatioChanged(store.value);
    }
  }

  dispose(): void {
    if (this.disposed) return;
    this.disposed = true;
    this.releaseStore();
    this.removeAllListeners();
  }

  private createOrAdopt(
    options: DividerControllerOptions,
    config: ResolvedSplitterConfig
  ): { store: RatioStore; owned: boolean } {
    const store =
      options.store ??
      new RatioStore({
        initialRatio: config.initialRatio,
        scheduler: options.scheduler,
        router: options.router,
      });
    store.attach(this.token);
    return { store, owned: options.store === undefined };
  }

  private swapStore(options: DividerControllerOptions, config: ResolvedSplitterConfig): void {
    const adopted = this.createOrAdopt(options, config);
    this.releaseStore();
    this._store = adopted.store;
    this.ownsStore = adopted.owned;
    this.drag = new DragStateMachine(adopted.store, () => this.context, options.effects);
    this.keyboard = new KeyboardAdjuster(adopted.store, () => this.context, options.effects);
    this.wire();
    log.debug(COMPONENT, 'Ratio store replaced', { owned: adopted.owned });
  }

  private releaseStore(): void {
    this.drag.dispose();
    this.keyboard.removeAllListeners();
    this.unwire.forEach((fn) => fn());
    this.unwire = [];
    this._store.cancelInterpolation();
    this._store.detach(this.token);
    if (this.ownsStore) {
      this._store.dispose();
    }
  }

  private wire(): void {
    const onDragStart = (ratio: number) => {
      this.emit('dragStart', ratio);
      this.options.onDragStart?.(ratio);
      this.emit('interaction', this.handleDetails);
    };
    const onDragEnd = (ratio: number) => {
      this.emit('dragEnd', ratio);
      this.options.onDragEnd?.(ratio);
      this.emit('interaction', this.handleDetails);
    };
    const onRatioChanged = (ratio: number) => this.emitRatioChanged(ratio);
    const onInteraction = () => this.emit('interaction', this.handleDetails);

    this.drag.on('dragStart', onDragStart);
    this.drag.on('dragEnd', onDragEnd);
    this.drag.on('ratioChanged', onRatioChanged);
    this.drag.on('interaction', onInteraction);
    this.keyboard.on('ratioChanged', onRatioChanged);
    this.unwire.push(this._store.subscribe((value) => this.emit('change', value)));
  }

  private emitRatioChanged(ratio: number): void {
    this.emit('ratioChanged', ratio);
    this.options.onRatioChanged?.(ratio);
  }
}
