/**
 * Duopane Split Panel Component
 * Two panes separated by a draggable, keyboard-adjustable divider
 */

import React from 'react';
import type { HandleDetails, SplitLayout, SplitterAxis } from '../types/duopane-split';
import { useSplitter, type UseSplitterOptions } from '../hooks/duopane-use-splitter';

export interface DuopaneSplitPanelProps extends UseSplitterOptions {
  id?: string;
  firstPanel: React.ReactNode;
  secondPanel: React.ReactNode;
  className?: string;
  style?: React.CSSProperties;
  /** Replaces the default divider visuals; the hit area and input wiring stay. */
  renderHandle?: (details: HandleDetails) => React.ReactNode;
}

const DEFAULT_COLORS = {
  divider: 'var(--duopane-divider, #d1d5db)',
  dividerHover: 'var(--duopane-divider-hover, #60a5fa)',
  dividerActive: 'var(--duopane-divider-active, #3b82f6)',
};

function paneStyle(layout: SplitLayout, axis: SplitterAxis, pane: 'first' | 'second'): React.CSSProperties {
  if (layout.kind === 'flex') {
    return { flex: '1 1 0', minWidth: 0, minHeight: 0, overflow: 'hidden' };
  }
  const size = `${pane === 'first' ? layout.split.firstExtent : layout.split.secondExtent}px`;
  return axis === 'horizontal'
    ? { width: size, flex: '0 0 auto', overflow: 'hidden' }
    : { height: size, flex: '0 0 auto', overflow: 'hidden' };
}

/**
 * Split panel. Pane sizes come from the controller's layout pass; the
 * component only turns them into styles.
 */
export const DuopaneSplitPanel: React.FC<DuopaneSplitPanelProps> = ({
  id,
  firstPanel,
  secondPanel,
  className = '',
  style = {},
  renderHandle,
  ...options
}) => {
  const { layout, config, handleDetails, containerRef, handleProps } = useSplitter(options);
  const axis = config.axis;
  const horizontal = axis === 'horizontal';
  const showDivider = layout.kind === 'sized';
  const slop = config.handleHitSlop;

  const dividerColor = handleDetails.isDragging
    ? config.colors.dividerActive ?? DEFAULT_COLORS.dividerActive
    : handleDetails.isHovering
      ? config.colors.dividerHover ?? DEFAULT_COLORS.dividerHover
      : config.colors.divider ?? DEFAULT_COLORS.divider;

  const containerClasses = [
    'duopane-split-panel',
    handleDetails.isDragging && 'duopane-dragging',
    className,
  ].filter(Boolean).join(' ');

  return (
    <div
      ref={containerRef}
      id={id}
      className={containerClasses}
      style={{
        display: 'flex',
        flexDirection: horizontal ? 'row' : 'column',
        width: '100%',
        height: '100%',
        overflow: 'hidden',
        ...style,
      }}
      data-duopane-split="true"
      data-duopane-axis={axis}
    >
      <div className="duopane-split-first" data-duopane-pane="first" style={paneStyle(layout, axis, 'first')}>
        {firstPanel}
      </div>

      {showDivider && (
        <div
          className="duopane-split-divider"
          data-duopane-divider={axis}
          style={{
            position: 'relative',
            flex: '0 0 auto',
            ...(horizontal ? { width: config.dividerThickness } : { height: config.dividerThickness }),
            backgroundColor: renderHandle ? undefined : dividerColor,
          }}
        >
          {renderHandle?.(handleDetails)}
          {/* Hit area: the divider plus slop on both sides */}
          <div
            {...handleProps}
            className="duopane-split-handle"
            style={{
              position: 'absolute',
              zIndex: 10,
              outline: 'none',
              touchAction: 'none',
              cursor: config.resizable ? (horizontal ? 'col-resize' : 'row-resize') : 'default',
              ...(horizontal
                ? { top: 0, bottom: 0, left: -slop, right: -slop }
                : { left: 0, right: 0, top: -slop, bottom: -slop }),
            }}
          />
        </div>
      )}

      <div className="duopane-split-second" data-duopane-pane="second" style={paneStyle(layout, axis, 'second')}>
        {secondPanel}
      </div>
    </div>
  );
};

export default DuopaneSplitPanel;
