export * from './types/duopane-split';
export * from './lib';
export { log, splitterLogger, LogLevel } from './services/logger';
export type { LogEntry, LogSink } from './services/logger';
export { useSplitter } from './hooks/duopane-use-splitter';
export type { UseSplitterOptions, UseSplitterResult } from './hooks/duopane-use-splitter';
export { DuopaneSplitPanel } from './components/DuopaneSplitPanel';
export type { DuopaneSplitPanelProps } from './components/DuopaneSplitPanel';
