/**
 * Splitter Error Handling
 *
 * Configuration errors are raised eagerly at construction, option update or
 * attach time. Geometry problems and interaction races never surface here.
 */

import type { ZodError, ZodIssue } from 'zod';

export enum SplitterErrorType {
  INVALID_RATIO = 'invalid_ratio',
  INVALID_RATIO_BOUNDS = 'invalid_ratio_bounds',
  NEGATIVE_SIZE = 'negative_size',
  INVALID_STEP = 'invalid_step',
  INVALID_EXTENT = 'invalid_extent',
  INVALID_OPTION = 'invalid_option',
  SHARED_STORE = 'shared_store'
}

export interface SplitterConfigIssue {
  path: string;
  message: string;
}

export class SplitterConfigError extends Error {
  readonly type: SplitterErrorType;
  readonly issues: SplitterConfigIssue[];

  constructor(type: SplitterErrorType, message: string, issues: SplitterConfigIssue[] = []) {
    super(message);
    this.name = 'SplitterConfigError';
    this.type = type;
    this.issues = issues;
  }
}

const RATIO_FIELDS = new Set(['initialRatio', 'doubleTapResetTo', 'snapPoints', 'snapTolerance']);
const BOUND_FIELDS = new Set(['minRatio', 'maxRatio']);
const SIZE_FIELDS = new Set([
  'minPanelSize',
  'minStartPanelSize',
  'minEndPanelSize',
  'dividerThickness',
  'handleHitSlop',
]);
const STEP_FIELDS = new Set(['keyboardStep', 'pageStep']);

/**
 * Map a schema issue onto the error taxonomy by the option it concerns.
 */
export function categorizeIssue(issue: ZodIssue): SplitterErrorType {
  const field = String(issue.path[0] ?? '');
  if (BOUND_FIELDS.has(field)) {
    return issue.code === 'custom' ? SplitterErrorType.INVALID_RATIO_BOUNDS : SplitterErrorType.INVALID_RATIO;
  }
  if (RATIO_FIELDS.has(field)) return SplitterErrorType.INVALID_RATIO;
  if (SIZE_FIELDS.has(field)) return SplitterErrorType.NEGATIVE_SIZE;
  if (STEP_FIELDS.has(field)) return SplitterErrorType.INVALID_STEP;
  if (field === 'fallbackMainAxisExtent') return SplitterErrorType.INVALID_EXTENT;
  return SplitterErrorType.INVALID_OPTION;
}

export function configErrorFromZod(error: ZodError): SplitterConfigError {
  const issues = error.issues.map((issue) => ({
    path: issue.path.join('.') || '(root)',
    message: issue.message,
  }));
  const first = error.issues[0];
  const type = first ? categorizeIssue(first) : SplitterErrorType.INVALID_OPTION;
  const summary = issues.map((i) => `${i.path}: ${i.message}`).join('; ');
  return new SplitterConfigError(type, `Invalid splitter options (${summary})`, issues);
}
