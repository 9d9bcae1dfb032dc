/**
 * Duopane core exports
 */

export * from './config';
export * from './constraintResolver';
export * from './dividerController';
export * from './dragStateMachine';
export * from './easing';
export * from './errors';
export * from './keyboardAdjuster';
export * from './pointerRouter';
export * from './ratioStore';
export * from './scheduler';
export * from './snapEngine';
export * from './theming';
