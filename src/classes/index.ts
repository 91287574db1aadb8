/**
 * Barrel export for all code builder classes
 */

export { CodeBuilder } from './CodeBuilder';
export { Variable, variable } from './Variable';
export { classifyValue, putExtended } from './ValueDispatcher';
export { UnsupportedValueKindError } from './exceptions';
