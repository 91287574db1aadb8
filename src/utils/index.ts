/**
 * Utility functions for the code builder
 */

export * from './valueConversion';
export * from './debug';
