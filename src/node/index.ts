/**
 * Block tree model
 */

export * from './types.js';
export * from './builders.js';
export * from './traverse.js';
