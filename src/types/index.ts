/**
 * Content Model
 * @module types
 */

export * from './ids.js';
export * from './entities.js';
export * from './support.js';
export * from './display.js';
