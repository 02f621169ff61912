/**
 * Error Handling Module
 * @module errors
 */

export * from './codes.js';
export * from './base.js';
export * from './infrastructure.js';
export * from './domain.js';
