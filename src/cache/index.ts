/**
 * Cache Subsystem
 * @module cache
 */

export * from './keyed-cache.js';
export * from './web-log-cache.js';
export * from './page-list-cache.js';
export * from './category-cache.js';
export * from './theme-asset-cache.js';
export * from './template-cache.js';
export * from './app-caches.js';
