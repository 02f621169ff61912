/**
 * Backup and Restore
 * @module backup
 */

export * from './archive.js';
export * from './backup-service.js';
