/**
 * Kysely reference backend.
 *
 * Tracking table, applier and the versions that run against it.
 */
export * from './types.js';
export * from './applier.js';
export * from './versioning.js';
export * from './version.js';
