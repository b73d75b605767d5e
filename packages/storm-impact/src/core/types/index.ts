/**
 * Core type exports
 */

export * from './zone.js';
export * from './hazard.js';
export * from './records.js';
