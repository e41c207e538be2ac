/**
 * Main type exports for wred-aqm
 */

export * from './aqm.js';
