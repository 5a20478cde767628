/**
 * @fileoverview Core type exports
 */

export * from './turns.js';
export * from './session.js';
export * from './events.js';
