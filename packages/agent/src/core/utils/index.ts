/**
 * @fileoverview Utils Module
 *
 * Error classification and history repair.
 */

export * from './errors.js';
export * from './history-repair.js';
