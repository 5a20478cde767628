/**
 * @fileoverview Interface module exports
 *
 * - events/: the per-session event channel and reconnect replay
 * - gateway/: WebSocket server, inbound message validation and routing
 */

export * from './events/index.js';
export * from './gateway/index.js';
