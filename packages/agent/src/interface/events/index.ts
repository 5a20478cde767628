/**
 * @fileoverview Event delivery exports
 */

export { EventChannel, storeEventLog, type EventChannelOptions, type EventLog, type EventObserver } from './event-channel.js';
export { ReplayEngine, type MessageObserver, type ReplaySource } from './replay-engine.js';
