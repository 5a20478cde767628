export { MapActiveSessionStore, type ActiveSessionStore } from './active-session-store.js';
