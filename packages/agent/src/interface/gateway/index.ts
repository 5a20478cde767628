/**
 * @fileoverview Gateway exports
 */

export { GatewayServer, sessionFromUrl, type GatewayServerConfig } from './websocket.js';
export {
  ClientConnection,
  CLOSE_SESSION_DELETED,
  CLOSE_TOO_SLOW,
  type ClientConnectionOptions,
  type ClientSocket,
} from './connection.js';
export { routeInbound } from './router.js';
export {
  inboundMessageSchema,
  taskMessageSchema,
  parseInboundMessage,
  type InboundMessage,
  type InboundType,
  type ParseResult,
} from './schemas.js';
