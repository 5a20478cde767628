/**
 * @fileoverview WebSocket Server
 *
 * Accepts observer connections and hands each one to a ClientConnection.
 * The connection URL selects the session: `ws://host:port/?session=<id>`,
 * or the default session when the parameter is absent.
 */
import { WebSocketServer, WebSocket } from 'ws';
import { EventEmitter } from 'events';
import { randomUUID } from 'crypto';
import type { IncomingMessage } from 'http';
import type { AddressInfo } from 'net';
import { TillerError } from '../../core/errors/index.js';
import { createLogger } from '../../infrastructure/logging/index.js';
import type { ServerSettings } from '../../infrastructure/settings/index.js';
import type { SessionCoordinator } from '../../runtime/orchestrator/index.js';
import { ClientConnection } from './connection.js';

const logger = createLogger('websocket');

// =============================================================================
// Types
// =============================================================================

export type GatewayServerConfig = Pick<ServerSettings, 'host' | 'port' | 'heartbeatIntervalMs' | 'maxPayloadBytes'>;

interface SocketEntry {
  connection: ClientConnection;
  socket: WebSocket;
}

/**
 * Session id named by a connection URL, if any.
 */
export function sessionFromUrl(url: string | undefined): string | undefined {
  const session = new URL(url ?? '/', 'http://localhost').searchParams.get('session');
  return session === null || session.trim() === '' ? undefined : session.trim();
}

// =============================================================================
// WebSocket Server
// =============================================================================

export class GatewayServer extends EventEmitter {
  private readonly config: GatewayServerConfig;
  private readonly coordinator: SessionCoordinator;
  private wss: WebSocketServer | null = null;
  private clients: Map<string, SocketEntry> = new Map();
  private heartbeatTimer: ReturnType<typeof setInterval> | null = null;

  constructor(config: GatewayServerConfig, coordinator: SessionCoordinator) {
    super();
    this.config = config;
    this.coordinator = coordinator;
  }

  /**
   * Start listening. Resolves with the bound port.
   */
  async start(): Promise<number> {
    return new Promise((resolve, reject) => {
      const wss = new WebSocketServer({
        port: this.config.port,
        host: this.config.host,
        maxPayload: this.config.maxPayloadBytes,
      });

      wss.once('error', reject);

      wss.on('listening', () => {
        wss.off('error', reject);
        wss.on('error', error => {
          logger.error('WebSocket server error', error);
          this.emit('error', error);
        });
        const address = wss.address();
        const port = typeof address === 'object' ? boundPort(address) : this.config.port;
        logger.info('WebSocket server started', { host: this.config.host, port });
        this.startHeartbeat();
        resolve(port);
      });

      wss.on('connection', (socket, request) => {
        this.handleConnection(socket, request);
      });

      wss.on('close', () => {
        logger.info('WebSocket server closed');
        this.stopHeartbeat();
        this.emit('close');
      });

      this.wss = wss;
    });
  }

  async stop(): Promise<void> {
    this.stopHeartbeat();

    for (const { connection, socket } of this.clients.values()) {
      connection.close();
      socket.close(1001, 'Server shutting down');
    }
    this.clients.clear();

    return new Promise(resolve => {
      if (this.wss) {
        this.wss.close(() => {
          this.wss = null;
          resolve();
        });
      } else {
        resolve();
      }
    });
  }

  getClientCount(): number {
    return this.clients.size;
  }

  // ===========================================================================
  // Private Methods
  // ===========================================================================

  private handleConnection(socket: WebSocket, request: IncomingMessage): void {
    const clientId = `client_${randomUUID().replace(/-/g, '').slice(0, 12)}`;
    const connection = new ClientConnection({
      id: clientId,
      socket,
      coordinator: this.coordinator,
      sessionId: sessionFromUrl(request.url),
    });
    this.clients.set(clientId, { connection, socket });

    logger.info('Client connected', {
      clientId,
      remoteAddress: request.socket.remoteAddress,
    });

    // Frames that arrive during replay wait for it to finish
    const opened = connection.open();

    socket.on('message', data => {
      opened
        .then(() => connection.receive(data.toString()))
        .catch((error: unknown) => {
          logger.error('Failed to handle message', TillerError.from(error, { clientId }));
        });
    });

    socket.on('pong', () => {
      connection.isAlive = true;
    });

    socket.on('close', (code, reason) => {
      connection.close();
      this.clients.delete(clientId);
      logger.info('Client disconnected', { clientId, code, reason: reason.toString() });
    });

    socket.on('error', error => {
      logger.warn('Client socket error', { clientId, error: error.message });
    });
  }

  private startHeartbeat(): void {
    this.heartbeatTimer = setInterval(() => {
      for (const [clientId, { connection, socket }] of this.clients.entries()) {
        if (!connection.isAlive) {
          logger.info('Client heartbeat timeout', { clientId });
          connection.close();
          socket.terminate();
          this.clients.delete(clientId);
          continue;
        }

        connection.isAlive = false;
        socket.ping();
      }
    }, this.config.heartbeatIntervalMs);
  }

  private stopHeartbeat(): void {
    if (this.heartbeatTimer) {
      clearInterval(this.heartbeatTimer);
      this.heartbeatTimer = null;
    }
  }
}

function boundPort(address: AddressInfo | null): number {
  return address?.port ?? 0;
}
