/**
 * @fileoverview Tiller Server Entry Point
 *
 * Wires settings, storage, the workspace backend and the reasoning service
 * into a SessionCoordinator and serves it over WebSocket.
 */
import { createLogger } from './infrastructure/logging/index.js';
import { loadSettings, type TillerSettings } from './infrastructure/settings/index.js';
import { DatabaseConnection, SqliteSessionStore, type SessionStore } from './infrastructure/persistence/index.js';
import { LocalBackend, type ExecutionBackend } from './infrastructure/backend/index.js';
import { AnthropicReasoningService, type ReasoningService } from './llm/index.js';
import { ReasoningSummarizer } from './context/index.js';
import { SessionCoordinator } from './runtime/orchestrator/index.js';
import { GatewayServer } from './interface/gateway/index.js';

const logger = createLogger('server');

// =============================================================================
// Types
// =============================================================================

export interface TillerServerConfig {
  settings: TillerSettings;
  /** Replaces the SQLite store opened at `storage.dbPath` */
  store?: SessionStore;
  /** Replaces the local backend rooted at `workspace.root` */
  backend?: ExecutionBackend;
  /** Replaces the Anthropic service for `reasoning.model` */
  service?: ReasoningService;
}

// =============================================================================
// Server
// =============================================================================

export class TillerServer {
  private readonly config: TillerServerConfig;
  private store: SessionStore | null = null;
  private coordinator: SessionCoordinator | null = null;
  private gateway: GatewayServer | null = null;
  private isRunning = false;

  constructor(config: TillerServerConfig) {
    this.config = config;
  }

  /**
   * @returns the port the gateway is listening on
   */
  async start(): Promise<number> {
    if (this.isRunning) {
      throw new Error('Server is already running');
    }

    const { settings } = this.config;
    logger.info('Starting Tiller server...');

    this.store = this.config.store ?? new SqliteSessionStore(new DatabaseConnection(settings.storage.dbPath));
    const backend = this.config.backend ?? new LocalBackend({
      root: settings.workspace.root,
      killGraceMs: settings.orchestrator.killGraceMs,
    });
    const service = this.config.service ?? new AnthropicReasoningService({ model: settings.reasoning.model });

    this.coordinator = new SessionCoordinator({
      store: this.store,
      backend,
      service,
      settings,
      summarizer: new ReasoningSummarizer(service),
    });

    this.gateway = new GatewayServer(settings.server, this.coordinator);
    const port = await this.gateway.start();
    this.isRunning = true;

    logger.info('Tiller server started', {
      host: settings.server.host,
      port,
      workspace: backend.root,
      dbPath: settings.storage.dbPath,
      model: service.model,
    });
    return port;
  }

  /**
   * Close connections, cancel running tasks and persist every session.
   */
  async stop(): Promise<void> {
    if (this.gateway) {
      await this.gateway.stop();
      this.gateway = null;
    }
    if (this.coordinator) {
      await this.coordinator.shutdown();
      this.coordinator = null;
    }
    if (this.store) {
      this.store.close();
      this.store = null;
    }
    this.isRunning = false;
    logger.info('Tiller server stopped');
  }
}

// =============================================================================
// CLI Entry Point
// =============================================================================

async function main(): Promise<void> {
  const server = new TillerServer({ settings: loadSettings() });

  const shutdown = async (signal: string) => {
    logger.info(`Received ${signal}, shutting down...`);
    await server.stop();
    process.exit(0);
  };

  process.on('SIGINT', () => void shutdown('SIGINT'));
  process.on('SIGTERM', () => void shutdown('SIGTERM'));
  process.on('uncaughtException', error => {
    logger.error('Uncaught exception', error);
    process.exit(1);
  });
  process.on('unhandledRejection', reason => {
    logger.error('Unhandled rejection', { reason: String(reason) });
    process.exit(1);
  });

  await server.start();
  logger.info('Server ready. Press Ctrl+C to stop.');
}

const isMain = process.argv[1]?.endsWith('server.js') || process.argv[1]?.endsWith('server.ts');
if (isMain) {
  main().catch((error: unknown) => {
    logger.error('Failed to start server', error instanceof Error ? error : { error: String(error) });
    process.exit(1);
  });
}
