/**
 * @fileoverview Client connection
 *
 * One attached observer per socket. Outbound messages are the replay and
 * then the live event stream of the bound session; inbound frames are
 * validated, routed, and answered with a `reply`.
 *
 * A client that stops draining its socket is disconnected rather than
 * skipped: the event stream must stay gapless, and reconnecting replays
 * whatever it missed. A client whose session is deleted is closed once any
 * request it has in flight is answered.
 */

import { ErrorCodes, TillerError, formatError } from '../../core/errors/index.js';
import type { OutboundMessage, ReplyMessage } from '../../core/types/index.js';
import { createLogger, type TillerLogger } from '../../infrastructure/logging/index.js';
import type { Attachment, SessionCoordinator } from '../../runtime/orchestrator/index.js';
import { routeInbound } from './router.js';
import { parseInboundMessage } from './schemas.js';

/** ws readyState for an open socket */
const OPEN = 1;

/** Close code sent to a client that cannot keep up */
export const CLOSE_TOO_SLOW = 1013;

/** Close code sent after the bound session is deleted */
export const CLOSE_SESSION_DELETED = 4000;

/**
 * The part of a ws socket a connection uses.
 */
export interface ClientSocket {
  readonly readyState: number;
  send(data: string, callback?: (error?: Error) => void): void;
  close(code?: number, reason?: string): void;
}

export interface ClientConnectionOptions {
  id: string;
  socket: ClientSocket;
  coordinator: SessionCoordinator;
  /** Session named by the connection URL; the default session when absent */
  sessionId?: string;
  maxPendingMessages?: number;
}

const DEFAULT_MAX_PENDING = 1000;

export class ClientConnection {
  readonly id: string;
  readonly connectedAt = new Date();
  isAlive = true;
  private readonly socket: ClientSocket;
  private readonly coordinator: SessionCoordinator;
  private readonly requestedSession: string | undefined;
  private readonly maxPending: number;
  private attachment: Attachment | null = null;
  private pending = 0;
  private inFlight = 0;
  private sessionDeleted = false;
  private closed = false;
  private readonly logger: TillerLogger;

  constructor(options: ClientConnectionOptions) {
    this.id = options.id;
    this.socket = options.socket;
    this.coordinator = options.coordinator;
    this.requestedSession = options.sessionId;
    this.maxPending = options.maxPendingMessages ?? DEFAULT_MAX_PENDING;
    this.logger = createLogger('connection', { clientId: options.id });
  }

  get sessionId(): string | undefined {
    return this.attachment?.sessionId;
  }

  get pendingMessages(): number {
    return this.pending;
  }

  /**
   * Attach to the bound session. Replay is delivered before this resolves.
   */
  async open(): Promise<void> {
    try {
      this.attachment = await this.coordinator.attach(this.requestedSession, message => this.deliver(message));
    } catch (error) {
      const wrapped = TillerError.from(error);
      this.logger.error('Cannot attach to session', wrapped);
      this.reply({
        type: 'reply',
        request: 'attach',
        ok: false,
        error: { code: wrapped.code, message: formatError(wrapped) },
      });
      this.socket.close(1011, 'Cannot attach to session');
      this.closed = true;
      return;
    }
    if (this.closed) {
      // the socket went away while the replay was being read
      this.attachment.detach();
    }
  }

  async receive(raw: string): Promise<void> {
    const parsed = parseInboundMessage(raw);
    if (!parsed.ok) {
      this.logger.warn('Rejected inbound message', { request: parsed.request, error: parsed.error });
      this.reply({
        type: 'reply',
        request: parsed.request,
        ok: false,
        error: { code: ErrorCodes.INVALID_MESSAGE, message: parsed.error },
      });
      return;
    }

    const { message } = parsed;
    const sessionId = this.sessionId;
    if (sessionId === undefined) {
      this.reply({
        type: 'reply',
        request: message.type,
        ok: false,
        error: { code: ErrorCodes.INVALID_STATE, message: 'Connection is not attached to a session' },
      });
      return;
    }

    this.inFlight++;
    try {
      const data = await routeInbound(this.coordinator, sessionId, message);
      this.reply(data === undefined
        ? { type: 'reply', request: message.type, ok: true }
        : { type: 'reply', request: message.type, ok: true, data });
    } catch (error) {
      const wrapped = TillerError.from(error);
      this.logger.info('Request failed', { request: message.type, code: wrapped.code, error: wrapped.message });
      this.reply({
        type: 'reply',
        request: message.type,
        ok: false,
        error: { code: wrapped.code, message: formatError(wrapped) },
      });
    } finally {
      this.inFlight--;
    }
    if (this.sessionDeleted && this.inFlight === 0) {
      this.closeDeleted();
    }
  }

  /**
   * Stop observing. Never affects the session or its run.
   */
  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.attachment?.detach();
  }

  private deliver(message: OutboundMessage): void {
    this.send(message);
    if (message.type === 'session_deleted') {
      // the coordinator has already detached this observer
      this.attachment = null;
      this.sessionDeleted = true;
      if (this.inFlight === 0) {
        this.closeDeleted();
      }
    }
  }

  private closeDeleted(): void {
    if (this.closed) return;
    this.closed = true;
    this.logger.info('Bound session was deleted, closing');
    this.socket.close(CLOSE_SESSION_DELETED, 'Session deleted');
  }

  private reply(message: ReplyMessage): void {
    this.send(message);
  }

  private send(message: OutboundMessage): void {
    if (this.closed || this.socket.readyState !== OPEN) {
      return;
    }
    if (this.pending >= this.maxPending) {
      this.logger.warn('Client is not draining its socket, disconnecting', { pending: this.pending });
      this.close();
      this.socket.close(CLOSE_TOO_SLOW, 'Client too slow');
      return;
    }

    this.pending++;
    this.socket.send(JSON.stringify(message), error => {
      this.pending--;
      if (error) {
        this.logger.warn('Failed to send to client', { error: error.message });
      }
    });
  }
}
