/**
 * @fileoverview Inbound message routing
 *
 * Maps a validated message from a connection bound to `sessionId` onto the
 * coordinator. The resolved value becomes the `data` of the reply.
 */

import type { SessionCoordinator } from '../../runtime/orchestrator/index.js';
import type { InboundMessage } from './schemas.js';

export async function routeInbound(
  coordinator: SessionCoordinator,
  sessionId: string,
  message: InboundMessage
): Promise<unknown> {
  switch (message.type) {
    case 'task':
      await coordinator.submitTask(sessionId, {
        content: message.content,
        mode: message.mode,
        images: message.images,
      });
      return { sessionId };
    case 'list_sessions':
      return { sessions: coordinator.listSessions() };
    case 'rename_session':
      await coordinator.renameSession(sessionId, message.name);
      return { sessionId, name: message.name.trim() };
    case 'delete_session':
      return { sessionId: message.sessionId, deleted: await coordinator.deleteSession(message.sessionId) };
    default:
      await coordinator.handleControl(sessionId, message);
      return undefined;
  }
}
