import type { ServerMessage } from '../types/protocol';
import type { PlayerRegistry } from './playerRegistry';

/**
 * Delivers server messages to players by id. A recipient that is gone is
 * skipped with a warning; it never affects delivery to anyone else.
 */
export class Broadcaster {
  constructor(private readonly registry: PlayerRegistry) {}

  async send(playerId: string, message: ServerMessage): Promise<boolean> {
    const connection = this.registry.connectionOf(playerId);
    if (!connection || !connection.isOpen()) {
      console.warn(`[broadcast] dropping ${message.type} for disconnected player ${playerId}`);
      return false;
    }
    const delivered = await connection.send(message);
    if (!delivered) {
      console.warn(`[broadcast] failed to deliver ${message.type} to player ${playerId}`);
    }
    return delivered;
  }

  async broadcast(playerIds: readonly string[], message: ServerMessage): Promise<boolean[]> {
    return Promise.all(playerIds.map((id) => this.send(id, message)));
  }
}
