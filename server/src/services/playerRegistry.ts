import { randomBytes } from 'crypto';
import { v4 as uuid } from 'uuid';
import type { Connection } from '../types/protocol';
import type { PlayerInfo } from '../types/game';

export interface Player extends PlayerInfo {
  connectionId: string;
  sessionId: string | null;
  joinedAt: number;
  departed: boolean;
}

export interface RegisterInput {
  username?: string | null;
  avatar?: string | null;
}

export function generateDisplayName(): string {
  return `Player_${randomBytes(3).toString('hex')}`;
}

/**
 * Identities of every joined client, keyed by player id. Connections are kept
 * alongside so the broadcaster can reach a player by id alone.
 */
export class PlayerRegistry {
  private readonly players = new Map<string, Player>();
  private readonly connections = new Map<string, Connection>();

  register(connection: Connection, input: RegisterInput = {}): Player {
    const username = input.username?.trim() || generateDisplayName();
    const avatar = input.avatar?.trim() || undefined;
    const player: Player = {
      id: uuid(),
      username,
      avatar,
      connectionId: connection.id,
      sessionId: null,
      joinedAt: Date.now(),
      departed: false,
    };
    this.players.set(player.id, player);
    this.connections.set(player.id, connection);
    return player;
  }

  get(playerId: string): Player | undefined {
    return this.players.get(playerId);
  }

  connectionOf(playerId: string): Connection | undefined {
    return this.connections.get(playerId);
  }

  setSession(playerId: string, sessionId: string | null): void {
    const player = this.players.get(playerId);
    if (player) player.sessionId = sessionId;
  }

  /** Flags a player whose connection is going away, before its teardown starts. */
  markDeparted(playerId: string): void {
    const player = this.players.get(playerId);
    if (player) player.departed = true;
  }

  isPresent(playerId: string): boolean {
    const player = this.players.get(playerId);
    return !!player && !player.departed && !!this.connections.get(playerId)?.isOpen();
  }

  remove(playerId: string): Player | undefined {
    const player = this.players.get(playerId);
    this.players.delete(playerId);
    this.connections.delete(playerId);
    return player;
  }

  get size(): number {
    return this.players.size;
  }
}
