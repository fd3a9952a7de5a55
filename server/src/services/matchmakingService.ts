import { AsyncLock } from '../lib/asyncLock';
import type { PlayerMark } from '../types/game';
import type { GameService } from './gameService';
import type { GameSession } from './gameSession';
import type { Player, PlayerRegistry } from './playerRegistry';

export type JoinResult =
  | { status: 'waiting' }
  | { status: 'success'; session: GameSession; symbol: PlayerMark };

/**
 * Holds at most one waiting player. The slot is only reachable through
 * `tryPair` and `leave`, and every check-and-set on it happens under `lock`.
 */
export class Matchmaker {
  private waiting: Player | null = null;
  private readonly lock = new AsyncLock();

  constructor(
    private readonly registry: PlayerRegistry,
    private readonly games: GameService
  ) {}

  /**
   * Pairs `player` with the waiting player, who becomes X, or parks `player`
   * in the slot when nobody usable is waiting.
   */
  async tryPair(player: Player): Promise<JoinResult> {
    return this.lock.run((): JoinResult => {
      const other = this.waiting;
      if (other && other.id !== player.id) {
        this.waiting = null;
        if (this.registry.isPresent(other.id)) {
          const session = this.games.createSession(other, player);
          console.log(`[mm] paired ${other.username} (X) with ${player.username} (O)`);
          return { status: 'success', session, symbol: 'O' };
        }
        console.warn(`[mm] discarding stale waiting player ${other.username}`);
      }
      this.waiting = player;
      console.log(`[mm] ${player.username} is waiting for an opponent`);
      return { status: 'waiting' };
    });
  }

  /** Empties the slot if `playerId` is the one waiting in it. */
  async leave(playerId: string): Promise<boolean> {
    return this.lock.run(() => {
      const waiting = this.waiting;
      if (!waiting || waiting.id !== playerId) return false;
      console.log(`[mm] ${waiting.username} left the queue`);
      this.waiting = null;
      return true;
    });
  }

  isWaiting(playerId: string): boolean {
    return this.waiting?.id === playerId;
  }

  get hasWaitingPlayer(): boolean {
    return this.waiting !== null;
  }
}
