import { NotParticipantError, SessionNotFoundError } from '../lib/errors';
import type { MoveResult, Position, TerminationReason } from '../types/game';
import type { Broadcaster } from './broadcaster';
import { GameSession } from './gameSession';
import type { Player, PlayerRegistry } from './playerRegistry';

/**
 * Arena of live sessions keyed by game id. Players and connections refer to a
 * session only through its id.
 */
export class GameService {
  private readonly sessions = new Map<string, GameSession>();

  constructor(
    private readonly registry: PlayerRegistry,
    private readonly broadcaster: Broadcaster
  ) {}

  /** `x` moves first. Both players are told about the game before this returns. */
  createSession(x: Player, o: Player): GameSession {
    const session = new GameSession(x, o, this.broadcaster);
    this.sessions.set(session.id, session);
    this.registry.setSession(x.id, session.id);
    this.registry.setSession(o.id, session.id);
    session.announceStart();
    console.log(`[game] ${session.id} started between ${x.username} and ${o.username}`);
    return session;
  }

  get(gameId: string): GameSession | undefined {
    return this.sessions.get(gameId);
  }

  get activeCount(): number {
    return this.sessions.size;
  }

  async submitMove(gameId: string, playerId: string | null, position: Position): Promise<MoveResult> {
    const { session, participantId } = this.requireParticipant(gameId, playerId);
    return session.submitMove(participantId, position);
  }

  chat(gameId: string, playerId: string | null, text: string): void {
    const { session, participantId } = this.requireParticipant(gameId, playerId);
    session.chat(participantId, text);
  }

  /** Explicit quit: the game must exist and the requester must be in it. */
  async quit(gameId: string, playerId: string | null): Promise<boolean> {
    const { session, participantId } = this.requireParticipant(gameId, playerId);
    return this.terminate(session, participantId, 'quit');
  }

  /** Connection loss: ends whatever session the player is in, if any. */
  async disconnect(playerId: string): Promise<boolean> {
    const sessionId = this.registry.get(playerId)?.sessionId;
    const session = sessionId ? this.sessions.get(sessionId) : undefined;
    if (!session) return false;
    return this.terminate(session, playerId, 'disconnect');
  }

  /**
   * Handles a `new_game_response`. Returns the new session once both players
   * asked for another game, or `null` while the first vote waits for the second.
   */
  async respondToRematch(
    gameId: string,
    playerId: string | null,
    response: 'start' | 'quit'
  ): Promise<GameSession | null> {
    const { session, participantId } = this.requireParticipant(gameId, playerId);
    if (response === 'quit') {
      await this.terminate(session, participantId, 'quit');
      return null;
    }
    const ready = await session.voteRematch(participantId);
    if (!ready) return null;

    this.retire(session);
    const x = this.registry.get(session.players.O.id);
    const o = this.registry.get(session.players.X.id);
    if (!x || !o || !this.registry.isPresent(x.id) || !this.registry.isPresent(o.id)) {
      await this.abandonRematch(session);
      return null;
    }
    // symbols swap so the previous O opens the next game
    const next = new GameSession(x, o, this.broadcaster);
    // queued before anyone can reach `next`, so a quit or disconnect is always announced after it
    next.announceRematch(session);
    this.sessions.set(next.id, next);
    this.registry.setSession(x.id, next.id);
    this.registry.setSession(o.id, next.id);
    console.log(`[game] ${next.id} rematch of ${session.id}: ${x.username} (X) vs ${o.username} (O)`);
    return next;
  }

  /** A player left between the second vote and the next game: tell whoever is still here. */
  private async abandonRematch(session: GameSession): Promise<void> {
    const [first, second] = session.participantIds;
    for (const [stayed, left] of [
      [first, second],
      [second, first],
    ]) {
      if (!this.registry.isPresent(stayed)) continue;
      const name = left === session.players.X.id ? session.players.X.username : session.players.O.username;
      await this.broadcaster.send(stayed, {
        type: 'quit_ack',
        data: { status: 'success', message: `${name} has left the game.` },
      });
    }
  }

  private async terminate(session: GameSession, playerId: string, reason: TerminationReason): Promise<boolean> {
    const ended = await session.terminate(playerId, reason);
    if (ended) this.retire(session);
    return ended;
  }

  private retire(session: GameSession): void {
    if (this.sessions.get(session.id) === session) this.sessions.delete(session.id);
    for (const id of session.participantIds) {
      if (this.registry.get(id)?.sessionId === session.id) this.registry.setSession(id, null);
    }
  }

  private requireParticipant(
    gameId: string,
    playerId: string | null
  ): { session: GameSession; participantId: string } {
    const session = this.sessions.get(gameId);
    if (!session) throw new SessionNotFoundError(gameId);
    if (playerId === null || !session.hasParticipant(playerId)) throw new NotParticipantError(gameId);
    return { session, participantId: playerId };
  }
}
