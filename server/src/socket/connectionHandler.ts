import type { GameContext } from '../context';
import { AsyncLock } from '../lib/asyncLock';
import { AlreadyJoinedError, GameError, ProtocolError } from '../lib/errors';
import { decodeMessage, parseLine, type ClientMessage, type JoinData } from '../lib/protocol';
import type { Connection, ServerMessage } from '../types/protocol';

/**
 * Protocol state for one client connection, independent of the transport.
 *
 * Inbound messages are handled strictly one after another; teardown is queued
 * behind whatever is already in flight. The handler holds only the player id,
 * never a session.
 */
export class ConnectionHandler {
  private playerId: string | null = null;
  private closed = false;
  private readonly inbox = new AsyncLock();

  constructor(
    private readonly connection: Connection,
    private readonly ctx: GameContext
  ) {}

  get currentPlayerId(): string | null {
    return this.playerId;
  }

  /** One newline-delimited line of JSON text. */
  receiveLine(line: string): Promise<void> {
    return this.inbox.run(() => this.process(() => parseLine(line)));
  }

  /** An already-parsed envelope, or its JSON text. */
  receive(raw: unknown): Promise<void> {
    if (typeof raw === 'string') return this.receiveLine(raw);
    return this.inbox.run(() => this.process(() => decodeMessage(raw)));
  }

  /** A line that was too long to read, reported in turn with the others. */
  rejectOversizedLine(): Promise<void> {
    return this.inbox.run(async () => {
      if (this.closed) return;
      await this.reportError(new ProtocolError('invalid_json', 'Message exceeds the maximum line length.'));
    });
  }

  /**
   * Releases the player: a waiting player leaves the matchmaking slot, a
   * player in a game abandons it. Safe to call more than once.
   */
  close(): Promise<void> {
    if (this.closed) return Promise.resolve();
    this.closed = true;
    return this.inbox.run(() => this.teardown());
  }

  private async process(decode: () => ClientMessage): Promise<void> {
    if (this.closed) return;
    try {
      await this.dispatch(decode());
    } catch (err) {
      await this.reportError(err);
    }
  }

  private async dispatch(message: ClientMessage): Promise<void> {
    const { games } = this.ctx;
    switch (message.type) {
      case 'join':
        await this.join(message.data);
        return;
      case 'move':
        await games.submitMove(message.data.game_id, this.playerId, message.data.position);
        return;
      case 'chat':
        games.chat(message.data.game_id, this.playerId, message.data.message);
        return;
      case 'quit':
        await games.quit(message.data.game_id, this.playerId);
        return;
      case 'new_game_response':
        await games.respondToRematch(message.data.game_id, this.playerId, message.data.response);
        return;
    }
  }

  private async join(data: JoinData): Promise<void> {
    const { registry, matchmaker } = this.ctx;
    const existing = this.playerId ? registry.get(this.playerId) : undefined;
    if (existing) {
      if (existing.sessionId || matchmaker.isWaiting(existing.id)) throw new AlreadyJoinedError();
      // previous game is over; start again under a fresh identity
      registry.remove(existing.id);
    }

    const player = registry.register(this.connection, data);
    this.playerId = player.id;
    console.log(`[conn] ${this.connection.id} joined as ${player.username}`);

    const result = await matchmaker.tryPair(player);
    if (result.status === 'waiting') {
      await this.send({ type: 'join_ack', data: { status: 'waiting', message: 'Waiting for an opponent...' } });
    }
    // on success the new session has already queued join_ack for both players
  }

  private async teardown(): Promise<void> {
    const playerId = this.playerId;
    this.playerId = null;
    if (!playerId) return;
    const { registry, matchmaker, games } = this.ctx;
    registry.markDeparted(playerId);
    try {
      const leftQueue = await matchmaker.leave(playerId);
      if (!leftQueue) await games.disconnect(playerId);
    } finally {
      registry.remove(playerId);
    }
  }

  private async reportError(err: unknown): Promise<void> {
    if (err instanceof GameError) {
      console.warn(`[conn] ${this.connection.id} ${err.code}: ${err.message}`);
      await this.send({ type: 'error', data: { code: err.code, message: err.message } });
      return;
    }
    console.error(`[conn] ${this.connection.id} unexpected error`, err);
    await this.send({ type: 'error', data: { code: 'internal_error', message: 'Internal server error.' } });
  }

  private send(message: ServerMessage): Promise<boolean> {
    return this.connection.send(message);
  }
}
