import { v4 as uuid } from 'uuid';
import { AsyncLock } from '../lib/asyncLock';
import { GameError } from '../lib/errors';
import type {
  Board,
  GameState,
  MoveRejection,
  MoveResult,
  PlayerInfo,
  PlayerMark,
  Position,
  SessionStatus,
  TerminationReason,
} from '../types/game';
import type { MoveAckFailure, MoveAckSuccess, ServerMessage } from '../types/protocol';
import type { Broadcaster } from './broadcaster';
import { checkPlacement, cloneBoard, createBoard, evaluate, otherMark } from './gameRules';

interface Delivery {
  to: readonly string[];
  message: ServerMessage;
}

const REJECTION_MESSAGES: Record<MoveRejection, string> = {
  not_your_turn: 'It is not your turn.',
  out_of_bounds: 'Position must be a row and column between 0 and 2.',
  cell_occupied: 'Position already occupied.',
};

export function describeRejection(reason: MoveRejection, state: GameState): string {
  if (reason === 'not_your_turn' && state.status !== 'in_progress') return 'The game is over.';
  return REJECTION_MESSAGES[reason];
}

export function nextPlayerName(state: GameState): string | null {
  return state.status === 'in_progress' ? state.players[state.currentTurn].username : null;
}

export function winnerName(state: GameState): string | null {
  if (state.winner === 'draw') return 'draw';
  return state.winner ? state.players[state.winner].username : null;
}

export function toMoveAck(state: GameState): MoveAckSuccess {
  return {
    status: 'success',
    game_state: state.board,
    next_player: nextPlayerName(state),
    winner: winnerName(state),
  };
}

export function toMoveFailure(reason: MoveRejection, state: GameState): MoveAckFailure {
  return {
    status: 'failure',
    code: reason === 'not_your_turn' ? 'not_your_turn' : 'invalid_move',
    message: describeRejection(reason, state),
    game_state: state.board,
    next_player: nextPlayerName(state),
    winner: winnerName(state),
  };
}

/**
 * One game between two players.
 *
 * Every mutation of board, turn and status runs under `lock`, one at a time.
 * Messages produced by a mutation are queued on `outbox` before the lock is
 * released and written after it, so slow clients never hold up the next move
 * and both players see updates in mutation order.
 */
export class GameSession {
  readonly id: string;
  readonly players: { X: PlayerInfo; O: PlayerInfo };
  readonly startedAt = Date.now();

  private readonly lock = new AsyncLock();
  private readonly outbox = new AsyncLock();
  private board: Board = createBoard();
  private currentTurn: PlayerMark = 'X';
  private status: SessionStatus = 'in_progress';
  private winner: PlayerMark | 'draw' | null = null;
  private moveCount = 0;
  private endedAt: number | undefined;
  private closed = false;
  private readonly rematchVotes = new Set<string>();

  constructor(
    x: PlayerInfo,
    o: PlayerInfo,
    private readonly broadcaster: Broadcaster,
    id: string = uuid()
  ) {
    this.id = id;
    this.players = { X: { ...x }, O: { ...o } };
  }

  get participantIds(): [string, string] {
    return [this.players.X.id, this.players.O.id];
  }

  get isClosed(): boolean {
    return this.closed;
  }

  markOf(playerId: string): PlayerMark | null {
    if (this.players.X.id === playerId) return 'X';
    if (this.players.O.id === playerId) return 'O';
    return null;
  }

  hasParticipant(playerId: string): boolean {
    return this.markOf(playerId) !== null;
  }

  opponentOf(playerId: string): PlayerInfo | null {
    const mark = this.markOf(playerId);
    return mark ? this.players[otherMark(mark)] : null;
  }

  snapshot(): GameState {
    return {
      id: this.id,
      board: cloneBoard(this.board),
      players: { X: { ...this.players.X }, O: { ...this.players.O } },
      currentTurn: this.currentTurn,
      status: this.status,
      winner: this.winner,
      moveCount: this.moveCount,
      startedAt: this.startedAt,
      endedAt: this.endedAt,
    };
  }

  /** Queues the `join_ack` for both players; the joiner (O) is told first. */
  announceStart(): void {
    const { X, O } = this.players;
    this.publish([
      {
        to: [O.id],
        message: {
          type: 'join_ack',
          data: {
            status: 'success',
            game_id: this.id,
            player_symbol: 'O',
            username: O.username,
            opponent: { username: X.username, avatar: X.avatar ?? null },
          },
        },
      },
      {
        to: [X.id],
        message: {
          type: 'join_ack',
          data: {
            status: 'success',
            game_id: this.id,
            player_symbol: 'X',
            username: X.username,
            opponent: { username: O.username, avatar: O.avatar ?? null },
          },
        },
      },
    ]);
  }

  /**
   * Queues the `new_game` notice that opens a rematch. It is written only once
   * `previous` has delivered everything it queued, and ahead of anything this
   * session queues later.
   */
  announceRematch(previous: GameSession): void {
    const state = this.snapshot();
    const next = nextPlayerName(state) ?? this.players.X.username;
    this.publish(
      (['X', 'O'] as const).map(
        (mark): Delivery => ({
          to: [this.players[mark].id],
          message: {
            type: 'new_game',
            data: {
              status: 'success',
              game_id: this.id,
              player_symbol: mark,
              username: this.players[mark].username,
              game_state: state.board,
              next_player: next,
            },
          },
        })
      ),
      () => previous.flush()
    );
  }

  async submitMove(playerId: string, position: Position): Promise<MoveResult> {
    return this.lock.run(() => {
      const result = this.applyMove(playerId, position);
      if (result.ok) {
        const deliveries: Delivery[] = [
          { to: this.participantIds, message: { type: 'move_ack', data: toMoveAck(result.state) } },
        ];
        const winner = winnerName(result.state);
        if (winner !== null) {
          deliveries.push({
            to: this.participantIds,
            message: { type: 'game_over', data: { game_id: this.id, winner } },
          });
          console.log(`[game] ${this.id} ended. Winner: ${winner}`);
        }
        this.publish(deliveries);
      } else {
        this.publish([
          { to: [playerId], message: { type: 'move_ack', data: toMoveFailure(result.reason, result.state) } },
        ]);
      }
      return result;
    });
  }

  /** Chat is relayed to both players, sender included, whatever the game status. */
  chat(playerId: string, text: string): void {
    const mark = this.markOf(playerId);
    if (!mark) return;
    this.publish([
      {
        to: this.participantIds,
        message: { type: 'chat_broadcast', data: { username: this.players[mark].username, message: text } },
      },
    ]);
  }

  /**
   * Ends the session on behalf of `playerId`. Only the first call has any
   * effect; it returns `false` for every later one, so the surviving player
   * hears about it exactly once.
   */
  async terminate(playerId: string, reason: TerminationReason): Promise<boolean> {
    return this.lock.run(() => {
      const mark = this.markOf(playerId);
      if (this.closed || !mark) return false;
      this.closed = true;
      if (this.status === 'in_progress') {
        this.status = 'abandoned';
        this.endedAt = Date.now();
      }
      const leaver = this.players[mark];
      const survivor = this.players[otherMark(mark)];
      const deliveries: Delivery[] = [];
      if (reason === 'quit') {
        deliveries.push({
          to: [leaver.id],
          message: { type: 'quit_ack', data: { status: 'success', message: 'You have left the game.' } },
        });
      }
      deliveries.push({
        to: [survivor.id],
        message: { type: 'quit_ack', data: { status: 'success', message: `${leaver.username} has left the game.` } },
      });
      this.publish(deliveries);
      console.log(`[game] ${this.id}: ${leaver.username} left (${reason})`);
      return true;
    });
  }

  /**
   * Records a vote to play again. Resolves `true` once both players have
   * voted; the session is then closed and the caller starts the next one.
   */
  async voteRematch(playerId: string): Promise<boolean> {
    return this.lock.run(() => {
      if (this.closed || this.status === 'in_progress' || this.status === 'abandoned') {
        throw new GameError('invalid_game', 'A new game can only be requested once this game has finished.');
      }
      this.rematchVotes.add(playerId);
      if (this.rematchVotes.size < 2) {
        this.publish([{ to: [playerId], message: { type: 'new_game', data: { status: 'waiting', game_id: this.id } } }]);
        return false;
      }
      this.closed = true;
      return true;
    });
  }

  /** Resolves once every message queued so far has been handed to the transports. */
  flush(): Promise<void> {
    return this.outbox.run(() => undefined);
  }

  private applyMove(playerId: string, position: Position): MoveResult {
    const mark = this.markOf(playerId);
    if (mark === null || this.status !== 'in_progress' || mark !== this.currentTurn) {
      return { ok: false, reason: 'not_your_turn', state: this.snapshot() };
    }
    const rejection = checkPlacement(this.board, position);
    if (rejection) {
      return { ok: false, reason: rejection, state: this.snapshot() };
    }

    const [row, col] = position;
    this.board[row][col] = mark;
    this.moveCount += 1;

    const evaluation = evaluate(this.board);
    if (evaluation.outcome === 'won') {
      this.status = 'won';
      this.winner = evaluation.mark;
      this.endedAt = Date.now();
    } else if (evaluation.outcome === 'draw') {
      this.status = 'draw';
      this.winner = 'draw';
      this.endedAt = Date.now();
    } else {
      this.currentTurn = otherMark(mark);
    }
    return { ok: true, state: this.snapshot() };
  }

  private publish(deliveries: Delivery[], before?: () => Promise<void>): void {
    this.outbox
      .run(async () => {
        if (before) await before();
        for (const delivery of deliveries) {
          await this.broadcaster.broadcast(delivery.to, delivery.message);
        }
      })
      .catch((err: unknown) => {
        console.error(`[game] ${this.id}: delivery failed`, err);
      });
  }
}
