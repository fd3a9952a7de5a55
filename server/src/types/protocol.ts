import type { ErrorCode } from '../lib/errors';
import type { Board, PlayerMark } from './game';

export interface OpponentInfo {
  username: string;
  avatar: string | null;
}

export type JoinAck =
  | { status: 'waiting'; message: string }
  | { status: 'success'; game_id: string; player_symbol: PlayerMark; username: string; opponent: OpponentInfo };

export interface MoveAckSuccess {
  status: 'success';
  game_state: Board;
  next_player: string | null;
  winner: string | null;
}

export interface MoveAckFailure {
  status: 'failure';
  code: Extract<ErrorCode, 'invalid_move' | 'not_your_turn'>;
  message: string;
  game_state: Board;
  next_player: string | null;
  winner: string | null;
}

export type NewGameNotice =
  | { status: 'waiting'; game_id: string }
  | {
      status: 'success';
      game_id: string;
      player_symbol: PlayerMark;
      username: string;
      game_state: Board;
      next_player: string;
    };

export type ServerMessage =
  | { type: 'join_ack'; data: JoinAck }
  | { type: 'move_ack'; data: MoveAckSuccess | MoveAckFailure }
  | { type: 'chat_broadcast'; data: { username: string; message: string } }
  | { type: 'quit_ack'; data: { status: 'success'; message: string } }
  | { type: 'game_over'; data: { game_id: string; winner: string } }
  | { type: 'new_game'; data: NewGameNotice }
  | { type: 'error'; data: { code: ErrorCode; message: string } };

export type ServerMessageType = ServerMessage['type'];

export type TransportKind = 'tcp' | 'socket.io';

/**
 * One accepted client connection, whatever carries it. `send` never throws;
 * delivery to a closed connection is dropped and reported as `false`.
 */
export interface Connection {
  readonly id: string;
  readonly transport: TransportKind;
  readonly remoteAddress: string;
  isOpen(): boolean;
  send(message: ServerMessage): Promise<boolean>;
  close(): void;
}
