export type PlayerMark = 'X' | 'O';

export type Cell = PlayerMark | '';

export type Board = Cell[][]; // 3 rows of 3 cells

export type Position = [row: number, col: number];

export interface PlayerInfo {
  id: string;
  username: string;
  avatar?: string;
}

export type SessionStatus = 'in_progress' | 'won' | 'draw' | 'abandoned';

export type TerminationReason = 'quit' | 'disconnect';

export type Evaluation =
  | { outcome: 'ongoing' }
  | { outcome: 'won'; mark: PlayerMark; line: Position[] }
  | { outcome: 'draw' };

export interface GameState {
  id: string;
  board: Board;
  players: {
    X: PlayerInfo;
    O: PlayerInfo;
  };
  currentTurn: PlayerMark;
  status: SessionStatus;
  winner: PlayerMark | 'draw' | null;
  moveCount: number;
  startedAt: number;
  endedAt?: number;
}

export type MoveRejection = 'not_your_turn' | 'out_of_bounds' | 'cell_occupied';

export type MoveResult =
  | { ok: true; state: GameState }
  | { ok: false; reason: MoveRejection; state: GameState };
