import { Board, Evaluation, Position, PlayerMark } from '../types/game';

export const BOARD_SIZE = 3;

const WIN_LINES: Position[][] = [
  // rows
  [[0, 0], [0, 1], [0, 2]],
  [[1, 0], [1, 1], [1, 2]],
  [[2, 0], [2, 1], [2, 2]],
  // columns
  [[0, 0], [1, 0], [2, 0]],
  [[0, 1], [1, 1], [2, 1]],
  [[0, 2], [1, 2], [2, 2]],
  // diagonals
  [[0, 0], [1, 1], [2, 2]],
  [[0, 2], [1, 1], [2, 0]],
];

export function createBoard(): Board {
  return Array.from({ length: BOARD_SIZE }, () => Array.from({ length: BOARD_SIZE }, () => '' as const));
}

export function cloneBoard(board: Board): Board {
  return board.map((row) => row.slice());
}

export function isInBounds([row, col]: Position): boolean {
  return (
    Number.isInteger(row) &&
    Number.isInteger(col) &&
    row >= 0 &&
    row < BOARD_SIZE &&
    col >= 0 &&
    col < BOARD_SIZE
  );
}

export function otherMark(mark: PlayerMark): PlayerMark {
  return mark === 'X' ? 'O' : 'X';
}

/**
 * Checks placement legality only. Turn order is the session's concern.
 */
export function checkPlacement(board: Board, position: Position): 'out_of_bounds' | 'cell_occupied' | null {
  if (!isInBounds(position)) return 'out_of_bounds';
  const [row, col] = position;
  if (board[row][col] !== '') return 'cell_occupied';
  return null;
}

/**
 * Evaluates a board snapshot. The first complete line found wins; valid play
 * can never produce two lines of different marks.
 */
export function evaluate(board: Board): Evaluation {
  for (const line of WIN_LINES) {
    const [[r0, c0], [r1, c1], [r2, c2]] = line;
    const first = board[r0][c0];
    if (first !== '' && first === board[r1][c1] && first === board[r2][c2]) {
      return { outcome: 'won', mark: first, line };
    }
  }
  if (board.every((row) => row.every((cell) => cell !== ''))) return { outcome: 'draw' };
  return { outcome: 'ongoing' };
}
