import fc from 'fast-check';
import {
  checkPlacement,
  createBoard,
  evaluate,
  isInBounds,
  otherMark,
} from '../../server/src/services/gameRules';
import type { Board, Cell, PlayerMark, Position } from '../../server/src/types/game';

function boardFrom(rows: string[]): Board {
  return rows.map((row) =>
    row.split('').map((ch): Cell => (ch === 'X' ? 'X' : ch === 'O' ? 'O' : ''))
  );
}

// Independent line check used as the oracle for the property tests.
function hasThreeInARow(board: Board, mark: PlayerMark): boolean {
  const cells = board.flat();
  const at = (i: number) => cells[i] === mark;
  for (let i = 0; i < 3; i++) {
    if (at(i * 3) && at(i * 3 + 1) && at(i * 3 + 2)) return true;
    if (at(i) && at(i + 3) && at(i + 6)) return true;
  }
  return (at(0) && at(4) && at(8)) || (at(2) && at(4) && at(6));
}

const ALL_POSITIONS: Position[] = [0, 1, 2].flatMap((row) => [0, 1, 2].map((col): Position => [row, col]));

describe('gameRules', () => {
  describe('createBoard', () => {
    it('creates an empty 3x3 board', () => {
      expect(createBoard()).toEqual([
        ['', '', ''],
        ['', '', ''],
        ['', '', ''],
      ]);
    });

    it('returns independent rows', () => {
      const board = createBoard();
      board[0][0] = 'X';
      expect(board[1][0]).toBe('');
      expect(createBoard()[0][0]).toBe('');
    });
  });

  describe('evaluate', () => {
    it('reports an empty board as ongoing', () => {
      expect(evaluate(createBoard())).toEqual({ outcome: 'ongoing' });
    });

    const wins: Array<[string, string[], PlayerMark, Position[]]> = [
      ['top row', ['XXX', 'OO.', '...'], 'X', [[0, 0], [0, 1], [0, 2]]],
      ['middle column', ['XO.', 'XO.', '.OX'], 'O', [[0, 1], [1, 1], [2, 1]]],
      ['main diagonal', ['XO.', 'OX.', '..X'], 'X', [[0, 0], [1, 1], [2, 2]]],
      ['anti diagonal', ['XXO', 'XO.', 'O..'], 'O', [[0, 2], [1, 1], [2, 0]]],
      ['bottom row', ['XX.', '...', 'OOO'], 'O', [[2, 0], [2, 1], [2, 2]]],
    ];

    it.each(wins)('detects a win on the %s', (_name, rows, mark, line) => {
      expect(evaluate(boardFrom(rows))).toEqual({ outcome: 'won', mark, line });
    });

    it('detects a draw on a full board without a line', () => {
      expect(evaluate(boardFrom(['XOX', 'XOO', 'OXX']))).toEqual({ outcome: 'draw' });
    });

    it('prefers a win over a draw when the last move fills the board', () => {
      expect(evaluate(boardFrom(['XOX', 'OXO', 'OXX']))).toEqual({
        outcome: 'won',
        mark: 'X',
        line: [[0, 0], [1, 1], [2, 2]],
      });
    });

    it('does not treat a line of empty cells as a win', () => {
      expect(evaluate(boardFrom(['...', 'XO.', '...']))).toEqual({ outcome: 'ongoing' });
    });
  });

  describe('checkPlacement', () => {
    const board = boardFrom(['X..', '...', '..O']);

    it('accepts an empty in-bounds cell', () => {
      expect(checkPlacement(board, [1, 1])).toBeNull();
    });

    it('rejects occupied cells', () => {
      expect(checkPlacement(board, [0, 0])).toBe('cell_occupied');
      expect(checkPlacement(board, [2, 2])).toBe('cell_occupied');
    });

    const outOfBounds: Position[] = [
      [3, 0],
      [0, 3],
      [-1, 1],
      [1, -1],
      [1.5, 0],
      [Number.NaN, 0],
    ];

    it.each(outOfBounds)('rejects (%p, %p) as out of bounds', (row, col) => {
      expect(checkPlacement(board, [row, col])).toBe('out_of_bounds');
    });
  });

  it('isInBounds accepts exactly the nine board positions', () => {
    for (const position of ALL_POSITIONS) expect(isInBounds(position)).toBe(true);
    expect(isInBounds([3, 3])).toBe(false);
  });

  it('otherMark alternates between X and O', () => {
    expect(otherMark('X')).toBe('O');
    expect(otherMark('O')).toBe('X');
  });

  describe('properties over alternating play', () => {
    it('reports a win exactly when a line is complete and a draw exactly when the board fills without one', () => {
      fc.assert(
        fc.property(fc.shuffledSubarray(ALL_POSITIONS, { minLength: 9, maxLength: 9 }), (order) => {
          const board = createBoard();
          let mark: PlayerMark = 'X';
          for (let i = 0; i < order.length; i++) {
            const [row, col] = order[i];
            board[row][col] = mark;
            const result = evaluate(board);
            const xWins = hasThreeInARow(board, 'X');
            const oWins = hasThreeInARow(board, 'O');
            const full = i === order.length - 1;

            if (result.outcome === 'won') {
              expect(hasThreeInARow(board, result.mark)).toBe(true);
              expect(result.mark).toBe(mark);
              return;
            }
            expect(xWins || oWins).toBe(false);
            expect(result.outcome).toBe(full ? 'draw' : 'ongoing');
            mark = otherMark(mark);
          }
        }),
        { numRuns: 200 }
      );
    });

    it('never reports two winners for a board reached by alternating play', () => {
      fc.assert(
        fc.property(fc.shuffledSubarray(ALL_POSITIONS, { minLength: 9, maxLength: 9 }), (order) => {
          const board = createBoard();
          let mark: PlayerMark = 'X';
          for (const [row, col] of order) {
            board[row][col] = mark;
            if (evaluate(board).outcome !== 'ongoing') break;
            mark = otherMark(mark);
          }
          expect(hasThreeInARow(board, 'X') && hasThreeInARow(board, 'O')).toBe(false);
        }),
        { numRuns: 200 }
      );
    });
  });
});
