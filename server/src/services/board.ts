import { BOARD_SIZE, type BoardStatus, type BoardView, type Cell, type PlayerMark } from '../types/game';
import { GameRuleError } from '../lib/errors';

const WIN_LINES = [
  [0, 1, 2],
  [3, 4, 5],
  [6, 7, 8],
  [0, 3, 6],
  [1, 4, 7],
  [2, 5, 8],
  [0, 4, 8],
  [2, 4, 6],
];

export function detectWinner(board: readonly Cell[]): PlayerMark | 'draw' | null {
  for (const [a, b, c] of WIN_LINES) {
    const mark = board[a];
    if (mark && mark === board[b] && mark === board[c]) {
      return mark;
    }
  }
  if (board.every((c) => c !== null)) return 'draw';
  return null;
}

export function detectStatus(board: readonly Cell[]): BoardStatus {
  const winner = detectWinner(board);
  if (winner === null) return { kind: 'continue' };
  if (winner === 'draw') return { kind: 'draw' };
  return { kind: 'win', symbol: winner };
}

export function isCellIndex(index: number): boolean {
  return Number.isInteger(index) && index >= 0 && index < BOARD_SIZE;
}

/**
 * The 3x3 grid. Validates placement only (range and occupancy); whose turn it
 * is belongs to the match.
 */
export class Board {
  private readonly cells: Cell[] = Array<Cell>(BOARD_SIZE).fill(null);
  private placed = 0;

  apply(move: { mark: PlayerMark; index: number }): BoardView {
    if (!isCellIndex(move.index)) {
      throw new GameRuleError('out_of_range', `Cell index must be between 0 and ${BOARD_SIZE - 1}`);
    }
    if (this.cells[move.index] !== null) {
      throw new GameRuleError('cell_occupied', 'Cell occupied');
    }

    this.cells[move.index] = move.mark;
    this.placed += 1;
    return this.view();
  }

  view(): BoardView {
    const grid = Object.freeze(this.cells.slice());
    return { grid, status: detectStatus(grid), moves: this.placed };
  }
}
