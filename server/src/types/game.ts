export type PlayerMark = 'X' | 'O';

export const MARKS: readonly PlayerMark[] = ['X', 'O'];

export const BOARD_SIZE = 9;

export type Cell = PlayerMark | null;

export function otherMark(mark: PlayerMark): PlayerMark {
  return mark === 'X' ? 'O' : 'X';
}

// What the board alone can tell after a placement; it knows nothing about turns.
export type BoardStatus =
  | { kind: 'continue' }
  | { kind: 'win'; symbol: PlayerMark }
  | { kind: 'draw' };

export interface BoardView {
  grid: readonly Cell[]; // 9 cells, row-major
  status: BoardStatus;
  moves: number;
}

// Status as clients see it in a board update.
export type MatchStatus =
  | { kind: 'in_progress'; turn: PlayerMark }
  | { kind: 'win'; symbol: PlayerMark }
  | { kind: 'draw' };

export type MatchOutcome =
  | { kind: 'win'; symbol: PlayerMark }
  | { kind: 'draw' }
  | { kind: 'abandoned'; symbol: PlayerMark };

export type MatchState =
  | { phase: 'waiting_for_start' }
  | { phase: 'in_progress'; turn: PlayerMark }
  | { phase: 'completed'; outcome: MatchOutcome };
