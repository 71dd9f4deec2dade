import { v4 as uuid } from 'uuid';
import { Board } from './board';
import {
  MARKS,
  otherMark,
  type BoardView,
  type MatchOutcome,
  type MatchState,
  type MatchStatus,
  type PlayerMark,
} from '../types/game';
import type { ServerMessage } from '../protocol/codec';
import { GameRuleError } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';

/** Anything a match can notify; in the server this is a Session. */
export interface MatchParticipant {
  readonly id: string;
  notify(message: ServerMessage): void;
}

export interface MatchOptions<P extends MatchParticipant> {
  id?: string;
  logger?: Logger;
  onCompleted?: (match: Match<P>, outcome: MatchOutcome) => void;
}

/**
 * One game between two bound participants.
 *
 * All state changes go through `withMatchLock`, so moves and abandonment for
 * the same match are applied one at a time, and each accepted change is
 * broadcast to both players before the next one is looked at.
 */
export class Match<P extends MatchParticipant = MatchParticipant> {
  readonly id: string;
  private readonly board = new Board();
  private state: MatchState = { phase: 'waiting_for_start' };
  private queue: Promise<void> = Promise.resolve();
  private readonly logger: Logger;
  private readonly onCompleted?: (match: Match<P>, outcome: MatchOutcome) => void;

  constructor(
    private readonly players: Readonly<Record<PlayerMark, P>>,
    options: MatchOptions<P> = {},
  ) {
    if (players.X === players.O) throw new Error('A match needs two distinct players');
    this.id = options.id ?? uuid();
    this.logger = options.logger ?? createLogger('match');
    this.onCompleted = options.onCompleted;
  }

  get snapshot(): MatchState {
    return this.state;
  }

  view(): BoardView {
    return this.board.view();
  }

  player(mark: PlayerMark): P {
    return this.players[mark];
  }

  /** Both players are bound: X gets the first turn. */
  start(): void {
    if (this.state.phase !== 'waiting_for_start') throw new Error(`Match ${this.id} already started`);
    this.state = { phase: 'in_progress', turn: 'X' };

    for (const mark of MARKS) {
      this.players[mark].notify({ type: 'game:matched', matchId: this.id, symbol: mark, opponentPresent: true });
    }
    this.broadcast(this.stateMessage(this.board.view(), { kind: 'in_progress', turn: 'X' }));
    this.logger.info(`started ${this.id} X=${this.players.X.id} O=${this.players.O.id}`);
  }

  /** Rejects with a GameRuleError when the move is not allowed; the match is then unchanged. */
  submit(mark: PlayerMark, cell: number): Promise<BoardView> {
    return this.withMatchLock(() => this.applyMove(mark, cell));
  }

  /** Resolves false when the match had already ended. */
  abandon(mark: PlayerMark): Promise<boolean> {
    return this.withMatchLock(() => {
      if (this.state.phase === 'completed') return false;
      this.logger.info(`player ${mark} left ${this.id}`);
      this.complete({ kind: 'abandoned', symbol: mark });
      return true;
    });
  }

  private withMatchLock<T>(task: () => T): Promise<T> {
    const run = this.queue.then(task);
    this.queue = run.then(
      () => undefined,
      () => undefined,
    );
    return run;
  }

  private applyMove(mark: PlayerMark, cell: number): BoardView {
    const state = this.state;
    if (state.phase === 'completed') throw new GameRuleError('match_already_over', 'Match is already over');
    if (state.phase === 'waiting_for_start') throw new GameRuleError('match_not_started', 'Match has not started');
    if (mark !== state.turn) throw new GameRuleError('turn_violation', 'Not your turn');

    const view = this.board.apply({ mark, index: cell });

    switch (view.status.kind) {
      case 'continue': {
        const turn = otherMark(mark);
        this.state = { phase: 'in_progress', turn };
        this.broadcast(this.stateMessage(view, { kind: 'in_progress', turn }));
        break;
      }
      case 'win':
        this.broadcast(this.stateMessage(view, { kind: 'win', symbol: view.status.symbol }));
        this.complete({ kind: 'win', symbol: view.status.symbol });
        break;
      case 'draw':
        this.broadcast(this.stateMessage(view, { kind: 'draw' }));
        this.complete({ kind: 'draw' });
        break;
    }
    return view;
  }

  private complete(outcome: MatchOutcome) {
    this.state = { phase: 'completed', outcome };
    this.broadcast({ type: 'game:ended', outcome });
    this.logger.info(`ended ${this.id} outcome=${describeOutcome(outcome)} moves=${this.board.view().moves}`);
    this.onCompleted?.(this, outcome);
  }

  // Same message, same order, to both players, inside the locked unit.
  private broadcast(message: ServerMessage) {
    for (const mark of MARKS) {
      this.players[mark].notify(message);
    }
  }

  private stateMessage(view: BoardView, status: MatchStatus): ServerMessage {
    return { type: 'game:state', grid: view.grid.slice(), status };
  }
}

export function describeOutcome(outcome: MatchOutcome): string {
  switch (outcome.kind) {
    case 'win':
      return `win(${outcome.symbol})`;
    case 'draw':
      return 'draw';
    case 'abandoned':
      return `abandoned(${outcome.symbol})`;
  }
}
