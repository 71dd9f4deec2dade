import { Match } from './matchService';
import type { Lobby, Session } from './session';
import { MARKS } from '../types/game';
import { createLogger, type Logger } from '../lib/logger';

export interface MatchmakerOptions {
  /** Put both players back in the queue once their match is over (default true). */
  requeueAfterMatch?: boolean;
  logger?: Logger;
}

export interface LobbyStats {
  waiting: number;
  activeMatches: number;
}

/**
 * First-come-first-served pairing. The queue and the match registry are only
 * touched inside synchronous sections, so a session can never be paired twice
 * or dropped between being dequeued and bound.
 */
export class Matchmaker implements Lobby {
  private readonly queue: Session[] = [];
  private readonly matches = new Map<string, Match<Session>>();
  private readonly requeueAfterMatch: boolean;
  private readonly logger: Logger;

  constructor(options: MatchmakerOptions = {}) {
    this.requeueAfterMatch = options.requeueAfterMatch ?? true;
    this.logger = options.logger ?? createLogger('mm');
  }

  enqueue(session: Session): void {
    if (!session.isOpen || session.state === 'playing') return;
    // de-duplicate: a session waits at most once
    if (this.queue.includes(session)) return;

    this.queue.push(session);
    session.markQueued();
    this.logger.info(`queued ${session.id} (waiting=${this.queue.length})`);
    this.pairWaiting();
  }

  withdraw(session: Session): void {
    const index = this.queue.indexOf(session);
    if (index === -1) return;
    this.queue.splice(index, 1);
    this.logger.info(`left queue ${session.id} (waiting=${this.queue.length})`);
  }

  findMatch(matchId: string): Match<Session> | undefined {
    return this.matches.get(matchId);
  }

  waiting(): readonly Session[] {
    return this.queue.slice();
  }

  get stats(): LobbyStats {
    return { waiting: this.queue.length, activeMatches: this.matches.size };
  }

  private pairWaiting() {
    while (this.queue.length >= 2) {
      const first = this.queue.shift();
      const second = this.queue.shift();
      if (!first || !second) break;
      this.startMatch(first, second);
    }
  }

  // Longest-waiting session plays X.
  private startMatch(x: Session, o: Session) {
    const match = new Match<Session>(
      { X: x, O: o },
      {
        logger: this.logger.child('match'),
        onCompleted: (completed) => this.handleMatchCompleted(completed),
      },
    );
    this.matches.set(match.id, match);
    x.bind(match.id, 'X');
    o.bind(match.id, 'O');
    this.logger.info(`matched ${match.id}: ${x.id} vs ${o.id}`);

    match.start();
    x.flushPending();
    o.flushPending();
  }

  private handleMatchCompleted(match: Match<Session>) {
    this.matches.delete(match.id);

    const players = MARKS.map((mark) => match.player(mark));
    for (const session of players) session.release();

    for (const session of players) {
      if (!session.isOpen) continue;
      if (this.requeueAfterMatch) {
        this.enqueue(session);
      } else {
        session.close();
      }
    }
  }
}
