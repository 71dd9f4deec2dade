import { v4 as uuid } from 'uuid';
import { BOARD_SIZE, type PlayerMark } from '../types/game';
import type { ClientMessage, ServerMessage } from '../protocol/codec';
import type { Transport } from '../transport/types';
import type { Match, MatchParticipant } from './matchService';
import { GameRuleError, errorMessage, type DecodeError, type ErrorReason } from '../lib/errors';
import { createLogger, type Logger } from '../lib/logger';

export type SessionStatus = 'handshake' | 'idle' | 'queued' | 'playing' | 'closed';

/** The part of the matchmaker a session talks to. */
export interface Lobby {
  enqueue(session: Session): void;
  withdraw(session: Session): void;
  findMatch(matchId: string): Match<Session> | undefined;
}

export interface SessionOptions {
  /** When set, the first message must be a hello naming this game. */
  handshake?: { gameId: string } | null;
  logger?: Logger;
  onClosed?: (session: Session) => void;
}

interface Binding {
  matchId: string;
  symbol: PlayerMark;
}

/**
 * Server-side stand-in for one connected client. Relays move intents to the
 * bound match and match notifications back over the transport. The session
 * only remembers the match id; the match is looked up in the lobby.
 */
export class Session implements MatchParticipant {
  readonly id = uuid();
  private status: SessionStatus;
  private binding: Binding | null = null;
  private readonly pending: number[] = [];
  private finishedMatches = 0;
  private readonly handshake: { gameId: string } | null;
  private readonly logger: Logger;
  private readonly onClosed?: (session: Session) => void;

  constructor(
    private readonly transport: Transport,
    private readonly lobby: Lobby,
    options: SessionOptions = {},
  ) {
    this.handshake = options.handshake ?? null;
    this.status = this.handshake ? 'handshake' : 'idle';
    this.logger = options.logger ?? createLogger('session');
    this.onClosed = options.onClosed;
  }

  get state(): SessionStatus {
    return this.status;
  }

  get isOpen(): boolean {
    return this.status !== 'closed';
  }

  get symbol(): PlayerMark | null {
    return this.binding?.symbol ?? null;
  }

  get matchId(): string | null {
    return this.binding?.matchId ?? null;
  }

  open(): void {
    this.transport.start({
      message: (message) => this.onMessage(message),
      protocolError: (error) => this.onProtocolError(error),
      closed: (error) => this.onTransportClosed(error),
    });
    this.logger.info(`opened ${this.id} via ${this.transport.kind} from ${this.transport.remoteAddress}`);
    if (this.status === 'idle') this.lobby.enqueue(this);
  }

  // ---- called by the matchmaker ----

  markQueued(): void {
    if (this.status === 'idle') this.status = 'queued';
  }

  bind(matchId: string, symbol: PlayerMark): void {
    if (this.status === 'closed') return;
    if (this.binding) throw new Error(`Session ${this.id} is already in match ${this.binding.matchId}`);
    this.binding = { matchId, symbol };
    this.status = 'playing';
  }

  /** Hands intents received while waiting to the freshly started match, oldest first. */
  flushPending(): void {
    for (const cell of this.pending.splice(0)) {
      this.forwardMove(cell);
    }
  }

  release(): void {
    if (!this.binding) return;
    this.binding = null;
    this.finishedMatches += 1;
    if (this.status === 'playing') this.status = 'idle';
  }

  notify(message: ServerMessage): void {
    if (this.status === 'closed') return;
    try {
      this.transport.send(message);
    } catch (err) {
      this.logger.warn(`write to ${this.id} failed: ${errorMessage(err)}`);
      this.close();
    }
  }

  close(): void {
    if (this.status === 'closed') return;
    this.terminate();
    this.transport.close();
  }

  // ---- inbound ----

  private onMessage(message: ClientMessage) {
    if (this.status === 'closed') return;

    switch (message.type) {
      case 'game:hello':
        return this.onHello(message.game);
      case 'game:move':
        if (this.status === 'handshake') {
          return this.rejectHandshake('Expected a hello before any other message');
        }
        return this.onMove(message.cell);
    }
  }

  private onHello(game: string) {
    if (this.status !== 'handshake' || !this.handshake) {
      this.logger.debug(`ignoring extra hello from ${this.id}`);
      return;
    }
    if (game !== this.handshake.gameId) {
      return this.rejectHandshake(`Unknown game "${game}"`);
    }
    this.status = 'idle';
    this.lobby.enqueue(this);
  }

  private rejectHandshake(message: string) {
    this.logger.warn(`handshake failed for ${this.id}: ${message}`);
    this.sendError('handshake_failed', message);
    this.close();
  }

  private onMove(cell: number) {
    if (this.status === 'playing') return this.forwardMove(cell);

    if (this.finishedMatches > 0) {
      this.sendError('match_already_over', 'Match is already over');
      return;
    }
    if (this.pending.length >= BOARD_SIZE) {
      this.logger.debug(`dropping intent from ${this.id}: pending queue full`);
      this.sendError('match_not_started', 'Too many moves before the match started');
      return;
    }
    this.pending.push(cell);
  }

  private forwardMove(cell: number) {
    const binding = this.binding;
    if (!binding) return;
    const match = this.lobby.findMatch(binding.matchId);
    if (!match) {
      this.sendError('match_already_over', 'Match is already over');
      return;
    }

    match.submit(binding.symbol, cell).catch((err: unknown) => {
      if (err instanceof GameRuleError) {
        this.logger.debug(`rejected move ${cell} from ${this.id}: ${err.code}`);
        this.sendError(err.code, err.message);
        return;
      }
      this.logger.error(`move from ${this.id} failed`, err);
      this.close();
    });
  }

  private onProtocolError(error: DecodeError) {
    if (this.status === 'closed') return;
    this.logger.warn(`protocol error from ${this.id}: ${error.message}`);
    this.sendError('protocol_error', error.message);
    this.close();
  }

  private onTransportClosed(error?: Error) {
    if (error) this.logger.warn(`transport failure on ${this.id}: ${error.message}`);
    this.terminate(error);
  }

  private sendError(reason: ErrorReason, message: string) {
    this.notify({ type: 'game:error', reason, message });
  }

  /**
   * Stops all further inbound work at once. A queued session just leaves the
   * queue; a playing one tells its match exactly once that it abandoned.
   */
  private terminate(error?: Error) {
    if (this.status === 'closed') return;
    const previous = this.status;
    this.status = 'closed';
    this.pending.length = 0;

    if (previous === 'queued') {
      this.lobby.withdraw(this);
    }

    const binding = this.binding;
    if (previous === 'playing' && binding) {
      const match = this.lobby.findMatch(binding.matchId);
      match?.abandon(binding.symbol).catch((err: unknown) => {
        this.logger.error(`failed to abandon ${binding.matchId}`, err);
      });
    }

    this.logger.info(`closed ${this.id}${error ? ` (${error.message})` : ''}`);
    this.onClosed?.(this);
  }
}
