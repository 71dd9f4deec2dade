export type GameRuleCode =
  | 'turn_violation'
  | 'out_of_range'
  | 'cell_occupied'
  | 'match_already_over'
  | 'match_not_started';

export type ErrorReason = GameRuleCode | 'protocol_error' | 'handshake_failed';

/**
 * A move the rules do not allow. The offending client is told and the match
 * carries on untouched.
 */
export class GameRuleError extends Error {
  constructor(
    readonly code: GameRuleCode,
    message: string,
  ) {
    super(message);
    this.name = 'GameRuleError';
  }
}

/** Bytes or payloads that do not form a valid protocol message. */
export class DecodeError extends Error {
  constructor(
    message: string,
    readonly details?: unknown,
  ) {
    super(message);
    this.name = 'DecodeError';
  }
}

/** Configuration or bind failures; the process cannot continue. */
export class StartupError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'StartupError';
  }
}

export function errorMessage(err: unknown): string {
  if (err instanceof Error) return err.message;
  return String(err);
}
