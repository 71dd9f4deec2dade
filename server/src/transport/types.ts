import type { ClientMessage, ServerMessage } from '../protocol/codec';
import type { DecodeError } from '../lib/errors';

export interface TransportHandlers {
  message(message: ClientMessage): void;
  protocolError(error: DecodeError): void;
  /** Fires once, whether the peer went away, I/O failed (`error` set) or we closed. */
  closed(error?: Error): void;
}

/**
 * One client connection as the session sees it: decoded messages in,
 * server messages out.
 */
export interface Transport {
  readonly kind: string;
  readonly remoteAddress: string;
  start(handlers: TransportHandlers): void;
  send(message: ServerMessage): void;
  /** Flushes what was already sent, then releases the connection. */
  close(): void;
}
