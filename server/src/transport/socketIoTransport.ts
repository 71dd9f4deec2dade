import { parseClientMessage, type ClientMessage, type ServerMessage } from '../protocol/codec';
import { DecodeError } from '../lib/errors';
import type { Transport, TransportHandlers } from './types';

const INBOUND_EVENTS: readonly ClientMessage['type'][] = ['game:hello', 'game:move'];

// disconnects we asked for (or the client asked for politely) are not failures
const CLEAN_DISCONNECTS = new Set(['server namespace disconnect', 'client namespace disconnect', 'server shutting down']);

/** The part of a socket.io server-side `Socket` the transport talks to. */
export interface ClientSocket {
  readonly handshake: { readonly address: string };
  on(event: string, listener: (arg: unknown) => void): unknown;
  emit(event: string, payload: object): unknown;
  disconnect(close?: boolean): unknown;
}

/**
 * Browser clients: every message travels as a socket.io event named by its
 * `type`, the remaining fields being the payload. Socket.io does its own
 * framing and ping/pong liveness.
 */
export class SocketIoTransport implements Transport {
  readonly kind = 'socket.io';
  readonly remoteAddress: string;
  private handlers: TransportHandlers | null = null;
  private closing = false;
  private finished = false;

  constructor(private readonly socket: ClientSocket) {
    this.remoteAddress = socket.handshake.address;
  }

  start(handlers: TransportHandlers): void {
    if (this.handlers) throw new Error('Transport already started');
    this.handlers = handlers;

    for (const type of INBOUND_EVENTS) {
      this.socket.on(type, (payload: unknown) => this.relay(handlers, type, payload));
    }
    this.socket.on('disconnect', (reason: unknown) => {
      const text = String(reason);
      this.finish(CLEAN_DISCONNECTS.has(text) ? undefined : new Error(text));
    });
  }

  send(message: ServerMessage): void {
    if (this.closing) return;
    const { type, ...body } = message;
    this.socket.emit(type, body);
  }

  close(): void {
    if (this.closing) return;
    this.closing = true;
    this.socket.disconnect(true);
  }

  private relay(handlers: TransportHandlers, type: ClientMessage['type'], payload: unknown) {
    if (this.closing) return;
    const candidate = typeof payload === 'object' && payload !== null ? { ...payload, type } : { type };
    let message: ClientMessage;
    try {
      message = parseClientMessage(candidate);
    } catch (err) {
      if (err instanceof DecodeError) return handlers.protocolError(err);
      throw err;
    }
    handlers.message(message);
  }

  private finish(error?: Error) {
    if (this.finished) return;
    this.finished = true;
    this.closing = true;
    this.handlers?.closed(error);
  }
}
