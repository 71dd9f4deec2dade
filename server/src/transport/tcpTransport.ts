import type { Socket } from 'net';
import type { Duplex } from 'stream';
import {
  FrameDecoder,
  decodeClientMessage,
  encodeFrame,
  type ClientMessage,
  type ServerMessage,
} from '../protocol/codec';
import { DecodeError } from '../lib/errors';
import type { Transport, TransportHandlers } from './types';

/** Outbound bytes a peer may leave unread before it is dropped. */
export const MAX_BUFFERED_BYTES = 64 * 1024;

const CLOSE_GRACE_MS = 2000;

export interface TcpTransportOptions {
  /** How long `close` waits for the peer to take the last writes before destroying the socket. */
  closeGraceMs?: number;
}

export class TcpTransport implements Transport {
  readonly kind = 'tcp';
  private readonly decoder = new FrameDecoder();
  private readonly closeGraceMs: number;
  private handlers: TransportHandlers | null = null;
  private closing = false;
  private finished = false;
  private blocked = false;
  private closeTimer: ReturnType<typeof setTimeout> | null = null;

  constructor(
    private readonly stream: Duplex,
    readonly remoteAddress: string,
    options: TcpTransportOptions = {},
  ) {
    this.closeGraceMs = options.closeGraceMs ?? CLOSE_GRACE_MS;
  }

  static fromSocket(socket: Socket, keepAliveMs: number): TcpTransport {
    // idle peers are detected by the kernel's keep-alive probes
    socket.setKeepAlive(true, keepAliveMs);
    socket.setNoDelay(true);
    const address = socket.remoteAddress ? `${socket.remoteAddress}:${socket.remotePort}` : 'unknown';
    return new TcpTransport(socket, address);
  }

  start(handlers: TransportHandlers): void {
    if (this.handlers) throw new Error('Transport already started');
    this.handlers = handlers;
    this.stream.on('data', (chunk: Buffer) => this.onData(handlers, chunk));
    this.stream.on('end', () => this.stream.end());
    this.stream.on('error', (err: Error) => this.finish(err));
    this.stream.on('close', () => this.finish());
  }

  send(message: ServerMessage): void {
    if (this.closing) return;
    const frame = encodeFrame(message);
    if (this.stream.writableLength + frame.length > MAX_BUFFERED_BYTES) {
      this.finish(new Error('Peer is not reading'));
      this.stream.destroy();
      return;
    }

    const flushed = this.stream.write(frame, (err?: Error | null) => {
      if (err) this.finish(err);
    });
    if (!flushed) this.holdReads();
  }

  close(): void {
    if (this.closing) return;
    this.closing = true;
    this.closeTimer = setTimeout(() => this.stream.destroy(), this.closeGraceMs);
    this.closeTimer.unref();
    this.stream.end(() => this.stream.destroy());
  }

  // No new input while the peer is behind on reading what we wrote.
  private holdReads() {
    if (this.blocked) return;
    this.blocked = true;
    this.stream.pause();
    this.stream.once('drain', () => {
      this.blocked = false;
      if (!this.closing) this.stream.resume();
    });
  }

  private onData(handlers: TransportHandlers, chunk: Buffer) {
    if (this.closing) return;

    let frames: Buffer[];
    try {
      frames = this.decoder.push(chunk);
    } catch (err) {
      if (err instanceof DecodeError) return handlers.protocolError(err);
      throw err;
    }

    for (const frame of frames) {
      if (this.closing) return;
      let message: ClientMessage;
      try {
        message = decodeClientMessage(frame);
      } catch (err) {
        if (err instanceof DecodeError) return handlers.protocolError(err);
        throw err;
      }
      handlers.message(message);
    }
  }

  private finish(error?: Error) {
    if (this.closeTimer) {
      clearTimeout(this.closeTimer);
      this.closeTimer = null;
    }
    if (this.finished) return;
    this.finished = true;
    this.closing = true;
    this.handlers?.closed(error);
  }
}
