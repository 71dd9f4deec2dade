import { Duplex } from 'stream';
import type { ClientMessage, ServerMessage, ServerMessageOf } from '../src/protocol/codec';
import type { Transport, TransportHandlers } from '../src/transport/types';
import type { ClientSocket } from '../src/transport/socketIoTransport';
import { DecodeError } from '../src/lib/errors';

/** Lets queued promise callbacks and stream ticks run. */
export async function flush(): Promise<void> {
  await new Promise((resolve) => setImmediate(resolve));
  await new Promise((resolve) => setImmediate(resolve));
}

export function ofType<T extends ServerMessage['type']>(
  messages: readonly ServerMessage[],
  type: T,
): ServerMessageOf<T>[] {
  return messages.filter((m): m is ServerMessageOf<T> => m.type === type);
}

/** In-process transport: records what the server sends, replays what a client would. */
export class FakeTransport implements Transport {
  readonly kind = 'fake';
  readonly sent: ServerMessage[] = [];
  closed = false;
  private handlers: TransportHandlers | null = null;

  constructor(readonly remoteAddress = 'fake:1') {}

  start(handlers: TransportHandlers): void {
    this.handlers = handlers;
  }

  send(message: ServerMessage): void {
    if (!this.closed) this.sent.push(message);
  }

  close(): void {
    if (this.closed) return;
    this.closed = true;
    this.handlers?.closed();
  }

  receive(message: ClientMessage): void {
    this.handlers?.message(message);
  }

  move(cell: number): void {
    this.receive({ type: 'game:move', cell });
  }

  garble(reason = 'Payload is not valid JSON'): void {
    this.handlers?.protocolError(new DecodeError(reason));
  }

  /** The peer vanished or the socket failed. */
  drop(error: Error = new Error('read ECONNRESET')): void {
    this.closed = true;
    this.handlers?.closed(error);
  }

  ofType<T extends ServerMessage['type']>(type: T): ServerMessageOf<T>[] {
    return ofType(this.sent, type);
  }

  last(): ServerMessage | undefined {
    return this.sent[this.sent.length - 1];
  }
}

/** One end of a socket: bytes pushed with `feed` are what the peer wrote. */
export class FakeSocket extends Duplex {
  readonly written: Buffer[] = [];
  private held: Array<() => void> | null = null;

  _read(): void {}

  _write(chunk: Buffer, _encoding: BufferEncoding, callback: (error?: Error | null) => void): void {
    this.written.push(chunk);
    if (this.held) this.held.push(() => callback());
    else callback();
  }

  /** The peer stops reading: writes are accepted but never acknowledged. */
  stall(): void {
    this.held = [];
  }

  /** The peer catches up on everything it left unread. */
  catchUp(): void {
    const held = this.held ?? [];
    this.held = null;
    for (const done of held) done();
  }

  feed(bytes: Buffer): void {
    this.push(bytes);
  }

  hangUp(): void {
    this.push(null);
  }

  get output(): Buffer {
    return Buffer.concat(this.written);
  }
}

/** Server-side end of a socket.io connection, driven by the test. */
export class FakeClientSocket implements ClientSocket {
  readonly handshake = { address: '10.0.0.7' };
  readonly emitted: Array<[string, object]> = [];
  disconnects = 0;
  private readonly listeners = new Map<string, Array<(arg: unknown) => void>>();

  on(event: string, listener: (arg: unknown) => void): this {
    this.listeners.set(event, [...(this.listeners.get(event) ?? []), listener]);
    return this;
  }

  emit(event: string, payload: object): boolean {
    this.emitted.push([event, payload]);
    return true;
  }

  /** socket.io reports a disconnect it was asked for with this reason. */
  disconnect(): this {
    this.disconnects += 1;
    this.fire('disconnect', 'server namespace disconnect');
    return this;
  }

  /** An event arriving from the browser. */
  fire(event: string, arg: unknown): void {
    for (const listener of this.listeners.get(event) ?? []) listener(arg);
  }
}
