import { z } from 'zod';
import { BOARD_SIZE } from '../types/game';
import { DecodeError } from '../lib/errors';

// Wire format: every frame is a 2-byte big-endian length followed by that many
// bytes of UTF-8 JSON. Messages are discriminated by `type`.

export const FRAME_HEADER_BYTES = 2;
export const MAX_FRAME_BYTES = 0xffff;

const markSchema = z.enum(['X', 'O']);

export const clientMessageSchema = z.discriminatedUnion('type', [
  z.object({ type: z.literal('game:hello'), game: z.string().min(1).max(64) }),
  // range is a game rule, checked by the board, not a decoding concern
  z.object({ type: z.literal('game:move'), cell: z.number().int() }),
]);

const statusSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('in_progress'), turn: markSchema }),
  z.object({ kind: z.literal('win'), symbol: markSchema }),
  z.object({ kind: z.literal('draw') }),
]);

const outcomeSchema = z.discriminatedUnion('kind', [
  z.object({ kind: z.literal('win'), symbol: markSchema }),
  z.object({ kind: z.literal('draw') }),
  z.object({ kind: z.literal('abandoned'), symbol: markSchema }),
]);

const errorReasonSchema = z.enum([
  'protocol_error',
  'handshake_failed',
  'turn_violation',
  'out_of_range',
  'cell_occupied',
  'match_already_over',
  'match_not_started',
]);

export const serverMessageSchema = z.discriminatedUnion('type', [
  z.object({
    type: z.literal('game:matched'),
    matchId: z.string(),
    symbol: markSchema,
    opponentPresent: z.boolean(),
  }),
  z.object({
    type: z.literal('game:state'),
    grid: z.array(markSchema.nullable()).length(BOARD_SIZE),
    status: statusSchema,
  }),
  z.object({ type: z.literal('game:ended'), outcome: outcomeSchema }),
  z.object({ type: z.literal('game:error'), reason: errorReasonSchema, message: z.string() }),
]);

export type ClientMessage = z.infer<typeof clientMessageSchema>;
export type ServerMessage = z.infer<typeof serverMessageSchema>;
export type ServerMessageOf<T extends ServerMessage['type']> = Extract<ServerMessage, { type: T }>;

export function parseClientMessage(value: unknown): ClientMessage {
  const parsed = clientMessageSchema.safeParse(value);
  if (!parsed.success) throw new DecodeError('Unrecognised client message', parsed.error.issues);
  return parsed.data;
}

export function parseServerMessage(value: unknown): ServerMessage {
  const parsed = serverMessageSchema.safeParse(value);
  if (!parsed.success) throw new DecodeError('Unrecognised server message', parsed.error.issues);
  return parsed.data;
}

function parseJson(payload: Buffer | string): unknown {
  const text = typeof payload === 'string' ? payload : payload.toString('utf8');
  try {
    return JSON.parse(text);
  } catch {
    throw new DecodeError('Payload is not valid JSON');
  }
}

/** Decodes one frame payload (header already stripped). */
export function decodeClientMessage(payload: Buffer | string): ClientMessage {
  return parseClientMessage(parseJson(payload));
}

export function decodeServerMessage(payload: Buffer | string): ServerMessage {
  return parseServerMessage(parseJson(payload));
}

export function encodeFrame(message: ClientMessage | ServerMessage): Buffer {
  const payload = Buffer.from(JSON.stringify(message), 'utf8');
  if (payload.length > MAX_FRAME_BYTES) {
    throw new RangeError(`Message of ${payload.length} bytes exceeds the ${MAX_FRAME_BYTES} byte frame limit`);
  }
  const frame = Buffer.allocUnsafe(FRAME_HEADER_BYTES + payload.length);
  frame.writeUInt16BE(payload.length, 0);
  payload.copy(frame, FRAME_HEADER_BYTES);
  return frame;
}

/**
 * Reassembles frames from an arbitrary chunking of the byte stream. Returns
 * the payloads completed by each chunk; a partial frame stays buffered.
 */
export class FrameDecoder {
  private buffered: Buffer = Buffer.alloc(0);

  push(chunk: Buffer): Buffer[] {
    this.buffered = this.buffered.length === 0 ? chunk : Buffer.concat([this.buffered, chunk]);
    const frames: Buffer[] = [];

    while (this.buffered.length >= FRAME_HEADER_BYTES) {
      const length = this.buffered.readUInt16BE(0);
      if (length === 0) {
        this.buffered = Buffer.alloc(0);
        throw new DecodeError('Empty frame');
      }
      const end = FRAME_HEADER_BYTES + length;
      if (this.buffered.length < end) break;
      frames.push(this.buffered.subarray(FRAME_HEADER_BYTES, end));
      this.buffered = this.buffered.subarray(end);
    }

    return frames;
  }

  get pendingBytes(): number {
    return this.buffered.length;
  }
}
