/**
 * @fileoverview Newline-delimited JSON framing.
 *
 * One compact JSON record per line. JSON.stringify never emits a raw newline,
 * so `\n` is a safe record separator and a malformed line never breaks the
 * alignment of the lines that follow it.
 */

import { StringDecoder } from 'node:string_decoder';
import type { z } from 'zod';
import { FrameTooLargeError, MalformedMessageError, UnknownMessageTypeError } from './errors.js';
import {
  CLIENT_MESSAGE_TYPES,
  ClientMessage,
  SERVER_MESSAGE_TYPES,
  ServerMessage,
} from './messages.js';

/**
 * Default upper bound for a single frame.
 */
export const DEFAULT_MAX_FRAME_BYTES = 64 * 1024;

/**
 * Result of decoding one frame.
 */
export type DecodeResult<T> =
  | { readonly ok: true; readonly message: T }
  | { readonly ok: false; readonly error: MalformedMessageError | UnknownMessageTypeError };

/**
 * A decoded client frame as seen by the server.
 */
export type InboundFrame = DecodeResult<ClientMessage>;

/**
 * Encode a message as a self-delimited frame.
 */
export function encodeFrame(message: ServerMessage | ClientMessage): string {
  return `${JSON.stringify(message)}\n`;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}

function decodeRecord<T>(
  line: string,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>,
  knownTypes: ReadonlySet<string>,
  normalize: (record: Record<string, unknown>) => Record<string, unknown> = (record) => record
): DecodeResult<T> {
  let data: unknown;
  try {
    data = JSON.parse(line);
  } catch {
    return { ok: false, error: new MalformedMessageError('frame is not valid JSON', line) };
  }

  if (!isRecord(data)) {
    return { ok: false, error: new MalformedMessageError('frame is not a JSON object', line) };
  }

  const record = normalize(data);
  const type = record['type'];
  if (typeof type !== 'string') {
    return { ok: false, error: new MalformedMessageError('missing "type" field', line) };
  }

  if (!knownTypes.has(type)) {
    return { ok: false, error: new UnknownMessageTypeError(type) };
  }

  const result = schema.safeParse(record);
  if (!result.success) {
    const issue = result.error.issues[0];
    const detail = issue ? `${issue.path.join('.') || type}: ${issue.message}` : type;
    return { ok: false, error: new MalformedMessageError(`invalid ${type} payload (${detail})`, line) };
  }

  return { ok: true, message: result.data };
}

/**
 * The handshake record may omit `type`; `{ "name": "..." }` reads as a name message.
 */
function normalizeHandshake(record: Record<string, unknown>): Record<string, unknown> {
  if (record['type'] === undefined && typeof record['name'] === 'string') {
    return { ...record, type: 'name' };
  }
  return record;
}

/**
 * Decode one line sent by a client.
 */
export function decodeClientFrame(line: string): InboundFrame {
  return decodeRecord(line, ClientMessage, CLIENT_MESSAGE_TYPES, normalizeHandshake);
}

/**
 * Decode one line sent by the server.
 */
export function decodeServerFrame(line: string): DecodeResult<ServerMessage> {
  return decodeRecord(line, ServerMessage, SERVER_MESSAGE_TYPES);
}

/**
 * Incremental splitter that turns arbitrary chunks into complete lines.
 *
 * Keeps the unterminated remainder between calls, strips a trailing `\r`
 * and skips blank lines.
 */
export class LineDecoder {
  private remainder = '';
  private readonly textDecoder = new StringDecoder('utf8');

  constructor(private readonly maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES) {}

  /**
   * Feed a chunk and collect every line it completes.
   * @throws {FrameTooLargeError} if the pending remainder grows past the limit
   */
  push(chunk: string | Buffer): string[] {
    const text = typeof chunk === 'string' ? chunk : this.textDecoder.write(chunk);
    const parts = `${this.remainder}${text}`.split('\n');
    this.remainder = parts.pop() ?? '';

    if (Buffer.byteLength(this.remainder) > this.maxFrameBytes) {
      this.remainder = '';
      throw new FrameTooLargeError(this.maxFrameBytes);
    }

    return parts.map(stripCarriageReturn).filter(isNotBlank);
  }

  /**
   * Flush the remainder at end of stream.
   */
  end(): string[] {
    const last = stripCarriageReturn(`${this.remainder}${this.textDecoder.end()}`);
    this.remainder = '';
    return isNotBlank(last) ? [last] : [];
  }

  /** Bytes buffered without a terminator */
  get pendingBytes(): number {
    return Buffer.byteLength(this.remainder);
  }
}

function stripCarriageReturn(line: string): string {
  return line.endsWith('\r') ? line.slice(0, -1) : line;
}

function isNotBlank(line: string): boolean {
  return line.trim().length > 0;
}

/**
 * Lazily decode client frames from a byte or text stream.
 *
 * Each call starts a fresh decoder, so the sequence can be restarted on a new source.
 * A trailing line without terminator is decoded when the source ends.
 */
export async function* decodeStream(
  source: AsyncIterable<string | Buffer>,
  maxFrameBytes: number = DEFAULT_MAX_FRAME_BYTES
): AsyncGenerator<InboundFrame, void, undefined> {
  const lines = new LineDecoder(maxFrameBytes);

  for await (const chunk of source) {
    for (const line of lines.push(chunk)) {
      yield decodeClientFrame(line);
    }
  }

  for (const line of lines.end()) {
    yield decodeClientFrame(line);
  }
}
