/**
 * @fileoverview Legacy pipe-delimited protocol.
 *
 * Older clients speak ASCII tokens separated by `|`, one command per line,
 * e.g. `FIRE 3 4|` or `SHOT|1|3|4|hit`. A trailing `|` is optional.
 * This variant has no matchmaking and resolves shots on the server.
 */

import type { DecodeResult } from './codec.js';
import { MalformedMessageError, UnknownMessageTypeError } from './errors.js';
import type { PlayerNumber } from './types.js';

/**
 * Commands a legacy client may send.
 */
export type LegacyCommand =
  | { readonly kind: 'ships' }
  | { readonly kind: 'fire'; readonly row: number; readonly col: number }
  | { readonly kind: 'ping' }
  | { readonly kind: 'quit'; readonly player: PlayerNumber | null };

/**
 * Messages the legacy room sends.
 */
export type LegacyMessage =
  | { readonly kind: 'player'; readonly player: PlayerNumber }
  | { readonly kind: 'wait' }
  | { readonly kind: 'your_placement' }
  | { readonly kind: 'start'; readonly turn: PlayerNumber }
  | {
      readonly kind: 'shot';
      readonly player: PlayerNumber;
      readonly row: number;
      readonly col: number;
      readonly result: 'hit' | 'miss';
    }
  | { readonly kind: 'error'; readonly reason: string }
  | { readonly kind: 'pong' }
  | { readonly kind: 'quit'; readonly player: PlayerNumber };

/**
 * Encode a legacy message as a newline-terminated line.
 */
export function encodeLegacyFrame(message: LegacyMessage): string {
  return `${encodeLegacyMessage(message)}\n`;
}

/**
 * Encode a legacy message without terminator.
 */
export function encodeLegacyMessage(message: LegacyMessage): string {
  switch (message.kind) {
    case 'player':
      return `PLAYER|${message.player}`;
    case 'wait':
      return 'WAIT|';
    case 'your_placement':
      return 'YOURPLACEMENT|';
    case 'start':
      return `START|${message.turn}`;
    case 'shot':
      return `SHOT|${message.player}|${message.row}|${message.col}|${message.result}`;
    case 'error':
      return `ERROR|${message.reason.replaceAll('|', '/')}`;
    case 'pong':
      return 'PONG|';
    case 'quit':
      return `QUIT|${message.player}`;
  }
}

function parseCoordinate(token: string | undefined): number | null {
  if (token === undefined || !/^\d+$/.test(token)) return null;
  return Number(token);
}

function parsePlayer(token: string | undefined): PlayerNumber | null {
  if (token === '1') return 1;
  if (token === '2') return 2;
  return null;
}

/**
 * Parse one legacy command line.
 */
export function parseLegacyCommand(line: string): DecodeResult<LegacyCommand> {
  const tokens = line.trim().split('|');
  if (tokens.length > 1 && tokens[tokens.length - 1] === '') {
    tokens.pop();
  }

  const head = (tokens[0] ?? '').trim();
  const [verb = '', ...inlineArgs] = head.split(/\s+/);

  switch (verb.toUpperCase()) {
    case 'SHIPS':
      return { ok: true, message: { kind: 'ships' } };

    case 'FIRE': {
      // Both `FIRE 3 4|` and `FIRE|3|4` are seen in the wild
      const args = inlineArgs.length > 0 ? inlineArgs : tokens.slice(1).map((t) => t.trim());
      const row = parseCoordinate(args[0]);
      const col = parseCoordinate(args[1]);
      if (row === null || col === null) {
        return { ok: false, error: new MalformedMessageError('FIRE needs a row and a column', line) };
      }
      return { ok: true, message: { kind: 'fire', row, col } };
    }

    case 'PING':
      return { ok: true, message: { kind: 'ping' } };

    case 'QUIT':
      return { ok: true, message: { kind: 'quit', player: parsePlayer(tokens[1]?.trim()) } };

    case '':
      return { ok: false, error: new MalformedMessageError('empty command', line) };

    default:
      return { ok: false, error: new UnknownMessageTypeError(verb) };
  }
}
