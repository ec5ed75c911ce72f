/**
 * @fileoverview Broadside protocol message definitions.
 * Uses Zod for runtime validation of every record read off the wire.
 */

import { z } from 'zod';

// ============ Shared Schemas ============

export const PlayerNumberSchema = z.union([z.literal(1), z.literal(2)]);

export const SessionIdSchema = z.number().int().positive();

const CoordinateSchema = z.number().int().min(0);

export const ShotResultSchema = z.enum(['hit', 'miss', 'sunk']);

export const GameOverReasonSchema = z.enum(['fleet_destroyed', 'opponent_disconnected', 'shutdown']);

/**
 * A ship placement is opaque: geometry belongs to the clients, so any JSON
 * value is accepted and relayed untouched. Only its presence is required.
 */
export const ShipSchema = z.unknown().refine((ship) => ship !== undefined, {
  message: 'ship is required',
});

// ============ Client -> Server Messages ============

/**
 * Handshake record. The bare `{ name }` form without `type` is accepted by the decoder.
 */
export const NameMessage = z.object({
  type: z.literal('name'),
  name: z.string(),
});

export const ShipPlacementMessage = z.object({
  type: z.literal('ship_placement'),
  player_num: PlayerNumberSchema,
  ship: ShipSchema,
});

export const SetupCompleteMessage = z.object({
  type: z.literal('setup_complete'),
  player_num: PlayerNumberSchema,
});

export const ShotMessage = z.object({
  type: z.literal('shot'),
  player_num: PlayerNumberSchema,
  row: CoordinateSchema,
  col: CoordinateSchema,
});

/**
 * Outcome of a shot, reported by the player who was shot at.
 * `player` is the shooter.
 */
export const ShotResultMessage = z.object({
  type: z.literal('shot_result'),
  player: PlayerNumberSchema,
  row: CoordinateSchema,
  col: CoordinateSchema,
  result: ShotResultSchema,
});

/**
 * Client announcement that the game is won, normally sent by the player whose fleet is gone.
 */
export const ClientGameOverMessage = z.object({
  type: z.literal('game_over'),
  winner: PlayerNumberSchema,
});

export const ClientChatMessage = z.object({
  type: z.literal('chat'),
  text: z.string().min(1).max(500),
  player: z.string().optional(),
});

/**
 * Request to re-enter matchmaking after a finished game.
 */
export const FindMatchMessage = z.object({
  type: z.literal('find_match'),
});

export const PongMessage = z.object({
  type: z.literal('pong'),
});

/**
 * Union of all valid client-to-server messages.
 */
export const ClientMessage = z.discriminatedUnion('type', [
  NameMessage,
  ShipPlacementMessage,
  SetupCompleteMessage,
  ShotMessage,
  ShotResultMessage,
  ClientGameOverMessage,
  ClientChatMessage,
  FindMatchMessage,
  PongMessage,
]);

export type ClientMessage = z.infer<typeof ClientMessage>;

export const CLIENT_MESSAGE_TYPES: ReadonlySet<string> = new Set<ClientMessage['type']>([
  'name',
  'ship_placement',
  'setup_complete',
  'shot',
  'shot_result',
  'game_over',
  'chat',
  'find_match',
  'pong',
]);

// ============ Server -> Client Messages ============

export const SessionStartMessage = z.object({
  type: z.literal('session_start'),
  session_id: SessionIdSchema,
  player_num: PlayerNumberSchema,
  opponent: z.string(),
});

export const WaitingForOpponentMessage = z.object({
  type: z.literal('waiting_for_opponent'),
});

export const ErrorMessage = z.object({
  type: z.literal('error'),
  message: z.string(),
});

export const SetupUpdateMessage = z.object({
  type: z.literal('setup_update'),
  player: PlayerNumberSchema,
  ready: z.boolean(),
});

export const GameplayStartMessage = z.object({
  type: z.literal('gameplay_start'),
  current_player: PlayerNumberSchema,
});

export const OpponentShipPlacementMessage = z.object({
  type: z.literal('opponent_ship_placement'),
  ship: ShipSchema,
});

export const ReceiveShotMessage = z.object({
  type: z.literal('receive_shot'),
  row: CoordinateSchema,
  col: CoordinateSchema,
  player: PlayerNumberSchema,
});

export const TurnChangeMessage = z.object({
  type: z.literal('turn_change'),
  current_player: PlayerNumberSchema,
});

export const OpponentDisconnectedMessage = z.object({
  type: z.literal('opponent_disconnected'),
});

export const ServerChatMessage = z.object({
  type: z.literal('chat'),
  player: z.string(),
  text: z.string(),
});

export const ServerGameOverMessage = z.object({
  type: z.literal('game_over'),
  winner: PlayerNumberSchema,
  reason: GameOverReasonSchema,
});

export const PingMessage = z.object({
  type: z.literal('ping'),
});

/**
 * Union of all valid server-to-client messages.
 */
export const ServerMessage = z.discriminatedUnion('type', [
  SessionStartMessage,
  WaitingForOpponentMessage,
  ErrorMessage,
  SetupUpdateMessage,
  GameplayStartMessage,
  OpponentShipPlacementMessage,
  ReceiveShotMessage,
  ShotResultMessage,
  TurnChangeMessage,
  OpponentDisconnectedMessage,
  ServerChatMessage,
  ServerGameOverMessage,
  PingMessage,
]);

export type ServerMessage = z.infer<typeof ServerMessage>;

export const SERVER_MESSAGE_TYPES: ReadonlySet<string> = new Set<ServerMessage['type']>([
  'session_start',
  'waiting_for_opponent',
  'error',
  'setup_update',
  'gameplay_start',
  'opponent_ship_placement',
  'receive_shot',
  'shot_result',
  'turn_change',
  'opponent_disconnected',
  'chat',
  'game_over',
  'ping',
]);

// ============ Utility Functions ============

/**
 * Parse and validate a client message from unknown data.
 * @returns Validated ClientMessage or null if invalid
 */
export function parseClientMessage(data: unknown): ClientMessage | null {
  const result = ClientMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Parse and validate a server message from unknown data.
 * @returns Validated ServerMessage or null if invalid
 */
export function parseServerMessage(data: unknown): ServerMessage | null {
  const result = ServerMessage.safeParse(data);
  return result.success ? result.data : null;
}

/**
 * Type guard for checking if a message is a specific type.
 */
export function isMessageType<T extends ServerMessage['type']>(
  message: ServerMessage,
  type: T
): message is Extract<ServerMessage, { type: T }> {
  return message.type === type;
}
