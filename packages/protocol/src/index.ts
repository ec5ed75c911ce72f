/**
 * @fileoverview Main entry point for the protocol package.
 * Re-exports message schemas, the line codec, the legacy codec and shared types.
 */

// Codec
export {
  DEFAULT_MAX_FRAME_BYTES,
  type DecodeResult,
  decodeClientFrame,
  decodeServerFrame,
  decodeStream,
  encodeFrame,
  type InboundFrame,
  LineDecoder,
} from './codec.js';
// Connection contract
export type { Channel, ConnectionHandle } from './connection.js';
// Errors
export { FrameTooLargeError, MalformedMessageError, UnknownMessageTypeError } from './errors.js';
// Legacy protocol
export {
  encodeLegacyFrame,
  encodeLegacyMessage,
  type LegacyCommand,
  type LegacyMessage,
  parseLegacyCommand,
} from './legacy.js';
// Messages
export {
  CLIENT_MESSAGE_TYPES,
  ClientChatMessage,
  ClientGameOverMessage,
  ClientMessage,
  ErrorMessage,
  FindMatchMessage,
  GameOverReasonSchema,
  GameplayStartMessage,
  isMessageType,
  NameMessage,
  OpponentDisconnectedMessage,
  OpponentShipPlacementMessage,
  PingMessage,
  PlayerNumberSchema,
  PongMessage,
  parseClientMessage,
  parseServerMessage,
  ReceiveShotMessage,
  SERVER_MESSAGE_TYPES,
  ServerChatMessage,
  ServerGameOverMessage,
  ServerMessage,
  SessionIdSchema,
  SessionStartMessage,
  SetupCompleteMessage,
  SetupUpdateMessage,
  ShipPlacementMessage,
  ShipSchema,
  ShotMessage,
  ShotResultMessage,
  ShotResultSchema,
  TurnChangeMessage,
  WaitingForOpponentMessage,
} from './messages.js';
// Types
export type {
  Cell,
  GameOverReason,
  GamePhase,
  Orientation,
  PlayerName,
  PlayerNumber,
  SessionId,
  ShipPlacement,
  ShotResult,
} from './types.js';
export { otherPlayer } from './types.js';

/**
 * Protocol version.
 */
export const PROTOCOL_VERSION = '1.0.0';
