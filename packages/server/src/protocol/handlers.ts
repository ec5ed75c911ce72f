/**
 * @fileoverview Session message handlers using a registry pattern.
 * Each in-session message type has a dedicated handler registered in the handlers map.
 * Handlers are pure: they take the current state and return the next state plus routed responses.
 */

import type { ClientMessage, PlayerName, PlayerNumber, ServerMessage } from '@broadside/protocol';
import { OutOfTurnError, SessionRuleError } from '../errors.js';
import type { SessionState } from '../game/SessionState.js';

// ============ Types ============

/**
 * Messages a session handles. Handshake, matchmaking and heartbeat records
 * are consumed by the orchestrator before they reach a session.
 */
export type SessionMessage = Extract<
  ClientMessage,
  { type: 'ship_placement' | 'setup_complete' | 'shot' | 'shot_result' | 'game_over' | 'chat' }
>;

const SESSION_MESSAGE_TYPES: ReadonlySet<ClientMessage['type']> = new Set<SessionMessage['type']>([
  'ship_placement',
  'setup_complete',
  'shot',
  'shot_result',
  'game_over',
  'chat',
]);

export function isSessionMessage(message: ClientMessage): message is SessionMessage {
  return SESSION_MESSAGE_TYPES.has(message.type);
}

/**
 * Who sent the message being handled.
 */
export interface SessionContext {
  /** Slot of the sender */
  readonly sender: PlayerNumber;
  /** Display name of the sender */
  readonly senderName: PlayerName;
}

/**
 * Target for sending a response message.
 */
export type MessageTarget = 'sender' | 'opponent' | 'all';

/**
 * A response to be sent after handling a message.
 */
export interface MessageResponse {
  target: MessageTarget;
  message: ServerMessage;
}

/**
 * Result of handling a message.
 */
export interface MessageHandlerResult {
  /** Updated session state */
  newState: SessionState;
  /** Messages to send in response */
  responses: MessageResponse[];
  /** Set when the message was refused; the state is then unchanged */
  rejection?: OutOfTurnError | SessionRuleError;
}

/**
 * Handler function type for a specific message type.
 */
type MessageHandler<T extends SessionMessage> = (
  message: T,
  context: SessionContext,
  state: SessionState
) => MessageHandlerResult;

// ============ Handler Registry ============

/**
 * Registry of message handlers by type.
 */
const messageHandlers: {
  [K in SessionMessage['type']]: MessageHandler<Extract<SessionMessage, { type: K }>>;
} = {
  ship_placement: handleShipPlacement,
  setup_complete: handleSetupComplete,
  shot: handleShot,
  shot_result: handleShotResult,
  game_over: handleGameOver,
  chat: handleChat,
};

// ============ Main Handler ============

/**
 * Handle a session message by dispatching to the appropriate handler.
 *
 * Once the session is over, everything except chat is dropped without a reply.
 */
export function handleSessionMessage(
  message: SessionMessage,
  context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  if (state.isOver && message.type !== 'chat') {
    return unchanged(state);
  }

  const handler = messageHandlers[message.type];
  // The mapped registry type guarantees the handler matches the message type
  return handler(message as never, context, state);
}

// ============ Helpers ============

function unchanged(state: SessionState): MessageHandlerResult {
  return { newState: state, responses: [] };
}

function reject(state: SessionState, rejection: OutOfTurnError | SessionRuleError): MessageHandlerResult {
  return {
    newState: state,
    responses: [{ target: 'sender', message: { type: 'error', message: rejection.message } }],
    rejection,
  };
}

function slotMismatch(): SessionRuleError {
  return new SessionRuleError('player_num does not match your slot');
}

// ============ Individual Handlers ============

/**
 * Handle ship_placement - relayed verbatim to the opponent during setup.
 */
function handleShipPlacement(
  message: Extract<SessionMessage, { type: 'ship_placement' }>,
  context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  if (state.phase !== 'setup') {
    return reject(state, new OutOfTurnError('Ships can only be placed during setup'));
  }
  if (message.player_num !== context.sender) {
    return reject(state, slotMismatch());
  }

  return {
    newState: state,
    responses: [{ target: 'opponent', message: { type: 'opponent_ship_placement', ship: message.ship } }],
  };
}

/**
 * Handle setup_complete - marks the sender ready and starts gameplay once both are.
 * A repeat announcement re-broadcasts the ready flag but never restarts gameplay.
 */
function handleSetupComplete(
  message: Extract<SessionMessage, { type: 'setup_complete' }>,
  context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  if (message.player_num !== context.sender) {
    return reject(state, slotMismatch());
  }

  const responses: MessageResponse[] = [
    { target: 'all', message: { type: 'setup_update', player: context.sender, ready: true } },
  ];

  let newState = state.markSetupComplete(context.sender);
  if (newState.phase === 'setup' && newState.areBothReady()) {
    newState = newState.startGameplay();
    responses.push({
      target: 'all',
      message: { type: 'gameplay_start', current_player: newState.currentTurn },
    });
  }

  return { newState, responses };
}

/**
 * Handle shot - only the turn owner may fire, and only once the previous shot is resolved.
 * A valid shot reaches the targeted player alone.
 */
function handleShot(
  message: Extract<SessionMessage, { type: 'shot' }>,
  context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  if (state.phase !== 'gameplay') {
    return reject(state, new OutOfTurnError('Shots are not allowed before gameplay starts'));
  }
  if (message.player_num !== context.sender) {
    return reject(state, slotMismatch());
  }
  if (context.sender !== state.currentTurn) {
    return reject(state, new OutOfTurnError('Not your turn'));
  }
  if (state.pendingShot !== null) {
    return reject(state, new OutOfTurnError('Waiting for the result of your previous shot'));
  }

  const { row, col } = message;
  return {
    newState: state.registerShot(context.sender, { row, col }),
    responses: [{ target: 'opponent', message: { type: 'receive_shot', row, col, player: context.sender } }],
  };
}

/**
 * Handle shot_result - reported by the targeted player and trusted as-is.
 * Broadcast to both; a miss passes the turn, a hit or sink keeps it with the shooter.
 */
function handleShotResult(
  message: Extract<SessionMessage, { type: 'shot_result' }>,
  context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  if (state.phase !== 'gameplay') {
    return reject(state, new OutOfTurnError('Shot results are not allowed before gameplay starts'));
  }

  const pending = state.pendingShot;
  if (pending === null) {
    return reject(state, new SessionRuleError('No shot is awaiting a result'));
  }
  if (context.sender === pending.shooter) {
    return reject(state, new SessionRuleError('Only the targeted player can report a shot result'));
  }
  if (message.player !== pending.shooter || message.row !== pending.row || message.col !== pending.col) {
    return reject(state, new SessionRuleError('Shot result does not match the pending shot'));
  }

  const newState = state.resolveShot(message.result);
  const responses: MessageResponse[] = [
    {
      target: 'all',
      message: {
        type: 'shot_result',
        player: message.player,
        row: message.row,
        col: message.col,
        result: message.result,
      },
    },
  ];

  if (newState.currentTurn !== state.currentTurn) {
    responses.push({
      target: 'all',
      message: { type: 'turn_change', current_player: newState.currentTurn },
    });
  }

  return { newState, responses };
}

/**
 * Handle game_over - the win condition is signalled by a client and relayed to both.
 */
function handleGameOver(
  message: Extract<SessionMessage, { type: 'game_over' }>,
  _context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  if (state.phase !== 'gameplay') {
    return reject(state, new OutOfTurnError('The game has not started'));
  }

  return {
    newState: state.endGame(message.winner),
    responses: [
      {
        target: 'all',
        message: { type: 'game_over', winner: message.winner, reason: 'fleet_destroyed' },
      },
    ],
  };
}

/**
 * Handle chat - broadcast in any phase with the sender's name attached.
 */
function handleChat(
  message: Extract<SessionMessage, { type: 'chat' }>,
  context: SessionContext,
  state: SessionState
): MessageHandlerResult {
  return {
    newState: state,
    responses: [
      { target: 'all', message: { type: 'chat', player: context.senderName, text: message.text } },
    ],
  };
}
