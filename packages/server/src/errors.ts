/**
 * @fileoverview Server error taxonomy.
 *
 * Handshake errors end the offending connection only. Session rejections are
 * reported back to the sender and leave the connection open. Connection loss
 * always runs the disconnect cascade.
 */

/**
 * Another connected player already uses the requested display name.
 */
export class NameTakenError extends Error {
  constructor(readonly playerName: string) {
    super(`Name "${playerName}" is already taken`);
    this.name = 'NameTakenError';
  }
}

/**
 * The requested display name is empty, blank or too long.
 */
export class InvalidNameError extends Error {
  constructor(reason: string) {
    super(`Invalid name: ${reason}`);
    this.name = 'InvalidNameError';
  }
}

/**
 * A session message the current phase or turn does not allow.
 */
export class OutOfTurnError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'OutOfTurnError';
  }
}

/**
 * A message that contradicts the sender's slot or the pending shot.
 */
export class SessionRuleError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'SessionRuleError';
  }
}

/**
 * A session id that is not (or no longer) registered.
 */
export class SessionNotFoundError extends Error {
  constructor(readonly sessionId: number | null) {
    super(sessionId === null ? 'Player has no active session' : `Session not found: ${sessionId}`);
    this.name = 'SessionNotFoundError';
  }
}

/**
 * Read or write failure, peer close, overflow or heartbeat timeout.
 */
export class ConnectionLostError extends Error {
  constructor(reason: string) {
    super(`Connection lost: ${reason}`);
    this.name = 'ConnectionLostError';
  }
}

/**
 * Configuration file that does not match the schema.
 */
export class InvalidConfigError extends Error {
  constructor(message: string) {
    super(`Invalid server configuration: ${message}`);
    this.name = 'InvalidConfigError';
  }
}
