/**
 * @fileoverview Errors raised while decoding frames off the wire.
 */

/**
 * A frame that is not a JSON object, or a known message type with an invalid payload.
 */
export class MalformedMessageError extends Error {
  constructor(
    message: string,
    readonly frame: string
  ) {
    super(`Malformed message: ${message}`);
    this.name = 'MalformedMessageError';
  }
}

/**
 * A well-formed record whose `type` is not part of the protocol.
 */
export class UnknownMessageTypeError extends Error {
  constructor(readonly messageType: string) {
    super(`Unknown message type: ${messageType}`);
    this.name = 'UnknownMessageTypeError';
  }
}

/**
 * More than the allowed number of bytes arrived without a record separator.
 */
export class FrameTooLargeError extends Error {
  constructor(readonly limit: number) {
    super(`Frame exceeds ${limit} bytes without a line terminator`);
    this.name = 'FrameTooLargeError';
  }
}
