/**
 * @fileoverview Error types raised by the session core.
 *
 * - InvalidSessionError: a caller referenced a session that does not exist or
 *   a value that is not a well-formed session. Public manager operations catch
 *   it, report the message and do nothing.
 * - UnknownModeError: a mode outside the closed set reached command
 *   construction. Always a programming error; never caught by the core.
 * - AttachUnavailableError: an `attach` invocation was requested for a session
 *   that cannot be attached to.
 * - RegistryClosedError: the registry was written to before `open()` loaded
 *   the database file, or after `close()`.
 *
 * @module errors
 */

export class InvalidSessionError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'InvalidSessionError';
  }
}

export class UnknownModeError extends Error {
  readonly mode: string;

  constructor(mode: string) {
    super(`Unknown session mode: ${mode}`);
    this.name = 'UnknownModeError';
    this.mode = mode;
  }
}

export class RegistryClosedError extends Error {
  readonly filePath: string;

  constructor(filePath: string) {
    super(`Session registry ${filePath} is not open`);
    this.name = 'RegistryClosedError';
    this.filePath = filePath;
  }
}

export class AttachUnavailableError extends Error {
  readonly sessionId: string;

  constructor(sessionId: string) {
    super(`Session ${sessionId} is not attachable and its socket no longer exists`);
    this.name = 'AttachUnavailableError';
    this.sessionId = sessionId;
  }
}
