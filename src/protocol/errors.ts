/**
 * Bridge exception hierarchy.
 *
 * All bridge-specific errors inherit from BridgeError.
 */

/** Base error for all bridge errors. */
export class BridgeError extends Error {
  constructor(message?: string) {
    super(message);
    this.name = "BridgeError";
    Object.setPrototypeOf(this, new.target.prototype);
  }
}

/** Raised when the inbound request body cannot be read. */
export class BodyReadError extends BridgeError {
  constructor(message?: string) {
    super(message);
    this.name = "BodyReadError";
  }
}

/** Raised when an inbound signature does not match the shared secret. */
export class SignatureMismatchError extends BridgeError {
  constructor(message?: string) {
    super(message);
    this.name = "SignatureMismatchError";
  }
}

/** Raised when a JSON document cannot be decoded. */
export class DecodeError extends BridgeError {
  constructor(message?: string) {
    super(message);
    this.name = "DecodeError";
  }
}

/** Raised when the outer chat-message envelope is malformed. */
export class EnvelopeDecodeError extends DecodeError {
  constructor(message?: string) {
    super(message);
    this.name = "EnvelopeDecodeError";
  }
}

/** Raised when the nested rich-text payload is malformed. Non-fatal. */
export class RichTextDecodeError extends DecodeError {
  constructor(message?: string) {
    super(message);
    this.name = "RichTextDecodeError";
  }
}

/** Raised when the automation webhook rejects or cannot receive a command. */
export class AutomationDispatchError extends BridgeError {
  readonly status: number | null;

  constructor(message?: string, status: number | null = null) {
    super(message);
    this.name = "AutomationDispatchError";
    this.status = status;
  }
}

/** Raised when a reply cannot be posted back to the chat backend. */
export class ReplyDeliveryError extends BridgeError {
  readonly status: number | null;

  constructor(message?: string, status: number | null = null) {
    super(message);
    this.name = "ReplyDeliveryError";
    this.status = status;
  }
}

/** Raised when the startup configuration is missing or invalid. */
export class ConfigError extends BridgeError {
  readonly problems: readonly string[];

  constructor(problems: readonly string[]) {
    super(`Invalid configuration: ${problems.join("; ")}`);
    this.name = "ConfigError";
    this.problems = problems;
  }
}

/** Render any thrown value as a message string. */
export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
