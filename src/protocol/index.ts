/**
 * Bridge protocol -- signing, message codec and command parsing.
 *
 * Public API re-exports for the protocol layer.
 */

// Types
export {
  INBOUND_BACKEND_HEADER,
  INBOUND_RANDOM_HEADER,
  INBOUND_SIGNATURE_HEADER,
  OUTBOUND_RANDOM_HEADER,
  OUTBOUND_SIGNATURE_HEADER,
  OCS_API_HEADER,
  CHAT_MESSAGE_OBJECT_NAME,
  TRIGGER_MARKER,
  type MessageActor,
  type MessageObject,
  type MessageTarget,
  type MessageEnvelope,
  type RichObjectParameter,
  type RichTextPayload,
  type Command,
  type Reply,
} from "./types.js";

// Errors
export {
  BridgeError,
  BodyReadError,
  SignatureMismatchError,
  DecodeError,
  EnvelopeDecodeError,
  RichTextDecodeError,
  AutomationDispatchError,
  ReplyDeliveryError,
  ConfigError,
  errorMessage,
} from "./errors.js";

// Signatures
export {
  NONCE_ALPHABET,
  NONCE_LENGTH,
  type SignedFrame,
  sign,
  verify,
  generateNonce,
  signWithFreshNonce,
} from "./signature.js";

// Message codec
export {
  decodeEnvelope,
  decodeRichText,
  encodeReply,
  encodeCommand,
} from "./message.js";

// Commands
export {
  type NoMatchReason,
  type CommandParseResult,
  tokenize,
  parseCommand,
} from "./command.js";
