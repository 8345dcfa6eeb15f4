/**
 * Core types and constants shared by the bridge protocol.
 */

/** Inbound headers sent by the Talk backend with every bot webhook. */
export const INBOUND_BACKEND_HEADER = "x-nextcloud-talk-backend";
export const INBOUND_RANDOM_HEADER = "x-nextcloud-talk-random";
export const INBOUND_SIGNATURE_HEADER = "x-nextcloud-talk-signature";

/** Outbound headers expected by the Talk bot API. */
export const OUTBOUND_RANDOM_HEADER = "X-Nextcloud-Talk-Bot-Random";
export const OUTBOUND_SIGNATURE_HEADER = "X-Nextcloud-Talk-Bot-Signature";
export const OCS_API_HEADER = "OCS-APIRequest";

/** `object.name` of an envelope carrying a chat text message. */
export const CHAT_MESSAGE_OBJECT_NAME = "message";

/** Literal marker that opens a command. */
export const TRIGGER_MARKER = "@ha";

export interface MessageActor {
  readonly type: string;
  readonly id: string;
  readonly name: string;
}

export interface MessageObject {
  readonly type: string;
  readonly id: string;
  readonly name: string;
  /** JSON-encoded rich-text payload when `name === "message"`. */
  readonly content: string;
  readonly mediaType: string;
}

export interface MessageTarget {
  readonly type: string;
  readonly id: string;
  readonly name: string;
}

/** The chat-message envelope delivered to the bot. */
export interface MessageEnvelope {
  readonly type: string;
  readonly actor: MessageActor;
  readonly object: MessageObject;
  readonly target: MessageTarget;
}

export interface RichObjectParameter {
  readonly id: string;
  readonly name: string;
  readonly type: string;
}

/** Rich-text content of a chat message. Only `message` is interpreted. */
export interface RichTextPayload {
  readonly message: string;
  readonly parameters?: Readonly<Record<string, RichObjectParameter>>;
}

/** A structured automation call extracted from chat text. */
export interface Command {
  readonly action: string;
  readonly target: string;
}

/** Reply posted back into the originating conversation. */
export interface Reply {
  readonly message: string;
  readonly replyTo: string;
}
