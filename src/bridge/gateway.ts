/**
 * Inbound message pipeline.
 *
 *   Received -> SignatureVerified -> Decoded -> Ignored | CommandDispatched
 *
 * Every request ends in exactly one tagged GatewayOutcome. Nothing with a
 * side effect (webhook call, reply) happens before the signature over the
 * raw body has been verified.
 */

import { randomInt } from "node:crypto";

import { parseCommand } from "../protocol/command.js";
import {
  BodyReadError,
  EnvelopeDecodeError,
  RichTextDecodeError,
  SignatureMismatchError,
} from "../protocol/errors.js";
import { decodeEnvelope, decodeRichText } from "../protocol/message.js";
import { verify } from "../protocol/signature.js";
import {
  CHAT_MESSAGE_OBJECT_NAME,
  type Command,
  type MessageEnvelope,
} from "../protocol/types.js";
import type { AutomationClient } from "./automation-client.js";
import type { BridgeConfig } from "./config.js";
import type { Logger } from "./logger.js";
import type { OutboundNotifier } from "./notifier.js";

/** A webhook delivery as seen by the pipeline, independent of the HTTP stack. */
export interface InboundRequest {
  /** Raw body bytes, or `null` when the body could not be read. */
  readonly body: Uint8Array | null;
  readonly backendUrl: string;
  readonly nonce: string;
  readonly signature: string;
  /** Aborted when the caller stops waiting for the outcome. */
  readonly signal?: AbortSignal;
}

export type RejectReason = "body-unreadable" | "signature-mismatch" | "envelope-invalid";

export type IgnoreReason = "not-a-chat-message" | "rich-text-invalid" | "non-command";

export type GatewayOutcome =
  | {
      readonly kind: "rejected";
      readonly reason: RejectReason;
      readonly error: BodyReadError | SignatureMismatchError | EnvelopeDecodeError;
    }
  | { readonly kind: "ignored"; readonly reason: IgnoreReason }
  | {
      readonly kind: "dispatched";
      readonly command: Command;
      readonly automationSucceeded: boolean;
      readonly replyText: string;
      readonly replyDelivered: boolean;
    };

export interface GatewayDeps {
  config: Pick<BridgeConfig, "secret" | "successReplies" | "failureReply">;
  automation: Pick<AutomationClient, "dispatch">;
  notifier: Pick<OutboundNotifier, "notify">;
  logger: Logger;
  /** Picks the acknowledgement text; uniform random by default. */
  pickReply?: (replies: readonly string[]) => string;
}

function pickRandom(replies: readonly string[]): string {
  return replies[randomInt(replies.length)];
}

export class InboundGateway {
  private _config: GatewayDeps["config"];
  private _automation: GatewayDeps["automation"];
  private _notifier: GatewayDeps["notifier"];
  private _logger: Logger;
  private _pickReply: (replies: readonly string[]) => string;

  constructor(deps: GatewayDeps) {
    this._config = deps.config;
    this._automation = deps.automation;
    this._notifier = deps.notifier;
    this._logger = deps.logger.child({ component: "talk" });
    this._pickReply = deps.pickReply ?? pickRandom;
  }

  async handle(request: InboundRequest): Promise<GatewayOutcome> {
    // Received
    if (request.body === null) {
      const error = new BodyReadError("can't read body");
      this._logger.warn("Error reading body");
      return { kind: "rejected", reason: "body-unreadable", error };
    }

    // SignatureVerified
    if (!verify(request.body, request.nonce, request.signature, this._config.secret)) {
      const error = new SignatureMismatchError("Invalid signature");
      this._logger.warn({ backend: request.backendUrl }, "Error validating signature");
      return { kind: "rejected", reason: "signature-mismatch", error };
    }

    // Decoded
    let envelope: MessageEnvelope;
    try {
      envelope = decodeEnvelope(request.body);
    } catch (err) {
      if (!(err instanceof EnvelopeDecodeError)) throw err;
      this._logger.warn({ err: err.message }, "Error invalid body");
      return { kind: "rejected", reason: "envelope-invalid", error: err };
    }

    if (envelope.object.name !== CHAT_MESSAGE_OBJECT_NAME) {
      this._logger.debug({ objectName: envelope.object.name }, "Not a chat message");
      return { kind: "ignored", reason: "not-a-chat-message" };
    }

    let text: string;
    try {
      text = decodeRichText(envelope.object.content).message;
    } catch (err) {
      if (!(err instanceof RichTextDecodeError)) throw err;
      this._logger.info({ messageId: envelope.object.id }, "Dropping message with invalid rich-text content");
      return { kind: "ignored", reason: "rich-text-invalid" };
    }

    const parsed = parseCommand(text);
    if (parsed.kind === "no-match") {
      if (parsed.reason === "missing-arguments") {
        this._logger.info({ text }, "Command doesn't contain at least two words");
      } else {
        this._logger.info({ text }, "Message is not command");
      }
      return { kind: "ignored", reason: "non-command" };
    }

    // CommandDispatched
    this._logger.info({ text }, "Command found");
    const automationSucceeded = await this._automation.dispatch(parsed.command, {
      signal: request.signal,
    });
    const replyText = automationSucceeded
      ? this._pickReply(this._config.successReplies)
      : this._config.failureReply;

    const replyDelivered = await this._notifier.notify(
      {
        backendUrl: request.backendUrl,
        roomId: envelope.target.id,
        replyTo: envelope.object.id,
      },
      replyText,
      { signal: request.signal }
    );

    return {
      kind: "dispatched",
      command: parsed.command,
      automationSucceeded,
      replyText,
      replyDelivered,
    };
  }
}

/** HTTP status and body for an outcome. */
export function outcomeResponse(outcome: GatewayOutcome): { status: number; body: string } {
  if (outcome.kind === "rejected") {
    return { status: 400, body: outcome.error.message };
  }
  return { status: 200, body: "Received" };
}
