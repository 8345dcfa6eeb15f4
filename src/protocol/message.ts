/**
 * Chat-message envelope and rich-text payload codec.
 *
 * Missing or `null` fields become empty strings and unknown fields are
 * dropped. A field that is present with the wrong type, or a document
 * that is not a JSON object, raises a DecodeError subclass.
 */

import { EnvelopeDecodeError, RichTextDecodeError } from "./errors.js";
import type {
  Command,
  MessageActor,
  MessageEnvelope,
  MessageObject,
  MessageTarget,
  Reply,
  RichObjectParameter,
  RichTextPayload,
} from "./types.js";

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

/** Throws the decode error of the document being read. */
type Reject = () => never;

function stringField(obj: JsonObject, key: string, reject: Reject): string {
  const value = obj[key];
  if (value === undefined || value === null) return "";
  if (typeof value === "string") return value;
  return reject();
}

function objectField(obj: JsonObject, key: string, reject: Reject): JsonObject {
  const value = obj[key];
  if (value === undefined || value === null) return {};
  if (isJsonObject(value)) return value;
  return reject();
}

function looseText(value: unknown): string {
  return typeof value === "string" ? value : "";
}

const rejectEnvelope: Reject = () => {
  throw new EnvelopeDecodeError("Invalid body supplied");
};

const rejectRichText: Reject = () => {
  throw new RichTextDecodeError("Invalid rich-text content supplied");
};

/**
 * Parse `text` as JSON and require an object at the top level.
 *
 * Returns `null` when the text is not a JSON object.
 */
function parseObject(text: string): JsonObject | null {
  let parsed: unknown;
  try {
    parsed = JSON.parse(text);
  } catch {
    return null;
  }
  return isJsonObject(parsed) ? parsed : null;
}

function decodeActor(obj: JsonObject): MessageActor {
  return Object.freeze({
    type: stringField(obj, "type", rejectEnvelope),
    id: stringField(obj, "id", rejectEnvelope),
    name: stringField(obj, "name", rejectEnvelope),
  });
}

function decodeObject(obj: JsonObject): MessageObject {
  return Object.freeze({
    type: stringField(obj, "type", rejectEnvelope),
    id: stringField(obj, "id", rejectEnvelope),
    name: stringField(obj, "name", rejectEnvelope),
    content: stringField(obj, "content", rejectEnvelope),
    mediaType: stringField(obj, "mediaType", rejectEnvelope),
  });
}

function decodeTarget(obj: JsonObject): MessageTarget {
  return Object.freeze({
    type: stringField(obj, "type", rejectEnvelope),
    id: stringField(obj, "id", rejectEnvelope),
    name: stringField(obj, "name", rejectEnvelope),
  });
}

/**
 * Decode the outer chat-message envelope from the raw request body.
 *
 * @throws {EnvelopeDecodeError} If the body is not a JSON object or a
 *   known field has the wrong type.
 */
export function decodeEnvelope(body: string | Uint8Array): MessageEnvelope {
  const text =
    typeof body === "string" ? body : Buffer.from(body).toString("utf-8");
  const root = parseObject(text);
  if (root === null) {
    return rejectEnvelope();
  }

  return Object.freeze({
    type: stringField(root, "type", rejectEnvelope),
    actor: decodeActor(objectField(root, "actor", rejectEnvelope)),
    object: decodeObject(objectField(root, "object", rejectEnvelope)),
    target: decodeTarget(objectField(root, "target", rejectEnvelope)),
  });
}

/**
 * Decode the rich-text payload carried in `object.content`.
 *
 * Parameters are kept as delivered but not interpreted. Talk sends an
 * empty list when there are none, so anything but an object counts as
 * absent, entries that are not objects are skipped and their fields
 * are read leniently.
 *
 * @throws {RichTextDecodeError} If the content is not a JSON object or
 *   `message` is not a string.
 */
export function decodeRichText(content: string): RichTextPayload {
  const root = parseObject(content);
  if (root === null) {
    return rejectRichText();
  }

  const message = stringField(root, "message", rejectRichText);
  const rawParameters = root["parameters"];
  if (!isJsonObject(rawParameters)) {
    return Object.freeze({ message });
  }

  const parameters: Record<string, RichObjectParameter> = {};
  for (const [key, value] of Object.entries(rawParameters)) {
    if (!isJsonObject(value)) continue;
    parameters[key] = Object.freeze({
      id: looseText(value["id"]),
      name: looseText(value["name"]),
      type: looseText(value["type"]),
    });
  }

  return Object.freeze({ message, parameters: Object.freeze(parameters) });
}

/**
 * Encode a reply as `{"message":...,"replyTo":...}`.
 */
export function encodeReply(reply: Reply): Buffer {
  return Buffer.from(
    JSON.stringify({ message: reply.message, replyTo: reply.replyTo }),
    "utf-8"
  );
}

/**
 * Encode a command as `{"action":...,"target":...}`.
 */
export function encodeCommand(command: Command): Buffer {
  return Buffer.from(
    JSON.stringify({ action: command.action, target: command.target }),
    "utf-8"
  );
}
