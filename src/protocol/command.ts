/**
 * Command recognition for chat text.
 *
 * A command is `@ha <action> <target>`: the marker must open the text,
 * the action is a single word (`[A-Za-z0-9_]+`) and the target starts
 * with a word character. Separators are single ASCII whitespace
 * characters. Tokens past the target are ignored.
 */

import { TRIGGER_MARKER, type Command } from "./types.js";

/** Why a text did not yield a command. */
export type NoMatchReason = "no-trigger" | "missing-arguments";

export type CommandParseResult =
  | { readonly kind: "command"; readonly command: Command }
  | { readonly kind: "no-match"; readonly reason: NoMatchReason };

/** ASCII whitespace: tab, newline, form feed, carriage return, space. */
const SEPARATOR = "[\\t\\n\\f\\r ]";
const WHITESPACE = new RegExp(`${SEPARATOR}+`);
const OPENING = new RegExp(`^${TRIGGER_MARKER}${SEPARATOR}`);
const COMMAND = new RegExp(
  `^${TRIGGER_MARKER}${SEPARATOR}(\\w+)${SEPARATOR}(\\w[^\\t\\n\\f\\r ]*)`
);

/**
 * Split text on whitespace runs, dropping empty tokens.
 */
export function tokenize(text: string): string[] {
  return text.split(WHITESPACE).filter((token) => token.length > 0);
}

/**
 * Extract a command from chat text.
 *
 * Marker, action and target are separated by exactly one whitespace
 * character each.
 */
export function parseCommand(text: string): CommandParseResult {
  if (!OPENING.test(text)) {
    return { kind: "no-match", reason: "no-trigger" };
  }

  const match = COMMAND.exec(text);
  if (match === null) {
    const reason = tokenize(text).length < 3 ? "missing-arguments" : "no-trigger";
    return { kind: "no-match", reason };
  }

  const [, action, target] = match;
  return { kind: "command", command: Object.freeze({ action, target }) };
}
