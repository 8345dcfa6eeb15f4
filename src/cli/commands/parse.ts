/**
 * talk-ha-bridge parse -- Show the command a chat text would trigger.
 *
 * OFFLINE: nothing is sent.
 */

import { parseCommand } from "../../protocol/command.js";

export function parseTextCommand(text: string): void {
  const result = parseCommand(text);
  if (result.kind === "command") {
    console.log(JSON.stringify(result.command));
  } else {
    console.log(`No command (${result.reason})`);
  }
}
