#!/usr/bin/env node
/**
 * talk-ha-bridge CLI.
 */

import { Command } from "commander";

import { startCommand } from "./commands/start.js";
import { signCommand } from "./commands/sign.js";
import { parseTextCommand } from "./commands/parse.js";
import { parsePortOption } from "./helpers.js";

const program = new Command();

program
  .name("talk-ha-bridge")
  .description("Relay Talk bot commands to a Home Assistant webhook")
  .version("0.1.0");

// ---- start -----------------------------------------------------------------
program
  .command("start")
  .description("Serve the bot webhook on bot.port")
  .option("-c, --config <path>", "JSON config file (default: ./config.json)")
  .option("-p, --port <port>", "Listen port, overrides bot.port")
  .action(async (opts: { config?: string; port?: string }) => {
    await startCommand({
      config: opts.config,
      port: parsePortOption(opts.port),
    });
  });

// ---- sign ------------------------------------------------------------------
program
  .command("sign <payload>")
  .description("Print the random and signature headers for a payload (offline)")
  .requiredOption("-s, --secret <secret>", "Shared bot secret")
  .option("-r, --random <nonce>", "Use this nonce instead of a fresh one")
  .action((payload: string, opts: { secret: string; random?: string }) => {
    signCommand(payload, opts);
  });

// ---- parse -----------------------------------------------------------------
program
  .command("parse <text>")
  .description("Show the command a chat message would trigger (offline)")
  .action((text: string) => {
    parseTextCommand(text);
  });

await program.parseAsync(process.argv);
