/**
 * talk-ha-bridge start -- Load the configuration and serve the bot webhook.
 */

import type { Server } from "node:http";

import { loadConfig } from "../../bridge/config.js";
import { createLogger } from "../../bridge/logger.js";
import { startServer } from "../../bridge/server.js";
import { ConfigError, errorMessage } from "../../protocol/errors.js";
import { cliError } from "../helpers.js";

export async function startCommand(options: {
  config?: string;
  port?: number;
}): Promise<Server> {
  let server: Server;
  try {
    const config = loadConfig({
      configPath: options.config,
      overrides: options.port === undefined ? {} : { port: options.port },
    });
    const logger = createLogger({ level: config.logLevel });
    logger.child({ component: "config" }).info("Configuration loaded");
    server = await startServer(config, logger);
  } catch (err) {
    if (err instanceof ConfigError) {
      cliError(`Fatal error config file: ${err.problems.join("\n  ")}`);
    }
    cliError(`Error: ${errorMessage(err)}`);
  }
  return server;
}
