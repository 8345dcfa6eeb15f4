/**
 * HTTP surface of the bridge.
 *
 * Endpoints:
 *   POST /message   Talk bot webhook (signed)
 *
 * The body is read raw so the HMAC covers exactly the bytes the backend
 * signed.
 */

import type { Server } from "node:http";
import express, {
  type Express,
  type NextFunction,
  type Request,
  type Response,
} from "express";

import { BodyReadError, errorMessage } from "../protocol/errors.js";
import {
  INBOUND_BACKEND_HEADER,
  INBOUND_RANDOM_HEADER,
  INBOUND_SIGNATURE_HEADER,
} from "../protocol/types.js";
import { AutomationClient } from "./automation-client.js";
import type { BridgeConfig } from "./config.js";
import { InboundGateway, outcomeResponse } from "./gateway.js";
import { createHttpClient, loadCaBundle } from "./http-client.js";
import type { Logger } from "./logger.js";
import { OutboundNotifier } from "./notifier.js";

export const MESSAGE_PATH = "/message";
const BODY_LIMIT = "1mb";

export interface AppDeps {
  gateway: Pick<InboundGateway, "handle">;
  logger: Logger;
}

/** Errors raised by the body parser carry a string `type` such as `entity.too.large`. */
function isBodyParserError(err: unknown): boolean {
  return (
    err instanceof Error &&
    "type" in err &&
    typeof err.type === "string"
  );
}

export function createApp(deps: AppDeps): Express {
  const app = express();
  const logger = deps.logger.child({ component: "request" });

  app.disable("x-powered-by");

  app.post(
    MESSAGE_PATH,
    express.raw({ type: () => true, limit: BODY_LIMIT }),
    async (req: Request, res: Response, next: NextFunction) => {
      const controller = new AbortController();
      res.on("close", () => {
        if (!res.writableFinished) {
          controller.abort();
        }
      });

      const body: unknown = req.body;
      try {
        const outcome = await deps.gateway.handle({
          body: Buffer.isBuffer(body) ? body : Buffer.alloc(0),
          backendUrl: req.get(INBOUND_BACKEND_HEADER) ?? "",
          nonce: req.get(INBOUND_RANDOM_HEADER) ?? "",
          signature: req.get(INBOUND_SIGNATURE_HEADER) ?? "",
          signal: controller.signal,
        });
        const { status, body: text } = outcomeResponse(outcome);
        res.status(status).type("text/plain").send(text);
      } catch (err) {
        next(err);
      }
    }
  );

  app.all(MESSAGE_PATH, (_req: Request, res: Response) => {
    res.set("Allow", "POST").status(405).type("text/plain").send("Method Not Allowed");
  });

  app.use((err: unknown, _req: Request, res: Response, _next: NextFunction) => {
    if (isBodyParserError(err)) {
      const error = new BodyReadError("can't read body");
      logger.warn({ err: errorMessage(err) }, "Error reading body");
      res.status(400).type("text/plain").send(error.message);
      return;
    }
    logger.error({ err: errorMessage(err) }, "Unhandled request error");
    res.status(500).type("text/plain").send("Internal Server Error");
  });

  return app;
}

/**
 * Wire the pipeline for a loaded configuration.
 *
 * @throws {ConfigError} If the configured CA bundle cannot be read.
 */
export async function createGateway(
  config: BridgeConfig,
  logger: Logger
): Promise<InboundGateway> {
  const ca = await loadCaBundle(config.tlsCaFile);
  const http = createHttpClient({ ca });

  return new InboundGateway({
    config,
    automation: new AutomationClient({ config, http, logger }),
    notifier: new OutboundNotifier({ config, http, logger }),
    logger,
  });
}

/**
 * Start listening on `bot.port`.
 *
 * Resolves once the server is bound.
 */
export async function startServer(config: BridgeConfig, logger: Logger): Promise<Server> {
  const gateway = await createGateway(config, logger);
  const app = createApp({ gateway, logger });
  const log = logger.child({ component: "network" });

  return new Promise<Server>((resolve, reject) => {
    const server = app.listen(config.port);
    server.once("error", reject);
    server.once("listening", () => {
      server.off("error", reject);
      const address = server.address();
      const port = typeof address === "object" && address !== null ? address.port : config.port;
      log.info({ port }, "Listening");
      resolve(server);
    });
  });
}
