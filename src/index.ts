/**
 * talk-ha-bridge -- relays signed Talk bot messages to a Home Assistant webhook.
 *
 * Top-level package exports: the bridge runtime and the protocol layer.
 */

export {
  BridgeConfig,
  loadConfig,
  createLogger,
  InboundGateway,
  createApp,
  startServer,
} from "./bridge/index.js";
export type { GatewayOutcome, InboundRequest } from "./bridge/index.js";
export * as protocol from "./protocol/index.js";
