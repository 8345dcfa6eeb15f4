/**
 * Bridge runtime -- configuration, outbound clients, pipeline and HTTP surface.
 */

export {
  BridgeConfig,
  type BridgeConfigOptions,
  type LoadConfigOptions,
  loadConfig,
  readConfigFile,
  readConfigEnv,
} from "./config.js";
export { type Logger, type LoggerOptions, createLogger, silentLogger } from "./logger.js";
export { createHttpClient, loadCaBundle } from "./http-client.js";
export { AutomationClient, type DispatchOptions } from "./automation-client.js";
export { OutboundNotifier, type ReplyTarget, replyUrl } from "./notifier.js";
export {
  InboundGateway,
  type InboundRequest,
  type GatewayOutcome,
  type RejectReason,
  type IgnoreReason,
  outcomeResponse,
} from "./gateway.js";
export { MESSAGE_PATH, createApp, createGateway, startServer } from "./server.js";
