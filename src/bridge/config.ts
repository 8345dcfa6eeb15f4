/**
 * Bridge configuration.
 *
 * Priority (highest wins): explicit override > env var > config file > default.
 * The config file is JSON with every key nested under `bot`, e.g.
 *
 *     { "bot": { "port": 8080, "secret": "...",
 *                "ha": { "url": "http://ha.local:8123", "webhook_id": "..." } } }
 *
 * A loaded BridgeConfig is frozen and shared read-only by every request.
 */

import { existsSync, readFileSync } from "node:fs";
import { resolve } from "node:path";

import { ConfigError, errorMessage } from "../protocol/errors.js";

export const DEFAULT_CONFIG_FILE = "config.json";
export const DEFAULT_PORT = 8080;
export const DEFAULT_TIMEOUT_MS = 30_000;
export const DEFAULT_SUCCESS_REPLIES: readonly string[] = ["Done!"];
export const DEFAULT_FAILURE_REPLY = "Error calling Home Assistant";
export const DEFAULT_LOG_LEVEL = "info";

const VALID_LOG_LEVELS = new Set([
  "fatal",
  "error",
  "warn",
  "info",
  "debug",
  "trace",
  "silent",
]);

/** Unvalidated settings as they come from a file, env or caller. */
export interface BridgeConfigOptions {
  port?: number | string;
  secret?: string;
  haUrl?: string;
  haWebhookId?: string;
  haTimeoutMs?: number | string;
  replyTimeoutMs?: number | string;
  successReplies?: readonly string[];
  failureReply?: string;
  tlsCaFile?: string;
  logLevel?: string;
}

type Env = Record<string, string | undefined>;

export class BridgeConfig {
  readonly port: number;
  readonly secret: string;
  readonly haUrl: string;
  readonly haWebhookId: string;
  readonly haTimeoutMs: number;
  readonly replyTimeoutMs: number;
  readonly successReplies: readonly string[];
  readonly failureReply: string;
  readonly tlsCaFile: string | null;
  readonly logLevel: string;

  /**
   * Validate fully resolved options.
   *
   * @throws {ConfigError} Listing every invalid or missing value.
   */
  constructor(options: BridgeConfigOptions) {
    const problems: string[] = [];

    this.port = parseInteger(options.port ?? DEFAULT_PORT, "bot.port", problems, 0, 65535);
    this.secret = requireString(options.secret, "bot.secret", problems);
    this.haUrl = requireHttpUrl(options.haUrl, "bot.ha.url", problems);
    this.haWebhookId = requireString(options.haWebhookId, "bot.ha.webhook_id", problems);
    this.haTimeoutMs = parseInteger(
      options.haTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      "bot.ha.timeout_ms",
      problems,
      1
    );
    this.replyTimeoutMs = parseInteger(
      options.replyTimeoutMs ?? DEFAULT_TIMEOUT_MS,
      "bot.reply.timeout_ms",
      problems,
      1
    );

    const successReplies = options.successReplies ?? DEFAULT_SUCCESS_REPLIES;
    if (successReplies.length === 0 || successReplies.some((r) => r.length === 0)) {
      problems.push("bot.replies.success must be a non-empty list of non-empty strings");
    }
    this.successReplies = Object.freeze([...successReplies]);

    this.failureReply = options.failureReply ?? DEFAULT_FAILURE_REPLY;
    if (this.failureReply.length === 0) {
      problems.push("bot.replies.failure must not be empty");
    }

    this.tlsCaFile = options.tlsCaFile ? options.tlsCaFile : null;

    const logLevel = options.logLevel ?? DEFAULT_LOG_LEVEL;
    if (!VALID_LOG_LEVELS.has(logLevel)) {
      problems.push(
        `bot.log_level '${logLevel}' must be one of: ${JSON.stringify([...VALID_LOG_LEVELS].sort())}`
      );
    }
    this.logLevel = logLevel;

    if (problems.length > 0) {
      throw new ConfigError(problems);
    }

    Object.freeze(this);
  }

  /** Webhook URL of the automation hub, without duplicate slashes. */
  get webhookUrl(): string {
    return `${this.haUrl.replace(/\/+$/, "")}/api/webhook/${this.haWebhookId}`;
  }
}

function requireString(
  value: string | undefined,
  key: string,
  problems: string[]
): string {
  if (value === undefined || value.trim().length === 0) {
    problems.push(`${key} is required`);
    return "";
  }
  return value;
}

function requireHttpUrl(
  value: string | undefined,
  key: string,
  problems: string[]
): string {
  const url = requireString(value, key, problems);
  if (url === "") {
    return url;
  }
  try {
    const parsed = new URL(url);
    if (parsed.protocol !== "http:" && parsed.protocol !== "https:") {
      problems.push(`${key} must be an http(s) URL, got '${url}'`);
    }
  } catch {
    problems.push(`${key} is not a valid URL: '${url}'`);
  }
  return url;
}

function parseInteger(
  value: number | string,
  key: string,
  problems: string[],
  min: number,
  max: number = Number.MAX_SAFE_INTEGER
): number {
  const parsed = typeof value === "number" ? value : Number(value.trim());
  if (!Number.isInteger(parsed) || parsed < min || parsed > max) {
    problems.push(`${key} must be an integer between ${min} and ${max}, got '${value}'`);
    return 0;
  }
  return parsed;
}

// ---------------------------------------------------------------------------
// File and environment sources
// ---------------------------------------------------------------------------

type JsonObject = Record<string, unknown>;

function isJsonObject(value: unknown): value is JsonObject {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function section(obj: JsonObject, key: string): JsonObject {
  const value = obj[key];
  return isJsonObject(value) ? value : {};
}

function scalar(
  obj: JsonObject,
  key: string,
  problems: string[],
  path: string
): string | number | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string" || typeof value === "number") return value;
  problems.push(`${path} must be a string or number`);
  return undefined;
}

function text(
  obj: JsonObject,
  key: string,
  problems: string[],
  path: string
): string | undefined {
  const value = scalar(obj, key, problems, path);
  return value === undefined ? undefined : String(value);
}

function textList(
  obj: JsonObject,
  key: string,
  problems: string[],
  path: string
): string[] | undefined {
  const value = obj[key];
  if (value === undefined || value === null) return undefined;
  if (typeof value === "string") return [value];
  if (Array.isArray(value) && value.every((v): v is string => typeof v === "string")) {
    return value;
  }
  problems.push(`${path} must be a string or a list of strings`);
  return undefined;
}

/**
 * Read the `bot` section of a JSON config file.
 *
 * @throws {ConfigError} If the file cannot be read or is not valid JSON.
 */
export function readConfigFile(path: string): BridgeConfigOptions {
  let parsed: unknown;
  try {
    parsed = JSON.parse(readFileSync(path, "utf-8"));
  } catch (err) {
    throw new ConfigError([`cannot read config file ${path}: ${errorMessage(err)}`]);
  }
  if (!isJsonObject(parsed)) {
    throw new ConfigError([`config file ${path} must contain a JSON object`]);
  }

  const problems: string[] = [];
  const bot = section(parsed, "bot");
  const ha = section(bot, "ha");
  const reply = section(bot, "reply");
  const replies = section(bot, "replies");
  const tls = section(bot, "tls");

  const options: BridgeConfigOptions = {
    port: scalar(bot, "port", problems, "bot.port"),
    secret: text(bot, "secret", problems, "bot.secret"),
    haUrl: text(ha, "url", problems, "bot.ha.url"),
    haWebhookId: text(ha, "webhook_id", problems, "bot.ha.webhook_id"),
    haTimeoutMs: scalar(ha, "timeout_ms", problems, "bot.ha.timeout_ms"),
    replyTimeoutMs: scalar(reply, "timeout_ms", problems, "bot.reply.timeout_ms"),
    successReplies: textList(replies, "success", problems, "bot.replies.success"),
    failureReply: text(replies, "failure", problems, "bot.replies.failure"),
    tlsCaFile: text(tls, "ca_file", problems, "bot.tls.ca_file"),
    logLevel: text(bot, "log_level", problems, "bot.log_level"),
  };

  if (problems.length > 0) {
    throw new ConfigError(problems);
  }
  return options;
}

/**
 * Settings taken from `BOT_*` environment variables.
 */
export function readConfigEnv(env: Env): BridgeConfigOptions {
  const get = (name: string): string | undefined => {
    const value = env[name];
    return value === undefined || value === "" ? undefined : value;
  };

  return {
    port: get("BOT_PORT"),
    secret: get("BOT_SECRET"),
    haUrl: get("BOT_HA_URL"),
    haWebhookId: get("BOT_HA_WEBHOOK_ID"),
    haTimeoutMs: get("BOT_HA_TIMEOUT_MS"),
    replyTimeoutMs: get("BOT_REPLY_TIMEOUT_MS"),
    tlsCaFile: get("BOT_TLS_CA_FILE"),
    logLevel: get("BOT_LOG_LEVEL"),
  };
}

/**
 * Merge sources left to right; later defined values win.
 */
function mergeOptions(...sources: BridgeConfigOptions[]): BridgeConfigOptions {
  const merged: BridgeConfigOptions = {};
  for (const source of sources) {
    for (const [key, value] of Object.entries(source)) {
      if (value !== undefined) {
        Object.assign(merged, { [key]: value });
      }
    }
  }
  return merged;
}

export interface LoadConfigOptions {
  /** Explicit config file. Must exist when given. */
  configPath?: string;
  /** Highest-priority values, typically from CLI flags. */
  overrides?: BridgeConfigOptions;
  env?: Env;
  cwd?: string;
}

/**
 * Load and validate the configuration.
 *
 * Without `configPath`, `config.json` in the working directory is used
 * when it exists; otherwise only env vars and overrides apply.
 *
 * @throws {ConfigError} If the file is unreadable or any value is invalid.
 */
export function loadConfig(options: LoadConfigOptions = {}): BridgeConfig {
  const env = options.env ?? process.env;
  const cwd = options.cwd ?? process.cwd();

  let fileOptions: BridgeConfigOptions = {};
  if (options.configPath !== undefined) {
    fileOptions = readConfigFile(resolve(cwd, options.configPath));
  } else {
    const defaultPath = resolve(cwd, DEFAULT_CONFIG_FILE);
    if (existsSync(defaultPath)) {
      fileOptions = readConfigFile(defaultPath);
    }
  }

  return new BridgeConfig(
    mergeOptions(fileOptions, readConfigEnv(env), options.overrides ?? {})
  );
}
