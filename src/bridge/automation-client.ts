/**
 * Posts parsed commands to the Home Assistant webhook.
 *
 * One POST per command: no retry, no backoff. Only HTTP 200 counts as
 * success.
 */

import type { AxiosInstance } from "axios";

import { AutomationDispatchError, errorMessage } from "../protocol/errors.js";
import { encodeCommand } from "../protocol/message.js";
import type { Command } from "../protocol/types.js";
import type { BridgeConfig } from "./config.js";
import { truncateBody } from "./http-client.js";
import type { Logger } from "./logger.js";

export interface AutomationClientDeps {
  config: Pick<BridgeConfig, "webhookUrl" | "haTimeoutMs">;
  http: AxiosInstance;
  logger: Logger;
}

export interface DispatchOptions {
  /** Aborts the call when the inbound request goes away. */
  signal?: AbortSignal;
}

export class AutomationClient {
  private _config: AutomationClientDeps["config"];
  private _http: AxiosInstance;
  private _logger: Logger;

  constructor(deps: AutomationClientDeps) {
    this._config = deps.config;
    this._http = deps.http;
    this._logger = deps.logger.child({ component: "webhook" });
  }

  /**
   * Send a command and report whether the hub accepted it.
   *
   * Never throws; failures are logged and reported as `false`.
   */
  async dispatch(command: Command, options: DispatchOptions = {}): Promise<boolean> {
    try {
      await this.post(command, options);
      this._logger.info({ action: command.action, target: command.target }, "POST request was successful");
      return true;
    } catch (err) {
      if (err instanceof AutomationDispatchError && err.status !== null) {
        this._logger.warn({ status: err.status }, err.message);
      } else {
        this._logger.error({ err: errorMessage(err) }, "POST request failed");
      }
      return false;
    }
  }

  /**
   * Send a command.
   *
   * @throws {AutomationDispatchError} On a non-200 status or transport error.
   */
  async post(command: Command, options: DispatchOptions = {}): Promise<void> {
    let status: number;
    let data: unknown;
    try {
      const resp = await this._http.post(this._config.webhookUrl, encodeCommand(command), {
        headers: { "Content-Type": "application/json" },
        timeout: this._config.haTimeoutMs,
        signal: options.signal,
      });
      status = resp.status;
      data = resp.data;
    } catch (err) {
      throw new AutomationDispatchError(errorMessage(err));
    }

    if (status !== 200) {
      throw new AutomationDispatchError(
        `POST request failed with status code ${status}: ${truncateBody(data)}`,
        status
      );
    }
  }
}
