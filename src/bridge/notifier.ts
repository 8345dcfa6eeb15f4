/**
 * Signed replies back into a Talk conversation.
 *
 * The Talk bot API authenticates a reply by an HMAC over the reply text
 * keyed with the shared secret, carried next to the nonce in the
 * `X-Nextcloud-Talk-Bot-*` headers.
 */

import type { AxiosInstance } from "axios";

import { ReplyDeliveryError, errorMessage } from "../protocol/errors.js";
import { encodeReply } from "../protocol/message.js";
import { signWithFreshNonce } from "../protocol/signature.js";
import {
  OCS_API_HEADER,
  OUTBOUND_RANDOM_HEADER,
  OUTBOUND_SIGNATURE_HEADER,
} from "../protocol/types.js";
import type { BridgeConfig } from "./config.js";
import { truncateBody } from "./http-client.js";
import type { Logger } from "./logger.js";

/** Where a reply goes and which message it answers. */
export interface ReplyTarget {
  /** Value of the inbound `X-NEXTCLOUD-TALK-BACKEND` header. */
  readonly backendUrl: string;
  readonly roomId: string;
  readonly replyTo: string;
}

export interface NotifierDeps {
  config: Pick<BridgeConfig, "secret" | "replyTimeoutMs">;
  http: AxiosInstance;
  logger: Logger;
}

/**
 * Build the bot message endpoint for a room.
 *
 * @throws {ReplyDeliveryError} If the backend URL is not an http(s) URL.
 */
export function replyUrl(backendUrl: string, roomId: string): string {
  const base = backendUrl.endsWith("/") ? backendUrl : `${backendUrl}/`;
  const url = `${base}ocs/v2.php/apps/spreed/api/v1/bot/${encodeURIComponent(roomId)}/message`;
  let protocol: string;
  try {
    protocol = new URL(url).protocol;
  } catch {
    throw new ReplyDeliveryError(`Invalid backend URL '${backendUrl}'`);
  }
  if (protocol !== "http:" && protocol !== "https:") {
    throw new ReplyDeliveryError(`Invalid backend URL '${backendUrl}'`);
  }
  return url;
}

export class OutboundNotifier {
  private _config: NotifierDeps["config"];
  private _http: AxiosInstance;
  private _logger: Logger;

  constructor(deps: NotifierDeps) {
    this._config = deps.config;
    this._http = deps.http;
    this._logger = deps.logger.child({ component: "response" });
  }

  /**
   * Post a reply, best effort.
   *
   * Failures are logged and reported as `false`; the inbound request
   * has its own outcome regardless.
   */
  async notify(
    target: ReplyTarget,
    text: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<boolean> {
    try {
      await this.send(target, text, options);
      return true;
    } catch (err) {
      this._logger.error(
        { roomId: target.roomId, err: errorMessage(err) },
        "Error posting reply"
      );
      return false;
    }
  }

  /**
   * Post a reply.
   *
   * @throws {ReplyDeliveryError} On an invalid backend URL, a transport
   *   error or a non-2xx status.
   */
  async send(
    target: ReplyTarget,
    text: string,
    options: { signal?: AbortSignal } = {}
  ): Promise<void> {
    const url = replyUrl(target.backendUrl, target.roomId);
    const body = encodeReply({ message: text, replyTo: target.replyTo });
    const { nonce, signature } = signWithFreshNonce(text, this._config.secret);

    let status: number;
    let data: unknown;
    try {
      const resp = await this._http.post(url, body, {
        headers: {
          "Content-Type": "application/json",
          [OCS_API_HEADER]: "true",
          [OUTBOUND_RANDOM_HEADER]: nonce,
          [OUTBOUND_SIGNATURE_HEADER]: signature,
        },
        timeout: this._config.replyTimeoutMs,
        signal: options.signal,
      });
      status = resp.status;
      data = resp.data;
    } catch (err) {
      throw new ReplyDeliveryError(errorMessage(err));
    }

    if (status < 200 || status >= 300) {
      throw new ReplyDeliveryError(
        `Reply rejected with status code ${status}: ${truncateBody(data)}`,
        status
      );
    }
  }
}
