/**
 * talk-ha-bridge sign -- Print the signature headers for a payload.
 *
 * OFFLINE: useful for crafting requests against a running bridge, e.g.
 * `curl -H "X-Nextcloud-Talk-Random: <nonce>" -H "X-Nextcloud-Talk-Signature: <sig>"`.
 */

import { generateNonce, sign } from "../../protocol/signature.js";
import { errorMessage } from "../../protocol/errors.js";
import { cliError } from "../helpers.js";

export function signCommand(
  payload: string,
  options: { secret: string; random?: string }
): void {
  let nonce: string;
  try {
    nonce = options.random ?? generateNonce();
  } catch (err) {
    cliError(`Error: ${errorMessage(err)}`);
  }

  console.log(`X-Nextcloud-Talk-Random: ${nonce}`);
  console.log(`X-Nextcloud-Talk-Signature: ${sign(payload, nonce, options.secret)}`);
}
