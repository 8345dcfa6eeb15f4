/**
 * HMAC-SHA256 signing for bot messages.
 *
 * Both directions use the same scheme: the digest covers the nonce
 * immediately followed by the payload, keyed with the shared secret and
 * encoded as lowercase hex.
 */

import { createHmac, randomInt, timingSafeEqual } from "node:crypto";

/** Alphabet nonces are drawn from. */
export const NONCE_ALPHABET =
  "abcdefghijklmnopqrstuvwxyzABCDEFGHIJKLMNOPQRSTUVWXYZ0123456789";

/** Minimum (and default) nonce length. */
export const NONCE_LENGTH = 64;

const HEX_DIGEST = /^[0-9a-fA-F]{64}$/;

/** A nonce together with the signature computed over it. */
export interface SignedFrame {
  readonly nonce: string;
  readonly signature: string;
}

/**
 * Compute the hex HMAC-SHA256 of `nonce || payload`.
 */
export function sign(
  payload: string | Uint8Array,
  nonce: string,
  secret: string
): string {
  return createHmac("sha256", secret)
    .update(nonce)
    .update(payload)
    .digest("hex");
}

/**
 * Check `signature` against the digest of `nonce || payload`.
 *
 * Anything that is not a 64-character hex string is rejected without
 * comparing. Well-formed digests are compared with `timingSafeEqual()`.
 */
export function verify(
  payload: string | Uint8Array,
  nonce: string,
  signature: string,
  secret: string
): boolean {
  if (!HEX_DIGEST.test(signature)) {
    return false;
  }

  const expected = Buffer.from(sign(payload, nonce, secret), "hex");
  const received = Buffer.from(signature, "hex");

  if (expected.length !== received.length) {
    return false;
  }

  return timingSafeEqual(expected, received);
}

/**
 * Draw a fresh nonce from NONCE_ALPHABET using the CSPRNG.
 */
export function generateNonce(length: number = NONCE_LENGTH): string {
  if (!Number.isInteger(length) || length < NONCE_LENGTH) {
    throw new RangeError(
      `Nonce length must be an integer >= ${NONCE_LENGTH}, got ${length}`
    );
  }

  let nonce = "";
  for (let i = 0; i < length; i++) {
    nonce += NONCE_ALPHABET[randomInt(NONCE_ALPHABET.length)];
  }
  return nonce;
}

/**
 * Sign a payload under a freshly generated nonce.
 */
export function signWithFreshNonce(
  payload: string | Uint8Array,
  secret: string
): SignedFrame {
  const nonce = generateNonce();
  return { nonce, signature: sign(payload, nonce, secret) };
}
