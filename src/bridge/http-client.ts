/**
 * Outbound HTTP client shared by the automation and reply paths.
 *
 * Certificates are always validated. An optional PEM bundle is added on
 * top of Node's bundled root certificates, for backends signed by a
 * private CA.
 */

import axios, { type AxiosInstance } from "axios";
import { readFile } from "node:fs/promises";
import { Agent as HttpsAgent } from "node:https";
import { rootCertificates } from "node:tls";

import { ConfigError, errorMessage } from "../protocol/errors.js";

export interface HttpClientOptions {
  /** Extra trusted CA certificates (PEM). */
  ca?: string | null;
}

export function createHttpClient(options: HttpClientOptions = {}): AxiosInstance {
  const httpsAgent = new HttpsAgent({
    rejectUnauthorized: true,
    ...(options.ca ? { ca: [...rootCertificates, options.ca] } : {}),
  });

  return axios.create({
    httpsAgent,
    // Redirects are not followed: a signed request only goes to the URL it was built for.
    maxRedirects: 0,
    responseType: "text",
    // Callers decide what a successful status is.
    validateStatus: () => true,
  });
}

/**
 * Read the PEM bundle named by `bot.tls.ca_file`, if any.
 *
 * @throws {ConfigError} If the file cannot be read or holds no certificate.
 */
export async function loadCaBundle(path: string | null): Promise<string | null> {
  if (path === null) {
    return null;
  }

  let pem: string;
  try {
    pem = await readFile(path, "utf-8");
  } catch (err) {
    throw new ConfigError([`cannot read bot.tls.ca_file ${path}: ${errorMessage(err)}`]);
  }
  if (!pem.includes("-----BEGIN CERTIFICATE-----")) {
    throw new ConfigError([`bot.tls.ca_file ${path} contains no PEM certificate`]);
  }
  return pem;
}

/** First `max` characters of a response body, for log lines. */
export function truncateBody(data: unknown, max: number = 200): string {
  const text = typeof data === "string" ? data : JSON.stringify(data) ?? "";
  return text.length > max ? `${text.slice(0, max)}...` : text;
}
