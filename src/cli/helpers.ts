/**
 * CLI helper utilities shared across commands.
 */

/**
 * Print an error message to stderr and exit with code 1.
 */
export function cliError(msg: string): never {
  process.stderr.write(msg + "\n");
  process.exit(1);
}

/**
 * Parse a port flag, or return `undefined` when the flag was not given.
 */
export function parsePortOption(value: string | undefined): number | undefined {
  if (value === undefined) {
    return undefined;
  }
  const port = Number(value);
  if (!Number.isInteger(port) || port < 0 || port > 65535) {
    cliError(`Invalid port '${value}'.`);
  }
  return port;
}
