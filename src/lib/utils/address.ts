import { ServerStateError } from '../errors/errors.js';

/**
 * Listen address split into its parts. An empty host means all interfaces.
 */
export interface ListenAddress {
  host?: string;
  port: number;
}

/**
 * Parse a `[host]:port` listen address such as `:5001`, `127.0.0.1:0` or `[::1]:8055`.
 *
 * @throws {ServerStateError} When the address has no valid port
 */
export function parseListenAddress(address: string): ListenAddress {
  const match = /^(?:\[([^\]]+)\]|([^:]*)):(\d{1,5})$/.exec(address.trim());
  if (!match) {
    throw ServerStateError.invalidAddress(address);
  }

  const port = Number(match[3]);
  if (port > 65_535) {
    throw ServerStateError.invalidAddress(address);
  }

  const host = match[1] ?? match[2];
  return host ? { host, port } : { port };
}

/** Render a bound address back into `host:port` form */
export function formatAddress(host: string, port: number): string {
  return host.includes(':') ? `[${host}]:${port}` : `${host}:${port}`;
}
