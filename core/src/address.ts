/**
 * Endpoint addresses: `host:port`, the meeting point of a solver endpoint and
 * its clients. The NATS server the endpoint attaches to listens there.
 */

import { ConfigurationError } from "./errors.js";

const LOG_PREFIX = "planwire-core:address";

export interface EndpointAddress {
  host: string;
  port: number;
}

const HOST_RE = /^[a-zA-Z0-9]([a-zA-Z0-9.-]*[a-zA-Z0-9])?$|^\[[0-9a-fA-F:.]+\]$/;

/**
 * @throws ConfigurationError when the address is not `host:port`
 */
export function parseAddress(input: string): EndpointAddress {
  const raw = input.trim();
  const colonIdx = raw.lastIndexOf(":");
  if (colonIdx <= 0) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:parseAddress - Expected host:port, got "${input}"`,
    });
  }
  const host = raw.slice(0, colonIdx);
  const portText = raw.slice(colonIdx + 1);
  const port = Number(portText);
  if (!HOST_RE.test(host)) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:parseAddress - Invalid host "${host}" in "${input}"`,
    });
  }
  if (!/^\d+$/.test(portText) || port < 1 || port > 65535) {
    throw new ConfigurationError({
      message: `${LOG_PREFIX}:parseAddress - Invalid port "${portText}" in "${input}"`,
    });
  }
  return { host, port };
}

export function formatAddress(address: EndpointAddress): string {
  return `${address.host}:${address.port}`;
}

/** NATS server URL for an address. */
export function toNatsUrl(input: string): string {
  return `nats://${formatAddress(parseAddress(input))}`;
}
