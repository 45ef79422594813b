import net from "node:net";

import { ConfigError } from "../errors.js";

export interface CollectorAddress {
  /** Network instance named before the first `/`, if any. Parsed but not applied. */
  vrf?: string;
  address: string;
}

/** Accepts `host:port`, `[ipv6]:port`, and `unix:` or `scheme://` targets gRPC understands. */
export function validateHostPort(address: string, what: string): string {
  const trimmed = address.trim();
  if (!trimmed) {
    throw new ConfigError(`${what} address is required`);
  }
  if (/^[a-z][a-z0-9+.-]*:\/\//i.test(trimmed) || trimmed.startsWith("unix:")) {
    return trimmed;
  }

  const match = /^(?:\[([^\]]+)\]|([^:[\]\s]+)):(\d+)$/.exec(trimmed);
  if (!match) {
    throw new ConfigError(`${what} address "${address}" must be in the form host:port`);
  }
  const bracketed = match[1];
  if (bracketed !== undefined && !net.isIPv6(bracketed)) {
    throw new ConfigError(`${what} address "${address}" has an invalid IPv6 literal`);
  }
  const port = Number(match[3]);
  if (port < 1 || port > 65535) {
    throw new ConfigError(`${what} address "${address}" has an invalid port`);
  }
  return trimmed;
}

/** Parses `[<vrf-name>/]address:port`. */
export function parseCollectorAddress(value: string): CollectorAddress {
  const trimmed = value.trim();
  const slash = trimmed.indexOf("/");
  if (slash < 0 || trimmed.startsWith("unix:") || trimmed.includes("://")) {
    return { address: validateHostPort(trimmed, "collector") };
  }

  const vrf = trimmed.slice(0, slash);
  if (!vrf || /\s/.test(vrf)) {
    throw new ConfigError(`collector address "${value}" has an invalid VRF name`);
  }
  return { vrf, address: validateHostPort(trimmed.slice(slash + 1), "collector") };
}

export function validateSourceAddress(value: string): string {
  const trimmed = value.trim();
  if (net.isIP(trimmed) === 0) {
    throw new ConfigError(`source address "${value}" must be an IP address`);
  }
  return trimmed;
}
