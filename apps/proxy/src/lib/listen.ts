import { ConfigError } from "./errors.js";
import type { RuntimeEnv } from "./runtimeEnv.js";

export type ListenTarget =
  | { kind: "tcp"; host: string; port: number }
  | { kind: "fd"; name: string; fd: number };

const ENVFD_PREFIX = "envfd:";
const PORTFD_ENV_PREFIX = "RUNSIT_PORTFD_";

function parsePort(raw: string, addr: string): number {
  const port = Number(raw);
  if (!/^\d+$/.test(raw) || port > 65535) {
    throw new ConfigError(`Invalid port in listen address ${JSON.stringify(addr)}`);
  }
  return port;
}

/**
 * Parse a listen address: "host:port", ":port", a bare "port", or
 * "envfd:NAME" to take an inherited socket from RUNSIT_PORTFD_NAME.
 */
export function parseListenAddress(addr: string, env: RuntimeEnv): ListenTarget {
  if (addr.startsWith(ENVFD_PREFIX)) {
    const name = addr.slice(ENVFD_PREFIX.length);
    const fdstr = env[PORTFD_ENV_PREFIX + name];
    if (!fdstr) {
      throw new ConfigError(`didn't find named runsit port named ${JSON.stringify(name)} in environment`);
    }
    const fd = Number(fdstr);
    if (!/^\d+$/.test(fdstr)) {
      throw new ConfigError(`bogus port number ${JSON.stringify(fdstr)} in environment`);
    }
    return { kind: "fd", name, fd };
  }

  const idx = addr.lastIndexOf(":");
  if (idx === -1) {
    return { kind: "tcp", host: "0.0.0.0", port: parsePort(addr, addr) };
  }
  const host = addr.slice(0, idx).replace(/^\[(.*)\]$/, "$1");
  return { kind: "tcp", host: host || "0.0.0.0", port: parsePort(addr.slice(idx + 1), addr) };
}
