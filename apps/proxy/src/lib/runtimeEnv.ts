import { Command } from "commander";
import os from "node:os";
import path from "node:path";
import { ConfigError } from "./errors.js";

export interface RuntimeEnv {
  // Listen address when --listen is not given: "host:port", "port" or "envfd:NAME".
  LISTEN?: string;
  // The first GOPATH entry's src directory is the source root.
  GOPATH?: string;
  FRESHNESS_WINDOW_SECONDS?: string;
  // Space separated argv; the package key is appended as the last argument.
  FETCH_COMMAND?: string;
  LOG_LEVEL?: string;

  // RUNSIT_PORTFD_<NAME> entries for "envfd:NAME" listen addresses.
  [name: string]: string | undefined;
}

export interface RetrievalCommand {
  argv: string[];
  env: Record<string, string>;
}

export interface ProxyConfig {
  listen: string;
  sourceRoot: string;
  freshnessWindowMs: number;
  retrieval: RetrievalCommand;
  logLevel: string;
}

const DEFAULT_LISTEN = ":8080";
const DEFAULT_FRESHNESS_WINDOW_SECONDS = 60;
const DEFAULT_FETCH_COMMAND = ["go", "get", "-u", "-d"];

export function parseFreshnessWindowMs(raw: string | undefined): number {
  const n = Number(raw ?? String(DEFAULT_FRESHNESS_WINDOW_SECONDS));
  const seconds = Number.isFinite(n) && n > 0 ? n : DEFAULT_FRESHNESS_WINDOW_SECONDS;
  return Math.trunc(seconds * 1000);
}

export function resolveSourceRoot(gopath: string | undefined): string {
  const first = (gopath ?? "")
    .split(path.delimiter)
    .map((s) => s.trim())
    .find(Boolean);
  return path.resolve(first ?? path.join(os.homedir(), "go"), "src");
}

export function parseRetrievalCommand(raw: string | undefined): RetrievalCommand {
  if (raw === undefined) {
    // `go get` only populates GOPATH/src outside module mode.
    return { argv: [...DEFAULT_FETCH_COMMAND], env: { GO111MODULE: "off" } };
  }
  const argv = raw.split(/\s+/).filter(Boolean);
  if (argv.length === 0) {
    throw new ConfigError("FETCH_COMMAND is empty");
  }
  return { argv, env: {} };
}

function parseListenFlag(argv: string[]): string | undefined {
  const program = new Command()
    .name("gopath-proxy")
    .description("Serves GOPATH package trees fetched on demand")
    .option("--listen <addr>", "port, ip:port, or 'envfd:NAME' to listen on")
    .exitOverride()
    .parse(argv);
  return program.opts<{ listen?: string }>().listen;
}

export function loadConfig(env: RuntimeEnv, argv: string[] = process.argv): ProxyConfig {
  return {
    listen: parseListenFlag(argv) ?? env.LISTEN ?? DEFAULT_LISTEN,
    sourceRoot: resolveSourceRoot(env.GOPATH),
    freshnessWindowMs: parseFreshnessWindowMs(env.FRESHNESS_WINDOW_SECONDS),
    retrieval: parseRetrievalCommand(env.FETCH_COMMAND),
    logLevel: env.LOG_LEVEL ?? "info",
  };
}
