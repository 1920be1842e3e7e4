import "dotenv/config";
import { CommanderError } from "commander";
import { FetchCoordinator } from "./fetch/coordinator.js";
import { MarkerStore } from "./fetch/markers.js";
import { CommandRetriever } from "./fetch/retriever.js";
import { type ListenTarget, parseListenAddress } from "./lib/listen.js";
import { createLogger } from "./lib/logger.js";
import { type ProxyConfig, loadConfig } from "./lib/runtimeEnv.js";
import { buildServer } from "./server.js";

let config: ProxyConfig;
let target: ListenTarget;
try {
  config = loadConfig(process.env);
  target = parseListenAddress(config.listen, process.env);
} catch (err) {
  if (err instanceof CommanderError) process.exit(err.exitCode);
  createLogger().fatal({ err }, "Invalid configuration");
  process.exit(1);
}

const logger = createLogger(config.logLevel);

const markers = new MarkerStore({
  sourceRoot: config.sourceRoot,
  freshnessWindowMs: config.freshnessWindowMs,
  logger: logger.child({ component: "markers" }),
});
const coordinator = new FetchCoordinator({
  markers,
  retriever: new CommandRetriever(config.retrieval),
  logger: logger.child({ component: "fetch" }),
});

const server = buildServer({ coordinator, logger });

if (target.kind === "tcp") {
  await server.listen({ port: target.port, host: target.host });
} else {
  // Inherited socket from a process supervisor.
  await server.ready();
  const fd = target.fd;
  await new Promise<void>((resolve, reject) => {
    server.server.once("error", reject);
    server.server.listen({ fd }, () => {
      server.server.off("error", reject);
      resolve();
    });
  });
}

logger.info({ addr: config.listen, sourceRoot: config.sourceRoot }, "Listened; starting");
