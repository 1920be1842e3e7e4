import Fastify, { type FastifyError, type FastifyReply, type FastifyRequest } from "fastify";
import type { FileHandle } from "node:fs/promises";
import fs from "node:fs/promises";
import path from "node:path";
import type { FetchCoordinator } from "./fetch/coordinator.js";
import { createPackageArchive } from "./lib/archive.js";
import type { Logger } from "./lib/logger.js";
import { resolveRequestPath } from "./lib/requestPath.js";

export interface ServerDeps {
  coordinator: FetchCoordinator;
  logger: Logger;
}

const TEXT_PLAIN = "text/plain; charset=utf-8";
const TAR = "application/x-tar";
const HOME_PAGE = "<html><body>go get proxy</body></html>";

function errorText(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}

export function buildServer(deps: ServerDeps) {
  const server = Fastify({
    loggerInstance: deps.logger,
    // The router rejects undecodable paths before any route runs.
    frameworkErrors: (err: FastifyError, req: FastifyRequest, reply: FastifyReply) => {
      if (err.code === "FST_ERR_BAD_URL") {
        req.log.warn({ path: req.url }, "invalid requested path");
        reply.code(500).type(TEXT_PLAIN).send("invalid path");
        return;
      }
      reply.send(err);
    },
  });

  server.get("/*", async (req, reply) => {
    const target = resolveRequestPath(req.url);
    switch (target.kind) {
      case "ignored":
        return reply.send();
      case "home":
        return reply.type("text/html; charset=utf-8").send(HOME_PAGE);
      case "invalid":
        req.log.warn({ path: req.url }, "invalid requested path");
        return reply.code(500).type(TEXT_PLAIN).send("invalid path");
      case "package":
        break;
      default: {
        const _exhaustive: never = target;
        return _exhaustive;
      }
    }

    let dir: string;
    try {
      dir = await deps.coordinator.ensure(target.packageKey);
    } catch (err) {
      return reply.code(500).type(TEXT_PLAIN).send(errorText(err));
    }

    if (target.file === null) {
      const archive = createPackageArchive(dir);
      archive.on("error", (err) => {
        req.log.error({ err, dir }, "Error generating tar");
      });
      return reply.type(TAR).send(archive);
    }

    let handle: FileHandle;
    try {
      handle = await fs.open(path.join(dir, target.file));
    } catch (err) {
      return reply.code(500).type(TEXT_PLAIN).send(errorText(err));
    }
    return reply.type(TEXT_PLAIN).send(handle.createReadStream());
  });

  return server;
}
