import { spawn } from "node:child_process";
import type { RetrievalCommand } from "../lib/runtimeEnv.js";

export type RetrievalResult =
  | { ok: true; output: string }
  | { ok: false; reason: string; output: string };

/** Runs the external fetch for one package key. */
export interface PackageRetriever {
  retrieve(packageKey: string): Promise<RetrievalResult>;
}

/**
 * Spawns the configured command with the package key appended and
 * captures stdout and stderr interleaved into one output.
 */
export class CommandRetriever implements PackageRetriever {
  constructor(private readonly command: RetrievalCommand) {}

  retrieve(packageKey: string): Promise<RetrievalResult> {
    const [bin, ...args] = this.command.argv;
    if (bin === undefined) {
      return Promise.resolve({ ok: false, reason: "no retrieval command configured", output: "" });
    }

    return new Promise((resolve) => {
      const chunks: Buffer[] = [];
      const child = spawn(bin, [...args, packageKey], {
        env: { ...process.env, ...this.command.env },
        stdio: ["ignore", "pipe", "pipe"],
      });
      child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
      child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

      const collect = (): string => Buffer.concat(chunks).toString("utf8");
      // A failed spawn may emit "close" after "error"; the first settle wins.
      child.on("error", (err) => {
        resolve({ ok: false, reason: err.message, output: collect() });
      });
      child.on("close", (code, signal) => {
        if (code === 0) {
          resolve({ ok: true, output: collect() });
        } else if (signal) {
          resolve({ ok: false, reason: `signal: ${signal}`, output: collect() });
        } else {
          resolve({ ok: false, reason: `exit status ${code ?? "unknown"}`, output: collect() });
        }
      });
    });
  }
}
