import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../lib/logger.js";

export const MARKER_FILE = ".go-get-proxy-last";

export interface MarkerStoreOptions {
  sourceRoot: string;
  freshnessWindowMs: number;
  logger: Logger;
  now?: () => number;
}

/**
 * Freshness markers: zero-byte files whose mtime records the last
 * successful fetch covering their directory.
 */
export class MarkerStore {
  readonly sourceRoot: string;
  private readonly freshnessWindowMs: number;
  private readonly logger: Logger;
  private readonly now: () => number;

  constructor(opts: MarkerStoreOptions) {
    this.sourceRoot = path.resolve(opts.sourceRoot);
    this.freshnessWindowMs = opts.freshnessWindowMs;
    this.logger = opts.logger;
    this.now = opts.now ?? Date.now;
  }

  packageDirectory(packageKey: string): string {
    return path.join(this.sourceRoot, ...packageKey.split("/"));
  }

  private isManaged(dir: string): boolean {
    const rel = path.relative(this.sourceRoot, dir);
    if (rel === "") return true;
    return rel !== ".." && !rel.startsWith(`..${path.sep}`) && !path.isAbsolute(rel);
  }

  /**
   * True if `dir` or one of its ancestors, up to and including the source
   * root, holds a marker younger than the freshness window.
   */
  async isFresh(dir: string): Promise<boolean> {
    let current = path.resolve(dir);
    if (!this.isManaged(current)) return false;

    for (;;) {
      const mtimeMs = await this.markerMtime(current);
      if (mtimeMs !== null && this.now() - mtimeMs < this.freshnessWindowMs) {
        this.logger.debug({ dir: current }, "Dir is new enough");
        return true;
      }
      if (current === this.sourceRoot) return false;
      current = path.dirname(current);
    }
  }

  private async markerMtime(dir: string): Promise<number | null> {
    try {
      const st = await fs.stat(path.join(dir, MARKER_FILE));
      return st.mtimeMs;
    } catch {
      return null;
    }
  }

  async stamp(dir: string): Promise<void> {
    const file = path.join(dir, MARKER_FILE);
    await fs.rm(file, { force: true });
    await fs.writeFile(file, "");
  }
}
