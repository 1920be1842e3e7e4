import type { Dirent } from "node:fs";
import fs from "node:fs/promises";
import path from "node:path";
import type { Logger } from "../lib/logger.js";
import type { MarkerStore } from "./markers.js";
import { VCS_DIRS } from "./vcsRoot.js";

/**
 * Write a freshness marker into every directory under `root`, skipping VCS
 * metadata directories. Per-directory failures are logged and skipped.
 * Returns the number of directories stamped.
 */
export async function stampTree(root: string, markers: MarkerStore, logger: Logger): Promise<number> {
  const stack = [path.resolve(root)];
  let stamped = 0;

  while (stack.length > 0) {
    const dir = stack.pop();
    if (dir === undefined) break;
    if (VCS_DIRS.includes(path.basename(dir))) continue;

    try {
      await markers.stamp(dir);
      stamped++;
    } catch (err) {
      logger.warn({ err, dir }, "Failed to write freshness marker");
    }

    let entries: Dirent[];
    try {
      entries = await fs.readdir(dir, { withFileTypes: true });
    } catch (err) {
      logger.warn({ err, dir }, "Failed to read directory while stamping");
      continue;
    }
    for (const entry of entries) {
      // Dirent.isDirectory() is false for symlinks, so links are not followed.
      if (entry.isDirectory()) {
        stack.push(path.join(dir, entry.name));
      }
    }
  }

  return stamped;
}
