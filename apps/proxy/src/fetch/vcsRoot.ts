import fs from "node:fs/promises";
import path from "node:path";
import { VcsRootError } from "../lib/errors.js";

export const LEGACY_VCS_DIR = ".svn";
export const MODERN_VCS_DIRS = [".git", ".hg", ".bzr"] as const;
export const VCS_DIRS: readonly string[] = [LEGACY_VCS_DIR, ...MODERN_VCS_DIRS];

async function hasDir(dir: string, name: string): Promise<boolean> {
  try {
    return (await fs.stat(path.join(dir, name))).isDirectory();
  } catch {
    return false;
  }
}

/**
 * Find the top of the checkout containing `startDir`.
 *
 * Subversion keeps a .svn directory at every level of older checkouts, so
 * the climb goes on through .svn directories and stops at the first parent
 * without one. Git, Mercurial and Bazaar mark only the top.
 */
export async function locateVcsRoot(startDir: string): Promise<string> {
  let root = path.resolve(startDir);
  let sawLegacy = false;

  for (let dir = root; ; ) {
    if (await hasDir(dir, LEGACY_VCS_DIR)) {
      sawLegacy = true;
    } else if (sawLegacy) {
      break;
    }
    root = dir;

    let modern = false;
    for (const name of MODERN_VCS_DIRS) {
      if (await hasDir(dir, name)) {
        modern = true;
        break;
      }
    }
    if (modern) break;

    const parent = path.dirname(dir);
    if (parent === dir) {
      throw new VcsRootError(startDir);
    }
    dir = parent;
  }

  return root;
}
