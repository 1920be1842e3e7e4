import path from "node:path";
import { Readable } from "node:stream";
import { create } from "tar";
import { MARKER_FILE } from "../fetch/markers.js";
import { VCS_DIRS } from "../fetch/vcsRoot.js";

function isArchived(entryPath: string): boolean {
  const parts = entryPath.split(/[\\/]/);
  if (parts.some((part) => VCS_DIRS.includes(part))) return false;
  return path.basename(entryPath) !== MARKER_FILE;
}

/**
 * Tar stream of `dir`'s contents with paths relative to `dir`. VCS metadata
 * and freshness markers are left out.
 */
export function createPackageArchive(dir: string): Readable {
  const pack = create(
    {
      cwd: dir,
      portable: true,
      filter: (entryPath) => isArchived(entryPath),
    },
    ["."]
  );
  return Readable.from(pack);
}
