import path from "node:path";
import { VCS_DIRS } from "../fetch/vcsRoot.js";

export const SOURCE_FILE_SUFFIXES = [".go"] as const;

export type RequestTarget =
  | { kind: "ignored" }
  | { kind: "home" }
  | { kind: "invalid" }
  | { kind: "package"; packageKey: string; file: string | null };

const IGNORED_PATHS = new Set(["/favicon.ico", "/robots.txt"]);

/** Lexical cleanup of a slash path: no ".", "..", repeated or trailing slashes. */
export function cleanPath(p: string): string {
  const normalized = path.posix.normalize(p);
  if (normalized.length > 1 && normalized.endsWith("/")) {
    return normalized.slice(0, -1);
  }
  return normalized;
}

// Checkout metadata is never served, even when a fresh marker above it
// would skip the fetch.
function isServablePackage(packageKey: string): boolean {
  return packageKey !== "" && !packageKey.split("/").some((part) => VCS_DIRS.includes(part));
}

function decodePath(raw: string): string | null {
  try {
    return decodeURIComponent(raw);
  } catch {
    return null;
  }
}

/**
 * Map a request URL (path plus optional query) to what should be served.
 * Paths must already be in cleaned form; anything else is invalid.
 */
export function resolveRequestPath(url: string): RequestTarget {
  const q = url.indexOf("?");
  const upath = decodePath(q === -1 ? url : url.slice(0, q));
  if (upath === null) return { kind: "invalid" };

  if (IGNORED_PATHS.has(upath)) return { kind: "ignored" };
  if (upath.length < 2) return { kind: "home" };
  if (!upath.startsWith("/") || cleanPath(upath) !== upath) return { kind: "invalid" };

  const slash = upath.lastIndexOf("/");
  const file = upath.slice(slash + 1);
  if (SOURCE_FILE_SUFFIXES.some((suffix) => file.endsWith(suffix))) {
    const packageKey = upath.slice(1, slash);
    if (!isServablePackage(packageKey)) return { kind: "invalid" };
    return { kind: "package", packageKey, file };
  }
  const packageKey = upath.slice(1);
  if (!isServablePackage(packageKey)) return { kind: "invalid" };
  return { kind: "package", packageKey, file: null };
}
