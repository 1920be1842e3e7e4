import fs from "node:fs/promises";
import os from "node:os";
import path from "node:path";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { VcsRootError } from "../lib/errors.js";
import { locateVcsRoot } from "./vcsRoot.js";

async function mkdirs(base: string, ...dirs: string[]): Promise<void> {
  for (const dir of dirs) {
    await fs.mkdir(path.join(base, dir), { recursive: true });
  }
}

describe("locateVcsRoot", () => {
  let tmp: string;

  beforeEach(async () => {
    tmp = await fs.mkdtemp(path.join(os.tmpdir(), "vcsroot-"));
  });

  afterEach(async () => {
    await fs.rm(tmp, { recursive: true, force: true });
  });

  it("returns the top of a git checkout from three levels down", async () => {
    await mkdirs(tmp, "repo/.git", "repo/a/b/c");
    expect(await locateVcsRoot(path.join(tmp, "repo/a/b/c"))).toBe(path.join(tmp, "repo"));
  });

  it("returns the start directory when it is the checkout top", async () => {
    await mkdirs(tmp, "repo/.hg");
    expect(await locateVcsRoot(path.join(tmp, "repo"))).toBe(path.join(tmp, "repo"));
  });

  it("stops at the first modern checkout on the way up", async () => {
    await mkdirs(tmp, "outer/.git", "outer/vendor/inner/.bzr", "outer/vendor/inner/pkg");
    expect(await locateVcsRoot(path.join(tmp, "outer/vendor/inner/pkg"))).toBe(
      path.join(tmp, "outer/vendor/inner")
    );
  });

  it("climbs through legacy levels to a directory with both legacy and modern metadata", async () => {
    await mkdirs(tmp, "top/.git", "top/.svn", "top/a/.svn", "top/a/b/.svn");
    expect(await locateVcsRoot(path.join(tmp, "top/a/b"))).toBe(path.join(tmp, "top"));
  });

  it("stops below the first parent without legacy metadata", async () => {
    await mkdirs(tmp, "top/.git", "top/trunk/.svn", "top/trunk/pkg/.svn");
    expect(await locateVcsRoot(path.join(tmp, "top/trunk/pkg"))).toBe(path.join(tmp, "top/trunk"));
  });

  it("starts a legacy climb from a plain subdirectory", async () => {
    await mkdirs(tmp, "wc/.svn", "wc/pkg/.svn", "wc/pkg/plain");
    expect(await locateVcsRoot(path.join(tmp, "wc/pkg/plain"))).toBe(path.join(tmp, "wc"));
  });

  it("does not treat a .git file as checkout metadata", async () => {
    await mkdirs(tmp, "super/.git", "super/module/pkg");
    await fs.writeFile(path.join(tmp, "super/module/.git"), "gitdir: ../.git/modules/module\n");
    expect(await locateVcsRoot(path.join(tmp, "super/module/pkg"))).toBe(path.join(tmp, "super"));
  });

  it("fails when no checkout metadata exists up to the filesystem root", async () => {
    await mkdirs(tmp, "plain/pkg");
    await expect(locateVcsRoot(path.join(tmp, "plain/pkg"))).rejects.toBeInstanceOf(VcsRootError);
  });
});
