import { describe, expect, it } from "vitest";
import { cleanPath, resolveRequestPath } from "./requestPath.js";

describe("cleanPath", () => {
  it("drops dot segments and repeated or trailing slashes", () => {
    expect(cleanPath("/a/./b/../c//d/")).toBe("/a/c/d");
  });

  it("keeps the root", () => {
    expect(cleanPath("/")).toBe("/");
  });
});

describe("resolveRequestPath", () => {
  it("ignores favicon and robots requests", () => {
    expect(resolveRequestPath("/favicon.ico")).toEqual({ kind: "ignored" });
    expect(resolveRequestPath("/robots.txt")).toEqual({ kind: "ignored" });
  });

  it("serves the home page for the root path", () => {
    expect(resolveRequestPath("/")).toEqual({ kind: "home" });
  });

  it("maps a directory path to a whole-package request", () => {
    expect(resolveRequestPath("/example.org/pkg")).toEqual({
      kind: "package",
      packageKey: "example.org/pkg",
      file: null,
    });
  });

  it("splits a source file off the package path", () => {
    expect(resolveRequestPath("/example.org/pkg/file.go")).toEqual({
      kind: "package",
      packageKey: "example.org/pkg",
      file: "file.go",
    });
  });

  it("treats other file names as part of the package key", () => {
    expect(resolveRequestPath("/example.org/pkg/README.md")).toEqual({
      kind: "package",
      packageKey: "example.org/pkg/README.md",
      file: null,
    });
  });

  it("ignores the query string", () => {
    expect(resolveRequestPath("/example.org/pkg?go-get=1")).toEqual({
      kind: "package",
      packageKey: "example.org/pkg",
      file: null,
    });
  });

  it("decodes percent-escapes before checking the path", () => {
    expect(resolveRequestPath("/example.org/%2e%2e/etc")).toEqual({ kind: "invalid" });
    expect(resolveRequestPath("/example.org/my%20pkg")).toEqual({
      kind: "package",
      packageKey: "example.org/my pkg",
      file: null,
    });
  });

  it.each([
    "/example.org/../etc",
    "/example.org/./pkg",
    "/example.org//pkg",
    "/example.org/pkg/",
    "/..",
    "/example.org/%zz",
  ])("rejects the non-canonical path %s", (url) => {
    expect(resolveRequestPath(url)).toEqual({ kind: "invalid" });
  });

  it("rejects a source file without a package", () => {
    expect(resolveRequestPath("/file.go")).toEqual({ kind: "invalid" });
  });

  it.each(["/example.org/pkg/.git", "/example.org/pkg/.svn/entries", "/example.org/pkg/.hg/file.go", "/.bzr"])(
    "rejects checkout metadata in %s",
    (url) => {
      expect(resolveRequestPath(url)).toEqual({ kind: "invalid" });
    }
  );

  it("accepts names that only start like checkout metadata", () => {
    expect(resolveRequestPath("/example.org/pkg/.github")).toEqual({
      kind: "package",
      packageKey: "example.org/pkg/.github",
      file: null,
    });
  });
});
