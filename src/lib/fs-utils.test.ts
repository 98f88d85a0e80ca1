import { describe, it, expect, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readFileSync, readdirSync, rmSync, writeFileSync } from "fs";
import { join } from "path";
import { tmpdir } from "os";
import { atomicWriteFileSync, isStrictlyWithin, isWithin, pruneEmptyDirsSync } from "./fs-utils.js";

let TMP = "";

afterEach(() => {
  if (TMP) rmSync(TMP, { recursive: true, force: true });
});

describe("atomicWriteFileSync", () => {
  it("creates parent directories and leaves no temp file behind", () => {
    TMP = mkdtempSync(join(tmpdir(), "apptint-fs-"));
    const target = join(TMP, "nested", "state.json");
    atomicWriteFileSync(target, "{}");
    expect(readFileSync(target, "utf-8")).toBe("{}");
    expect(readdirSync(join(TMP, "nested"))).toEqual(["state.json"]);
  });

  it("replaces existing content", () => {
    TMP = mkdtempSync(join(tmpdir(), "apptint-fs-"));
    const target = join(TMP, "state.json");
    writeFileSync(target, "old");
    atomicWriteFileSync(target, "new");
    expect(readFileSync(target, "utf-8")).toBe("new");
  });
});

describe("isWithin", () => {
  it("accepts descendants and the root itself", () => {
    expect(isWithin("/srv/root", "/srv/root/a/b")).toBe(true);
    expect(isWithin("/srv/root", "/srv/root")).toBe(true);
  });

  it("rejects siblings and traversal", () => {
    expect(isWithin("/srv/root", "/srv/rootless")).toBe(false);
    expect(isWithin("/srv/root", "/srv/root/../other")).toBe(false);
    expect(isWithin("/srv/root", "/etc")).toBe(false);
  });
});

describe("isStrictlyWithin", () => {
  it("accepts descendants but not the root itself", () => {
    expect(isStrictlyWithin("/srv/root", "/srv/root/a")).toBe(true);
    expect(isStrictlyWithin("/srv/root", "/srv/root")).toBe(false);
    expect(isStrictlyWithin("/srv/root", "/srv/root/a/..")).toBe(false);
  });

  it("rejects siblings and traversal", () => {
    expect(isStrictlyWithin("/srv/root", "/srv/rootless")).toBe(false);
    expect(isStrictlyWithin("/srv/root", "/srv/root/../other")).toBe(false);
  });
});

describe("pruneEmptyDirsSync", () => {
  it("removes empty directories up to the given depth", () => {
    TMP = mkdtempSync(join(tmpdir(), "apptint-fs-"));
    const leaf = join(TMP, "apps", "demo");
    mkdirSync(leaf, { recursive: true });
    pruneEmptyDirsSync(leaf, 2);
    expect(existsSync(join(TMP, "apps"))).toBe(false);
    expect(existsSync(TMP)).toBe(true);
  });

  it("stops at the first non-empty directory", () => {
    TMP = mkdtempSync(join(tmpdir(), "apptint-fs-"));
    mkdirSync(join(TMP, "apps", "demo"), { recursive: true });
    mkdirSync(join(TMP, "apps", "other"), { recursive: true });
    pruneEmptyDirsSync(join(TMP, "apps", "demo"), 2);
    expect(existsSync(join(TMP, "apps", "demo"))).toBe(false);
    expect(existsSync(join(TMP, "apps", "other"))).toBe(true);
  });
});
