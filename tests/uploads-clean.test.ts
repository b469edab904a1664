/**
 * uploads:clean Utility Tests
 */

import { describe, it, expect, beforeEach, afterEach } from "vitest";
import { existsSync, mkdirSync, mkdtempSync, readdirSync, rmSync, writeFileSync } from "fs";
import os from "os";
import path from "path";
import { cleanContentsDir, pruneWorkspaces } from "../src/cli/uploads_clean.js";

let root: string;
let contentsDir: string;

beforeEach(() => {
  root = mkdtempSync(path.join(os.tmpdir(), "uploads-clean-"));
  contentsDir = path.join(root, "uploads", "contents");
});

afterEach(() => {
  rmSync(root, { recursive: true, force: true });
});

describe("cleanContentsDir", () => {
  it("creates contents/ when it does not exist", () => {
    expect(existsSync(contentsDir)).toBe(false);

    cleanContentsDir(contentsDir);

    expect(existsSync(contentsDir)).toBe(true);
  });

  it("removes every build workspace", () => {
    mkdirSync(path.join(contentsDir, "OFF0001", "history"), { recursive: true });
    writeFileSync(path.join(contentsDir, "OFF0001", "final.pdf"), "fake");
    writeFileSync(path.join(contentsDir, "OFF0001", "history", "final-v1.pdf"), "older");

    cleanContentsDir(contentsDir);

    expect(readdirSync(contentsDir)).toEqual([]);
  });

  it("refuses to clean directories not named 'contents' (safety)", () => {
    mkdirSync(path.join(root, "uploads", "assets"), { recursive: true });
    expect(() => cleanContentsDir(path.join(root, "uploads"))).toThrow(/^Safety/);
    expect(() => cleanContentsDir(path.join(root, "uploads", "assets"))).toThrow(/^Safety/);
    expect(existsSync(path.join(root, "uploads", "assets"))).toBe(true);
  });
});

describe("pruneWorkspaces", () => {
  it("removes only the workspaces of instances that no longer exist", () => {
    for (const code of ["OFF0001", "OFF0002", "OFF0003"]) {
      mkdirSync(path.join(contentsDir, code), { recursive: true });
      writeFileSync(path.join(contentsDir, code, "final.pdf"), code);
    }
    writeFileSync(path.join(contentsDir, "notes.txt"), "kept");

    const removed = pruneWorkspaces(contentsDir, new Set(["OFF0002"]));

    expect(removed).toEqual(["OFF0001", "OFF0003"]);
    expect(readdirSync(contentsDir).sort()).toEqual(["OFF0002", "notes.txt"]);
  });

  it("returns nothing when contents/ does not exist", () => {
    expect(pruneWorkspaces(contentsDir, new Set())).toEqual([]);
  });

  it("refuses directories not named 'contents' (safety)", () => {
    mkdirSync(path.join(root, "uploads", "assets", "a1"), { recursive: true });
    expect(() => pruneWorkspaces(path.join(root, "uploads", "assets"), new Set())).toThrow(/^Safety/);
    expect(existsSync(path.join(root, "uploads", "assets", "a1"))).toBe(true);
  });
});
