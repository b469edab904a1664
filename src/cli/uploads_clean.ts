#!/usr/bin/env tsx
/**
 * Build Workspace Cleanup
 *
 * By default removes the build directories under <UPLOADS_DIR>/contents/
 * whose instance no longer exists in the database (deleted instances leave
 * their workspace behind). With --all, removes every build directory;
 * build history rows are left alone and their artifacts are gone afterwards.
 *
 * Usage:
 *   npm run uploads:clean
 *   npm run uploads:clean -- --all
 */

import "dotenv/config";
import { existsSync, mkdirSync, readdirSync, rmSync } from "fs";
import path from "path";
import { fileURLToPath } from "url";

function resolveContentsDir(contentsDir: string, caller: string): string {
  const resolved = path.resolve(contentsDir);
  if (path.basename(resolved) !== "contents") {
    throw new Error(
      `Safety: ${caller} refuses to clean "${resolved}": target must be named "contents".`,
    );
  }
  return resolved;
}

/**
 * Empty a build-contents directory, recreating it.
 * Refuses any directory not named "contents".
 */
export function cleanContentsDir(contentsDir: string): void {
  const resolved = resolveContentsDir(contentsDir, "cleanContentsDir");

  if (existsSync(resolved)) {
    rmSync(resolved, { recursive: true, force: true });
  }
  mkdirSync(resolved, { recursive: true });
}

/**
 * Remove the workspaces of instance codes not in `liveCodes`.
 * Returns the removed codes, sorted. Loose files are left in place.
 */
export function pruneWorkspaces(contentsDir: string, liveCodes: ReadonlySet<string>): string[] {
  const resolved = resolveContentsDir(contentsDir, "pruneWorkspaces");
  if (!existsSync(resolved)) return [];

  const orphans = readdirSync(resolved, { withFileTypes: true })
    .filter((entry) => entry.isDirectory() && !liveCodes.has(entry.name))
    .map((entry) => entry.name)
    .sort();

  for (const code of orphans) {
    rmSync(path.join(resolved, code), { recursive: true, force: true });
  }
  return orphans;
}

async function liveInstanceCodes(): Promise<Set<string>> {
  const { db, pool } = await import("../db/connection.js");
  const { instances } = await import("../db/schema.js");
  try {
    const rows = await db.select({ instanceCode: instances.instanceCode }).from(instances);
    return new Set(rows.map((row) => row.instanceCode));
  } finally {
    await pool.end();
  }
}

async function main(): Promise<void> {
  const contentsDir = path.join(process.env.UPLOADS_DIR ?? "uploads", "contents");

  if (process.argv.includes("--all")) {
    console.log(`Cleaning build workspaces: ${path.resolve(contentsDir)}`);
    cleanContentsDir(contentsDir);
  } else {
    console.log(`Pruning orphaned build workspaces: ${path.resolve(contentsDir)}`);
    const removed = pruneWorkspaces(contentsDir, await liveInstanceCodes());
    console.log(`Removed ${removed.length} workspace(s)${removed.length ? `: ${removed.join(", ")}` : ""}`);
  }
  console.log("Done.");
}

// ── CLI entry point ──────────────────────────────────────────────────
if (
  process.argv[1] &&
  path.resolve(process.argv[1]) ===
    path.resolve(fileURLToPath(import.meta.url))
) {
  main().catch((err: unknown) => {
    console.error("Cleanup failed:", err);
    process.exit(1);
  });
}
