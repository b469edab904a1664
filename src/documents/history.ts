/**
 * Artifact version history.
 *
 * Before a new build overwrites final.pdf, the current one is copied to
 * history/final-v<N>.pdf, N being one past the highest version present.
 */

import { existsSync } from "fs";
import { constants, copyFile, mkdir, readdir } from "fs/promises";
import path from "path";
import type { BuildWorkspace } from "./workspace.js";

const VERSION_FILE = /^final-v(\d+)\.pdf$/;

export function isHistoryFileName(name: string): boolean {
  return VERSION_FILE.test(name);
}

export function historyFileName(version: number): string {
  return `final-v${version}.pdf`;
}

/**
 * Next version number for a history directory listing.
 * Compares versions numerically, so v10 follows v9.
 */
export function nextHistoryVersion(fileNames: string[]): number {
  let highest = 0;
  for (const name of fileNames) {
    const match = VERSION_FILE.exec(name);
    if (match) highest = Math.max(highest, Number.parseInt(match[1], 10));
  }
  return highest + 1;
}

/**
 * Copy the current artifact into history/.
 * Returns the history file written, or null when there is no artifact yet.
 */
export async function rotateHistory(workspace: BuildWorkspace): Promise<string | null> {
  await mkdir(workspace.historyDir, { recursive: true });
  if (!existsSync(workspace.artifactPath)) return null;

  const entries = await readdir(workspace.historyDir);
  const target = path.join(workspace.historyDir, historyFileName(nextHistoryVersion(entries)));
  // EXCL: never overwrite an existing version
  await copyFile(workspace.artifactPath, target, constants.COPYFILE_EXCL);
  return target;
}
