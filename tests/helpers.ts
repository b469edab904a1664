/**
 * Shared fixtures: temp directories, a seeded in-memory store and a
 * renderer stand-in that writes a fake artifact instead of running pandoc.
 */

import { mkdirSync, mkdtempSync, rmSync, writeFileSync } from "fs";
import { writeFile } from "fs/promises";
import os from "os";
import path from "path";
import type { Renderer, RenderResult } from "../src/documents/renderer.js";
import type { DocumentStore } from "../src/documents/store.js";
import type { BuildWorkspace } from "../src/documents/workspace.js";

export const ORG_ID = "00000000-0000-4000-8000-000000000001";
export const OTHER_ORG_ID = "00000000-0000-4000-8000-000000000002";
export const TEST_SECRET = "test-secret";

export interface TempDirs {
  root: string;
  uploadsDir: string;
  slugsDir: string;
  cleanup(): void;
}

/** Temp tree with a "letter" layout bundle holding template.tex. */
export function makeTempDirs(): TempDirs {
  const root = mkdtempSync(path.join(os.tmpdir(), "docbuild-"));
  const uploadsDir = path.join(root, "uploads");
  const slugsDir = path.join(root, "slugs");
  mkdirSync(path.join(slugsDir, "letter"), { recursive: true });
  writeFileSync(path.join(slugsDir, "letter", "template.tex"), "TEMPLATE $body$");
  writeFileSync(path.join(slugsDir, "letter", "style.sty"), "% style");
  return {
    root,
    uploadsDir,
    slugsDir,
    cleanup: () => rmSync(root, { recursive: true, force: true }),
  };
}

export async function seedDocuments(store: DocumentStore, slug = "letter") {
  const user = await store.createUser({
    name: "Test Author",
    email: "author@example.com",
    organisationId: ORG_ID,
  });
  const logo = await store.createAsset({
    organisationId: ORG_ID,
    name: "logo",
    file: "logo.png",
    creatorId: user.id,
  });
  const layout = await store.createLayout({
    organisationId: ORG_ID,
    name: "Letter",
    slug,
    creatorId: user.id,
    assetIds: [logo.id],
  });
  const contentType = await store.createContentType({
    organisationId: ORG_ID,
    name: "Offer letter",
    prefix: "OFF",
    layoutId: layout.id,
    creatorId: user.id,
    fields: [
      { name: "employee", fieldType: "string" },
      { name: "position", fieldType: "string" },
      { name: "salary", fieldType: "number" },
    ],
  });
  return { user, logo, layout, contentType };
}

/**
 * Renderer stand-in. On exit code 0 it writes "pdf build <n>" to final.pdf,
 * n counting render calls from 1.
 */
export class FakeRenderer implements Renderer {
  calls: BuildWorkspace[] = [];
  exitCode = 0;
  active = 0;
  maxActive = 0;

  constructor(private beforeWrite?: () => Promise<void>) {}

  async render(workspace: BuildWorkspace): Promise<RenderResult> {
    this.calls.push(workspace);
    const n = this.calls.length;
    this.active++;
    this.maxActive = Math.max(this.maxActive, this.active);
    try {
      if (this.beforeWrite) await this.beforeWrite();
      if (this.exitCode !== 0) {
        return { exitCode: this.exitCode, output: "Error producing PDF." };
      }
      await writeFile(workspace.artifactPath, `pdf build ${n}`);
      return { exitCode: 0, output: "" };
    } finally {
      this.active--;
    }
  }
}
