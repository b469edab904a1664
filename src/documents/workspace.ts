/**
 * Per-instance build workspace.
 *
 * Every path a build touches is derived here once and the resulting
 * BuildWorkspace is passed to each stage.
 *
 *   <uploads>/contents/<code>/
 *     template.tex …   copied from the layout bundle
 *     content.md       assembled source
 *     qr.png
 *     final.pdf        latest artifact
 *     history/final-v<N>.pdf
 */

import { cp, mkdir, stat } from "fs/promises";
import path from "path";
import { BuildIOError } from "../shared/errors.js";

export interface BuildWorkspace {
  instanceCode: string;
  root: string;
  contentPath: string;
  templatePath: string;
  artifactPath: string;
  qrPath: string;
  historyDir: string;
  /** Public URL path of the artifact, independent of where uploads live on disk. */
  docUrl: string;
}

const SAFE_CODE = /^[A-Za-z0-9_-]+$/;

export function buildWorkspace(uploadsDir: string, instanceCode: string): BuildWorkspace {
  if (!SAFE_CODE.test(instanceCode)) {
    throw new Error(`Instance code is not a safe directory name: "${instanceCode}"`);
  }
  const root = path.join(uploadsDir, "contents", instanceCode);
  return {
    instanceCode,
    root,
    contentPath: path.join(root, "content.md"),
    templatePath: path.join(root, "template.tex"),
    artifactPath: path.join(root, "final.pdf"),
    qrPath: path.join(root, "qr.png"),
    historyDir: path.join(root, "history"),
    docUrl: builtDocumentUrl(instanceCode),
  };
}

/** `uploads/contents/<code>/final.pdf` */
export function builtDocumentUrl(instanceCode: string): string {
  return `uploads/contents/${instanceCode}/final.pdf`;
}

/** Create the workspace root (and parents). */
export async function createWorkspaceDir(workspace: BuildWorkspace): Promise<void> {
  try {
    await mkdir(workspace.root, { recursive: true });
  } catch (err) {
    throw new BuildIOError("Cannot create build directory", workspace.root, { cause: err });
  }
}

/** Copy the contents of a layout bundle into the workspace root, overwriting. */
export async function copyLayoutBundle(workspace: BuildWorkspace, bundleDir: string): Promise<void> {
  try {
    const info = await stat(bundleDir);
    if (!info.isDirectory()) {
      throw new BuildIOError("Layout bundle is not a directory", bundleDir);
    }
  } catch (err) {
    if (err instanceof BuildIOError) throw err;
    throw new BuildIOError("Layout bundle not found", bundleDir, { cause: err });
  }

  try {
    await cp(bundleDir, workspace.root, { recursive: true, force: true });
  } catch (err) {
    throw new BuildIOError(`Cannot copy layout bundle ${bundleDir} into`, workspace.root, { cause: err });
  }
}
