/**
 * Layout Bundles: resolves layout slugs to template bundle directories.
 *
 * A bundle is a directory `<slugsDir>/<slug>/` holding at least
 * `template.tex`; its whole content is copied into each build workspace.
 */

import { existsSync, readdirSync, statSync } from "fs";
import path from "path";
import { BuildIOError } from "../shared/errors.js";

export class LayoutBundles {
  private slugsDir: string;

  constructor(slugsDir: string) {
    this.slugsDir = path.resolve(slugsDir);
  }

  /**
   * Absolute path of the bundle for `slug`.
   * Throws BuildIOError when the slug escapes the root or the bundle is missing.
   */
  resolve(slug: string): string {
    const dir = path.resolve(this.slugsDir, slug);
    if (path.dirname(dir) !== this.slugsDir) {
      throw new BuildIOError(`Layout slug "${slug}" does not name a bundle under`, this.slugsDir);
    }
    if (!isDirectory(dir)) {
      throw new BuildIOError("Layout bundle not found", dir);
    }
    return dir;
  }

  has(slug: string): boolean {
    try {
      this.resolve(slug);
      return true;
    } catch {
      return false;
    }
  }

  /** Slugs of every bundle directory, sorted. */
  list(): string[] {
    if (!existsSync(this.slugsDir)) return [];
    return readdirSync(this.slugsDir)
      .filter((entry) => isDirectory(path.join(this.slugsDir, entry)))
      .sort();
  }
}

function isDirectory(dir: string): boolean {
  try {
    return statSync(dir).isDirectory();
  } catch {
    return false;
  }
}
