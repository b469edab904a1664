/**
 * Renderer: runs the external typesetter over a prepared workspace.
 *
 * PandocRenderer invokes:
 *   pandoc <content.md> --template=<template.tex> --pdf-engine=<engine> -o <final.pdf>
 * and reports the process's own exit status with its combined output.
 */

import { spawn } from "child_process";
import { writeFile } from "fs/promises";
import { constants as osConstants } from "os";
import { BuildIOError } from "../shared/errors.js";
import type { BuildWorkspace } from "./workspace.js";

export interface RenderResult {
  exitCode: number;
  output: string;
}

export interface Renderer {
  render(workspace: BuildWorkspace): Promise<RenderResult>;
}

/** Exit status reported when the executable cannot be started (shell convention). */
export const EXIT_NOT_FOUND = 127;
/** Exit status reported when the timeout kills the process (coreutils `timeout` convention). */
export const EXIT_TIMED_OUT = 124;

export interface PandocOptions {
  bin: string;
  pdfEngine: string;
  /** 0 disables the timeout. */
  timeoutMs: number;
}

export function pandocArgs(workspace: BuildWorkspace, pdfEngine: string): string[] {
  return [
    workspace.contentPath,
    `--template=${workspace.templatePath}`,
    `--pdf-engine=${pdfEngine}`,
    "-o",
    workspace.artifactPath,
  ];
}

/** Header, blank line, raw body → content.md */
export async function writeSource(workspace: BuildWorkspace, header: string, raw: string): Promise<void> {
  try {
    await writeFile(workspace.contentPath, `${header}\n${raw}\n`, "utf-8");
  } catch (err) {
    throw new BuildIOError("Cannot write source document", workspace.contentPath, { cause: err });
  }
}

export class PandocRenderer implements Renderer {
  constructor(private options: PandocOptions) {}

  render(workspace: BuildWorkspace): Promise<RenderResult> {
    return runProcess(this.options.bin, pandocArgs(workspace, this.options.pdfEngine), this.options.timeoutMs);
  }
}

/**
 * Spawn `bin` and resolve once it exits. Never rejects: start failures and
 * timeouts are reported through the exit code.
 */
export function runProcess(bin: string, args: string[], timeoutMs: number): Promise<RenderResult> {
  return new Promise((resolve) => {
    const chunks: Buffer[] = [];
    let settled = false;
    let timedOut = false;

    const child = spawn(bin, args, { stdio: ["ignore", "pipe", "pipe"] });

    const timer =
      timeoutMs > 0
        ? setTimeout(() => {
            timedOut = true;
            child.kill("SIGKILL");
          }, timeoutMs)
        : null;

    const finish = (exitCode: number, extra?: string) => {
      if (settled) return;
      settled = true;
      if (timer) clearTimeout(timer);
      const output = Buffer.concat(chunks).toString("utf-8") + (extra ?? "");
      resolve({ exitCode, output });
    };

    child.stdout.on("data", (chunk: Buffer) => chunks.push(chunk));
    child.stderr.on("data", (chunk: Buffer) => chunks.push(chunk));

    child.on("error", (err) => {
      finish(EXIT_NOT_FOUND, err.message);
    });

    child.on("close", (code, signal) => {
      if (timedOut) {
        finish(EXIT_TIMED_OUT, `\nrenderer killed after ${timeoutMs}ms`);
      } else if (code !== null) {
        finish(code);
      } else if (signal) {
        finish(128 + signalNumber(signal));
      } else {
        finish(1);
      }
    });
  });
}

function signalNumber(signal: NodeJS.Signals): number {
  for (const [name, value] of Object.entries(osConstants.signals)) {
    if (name === signal) return Number(value);
  }
  return 0;
}
