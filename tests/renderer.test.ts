import { describe, it, expect, afterEach } from "vitest";
import { mkdirSync, mkdtempSync, readFileSync, rmSync } from "fs";
import os from "os";
import path from "path";
import {
  EXIT_NOT_FOUND,
  EXIT_TIMED_OUT,
  PandocRenderer,
  pandocArgs,
  runProcess,
  writeSource,
} from "../src/documents/renderer.js";
import { buildWorkspace } from "../src/documents/workspace.js";
import { BuildIOError } from "../src/shared/errors.js";

const tmpDirs: string[] = [];

function tmpUploads(): string {
  const dir = mkdtempSync(path.join(os.tmpdir(), "renderer-"));
  tmpDirs.push(dir);
  return dir;
}

afterEach(() => {
  for (const dir of tmpDirs.splice(0)) rmSync(dir, { recursive: true, force: true });
});

describe("pandocArgs", () => {
  it("passes source, template, engine and output", () => {
    const ws = buildWorkspace("/srv/uploads", "OFF0001");
    expect(pandocArgs(ws, "xelatex")).toEqual([
      "/srv/uploads/contents/OFF0001/content.md",
      "--template=/srv/uploads/contents/OFF0001/template.tex",
      "--pdf-engine=xelatex",
      "-o",
      "/srv/uploads/contents/OFF0001/final.pdf",
    ]);
  });
});

describe("writeSource", () => {
  it("writes header, a blank line and the raw body", async () => {
    const ws = buildWorkspace(tmpUploads(), "OFF0001");
    mkdirSync(ws.root, { recursive: true });

    await writeSource(ws, "---\ntitle: x\n---\n", "Body text");

    expect(readFileSync(ws.contentPath, "utf-8")).toBe("---\ntitle: x\n---\n\nBody text\n");
  });

  it("raises BuildIOError when the workspace is missing", async () => {
    const ws = buildWorkspace(tmpUploads(), "OFF0002");
    await expect(writeSource(ws, "---\n---\n", "")).rejects.toBeInstanceOf(BuildIOError);
  });
});

describe("runProcess", () => {
  it("reports the exit code with stdout and stderr", async () => {
    const script = "process.stdout.write('out-text');process.stderr.write('err-text');process.exit(3)";
    const result = await runProcess(process.execPath, ["-e", script], 10_000);

    expect(result.exitCode).toBe(3);
    expect(result.output).toContain("out-text");
    expect(result.output).toContain("err-text");
  });

  it("reports 0 for a clean exit", async () => {
    const result = await runProcess(process.execPath, ["-e", ""], 10_000);
    expect(result).toEqual({ exitCode: 0, output: "" });
  });

  it("maps a missing executable to 127", async () => {
    const result = await runProcess("/nonexistent/pandoc-binary", [], 10_000);
    expect(result.exitCode).toBe(EXIT_NOT_FOUND);
    expect(result.output).toContain("ENOENT");
  });

  it("kills the process after the timeout", async () => {
    const result = await runProcess(process.execPath, ["-e", "setTimeout(() => {}, 10000)"], 200);
    expect(result.exitCode).toBe(EXIT_TIMED_OUT);
    expect(result.output).toBe("\nrenderer killed after 200ms");
  });

  it("maps death by signal to 128 + signal number", async () => {
    const result = await runProcess(process.execPath, ["-e", "process.kill(process.pid, 'SIGTERM')"], 10_000);
    expect(result.exitCode).toBe(128 + os.constants.signals.SIGTERM);
  });
});

describe("PandocRenderer", () => {
  it("runs the configured binary", async () => {
    const renderer = new PandocRenderer({ bin: "/nonexistent/pandoc-binary", pdfEngine: "xelatex", timeoutMs: 0 });
    const result = await renderer.render(buildWorkspace(tmpUploads(), "OFF0001"));
    expect(result.exitCode).toBe(EXIT_NOT_FOUND);
  });
});
