/**
 * DocumentBuilder: builds an instance into a PDF.
 *
 * Per build, holding the instance's lock throughout:
 *   1. create the workspace directory
 *   2. start history rotation in the background; the build does not await
 *      it, but the lock stays held until it settles
 *   3. copy the layout bundle and write the QR code, concurrently
 *   4. assemble the header, write content.md, run the renderer
 *   5. append a build-history entry with the renderer's exit code
 *
 * Renderer failures are not retried; they are recorded and returned. A
 * layout whose bundle is missing is recorded the same way, with exit code
 * EXIT_BUNDLE_MISSING and nothing written. Other filesystem failures before
 * the renderer runs abort the build with a BuildIOError and record nothing.
 */

import { BackgroundTasks } from "../shared/background.js";
import { BuildIOError } from "../shared/errors.js";
import { sha256File } from "../shared/hash.js";
import { KeyedLock } from "../shared/keyed_lock.js";
import type { Hold } from "../shared/keyed_lock.js";
import { signAssetUrl } from "./asset_url.js";
import type { AssetUrlOptions } from "./asset_url.js";
import { addBuildHistory } from "./build_history.js";
import type { LayoutBundles } from "./bundles.js";
import { assembleHeader, resolveAssetLinks } from "./header.js";
import { rotateHistory } from "./history.js";
import { generateQr } from "./qr.js";
import { writeSource } from "./renderer.js";
import type { Renderer } from "./renderer.js";
import type { DocumentStore } from "./store.js";
import type { BuildHistory, ContentType, Instance, Layout, User } from "./types.js";
import { buildWorkspace, copyLayoutBundle, createWorkspaceDir } from "./workspace.js";

/** EX_NOINPUT from sysexits.h: the layout's template bundle does not exist. */
export const EXIT_BUNDLE_MISSING = 66;

function resolveBundle(bundles: LayoutBundles, slug: string): string | BuildIOError {
  try {
    return bundles.resolve(slug);
  } catch (err) {
    if (err instanceof BuildIOError) return err;
    throw err;
  }
}

export interface DocumentBuilderOptions {
  store: DocumentStore;
  renderer: Renderer;
  bundles: LayoutBundles;
  uploadsDir: string;
  assetUrl: Omit<AssetUrlOptions, "now">;
  background?: BackgroundTasks;
  locks?: KeyedLock;
  now?: () => Date;
}

export interface BuildResult {
  exitCode: number;
  output: string;
  history: BuildHistory;
  /** Artifact URL path; null when the build failed. */
  docUrl: string | null;
  artifactSha256: string | null;
}

export class DocumentBuilder {
  readonly background: BackgroundTasks;
  private locks: KeyedLock;
  private now: () => Date;

  constructor(private options: DocumentBuilderOptions) {
    this.background = options.background ?? new BackgroundTasks("history");
    this.locks = options.locks ?? new KeyedLock();
    this.now = options.now ?? (() => new Date());
  }

  async build(
    user: Pick<User, "id">,
    instance: Instance,
    contentType: ContentType,
    layout: Layout,
  ): Promise<BuildResult> {
    return this.locks.run(instance.id, (hold) => this.runBuild(hold, user, instance, contentType, layout));
  }

  private async runBuild(
    hold: Hold,
    user: Pick<User, "id">,
    instance: Instance,
    contentType: ContentType,
    layout: Layout,
  ): Promise<BuildResult> {
    const { store, renderer, bundles } = this.options;
    const startTime = this.now();
    const workspace = buildWorkspace(this.options.uploadsDir, instance.instanceCode);
    const bundleDir = resolveBundle(bundles, layout.slug);

    if (bundleDir instanceof BuildIOError) {
      const exitCode = EXIT_BUNDLE_MISSING;
      const history = await addBuildHistory(store, user, instance, { startTime, endTime: this.now(), exitCode });
      console.error(`[build] ${instance.instanceCode}: ${bundleDir.message}`);
      return { exitCode, output: bundleDir.message, history, docUrl: null, artifactSha256: null };
    }

    await createWorkspaceDir(workspace);

    hold(
      this.background.run(`rotate history for ${instance.instanceCode}`, async () => {
        const written = await rotateHistory(workspace);
        if (written) console.log(`[build] ${instance.instanceCode}: previous artifact kept as ${written}`);
      }),
    );

    const [, qrPath] = await Promise.all([
      copyLayoutBundle(workspace, bundleDir),
      generateQr(instance.id, workspace),
    ]);

    const signingTime = this.now();
    const header = assembleHeader({
      fields: contentType.fields,
      serialized: instance.serialized,
      assets: resolveAssetLinks(layout.assets, (asset) =>
        signAssetUrl(asset, { ...this.options.assetUrl, now: signingTime }),
      ),
      qrPath,
      workDir: workspace.root,
    });
    await writeSource(workspace, header, instance.raw);

    const { exitCode, output } = await renderer.render(workspace);
    const endTime = this.now();

    const history = await addBuildHistory(store, user, instance, { startTime, endTime, exitCode });

    if (exitCode === 0) {
      console.log(`[build] ${instance.instanceCode}: built in ${history.delay}ms`);
    } else {
      console.error(`[build] ${instance.instanceCode}: renderer exited with ${exitCode}`);
    }

    return {
      exitCode,
      output,
      history,
      docUrl: exitCode === 0 ? workspace.docUrl : null,
      artifactSha256: exitCode === 0 ? await sha256File(workspace.artifactPath) : null,
    };
  }
}
