/**
 * Document API Routes
 *
 * Content types, data templates, instances, builds and the files builds
 * produce. Every /v1 route acts as the user named by the `x-user-id` header
 * and only sees records of that user's organisation; built artifacts are
 * served under the same rule.
 */

import { Router } from "express";
import type { Request, Response } from "express";
import path from "path";

import { verifyAssetUrl } from "../documents/asset_url.js";
import type { DocumentBuilder } from "../documents/build.js";
import type { LayoutBundles } from "../documents/bundles.js";
import { isHistoryFileName } from "../documents/history.js";
import {
  createInstance,
  deleteInstance,
  showInstance,
  updateInstance,
} from "../documents/instances.js";
import type { DocumentStore } from "../documents/store.js";
import { NotFoundError } from "../shared/errors.js";
import {
  currentUser,
  loadContentType,
  loadDataTemplate,
  loadInstance,
  loadOwned,
  pageParams,
  sendError,
} from "./http.js";
import {
  CreateContentTypeSchema,
  CreateDataTemplateSchema,
  CreateInstanceSchema,
  UpdateContentTypeSchema,
  UpdateDataTemplateSchema,
  UpdateInstanceSchema,
} from "./schemas.js";

export interface DocumentRouterDeps {
  store: DocumentStore;
  builder: DocumentBuilder;
  bundles: LayoutBundles;
  uploadsDir: string;
  assetUrlSecret: string;
}

// ── Router ──────────────────────────────────────────────────────────

export function documentRouter(deps: DocumentRouterDeps): Router {
  const { store, builder } = deps;
  const router = Router();

  const findLayout = (id: string) => store.getLayout(id);

  /** Serve a file from an instance's build directory to its own organisation. */
  async function sendArtifact(req: Request, res: Response, fileName: string): Promise<void> {
    const user = await currentUser(store, req);
    const { instanceCode } = req.params;
    const instance = await store.getInstanceByCode(instanceCode);
    const contentType = instance ? await store.getContentType(instance.contentTypeId) : null;
    if (!contentType || contentType.organisationId !== user.organisationId) {
      throw new NotFoundError("Build", instanceCode);
    }

    const filePath = path.resolve(deps.uploadsDir, "contents", instanceCode, fileName);
    res.sendFile(filePath, (err) => {
      if (err && !res.headersSent) res.status(404).json({ error: "Build artifact not found" });
    });
  }

  // ── POST /v1/content-types ────────────────────────────────────────
  router.post("/v1/content-types", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const body = CreateContentTypeSchema.parse(req.body);

      await loadOwned(user, "Layout", body.layoutId, findLayout);

      const contentType = await store.createContentType({
        ...body,
        organisationId: user.organisationId,
        creatorId: user.id,
      });
      res.status(201).json(contentType);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/content-types ─────────────────────────────────────────
  router.get("/v1/content-types", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await store.listContentTypes(user.organisationId, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/content-types/:contentTypeId ──────────────────────────
  router.get("/v1/content-types/:contentTypeId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await loadContentType(store, user, req.params.contentTypeId));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/content-types/:contentTypeId ────────────────────────
  router.patch("/v1/content-types/:contentTypeId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const contentType = await loadContentType(store, user, req.params.contentTypeId);
      const body = UpdateContentTypeSchema.parse(req.body);
      if (body.layoutId !== undefined) await loadOwned(user, "Layout", body.layoutId, findLayout);
      res.json(await store.updateContentType(contentType.id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/content-types/:contentTypeId ───────────────────────
  router.delete("/v1/content-types/:contentTypeId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const contentType = await loadContentType(store, user, req.params.contentTypeId);
      await store.deleteContentType(contentType.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/content-types/:contentTypeId/data-templates ──────────
  router.post("/v1/content-types/:contentTypeId/data-templates", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const contentType = await loadContentType(store, user, req.params.contentTypeId);
      const body = CreateDataTemplateSchema.parse(req.body);
      const template = await store.createDataTemplate({
        ...body,
        contentTypeId: contentType.id,
        creatorId: user.id,
      });
      res.status(201).json(template);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/content-types/:contentTypeId/data-templates ───────────
  router.get("/v1/content-types/:contentTypeId/data-templates", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const contentType = await loadContentType(store, user, req.params.contentTypeId);
      res.json(await store.listDataTemplates(contentType.id, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/data-templates ────────────────────────────────────────
  router.get("/v1/data-templates", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await store.listOrganisationDataTemplates(user.organisationId, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/data-templates/:dataTemplateId ────────────────────────
  router.get("/v1/data-templates/:dataTemplateId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await loadDataTemplate(store, user, req.params.dataTemplateId));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/data-templates/:dataTemplateId ──────────────────────
  router.patch("/v1/data-templates/:dataTemplateId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const template = await loadDataTemplate(store, user, req.params.dataTemplateId);
      const body = UpdateDataTemplateSchema.parse(req.body);
      res.json(await store.updateDataTemplate(template.id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/data-templates/:dataTemplateId ─────────────────────
  router.delete("/v1/data-templates/:dataTemplateId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const template = await loadDataTemplate(store, user, req.params.dataTemplateId);
      await store.deleteDataTemplate(template.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/content-types/:contentTypeId/instances ───────────────
  router.post("/v1/content-types/:contentTypeId/instances", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const contentType = await loadContentType(store, user, req.params.contentTypeId);
      const body = CreateInstanceSchema.parse(req.body);
      const instance = await createInstance(store, user, contentType, body);
      res.status(201).json(instance);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/content-types/:contentTypeId/instances ────────────────
  router.get("/v1/content-types/:contentTypeId/instances", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const contentType = await loadContentType(store, user, req.params.contentTypeId);
      res.json(await store.listInstances(contentType.id, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/instances ─────────────────────────────────────────────
  router.get("/v1/instances", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await store.listOrganisationInstances(user.organisationId, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/instances/:instanceId ─────────────────────────────────
  router.get("/v1/instances/:instanceId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const { instance } = await loadInstance(store, user, req.params.instanceId);
      const view = await showInstance(store, instance.id);
      if (!view) throw new NotFoundError("Instance", instance.id);
      res.json(view);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/instances/:instanceId ───────────────────────────────
  router.patch("/v1/instances/:instanceId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const { instance } = await loadInstance(store, user, req.params.instanceId);
      const body = UpdateInstanceSchema.parse(req.body);
      res.json(await updateInstance(store, instance.id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/instances/:instanceId ──────────────────────────────
  router.delete("/v1/instances/:instanceId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const { instance } = await loadInstance(store, user, req.params.instanceId);
      await deleteInstance(store, instance.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/instances/:instanceId/build ──────────────────────────
  router.post("/v1/instances/:instanceId/build", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const { instance, contentType } = await loadInstance(store, user, req.params.instanceId);
      const layout = await store.getLayout(contentType.layoutId);
      if (!layout) throw new NotFoundError("Layout", contentType.layoutId);

      const result = await builder.build(user, instance, contentType, layout);
      res.status(result.exitCode === 0 ? 200 : 422).json({
        exitCode: result.exitCode,
        output: result.output,
        build: result.docUrl,
        artifactSha256: result.artifactSha256,
        history: result.history,
      });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/instances/:instanceId/builds ──────────────────────────
  router.get("/v1/instances/:instanceId/builds", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const { instance } = await loadInstance(store, user, req.params.instanceId);
      res.json(await store.listBuildHistory(instance.id));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /uploads/contents/:instanceCode/final.pdf ─────────────────
  router.get("/uploads/contents/:instanceCode/final.pdf", async (req, res) => {
    try {
      await sendArtifact(req, res, "final.pdf");
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /uploads/contents/:instanceCode/history/:file ─────────────
  router.get("/uploads/contents/:instanceCode/history/:file", async (req, res) => {
    try {
      const { file } = req.params;
      if (!isHistoryFileName(file)) throw new NotFoundError("Build version", file);
      await sendArtifact(req, res, path.join("history", file));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /uploads/assets/:assetId/:file (signed) ───────────────────
  router.get("/uploads/assets/:assetId/:file", (req, res) => {
    const { assetId, file } = req.params;
    const pathname = `/uploads/assets/${assetId}/${encodeURIComponent(file)}`;
    const expires = typeof req.query.expires === "string" ? req.query.expires : undefined;
    const signature = typeof req.query.signature === "string" ? req.query.signature : undefined;

    const check = verifyAssetUrl(pathname, expires, signature, { secret: deps.assetUrlSecret });
    if (check !== "valid") {
      res.status(403).json({ error: `Asset URL ${check}` });
      return;
    }

    const assetsRoot = path.resolve(deps.uploadsDir, "assets");
    const filePath = path.resolve(assetsRoot, assetId, path.basename(file));
    res.sendFile(filePath, (err) => {
      if (err && !res.headersSent) res.status(404).json({ error: "Asset file not found" });
    });
  });

  return router;
}
