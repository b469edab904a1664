/**
 * Library Routes
 *
 * The organisation's building blocks: assets, layouts (and the template
 * bundles they name) and themes.
 */

import { Router } from "express";

import type { LayoutBundles } from "../documents/bundles.js";
import type { DocumentStore } from "../documents/store.js";
import type { User } from "../documents/types.js";
import { NotFoundError } from "../shared/errors.js";
import { currentUser, loadOwned, pageParams, sendError } from "./http.js";
import {
  CreateAssetSchema,
  CreateLayoutSchema,
  CreateThemeSchema,
  UpdateAssetSchema,
  UpdateLayoutSchema,
  UpdateThemeSchema,
} from "./schemas.js";

export interface LibraryRouterDeps {
  store: DocumentStore;
  bundles: LayoutBundles;
}

async function checkAssetsOwned(store: DocumentStore, user: User, assetIds: string[]): Promise<void> {
  for (const assetId of assetIds) {
    const asset = await store.getAsset(assetId);
    if (!asset || asset.organisationId !== user.organisationId) {
      throw new NotFoundError("Asset", assetId);
    }
  }
}

export function libraryRouter(deps: LibraryRouterDeps): Router {
  const { store, bundles } = deps;
  const router = Router();

  const findAsset = (id: string) => store.getAsset(id);
  const findLayout = (id: string) => store.getLayout(id);
  const findTheme = (id: string) => store.getTheme(id);

  // ── POST /v1/assets ───────────────────────────────────────────────
  router.post("/v1/assets", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const body = CreateAssetSchema.parse(req.body);
      const asset = await store.createAsset({
        ...body,
        organisationId: user.organisationId,
        creatorId: user.id,
      });
      res.status(201).json(asset);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/assets ────────────────────────────────────────────────
  router.get("/v1/assets", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await store.listAssets(user.organisationId, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/assets/:assetId ───────────────────────────────────────
  router.get("/v1/assets/:assetId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await loadOwned(user, "Asset", req.params.assetId, findAsset));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/assets/:assetId ─────────────────────────────────────
  router.patch("/v1/assets/:assetId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const asset = await loadOwned(user, "Asset", req.params.assetId, findAsset);
      const body = UpdateAssetSchema.parse(req.body);
      res.json(await store.updateAsset(asset.id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/assets/:assetId ────────────────────────────────────
  router.delete("/v1/assets/:assetId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const asset = await loadOwned(user, "Asset", req.params.assetId, findAsset);
      await store.deleteAsset(asset.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/layout-bundles ────────────────────────────────────────
  router.get("/v1/layout-bundles", async (req, res) => {
    try {
      await currentUser(store, req);
      res.json({ slugs: bundles.list() });
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/layouts ──────────────────────────────────────────────
  router.post("/v1/layouts", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const body = CreateLayoutSchema.parse(req.body);

      if (!bundles.has(body.slug)) {
        res.status(400).json({ error: `Unknown layout bundle: ${body.slug}` });
        return;
      }
      await checkAssetsOwned(store, user, body.assetIds);

      const layout = await store.createLayout({
        ...body,
        organisationId: user.organisationId,
        creatorId: user.id,
      });
      res.status(201).json(layout);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/layouts ───────────────────────────────────────────────
  router.get("/v1/layouts", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await store.listLayouts(user.organisationId, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/layouts/:layoutId ─────────────────────────────────────
  router.get("/v1/layouts/:layoutId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await loadOwned(user, "Layout", req.params.layoutId, findLayout));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/layouts/:layoutId ───────────────────────────────────
  router.patch("/v1/layouts/:layoutId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const layout = await loadOwned(user, "Layout", req.params.layoutId, findLayout);
      const body = UpdateLayoutSchema.parse(req.body);

      if (body.slug !== undefined && !bundles.has(body.slug)) {
        res.status(400).json({ error: `Unknown layout bundle: ${body.slug}` });
        return;
      }
      if (body.assetIds) await checkAssetsOwned(store, user, body.assetIds);

      res.json(await store.updateLayout(layout.id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/layouts/:layoutId ──────────────────────────────────
  router.delete("/v1/layouts/:layoutId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const layout = await loadOwned(user, "Layout", req.params.layoutId, findLayout);
      await store.deleteLayout(layout.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── POST /v1/themes ───────────────────────────────────────────────
  router.post("/v1/themes", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const body = CreateThemeSchema.parse(req.body);
      const theme = await store.createTheme({
        ...body,
        organisationId: user.organisationId,
        creatorId: user.id,
      });
      res.status(201).json(theme);
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/themes ────────────────────────────────────────────────
  router.get("/v1/themes", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await store.listThemes(user.organisationId, pageParams(req)));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── GET /v1/themes/:themeId ───────────────────────────────────────
  router.get("/v1/themes/:themeId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      res.json(await loadOwned(user, "Theme", req.params.themeId, findTheme));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── PATCH /v1/themes/:themeId ─────────────────────────────────────
  router.patch("/v1/themes/:themeId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const theme = await loadOwned(user, "Theme", req.params.themeId, findTheme);
      const body = UpdateThemeSchema.parse(req.body);
      res.json(await store.updateTheme(theme.id, body));
    } catch (err) {
      sendError(res, err);
    }
  });

  // ── DELETE /v1/themes/:themeId ────────────────────────────────────
  router.delete("/v1/themes/:themeId", async (req, res) => {
    try {
      const user = await currentUser(store, req);
      const theme = await loadOwned(user, "Theme", req.params.themeId, findTheme);
      await store.deleteTheme(theme.id);
      res.status(204).end();
    } catch (err) {
      sendError(res, err);
    }
  });

  return router;
}
