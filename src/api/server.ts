import "dotenv/config";
import { db, pool } from "../db/connection.js";
import { DocumentBuilder } from "../documents/build.js";
import { LayoutBundles } from "../documents/bundles.js";
import { PgDocumentStore } from "../documents/pg_store.js";
import { PandocRenderer } from "../documents/renderer.js";
import { loadConfig } from "../shared/config.js";
import { createApp } from "./app.js";

const config = loadConfig(process.env);

const store = new PgDocumentStore(db);
const bundles = new LayoutBundles(config.slugsDir);
const builder = new DocumentBuilder({
  store,
  bundles,
  renderer: new PandocRenderer(config.pandoc),
  uploadsDir: config.uploadsDir,
  assetUrl: config.assetUrl,
});

const app = createApp({
  store,
  builder,
  bundles,
  uploadsDir: config.uploadsDir,
  assetUrlSecret: config.assetUrl.secret,
});

// ── Start server ────────────────────────────────────────────────
export function startServer() {
  const server = app.listen(config.port, () => {
    console.log(`[api] Document service running on port ${config.port}`);
  });

  const shutdown = (signal: string) => {
    console.log(`[api] ${signal} received, shutting down`);
    server.close(() => {
      builder.background
        .drain()
        .then(() => pool.end())
        .then(() => process.exit(0))
        .catch((err: unknown) => {
          console.error("[api] Shutdown failed:", err);
          process.exit(1);
        });
    });
  };
  process.once("SIGINT", () => shutdown("SIGINT"));
  process.once("SIGTERM", () => shutdown("SIGTERM"));

  return server;
}

export { app };

// Start if run directly
if (process.argv[1]?.includes("server")) {
  startServer();
}
