import express from "express";
import type { Express } from "express";
import { libraryRouter } from "./library_routes.js";
import { documentRouter } from "./routes.js";
import type { DocumentRouterDeps } from "./routes.js";

/**
 * Build the Express application. Persistence and rendering come in through
 * `deps`, so tests can pass in-process stand-ins.
 */
export function createApp(deps: DocumentRouterDeps): Express {
  const app = express();
  app.use(express.json({ limit: "5mb" }));

  app.use(libraryRouter(deps));
  app.use(documentRouter(deps));

  return app;
}
