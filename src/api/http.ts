/**
 * Request helpers shared by the routers: the acting user, organisation-scoped
 * lookups, page parameters and the error-to-status mapping.
 */

import type { Request, Response } from "express";
import { z, ZodError } from "zod";

import type { PageParams } from "../documents/pagination.js";
import type { DocumentStore } from "../documents/store.js";
import type { ContentType, DataTemplate, Instance, User } from "../documents/types.js";
import {
  AssetUrlError,
  BuildIOError,
  ConstraintError,
  NotFoundError,
  UnauthorizedError,
} from "../shared/errors.js";
import { PageQuerySchema } from "./schemas.js";

const UuidSchema = z.string().uuid();

export function isUuid(id: string): boolean {
  return UuidSchema.safeParse(id).success;
}

export async function currentUser(store: DocumentStore, req: Request): Promise<User> {
  const parsed = UuidSchema.safeParse(req.header("x-user-id"));
  if (!parsed.success) throw new UnauthorizedError();
  const user = await store.getUser(parsed.data);
  if (!user) throw new UnauthorizedError();
  return user;
}

export function pageParams(req: Request): PageParams {
  return PageQuerySchema.parse(req.query);
}

/**
 * Look up a record the user's organisation owns. Missing ids, malformed ids
 * and another organisation's records all answer NotFoundError.
 */
export async function loadOwned<T extends { organisationId: string }>(
  user: User,
  entity: string,
  id: string,
  find: (id: string) => Promise<T | null>,
): Promise<T> {
  const record = isUuid(id) ? await find(id) : null;
  if (!record || record.organisationId !== user.organisationId) {
    throw new NotFoundError(entity, id);
  }
  return record;
}

export async function loadContentType(store: DocumentStore, user: User, id: string): Promise<ContentType> {
  return loadOwned(user, "Content type", id, (contentTypeId) => store.getContentType(contentTypeId));
}

export async function loadInstance(
  store: DocumentStore,
  user: User,
  id: string,
): Promise<{ instance: Instance; contentType: ContentType }> {
  const instance = isUuid(id) ? await store.getInstance(id) : null;
  if (!instance) throw new NotFoundError("Instance", id);
  const contentType = await store.getContentType(instance.contentTypeId);
  if (!contentType || contentType.organisationId !== user.organisationId) {
    throw new NotFoundError("Instance", id);
  }
  return { instance, contentType };
}

export async function loadDataTemplate(store: DocumentStore, user: User, id: string): Promise<DataTemplate> {
  const template = isUuid(id) ? await store.getDataTemplate(id) : null;
  if (!template) throw new NotFoundError("Data template", id);
  const contentType = await store.getContentType(template.contentTypeId);
  if (!contentType || contentType.organisationId !== user.organisationId) {
    throw new NotFoundError("Data template", id);
  }
  return template;
}

export function sendError(res: Response, err: unknown): void {
  if (err instanceof ZodError) {
    res.status(400).json({ error: "Invalid request", issues: err.issues });
  } else if (err instanceof UnauthorizedError) {
    res.status(401).json({ error: err.message });
  } else if (err instanceof NotFoundError) {
    res.status(404).json({ error: err.message });
  } else if (err instanceof ConstraintError) {
    res.status(409).json({ error: err.message });
  } else if (err instanceof BuildIOError) {
    console.error(`[api] ${err.message}`);
    res.status(500).json({ error: err.message, path: err.path });
  } else if (err instanceof AssetUrlError) {
    console.error(`[api] ${err.message}`);
    res.status(500).json({ error: err.message, assetId: err.assetId });
  } else {
    const message = err instanceof Error ? err.message : String(err);
    console.error(`[api] ${message}`);
    res.status(500).json({ error: message });
  }
}
