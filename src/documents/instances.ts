/**
 * Instance lifecycle: creation with sequence codes, read model, updates.
 */

import { NotFoundError } from "../shared/errors.js";
import { builtDocumentUrl } from "./workspace.js";
import type { DocumentStore } from "./store.js";
import type {
  ContentType,
  Instance,
  InstancePatch,
  InstanceView,
  SerializedValues,
  User,
} from "./types.js";

export const SEQUENCE_WIDTH = 4;

export function counterSubject(contentTypeId: string): string {
  return `ContentType:${contentTypeId}`;
}

/** "OFF", 7 → "OFF0007". Counts wider than four digits are kept whole. */
export function formatSequenceCode(prefix: string, count: number): string {
  return prefix + String(count).padStart(SEQUENCE_WIDTH, "0");
}

export interface CreateInstanceParams {
  serialized: SerializedValues;
  raw: string;
  stateId?: string | null;
}

/**
 * Create an instance under `contentType`, assigning the next sequence code.
 *
 * The counter increment is a single atomic store operation, so concurrent
 * creations under one content type never share a code. A failed insert
 * leaves a gap in the sequence.
 */
export async function createInstance(
  store: DocumentStore,
  user: Pick<User, "id">,
  contentType: ContentType,
  params: CreateInstanceParams,
): Promise<InstanceView> {
  const count = await store.nextCounter(counterSubject(contentType.id));
  const instance = await store.insertInstance({
    instanceCode: formatSequenceCode(contentType.prefix, count),
    serialized: params.serialized,
    raw: params.raw,
    contentTypeId: contentType.id,
    stateId: params.stateId ?? null,
    creatorId: user.id,
  });
  return { ...instance, contentType };
}

/** Attach `build` when the instance has at least one successful build. */
export async function withBuiltDocument(
  store: DocumentStore,
  instance: Instance,
  contentType: ContentType,
): Promise<InstanceView> {
  const success = await store.latestSuccessfulBuild(instance.id);
  if (!success) return { ...instance, contentType };
  return { ...instance, contentType, build: builtDocumentUrl(instance.instanceCode) };
}

export async function showInstance(store: DocumentStore, instanceId: string): Promise<InstanceView | null> {
  const instance = await store.getInstance(instanceId);
  if (!instance) return null;
  const contentType = await store.getContentType(instance.contentTypeId);
  if (!contentType) throw new NotFoundError("Content type", instance.contentTypeId);
  return withBuiltDocument(store, instance, contentType);
}

export async function updateInstance(
  store: DocumentStore,
  instanceId: string,
  patch: InstancePatch,
): Promise<InstanceView> {
  const updated = await store.updateInstance(instanceId, patch);
  if (!updated) throw new NotFoundError("Instance", instanceId);
  const contentType = await store.getContentType(updated.contentTypeId);
  if (!contentType) throw new NotFoundError("Content type", updated.contentTypeId);
  return withBuiltDocument(store, updated, contentType);
}

export async function deleteInstance(store: DocumentStore, instanceId: string): Promise<void> {
  const deleted = await store.deleteInstance(instanceId);
  if (!deleted) throw new NotFoundError("Instance", instanceId);
}
