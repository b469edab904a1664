/**
 * Document domain types.
 *
 * Rows mirror the tables in db/schema.ts; the aggregates (Layout with its
 * assets, ContentType with its fields) are what the store hands out.
 */

/** Field values of an instance, keyed by content-type field name. */
export type SerializedValues = Record<string, unknown>;

export type BuildStatus = "success" | "failed";

export interface User {
  id: string;
  name: string;
  email: string;
  organisationId: string;
  createdAt: Date;
}

export interface Asset {
  id: string;
  organisationId: string;
  name: string;
  /** Stored file name under uploads/assets/<id>/. */
  file: string;
  creatorId: string;
  createdAt: Date;
}

export interface Layout {
  id: string;
  organisationId: string;
  name: string;
  /** Names the template bundle directory under the slugs root. */
  slug: string;
  creatorId: string;
  /** In association order. */
  assets: Asset[];
  createdAt: Date;
  updatedAt: Date;
}

export interface ContentTypeField {
  id: string;
  contentTypeId: string;
  name: string;
  fieldType: string;
  position: number;
}

export interface ContentType {
  id: string;
  organisationId: string;
  name: string;
  prefix: string;
  layoutId: string;
  creatorId: string;
  /** In declaration order. */
  fields: ContentTypeField[];
  createdAt: Date;
  updatedAt: Date;
}

export interface Instance {
  id: string;
  /** Sequence code: content-type prefix + zero-padded counter. */
  instanceCode: string;
  serialized: SerializedValues;
  raw: string;
  contentTypeId: string;
  stateId: string | null;
  creatorId: string;
  createdAt: Date;
  updatedAt: Date;
}

export interface BuildHistory {
  id: string;
  instanceId: string;
  creatorId: string;
  status: BuildStatus;
  exitCode: number;
  startTime: Date;
  endTime: Date;
  /** endTime − startTime in milliseconds. */
  delay: number;
  insertedAt: Date;
}

export interface Theme {
  id: string;
  organisationId: string;
  name: string;
  font: string;
  /** Heading/body sizes in points, e.g. { h1: 36, p: 12 }. */
  typescale: Record<string, number>;
  /** Font file under uploads/themes/<id>/, when one was supplied. */
  file: string | null;
  creatorId: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Reusable body text for instances of one content type. */
export interface DataTemplate {
  id: string;
  tag: string;
  data: string;
  contentTypeId: string;
  creatorId: string;
  createdAt: Date;
  updatedAt: Date;
}

/** Instance as returned to API callers. */
export interface InstanceView extends Instance {
  contentType: ContentType;
  /** Present only once a build has succeeded. */
  build?: string;
}

// ── Store inputs ───────────────────────────────────────────────────

export interface NewUser {
  name: string;
  email: string;
  organisationId: string;
}

export interface NewAsset {
  organisationId: string;
  name: string;
  file: string;
  creatorId: string;
}

export interface AssetPatch {
  name?: string;
  file?: string;
}

export interface NewLayout {
  organisationId: string;
  name: string;
  slug: string;
  creatorId: string;
  assetIds: string[];
}

export interface LayoutPatch {
  name?: string;
  slug?: string;
  /** Replaces the association list, keeping the given order. */
  assetIds?: string[];
}

export interface NewContentType {
  organisationId: string;
  name: string;
  prefix: string;
  layoutId: string;
  creatorId: string;
  fields: Array<{ name: string; fieldType: string }>;
}

/** The prefix is fixed once instances may have been numbered under it. */
export interface ContentTypePatch {
  name?: string;
  layoutId?: string;
  /** Replaces every field, in the given order. */
  fields?: Array<{ name: string; fieldType: string }>;
}

export interface NewInstance {
  instanceCode: string;
  serialized: SerializedValues;
  raw: string;
  contentTypeId: string;
  stateId: string | null;
  creatorId: string;
}

export interface InstancePatch {
  serialized?: SerializedValues;
  raw?: string;
  stateId?: string | null;
}

export interface NewBuildHistory {
  instanceId: string;
  creatorId: string;
  status: BuildStatus;
  exitCode: number;
  startTime: Date;
  endTime: Date;
  delay: number;
}

export interface NewTheme {
  organisationId: string;
  name: string;
  font: string;
  typescale: Record<string, number>;
  file: string | null;
  creatorId: string;
}

export interface ThemePatch {
  name?: string;
  font?: string;
  typescale?: Record<string, number>;
  file?: string | null;
}

export interface NewDataTemplate {
  tag: string;
  data: string;
  contentTypeId: string;
  creatorId: string;
}

export interface DataTemplatePatch {
  tag?: string;
  data?: string;
}
