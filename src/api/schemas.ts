import { z } from "zod";
import { DEFAULT_PAGE_SIZE, MAX_PAGE_SIZE } from "../documents/pagination.js";

const SLUG = /^[a-z0-9][a-z0-9_-]*$/;
const PREFIX = /^[A-Za-z0-9_-]+$/;
// Asset and field names become header keys.
const HEADER_KEY = /^[A-Za-z][A-Za-z0-9_]*$/;

const AssetName = z.string().max(100).regex(HEADER_KEY);

const FieldSchema = z.object({
  name: z.string().max(100).regex(HEADER_KEY),
  fieldType: z.string().min(1).default("string"),
});

// Point sizes per heading level or element, e.g. { "h1": 36, "p": 12 }.
const TypescaleSchema = z.record(z.number().positive());

export const PageQuerySchema = z.object({
  page: z.coerce.number().int().min(1).default(1),
  pageSize: z.coerce
    .number()
    .int()
    .min(1)
    .default(DEFAULT_PAGE_SIZE)
    .transform((size) => Math.min(size, MAX_PAGE_SIZE)),
});

export const CreateAssetSchema = z.object({
  name: AssetName,
  file: z.string().min(1),
});

export const UpdateAssetSchema = CreateAssetSchema.partial().strict();

export const CreateLayoutSchema = z.object({
  name: z.string().min(1),
  slug: z.string().regex(SLUG),
  assetIds: z.array(z.string().uuid()).default([]),
});

export const UpdateLayoutSchema = z
  .object({
    name: z.string().min(1),
    slug: z.string().regex(SLUG),
    assetIds: z.array(z.string().uuid()),
  })
  .partial()
  .strict();

export const CreateContentTypeSchema = z.object({
  name: z.string().min(1),
  prefix: z.string().min(1).max(20).regex(PREFIX),
  layoutId: z.string().uuid(),
  fields: z.array(FieldSchema).default([]),
});

// No prefix: instance codes already issued under it must stay valid.
export const UpdateContentTypeSchema = z
  .object({
    name: z.string().min(1),
    layoutId: z.string().uuid(),
    fields: z.array(FieldSchema),
  })
  .partial()
  .strict();

export const CreateInstanceSchema = z.object({
  serialized: z.record(z.unknown()).default({}),
  raw: z.string().default(""),
  stateId: z.string().uuid().nullable().optional(),
});

export const UpdateInstanceSchema = z.object({
  serialized: z.record(z.unknown()).optional(),
  raw: z.string().optional(),
  stateId: z.string().uuid().nullable().optional(),
});

export const CreateThemeSchema = z.object({
  name: z.string().min(1),
  font: z.string().min(1),
  typescale: TypescaleSchema.default({}),
  file: z.string().min(1).nullable().default(null),
});

export const UpdateThemeSchema = z
  .object({
    name: z.string().min(1),
    font: z.string().min(1),
    typescale: TypescaleSchema,
    file: z.string().min(1).nullable(),
  })
  .partial()
  .strict();

export const CreateDataTemplateSchema = z.object({
  tag: z.string().min(1),
  data: z.string().default(""),
});

export const UpdateDataTemplateSchema = z
  .object({
    tag: z.string().min(1),
    data: z.string(),
  })
  .partial()
  .strict();

export type PageQuery = z.infer<typeof PageQuerySchema>;
export type CreateAssetRequest = z.infer<typeof CreateAssetSchema>;
export type CreateLayoutRequest = z.infer<typeof CreateLayoutSchema>;
export type CreateContentTypeRequest = z.infer<typeof CreateContentTypeSchema>;
export type UpdateContentTypeRequest = z.infer<typeof UpdateContentTypeSchema>;
export type CreateInstanceRequest = z.infer<typeof CreateInstanceSchema>;
export type UpdateInstanceRequest = z.infer<typeof UpdateInstanceSchema>;
export type CreateThemeRequest = z.infer<typeof CreateThemeSchema>;
export type CreateDataTemplateRequest = z.infer<typeof CreateDataTemplateSchema>;
