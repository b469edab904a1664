import {
  pgTable,
  text,
  timestamp,
  integer,
  jsonb,
  uuid,
  varchar,
  serial,
} from "drizzle-orm/pg-core";
import type { SerializedValues } from "../documents/types.js";

// ── Users ──────────────────────────────────────────────────────────
export const users = pgTable("users", {
  id: uuid("id").primaryKey().defaultRandom(),
  name: text("name").notNull(),
  email: varchar("email", { length: 255 }).notNull().unique(),
  organisationId: uuid("organisation_id").notNull(),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// ── Layouts ────────────────────────────────────────────────────────
export const layouts = pgTable("layouts", {
  id: uuid("id").primaryKey().defaultRandom(),
  organisationId: uuid("organisation_id").notNull(),
  name: text("name").notNull(),
  slug: varchar("slug", { length: 100 }).notNull(),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// ── Assets ─────────────────────────────────────────────────────────
export const assets = pgTable("assets", {
  id: uuid("id").primaryKey().defaultRandom(),
  organisationId: uuid("organisation_id").notNull(),
  name: varchar("name", { length: 100 }).notNull(),
  file: text("file").notNull(),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  createdAt: timestamp("created_at").notNull().defaultNow(),
});

// ── Layout ↔ Asset ─────────────────────────────────────────────────
export const layoutAssets = pgTable("layout_assets", {
  id: serial("id").primaryKey(),
  layoutId: uuid("layout_id").notNull().references(() => layouts.id, { onDelete: "cascade" }),
  assetId: uuid("asset_id").notNull().references(() => assets.id, { onDelete: "cascade" }),
  position: integer("position").notNull(),
});

// ── Content Types ──────────────────────────────────────────────────
export const contentTypes = pgTable("content_types", {
  id: uuid("id").primaryKey().defaultRandom(),
  organisationId: uuid("organisation_id").notNull(),
  name: text("name").notNull(),
  // Instance codes and build directories derive from the prefix, so it is unique across organisations.
  prefix: varchar("prefix", { length: 20 }).notNull().unique(),
  layoutId: uuid("layout_id").notNull().references(() => layouts.id),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

export const contentTypeFields = pgTable("content_type_fields", {
  id: uuid("id").primaryKey().defaultRandom(),
  contentTypeId: uuid("content_type_id").notNull().references(() => contentTypes.id, { onDelete: "cascade" }),
  name: varchar("name", { length: 100 }).notNull(),
  fieldType: varchar("field_type", { length: 30 }).notNull(),
  position: integer("position").notNull(),
});

// ── Instances ──────────────────────────────────────────────────────
export const instances = pgTable("instances", {
  id: uuid("id").primaryKey().defaultRandom(),
  instanceCode: varchar("instance_code", { length: 40 }).notNull().unique(),
  serialized: jsonb("serialized").$type<SerializedValues>().notNull(),
  raw: text("raw").notNull(),
  contentTypeId: uuid("content_type_id").notNull().references(() => contentTypes.id),
  stateId: uuid("state_id"),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// ── Build Histories ────────────────────────────────────────────────
export const buildHistories = pgTable("build_histories", {
  id: uuid("id").primaryKey().defaultRandom(),
  instanceId: uuid("instance_id").notNull().references(() => instances.id, { onDelete: "cascade" }),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  status: varchar("status", { length: 10 }).$type<"success" | "failed">().notNull(),
  exitCode: integer("exit_code").notNull(),
  startTime: timestamp("start_time", { precision: 3 }).notNull(),
  endTime: timestamp("end_time", { precision: 3 }).notNull(),
  delay: integer("delay").notNull(),
  insertedAt: timestamp("inserted_at", { precision: 3 }).notNull().defaultNow(),
});

// ── Counters ───────────────────────────────────────────────────────
export const counters = pgTable("counters", {
  id: serial("id").primaryKey(),
  subject: varchar("subject", { length: 100 }).notNull().unique(),
  count: integer("count").notNull(),
});

// ── Themes ─────────────────────────────────────────────────────────
export const themes = pgTable("themes", {
  id: uuid("id").primaryKey().defaultRandom(),
  organisationId: uuid("organisation_id").notNull(),
  name: text("name").notNull(),
  font: text("font").notNull(),
  typescale: jsonb("typescale").$type<Record<string, number>>().notNull(),
  file: text("file"),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});

// ── Data Templates ─────────────────────────────────────────────────
export const dataTemplates = pgTable("data_templates", {
  id: uuid("id").primaryKey().defaultRandom(),
  tag: text("tag").notNull(),
  data: text("data").notNull(),
  contentTypeId: uuid("content_type_id").notNull().references(() => contentTypes.id, { onDelete: "cascade" }),
  creatorId: uuid("creator_id").notNull().references(() => users.id),
  createdAt: timestamp("created_at").notNull().defaultNow(),
  updatedAt: timestamp("updated_at").notNull().defaultNow(),
});
