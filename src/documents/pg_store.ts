import { and, asc, count as countRows, desc, eq, inArray, sql } from "drizzle-orm";
import type { SQL } from "drizzle-orm";
import type { NodePgDatabase } from "drizzle-orm/node-postgres";
import type { PgTable } from "drizzle-orm/pg-core";
import * as schema from "../db/schema.js";
import { ConstraintError } from "../shared/errors.js";
import { pageOffset, toPage } from "./pagination.js";
import type { Page, PageParams } from "./pagination.js";
import { translateErrors } from "./pg_errors.js";
import { CONTENT_TYPE_IN_USE, LAYOUT_IN_USE } from "./store.js";
import type { DocumentStore } from "./store.js";
import type {
  Asset,
  AssetPatch,
  BuildHistory,
  ContentType,
  ContentTypeField,
  ContentTypePatch,
  DataTemplate,
  DataTemplatePatch,
  Instance,
  InstancePatch,
  Layout,
  LayoutPatch,
  NewAsset,
  NewBuildHistory,
  NewContentType,
  NewDataTemplate,
  NewInstance,
  NewLayout,
  NewTheme,
  NewUser,
  Theme,
  ThemePatch,
  User,
} from "./types.js";

export type Database = NodePgDatabase<typeof schema>;

type LayoutRow = typeof schema.layouts.$inferSelect;
type ContentTypeRow = typeof schema.contentTypes.$inferSelect;

/**
 * DocumentStore backed by PostgreSQL through drizzle-orm.
 *
 * Writes go through translateErrors so unique and foreign-key violations
 * surface as ConstraintError, as they do from the in-memory store.
 */
export class PgDocumentStore implements DocumentStore {
  constructor(private db: Database) {}

  private async total(table: PgTable, where: SQL): Promise<number> {
    const [row] = await this.db.select({ total: countRows() }).from(table).where(where);
    return row.total;
  }

  // ── Users ──────────────────────────────────────────────────────

  async createUser(params: NewUser): Promise<User> {
    return translateErrors(async () => {
      const [row] = await this.db.insert(schema.users).values(params).returning();
      return row;
    });
  }

  async getUser(id: string): Promise<User | null> {
    const rows = await this.db.select().from(schema.users).where(eq(schema.users.id, id));
    return rows[0] ?? null;
  }

  // ── Assets ─────────────────────────────────────────────────────

  async createAsset(params: NewAsset): Promise<Asset> {
    return translateErrors(async () => {
      const [row] = await this.db.insert(schema.assets).values(params).returning();
      return row;
    });
  }

  async getAsset(id: string): Promise<Asset | null> {
    const rows = await this.db.select().from(schema.assets).where(eq(schema.assets.id, id));
    return rows[0] ?? null;
  }

  async listAssets(organisationId: string, page: PageParams): Promise<Page<Asset>> {
    const where = eq(schema.assets.organisationId, organisationId);
    const entries = await this.db
      .select()
      .from(schema.assets)
      .where(where)
      .orderBy(desc(schema.assets.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));
    return toPage(entries, await this.total(schema.assets, where), page);
  }

  async updateAsset(id: string, patch: AssetPatch): Promise<Asset | null> {
    // assets carry no updated_at, so an empty patch has nothing to set
    if (patch.name === undefined && patch.file === undefined) return this.getAsset(id);
    const rows = await this.db
      .update(schema.assets)
      .set(patch)
      .where(eq(schema.assets.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async deleteAsset(id: string): Promise<boolean> {
    // layout_assets cascade on asset_id
    const rows = await this.db
      .delete(schema.assets)
      .where(eq(schema.assets.id, id))
      .returning({ id: schema.assets.id });
    return rows.length > 0;
  }

  // ── Layouts ────────────────────────────────────────────────────

  private async withAssets(rows: LayoutRow[]): Promise<Layout[]> {
    if (rows.length === 0) return [];
    const assetRows = await this.db
      .select({ layoutId: schema.layoutAssets.layoutId, asset: schema.assets })
      .from(schema.layoutAssets)
      .innerJoin(schema.assets, eq(schema.layoutAssets.assetId, schema.assets.id))
      .where(inArray(schema.layoutAssets.layoutId, rows.map((r) => r.id)))
      .orderBy(asc(schema.layoutAssets.position));

    return rows.map((row) => ({
      ...row,
      assets: assetRows.filter((a) => a.layoutId === row.id).map((a) => a.asset),
    }));
  }

  async createLayout(params: NewLayout): Promise<Layout> {
    const { assetIds, ...values } = params;
    const layoutId = await translateErrors(() =>
      this.db.transaction(async (tx) => {
        const [row] = await tx.insert(schema.layouts).values(values).returning();
        if (assetIds.length > 0) {
          await tx.insert(schema.layoutAssets).values(
            assetIds.map((assetId, position) => ({ layoutId: row.id, assetId, position })),
          );
        }
        return row.id;
      }),
    );

    const layout = await this.getLayout(layoutId);
    if (!layout) throw new Error(`Layout vanished after insert: ${layoutId}`);
    return layout;
  }

  async getLayout(id: string): Promise<Layout | null> {
    const rows = await this.db.select().from(schema.layouts).where(eq(schema.layouts.id, id));
    const [layout] = await this.withAssets(rows);
    return layout ?? null;
  }

  async listLayouts(organisationId: string, page: PageParams): Promise<Page<Layout>> {
    const where = eq(schema.layouts.organisationId, organisationId);
    const rows = await this.db
      .select()
      .from(schema.layouts)
      .where(where)
      .orderBy(desc(schema.layouts.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));
    return toPage(await this.withAssets(rows), await this.total(schema.layouts, where), page);
  }

  async updateLayout(id: string, patch: LayoutPatch): Promise<Layout | null> {
    const { assetIds, ...values } = patch;
    const found = await translateErrors(() =>
      this.db.transaction(async (tx) => {
        const rows = await tx
          .update(schema.layouts)
          .set({ ...values, updatedAt: new Date() })
          .where(eq(schema.layouts.id, id))
          .returning({ id: schema.layouts.id });
        if (rows.length === 0) return false;

        if (assetIds) {
          await tx.delete(schema.layoutAssets).where(eq(schema.layoutAssets.layoutId, id));
          if (assetIds.length > 0) {
            await tx.insert(schema.layoutAssets).values(
              assetIds.map((assetId, position) => ({ layoutId: id, assetId, position })),
            );
          }
        }
        return true;
      }),
    );
    return found ? this.getLayout(id) : null;
  }

  async deleteLayout(id: string): Promise<boolean> {
    const users = await this.total(schema.contentTypes, eq(schema.contentTypes.layoutId, id));
    if (users > 0) throw new ConstraintError(LAYOUT_IN_USE);

    return translateErrors(async () => {
      const rows = await this.db
        .delete(schema.layouts)
        .where(eq(schema.layouts.id, id))
        .returning({ id: schema.layouts.id });
      return rows.length > 0;
    });
  }

  // ── Content Types ──────────────────────────────────────────────

  private async withFields(rows: ContentTypeRow[]): Promise<ContentType[]> {
    if (rows.length === 0) return [];
    const fields: ContentTypeField[] = await this.db
      .select()
      .from(schema.contentTypeFields)
      .where(inArray(schema.contentTypeFields.contentTypeId, rows.map((r) => r.id)))
      .orderBy(asc(schema.contentTypeFields.position));

    return rows.map((row) => ({
      ...row,
      fields: fields.filter((f) => f.contentTypeId === row.id),
    }));
  }

  async createContentType(params: NewContentType): Promise<ContentType> {
    const { fields, ...values } = params;
    const contentTypeId = await translateErrors(() =>
      this.db.transaction(async (tx) => {
        const [row] = await tx.insert(schema.contentTypes).values(values).returning();
        if (fields.length > 0) {
          await tx.insert(schema.contentTypeFields).values(
            fields.map((field, position) => ({
              contentTypeId: row.id,
              name: field.name,
              fieldType: field.fieldType,
              position,
            })),
          );
        }
        return row.id;
      }),
    );

    const contentType = await this.getContentType(contentTypeId);
    if (!contentType) throw new Error(`Content type vanished after insert: ${contentTypeId}`);
    return contentType;
  }

  async getContentType(id: string): Promise<ContentType | null> {
    const rows = await this.db.select().from(schema.contentTypes).where(eq(schema.contentTypes.id, id));
    const [contentType] = await this.withFields(rows);
    return contentType ?? null;
  }

  async listContentTypes(organisationId: string, page: PageParams): Promise<Page<ContentType>> {
    const where = eq(schema.contentTypes.organisationId, organisationId);
    const rows = await this.db
      .select()
      .from(schema.contentTypes)
      .where(where)
      .orderBy(desc(schema.contentTypes.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));
    return toPage(await this.withFields(rows), await this.total(schema.contentTypes, where), page);
  }

  async updateContentType(id: string, patch: ContentTypePatch): Promise<ContentType | null> {
    const { fields, ...values } = patch;
    const found = await translateErrors(() =>
      this.db.transaction(async (tx) => {
        const rows = await tx
          .update(schema.contentTypes)
          .set({ ...values, updatedAt: new Date() })
          .where(eq(schema.contentTypes.id, id))
          .returning({ id: schema.contentTypes.id });
        if (rows.length === 0) return false;

        if (fields) {
          await tx.delete(schema.contentTypeFields).where(eq(schema.contentTypeFields.contentTypeId, id));
          if (fields.length > 0) {
            await tx.insert(schema.contentTypeFields).values(
              fields.map((field, position) => ({
                contentTypeId: id,
                name: field.name,
                fieldType: field.fieldType,
                position,
              })),
            );
          }
        }
        return true;
      }),
    );
    return found ? this.getContentType(id) : null;
  }

  async deleteContentType(id: string): Promise<boolean> {
    const instances = await this.total(schema.instances, eq(schema.instances.contentTypeId, id));
    if (instances > 0) throw new ConstraintError(CONTENT_TYPE_IN_USE);

    // content_type_fields and data_templates cascade
    return translateErrors(async () => {
      const rows = await this.db
        .delete(schema.contentTypes)
        .where(eq(schema.contentTypes.id, id))
        .returning({ id: schema.contentTypes.id });
      return rows.length > 0;
    });
  }

  // ── Instances ──────────────────────────────────────────────────

  async insertInstance(params: NewInstance): Promise<Instance> {
    return translateErrors(async () => {
      const [row] = await this.db.insert(schema.instances).values(params).returning();
      return row;
    });
  }

  async getInstance(id: string): Promise<Instance | null> {
    const rows = await this.db.select().from(schema.instances).where(eq(schema.instances.id, id));
    return rows[0] ?? null;
  }

  async getInstanceByCode(instanceCode: string): Promise<Instance | null> {
    const rows = await this.db
      .select()
      .from(schema.instances)
      .where(eq(schema.instances.instanceCode, instanceCode));
    return rows[0] ?? null;
  }

  async updateInstance(id: string, patch: InstancePatch): Promise<Instance | null> {
    const rows = await this.db
      .update(schema.instances)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(schema.instances.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async deleteInstance(id: string): Promise<boolean> {
    // build_histories cascade on instance_id
    const rows = await this.db
      .delete(schema.instances)
      .where(eq(schema.instances.id, id))
      .returning({ id: schema.instances.id });
    return rows.length > 0;
  }

  async listInstances(contentTypeId: string, page: PageParams): Promise<Page<Instance>> {
    const where = eq(schema.instances.contentTypeId, contentTypeId);
    const entries = await this.db
      .select()
      .from(schema.instances)
      .where(where)
      .orderBy(desc(schema.instances.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));
    return toPage(entries, await this.total(schema.instances, where), page);
  }

  async listOrganisationInstances(organisationId: string, page: PageParams): Promise<Page<Instance>> {
    const where = eq(schema.contentTypes.organisationId, organisationId);
    const rows = await this.db
      .select({ instance: schema.instances })
      .from(schema.instances)
      .innerJoin(schema.contentTypes, eq(schema.instances.contentTypeId, schema.contentTypes.id))
      .where(where)
      .orderBy(desc(schema.instances.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));

    const [{ total }] = await this.db
      .select({ total: countRows() })
      .from(schema.instances)
      .innerJoin(schema.contentTypes, eq(schema.instances.contentTypeId, schema.contentTypes.id))
      .where(where);

    return toPage(rows.map((r) => r.instance), total, page);
  }

  // ── Counters ───────────────────────────────────────────────────

  async nextCounter(subject: string): Promise<number> {
    // Single upsert statement: row-level locking in PostgreSQL serialises
    // concurrent increments of the same subject.
    const [row] = await this.db
      .insert(schema.counters)
      .values({ subject, count: 1 })
      .onConflictDoUpdate({
        target: schema.counters.subject,
        set: { count: sql`${schema.counters.count} + 1` },
      })
      .returning({ count: schema.counters.count });
    return row.count;
  }

  // ── Build History ──────────────────────────────────────────────

  async insertBuildHistory(params: NewBuildHistory): Promise<BuildHistory> {
    return translateErrors(async () => {
      const [row] = await this.db.insert(schema.buildHistories).values(params).returning();
      return row;
    });
  }

  async listBuildHistory(instanceId: string): Promise<BuildHistory[]> {
    return this.db
      .select()
      .from(schema.buildHistories)
      .where(eq(schema.buildHistories.instanceId, instanceId))
      .orderBy(desc(schema.buildHistories.insertedAt));
  }

  async latestSuccessfulBuild(instanceId: string): Promise<BuildHistory | null> {
    const rows = await this.db
      .select()
      .from(schema.buildHistories)
      .where(and(eq(schema.buildHistories.instanceId, instanceId), eq(schema.buildHistories.exitCode, 0)))
      .orderBy(desc(schema.buildHistories.insertedAt))
      .limit(1);
    return rows[0] ?? null;
  }

  // ── Themes ─────────────────────────────────────────────────────

  async createTheme(params: NewTheme): Promise<Theme> {
    return translateErrors(async () => {
      const [row] = await this.db.insert(schema.themes).values(params).returning();
      return row;
    });
  }

  async getTheme(id: string): Promise<Theme | null> {
    const rows = await this.db.select().from(schema.themes).where(eq(schema.themes.id, id));
    return rows[0] ?? null;
  }

  async listThemes(organisationId: string, page: PageParams): Promise<Page<Theme>> {
    const where = eq(schema.themes.organisationId, organisationId);
    const entries = await this.db
      .select()
      .from(schema.themes)
      .where(where)
      .orderBy(desc(schema.themes.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));
    return toPage(entries, await this.total(schema.themes, where), page);
  }

  async updateTheme(id: string, patch: ThemePatch): Promise<Theme | null> {
    const rows = await this.db
      .update(schema.themes)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(schema.themes.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async deleteTheme(id: string): Promise<boolean> {
    const rows = await this.db
      .delete(schema.themes)
      .where(eq(schema.themes.id, id))
      .returning({ id: schema.themes.id });
    return rows.length > 0;
  }

  // ── Data Templates ─────────────────────────────────────────────

  async createDataTemplate(params: NewDataTemplate): Promise<DataTemplate> {
    return translateErrors(async () => {
      const [row] = await this.db.insert(schema.dataTemplates).values(params).returning();
      return row;
    });
  }

  async getDataTemplate(id: string): Promise<DataTemplate | null> {
    const rows = await this.db.select().from(schema.dataTemplates).where(eq(schema.dataTemplates.id, id));
    return rows[0] ?? null;
  }

  async listDataTemplates(contentTypeId: string, page: PageParams): Promise<Page<DataTemplate>> {
    const where = eq(schema.dataTemplates.contentTypeId, contentTypeId);
    const entries = await this.db
      .select()
      .from(schema.dataTemplates)
      .where(where)
      .orderBy(desc(schema.dataTemplates.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));
    return toPage(entries, await this.total(schema.dataTemplates, where), page);
  }

  async listOrganisationDataTemplates(organisationId: string, page: PageParams): Promise<Page<DataTemplate>> {
    const where = eq(schema.contentTypes.organisationId, organisationId);
    const rows = await this.db
      .select({ template: schema.dataTemplates })
      .from(schema.dataTemplates)
      .innerJoin(schema.contentTypes, eq(schema.dataTemplates.contentTypeId, schema.contentTypes.id))
      .where(where)
      .orderBy(desc(schema.dataTemplates.createdAt))
      .limit(page.pageSize)
      .offset(pageOffset(page));

    const [{ total }] = await this.db
      .select({ total: countRows() })
      .from(schema.dataTemplates)
      .innerJoin(schema.contentTypes, eq(schema.dataTemplates.contentTypeId, schema.contentTypes.id))
      .where(where);

    return toPage(rows.map((r) => r.template), total, page);
  }

  async updateDataTemplate(id: string, patch: DataTemplatePatch): Promise<DataTemplate | null> {
    const rows = await this.db
      .update(schema.dataTemplates)
      .set({ ...patch, updatedAt: new Date() })
      .where(eq(schema.dataTemplates.id, id))
      .returning();
    return rows[0] ?? null;
  }

  async deleteDataTemplate(id: string): Promise<boolean> {
    const rows = await this.db
      .delete(schema.dataTemplates)
      .where(eq(schema.dataTemplates.id, id))
      .returning({ id: schema.dataTemplates.id });
    return rows.length > 0;
  }
}
