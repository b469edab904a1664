/**
 * DocumentStore: persistence boundary for the document context.
 *
 * PgDocumentStore (pg_store.ts) backs it with PostgreSQL; InMemoryDocumentStore
 * below is the Map-backed stand-in used by tests. Both raise ConstraintError
 * for uniqueness and reference violations.
 */

import { v4 as uuidv4 } from "uuid";
import { ConstraintError } from "../shared/errors.js";
import { paginate } from "./pagination.js";
import type { Page, PageParams } from "./pagination.js";
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

export const LAYOUT_IN_USE = "Cannot delete the layout: content types depend on it";
export const CONTENT_TYPE_IN_USE = "Cannot delete the content type: instances exist under it";

export interface DocumentStore {
  createUser(params: NewUser): Promise<User>;
  getUser(id: string): Promise<User | null>;

  // Every index below is newest first.

  createAsset(params: NewAsset): Promise<Asset>;
  getAsset(id: string): Promise<Asset | null>;
  listAssets(organisationId: string, page: PageParams): Promise<Page<Asset>>;
  updateAsset(id: string, patch: AssetPatch): Promise<Asset | null>;
  /** Also drops the asset from every layout it belongs to. */
  deleteAsset(id: string): Promise<boolean>;

  createLayout(params: NewLayout): Promise<Layout>;
  getLayout(id: string): Promise<Layout | null>;
  listLayouts(organisationId: string, page: PageParams): Promise<Page<Layout>>;
  updateLayout(id: string, patch: LayoutPatch): Promise<Layout | null>;
  /** Refused with ConstraintError while a content type uses the layout. */
  deleteLayout(id: string): Promise<boolean>;

  /** Prefixes are unique across all organisations. */
  createContentType(params: NewContentType): Promise<ContentType>;
  getContentType(id: string): Promise<ContentType | null>;
  listContentTypes(organisationId: string, page: PageParams): Promise<Page<ContentType>>;
  updateContentType(id: string, patch: ContentTypePatch): Promise<ContentType | null>;
  /** Refused with ConstraintError while instances exist; removes its data templates. */
  deleteContentType(id: string): Promise<boolean>;

  insertInstance(params: NewInstance): Promise<Instance>;
  getInstance(id: string): Promise<Instance | null>;
  getInstanceByCode(instanceCode: string): Promise<Instance | null>;
  updateInstance(id: string, patch: InstancePatch): Promise<Instance | null>;
  /** Removes the instance together with its build history. */
  deleteInstance(id: string): Promise<boolean>;
  listInstances(contentTypeId: string, page: PageParams): Promise<Page<Instance>>;
  /** Instances of every content type the organisation owns. */
  listOrganisationInstances(organisationId: string, page: PageParams): Promise<Page<Instance>>;

  /**
   * Atomically increment the counter for `subject` and return the new count.
   * The first call for a subject returns 1.
   */
  nextCounter(subject: string): Promise<number>;

  insertBuildHistory(params: NewBuildHistory): Promise<BuildHistory>;
  listBuildHistory(instanceId: string): Promise<BuildHistory[]>;
  /** Most recent entry with exit code 0, if any. */
  latestSuccessfulBuild(instanceId: string): Promise<BuildHistory | null>;

  createTheme(params: NewTheme): Promise<Theme>;
  getTheme(id: string): Promise<Theme | null>;
  listThemes(organisationId: string, page: PageParams): Promise<Page<Theme>>;
  updateTheme(id: string, patch: ThemePatch): Promise<Theme | null>;
  deleteTheme(id: string): Promise<boolean>;

  createDataTemplate(params: NewDataTemplate): Promise<DataTemplate>;
  getDataTemplate(id: string): Promise<DataTemplate | null>;
  listDataTemplates(contentTypeId: string, page: PageParams): Promise<Page<DataTemplate>>;
  listOrganisationDataTemplates(organisationId: string, page: PageParams): Promise<Page<DataTemplate>>;
  updateDataTemplate(id: string, patch: DataTemplatePatch): Promise<DataTemplate | null>;
  deleteDataTemplate(id: string): Promise<boolean>;
}

type LayoutRow = Omit<Layout, "assets"> & { assetIds: string[] };

function newestFirst<T>(rows: Iterable<T>, keep: (row: T) => boolean): T[] {
  return [...rows].filter(keep).reverse();
}

export class InMemoryDocumentStore implements DocumentStore {
  private users = new Map<string, User>();
  private assets = new Map<string, Asset>();
  private layouts = new Map<string, LayoutRow>();
  private contentTypes = new Map<string, ContentType>();
  private instances = new Map<string, Instance>();
  private histories: BuildHistory[] = [];
  private counters = new Map<string, number>();
  private themes = new Map<string, Theme>();
  private dataTemplates = new Map<string, DataTemplate>();

  // ── Users ──────────────────────────────────────────────────────

  async createUser(params: NewUser): Promise<User> {
    for (const existing of this.users.values()) {
      if (existing.email === params.email) {
        throw new ConstraintError(`users.email already taken: ${params.email}`);
      }
    }
    const user: User = { id: uuidv4(), ...params, createdAt: new Date() };
    this.users.set(user.id, user);
    return user;
  }

  async getUser(id: string): Promise<User | null> {
    return this.users.get(id) ?? null;
  }

  // ── Assets ─────────────────────────────────────────────────────

  async createAsset(params: NewAsset): Promise<Asset> {
    const asset: Asset = { id: uuidv4(), ...params, createdAt: new Date() };
    this.assets.set(asset.id, asset);
    return asset;
  }

  async getAsset(id: string): Promise<Asset | null> {
    return this.assets.get(id) ?? null;
  }

  async listAssets(organisationId: string, page: PageParams): Promise<Page<Asset>> {
    return paginate(
      newestFirst(this.assets.values(), (a) => a.organisationId === organisationId),
      page,
    );
  }

  async updateAsset(id: string, patch: AssetPatch): Promise<Asset | null> {
    const existing = this.assets.get(id);
    if (!existing) return null;
    const updated: Asset = {
      ...existing,
      name: patch.name ?? existing.name,
      file: patch.file ?? existing.file,
    };
    this.assets.set(id, updated);
    return updated;
  }

  async deleteAsset(id: string): Promise<boolean> {
    if (!this.assets.delete(id)) return false;
    for (const layout of this.layouts.values()) {
      layout.assetIds = layout.assetIds.filter((assetId) => assetId !== id);
    }
    return true;
  }

  // ── Layouts ────────────────────────────────────────────────────

  private checkAssets(assetIds: string[]): void {
    for (const assetId of assetIds) {
      if (!this.assets.has(assetId)) {
        throw new ConstraintError(`layout_assets.asset_id references missing asset ${assetId}`);
      }
    }
  }

  private toLayout(row: LayoutRow): Layout {
    const { assetIds, ...rest } = row;
    const assets: Asset[] = [];
    for (const assetId of assetIds) {
      const asset = this.assets.get(assetId);
      if (asset) assets.push(asset);
    }
    return { ...rest, assets };
  }

  async createLayout(params: NewLayout): Promise<Layout> {
    this.checkAssets(params.assetIds);
    const now = new Date();
    const row: LayoutRow = {
      id: uuidv4(),
      organisationId: params.organisationId,
      name: params.name,
      slug: params.slug,
      creatorId: params.creatorId,
      assetIds: [...params.assetIds],
      createdAt: now,
      updatedAt: now,
    };
    this.layouts.set(row.id, row);
    return this.toLayout(row);
  }

  async getLayout(id: string): Promise<Layout | null> {
    const row = this.layouts.get(id);
    return row ? this.toLayout(row) : null;
  }

  async listLayouts(organisationId: string, page: PageParams): Promise<Page<Layout>> {
    const rows = newestFirst(this.layouts.values(), (l) => l.organisationId === organisationId);
    const listed = paginate(rows, page);
    return { ...listed, entries: listed.entries.map((row) => this.toLayout(row)) };
  }

  async updateLayout(id: string, patch: LayoutPatch): Promise<Layout | null> {
    const existing = this.layouts.get(id);
    if (!existing) return null;
    if (patch.assetIds) this.checkAssets(patch.assetIds);
    const updated: LayoutRow = {
      ...existing,
      name: patch.name ?? existing.name,
      slug: patch.slug ?? existing.slug,
      assetIds: patch.assetIds ? [...patch.assetIds] : existing.assetIds,
      updatedAt: new Date(),
    };
    this.layouts.set(id, updated);
    return this.toLayout(updated);
  }

  async deleteLayout(id: string): Promise<boolean> {
    if (!this.layouts.has(id)) return false;
    for (const contentType of this.contentTypes.values()) {
      if (contentType.layoutId === id) throw new ConstraintError(LAYOUT_IN_USE);
    }
    return this.layouts.delete(id);
  }

  // ── Content Types ──────────────────────────────────────────────

  private buildFields(contentTypeId: string, fields: NewContentType["fields"]): ContentTypeField[] {
    return fields.map((field, position) => ({
      id: uuidv4(),
      contentTypeId,
      name: field.name,
      fieldType: field.fieldType,
      position,
    }));
  }

  async createContentType(params: NewContentType): Promise<ContentType> {
    if (!this.layouts.has(params.layoutId)) {
      throw new ConstraintError(`content_types.layout_id references missing layout ${params.layoutId}`);
    }
    for (const existing of this.contentTypes.values()) {
      if (existing.prefix === params.prefix) {
        throw new ConstraintError(`content_types.prefix already taken: ${params.prefix}`);
      }
    }
    const now = new Date();
    const id = uuidv4();
    const contentType: ContentType = {
      id,
      organisationId: params.organisationId,
      name: params.name,
      prefix: params.prefix,
      layoutId: params.layoutId,
      creatorId: params.creatorId,
      fields: this.buildFields(id, params.fields),
      createdAt: now,
      updatedAt: now,
    };
    this.contentTypes.set(id, contentType);
    return contentType;
  }

  async getContentType(id: string): Promise<ContentType | null> {
    return this.contentTypes.get(id) ?? null;
  }

  async listContentTypes(organisationId: string, page: PageParams): Promise<Page<ContentType>> {
    return paginate(
      newestFirst(this.contentTypes.values(), (c) => c.organisationId === organisationId),
      page,
    );
  }

  async updateContentType(id: string, patch: ContentTypePatch): Promise<ContentType | null> {
    const existing = this.contentTypes.get(id);
    if (!existing) return null;
    if (patch.layoutId && !this.layouts.has(patch.layoutId)) {
      throw new ConstraintError(`content_types.layout_id references missing layout ${patch.layoutId}`);
    }
    const updated: ContentType = {
      ...existing,
      name: patch.name ?? existing.name,
      layoutId: patch.layoutId ?? existing.layoutId,
      fields: patch.fields ? this.buildFields(id, patch.fields) : existing.fields,
      updatedAt: new Date(),
    };
    this.contentTypes.set(id, updated);
    return updated;
  }

  async deleteContentType(id: string): Promise<boolean> {
    if (!this.contentTypes.has(id)) return false;
    for (const instance of this.instances.values()) {
      if (instance.contentTypeId === id) throw new ConstraintError(CONTENT_TYPE_IN_USE);
    }
    for (const template of this.dataTemplates.values()) {
      if (template.contentTypeId === id) this.dataTemplates.delete(template.id);
    }
    return this.contentTypes.delete(id);
  }

  private ownedBy(contentTypeId: string, organisationId: string): boolean {
    return this.contentTypes.get(contentTypeId)?.organisationId === organisationId;
  }

  // ── Instances ──────────────────────────────────────────────────

  async insertInstance(params: NewInstance): Promise<Instance> {
    for (const existing of this.instances.values()) {
      if (existing.instanceCode === params.instanceCode) {
        throw new ConstraintError(`instances.instance_code already taken: ${params.instanceCode}`);
      }
    }
    const now = new Date();
    const instance: Instance = { id: uuidv4(), ...params, createdAt: now, updatedAt: now };
    this.instances.set(instance.id, instance);
    return instance;
  }

  async getInstance(id: string): Promise<Instance | null> {
    return this.instances.get(id) ?? null;
  }

  async getInstanceByCode(instanceCode: string): Promise<Instance | null> {
    for (const instance of this.instances.values()) {
      if (instance.instanceCode === instanceCode) return instance;
    }
    return null;
  }

  async updateInstance(id: string, patch: InstancePatch): Promise<Instance | null> {
    const existing = this.instances.get(id);
    if (!existing) return null;
    const updated: Instance = {
      ...existing,
      serialized: patch.serialized ?? existing.serialized,
      raw: patch.raw ?? existing.raw,
      stateId: patch.stateId === undefined ? existing.stateId : patch.stateId,
      updatedAt: new Date(),
    };
    this.instances.set(id, updated);
    return updated;
  }

  async deleteInstance(id: string): Promise<boolean> {
    if (!this.instances.delete(id)) return false;
    this.histories = this.histories.filter((h) => h.instanceId !== id);
    return true;
  }

  async listInstances(contentTypeId: string, page: PageParams): Promise<Page<Instance>> {
    return paginate(
      newestFirst(this.instances.values(), (i) => i.contentTypeId === contentTypeId),
      page,
    );
  }

  async listOrganisationInstances(organisationId: string, page: PageParams): Promise<Page<Instance>> {
    return paginate(
      newestFirst(this.instances.values(), (i) => this.ownedBy(i.contentTypeId, organisationId)),
      page,
    );
  }

  // ── Counters ───────────────────────────────────────────────────

  async nextCounter(subject: string): Promise<number> {
    // Read and write happen in the same synchronous turn.
    const count = (this.counters.get(subject) ?? 0) + 1;
    this.counters.set(subject, count);
    return count;
  }

  // ── Build History ──────────────────────────────────────────────

  async insertBuildHistory(params: NewBuildHistory): Promise<BuildHistory> {
    if (!this.instances.has(params.instanceId)) {
      throw new ConstraintError(`build_histories.instance_id references missing instance ${params.instanceId}`);
    }
    const history: BuildHistory = { id: uuidv4(), ...params, insertedAt: new Date() };
    this.histories.push(history);
    return history;
  }

  async listBuildHistory(instanceId: string): Promise<BuildHistory[]> {
    return newestFirst(this.histories, (h) => h.instanceId === instanceId);
  }

  async latestSuccessfulBuild(instanceId: string): Promise<BuildHistory | null> {
    for (let i = this.histories.length - 1; i >= 0; i--) {
      const h = this.histories[i];
      if (h.instanceId === instanceId && h.exitCode === 0) return h;
    }
    return null;
  }

  // ── Themes ─────────────────────────────────────────────────────

  async createTheme(params: NewTheme): Promise<Theme> {
    const now = new Date();
    const theme: Theme = { id: uuidv4(), ...params, createdAt: now, updatedAt: now };
    this.themes.set(theme.id, theme);
    return theme;
  }

  async getTheme(id: string): Promise<Theme | null> {
    return this.themes.get(id) ?? null;
  }

  async listThemes(organisationId: string, page: PageParams): Promise<Page<Theme>> {
    return paginate(
      newestFirst(this.themes.values(), (t) => t.organisationId === organisationId),
      page,
    );
  }

  async updateTheme(id: string, patch: ThemePatch): Promise<Theme | null> {
    const existing = this.themes.get(id);
    if (!existing) return null;
    const updated: Theme = {
      ...existing,
      name: patch.name ?? existing.name,
      font: patch.font ?? existing.font,
      typescale: patch.typescale ?? existing.typescale,
      file: patch.file === undefined ? existing.file : patch.file,
      updatedAt: new Date(),
    };
    this.themes.set(id, updated);
    return updated;
  }

  async deleteTheme(id: string): Promise<boolean> {
    return this.themes.delete(id);
  }

  // ── Data Templates ─────────────────────────────────────────────

  async createDataTemplate(params: NewDataTemplate): Promise<DataTemplate> {
    if (!this.contentTypes.has(params.contentTypeId)) {
      throw new ConstraintError(
        `data_templates.content_type_id references missing content type ${params.contentTypeId}`,
      );
    }
    const now = new Date();
    const template: DataTemplate = { id: uuidv4(), ...params, createdAt: now, updatedAt: now };
    this.dataTemplates.set(template.id, template);
    return template;
  }

  async getDataTemplate(id: string): Promise<DataTemplate | null> {
    return this.dataTemplates.get(id) ?? null;
  }

  async listDataTemplates(contentTypeId: string, page: PageParams): Promise<Page<DataTemplate>> {
    return paginate(
      newestFirst(this.dataTemplates.values(), (t) => t.contentTypeId === contentTypeId),
      page,
    );
  }

  async listOrganisationDataTemplates(organisationId: string, page: PageParams): Promise<Page<DataTemplate>> {
    return paginate(
      newestFirst(this.dataTemplates.values(), (t) => this.ownedBy(t.contentTypeId, organisationId)),
      page,
    );
  }

  async updateDataTemplate(id: string, patch: DataTemplatePatch): Promise<DataTemplate | null> {
    const existing = this.dataTemplates.get(id);
    if (!existing) return null;
    const updated: DataTemplate = {
      ...existing,
      tag: patch.tag ?? existing.tag,
      data: patch.data ?? existing.data,
      updatedAt: new Date(),
    };
    this.dataTemplates.set(id, updated);
    return updated;
  }

  async deleteDataTemplate(id: string): Promise<boolean> {
    return this.dataTemplates.delete(id);
  }
}
