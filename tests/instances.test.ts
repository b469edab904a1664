import { describe, it, expect, beforeEach } from "vitest";
import {
  counterSubject,
  createInstance,
  deleteInstance,
  formatSequenceCode,
  showInstance,
  updateInstance,
} from "../src/documents/instances.js";
import { InMemoryDocumentStore } from "../src/documents/store.js";
import type { ContentType, User } from "../src/documents/types.js";
import { NotFoundError } from "../src/shared/errors.js";
import { ORG_ID, seedDocuments } from "./helpers.js";

const T0 = new Date("2024-03-01T10:00:00.000Z");

describe("formatSequenceCode", () => {
  it("zero-pads the count to four digits", () => {
    expect(formatSequenceCode("OFF", 1)).toBe("OFF0001");
    expect(formatSequenceCode("OFF", 42)).toBe("OFF0042");
    expect(formatSequenceCode("OFF", 9999)).toBe("OFF9999");
  });

  it("keeps counts wider than four digits whole", () => {
    expect(formatSequenceCode("OFF", 12345)).toBe("OFF12345");
  });

  it("keys counters by content type", () => {
    expect(counterSubject("abc")).toBe("ContentType:abc");
  });
});

describe("createInstance", () => {
  let store: InMemoryDocumentStore;
  let user: User;
  let contentType: ContentType;

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    ({ user, contentType } = await seedDocuments(store));
  });

  it("assigns sequential codes under one content type", async () => {
    const codes: string[] = [];
    for (let i = 0; i < 3; i++) {
      const instance = await createInstance(store, user, contentType, { serialized: {}, raw: `doc ${i}` });
      codes.push(instance.instanceCode);
    }
    expect(codes).toEqual(["OFF0001", "OFF0002", "OFF0003"]);
  });

  it("counts each content type separately", async () => {
    const invoices = await store.createContentType({
      organisationId: ORG_ID,
      name: "Invoice",
      prefix: "INV",
      layoutId: contentType.layoutId,
      creatorId: user.id,
      fields: [],
    });

    await createInstance(store, user, contentType, { serialized: {}, raw: "" });
    const invoice = await createInstance(store, user, invoices, { serialized: {}, raw: "" });

    expect(invoice.instanceCode).toBe("INV0001");
  });

  it("never hands out the same code to concurrent creations", async () => {
    const created = await Promise.all(
      Array.from({ length: 25 }, (_, i) =>
        createInstance(store, user, contentType, { serialized: {}, raw: `doc ${i}` }),
      ),
    );

    const codes = created.map((i) => i.instanceCode).sort();
    expect(new Set(codes).size).toBe(25);
    expect(codes[0]).toBe("OFF0001");
    expect(codes[24]).toBe("OFF0025");
  });

  it("stores fields, body, state and creator", async () => {
    const instance = await createInstance(store, user, contentType, {
      serialized: { employee: "Ada" },
      raw: "Welcome aboard.",
    });

    expect(instance.serialized).toEqual({ employee: "Ada" });
    expect(instance.raw).toBe("Welcome aboard.");
    expect(instance.stateId).toBeNull();
    expect(instance.creatorId).toBe(user.id);
    expect(instance.contentType.id).toBe(contentType.id);
  });
});

describe("showInstance", () => {
  let store: InMemoryDocumentStore;
  let user: User;
  let contentType: ContentType;

  beforeEach(async () => {
    store = new InMemoryDocumentStore();
    ({ user, contentType } = await seedDocuments(store));
  });

  it("returns null for an unknown instance", async () => {
    expect(await showInstance(store, "missing")).toBeNull();
  });

  it("exposes the build path only after a successful build", async () => {
    const instance = await createInstance(store, user, contentType, { serialized: {}, raw: "" });

    const before = await showInstance(store, instance.id);
    expect(before).not.toBeNull();
    expect(before).not.toHaveProperty("build");

    await store.insertBuildHistory({
      instanceId: instance.id,
      creatorId: user.id,
      status: "failed",
      exitCode: 1,
      startTime: T0,
      endTime: T0,
      delay: 0,
    });
    expect(await showInstance(store, instance.id)).not.toHaveProperty("build");

    await store.insertBuildHistory({
      instanceId: instance.id,
      creatorId: user.id,
      status: "success",
      exitCode: 0,
      startTime: T0,
      endTime: T0,
      delay: 0,
    });
    const after = await showInstance(store, instance.id);
    expect(after?.build).toBe("uploads/contents/OFF0001/final.pdf");
  });
});

describe("updateInstance / deleteInstance", () => {
  it("updates the body and keeps the code", async () => {
    const store = new InMemoryDocumentStore();
    const { user, contentType } = await seedDocuments(store);
    const instance = await createInstance(store, user, contentType, { serialized: { employee: "Ada" }, raw: "v1" });

    const updated = await updateInstance(store, instance.id, { raw: "v2" });

    expect(updated.raw).toBe("v2");
    expect(updated.serialized).toEqual({ employee: "Ada" });
    expect(updated.instanceCode).toBe("OFF0001");
  });

  it("rejects unknown instances", async () => {
    const store = new InMemoryDocumentStore();
    await expect(updateInstance(store, "missing", { raw: "x" })).rejects.toThrow(NotFoundError);
    await expect(deleteInstance(store, "missing")).rejects.toThrow(NotFoundError);
  });

  it("removes build history with the instance", async () => {
    const store = new InMemoryDocumentStore();
    const { user, contentType } = await seedDocuments(store);
    const instance = await createInstance(store, user, contentType, { serialized: {}, raw: "" });
    await store.insertBuildHistory({
      instanceId: instance.id,
      creatorId: user.id,
      status: "success",
      exitCode: 0,
      startTime: T0,
      endTime: T0,
      delay: 0,
    });

    await deleteInstance(store, instance.id);

    expect(await store.getInstance(instance.id)).toBeNull();
    expect(await store.listBuildHistory(instance.id)).toEqual([]);
  });
});
