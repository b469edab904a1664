import { describe, it, expect } from "vitest";
import {
  addBuildHistory,
  buildDelay,
  buildHistoryParams,
  buildStatus,
} from "../src/documents/build_history.js";
import { createInstance } from "../src/documents/instances.js";
import { InMemoryDocumentStore } from "../src/documents/store.js";
import { ConstraintError } from "../src/shared/errors.js";
import { seedDocuments } from "./helpers.js";

const T0 = new Date("2024-03-01T10:00:00.000Z");
const T1 = new Date(T0.getTime() + 2500);

describe("buildHistoryParams", () => {
  it("records delay in milliseconds and success for exit code 0", () => {
    const params = buildHistoryParams({ id: "user-1" }, { id: "inst-1" }, {
      startTime: T0,
      endTime: T1,
      exitCode: 0,
    });

    expect(params).toEqual({
      instanceId: "inst-1",
      creatorId: "user-1",
      status: "success",
      exitCode: 0,
      startTime: T0,
      endTime: T1,
      delay: 2500,
    });
  });

  it("marks any non-zero exit code as failed regardless of delay", () => {
    const params = buildHistoryParams({ id: "u" }, { id: "i" }, { startTime: T0, endTime: T1, exitCode: 1 });
    expect(params.status).toBe("failed");
    expect(params.delay).toBe(2500);
    expect(params.exitCode).toBe(1);
  });
});

describe("buildStatus / buildDelay", () => {
  it("classifies exit codes", () => {
    expect(buildStatus(0)).toBe("success");
    expect(buildStatus(1)).toBe("failed");
    expect(buildStatus(127)).toBe("failed");
    expect(buildStatus(-1)).toBe("failed");
  });

  it("subtracts start from end", () => {
    expect(buildDelay(T0, T0)).toBe(0);
    expect(buildDelay(T0, T1)).toBe(2500);
  });
});

describe("addBuildHistory", () => {
  it("appends an entry linked to the instance and user", async () => {
    const store = new InMemoryDocumentStore();
    const { user, contentType } = await seedDocuments(store);
    const instance = await createInstance(store, user, contentType, { serialized: {}, raw: "" });

    const history = await addBuildHistory(store, user, instance, { startTime: T0, endTime: T1, exitCode: 2 });

    expect(history.instanceId).toBe(instance.id);
    expect(history.creatorId).toBe(user.id);
    expect(history.exitCode).toBe(2);
    expect(history.status).toBe("failed");
    expect(await store.listBuildHistory(instance.id)).toEqual([history]);
  });

  it("propagates insertion failures", async () => {
    const store = new InMemoryDocumentStore();
    const { user } = await seedDocuments(store);

    await expect(
      addBuildHistory(store, user, { id: "missing-instance" }, { startTime: T0, endTime: T1, exitCode: 0 }),
    ).rejects.toThrow(ConstraintError);
  });
});
