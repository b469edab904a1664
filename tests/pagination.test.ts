import { describe, it, expect } from "vitest";
import { PageQuerySchema } from "../src/api/schemas.js";
import { paginate, toPage } from "../src/documents/pagination.js";

describe("paginate", () => {
  const items = ["a", "b", "c", "d", "e"];

  it("slices the requested page and reports totals", () => {
    expect(paginate(items, { page: 2, pageSize: 2 })).toEqual({
      entries: ["c", "d"],
      pageNumber: 2,
      pageSize: 2,
      totalEntries: 5,
      totalPages: 3,
    });
  });

  it("returns an empty page past the end", () => {
    expect(paginate(items, { page: 4, pageSize: 2 }).entries).toEqual([]);
  });

  it("counts zero pages for an empty listing", () => {
    expect(toPage([], 0, { page: 1, pageSize: 10 }).totalPages).toBe(0);
  });
});

describe("PageQuerySchema", () => {
  it("defaults to the first page of ten", () => {
    expect(PageQuerySchema.parse({})).toEqual({ page: 1, pageSize: 10 });
  });

  it("reads query-string numbers and caps the page size", () => {
    expect(PageQuerySchema.parse({ page: "3", pageSize: "500" })).toEqual({ page: 3, pageSize: 100 });
  });

  it("rejects pages below 1 and non-numbers", () => {
    expect(PageQuerySchema.safeParse({ page: "0" }).success).toBe(false);
    expect(PageQuerySchema.safeParse({ pageSize: "many" }).success).toBe(false);
  });
});
