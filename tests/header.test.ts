import { describe, it, expect } from "vitest";
import {
  assembleHeader,
  fieldLines,
  formatHeaderValue,
  resolveAssetLinks,
  toHeaderUrl,
} from "../src/documents/header.js";
import type { Asset, ContentTypeField } from "../src/documents/types.js";

function field(name: string, position: number): ContentTypeField {
  return { id: `f${position}`, contentTypeId: "ct", name, fieldType: "string", position };
}

function asset(id: string, name: string): Asset {
  return {
    id,
    organisationId: "org",
    name,
    file: `${name}.png`,
    creatorId: "u",
    createdAt: new Date(0),
  };
}

describe("fieldLines", () => {
  const fields = [field("title", 0), field("employee", 1), field("salary", 2), field("department", 3)];

  it("emits only declared fields present in serialized, in declaration order", () => {
    const lines = fieldLines(fields, { salary: 4200, extra: "ignored", employee: "Ada" });
    expect(lines).toEqual(["employee: Ada", "salary: 4200"]);
  });

  it("emits nothing when no declared field is present", () => {
    expect(fieldLines(fields, {})).toEqual([]);
  });

  it("keeps a present key even when its value is empty", () => {
    expect(fieldLines([field("note", 0)], { note: null })).toEqual(["note: "]);
  });
});

describe("formatHeaderValue", () => {
  it("formats scalars and structures", () => {
    expect(formatHeaderValue("text")).toBe("text");
    expect(formatHeaderValue(12.5)).toBe("12.5");
    expect(formatHeaderValue(false)).toBe("false");
    expect(formatHeaderValue(undefined)).toBe("");
    expect(formatHeaderValue(["a", "b"])).toBe('["a","b"]');
    expect(formatHeaderValue({ k: 1 })).toBe('{"k":1}');
  });
});

describe("toHeaderUrl", () => {
  it("drops the single leading slash of a root-relative URL", () => {
    expect(toHeaderUrl("/uploads/assets/a/logo.png?x=1")).toBe("uploads/assets/a/logo.png?x=1");
  });

  it("leaves absolute URLs untouched", () => {
    expect(toHeaderUrl("https://cdn.example.com/logo.png")).toBe("https://cdn.example.com/logo.png");
  });
});

describe("resolveAssetLinks", () => {
  it("keeps association order and strips the leading slash", () => {
    const links = resolveAssetLinks([asset("a1", "logo"), asset("a2", "seal")], (a) => `/files/${a.id}`);
    expect(links).toEqual([
      { name: "logo", url: "files/a1" },
      { name: "seal", url: "files/a2" },
    ]);
  });

  it("propagates resolver failures", () => {
    expect(() =>
      resolveAssetLinks([asset("a1", "logo")], () => {
        throw new Error("storage offline");
      }),
    ).toThrow("storage offline");
  });
});

describe("assembleHeader", () => {
  it("orders fields, assets, qrcode and path between sentinels", () => {
    const header = assembleHeader({
      fields: [field("employee", 0), field("position", 1), field("salary", 2)],
      serialized: { salary: 5000, employee: "Ada Lovelace" },
      assets: [{ name: "logo", url: "uploads/assets/a1/logo.png" }],
      qrPath: "uploads/contents/OFF0001/qr.png",
      workDir: "uploads/contents/OFF0001",
    });

    expect(header).toBe(
      [
        "---",
        "employee: Ada Lovelace",
        "salary: 5000",
        "logo: uploads/assets/a1/logo.png",
        "qrcode: uploads/contents/OFF0001/qr.png",
        "path: uploads/contents/OFF0001",
        "---",
        "",
      ].join("\n"),
    );
  });

  it("still emits qrcode and path with no fields or assets", () => {
    const header = assembleHeader({
      fields: [],
      serialized: {},
      assets: [],
      qrPath: "q.png",
      workDir: "w",
    });
    expect(header).toBe("---\nqrcode: q.png\npath: w\n---\n");
  });
});
