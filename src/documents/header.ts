/**
 * Front-matter header for the renderer.
 *
 *   ---
 *   <field>: <value>      declared fields present in serialized, declaration order
 *   <asset>: <url>        layout assets, association order
 *   qrcode: <path>
 *   path: <workspace>
 *   ---
 */

import type { Asset, ContentTypeField, SerializedValues } from "./types.js";

export const HEADER_SENTINEL = "---";

export interface AssetLink {
  name: string;
  url: string;
}

export interface HeaderInput {
  fields: ContentTypeField[];
  serialized: SerializedValues;
  assets: AssetLink[];
  qrPath: string;
  workDir: string;
}

/** Text form of a serialized value; strings verbatim, everything else as JSON. */
export function formatHeaderValue(value: unknown): string {
  if (typeof value === "string") return value;
  if (value === null || value === undefined) return "";
  if (typeof value === "number" || typeof value === "boolean") return String(value);
  return JSON.stringify(value);
}

/**
 * Drop the leading "/" of a root-relative URL so the renderer resolves it
 * against the working directory. Absolute URLs pass through unchanged.
 */
export function toHeaderUrl(url: string): string {
  return url.startsWith("/") ? url.slice(1) : url;
}

/** Resolve each asset to a header link. A resolver failure propagates. */
export function resolveAssetLinks(
  assets: Asset[],
  resolveUrl: (asset: Asset) => string,
): AssetLink[] {
  return assets.map((asset) => ({ name: asset.name, url: toHeaderUrl(resolveUrl(asset)) }));
}

/** Field lines only; missing values are skipped. */
export function fieldLines(fields: ContentTypeField[], serialized: SerializedValues): string[] {
  const lines: string[] = [];
  for (const field of fields) {
    if (!Object.prototype.hasOwnProperty.call(serialized, field.name)) continue;
    lines.push(`${field.name}: ${formatHeaderValue(serialized[field.name])}`);
  }
  return lines;
}

export function assembleHeader(input: HeaderInput): string {
  const lines = [
    HEADER_SENTINEL,
    ...fieldLines(input.fields, input.serialized),
    ...input.assets.map((a) => `${a.name}: ${a.url}`),
    `qrcode: ${input.qrPath}`,
    `path: ${input.workDir}`,
    HEADER_SENTINEL,
  ];
  return lines.join("\n") + "\n";
}
