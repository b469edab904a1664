/**
 * Signed, time-limited asset URLs.
 *
 * URLs are root-relative: /uploads/assets/<assetId>/<file>?expires=<unix>&signature=<hex>
 * The signature is HMAC-SHA256 over "<pathname>:<expires>".
 */

import { createHmac, timingSafeEqual } from "crypto";
import path from "path";
import { AssetUrlError } from "../shared/errors.js";
import type { Asset } from "./types.js";

export interface AssetUrlOptions {
  secret: string;
  ttlSeconds: number;
  now?: Date;
}

export function assetPathname(asset: Pick<Asset, "id" | "file">): string {
  const fileName = path.basename(asset.file);
  if (fileName === "" || fileName === "." || fileName === "..") {
    throw new AssetUrlError(asset.id, `invalid stored file "${asset.file}"`);
  }
  return `/uploads/assets/${asset.id}/${encodeURIComponent(fileName)}`;
}

function sign(secret: string, pathname: string, expires: number): string {
  return createHmac("sha256", secret).update(`${pathname}:${expires}`).digest("hex");
}

export function signAssetUrl(asset: Pick<Asset, "id" | "file">, options: AssetUrlOptions): string {
  if (!options.secret) {
    throw new AssetUrlError(asset.id, "no signing secret configured");
  }
  const pathname = assetPathname(asset);
  const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
  const expires = nowSeconds + options.ttlSeconds;
  const signature = sign(options.secret, pathname, expires);
  return `${pathname}?expires=${expires}&signature=${signature}`;
}

export type AssetUrlCheck = "valid" | "expired" | "invalid";

export function verifyAssetUrl(
  pathname: string,
  expires: string | undefined,
  signature: string | undefined,
  options: Omit<AssetUrlOptions, "ttlSeconds">,
): AssetUrlCheck {
  if (!expires || !signature || !/^\d+$/.test(expires) || !/^[a-f0-9]{64}$/.test(signature)) {
    return "invalid";
  }
  const expected = Buffer.from(sign(options.secret, pathname, Number(expires)), "hex");
  const given = Buffer.from(signature, "hex");
  if (!timingSafeEqual(expected, given)) return "invalid";

  const nowSeconds = Math.floor((options.now ?? new Date()).getTime() / 1000);
  return Number(expires) < nowSeconds ? "expired" : "valid";
}
