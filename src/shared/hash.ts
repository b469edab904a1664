import { createHash } from "crypto";
import { readFile } from "fs/promises";

/** SHA-256 hash of raw bytes (Buffer). */
export function sha256Bytes(data: Buffer): string {
  return createHash("sha256").update(data).digest("hex");
}

/** SHA-256 of a file's content, or null when the file does not exist. */
export async function sha256File(filePath: string): Promise<string | null> {
  try {
    return sha256Bytes(await readFile(filePath));
  } catch (err) {
    if (err instanceof Error && "code" in err && err.code === "ENOENT") return null;
    throw err;
  }
}
