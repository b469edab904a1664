/** A requested record does not exist. */
export class NotFoundError extends Error {
  constructor(entity: string, id: string) {
    super(`${entity} not found: ${id}`);
    this.name = "NotFoundError";
  }
}

/** The request carries no known acting user. */
export class UnauthorizedError extends Error {
  constructor(message = "Unknown or missing user") {
    super(message);
    this.name = "UnauthorizedError";
  }
}

/** A filesystem step of the build failed; `path` names the offending file or directory. */
export class BuildIOError extends Error {
  readonly path: string;

  constructor(message: string, path: string, options?: { cause?: unknown }) {
    super(`${message}: ${path}`, options);
    this.name = "BuildIOError";
    this.path = path;
  }
}

/** An asset could not be turned into a signed URL. */
export class AssetUrlError extends Error {
  readonly assetId: string;

  constructor(assetId: string, reason: string) {
    super(`Cannot resolve URL for asset ${assetId}: ${reason}`);
    this.name = "AssetUrlError";
    this.assetId = assetId;
  }
}

/** A uniqueness or reference rule of the store was violated. */
export class ConstraintError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = "ConstraintError";
  }
}
