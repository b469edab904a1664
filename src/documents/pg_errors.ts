import { ConstraintError } from "../shared/errors.js";

/** SQLSTATE codes PostgreSQL reports for integrity violations. */
export const UNIQUE_VIOLATION = "23505";
export const FOREIGN_KEY_VIOLATION = "23503";

interface PgErrorFields {
  code: string;
  message: string;
  detail?: string;
}

function pgFields(err: unknown): PgErrorFields | null {
  if (!(err instanceof Error) || !("code" in err) || typeof err.code !== "string") return null;
  const detail = "detail" in err && typeof err.detail === "string" ? err.detail : undefined;
  return { code: err.code, message: err.message, detail };
}

/**
 * The pg error behind `err`, looking one level into `cause` for errors a
 * query builder wrapped.
 */
function findPgError(err: unknown): PgErrorFields | null {
  const direct = pgFields(err);
  if (direct) return direct;
  return err instanceof Error ? pgFields(err.cause) : null;
}

/**
 * Map integrity violations to ConstraintError; anything else is returned
 * unchanged for the caller to rethrow.
 */
export function toStoreError(err: unknown): unknown {
  const pgErr = findPgError(err);
  if (!pgErr) return err;
  if (pgErr.code === UNIQUE_VIOLATION || pgErr.code === FOREIGN_KEY_VIOLATION) {
    return new ConstraintError(pgErr.detail ?? pgErr.message, { cause: err });
  }
  return err;
}

/** Run a store write, translating integrity violations. */
export async function translateErrors<T>(work: () => Promise<T>): Promise<T> {
  try {
    return await work();
  } catch (err) {
    throw toStoreError(err);
  }
}
