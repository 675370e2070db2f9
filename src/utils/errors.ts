export class CatalogError extends Error {
  public readonly status: number;
  public readonly path?: string;

  constructor(message: string, status: number, path?: string) {
    super(message);
    this.name = "CatalogError";
    this.status = status;
    this.path = path;
  }
}

export class AccessDeniedError extends CatalogError {
  constructor(path: string, reason = "Access denied") {
    super(reason, 403, path);
    this.name = "AccessDeniedError";
  }
}

export class NotFoundError extends CatalogError {
  constructor(path: string, what = "Not found") {
    super(what, 404, path);
    this.name = "NotFoundError";
  }
}

export class InvalidRequestError extends CatalogError {
  constructor(message: string, path?: string) {
    super(message, 400, path);
    this.name = "InvalidRequestError";
  }
}

export function toError(e: unknown): Error {
  return e instanceof Error ? e : new Error(String(e));
}

/** True when a filesystem error says the path is gone */
export function isMissingFileError(e: unknown): boolean {
  if (typeof e !== "object" || e === null || !("code" in e)) return false;
  return e.code === "ENOENT" || e.code === "ENOTDIR";
}
