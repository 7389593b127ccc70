/**
 * Raised when a module id or gene symbol is referenced that the loaded
 * tables do not contain. Treated as fatal: scoring against a missing
 * table would produce a silently wrong result.
 */
export class NotFoundError extends Error {
  readonly entity: "module" | "gene";
  readonly key: string;

  constructor(entity: "module" | "gene", key: string | number) {
    super(`${entity} not found: ${key}`);
    this.name = "NotFoundError";
    this.entity = entity;
    this.key = String(key);
  }
}

/** Raised while building the provider from tables that break an invariant. */
export class DataIntegrityError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "DataIntegrityError";
  }
}

export class SnapshotFormatError extends Error {
  readonly issues: string[];

  constructor(source: string, issues: string[]) {
    super(`invalid snapshot (${source}): ${issues.slice(0, 5).join("; ")}`);
    this.name = "SnapshotFormatError";
    this.issues = issues;
  }
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof Error) return error.message;
  if (typeof error === "string") return error;
  return "unknown error";
}
