import type { FieldIssue } from "@shared/schemas";

export type ChildCollection = "notes" | "charts";

/** Base for every error the journal services raise on purpose. */
export class JournalError extends Error {
  readonly status: number;
  readonly code: string;

  constructor(message: string, status: number, code: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = new.target.name;
    this.status = status;
    this.code = code;
  }
}

export class ValidationError extends JournalError {
  readonly issues: FieldIssue[];

  constructor(issues: FieldIssue[]) {
    const summary = issues.map((issue) => `${issue.field}: ${issue.message}`).join("; ");
    super(summary ? `Invalid input (${summary})` : "Invalid input", 400, "VALIDATION_ERROR");
    this.issues = issues;
  }

  static single(field: string, message: string): ValidationError {
    return new ValidationError([{ field, message }]);
  }
}

export class NotFoundError extends JournalError {
  readonly entity: string;
  readonly entityId: number;

  constructor(entity: string, id: number) {
    super(`${entity} ${id} not found`, 404, "NOT_FOUND");
    this.entity = entity;
    this.entityId = id;
  }
}

export class PersistenceError extends JournalError {
  constructor(cause: unknown, code = "PERSISTENCE_ERROR") {
    super(cause instanceof Error ? cause.message : String(cause), 500, code, { cause });
  }
}

/**
 * The owner row is already committed; only its child collection failed.
 * Re-submitting the same form converges, since the reconciler is idempotent.
 */
export class ChildSyncError extends PersistenceError {
  readonly ownerCommitted = true as const;
  readonly ownerId: number;
  readonly collection: ChildCollection;

  constructor(ownerId: number, collection: ChildCollection, cause: unknown) {
    super(cause, "CHILD_SYNC_FAILED");
    this.ownerId = ownerId;
    this.collection = collection;
  }
}

/** Runs a repository call, wrapping driver failures without retrying. */
export async function persist<T>(operation: () => Promise<T>): Promise<T> {
  try {
    return await operation();
  } catch (err) {
    if (err instanceof JournalError) throw err;
    throw new PersistenceError(err);
  }
}
