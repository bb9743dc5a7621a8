import { serializeTags } from "@shared/utils/tags";
import type { ChartRowInput, NoteRowInput } from "@shared/schemas";
import type { Chart, Note } from "@shared/types/journal";

import type { ChildCollection } from "./errors";
import type { ChartFields, ChildRepository, NoteFields } from "./repositories";

/**
 * How to read one kind of child row. `normalize` returns null for a row whose
 * required field is blank, which drops it from the proposed set.
 */
export interface ChildKind<TChild extends { id: number }, TRow extends { id?: unknown }, TFields> {
  collection: ChildCollection;
  normalize(row: TRow): TFields | null;
  fieldsOf(child: TChild): TFields;
  equals(a: TFields, b: TFields): boolean;
}

export interface ChildDiff<TFields> {
  toInsert: TFields[];
  toUpdate: Array<{ id: number; fields: TFields }>;
  toKeep: number[];
  toDetach: number[];
}

export interface ReconcileSummary {
  inserted: number[];
  updated: number[];
  kept: number[];
  detached: number[];
  deleted: number[];
}

function trimToNull(value: string | null | undefined): string | null {
  const trimmed = value?.trim() ?? "";
  return trimmed === "" ? null : trimmed;
}

/** Safe integer ids (or their decimal text) only; anything else marks a new row. */
export function parseRowId(raw: unknown): number | null {
  if (typeof raw === "number") {
    return Number.isSafeInteger(raw) ? raw : null;
  }
  if (typeof raw === "string" && /^\s*-?\d+\s*$/.test(raw)) {
    const id = Number(raw.trim());
    return Number.isSafeInteger(id) ? id : null;
  }
  return null;
}

export const noteKind: ChildKind<Note, NoteRowInput, NoteFields> = {
  collection: "notes",
  normalize(row) {
    const body = trimToNull(row.body);
    if (body === null) return null;
    return { title: trimToNull(row.title), body, tags: serializeTags(row.tags ?? null) };
  },
  fieldsOf(note) {
    return { title: note.title, body: note.body, tags: serializeTags(note.tags) };
  },
  equals(a, b) {
    return a.title === b.title && a.body === b.body && a.tags === b.tags;
  },
};

export const chartKind: ChildKind<Chart, ChartRowInput, ChartFields> = {
  collection: "charts",
  normalize(row) {
    const chartUrl = trimToNull(row.chartUrl);
    if (chartUrl === null) return null;
    return { chartUrl, description: trimToNull(row.description) };
  },
  fieldsOf(chart) {
    return { chartUrl: chart.chartUrl, description: chart.description };
  },
  equals(a, b) {
    return a.chartUrl === b.chartUrl && a.description === b.description;
  },
};

/**
 * Partitions a proposed full replacement set against the owner's attached
 * children. Pure; nothing is written.
 */
export function diffChildren<TChild extends { id: number }, TRow extends { id?: unknown }, TFields>(
  existing: readonly TChild[],
  proposed: readonly TRow[],
  kind: ChildKind<TChild, TRow, TFields>
): ChildDiff<TFields> {
  const attached = new Map(existing.map((child) => [child.id, child]));
  const claimed = new Set<number>();
  const diff: ChildDiff<TFields> = { toInsert: [], toUpdate: [], toKeep: [], toDetach: [] };

  for (const row of proposed) {
    const fields = kind.normalize(row);
    if (fields === null) continue;

    const id = parseRowId(row.id);
    const current = id === null || claimed.has(id) ? undefined : attached.get(id);
    if (id === null || current === undefined) {
      diff.toInsert.push(fields);
      continue;
    }

    claimed.add(id);
    if (kind.equals(kind.fieldsOf(current), fields)) {
      diff.toKeep.push(id);
    } else {
      diff.toUpdate.push({ id, fields });
    }
  }

  for (const child of existing) {
    if (!claimed.has(child.id)) {
      diff.toDetach.push(child.id);
    }
  }
  return diff;
}

export function isNoop<TFields>(diff: ChildDiff<TFields>): boolean {
  return diff.toInsert.length === 0 && diff.toUpdate.length === 0 && diff.toDetach.length === 0;
}

/** Unlinks a child and deletes it once no junction row anywhere references it. */
export async function detachChild<TOwner, TChild extends { id: number }, TFields>(
  repo: ChildRepository<TOwner, TChild, TFields>,
  owner: TOwner,
  childId: number
): Promise<boolean> {
  await repo.unlink(owner, childId);
  return collectOrphan(repo, childId);
}

export async function collectOrphan<TOwner, TChild extends { id: number }, TFields>(
  repo: ChildRepository<TOwner, TChild, TFields>,
  childId: number
): Promise<boolean> {
  if ((await repo.countLinks(childId)) > 0) return false;
  await repo.remove(childId);
  return true;
}

/**
 * Writes a diff in order: updates, inserts, detaches. Stops at the first
 * failing write and rethrows it; earlier writes stay.
 */
export async function applyChildDiff<TOwner, TChild extends { id: number }, TFields>(
  repo: ChildRepository<TOwner, TChild, TFields>,
  owner: TOwner,
  diff: ChildDiff<TFields>
): Promise<ReconcileSummary> {
  const summary: ReconcileSummary = {
    inserted: [],
    updated: [],
    kept: [...diff.toKeep],
    detached: [],
    deleted: [],
  };

  for (const { id, fields } of diff.toUpdate) {
    await repo.update(id, fields);
    summary.updated.push(id);
  }

  for (const fields of diff.toInsert) {
    const id = await repo.insert(fields);
    await repo.link(owner, id);
    summary.inserted.push(id);
  }

  for (const id of diff.toDetach) {
    const deleted = await detachChild(repo, owner, id);
    summary.detached.push(id);
    if (deleted) summary.deleted.push(id);
  }

  return summary;
}

export async function reconcileChildren<TOwner, TChild extends { id: number }, TRow extends { id?: unknown }, TFields>(
  repo: ChildRepository<TOwner, TChild, TFields>,
  owner: TOwner,
  proposed: readonly TRow[],
  kind: ChildKind<TChild, TRow, TFields>
): Promise<ReconcileSummary> {
  const existing = await repo.listAttached(owner);
  const diff = diffChildren(existing, proposed, kind);
  return applyChildDiff(repo, owner, diff);
}
