import { chartRowsSchema, toFieldIssues } from "@shared/schemas";
import type { NoteDetail } from "@shared/types/journal";

import { logger } from "../logger";

import { NotFoundError, persist, ValidationError } from "./errors";
import { chartKind, reconcileChildren, type ReconcileSummary } from "./reconciler";
import type { JournalStore } from "./repositories";

export type NoteService = ReturnType<typeof createNoteService>;

/** Charts pinned to a single note, wherever that note is attached. */
export function createNoteService(store: JournalStore) {
  const log = logger.child({ module: "notes" });

  async function getNote(id: number): Promise<NoteDetail | null> {
    const note = await persist(() => store.notes.findById(id));
    if (!note) return null;

    const charts = await persist(() => store.noteCharts.listAttached(id));
    return { ...note, charts };
  }

  async function replaceNoteCharts(noteId: number, rows: unknown): Promise<ReconcileSummary> {
    const parsed = chartRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error, "charts"));
    }
    if (!(await persist(() => store.notes.findById(noteId)))) {
      throw new NotFoundError("Note", noteId);
    }

    const summary = await persist(() => reconcileChildren(store.noteCharts, noteId, parsed.data, chartKind));
    log.debug({ noteId, inserted: summary.inserted.length, deleted: summary.deleted.length }, "Note charts replaced");
    return summary;
  }

  return { getNote, replaceNoteCharts };
}
