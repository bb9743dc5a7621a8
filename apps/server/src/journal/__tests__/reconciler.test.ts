import type { Note } from "@shared/types/journal";
import { describe, it, expect, beforeEach } from "vitest";

import { MemoryJournalStore } from "../../../../../test/fakes/memoryJournalStore";
import { chartKind, diffChildren, isNoop, noteKind, parseRowId, reconcileChildren } from "../reconciler";

function note(id: number, body: string, extra: Partial<Note> = {}): Note {
  return { id, title: null, body, tags: [], createdAt: null, ...extra };
}

describe("parseRowId", () => {
  it("accepts integers and integer text only", () => {
    expect(parseRowId(4)).toBe(4);
    expect(parseRowId(" 12 ")).toBe(12);
    expect(parseRowId(1.5)).toBeNull();
    expect(parseRowId("1.5")).toBeNull();
    expect(parseRowId("abc")).toBeNull();
    expect(parseRowId(null)).toBeNull();
    expect(parseRowId(undefined)).toBeNull();
  });

  it("rejects ids past the safe integer range", () => {
    expect(parseRowId(Number.MAX_SAFE_INTEGER)).toBe(Number.MAX_SAFE_INTEGER);
    expect(parseRowId("9007199254740991")).toBe(9007199254740991);
    expect(parseRowId("9007199254740993")).toBeNull();
    expect(parseRowId(2 ** 53)).toBeNull();
  });

  it("never matches a rounded text id to an attached child", () => {
    const diff = diffChildren([note(9007199254740992, "a")], [{ id: "9007199254740993", body: "a" }], noteKind);

    expect(diff.toKeep).toEqual([]);
    expect(diff.toInsert).toEqual([{ title: null, body: "a", tags: null }]);
  });
});

describe("diffChildren", () => {
  it("partitions updates, inserts and detaches", () => {
    const diff = diffChildren([note(1, "a"), note(2, "b")], [{ id: 1, body: "a2" }, { body: "c" }], noteKind);

    expect(diff.toUpdate).toEqual([{ id: 1, fields: { title: null, body: "a2", tags: null } }]);
    expect(diff.toInsert).toEqual([{ title: null, body: "c", tags: null }]);
    expect(diff.toKeep).toEqual([]);
    expect(diff.toDetach).toEqual([2]);
  });

  it("inserts rows carrying ids the owner does not have", () => {
    const diff = diffChildren([note(1, "a")], [{ id: 99, body: "a" }], noteKind);

    expect(diff.toUpdate).toEqual([]);
    expect(diff.toInsert).toEqual([{ title: null, body: "a", tags: null }]);
    expect(diff.toDetach).toEqual([1]);
  });

  it("matches stringly ids and treats a repeated id as a new row", () => {
    const diff = diffChildren([note(1, "a")], [{ id: "1", body: "a" }, { id: 1, body: "copy" }], noteKind);

    expect(diff.toKeep).toEqual([1]);
    expect(diff.toInsert).toEqual([{ title: null, body: "copy", tags: null }]);
    expect(diff.toDetach).toEqual([]);
  });

  it("drops blank rows, which detaches the child they pointed at", () => {
    const diff = diffChildren([note(1, "a")], [{ id: 1, body: "   " }, { body: "" }], noteKind);

    expect(diff.toInsert).toEqual([]);
    expect(diff.toKeep).toEqual([]);
    expect(diff.toDetach).toEqual([1]);
  });

  it("compares normalized values, so cosmetic differences are not updates", () => {
    const existing = [note(1, "Entry", { title: "Plan", tags: ["a", "b"] })];
    const diff = diffChildren(existing, [{ id: 1, title: " Plan ", body: "Entry  ", tags: " a ,b, a" }], noteKind);

    expect(diff.toKeep).toEqual([1]);
    expect(isNoop(diff)).toBe(true);
  });

  it("treats tag order as significant", () => {
    const existing = [note(1, "Entry", { tags: ["a", "b"] })];
    const diff = diffChildren(existing, [{ id: 1, body: "Entry", tags: ["b", "a"] }], noteKind);

    expect(diff.toUpdate).toEqual([{ id: 1, fields: { title: null, body: "Entry", tags: "b, a" } }]);
  });

  it("diffs charts on url and caption", () => {
    const existing = [{ id: 5, chartUrl: "https://example.com/1.png", description: null, createdAt: null }];
    const diff = diffChildren(
      existing,
      [
        { id: 5, chartUrl: "https://example.com/1.png", description: "HTF" },
        { chartUrl: "  " },
      ],
      chartKind
    );

    expect(diff.toUpdate).toEqual([{ id: 5, fields: { chartUrl: "https://example.com/1.png", description: "HTF" } }]);
    expect(diff.toInsert).toEqual([]);
  });
});

describe("reconcileChildren", () => {
  let store: MemoryJournalStore;

  beforeEach(() => {
    store = new MemoryJournalStore();
  });

  it("makes the attached set equal the proposed rows", async () => {
    const summary = await reconcileChildren(store.tradeNotes, 1, [{ body: "a" }, { body: "b", tags: ["x"] }], noteKind);

    expect(summary.inserted).toHaveLength(2);
    const attached = await store.tradeNotes.listAttached(1);
    expect(attached.map((n) => [n.body, n.tags])).toEqual([
      ["a", []],
      ["b", ["x"]],
    ]);
  });

  it("writes nothing when the same rows are submitted again", async () => {
    await reconcileChildren(store.tradeNotes, 1, [{ body: "a" }, { body: "b" }], noteKind);
    const rows = (await store.tradeNotes.listAttached(1)).map(({ id, title, body, tags }) => ({ id, title, body, tags }));

    store.resetWrites();
    const first = await reconcileChildren(store.tradeNotes, 1, rows, noteKind);
    const second = await reconcileChildren(store.tradeNotes, 1, rows, noteKind);

    expect(store.writes).toEqual([]);
    expect(first.kept).toEqual(rows.map((row) => row.id));
    expect(second.kept).toEqual(rows.map((row) => row.id));
  });

  it("keeps a detached note that another owner still links", async () => {
    const { inserted } = await reconcileChildren(store.tradeNotes, 1, [{ body: "shared" }], noteKind);
    const noteId = inserted[0] ?? 0;
    store.attachTradeNote(2, noteId);

    const first = await reconcileChildren(store.tradeNotes, 1, [], noteKind);
    expect(first.detached).toEqual([noteId]);
    expect(first.deleted).toEqual([]);
    expect(store.noteRows.has(noteId)).toBe(true);

    const second = await reconcileChildren(store.tradeNotes, 2, [], noteKind);
    expect(second.deleted).toEqual([noteId]);
    expect(store.noteRows.has(noteId)).toBe(false);
  });

  it("deletes a detached note even when it carries charts", async () => {
    const { inserted } = await reconcileChildren(store.tradeNotes, 1, [{ body: "annotated" }], noteKind);
    const noteId = inserted[0] ?? 0;
    const charts = await reconcileChildren(store.noteCharts, noteId, [{ chartUrl: "https://example.com/n.png" }], chartKind);
    const chartId = charts.inserted[0] ?? 0;

    expect(await store.tradeNotes.countLinks(noteId)).toBe(1);
    const summary = await reconcileChildren(store.tradeNotes, 1, [], noteKind);

    expect(summary.deleted).toEqual([noteId]);
    expect(store.noteRows.has(noteId)).toBe(false);
    expect(store.chartRows.has(chartId)).toBe(false);
    expect(store.noteChartLinks).toEqual([]);
  });

  it("keeps a note's chart that a trade also links", async () => {
    const { inserted } = await reconcileChildren(store.tradeNotes, 1, [{ body: "annotated" }], noteKind);
    const noteId = inserted[0] ?? 0;
    const charts = await reconcileChildren(store.noteCharts, noteId, [{ chartUrl: "https://example.com/n.png" }], chartKind);
    const chartId = charts.inserted[0] ?? 0;
    await store.tradeCharts.link(1, chartId);

    await reconcileChildren(store.tradeNotes, 1, [], noteKind);

    expect(store.noteRows.has(noteId)).toBe(false);
    expect(store.chartRows.has(chartId)).toBe(true);
    expect((await store.tradeCharts.listAttached(1)).map((c) => c.id)).toEqual([chartId]);
  });

  it("stops at the first failing write and keeps what was written", async () => {
    await reconcileChildren(store.tradeNotes, 1, [{ body: "old" }], noteKind);
    const [existing] = await store.tradeNotes.listAttached(1);
    store.failOn("tradeNotes.insert", new Error("disk full"));

    await expect(
      reconcileChildren(store.tradeNotes, 1, [{ id: existing?.id, body: "edited" }, { body: "new" }], noteKind)
    ).rejects.toThrow("disk full");

    const attached = await store.tradeNotes.listAttached(1);
    expect(attached.map((n) => n.body)).toEqual(["edited"]);
  });
});
