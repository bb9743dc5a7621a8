import { and, asc, count, desc, eq, getTableColumns, gte, lte, sql, type SQL } from "drizzle-orm";
import type { AnyPgColumn } from "drizzle-orm/pg-core";
import type { AnalysisFilters, TradeFilters, TradeOrderColumn } from "@shared/schemas";
import type { Chart, Estimation, Note, Trade } from "@shared/types/journal";
import { parseTags } from "@shared/utils/tags";

import type { Database } from "../db";
import {
  accounts,
  analyses,
  analysisCharts,
  analysisNotes,
  charts,
  noteCharts,
  notes,
  setupCharts,
  setups,
  tradeCharts,
  tradeNotes,
  trades,
  type AnalysisRow,
  type ChartRow,
  type NoteRow,
  type TradeRow,
} from "../db/schema";

import type { ChartFields, JournalStore, NoteFields, TradeRecord } from "./repositories";

const TRADE_ORDER: Record<TradeOrderColumn, AnyPgColumn> = {
  id: trades.id,
  dateLocal: trades.dateLocal,
  timeLocal: trades.timeLocal,
  accountId: trades.accountId,
  setupId: trades.setupId,
  analysisId: trades.analysisId,
  asset: trades.asset,
  state: trades.state,
  result: trades.result,
  session: trades.session,
  netPnl: trades.netPnl,
  riskReward: trades.riskReward,
  rewardPercent: trades.rewardPercent,
};

function toEstimation(value: number | null): Estimation | null {
  return value === 0 || value === 1 ? value : null;
}

function toTrade(row: TradeRow): Trade {
  return {
    ...row,
    estimation: toEstimation(row.estimation),
    emotionalProblems: row.emotionalProblems ?? [],
  };
}

function toNote(row: NoteRow): Note {
  return { ...row, tags: parseTags(row.tags) };
}

function toChart(row: ChartRow): Chart {
  return row;
}

function toTradeValues(record: TradeRecord): typeof trades.$inferInsert {
  // Empty selections are stored as NULL
  return {
    ...record,
    emotionalProblems: record.emotionalProblems.length > 0 ? record.emotionalProblems : null,
  };
}

function firstId(rows: Array<{ id: number }>, table: string): number {
  const row = rows[0];
  if (!row) {
    throw new Error(`Insert into ${table} returned no id`);
  }
  return row.id;
}

async function sumCounts(queries: Array<PromiseLike<Array<{ value: number }>>>): Promise<number> {
  const results = await Promise.all(queries);
  return results.reduce((total, rows) => total + (rows[0]?.value ?? 0), 0);
}

export function createDrizzleStore(db: Database): JournalStore {
  const noteColumns = getTableColumns(notes);
  const chartColumns = getTableColumns(charts);

  const chartTable = {
    async insert(fields: ChartFields): Promise<number> {
      const rows = await db.insert(charts).values(fields).returning({ id: charts.id });
      return firstId(rows, "charts");
    },
    async update(childId: number, fields: ChartFields): Promise<void> {
      await db.update(charts).set(fields).where(eq(charts.id, childId));
    },
    async countLinks(childId: number): Promise<number> {
      return sumCounts([
        db.select({ value: count() }).from(tradeCharts).where(eq(tradeCharts.chartId, childId)),
        db.select({ value: count() }).from(analysisCharts).where(eq(analysisCharts.chartId, childId)),
        db.select({ value: count() }).from(setupCharts).where(eq(setupCharts.chartId, childId)),
        db.select({ value: count() }).from(noteCharts).where(eq(noteCharts.chartId, childId)),
      ]);
    },
    async remove(childId: number): Promise<void> {
      await db.delete(charts).where(eq(charts.id, childId));
    },
  };

  const noteTable = {
    async insert(fields: NoteFields): Promise<number> {
      const rows = await db.insert(notes).values(fields).returning({ id: notes.id });
      return firstId(rows, "notes");
    },
    async update(childId: number, fields: NoteFields): Promise<void> {
      await db.update(notes).set(fields).where(eq(notes.id, childId));
    },
    // note_charts hangs off the note; it does not keep the note alive
    async countLinks(childId: number): Promise<number> {
      return sumCounts([
        db.select({ value: count() }).from(tradeNotes).where(eq(tradeNotes.noteId, childId)),
        db.select({ value: count() }).from(analysisNotes).where(eq(analysisNotes.noteId, childId)),
      ]);
    },
    async remove(childId: number): Promise<void> {
      const attached = await db
        .select({ chartId: noteCharts.chartId })
        .from(noteCharts)
        .where(eq(noteCharts.noteId, childId));
      await db.delete(notes).where(eq(notes.id, childId));

      for (const { chartId } of attached) {
        if ((await chartTable.countLinks(chartId)) === 0) {
          await chartTable.remove(chartId);
        }
      }
    },
  };

  return {
    trades: {
      async findById(id) {
        const rows = await db.select().from(trades).where(eq(trades.id, id)).limit(1);
        const row = rows[0];
        return row ? toTrade(row) : null;
      },

      async list(filters: TradeFilters) {
        const conditions: SQL[] = [];
        if (filters.accountId != null) conditions.push(eq(trades.accountId, filters.accountId));
        if (filters.setupId != null) conditions.push(eq(trades.setupId, filters.setupId));
        if (filters.analysisId != null) conditions.push(eq(trades.analysisId, filters.analysisId));
        if (filters.asset != null) conditions.push(eq(trades.asset, filters.asset));
        if (filters.state != null) conditions.push(eq(trades.state, filters.state));
        if (filters.result != null) conditions.push(eq(trades.result, filters.result));
        if (filters.session != null) conditions.push(eq(trades.session, filters.session));
        if (filters.dateFrom) conditions.push(gte(trades.dateLocal, filters.dateFrom));
        if (filters.dateTo) conditions.push(lte(trades.dateLocal, filters.dateTo));

        const direction = filters.direction === "desc" ? desc : asc;
        const ordering = filters.orderBy
          ? [direction(TRADE_ORDER[filters.orderBy]), asc(trades.id)]
          : [asc(trades.dateLocal), asc(trades.id)];

        const rows = await db
          .select()
          .from(trades)
          .where(and(...conditions))
          .orderBy(...ordering);
        return rows.map(toTrade);
      },

      async insert(record) {
        const rows = await db.insert(trades).values(toTradeValues(record)).returning({ id: trades.id });
        return firstId(rows, "trades");
      },

      async update(id, record) {
        await db.update(trades).set(toTradeValues(record)).where(eq(trades.id, id));
      },

      async remove(id) {
        const rows = await db.delete(trades).where(eq(trades.id, id)).returning({ id: trades.id });
        return rows.length > 0;
      },
    },

    analyses: {
      async findById(id) {
        const rows = await db.select().from(analyses).where(eq(analyses.id, id)).limit(1);
        return rows[0] ?? null;
      },

      async list(filters: AnalysisFilters) {
        const conditions: SQL[] = [];
        if (filters.asset != null) conditions.push(eq(analyses.asset, filters.asset));
        if (filters.dateFrom) conditions.push(gte(analyses.dateLocal, filters.dateFrom));
        if (filters.dateTo) conditions.push(lte(analyses.dateLocal, filters.dateTo));

        const rows: AnalysisRow[] = await db
          .select()
          .from(analyses)
          .where(and(...conditions))
          .orderBy(desc(analyses.dateLocal), desc(analyses.timeLocal), desc(analyses.id));
        return rows;
      },

      async insert(record) {
        const rows = await db.insert(analyses).values(record).returning({ id: analyses.id });
        return firstId(rows, "analyses");
      },

      async update(id, record) {
        const { createdAtUtc: _createdAt, ...values } = record;
        await db.update(analyses).set(values).where(eq(analyses.id, id));
      },

      async remove(id) {
        const rows = await db.delete(analyses).where(eq(analyses.id, id)).returning({ id: analyses.id });
        return rows.length > 0;
      },
    },

    references: {
      async accountExists(id) {
        const rows = await db.select({ id: accounts.id }).from(accounts).where(eq(accounts.id, id)).limit(1);
        return rows.length > 0;
      },
      async setupExists(id) {
        const rows = await db.select({ id: setups.id }).from(setups).where(eq(setups.id, id)).limit(1);
        return rows.length > 0;
      },
      async listAccounts() {
        return db.select().from(accounts).where(eq(accounts.archived, false)).orderBy(asc(accounts.id));
      },
      async insertAccount(account) {
        const rows = await db.insert(accounts).values(account).returning();
        const row = rows[0];
        if (!row) throw new Error("Insert into accounts returned no row");
        return row;
      },
      async listSetups() {
        return db.select().from(setups).orderBy(asc(setups.name));
      },
      async findSetupById(id) {
        const rows = await db.select().from(setups).where(eq(setups.id, id)).limit(1);
        return rows[0] ?? null;
      },
      async findSetupByName(name) {
        const rows = await db.select().from(setups).where(eq(setups.name, name)).limit(1);
        return rows[0] ?? null;
      },
      async insertSetup(setup) {
        const rows = await db.insert(setups).values(setup).returning();
        const row = rows[0];
        if (!row) throw new Error("Insert into setups returned no row");
        return row;
      },
    },

    tradeNotes: {
      ...noteTable,
      async listAttached(tradeId) {
        const rows = await db
          .select(noteColumns)
          .from(notes)
          .innerJoin(tradeNotes, eq(tradeNotes.noteId, notes.id))
          .where(eq(tradeNotes.tradeId, tradeId))
          .orderBy(asc(notes.id));
        return rows.map(toNote);
      },
      async link(tradeId, noteId) {
        await db.insert(tradeNotes).values({ tradeId, noteId }).onConflictDoNothing();
      },
      async unlink(tradeId, noteId) {
        await db
          .delete(tradeNotes)
          .where(and(eq(tradeNotes.tradeId, tradeId), eq(tradeNotes.noteId, noteId)));
      },
    },

    tradeCharts: {
      ...chartTable,
      async listAttached(tradeId) {
        const rows = await db
          .select(chartColumns)
          .from(charts)
          .innerJoin(tradeCharts, eq(tradeCharts.chartId, charts.id))
          .where(eq(tradeCharts.tradeId, tradeId))
          .orderBy(asc(charts.id));
        return rows.map(toChart);
      },
      async link(tradeId, chartId) {
        await db.insert(tradeCharts).values({ tradeId, chartId }).onConflictDoNothing();
      },
      async unlink(tradeId, chartId) {
        await db
          .delete(tradeCharts)
          .where(and(eq(tradeCharts.tradeId, tradeId), eq(tradeCharts.chartId, chartId)));
      },
    },

    analysisNotes: {
      ...noteTable,
      async listAttached({ analysisId, section }) {
        const rows = await db
          .select(noteColumns)
          .from(notes)
          .innerJoin(analysisNotes, eq(analysisNotes.noteId, notes.id))
          .where(and(eq(analysisNotes.analysisId, analysisId), eq(analysisNotes.section, section)))
          .orderBy(asc(notes.id));
        return rows.map(toNote);
      },
      async link({ analysisId, section }, noteId) {
        await db.insert(analysisNotes).values({ analysisId, noteId, section }).onConflictDoNothing();
      },
      async unlink({ analysisId, section }, noteId) {
        await db
          .delete(analysisNotes)
          .where(
            and(
              eq(analysisNotes.analysisId, analysisId),
              eq(analysisNotes.noteId, noteId),
              eq(analysisNotes.section, section)
            )
          );
      },
    },

    analysisCharts: {
      ...chartTable,
      async listAttached({ analysisId, section }) {
        const rows = await db
          .select(chartColumns)
          .from(charts)
          .innerJoin(analysisCharts, eq(analysisCharts.chartId, charts.id))
          .where(and(eq(analysisCharts.analysisId, analysisId), eq(analysisCharts.section, section)))
          .orderBy(asc(charts.id));
        return rows.map(toChart);
      },
      async link({ analysisId, section }, chartId) {
        await db.insert(analysisCharts).values({ analysisId, chartId, section }).onConflictDoNothing();
      },
      async unlink({ analysisId, section }, chartId) {
        await db
          .delete(analysisCharts)
          .where(
            and(
              eq(analysisCharts.analysisId, analysisId),
              eq(analysisCharts.chartId, chartId),
              eq(analysisCharts.section, section)
            )
          );
      },
    },

    setupCharts: {
      ...chartTable,
      async listAttached(setupId) {
        const rows = await db
          .select(chartColumns)
          .from(charts)
          .innerJoin(setupCharts, eq(setupCharts.chartId, charts.id))
          .where(eq(setupCharts.setupId, setupId))
          .orderBy(asc(charts.id));
        return rows.map(toChart);
      },
      async link(setupId, chartId) {
        await db.insert(setupCharts).values({ setupId, chartId }).onConflictDoNothing();
      },
      async unlink(setupId, chartId) {
        await db
          .delete(setupCharts)
          .where(and(eq(setupCharts.setupId, setupId), eq(setupCharts.chartId, chartId)));
      },
    },

    noteCharts: {
      ...chartTable,
      async listAttached(noteId) {
        const rows = await db
          .select(chartColumns)
          .from(charts)
          .innerJoin(noteCharts, eq(noteCharts.chartId, charts.id))
          .where(eq(noteCharts.noteId, noteId))
          .orderBy(asc(charts.id));
        return rows.map(toChart);
      },
      async link(noteId, chartId) {
        await db.insert(noteCharts).values({ noteId, chartId }).onConflictDoNothing();
      },
      async unlink(noteId, chartId) {
        await db
          .delete(noteCharts)
          .where(and(eq(noteCharts.noteId, noteId), eq(noteCharts.chartId, chartId)));
      },
    },

    notes: {
      async findById(id) {
        const rows = await db.select().from(notes).where(eq(notes.id, id)).limit(1);
        const row = rows[0];
        return row ? toNote(row) : null;
      },
    },

    async ping() {
      await db.execute(sql`select 1`);
    },
  };
}
