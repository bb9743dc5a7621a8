import {
  chartRowsSchema,
  noteRowsSchema,
  toFieldIssues,
  tradeFiltersSchema,
  tradeSubmissionSchema,
  type FieldIssue,
} from "@shared/schemas";
import { allowedStatuses, visibleStages } from "@shared/tradeLifecycle";
import type { Stage, Trade, TradeDetail, TradeState } from "@shared/types/journal";

import { logger } from "../logger";

import { ChildSyncError, NotFoundError, persist, ValidationError, type ChildCollection } from "./errors";
import { computeMetrics, equityCurve, type EquityPoint, type JournalMetrics } from "./metrics";
import { chartKind, collectOrphan, noteKind, reconcileChildren, type ReconcileSummary } from "./reconciler";
import type { JournalStore } from "./repositories";
import { buildTradeRecord, inspectTradePayload, referencedIds } from "./tradeEngine";

export interface TradeServiceOptions {
  clock?: () => Date;
  defaultTz?: string;
}

export interface StatusOption {
  state: TradeState;
  stages: Stage[];
}

export interface TradeStatuses {
  current: TradeState;
  options: StatusOption[];
}

export interface TradeSaveResult {
  trade: TradeDetail;
  notes: ReconcileSummary | null;
  charts: ReconcileSummary | null;
}

export interface TradeMetricsReport {
  metrics: JournalMetrics;
  equityCurve: EquityPoint[];
}

export type TradeService = ReturnType<typeof createTradeService>;

export function createTradeService(store: JournalStore, options: TradeServiceOptions = {}) {
  const log = logger.child({ module: "trades" });
  const clock = options.clock ?? (() => new Date());

  async function requireTrade(id: number): Promise<Trade> {
    const trade = await persist(() => store.trades.findById(id));
    if (!trade) {
      throw new NotFoundError("Trade", id);
    }
    return trade;
  }

  async function referenceIssues(payload: unknown): Promise<FieldIssue[]> {
    const { accountId, setupId, analysisId } = referencedIds(payload);
    const issues: FieldIssue[] = [];

    if (accountId !== null && !(await persist(() => store.references.accountExists(accountId)))) {
      issues.push({ field: "accountId", message: `Account ${accountId} does not exist` });
    }
    if (setupId !== null && !(await persist(() => store.references.setupExists(setupId)))) {
      issues.push({ field: "setupId", message: `Setup ${setupId} does not exist` });
    }
    if (analysisId !== null && !(await persist(() => store.analyses.findById(analysisId)))) {
      issues.push({ field: "analysisId", message: `Analysis ${analysisId} does not exist` });
    }
    return issues;
  }

  /** Validates a payload (plus any extra issues found by the caller) and builds the row. */
  async function prepare(payload: unknown, current: Trade | null, extraIssues: FieldIssue[] = []) {
    const inspection = inspectTradePayload(payload, current);
    const reported = new Set(inspection.issues.map((issue) => issue.field));
    const refIssues = (await referenceIssues(payload)).filter((issue) => !reported.has(issue.field));
    const issues = [...inspection.issues, ...refIssues, ...extraIssues];

    if (inspection.input === null || issues.length > 0) {
      throw new ValidationError(issues);
    }
    return buildTradeRecord(inspection.input, current, { now: clock(), defaultTz: options.defaultTz });
  }

  function parseNoteRows(rows: unknown) {
    const parsed = noteRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error, "notes"));
    }
    return parsed.data;
  }

  function parseChartRows(rows: unknown) {
    const parsed = chartRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error, "charts"));
    }
    return parsed.data;
  }

  async function syncCollection(
    tradeId: number,
    collection: ChildCollection,
    rows: unknown,
    ownerCommitted: boolean
  ): Promise<ReconcileSummary> {
    const run =
      collection === "notes"
        ? () => reconcileChildren(store.tradeNotes, tradeId, parseNoteRows(rows), noteKind)
        : () => reconcileChildren(store.tradeCharts, tradeId, parseChartRows(rows), chartKind);

    if (!ownerCommitted) {
      return persist(run);
    }

    try {
      return await run();
    } catch (err) {
      log.error({ err, tradeId, collection }, "Trade saved but child collection failed to sync");
      throw new ChildSyncError(tradeId, collection, err);
    }
  }

  /** Row-shape problems in either collection, found before anything is written. */
  function submissionIssues(notes: unknown, charts: unknown): FieldIssue[] {
    const issues: FieldIssue[] = [];
    if (notes !== undefined) {
      const parsed = noteRowsSchema.safeParse(notes);
      if (!parsed.success) issues.push(...toFieldIssues(parsed.error, "notes"));
    }
    if (charts !== undefined) {
      const parsed = chartRowsSchema.safeParse(charts);
      if (!parsed.success) issues.push(...toFieldIssues(parsed.error, "charts"));
    }
    return issues;
  }

  async function getTrade(id: number): Promise<Trade | null> {
    return persist(() => store.trades.findById(id));
  }

  async function getTradeDetail(id: number): Promise<TradeDetail | null> {
    const trade = await getTrade(id);
    if (!trade) return null;

    const notes = await persist(() => store.tradeNotes.listAttached(id));
    const charts = await persist(() => store.tradeCharts.listAttached(id));
    return { ...trade, notes, charts };
  }

  async function requireDetail(id: number): Promise<TradeDetail> {
    const detail = await getTradeDetail(id);
    if (!detail) {
      throw new NotFoundError("Trade", id);
    }
    return detail;
  }

  async function listTrades(filters: unknown = {}): Promise<Trade[]> {
    const parsed = tradeFiltersSchema.safeParse(filters);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error));
    }
    return persist(() => store.trades.list(parsed.data));
  }

  async function createTrade(payload: unknown): Promise<number> {
    const record = await prepare(payload, null);
    const id = await persist(() => store.trades.insert(record));
    log.info({ tradeId: id, state: record.state }, "Trade created");
    return id;
  }

  async function updateTrade(id: number, payload: unknown): Promise<Trade> {
    const current = await requireTrade(id);
    const record = await prepare(payload, current);
    await persist(() => store.trades.update(id, record));

    if (current.state !== record.state) {
      log.info({ tradeId: id, from: current.state, to: record.state }, "Trade status changed");
    }
    return { id, ...record };
  }

  async function deleteTrade(id: number): Promise<void> {
    const notes = await persist(() => store.tradeNotes.listAttached(id));
    const charts = await persist(() => store.tradeCharts.listAttached(id));

    const removed = await persist(() => store.trades.remove(id));
    if (!removed) {
      throw new NotFoundError("Trade", id);
    }

    await persist(async () => {
      for (const note of notes) await collectOrphan(store.tradeNotes, note.id);
      for (const chart of charts) await collectOrphan(store.tradeCharts, chart.id);
    });
    log.info({ tradeId: id }, "Trade deleted");
  }

  async function replaceTradeNotes(tradeId: number, rows: unknown): Promise<ReconcileSummary> {
    await requireTrade(tradeId);
    return syncCollection(tradeId, "notes", rows, false);
  }

  async function replaceTradeCharts(tradeId: number, rows: unknown): Promise<ReconcileSummary> {
    await requireTrade(tradeId);
    return syncCollection(tradeId, "charts", rows, false);
  }

  /**
   * Trade row first, then notes, then charts. The writes are not atomic: once
   * the trade row is committed a child failure surfaces as ChildSyncError.
   * Collections left undefined are not touched.
   */
  async function commitSubmission(id: number | null, submission: unknown): Promise<TradeSaveResult> {
    const parsed = tradeSubmissionSchema.safeParse(submission);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error));
    }
    const { trade, notes, charts } = parsed.data;

    const current = id === null ? null : await requireTrade(id);
    const record = await prepare(trade, current, submissionIssues(notes, charts));

    let tradeId: number;
    if (id === null) {
      tradeId = await persist(() => store.trades.insert(record));
      log.info({ tradeId, state: record.state }, "Trade created");
    } else {
      tradeId = id;
      await persist(() => store.trades.update(id, record));
      if (current && current.state !== record.state) {
        log.info({ tradeId, from: current.state, to: record.state }, "Trade status changed");
      }
    }

    const noteSummary = notes === undefined ? null : await syncCollection(tradeId, "notes", notes, true);
    const chartSummary = charts === undefined ? null : await syncCollection(tradeId, "charts", charts, true);

    return {
      trade: await requireDetail(tradeId),
      notes: noteSummary,
      charts: chartSummary,
    };
  }

  async function createTradeWithChildren(submission: unknown): Promise<TradeSaveResult> {
    return commitSubmission(null, submission);
  }

  async function saveTrade(id: number, submission: unknown): Promise<TradeSaveResult> {
    return commitSubmission(id, submission);
  }

  async function statuses(id: number): Promise<TradeStatuses> {
    const trade = await requireTrade(id);
    return {
      current: trade.state,
      options: allowedStatuses(trade.state).map((state) => ({ state, stages: visibleStages(state) })),
    };
  }

  async function metrics(filters: unknown = {}): Promise<TradeMetricsReport> {
    const trades = await listTrades(filters);
    return { metrics: computeMetrics(trades), equityCurve: equityCurve(trades) };
  }

  return {
    createTrade,
    updateTrade,
    deleteTrade,
    getTrade,
    getTradeDetail,
    listTrades,
    replaceTradeNotes,
    replaceTradeCharts,
    createTradeWithChildren,
    saveTrade,
    statuses,
    metrics,
  };
}
