import {
  analysisFiltersSchema,
  analysisPayloadSchema,
  chartRowsSchema,
  isAnalysisSection,
  noteRowsSchema,
  toFieldIssues,
} from "@shared/schemas";
import type {
  Analysis,
  AnalysisDetail,
  AnalysisSection,
  SectionedCharts,
  SectionedNotes,
} from "@shared/types/journal";
import { ANALYSIS_SECTIONS } from "@shared/vocab";

import { logger } from "../logger";

import { NotFoundError, persist, ValidationError } from "./errors";
import { chartKind, collectOrphan, noteKind, reconcileChildren, type ReconcileSummary } from "./reconciler";
import type { AnalysisRecord, JournalStore } from "./repositories";

export interface AnalysisServiceOptions {
  clock?: () => Date;
  defaultTz?: string;
}

export type AnalysisService = ReturnType<typeof createAnalysisService>;

export function createAnalysisService(store: JournalStore, options: AnalysisServiceOptions = {}) {
  const log = logger.child({ module: "analyses" });
  const clock = options.clock ?? (() => new Date());

  function parsePayload(payload: unknown, current: Analysis | null): AnalysisRecord {
    const parsed = analysisPayloadSchema.safeParse(payload);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error));
    }
    const input = parsed.data;
    return {
      localTz: input.localTz ?? current?.localTz ?? options.defaultTz ?? null,
      dateLocal: input.dateLocal,
      timeLocal: input.timeLocal,
      asset: input.asset,
      preMarketSummary: input.preMarketSummary ?? null,
      planSummary: input.planSummary ?? null,
      postMarketSummary: input.postMarketSummary ?? null,
      dayResult: input.dayResult ?? null,
    };
  }

  function requireSection(section: string): AnalysisSection {
    if (!isAnalysisSection(section)) {
      throw ValidationError.single("section", `Section must be one of ${ANALYSIS_SECTIONS.join(", ")}`);
    }
    return section;
  }

  async function requireAnalysis(id: number): Promise<Analysis> {
    const analysis = await persist(() => store.analyses.findById(id));
    if (!analysis) {
      throw new NotFoundError("Analysis", id);
    }
    return analysis;
  }

  async function createAnalysis(payload: unknown): Promise<number> {
    const record = parsePayload(payload, null);
    const id = await persist(() => store.analyses.insert({ ...record, createdAtUtc: clock() }));
    log.info({ analysisId: id, asset: record.asset }, "Analysis created");
    return id;
  }

  async function updateAnalysis(id: number, payload: unknown): Promise<Analysis> {
    const current = await requireAnalysis(id);
    const record = parsePayload(payload, current);
    await persist(() => store.analyses.update(id, record));
    return { ...record, id, createdAtUtc: current.createdAtUtc };
  }

  async function getAnalysis(id: number): Promise<AnalysisDetail | null> {
    const analysis = await persist(() => store.analyses.findById(id));
    if (!analysis) return null;

    const notes: SectionedNotes = { pre: [], plan: [], post: [] };
    const charts: SectionedCharts = { pre: [], plan: [], post: [] };
    for (const section of ANALYSIS_SECTIONS) {
      notes[section] = await persist(() => store.analysisNotes.listAttached({ analysisId: id, section }));
      charts[section] = await persist(() => store.analysisCharts.listAttached({ analysisId: id, section }));
    }
    return { ...analysis, notes, charts };
  }

  async function listAnalyses(filters: unknown = {}): Promise<Analysis[]> {
    const parsed = analysisFiltersSchema.safeParse(filters);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error));
    }
    return persist(() => store.analyses.list(parsed.data));
  }

  async function deleteAnalysis(id: number): Promise<void> {
    const detail = await getAnalysis(id);
    if (!detail) {
      throw new NotFoundError("Analysis", id);
    }

    await persist(() => store.analyses.remove(id));
    await persist(async () => {
      for (const section of ANALYSIS_SECTIONS) {
        for (const note of detail.notes[section]) await collectOrphan(store.analysisNotes, note.id);
        for (const chart of detail.charts[section]) await collectOrphan(store.analysisCharts, chart.id);
      }
    });
    log.info({ analysisId: id }, "Analysis deleted");
  }

  async function replaceAnalysisNotes(id: number, section: string, rows: unknown): Promise<ReconcileSummary> {
    const slot = { analysisId: id, section: requireSection(section) };
    const parsed = noteRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error, "notes"));
    }
    await requireAnalysis(id);
    return persist(() => reconcileChildren(store.analysisNotes, slot, parsed.data, noteKind));
  }

  async function replaceAnalysisCharts(id: number, section: string, rows: unknown): Promise<ReconcileSummary> {
    const slot = { analysisId: id, section: requireSection(section) };
    const parsed = chartRowsSchema.safeParse(rows);
    if (!parsed.success) {
      throw new ValidationError(toFieldIssues(parsed.error, "charts"));
    }
    await requireAnalysis(id);
    return persist(() => reconcileChildren(store.analysisCharts, slot, parsed.data, chartKind));
  }

  return {
    createAnalysis,
    updateAnalysis,
    deleteAnalysis,
    getAnalysis,
    listAnalyses,
    replaceAnalysisNotes,
    replaceAnalysisCharts,
  };
}
