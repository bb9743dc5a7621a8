import type {
  ANALYSIS_SECTIONS,
  EMOTIONAL_PROBLEMS,
  ESTIMATIONS,
  TRADE_RESULTS,
  TRADE_SESSIONS,
  TRADE_STATES,
} from "../vocab";

export type TradeState = (typeof TRADE_STATES)[number];
export type TradeResult = (typeof TRADE_RESULTS)[number];
export type TradeSession = (typeof TRADE_SESSIONS)[number];
export type AnalysisSection = (typeof ANALYSIS_SECTIONS)[number];
export type EmotionalProblem = (typeof EMOTIONAL_PROBLEMS)[number];
export type Estimation = (typeof ESTIMATIONS)[number];

/** Form-visibility grouping a status belongs to. */
export type Stage = "open" | "closed" | "review";

export interface Trade {
  id: number;
  localTz: string | null;
  dateLocal: string;
  timeLocal: string;
  accountId: number | null;
  setupId: number | null;
  analysisId: number | null;
  asset: string;
  session: TradeSession | null;
  state: TradeState;
  result: TradeResult | null;
  netPnl: number | null;
  riskPct: number;
  riskReward: number | null;
  rewardPercent: number | null;
  estimation: Estimation | null;
  emotionalProblems: EmotionalProblem[];
  hotThoughts: string | null;
  coldThoughts: string | null;
  closedAtUtc: Date | null;
}

export interface Note {
  id: number;
  title: string | null;
  body: string;
  tags: string[];
  createdAt: Date | null;
}

export interface Chart {
  id: number;
  chartUrl: string;
  description: string | null;
  createdAt: Date | null;
}

/** A note with the charts attached to it through note_charts. */
export interface NoteDetail extends Note {
  charts: Chart[];
}

export interface TradeDetail extends Trade {
  notes: Note[];
  charts: Chart[];
}

export interface Analysis {
  id: number;
  createdAtUtc: Date | null;
  localTz: string | null;
  dateLocal: string;
  timeLocal: string;
  asset: string;
  preMarketSummary: string | null;
  planSummary: string | null;
  postMarketSummary: string | null;
  dayResult: string | null;
}

export type SectionedNotes = Record<AnalysisSection, Note[]>;
export type SectionedCharts = Record<AnalysisSection, Chart[]>;

export interface AnalysisDetail extends Analysis {
  notes: SectionedNotes;
  charts: SectionedCharts;
}

export interface Account {
  id: number;
  name: string;
  broker: string | null;
  currency: string;
  startingBalance: number | null;
  isProp: boolean;
  archived: boolean;
  createdAt: Date | null;
}

export interface Setup {
  id: number;
  name: string;
  description: string | null;
  createdAt: Date | null;
}

/** Example charts collected for a setup. */
export interface SetupDetail extends Setup {
  charts: Chart[];
}

/**
 * A row as it comes back from a table editor. Ids may be stale, foreign or
 * stringly typed; the reconciler decides whether to trust them.
 */
export interface ProposedNoteRow {
  id?: number | string | null;
  title?: string | null;
  body?: string | null;
  tags?: string[] | string | null;
}

export interface ProposedChartRow {
  id?: number | string | null;
  chartUrl?: string | null;
  description?: string | null;
}
