import { nanoid } from 'nanoid';

import type { TradeSubmission } from './schemas';
import {
  allowedStatuses,
  CREATE_ALLOWED_STATUSES,
  visibleStages,
} from './tradeLifecycle';
import type {
  EmotionalProblem,
  Estimation,
  Stage,
  TradeDetail,
  TradeResult,
  TradeSession,
  TradeState,
} from './types/journal';

export interface TradeDraftFields {
  localTz: string | null;
  dateLocal: string;
  timeLocal: string;
  accountId: number | null;
  setupId: number | null;
  analysisId: number | null;
  asset: string;
  session: TradeSession | null;
  riskPct: number;
  result: TradeResult | null;
  netPnl: number | null;
  riskReward: number | null;
  rewardPercent: number | null;
  hotThoughts: string | null;
  emotionalProblems: EmotionalProblem[];
  coldThoughts: string | null;
  estimation: Estimation | null;
}

export interface DraftNoteRow {
  /** Client-side row identity, stable across re-renders. */
  key: string;
  id: number | null;
  title: string;
  body: string;
  tags: string[];
}

export interface DraftChartRow {
  key: string;
  id: number | null;
  chartUrl: string;
  description: string;
}

export type NewTradeDefaults = Pick<TradeDraftFields, 'dateLocal' | 'timeLocal' | 'asset'> &
  Partial<TradeDraftFields>;

const EMPTY_OUTCOME = {
  result: null,
  netPnl: null,
  riskReward: null,
  rewardPercent: null,
  hotThoughts: null,
  emotionalProblems: [],
  coldThoughts: null,
  estimation: null,
} satisfies Partial<TradeDraftFields>;

/**
 * Pending edits for one trade editing flow.
 *
 * A view-controller holds one of these from "open editor" until save or
 * cancel. Values typed into a stage that later gets hidden are kept here so
 * switching the status back does not lose them, but they are submitted as
 * null while hidden.
 */
export class TradeEditSession {
  readonly id = nanoid();
  readonly tradeId: number | null;
  readonly baseline: TradeState;

  private target: TradeState;
  private fields: TradeDraftFields;
  private notes: DraftNoteRow[];
  private charts: DraftChartRow[];
  private dirty = false;

  private constructor(
    tradeId: number | null,
    baseline: TradeState,
    fields: TradeDraftFields,
    notes: DraftNoteRow[],
    charts: DraftChartRow[]
  ) {
    this.tradeId = tradeId;
    this.baseline = baseline;
    this.target = baseline;
    this.fields = fields;
    this.notes = notes;
    this.charts = charts;
  }

  static forTrade(detail: TradeDetail): TradeEditSession {
    const { id, state, notes, charts, closedAtUtc: _closedAt, ...fields } = detail;
    return new TradeEditSession(
      id,
      state,
      { ...fields, emotionalProblems: [...fields.emotionalProblems] },
      notes.map((note) => ({
        key: nanoid(),
        id: note.id,
        title: note.title ?? '',
        body: note.body,
        tags: [...note.tags],
      })),
      charts.map((chart) => ({
        key: nanoid(),
        id: chart.id,
        chartUrl: chart.chartUrl,
        description: chart.description ?? '',
      }))
    );
  }

  static forNewTrade(defaults: NewTradeDefaults, initialState: TradeState = 'open'): TradeEditSession {
    if (!CREATE_ALLOWED_STATUSES.includes(initialState)) {
      throw new Error(`A new trade cannot start as '${initialState}'`);
    }
    return new TradeEditSession(
      null,
      initialState,
      {
        localTz: null,
        accountId: null,
        setupId: null,
        analysisId: null,
        session: null,
        riskPct: 1,
        ...EMPTY_OUTCOME,
        ...defaults,
      },
      [],
      []
    );
  }

  get isNew(): boolean {
    return this.tradeId === null;
  }

  get status(): TradeState {
    return this.target;
  }

  statusOptions(): TradeState[] {
    return this.isNew ? [...CREATE_ALLOWED_STATUSES] : allowedStatuses(this.baseline);
  }

  selectStatus(next: TradeState): void {
    if (!this.statusOptions().includes(next)) {
      throw new Error(`Status '${next}' is not reachable from '${this.baseline}'`);
    }
    if (next !== this.target) {
      this.target = next;
      this.dirty = true;
    }
  }

  stages(): Stage[] {
    return visibleStages(this.target);
  }

  get values(): Readonly<TradeDraftFields> {
    return this.fields;
  }

  set<K extends keyof TradeDraftFields>(key: K, value: TradeDraftFields[K]): void {
    this.fields = { ...this.fields, [key]: value };
    this.dirty = true;
  }

  get noteRows(): readonly DraftNoteRow[] {
    return this.notes;
  }

  get chartRows(): readonly DraftChartRow[] {
    return this.charts;
  }

  addNote(row: Partial<Omit<DraftNoteRow, 'key' | 'id'>> = {}): string {
    const key = nanoid();
    this.notes = [...this.notes, { key, id: null, title: '', body: '', tags: [], ...row }];
    this.dirty = true;
    return key;
  }

  editNote(key: string, patch: Partial<Omit<DraftNoteRow, 'key' | 'id'>>): void {
    this.notes = this.notes.map((row) => (row.key === key ? { ...row, ...patch } : row));
    this.dirty = true;
  }

  removeNote(key: string): void {
    this.notes = this.notes.filter((row) => row.key !== key);
    this.dirty = true;
  }

  addChart(row: Partial<Omit<DraftChartRow, 'key' | 'id'>> = {}): string {
    const key = nanoid();
    this.charts = [...this.charts, { key, id: null, chartUrl: '', description: '', ...row }];
    this.dirty = true;
    return key;
  }

  editChart(key: string, patch: Partial<Omit<DraftChartRow, 'key' | 'id'>>): void {
    this.charts = this.charts.map((row) => (row.key === key ? { ...row, ...patch } : row));
    this.dirty = true;
  }

  removeChart(key: string): void {
    this.charts = this.charts.filter((row) => row.key !== key);
    this.dirty = true;
  }

  isDirty(): boolean {
    return this.dirty;
  }

  /** Whole-form payload for create/save. Hidden stages go out as null. */
  toSubmission(): TradeSubmission {
    const stages = this.stages();
    const closed = stages.includes('closed');
    const review = stages.includes('review');
    const f = this.fields;

    return {
      trade: {
        state: this.target,
        localTz: f.localTz,
        dateLocal: f.dateLocal,
        timeLocal: f.timeLocal,
        accountId: f.accountId,
        setupId: f.setupId,
        analysisId: f.analysisId,
        asset: f.asset,
        session: f.session,
        riskPct: f.riskPct,
        result: closed ? f.result : null,
        netPnl: closed ? f.netPnl : null,
        riskReward: closed ? f.riskReward : null,
        rewardPercent: closed ? f.rewardPercent : null,
        hotThoughts: closed ? f.hotThoughts : null,
        emotionalProblems: closed ? f.emotionalProblems : null,
        ...(review ? { coldThoughts: f.coldThoughts, estimation: f.estimation } : {}),
      },
      notes: this.notes.map(({ id, title, body, tags }) => ({ id, title, body, tags })),
      charts: this.charts.map(({ id, chartUrl, description }) => ({ id, chartUrl, description })),
    };
  }
}
