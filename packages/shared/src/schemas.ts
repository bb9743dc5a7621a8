import { z } from 'zod';

import { normalizeEmotionalProblems } from './utils/emotions';
import type {
  AnalysisSection,
  ProposedChartRow,
  ProposedNoteRow,
  Estimation,
  EmotionalProblem,
  TradeResult,
  TradeSession,
  TradeState,
} from './types/journal';
import {
  ANALYSIS_SECTIONS,
  EMOTIONAL_PROBLEMS,
  RESULT_PLACEHOLDER,
  RISK_PCT_MAX,
  RISK_PCT_MIN,
  RISK_PCT_STEP,
  TRADE_RESULTS,
  TRADE_SESSIONS,
  TRADE_STATES,
} from './vocab';

export interface FieldIssue {
  field: string;
  message: string;
}

// ---- coercion helpers -------------------------------------------------------

function blankToNull(value: unknown): unknown {
  if (typeof value !== 'string') return value;
  const trimmed = value.trim();
  return trimmed === '' ? null : trimmed;
}

function toNumeric(value: unknown): unknown {
  const cleaned = blankToNull(value);
  if (typeof cleaned !== 'string') return cleaned;
  const parsed = Number(cleaned);
  return Number.isNaN(parsed) ? cleaned : parsed;
}

function toEstimation(value: unknown): unknown {
  if (typeof value === 'boolean') return value ? 1 : 0;
  return toNumeric(value);
}

function isCalendarDate(value: string): boolean {
  const parsed = new Date(`${value}T00:00:00Z`);
  return !Number.isNaN(parsed.getTime()) && parsed.toISOString().slice(0, 10) === value;
}

function isStepOf(value: number, step: number): boolean {
  const scaled = value / step;
  return Math.abs(scaled - Math.round(scaled)) < 1e-9;
}

function isWebUrl(value: string): boolean {
  try {
    const url = new URL(value);
    return url.protocol === 'http:' || url.protocol === 'https:';
  } catch {
    return false;
  }
}

// ---- field schemas ----------------------------------------------------------

export const textField = z.preprocess(blankToNull, z.string().nullable());

export const dateField = z.preprocess(
  (value) => (value instanceof Date ? value.toISOString().slice(0, 10) : blankToNull(value)),
  z
    .string({ required_error: 'Date is required', invalid_type_error: 'Date is required' })
    .regex(/^\d{4}-\d{2}-\d{2}$/, 'Date must look like YYYY-MM-DD')
    .refine(isCalendarDate, 'Date is not a calendar date')
);

export const timeField = z.preprocess(
  blankToNull,
  z
    .string({ required_error: 'Time is required', invalid_type_error: 'Time is required' })
    .regex(/^([01]\d|2[0-3]):[0-5]\d(:[0-5]\d)?$/, 'Time must look like HH:MM or HH:MM:SS')
    .transform((value) => (value.length === 5 ? `${value}:00` : value))
);

export const numberField = z.preprocess(toNumeric, z.number().finite().nullable());

export const idRefField = z.preprocess(toNumeric, z.number().int().positive().nullable());

export const stateField = z.preprocess(blankToNull, z.enum(TRADE_STATES));

export const resultField = z.preprocess(
  (value) => (value === RESULT_PLACEHOLDER ? null : blankToNull(value)),
  z.enum(TRADE_RESULTS).nullable()
);

export const sessionField = z.preprocess(blankToNull, z.enum(TRADE_SESSIONS).nullable());

export const riskPctField = z.preprocess(
  toNumeric,
  z
    .number({ required_error: 'Risk percent is required', invalid_type_error: 'Risk percent is required' })
    .min(RISK_PCT_MIN, `Risk percent must be at least ${RISK_PCT_MIN}`)
    .max(RISK_PCT_MAX, `Risk percent must be at most ${RISK_PCT_MAX}`)
    .refine((value) => isStepOf(value, RISK_PCT_STEP), `Risk percent must be a multiple of ${RISK_PCT_STEP}`)
);

export const estimationField = z.preprocess(
  toEstimation,
  z.union([z.literal(0), z.literal(1)]).nullable()
);

export const emotionalProblemsField = z.preprocess(
  (value) => (value === null ? [] : normalizeEmotionalProblems(value)),
  z.array(z.enum(EMOTIONAL_PROBLEMS))
);

export const sectionField = z.enum(ANALYSIS_SECTIONS);

export function isAnalysisSection(value: unknown): value is AnalysisSection {
  return sectionField.safeParse(value).success;
}

// ---- trade ------------------------------------------------------------------

export const tradeFields = {
  state: stateField,
  localTz: textField.optional(),
  dateLocal: dateField,
  timeLocal: timeField,
  accountId: idRefField.optional(),
  setupId: idRefField.optional(),
  analysisId: idRefField.optional(),
  asset: z.preprocess(
    blankToNull,
    z.string({ required_error: 'Asset is required', invalid_type_error: 'Asset is required' })
  ),
  session: sessionField.optional(),
  riskPct: riskPctField,
  result: resultField.optional(),
  netPnl: numberField.optional(),
  riskReward: numberField.optional(),
  rewardPercent: numberField.optional(),
  hotThoughts: textField.optional(),
  emotionalProblems: emotionalProblemsField.optional(),
  coldThoughts: textField.optional(),
  estimation: estimationField.optional(),
};

export const tradePayloadSchema = z.object(tradeFields).strict();

type Numeric = number | string | null;

/** What a caller sends. Strings are accepted wherever they get coerced. */
export interface TradePayload {
  state: TradeState | string;
  localTz?: string | null;
  dateLocal: string | Date;
  timeLocal: string;
  accountId?: Numeric;
  setupId?: Numeric;
  analysisId?: Numeric;
  asset: string;
  session?: TradeSession | string | null;
  riskPct: Numeric;
  result?: TradeResult | string | null;
  netPnl?: Numeric;
  riskReward?: Numeric;
  rewardPercent?: Numeric;
  hotThoughts?: string | null;
  emotionalProblems?: EmotionalProblem[] | string[] | string | null;
  coldThoughts?: string | null;
  estimation?: Estimation | boolean | string | null;
}

/** What the engine works with after coercion. */
export type TradeInput = z.output<typeof tradePayloadSchema>;

// ---- child rows -------------------------------------------------------------

// Rows echo whatever columns the editor shows, so unknown keys are stripped, not rejected
const rowIdField = z.union([z.number(), z.string(), z.null()]).optional();

export const noteRowSchema = z.object({
  id: rowIdField,
  title: z.string().nullable().optional(),
  body: z.string().nullable().optional(),
  tags: z.union([z.array(z.string()), z.string(), z.null()]).optional(),
});

export const chartRowSchema = z.object({
  id: rowIdField,
  chartUrl: z
    .string()
    .nullable()
    .optional()
    .refine(
      (value) => value == null || value.trim() === '' || isWebUrl(value.trim()),
      'Chart URL must be an http(s) link'
    ),
  description: z.string().nullable().optional(),
});

export const noteRowsSchema = z.array(noteRowSchema);
export const chartRowsSchema = z.array(chartRowSchema);

export type NoteRowInput = z.output<typeof noteRowSchema>;
export type ChartRowInput = z.output<typeof chartRowSchema>;

/** Full form resubmission: the trade plus (optionally) both child tables. */
export const tradeSubmissionSchema = z.object({
  trade: z.unknown(),
  notes: z.unknown().optional(),
  charts: z.unknown().optional(),
});

export interface TradeSubmission {
  trade: TradePayload;
  notes?: ProposedNoteRow[];
  charts?: ProposedChartRow[];
}

// ---- analysis ---------------------------------------------------------------

export const analysisPayloadSchema = z
  .object({
    localTz: textField.optional(),
    dateLocal: dateField,
    timeLocal: timeField,
    asset: z.preprocess(
      blankToNull,
      z.string({ required_error: 'Asset is required', invalid_type_error: 'Asset is required' })
    ),
    preMarketSummary: textField.optional(),
    planSummary: textField.optional(),
    postMarketSummary: textField.optional(),
    dayResult: textField.optional(),
  })
  .strict();

export interface AnalysisPayload {
  localTz?: string | null;
  dateLocal: string | Date;
  timeLocal: string;
  asset: string;
  preMarketSummary?: string | null;
  planSummary?: string | null;
  postMarketSummary?: string | null;
  dayResult?: string | null;
}

export type AnalysisInput = z.output<typeof analysisPayloadSchema>;

// ---- references -------------------------------------------------------------

export const accountPayloadSchema = z
  .object({
    name: z.preprocess(blankToNull, z.string({ invalid_type_error: 'Name is required' })),
    broker: textField.optional(),
    currency: z.preprocess(blankToNull, z.string().min(3).max(8).nullable()).optional(),
    startingBalance: numberField.optional(),
    isProp: z.boolean().optional(),
  })
  .strict();

export const setupPayloadSchema = z
  .object({
    name: z.preprocess(blankToNull, z.string({ invalid_type_error: 'Name is required' })),
    description: textField.optional(),
  })
  .strict();

export interface AccountPayload {
  name: string;
  broker?: string | null;
  currency?: string | null;
  startingBalance?: Numeric;
  isProp?: boolean;
}

export interface SetupPayload {
  name: string;
  description?: string | null;
}

export type AccountInput = z.output<typeof accountPayloadSchema>;
export type SetupInput = z.output<typeof setupPayloadSchema>;

// ---- listing filters --------------------------------------------------------

export const TRADE_ORDER_COLUMNS = [
  'id',
  'dateLocal',
  'timeLocal',
  'accountId',
  'setupId',
  'analysisId',
  'asset',
  'state',
  'result',
  'session',
  'netPnl',
  'riskReward',
  'rewardPercent',
] as const;

export type TradeOrderColumn = (typeof TRADE_ORDER_COLUMNS)[number];

export const tradeFiltersSchema = z
  .object({
    accountId: idRefField.optional(),
    setupId: idRefField.optional(),
    analysisId: idRefField.optional(),
    asset: textField.optional(),
    state: z.preprocess(blankToNull, z.enum(TRADE_STATES).nullable()).optional(),
    result: z.preprocess(blankToNull, z.enum(TRADE_RESULTS).nullable()).optional(),
    session: sessionField.optional(),
    dateFrom: dateField.optional(),
    dateTo: dateField.optional(),
    orderBy: z.enum(TRADE_ORDER_COLUMNS).optional(),
    direction: z.enum(['asc', 'desc']).optional(),
  })
  .strict();

export type TradeFilters = z.output<typeof tradeFiltersSchema>;

export const analysisFiltersSchema = z
  .object({
    asset: textField.optional(),
    dateFrom: dateField.optional(),
    dateTo: dateField.optional(),
  })
  .strict();

export type AnalysisFilters = z.output<typeof analysisFiltersSchema>;

// ---- issues -----------------------------------------------------------------

/** Flattens a ZodError into one issue per field (unknown keys listed individually). */
export function toFieldIssues(error: z.ZodError, prefix?: string): FieldIssue[] {
  const issues: FieldIssue[] = [];
  for (const issue of error.issues) {
    const base = issue.path.map(String).join('.');
    const path = prefix ? [prefix, base].filter(Boolean).join('.') : base;

    if (issue.code === z.ZodIssueCode.unrecognized_keys) {
      for (const key of issue.keys) {
        issues.push({ field: path ? `${path}.${key}` : key, message: 'Unknown field' });
      }
      continue;
    }
    issues.push({ field: path || '(root)', message: issue.message });
  }
  return issues;
}
