import { sql, type SQL } from 'drizzle-orm';
import {
  pgTable,
  serial,
  text,
  integer,
  doublePrecision,
  boolean,
  jsonb,
  timestamp,
  date,
  time,
  index,
  primaryKey,
  check,
  type AnyPgColumn,
} from 'drizzle-orm/pg-core';

// Relative imports: drizzle-kit loads this file without the tsconfig path aliases
import type { EmotionalProblem } from '../../../../packages/shared/src/types/journal';
import {
  ANALYSIS_SECTIONS,
  ESTIMATIONS,
  TRADE_RESULTS,
  TRADE_SESSIONS,
  TRADE_STATES,
} from '../../../../packages/shared/src/vocab';

function inList(column: AnyPgColumn, values: readonly (string | number)[]): SQL {
  const literals = values
    .map((value) => (typeof value === 'number' ? String(value) : `'${value.replace(/'/g, "''")}'`))
    .join(', ');
  return sql`${column} in (${sql.raw(literals)})`;
}

// =========================
// CORE
// =========================

export const accounts = pgTable('accounts', {
  id: serial('id').primaryKey(),
  name: text('name').notNull(),
  broker: text('broker'),
  currency: text('currency').notNull().default('USD'),
  startingBalance: doublePrecision('starting_balance'),
  isProp: boolean('is_prop').notNull().default(false),
  archived: boolean('archived').notNull().default(false),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
});

export const setups = pgTable('setups', {
  id: serial('id').primaryKey(),
  name: text('name').notNull().unique(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
});

export const notes = pgTable('notes', {
  id: serial('id').primaryKey(),
  title: text('title'),
  body: text('body').notNull(),
  tags: text('tags'), // comma-joined, see @shared/utils/tags
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
});

export const charts = pgTable('charts', {
  id: serial('id').primaryKey(),
  chartUrl: text('chart_url').notNull(),
  description: text('description'),
  createdAt: timestamp('created_at', { withTimezone: true }).defaultNow(),
});

// =========================
// ANALYSES
// =========================

export const analyses = pgTable(
  'analyses',
  {
    id: serial('id').primaryKey(),
    createdAtUtc: timestamp('created_at_utc', { withTimezone: true }).defaultNow(),
    localTz: text('local_tz'),
    dateLocal: date('date_local').notNull(),
    timeLocal: time('time_local').notNull(),
    asset: text('asset').notNull(),
    preMarketSummary: text('pre_market_summary'),
    planSummary: text('plan_summary'),
    postMarketSummary: text('post_market_summary'),
    dayResult: text('day_result'),
  },
  (table) => ({
    dateIdx: index('idx_analyses_date_local').on(table.dateLocal),
    assetIdx: index('idx_analyses_asset').on(table.asset),
  })
);

// =========================
// TRADES
// =========================

export const trades = pgTable(
  'trades',
  {
    id: serial('id').primaryKey(),

    localTz: text('local_tz'),
    dateLocal: date('date_local').notNull(),
    timeLocal: time('time_local').notNull(),

    accountId: integer('account_id').references(() => accounts.id, {
      onDelete: 'set null',
      onUpdate: 'cascade',
    }),
    setupId: integer('setup_id').references(() => setups.id, {
      onDelete: 'set null',
      onUpdate: 'cascade',
    }),
    analysisId: integer('analysis_id').references(() => analyses.id, {
      onDelete: 'set null',
      onUpdate: 'cascade',
    }),
    asset: text('asset').notNull(),

    session: text('session', { enum: TRADE_SESSIONS }),
    state: text('state', { enum: TRADE_STATES }).notNull().default('open'),
    result: text('result', { enum: TRADE_RESULTS }),

    netPnl: doublePrecision('net_pnl'),
    riskPct: doublePrecision('risk_pct').notNull(),
    riskReward: doublePrecision('risk_reward'),
    rewardPercent: doublePrecision('reward_percent'),
    estimation: integer('estimation'),

    emotionalProblems: jsonb('emotional_problems').$type<EmotionalProblem[]>(),
    hotThoughts: text('hot_thoughts'),
    coldThoughts: text('cold_thoughts'),
    closedAtUtc: timestamp('closed_at_utc', { withTimezone: true }),
  },
  (table) => ({
    sessionCheck: check('trades_session_check', inList(table.session, TRADE_SESSIONS)),
    stateCheck: check('trades_state_check', inList(table.state, TRADE_STATES)),
    resultCheck: check('trades_result_check', inList(table.result, TRADE_RESULTS)),
    estimationCheck: check('trades_estimation_check', inList(table.estimation, ESTIMATIONS)),
    // Outcome columns stay empty until the trade reaches the closed tier
    openTierCheck: check(
      'trades_open_tier_outcome_check',
      sql`${table.state} not in ('open', 'cancelled', 'missed') or (${table.result} is null and ${table.netPnl} is null and ${table.riskReward} is null)`
    ),
    dateIdx: index('idx_trades_date_local').on(table.dateLocal),
    accountIdx: index('idx_trades_account').on(table.accountId),
    assetIdx: index('idx_trades_asset').on(table.asset),
    resultIdx: index('idx_trades_result').on(table.result),
    setupIdx: index('idx_trades_setup').on(table.setupId),
  })
);

// =========================
// JUNCTIONS (many-to-many)
// =========================

export const tradeNotes = pgTable(
  'trade_notes',
  {
    tradeId: integer('trade_id')
      .notNull()
      .references(() => trades.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    noteId: integer('note_id')
      .notNull()
      .references(() => notes.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tradeId, table.noteId] }),
  })
);

export const tradeCharts = pgTable(
  'trade_charts',
  {
    tradeId: integer('trade_id')
      .notNull()
      .references(() => trades.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    chartId: integer('chart_id')
      .notNull()
      .references(() => charts.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.tradeId, table.chartId] }),
  })
);

export const analysisNotes = pgTable(
  'analysis_notes',
  {
    analysisId: integer('analysis_id')
      .notNull()
      .references(() => analyses.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    noteId: integer('note_id')
      .notNull()
      .references(() => notes.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    section: text('section', { enum: ANALYSIS_SECTIONS }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.analysisId, table.noteId, table.section] }),
    sectionCheck: check('analysis_notes_section_check', inList(table.section, ANALYSIS_SECTIONS)),
  })
);

export const analysisCharts = pgTable(
  'analysis_charts',
  {
    analysisId: integer('analysis_id')
      .notNull()
      .references(() => analyses.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    chartId: integer('chart_id')
      .notNull()
      .references(() => charts.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    section: text('section', { enum: ANALYSIS_SECTIONS }).notNull(),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.analysisId, table.chartId, table.section] }),
    sectionCheck: check('analysis_charts_section_check', inList(table.section, ANALYSIS_SECTIONS)),
  })
);

export const setupCharts = pgTable(
  'setup_charts',
  {
    setupId: integer('setup_id')
      .notNull()
      .references(() => setups.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    chartId: integer('chart_id')
      .notNull()
      .references(() => charts.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.setupId, table.chartId] }),
  })
);

export const noteCharts = pgTable(
  'note_charts',
  {
    noteId: integer('note_id')
      .notNull()
      .references(() => notes.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
    chartId: integer('chart_id')
      .notNull()
      .references(() => charts.id, { onDelete: 'cascade', onUpdate: 'cascade' }),
  },
  (table) => ({
    pk: primaryKey({ columns: [table.noteId, table.chartId] }),
  })
);

export type TradeRow = typeof trades.$inferSelect;
export type NoteRow = typeof notes.$inferSelect;
export type ChartRow = typeof charts.$inferSelect;
export type AnalysisRow = typeof analyses.$inferSelect;
export type AccountRow = typeof accounts.$inferSelect;
export type SetupRow = typeof setups.$inferSelect;
