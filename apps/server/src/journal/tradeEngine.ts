import {
  idRefField,
  numberField,
  resultField,
  stateField,
  toFieldIssues,
  tradePayloadSchema,
  type FieldIssue,
  type TradeInput,
} from "@shared/schemas";
import {
  allowedStatuses,
  CREATE_ALLOWED_STATUSES,
  isClosedTier,
  isReviewTier,
} from "@shared/tradeLifecycle";
import type { Trade, TradeState } from "@shared/types/journal";

import type { TradeRecord } from "./repositories";

export interface TradeInspection {
  input: TradeInput | null;
  issues: FieldIssue[];
}

export interface TradeReferences {
  accountId: number | null;
  setupId: number | null;
  analysisId: number | null;
}

type RawPayload = Record<string, unknown>;

const REFERENCE_FIELDS = ["accountId", "setupId", "analysisId"] as const;

// Closed-tier fields that must hold a value before the state commits
const CLOSE_REQUIREMENTS = [
  { field: "result", schema: resultField, message: "Result is required once the trade is closed" },
  { field: "netPnl", schema: numberField, message: "Net PnL is required once the trade is closed" },
  { field: "riskReward", schema: numberField, message: "Risk/reward is required once the trade is closed" },
] as const;

function isRawPayload(value: unknown): value is RawPayload {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function topLevelField(issue: FieldIssue): string {
  return issue.field.split(".")[0] ?? issue.field;
}

function gateStatus(target: TradeState, current: Trade | null): FieldIssue | null {
  if (current === null) {
    return CREATE_ALLOWED_STATUSES.includes(target)
      ? null
      : {
          field: "state",
          message: `A new trade can only start as ${CREATE_ALLOWED_STATUSES.join(" or ")}`,
        };
  }

  const allowed = allowedStatuses(current.state);
  return allowed.includes(target)
    ? null
    : {
        field: "state",
        message: `Cannot move a ${current.state} trade to ${target} (allowed: ${allowed.join(", ")})`,
      };
}

/**
 * Checks a trade payload against the structural schema and the rules of its
 * target status. Every problem found is returned; nothing throws.
 *
 * `current` is the stored trade for an update, null for a create.
 */
export function inspectTradePayload(raw: unknown, current: Trade | null): TradeInspection {
  const parsed = tradePayloadSchema.safeParse(raw);
  const issues = parsed.success ? [] : toFieldIssues(parsed.error);

  if (!isRawPayload(raw)) {
    return { input: null, issues };
  }

  const reported = new Set(issues.map(topLevelField));
  const target = stateField.safeParse(raw.state);
  if (!target.success) {
    return { input: null, issues };
  }

  const gate = gateStatus(target.data, current);
  if (gate && !reported.has(gate.field)) {
    issues.push(gate);
  }

  if (isClosedTier(target.data)) {
    for (const rule of CLOSE_REQUIREMENTS) {
      if (reported.has(rule.field)) continue;
      const value = rule.schema.safeParse(raw[rule.field]);
      // A value that fails to parse was already reported by the schema
      if (raw[rule.field] === undefined || (value.success && value.data === null)) {
        issues.push({ field: rule.field, message: rule.message });
      }
    }
  }

  if (issues.length > 0 || !parsed.success) {
    return { input: null, issues };
  }
  return { input: parsed.data, issues };
}

/** Reference ids a payload points at, read field by field so one bad id does not hide the others. */
export function referencedIds(raw: unknown): TradeReferences {
  const refs: TradeReferences = { accountId: null, setupId: null, analysisId: null };
  if (!isRawPayload(raw)) return refs;

  for (const field of REFERENCE_FIELDS) {
    const parsed = idRefField.safeParse(raw[field]);
    refs[field] = parsed.success ? parsed.data : null;
  }
  return refs;
}

export interface BuildTradeOptions {
  now: Date;
  defaultTz?: string;
}

/**
 * Turns validated input into the full row to write. Fields belonging to a
 * stage the target status does not reach are reset; review notes omitted from
 * an update keep their stored values.
 */
export function buildTradeRecord(
  input: TradeInput,
  current: Trade | null,
  { now, defaultTz }: BuildTradeOptions
): TradeRecord {
  const closed = isClosedTier(input.state);
  const review = isReviewTier(input.state);

  return {
    localTz: input.localTz ?? current?.localTz ?? defaultTz ?? null,
    dateLocal: input.dateLocal,
    timeLocal: input.timeLocal,
    accountId: input.accountId ?? null,
    setupId: input.setupId ?? null,
    analysisId: input.analysisId ?? null,
    asset: input.asset,
    session: input.session ?? null,
    state: input.state,
    riskPct: input.riskPct,

    result: closed ? input.result ?? null : null,
    netPnl: closed ? input.netPnl ?? null : null,
    riskReward: closed ? input.riskReward ?? null : null,
    rewardPercent: closed ? input.rewardPercent ?? null : null,
    hotThoughts: closed ? input.hotThoughts ?? null : null,
    emotionalProblems: closed ? input.emotionalProblems ?? [] : [],

    coldThoughts: review
      ? input.coldThoughts !== undefined
        ? input.coldThoughts
        : current?.coldThoughts ?? null
      : null,
    estimation: review
      ? input.estimation !== undefined
        ? input.estimation
        : current?.estimation ?? null
      : null,

    closedAtUtc: current?.closedAtUtc ?? (closed ? now : null),
  };
}
