/**
 * Trade status state machine.
 *
 * Pure functions only: the server uses them to gate submits and a UI uses the
 * same functions to decide which statuses and form sections to offer.
 */

import type { Stage, TradeState } from "./types/journal";
import { TRADE_STATES } from "./vocab";

export const STATUS_TRANSITIONS: Record<TradeState, readonly TradeState[]> = {
  open: ["open", "closed", "cancelled", "missed"],
  closed: ["closed", "reviewed"],
  reviewed: ["reviewed"],
  cancelled: ["cancelled"],
  missed: ["missed"],
};

export const STATUS_STAGE: Record<TradeState, Stage> = {
  open: "open",
  closed: "closed",
  reviewed: "review",
  cancelled: "open",
  missed: "open",
};

/** Statuses a brand new trade may start in. */
export const CREATE_ALLOWED_STATUSES: readonly TradeState[] = ["open", "missed"];

const STAGE_ORDER: readonly Stage[] = ["open", "closed", "review"];

export function isTradeState(value: unknown): value is TradeState {
  return TRADE_STATES.some((state) => state === value);
}

/**
 * Forward targets, then states that lead into the current one (so an
 * over-advanced trade can be walked back a stage), then the state itself.
 */
export function allowedStatuses(currentState: string): TradeState[] {
  if (!isTradeState(currentState)) {
    return ["open"];
  }

  const forward = STATUS_TRANSITIONS[currentState];
  const backward = TRADE_STATES.filter((state) =>
    STATUS_TRANSITIONS[state].includes(currentState)
  );

  const ordered: TradeState[] = [];
  for (const candidate of [...forward, ...backward, currentState]) {
    if (!ordered.includes(candidate)) {
      ordered.push(candidate);
    }
  }
  return ordered;
}

export function canTransition(from: TradeState, to: TradeState): boolean {
  return allowedStatuses(from).includes(to);
}

export function stageOf(state: string): Stage {
  return isTradeState(state) ? STATUS_STAGE[state] : "open";
}

/** Form sections that must be filled for the selected target status. */
export function visibleStages(targetState: string): Stage[] {
  const stage = stageOf(targetState);
  return STAGE_ORDER.slice(0, STAGE_ORDER.indexOf(stage) + 1);
}

export function isClosedTier(state: string): boolean {
  return visibleStages(state).includes("closed");
}

export function isReviewTier(state: string): boolean {
  return visibleStages(state).includes("review");
}
