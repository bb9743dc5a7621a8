import type { TradeResult, TradeState } from "@shared/types/journal";
import { EMOTIONAL_PROBLEMS, TRADE_RESULTS, TRADE_SESSIONS } from "@shared/vocab";

import type { Journal } from "./index";

export interface SeedOptions {
  count?: number;
  now?: Date;
  asset?: string;
}

export interface SeedSummary {
  tradeIds: number[];
  byState: Record<TradeState, number>;
}

const HOUR_MS = 60 * 60 * 1000;

function pick<T>(values: readonly [T, ...T[]], index: number): T {
  return values[index % values.length] ?? values[0];
}

function seedState(index: number): TradeState {
  const closed = index % 3 !== 0;
  if (!closed) return "open";
  return index % 5 === 0 ? "reviewed" : "closed";
}

function seedPnl(result: TradeResult, index: number): number {
  switch (result) {
    case "win":
      return (index + 1) * 50;
    case "loss":
      return -(index + 1) * 25;
    case "be":
      return 0;
  }
}

/**
 * Inserts demo trades six hours apart going back from `now`, walking each one
 * through the same service calls a user would make (create open, then close,
 * then review), so every row passes the lifecycle rules.
 */
export async function seedJournal(journal: Journal, options: SeedOptions = {}): Promise<SeedSummary> {
  const count = options.count ?? 10;
  const now = options.now ?? new Date();
  const asset = options.asset ?? "EURUSD";

  const summary: SeedSummary = {
    tradeIds: [],
    byState: { open: 0, closed: 0, reviewed: 0, cancelled: 0, missed: 0 },
  };

  for (let index = 0; index < count; index++) {
    const openedAt = new Date(now.getTime() - index * 6 * HOUR_MS).toISOString();
    const opening = {
      state: "open",
      localTz: "UTC",
      dateLocal: openedAt.slice(0, 10),
      timeLocal: openedAt.slice(11, 19),
      asset,
      session: pick(TRADE_SESSIONS, index),
      riskPct: 0.5 + (index % 4) * 0.5,
    };
    const id = await journal.trades.createTrade(opening);
    const state = seedState(index);

    if (state !== "open") {
      const result = pick(TRADE_RESULTS, index + 2);
      const riskReward = 1 + (index % 4) * 0.5;
      const problems = [
        ...(index % 2 === 0 ? [EMOTIONAL_PROBLEMS[0]] : []),
        ...(index % 3 === 0 ? [EMOTIONAL_PROBLEMS[1]] : []),
      ];
      const closing = {
        ...opening,
        state: "closed",
        result,
        netPnl: seedPnl(result, index),
        riskReward,
        rewardPercent: riskReward * 10,
        emotionalProblems: problems,
        hotThoughts: `Demo trade ${index + 1}`,
      };
      await journal.trades.updateTrade(id, closing);

      if (state === "reviewed") {
        await journal.trades.updateTrade(id, {
          ...closing,
          state: "reviewed",
          coldThoughts: "Followed the plan",
          estimation: index % 2,
        });
      }
    }

    summary.tradeIds.push(id);
    summary.byState[state] += 1;
  }
  return summary;
}
