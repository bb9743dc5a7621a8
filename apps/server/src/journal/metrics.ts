import type { Trade, TradeResult } from "@shared/types/journal";

export interface JournalMetrics {
  count: number;
  winRate: number;
  /** null when there are winning trades but no losing ones. */
  profitFactor: number | null;
  expectancyR: number;
  avgR: number;
  totalPnl: number;
  bestTrade: number;
  worstTrade: number;
}

export interface EquityPoint {
  tradeId: number;
  dateLocal: string;
  timeLocal: string;
  pnl: number;
  cumulativePnl: number;
}

interface ScoredTrade {
  trade: Trade;
  result: TradeResult;
  pnl: number;
  r: number;
}

const EMPTY_METRICS: JournalMetrics = {
  count: 0,
  winRate: 0,
  profitFactor: 0,
  expectancyR: 0,
  avgR: 0,
  totalPnl: 0,
  bestTrade: 0,
  worstTrade: 0,
};

function round(value: number, digits: number): number {
  const factor = 10 ** digits;
  return Math.round(value * factor) / factor;
}

function sum(values: number[]): number {
  return values.reduce((total, value) => total + value, 0);
}

function mean(values: number[]): number {
  return values.length > 0 ? sum(values) / values.length : 0;
}

function rMultiple(result: TradeResult, riskReward: number | null): number {
  switch (result) {
    case "win":
      return riskReward ?? 0;
    case "loss":
      return -1;
    case "be":
      return 0;
  }
}

/** Finished trades with an outcome; everything else is left out of the figures. */
function scoreTrades(trades: readonly Trade[]): ScoredTrade[] {
  const scored: ScoredTrade[] = [];
  for (const trade of trades) {
    if (trade.state !== "closed" && trade.state !== "reviewed") continue;
    if (trade.result === null || trade.netPnl === null) continue;
    scored.push({
      trade,
      result: trade.result,
      pnl: trade.netPnl,
      r: rMultiple(trade.result, trade.riskReward),
    });
  }
  return scored;
}

export function computeMetrics(trades: readonly Trade[]): JournalMetrics {
  const scored = scoreTrades(trades);
  if (scored.length === 0) {
    return { ...EMPTY_METRICS };
  }

  const pnls = scored.map((entry) => entry.pnl);
  const rs = scored.map((entry) => entry.r);

  const grossWin = sum(pnls.filter((pnl) => pnl > 0));
  const grossLoss = -sum(pnls.filter((pnl) => pnl < 0));
  let profitFactor: number | null;
  if (grossLoss > 0) {
    profitFactor = round(grossWin / grossLoss, 2);
  } else {
    profitFactor = grossWin > 0 ? null : 0;
  }

  const winShare = scored.filter((entry) => entry.result === "win").length / scored.length;
  const avgWinR = mean(rs.filter((r) => r > 0));
  const avgLossR = -mean(rs.filter((r) => r < 0));
  const expectancyR = winShare * avgWinR - (1 - winShare) * avgLossR;

  return {
    count: scored.length,
    winRate: round(winShare * 100, 2),
    profitFactor,
    expectancyR: round(expectancyR, 3),
    avgR: round(mean(rs), 3),
    totalPnl: round(sum(pnls), 2),
    bestTrade: round(Math.max(...pnls), 2),
    worstTrade: round(Math.min(...pnls), 2),
  };
}

export function equityCurve(trades: readonly Trade[]): EquityPoint[] {
  const ordered = scoreTrades(trades).sort(
    (a, b) =>
      a.trade.dateLocal.localeCompare(b.trade.dateLocal) ||
      a.trade.timeLocal.localeCompare(b.trade.timeLocal) ||
      a.trade.id - b.trade.id
  );

  let running = 0;
  return ordered.map(({ trade, pnl }) => {
    running += pnl;
    return {
      tradeId: trade.id,
      dateLocal: trade.dateLocal,
      timeLocal: trade.timeLocal,
      pnl,
      cumulativePnl: round(running, 2),
    };
  });
}
