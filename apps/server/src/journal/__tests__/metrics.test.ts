import { describe, it, expect } from "vitest";
import type { Trade } from "@shared/types/journal";

import { computeMetrics, equityCurve } from "../metrics";

let nextId = 1;

function trade(overrides: Partial<Trade>): Trade {
  return {
    id: nextId++,
    localTz: "UTC+3",
    dateLocal: "2024-03-04",
    timeLocal: "10:00:00",
    accountId: null,
    setupId: null,
    analysisId: null,
    asset: "EURUSD",
    session: null,
    state: "closed",
    result: "win",
    netPnl: 100,
    riskPct: 1,
    riskReward: 2,
    rewardPercent: null,
    estimation: null,
    emotionalProblems: [],
    hotThoughts: null,
    coldThoughts: null,
    closedAtUtc: new Date("2024-03-04T09:00:00Z"),
    ...overrides,
  };
}

describe("computeMetrics", () => {
  it("returns zeros without finished trades", () => {
    const metrics = computeMetrics([trade({ state: "open", result: null, netPnl: null })]);

    expect(metrics).toEqual({
      count: 0,
      winRate: 0,
      profitFactor: 0,
      expectancyR: 0,
      avgR: 0,
      totalPnl: 0,
      bestTrade: 0,
      worstTrade: 0,
    });
  });

  it("summarises wins, losses and break-evens", () => {
    const metrics = computeMetrics([
      trade({ result: "win", netPnl: 200, riskReward: 2 }),
      trade({ result: "win", netPnl: 100, riskReward: 1 }),
      trade({ state: "reviewed", result: "loss", netPnl: -100, riskReward: 3 }),
      trade({ result: "be", netPnl: 0, riskReward: null }),
    ]);

    expect(metrics).toEqual({
      count: 4,
      winRate: 50,
      profitFactor: 3,
      expectancyR: 0.25,
      avgR: 0.5,
      totalPnl: 200,
      bestTrade: 200,
      worstTrade: -100,
    });
  });

  it("has no profit factor when nothing was lost", () => {
    expect(computeMetrics([trade({ netPnl: 50 })]).profitFactor).toBeNull();
  });

  it("ignores cancelled and missed trades and closed ones without an outcome", () => {
    const metrics = computeMetrics([
      trade({ state: "cancelled" }),
      trade({ state: "missed" }),
      trade({ result: null }),
      trade({ netPnl: -40, result: "loss" }),
    ]);

    expect(metrics.count).toBe(1);
    expect(metrics.winRate).toBe(0);
    expect(metrics.expectancyR).toBe(-1);
  });
});

describe("equityCurve", () => {
  it("accumulates pnl in trade time order", () => {
    const late = trade({ dateLocal: "2024-03-05", netPnl: -30.1 });
    const early = trade({ dateLocal: "2024-03-04", timeLocal: "15:00:00", netPnl: 80.2 });
    const earliest = trade({ dateLocal: "2024-03-04", timeLocal: "09:00:00", netPnl: 10 });

    expect(equityCurve([late, early, earliest]).map((point) => [point.tradeId, point.cumulativePnl])).toEqual([
      [earliest.id, 10],
      [early.id, 90.2],
      [late.id, 60.1],
    ]);
  });
});
