import { describe, expect, it } from "vitest";
import type { EquityPoint, Trade } from "@senko/core";
import { analyzeEquitySeries, computeStatistics } from "./calcPerformance";

const DAY = 86_400_000;

const curve = (equities: number[], exposed: boolean[] = []): EquityPoint[] =>
	equities.map((equity, index) => ({
		timestamp: index * DAY,
		equity,
		cash: equity,
		side: exposed[index] ? "LONG" : "FLAT",
		exposed: exposed[index] ?? false,
	}));

const trade = (pnl: number, returnPct: number): Trade => ({
	side: "LONG",
	entryTimestamp: 0,
	exitTimestamp: DAY,
	entryPrice: 100,
	exitPrice: 100 + returnPct,
	size: 1,
	stopLossPrice: 90,
	takeProfitPrice: 120,
	exitReason: pnl >= 0 ? "TAKE_PROFIT" : "STOP_LOSS",
	commission: 0,
	pnl,
	returnPct,
	barsHeld: 1,
});

const closes = (values: number[]) =>
	values.map((close, index) => ({ timestamp: index * DAY, close }));

describe("computeStatistics", () => {
	it("reports a flat run without trades", () => {
		const stats = computeStatistics({
			equityCurve: curve([1000, 1000, 1000]),
			trades: [],
			bars: closes([10, 11, 12]),
			initialCash: 1000,
		});

		expect(stats.totalReturnPct).toBe(0);
		expect(stats.tradeCount).toBe(0);
		expect(stats.winRatePct).toBe(0);
		expect(stats.profitFactor).toBe(0);
		expect(stats.profitFactorStatus).toBe("no_trades");
		expect(stats.maxDrawdownPct).toBe(0);
		expect(stats.sharpeRatio).toBe(0);
		expect(stats.sortinoRatio).toBe(0);
		expect(stats.exposureTimePct).toBe(0);
		expect(stats.expectancy).toBe(0);
		expect(stats.finalEquity).toBe(1000);
		expect(stats.buyAndHoldReturnPct).toBeCloseTo(20, 10);
	});

	it("returns zeros for an empty curve", () => {
		const stats = computeStatistics({
			equityCurve: [],
			trades: [],
			bars: [],
			initialCash: 1000,
		});
		expect(stats.totalReturnPct).toBe(0);
		expect(stats.buyAndHoldReturnPct).toBe(0);
		expect(stats.startTimestamp).toBeNull();
		expect(stats.finalEquity).toBe(1000);
		expect(stats.exposureTimePct).toBe(0);
	});

	it("derives return and exposure from the equity curve", () => {
		const stats = computeStatistics({
			equityCurve: curve([1000, 1100, 1200, 1200], [true, true, true, false]),
			trades: [trade(200, 20)],
			bars: closes([100, 110, 120, 130]),
			initialCash: 1000,
		});

		expect(stats.totalReturnPct).toBeCloseTo(20, 10);
		expect(stats.buyAndHoldReturnPct).toBeCloseTo(30, 10);
		expect(stats.exposureTimePct).toBe(75);
		expect(stats.winRatePct).toBe(100);
		expect(stats.profitFactor).toBe(Infinity);
		expect(stats.profitFactorStatus).toBe("no_losses");
		expect(stats.peakEquity).toBe(1200);
		expect(stats.barCount).toBe(4);
	});

	it("computes profit factor and trade aggregates", () => {
		const stats = computeStatistics({
			equityCurve: curve([1000, 1300, 1200, 1250]),
			trades: [trade(300, 30), trade(-100, -10), trade(50, 5)],
			bars: closes([1, 1, 1, 1]),
			initialCash: 1000,
		});

		expect(stats.grossProfit).toBe(350);
		expect(stats.grossLoss).toBe(100);
		expect(stats.profitFactor).toBe(3.5);
		expect(stats.profitFactorStatus).toBe("ratio");
		expect(stats.netProfit).toBe(250);
		expect(stats.winRatePct).toBeCloseTo(200 / 3, 10);
		expect(stats.bestTradePct).toBe(30);
		expect(stats.worstTradePct).toBe(-10);
		expect(stats.avgTradePct).toBeCloseTo(25 / 3, 10);
		expect(stats.expectancy).toBeCloseTo(250 / 3, 10);
		expect(stats.longestWinStreak).toBe(1);
		expect(stats.longestLossStreak).toBe(1);
	});

	it("reports an infinite factor when there are winners and no losers", () => {
		const stats = computeStatistics({
			equityCurve: curve([1000, 1100, 1150]),
			trades: [trade(100, 10), trade(50, 5)],
			bars: closes([1, 1, 1]),
			initialCash: 1000,
		});
		expect(stats.grossLoss).toBe(0);
		expect(stats.profitFactor).toBe(Infinity);
		expect(stats.profitFactorStatus).toBe("no_losses");
	});

	it("reports a zero factor when every trade broke even", () => {
		const stats = computeStatistics({
			equityCurve: curve([1000, 1000]),
			trades: [trade(0, 0)],
			bars: closes([1, 1]),
			initialCash: 1000,
		});
		expect(stats.profitFactor).toBe(0);
		expect(stats.profitFactorStatus).toBe("no_losses");
	});

	it("annualizes sharpe and sortino from per-bar returns", () => {
		const stats = computeStatistics({
			equityCurve: curve([110, 99, 108.9]),
			trades: [],
			bars: closes([1, 1, 1]),
			initialCash: 100,
		});

		const returns = [0.1, -0.1, 0.1];
		const mean = 0.1 / 3;
		const std = Math.sqrt(
			returns.reduce((sum, value) => sum + (value - mean) ** 2, 0) / 3
		);
		expect(stats.periodsPerYear).toBe(252);
		expect(stats.sharpeRatio).toBeCloseTo((mean / std) * Math.sqrt(252), 6);
		expect(stats.sortinoRatio).toBeCloseTo((mean / 0.1) * Math.sqrt(252), 6);
	});

	it("gives the same ratios for a curve at any account scale", () => {
		const base = computeStatistics({
			equityCurve: curve([110, 99, 108.9]),
			trades: [],
			bars: closes([1, 1, 1]),
			initialCash: 100,
		});
		const scaled = computeStatistics({
			equityCurve: curve([0.55, 0.495, 0.5445]),
			trades: [],
			bars: closes([1, 1, 1]),
			initialCash: 0.5,
		});

		expect(scaled.sharpeRatio).toBeCloseTo(base.sharpeRatio, 6);
		expect(scaled.sortinoRatio).toBeCloseTo(base.sortinoRatio, 6);
	});

	it("uses an explicit annualization factor", () => {
		const stats = computeStatistics({
			equityCurve: curve([110, 99, 108.9]),
			trades: [],
			bars: closes([1, 1, 1]),
			initialCash: 100,
			periodsPerYear: 12,
		});
		expect(stats.periodsPerYear).toBe(12);
		const mean = 0.1 / 3;
		const std = Math.sqrt(
			[0.1, -0.1, 0.1].reduce((sum, value) => sum + (value - mean) ** 2, 0) / 3
		);
		expect(stats.sharpeRatio).toBeCloseTo((mean / std) * Math.sqrt(12), 6);
	});

	it("passes the ruin flag through", () => {
		const stats = computeStatistics({
			equityCurve: curve([1000, -50]),
			trades: [],
			bars: closes([1, 1]),
			initialCash: 1000,
			ruined: true,
		});
		expect(stats.ruined).toBe(true);
		expect(stats.totalReturnPct).toBeCloseTo(-105, 10);
	});
});

describe("analyzeEquitySeries", () => {
	it("measures drawdown depth from a peak seeded at the initial cash", () => {
		const result = analyzeEquitySeries(curve([90, 95, 120, 96, 100, 121]), 100);

		expect(result.drawdowns).toHaveLength(2);
		expect(result.drawdowns[0].depthPct).toBeCloseTo(10, 10);
		expect(result.drawdowns[0].peakTimestamp).toBeNull();
		expect(result.drawdowns[0].recoveryTimestamp).toBe(2 * DAY);
		expect(result.drawdowns[1].depthPct).toBeCloseTo(20, 10);
		expect(result.drawdowns[1].peakTimestamp).toBe(2 * DAY);
		expect(result.drawdowns[1].troughTimestamp).toBe(3 * DAY);
		expect(result.maxDrawdownPct).toBeCloseTo(20, 10);
		expect(result.avgDrawdownPct).toBeCloseTo(15, 10);
		expect(result.maxDrawdownDurationBars).toBe(2);
		expect(result.peakEquity).toBe(121);
	});

	it("keeps an unrecovered drawdown open to the end", () => {
		const result = analyzeEquitySeries(curve([110, 99, 108.9]), 100);

		expect(result.drawdowns).toHaveLength(1);
		expect(result.drawdowns[0].recoveryTimestamp).toBeNull();
		expect(result.drawdowns[0].troughEquity).toBe(99);
		expect(result.drawdowns[0].durationBars).toBe(2);
		expect(result.maxDrawdownPct).toBeCloseTo(10, 10);
		expect(result.returns).toHaveLength(3);
	});

	it("stops collecting returns once equity is no longer positive", () => {
		const result = analyzeEquitySeries(curve([1000, -50, -40]), 1000);
		expect(result.returns).toEqual([0, -1.05]);
	});

	it("treats a return to the prior peak as recovery", () => {
		const result = analyzeEquitySeries(curve([100, 80, 100]), 100);
		expect(result.drawdowns).toHaveLength(1);
		expect(result.drawdowns[0].recoveryTimestamp).toBe(2 * DAY);
		expect(result.drawdowns[0].depthPct).toBeCloseTo(20, 10);
	});
});
