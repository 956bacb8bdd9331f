import {
	createLogger,
	inferPeriodsPerYear,
	type EquityPoint,
	type Trade,
} from "@senko/core";
import { buildStreakDiagnostics } from "./diagnostics";
import type {
	BacktestStatistics,
	DrawdownSpan,
	EquityCurveStats,
	ProfitFactorStatus,
} from "./metricsSchema";

const logger = createLogger("metrics");

export interface StatisticsInput {
	equityCurve: readonly EquityPoint[];
	trades: readonly Trade[];
	/** Bars the simulation ran over; buy-and-hold uses the first and last close. */
	bars: readonly { timestamp: number; close: number }[];
	initialCash: number;
	/** Inferred from the median bar spacing when omitted. */
	periodsPerYear?: number;
	/** Annual rate, 0 by default. */
	riskFreeRate?: number;
	ruined?: boolean;
}

export const computeStatistics = (
	input: StatisticsInput
): BacktestStatistics => {
	const { equityCurve, trades, bars, initialCash } = input;
	const curve = analyzeEquitySeries(equityCurve, initialCash);

	const periodsPerYear =
		input.periodsPerYear ??
		inferPeriodsPerYear(equityCurve.map((point) => point.timestamp));
	const riskFreeRate = input.riskFreeRate ?? 0;

	const grossProfit = trades
		.filter((trade) => trade.pnl > 0)
		.reduce((sum, trade) => sum + trade.pnl, 0);
	const grossLoss = trades
		.filter((trade) => trade.pnl < 0)
		.reduce((sum, trade) => sum + Math.abs(trade.pnl), 0);
	const netProfit = trades.reduce((sum, trade) => sum + trade.pnl, 0);
	const tradeCount = trades.length;
	const wins = trades.filter((trade) => trade.pnl > 0).length;
	const { profitFactor, profitFactorStatus } = computeProfitFactor(
		tradeCount,
		grossProfit,
		grossLoss
	);

	const tradeReturns = trades.map((trade) => trade.returnPct);
	const exposedBars = equityCurve.filter((point) => point.exposed).length;
	const streaks = buildStreakDiagnostics(trades);

	const firstClose = bars[0]?.close;
	const lastClose = bars.at(-1)?.close;
	const buyAndHoldReturnPct =
		firstClose !== undefined && lastClose !== undefined && firstClose > 0
			? (lastClose / firstClose - 1) * 100
			: 0;

	const statistics: BacktestStatistics = {
		startTimestamp: equityCurve[0]?.timestamp ?? null,
		endTimestamp: equityCurve.at(-1)?.timestamp ?? null,
		barCount: equityCurve.length,
		initialCash,
		finalEquity: curve.finalEquity,
		peakEquity: curve.peakEquity,
		totalReturnPct: equityCurve.length
			? (curve.finalEquity / initialCash - 1) * 100
			: 0,
		buyAndHoldReturnPct,
		maxDrawdownPct: curve.maxDrawdownPct,
		avgDrawdownPct: curve.avgDrawdownPct,
		maxDrawdownDurationBars: curve.maxDrawdownDurationBars,
		tradeCount,
		winRatePct: tradeCount ? (wins / tradeCount) * 100 : 0,
		profitFactor,
		profitFactorStatus,
		netProfit,
		grossProfit,
		grossLoss,
		bestTradePct: tradeReturns.length ? Math.max(...tradeReturns) : 0,
		worstTradePct: tradeReturns.length ? Math.min(...tradeReturns) : 0,
		avgTradePct: mean(tradeReturns),
		expectancy: tradeCount ? netProfit / tradeCount : 0,
		sharpeRatio: computeSharpe(curve.returns, riskFreeRate, periodsPerYear),
		sortinoRatio: computeSortino(curve.returns, riskFreeRate, periodsPerYear),
		periodsPerYear,
		exposureTimePct: equityCurve.length
			? (exposedBars / equityCurve.length) * 100
			: 0,
		longestWinStreak: streaks.longestWinStreak,
		longestLossStreak: streaks.longestLossStreak,
		ruined: input.ruined ?? false,
	};

	logger.debug("statistics_computed", {
		bars: statistics.barCount,
		trades: tradeCount,
		totalReturnPct: statistics.totalReturnPct,
	});

	return statistics;
};

const computeProfitFactor = (
	tradeCount: number,
	grossProfit: number,
	grossLoss: number
): { profitFactor: number; profitFactorStatus: ProfitFactorStatus } => {
	if (!tradeCount) {
		return { profitFactor: 0, profitFactorStatus: "no_trades" };
	}
	if (grossLoss === 0) {
		return {
			profitFactor: grossProfit > 0 ? Infinity : 0,
			profitFactorStatus: "no_losses",
		};
	}
	return { profitFactor: grossProfit / grossLoss, profitFactorStatus: "ratio" };
};

interface ActiveSpan {
	peakTimestamp: number | null;
	peakEquity: number;
	troughTimestamp: number;
	troughEquity: number;
	durationBars: number;
}

/**
 * Per-bar returns and drawdown episodes of an equity curve. The running peak
 * starts at the initial cash; an episode lasts while equity stays below it.
 * A bar that starts from non-positive equity has no return.
 */
export const analyzeEquitySeries = (
	series: readonly EquityPoint[],
	initialCash: number
): EquityCurveStats => {
	const returns: number[] = [];
	const drawdowns: DrawdownSpan[] = [];
	let peakEquity = initialCash;
	let peakTimestamp: number | null = null;
	let previousEquity = initialCash;
	let activeSpan: ActiveSpan | null = null;

	for (const point of series) {
		if (previousEquity > 0) {
			returns.push((point.equity - previousEquity) / previousEquity);
		}
		previousEquity = point.equity;

		if (point.equity >= peakEquity) {
			if (activeSpan) {
				finalizeDrawdown(drawdowns, activeSpan, point.timestamp);
				activeSpan = null;
			}
			peakEquity = point.equity;
			peakTimestamp = point.timestamp;
			continue;
		}

		if (!activeSpan) {
			activeSpan = {
				peakTimestamp,
				peakEquity,
				troughTimestamp: point.timestamp,
				troughEquity: point.equity,
				durationBars: 1,
			};
			continue;
		}

		activeSpan.durationBars += 1;
		if (point.equity < activeSpan.troughEquity) {
			activeSpan.troughEquity = point.equity;
			activeSpan.troughTimestamp = point.timestamp;
		}
	}

	if (activeSpan) {
		finalizeDrawdown(drawdowns, activeSpan, null);
	}

	const depths = drawdowns.map((span) => span.depthPct);
	return {
		returns,
		drawdowns,
		maxDrawdownPct: depths.length ? Math.max(...depths) : 0,
		avgDrawdownPct: mean(depths),
		maxDrawdownDurationBars: drawdowns.length
			? Math.max(...drawdowns.map((span) => span.durationBars))
			: 0,
		peakEquity,
		finalEquity: series.at(-1)?.equity ?? initialCash,
	};
};

const finalizeDrawdown = (
	drawdowns: DrawdownSpan[],
	span: ActiveSpan,
	recoveryTimestamp: number | null
): void => {
	const depth = span.peakEquity - span.troughEquity;
	drawdowns.push({
		peakTimestamp: span.peakTimestamp,
		troughTimestamp: span.troughTimestamp,
		recoveryTimestamp,
		peakEquity: span.peakEquity,
		troughEquity: span.troughEquity,
		depthPct: span.peakEquity > 0 ? (depth / span.peakEquity) * 100 : 0,
		durationBars: span.durationBars,
	});
};

const mean = (values: readonly number[]): number =>
	values.length
		? values.reduce((sum, value) => sum + value, 0) / values.length
		: 0;

export const computeSharpe = (
	returns: readonly number[],
	riskFreeRate: number,
	periodsPerYear: number
): number => {
	if (returns.length < 2 || periodsPerYear <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periodsPerYear) - 1;
	const excess = mean(returns) - rfPerPeriod;
	const std = standardDeviation(returns);
	return std === 0 ? 0 : (excess / std) * Math.sqrt(periodsPerYear);
};

export const computeSortino = (
	returns: readonly number[],
	riskFreeRate: number,
	periodsPerYear: number
): number => {
	if (returns.length < 2 || periodsPerYear <= 0) {
		return 0;
	}
	const rfPerPeriod = Math.pow(1 + riskFreeRate, 1 / periodsPerYear) - 1;
	const downside = returns.filter((value) => value < rfPerPeriod);
	if (!downside.length) {
		return 0;
	}
	const excess = mean(returns) - rfPerPeriod;
	const downsideDeviation = Math.sqrt(
		downside.reduce((sum, value) => sum + (value - rfPerPeriod) ** 2, 0) /
			downside.length
	);
	return downsideDeviation === 0
		? 0
		: (excess / downsideDeviation) * Math.sqrt(periodsPerYear);
};

const standardDeviation = (values: readonly number[]): number => {
	if (values.length < 2) {
		return 0;
	}
	const average = mean(values);
	const variance =
		values.reduce((sum, value) => sum + (value - average) ** 2, 0) /
		values.length;
	return Math.sqrt(variance);
};
