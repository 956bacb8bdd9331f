import {
	createLogger,
	hashJson,
	resolveBacktestConfig,
	summarizeBars,
} from "@senko/core";
import type {
	BacktestConfig,
	BacktestConfigInput,
	BarFingerprintSummary,
	EquityPoint,
	OpenPosition,
	PriceBar,
	SignalRow,
	Trade,
} from "@senko/core";
import { normalizeBars } from "@senko/data";
import { buildIndicatorTable } from "@senko/indicators";
import type { CloudIndicatorParams } from "@senko/indicators";
import { generateSignals } from "@senko/strategy-engine";
import type { CloudSignalParams } from "@senko/strategy-engine";
import type { RiskConfig } from "@senko/risk-engine";
import { TradeSimulator } from "@senko/execution-engine";
import type {
	RuinState,
	SimulationResult,
	SkippedSignalReason,
} from "@senko/execution-engine";
import { analyzeEquitySeries, computeStatistics } from "@senko/metrics";
import type { BacktestStatistics, DrawdownSpan } from "@senko/metrics";

const backtestLogger = createLogger("backtest-core");

export interface RunBacktestOptions {
	symbol?: string;
	/** Annualization factor for sharpe/sortino; inferred from bar spacing when omitted. */
	periodsPerYear?: number;
	riskFreeRate?: number;
}

export interface BacktestRunResult {
	symbol: string;
	config: BacktestConfig;
	configFingerprint: string;
	data: BarFingerprintSummary;
	table: SignalRow[];
	trades: Trade[];
	equityCurve: EquityPoint[];
	openPosition: OpenPosition | null;
	ruin: RuinState;
	skippedSignals: Record<SkippedSignalReason, number>;
	drawdowns: DrawdownSpan[];
	statistics: BacktestStatistics;
}

export const toCloudParams = (config: BacktestConfig): CloudIndicatorParams => ({
	fastWindow: config.indicators.fastWindow,
	slowWindow: config.indicators.slowWindow,
	cloudWindow: config.indicators.cloudWindow,
	volatilityWindow: config.indicators.volatilityWindow,
	trendLength: config.trendFilter.length,
});

export const toSignalParams = (config: BacktestConfig): CloudSignalParams => ({
	lookbackWindow: config.signal.lookbackWindow,
	minConfirm: config.signal.minConfirm,
	trendBackCandles: config.trendFilter.backCandles,
});

export const toRiskConfig = (config: BacktestConfig): RiskConfig => ({
	stopMultiplier: config.risk.stopMultiplier,
	rewardMultiplier: config.risk.rewardMultiplier,
	positionSizeFraction: config.risk.positionSizeFraction,
	marginRatio: config.account.marginRatio,
	commissionRate: config.account.commissionRate,
});

/** Indicator and signal table for already validated bars. */
export const buildSignalTable = (
	bars: readonly PriceBar[],
	config: BacktestConfig
): SignalRow[] =>
	generateSignals(
		buildIndicatorTable(bars, toCloudParams(config)),
		toSignalParams(config)
	);

export interface SimulationReport {
	simulation: SimulationResult;
	drawdowns: DrawdownSpan[];
	statistics: BacktestStatistics;
}

export const simulateTable = (
	table: readonly SignalRow[],
	config: BacktestConfig,
	options: RunBacktestOptions = {}
): SimulationReport => {
	const simulator = new TradeSimulator({
		initialCash: config.account.initialCash,
		risk: toRiskConfig(config),
		symbol: options.symbol,
	});
	const simulation = simulator.run(table);
	const statistics = computeStatistics({
		equityCurve: simulation.equityCurve,
		trades: simulation.trades,
		bars: table,
		initialCash: config.account.initialCash,
		periodsPerYear: options.periodsPerYear,
		riskFreeRate: options.riskFreeRate,
		ruined: simulation.ruin.triggered,
	});
	const { drawdowns } = analyzeEquitySeries(
		simulation.equityCurve,
		config.account.initialCash
	);
	return { simulation, drawdowns, statistics };
};

/**
 * Runs one symbol end to end. The configuration is validated before the bars,
 * and the bars before any indicator work.
 */
export const runBacktest = (
	rawBars: readonly unknown[],
	configInput: BacktestConfigInput = {},
	options: RunBacktestOptions = {}
): BacktestRunResult => {
	const config = resolveBacktestConfig(configInput);
	const symbol = options.symbol ?? "UNKNOWN";
	const bars = normalizeBars(rawBars, { source: symbol });
	const configFingerprint = hashJson(config);

	backtestLogger.debug("backtest_started", {
		symbol,
		bars: bars.length,
		configFingerprint,
	});

	const table = buildSignalTable(bars, config);
	const { simulation, drawdowns, statistics } = simulateTable(
		table,
		config,
		{ ...options, symbol }
	);

	backtestLogger.info("backtest_completed", { symbol, statistics });

	return {
		symbol,
		config,
		configFingerprint,
		data: summarizeBars(bars),
		table,
		trades: simulation.trades,
		equityCurve: simulation.equityCurve,
		openPosition: simulation.openPosition,
		ruin: simulation.ruin,
		skippedSignals: simulation.skippedSignals,
		drawdowns,
		statistics,
	};
};
