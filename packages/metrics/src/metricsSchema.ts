export interface DrawdownSpan {
	peakTimestamp: number | null;
	troughTimestamp: number;
	recoveryTimestamp: number | null;
	peakEquity: number;
	troughEquity: number;
	/** Peak-to-trough decline as a positive percentage of the peak. */
	depthPct: number;
	/** Bars spent below the peak. */
	durationBars: number;
}

export interface EquityCurveStats {
	returns: number[];
	drawdowns: DrawdownSpan[];
	maxDrawdownPct: number;
	avgDrawdownPct: number;
	maxDrawdownDurationBars: number;
	peakEquity: number;
	finalEquity: number;
}

export interface StreakDiagnostics {
	longestWinStreak: number;
	longestLossStreak: number;
}

/**
 * `ratio` is gross profit over gross loss. Without losing trades the factor is
 * Infinity when anything was won and 0 otherwise; without trades it is 0.
 */
export type ProfitFactorStatus = "ratio" | "no_losses" | "no_trades";

export interface BacktestStatistics {
	startTimestamp: number | null;
	endTimestamp: number | null;
	barCount: number;
	initialCash: number;
	finalEquity: number;
	peakEquity: number;
	totalReturnPct: number;
	buyAndHoldReturnPct: number;
	maxDrawdownPct: number;
	avgDrawdownPct: number;
	maxDrawdownDurationBars: number;
	tradeCount: number;
	winRatePct: number;
	profitFactor: number;
	profitFactorStatus: ProfitFactorStatus;
	netProfit: number;
	grossProfit: number;
	grossLoss: number;
	bestTradePct: number;
	worstTradePct: number;
	avgTradePct: number;
	expectancy: number;
	sharpeRatio: number;
	sortinoRatio: number;
	periodsPerYear: number;
	exposureTimePct: number;
	longestWinStreak: number;
	longestLossStreak: number;
	ruined: boolean;
}

/** Numeric statistics usable as an optimization target or batch average. */
export type NumericStatistic = {
	[K in keyof BacktestStatistics]: BacktestStatistics[K] extends number
		? K
		: never;
}[keyof BacktestStatistics];

export const SUMMARY_COLUMNS = [
	"totalReturnPct",
	"buyAndHoldReturnPct",
	"maxDrawdownPct",
	"avgDrawdownPct",
	"winRatePct",
	"profitFactor",
	"sharpeRatio",
	"sortinoRatio",
	"exposureTimePct",
	"tradeCount",
	"finalEquity",
] as const satisfies readonly NumericStatistic[];

export type SummaryColumn = (typeof SUMMARY_COLUMNS)[number];

export type BatchRowStatus = "completed" | "failed" | "average";

export interface BatchSummaryRow {
	symbol: string;
	status: BatchRowStatus;
	values: Record<SummaryColumn, number> | null;
	error: string | null;
}

export const NUMERIC_STATISTICS = [
	"barCount",
	"initialCash",
	"finalEquity",
	"peakEquity",
	"totalReturnPct",
	"buyAndHoldReturnPct",
	"maxDrawdownPct",
	"avgDrawdownPct",
	"maxDrawdownDurationBars",
	"tradeCount",
	"winRatePct",
	"profitFactor",
	"netProfit",
	"grossProfit",
	"grossLoss",
	"bestTradePct",
	"worstTradePct",
	"avgTradePct",
	"expectancy",
	"sharpeRatio",
	"sortinoRatio",
	"periodsPerYear",
	"exposureTimePct",
	"longestWinStreak",
	"longestLossStreak",
] as const satisfies readonly NumericStatistic[];

export const isNumericStatistic = (value: string): value is NumericStatistic =>
	NUMERIC_STATISTICS.some((key) => key === value);
