export {
	analyzeEquitySeries,
	computeSharpe,
	computeSortino,
	computeStatistics,
} from "./calcPerformance";
export type { StatisticsInput } from "./calcPerformance";
export { buildStreakDiagnostics } from "./diagnostics";
export {
	formatBatchSummaryCsv,
	formatStatisticsCsv,
	formatTradesCsv,
	formatValue,
	toCsv,
} from "./formatCSV";
export type { FormatCsvOptions } from "./formatCSV";
export {
	NUMERIC_STATISTICS,
	SUMMARY_COLUMNS,
	isNumericStatistic,
} from "./metricsSchema";
export type {
	BacktestStatistics,
	BatchRowStatus,
	BatchSummaryRow,
	DrawdownSpan,
	EquityCurveStats,
	NumericStatistic,
	ProfitFactorStatus,
	StreakDiagnostics,
	SummaryColumn,
} from "./metricsSchema";
