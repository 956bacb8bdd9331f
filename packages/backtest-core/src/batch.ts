import {
	createLogger,
	describeError,
	resolveBacktestConfig,
} from "@senko/core";
import type { BacktestConfigInput, ErrorDescription } from "@senko/core";
import type {
	BacktestStatistics,
	BatchSummaryRow,
	SummaryColumn,
} from "@senko/metrics";
import { runBacktest } from "./runBacktest";
import type { BacktestRunResult, RunBacktestOptions } from "./runBacktest";

const batchLogger = createLogger("backtest-core:batch");

export const AVERAGE_ROW_SYMBOL = "AVERAGE";

export type BarSource =
	| readonly unknown[]
	| (() => Promise<readonly unknown[]>);

export interface BatchJob {
	symbol: string;
	/** Bars, or a loader whose failure is recorded against this symbol. */
	bars: BarSource;
}

export type BatchOutcome =
	| { symbol: string; status: "completed"; result: BacktestRunResult }
	| { symbol: string; status: "failed"; error: ErrorDescription };

export type BatchOptions = Omit<RunBacktestOptions, "symbol">;

const loadJobBars = async (source: BarSource): Promise<readonly unknown[]> =>
	typeof source === "function" ? source() : source;

/**
 * Runs each symbol independently and in order. A failing symbol is recorded
 * with its error code and never stops the rest. An invalid configuration
 * fails the whole batch before any symbol runs.
 */
export const runBatch = async (
	jobs: readonly BatchJob[],
	configInput: BacktestConfigInput = {},
	options: BatchOptions = {}
): Promise<BatchOutcome[]> => {
	const config = resolveBacktestConfig(configInput);
	const outcomes: BatchOutcome[] = [];

	for (const job of jobs) {
		try {
			const bars = await loadJobBars(job.bars);
			const result = runBacktest(bars, config, {
				...options,
				symbol: job.symbol,
			});
			outcomes.push({ symbol: job.symbol, status: "completed", result });
		} catch (error) {
			const description = describeError(error);
			batchLogger.error("batch_run_failed", {
				symbol: job.symbol,
				...description,
			});
			outcomes.push({
				symbol: job.symbol,
				status: "failed",
				error: description,
			});
		}
	}

	return outcomes;
};

const pickSummaryValues = (
	statistics: BacktestStatistics
): Record<SummaryColumn, number> => ({
	totalReturnPct: statistics.totalReturnPct,
	buyAndHoldReturnPct: statistics.buyAndHoldReturnPct,
	maxDrawdownPct: statistics.maxDrawdownPct,
	avgDrawdownPct: statistics.avgDrawdownPct,
	winRatePct: statistics.winRatePct,
	profitFactor: statistics.profitFactor,
	sharpeRatio: statistics.sharpeRatio,
	sortinoRatio: statistics.sortinoRatio,
	exposureTimePct: statistics.exposureTimePct,
	tradeCount: statistics.tradeCount,
	finalEquity: statistics.finalEquity,
});

const mean = (values: readonly number[]): number =>
	values.length
		? values.reduce((sum, value) => sum + value, 0) / values.length
		: NaN;

/**
 * Column means over completed runs. Profit factor is averaged over runs with a
 * finite ratio only, and is NaN when there is none.
 */
const averageValues = (
	runs: readonly BacktestStatistics[]
): Record<SummaryColumn, number> => {
	const rows = runs.map(pickSummaryValues);
	const columnMean = (column: SummaryColumn): number =>
		mean(rows.map((row) => row[column]));
	return {
		totalReturnPct: columnMean("totalReturnPct"),
		buyAndHoldReturnPct: columnMean("buyAndHoldReturnPct"),
		maxDrawdownPct: columnMean("maxDrawdownPct"),
		avgDrawdownPct: columnMean("avgDrawdownPct"),
		winRatePct: columnMean("winRatePct"),
		profitFactor: mean(
			runs
				.filter((run) => run.profitFactorStatus === "ratio")
				.map((run) => run.profitFactor)
		),
		sharpeRatio: columnMean("sharpeRatio"),
		sortinoRatio: columnMean("sortinoRatio"),
		exposureTimePct: columnMean("exposureTimePct"),
		tradeCount: columnMean("tradeCount"),
		finalEquity: columnMean("finalEquity"),
	};
};

/**
 * One row per symbol plus an AVERAGE row over the completed runs. Without a
 * completed run there is no AVERAGE row.
 */
export const summarizeBatch = (
	outcomes: readonly BatchOutcome[]
): BatchSummaryRow[] => {
	const rows = outcomes.map((outcome): BatchSummaryRow =>
		outcome.status === "completed"
			? {
					symbol: outcome.symbol,
					status: "completed",
					values: pickSummaryValues(outcome.result.statistics),
					error: null,
				}
			: {
					symbol: outcome.symbol,
					status: "failed",
					values: null,
					error: `${outcome.error.code}: ${outcome.error.message}`,
				}
	);

	const completed = outcomes.flatMap((outcome) =>
		outcome.status === "completed" ? [outcome.result.statistics] : []
	);
	if (completed.length) {
		rows.push({
			symbol: AVERAGE_ROW_SYMBOL,
			status: "average",
			values: averageValues(completed),
			error: null,
		});
	}

	batchLogger.info("batch_completed", {
		rows: rows.map((row) => ({
			symbol: row.symbol,
			status: row.status,
			...row.values,
		})),
	});

	return rows;
};
