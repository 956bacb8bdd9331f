import { setImmediate as yieldToEventLoop } from "node:timers/promises";
import {
	InvalidConfigurationError,
	createLogger,
	hashJson,
	mergeBacktestConfig,
	resolveBacktestConfig,
} from "@senko/core";
import type { BacktestConfigInput } from "@senko/core";
import { normalizeBars } from "@senko/data";
import type { BacktestStatistics, NumericStatistic } from "@senko/metrics";
import { buildSignalTable, simulateTable } from "./runBacktest";
import type { RunBacktestOptions } from "./runBacktest";

const optimizeLogger = createLogger("backtest-core:optimize");

export interface RiskGrid {
	stopMultipliers: readonly number[];
	rewardMultipliers: readonly number[];
}

/** Inclusive range; values are rounded to cancel floating-point drift. */
export const buildRange = (
	start: number,
	end: number,
	step: number
): number[] => {
	if (!(step > 0) || end < start) {
		return [];
	}
	const count = Math.floor((end - start) / step + 1e-9) + 1;
	return Array.from(
		{ length: count },
		(_, i) => Math.round((start + i * step) * 1e9) / 1e9
	);
};

export const DEFAULT_RISK_GRID: RiskGrid = {
	stopMultipliers: buildRange(1.0, 2.4, 0.1),
	rewardMultipliers: buildRange(1.0, 2.9, 0.1),
};

export type OptimizationStatus = "completed" | "cancelled" | "timed_out";

export interface OptimizationCell {
	stopMultiplier: number;
	rewardMultiplier: number;
	score: number;
	statistics: BacktestStatistics;
}

export interface OptimizationResult {
	status: OptimizationStatus;
	maximize: NumericStatistic;
	configFingerprint: string;
	totalCells: number;
	best: OptimizationCell | null;
	cells: OptimizationCell[];
}

export interface OptimizeOptions extends RunBacktestOptions {
	/** Statistic to maximize, `totalReturnPct` by default. */
	maximize?: NumericStatistic;
	signal?: AbortSignal;
	/** Checked between cells; cells already run are kept. */
	timeoutMs?: number;
	onCell?: (cell: OptimizationCell) => void;
}

const validateGrid = (grid: RiskGrid): void => {
	const issues: string[] = [];
	const axes = [
		["stopMultipliers", grid.stopMultipliers],
		["rewardMultipliers", grid.rewardMultipliers],
	] as const;
	for (const [key, values] of axes) {
		if (!values.length) {
			issues.push(`${key}: must not be empty`);
		}
		for (const value of values) {
			if (!Number.isFinite(value) || value <= 0) {
				issues.push(`${key}: must be positive, got ${value}`);
			}
		}
	}
	if (issues.length) {
		throw new InvalidConfigurationError(issues);
	}
};

/**
 * Grid search over stop and reward multipliers. The indicator and signal
 * table is built once; every cell runs a fresh simulator over it. Cancellation
 * and the timeout are honoured between cells.
 */
export const optimizeRiskParameters = async (
	rawBars: readonly unknown[],
	configInput: BacktestConfigInput = {},
	grid: RiskGrid = DEFAULT_RISK_GRID,
	options: OptimizeOptions = {}
): Promise<OptimizationResult> => {
	const baseConfig = resolveBacktestConfig(configInput);
	validateGrid(grid);
	const maximize = options.maximize ?? "totalReturnPct";
	const symbol = options.symbol ?? "UNKNOWN";
	const bars = normalizeBars(rawBars, { source: symbol });
	const table = buildSignalTable(bars, baseConfig);

	const totalCells =
		grid.stopMultipliers.length * grid.rewardMultipliers.length;
	const cells: OptimizationCell[] = [];
	let best: OptimizationCell | null = null;
	let status: OptimizationStatus = "completed";
	const startedAt = Date.now();

	optimizeLogger.info("sweep_started", {
		symbol,
		maximize,
		totalCells,
	});

	sweep: for (const stopMultiplier of grid.stopMultipliers) {
		for (const rewardMultiplier of grid.rewardMultipliers) {
			if (options.signal?.aborted) {
				status = "cancelled";
				break sweep;
			}
			if (
				options.timeoutMs !== undefined &&
				Date.now() - startedAt >= options.timeoutMs
			) {
				status = "timed_out";
				break sweep;
			}

			const config = mergeBacktestConfig(baseConfig, {
				risk: { stopMultiplier, rewardMultiplier },
			});
			const { statistics } = simulateTable(table, config, {
				...options,
				symbol,
			});
			const cell: OptimizationCell = {
				stopMultiplier,
				rewardMultiplier,
				score: statistics[maximize],
				statistics,
			};
			cells.push(cell);
			if (!Number.isNaN(cell.score) && (!best || cell.score > best.score)) {
				best = cell;
			}
			options.onCell?.(cell);

			await yieldToEventLoop();
		}
	}

	const logLevel = status === "completed" ? "info" : "warn";
	optimizeLogger.log(logLevel, "sweep_finished", {
		symbol,
		status,
		cellsRun: cells.length,
		totalCells,
		bestStop: best?.stopMultiplier ?? null,
		bestReward: best?.rewardMultiplier ?? null,
		bestScore: best?.score ?? null,
	});

	return {
		status,
		maximize,
		configFingerprint: hashJson(baseConfig),
		totalCells,
		best,
		cells,
	};
};
