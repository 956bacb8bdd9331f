import { promises as fs } from "node:fs";
import path from "node:path";
import {
	createLogger,
	loadBacktestConfig,
	mergeBacktestConfig,
} from "@senko/core";
import type { BacktestConfig, BacktestConfigInput } from "@senko/core";
import { listBarFiles, loadBarsFile, symbolFromPath } from "@senko/data";
import {
	optimizeRiskParameters,
	runBacktest,
	runBatch,
	summarizeBatch,
} from "@senko/backtest-core";
import type {
	BacktestRunResult,
	OptimizationResult,
} from "@senko/backtest-core";
import {
	formatBatchSummaryCsv,
	formatStatisticsCsv,
	formatTradesCsv,
	isNumericStatistic,
	toCsv,
} from "@senko/metrics";
import { getFlag, getNumberArg, getStringArg } from "./cliArgs";
import type { ParsedCliArgs } from "./cliArgs";

const cliLogger = createLogger("backtest-cli");

export const USAGE = `Usage:
  npm run backtest -- <command> [options]

Commands:
  run --file <csv|json>      Backtest one bar file
  batch --dir <dir>          Backtest every .csv/.json file in a directory
  optimize --file <csv|json> Grid search over stop and reward multipliers

Options:
  --symbol <name>            Symbol label (defaults to the file name)
  --profile <name>           Config profile under config/backtest (default: BACKTEST_PROFILE or "default")
  --configDir <path>         Config directory
  --output <dir>             Output directory (default: BACKTEST_OUTPUT_DIR or ./output)
  --stop <n>                 Override risk.stopMultiplier
  --reward <n>               Override risk.rewardMultiplier
  --initialCash <n>          Override account.initialCash
  --periodsPerYear <n>       Annualization factor for sharpe/sortino
  --metric <name>            Statistic maximized by optimize (default: totalReturnPct)
  --timeout <ms>             Stop optimize after this many milliseconds
  --json                     Print the full JSON result
  --help                     Show this message
`;

export interface CommandContext {
	configDir: string;
	profile: string;
	outputDir: string;
	print: (line: string) => void;
	signal?: AbortSignal;
}

const requireStringArg = (parsed: ParsedCliArgs, key: string): string => {
	const value = getStringArg(parsed.args, key);
	if (!value) {
		throw new Error(`Missing required --${key} for ${parsed.command}`);
	}
	return value;
};

const resolveConfig = (
	parsed: ParsedCliArgs,
	context: CommandContext
): BacktestConfig => {
	const configDir = getStringArg(parsed.args, "configDir") ?? context.configDir;
	const profile = getStringArg(parsed.args, "profile") ?? context.profile;
	const base = loadBacktestConfig(configDir, profile);

	const risk: NonNullable<BacktestConfigInput["risk"]> = {};
	const stop = getNumberArg(parsed.args, "stop");
	if (stop !== undefined) {
		risk.stopMultiplier = stop;
	}
	const reward = getNumberArg(parsed.args, "reward");
	if (reward !== undefined) {
		risk.rewardMultiplier = reward;
	}
	const account: NonNullable<BacktestConfigInput["account"]> = {};
	const initialCash = getNumberArg(parsed.args, "initialCash");
	if (initialCash !== undefined) {
		account.initialCash = initialCash;
	}
	return mergeBacktestConfig(base, { risk, account });
};

const safeName = (symbol: string): string => symbol.replace(/[\\/:\s]/g, "_");

const resolveOutputDir = (
	parsed: ParsedCliArgs,
	context: CommandContext
): string => getStringArg(parsed.args, "output") ?? context.outputDir;

const writeFiles = async (
	outputDir: string,
	files: Record<string, string>
): Promise<string[]> => {
	await fs.mkdir(outputDir, { recursive: true });
	const written: string[] = [];
	for (const [name, content] of Object.entries(files)) {
		const filePath = path.join(outputDir, name);
		await fs.writeFile(
			filePath,
			content.endsWith("\n") ? content : `${content}\n`
		);
		written.push(filePath);
	}
	return written;
};

/** Infinite ratios are written as "Infinity", as in the CSV reports. */
const writeInfinity = (_key: string, value: unknown): unknown =>
	typeof value === "number" && !Number.isFinite(value) && !Number.isNaN(value)
		? String(value)
		: value;

export const toJson = (value: unknown): string =>
	JSON.stringify(value, writeInfinity, 2);

const printSummary = (
	result: BacktestRunResult,
	print: (line: string) => void
): void => {
	const { statistics } = result;
	print(`---- ${result.symbol} (${result.configFingerprint}) ----`);
	print(`Trades: ${statistics.tradeCount}`);
	print(`Final equity: ${statistics.finalEquity.toFixed(2)}`);
	print(`Return: ${statistics.totalReturnPct.toFixed(2)}%`);
	print(`Buy & hold: ${statistics.buyAndHoldReturnPct.toFixed(2)}%`);
	print(`Max drawdown: ${statistics.maxDrawdownPct.toFixed(2)}%`);
	print(`Win rate: ${statistics.winRatePct.toFixed(2)}%`);
	if (result.ruin.triggered) {
		print(`Ruined at bar ${result.ruin.index}`);
	}
};

export const runSingleCommand = async (
	parsed: ParsedCliArgs,
	context: CommandContext
): Promise<string[]> => {
	const file = requireStringArg(parsed, "file");
	const config = resolveConfig(parsed, context);
	const symbol = getStringArg(parsed.args, "symbol") ?? symbolFromPath(file);
	const { bars } = await loadBarsFile(file, symbol);
	const result = runBacktest(bars, config, {
		symbol,
		periodsPerYear: getNumberArg(parsed.args, "periodsPerYear"),
	});

	printSummary(result, context.print);
	if (getFlag(parsed.args, "json")) {
		context.print(toJson(result));
	}

	const prefix = `${safeName(symbol)}-${result.configFingerprint}`;
	return writeFiles(resolveOutputDir(parsed, context), {
		[`${prefix}-result.json`]: toJson(result),
		[`${prefix}-trades.csv`]: formatTradesCsv(result.trades, symbol),
		[`${prefix}-statistics.csv`]: formatStatisticsCsv(
			result.statistics,
			symbol
		),
	});
};

export const runBatchCommand = async (
	parsed: ParsedCliArgs,
	context: CommandContext
): Promise<string[]> => {
	const dir = requireStringArg(parsed, "dir");
	const config = resolveConfig(parsed, context);
	const files = await listBarFiles(dir);
	if (!files.length) {
		throw new Error(`No .csv or .json bar files in ${dir}`);
	}

	const outcomes = await runBatch(
		files.map((file) => {
			const symbol = symbolFromPath(file);
			return {
				symbol,
				bars: async () => (await loadBarsFile(file, symbol)).bars,
			};
		}),
		config,
		{ periodsPerYear: getNumberArg(parsed.args, "periodsPerYear") }
	);
	const rows = summarizeBatch(outcomes);

	for (const row of rows) {
		context.print(
			row.values
				? `${row.symbol}: ${row.values.totalReturnPct.toFixed(2)}% over ${row.values.tradeCount} trades`
				: `${row.symbol}: failed (${row.error ?? "unknown error"})`
		);
	}
	if (getFlag(parsed.args, "json")) {
		context.print(toJson(rows));
	}

	return writeFiles(resolveOutputDir(parsed, context), {
		"batch-summary.json": toJson(rows),
		"batch-summary.csv": formatBatchSummaryCsv(rows),
	});
};

const formatCellsCsv = (result: OptimizationResult): string =>
	toCsv(
		[
			"stopMultiplier",
			"rewardMultiplier",
			"score",
			"tradeCount",
			"totalReturnPct",
		],
		result.cells.map((cell) => ({
			stopMultiplier: cell.stopMultiplier,
			rewardMultiplier: cell.rewardMultiplier,
			score: cell.score,
			tradeCount: cell.statistics.tradeCount,
			totalReturnPct: cell.statistics.totalReturnPct,
		})),
		true
	);

export const runOptimizeCommand = async (
	parsed: ParsedCliArgs,
	context: CommandContext
): Promise<string[]> => {
	const file = requireStringArg(parsed, "file");
	const metric = getStringArg(parsed.args, "metric") ?? "totalReturnPct";
	if (!isNumericStatistic(metric)) {
		throw new Error(`Unknown --metric ${metric}`);
	}
	const config = resolveConfig(parsed, context);
	const symbol = getStringArg(parsed.args, "symbol") ?? symbolFromPath(file);
	const { bars } = await loadBarsFile(file, symbol);

	const result = await optimizeRiskParameters(bars, config, undefined, {
		symbol,
		maximize: metric,
		signal: context.signal,
		timeoutMs: getNumberArg(parsed.args, "timeout"),
		periodsPerYear: getNumberArg(parsed.args, "periodsPerYear"),
	});

	context.print(
		`${symbol}: ${result.status}, ${result.cells.length}/${result.totalCells} cells`
	);
	if (result.best) {
		context.print(
			`Best ${metric}: ${result.best.score.toFixed(4)} at stop ${result.best.stopMultiplier}, reward ${result.best.rewardMultiplier}`
		);
	}
	if (getFlag(parsed.args, "json")) {
		context.print(toJson(result));
	}

	const prefix = `${safeName(symbol)}-${result.configFingerprint}-optimize`;
	return writeFiles(resolveOutputDir(parsed, context), {
		[`${prefix}.json`]: toJson(result),
		[`${prefix}.csv`]: formatCellsCsv(result),
	});
};

export const runCommand = async (
	parsed: ParsedCliArgs,
	context: CommandContext
): Promise<string[]> => {
	switch (parsed.command) {
		case "run":
			return runSingleCommand(parsed, context);
		case "batch":
			return runBatchCommand(parsed, context);
		case "optimize":
			return runOptimizeCommand(parsed, context);
		default:
			throw new Error(
				parsed.command
					? `Unknown command "${parsed.command}"\n\n${USAGE}`
					: USAGE
			);
	}
};

export const logWrittenFiles = (files: readonly string[]): void => {
	cliLogger.info("output_written", { files });
};
