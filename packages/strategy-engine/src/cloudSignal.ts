import { InvalidConfigurationError, createLogger } from "@senko/core";
import type { IndicatorRow, SignalRow, TradeSignal } from "@senko/core";
import { RollingCount } from "@senko/indicators";
import { computeTrendBias } from "./trendFilter";

const signalLogger = createLogger("strategy-engine:cloud-signal");

export interface CloudSignalParams {
	/** Rows, including the current one, scanned for bars clear of the cloud. */
	lookbackWindow: number;
	/** Bars clear of the cloud required within the lookback window. */
	minConfirm: number;
	/** Extra rows, before the current one, the trend filter must agree on. */
	trendBackCandles: number;
}

export const validateSignalParams = (params: CloudSignalParams): void => {
	const issues: string[] = [];
	if (!Number.isInteger(params.lookbackWindow) || params.lookbackWindow < 1) {
		issues.push(
			`lookbackWindow: must be a positive integer, got ${params.lookbackWindow}`
		);
	}
	if (!Number.isInteger(params.minConfirm) || params.minConfirm < 1) {
		issues.push(
			`minConfirm: must be a positive integer, got ${params.minConfirm}`
		);
	} else if (params.minConfirm > params.lookbackWindow) {
		issues.push(
			`minConfirm: must not exceed lookbackWindow (${params.lookbackWindow})`
		);
	}
	if (
		!Number.isInteger(params.trendBackCandles) ||
		params.trendBackCandles < 0
	) {
		issues.push(
			`trendBackCandles: must be a non-negative integer, got ${params.trendBackCandles}`
		);
	}
	if (issues.length) {
		throw new InvalidConfigurationError(issues);
	}
};

const resolveSignal = (long: boolean, short: boolean): TradeSignal => {
	if (long && !short) {
		return "LONG";
	}
	if (short && !long) {
		return "SHORT";
	}
	return "NONE";
};

/**
 * Cloud pierce entries: a long needs `minConfirm` of the last
 * `lookbackWindow` bars entirely above the cloud, the current bar opening
 * below the cloud top and closing above it, and a +1 trend bias. Shorts
 * mirror this against the cloud bottom. Counts over an incomplete window
 * never confirm.
 */
export const generateSignals = (
	rows: readonly IndicatorRow[],
	params: CloudSignalParams
): SignalRow[] => {
	validateSignalParams(params);

	const trend = computeTrendBias(rows, params.trendBackCandles);
	const aboveWindow = new RollingCount(params.lookbackWindow);
	const belowWindow = new RollingCount(params.lookbackWindow);
	let longs = 0;
	let shorts = 0;

	const signals = rows.map((row, i): SignalRow => {
		const cloudTop = Math.max(row.spanA, row.spanB);
		const cloudBottom = Math.min(row.spanA, row.spanB);
		const aboveCloudCount = aboveWindow.push(
			row.open > cloudTop && row.close > cloudTop
		);
		const belowCloudCount = belowWindow.push(
			row.open < cloudBottom && row.close < cloudBottom
		);
		const pierceUp = row.open < cloudTop && row.close > cloudTop;
		const pierceDown = row.open > cloudBottom && row.close < cloudBottom;
		const trendBias = trend[i];

		const long =
			aboveWindow.full &&
			aboveCloudCount >= params.minConfirm &&
			pierceUp &&
			trendBias === 1;
		const short =
			belowWindow.full &&
			belowCloudCount >= params.minConfirm &&
			pierceDown &&
			trendBias === -1;
		const signal = resolveSignal(long, short);
		if (signal === "LONG") {
			longs += 1;
		} else if (signal === "SHORT") {
			shorts += 1;
		}

		return {
			...row,
			cloudTop,
			cloudBottom,
			trendBias,
			aboveCloudCount,
			belowCloudCount,
			pierceUp,
			pierceDown,
			signal,
		};
	});

	signalLogger.debug("signals_generated", { rows: rows.length, longs, shorts });
	return signals;
};
