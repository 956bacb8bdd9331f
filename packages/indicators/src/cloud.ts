import {
	InsufficientDataError,
	InvalidConfigurationError,
	createLogger,
} from "@senko/core";
import type { IndicatorRow, PriceBar } from "@senko/core";
import { calculateATRSeries } from "./atr";
import { emaSeries } from "./ema";
import { midpointSeries } from "./midpoint";

const indicatorLogger = createLogger("indicators:cloud");

export interface CloudIndicatorParams {
	fastWindow: number;
	slowWindow: number;
	cloudWindow: number;
	volatilityWindow: number;
	trendLength: number;
}

export const validateCloudParams = (params: CloudIndicatorParams): void => {
	const issues = Object.entries(params)
		.filter(([, value]) => !Number.isInteger(value) || value < 1)
		.map(([key, value]) => `${key}: must be a positive integer, got ${value}`);
	if (issues.length) {
		throw new InvalidConfigurationError(issues);
	}
};

/**
 * Fewest bars that produce at least one complete indicator row. The ATR needs
 * one extra bar because true range starts at the second bar.
 */
export const requiredBars = (params: CloudIndicatorParams): number =>
	Math.max(
		params.fastWindow,
		params.slowWindow,
		params.cloudWindow,
		params.trendLength,
		params.volatilityWindow + 1
	);

const cloudAt = (
	spanA: ReadonlyArray<number | null>,
	spanB: ReadonlyArray<number | null>,
	index: number
): { top: number; bottom: number } | null => {
	if (index < 0) {
		return null;
	}
	const a = spanA[index];
	const b = spanB[index];
	if (a === null || b === null) {
		return null;
	}
	return { top: Math.max(a, b), bottom: Math.min(a, b) };
};

/**
 * Computes the cloud indicator table. Every value at row t is derived from
 * bars[0..t] only: spans are not shifted forward, and the lagging-close
 * confirmation compares the close `slowWindow` bars back with the cloud as it
 * stood on that same bar.
 *
 * Rows are emitted only for bars where every indicator is defined.
 */
export const buildIndicatorTable = (
	bars: readonly PriceBar[],
	params: CloudIndicatorParams
): IndicatorRow[] => {
	validateCloudParams(params);
	const required = requiredBars(params);
	if (bars.length < required) {
		throw new InsufficientDataError(required, bars.length);
	}

	const fast = midpointSeries(bars, params.fastWindow);
	const slow = midpointSeries(bars, params.slowWindow);
	const spanB = midpointSeries(bars, params.cloudWindow);
	const spanA = fast.map((fastValue, i) => {
		const slowValue = slow[i];
		return fastValue === null || slowValue === null
			? null
			: (fastValue + slowValue) / 2;
	});
	const volatility = calculateATRSeries(bars, params.volatilityWindow);
	const trend = emaSeries(
		bars.map((bar) => bar.close),
		params.trendLength
	);

	const rows: IndicatorRow[] = [];
	for (let t = 0; t < bars.length; t += 1) {
		const fastLine = fast[t];
		const slowLine = slow[t];
		const a = spanA[t];
		const b = spanB[t];
		const vol = volatility[t];
		const trendValue = trend[t];
		if (
			fastLine === null ||
			slowLine === null ||
			a === null ||
			b === null ||
			vol === null ||
			trendValue === null
		) {
			continue;
		}

		const lagIndex = t - params.slowWindow;
		const lagCloud = cloudAt(spanA, spanB, lagIndex);
		const lagClose = lagIndex >= 0 ? bars[lagIndex].close : null;

		rows.push({
			...bars[t],
			index: t,
			fastLine,
			slowLine,
			spanA: a,
			spanB: b,
			volatility: vol,
			trendValue,
			longConfirmed:
				lagCloud !== null && lagClose !== null && lagClose > lagCloud.top,
			shortConfirmed:
				lagCloud !== null && lagClose !== null && lagClose < lagCloud.bottom,
		});
	}

	indicatorLogger.debug("indicator_table_built", {
		bars: bars.length,
		rows: rows.length,
		firstIndex: rows[0]?.index ?? null,
	});

	return rows;
};
