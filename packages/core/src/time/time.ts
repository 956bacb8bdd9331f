/**
 * Pure time utilities. All functions operate on UTC epoch milliseconds.
 */
import {
	DAY_MS,
	MONTHLY_SPACING_MS,
	MONTHS_PER_YEAR,
	TRADING_DAYS_PER_YEAR,
	WEEK_MS,
	WEEKS_PER_YEAR,
} from "./constants";

/**
 * Median spacing between consecutive timestamps, or null with fewer than two.
 */
export const medianSpacingMs = (timestamps: readonly number[]): number | null => {
	if (timestamps.length < 2) {
		return null;
	}
	const deltas: number[] = [];
	for (let i = 1; i < timestamps.length; i += 1) {
		deltas.push(timestamps[i] - timestamps[i - 1]);
	}
	deltas.sort((a, b) => a - b);
	const mid = Math.floor(deltas.length / 2);
	return deltas.length % 2 === 0
		? (deltas[mid - 1] + deltas[mid]) / 2
		: deltas[mid];
};

/**
 * Annualization factor for a given bar spacing: monthly bars give 12, weekly
 * 52, daily 252, intraday bars scale 252 trading days by bars per day.
 */
export const periodsPerYearForSpacing = (spacingMs: number): number => {
	if (!Number.isFinite(spacingMs) || spacingMs <= 0) {
		return TRADING_DAYS_PER_YEAR;
	}
	if (spacingMs >= MONTHLY_SPACING_MS) {
		return MONTHS_PER_YEAR;
	}
	if (spacingMs >= WEEK_MS) {
		return WEEKS_PER_YEAR;
	}
	if (spacingMs >= DAY_MS) {
		return TRADING_DAYS_PER_YEAR;
	}
	return TRADING_DAYS_PER_YEAR * (DAY_MS / spacingMs);
};

export const inferPeriodsPerYear = (timestamps: readonly number[]): number => {
	const spacing = medianSpacingMs(timestamps);
	return spacing === null
		? TRADING_DAYS_PER_YEAR
		: periodsPerYearForSpacing(spacing);
};
