import { RollingCount } from "@senko/indicators";
import type { IndicatorRow, TrendBias } from "@senko/core";

type TrendInput = Pick<IndicatorRow, "open" | "close" | "trendValue">;

/**
 * Directional gate from the trend average: +1 when every row in the window
 * of `backCandles + 1` rows ending at t opens and closes above the average,
 * -1 when every row is entirely below, 0 otherwise. Until the window is full
 * the bias is 0.
 */
export const computeTrendBias = (
	rows: readonly TrendInput[],
	backCandles: number
): TrendBias[] => {
	if (!Number.isInteger(backCandles) || backCandles < 0) {
		throw new RangeError(
			`backCandles must be a non-negative integer, got ${backCandles}`
		);
	}
	const window = backCandles + 1;
	const above = new RollingCount(window);
	const below = new RollingCount(window);

	return rows.map((row) => {
		above.push(row.open > row.trendValue && row.close > row.trendValue);
		below.push(row.open < row.trendValue && row.close < row.trendValue);
		if (above.all) {
			return 1;
		}
		if (below.all) {
			return -1;
		}
		return 0;
	});
};
