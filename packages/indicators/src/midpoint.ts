import { RollingExtremum } from "./rolling";

export interface RangeInput {
	high: number;
	low: number;
}

/**
 * Midpoint of the highest high and lowest low over a trailing window, aligned
 * to the input: entries before the window fills are null.
 */
export const midpointSeries = (
	bars: readonly RangeInput[],
	window: number
): Array<number | null> => {
	const highest = new RollingExtremum(window, "max");
	const lowest = new RollingExtremum(window, "min");
	return bars.map((bar) => {
		const high = highest.push(bar.high);
		const low = lowest.push(bar.low);
		return high === null || low === null ? null : (high + low) / 2;
	});
};
