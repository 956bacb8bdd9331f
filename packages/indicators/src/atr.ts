export interface AtrInput {
	high: number;
	low: number;
	close: number;
}

/**
 * Wilder average true range aligned to `candles`. True range starts at the
 * second candle; the first ATR value, at index `period`, is the mean of the
 * first `period` true ranges.
 */
export function calculateATRSeries(
	candles: readonly AtrInput[],
	period = 14
): Array<number | null> {
	const series: Array<number | null> = new Array(candles.length).fill(null);
	if (period <= 0 || candles.length < period + 1) {
		return series;
	}

	const trueRanges = computeTrueRanges(candles);
	let atr =
		trueRanges.slice(0, period).reduce((acc, value) => acc + value, 0) / period;
	series[period] = atr;

	for (let i = period; i < trueRanges.length; i += 1) {
		atr = (atr * (period - 1) + trueRanges[i]) / period;
		series[i + 1] = atr;
	}

	return series;
}

export const computeTrueRanges = (candles: readonly AtrInput[]): number[] => {
	const trueRanges: number[] = [];
	for (let i = 1; i < candles.length; i += 1) {
		const current = candles[i];
		const previousClose = candles[i - 1].close;
		const highLow = current.high - current.low;
		const highClose = Math.abs(current.high - previousClose);
		const lowClose = Math.abs(current.low - previousClose);
		trueRanges.push(Math.max(highLow, highClose, lowClose));
	}
	return trueRanges;
};
