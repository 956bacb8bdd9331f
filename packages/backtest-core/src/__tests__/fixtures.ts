import type { BacktestConfigInput, PriceBar } from "@senko/core";

export const DAY = 86_400_000;

/**
 * Bars stepping up by 2 that open and close above the cloud, except bar
 * `pierceAt`, which opens inside the cloud and closes above its top.
 */
export const pierceSeries = (count = 16, pierceAt = 10): PriceBar[] =>
	Array.from({ length: count }, (_, t) =>
		t === pierceAt
			? {
					timestamp: t * DAY,
					open: 8.5 + 2 * t,
					high: 11.5 + 2 * t,
					low: 8 + 2 * t,
					close: 11 + 2 * t,
				}
			: {
					timestamp: t * DAY,
					open: 10 + 2 * t,
					high: 11.5 + 2 * t,
					low: 9.5 + 2 * t,
					close: 11 + 2 * t,
				}
	);

/** Bar i: open 9+i, high 11+i, low 9+i, close 10+i. */
export const risingSeries = (count: number): PriceBar[] =>
	Array.from({ length: count }, (_, i) => ({
		timestamp: i * DAY,
		open: 9 + i,
		high: 11 + i,
		low: 9 + i,
		close: 10 + i,
	}));

export const smallConfig: BacktestConfigInput = {
	indicators: {
		fastWindow: 2,
		slowWindow: 3,
		cloudWindow: 4,
		volatilityWindow: 2,
	},
	trendFilter: { length: 5, backCandles: 1 },
	signal: { lookbackWindow: 3, minConfirm: 2 },
	risk: { stopMultiplier: 1.5, rewardMultiplier: 2, positionSizeFraction: 1 },
	account: { initialCash: 3100, commissionRate: 0, marginRatio: 1 },
};
