import type { Trade } from "@senko/core";
import type { StreakDiagnostics } from "./metricsSchema";

export const buildStreakDiagnostics = (
	trades: readonly Trade[]
): StreakDiagnostics => {
	let longestWinStreak = 0;
	let longestLossStreak = 0;
	let currentWinStreak = 0;
	let currentLossStreak = 0;

	for (const trade of trades) {
		if (trade.pnl > 0) {
			currentWinStreak += 1;
			currentLossStreak = 0;
			longestWinStreak = Math.max(longestWinStreak, currentWinStreak);
		} else if (trade.pnl < 0) {
			currentLossStreak += 1;
			currentWinStreak = 0;
			longestLossStreak = Math.max(longestLossStreak, currentLossStreak);
		} else {
			currentLossStreak = 0;
			currentWinStreak = 0;
		}
	}

	return {
		longestWinStreak,
		longestLossStreak,
	};
};
