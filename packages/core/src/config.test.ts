import path from "node:path";
import { describe, expect, it } from "vitest";
import {
	DEFAULT_BACKTEST_CONFIG,
	getConfigMetadata,
	loadBacktestConfig,
	mergeBacktestConfig,
	resolveBacktestConfig,
} from "./config";
import { InvalidConfigurationError } from "./errors";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");

const captureIssues = (fn: () => unknown): string[] => {
	try {
		fn();
	} catch (error) {
		if (error instanceof InvalidConfigurationError) {
			return error.issues;
		}
		throw error;
	}
	throw new Error("expected InvalidConfigurationError");
};

describe("resolveBacktestConfig", () => {
	it("fills every section with defaults", () => {
		expect(DEFAULT_BACKTEST_CONFIG).toEqual({
			indicators: {
				fastWindow: 9,
				slowWindow: 26,
				cloudWindow: 52,
				volatilityWindow: 14,
			},
			trendFilter: { length: 100, backCandles: 7 },
			signal: { lookbackWindow: 10, minConfirm: 5 },
			risk: {
				stopMultiplier: 1.5,
				rewardMultiplier: 2,
				positionSizeFraction: 0.99,
			},
			account: {
				initialCash: 1_000_000,
				commissionRate: 0.0002,
				marginRatio: 0.1,
			},
		});
	});

	it("rejects non-integer and non-positive windows", () => {
		const issues = captureIssues(() =>
			resolveBacktestConfig({ indicators: { fastWindow: 0, slowWindow: 2.5 } })
		);
		expect(issues).toHaveLength(2);
		expect(issues[0]).toMatch(/^indicators\.fastWindow:/);
		expect(issues[1]).toMatch(/^indicators\.slowWindow:/);
	});

	it("rejects out-of-range account and risk values", () => {
		const issues = captureIssues(() =>
			resolveBacktestConfig({
				risk: { stopMultiplier: 0 },
				account: { commissionRate: 1, marginRatio: 0 },
			})
		);
		expect(issues.map((issue) => issue.split(":")[0])).toEqual([
			"risk.stopMultiplier",
			"account.commissionRate",
			"account.marginRatio",
		]);
	});

	it("accepts zero back candles and zero commission", () => {
		const config = resolveBacktestConfig({
			trendFilter: { backCandles: 0 },
			account: { commissionRate: 0 },
		});
		expect(config.trendFilter.backCandles).toBe(0);
		expect(config.account.commissionRate).toBe(0);
	});
});

describe("mergeBacktestConfig", () => {
	it("overrides single fields without dropping the rest of a section", () => {
		const merged = mergeBacktestConfig(DEFAULT_BACKTEST_CONFIG, {
			risk: { stopMultiplier: 2.2 },
		});
		expect(merged.risk).toEqual({
			stopMultiplier: 2.2,
			rewardMultiplier: 2,
			positionSizeFraction: 0.99,
		});
		expect(merged.indicators).toEqual(DEFAULT_BACKTEST_CONFIG.indicators);
	});

	it("marks merged profiles as merged", () => {
		const base = loadBacktestConfig(FIXTURE_DIR, "tight");
		const merged = mergeBacktestConfig(base, { risk: { rewardMultiplier: 1 } });
		expect(getConfigMetadata(merged)).toMatchObject({
			source: "merged",
			profile: "tight",
		});
	});
});

describe("loadBacktestConfig", () => {
	it("merges a profile file over defaults and tags its origin", () => {
		const config = loadBacktestConfig(FIXTURE_DIR, "tight");
		expect(config.risk.stopMultiplier).toBe(1);
		expect(config.risk.rewardMultiplier).toBe(3);
		expect(config.account.initialCash).toBe(10_000);
		expect(config.account.commissionRate).toBe(0.0002);
		expect(getConfigMetadata(config)).toEqual({
			source: "file",
			profile: "tight",
			path: path.join(FIXTURE_DIR, "backtest", "tight.json"),
		});
	});

	it("reports minConfirm larger than the lookback window", () => {
		const issues = captureIssues(() =>
			loadBacktestConfig(FIXTURE_DIR, "confirm-exceeds-lookback")
		);
		expect(issues).toEqual([
			"confirm-exceeds-lookback: signal.minConfirm: must not exceed lookbackWindow (4)",
		]);
	});

	it("rejects unknown keys", () => {
		const issues = captureIssues(() =>
			loadBacktestConfig(FIXTURE_DIR, "unknown-field")
		);
		expect(issues).toHaveLength(1);
		expect(issues[0]).toMatch(/^unknown-field: risk: .*trailingStop/);
	});

	it("rejects malformed JSON", () => {
		expect(() => loadBacktestConfig(FIXTURE_DIR, "malformed")).toThrow(
			InvalidConfigurationError
		);
	});

	it("throws when the profile does not exist", () => {
		expect(() => loadBacktestConfig(FIXTURE_DIR, "missing")).toThrowError(
			/profile "missing" not found/
		);
	});
});
