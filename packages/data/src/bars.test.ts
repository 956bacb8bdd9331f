import { describe, expect, it } from "vitest";
import { SchemaError } from "@senko/core";
import { normalizeBars } from "./bars";

const bar = (timestamp: number, close = 100) => ({
	timestamp,
	open: close,
	high: close + 1,
	low: close - 1,
	close,
});

const captureSchemaError = (fn: () => unknown): SchemaError => {
	try {
		fn();
	} catch (error) {
		if (error instanceof SchemaError) {
			return error;
		}
		throw error;
	}
	throw new Error("expected SchemaError");
};

describe("normalizeBars", () => {
	it("returns frozen bars in input order", () => {
		const bars = normalizeBars([bar(1), bar(2, 101)]);
		expect(bars).toEqual([
			{ timestamp: 1, open: 100, high: 101, low: 99, close: 100 },
			{ timestamp: 2, open: 101, high: 102, low: 100, close: 101 },
		]);
		expect(Object.isFrozen(bars)).toBe(true);
		expect(Object.isFrozen(bars[0])).toBe(true);
	});

	it("converts ISO strings and dates to epoch milliseconds", () => {
		const bars = normalizeBars([
			{ ...bar(0), timestamp: "2024-01-02T00:00:00Z" },
			{ ...bar(0), timestamp: new Date("2024-01-03T00:00:00Z") },
			{ ...bar(0), timestamp: "1704326400000" },
		]);
		expect(bars.map((entry) => entry.timestamp)).toEqual([
			1704153600000, 1704240000000, 1704326400000,
		]);
	});

	it("reports missing and non-numeric fields per row", () => {
		const error = captureSchemaError(() =>
			normalizeBars([
				bar(1),
				{ timestamp: 2, open: 1, high: 2, low: 0.5 },
				{ ...bar(3), high: "abc" },
			])
		);
		expect(error.code).toBe("SCHEMA_ERROR");
		expect(error.issues).toEqual([
			"row 1.close: Required",
			"row 2.high: Expected number, received string",
		]);
	});

	it("rejects inconsistent OHLC values", () => {
		const error = captureSchemaError(() =>
			normalizeBars([{ timestamp: 1, open: 5, high: 4, low: 3, close: 3.5 }])
		);
		expect(error.issues).toEqual(["row 0.open: open outside the high/low range"]);
	});

	it("rejects duplicate and decreasing timestamps", () => {
		const error = captureSchemaError(() =>
			normalizeBars([bar(1), bar(3), bar(3), bar(2)])
		);
		expect(error.issues).toEqual([
			"row 2.timestamp: 3 does not follow 3",
			"row 3.timestamp: 2 does not follow 3",
		]);
	});

	it("sorts and de-duplicates in repair mode, keeping the last duplicate", () => {
		const bars = normalizeBars([bar(3, 103), bar(1), bar(3, 105)], {
			repair: true,
		});
		expect(bars.map((entry) => [entry.timestamp, entry.close])).toEqual([
			[1, 100],
			[3, 105],
		]);
	});
});
