import { describe, expect, it } from "vitest";
import fc from "fast-check";
import { RollingCount, RollingExtremum } from "./rolling";

describe("RollingExtremum", () => {
	it("returns null until the window fills", () => {
		const max = new RollingExtremum(3, "max");
		expect([5, 1, 4, 2, 0, 7].map((value) => max.push(value))).toEqual([
			null,
			null,
			5,
			4,
			4,
			7,
		]);
	});

	it("tracks the minimum", () => {
		const min = new RollingExtremum(2, "min");
		expect([3, 1, 4, 1, 5].map((value) => min.push(value))).toEqual([
			null,
			1,
			1,
			1,
			1,
		]);
	});

	it("rejects non-positive windows", () => {
		expect(() => new RollingExtremum(0, "max")).toThrow(RangeError);
	});

	it("matches a brute-force scan", () => {
		fc.assert(
			fc.property(
				fc.array(fc.integer({ min: -1000, max: 1000 }), { minLength: 1, maxLength: 3000 }),
				fc.integer({ min: 1, max: 40 }),
				(values, window) => {
					const max = new RollingExtremum(window, "max");
					values.forEach((value, i) => {
						const expected =
							i + 1 >= window
								? Math.max(...values.slice(i + 1 - window, i + 1))
								: null;
						expect(max.push(value)).toBe(expected);
					});
				}
			),
			{ numRuns: 50 }
		);
	});
});

describe("RollingCount", () => {
	it("counts set flags over the trailing window", () => {
		const counter = new RollingCount(3);
		const counts = [true, true, false, true, false, false].map((flag) =>
			counter.push(flag)
		);
		expect(counts).toEqual([1, 2, 2, 2, 1, 1]);
		expect(counter.full).toBe(true);
	});

	it("reports all only for a full window of set flags", () => {
		const counter = new RollingCount(2);
		counter.push(true);
		expect(counter.all).toBe(false);
		counter.push(true);
		expect(counter.all).toBe(true);
		counter.push(false);
		expect(counter.all).toBe(false);
		expect(counter.count).toBe(1);
	});
});
