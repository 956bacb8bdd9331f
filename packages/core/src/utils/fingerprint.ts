import crypto from "node:crypto";
import type { PriceBar } from "../types";

const stableStringifyInternal = (value: unknown): string => {
	if (value === null || typeof value !== "object") {
		return JSON.stringify(value) ?? "null";
	}
	if (Array.isArray(value)) {
		return `[${value.map(stableStringifyInternal).join(",")}]`;
	}
	const entries = Object.entries(value)
		.filter(([, val]) => typeof val !== "undefined")
		.sort(([a], [b]) => (a < b ? -1 : a > b ? 1 : 0))
		.map(
			([key, val]) => `${JSON.stringify(key)}:${stableStringifyInternal(val)}`
		);
	return `{${entries.join(",")}}`;
};

/** JSON with object keys sorted at every depth. */
export const stableStringify = (value: unknown): string => {
	return stableStringifyInternal(value);
};

export const hashJson = (value: unknown, length = 12): string => {
	const digest = crypto
		.createHash("sha1")
		.update(stableStringify(value))
		.digest("hex");
	return length > 0 ? digest.slice(0, length) : digest;
};

export interface BarFingerprintSummary {
	count: number;
	firstTimestamp: number | null;
	lastTimestamp: number | null;
	headHash: string | null;
	tailHash: string | null;
}

export const summarizeBars = (
	bars: readonly PriceBar[],
	limit = 20
): BarFingerprintSummary => {
	const normalizedLimit = Math.max(1, limit);
	const headSlice = bars.slice(0, Math.min(normalizedLimit, bars.length));
	const tailSlice = bars.slice(Math.max(0, bars.length - normalizedLimit));
	const computeHash = (slice: readonly PriceBar[]): string | null => {
		return slice.length ? hashJson(slice) : null;
	};
	return {
		count: bars.length,
		firstTimestamp: bars[0]?.timestamp ?? null,
		lastTimestamp: bars[bars.length - 1]?.timestamp ?? null,
		headHash: computeHash(headSlice),
		tailHash: computeHash(tailSlice),
	};
};
