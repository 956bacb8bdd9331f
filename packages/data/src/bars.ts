import { z } from "zod";
import { SchemaError, createLogger } from "@senko/core";
import type { PriceBar } from "@senko/core";

const dataLogger = createLogger("data:bars");

const MAX_REPORTED_ISSUES = 20;

const price = z.number().finite().positive();

const TimestampSchema = z
	.union([z.number().finite(), z.string().min(1), z.date()])
	.transform((value, ctx) => {
		const ms =
			typeof value === "number"
				? value
				: value instanceof Date
					? value.getTime()
					: parseTimestampString(value);
		if (!Number.isFinite(ms)) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				message: `unparseable timestamp "${String(value)}"`,
			});
			return z.NEVER;
		}
		return ms;
	});

export const PriceBarSchema = z
	.object({
		timestamp: TimestampSchema,
		open: price,
		high: price,
		low: price,
		close: price,
		volume: z.number().finite().min(0).optional(),
	})
	.superRefine((bar, ctx) => {
		if (bar.high < bar.low) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["high"],
				message: "high is below low",
			});
		}
		if (bar.open > bar.high || bar.open < bar.low) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["open"],
				message: "open outside the high/low range",
			});
		}
		if (bar.close > bar.high || bar.close < bar.low) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["close"],
				message: "close outside the high/low range",
			});
		}
	});

export type PriceBarInput = z.input<typeof PriceBarSchema>;

/** Numeric strings are epoch milliseconds; anything else goes through Date.parse. */
const parseTimestampString = (value: string): number => {
	const trimmed = value.trim();
	if (/^-?\d+(\.\d+)?$/.test(trimmed)) {
		return Number(trimmed);
	}
	return Date.parse(trimmed);
};

export interface NormalizeBarsOptions {
	/**
	 * Sort by timestamp and drop duplicates (the last occurrence wins) instead
	 * of rejecting an unordered table.
	 */
	repair?: boolean;
	/** Label used in error messages and logs. */
	source?: string;
}

const sortAndDedupe = (bars: PriceBar[]): PriceBar[] => {
	const byTimestamp = new Map<number, PriceBar>();
	for (const bar of bars) {
		byTimestamp.set(bar.timestamp, bar);
	}
	return Array.from(byTimestamp.values()).sort(
		(a, b) => a.timestamp - b.timestamp
	);
};

const toPriceBar = (parsed: z.output<typeof PriceBarSchema>): PriceBar => {
	const bar: PriceBar = {
		timestamp: parsed.timestamp,
		open: parsed.open,
		high: parsed.high,
		low: parsed.low,
		close: parsed.close,
	};
	if (parsed.volume !== undefined) {
		bar.volume = parsed.volume;
	}
	return Object.freeze(bar);
};

/**
 * Validates a raw bar table into frozen PriceBar records with strictly
 * increasing timestamps. Throws SchemaError listing the offending rows.
 */
export const normalizeBars = (
	rows: readonly unknown[],
	options: NormalizeBarsOptions = {}
): readonly PriceBar[] => {
	const source = options.source ?? "bars";
	const issues: string[] = [];
	const bars: PriceBar[] = [];

	rows.forEach((row, index) => {
		const parsed = PriceBarSchema.safeParse(row);
		if (!parsed.success) {
			for (const issue of parsed.error.issues) {
				const field = issue.path.length ? `.${issue.path.join(".")}` : "";
				issues.push(`row ${index}${field}: ${issue.message}`);
			}
			return;
		}
		bars.push(toPriceBar(parsed.data));
	});

	if (issues.length) {
		throw new SchemaError(
			`Invalid price bars in ${source}: ${issues.length} issue(s)`,
			issues.slice(0, MAX_REPORTED_ISSUES)
		);
	}

	if (options.repair) {
		const repaired = sortAndDedupe(bars);
		if (repaired.length !== bars.length) {
			dataLogger.warn("duplicate_bars_dropped", {
				source,
				dropped: bars.length - repaired.length,
			});
		}
		return Object.freeze(repaired);
	}

	for (let i = 1; i < bars.length; i += 1) {
		if (bars[i].timestamp <= bars[i - 1].timestamp) {
			issues.push(
				`row ${i}.timestamp: ${bars[i].timestamp} does not follow ${bars[i - 1].timestamp}`
			);
		}
	}
	if (issues.length) {
		throw new SchemaError(
			`Timestamps in ${source} must be unique and strictly increasing`,
			issues.slice(0, MAX_REPORTED_ISSUES)
		);
	}

	return Object.freeze(bars);
};
