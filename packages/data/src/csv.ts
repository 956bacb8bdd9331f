import { parse } from "csv-parse/sync";
import { SchemaError } from "@senko/core";
import type { PriceBar } from "@senko/core";
import { normalizeBars } from "./bars";
import type { NormalizeBarsOptions } from "./bars";

type BarField = "timestamp" | "open" | "high" | "low" | "close" | "volume";

const COLUMN_ALIASES: Record<string, BarField> = {
	timestamp: "timestamp",
	time: "timestamp",
	date: "timestamp",
	datetime: "timestamp",
	gmt_time: "timestamp",
	open: "open",
	o: "open",
	high: "high",
	h: "high",
	low: "low",
	l: "low",
	close: "close",
	c: "close",
	volume: "volume",
	vol: "volume",
	v: "volume",
};

const NUMERIC_FIELDS = new Set<BarField>(["open", "high", "low", "close", "volume"]);

const toFieldValue = (field: BarField, raw: string): unknown => {
	const trimmed = raw.trim();
	if (!trimmed.length) {
		return undefined;
	}
	if (!NUMERIC_FIELDS.has(field)) {
		return trimmed;
	}
	const value = Number(trimmed);
	return Number.isFinite(value) ? value : trimmed;
};

const isStringRecord = (value: unknown): value is Record<string, string> =>
	typeof value === "object" &&
	value !== null &&
	Object.values(value).every((entry) => typeof entry === "string");

/**
 * Parses a CSV bar table. Headers are matched case-insensitively against
 * common OHLCV column names; unknown columns are ignored.
 */
export const parseBarsCsv = (
	content: string,
	options: NormalizeBarsOptions = {}
): readonly PriceBar[] => {
	const records: unknown = parse(content, {
		columns: (header: string[]) => header.map((name) => name.trim().toLowerCase()),
		skip_empty_lines: true,
		trim: true,
	});
	if (!Array.isArray(records)) {
		throw new SchemaError("CSV content did not produce a row list");
	}

	const rows = records.map((record) => {
		if (!isStringRecord(record)) {
			return record;
		}
		const row: Partial<Record<BarField, unknown>> = {};
		for (const [column, raw] of Object.entries(record)) {
			const field = COLUMN_ALIASES[column];
			if (field && row[field] === undefined) {
				row[field] = toFieldValue(field, raw);
			}
		}
		return row;
	});

	return normalizeBars(rows, options);
};
