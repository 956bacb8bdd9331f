import { promises as fs } from "node:fs";
import path from "node:path";
import { SchemaError } from "@senko/core";
import type { PriceBar } from "@senko/core";
import { normalizeBars } from "./bars";
import { parseBarsCsv } from "./csv";

export interface BarFile {
	symbol: string;
	path: string;
	bars: readonly PriceBar[];
}

const SUPPORTED_EXTENSIONS = new Set([".csv", ".json"]);

export const symbolFromPath = (filePath: string): string =>
	path.basename(filePath, path.extname(filePath));

const extractJsonRows = (payload: unknown, source: string): unknown[] => {
	if (Array.isArray(payload)) {
		return payload;
	}
	if (
		typeof payload === "object" &&
		payload !== null &&
		"bars" in payload &&
		Array.isArray(payload.bars)
	) {
		return payload.bars;
	}
	throw new SchemaError(
		`${source} must contain an array of bars or an object with a "bars" array`
	);
};

/**
 * Reads a CSV or JSON bar file. Rows are sorted and de-duplicated by
 * timestamp before validation of ordering.
 */
export const loadBarsFile = async (
	filePath: string,
	symbol = symbolFromPath(filePath)
): Promise<BarFile> => {
	const extension = path.extname(filePath).toLowerCase();
	if (!SUPPORTED_EXTENSIONS.has(extension)) {
		throw new SchemaError(`Unsupported bar file type: ${filePath}`);
	}
	const content = await fs.readFile(filePath, "utf8");
	const options = { repair: true, source: filePath };

	if (extension === ".csv") {
		return { symbol, path: filePath, bars: parseBarsCsv(content, options) };
	}

	let payload: unknown;
	try {
		payload = JSON.parse(content);
	} catch (error) {
		throw new SchemaError(
			`${filePath} is not valid JSON: ${error instanceof Error ? error.message : "parse failed"}`
		);
	}
	return {
		symbol,
		path: filePath,
		bars: normalizeBars(extractJsonRows(payload, filePath), options),
	};
};

/** Lists bar files in a directory, sorted by name. */
export const listBarFiles = async (dir: string): Promise<string[]> => {
	const entries = await fs.readdir(dir, { withFileTypes: true });
	return entries
		.filter(
			(entry) =>
				entry.isFile() &&
				SUPPORTED_EXTENSIONS.has(path.extname(entry.name).toLowerCase())
		)
		.map((entry) => path.join(dir, entry.name))
		.sort();
};
