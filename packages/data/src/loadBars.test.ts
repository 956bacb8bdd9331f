import path from "node:path";
import { describe, expect, it } from "vitest";
import { SchemaError } from "@senko/core";
import { listBarFiles, loadBarsFile, symbolFromPath } from "./loadBars";

const FIXTURE_DIR = path.join(__dirname, "__tests__", "fixtures");

describe("loadBarsFile", () => {
	it("loads a CSV file, sorting and de-duplicating rows", async () => {
		const file = await loadBarsFile(path.join(FIXTURE_DIR, "SAMPLE.csv"));
		expect(file.symbol).toBe("SAMPLE");
		expect(file.bars.map((bar) => bar.close)).toEqual([101, 103, 104]);
		expect(file.bars[0].timestamp).toBe(Date.parse("2024-01-02"));
		expect(file.bars[2].volume).toBeUndefined();
	});

	it("loads a JSON file with a bars array", async () => {
		const file = await loadBarsFile(
			path.join(FIXTURE_DIR, "SAMPLE.json"),
			"BTCUSD"
		);
		expect(file.symbol).toBe("BTCUSD");
		expect(file.bars).toHaveLength(2);
		expect(file.bars[1].volume).toBe(5);
	});

	it("rejects unsupported extensions", async () => {
		await expect(
			loadBarsFile(path.join(FIXTURE_DIR, "notes.txt"))
		).rejects.toBeInstanceOf(SchemaError);
	});
});

describe("listBarFiles", () => {
	it("lists only CSV and JSON files in name order", async () => {
		const files = await listBarFiles(FIXTURE_DIR);
		expect(files.map((file) => path.basename(file))).toEqual([
			"SAMPLE.csv",
			"SAMPLE.json",
		]);
	});

	it("derives the symbol from the file name", () => {
		expect(symbolFromPath("/data/EURUSD.csv")).toBe("EURUSD");
	});
});
