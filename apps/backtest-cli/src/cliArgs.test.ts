import { describe, it, expect } from "vitest";
import { getFlag, getNumberArg, getStringArg, parseCliArgs } from "./cliArgs";

describe("backtest CLI arg parsing", () => {
	it("takes the first positional as the command", () => {
		const parsed = parseCliArgs(["run", "--file", "bars.csv", "extra"]);
		expect(parsed.command).toBe("run");
		expect(parsed.positionals).toEqual(["extra"]);
		expect(parsed.args.file).toBe("bars.csv");
	});

	it("captures --key=value syntax", () => {
		const parsed = parseCliArgs(["optimize", "--metric=sharpeRatio"]);
		expect(parsed.args.metric).toBe("sharpeRatio");
	});

	it("treats a key followed by another key as a flag", () => {
		const parsed = parseCliArgs(["run", "--json", "--symbol", "ABC"]);
		expect(parsed.args.json).toBe(true);
		expect(parsed.args.symbol).toBe("ABC");
		expect(getFlag(parsed.args, "json")).toBe(true);
		expect(getFlag(parsed.args, "help")).toBe(false);
	});

	it("leaves the command undefined without positionals", () => {
		const parsed = parseCliArgs(["--help"]);
		expect(parsed.command).toBeUndefined();
		expect(parsed.args.help).toBe(true);
	});

	it("reads typed values", () => {
		const { args } = parseCliArgs(["--timeout", "250", "--bad", "x", "--flag"]);
		expect(getNumberArg(args, "timeout")).toBe(250);
		expect(getNumberArg(args, "missing")).toBeUndefined();
		expect(getStringArg(args, "flag")).toBeUndefined();
		expect(() => getNumberArg(args, "bad")).toThrow(
			"Invalid numeric value for --bad: x"
		);
	});
});
