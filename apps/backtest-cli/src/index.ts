#!/usr/bin/env node

import path from "node:path";
import process from "node:process";
import {
	describeError,
	getDefaultConfigDir,
	getWorkspaceRoot,
	loadEnvConfig,
} from "@senko/core";
import { getFlag, parseCliArgs } from "./cliArgs";
import { USAGE, logWrittenFiles, runCommand } from "./commands";

const main = async (): Promise<void> => {
	const parsed = parseCliArgs(process.argv.slice(2));
	if (getFlag(parsed.args, "help") || !parsed.command) {
		console.log(USAGE);
		return;
	}

	const env = loadEnvConfig();
	const controller = new AbortController();
	const onInterrupt = (): void => controller.abort();
	process.once("SIGINT", onInterrupt);

	try {
		const written = await runCommand(parsed, {
			configDir: env.configDir ?? getDefaultConfigDir(),
			profile: env.profile,
			outputDir: env.outputDir ?? path.join(getWorkspaceRoot(), "output"),
			print: (line) => console.log(line),
			signal: controller.signal,
		});
		logWrittenFiles(written);
		for (const file of written) {
			console.log(`📤 Saved ${path.relative(process.cwd(), file) || file}`);
		}
	} finally {
		process.removeListener("SIGINT", onInterrupt);
	}
};

main().catch((error: unknown) => {
	const { code, message } = describeError(error);
	console.error(`Backtest failed [${code}]: ${message}`);
	if (process.env.DEBUG) {
		console.error(error);
	}
	process.exitCode = 1;
});
