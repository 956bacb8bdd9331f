import fs from "node:fs";
import path from "node:path";
import dotenv from "dotenv";
import { z } from "zod";

import { InvalidConfigurationError } from "./errors";

const windowField = (fallback: number) =>
	z.number().int().min(1).default(fallback);

export const IndicatorSettingsSchema = z
	.object({
		fastWindow: windowField(9),
		slowWindow: windowField(26),
		cloudWindow: windowField(52),
		volatilityWindow: windowField(14),
	})
	.strict();

export const TrendFilterSettingsSchema = z
	.object({
		length: windowField(100),
		backCandles: z.number().int().min(0).default(7),
	})
	.strict();

export const SignalSettingsSchema = z
	.object({
		lookbackWindow: windowField(10),
		minConfirm: z.number().int().min(1).default(5),
	})
	.strict();

export const RiskSettingsSchema = z
	.object({
		stopMultiplier: z.number().positive().default(1.5),
		rewardMultiplier: z.number().positive().default(2.0),
		positionSizeFraction: z.number().gt(0).max(1).default(0.99),
	})
	.strict();

export const AccountSettingsSchema = z
	.object({
		initialCash: z.number().positive().default(1_000_000),
		commissionRate: z.number().min(0).lt(1).default(0.0002),
		marginRatio: z.number().gt(0).max(1).default(0.1),
	})
	.strict();

export const BacktestConfigSchema = z
	.object({
		indicators: IndicatorSettingsSchema.default({}),
		trendFilter: TrendFilterSettingsSchema.default({}),
		signal: SignalSettingsSchema.default({}),
		risk: RiskSettingsSchema.default({}),
		account: AccountSettingsSchema.default({}),
	})
	.strict()
	.superRefine((config, ctx) => {
		if (config.signal.minConfirm > config.signal.lookbackWindow) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["signal", "minConfirm"],
				message: `must not exceed lookbackWindow (${config.signal.lookbackWindow})`,
			});
		}
	});

export type IndicatorSettings = z.infer<typeof IndicatorSettingsSchema>;
export type TrendFilterSettings = z.infer<typeof TrendFilterSettingsSchema>;
export type SignalSettings = z.infer<typeof SignalSettingsSchema>;
export type RiskSettings = z.infer<typeof RiskSettingsSchema>;
export type AccountSettings = z.infer<typeof AccountSettingsSchema>;
export type BacktestConfig = z.infer<typeof BacktestConfigSchema>;
/** Partial configuration: every section and field may be omitted. */
export type BacktestConfigInput = z.input<typeof BacktestConfigSchema>;

export type ConfigSourceType = "file" | "embedded" | "merged";

export interface ConfigMetadata {
	path?: string;
	source: ConfigSourceType;
	profile?: string;
}

const CONFIG_META_SYMBOL = Symbol.for("senko.config.meta");

const isConfigMetadata = (value: unknown): value is ConfigMetadata =>
	typeof value === "object" &&
	value !== null &&
	"source" in value &&
	typeof value.source === "string";

const readConfigMetadata = (config: unknown): ConfigMetadata | null => {
	if (!config || typeof config !== "object") {
		return null;
	}
	const meta: unknown = Reflect.get(config, CONFIG_META_SYMBOL);
	return isConfigMetadata(meta) ? meta : null;
};

export const withConfigMetadata = <T extends object>(
	config: T,
	metadata: ConfigMetadata
): T => {
	const existing = readConfigMetadata(config);
	Object.defineProperty(config, CONFIG_META_SYMBOL, {
		value: { ...existing, ...metadata },
		enumerable: false,
		configurable: true,
		writable: true,
	});
	return config;
};

export const getConfigMetadata = (config: unknown): ConfigMetadata | null =>
	readConfigMetadata(config);

const formatIssues = (error: z.ZodError): string[] =>
	error.issues.map((issue) => {
		const location = issue.path.length ? issue.path.join(".") : "config";
		return `${location}: ${issue.message}`;
	});

/**
 * Validates a (possibly partial) configuration, filling omitted fields with
 * defaults. Every violation is reported at once.
 */
export const resolveBacktestConfig = (
	input: BacktestConfigInput = {}
): BacktestConfig => {
	const parsed = BacktestConfigSchema.safeParse(input);
	if (!parsed.success) {
		throw new InvalidConfigurationError(formatIssues(parsed.error));
	}
	return parsed.data;
};

export const DEFAULT_BACKTEST_CONFIG: BacktestConfig = resolveBacktestConfig();

/** Section-wise merge of overrides over an existing configuration. */
export const mergeBacktestConfig = (
	base: BacktestConfigInput,
	overrides: BacktestConfigInput = {}
): BacktestConfig => {
	const merged = resolveBacktestConfig({
		indicators: { ...base.indicators, ...overrides.indicators },
		trendFilter: { ...base.trendFilter, ...overrides.trendFilter },
		signal: { ...base.signal, ...overrides.signal },
		risk: { ...base.risk, ...overrides.risk },
		account: { ...base.account, ...overrides.account },
	});
	const baseMeta = readConfigMetadata(base);
	if (baseMeta) {
		return withConfigMetadata(merged, { ...baseMeta, source: "merged" });
	}
	return merged;
};

let envLoaded = false;
let loadedEnvPath: string | undefined;
let cachedWorkspaceRoot: string | undefined;

const isWorkspaceRoot = (dir: string): boolean => {
	const manifestPath = path.join(dir, "package.json");
	if (!fs.existsSync(manifestPath)) {
		return false;
	}
	try {
		const manifest: unknown = JSON.parse(fs.readFileSync(manifestPath, "utf-8"));
		return (
			typeof manifest === "object" &&
			manifest !== null &&
			"workspaces" in manifest
		);
	} catch {
		return false;
	}
};

const findWorkspaceRoot = (): string => {
	if (cachedWorkspaceRoot) {
		return cachedWorkspaceRoot;
	}

	let current = process.cwd();
	while (!isWorkspaceRoot(current)) {
		const parent = path.dirname(current);
		if (parent === current) {
			cachedWorkspaceRoot = process.cwd();
			return cachedWorkspaceRoot;
		}
		current = parent;
	}

	cachedWorkspaceRoot = current;
	return current;
};

export const getWorkspaceRoot = (): string => findWorkspaceRoot();

const getDefaultEnvPath = (): string => path.join(findWorkspaceRoot(), ".env");
export const getDefaultConfigDir = (): string =>
	path.join(findWorkspaceRoot(), "config");

const readOptionalEnvVar = (key: string): string | undefined => {
	const value = process.env[key];
	if (typeof value !== "string") {
		return undefined;
	}
	const trimmed = value.trim();
	return trimmed.length ? trimmed : undefined;
};

export interface EnvConfig {
	profile: string;
	configDir?: string;
	outputDir?: string;
}

export const loadEnvConfig = (envPath = getDefaultEnvPath()): EnvConfig => {
	if (!envLoaded || loadedEnvPath !== envPath) {
		dotenv.config({ path: envPath });
		envLoaded = true;
		loadedEnvPath = envPath;
	}

	return {
		profile: readOptionalEnvVar("BACKTEST_PROFILE") ?? "default",
		configDir: readOptionalEnvVar("BACKTEST_CONFIG_DIR"),
		outputDir: readOptionalEnvVar("BACKTEST_OUTPUT_DIR"),
	};
};

const readJsonFile = (filePath: string): unknown => {
	const contents = fs.readFileSync(filePath, "utf-8");
	try {
		return JSON.parse(contents);
	} catch (error) {
		throw new InvalidConfigurationError([
			`${filePath}: ${error instanceof Error ? error.message : "invalid JSON"}`,
		]);
	}
};

export const resolveBacktestProfilePath = (
	configDir: string,
	profile: string
): string => {
	const fileName = profile.endsWith(".json") ? profile : `${profile}.json`;
	const candidates = [
		path.join(configDir, "backtest", fileName),
		path.join(configDir, fileName),
	];
	for (const candidate of candidates) {
		if (fs.existsSync(candidate)) {
			return candidate;
		}
	}
	throw new InvalidConfigurationError([
		`profile "${profile}" not found. Looked for ${candidates.join(", ")}`,
	]);
};

/**
 * Loads `config/backtest/<profile>.json`. Fields the profile omits fall back
 * to the defaults.
 */
export const loadBacktestConfig = (
	configDir = getDefaultConfigDir(),
	profile = "default"
): BacktestConfig => {
	const profilePath = resolveBacktestProfilePath(configDir, profile);
	const file = readJsonFile(profilePath);
	if (typeof file !== "object" || file === null || Array.isArray(file)) {
		throw new InvalidConfigurationError([
			`${profilePath}: expected a JSON object`,
		]);
	}
	const parsed = BacktestConfigSchema.safeParse(file);
	if (!parsed.success) {
		throw new InvalidConfigurationError(
			formatIssues(parsed.error).map((issue) => `${profile}: ${issue}`)
		);
	}
	return withConfigMetadata(parsed.data, {
		source: "file",
		path: profilePath,
		profile,
	});
};
